/**
 * RunPod Provider
 *
 * Serverless backend driven through RunPod's REST API: a template holding
 * the worker image and environment, then an endpoint running it. The
 * endpoint speaks the OpenAI API under `/openai/v1`.
 */

import { request, type Dispatcher } from "undici";
import { z } from "zod";
import type { DeployRequest, DeploymentResult, ProviderPlan } from "../types/deployment.js";
import type { InferenceProvider, PreflightCheck, ProviderStatus } from "../types/provider.js";
import { failedResult } from "../types/deployment.js";
import { ConfigError, HybridRouterError } from "../types/errors.js";
import { providerGpuId, providerGpuMap } from "../catalog/catalog.js";
import { debug, errorMessage, logger } from "../utils/debug.js";
import { httpStatus, resolveProviderDeps, type ProviderDeps } from "./base.js";

const NAME = "runpod";

export const RUNPOD_API_BASE = "https://rest.runpod.io/v1";
export const RUNPOD_SERVE_BASE = "https://api.runpod.ai/v2";

const WORKER_IMAGE = "runpod/worker-v1-vllm:v2.11.3";
const REQUEST_TIMEOUT_MS = 30_000;

export interface RunpodProviderOptions extends ProviderDeps {
  /** REST API base. Default: RUNPOD_API_BASE */
  apiBase?: string;
  /** undici dispatcher for outbound calls. Default: the global one */
  dispatcher?: Dispatcher;
}

const createdSchema = z.object({ id: z.string() });
const endpointListSchema = z.array(z.object({ id: z.string(), name: z.string().default("") }));
const endpointDetailSchema = z
  .object({
    templateId: z.string().optional(),
    workers: z.unknown().optional(),
  })
  .passthrough();

/**
 * Non-2xx answer from the REST API
 */
class RunpodApiError extends HybridRouterError {
  readonly statusCode: number;

  constructor(method: string, path: string, statusCode: number, body: string) {
    super(`${method} ${path} returned ${statusCode}${body ? `: ${body.slice(0, 200)}` : ""}`);
    this.name = "RunpodApiError";
    this.statusCode = statusCode;
  }
}

export const runpodEndpointName = (serviceName: string): string => `${serviceName}-serverless`;

/**
 * Create the RunPod adapter
 */
export const createRunpodProvider = (options: RunpodProviderOptions = {}): InferenceProvider => {
  const { env } = resolveProviderDeps(options);
  const apiBase = (options.apiBase ?? RUNPOD_API_BASE).replace(/\/+$/, "");

  const apiKey = (): string | undefined => env.RUNPOD_API_KEY || undefined;

  const call = async (
    method: "GET" | "POST" | "DELETE",
    path: string,
    key: string,
    body?: unknown
  ): Promise<unknown> => {
    const response = await request(`${apiBase}${path}`, {
      method,
      headers: {
        authorization: `Bearer ${key}`,
        "content-type": "application/json",
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      dispatcher: options.dispatcher,
    });
    const text = await response.body.text();
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new RunpodApiError(method, path, response.statusCode, text);
    }
    return text ? JSON.parse(text) : null;
  };

  const plan = (req: DeployRequest): ProviderPlan => {
    const gpuTypeId = providerGpuId(req.gpu, NAME);
    if (!gpuTypeId) {
      const supported = Object.keys(providerGpuMap(NAME)).sort().join(", ");
      throw new ConfigError(`GPU ${req.gpu} is not offered. Supported: ${supported}`, NAME);
    }

    const serverless = req.scaling.serverless;
    const fastBoot = req.coldStartMode === "fast_boot";

    const workerEnv: Record<string, string> = {
      MODEL_NAME: req.modelName,
      MAX_MODEL_LEN: String(req.maxModelLen),
      TENSOR_PARALLEL_SIZE: String(req.tpSize),
      GPU_MEMORY_UTILIZATION: "0.95",
      MAX_CONCURRENCY: String(req.concurrency),
      DISABLE_LOG_REQUESTS: "true",
      OPENAI_SERVED_MODEL_NAME_OVERRIDE: "llm",
    };
    if (fastBoot) {
      workerEnv.ENFORCE_EAGER = "true";
    }
    if (env.HF_TOKEN) {
      workerEnv.HF_TOKEN = env.HF_TOKEN;
    }

    return {
      provider: NAME,
      renderedScript: "",
      env: workerEnv,
      metadata: {
        endpoint_name: runpodEndpointName(req.serviceName),
        image_name: WORKER_IMAGE,
        gpu_type_id: gpuTypeId,
        gpu_count: String(req.gpuCount),
        workers_min: String(req.scaleToZero ? serverless.workersMin : Math.max(1, serverless.workersMin)),
        workers_max: String(serverless.workersMax),
        idle_timeout: String(serverless.scaledownWindow),
        execution_timeout_ms: String(serverless.timeout * 1000),
        flashboot: fastBoot ? "true" : "false",
        scaler_value: String(serverless.scalerValue),
      },
    };
  };

  const deploy: InferenceProvider["deploy"] = async (deployPlan) => {
    const meta = deployPlan.metadata;
    const endpointName = meta.endpoint_name;
    if (!endpointName) {
      throw new HybridRouterError("RunPod plan is missing endpoint_name");
    }
    const key = apiKey();
    if (!key) {
      return failedResult(NAME, "RUNPOD_API_KEY environment variable is not set", {
        endpoint_name: endpointName,
      });
    }

    let templateId: string;
    try {
      logger.info(`Creating RunPod template ${endpointName}`);
      const created = createdSchema.parse(
        await call("POST", "/templates", key, {
          name: endpointName,
          imageName: meta.image_name,
          containerDiskInGb: 50,
          env: deployPlan.env,
          isServerless: true,
        })
      );
      templateId = created.id;
    } catch (error) {
      return failedResult(NAME, `Template creation failed: ${errorMessage(error)}`, {
        endpoint_name: endpointName,
      });
    }

    let endpointId: string;
    try {
      logger.info(`Creating RunPod endpoint ${endpointName}`);
      const created = createdSchema.parse(
        await call("POST", "/endpoints", key, {
          name: endpointName,
          templateId,
          gpuTypeIds: [meta.gpu_type_id],
          gpuCount: Number(meta.gpu_count ?? "1"),
          workersMin: Number(meta.workers_min ?? "0"),
          workersMax: Number(meta.workers_max ?? "1"),
          idleTimeout: Number(meta.idle_timeout ?? "60"),
          executionTimeoutMs: Number(meta.execution_timeout_ms ?? "600000"),
          flashboot: meta.flashboot === "true",
          scalerType: "QUEUE_DELAY",
          scalerValue: Number(meta.scaler_value ?? "4"),
        })
      );
      endpointId = created.id;
    } catch (error) {
      // The template is useless without its endpoint
      try {
        await call("DELETE", `/templates/${templateId}`, key);
      } catch (cleanupError) {
        logger.warn(`Failed to clean up RunPod template ${templateId}: ${errorMessage(cleanupError)}`);
      }
      return failedResult(NAME, `Endpoint creation failed: ${errorMessage(error)}`, {
        endpoint_name: endpointName,
        template_id: templateId,
      });
    }

    const endpointUrl = `${RUNPOD_SERVE_BASE}/${endpointId}/openai/v1`;
    logger.info(`RunPod endpoint ${endpointName} deployed at ${endpointUrl}`);
    return {
      provider: NAME,
      deploymentId: endpointId,
      endpointUrl,
      healthUrl: `${RUNPOD_SERVE_BASE}/${endpointId}/health`,
      metadata: {
        endpoint_id: endpointId,
        template_id: templateId,
        endpoint_name: endpointName,
      },
    };
  };

  const destroy = async (result: DeploymentResult): Promise<void> => {
    const key = apiKey();
    if (!key) {
      throw new HybridRouterError("RUNPOD_API_KEY is not set, cannot delete RunPod resources");
    }
    const failures: string[] = [];
    const { endpoint_id: endpointId, template_id: templateId } = result.metadata;

    // Endpoint first: a template in use cannot be deleted
    if (endpointId) {
      logger.info(`Deleting RunPod endpoint ${endpointId}`);
      try {
        await call("DELETE", `/endpoints/${endpointId}`, key);
      } catch (error) {
        failures.push(`endpoint ${endpointId}: ${errorMessage(error)}`);
      }
    }
    if (templateId) {
      logger.info(`Deleting RunPod template ${templateId}`);
      try {
        await call("DELETE", `/templates/${templateId}`, key);
      } catch (error) {
        failures.push(`template ${templateId}: ${errorMessage(error)}`);
      }
    }
    if (failures.length > 0) {
      throw new HybridRouterError(`RunPod cleanup incomplete: ${failures.join("; ")}`);
    }
  };

  const describe = async (serviceName: string): Promise<ProviderStatus> => {
    const endpointName = runpodEndpointName(serviceName);
    const key = apiKey();
    if (!key) {
      return { provider: NAME, status: "unknown", error: "RUNPOD_API_KEY not set" };
    }
    try {
      const endpoints = endpointListSchema.parse(await call("GET", "/endpoints", key));
      // Flashboot endpoints get a " -fb" suffix
      const match = endpoints.find(
        (ep) => ep.name === endpointName || ep.name === `${endpointName} -fb`
      );
      if (!match) {
        return { provider: NAME, endpoint_name: endpointName, status: "not found" };
      }
      const detail = endpointDetailSchema.parse(
        await call("GET", `/endpoints/${match.id}?includeWorkers=true`, key)
      );
      return {
        provider: NAME,
        endpoint_name: endpointName,
        endpoint_id: match.id,
        status: "running",
        workers: JSON.stringify(detail.workers ?? {}),
        ...(detail.templateId ? { template_id: detail.templateId } : {}),
      };
    } catch (error) {
      return { provider: NAME, endpoint_name: endpointName, status: "unknown", error: errorMessage(error) };
    }
  };

  const preflight = async (): Promise<PreflightCheck[]> => {
    const key = apiKey();
    const fixCommand = "export RUNPOD_API_KEY=<your-key>";
    if (!key) {
      return [
        {
          name: "api_key",
          passed: false,
          message: "RUNPOD_API_KEY environment variable is not set",
          fixCommand,
        },
      ];
    }

    const checks: PreflightCheck[] = [{ name: "api_key", passed: true, message: "RUNPOD_API_KEY is set" }];
    try {
      await call("GET", "/endpoints", key);
      checks.push({ name: "api_key_valid", passed: true, message: "RUNPOD_API_KEY is valid" });
    } catch (error) {
      const unauthorized = error instanceof RunpodApiError && error.statusCode === 401;
      debug.log(`RunPod key check failed: ${errorMessage(error)}`);
      checks.push(
        unauthorized
          ? {
              name: "api_key_valid",
              passed: false,
              message: "RUNPOD_API_KEY is invalid (401 Unauthorized)",
              fixCommand,
            }
          : {
              name: "api_key_valid",
              passed: false,
              message: `RunPod API check failed: ${errorMessage(error)}`,
            }
      );
    }
    return checks;
  };

  return {
    name: NAME,
    kind: "serverless",
    plan,
    deploy,
    status: (result) => httpStatus(result),
    destroy,
    describe,
    preflight,
    authToken: apiKey,
  };
};
