/**
 * Modal Provider
 *
 * Serverless backend. Renders a Modal app script around the shared serve
 * command and deploys it with the `modal` CLI.
 */

import type { DeployRequest, DeploymentResult, ProviderPlan } from "../types/deployment.js";
import type { InferenceProvider, PreflightCheck, ProviderStatus } from "../types/provider.js";
import { failedResult } from "../types/deployment.js";
import { ConfigError, HybridRouterError } from "../types/errors.js";
import { providerGpuId, providerGpuMap } from "../catalog/catalog.js";
import { renderTemplateFile } from "../templates/engine.js";
import { logger } from "../utils/debug.js";
import { withTempFile } from "./command.js";
import { httpStatus, lastLine, resolveProviderDeps, type ProviderDeps } from "./base.js";

const NAME = "modal";

/** Modal's web server listens on this port inside the container */
const CONTAINER_PORT = "8000";

const DEPLOY_TIMEOUT_MS = 600_000;
const STOP_TIMEOUT_MS = 60_000;
const LIST_TIMEOUT_MS = 30_000;

const WEB_URL = /https:\/\/[^\s"'<>]+\.modal\.run[^\s"'<>]*/;

/**
 * Find the web endpoint in `modal deploy` output
 */
export const parseModalUrl = (output: string): string | undefined =>
  WEB_URL.exec(output)?.[0].replace(/\/+$/, "");

export const modalAppName = (serviceName: string): string => `${serviceName}-serverless`;

/**
 * Create the Modal adapter
 */
export const createModalProvider = (deps: ProviderDeps = {}): InferenceProvider => {
  const { runner, env } = resolveProviderDeps(deps);

  const plan = (request: DeployRequest, serveCommand: string): ProviderPlan => {
    const gpu = providerGpuId(request.gpu, NAME);
    if (!gpu) {
      const supported = Object.keys(providerGpuMap(NAME)).sort().join(", ");
      throw new ConfigError(`GPU ${request.gpu} is not offered. Supported: ${supported}`, NAME);
    }

    const appName = modalAppName(request.serviceName);
    const fastBoot = request.coldStartMode === "fast_boot";
    const serverless = request.scaling.serverless;

    const renderedScript = renderTemplateFile("modal_server.py.tpl", {
      app_name: appName,
      gpu: request.gpuCount > 1 ? `${gpu}:${request.gpuCount}` : gpu,
      port: CONTAINER_PORT,
      serve_cmd: serveCommand.replace(/--port \d+/, `--port ${CONTAINER_PORT}`),
      server_version: request.serverVersion,
      max_concurrency: request.concurrency,
      timeout_s: serverless.timeout,
      scaledown_window_s: serverless.scaledownWindow,
      min_containers: request.scaleToZero ? 0 : 1,
      startup_timeout_s: 600,
      enable_memory_snapshot: fastBoot ? "True" : "False",
      experimental_options_line: fastBoot
        ? 'experimental_options={"enable_gpu_snapshot": True},'
        : "",
    });

    return {
      provider: NAME,
      renderedScript,
      env: { MODEL_ID: request.modelName },
      metadata: { app_name: appName, function_name: "serve" },
    };
  };

  const deploy: InferenceProvider["deploy"] = async (deployPlan, options = {}) => {
    const appName = deployPlan.metadata.app_name;
    if (!appName) {
      throw new HybridRouterError("Modal plan is missing app_name");
    }
    const functionName = deployPlan.metadata.function_name ?? "serve";
    const metadata = { app_name: appName };

    logger.info(`Deploying Modal app ${appName}`);
    const result = await withTempFile("modal-", "app.py", deployPlan.renderedScript, (path) =>
      runner("modal", ["deploy", path], {
        env: deployPlan.env,
        timeoutMs: DEPLOY_TIMEOUT_MS,
        signal: options.signal,
      })
    );

    if (result.exitCode !== 0) {
      const reason = lastLine(result.stderr) || `exit code ${result.exitCode}`;
      return failedResult(NAME, `modal deploy failed: ${reason}`, metadata);
    }

    const url = parseModalUrl(`${result.stdout}\n${result.stderr}`);
    if (!url) {
      return failedResult(NAME, "Deployed but could not resolve web URL", metadata);
    }

    logger.info(`Modal app ${appName} deployed at ${url}`);
    return {
      provider: NAME,
      deploymentId: appName,
      endpointUrl: url,
      healthUrl: `${url}/health`,
      metadata: { app_name: appName, function_name: functionName },
    };
  };

  const destroy = async (result: DeploymentResult): Promise<void> => {
    const appName = result.metadata.app_name;
    if (!appName) {
      logger.warn("No app_name in Modal metadata, nothing to stop");
      return;
    }
    logger.info(`Stopping Modal app ${appName}`);
    const stopped = await runner("modal", ["app", "stop", appName], {
      timeoutMs: STOP_TIMEOUT_MS,
    });
    if (stopped.exitCode !== 0) {
      throw new HybridRouterError(`modal app stop ${appName} failed: ${lastLine(stopped.stderr)}`);
    }
  };

  const describe = async (serviceName: string): Promise<ProviderStatus> => {
    const appName = modalAppName(serviceName);
    const listed = await runner("modal", ["app", "list"], { timeoutMs: LIST_TIMEOUT_MS });
    if (listed.exitCode !== 0) {
      return { provider: NAME, app_name: appName, status: "unknown", error: lastLine(listed.stderr) };
    }
    return {
      provider: NAME,
      app_name: appName,
      status: listed.stdout.includes(appName) ? "running" : "not found",
    };
  };

  const preflight = async (): Promise<PreflightCheck[]> => {
    const version = await runner("modal", ["--version"], { timeoutMs: LIST_TIMEOUT_MS });
    const checks: PreflightCheck[] = [
      version.exitCode === 0
        ? { name: "cli", passed: true, message: `modal CLI found (${lastLine(version.stdout)})` }
        : {
            name: "cli",
            passed: false,
            message: "modal CLI not found",
            fixCommand: "pip install modal",
          },
    ];
    const hasToken = Boolean(env.MODAL_TOKEN_ID && env.MODAL_TOKEN_SECRET);
    if (version.exitCode === 0 && !hasToken) {
      const profile = await runner("modal", ["profile", "current"], { timeoutMs: LIST_TIMEOUT_MS });
      checks.push(
        profile.exitCode === 0
          ? { name: "auth", passed: true, message: `Modal profile ${lastLine(profile.stdout)}` }
          : {
              name: "auth",
              passed: false,
              message: "No Modal credentials configured",
              fixCommand: "modal setup",
            }
      );
    } else if (hasToken) {
      checks.push({ name: "auth", passed: true, message: "MODAL_TOKEN_ID is set" });
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
  };
};
