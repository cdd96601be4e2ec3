/**
 * SkyServe Provider
 *
 * Spot backend. Renders a SkyServe service YAML around the shared serve
 * command and drives the `sky` CLI.
 */

import type { DeployRequest, DeploymentResult, ProviderPlan } from "../types/deployment.js";
import type { InferenceProvider, PreflightCheck, ProviderStatus } from "../types/provider.js";
import { failedResult } from "../types/deployment.js";
import { ConfigError, HybridRouterError } from "../types/errors.js";
import { spotGpuName } from "../catalog/catalog.js";
import { renderTemplateFile } from "../templates/engine.js";
import { debug, logger } from "../utils/debug.js";
import { withTempFile } from "./command.js";
import { httpStatus, lastLine, resolveProviderDeps, type ProviderDeps } from "./base.js";

const NAME = "skyserve";

/** Port the replicas serve on */
export const SPOT_PORT = "8001";

const UP_TIMEOUT_MS = 600_000;
const STATUS_TIMEOUT_MS = 30_000;
const DOWN_TIMEOUT_MS = 120_000;

export interface SkyserveProviderOptions extends ProviderDeps {
  /** `sky serve status --endpoint` attempts after `up`. Default: 10 */
  endpointPollAttempts?: number;
  /** Delay between endpoint polls. Default: 15000 */
  endpointPollDelayMs?: number;
  /** `sky serve down` attempts. Default: 6 */
  downAttempts?: number;
  /** Delay between teardown attempts. Default: 10000 */
  downDelayMs?: number;
}

export const skyserveServiceName = (serviceName: string): string => `${serviceName}-spot`;

/**
 * Normalize `sky serve status --endpoint` output to a URL
 *
 * The CLI prints either a full URL or a bare `host:port`.
 */
export const parseSkyEndpoint = (output: string): string | undefined => {
  const line = lastLine(output);
  if (/^https?:\/\//.test(line)) return line.replace(/\/+$/, "");
  if (/^[\w.-]+:\d+$/.test(line)) return `http://${line}`;
  return undefined;
};

/**
 * SkyPilot resource constraint pinning a cloud region
 */
export const regionBlock = (cloud: string, region?: string): string =>
  region ? `  any_of:\n    - infra: ${cloud.toLowerCase()}/${region}` : "";

/**
 * Create the SkyServe adapter
 */
export const createSkyserveProvider = (options: SkyserveProviderOptions = {}): InferenceProvider => {
  const { runner, sleep } = resolveProviderDeps(options);
  const pollAttempts = Math.max(1, options.endpointPollAttempts ?? 10);
  const pollDelayMs = options.endpointPollDelayMs ?? 15_000;
  const downAttempts = Math.max(1, options.downAttempts ?? 6);
  const downDelayMs = options.downDelayMs ?? 10_000;

  const plan = (request: DeployRequest, serveCommand: string): ProviderPlan => {
    const gpu = spotGpuName(request.gpu);
    if (!gpu) {
      throw new ConfigError(`GPU ${request.gpu} has no spot accelerator name`, NAME);
    }
    const spot = request.scaling.spot;
    const serviceName = skyserveServiceName(request.serviceName);

    const renderedScript = renderTemplateFile("skyserve.yaml.tpl", {
      min_replicas: request.scaleToZero ? spot.minReplicas : Math.max(1, spot.minReplicas),
      max_replicas: spot.maxReplicas,
      target_qps: spot.targetQps,
      upscale_delay: spot.upscaleDelay,
      downscale_delay: spot.downscaleDelay,
      gpu,
      gpu_count: request.gpuCount,
      port: SPOT_PORT,
      region_block: regionBlock(request.spotCloud, request.region),
      server_version: request.serverVersion,
      serve_cmd: serveCommand.replace(/--port \d+/, `--port ${SPOT_PORT}`),
    });

    return {
      provider: NAME,
      renderedScript,
      env: {},
      metadata: { service_name: serviceName },
    };
  };

  const pollEndpoint = async (
    serviceName: string,
    signal?: AbortSignal
  ): Promise<string | undefined> => {
    for (let attempt = 1; attempt <= pollAttempts; attempt++) {
      if (signal?.aborted) return undefined;
      const status = await runner("sky", ["serve", "status", serviceName, "--endpoint"], {
        timeoutMs: STATUS_TIMEOUT_MS,
        signal,
      });
      const endpoint = status.exitCode === 0 ? parseSkyEndpoint(status.stdout) : undefined;
      if (endpoint) return endpoint;
      debug.log(`Endpoint poll ${attempt}/${pollAttempts} for ${serviceName}: not yet available`);
      if (attempt < pollAttempts) {
        await sleep(pollDelayMs);
      }
    }
    return undefined;
  };

  const deploy: InferenceProvider["deploy"] = async (deployPlan, deployOptions = {}) => {
    const serviceName = deployPlan.metadata.service_name;
    if (!serviceName) {
      throw new HybridRouterError("SkyServe plan is missing service_name");
    }
    const metadata = { service_name: serviceName };

    logger.info(`Launching SkyServe service ${serviceName}`);
    const up = await withTempFile("skyserve-", "service.yaml", deployPlan.renderedScript, (path) =>
      runner("sky", ["serve", "up", path, "--service-name", serviceName, "-y"], {
        env: deployPlan.env,
        timeoutMs: UP_TIMEOUT_MS,
        signal: deployOptions.signal,
      })
    );
    if (up.exitCode !== 0) {
      const reason = lastLine(up.stderr) || `exit code ${up.exitCode}`;
      return failedResult(NAME, `sky serve up failed: ${reason}`, metadata);
    }

    const endpoint = await pollEndpoint(serviceName, deployOptions.signal);
    if (!endpoint) {
      logger.warn(`SkyServe ${serviceName} is up but has no endpoint yet`);
      return failedResult(NAME, "Endpoint not yet available (still provisioning)", metadata);
    }

    logger.info(`SkyServe ${serviceName} endpoint: ${endpoint}`);
    return {
      provider: NAME,
      deploymentId: serviceName,
      endpointUrl: endpoint,
      healthUrl: `${endpoint}/health`,
      metadata,
    };
  };

  const serviceExists = async (serviceName: string): Promise<boolean | undefined> => {
    const status = await runner("sky", ["serve", "status", serviceName], {
      timeoutMs: STATUS_TIMEOUT_MS,
    });
    if (status.exitCode !== 0) {
      const output = `${status.stdout}\n${status.stderr}`;
      return /not found|no .*services?/i.test(output) ? false : undefined;
    }
    return status.stdout.includes(serviceName);
  };

  const destroy = async (result: DeploymentResult): Promise<void> => {
    const serviceName = result.metadata.service_name;
    if (!serviceName) {
      logger.warn("No service_name in SkyServe metadata, nothing to tear down");
      return;
    }

    let lastError = "";
    for (let attempt = 1; attempt <= downAttempts; attempt++) {
      logger.info(`Tearing down SkyServe service ${serviceName} (attempt ${attempt}/${downAttempts})`);
      const down = await runner("sky", ["serve", "down", serviceName, "-y"], {
        timeoutMs: DOWN_TIMEOUT_MS,
      });
      if (down.exitCode !== 0) {
        lastError = lastLine(down.stderr) || `exit code ${down.exitCode}`;
      }
      if ((await serviceExists(serviceName)) === false) {
        return;
      }
      if (attempt < downAttempts) {
        await sleep(downDelayMs);
      }
    }
    throw new HybridRouterError(
      `SkyServe service ${serviceName} still present after ${downAttempts} teardown attempts` +
        (lastError ? `: ${lastError}` : "")
    );
  };

  const describe = async (serviceName: string): Promise<ProviderStatus> => {
    const spotName = skyserveServiceName(serviceName);
    const status = await runner("sky", ["serve", "status", spotName], {
      timeoutMs: STATUS_TIMEOUT_MS,
    });
    if (status.exitCode !== 0) {
      return { provider: NAME, service_name: spotName, status: "unknown", error: lastLine(status.stderr) };
    }
    const row = status.stdout.split("\n").find((line) => line.trim().startsWith(spotName));
    if (!row) {
      return { provider: NAME, service_name: spotName, status: "not found" };
    }
    // Columns: NAME VERSION UPTIME STATUS ...
    const state = row.trim().split(/\s+/).find((cell) => /^[A-Z_]{4,}$/.test(cell));
    return { provider: NAME, service_name: spotName, status: state ?? "running" };
  };

  const preflight = async (): Promise<PreflightCheck[]> => {
    const version = await runner("sky", ["--version"], { timeoutMs: STATUS_TIMEOUT_MS });
    if (version.exitCode !== 0) {
      return [
        {
          name: "cli",
          passed: false,
          message: "sky CLI not found",
          fixCommand: "pip install 'skypilot[all]'",
        },
      ];
    }
    const check = await runner("sky", ["check"], { timeoutMs: UP_TIMEOUT_MS });
    return [
      { name: "cli", passed: true, message: `sky CLI found (${lastLine(version.stdout)})` },
      check.exitCode === 0
        ? { name: "clouds", passed: true, message: "At least one cloud is enabled" }
        : {
            name: "clouds",
            passed: false,
            message: `sky check failed: ${lastLine(check.stderr) || lastLine(check.stdout)}`,
            fixCommand: "sky check",
          },
    ];
  };

  return {
    name: NAME,
    kind: "spot",
    plan,
    deploy,
    status: (result) => httpStatus(result),
    destroy,
    describe,
    preflight,
  };
};
