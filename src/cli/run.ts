/**
 * Command dispatch for the `hybrid-router` binary
 */

import { homedir } from "node:os";
import { join } from "node:path";
import type { DeploymentResult, HybridDeployment } from "../types/deployment.js";
import type { DeploymentRecord, DeploymentStore } from "../types/state.js";
import { routerConfigFromEnv, type RouterConfigInput } from "../types/config.js";
import { ConfigError, HybridRouterError } from "../types/errors.js";
import { defaultScalingPolicy, loadScalingPolicy } from "../config/scaling.js";
import { createDefaultRegistry, type ProviderRegistry } from "../providers/registry.js";
import { createFileStore } from "../state/file.js";
import { createCoordinator, type Coordinator } from "../orchestrator/coordinator.js";
import { createRouterServer } from "../proxy/server.js";
import { errorMessage, isDebugEnabled, setDebugEnabled } from "../utils/debug.js";
import {
  parseCli,
  toDeployRequest,
  USAGE,
  type CliCommand,
  type DeployArgs,
  type ParsedCli,
} from "./args.js";

type Env = Record<string, string | undefined>;

export interface CliDeps {
  env?: Env;
  out?: (line: string) => void;
  err?: (line: string) => void;
  registry?: ProviderRegistry;
  store?: DeploymentStore;
  /** Resolves when the process is asked to stop */
  waitForStop?: () => Promise<void>;
  newServiceName?: () => string;
}

interface Io {
  env: Env;
  out: (line: string) => void;
  err: (line: string) => void;
  registry: ProviderRegistry;
  store: DeploymentStore;
  waitForStop: () => Promise<void>;
}

const waitForSignal = (): Promise<void> =>
  new Promise((resolve) => {
    const stop = (): void => {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
      resolve();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  });

/**
 * Directory of the JSON state file: `HYBRID_STATE_DIR`, else
 * `~/.hybrid-router`
 */
export const stateDirectory = (env: Env): string =>
  env.HYBRID_STATE_DIR?.trim() || join(homedir(), ".hybrid-router");

const describeLeg = (label: string, result: DeploymentResult | null, pending: boolean): string => {
  const name = `${label}:`.padEnd(12);
  if (result?.endpointUrl) return `  ${name}${result.endpointUrl}`;
  if (result?.error) return `  ${name}FAILED - ${result.error}`;
  return pending ? `  ${name}launching in background...` : `  ${name}-`;
};

const printDeployment = (io: Io, deployment: HybridDeployment, spotPending: boolean, serverlessOnly: boolean): void => {
  io.out("=".repeat(60));
  io.out(`  Service:    ${deployment.serviceName} (${deployment.status})`);
  io.out(describeLeg("Serverless", deployment.serverless, false));
  if (!serverlessOnly) {
    io.out(describeLeg("Spot", deployment.spot, spotPending));
  }
  if (deployment.routerUrl) {
    io.out(serverlessOnly ? `Endpoint -> ${deployment.routerUrl}` : `All traffic -> ${deployment.routerUrl}`);
  }
  io.out("=".repeat(60));
};

const routerInput = (io: Io, args?: DeployArgs): RouterConfigInput => {
  const fromEnv = routerConfigFromEnv(io.env);
  const port = args?.port ?? fromEnv.port ?? 0;
  // Debug mode also turns on the HTTP request log
  return { ...fromEnv, port, host: io.env.HOST?.trim() || "0.0.0.0", logger: isDebugEnabled() };
};

// ─────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────

const deploy = async (io: Io, args: DeployArgs): Promise<number> => {
  const scaling = args.scalingPolicy ? await loadScalingPolicy(args.scalingPolicy) : defaultScalingPolicy();
  const request = toDeployRequest(args, scaling);

  const coordinator = createCoordinator({
    registry: io.registry,
    store: io.store,
    config: { router: routerInput(io, args), publicHost: args.publicHost ?? "127.0.0.1" },
  });

  io.out(`Deploying ${request.modelName} on ${request.gpu}`);
  io.out(`Service name: ${request.serviceName}`);
  io.out(request.serverlessOnly ? "Mode: serverless-only" : `Spot cloud: ${request.spotCloud}`);

  const result = await coordinator.deploy(request);
  if (result.isErr()) {
    io.err(result.error.message);
    return 1;
  }

  const { deployment, spotSettled } = result.value;
  printDeployment(io, deployment, !request.serverlessOnly, request.serverlessOnly);

  if (request.serverlessOnly) {
    await coordinator.shutdown();
    return deployment.status === "failed" ? 1 : 0;
  }

  io.out("Router is running in this process. Press Ctrl-C to stop it;");
  io.out(`backends keep running until: hybrid-router destroy --service-name ${request.serviceName}`);

  const reportSpot = spotSettled.then((settled) => {
    io.out(describeLeg("Spot", settled.spot, false));
    io.out(`Status: ${settled.status}`);
    return settled;
  });
  const stopped = io.waitForStop();

  // With no backend left the router is already closed; stop waiting
  const early = await Promise.race([reportSpot, stopped.then(() => null)]);
  if (early?.status === "failed") {
    await coordinator.shutdown();
    return 1;
  }

  await stopped;
  await coordinator.shutdown();
  const settled = await reportSpot;
  return settled.status === "failed" ? 1 : 0;
};

const destroyOne = async (io: Io, coordinator: Coordinator, serviceName: string): Promise<boolean> => {
  const result = await coordinator.destroy(serviceName);
  if (result.isErr()) {
    io.err(result.error.message);
    return false;
  }
  const report = result.value;
  for (const role of report.destroyed) {
    io.out(`  ${serviceName}: ${role} destroyed`);
  }
  for (const failure of report.failures) {
    io.err(`  ${serviceName}: ${failure.component} (${failure.provider}) FAILED - ${failure.message}`);
  }
  return report.error === null;
};

const destroy = async (io: Io, serviceName: string | undefined, all: boolean): Promise<number> => {
  const coordinator = createCoordinator({ registry: io.registry, store: io.store });
  let names: string[];
  if (all) {
    const records = await io.store.list();
    names = records.filter((r) => r.status !== "destroyed").map((r) => r.serviceName);
    if (names.length === 0) {
      io.out("No deployments to destroy.");
      return 0;
    }
    io.out(`Destroying ${names.length} deployment(s)...`);
  } else if (serviceName) {
    names = [serviceName];
  } else {
    throw new ConfigError("destroy needs --service-name or --all");
  }

  let failed = 0;
  for (const name of names) {
    if (!(await destroyOne(io, coordinator, name))) failed += 1;
  }
  return failed === 0 ? 0 : 1;
};

const status = async (io: Io, serviceName: string, json: boolean): Promise<number> => {
  const coordinator = createCoordinator({
    registry: io.registry,
    store: io.store,
    config: { router: routerConfigFromEnv(io.env) },
  });
  const result = await coordinator.status(serviceName);
  if (result.isErr()) {
    io.err(result.error.message);
    return 1;
  }

  const report = result.value;
  if (json) {
    io.out(JSON.stringify(report, null, 2));
    return 0;
  }

  const { record } = report;
  io.out(`Service:    ${record.serviceName}`);
  io.out(`Status:     ${record.status}`);
  io.out(`Model:      ${record.request.modelName} on ${record.request.gpu}`);
  io.out(`Router:     ${record.routerUrl ?? "-"}`);
  io.out(describeLeg("Serverless", record.components.serverless ?? null, false));
  if (!record.request.serverlessOnly) {
    io.out(describeLeg("Spot", record.components.spot ?? null, record.status === "launching"));
  }
  for (const [role, health] of Object.entries(report.health)) {
    io.out(`  ${role} health: ${health}`);
  }
  if (report.router) {
    const stats = report.router.route_stats;
    io.out(`Routing:    ${report.router.phase}, spot ready: ${report.router.skyserve_ready ? "yes" : "no"}`);
    io.out(`Requests:   ${stats.total} (spot ${stats.pct_spot}%, serverless ${stats.pct_serverless}%)`);
  } else if (report.routerError) {
    io.out(`Routing:    unavailable (${report.routerError})`);
  }
  return 0;
};

const formatRecord = (record: DeploymentRecord): string =>
  [
    record.serviceName.padEnd(24),
    record.status.padEnd(10),
    record.request.gpu.padEnd(12),
    (record.routerUrl ?? "-").padEnd(36),
    record.createdAt,
  ].join(" ");

const list = async (io: Io, command: Extract<CliCommand, { kind: "list" }>): Promise<number> => {
  const records = await io.store.list(command.status ? { status: command.status } : undefined);
  if (command.json) {
    io.out(JSON.stringify(records, null, 2));
    return 0;
  }
  if (records.length === 0) {
    io.out("No deployments.");
    return 0;
  }
  io.out(["SERVICE".padEnd(24), "STATUS".padEnd(10), "GPU".padEnd(12), "ENDPOINT".padEnd(36), "CREATED"].join(" "));
  for (const record of records) {
    io.out(formatRecord(record));
  }
  return 0;
};

const check = async (io: Io, providerName: string, gpu: string | undefined): Promise<number> => {
  const provider = io.registry.get(providerName);
  if (!provider.preflight) {
    io.out(`${providerName}: no preflight checks`);
    return 0;
  }
  const request = toDeployRequest(
    {
      model: "preflight",
      gpu: gpu ?? "L4",
      gpuCount: 1,
      tpSize: 1,
      maxModelLen: 4096,
      coldStartMode: "fast_boot",
      scaleToZero: true,
      serverlessProvider: provider.kind === "serverless" ? provider.name : "auto",
      spotProvider: provider.kind === "spot" ? provider.name : "skyserve",
      spotCloud: "aws",
      serviceName: "preflight",
      serverlessOnly: false,
      serverVersion: "",
    },
    defaultScalingPolicy()
  );

  const checks = await provider.preflight(request);
  for (const item of checks) {
    io.out(`  [${item.passed ? "PASS" : "FAIL"}] ${item.name}: ${item.message}`);
    if (!item.passed && item.fixCommand) {
      io.out(`         fix: ${item.fixCommand}`);
    }
  }
  return checks.every((item) => item.passed) ? 0 : 1;
};

const serve = async (io: Io): Promise<number> => {
  const router = createRouterServer(routerInput(io));
  await router.listen();
  await io.waitForStop();
  await router.close();
  return 0;
};

/**
 * Run one CLI invocation
 *
 * @returns Process exit code: 0 success, 1 failure, 2 usage error
 */
export const runCli = async (argv: readonly string[], deps: CliDeps = {}): Promise<number> => {
  const env = deps.env ?? process.env;
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));

  let parsed: ParsedCli;
  try {
    parsed = parseCli(argv, deps.newServiceName);
  } catch (error) {
    err(errorMessage(error));
    err(USAGE);
    return 2;
  }
  setDebugEnabled(parsed.debug);

  const { command } = parsed;
  if (command.kind === "help") {
    out(USAGE);
    return 0;
  }

  const io: Io = {
    env,
    out,
    err,
    registry: deps.registry ?? createDefaultRegistry({ env }),
    store: deps.store ?? createFileStore({ directory: stateDirectory(env) }),
    waitForStop: deps.waitForStop ?? waitForSignal,
  };

  try {
    switch (command.kind) {
      case "deploy":
        return await deploy(io, command.args);
      case "destroy":
        return await destroy(io, command.serviceName, command.all);
      case "status":
        return await status(io, command.serviceName, command.json);
      case "list":
        return await list(io, command);
      case "check":
        return await check(io, command.provider, command.gpu);
      case "serve":
        return await serve(io);
    }
  } catch (error) {
    if (error instanceof HybridRouterError) {
      err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await io.store.close();
  }
};
