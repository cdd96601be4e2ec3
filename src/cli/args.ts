/**
 * Command-line argument parsing
 *
 * Each sub-command gets its own option table; unknown flags are errors.
 */

import { parseArgs } from "node:util";
import { randomUUID } from "node:crypto";
import type { ColdStartMode, DeployRequest, DeploymentStatus } from "../types/deployment.js";
import type { ScalingPolicy } from "../config/scaling.js";
import { ConfigError } from "../types/errors.js";
import { AUTO_PROVIDER } from "../planner/planner.js";

export const DEFAULT_SERVER_VERSION = "0.8.5";

export interface DeployArgs {
  model: string;
  gpu: string;
  gpuCount: number;
  tpSize: number;
  maxModelLen: number;
  concurrency?: number;
  workersMax?: number;
  coldStartMode: ColdStartMode;
  scaleToZero: boolean;
  serverlessProvider: string;
  spotProvider: string;
  spotCloud: string;
  region?: string;
  serviceName: string;
  serverlessOnly: boolean;
  serverVersion: string;
  scalingPolicy?: string;
  /** Router listen port; 0 picks a free one */
  port?: number;
  publicHost?: string;
}

export type CliCommand =
  | { kind: "deploy"; args: DeployArgs }
  | { kind: "destroy"; serviceName?: string; all: boolean }
  | { kind: "status"; serviceName: string; json: boolean }
  | { kind: "list"; status?: DeploymentStatus; json: boolean }
  | { kind: "check"; provider: string; gpu?: string }
  | { kind: "serve" }
  | { kind: "help" };

export interface ParsedCli {
  command: CliCommand;
  debug: boolean;
}

const STATUSES: readonly DeploymentStatus[] = ["launching", "active", "degraded", "failed", "destroyed"];

const isStatus = (value: string): value is DeploymentStatus =>
  STATUSES.some((status) => status === value);

const isColdStartMode = (value: string): value is ColdStartMode =>
  value === "fast_boot" || value === "no_fast_boot";

const intFlag = (name: string, value: string | undefined, min = 1): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`--${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
};

const required = (name: string, value: string | undefined): string => {
  if (!value) {
    throw new ConfigError(`--${name} is required`);
  }
  return value;
};

/**
 * Random default service name, e.g. "hybrid-1a2b3c4d"
 */
export const generateServiceName = (): string => `hybrid-${randomUUID().slice(0, 8)}`;

const COMMON = {
  debug: { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

const parseDeploy = (args: string[], newName: () => string): ParsedCli => {
  const { values } = parseArgs({
    args,
    strict: true,
    options: {
      ...COMMON,
      model: { type: "string" },
      gpu: { type: "string" },
      "gpu-count": { type: "string" },
      "tp-size": { type: "string" },
      "max-model-len": { type: "string" },
      concurrency: { type: "string" },
      "workers-max": { type: "string" },
      "cold-start-mode": { type: "string" },
      "no-scale-to-zero": { type: "boolean" },
      "serverless-provider": { type: "string" },
      "spot-provider": { type: "string" },
      "spot-cloud": { type: "string" },
      region: { type: "string" },
      "service-name": { type: "string" },
      "serverless-only": { type: "boolean" },
      "server-version": { type: "string" },
      "scaling-policy": { type: "string" },
      port: { type: "string" },
      "public-host": { type: "string" },
    },
  });
  if (values.help === true) return { command: { kind: "help" }, debug: values.debug === true };

  const coldStartMode = values["cold-start-mode"] ?? "fast_boot";
  if (!isColdStartMode(coldStartMode)) {
    throw new ConfigError(`--cold-start-mode must be fast_boot or no_fast_boot, got "${coldStartMode}"`);
  }

  return {
    debug: values.debug === true,
    command: {
      kind: "deploy",
      args: {
        model: required("model", values.model),
        gpu: required("gpu", values.gpu),
        gpuCount: intFlag("gpu-count", values["gpu-count"]) ?? 1,
        tpSize: intFlag("tp-size", values["tp-size"]) ?? 1,
        maxModelLen: intFlag("max-model-len", values["max-model-len"]) ?? 4096,
        concurrency: intFlag("concurrency", values.concurrency),
        workersMax: intFlag("workers-max", values["workers-max"]),
        coldStartMode,
        scaleToZero: values["no-scale-to-zero"] !== true,
        serverlessProvider: values["serverless-provider"] ?? AUTO_PROVIDER,
        spotProvider: values["spot-provider"] ?? "skyserve",
        spotCloud: values["spot-cloud"] ?? "aws",
        region: values.region,
        serviceName: values["service-name"] ?? newName(),
        serverlessOnly: values["serverless-only"] === true,
        serverVersion: values["server-version"] ?? DEFAULT_SERVER_VERSION,
        scalingPolicy: values["scaling-policy"],
        port: intFlag("port", values.port, 0),
        publicHost: values["public-host"],
      },
    },
  };
};

/**
 * Parse `argv` (without the node and script entries)
 *
 * @throws ConfigError on unknown commands or malformed values; node's
 * own `TypeError` on unknown flags
 */
export const parseCli = (argv: readonly string[], newName: () => string = generateServiceName): ParsedCli => {
  const [name, ...rest] = argv;

  switch (name) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { command: { kind: "help" }, debug: false };

    case "deploy":
      return parseDeploy(rest, newName);

    case "destroy": {
      const { values } = parseArgs({
        args: rest,
        strict: true,
        options: { ...COMMON, "service-name": { type: "string" }, all: { type: "boolean" } },
      });
      if (values.help === true) return { command: { kind: "help" }, debug: values.debug === true };
      const all = values.all === true;
      if (!all && !values["service-name"]) {
        throw new ConfigError("destroy needs --service-name or --all");
      }
      return {
        debug: values.debug === true,
        command: { kind: "destroy", serviceName: values["service-name"], all },
      };
    }

    case "status": {
      const { values } = parseArgs({
        args: rest,
        strict: true,
        options: { ...COMMON, "service-name": { type: "string" }, json: { type: "boolean" } },
      });
      if (values.help === true) return { command: { kind: "help" }, debug: values.debug === true };
      return {
        debug: values.debug === true,
        command: {
          kind: "status",
          serviceName: required("service-name", values["service-name"]),
          json: values.json === true,
        },
      };
    }

    case "list": {
      const { values } = parseArgs({
        args: rest,
        strict: true,
        options: { ...COMMON, status: { type: "string" }, json: { type: "boolean" } },
      });
      if (values.help === true) return { command: { kind: "help" }, debug: values.debug === true };
      let status: DeploymentStatus | undefined;
      if (values.status !== undefined) {
        if (!isStatus(values.status)) {
          throw new ConfigError(`--status must be one of ${STATUSES.join(", ")}, got "${values.status}"`);
        }
        status = values.status;
      }
      return { debug: values.debug === true, command: { kind: "list", status, json: values.json === true } };
    }

    case "check": {
      const { values } = parseArgs({
        args: rest,
        strict: true,
        options: { ...COMMON, provider: { type: "string" }, gpu: { type: "string" } },
      });
      if (values.help === true) return { command: { kind: "help" }, debug: values.debug === true };
      return {
        debug: values.debug === true,
        command: { kind: "check", provider: required("provider", values.provider), gpu: values.gpu },
      };
    }

    case "serve": {
      const { values } = parseArgs({ args: rest, strict: true, options: COMMON });
      if (values.help === true) return { command: { kind: "help" }, debug: values.debug === true };
      return { debug: values.debug === true, command: { kind: "serve" } };
    }

    default:
      throw new ConfigError(`Unknown command "${name}". Run "hybrid-router help" for usage.`);
  }
};

/**
 * Apply CLI overrides to a scaling policy and build the request
 */
export const toDeployRequest = (args: DeployArgs, base: ScalingPolicy): DeployRequest => {
  const serverless = {
    ...base.serverless,
    ...(args.concurrency !== undefined ? { concurrency: args.concurrency } : {}),
    ...(args.workersMax !== undefined ? { workersMax: args.workersMax } : {}),
  };
  const spot = { ...base.spot };
  if (!args.scaleToZero) {
    spot.minReplicas = Math.max(1, spot.minReplicas);
    serverless.workersMin = Math.max(1, serverless.workersMin);
    serverless.scaledownWindow = 300;
  }

  return {
    modelName: args.model,
    gpu: args.gpu,
    gpuCount: args.gpuCount,
    tpSize: args.tpSize,
    maxModelLen: args.maxModelLen,
    concurrency: serverless.concurrency,
    coldStartMode: args.coldStartMode,
    scaleToZero: args.scaleToZero,
    serverlessProvider: args.serverlessProvider,
    spotProvider: args.spotProvider,
    spotCloud: args.spotCloud,
    ...(args.region ? { region: args.region } : {}),
    serviceName: args.serviceName,
    scaling: { spot, serverless },
    serverlessOnly: args.serverlessOnly,
    serverVersion: args.serverVersion,
  };
};

export const USAGE = `Usage: hybrid-router <command> [options]

Commands:
  deploy    Deploy a model on serverless and spot behind one router
            --model <id> --gpu <name> [--gpu-count N] [--tp-size N]
            [--max-model-len N] [--concurrency N] [--workers-max N]
            [--cold-start-mode fast_boot|no_fast_boot] [--no-scale-to-zero]
            [--serverless-provider auto|modal|runpod] [--spot-cloud aws]
            [--region R] [--service-name NAME] [--serverless-only]
            [--scaling-policy FILE] [--port N] [--public-host HOST]
  destroy   Tear down a deployment        --service-name NAME | --all
  status    Show a deployment             --service-name NAME [--json]
  list      List deployments              [--status S] [--json]
  check     Run a provider's preflight    --provider NAME [--gpu G]
  serve     Run the router from environment variables

Every command accepts --debug.
`;
