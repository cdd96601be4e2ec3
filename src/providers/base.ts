import type { DeploymentResult } from "../types/deployment.js";
import type { HealthState } from "../types/provider.js";
import { checkHealth } from "../routing/prober.js";
import { debug, errorMessage } from "../utils/debug.js";
import { runCommand, type CommandRunner } from "./command.js";

/**
 * Environment view handed to adapters
 */
export type ProviderEnv = Readonly<Record<string, string | undefined>>;

/**
 * Collaborators shared by the built-in adapters
 */
export interface ProviderDeps {
  /** Runs vendor CLIs. Default: execFile */
  runner?: CommandRunner;
  /** Credentials and tokens. Default: process.env */
  env?: ProviderEnv;
  /** Waits between polls. Default: setTimeout */
  sleep?: (ms: number) => Promise<void>;
}

export type ResolvedProviderDeps = Required<ProviderDeps>;

/**
 * Abortable sleep; resolves early when the signal fires
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });

export const resolveProviderDeps = (deps: ProviderDeps = {}): ResolvedProviderDeps => ({
  runner: deps.runner ?? runCommand,
  env: deps.env ?? process.env,
  sleep: deps.sleep ?? ((ms) => sleep(ms)),
});

/** Upper bound on a status probe */
export const STATUS_TIMEOUT_MS = 5000;

/**
 * Default `status`: GET the health URL, healthy on 2xx
 */
export const httpStatus = async (
  result: DeploymentResult,
  timeoutMs = STATUS_TIMEOUT_MS
): Promise<HealthState> => {
  if (!result.healthUrl) return "unknown";
  try {
    await checkHealth(result.healthUrl, timeoutMs);
    return "healthy";
  } catch (error) {
    debug.log(`${result.provider} status check failed: ${errorMessage(error)}`);
    return "unhealthy";
  }
};

/**
 * Last non-empty line of CLI output, for error messages
 */
export const lastLine = (output: string): string => {
  const lines = output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");
  return lines[lines.length - 1] ?? "";
};
