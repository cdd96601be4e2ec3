/**
 * Parallel Launch Executor
 *
 * Starts both legs at once. The serverless leg is awaited (bounded); the
 * spot leg is handed back as a promise the caller watches in the
 * background. Neither leg can reject or block the other: every failure
 * becomes a `DeploymentResult` with `error` set.
 */

import type { DeploymentResult, DeployRequest, ProviderPlan } from "../types/deployment.js";
import type { InferenceProvider, PreflightCheck } from "../types/provider.js";
import { failedResult } from "../types/deployment.js";
import { ProviderDeployError } from "../types/errors.js";
import { sleep } from "../providers/base.js";
import { checkHealth } from "../routing/prober.js";
import { debug, errorMessage, logger } from "../utils/debug.js";

export interface LegOptions {
  /** Give up after this long; unset waits indefinitely */
  timeoutMs?: number;
  /** Aborts the leg */
  signal?: AbortSignal;
}

export interface LaunchOptions {
  serverlessTimeoutMs: number;
  spotTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface LaunchLeg {
  provider: InferenceProvider;
  plan: ProviderPlan;
}

/**
 * Outcome of `launchBoth`
 */
export interface LaunchHandle {
  /** Settled serverless result */
  serverless: DeploymentResult;
  /** Pending spot result, null when no spot leg was requested. Never rejects. */
  spot: Promise<DeploymentResult> | null;
}

/**
 * Run one provider's deploy, turning throws, aborts and timeouts into
 * failed results
 */
export const runLeg = async (
  provider: InferenceProvider,
  plan: ProviderPlan,
  options: LegOptions = {}
): Promise<DeploymentResult> => {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onCancel: (() => void) | undefined;

  const stopped = new Promise<DeploymentResult>((resolve) => {
    const giveUp = (reason: string): void => {
      controller.abort();
      resolve(failedResult(provider.name, reason, plan.metadata));
    };
    if (options.timeoutMs !== undefined) {
      const seconds = Math.round(options.timeoutMs / 1000);
      timer = setTimeout(() => giveUp(`Deploy timed out after ${seconds}s`), options.timeoutMs);
    }
    onCancel = () => giveUp("Deploy cancelled");
    if (options.signal?.aborted) {
      onCancel();
    } else {
      options.signal?.addEventListener("abort", onCancel, { once: true });
    }
  });

  const deployed = provider
    .deploy(plan, { signal: controller.signal })
    .catch((error: unknown) => {
      logger.error(new ProviderDeployError(provider.name, errorMessage(error)).message);
      return failedResult(provider.name, errorMessage(error), plan.metadata);
    });

  try {
    const result = await Promise.race([deployed, stopped]);
    if (result.error) {
      logger.warn(`${provider.name} deploy failed: ${result.error}`);
    }
    return result;
  } finally {
    clearTimeout(timer);
    if (onCancel) options.signal?.removeEventListener("abort", onCancel);
  }
};

/**
 * Start both legs concurrently and wait for serverless only
 */
export const launchBoth = async (
  serverless: LaunchLeg,
  spot: LaunchLeg | null,
  options: LaunchOptions
): Promise<LaunchHandle> => {
  // Spot starts first so its minutes-long provisioning overlaps everything
  const spotResult = spot
    ? runLeg(spot.provider, spot.plan, { timeoutMs: options.spotTimeoutMs, signal: options.signal })
    : null;
  const serverlessResult = await runLeg(serverless.provider, serverless.plan, {
    timeoutMs: options.serverlessTimeoutMs,
    signal: options.signal,
  });
  return { serverless: serverlessResult, spot: spotResult };
};

export interface WarmupOptions {
  /** Give up after this long */
  timeoutMs: number;
  /** Pause between polls */
  intervalMs: number;
  /** Bound on one poll. Default: 10000 */
  requestTimeoutMs?: number;
  signal?: AbortSignal;
  now?: () => number;
}

/**
 * Poll a health URL until it answers 2xx, so the first real request does
 * not pay the cold start
 *
 * @returns Whether the endpoint became healthy before the deadline
 */
export const warmUp = async (healthUrl: string, options: WarmupOptions): Promise<boolean> => {
  const now = options.now ?? Date.now;
  const deadline = now() + options.timeoutMs;
  let attempt = 0;

  while (now() < deadline && !options.signal?.aborted) {
    attempt += 1;
    try {
      await checkHealth(healthUrl, options.requestTimeoutMs ?? 10_000, options.signal);
      debug.log(`Warmup of ${healthUrl} succeeded after ${attempt} attempt(s)`);
      return true;
    } catch (error) {
      debug.log(`Warmup attempt ${attempt} on ${healthUrl}: ${errorMessage(error)}`);
    }
    await sleep(options.intervalMs, options.signal);
  }
  return false;
};

/**
 * Run a provider's preflight; returns the checks that failed
 *
 * A preflight that throws counts as one failed check.
 */
export const failedPreflight = async (
  provider: InferenceProvider,
  request: DeployRequest
): Promise<PreflightCheck[]> => {
  if (!provider.preflight) return [];
  try {
    const checks = await provider.preflight(request);
    return checks.filter((check) => !check.passed);
  } catch (error) {
    return [{ name: "preflight", passed: false, message: errorMessage(error) }];
  }
};

/**
 * One line per failed check, with its fix when known
 */
export const describeChecks = (checks: readonly PreflightCheck[]): string =>
  checks
    .map((check) => (check.fixCommand ? `${check.message} (fix: ${check.fixCommand})` : check.message))
    .join("; ");
