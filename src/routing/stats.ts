/**
 * Route Statistics
 *
 * Counters per backend, a sliding window of recent routes with a rolling
 * error rate, a latency average per backend and busy time per backend.
 */

import type { BackendName, RouteStats } from "../types/routing.js";

/**
 * One finished (or failed) route
 */
export interface RouteOutcome {
  backend: BackendName;
  ok: boolean;
  /** Time until response headers, or until the failure */
  latencyMs: number;
  /** Time the backend was busy, including the streamed body */
  durationMs: number;
}

/**
 * Rolling latency average
 */
export interface LatencyAverage {
  averageMs: number;
  sampleCount: number;
}

/**
 * Configuration for latency averaging
 */
export interface LatencyConfig {
  /** Weight given to previous average (0-1). Default: 0.8 */
  decay: number;
  /** Maximum samples to track. Default: 100 */
  maxSamples: number;
}

const DEFAULT_LATENCY_CONFIG: LatencyConfig = {
  decay: 0.8,
  maxSamples: 100,
};

/**
 * Update a latency average with an exponential moving average
 *
 * ```
 * newAverage = (oldAverage × decay) + (newSample × (1 - decay))
 * ```
 *
 * With decay = 0.8, samples of 100ms then 120ms give 104ms: a spike
 * raises the average without dominating it.
 */
export const calculateUpdatedLatency = (
  existing: LatencyAverage | null,
  latencyMs: number,
  config: LatencyConfig = DEFAULT_LATENCY_CONFIG
): LatencyAverage => {
  const { decay, maxSamples } = config;

  // First sample - just use the raw value as the starting average
  if (!existing) {
    return { averageMs: latencyMs, sampleCount: 1 };
  }

  return {
    averageMs: existing.averageMs * decay + latencyMs * (1 - decay),
    sampleCount: Math.min(existing.sampleCount + 1, maxSamples),
  };
};

export interface RouteStatsTracker {
  /**
   * Count a route as soon as the backend is chosen
   * @returns Routes counted so far
   */
  recordRoute(backend: BackendName): number;
  /** Record how the route ended */
  recordOutcome(outcome: RouteOutcome): void;
  /**
   * Report in the `/router/health` shape
   * @param spotReadyMs - Cumulative time spot has been ready
   */
  report(spotReadyMs: number): RouteStats;
}

export interface RouteStatsOptions {
  windowSize: number;
  now?: () => number;
}

interface WindowEntry {
  backend: BackendName;
  ok: boolean;
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Create a route statistics tracker
 */
export const createRouteStats = (options: RouteStatsOptions): RouteStatsTracker => {
  const now = options.now ?? Date.now;
  const startedAt = now();
  const windowSize = Math.max(1, options.windowSize);

  const counts: Record<BackendName, number> = { spot: 0, serverless: 0 };
  const busyMs: Record<BackendName, number> = { spot: 0, serverless: 0 };
  const latency: Record<BackendName, LatencyAverage | null> = {
    spot: null,
    serverless: null,
  };
  let errors = 0;

  // Ring buffer of the most recent outcomes
  const window: WindowEntry[] = [];
  let windowNext = 0;

  const recordRoute = (backend: BackendName): number => {
    counts[backend] += 1;
    return counts.spot + counts.serverless;
  };

  const recordOutcome = (outcome: RouteOutcome): void => {
    const { backend, ok } = outcome;
    busyMs[backend] += Math.max(0, outcome.durationMs);
    if (ok) {
      latency[backend] = calculateUpdatedLatency(latency[backend], outcome.latencyMs);
    } else {
      errors += 1;
    }

    const entry: WindowEntry = { backend, ok };
    if (window.length < windowSize) {
      window.push(entry);
    } else {
      window[windowNext] = entry;
    }
    windowNext = (windowNext + 1) % windowSize;
  };

  const report = (spotReadyMs: number): RouteStats => {
    const total = counts.spot + counts.serverless;
    const windowSpot = window.filter((e) => e.backend === "spot").length;
    const windowErrors = window.filter((e) => !e.ok).length;
    const spotLatency = latency.spot;
    const serverlessLatency = latency.serverless;

    return {
      total,
      spot: counts.spot,
      serverless: counts.serverless,
      pct_spot: total ? (100 * counts.spot) / total : 0,
      pct_serverless: total ? (100 * counts.serverless) / total : 0,
      errors,
      window_total: window.length,
      window_spot: windowSpot,
      window_serverless: window.length - windowSpot,
      window_error_rate: window.length ? windowErrors / window.length : 0,
      avg_latency_ms_spot: spotLatency ? round2(spotLatency.averageMs) : null,
      avg_latency_ms_serverless: serverlessLatency
        ? round2(serverlessLatency.averageMs)
        : null,
      gpu_seconds_spot: round2(busyMs.spot / 1000),
      gpu_seconds_serverless: round2(busyMs.serverless / 1000),
      uptime_seconds: round2((now() - startedAt) / 1000),
      spot_ready_seconds: round2(spotReadyMs / 1000),
    };
  };

  return { recordRoute, recordOutcome, report };
};
