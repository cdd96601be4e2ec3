/**
 * Readiness Prober
 *
 * Checks the spot backend's readiness path on a fixed tick and on demand,
 * writing each result into the routing state. At most one probe is in
 * flight at a time: every caller that triggers a probe while one is
 * running against the same spot URL shares its promise. A new spot URL
 * cancels the stale probe and is checked at once.
 */

import { request } from "undici";
import type { RoutingState } from "./state.js";
import { ProbeError } from "../types/errors.js";
import { debug, errorMessage } from "../utils/debug.js";

export interface ReadinessProberConfig {
  /** Tick of the background loop */
  intervalMs: number;
  /** Bound on one probe */
  timeoutMs: number;
  /** Minimum spacing between on-demand probes */
  minIntervalMs: number;
  readyPath: string;
  pokePath: string;
  pokeTimeoutMs: number;
  pokeMinIntervalMs: number;
}

export interface ReadinessProber {
  /** Start the background loop; the first probe fires immediately */
  start(): void;
  /** Stop the loop and abort whatever is in flight */
  stop(): void;
  isRunning(): boolean;
  /**
   * Debounced probe. Resolves when the shared in-flight probe settles,
   * or immediately when the minimum interval has not elapsed.
   */
  probe(): Promise<void>;
  /** Probe now unless one is already in flight */
  refresh(): Promise<void>;
  /**
   * Detached wake-up request to the spot backend. Throttled, bounded by
   * a short timeout, result discarded.
   */
  poke(): void;
  /** Network probes issued so far */
  probeCount(): number;
}

export interface ReadinessProberDeps {
  now?: () => number;
}

/**
 * Join a base URL with a server-controlled path
 */
export const joinUrl = (base: string, path: string): string =>
  `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;

/**
 * GET a URL with a hard timeout; resolves on 2xx, rejects with ProbeError
 */
export const checkHealth = async (
  url: string,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<void> => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await request(url, {
      method: "GET",
      signal: controller.signal,
    });
    await response.body.dump();
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new ProbeError(url, `status=${response.statusCode}`, response.statusCode);
    }
  } catch (error) {
    if (error instanceof ProbeError) throw error;
    const message = controller.signal.aborted
      ? `timeout after ${timeoutMs}ms`
      : errorMessage(error);
    throw new ProbeError(url, message);
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", onAbort);
  }
};

/**
 * Create a readiness prober bound to one routing state
 */
export const createReadinessProber = (
  state: RoutingState,
  config: ReadinessProberConfig,
  deps: ReadinessProberDeps = {}
): ReadinessProber => {
  const now = deps.now ?? Date.now;

  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;
  let inFlightUrl: string | null = null;
  let inFlightAbort: AbortController | null = null;
  let lastProbedUrl: string | null = null;
  let lastProbeStartedAt = Number.NEGATIVE_INFINITY;
  let lastPokeAt = Number.NEGATIVE_INFINITY;
  let issued = 0;

  const runProbe = async (spotUrl: string): Promise<void> => {
    const abort = new AbortController();
    inFlightAbort = abort;
    issued += 1;
    const url = joinUrl(spotUrl, config.readyPath);

    try {
      await checkHealth(url, config.timeoutMs, abort.signal);
      if (!abort.signal.aborted) {
        state.recordProbe(spotUrl, { ok: true });
      }
    } catch (error) {
      if (!abort.signal.aborted) {
        debug.log(`Spot probe failed: ${errorMessage(error)}`);
        state.recordProbe(spotUrl, { ok: false, error: errorMessage(error) });
      }
    } finally {
      if (inFlightAbort === abort) inFlightAbort = null;
    }
  };

  const trigger = (honourMinInterval: boolean): Promise<void> => {
    const snapshot = state.snapshot();
    if (inFlight && inFlightUrl === snapshot.spotUrl) return inFlight;
    if (!snapshot.spotUrl || snapshot.shutdown) return inFlight ?? Promise.resolve();

    const startedAt = now();
    const sameUrl = snapshot.spotUrl === lastProbedUrl;
    if (honourMinInterval && sameUrl && startedAt - lastProbeStartedAt < config.minIntervalMs) {
      return Promise.resolve();
    }
    lastProbeStartedAt = startedAt;
    lastProbedUrl = snapshot.spotUrl;

    // The state ignores results for a URL it no longer holds
    inFlightAbort?.abort();

    const current = runProbe(snapshot.spotUrl).finally(() => {
      if (inFlight === current) {
        inFlight = null;
        inFlightUrl = null;
      }
    });
    inFlight = current;
    inFlightUrl = snapshot.spotUrl;
    return current;
  };

  const start = (): void => {
    if (timer) return;
    timer = setInterval(() => {
      void trigger(false);
    }, config.intervalMs);
    timer.unref();
    void trigger(false);
  };

  const stop = (): void => {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
    inFlightAbort?.abort();
  };

  const sendPoke = async (url: string): Promise<void> => {
    try {
      const response = await request(url, {
        method: "GET",
        signal: AbortSignal.timeout(config.pokeTimeoutMs),
      });
      await response.body.dump();
    } catch (error) {
      debug.log(`Spot poke failed: ${errorMessage(error)}`);
    }
  };

  const poke = (): void => {
    const { spotUrl, shutdown } = state.snapshot();
    if (!spotUrl || shutdown) return;

    const at = now();
    if (at - lastPokeAt < config.pokeMinIntervalMs) return;
    lastPokeAt = at;

    // Fire and forget: the result never matters
    void sendPoke(joinUrl(spotUrl, config.pokePath));
  };

  return {
    start,
    stop,
    isRunning: () => timer !== null,
    probe: () => trigger(true),
    refresh: () => trigger(false),
    poke,
    probeCount: () => issued,
  };
};
