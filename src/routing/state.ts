/**
 * Routing State
 *
 * The single owner of the fields the proxy consults on every request.
 * The current snapshot is a frozen object that is swapped, never edited,
 * so every reader sees one consistent version and every writer publishes
 * a whole new one.
 */

import type {
  ProbeOutcome,
  RoutingPatch,
  RoutingSnapshot,
} from "../types/routing.js";

export interface RoutingState {
  /** Current consistent view */
  snapshot(): RoutingSnapshot;
  /**
   * Apply a partial update. Fields absent from the patch keep their value.
   * Pointing spot at a different URL resets its readiness.
   */
  apply(patch: RoutingPatch): RoutingSnapshot;
  /**
   * Record a probe result taken against `spotUrl`. Ignored when the spot
   * URL has changed since the probe started.
   */
  recordProbe(spotUrl: string, outcome: ProbeOutcome): RoutingSnapshot;
  /** Cumulative milliseconds spot has been ready */
  spotReadyMs(): number;
  /** Enter the terminal state; later patches are ignored */
  shutdown(): RoutingSnapshot;
}

export interface RoutingStateOptions {
  initial?: RoutingPatch;
  /** Clock, in epoch milliseconds */
  now?: () => number;
}

/**
 * Trim trailing slashes; empty or null clears
 */
export const normalizeBaseUrl = (url: string | null | undefined): string | null => {
  if (!url) return null;
  const trimmed = url.trim().replace(/\/+$/, "");
  return trimmed === "" ? null : trimmed;
};

type SnapshotDraft = { -readonly [K in keyof RoutingSnapshot]: RoutingSnapshot[K] };

const EMPTY_SNAPSHOT: RoutingSnapshot = Object.freeze({
  serverlessUrl: null,
  spotUrl: null,
  serverlessAuthToken: null,
  spotReady: false,
  lastProbeAt: null,
  lastProbeError: null,
  shutdown: false,
});

/**
 * Create the routing state for one router process
 */
export const createRoutingState = (options: RoutingStateOptions = {}): RoutingState => {
  const now = options.now ?? Date.now;

  let current: RoutingSnapshot = EMPTY_SNAPSHOT;
  let readyAccumulatedMs = 0;
  let readySince: number | null = null;

  const publish = (next: RoutingSnapshot): RoutingSnapshot => {
    const at = now();
    if (current.spotReady && !next.spotReady && readySince !== null) {
      readyAccumulatedMs += at - readySince;
      readySince = null;
    } else if (!current.spotReady && next.spotReady) {
      readySince = at;
    }
    current = Object.freeze(next);
    return current;
  };

  const apply = (patch: RoutingPatch): RoutingSnapshot => {
    if (current.shutdown) return current;

    const next: SnapshotDraft = { ...current };
    let changed = false;

    if (patch.serverlessUrl !== undefined) {
      const url = normalizeBaseUrl(patch.serverlessUrl);
      if (url !== current.serverlessUrl) {
        next.serverlessUrl = url;
        changed = true;
      }
    }
    if (patch.serverlessAuthToken !== undefined) {
      const token = patch.serverlessAuthToken || null;
      if (token !== current.serverlessAuthToken) {
        next.serverlessAuthToken = token;
        changed = true;
      }
    }
    if (patch.spotUrl !== undefined) {
      const url = normalizeBaseUrl(patch.spotUrl);
      if (url !== current.spotUrl) {
        // Readiness belonged to the old URL
        next.spotUrl = url;
        next.spotReady = false;
        next.lastProbeError = null;
        changed = true;
      }
    }

    return changed ? publish(next) : current;
  };

  const recordProbe = (spotUrl: string, outcome: ProbeOutcome): RoutingSnapshot => {
    if (current.shutdown || normalizeBaseUrl(spotUrl) !== current.spotUrl) {
      return current;
    }
    return publish({
      ...current,
      spotReady: outcome.ok,
      lastProbeAt: now(),
      lastProbeError: outcome.ok ? null : outcome.error,
    });
  };

  const spotReadyMs = (): number =>
    readyAccumulatedMs + (readySince !== null ? now() - readySince : 0);

  const shutdown = (): RoutingSnapshot => {
    if (current.shutdown) return current;
    return publish({ ...current, spotReady: false, shutdown: true });
  };

  if (options.initial) {
    apply(options.initial);
  }

  return {
    snapshot: () => current,
    apply,
    recordProbe,
    spotReadyMs,
    shutdown,
  };
};
