/**
 * Backend Selection
 *
 * Pure functions over a routing snapshot. The choice depends only on
 * whether each URL is present and whether spot is ready.
 */

import { ok, err, type Result } from "neverthrow";
import type {
  BackendTarget,
  RoutingPhase,
  RoutingSnapshot,
} from "../types/routing.js";
import { NoBackendAvailableError } from "../types/errors.js";

/**
 * Pick the backend for one request
 *
 * Spot when its URL is set and it is ready, serverless when set,
 * otherwise no backend.
 */
export const selectBackend = (
  snapshot: RoutingSnapshot
): Result<BackendTarget, NoBackendAvailableError> => {
  const { serverlessUrl, spotUrl, spotReady, shutdown } = snapshot;

  if (shutdown) {
    return err(new NoBackendAvailableError("Router is shutting down"));
  }
  if (spotUrl && spotReady) {
    return ok({ backend: "spot", baseUrl: spotUrl, fallbackUrl: serverlessUrl });
  }
  if (serverlessUrl) {
    return ok({ backend: "serverless", baseUrl: serverlessUrl, fallbackUrl: null });
  }
  if (spotUrl) {
    return err(
      new NoBackendAvailableError("Spot backend not ready, no serverless fallback")
    );
  }
  return err(new NoBackendAvailableError("No backends configured yet"));
};

/**
 * Name the phase a snapshot is in
 */
export const routingPhase = (snapshot: RoutingSnapshot): RoutingPhase => {
  if (snapshot.shutdown) return "shutdown";
  if (snapshot.spotUrl && snapshot.spotReady) return "spot_preferred";
  if (snapshot.serverlessUrl) return "serverless_only";
  return "no_backends";
};

/**
 * Whether a serverless route should wake spot
 */
export const shouldWakeSpot = (snapshot: RoutingSnapshot): boolean =>
  !!snapshot.spotUrl && !snapshot.spotReady && !snapshot.shutdown;
