/**
 * Routing Module
 *
 * Backend selection for the proxy: the mutable routing state, the spot
 * readiness prober and rolling route statistics.
 */

// State
export {
  createRoutingState,
  normalizeBaseUrl,
  type RoutingState,
  type RoutingStateOptions,
} from "./state.js";

// Selection
export { selectBackend, routingPhase, shouldWakeSpot } from "./selection.js";

// Readiness
export {
  createReadinessProber,
  checkHealth,
  joinUrl,
  type ReadinessProber,
  type ReadinessProberConfig,
  type ReadinessProberDeps,
} from "./prober.js";

// Statistics
export {
  createRouteStats,
  calculateUpdatedLatency,
  type RouteOutcome,
  type RouteStatsTracker,
  type RouteStatsOptions,
  type LatencyAverage,
  type LatencyConfig,
} from "./stats.js";
