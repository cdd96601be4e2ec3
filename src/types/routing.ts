/**
 * Backend a request can be routed to
 */
export type BackendName = "serverless" | "spot";

/**
 * Immutable view of the routing state at one instant
 *
 * Readers always receive a whole snapshot; writers replace it wholesale,
 * so a reader can never see a spot URL paired with the readiness of a
 * previous URL.
 */
export interface RoutingSnapshot {
  /** Serverless base URL without trailing slash */
  readonly serverlessUrl: string | null;
  /** Spot base URL without trailing slash */
  readonly spotUrl: string | null;
  /** Bearer token injected when forwarding to serverless */
  readonly serverlessAuthToken: string | null;
  /** Result of the most recent spot probe */
  readonly spotReady: boolean;
  /** Epoch milliseconds of the most recent probe */
  readonly lastProbeAt: number | null;
  readonly lastProbeError: string | null;
  /** Set once the router stops; no backend is selected afterwards */
  readonly shutdown: boolean;
}

/**
 * Partial update. Absent fields are left alone; `null` or "" clears.
 */
export interface RoutingPatch {
  serverlessUrl?: string | null;
  spotUrl?: string | null;
  serverlessAuthToken?: string | null;
}

/**
 * Outcome of one readiness probe
 */
export type ProbeOutcome = { ok: true } | { ok: false; error: string };

/**
 * Derived routing phase, never stored
 */
export type RoutingPhase =
  | "no_backends"
  | "serverless_only"
  | "spot_preferred"
  | "shutdown";

/**
 * Backend picked for one request
 */
export interface BackendTarget {
  backend: BackendName;
  baseUrl: string;
  /** Serverless URL to retry once on spot transport failure */
  fallbackUrl: string | null;
}

/**
 * Route statistics as reported by `/router/health`
 */
export interface RouteStats {
  total: number;
  spot: number;
  serverless: number;
  pct_spot: number;
  pct_serverless: number;
  errors: number;
  window_total: number;
  window_spot: number;
  window_serverless: number;
  /** Share of failed routes in the window, 0..1 */
  window_error_rate: number;
  avg_latency_ms_spot: number | null;
  avg_latency_ms_serverless: number | null;
  gpu_seconds_spot: number;
  gpu_seconds_serverless: number;
  uptime_seconds: number;
  spot_ready_seconds: number;
}

/**
 * Body of `GET /router/health`
 */
export interface RouterHealth {
  skyserve_ready: boolean;
  /** Epoch seconds */
  last_probe_ts: number | null;
  last_probe_err: string | null;
  serverless_base_url: string | null;
  skyserve_base_url: string | null;
  phase: RoutingPhase;
  route_stats: RouteStats;
}
