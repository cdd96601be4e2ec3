import type {
  DeployRequest,
  DeploymentResult,
  ProviderPlan,
} from "./deployment.js";

/**
 * Which half of a hybrid deployment a provider can serve
 */
export type ProviderKind = "serverless" | "spot";

/**
 * Health of a deployed backend as seen by a cheap status query
 */
export type HealthState = "healthy" | "unhealthy" | "unknown";

/**
 * A single preflight validation step
 */
export interface PreflightCheck {
  /** Check identifier, e.g. "api_key" */
  name: string;
  passed: boolean;
  /** Human-readable status */
  message: string;
  /** Shell command that fixes the problem, when there is one */
  fixCommand?: string;
}

/**
 * Options for a deploy call
 */
export interface DeployOptions {
  /** Aborted when the caller stops waiting */
  signal?: AbortSignal;
}

/**
 * Provider-native status report for a service
 */
export interface ProviderStatus {
  provider: string;
  status: string;
  [detail: string]: string;
}

/**
 * Capability contract every backend implements
 *
 * Adapters must not share mutable state with each other: two deploys on
 * two providers run concurrently.
 */
export interface InferenceProvider {
  /** Registry name, e.g. "modal" or "skyserve" */
  readonly name: string;
  readonly kind: ProviderKind;

  /**
   * Render the deployment artifact. Pure, no I/O.
   *
   * @param request - Accepted deploy request
   * @param serveCommand - Shared model-server start command
   * @throws ConfigError if the request is incompatible with this provider
   */
  plan(request: DeployRequest, serveCommand: string): ProviderPlan;

  /**
   * Execute the plan. Failures to bring the backend up are returned as a
   * result with `error` set; throwing is reserved for programmer errors.
   */
  deploy(plan: ProviderPlan, options?: DeployOptions): Promise<DeploymentResult>;

  /**
   * Cheap, side-effect-free health query
   */
  status(result: DeploymentResult): Promise<HealthState>;

  /**
   * Best-effort teardown. Rejections are collected by the caller.
   */
  destroy(result: DeploymentResult): Promise<void>;

  /**
   * Validate the local environment before planning
   */
  preflight?(request: DeployRequest): Promise<PreflightCheck[]>;

  /**
   * Provider-native status lookup by service name
   */
  describe?(serviceName: string): Promise<ProviderStatus>;

  /**
   * Bearer token the router must present to this backend, if any
   */
  authToken?(): string | undefined;
}
