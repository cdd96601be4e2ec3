import type { ScalingPolicy } from "../config/scaling.js";

/**
 * Cold start behaviour requested for the model server
 */
export type ColdStartMode = "fast_boot" | "no_fast_boot";

/**
 * What the user asks for. Immutable once accepted.
 */
export interface DeployRequest {
  /** Model identifier (e.g. a Hugging Face repo id) */
  readonly modelName: string;
  /** Canonical GPU short name (see the catalog) */
  readonly gpu: string;
  /** GPUs per replica */
  readonly gpuCount: number;
  /** Tensor-parallel degree */
  readonly tpSize: number;
  /** Maximum sequence length served */
  readonly maxModelLen: number;
  /** Concurrent requests per serverless container */
  readonly concurrency: number;
  readonly coldStartMode: ColdStartMode;
  /** Allow the serverless backend to scale down to zero containers */
  readonly scaleToZero: boolean;
  /** Serverless provider name, or "auto" for the cheapest offering the GPU */
  readonly serverlessProvider: string;
  /** Spot provider name */
  readonly spotProvider: string;
  /** Cloud the spot capacity is drawn from */
  readonly spotCloud: string;
  readonly region?: string;
  /** Unique key of the deployment */
  readonly serviceName: string;
  readonly scaling: ScalingPolicy;
  /** Skip spot and router entirely */
  readonly serverlessOnly: boolean;
  /** Model server version pinned for every backend */
  readonly serverVersion: string;
}

/**
 * Rendered, backend-specific deployment artifact. Produced once by the
 * planner and consumed once by that provider's deploy step.
 */
export interface ProviderPlan {
  /** Provider name */
  readonly provider: string;
  /** Rendered config or script text (may be empty for REST providers) */
  readonly renderedScript: string;
  /** Environment for the deploy step or the remote workload */
  readonly env: Readonly<Record<string, string>>;
  /** Free-form identifiers (app name, function name, service name) */
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Outcome of executing one plan. `endpointUrl` and `error` are
 * mutually exclusive.
 */
export interface DeploymentResult {
  readonly provider: string;
  /** Provider-side identifier of the deployment */
  readonly deploymentId: string;
  readonly endpointUrl?: string;
  readonly healthUrl?: string;
  readonly error?: string;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Lifecycle of a hybrid deployment
 *
 * - launching: nothing serves yet and a leg is still running
 * - active: serverless is up and spot is up or still pending
 * - degraded: one backend failed while the other serves
 * - failed: no backend came up
 * - destroyed: torn down on request
 */
export type DeploymentStatus =
  | "launching"
  | "active"
  | "degraded"
  | "failed"
  | "destroyed";

/**
 * The joined, user-visible record of one deployment
 */
export interface HybridDeployment {
  readonly serviceName: string;
  readonly serverless: DeploymentResult | null;
  /** Null until the spot leg settles */
  readonly spot: DeploymentResult | null;
  /** Public address clients use */
  readonly routerUrl: string | null;
  readonly status: DeploymentStatus;
}

/**
 * Whether a result describes a backend that came up
 */
export const isSuccessful = (
  result: DeploymentResult | null | undefined
): result is DeploymentResult & { endpointUrl: string } =>
  !!result && !result.error && typeof result.endpointUrl === "string";

/**
 * Build a failed result, keeping whatever identifiers are known
 */
export const failedResult = (
  provider: string,
  error: string,
  metadata: Readonly<Record<string, string>> = {}
): DeploymentResult => ({
  provider,
  deploymentId: metadata.service_name ?? metadata.app_name ?? metadata.endpoint_name ?? "",
  error,
  metadata,
});

/**
 * Derive the overall status from the two legs
 *
 * @param serverless - Serverless result, null when not requested
 * @param spot - Spot result, null while pending or not requested
 * @param spotPending - Whether the spot leg is still running
 */
export const deriveStatus = (
  serverless: DeploymentResult | null,
  spot: DeploymentResult | null,
  spotPending: boolean
): DeploymentStatus => {
  const serverlessUp = isSuccessful(serverless);
  const spotUp = isSuccessful(spot);

  if (spotPending) {
    return serverlessUp ? "active" : "launching";
  }
  if (serverlessUp && spotUp) return "active";
  if (serverlessUp || spotUp) {
    // Serverless-only deployments never had a spot leg to lose
    return spot === null && serverlessUp ? "active" : "degraded";
  }
  return "failed";
};
