// Deployment model
export {
  type ColdStartMode,
  type DeployRequest,
  type ProviderPlan,
  type DeploymentResult,
  type DeploymentStatus,
  type HybridDeployment,
  isSuccessful,
  failedResult,
  deriveStatus,
} from "./deployment.js";

// Provider contract
export {
  type ProviderKind,
  type HealthState,
  type PreflightCheck,
  type DeployOptions,
  type ProviderStatus,
  type InferenceProvider,
} from "./provider.js";

// Routing types
export {
  type BackendName,
  type RoutingSnapshot,
  type RoutingPatch,
  type ProbeOutcome,
  type RoutingPhase,
  type BackendTarget,
  type RouteStats,
  type RouterHealth,
} from "./routing.js";

// Configuration types
export {
  type RouterConfig,
  type RouterConfigInput,
  type LaunchConfig,
  type LaunchConfigInput,
  DEFAULT_ROUTER_CONFIG,
  DEFAULT_LAUNCH_CONFIG,
  MIN_PROBE_INTERVAL_MS,
  resolveRouterConfig,
  resolveLaunchConfig,
  routerConfigFromEnv,
} from "./config.js";

// Error types
export {
  HybridRouterError,
  ConfigError,
  ValidationError,
  TemplateError,
  ProviderDeployError,
  ProbeError,
  ProxyUpstreamError,
  NoBackendAvailableError,
  TeardownError,
  UnknownProviderError,
  type TeardownFailure,
} from "./errors.js";

// State store types
export {
  type ComponentRole,
  type DeploymentRecord,
  type DeploymentFilter,
  type DeploymentStore,
} from "./state.js";

// Re-export Result type from neverthrow for convenience
export { type Result, ok, err } from "neverthrow";
