/**
 * hybrid-inference-router
 *
 * Deploys one LLM inference workload on a serverless GPU provider and a
 * spot GPU pool at once, and fronts both with a routing proxy that sends
 * traffic to spot whenever it is ready and to serverless otherwise.
 */

export const VERSION = "0.1.0";

// Export all types
export * from "./types/index.js";

// Catalog, configuration and templates
export * from "./config/index.js";
export * from "./catalog/index.js";
export * from "./templates/index.js";

// Providers
export * from "./providers/index.js";

// Planning and launch
export * from "./planner/index.js";
export * from "./launch/index.js";
export * from "./orchestrator/index.js";

// Routing proxy
export * from "./routing/index.js";
export * from "./proxy/index.js";

// Deployment state
export * from "./state/index.js";

// Utilities
export * from "./utils/index.js";
