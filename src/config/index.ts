/**
 * Configuration Module
 *
 * Catalog loading and scaling policies.
 */

// Schema types
export type { CatalogYaml, Catalog, GpuSpec, ProviderGpu } from "./schema.js";

// Loader functions
export {
  getConfigDir,
  parseCatalog,
  loadCatalog,
  getCatalog,
  resetCatalogCache,
} from "./loader.js";

// Scaling policy
export {
  defaultScalingPolicy,
  parseScalingPolicy,
  loadScalingPolicy,
  type ScalingPolicy,
  type SpotScaling,
  type ServerlessScaling,
} from "./scaling.js";
