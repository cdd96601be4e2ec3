export {
  normalizeGpuName,
  getGpuSpec,
  providerGpuId,
  providerGpuMap,
  providerRegions,
  getProviderPrice,
  spotGpuName,
  queryCatalog,
  cheapestProvider,
  type CatalogQuery,
} from "./catalog.js";
