/**
 * GPU Catalog Queries
 *
 * Pure lookups over a loaded catalog. Every function takes the catalog as
 * its last argument and defaults to the bundled one.
 */

import { getCatalog } from "../config/loader.js";
import type { Catalog, GpuSpec, ProviderGpu } from "../config/schema.js";

/**
 * Query options for filtering offerings
 */
export interface CatalogQuery {
  /** Canonical GPU name or alias */
  readonly gpu?: string;
  readonly provider?: string;
  readonly minVramGb?: number;
  /** Upper bound on price; unlisted prices are excluded */
  readonly maxPrice?: number;
}

/**
 * Resolve a GPU name or alias to its canonical short name
 *
 * Exact names win; otherwise the match is case-insensitive.
 */
export const normalizeGpuName = (
  name: string,
  catalog: Catalog = getCatalog()
): string | undefined => {
  if (catalog.gpus.has(name)) return name;
  const alias = catalog.aliases.get(name);
  if (alias) return alias;

  const upper = name.toUpperCase();
  for (const key of catalog.gpus.keys()) {
    if (key.toUpperCase() === upper) return key;
  }
  for (const [key, target] of catalog.aliases) {
    if (key.toUpperCase() === upper) return target;
  }
  return undefined;
};

export const getGpuSpec = (
  name: string,
  catalog: Catalog = getCatalog()
): GpuSpec | undefined => {
  const canonical = normalizeGpuName(name, catalog);
  return canonical ? catalog.gpus.get(canonical) : undefined;
};

const findOffering = (
  gpu: string,
  provider: string,
  catalog: Catalog
): ProviderGpu | undefined => {
  const canonical = normalizeGpuName(gpu, catalog) ?? gpu;
  return catalog.offerings.find((o) => o.gpu === canonical && o.provider === provider);
};

/**
 * Provider-specific identifier for a GPU, if the provider offers it
 */
export const providerGpuId = (
  gpu: string,
  provider: string,
  catalog: Catalog = getCatalog()
): string | undefined => findOffering(gpu, provider, catalog)?.providerGpuId;

/**
 * Every GPU a provider offers, canonical name to provider identifier
 */
export const providerGpuMap = (
  provider: string,
  catalog: Catalog = getCatalog()
): Record<string, string> =>
  Object.fromEntries(
    catalog.offerings
      .filter((o) => o.provider === provider)
      .map((o) => [o.gpu, o.providerGpuId])
  );

/**
 * Regions where a provider offers a GPU; empty means all regions
 */
export const providerRegions = (
  gpu: string,
  provider: string,
  catalog: Catalog = getCatalog()
): readonly string[] => findOffering(gpu, provider, catalog)?.regions ?? [];

/**
 * Listed price per GPU-hour, 0 when unknown
 */
export const getProviderPrice = (
  gpu: string,
  provider: string,
  catalog: Catalog = getCatalog()
): number => findOffering(gpu, provider, catalog)?.pricePerGpuHour ?? 0;

/**
 * Accelerator name the spot launcher uses for a GPU
 */
export const spotGpuName = (
  gpu: string,
  catalog: Catalog = getCatalog()
): string | undefined => {
  const canonical = normalizeGpuName(gpu, catalog);
  return canonical ? catalog.spotNames.get(canonical) : undefined;
};

/**
 * Sort by price, unlisted prices last
 */
const byPrice = (a: ProviderGpu, b: ProviderGpu): number => {
  const aUnlisted = a.pricePerGpuHour === 0;
  const bUnlisted = b.pricePerGpuHour === 0;
  if (aUnlisted !== bUnlisted) return aUnlisted ? 1 : -1;
  return a.pricePerGpuHour - b.pricePerGpuHour;
};

/**
 * Filter offerings, cheapest first
 */
export const queryCatalog = (
  query: CatalogQuery = {},
  catalog: Catalog = getCatalog()
): ProviderGpu[] => {
  const gpu = query.gpu ? normalizeGpuName(query.gpu, catalog) ?? query.gpu : undefined;

  return catalog.offerings
    .filter((o) => gpu === undefined || o.gpu === gpu)
    .filter((o) => query.provider === undefined || o.provider === query.provider)
    .filter(
      (o) =>
        query.minVramGb === undefined ||
        (catalog.gpus.get(o.gpu)?.vramGb ?? 0) >= query.minVramGb
    )
    .filter(
      (o) =>
        query.maxPrice === undefined ||
        (o.pricePerGpuHour > 0 && o.pricePerGpuHour <= query.maxPrice)
    )
    .sort(byPrice);
};

/**
 * Cheapest priced offering of a GPU among the given providers
 */
export const cheapestProvider = (
  gpu: string,
  among: readonly string[],
  catalog: Catalog = getCatalog()
): ProviderGpu | undefined =>
  queryCatalog({ gpu }, catalog).find(
    (o) => o.pricePerGpuHour > 0 && among.includes(o.provider)
  );
