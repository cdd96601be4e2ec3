/**
 * Configuration Loader
 *
 * Locates the bundled config/ directory and loads the GPU catalog from it.
 */

import { parse } from "yaml";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { ConfigError } from "../types/errors.js";
import {
  catalogYamlSchema,
  type Catalog,
  type CatalogYaml,
  type GpuSpec,
  type ProviderGpu,
} from "./schema.js";

// ============================================================================
// Path Resolution
// ============================================================================

/**
 * Get the config directory path
 */
export const getConfigDir = (): string => {
  // In ESM, we need to derive __dirname from import.meta.url
  const currentFile = fileURLToPath(import.meta.url);
  const srcDir = dirname(dirname(currentFile));
  const rootDir = dirname(srcDir);
  return join(rootDir, "config");
};

// ============================================================================
// YAML Parsing
// ============================================================================

/**
 * Parse a YAML file without assuming its shape
 */
const parseYamlFile = (filePath: string): unknown => {
  const content = readFileSync(filePath, "utf-8");
  return parse(content);
};

// ============================================================================
// Conversion (YAML -> Runtime types)
// ============================================================================

const convertCatalog = (yaml: CatalogYaml): Catalog => {
  const gpus = new Map<string, GpuSpec>(
    Object.entries(yaml.gpus).map(([shortName, spec]): [string, GpuSpec] => [
      shortName,
      {
        shortName,
        fullName: spec.full_name,
        vramGb: spec.vram_gb,
        arch: spec.arch,
      },
    ])
  );

  const offerings = Object.entries(yaml.providers).flatMap(([provider, entries]) =>
    entries.map(
      (entry): ProviderGpu => ({
        gpu: entry.gpu,
        provider,
        providerGpuId: entry.id,
        pricePerGpuHour: entry.price,
        regions: entry.regions ?? [],
      })
    )
  );

  return {
    gpus,
    aliases: new Map(Object.entries(yaml.aliases)),
    spotNames: new Map(Object.entries(yaml.spot_names)),
    offerings,
  };
};

// ============================================================================
// Validation
// ============================================================================

/**
 * Every alias, spot name and offering must point at a known GPU
 */
const validateReferences = (catalog: Catalog, source: string): void => {
  const problems: string[] = [];

  for (const [alias, target] of catalog.aliases) {
    if (!catalog.gpus.has(target)) {
      problems.push(`alias "${alias}" points at unknown GPU "${target}"`);
    }
  }
  for (const gpu of catalog.spotNames.keys()) {
    if (!catalog.gpus.has(gpu)) {
      problems.push(`spot name given for unknown GPU "${gpu}"`);
    }
  }
  for (const offering of catalog.offerings) {
    if (!catalog.gpus.has(offering.gpu)) {
      problems.push(`${offering.provider} offers unknown GPU "${offering.gpu}"`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid catalog ${source}: ${problems.join("; ")}`);
  }
};

// ============================================================================
// Loader Functions
// ============================================================================

/**
 * Build a catalog from an already-parsed document
 *
 * @throws ConfigError on a malformed document or dangling reference
 */
export const parseCatalog = (raw: unknown, source = "catalog"): Catalog => {
  const result = catalogYamlSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid catalog ${source}: ${issues.join("; ")}`);
  }
  const catalog = convertCatalog(result.data);
  validateReferences(catalog, source);
  return catalog;
};

/**
 * Load the GPU catalog from config/catalog.yml
 */
export const loadCatalog = (configDir?: string): Catalog => {
  const dir = configDir ?? getConfigDir();
  const filePath = join(dir, "catalog.yml");
  return parseCatalog(parseYamlFile(filePath), filePath);
};

// ============================================================================
// Cached Catalog (singleton)
// ============================================================================

let cachedCatalog: Catalog | null = null;

/**
 * Get the bundled catalog (cached)
 */
export const getCatalog = (): Catalog => {
  if (!cachedCatalog) {
    cachedCatalog = loadCatalog();
  }
  return cachedCatalog;
};

/**
 * Reset cached catalog (for testing)
 */
export const resetCatalogCache = (): void => {
  cachedCatalog = null;
};
