/**
 * Catalog Schema
 *
 * Shape of config/catalog.yml and the runtime types it converts to.
 */

import { z } from "zod";

// ============================================================================
// catalog.yml
// ============================================================================

const gpuSpecYamlSchema = z
  .object({
    full_name: z.string(),
    vram_gb: z.number().positive(),
    arch: z.string(),
  })
  .strict();

const providerGpuYamlSchema = z
  .object({
    /** Canonical GPU short name */
    gpu: z.string(),
    /** Provider-specific GPU identifier */
    id: z.string(),
    /** USD per GPU-hour, 0 when not listed */
    price: z.number().min(0),
    /** Regions offering the GPU; absent means all */
    regions: z.array(z.string()).optional(),
  })
  .strict();

export const catalogYamlSchema = z
  .object({
    gpus: z.record(gpuSpecYamlSchema),
    aliases: z.record(z.string()).default({}),
    spot_names: z.record(z.string()).default({}),
    // Only holds YAML anchors reused under providers
    region_sets: z.record(z.array(z.string())).optional(),
    providers: z.record(z.array(providerGpuYamlSchema)),
  })
  .strict();

export type CatalogYaml = z.output<typeof catalogYamlSchema>;

// ============================================================================
// Runtime types
// ============================================================================

/**
 * Hardware facts for a GPU type
 */
export interface GpuSpec {
  /** "L4", "H100", "A100_80GB" */
  readonly shortName: string;
  readonly fullName: string;
  readonly vramGb: number;
  /** "ada", "ampere", "hopper", "blackwell" */
  readonly arch: string;
}

/**
 * One GPU offering from one serverless provider
 */
export interface ProviderGpu {
  readonly gpu: string;
  readonly provider: string;
  readonly providerGpuId: string;
  /** USD, 0 = unknown/not listed */
  readonly pricePerGpuHour: number;
  /** Empty = all regions */
  readonly regions: readonly string[];
}

/**
 * Immutable, indexed catalog
 */
export type Catalog = Readonly<{
  gpus: ReadonlyMap<string, GpuSpec>;
  aliases: ReadonlyMap<string, string>;
  /** Canonical name to the spot launcher's accelerator name */
  spotNames: ReadonlyMap<string, string>;
  offerings: readonly ProviderGpu[];
}>;
