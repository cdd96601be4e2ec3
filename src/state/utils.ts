import { z } from "zod";
import type {
  ComponentRole,
  DeploymentFilter,
  DeploymentRecord,
} from "../types/state.js";
import type { DeploymentResult, DeploymentStatus } from "../types/deployment.js";

const stringMap = z.record(z.string());

const resultSchema = z.object({
  provider: z.string(),
  deploymentId: z.string(),
  endpointUrl: z.string().optional(),
  healthUrl: z.string().optional(),
  error: z.string().optional(),
  metadata: stringMap,
});

const requestSchema = z.object({
  modelName: z.string(),
  gpu: z.string(),
  gpuCount: z.number(),
  tpSize: z.number(),
  maxModelLen: z.number(),
  concurrency: z.number(),
  coldStartMode: z.enum(["fast_boot", "no_fast_boot"]),
  scaleToZero: z.boolean(),
  serverlessProvider: z.string(),
  spotProvider: z.string(),
  spotCloud: z.string(),
  region: z.string().optional(),
  serviceName: z.string(),
  scaling: z.object({
    spot: z.object({
      minReplicas: z.number(),
      maxReplicas: z.number(),
      targetQps: z.number(),
      upscaleDelay: z.number(),
      downscaleDelay: z.number(),
    }),
    serverless: z.object({
      concurrency: z.number(),
      scaledownWindow: z.number(),
      timeout: z.number(),
      workersMin: z.number(),
      workersMax: z.number(),
      scalerValue: z.number(),
    }),
  }),
  serverlessOnly: z.boolean(),
  serverVersion: z.string(),
});

export const deploymentStatusSchema = z.enum([
  "launching",
  "active",
  "degraded",
  "failed",
  "destroyed",
]);

/**
 * Shape of a persisted record; stored JSON is checked against it on read
 */
export const deploymentRecordSchema: z.ZodType<DeploymentRecord> = z.object({
  serviceName: z.string(),
  status: deploymentStatusSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  request: requestSchema,
  routerUrl: z.string().nullable(),
  components: z.object({
    serverless: resultSchema.optional(),
    spot: resultSchema.optional(),
  }),
});

/**
 * Parse stored JSON into a record, null when it is missing or malformed
 */
export const parseRecord = (value: string | null | undefined): DeploymentRecord | null => {
  if (!value) return null;
  try {
    const parsed = deploymentRecordSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
};

export const withStatus = (
  record: DeploymentRecord,
  status: DeploymentStatus,
  now: Date
): DeploymentRecord => ({ ...record, status, updatedAt: now.toISOString() });

export const withComponent = (
  record: DeploymentRecord,
  role: ComponentRole,
  result: DeploymentResult,
  now: Date
): DeploymentRecord => ({
  ...record,
  components: { ...record.components, [role]: result },
  updatedAt: now.toISOString(),
});

export const matchesFilter = (record: DeploymentRecord, filter: DeploymentFilter = {}): boolean =>
  filter.status === undefined || record.status === filter.status;

/**
 * Newest first; ties broken by name for a stable order
 */
export const byNewest = (a: DeploymentRecord, b: DeploymentRecord): number =>
  b.createdAt.localeCompare(a.createdAt) || a.serviceName.localeCompare(b.serviceName);
