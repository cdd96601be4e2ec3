/**
 * Scaling Policy
 *
 * Autoscaling knobs for both legs, loaded from YAML. Unknown sections and
 * keys are rejected so typos surface before anything is deployed.
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigError } from "../types/errors.js";

const spotScalingSchema = z
  .object({
    min_replicas: z.number().int().min(0).default(0),
    max_replicas: z.number().int().min(1).default(5),
    target_qps: z.number().positive().default(10),
    upscale_delay: z.number().int().min(0).default(5),
    downscale_delay: z.number().int().min(0).default(300),
  })
  .strict();

const serverlessScalingSchema = z
  .object({
    concurrency: z.number().int().min(1).default(32),
    scaledown_window: z.number().int().min(0).default(60),
    timeout: z.number().int().min(1).default(600),
    workers_min: z.number().int().min(0).default(0),
    workers_max: z.number().int().min(1).default(1),
    scaler_value: z.number().int().min(1).default(4),
  })
  .strict();

const scalingPolicySchema = z
  .object({
    // An empty YAML section parses as null
    spot: z.preprocess((v) => v ?? {}, spotScalingSchema),
    serverless: z.preprocess((v) => v ?? {}, serverlessScalingSchema),
  })
  .strict();

/**
 * Spot autoscaling (replica bounds, QPS target, delays in seconds)
 */
export interface SpotScaling {
  minReplicas: number;
  maxReplicas: number;
  targetQps: number;
  upscaleDelay: number;
  downscaleDelay: number;
}

/**
 * Serverless autoscaling (container concurrency, windows in seconds)
 */
export interface ServerlessScaling {
  concurrency: number;
  scaledownWindow: number;
  timeout: number;
  workersMin: number;
  workersMax: number;
  /** Queue delay target for providers that scale on it */
  scalerValue: number;
}

export interface ScalingPolicy {
  spot: SpotScaling;
  serverless: ServerlessScaling;
}

type ScalingPolicyYaml = z.output<typeof scalingPolicySchema>;

const convertPolicy = (yaml: ScalingPolicyYaml): ScalingPolicy => ({
  spot: {
    minReplicas: yaml.spot.min_replicas,
    maxReplicas: yaml.spot.max_replicas,
    targetQps: yaml.spot.target_qps,
    upscaleDelay: yaml.spot.upscale_delay,
    downscaleDelay: yaml.spot.downscale_delay,
  },
  serverless: {
    concurrency: yaml.serverless.concurrency,
    scaledownWindow: yaml.serverless.scaledown_window,
    timeout: yaml.serverless.timeout,
    workersMin: yaml.serverless.workers_min,
    workersMax: yaml.serverless.workers_max,
    scalerValue: yaml.serverless.scaler_value,
  },
});

/**
 * Policy with every default applied
 */
export const defaultScalingPolicy = (): ScalingPolicy =>
  convertPolicy(scalingPolicySchema.parse({}));

/**
 * Validate an already-parsed policy document
 *
 * @throws ConfigError listing every offending path
 */
export const parseScalingPolicy = (raw: unknown, source = "scaling policy"): ScalingPolicy => {
  const result = scalingPolicySchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid ${source}: ${issues.join("; ")}`);
  }
  if (result.data.spot.min_replicas > result.data.spot.max_replicas) {
    throw new ConfigError(`Invalid ${source}: spot.min_replicas exceeds spot.max_replicas`);
  }
  return convertPolicy(result.data);
};

/**
 * Load a scaling policy from a YAML file
 */
export const loadScalingPolicy = async (path: string): Promise<ScalingPolicy> => {
  const content = await readFile(path, "utf-8");
  return parseScalingPolicy(parse(content), path);
};
