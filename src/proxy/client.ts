/**
 * Router Admin Client
 *
 * Used by the orchestrator to hand backend URLs to a running router and
 * by the CLI to read its health.
 */

import { request } from "undici";
import { z } from "zod";
import { err, ok, type Result } from "neverthrow";
import type { RouterHealth, RoutingPatch } from "../types/routing.js";
import { HybridRouterError } from "../types/errors.js";
import { errorMessage, logger } from "../utils/debug.js";

export interface RouterClientOptions {
  /** Key the router expects, if it has one */
  apiKey?: string;
  /** Header carrying the key. Default: "x-api-key" */
  apiKeyHeader?: string;
  /** Bound on one HTTP call. Default: 10000 */
  timeoutMs?: number;
}

export interface PushOptions extends RouterClientOptions {
  /** Total attempts. Default: 5 */
  retries?: number;
  /** Wait between attempts. Default: 3000 */
  delayMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

const authHeaders = (options: RouterClientOptions): Record<string, string> =>
  options.apiKey ? { [options.apiKeyHeader ?? "x-api-key"]: options.apiKey } : {};

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

const adminUrl = (routerUrl: string, path: string): string =>
  `${routerUrl.replace(/\/+$/, "")}${path}`;

/**
 * Wire body of a routing patch; absent fields stay absent
 */
export const toConfigBody = (patch: RoutingPatch): Record<string, string | null> => {
  const body: Record<string, string | null> = {};
  if (patch.serverlessUrl !== undefined) body["serverless_url"] = patch.serverlessUrl;
  if (patch.spotUrl !== undefined) body["spot_url"] = patch.spotUrl;
  if (patch.serverlessAuthToken !== undefined) {
    body["serverless_auth_token"] = patch.serverlessAuthToken;
  }
  return body;
};

/**
 * POST a routing patch to `/router/config`, retrying on failure
 *
 * @returns true once the router accepted the patch, false when every
 * attempt failed
 */
export const pushRouterConfig = async (
  routerUrl: string,
  patch: RoutingPatch,
  options: PushOptions = {}
): Promise<boolean> => {
  const retries = Math.max(1, options.retries ?? 5);
  const delayMs = options.delayMs ?? 3000;
  const body = JSON.stringify(toConfigBody(patch));

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      const response = await request(adminUrl(routerUrl, "/router/config"), {
        method: "POST",
        headers: { "content-type": "application/json", ...authHeaders(options) },
        body,
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
      await response.body.dump();
      if (response.statusCode >= 200 && response.statusCode < 300) {
        return true;
      }
      logger.warn(
        `Router config push attempt ${attempt}/${retries} got status ${response.statusCode}`
      );
    } catch (error) {
      logger.warn(
        `Router config push attempt ${attempt}/${retries} failed: ${errorMessage(error)}`
      );
    }
    if (attempt < retries) {
      await sleep(delayMs);
    }
  }
  return false;
};

const routeStatsSchema = z.object({
  total: z.number(),
  spot: z.number(),
  serverless: z.number(),
  pct_spot: z.number(),
  pct_serverless: z.number(),
  errors: z.number(),
  window_total: z.number(),
  window_spot: z.number(),
  window_serverless: z.number(),
  window_error_rate: z.number(),
  avg_latency_ms_spot: z.number().nullable(),
  avg_latency_ms_serverless: z.number().nullable(),
  gpu_seconds_spot: z.number(),
  gpu_seconds_serverless: z.number(),
  uptime_seconds: z.number(),
  spot_ready_seconds: z.number(),
});

export const routerHealthSchema: z.ZodType<RouterHealth> = z.object({
  skyserve_ready: z.boolean(),
  last_probe_ts: z.number().nullable(),
  last_probe_err: z.string().nullable(),
  serverless_base_url: z.string().nullable(),
  skyserve_base_url: z.string().nullable(),
  phase: z.enum(["no_backends", "serverless_only", "spot_preferred", "shutdown"]),
  route_stats: routeStatsSchema,
});

/**
 * GET `/router/health`
 */
export const fetchRouterHealth = async (
  routerUrl: string,
  options: RouterClientOptions = {}
): Promise<Result<RouterHealth, HybridRouterError>> => {
  try {
    const response = await request(adminUrl(routerUrl, "/router/health"), {
      method: "GET",
      headers: authHeaders(options),
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    if (response.statusCode !== 200) {
      await response.body.dump();
      return err(new HybridRouterError(`Router health returned status ${response.statusCode}`));
    }
    const parsed = routerHealthSchema.safeParse(await response.body.json());
    if (!parsed.success) {
      return err(new HybridRouterError(`Unexpected router health body: ${parsed.error.message}`));
    }
    return ok(parsed.data);
  } catch (error) {
    return err(new HybridRouterError(`Router unreachable: ${errorMessage(error)}`));
  }
};
