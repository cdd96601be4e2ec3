import { ConfigError } from "./errors.js";

/**
 * Routing proxy configuration
 */
export interface RouterConfig {
  /** Listen port. Default: 8080 */
  port: number;
  /** Listen address. Default: "0.0.0.0" */
  host: string;
  /** Initial serverless URL, if known at startup */
  serverlessUrl?: string;
  /** Initial spot URL, if known at startup */
  spotUrl?: string;
  /** Initial bearer token for the serverless backend */
  serverlessAuthToken?: string;
  /** Spot readiness path. Default: "/health" */
  spotReadyPath: string;
  /** Path hit to wake the spot autoscaler. Default: "/health" */
  spotPokePath: string;
  /** Background probe tick. Default: 1000, floor: 250 */
  probeIntervalMs: number;
  /** Readiness probe timeout. Default: 1000 */
  probeTimeoutMs: number;
  /** Poke timeout. Default: 300 */
  pokeTimeoutMs: number;
  /** Minimum spacing between request-triggered probes. Default: 1000 */
  checkMinIntervalMs: number;
  /** Minimum spacing between pokes. Default: 500 */
  pokeMinIntervalMs: number;
  /** Upstream header and body timeout. Default: 210000 */
  upstreamTimeoutMs: number;
  /** Upstream connect timeout. Default: 2000 */
  connectTimeoutMs: number;
  /** Key clients must present; unset disables auth */
  apiKey?: string;
  /** Header carrying the key. Default: "x-api-key" */
  apiKeyHeader: string;
  /** Serve `/router/health` without a key. Default: false */
  allowHealthNoAuth: boolean;
  /** Size of the recent-routes window. Default: 200 */
  routeWindowSize: number;
  /** Retry on serverless when spot answers 5xx. Default: false */
  failoverOnSpotServerError: boolean;
  /** Maximum request body in bytes. Default: 32 MiB */
  bodyLimit: number;
  /** Enable Fastify's request logger. Default: false */
  logger: boolean;
}

export type RouterConfigInput = Partial<RouterConfig>;

export const MIN_PROBE_INTERVAL_MS = 250;

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  port: 8080,
  host: "0.0.0.0",
  spotReadyPath: "/health",
  spotPokePath: "/health",
  probeIntervalMs: 1000,
  probeTimeoutMs: 1000,
  pokeTimeoutMs: 300,
  checkMinIntervalMs: 1000,
  pokeMinIntervalMs: 500,
  upstreamTimeoutMs: 210_000,
  connectTimeoutMs: 2000,
  apiKeyHeader: "x-api-key",
  allowHealthNoAuth: false,
  routeWindowSize: 200,
  failoverOnSpotServerError: false,
  bodyLimit: 32 * 1024 * 1024,
  logger: false,
};

/**
 * Resolve router configuration with defaults and floors
 */
export const resolveRouterConfig = (input: RouterConfigInput = {}): RouterConfig => {
  const pick = <K extends keyof RouterConfig>(key: K): RouterConfig[K] =>
    input[key] ?? DEFAULT_ROUTER_CONFIG[key];

  return {
    port: pick("port"),
    host: pick("host"),
    serverlessUrl: input.serverlessUrl,
    spotUrl: input.spotUrl,
    serverlessAuthToken: input.serverlessAuthToken,
    spotReadyPath: pick("spotReadyPath"),
    spotPokePath: pick("spotPokePath"),
    probeIntervalMs: Math.max(pick("probeIntervalMs"), MIN_PROBE_INTERVAL_MS),
    probeTimeoutMs: pick("probeTimeoutMs"),
    pokeTimeoutMs: pick("pokeTimeoutMs"),
    checkMinIntervalMs: pick("checkMinIntervalMs"),
    pokeMinIntervalMs: pick("pokeMinIntervalMs"),
    upstreamTimeoutMs: pick("upstreamTimeoutMs"),
    connectTimeoutMs: pick("connectTimeoutMs"),
    apiKey: input.apiKey,
    apiKeyHeader: pick("apiKeyHeader").toLowerCase(),
    allowHealthNoAuth: pick("allowHealthNoAuth"),
    routeWindowSize: Math.max(1, Math.floor(pick("routeWindowSize"))),
    failoverOnSpotServerError: pick("failoverOnSpotServerError"),
    bodyLimit: pick("bodyLimit"),
    logger: pick("logger"),
  };
};

type Env = Record<string, string | undefined>;

const envSeconds = (env: Env, name: string): number | undefined => {
  const value = env[name];
  if (value === undefined || value.trim() === "") return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got "${value}"`);
  }
  return Math.round(seconds * 1000);
};

const envInt = (env: Env, name: string): number | undefined => {
  const value = env[name];
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
};

const envBool = (env: Env, name: string): boolean | undefined => {
  const value = env[name];
  if (value === undefined) return undefined;
  return ["1", "true", "yes", "y"].includes(value.trim().toLowerCase());
};

const envString = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

/**
 * Read router settings from environment variables
 *
 * Durations are given in seconds and converted to milliseconds.
 *
 * @throws ConfigError on a malformed number
 */
export const routerConfigFromEnv = (env: Env = process.env): RouterConfigInput => ({
  port: envInt(env, "PORT"),
  serverlessUrl: envString(env, "SERVERLESS_BASE_URL"),
  spotUrl: envString(env, "SKYSERVE_BASE_URL"),
  serverlessAuthToken: envString(env, "SERVERLESS_AUTH_TOKEN"),
  spotReadyPath: envString(env, "SKYSERVE_READY_PATH"),
  spotPokePath: envString(env, "SKYSERVE_POKE_PATH"),
  probeTimeoutMs: envSeconds(env, "PROBE_TIMEOUT_SECONDS"),
  pokeTimeoutMs: envSeconds(env, "POKE_TIMEOUT_SECONDS"),
  upstreamTimeoutMs: envSeconds(env, "UPSTREAM_TIMEOUT_SECONDS"),
  checkMinIntervalMs: envSeconds(env, "CHECK_MIN_INTERVAL_SECONDS"),
  pokeMinIntervalMs: envSeconds(env, "POKE_MIN_INTERVAL_SECONDS"),
  apiKey: envString(env, "API_KEY"),
  apiKeyHeader: envString(env, "API_KEY_HEADER"),
  allowHealthNoAuth: envBool(env, "ALLOW_HEALTH_NO_AUTH"),
  routeWindowSize: envInt(env, "ROUTE_WINDOW_SIZE"),
});

/**
 * Launch orchestration configuration
 */
export interface LaunchConfig {
  /** Bound on the serverless leg. Default: 600000 */
  serverlessDeployTimeoutMs: number;
  /** Bound on the spot leg; unset waits indefinitely */
  spotDeployTimeoutMs?: number;
  /** Attempts when pushing URLs to the router. Default: 5 */
  pushRetries: number;
  /** Delay between push attempts. Default: 3000 */
  pushDelayMs: number;
  /** Router settings for the embedded proxy */
  router: RouterConfigInput;
  /** Host clients use to reach the router. Default: "127.0.0.1" */
  publicHost: string;
  /**
   * How long a serverless-only deploy polls the new endpoint's health to
   * trigger its cold start. 0 skips the warmup. Default: 300000
   */
  warmupTimeoutMs: number;
  /** Spacing of warmup polls. Default: 5000 */
  warmupIntervalMs: number;
}

export type LaunchConfigInput = Partial<LaunchConfig>;

export const DEFAULT_LAUNCH_CONFIG: LaunchConfig = {
  serverlessDeployTimeoutMs: 600_000,
  pushRetries: 5,
  pushDelayMs: 3000,
  router: {},
  publicHost: "127.0.0.1",
  warmupTimeoutMs: 300_000,
  warmupIntervalMs: 5000,
};

/**
 * Resolve launch configuration with defaults
 */
export const resolveLaunchConfig = (input: LaunchConfigInput = {}): LaunchConfig => ({
  serverlessDeployTimeoutMs:
    input.serverlessDeployTimeoutMs ?? DEFAULT_LAUNCH_CONFIG.serverlessDeployTimeoutMs,
  spotDeployTimeoutMs: input.spotDeployTimeoutMs,
  pushRetries: Math.max(1, input.pushRetries ?? DEFAULT_LAUNCH_CONFIG.pushRetries),
  pushDelayMs: input.pushDelayMs ?? DEFAULT_LAUNCH_CONFIG.pushDelayMs,
  router: input.router ?? DEFAULT_LAUNCH_CONFIG.router,
  publicHost: input.publicHost ?? DEFAULT_LAUNCH_CONFIG.publicHost,
  warmupTimeoutMs: Math.max(0, input.warmupTimeoutMs ?? DEFAULT_LAUNCH_CONFIG.warmupTimeoutMs),
  warmupIntervalMs: input.warmupIntervalMs ?? DEFAULT_LAUNCH_CONFIG.warmupIntervalMs,
});
