/**
 * Routing Proxy Server
 *
 * Public endpoint of a hybrid deployment. Every inbound request is sent to
 * the backend the routing state currently prefers; a spot request that
 * cannot reach its backend is retried once on serverless. Two admin
 * routes expose and update the routing state.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { finished } from "node:stream";
import Fastify, {
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from "fastify";
import { z } from "zod";
import type { RouterConfig, RouterConfigInput } from "../types/config.js";
import { resolveRouterConfig } from "../types/config.js";
import type {
  BackendName,
  RouterHealth,
  RoutingPatch,
  RoutingSnapshot,
} from "../types/routing.js";
import { ProxyUpstreamError } from "../types/errors.js";
import { createRoutingState, type RoutingState } from "../routing/state.js";
import { routingPhase, selectBackend, shouldWakeSpot } from "../routing/selection.js";
import { createRouteStats, type RouteStatsTracker } from "../routing/stats.js";
import { createReadinessProber, type ReadinessProber } from "../routing/prober.js";
import {
  buildProxyUrl,
  filterRequestHeaders,
  filterResponseHeaders,
  type OutgoingHeaders,
} from "./headers.js";
import {
  createUpstreamClient,
  isHttpMethod,
  type UpstreamResponse,
} from "./forward.js";
import { debug, errorMessage, logger } from "../utils/debug.js";

export interface RouterServer {
  readonly app: FastifyInstance;
  readonly config: RouterConfig;
  readonly state: RoutingState;
  readonly prober: ReadinessProber;
  readonly stats: RouteStatsTracker;
  /** Apply a routing patch in process; starts or stops the prober */
  update(patch: RoutingPatch): RoutingSnapshot;
  /** Body of `GET /router/health` */
  health(): RouterHealth;
  /** Start listening; resolves with the bound address */
  listen(): Promise<string>;
  /** Stop the prober, enter shutdown and close the listener */
  close(): Promise<void>;
}

export interface RouterServerDeps {
  now?: () => number;
}

const urlField = z.union([z.literal(""), z.string().url()]).nullable().optional();

/**
 * Body accepted by `POST /router/config`
 */
export const configPatchSchema = z.object({
  serverless_url: urlField,
  spot_url: urlField,
  serverless_auth_token: z.string().nullable().optional(),
});

export type ConfigPatchBody = z.infer<typeof configPatchSchema>;

/**
 * Map the wire body onto a routing patch
 */
export const toRoutingPatch = (body: ConfigPatchBody): RoutingPatch => ({
  serverlessUrl: body.serverless_url,
  spotUrl: body.spot_url,
  serverlessAuthToken: body.serverless_auth_token,
});

const digest = (value: string): Buffer => createHash("sha256").update(value).digest();

const firstHeader = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

const splitUrl = (url: string): { path: string; search: string } => {
  const index = url.indexOf("?");
  return index === -1
    ? { path: url, search: "" }
    : { path: url.slice(0, index), search: url.slice(index + 1) };
};

/** Routes between periodic summary lines */
const SUMMARY_EVERY = 100;

/**
 * Create the routing proxy
 */
export const createRouterServer = (
  input: RouterConfigInput = {},
  deps: RouterServerDeps = {}
): RouterServer => {
  const config = resolveRouterConfig(input);
  const now = deps.now ?? Date.now;

  const state = createRoutingState({
    initial: {
      serverlessUrl: config.serverlessUrl,
      spotUrl: config.spotUrl,
      serverlessAuthToken: config.serverlessAuthToken,
    },
    now,
  });
  const prober = createReadinessProber(
    state,
    {
      intervalMs: config.probeIntervalMs,
      timeoutMs: config.probeTimeoutMs,
      minIntervalMs: config.checkMinIntervalMs,
      readyPath: config.spotReadyPath,
      pokePath: config.spotPokePath,
      pokeTimeoutMs: config.pokeTimeoutMs,
      pokeMinIntervalMs: config.pokeMinIntervalMs,
    },
    { now }
  );
  const stats = createRouteStats({ windowSize: config.routeWindowSize, now });
  const upstream = createUpstreamClient({
    connectTimeoutMs: config.connectTimeoutMs,
    upstreamTimeoutMs: config.upstreamTimeoutMs,
  });

  const app = Fastify({ logger: config.logger, bodyLimit: config.bodyLimit });

  // Bodies are relayed untouched, whatever their type
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_request, body, done) => {
    done(null, body);
  });

  // ─────────────────────────────────────────────────────────────────
  // Auth
  // ─────────────────────────────────────────────────────────────────

  const expectedKey = config.apiKey ? digest(config.apiKey) : null;

  const extractApiKey = (request: FastifyRequest): string => {
    const fromHeader = firstHeader(request.headers[config.apiKeyHeader]);
    if (fromHeader) return fromHeader;
    const authorization = request.headers.authorization ?? "";
    return authorization.toLowerCase().startsWith("bearer ")
      ? authorization.slice("bearer ".length).trim()
      : "";
  };

  const isAuthorized = (request: FastifyRequest): boolean => {
    if (!expectedKey) return true;
    const provided = extractApiKey(request);
    return provided !== "" && timingSafeEqual(digest(provided), expectedKey);
  };

  // ─────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────

  const syncProber = (snapshot: RoutingSnapshot): void => {
    if (snapshot.spotUrl && !snapshot.shutdown && !prober.isRunning()) {
      prober.start();
    } else if ((!snapshot.spotUrl || snapshot.shutdown) && prober.isRunning()) {
      prober.stop();
    }
  };

  const update = (patch: RoutingPatch): RoutingSnapshot => {
    const before = state.snapshot();
    const after = state.apply(patch);
    if (after.serverlessUrl !== before.serverlessUrl) {
      logger.info(`Serverless URL updated: ${after.serverlessUrl ?? "(cleared)"}`);
    }
    if (after.serverlessAuthToken !== before.serverlessAuthToken) {
      logger.info("Serverless auth token updated");
    }
    if (after.spotUrl !== before.spotUrl) {
      logger.info(`Spot URL updated: ${after.spotUrl ?? "(cleared)"}`);
    }
    syncProber(after);
    return after;
  };

  const health = (): RouterHealth => {
    const snapshot = state.snapshot();
    return {
      skyserve_ready: snapshot.spotReady,
      last_probe_ts: snapshot.lastProbeAt === null ? null : snapshot.lastProbeAt / 1000,
      last_probe_err: snapshot.lastProbeError,
      serverless_base_url: snapshot.serverlessUrl,
      skyserve_base_url: snapshot.spotUrl,
      phase: routingPhase(snapshot),
      route_stats: stats.report(state.spotReadyMs()),
    };
  };

  // ─────────────────────────────────────────────────────────────────
  // Forwarding
  // ─────────────────────────────────────────────────────────────────

  type Attempt =
    | { kind: "response"; response: UpstreamResponse; startedAt: number; latencyMs: number }
    | { kind: "failed"; error: ProxyUpstreamError; elapsedMs: number }
    | { kind: "rejected"; status: number; message: string };

  const headersFor = (
    request: FastifyRequest,
    backend: BackendName,
    snapshot: RoutingSnapshot
  ): OutgoingHeaders => {
    const headers = filterRequestHeaders(request.headers, {
      apiKeyHeader: config.apiKeyHeader,
      // Serverless gets the router's token instead of the client's
      stripAuthorization: backend === "serverless",
    });
    if (backend === "serverless" && snapshot.serverlessAuthToken) {
      headers["authorization"] = `Bearer ${snapshot.serverlessAuthToken}`;
    }
    return headers;
  };

  const attempt = async (
    request: FastifyRequest,
    backend: BackendName,
    baseUrl: string,
    snapshot: RoutingSnapshot,
    signal: AbortSignal
  ): Promise<Attempt> => {
    if (!isHttpMethod(request.method)) {
      return { kind: "rejected", status: 405, message: `Unsupported method ${request.method}` };
    }
    const { path, search } = splitUrl(request.url);
    const target = buildProxyUrl(baseUrl, path, search);
    if (target.isErr()) {
      return { kind: "rejected", status: 400, message: target.error.message };
    }

    const startedAt = now();
    try {
      const response = await upstream.forward({
        backend,
        method: request.method,
        url: target.value,
        headers: headersFor(request, backend, snapshot),
        body: Buffer.isBuffer(request.body) ? request.body : undefined,
        signal,
      });
      return { kind: "response", response, startedAt, latencyMs: now() - startedAt };
    } catch (error) {
      const upstreamError =
        error instanceof ProxyUpstreamError
          ? error
          : new ProxyUpstreamError(backend, errorMessage(error), error);
      return { kind: "failed", error: upstreamError, elapsedMs: now() - startedAt };
    }
  };

  const relay = (
    reply: FastifyReply,
    backend: BackendName,
    result: Extract<Attempt, { kind: "response" }>
  ): FastifyReply => {
    const { response, startedAt, latencyMs } = result;
    finished(response.body, (error) => {
      stats.recordOutcome({
        backend,
        ok: !error,
        latencyMs,
        durationMs: now() - startedAt,
      });
      if (error) {
        debug.warn(`Stream from ${backend} ended early: ${errorMessage(error)}`);
      }
    });
    return reply
      .code(response.statusCode)
      .headers(filterResponseHeaders(response.headers))
      .send(response.body);
  };

  const proxy = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    if (!isAuthorized(request)) {
      return reply.code(401).send("unauthorized");
    }

    const snapshot = state.snapshot();
    const selection = selectBackend(snapshot);
    if (selection.isErr()) {
      return reply.code(503).send({ error: selection.error.message });
    }
    const target = selection.value;

    const total = stats.recordRoute(target.backend);
    if (total % SUMMARY_EVERY === 0) {
      const report = stats.report(state.spotReadyMs());
      logger.info(
        `requests=${report.total} spot=${report.spot} (${report.pct_spot.toFixed(0)}%) ` +
          `serverless=${report.serverless} (${report.pct_serverless.toFixed(0)}%) ` +
          `spot_ready=${snapshot.spotReady}`
      );
    }

    if (target.backend === "serverless" && shouldWakeSpot(snapshot)) {
      prober.poke();
      void prober.probe();
    }

    // Aborts the upstream call when the client disconnects first
    const clientGone = new AbortController();
    reply.raw.once("close", () => {
      if (!reply.raw.writableFinished) clientGone.abort();
    });

    const first = await attempt(request, target.backend, target.baseUrl, snapshot, clientGone.signal);
    if (first.kind === "rejected") {
      return reply.code(first.status).send({ error: first.message });
    }

    let failure: string | null = null;
    if (first.kind === "failed") {
      stats.recordOutcome({
        backend: target.backend,
        ok: false,
        latencyMs: first.elapsedMs,
        durationMs: first.elapsedMs,
      });
      failure = first.error.message;
    } else if (
      target.backend === "spot" &&
      first.response.statusCode >= 500 &&
      config.failoverOnSpotServerError &&
      target.fallbackUrl
    ) {
      await first.response.body.dump();
      stats.recordOutcome({
        backend: "spot",
        ok: false,
        latencyMs: first.latencyMs,
        durationMs: now() - first.startedAt,
      });
      failure = `status=${first.response.statusCode}`;
    } else {
      return relay(reply, target.backend, first);
    }

    if (clientGone.signal.aborted) {
      return reply;
    }
    if (target.backend !== "spot" || !target.fallbackUrl || !snapshot.spotUrl) {
      logger.warn(`Upstream error: ${failure}`);
      return reply.code(502).send({ error: "upstream_error", message: failure });
    }

    // Spot failed before any byte reached the client: one retry on serverless
    logger.warn(`Spot request failed (${failure}), retrying on serverless`);
    state.recordProbe(snapshot.spotUrl, { ok: false, error: failure });
    stats.recordRoute("serverless");

    const retry = await attempt(
      request,
      "serverless",
      target.fallbackUrl,
      state.snapshot(),
      clientGone.signal
    );
    if (retry.kind === "rejected") {
      return reply.code(retry.status).send({ error: retry.message });
    }
    if (retry.kind === "failed") {
      stats.recordOutcome({
        backend: "serverless",
        ok: false,
        latencyMs: retry.elapsedMs,
        durationMs: retry.elapsedMs,
      });
      logger.warn(`Upstream error: ${retry.error.message}`);
      return reply.code(502).send({ error: "upstream_error", message: retry.error.message });
    }
    return relay(reply, "serverless", retry);
  };

  // ─────────────────────────────────────────────────────────────────
  // Routes
  // ─────────────────────────────────────────────────────────────────

  app.get("/router/health", async (request, reply) => {
    if (!config.allowHealthNoAuth && !isAuthorized(request)) {
      return reply.code(401).send("unauthorized");
    }
    // Fresh readiness so the report is not stale
    await prober.refresh();
    return reply.send(health());
  });

  app.post("/router/config", async (request, reply) => {
    if (!isAuthorized(request)) {
      return reply.code(401).send("unauthorized");
    }

    let raw: unknown = {};
    if (Buffer.isBuffer(request.body) && request.body.length > 0) {
      try {
        raw = JSON.parse(request.body.toString("utf-8"));
      } catch (error) {
        return reply.code(400).send({ error: `Invalid JSON: ${errorMessage(error)}` });
      }
    }

    const parsed = configPatchSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      );
      return reply.code(400).send({ error: "Invalid config patch", issues });
    }

    update(toRoutingPatch(parsed.data));
    return reply.send({ status: "ok" });
  });

  app.all("/", proxy);
  app.all("/*", proxy);

  app.addHook("onClose", async () => {
    await upstream.close();
  });

  syncProber(state.snapshot());

  const listen = async (): Promise<string> => {
    const address = await app.listen({ port: config.port, host: config.host });
    logger.info(`Router listening on ${address}`);
    return address;
  };

  const close = async (): Promise<void> => {
    prober.stop();
    state.shutdown();
    await app.close();
  };

  return {
    app,
    config,
    state,
    prober,
    stats,
    update,
    health,
    listen,
    close,
  };
};
