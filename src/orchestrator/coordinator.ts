/**
 * Orchestration Coordinator
 *
 * Drives a hybrid deployment end to end:
 * 1. validate and plan
 * 2. start the routing proxy with no backends
 * 3. launch both legs; push the serverless URL as soon as it is up
 * 4. watch the spot leg in the background and push its URL when ready;
 *    close the proxy again when neither leg came up
 * 5. on destroy, cancel whatever is still launching, stop probing, tear
 *    down every leg that left anything behind and close the proxy
 *
 * Store failures are logged and never stop a deployment.
 */

import { ok, err, type Result } from "neverthrow";
import type {
  DeployRequest,
  DeploymentResult,
  DeploymentStatus,
  HybridDeployment,
  ProviderPlan,
} from "../types/deployment.js";
import type { HealthState, InferenceProvider } from "../types/provider.js";
import type { RouterHealth, RoutingPatch } from "../types/routing.js";
import type { ComponentRole, DeploymentRecord, DeploymentStore } from "../types/state.js";
import type { LaunchConfig, LaunchConfigInput } from "../types/config.js";
import { deriveStatus, failedResult, isSuccessful } from "../types/deployment.js";
import { resolveLaunchConfig } from "../types/config.js";
import {
  ConfigError,
  HybridRouterError,
  TeardownError,
  ValidationError,
  type TeardownFailure,
} from "../types/errors.js";
import type { ProviderRegistry } from "../providers/registry.js";
import { planDeployment } from "../planner/planner.js";
import {
  describeChecks,
  failedPreflight,
  launchBoth,
  warmUp,
  type LaunchHandle,
} from "../launch/executor.js";
import { createRouterServer, type RouterServer } from "../proxy/server.js";
import { fetchRouterHealth, pushRouterConfig } from "../proxy/client.js";
import { joinUrl } from "../routing/prober.js";
import { withComponent, withStatus } from "../state/utils.js";
import { errorMessage, logger } from "../utils/debug.js";

export interface CoordinatorDeps {
  registry: ProviderRegistry;
  store: DeploymentStore;
  config?: LaunchConfigInput;
  /** Clock for record timestamps. Default: current time */
  now?: () => Date;
}

/**
 * Result of a successful `deploy` call
 */
export interface DeployOutcome {
  /** State once the serverless leg has settled */
  deployment: HybridDeployment;
  /** Resolves once the spot leg settles and its outcome is applied. Never rejects. */
  spotSettled: Promise<HybridDeployment>;
}

export interface TeardownReport {
  serviceName: string;
  /** Roles whose teardown succeeded */
  destroyed: ComponentRole[];
  failures: TeardownFailure[];
  /** Aggregate of `failures`, null when everything was torn down */
  error: TeardownError | null;
}

export interface DeploymentReport {
  record: DeploymentRecord;
  /** Router view, null when there is no router or it is unreachable */
  router: RouterHealth | null;
  routerError?: string;
  /** Provider status of every leg that came up */
  health: Partial<Record<ComponentRole, HealthState>>;
}

export interface Coordinator {
  deploy(request: DeployRequest): Promise<Result<DeployOutcome, HybridRouterError>>;
  destroy(serviceName: string): Promise<Result<TeardownReport, HybridRouterError>>;
  status(serviceName: string): Promise<Result<DeploymentReport, HybridRouterError>>;
  list(): Promise<DeploymentRecord[]>;
  /** Router of a deployment started by this process */
  routerFor(serviceName: string): RouterServer | undefined;
  /** Close every router this process started; backends keep running */
  shutdown(): Promise<void>;
}

/**
 * A deployment started by this process
 */
interface LiveDeployment {
  record: DeploymentRecord;
  router: RouterServer | null;
  /** Address the router listens on, used for admin pushes */
  adminUrl: string | null;
  abort: AbortController;
  /** Both legs as started; settles once serverless has */
  launching: Promise<LaunchHandle> | null;
  serverless: DeploymentResult | null;
  spot: DeploymentResult | null;
  spotPending: Promise<DeploymentResult> | null;
  destroyed: boolean;
  /** Router closed by `shutdown`; results are still recorded */
  closed: boolean;
}

const ROLES: readonly ComponentRole[] = ["serverless", "spot"];

/**
 * Whether a result names anything that may need tearing down
 */
const leftResources = (result: DeploymentResult | undefined | null): result is DeploymentResult =>
  !!result && (result.deploymentId !== "" || Object.keys(result.metadata).length > 0);

const toDeployment = (entry: LiveDeployment): HybridDeployment => ({
  serviceName: entry.record.serviceName,
  serverless: entry.serverless,
  spot: entry.spot,
  routerUrl: entry.record.routerUrl,
  status: entry.record.status,
});

export const createCoordinator = (deps: CoordinatorDeps): Coordinator => {
  const { registry, store } = deps;
  const config: LaunchConfig = resolveLaunchConfig(deps.config);
  const now = deps.now ?? (() => new Date());
  const live = new Map<string, LiveDeployment>();
  // Names with a deploy call in progress
  const reserved = new Set<string>();

  // ─────────────────────────────────────────────────────────────────
  // Persistence
  // ─────────────────────────────────────────────────────────────────

  const persist = async (action: string, fn: () => Promise<unknown>): Promise<void> => {
    try {
      await fn();
    } catch (error) {
      logger.warn(`Deployment store: ${action} failed: ${errorMessage(error)}`);
    }
  };

  const setStatus = async (entry: LiveDeployment, status: DeploymentStatus): Promise<void> => {
    if (entry.record.status === status) return;
    logger.info(`${entry.record.serviceName}: ${entry.record.status} -> ${status}`);
    entry.record = withStatus(entry.record, status, now());
    await persist("status update", () => store.updateStatus(entry.record.serviceName, status));
  };

  const setComponent = async (
    entry: LiveDeployment,
    role: ComponentRole,
    result: DeploymentResult
  ): Promise<void> => {
    entry.record = withComponent(entry.record, role, result, now());
    await persist(`${role} update`, () =>
      store.updateComponent(entry.record.serviceName, role, result)
    );
  };

  const servicesInUse = async (): Promise<string[]> => {
    let stored: DeploymentRecord[] = [];
    try {
      stored = await store.list();
    } catch (error) {
      logger.warn(`Deployment store: list failed: ${errorMessage(error)}`);
    }
    const active = stored
      .filter((r) => r.status !== "destroyed" && r.status !== "failed")
      .map((r) => r.serviceName);
    return [...new Set([...active, ...live.keys()])];
  };

  // ─────────────────────────────────────────────────────────────────
  // Router
  // ─────────────────────────────────────────────────────────────────

  const push = async (entry: LiveDeployment, patch: RoutingPatch): Promise<boolean> => {
    if (!entry.router || !entry.adminUrl || entry.closed || entry.destroyed) return false;
    const pushed = await pushRouterConfig(entry.adminUrl, patch, {
      retries: config.pushRetries,
      delayMs: config.pushDelayMs,
      apiKey: entry.router.config.apiKey,
      apiKeyHeader: entry.router.config.apiKeyHeader,
    });
    if (!pushed) {
      logger.error(`${entry.record.serviceName}: router did not accept ${Object.keys(patch).join(", ")}`);
    }
    return pushed;
  };

  /**
   * Close the router of a deployment with no backend left and forget it.
   * The record keeps its components so `destroy` can still clean up.
   */
  const retire = async (entry: LiveDeployment): Promise<void> => {
    const { serviceName } = entry.record;
    logger.error(`${serviceName}: no backend came up`);
    entry.router?.prober.stop();
    if (live.get(serviceName) === entry) {
      live.delete(serviceName);
    }
    if (!entry.router || entry.closed) return;
    entry.closed = true;
    try {
      await entry.router.close();
    } catch (error) {
      logger.error(`${serviceName}: router close failed: ${errorMessage(error)}`);
    }
  };

  const startRouter = async (): Promise<{ router: RouterServer; adminUrl: string; publicUrl: string }> => {
    const router = createRouterServer(config.router);
    const adminUrl = await router.listen();
    const port = new URL(adminUrl).port;
    return { router, adminUrl, publicUrl: `http://${config.publicHost}:${port}` };
  };

  // ─────────────────────────────────────────────────────────────────
  // Deploy
  // ─────────────────────────────────────────────────────────────────

  const newRecord = (request: DeployRequest, routerUrl: string | null): DeploymentRecord => {
    const createdAt = now().toISOString();
    return {
      serviceName: request.serviceName,
      status: "launching",
      createdAt,
      updatedAt: createdAt,
      request,
      routerUrl,
      components: {},
    };
  };

  const warmUpServerless = async (
    entry: LiveDeployment,
    result: DeploymentResult & { endpointUrl: string }
  ): Promise<void> => {
    if (config.warmupTimeoutMs === 0) return;
    const { serviceName } = entry.record;
    const healthUrl = result.healthUrl ?? joinUrl(result.endpointUrl, "/health");
    logger.info(`${serviceName}: warming up ${healthUrl}`);
    const warm = await warmUp(healthUrl, {
      timeoutMs: config.warmupTimeoutMs,
      intervalMs: config.warmupIntervalMs,
      signal: entry.abort.signal,
    });
    if (warm) {
      logger.info(`${serviceName}: serverless container is healthy`);
    } else if (!entry.abort.signal.aborted) {
      const seconds = Math.round(config.warmupTimeoutMs / 1000);
      logger.warn(`${serviceName}: warmup timed out after ${seconds}s; the container may still be starting`);
    }
  };

  const deployServerlessOnly = async (
    request: DeployRequest,
    provider: InferenceProvider,
    entry: LiveDeployment,
    plan: ProviderPlan
  ): Promise<Result<DeployOutcome, HybridRouterError>> => {
    const launching = launchBoth({ provider, plan }, null, {
      serverlessTimeoutMs: config.serverlessDeployTimeoutMs,
      signal: entry.abort.signal,
    });
    entry.launching = launching;
    const result = (await launching).serverless;
    if (entry.destroyed) {
      return err(new HybridRouterError(`Deployment "${request.serviceName}" was destroyed during launch`));
    }
    entry.serverless = result;
    await setComponent(entry, "serverless", result);

    if (isSuccessful(result)) {
      await warmUpServerless(entry, result);
      if (entry.destroyed) {
        return err(new HybridRouterError(`Deployment "${request.serviceName}" was destroyed during launch`));
      }
      entry.record = { ...entry.record, routerUrl: result.endpointUrl };
      await persist("save", () => store.save(entry.record));
      await setStatus(entry, "active");
      logger.info(`${request.serviceName}: serverless-only deployment at ${result.endpointUrl}`);
    } else {
      await setStatus(entry, "failed");
      await retire(entry);
    }
    const deployment = toDeployment(entry);
    return ok({ deployment, spotSettled: Promise.resolve(deployment) });
  };

  const watchSpot = async (
    entry: LiveDeployment,
    pending: Promise<DeploymentResult>
  ): Promise<HybridDeployment> => {
    const result = await pending;
    entry.spot = result;
    entry.spotPending = null;
    if (entry.destroyed) {
      return toDeployment(entry);
    }

    await setComponent(entry, "spot", result);
    if (isSuccessful(result)) {
      logger.info(`${entry.record.serviceName}: spot up at ${result.endpointUrl}`);
      await push(entry, { spotUrl: result.endpointUrl });
    } else {
      logger.warn(
        `${entry.record.serviceName}: spot leg failed: ${result.error ?? "unknown error"}`
      );
    }
    const status = deriveStatus(entry.serverless, result, false);
    await setStatus(entry, status);
    if (status === "failed") {
      await retire(entry);
    }
    return toDeployment(entry);
  };

  const deploy = async (input: DeployRequest): Promise<Result<DeployOutcome, HybridRouterError>> => {
    // Claimed before the first await so a concurrent call sees it
    const name = input.serviceName;
    if (reserved.has(name) || live.has(name)) {
      return err(new ValidationError([`Service "${name}" already exists`]));
    }
    reserved.add(name);
    try {
      return await deployReserved(input);
    } finally {
      reserved.delete(name);
    }
  };

  const deployReserved = async (input: DeployRequest): Promise<Result<DeployOutcome, HybridRouterError>> => {
    const planned = planDeployment(input, registry, { existingServices: await servicesInUse() });
    if (planned.isErr()) {
      return err(planned.error);
    }
    const plan = planned.value;
    const request = plan.request;
    const serverlessProvider = registry.get(request.serverlessProvider);
    const spotProvider = plan.spot ? registry.get(request.spotProvider) : null;

    const [serverlessFailures, spotFailures] = await Promise.all([
      failedPreflight(serverlessProvider, request),
      spotProvider ? failedPreflight(spotProvider, request) : Promise.resolve([]),
    ]);
    if (serverlessFailures.length > 0) {
      return err(
        new ConfigError(`Preflight failed: ${describeChecks(serverlessFailures)}`, serverlessProvider.name)
      );
    }

    const entry: LiveDeployment = {
      record: newRecord(request, null),
      router: null,
      adminUrl: null,
      abort: new AbortController(),
      launching: null,
      serverless: null,
      spot: null,
      spotPending: null,
      destroyed: false,
      closed: false,
    };

    if (!plan.spot || !spotProvider) {
      live.set(request.serviceName, entry);
      await persist("save", () => store.save(entry.record));
      return deployServerlessOnly(request, serverlessProvider, entry, plan.serverless);
    }

    // The public endpoint exists before any backend does
    try {
      const started = await startRouter();
      entry.router = started.router;
      entry.adminUrl = started.adminUrl;
      entry.record = { ...entry.record, routerUrl: started.publicUrl };
    } catch (error) {
      return err(new HybridRouterError(`Router failed to start: ${errorMessage(error)}`));
    }
    live.set(request.serviceName, entry);
    await persist("save", () => store.save(entry.record));
    logger.info(`${request.serviceName}: router at ${entry.record.routerUrl ?? ""}`);

    const spotSkipped = spotFailures.length > 0;
    const launching = launchBoth(
      { provider: serverlessProvider, plan: plan.serverless },
      spotSkipped ? null : { provider: spotProvider, plan: plan.spot },
      {
        serverlessTimeoutMs: config.serverlessDeployTimeoutMs,
        spotTimeoutMs: config.spotDeployTimeoutMs,
        signal: entry.abort.signal,
      }
    );
    entry.launching = launching;
    const handle = await launching;
    if (entry.destroyed) {
      return err(new HybridRouterError(`Deployment "${request.serviceName}" was destroyed during launch`));
    }

    const spotPending =
      handle.spot ??
      Promise.resolve(
        // Nothing was launched, so nothing to tear down
        failedResult(spotProvider.name, `Preflight failed: ${describeChecks(spotFailures)}`, {})
      );
    entry.spotPending = spotPending;

    entry.serverless = handle.serverless;
    await setComponent(entry, "serverless", handle.serverless);

    if (!isSuccessful(handle.serverless) && spotSkipped) {
      const spot = await spotPending;
      entry.spot = spot;
      entry.spotPending = null;
      await setComponent(entry, "spot", spot);
      await setStatus(entry, "failed");
      await retire(entry);
      return err(
        new HybridRouterError(
          `No backend came up. Serverless: ${handle.serverless.error ?? "unknown error"}. Spot: ${spot.error ?? "unknown error"}`
        )
      );
    }

    if (isSuccessful(handle.serverless)) {
      const token = serverlessProvider.authToken?.();
      await push(entry, {
        serverlessUrl: handle.serverless.endpointUrl,
        ...(token ? { serverlessAuthToken: token } : {}),
      });
    }
    await setStatus(entry, deriveStatus(handle.serverless, null, true));
    if (!isSuccessful(handle.serverless)) {
      logger.warn(`${request.serviceName}: serverless leg failed, waiting on spot`);
    }

    return ok({
      deployment: toDeployment(entry),
      spotSettled: watchSpot(entry, spotPending),
    });
  };

  // ─────────────────────────────────────────────────────────────────
  // Destroy
  // ─────────────────────────────────────────────────────────────────

  const destroy = async (serviceName: string): Promise<Result<TeardownReport, HybridRouterError>> => {
    const entry = live.get(serviceName);
    let record: DeploymentRecord | null = entry?.record ?? null;
    if (!record) {
      try {
        record = await store.get(serviceName);
      } catch (error) {
        return err(new HybridRouterError(`Cannot read deployment "${serviceName}": ${errorMessage(error)}`));
      }
    }
    if (!record) {
      return err(new HybridRouterError(`Unknown deployment "${serviceName}"`));
    }

    let components: Partial<Record<ComponentRole, DeploymentResult>> = record.components;
    if (entry) {
      entry.destroyed = true;
      entry.router?.prober.stop();
      entry.abort.abort();
      // Cancelled legs still report what they may have created
      const handle = entry.launching ? await entry.launching : null;
      const serverless = handle?.serverless ?? entry.serverless;
      const spotPending = handle?.spot ?? entry.spotPending;
      const spot = spotPending ? await spotPending : entry.spot;
      components = {
        ...(serverless ? { serverless } : {}),
        ...(spot ? { spot } : {}),
      };
      for (const role of ROLES) {
        const result = components[role];
        if (result && entry.record.components[role] !== result) {
          await setComponent(entry, role, result);
        }
      }
    }

    const targets = ROLES.flatMap((role) => {
      const result = components[role];
      return leftResources(result) ? [{ role, result }] : [];
    });

    const settled = await Promise.allSettled(
      targets.map(async ({ role, result }) => {
        logger.info(`${serviceName}: tearing down ${role} on ${result.provider}`);
        await registry.get(result.provider).destroy(result);
        return role;
      })
    );

    const destroyed: ComponentRole[] = [];
    const failures: TeardownFailure[] = [];
    settled.forEach((outcome, index) => {
      const target = targets[index];
      if (!target) return;
      if (outcome.status === "fulfilled") {
        destroyed.push(target.role);
      } else {
        failures.push({
          component: target.role,
          provider: target.result.provider,
          message: errorMessage(outcome.reason),
        });
      }
    });

    if (entry) {
      try {
        if (!entry.closed) await entry.router?.close();
      } catch (error) {
        failures.push({ component: "router", provider: "local", message: errorMessage(error) });
      }
      if (live.get(serviceName) === entry) {
        live.delete(serviceName);
      }
    }

    const error = failures.length > 0 ? new TeardownError(failures) : null;
    if (error) {
      logger.error(`${serviceName}: ${error.message}`);
    } else {
      await persist("status update", () => store.updateStatus(serviceName, "destroyed"));
      logger.info(`${serviceName}: destroyed`);
    }
    return ok({ serviceName, destroyed, failures, error });
  };

  // ─────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────

  const componentHealth = async (
    components: Partial<Record<ComponentRole, DeploymentResult>>
  ): Promise<Partial<Record<ComponentRole, HealthState>>> => {
    const entries = await Promise.all(
      ROLES.map(async (role): Promise<[ComponentRole, HealthState] | null> => {
        const result = components[role];
        if (!isSuccessful(result)) return null;
        if (!registry.has(result.provider)) return [role, "unknown"];
        try {
          return [role, await registry.get(result.provider).status(result)];
        } catch (error) {
          logger.warn(`${role} status check failed: ${errorMessage(error)}`);
          return [role, "unknown"];
        }
      })
    );
    const health: Partial<Record<ComponentRole, HealthState>> = {};
    for (const entry of entries) {
      if (entry) health[entry[0]] = entry[1];
    }
    return health;
  };

  const status = async (serviceName: string): Promise<Result<DeploymentReport, HybridRouterError>> => {
    const entry = live.get(serviceName);
    let record: DeploymentRecord | null = entry?.record ?? null;
    if (!record) {
      try {
        record = await store.get(serviceName);
      } catch (error) {
        return err(new HybridRouterError(`Cannot read deployment "${serviceName}": ${errorMessage(error)}`));
      }
    }
    if (!record) {
      return err(new HybridRouterError(`Unknown deployment "${serviceName}"`));
    }

    const health = await componentHealth(record.components);

    if (entry?.router) {
      return ok({ record, router: entry.router.health(), health });
    }
    if (record.routerUrl && !record.request.serverlessOnly && record.status !== "destroyed") {
      const fetched = await fetchRouterHealth(record.routerUrl, {
        apiKey: config.router.apiKey,
        apiKeyHeader: config.router.apiKeyHeader,
      });
      return ok(
        fetched.match(
          (router) => ({ record, router, health }),
          (error) => ({ record, router: null, routerError: error.message, health })
        )
      );
    }
    return ok({ record, router: null, health });
  };

  const list = (): Promise<DeploymentRecord[]> => store.list();

  const shutdown = async (): Promise<void> => {
    const entries = [...live.values()];
    live.clear();
    await Promise.all(
      entries.map(async (entry) => {
        entry.closed = true;
        entry.abort.abort();
        await entry.router?.close();
      })
    );
  };

  return {
    deploy,
    destroy,
    status,
    list,
    routerFor: (serviceName) => live.get(serviceName)?.router ?? undefined,
    shutdown,
  };
};
