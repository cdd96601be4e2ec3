import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { createCoordinator, type Coordinator } from "./coordinator.js";
import { createProviderRegistry } from "../providers/registry.js";
import { createMemoryStore } from "../state/memory.js";
import { failedResult, type DeployRequest, type DeploymentResult, type ProviderPlan } from "../types/deployment.js";
import type { InferenceProvider, PreflightCheck, ProviderKind } from "../types/provider.js";
import type { DeploymentStore } from "../types/state.js";
import type { LaunchConfigInput } from "../types/config.js";
import { ConfigError, TeardownError, ValidationError } from "../types/errors.js";
import { makeRequest } from "../testing/fixtures.js";
import { startUpstream, type TestUpstream } from "../testing/upstream.js";

const SERVERLESS_URL = "https://svc-serverless.example";

interface StubOptions {
  deploy?: (plan: ProviderPlan, signal?: AbortSignal) => Promise<DeploymentResult>;
  preflight?: PreflightCheck[];
  destroyError?: string;
  token?: string;
}

type StubProvider = InferenceProvider & {
  deploy: Mock<InferenceProvider["deploy"]>;
  destroyed: DeploymentResult[];
};

const stubProvider = (name: string, kind: ProviderKind, options: StubOptions = {}): StubProvider => {
  const destroyed: DeploymentResult[] = [];
  const suffix = kind === "serverless" ? "serverless" : "spot";
  return {
    name,
    kind,
    destroyed,
    plan: (request: DeployRequest): ProviderPlan => ({
      provider: name,
      renderedScript: "",
      env: {},
      metadata: { service_name: `${request.serviceName}-${suffix}` },
    }),
    deploy: vi.fn<InferenceProvider["deploy"]>(async (plan, deployOptions) =>
      options.deploy
        ? options.deploy(plan, deployOptions?.signal)
        : failedResult(name, "no deploy scripted", plan.metadata)
    ),
    status: async () => "healthy",
    destroy: async (result) => {
      destroyed.push(result);
      if (options.destroyError) throw new Error(options.destroyError);
    },
    ...(options.preflight ? { preflight: async () => options.preflight ?? [] } : {}),
    ...(options.token ? { authToken: () => options.token } : {}),
  };
};

const upAt =
  (provider: string, url: string) =>
  async (plan: ProviderPlan): Promise<DeploymentResult> => ({
    provider,
    deploymentId: plan.metadata.service_name ?? "",
    endpointUrl: url,
    metadata: plan.metadata,
  });

/**
 * A deploy that waits until released or aborted
 */
const gated = (provider: string, url: string) => {
  let release: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  const deploy = async (plan: ProviderPlan, signal?: AbortSignal): Promise<DeploymentResult> => {
    await new Promise<void>((resolve) => {
      signal?.addEventListener("abort", () => resolve(), { once: true });
      void opened.then(resolve);
    });
    return upAt(provider, url)(plan);
  };
  return { deploy, release };
};

/**
 * A promise settled from outside
 */
const deferred = () => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

const launchConfig: LaunchConfigInput = {
  pushRetries: 1,
  pushDelayMs: 10,
  router: { port: 0, host: "127.0.0.1", probeIntervalMs: 60_000 },
  warmupTimeoutMs: 0,
};

describe("createCoordinator", () => {
  let spotUpstream: TestUpstream;
  let store: DeploymentStore;
  let coordinator: Coordinator | undefined;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    spotUpstream = await startUpstream((app) => {
      app.get("/health", async () => ({ status: "ok" }));
    });
    store = createMemoryStore();
  });

  afterEach(async () => {
    await coordinator?.shutdown();
    coordinator = undefined;
    await spotUpstream.close();
    vi.restoreAllMocks();
  });

  const build = (
    serverless: StubProvider,
    spot: StubProvider,
    deploymentStore = store,
    overrides: LaunchConfigInput = {}
  ): Coordinator => {
    coordinator = createCoordinator({
      registry: createProviderRegistry([serverless, spot]),
      store: deploymentStore,
      config: { ...launchConfig, ...overrides },
    });
    return coordinator;
  };

  // ─────────────────────────────────────────────────────────────────
  // deploy
  // ─────────────────────────────────────────────────────────────────

  describe("deploy", () => {
    it("routes to serverless first, then adds spot once it is up", async () => {
      const spotGate = gated("skyserve", spotUpstream.url);
      const serverless = stubProvider("modal", "serverless", {
        deploy: upAt("modal", SERVERLESS_URL),
        token: "test-secret",
      });
      const spot = stubProvider("skyserve", "spot", { deploy: spotGate.deploy });
      const c = build(serverless, spot);

      const result = await c.deploy(makeRequest());
      expect(result.isOk()).toBe(true);
      if (result.isErr()) return;

      const { deployment, spotSettled } = result.value;
      expect(deployment.status).toBe("active");
      expect(deployment.spot).toBeNull();
      expect(deployment.routerUrl).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);

      const router = c.routerFor("svc");
      expect(router?.health().serverless_base_url).toBe(SERVERLESS_URL);
      expect(router?.health().skyserve_base_url).toBeNull();
      expect(router?.state.snapshot().serverlessAuthToken).toBe("test-secret");

      spotGate.release();
      const settled = await spotSettled;
      expect(settled.status).toBe("active");
      expect(settled.spot?.endpointUrl).toBe(spotUpstream.url);

      await router?.prober.refresh();
      expect(router?.health().skyserve_base_url).toBe(spotUpstream.url);
      expect(router?.health().skyserve_ready).toBe(true);

      const record = await store.get("svc");
      expect(record?.status).toBe("active");
      expect(record?.routerUrl).toBe(deployment.routerUrl);
      expect(record?.components.serverless?.endpointUrl).toBe(SERVERLESS_URL);
      expect(record?.components.spot?.endpointUrl).toBe(spotUpstream.url);
    });

    it("keeps serving from spot when serverless fails", async () => {
      const serverless = stubProvider("modal", "serverless", {
        deploy: async (plan) => failedResult("modal", "quota exceeded", plan.metadata),
      });
      const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
      const c = build(serverless, spot);

      const result = await c.deploy(makeRequest());
      if (result.isErr()) throw result.error;

      expect(result.value.deployment.status).toBe("launching");
      const settled = await result.value.spotSettled;
      expect(settled.status).toBe("degraded");
      expect(settled.serverless?.error).toBe("quota exceeded");

      const health = c.routerFor("svc")?.health();
      expect(health?.serverless_base_url).toBeNull();
      expect(health?.skyserve_base_url).toBe(spotUpstream.url);
    });

    it("marks the deployment failed and closes the router when both legs fail", async () => {
      const spotDone = deferred();
      const serverless = stubProvider("modal", "serverless", {
        deploy: async (plan) => failedResult("modal", "quota exceeded", plan.metadata),
      });
      const spot = stubProvider("skyserve", "spot", {
        deploy: async (plan) => {
          await spotDone.promise;
          return failedResult("skyserve", "no capacity", plan.metadata);
        },
      });
      const c = build(serverless, spot);

      const result = await c.deploy(makeRequest());
      if (result.isErr()) throw result.error;
      expect(result.value.deployment.status).toBe("launching");
      const router = c.routerFor("svc");
      expect(router?.state.snapshot().shutdown).toBe(false);

      spotDone.resolve();
      const settled = await result.value.spotSettled;

      expect(settled.status).toBe("failed");
      expect(router?.state.snapshot().shutdown).toBe(true);
      expect(router?.prober.isRunning()).toBe(false);
      expect(c.routerFor("svc")).toBeUndefined();
      const record = await store.get("svc");
      expect(record?.status).toBe("failed");
      expect(record?.components.spot?.error).toBe("no capacity");
    });

    it("fails at once when serverless fails and spot was skipped", async () => {
      const serverless = stubProvider("modal", "serverless", {
        deploy: async (plan) => failedResult("modal", "quota exceeded", plan.metadata),
      });
      const spot = stubProvider("skyserve", "spot", {
        deploy: upAt("skyserve", spotUpstream.url),
        preflight: [{ name: "sky_cli", passed: false, message: "sky not found" }],
      });
      const c = build(serverless, spot);

      const result = await c.deploy(makeRequest());

      expect(result.isErr() && result.error.message).toBe(
        "No backend came up. Serverless: quota exceeded. Spot: Preflight failed: sky not found"
      );
      expect(spot.deploy).not.toHaveBeenCalled();
      expect(c.routerFor("svc")).toBeUndefined();
      expect((await store.get("svc"))?.status).toBe("failed");
    });

    it("allows a new deploy under the name of a failed one", async () => {
      const serverless = stubProvider("modal", "serverless", {
        deploy: async (plan) => failedResult("modal", "quota exceeded", plan.metadata),
      });
      const spot = stubProvider("skyserve", "spot", {
        deploy: async (plan) => failedResult("skyserve", "no capacity", plan.metadata),
      });
      const c = build(serverless, spot);
      const first = await c.deploy(makeRequest());
      if (first.isErr()) throw first.error;
      await first.value.spotSettled;

      const second = await c.deploy(makeRequest());

      expect(second.isOk()).toBe(true);
      if (second.isOk()) await second.value.spotSettled;
    });

    it("accepts only one of two concurrent deploys with the same name", async () => {
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
      const c = build(serverless, spot);

      const [first, second] = await Promise.all([c.deploy(makeRequest()), c.deploy(makeRequest())]);

      expect(first.isOk()).toBe(true);
      expect(second.isErr() && second.error).toBeInstanceOf(ValidationError);
      expect(second.isErr() && second.error.message).toBe(
        'Invalid deploy request: Service "svc" already exists'
      );
      expect(serverless.deploy).toHaveBeenCalledTimes(1);
      expect(spot.deploy).toHaveBeenCalledTimes(1);
      if (first.isOk()) await first.value.spotSettled;
    });

    it("rejects an invalid request before launching anything", async () => {
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
      const c = build(serverless, spot);

      const result = await c.deploy(makeRequest({ serviceName: "Bad_Name" }));

      expect(result.isErr()).toBe(true);
      expect(result.isErr() && result.error).toBeInstanceOf(ValidationError);
      expect(serverless.deploy).not.toHaveBeenCalled();
      expect(spot.deploy).not.toHaveBeenCalled();
      expect(c.routerFor("Bad_Name")).toBeUndefined();
    });

    it("rejects a service name that is already deployed", async () => {
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
      const c = build(serverless, spot);

      const first = await c.deploy(makeRequest());
      if (first.isErr()) throw first.error;
      await first.value.spotSettled;

      const second = await c.deploy(makeRequest());

      expect(second.isErr() && second.error.message).toBe(
        'Invalid deploy request: Service "svc" already exists'
      );
    });

    it("fails fast when the serverless preflight fails", async () => {
      const serverless = stubProvider("modal", "serverless", {
        deploy: upAt("modal", SERVERLESS_URL),
        preflight: [
          { name: "token", passed: false, message: "Modal token missing", fixCommand: "modal token new" },
        ],
      });
      const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
      const c = build(serverless, spot);

      const result = await c.deploy(makeRequest());

      expect(result.isErr() && result.error).toBeInstanceOf(ConfigError);
      expect(result.isErr() && result.error.message).toBe(
        "[modal] Preflight failed: Modal token missing (fix: modal token new)"
      );
      expect(serverless.deploy).not.toHaveBeenCalled();
      expect(await store.get("svc")).toBeNull();
    });

    it("skips the spot leg when its preflight fails", async () => {
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", {
        deploy: upAt("skyserve", spotUpstream.url),
        preflight: [{ name: "sky_cli", passed: false, message: "sky not found" }],
      });
      const c = build(serverless, spot);

      const result = await c.deploy(makeRequest());
      if (result.isErr()) throw result.error;
      const settled = await result.value.spotSettled;

      expect(spot.deploy).not.toHaveBeenCalled();
      expect(settled.spot?.error).toBe("Preflight failed: sky not found");
      expect(settled.status).toBe("degraded");
    });

    it("exposes the serverless endpoint directly in serverless-only mode", async () => {
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
      const c = build(serverless, spot);

      const result = await c.deploy(makeRequest({ serverlessOnly: true }));
      if (result.isErr()) throw result.error;

      expect(result.value.deployment.status).toBe("active");
      expect(result.value.deployment.routerUrl).toBe(SERVERLESS_URL);
      expect(c.routerFor("svc")).toBeUndefined();
      expect(spot.deploy).not.toHaveBeenCalled();
      expect((await store.get("svc"))?.routerUrl).toBe(SERVERLESS_URL);
    });

    it("warms up a serverless-only endpoint before handing it out", async () => {
      let checks = 0;
      const warming = await startUpstream((app) => {
        app.get("/health", async (_request, reply) => {
          checks += 1;
          return checks < 3 ? reply.code(503).send("loading") : { status: "ok" };
        });
      });
      try {
        const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", warming.url) });
        const spot = stubProvider("skyserve", "spot");
        const c = build(serverless, spot, store, { warmupTimeoutMs: 5000, warmupIntervalMs: 10 });

        const result = await c.deploy(makeRequest({ serverlessOnly: true }));
        if (result.isErr()) throw result.error;

        expect(warming.hits("/health")).toBe(3);
        expect(result.value.deployment.status).toBe("active");
        expect(result.value.deployment.routerUrl).toBe(warming.url);
      } finally {
        await warming.close();
      }
    });

    it("hands out a serverless-only endpoint that never warmed up", async () => {
      const cold = await startUpstream((app) => {
        app.get("/health", async (_request, reply) => reply.code(503).send("loading"));
      });
      try {
        const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", cold.url) });
        const spot = stubProvider("skyserve", "spot");
        const c = build(serverless, spot, store, { warmupTimeoutMs: 150, warmupIntervalMs: 20 });

        const result = await c.deploy(makeRequest({ serverlessOnly: true }));
        if (result.isErr()) throw result.error;

        expect(result.value.deployment.status).toBe("active");
        expect(cold.hits("/health")).toBeGreaterThan(1);
        expect(console.warn).toHaveBeenCalledWith("[hybrid]", expect.stringContaining("svc: warmup timed out"));
      } finally {
        await cold.close();
      }
    });

    it("keeps deploying when the store is unavailable", async () => {
      const unavailable = async (): Promise<never> => {
        throw new Error("connection refused");
      };
      const broken: DeploymentStore = {
        save: unavailable,
        get: unavailable,
        list: unavailable,
        updateStatus: unavailable,
        updateComponent: unavailable,
        clear: unavailable,
        close: async () => {},
      };
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
      const c = build(serverless, spot, broken);

      const result = await c.deploy(makeRequest());
      if (result.isErr()) throw result.error;

      expect((await result.value.spotSettled).status).toBe("active");
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // destroy
  // ─────────────────────────────────────────────────────────────────

  describe("destroy", () => {
    it("tears down both legs and closes the router", async () => {
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
      const c = build(serverless, spot);
      const result = await c.deploy(makeRequest());
      if (result.isErr()) throw result.error;
      await result.value.spotSettled;

      const report = await c.destroy("svc");
      if (report.isErr()) throw report.error;

      expect(report.value.destroyed).toEqual(["serverless", "spot"]);
      expect(report.value.failures).toEqual([]);
      expect(report.value.error).toBeNull();
      expect(serverless.destroyed.map((r) => r.deploymentId)).toEqual(["svc-serverless"]);
      expect(spot.destroyed.map((r) => r.deploymentId)).toEqual(["svc-spot"]);
      expect(c.routerFor("svc")).toBeUndefined();
      expect((await store.get("svc"))?.status).toBe("destroyed");
    });

    it("reports every failed step and leaves the record as it was", async () => {
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", {
        deploy: upAt("skyserve", spotUpstream.url),
        destroyError: "service still present",
      });
      const c = build(serverless, spot);
      const result = await c.deploy(makeRequest());
      if (result.isErr()) throw result.error;
      await result.value.spotSettled;

      const report = await c.destroy("svc");
      if (report.isErr()) throw report.error;

      expect(report.value.destroyed).toEqual(["serverless"]);
      expect(report.value.failures).toEqual([
        { component: "spot", provider: "skyserve", message: "service still present" },
      ]);
      expect(report.value.error).toBeInstanceOf(TeardownError);
      expect((await store.get("svc"))?.status).toBe("active");
    });

    it("cancels a pending spot leg and tears down what it named", async () => {
      const spotGate = gated("skyserve", spotUpstream.url);
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", { deploy: spotGate.deploy });
      const c = build(serverless, spot);
      const result = await c.deploy(makeRequest());
      if (result.isErr()) throw result.error;

      const report = await c.destroy("svc");
      if (report.isErr()) throw report.error;
      const settled = await result.value.spotSettled;

      expect(report.value.destroyed).toEqual(["serverless", "spot"]);
      expect(spot.destroyed[0]?.error).toBe("Deploy cancelled");
      expect(settled.spot?.error).toBe("Deploy cancelled");
    });

    it("tears down both legs when destroyed while serverless is still launching", async () => {
      const serverlessGate = gated("modal", SERVERLESS_URL);
      const spotGate = gated("skyserve", spotUpstream.url);
      const serverless = stubProvider("modal", "serverless", { deploy: serverlessGate.deploy });
      const spot = stubProvider("skyserve", "spot", { deploy: spotGate.deploy });
      const c = build(serverless, spot);

      const deploying = c.deploy(makeRequest());
      await vi.waitFor(() => expect(serverless.deploy).toHaveBeenCalled());
      const report = await c.destroy("svc");
      const result = await deploying;

      if (report.isErr()) throw report.error;
      expect(report.value.destroyed).toEqual(["serverless", "spot"]);
      expect(report.value.error).toBeNull();
      expect(serverless.destroyed.map((r) => [r.deploymentId, r.error])).toEqual([
        ["svc-serverless", "Deploy cancelled"],
      ]);
      expect(spot.destroyed.map((r) => [r.deploymentId, r.error])).toEqual([["svc-spot", "Deploy cancelled"]]);
      expect(result.isErr() && result.error.message).toBe('Deployment "svc" was destroyed during launch');
      expect(c.routerFor("svc")).toBeUndefined();
      expect((await store.get("svc"))?.status).toBe("destroyed");
    });

    it("destroys a deployment known only from the store", async () => {
      const serverless = stubProvider("modal", "serverless");
      const spot = stubProvider("skyserve", "spot");
      const c = build(serverless, spot);
      await store.save({
        serviceName: "old",
        status: "active",
        createdAt: "2026-01-01T00:00:00.000Z",
        updatedAt: "2026-01-01T00:00:00.000Z",
        request: makeRequest({ serviceName: "old" }),
        routerUrl: "http://127.0.0.1:8080",
        components: {
          serverless: {
            provider: "modal",
            deploymentId: "old-serverless",
            endpointUrl: SERVERLESS_URL,
            metadata: { app_name: "old-serverless" },
          },
          spot: { provider: "skyserve", deploymentId: "", error: "sky not found", metadata: {} },
        },
      });

      const report = await c.destroy("old");
      if (report.isErr()) throw report.error;

      expect(report.value.destroyed).toEqual(["serverless"]);
      expect(spot.destroyed).toEqual([]);
      expect((await store.get("old"))?.status).toBe("destroyed");
    });

    it("returns an error for an unknown deployment", async () => {
      const c = build(stubProvider("modal", "serverless"), stubProvider("skyserve", "spot"));

      const report = await c.destroy("ghost");

      expect(report.isErr() && report.error.message).toBe('Unknown deployment "ghost"');
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // status
  // ─────────────────────────────────────────────────────────────────

  describe("status", () => {
    it("combines the record, the router view and provider health", async () => {
      const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
      const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
      const c = build(serverless, spot);
      const result = await c.deploy(makeRequest());
      if (result.isErr()) throw result.error;
      await result.value.spotSettled;

      const report = await c.status("svc");
      if (report.isErr()) throw report.error;

      expect(report.value.record.status).toBe("active");
      expect(report.value.router?.serverless_base_url).toBe(SERVERLESS_URL);
      expect(report.value.health).toEqual({ serverless: "healthy", spot: "healthy" });
    });

    it("reports an unreachable router without failing", async () => {
      const c = build(stubProvider("modal", "serverless"), stubProvider("skyserve", "spot"));
      const closed = await startUpstream(() => {});
      await closed.close();
      await store.save({
        serviceName: "old",
        status: "active",
        createdAt: "2026-01-01T00:00:00.000Z",
        updatedAt: "2026-01-01T00:00:00.000Z",
        request: makeRequest({ serviceName: "old" }),
        routerUrl: closed.url,
        components: {},
      });

      const report = await c.status("old");
      if (report.isErr()) throw report.error;

      expect(report.value.router).toBeNull();
      expect(report.value.routerError).toBeDefined();
      expect(report.value.health).toEqual({});
    });
  });

  it("lists stored deployments", async () => {
    const serverless = stubProvider("modal", "serverless", { deploy: upAt("modal", SERVERLESS_URL) });
    const spot = stubProvider("skyserve", "spot", { deploy: upAt("skyserve", spotUpstream.url) });
    const c = build(serverless, spot);
    const result = await c.deploy(makeRequest());
    if (result.isErr()) throw result.error;
    await result.value.spotSettled;

    expect((await c.list()).map((r) => r.serviceName)).toEqual(["svc"]);
  });
});
