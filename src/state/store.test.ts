import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createMemoryStore } from "./memory.js";
import { createFileStore } from "./file.js";
import { createRedisStore, type RedisClient } from "./redis.js";
import type { DeploymentRecord, DeploymentStore } from "../types/state.js";
import { makeRequest } from "../testing/fixtures.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

const record = (serviceName: string, createdAt: string): DeploymentRecord => ({
  serviceName,
  status: "launching",
  createdAt,
  updatedAt: createdAt,
  request: makeRequest({ serviceName }),
  routerUrl: "http://127.0.0.1:8080",
  components: {},
});

/**
 * In-process stand-in for a Redis server
 */
const fakeRedis = (): RedisClient & { data: Map<string, string> } => {
  const data = new Map<string, string>();
  return {
    data,
    get: async (key) => data.get(key) ?? null,
    set: async (key, value) => {
      data.set(key, value);
      return "OK";
    },
    del: async (...keys) => keys.filter((key) => data.delete(key)).length,
    keys: async (pattern) => {
      const prefix = pattern.replace(/\*$/, "");
      return [...data.keys()].filter((key) => key.startsWith(prefix));
    },
    quit: async () => "OK",
  };
};

interface StoreCase {
  name: string;
  create: (dir: string) => DeploymentStore;
}

const cases: StoreCase[] = [
  { name: "memory", create: () => createMemoryStore({ now: () => NOW }) },
  { name: "file", create: (dir) => createFileStore({ directory: dir, now: () => NOW }) },
  { name: "redis", create: () => createRedisStore({ client: fakeRedis(), now: () => NOW }) },
];

describe.each(cases)("$name deployment store", ({ create }) => {
  let dir: string;
  let store: DeploymentStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "store-test-"));
    store = create(dir);
  });

  afterEach(async () => {
    await store.close();
    await rm(dir, { recursive: true, force: true });
  });

  it("saves and reads back a record", async () => {
    const saved = record("alpha", "2026-01-01T00:00:00.000Z");
    await store.save(saved);

    expect(await store.get("alpha")).toEqual(saved);
    expect(await store.get("missing")).toBeNull();
  });

  it("lists newest first and filters by status", async () => {
    await store.save(record("old", "2026-01-01T00:00:00.000Z"));
    await store.save(record("new", "2026-02-01T00:00:00.000Z"));
    await store.updateStatus("old", "active");

    expect((await store.list()).map((r) => r.serviceName)).toEqual(["new", "old"]);
    expect((await store.list({ status: "active" })).map((r) => r.serviceName)).toEqual(["old"]);
  });

  it("updates status and stamps the time", async () => {
    await store.save(record("alpha", "2026-01-01T00:00:00.000Z"));

    const updated = await store.updateStatus("alpha", "degraded");

    expect(updated?.status).toBe("degraded");
    expect(updated?.updatedAt).toBe("2026-03-01T12:00:00.000Z");
    expect((await store.get("alpha"))?.status).toBe("degraded");
  });

  it("replaces one component without touching the other", async () => {
    await store.save(record("alpha", "2026-01-01T00:00:00.000Z"));
    const serverless = {
      provider: "modal",
      deploymentId: "alpha-serverless",
      endpointUrl: "https://a.example",
      metadata: { app_name: "alpha-serverless" },
    };
    const spot = {
      provider: "skyserve",
      deploymentId: "alpha-spot",
      error: "no capacity",
      metadata: { service_name: "alpha-spot" },
    };

    await store.updateComponent("alpha", "serverless", serverless);
    await store.updateComponent("alpha", "spot", spot);

    expect((await store.get("alpha"))?.components).toEqual({ serverless, spot });
  });

  it("returns null when updating an unknown record", async () => {
    expect(await store.updateStatus("ghost", "failed")).toBeNull();
    expect(
      await store.updateComponent("ghost", "spot", { provider: "x", deploymentId: "", metadata: {} })
    ).toBeNull();
  });

  it("clears everything", async () => {
    await store.save(record("alpha", "2026-01-01T00:00:00.000Z"));

    await store.clear();

    expect(await store.list()).toEqual([]);
  });
});

describe("file deployment store", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "store-file-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("is visible to a second store on the same file", async () => {
    const writer = createFileStore({ directory: dir });
    await writer.save(record("alpha", "2026-01-01T00:00:00.000Z"));

    const reader = createFileStore({ directory: dir });

    expect((await reader.get("alpha"))?.serviceName).toBe("alpha");
  });

  it("serializes concurrent updates from one process", async () => {
    const store = createFileStore({ directory: dir, now: () => NOW });
    await store.save(record("alpha", "2026-01-01T00:00:00.000Z"));

    await Promise.all([
      store.updateComponent("alpha", "serverless", { provider: "modal", deploymentId: "a", metadata: {} }),
      store.updateComponent("alpha", "spot", { provider: "skyserve", deploymentId: "b", metadata: {} }),
    ]);

    const components = (await store.get("alpha"))?.components;
    expect(components?.serverless?.deploymentId).toBe("a");
    expect(components?.spot?.deploymentId).toBe("b");
  });

  it("skips malformed records", async () => {
    const good = record("alpha", "2026-01-01T00:00:00.000Z");
    await writeFile(
      join(dir, "deployments.json"),
      JSON.stringify({ deployments: { alpha: good, broken: { serviceName: 3 } } })
    );

    const store = createFileStore({ directory: dir });

    expect((await store.list()).map((r) => r.serviceName)).toEqual(["alpha"]);
  });

  it("refuses a corrupted file instead of overwriting it", async () => {
    const path = join(dir, "deployments.json");
    await writeFile(path, "{not json");
    const store = createFileStore({ directory: dir });

    await expect(store.save(record("alpha", "2026-01-01T00:00:00.000Z"))).rejects.toThrow(
      /is not valid JSON/
    );
    expect(await readFile(path, "utf-8")).toBe("{not json");
  });
});

describe("redis deployment store", () => {
  it("keys records under the prefix", async () => {
    const client = fakeRedis();
    const store = createRedisStore({ client, prefix: "test:" });

    await store.save(record("alpha", "2026-01-01T00:00:00.000Z"));

    expect([...client.data.keys()]).toEqual(["test:deployment:alpha"]);
  });

  it("ignores values that are not records", async () => {
    const client = fakeRedis();
    client.data.set("hybrid:deployment:junk", "not json");
    const store = createRedisStore({ client });

    expect(await store.list()).toEqual([]);
    expect(await store.get("junk")).toBeNull();
  });
});
