import { describe, it, expect } from "vitest";
import { selectBackend, routingPhase, shouldWakeSpot } from "./selection.js";
import type { RoutingSnapshot } from "../types/routing.js";
import { NoBackendAvailableError } from "../types/errors.js";

const snapshotOf = (overrides: Partial<RoutingSnapshot> = {}): RoutingSnapshot => ({
  serverlessUrl: null,
  spotUrl: null,
  serverlessAuthToken: null,
  spotReady: false,
  lastProbeAt: null,
  lastProbeError: null,
  shutdown: false,
  ...overrides,
});

describe("selectBackend", () => {
  it("fails with no backends", () => {
    const result = selectBackend(snapshotOf());
    expect(result.isErr()).toBe(true);
    result.mapErr((error) => {
      expect(error).toBeInstanceOf(NoBackendAvailableError);
      expect(error.message).toBe("No backends configured yet");
    });
  });

  it("uses serverless while spot is unknown", () => {
    const result = selectBackend(snapshotOf({ serverlessUrl: "http://a" }));
    expect(result._unsafeUnwrap()).toEqual({
      backend: "serverless",
      baseUrl: "http://a",
      fallbackUrl: null,
    });
  });

  it("uses serverless while spot is not ready", () => {
    const result = selectBackend(
      snapshotOf({ serverlessUrl: "http://a", spotUrl: "http://b" })
    );
    expect(result._unsafeUnwrap().backend).toBe("serverless");
  });

  it("prefers ready spot and keeps serverless as fallback", () => {
    const result = selectBackend(
      snapshotOf({ serverlessUrl: "http://a", spotUrl: "http://b", spotReady: true })
    );
    expect(result._unsafeUnwrap()).toEqual({
      backend: "spot",
      baseUrl: "http://b",
      fallbackUrl: "http://a",
    });
  });

  it("routes to ready spot with no serverless", () => {
    const result = selectBackend(snapshotOf({ spotUrl: "http://b", spotReady: true }));
    expect(result._unsafeUnwrap()).toEqual({
      backend: "spot",
      baseUrl: "http://b",
      fallbackUrl: null,
    });
  });

  it("fails when only an unready spot is known", () => {
    const result = selectBackend(snapshotOf({ spotUrl: "http://b" }));
    expect(result._unsafeUnwrapErr().message).toBe(
      "Spot backend not ready, no serverless fallback"
    );
  });

  it("fails after shutdown", () => {
    const result = selectBackend(
      snapshotOf({ serverlessUrl: "http://a", shutdown: true })
    );
    expect(result._unsafeUnwrapErr().message).toBe("Router is shutting down");
  });

  it("depends only on URL presence and readiness", () => {
    const base = { serverlessUrl: "http://a", spotUrl: "http://b", spotReady: true };
    const first = selectBackend(
      snapshotOf({ ...base, lastProbeAt: 1, lastProbeError: null })
    );
    const second = selectBackend(
      snapshotOf({ ...base, lastProbeAt: 99, serverlessAuthToken: "test-token" })
    );
    expect(first._unsafeUnwrap()).toEqual(second._unsafeUnwrap());
  });
});

describe("routingPhase", () => {
  it.each([
    [snapshotOf(), "no_backends"],
    [snapshotOf({ serverlessUrl: "http://a" }), "serverless_only"],
    [snapshotOf({ serverlessUrl: "http://a", spotUrl: "http://b" }), "serverless_only"],
    [snapshotOf({ spotUrl: "http://b", spotReady: true }), "spot_preferred"],
    [snapshotOf({ serverlessUrl: "http://a", shutdown: true }), "shutdown"],
  ] as const)("classifies %o as %s", (snapshot, phase) => {
    expect(routingPhase(snapshot)).toBe(phase);
  });
});

describe("shouldWakeSpot", () => {
  it("is true only for a known, unready spot", () => {
    expect(shouldWakeSpot(snapshotOf({ spotUrl: "http://b" }))).toBe(true);
    expect(shouldWakeSpot(snapshotOf({ spotUrl: "http://b", spotReady: true }))).toBe(false);
    expect(shouldWakeSpot(snapshotOf())).toBe(false);
  });
});
