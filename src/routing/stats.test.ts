import { describe, it, expect } from "vitest";
import { createRouteStats, calculateUpdatedLatency } from "./stats.js";

describe("calculateUpdatedLatency", () => {
  it("starts from the first sample", () => {
    expect(calculateUpdatedLatency(null, 100)).toEqual({ averageMs: 100, sampleCount: 1 });
  });

  it("weights history at 80%", () => {
    const first = calculateUpdatedLatency(null, 100);
    const second = calculateUpdatedLatency(first, 120);
    expect(second.averageMs).toBeCloseTo(104);
    expect(second.sampleCount).toBe(2);
  });

  it("caps the sample count", () => {
    const capped = calculateUpdatedLatency({ averageMs: 50, sampleCount: 100 }, 50);
    expect(capped.sampleCount).toBe(100);
  });
});

describe("createRouteStats", () => {
  it("reports zeros before any route", () => {
    const stats = createRouteStats({ windowSize: 10, now: () => 0 });
    expect(stats.report(0)).toEqual({
      total: 0,
      spot: 0,
      serverless: 0,
      pct_spot: 0,
      pct_serverless: 0,
      errors: 0,
      window_total: 0,
      window_spot: 0,
      window_serverless: 0,
      window_error_rate: 0,
      avg_latency_ms_spot: null,
      avg_latency_ms_serverless: null,
      gpu_seconds_spot: 0,
      gpu_seconds_serverless: 0,
      uptime_seconds: 0,
      spot_ready_seconds: 0,
    });
  });

  it("counts routes per backend with percentages", () => {
    const stats = createRouteStats({ windowSize: 10 });
    stats.recordRoute("spot");
    stats.recordRoute("spot");
    stats.recordRoute("spot");
    stats.recordRoute("serverless");

    const report = stats.report(0);
    expect(report.total).toBe(4);
    expect(report.spot).toBe(3);
    expect(report.serverless).toBe(1);
    expect(report.pct_spot).toBe(75);
    expect(report.pct_serverless).toBe(25);
  });

  it("keeps only the most recent outcomes in the window", () => {
    const stats = createRouteStats({ windowSize: 3 });
    stats.recordOutcome({ backend: "spot", ok: false, latencyMs: 5, durationMs: 5 });
    stats.recordOutcome({ backend: "spot", ok: true, latencyMs: 5, durationMs: 5 });
    stats.recordOutcome({ backend: "serverless", ok: true, latencyMs: 5, durationMs: 5 });
    stats.recordOutcome({ backend: "serverless", ok: false, latencyMs: 5, durationMs: 5 });

    const report = stats.report(0);
    expect(report.window_total).toBe(3);
    expect(report.window_spot).toBe(1);
    expect(report.window_serverless).toBe(2);
    expect(report.window_error_rate).toBeCloseTo(1 / 3);
    expect(report.errors).toBe(2);
  });

  it("tracks latency only for successful routes", () => {
    const stats = createRouteStats({ windowSize: 10 });
    stats.recordOutcome({ backend: "spot", ok: true, latencyMs: 100, durationMs: 100 });
    stats.recordOutcome({ backend: "spot", ok: false, latencyMs: 2000, durationMs: 2000 });
    stats.recordOutcome({ backend: "spot", ok: true, latencyMs: 120, durationMs: 120 });

    expect(stats.report(0).avg_latency_ms_spot).toBe(104);
  });

  it("accumulates busy seconds per backend", () => {
    const stats = createRouteStats({ windowSize: 10 });
    stats.recordOutcome({ backend: "serverless", ok: true, latencyMs: 10, durationMs: 1500 });
    stats.recordOutcome({ backend: "serverless", ok: false, latencyMs: 10, durationMs: 250 });

    const report = stats.report(0);
    expect(report.gpu_seconds_serverless).toBe(1.75);
    expect(report.gpu_seconds_spot).toBe(0);
  });

  it("reports uptime and spot-ready time in seconds", () => {
    let now = 10_000;
    const stats = createRouteStats({ windowSize: 10, now: () => now });
    now += 12_340;

    const report = stats.report(4_500);
    expect(report.uptime_seconds).toBe(12.34);
    expect(report.spot_ready_seconds).toBe(4.5);
  });
});
