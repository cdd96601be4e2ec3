import { describe, it, expect } from "vitest";
import { deriveStatus, failedResult, type DeploymentResult } from "./deployment.js";

const up = (provider: string): DeploymentResult => ({
  provider,
  deploymentId: `${provider}-1`,
  endpointUrl: `https://${provider}.example`,
  metadata: {},
});

const down = (provider: string): DeploymentResult => failedResult(provider, "no capacity");

describe("deriveStatus", () => {
  it("is active while serverless serves and spot is pending", () => {
    expect(deriveStatus(up("modal"), null, true)).toBe("active");
  });

  it("is launching while serverless failed and spot is pending", () => {
    expect(deriveStatus(down("modal"), null, true)).toBe("launching");
  });

  it("is active when both legs are up", () => {
    expect(deriveStatus(up("modal"), up("skyserve"), false)).toBe("active");
  });

  it("is degraded when exactly one leg is up", () => {
    expect(deriveStatus(up("modal"), down("skyserve"), false)).toBe("degraded");
    expect(deriveStatus(down("modal"), up("skyserve"), false)).toBe("degraded");
  });

  it("is active for serverless alone", () => {
    expect(deriveStatus(up("modal"), null, false)).toBe("active");
  });

  it("is failed when nothing came up", () => {
    expect(deriveStatus(down("modal"), down("skyserve"), false)).toBe("failed");
    expect(deriveStatus(down("modal"), null, false)).toBe("failed");
  });
});
