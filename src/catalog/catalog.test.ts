import { describe, it, expect } from "vitest";
import {
  cheapestProvider,
  getGpuSpec,
  getProviderPrice,
  normalizeGpuName,
  providerGpuId,
  providerGpuMap,
  providerRegions,
  queryCatalog,
  spotGpuName,
} from "./catalog.js";
import { loadCatalog, parseCatalog } from "../config/loader.js";
import { ConfigError } from "../types/errors.js";

describe("catalog", () => {
  // ─────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────

  describe("loading", () => {
    it("loads every GPU from the bundled file", () => {
      const catalog = loadCatalog();

      expect(catalog.gpus.size).toBe(18);
      expect(catalog.gpus.get("H200")).toEqual({
        shortName: "H200",
        fullName: "NVIDIA H200",
        vramGb: 141,
        arch: "hopper",
      });
    });

    it("rejects an offering for an unknown GPU", () => {
      const raw = {
        gpus: { L4: { full_name: "NVIDIA L4", vram_gb: 24, arch: "ada" } },
        providers: { acme: [{ gpu: "Z9", id: "z9", price: 1 }] },
      };

      expect(() => parseCatalog(raw)).toThrow(ConfigError);
      expect(() => parseCatalog(raw)).toThrow(/acme offers unknown GPU "Z9"/);
    });

    it("rejects unknown keys", () => {
      const raw = { gpus: {}, providers: {}, extra: true };

      expect(() => parseCatalog(raw)).toThrow(ConfigError);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Names
  // ─────────────────────────────────────────────────────────────────

  describe("normalizeGpuName", () => {
    it.each([
      ["H100", "H100"],
      ["A100", "A100_80GB"],
      ["4090", "RTX4090"],
      ["h100", "H100"],
      ["l40s", "L40S"],
    ])("resolves %s to %s", (input, expected) => {
      expect(normalizeGpuName(input)).toBe(expected);
    });

    it("returns undefined for an unknown name", () => {
      expect(normalizeGpuName("TPU")).toBeUndefined();
    });
  });

  it("looks up specs through aliases", () => {
    expect(getGpuSpec("A100")?.vramGb).toBe(80);
    expect(getGpuSpec("TPU")).toBeUndefined();
  });

  it("maps GPUs to spot accelerator names", () => {
    expect(spotGpuName("A100")).toBe("A100-80GB");
    expect(spotGpuName("A100_40GB")).toBe("A100");
    expect(spotGpuName("A4000")).toBeUndefined();
  });

  // ─────────────────────────────────────────────────────────────────
  // Provider offerings
  // ─────────────────────────────────────────────────────────────────

  describe("provider offerings", () => {
    it("returns provider identifiers", () => {
      expect(providerGpuId("L4", "cloudrun")).toBe("nvidia-l4");
      expect(providerGpuId("A100", "runpod")).toBe("NVIDIA A100-SXM4-80GB");
      expect(providerGpuId("H100", "cloudrun")).toBeUndefined();
    });

    it("returns a provider's full GPU map", () => {
      expect(providerGpuMap("azure")).toEqual({
        T4: "Consumption-GPU-NC8as-T4",
        A100_80GB: "Consumption-GPU-NC24-A100",
      });
    });

    it("returns region restrictions, empty meaning all", () => {
      expect(providerRegions("RTX_PRO_6000", "cloudrun")).toEqual(["us-central1"]);
      expect(providerRegions("L4", "cloudrun")).toHaveLength(12);
      expect(providerRegions("L4", "cloudrun")).toContain("us-east4");
      expect(providerRegions("H100", "modal")).toEqual([]);
    });

    it("returns listed prices and 0 otherwise", () => {
      expect(getProviderPrice("H100", "modal")).toBe(3.95);
      expect(getProviderPrice("H200", "runpod")).toBe(0);
      expect(getProviderPrice("H100", "azure")).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────

  describe("queryCatalog", () => {
    it("sorts by price", () => {
      const providers = queryCatalog({ gpu: "H100" }).map((o) => o.provider);

      expect(providers).toEqual(["modal", "runpod", "baseten"]);
    });

    it("puts unlisted prices last", () => {
      const rows = queryCatalog({ minVramGb: 141 }).map((o) => `${o.provider}:${o.gpu}`);

      expect(rows).toEqual(["modal:B200", "baseten:B200", "runpod:H200", "runpod:B200"]);
    });

    it("filters by maximum price", () => {
      const rows = queryCatalog({ maxPrice: 0.5 }).map((o) => `${o.provider}:${o.gpu}`);

      expect(rows).toEqual(["azure:T4", "runpod:A4000"]);
    });
  });

  describe("cheapestProvider", () => {
    it("picks the cheapest among the given providers", () => {
      expect(cheapestProvider("A100_80GB", ["modal", "runpod"])?.provider).toBe("runpod");
      expect(cheapestProvider("L4", ["modal", "runpod", "baseten"])?.provider).toBe("modal");
    });

    it("ignores unlisted prices", () => {
      expect(cheapestProvider("H200", ["runpod"])).toBeUndefined();
    });
  });
});
