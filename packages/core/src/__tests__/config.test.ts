import { afterEach, describe, expect, it } from "vitest";
import { config, defineConfig, parseEnvConfig } from "../index.js";

describe("config", () => {
  afterEach(() => {
    config.reset();
  });

  describe("defaults", () => {
    it("provides per-representation epsilons", () => {
      const all = config.getAll();
      expect(all.epsilon.double).toBe(1e-15);
      expect(all.epsilon.single).toBe(1e-6);
      expect(all.epsilon.decimal).toBe(1e-15);
      expect(all.epsilon.huge).toBe(1e-15);
    });

    it("provides working precision and iteration cap", () => {
      expect(config.getAll().decimal.precision).toBe(34);
      expect(config.getAll().collision.maxIterations).toBe(64);
      expect(config.getAll().debug).toBe(false);
    });
  });

  describe("set", () => {
    it("merges nested values without dropping siblings", () => {
      config.set({ epsilon: { double: 1e-12 } });
      expect(config.getAll().epsilon.double).toBe(1e-12);
      expect(config.getAll().epsilon.single).toBe(1e-6);
    });

    it("exposes raw values by dot path", () => {
      config.set({ decimal: { precision: 50 } });
      expect(config.get("decimal.precision")).toBe(50);
      expect(config.get("decimal.missing")).toBeUndefined();
    });

    it("clamps nonsensical integer settings", () => {
      config.set({ decimal: { precision: 0 }, collision: { maxIterations: -3 } });
      expect(config.getAll().decimal.precision).toBe(1);
      expect(config.getAll().collision.maxIterations).toBe(1);
    });

    it("applies after the configuration was first read", () => {
      expect(config.getAll().debug).toBe(false);
      config.set({ debug: true });
      expect(config.getAll().debug).toBe(true);
    });
  });

  describe("reset", () => {
    it("restores defaults", () => {
      config.set({ epsilon: { huge: 1e-9 } });
      config.reset();
      expect(config.getAll().epsilon.huge).toBe(1e-15);
    });
  });

  describe("parseEnvConfig", () => {
    it("maps prefixed variables onto nested keys", () => {
      const parsed = parseEnvConfig({
        ORBIS_DEBUG: "true",
        ORBIS_EPSILON__DOUBLE: "1e-12",
        ORBIS_COLLISION__MAX_ITERATIONS: "128",
        UNRELATED: "x",
      });
      expect(parsed).toEqual({
        debug: true,
        epsilon: { double: 1e-12 },
        collision: { maxIterations: 128 },
      });
    });

    it("keeps non-numeric strings as strings", () => {
      expect(parseEnvConfig({ ORBIS_MODE: "strict" })).toEqual({ mode: "strict" });
    });

    it("treats 0 and empty as false", () => {
      expect(parseEnvConfig({ ORBIS_DEBUG: "0" })).toEqual({ debug: false });
      expect(parseEnvConfig({ ORBIS_DEBUG: "" })).toEqual({ debug: false });
    });
  });

  describe("defineConfig", () => {
    it("returns its argument", () => {
      const cfg = { decimal: { precision: 40 } };
      expect(defineConfig(cfg)).toBe(cfg);
    });
  });
});
