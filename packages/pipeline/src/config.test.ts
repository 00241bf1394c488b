import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { parseConfig, resolveBackendSettings, resultColumnNames } from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseConfig", () => {
  it("fills defaults", () => {
    const config = parseConfig({});
    expect(config.dataDir).toBe("./data");
    expect(config.gridSizeKm).toBe(25);
    expect(config.backends).toEqual(["ndvi", "climate"]);
    expect(config.sequential).toBe(false);
    expect(config.ndvi).toEqual({
      minResolutionKm: 0.25,
      batchSize: 200,
      concurrency: 10,
      interBatchDelayMs: 2000,
    });
    expect(config.climate).toEqual({
      minResolutionKm: 25,
      batchSize: 100,
      concurrency: 3,
      interBatchDelayMs: 1000,
    });
    expect(config.retry).toEqual({
      maxAttempts: 3,
      rateLimitBaseDelayMs: 10_000,
      errorDelayMs: 5_000,
    });
    expect(config.openMeteo.endpoint).toBe("https://archive-api.open-meteo.com/v1/archive");
  });

  it("derives file paths from the data directory", () => {
    const config = parseConfig({ dataDir: "/tmp/panel" });
    expect(config.sourcePath).toBe(join("/tmp/panel", "analysis_panel.csv"));
    expect(config.checkpointPath).toBe(join("/tmp/panel", "climate_checkpoint.csv"));
    expect(config.ndviCachePath).toBe(join("/tmp/panel", "gee_cache.json"));
    expect(config.climateCachePath).toBe(join("/tmp/panel", "om_cache.json"));
  });

  it("keeps explicit paths", () => {
    const config = parseConfig({ dataDir: "/tmp/panel", sourcePath: "/elsewhere/input.csv" });
    expect(config.sourcePath).toBe("/elsewhere/input.csv");
  });

  it("merges partial backend settings over the defaults", () => {
    const config = parseConfig({ climate: { batchSize: 50 } });
    expect(config.climate.batchSize).toBe(50);
    expect(config.climate.concurrency).toBe(3);
  });

  it("orders and deduplicates backends", () => {
    expect(parseConfig({ backends: ["climate", "ndvi", "climate"] }).backends).toEqual([
      "ndvi",
      "climate",
    ]);
  });

  it("rejects invalid values with every failing field listed", () => {
    try {
      parseConfig({ gridSizeKm: -5, ndvi: { concurrency: 0 } });
      expect.fail("expected ConfigError");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^gridSizeKm: /);
      expect(err.issues[1]).toMatch(/^ndvi\.concurrency: /);
    }
  });

  it("rejects an empty backend list", () => {
    expect(() => parseConfig({ backends: [] })).toThrow(ConfigError);
  });
});

describe("resolveBackendSettings", () => {
  it("clamps climate to its native resolution", () => {
    const settings = resolveBackendSettings(parseConfig({ gridSizeKm: 5 }), "climate");
    expect(settings.resolutionKm).toBe(25);
    expect(settings.resolutionDeg).toBeCloseTo(25 / 111, 12);
    expect(resultColumnNames(settings)).toEqual([
      "temp_mean_(°C)_(25x25km)",
      "precip_sum_(mm/year)_(25x25km)",
    ]);
  });

  it("uses the grid size for NDVI above its native minimum", () => {
    const settings = resolveBackendSettings(parseConfig({ gridSizeKm: 5 }), "ndvi");
    expect(settings.resolutionKm).toBe(5);
    expect(settings.latColumn).toBe("ndvi_lat");
    expect(settings.lonColumn).toBe("ndvi_lon");
    expect(resultColumnNames(settings)).toEqual(["ndvi_mean_(0-1)_(5x5km)"]);
  });

  it("clamps NDVI below 250 m", () => {
    const settings = resolveBackendSettings(parseConfig({ gridSizeKm: 0.1 }), "ndvi");
    expect(settings.resolutionKm).toBe(0.25);
    expect(resultColumnNames(settings)).toEqual(["ndvi_mean_(0-1)_(0.25x0.25km)"]);
  });

  it("forces concurrency 1 when sequential", () => {
    const config = parseConfig({ sequential: true });
    expect(resolveBackendSettings(config, "ndvi").concurrency).toBe(1);
    expect(resolveBackendSettings(config, "climate").concurrency).toBe(1);
  });

  it("points each backend at its own cache file", () => {
    const config = parseConfig({ dataDir: "/tmp/panel" });
    expect(resolveBackendSettings(config, "ndvi").cachePath).toBe(join("/tmp/panel", "gee_cache.json"));
    expect(resolveBackendSettings(config, "climate").cachePath).toBe(
      join("/tmp/panel", "om_cache.json"),
    );
  });
});
