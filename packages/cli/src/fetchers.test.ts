import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  ClimateFetcher,
  ConfigError,
  NdviFetcher,
  parseConfig,
  resolveBackendSettings,
  type VegetationIndexSource,
} from "@covariate-fetch/pipeline";
import { connectEarthEngine, createFetcherFactory, readServiceAccountKey } from "./fetchers.js";

const fakeSource: VegetationIndexSource = {
  countImages: async () => 1,
  regionMean: async () => 4000,
};

describe("readServiceAccountKey", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "fetchers-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("accepts a key with an email and private key", () => {
    const path = join(dir, "key.json");
    writeFileSync(
      path,
      JSON.stringify({ client_email: "svc@test-project.example", private_key: "test-key", type: "service_account" }),
    );
    expect(readServiceAccountKey(path)).toEqual({
      client_email: "svc@test-project.example",
      private_key: "test-key",
      type: "service_account",
    });
  });

  it("rejects a key without a private key", () => {
    const path = join(dir, "key.json");
    writeFileSync(path, JSON.stringify({ client_email: "svc@test-project.example" }));
    expect(() => readServiceAccountKey(path)).toThrow(ConfigError);
  });

  it("rejects a missing file", () => {
    expect(() => readServiceAccountKey(join(dir, "absent.json"))).toThrow(ConfigError);
  });
});

describe("connectEarthEngine", () => {
  it("requires a project and key path", async () => {
    const error = await connectEarthEngine(parseConfig({})).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues).toEqual([
      "earthEngine.projectId: required for NDVI (set EE_PROJECT_ID)",
      "earthEngine.privateKeyPath: required for NDVI (set EE_PRIVATE_KEY_PATH)",
    ]);
  });
});

describe("createFetcherFactory", () => {
  const config = parseConfig({ gridSizeKm: 5 });

  it("builds an NDVI fetcher on the connected source", async () => {
    const fetcher = createFetcherFactory(config, fakeSource)(resolveBackendSettings(config, "ndvi"));
    expect(fetcher).toBeInstanceOf(NdviFetcher);
    expect(await fetcher.fetch({ year: 2020, lat: 10, lon: 20 })).toEqual({ ndvi: 0.4 });
  });

  it("builds a climate fetcher", () => {
    const fetcher = createFetcherFactory(config)(resolveBackendSettings(config, "climate"));
    expect(fetcher).toBeInstanceOf(ClimateFetcher);
  });

  it("refuses NDVI without a source", () => {
    const create = createFetcherFactory(config);
    expect(() => create(resolveBackendSettings(config, "ndvi"))).toThrow(
      "NDVI backend selected but Earth Engine is not connected",
    );
  });
});
