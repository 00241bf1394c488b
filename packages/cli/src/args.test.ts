import { describe, it, expect } from "vitest";
import { UsageError, configFromEnv, parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("returns an empty config with no arguments", () => {
    expect(parseArgs([])).toEqual({ help: false, config: {} });
  });

  it("reads every flag", () => {
    const { config } = parseArgs([
      "--data-dir",
      "/tmp/panel",
      "--source=/tmp/panel/input.csv",
      "--grid-km",
      "5",
      "--only",
      "climate",
      "--sequential",
    ]);
    expect(config).toEqual({
      dataDir: "/tmp/panel",
      sourcePath: "/tmp/panel/input.csv",
      gridSizeKm: 5,
      backends: ["climate"],
      sequential: true,
    });
  });

  it("recognizes help", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("rejects a non-numeric grid size", () => {
    expect(() => parseArgs(["--grid-km", "big"])).toThrow(
      new UsageError('--grid-km expects a number, got "big"'),
    );
  });

  it("rejects an unknown backend", () => {
    expect(() => parseArgs(["--only=modis"])).toThrow(
      '--only expects "ndvi" or "climate", got "modis"',
    );
  });

  it("rejects a flag missing its value", () => {
    expect(() => parseArgs(["--data-dir", "--sequential"])).toThrow("--data-dir requires a value");
    expect(() => parseArgs(["--source"])).toThrow("--source requires a value");
  });

  it("rejects unknown arguments", () => {
    expect(() => parseArgs(["--fast"])).toThrow(UsageError);
  });
});

describe("configFromEnv", () => {
  it("ignores unset and empty variables", () => {
    expect(configFromEnv({ COVARIATE_DATA_DIR: "" })).toEqual({});
  });

  it("maps every variable", () => {
    expect(
      configFromEnv({
        COVARIATE_DATA_DIR: "/srv/data",
        COVARIATE_GRID_KM: "10",
        EE_PROJECT_ID: "test-project",
        EE_PRIVATE_KEY_PATH: "/srv/key.json",
        OPEN_METEO_ENDPOINT: "http://localhost:8080/v1/archive",
      }),
    ).toEqual({
      dataDir: "/srv/data",
      gridSizeKm: 10,
      earthEngine: { projectId: "test-project", privateKeyPath: "/srv/key.json" },
      openMeteo: { endpoint: "http://localhost:8080/v1/archive" },
    });
  });

  it("passes a non-numeric grid size through for validation", () => {
    expect(configFromEnv({ COVARIATE_GRID_KM: "wide" }).gridSizeKm).toBeNaN();
  });
});
