import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { BackendId, CellQuery, CovariateValues } from "@covariate-fetch/types";
import { parseConfig, type BackendSettings, type PipelineConfigInput } from "./config.js";
import { CorruptCacheError, InputTableError, RateLimitExhaustedError } from "./errors.js";
import type { CovariateFetcher } from "./fetch/fetcher.js";
import { columnFill, runCovariatePipeline } from "./pipeline.js";

// ─── Helpers ───────────────────────────────────────────────────────────────

const SOURCE_CSV = [
  "lat_center,lon_center,year",
  "34.05,-118.25,2020",
  "34.06,-118.24,2020",
  "40.7,-74.0,2019",
  "",
].join("\n");

const NDVI_COLUMN = "ndvi_mean_(0-1)_(25x25km)";
const TEMP_COLUMN = "temp_mean_(°C)_(25x25km)";
const PRECIP_COLUMN = "precip_sum_(mm/year)_(25x25km)";

interface FakeFetcher extends CovariateFetcher {
  calls: CellQuery[];
}

function fakeFetcher(
  backend: BackendId,
  respond?: (query: CellQuery) => CovariateValues,
): FakeFetcher {
  const calls: CellQuery[] = [];
  const answer =
    respond ??
    ((q: CellQuery): CovariateValues =>
      backend === "ndvi" ? { ndvi: 0.5 } : { temp_mean: q.year - 2000, precip_sum: 100 });
  return {
    backend,
    name: `fake ${backend}`,
    variables: backend === "ndvi" ? ["ndvi"] : ["temp_mean", "precip_sum"],
    calls,
    async fetch(query) {
      calls.push(query);
      return answer(query);
    },
  };
}

describe("runCovariatePipeline", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "pipeline-test-"));
    writeFileSync(join(dir, "analysis_panel.csv"), SOURCE_CSV);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function run(
    fetchers: { ndvi: FakeFetcher; climate: FakeFetcher },
    overrides: PipelineConfigInput = {},
    signal?: AbortSignal,
  ) {
    const config = parseConfig({ dataDir: dir, gridSizeKm: 25, ...overrides });
    const createFetcher = vi.fn((settings: BackendSettings) => fetchers[settings.backend]);
    const result = await runCovariatePipeline(config, {
      createFetcher,
      signal,
      sleep: async () => {},
    });
    return { result, createFetcher };
  }

  it("fills every result column and writes the checkpoint", async () => {
    const fetchers = { ndvi: fakeFetcher("ndvi"), climate: fakeFetcher("climate") };
    const { result } = await run(fetchers);

    expect(result.status).toBe("completed");
    expect(result.stoppedBy).toBeUndefined();
    expect(fetchers.ndvi.calls).toHaveLength(2);
    expect(fetchers.climate.calls).toHaveLength(2);
    expect(result.fill).toEqual([
      { column: NDVI_COLUMN, filled: 3, total: 3 },
      { column: TEMP_COLUMN, filled: 3, total: 3 },
      { column: PRECIP_COLUMN, filled: 3, total: 3 },
    ]);

    const lines = readFileSync(join(dir, "climate_checkpoint.csv"), "utf-8").split("\n");
    expect(lines[0]).toBe(
      `lat_center,lon_center,year,${NDVI_COLUMN},${TEMP_COLUMN},${PRECIP_COLUMN},ndvi_lat,ndvi_lon,climate_lat,climate_lon`,
    );
    expect(lines[1]).toBe(
      "34.05,-118.25,2020,0.5,20,100,34.009009,-118.243243,34.009009,-118.243243",
    );
    expect(lines[3]).toBe(
      "40.7,-74.0,2019,0.5,19,100,40.765766,-74.099099,40.765766,-74.099099",
    );
    expect(existsSync(join(dir, "gee_cache.json"))).toBe(true);
    expect(existsSync(join(dir, "om_cache.json"))).toBe(true);
  });

  it("makes no backend calls on a warm rerun", async () => {
    await run({ ndvi: fakeFetcher("ndvi"), climate: fakeFetcher("climate") });
    const before = readFileSync(join(dir, "climate_checkpoint.csv"), "utf-8");

    const fetchers = { ndvi: fakeFetcher("ndvi"), climate: fakeFetcher("climate") };
    const { result } = await run(fetchers);

    expect(result.status).toBe("completed");
    expect(fetchers.ndvi.calls).toHaveLength(0);
    expect(fetchers.climate.calls).toHaveLength(0);
    expect(result.backends.map((b) => b.cacheHits)).toEqual([2, 2]);
    expect(readFileSync(join(dir, "climate_checkpoint.csv"), "utf-8")).toBe(before);
  });

  it("runs only the selected backends but keeps every result column", async () => {
    const fetchers = { ndvi: fakeFetcher("ndvi"), climate: fakeFetcher("climate") };
    const { result, createFetcher } = await run(fetchers, { backends: ["climate"] });

    expect(createFetcher).toHaveBeenCalledTimes(1);
    expect(fetchers.ndvi.calls).toHaveLength(0);
    expect(result.fill[0]).toEqual({ column: NDVI_COLUMN, filled: 0, total: 3 });
    expect(result.fill[1]).toEqual({ column: TEMP_COLUMN, filled: 3, total: 3 });
  });

  it("stops before climate when NDVI is rate-limited", async () => {
    const fetchers = {
      ndvi: fakeFetcher("ndvi", () => {
        throw new RateLimitExhaustedError("ndvi", 3);
      }),
      climate: fakeFetcher("climate"),
    };
    const { result } = await run(fetchers);

    expect(result.status).toBe("rate-limited");
    expect(result.stoppedBy).toBe("ndvi");
    expect(result.backends).toHaveLength(1);
    expect(fetchers.climate.calls).toHaveLength(0);
  });

  it("reports an interrupt from the climate backend", async () => {
    const controller = new AbortController();
    const fetchers = {
      ndvi: fakeFetcher("ndvi"),
      climate: fakeFetcher("climate", () => {
        controller.abort();
        return { temp_mean: 1, precip_sum: 1 };
      }),
    };
    const { result } = await run(fetchers, {}, controller.signal);

    expect(result.status).toBe("interrupted");
    expect(result.stoppedBy).toBe("climate");
    expect(result.fill[0]).toEqual({ column: NDVI_COLUMN, filled: 3, total: 3 });
    expect(result.fill[1]).toEqual({ column: TEMP_COLUMN, filled: 0, total: 3 });
  });

  it("fails on a corrupt cache before fetching anything", async () => {
    writeFileSync(join(dir, "om_cache.json"), "{not json");
    const fetchers = { ndvi: fakeFetcher("ndvi"), climate: fakeFetcher("climate") };

    await expect(run(fetchers)).rejects.toBeInstanceOf(CorruptCacheError);
    expect(fetchers.ndvi.calls).toHaveLength(0);
  });

  it("fails when the source table is missing", async () => {
    rmSync(join(dir, "analysis_panel.csv"));
    const fetchers = { ndvi: fakeFetcher("ndvi"), climate: fakeFetcher("climate") };
    await expect(run(fetchers)).rejects.toBeInstanceOf(InputTableError);
  });
});

describe("columnFill", () => {
  it("counts non-empty cells", () => {
    const fill = columnFill(
      {
        columns: ["a"],
        rows: [{ a: 1 }, { a: null }, { a: "" }, { a: "x" }, {}],
      },
      ["a"],
    );
    expect(fill).toEqual([{ column: "a", filled: 2, total: 5 }]);
  });
});
