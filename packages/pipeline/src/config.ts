/**
 * Pipeline configuration.
 *
 * Validated once at startup with zod and passed by value into every
 * component. Defaults match the standard panel layout: inputs and
 * outputs under ./data, a 25 km grid, Earth Engine NDVI at a 250 m native
 * minimum and Open-Meteo at a ~25 km native minimum.
 */

import { join } from "node:path";
import { z } from "zod";
import type { BackendId, CovariateVariable } from "@covariate-fetch/types";
import { ConfigError } from "./errors.js";
import { DEFAULT_OPEN_METEO_ENDPOINT } from "./fetch/climate.js";
import { effectiveResolutionKm, kmToDegrees } from "./grid/quantize.js";

export const DEFAULT_DATA_DIR = "./data";

export const DEFAULT_FILES = {
  source: "analysis_panel.csv",
  checkpoint: "climate_checkpoint.csv",
  ndviCache: "gee_cache.json",
  climateCache: "om_cache.json",
} as const;

/** Per-backend throughput knobs */
export interface BackendTuning {
  /** Native resolution of the backend; finer grids are clamped up to it */
  minResolutionKm: number;
  /** Unique cells per batch (one persist per batch) */
  batchSize: number;
  /** Fetches in flight at once within a batch */
  concurrency: number;
  /** Pause after a batch that called the backend */
  interBatchDelayMs: number;
}

export const NDVI_DEFAULTS: BackendTuning = {
  minResolutionKm: 0.25,
  batchSize: 200,
  concurrency: 10,
  interBatchDelayMs: 2000,
};

export const CLIMATE_DEFAULTS: BackendTuning = {
  minResolutionKm: 25,
  batchSize: 100,
  concurrency: 3,
  interBatchDelayMs: 1000,
};

function backendSchema(defaults: BackendTuning) {
  return z
    .object({
      minResolutionKm: z.number().positive().finite().default(defaults.minResolutionKm),
      batchSize: z.number().int().positive().default(defaults.batchSize),
      concurrency: z.number().int().positive().default(defaults.concurrency),
      interBatchDelayMs: z.number().int().nonnegative().default(defaults.interBatchDelayMs),
    })
    .default({});
}

export const pipelineConfigSchema = z
  .object({
    dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
    sourcePath: z.string().min(1).optional(),
    checkpointPath: z.string().min(1).optional(),
    ndviCachePath: z.string().min(1).optional(),
    climateCachePath: z.string().min(1).optional(),
    gridSizeKm: z.number().positive().finite().default(25),
    backends: z
      .array(z.enum(["ndvi", "climate"]))
      .nonempty()
      .default(["ndvi", "climate"]),
    /** Force one fetch in flight per backend */
    sequential: z.boolean().default(false),
    ndvi: backendSchema(NDVI_DEFAULTS),
    climate: backendSchema(CLIMATE_DEFAULTS),
    retry: z
      .object({
        maxAttempts: z.number().int().positive().default(3),
        rateLimitBaseDelayMs: z.number().int().nonnegative().default(10_000),
        errorDelayMs: z.number().int().nonnegative().default(5_000),
      })
      .default({}),
    earthEngine: z
      .object({
        projectId: z.string().min(1).optional(),
        privateKeyPath: z.string().min(1).optional(),
      })
      .default({}),
    openMeteo: z
      .object({
        endpoint: z.string().url().default(DEFAULT_OPEN_METEO_ENDPOINT),
        timeoutMs: z.number().int().positive().default(30_000),
      })
      .default({}),
  })
  .transform((c) => ({
    ...c,
    // Run each backend once, in canonical order
    backends: (["ndvi", "climate"] as const).filter((b) => c.backends.includes(b)),
    sourcePath: c.sourcePath ?? join(c.dataDir, DEFAULT_FILES.source),
    checkpointPath: c.checkpointPath ?? join(c.dataDir, DEFAULT_FILES.checkpoint),
    ndviCachePath: c.ndviCachePath ?? join(c.dataDir, DEFAULT_FILES.ndviCache),
    climateCachePath: c.climateCachePath ?? join(c.dataDir, DEFAULT_FILES.climateCache),
  }));

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type PipelineConfig = Readonly<z.output<typeof pipelineConfigSchema>>;

/**
 * Validate raw configuration (from env, flags or a literal).
 *
 * @throws ConfigError listing every failing field
 */
export function parseConfig(input: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return Object.freeze(result.data);
}

// ---------------------------------------------------------------------------
// Resolved per-backend settings
// ---------------------------------------------------------------------------

/** One result column and the variable that fills it */
export interface ResultColumn {
  variable: CovariateVariable;
  column: string;
}

/** Everything the scheduler needs to run one backend */
export interface BackendSettings {
  backend: BackendId;
  resolutionKm: number;
  resolutionDeg: number;
  /** Quantized-coordinate columns written to the checkpoint */
  latColumn: string;
  lonColumn: string;
  columns: readonly ResultColumn[];
  batchSize: number;
  /** Effective concurrency (1 when running sequentially) */
  concurrency: number;
  interBatchDelayMs: number;
  cachePath: string;
}

function resultColumnsFor(backend: BackendId, resolutionKm: number): ResultColumn[] {
  const cell = `${resolutionKm}x${resolutionKm}km`;
  if (backend === "ndvi") {
    return [{ variable: "ndvi", column: `ndvi_mean_(0-1)_(${cell})` }];
  }
  return [
    { variable: "temp_mean", column: `temp_mean_(°C)_(${cell})` },
    { variable: "precip_sum", column: `precip_sum_(mm/year)_(${cell})` },
  ];
}

export function resolveBackendSettings(
  config: PipelineConfig,
  backend: BackendId,
): BackendSettings {
  const tuning = backend === "ndvi" ? config.ndvi : config.climate;
  const resolutionKm = effectiveResolutionKm(config.gridSizeKm, tuning.minResolutionKm);
  return {
    backend,
    resolutionKm,
    resolutionDeg: kmToDegrees(resolutionKm),
    latColumn: `${backend}_lat`,
    lonColumn: `${backend}_lon`,
    columns: resultColumnsFor(backend, resolutionKm),
    batchSize: tuning.batchSize,
    concurrency: config.sequential ? 1 : tuning.concurrency,
    interBatchDelayMs: tuning.interBatchDelayMs,
    cachePath: backend === "ndvi" ? config.ndviCachePath : config.climateCachePath,
  };
}

export function resultColumnNames(settings: BackendSettings): string[] {
  return settings.columns.map((c) => c.column);
}
