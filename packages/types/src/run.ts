/**
 * Run outcome types.
 */

import type { BackendId } from "./covariate.js";

/**
 * How a backend run (or the whole pipeline) ended.
 *
 * - completed: every cell was resolved from cache or fetched
 * - interrupted: an abort signal stopped the run after flushing progress
 * - rate-limited: a fetch exhausted its retries on rate-limit responses
 */
export type RunStatus = "completed" | "interrupted" | "rate-limited";

/** Per-backend counters */
export interface BackendRunStats {
  backend: BackendId;
  /** Rows that could not be quantized (non-numeric lat/lon/year) */
  skippedRows: number;
  /** Unique (year, cell) keys across all years */
  uniqueCells: number;
  /** Cells answered from the response cache */
  cacheHits: number;
  /** Cells fetched from the backend during this run */
  fetched: number;
  /** Batches fully merged and persisted */
  batches: number;
  timeMs: number;
}

export interface BackendRunResult {
  status: RunStatus;
  stats: BackendRunStats;
}

/** Filled / total counts for one result column */
export interface ColumnFill {
  column: string;
  filled: number;
  total: number;
}

export interface PipelineResult {
  status: RunStatus;
  /** Backend that stopped the run, when status is not "completed" */
  stoppedBy?: BackendId;
  backends: BackendRunStats[];
  fill: ColumnFill[];
}
