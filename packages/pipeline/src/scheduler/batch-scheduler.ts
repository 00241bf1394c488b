/**
 * Batch scheduler: fills one backend's result columns for the whole table.
 *
 * Rows are grouped by year and quantized cell. Years run newest first;
 * each year's unique cells are split into batches. Within a batch, cached
 * cells are broadcast straight to their rows and only the misses are
 * dispatched to the fetcher, with bounded concurrency. A batch's fetched
 * values are merged (cache + every row sharing the cell) only once the
 * whole batch has come back, after which both files are persisted.
 *
 * Rate-limit exhaustion and interrupts stop the run after a final persist;
 * the in-flight batch is dropped rather than half-merged.
 */

import type {
  BackendRunResult,
  BackendRunStats,
  CellQuery,
  CheckpointTable,
  CovariateValues,
  RunStatus,
} from "@covariate-fetch/types";
import type { ResponseCache } from "../cache/response-cache.js";
import { ensureColumns, numericCell } from "../checkpoint/checkpoint.js";
import { resultColumnNames, type BackendSettings } from "../config.js";
import { RateLimitExhaustedError } from "../errors.js";
import { absentValues, describeQuery, type CovariateFetcher } from "../fetch/fetcher.js";
import { describeError } from "../fetch/retry.js";
import { cellKey, formatCoordinate, quantize } from "../grid/quantize.js";
import { sleep as defaultSleep, type Sleep } from "../util/sleep.js";
import { runPool } from "./pool.js";

/** Rows sharing one (year, quantized cell) */
export interface CellGroup {
  key: string;
  lat: number;
  lon: number;
  rows: number[];
}

export interface CellAssignment {
  /** year → unique cells in first-seen order */
  years: Map<number, CellGroup[]>;
  skippedRows: number;
}

export type SchedulerEvent =
  | {
      type: "year-start";
      backend: BackendSettings["backend"];
      year: number;
      cells: number;
      batches: number;
    }
  | {
      type: "batch-complete";
      backend: BackendSettings["backend"];
      year: number;
      batch: number;
      batches: number;
      cacheHits: number;
      fetched: number;
    };

export interface RunBackendOptions {
  table: CheckpointTable;
  cache: ResponseCache;
  fetcher: CovariateFetcher;
  settings: BackendSettings;
  /** Write the checkpoint table to disk */
  persist: () => void;
  signal?: AbortSignal;
  sleep?: Sleep;
  onProgress?: (event: SchedulerEvent) => void;
}

/**
 * Write each row's quantized coordinates into the backend's lat/lon columns
 * and group the rows by year and cell. Rows without a numeric position or
 * an integer year get null coordinates and are left out.
 */
export function assignCells(table: CheckpointTable, settings: BackendSettings): CellAssignment {
  const years = new Map<number, Map<string, CellGroup>>();
  let skippedRows = 0;

  table.rows.forEach((row, index) => {
    const lat = numericCell(row["lat_center"]);
    const lon = numericCell(row["lon_center"]);
    const year = numericCell(row["year"]);
    if (lat === null || lon === null || year === null || !Number.isInteger(year)) {
      row[settings.latColumn] = null;
      row[settings.lonColumn] = null;
      skippedRows++;
      return;
    }

    const cell = quantize(lat, lon, settings.resolutionDeg);
    const latText = formatCoordinate(cell.lat);
    const lonText = formatCoordinate(cell.lon);
    row[settings.latColumn] = latText;
    row[settings.lonColumn] = lonText;

    const key = cellKey(year, cell.lat, cell.lon);
    let cells = years.get(year);
    if (!cells) {
      cells = new Map();
      years.set(year, cells);
    }
    const group = cells.get(key);
    if (group) {
      group.rows.push(index);
    } else {
      // Query with the same rounded coordinates the key carries
      cells.set(key, { key, lat: Number(latText), lon: Number(lonText), rows: [index] });
    }
  });

  const grouped = new Map<number, CellGroup[]>();
  for (const [year, cells] of years) {
    grouped.set(year, [...cells.values()]);
  }
  return { years: grouped, skippedRows };
}

/** Copy one cell's values into every row that maps to it */
function broadcast(
  table: CheckpointTable,
  cell: CellGroup,
  values: CovariateValues,
  settings: BackendSettings,
): void {
  for (const index of cell.rows) {
    const row = table.rows[index]!;
    for (const { variable, column } of settings.columns) {
      row[column] = values[variable] ?? null;
    }
  }
}

type Settled<T> = { aborted: false; value: T } | { aborted: true };

/**
 * Resolve with the work's result, or as soon as the signal aborts. Work
 * abandoned by an abort keeps running; its outcome is ignored.
 */
function untilDoneOrAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<Settled<T>> {
  if (!signal) return work.then((value) => ({ aborted: false, value }));
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve({ aborted: true });
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve({ aborted: false, value });
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

async function fetchCell(
  fetcher: CovariateFetcher,
  query: CellQuery,
  signal?: AbortSignal,
): Promise<CovariateValues> {
  try {
    return await fetcher.fetch(query, signal);
  } catch (err) {
    if (err instanceof RateLimitExhaustedError || signal?.aborted) throw err;
    console.warn(
      `[scheduler] ${fetcher.backend} fetch failed for ${describeQuery(query)}: ${describeError(err)}`,
    );
    return absentValues(fetcher.variables);
  }
}

async function fetchBatch(
  misses: readonly CellGroup[],
  year: number,
  fetcher: CovariateFetcher,
  concurrency: number,
  signal?: AbortSignal,
): Promise<Map<string, CovariateValues>> {
  const results = new Map<string, CovariateValues>();
  await runPool(
    misses,
    concurrency,
    async (cell) => {
      const values = await fetchCell(fetcher, { year, lat: cell.lat, lon: cell.lon }, signal);
      results.set(cell.key, values);
    },
    signal,
  );
  return results;
}

/**
 * Fill one backend's columns. Resolves with "completed", "interrupted"
 * (signal aborted) or "rate-limited" (a fetch exhausted its retries);
 * every outcome leaves the checkpoint and cache flushed.
 */
export async function runBackend(options: RunBackendOptions): Promise<BackendRunResult> {
  const { table, cache, fetcher, settings, signal } = options;
  const sleep = options.sleep ?? defaultSleep;
  const startTime = Date.now();
  const tag = `[scheduler] ${settings.backend}:`;

  ensureColumns(table, [settings.latColumn, settings.lonColumn, ...resultColumnNames(settings)]);
  const { years, skippedRows } = assignCells(table, settings);

  const stats: BackendRunStats = {
    backend: settings.backend,
    skippedRows,
    uniqueCells: 0,
    cacheHits: 0,
    fetched: 0,
    batches: 0,
    timeMs: 0,
  };
  for (const cells of years.values()) stats.uniqueCells += cells.length;

  if (skippedRows > 0) {
    console.warn(
      `${tag} skipping ${skippedRows.toLocaleString()} row(s) without numeric lat_center/lon_center/year`,
    );
  }
  console.log(
    `${tag} ${stats.uniqueCells.toLocaleString()} unique cells across ${years.size} year(s) at ${settings.resolutionKm} km`,
  );

  const flush = (): void => {
    options.persist();
    cache.flush();
  };
  const finish = (status: RunStatus): BackendRunResult => {
    stats.timeMs = Date.now() - startTime;
    return { status, stats: { ...stats } };
  };
  const stopInterrupted = (): BackendRunResult => {
    console.log(`${tag} interrupted — saving progress`);
    flush();
    return finish("interrupted");
  };

  const orderedYears = [...years.keys()].sort((a, b) => b - a);

  for (const year of orderedYears) {
    const cells = years.get(year) ?? [];
    const batchCount = Math.ceil(cells.length / settings.batchSize);
    console.log(`${tag} year ${year}: ${cells.length.toLocaleString()} cells in ${batchCount} batch(es)`);
    options.onProgress?.({
      type: "year-start",
      backend: settings.backend,
      year,
      cells: cells.length,
      batches: batchCount,
    });

    for (let b = 0; b < batchCount; b++) {
      if (signal?.aborted) return stopInterrupted();

      const batch = cells.slice(b * settings.batchSize, (b + 1) * settings.batchSize);
      const misses: CellGroup[] = [];
      let hits = 0;
      for (const cell of batch) {
        const cached = cache.get(cell.key);
        if (cached) {
          broadcast(table, cell, cached, settings);
          hits++;
        } else {
          misses.push(cell);
        }
      }

      // Cancels the batch's remaining fetches on interrupt or rate-limit exhaustion
      const batchController = new AbortController();
      const cancelBatch = (): void => batchController.abort(signal?.reason);
      signal?.addEventListener("abort", cancelBatch, { once: true });

      let fetched: Map<string, CovariateValues>;
      try {
        const outcome = await untilDoneOrAborted(
          fetchBatch(misses, year, fetcher, settings.concurrency, batchController.signal),
          signal,
        );
        if (outcome.aborted || signal?.aborted) return stopInterrupted();
        fetched = outcome.value;
      } catch (err) {
        batchController.abort(err);
        if (err instanceof RateLimitExhaustedError) {
          console.error(`${tag} ${err.message} — saving progress and stopping`);
          flush();
          return finish("rate-limited");
        }
        if (signal?.aborted) return stopInterrupted();
        throw err;
      } finally {
        signal?.removeEventListener("abort", cancelBatch);
      }

      for (const cell of misses) {
        const values = fetched.get(cell.key);
        if (!values) continue;
        cache.put(cell.key, values);
        broadcast(table, cell, values, settings);
      }

      stats.cacheHits += hits;
      stats.fetched += fetched.size;
      stats.batches++;
      flush();
      options.onProgress?.({
        type: "batch-complete",
        backend: settings.backend,
        year,
        batch: b + 1,
        batches: batchCount,
        cacheHits: hits,
        fetched: fetched.size,
      });

      if (misses.length > 0 && settings.interBatchDelayMs > 0) {
        await sleep(settings.interBatchDelayMs, signal);
      }
    }
  }

  if (stats.batches === 0) flush();
  const result = finish("completed");
  console.log(
    `${tag} done — ${stats.cacheHits.toLocaleString()} cached, ${stats.fetched.toLocaleString()} fetched in ${(result.stats.timeMs / 1000).toFixed(1)}s`,
  );
  return result;
}
