/**
 * Pipeline orchestrator.
 *
 * Loads (or initializes) the checkpoint and both response caches, then runs
 * each selected backend in turn: NDVI first, climate second. A backend that
 * stops early (interrupt or rate-limit exhaustion) ends the whole run; the
 * scheduler has already flushed everything by then.
 */

import { mkdirSync } from "node:fs";
import {
  BACKEND_IDS,
  type BackendRunStats,
  type CheckpointTable,
  type ColumnFill,
  type PipelineResult,
} from "@covariate-fetch/types";
import { ResponseCache } from "./cache/response-cache.js";
import { loadOrInitCheckpoint, persistCheckpoint } from "./checkpoint/checkpoint.js";
import {
  resolveBackendSettings,
  resultColumnNames,
  type BackendSettings,
  type PipelineConfig,
} from "./config.js";
import type { CovariateFetcher } from "./fetch/fetcher.js";
import { runBackend, type SchedulerEvent } from "./scheduler/batch-scheduler.js";
import type { Sleep } from "./util/sleep.js";

export interface PipelineDeps {
  /** Build the fetcher for a backend at its effective resolution */
  createFetcher: (settings: BackendSettings) => CovariateFetcher;
  signal?: AbortSignal;
  sleep?: Sleep;
  onProgress?: (event: SchedulerEvent) => void;
}

export async function runCovariatePipeline(
  config: PipelineConfig,
  deps: PipelineDeps,
): Promise<PipelineResult> {
  mkdirSync(config.dataDir, { recursive: true });

  // Every result column exists from the first run on, whichever backends run
  const allColumns = BACKEND_IDS.flatMap((backend) =>
    resultColumnNames(resolveBackendSettings(config, backend)),
  );

  const { table } = loadOrInitCheckpoint({
    checkpointPath: config.checkpointPath,
    sourcePath: config.sourcePath,
    resultColumns: allColumns,
  });

  // Load every cache up front so a corrupt file fails before any fetching
  const runs = config.backends.map((backend) => {
    const settings = resolveBackendSettings(config, backend);
    return { settings, cache: ResponseCache.load(settings.cachePath) };
  });
  for (const { settings, cache } of runs) {
    console.log(`[cache] ${settings.backend}: ${cache.size.toLocaleString()} cached cells`);
  }

  const persist = (): void => persistCheckpoint(table, config.checkpointPath);
  const backends: BackendRunStats[] = [];

  for (const { settings, cache } of runs) {
    const fetcher = deps.createFetcher(settings);
    console.log(`[pipeline] Fetching ${fetcher.name} at ${settings.resolutionKm} km`);

    const result = await runBackend({
      table,
      cache,
      fetcher,
      settings,
      persist,
      signal: deps.signal,
      sleep: deps.sleep,
      onProgress: deps.onProgress,
    });
    backends.push(result.stats);

    if (result.status !== "completed") {
      return {
        status: result.status,
        stoppedBy: settings.backend,
        backends,
        fill: columnFill(table, allColumns),
      };
    }
  }

  persist();
  console.log(`[pipeline] Saved ${config.checkpointPath}`);
  return { status: "completed", backends, fill: columnFill(table, allColumns) };
}

/** Non-null counts per column */
export function columnFill(table: CheckpointTable, columns: readonly string[]): ColumnFill[] {
  return columns.map((column) => ({
    column,
    filled: table.rows.filter((row) => {
      const value = row[column];
      return value !== null && value !== undefined && value !== "";
    }).length,
    total: table.rows.length,
  }));
}
