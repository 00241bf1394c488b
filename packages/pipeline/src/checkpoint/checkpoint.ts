/**
 * Row checkpoint: the full working dataset, persisted after every batch.
 *
 * Created once from the source table with empty result columns, then
 * reloaded as-is on every later run. The checkpoint is the source of
 * truth for resumability; the response caches only avoid refetching.
 */

import { existsSync } from "node:fs";
import {
  REQUIRED_INPUT_COLUMNS,
  type CellValue,
  type CheckpointTable,
} from "@covariate-fetch/types";
import { CorruptCheckpointError, InputTableError } from "../errors.js";
import { readCsvTable, writeCsvTable } from "./csv.js";

export interface CheckpointOptions {
  checkpointPath: string;
  sourcePath: string;
  /** Result columns to add (empty) when initializing from the source */
  resultColumns: readonly string[];
}

export interface LoadedCheckpoint {
  table: CheckpointTable;
  /** True when the checkpoint was initialized from the source on this call */
  created: boolean;
}

/**
 * Load the checkpoint if it exists, otherwise build it from the source
 * table and persist it immediately.
 */
export function loadOrInitCheckpoint(options: CheckpointOptions): LoadedCheckpoint {
  if (existsSync(options.checkpointPath)) {
    let table: CheckpointTable;
    try {
      table = readCsvTable(options.checkpointPath);
    } catch (err) {
      throw new CorruptCheckpointError(
        options.checkpointPath,
        err instanceof Error ? err.message : String(err),
      );
    }
    assertInputColumns(table, options.checkpointPath);
    console.log(
      `[checkpoint] Loaded ${options.checkpointPath} (${table.rows.length.toLocaleString()} rows)`,
    );
    return { table, created: false };
  }

  if (!existsSync(options.sourcePath)) {
    throw new InputTableError(`Source table not found: ${options.sourcePath}`);
  }

  let table: CheckpointTable;
  try {
    table = readCsvTable(options.sourcePath);
  } catch (err) {
    throw new InputTableError(
      `Source table ${options.sourcePath} is not valid CSV: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  assertInputColumns(table, options.sourcePath);
  ensureColumns(table, options.resultColumns);

  persistCheckpoint(table, options.checkpointPath);
  console.log(
    `[checkpoint] Created ${options.checkpointPath} from ${options.sourcePath} (${table.rows.length.toLocaleString()} rows)`,
  );
  return { table, created: true };
}

/** Full overwrite of the checkpoint file with the table's current state. */
export function persistCheckpoint(table: CheckpointTable, checkpointPath: string): void {
  writeCsvTable(table, checkpointPath);
}

/**
 * Append any missing columns, filling them with null. Existing columns
 * and their values are left untouched.
 */
export function ensureColumns(table: CheckpointTable, columns: readonly string[]): void {
  for (const column of columns) {
    if (table.columns.includes(column)) continue;
    table.columns.push(column);
    for (const row of table.rows) {
      row[column] = null;
    }
  }
}

/** Read a cell as a number; null for empty or non-numeric text. */
export function numericCell(value: CellValue | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

function assertInputColumns(table: CheckpointTable, filePath: string): void {
  const missing = REQUIRED_INPUT_COLUMNS.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new InputTableError(
      `${filePath} is missing required column(s): ${missing.join(", ")}`,
    );
  }
}
