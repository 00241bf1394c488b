/**
 * CSV read/write for tables.
 *
 * Empty fields read as null and null writes as an empty field. Values are
 * otherwise kept as text on read; numbers written back use String(n).
 */

import { readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { CellValue, CheckpointTable, TableRow } from "@covariate-fetch/types";
import { writeFileAtomic } from "../io/atomic-write.js";

/**
 * Parse CSV text into a table. The first record is the header.
 * Throws whatever csv-parse throws for malformed input.
 */
export function parseCsvTable(text: string): CheckpointTable {
  const records: string[][] = parse(text, {
    skip_empty_lines: true,
    bom: true,
  });

  const [header, ...body] = records;
  if (!header) return { columns: [], rows: [] };

  const rows = body.map((record) => {
    const row: TableRow = {};
    header.forEach((column, i) => {
      const field = record[i];
      row[column] = field === undefined || field === "" ? null : field;
    });
    return row;
  });

  return { columns: [...header], rows };
}

export function readCsvTable(filePath: string): CheckpointTable {
  return parseCsvTable(readFileSync(filePath, "utf-8"));
}

function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "";
  return typeof value === "number" ? String(value) : value;
}

export function formatCsvTable(table: CheckpointTable): string {
  const records = [
    table.columns,
    ...table.rows.map((row) => table.columns.map((column) => formatCell(row[column]))),
  ];
  return stringify(records);
}

/** Overwrite `filePath` with the table's current state. */
export function writeCsvTable(table: CheckpointTable, filePath: string): void {
  writeFileAtomic(filePath, formatCsvTable(table));
}
