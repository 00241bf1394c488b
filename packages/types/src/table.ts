/**
 * Tabular working-set types.
 *
 * The checkpoint table mirrors the input CSV: the source columns in their
 * original order, followed by result columns and quantized-coordinate
 * columns appended by the pipeline.
 */

/** A single field. `null` is an empty CSV field (unset / absent). */
export type CellValue = string | number | null;

/** One record keyed by column name */
export type TableRow = Record<string, CellValue>;

/** Ordered columns plus rows, in source row order */
export interface CheckpointTable {
  columns: string[];
  rows: TableRow[];
}

/** Input columns every source table must carry */
export const REQUIRED_INPUT_COLUMNS = ["lat_center", "lon_center", "year"] as const;

export type RequiredInputColumn = (typeof REQUIRED_INPUT_COLUMNS)[number];
