export {
  loadOrInitCheckpoint,
  persistCheckpoint,
  ensureColumns,
  numericCell,
  type CheckpointOptions,
  type LoadedCheckpoint,
} from "./checkpoint.js";
export { parseCsvTable, readCsvTable, formatCsvTable, writeCsvTable } from "./csv.js";
