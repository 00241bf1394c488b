export { runPool } from "./pool.js";
export {
  runBackend,
  assignCells,
  type RunBackendOptions,
  type SchedulerEvent,
  type CellGroup,
  type CellAssignment,
} from "./batch-scheduler.js";
