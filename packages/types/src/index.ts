/**
 * @covariate-fetch/types
 *
 * Shared domain types for the covariate fetch pipeline.
 *
 * - Table: the checkpointed working dataset, one row per input record
 * - Covariate: backends, variables and the values they produce per grid cell
 * - Run: outcomes and statistics of a pipeline run
 */

export * from "./geo.js";
export * from "./table.js";
export * from "./covariate.js";
export * from "./run.js";
