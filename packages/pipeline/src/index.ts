/**
 * @covariate-fetch/pipeline
 *
 * Resumable NDVI and climate covariate fetch over a panel of grid cells.
 */

export * from "./errors.js";
export {
  parseConfig,
  pipelineConfigSchema,
  resolveBackendSettings,
  resultColumnNames,
  DEFAULT_DATA_DIR,
  DEFAULT_FILES,
  NDVI_DEFAULTS,
  CLIMATE_DEFAULTS,
  type PipelineConfig,
  type PipelineConfigInput,
  type BackendSettings,
  type BackendTuning,
  type ResultColumn,
} from "./config.js";
export {
  KM_PER_DEGREE,
  effectiveResolutionKm,
  kmToDegrees,
  quantize,
  quantizeCoordinate,
  formatCoordinate,
  cellKey,
} from "./grid/quantize.js";
export { ResponseCache } from "./cache/response-cache.js";
export * from "./checkpoint/index.js";
export * from "./fetch/index.js";
export * from "./scheduler/index.js";
export { runCovariatePipeline, columnFill, type PipelineDeps } from "./pipeline.js";
export { sleep, type Sleep } from "./util/sleep.js";
