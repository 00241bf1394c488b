/**
 * Covariate types: which backend produces which variables, and the value
 * record cached per grid cell.
 */

/** The two external data sources */
export type BackendId = "ndvi" | "climate";

export const BACKEND_IDS: readonly BackendId[] = ["ndvi", "climate"];

/** Variables produced by the vegetation-index backend */
export type NdviVariable = "ndvi";

/** Variables produced by the climate backend */
export type ClimateVariable = "temp_mean" | "precip_sum";

export type CovariateVariable = NdviVariable | ClimateVariable;

/**
 * Values fetched for one cell, keyed by variable name.
 * `null` means "fetched, nothing usable" and is a final answer.
 */
export type CovariateValues = Partial<Record<CovariateVariable, number | null>>;
