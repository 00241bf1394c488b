/**
 * Backend fetchers and the shared retry policy.
 */

export {
  type CovariateFetcher,
  yearWindow,
  absentValues,
  describeQuery,
} from "./fetcher.js";
export {
  type RetryPolicy,
  type RetryOptions,
  DEFAULT_RETRY_POLICY,
  fetchWithRetry,
  messageLooksRateLimited,
  describeError,
} from "./retry.js";
export {
  NdviFetcher,
  type NdviFetcherOptions,
  type VegetationIndexSource,
  type DateWindow,
  NDVI_SCALE_FACTOR,
  NDVI_SCALE_METERS,
} from "./ndvi.js";
export {
  EarthEngineSource,
  initializeEarthEngine,
  type EarthEngineCredentials,
  MODIS_NDVI_COLLECTION,
  MODIS_NDVI_BAND,
} from "./earth-engine.js";
export {
  ClimateFetcher,
  type ClimateFetcherOptions,
  type HttpGet,
  type HttpResponse,
  DEFAULT_OPEN_METEO_ENDPOINT,
  aggregateDaily,
  meanDailyTemperature,
  sumPrecipitation,
} from "./climate.js";
