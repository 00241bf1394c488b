/**
 * Covariate fetcher interface.
 *
 * A fetcher wraps one external backend for one grid resolution. It answers
 * one (year, cell) query with a value per variable, where null means the
 * backend had nothing usable. Fetchers never throw for ordinary backend
 * failures; the only error they let escape is RateLimitExhaustedError
 * (and the abort reason, when the signal fires).
 */

import type {
  BackendId,
  CellQuery,
  CovariateValues,
  CovariateVariable,
} from "@covariate-fetch/types";

export interface CovariateFetcher {
  /** Which backend this fetcher queries */
  readonly backend: BackendId;
  /** Human-readable name */
  readonly name: string;
  /** Variables every returned record carries */
  readonly variables: readonly CovariateVariable[];
  fetch(query: CellQuery, signal?: AbortSignal): Promise<CovariateValues>;
}

/** Calendar-year window sent to the backends, inclusive on both ends */
export function yearWindow(year: number): { start: string; end: string } {
  return { start: `${year}-01-01`, end: `${year}-12-31` };
}

/** A record with every variable set to null */
export function absentValues(variables: readonly CovariateVariable[]): CovariateValues {
  const values: CovariateValues = {};
  for (const variable of variables) {
    values[variable] = null;
  }
  return values;
}

export function describeQuery(query: CellQuery): string {
  return `${query.lat.toFixed(6)},${query.lon.toFixed(6)},${query.year}`;
}
