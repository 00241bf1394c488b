/**
 * Climate fetcher backed by the Open-Meteo historical weather archive.
 *
 * One request per cell and year for daily max/min temperature and daily
 * precipitation, aggregated to an annual mean temperature (°C) and an
 * annual precipitation sum (mm).
 */

import axios, { type AxiosRequestConfig } from "axios";
import { z } from "zod";
import type { CellQuery, CovariateValues, CovariateVariable } from "@covariate-fetch/types";
import { RateLimitSignal } from "../errors.js";
import type { Sleep } from "../util/sleep.js";
import { absentValues, describeQuery, yearWindow, type CovariateFetcher } from "./fetcher.js";
import { DEFAULT_RETRY_POLICY, fetchWithRetry, type RetryPolicy } from "./retry.js";

export const DEFAULT_OPEN_METEO_ENDPOINT = "https://archive-api.open-meteo.com/v1/archive";
const DEFAULT_TIMEOUT_MS = 30_000;

const DAILY_VARIABLES = ["temperature_2m_max", "temperature_2m_min", "precipitation_sum"];

const dailySeries = z.array(z.number().nullable());

const archiveResponseSchema = z.object({
  daily: z
    .object({
      temperature_2m_max: dailySeries.optional(),
      temperature_2m_min: dailySeries.optional(),
      precipitation_sum: dailySeries.optional(),
    })
    .optional(),
});

export type ArchiveResponse = z.infer<typeof archiveResponseSchema>;

/** The slice of an axios response the fetcher reads */
export interface HttpResponse {
  status: number;
  statusText: string;
  data: unknown;
}

/** Injectable GET, for testability */
export type HttpGet = (url: string, config: AxiosRequestConfig) => Promise<HttpResponse>;

export interface ClimateFetcherOptions {
  endpoint?: string;
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
  httpGet?: HttpGet;
}

const VARIABLES: readonly CovariateVariable[] = ["temp_mean", "precip_sum"];

export class ClimateFetcher implements CovariateFetcher {
  readonly backend = "climate" as const;
  readonly name = "Open-Meteo Archive";
  readonly variables = VARIABLES;

  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly sleep: Sleep | undefined;
  private readonly httpGet: HttpGet;

  constructor(options: ClimateFetcherOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_OPEN_METEO_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
    this.httpGet = options.httpGet ?? ((url, config) => axios.get(url, config));
  }

  fetch(query: CellQuery, signal?: AbortSignal): Promise<CovariateValues> {
    return fetchWithRetry(() => this.fetchOnce(query, signal), {
      backend: this.backend,
      label: describeQuery(query),
      policy: this.retry,
      isRateLimit: (err) => err instanceof RateLimitSignal,
      fallback: () => absentValues(VARIABLES),
      sleep: this.sleep,
      signal,
    });
  }

  private async fetchOnce(query: CellQuery, signal?: AbortSignal): Promise<CovariateValues> {
    const { start, end } = yearWindow(query.year);
    const res = await this.httpGet(this.endpoint, {
      params: {
        latitude: query.lat,
        longitude: query.lon,
        start_date: start,
        end_date: end,
        daily: DAILY_VARIABLES.join(","),
        timezone: "UTC",
      },
      timeout: this.timeoutMs,
      signal,
      validateStatus: () => true,
    });

    if (res.status === 429) {
      throw new RateLimitSignal(`Open-Meteo ${res.status} ${res.statusText}`);
    }
    if (res.status < 200 || res.status >= 300) {
      throw new Error(`Open-Meteo API error: ${res.status} ${res.statusText}`);
    }

    const parsed = archiveResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new Error(`Unexpected Open-Meteo response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }

    return aggregateDaily(parsed.data);
  }
}

/** Reduce a daily archive response to the annual covariates. */
export function aggregateDaily(response: ArchiveResponse): CovariateValues {
  const daily = response.daily ?? {};
  return {
    temp_mean: meanDailyTemperature(daily.temperature_2m_max ?? [], daily.temperature_2m_min ?? []),
    precip_sum: sumPrecipitation(daily.precipitation_sum),
  };
}

/**
 * Mean of daily midpoints (max + min) / 2. Days missing either value are
 * excluded, not imputed. Null when no day has both.
 */
export function meanDailyTemperature(
  max: readonly (number | null)[],
  min: readonly (number | null)[],
): number | null {
  let total = 0;
  let days = 0;
  const n = Math.min(max.length, min.length);
  for (let i = 0; i < n; i++) {
    const hi = max[i];
    const lo = min[i];
    if (hi == null || lo == null) continue;
    total += (hi + lo) / 2;
    days++;
  }
  return days > 0 ? total / days : null;
}

/**
 * Annual precipitation sum.
 *
 * - series absent from the response → null
 * - otherwise the sum of the days that have a value; missing days count
 *   as zero
 * - a series that is present but empty, or holds only nulls → null, not 0
 */
export function sumPrecipitation(series: readonly (number | null)[] | undefined): number | null {
  if (series === undefined) return null;
  let total = 0;
  let days = 0;
  for (const value of series) {
    if (value == null) continue;
    total += value;
    days++;
  }
  return days > 0 ? total : null;
}
