/**
 * NDVI fetcher.
 *
 * Annual mean of the MODIS 16-day NDVI composite over a buffered cell
 * center. The raw band is an integer reflectance scaled by 10000; the
 * fetcher returns the unit index (typically 0..1 over vegetated land).
 */

import type { CellQuery, CovariateValues, CovariateVariable } from "@covariate-fetch/types";
import type { Sleep } from "../util/sleep.js";
import { absentValues, describeQuery, yearWindow, type CovariateFetcher } from "./fetcher.js";
import {
  DEFAULT_RETRY_POLICY,
  fetchWithRetry,
  messageLooksRateLimited,
  type RetryPolicy,
} from "./retry.js";

/** Divisor turning the raw MODIS NDVI band into a unit index */
export const NDVI_SCALE_FACTOR = 10_000;

/** Native scale (meters) of the MODIS NDVI product */
export const NDVI_SCALE_METERS = 250;

export interface DateWindow {
  start: string;
  end: string;
}

/**
 * The vegetation-index backend as the fetcher sees it.
 *
 * Errors are reported by rejecting; rate-limit rejections are recognized
 * by their message ("429", "quota", "rate").
 */
export interface VegetationIndexSource {
  /** Number of images available in the window */
  countImages(window: DateWindow): Promise<number>;
  /**
   * Mean of the raw NDVI band over a circle around the point, or null when
   * the reduction produced no value.
   */
  regionMean(
    point: { lat: number; lon: number },
    window: DateWindow,
    radiusMeters: number,
  ): Promise<number | null>;
}

export interface NdviFetcherOptions {
  source: VegetationIndexSource;
  /** Effective grid resolution; the aggregation radius is half of it */
  resolutionKm: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

const VARIABLES: readonly CovariateVariable[] = ["ndvi"];

export class NdviFetcher implements CovariateFetcher {
  readonly backend = "ndvi" as const;
  readonly name = "MODIS NDVI (Earth Engine)";
  readonly variables = VARIABLES;

  private readonly source: VegetationIndexSource;
  private readonly radiusMeters: number;
  private readonly retry: RetryPolicy;
  private readonly sleep: Sleep | undefined;

  constructor(options: NdviFetcherOptions) {
    this.source = options.source;
    this.radiusMeters = (options.resolutionKm * 1000) / 2;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
  }

  fetch(query: CellQuery, signal?: AbortSignal): Promise<CovariateValues> {
    return fetchWithRetry(() => this.fetchOnce(query), {
      backend: this.backend,
      label: describeQuery(query),
      policy: this.retry,
      isRateLimit: messageLooksRateLimited,
      fallback: () => absentValues(VARIABLES),
      sleep: this.sleep,
      signal,
    });
  }

  private async fetchOnce(query: CellQuery): Promise<CovariateValues> {
    const window = yearWindow(query.year);

    const imageCount = await this.source.countImages(window);
    if (imageCount <= 0) return { ndvi: null };

    const mean = await this.source.regionMean(
      { lat: query.lat, lon: query.lon },
      window,
      this.radiusMeters,
    );
    if (mean == null) return { ndvi: null };

    return { ndvi: mean / NDVI_SCALE_FACTOR };
  }
}
