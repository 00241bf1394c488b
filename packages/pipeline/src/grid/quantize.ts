/**
 * Grid quantization for fetch deduplication.
 *
 * Rounds coordinates onto a regular lat/lon grid so that many nearby
 * records collapse onto a single cell, fetched once per year. The grid
 * step is configured in kilometers and converted to degrees with a flat
 * 111 km/degree approximation (no latitude correction).
 */

import type { GeoPoint } from "@covariate-fetch/types";

/** Kilometers per degree used for the km → degree conversion */
export const KM_PER_DEGREE = 111;

/** Decimal places used when a quantized coordinate is written as text */
export const COORDINATE_PRECISION = 6;

/**
 * The resolution actually used for a backend: a grid finer than the
 * backend's native resolution is clamped up to that minimum.
 */
export function effectiveResolutionKm(
  gridSizeKm: number,
  minResolutionKm: number,
): number {
  return Math.max(gridSizeKm, minResolutionKm);
}

export function kmToDegrees(km: number): number {
  return km / KM_PER_DEGREE;
}

/**
 * Round a coordinate to the nearest multiple of `resolutionDeg`.
 *
 * Idempotent at a fixed resolution: quantizing an already-quantized value
 * returns the same value.
 */
export function quantizeCoordinate(value: number, resolutionDeg: number): number {
  return Math.round(value / resolutionDeg) * resolutionDeg;
}

/**
 * Map a point to the center of its grid cell.
 */
export function quantize(lat: number, lon: number, resolutionDeg: number): GeoPoint {
  return {
    lat: quantizeCoordinate(lat, resolutionDeg),
    lon: quantizeCoordinate(lon, resolutionDeg),
  };
}

/**
 * Fixed-precision text for a quantized coordinate.
 *
 * The same cell must always serialize identically across runs, so this
 * never relies on default number-to-string conversion, where float noise
 * leaks into the text (3 * 0.1 → "0.30000000000000004").
 */
export function formatCoordinate(value: number): string {
  const text = value.toFixed(COORDINATE_PRECISION);
  // -0.0000001 rounds to "-0.000000"; keep a single spelling for zero
  return Number(text) === 0 ? (0).toFixed(COORDINATE_PRECISION) : text;
}

/**
 * Deterministic cache key for a (year, cell) pair: "2020,34.009009,-118.243243".
 */
export function cellKey(year: number, lat: number, lon: number): string {
  return `${year},${formatCoordinate(lat)},${formatCoordinate(lon)}`;
}
