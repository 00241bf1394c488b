/**
 * Geographic utility types.
 */

/** A WGS84 point in decimal degrees */
export interface GeoPoint {
  lat: number;
  lon: number;
}

/** One fetch unit: a quantized grid-cell center for a calendar year */
export interface CellQuery extends GeoPoint {
  year: number;
}
