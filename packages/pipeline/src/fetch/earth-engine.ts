/**
 * Earth Engine binding for the vegetation-index source.
 *
 * Authenticates with a service-account private key, then evaluates
 * MODIS/061/MOD13Q1 NDVI reductions server-side. Everything the client
 * reports as an error arrives as a message string; the NDVI fetcher's
 * retry policy classifies those messages.
 */

import ee from "@google/earthengine";
import type { DateWindow, VegetationIndexSource } from "./ndvi.js";
import { NDVI_SCALE_METERS } from "./ndvi.js";

export const MODIS_NDVI_COLLECTION = "MODIS/061/MOD13Q1";
export const MODIS_NDVI_BAND = "NDVI";

export interface EarthEngineCredentials {
  /** Cloud project billed for Earth Engine requests */
  projectId: string;
  /** Parsed service-account key JSON */
  privateKey: object;
}

/**
 * Authenticate and initialize the Earth Engine client. Must complete
 * before any EarthEngineSource call.
 */
export async function initializeEarthEngine(credentials: EarthEngineCredentials): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    ee.data.authenticateViaPrivateKey(
      credentials.privateKey,
      () => resolve(),
      (message) => reject(new Error(`Earth Engine authentication failed: ${message}`)),
    );
  });

  await new Promise<void>((resolve, reject) => {
    ee.initialize(
      null,
      null,
      () => resolve(),
      (message) => reject(new Error(`Earth Engine initialization failed: ${message}`)),
      null,
      credentials.projectId,
    );
  });

  console.log(`[ndvi] Earth Engine initialized (project ${credentials.projectId})`);
}

function evaluate<T>(object: ee.ComputedObject<T>): Promise<T | undefined> {
  return new Promise((resolve, reject) => {
    object.evaluate((result, error) => {
      if (error) reject(new Error(error));
      else resolve(result);
    });
  });
}

export class EarthEngineSource implements VegetationIndexSource {
  private readonly collectionId: string;
  private readonly band: string;

  constructor(collectionId: string = MODIS_NDVI_COLLECTION, band: string = MODIS_NDVI_BAND) {
    this.collectionId = collectionId;
    this.band = band;
  }

  async countImages(window: DateWindow): Promise<number> {
    const size = await evaluate(this.collection(window).size());
    if (typeof size !== "number") {
      throw new Error(`Unexpected image count from Earth Engine: ${String(size)}`);
    }
    return size;
  }

  async regionMean(
    point: { lat: number; lon: number },
    window: DateWindow,
    radiusMeters: number,
  ): Promise<number | null> {
    const geometry = ee.Geometry.Point([point.lon, point.lat]).buffer(radiusMeters);
    const reduced = this.collection(window)
      .mean()
      .reduceRegion({ reducer: ee.Reducer.mean(), geometry, scale: NDVI_SCALE_METERS })
      .get(this.band);

    const value = await evaluate(reduced);
    if (value == null) return null;
    if (typeof value !== "number") {
      throw new Error(`Unexpected ${this.band} value from Earth Engine: ${String(value)}`);
    }
    return value;
  }

  private collection(window: DateWindow): ee.ImageCollection {
    return ee.ImageCollection(this.collectionId).filterDate(window.start, window.end).select(this.band);
  }
}
