/**
 * Minimal typings for the parts of the Earth Engine JavaScript client the
 * NDVI source uses. The package ships no type declarations.
 */
declare module "@google/earthengine" {
  namespace ee {
    type EvaluateCallback<T> = (result: T | undefined, error?: string) => void;

    interface ComputedObject<T = unknown> {
      evaluate(callback: EvaluateCallback<T>): void;
    }

    interface Geometry extends ComputedObject {
      buffer(distance: number): Geometry;
    }

    interface Dictionary extends ComputedObject<Record<string, unknown>> {
      get(key: string): ComputedObject;
    }

    interface Reducer extends ComputedObject {}

    interface Image extends ComputedObject {
      reduceRegion(params: { reducer: Reducer; geometry: Geometry; scale: number }): Dictionary;
    }

    interface ImageCollection extends ComputedObject {
      filterDate(start: string, end: string): ImageCollection;
      select(band: string): ImageCollection;
      size(): ComputedObject<number>;
      mean(): Image;
    }

    function ImageCollection(id: string): ImageCollection;

    namespace Geometry {
      function Point(coords: [number, number]): Geometry;
    }

    namespace Reducer {
      function mean(): Reducer;
    }

    namespace data {
      function authenticateViaPrivateKey(
        privateKey: object,
        success: () => void,
        error: (message: string) => void,
      ): void;
    }

    function initialize(
      baseUrl: string | null,
      tileUrl: string | null,
      success: () => void,
      error: (message: string) => void,
      xsrfToken?: string | null,
      project?: string | null,
    ): void;
  }

  export = ee;
}
