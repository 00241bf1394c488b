/**
 * Wires the configured backends to their real clients.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  ClimateFetcher,
  ConfigError,
  EarthEngineSource,
  NdviFetcher,
  initializeEarthEngine,
  type BackendSettings,
  type CovariateFetcher,
  type PipelineConfig,
  type VegetationIndexSource,
} from "@covariate-fetch/pipeline";

const serviceAccountKeySchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

/** Read and check a Google service-account key file */
export function readServiceAccountKey(path: string): z.infer<typeof serviceAccountKeySchema> {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError([
      `earthEngine.privateKeyPath: cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
  const parsed = serviceAccountKeySchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `earthEngine.privateKeyPath: ${path} ${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}

/** Authenticate with Earth Engine and return the MODIS NDVI source */
export async function connectEarthEngine(config: PipelineConfig): Promise<VegetationIndexSource> {
  const { projectId, privateKeyPath } = config.earthEngine;
  if (!projectId || !privateKeyPath) {
    const issues: string[] = [];
    if (!projectId) issues.push("earthEngine.projectId: required for NDVI (set EE_PROJECT_ID)");
    if (!privateKeyPath) {
      issues.push("earthEngine.privateKeyPath: required for NDVI (set EE_PRIVATE_KEY_PATH)");
    }
    throw new ConfigError(issues);
  }

  const privateKey = readServiceAccountKey(privateKeyPath);
  await initializeEarthEngine({ projectId, privateKey });
  return new EarthEngineSource();
}

export function createFetcherFactory(
  config: PipelineConfig,
  ndviSource?: VegetationIndexSource,
): (settings: BackendSettings) => CovariateFetcher {
  return (settings) => {
    if (settings.backend === "ndvi") {
      if (!ndviSource) {
        throw new Error("NDVI backend selected but Earth Engine is not connected");
      }
      return new NdviFetcher({
        source: ndviSource,
        resolutionKm: settings.resolutionKm,
        retry: config.retry,
      });
    }
    return new ClimateFetcher({
      endpoint: config.openMeteo.endpoint,
      timeoutMs: config.openMeteo.timeoutMs,
      retry: config.retry,
    });
  };
}
