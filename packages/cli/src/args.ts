/**
 * Command-line flags and environment variables → raw pipeline config.
 *
 * Flags win over environment variables; parseConfig validates the result.
 */

import type { PipelineConfigInput } from "@covariate-fetch/pipeline";

export const USAGE = `Usage: covariate-fetch [options]

Options:
  --data-dir <dir>        Directory holding the panel, checkpoint and caches (default ./data)
  --source <file>         Source panel CSV (default <data-dir>/analysis_panel.csv)
  --grid-km <km>          Grid cell size in km (default 25)
  --only <ndvi|climate>   Run a single backend
  --sequential            One request in flight per backend
  -h, --help              Show this help

Environment:
  COVARIATE_DATA_DIR      Same as --data-dir
  COVARIATE_GRID_KM       Same as --grid-km
  EE_PROJECT_ID           Earth Engine cloud project (required for NDVI)
  EE_PRIVATE_KEY_PATH     Service-account key JSON (required for NDVI)
  OPEN_METEO_ENDPOINT     Override the Open-Meteo archive URL`;

/** Bad command line; reported with the usage text */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  help: boolean;
  config: PipelineConfigInput;
}

function parseNumber(flag: string, text: string): number {
  const n = Number(text);
  if (text.trim() === "" || !Number.isFinite(n)) {
    throw new UsageError(`${flag} expects a number, got "${text}"`);
  }
  return n;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const config: PipelineConfigInput = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
    const inline = flag === arg ? undefined : arg.slice(eq + 1);

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case "-h":
      case "--help":
        help = true;
        break;
      case "--sequential":
        config.sequential = true;
        break;
      case "--data-dir":
        config.dataDir = value();
        break;
      case "--source":
        config.sourcePath = value();
        break;
      case "--grid-km":
        config.gridSizeKm = parseNumber(flag, value());
        break;
      case "--only": {
        const backend = value();
        if (backend !== "ndvi" && backend !== "climate") {
          throw new UsageError(`--only expects "ndvi" or "climate", got "${backend}"`);
        }
        config.backends = [backend];
        break;
      }
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return { help, config };
}

export function configFromEnv(env: Readonly<Record<string, string | undefined>>): PipelineConfigInput {
  const config: PipelineConfigInput = {};
  if (env["COVARIATE_DATA_DIR"]) config.dataDir = env["COVARIATE_DATA_DIR"];
  // Left for parseConfig to reject when not numeric
  if (env["COVARIATE_GRID_KM"]) config.gridSizeKm = Number(env["COVARIATE_GRID_KM"]);

  const projectId = env["EE_PROJECT_ID"];
  const privateKeyPath = env["EE_PRIVATE_KEY_PATH"];
  if (projectId || privateKeyPath) {
    config.earthEngine = {
      ...(projectId ? { projectId } : {}),
      ...(privateKeyPath ? { privateKeyPath } : {}),
    };
  }
  if (env["OPEN_METEO_ENDPOINT"]) {
    config.openMeteo = { endpoint: env["OPEN_METEO_ENDPOINT"] };
  }
  return config;
}
