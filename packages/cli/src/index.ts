/**
 * covariate-fetch CLI.
 *
 * Usage: npx tsx packages/cli/src/index.ts [--data-dir ./data] [--grid-km 25]
 *
 * Exit codes: 0 completed or interrupted (progress saved), 2 rate limit
 * exhausted (progress saved), 1 fatal error, 130 forced quit.
 */

import { parseConfig, runCovariatePipeline } from "@covariate-fetch/pipeline";
import type { PipelineResult } from "@covariate-fetch/types";
import { USAGE, UsageError, configFromEnv, parseArgs } from "./args.js";
import { connectEarthEngine, createFetcherFactory } from "./fetchers.js";
import { createProgressReporter } from "./progress.js";
import { configBanner, exitCodeFor, runSummary } from "./report.js";

function installSignalHandlers(controller: AbortController): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      console.error(`\n[pipeline] ${signal} again — quitting without saving the current batch`);
      process.exit(130);
    }
    console.log(`\n[pipeline] ${signal} received — saving progress (press again to force quit)`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = parseConfig({ ...configFromEnv(process.env), ...args.config });
  for (const line of configBanner(config)) console.log(line);

  const ndviSource = config.backends.includes("ndvi")
    ? await connectEarthEngine(config)
    : undefined;

  const controller = new AbortController();
  installSignalHandlers(controller);
  const progress = createProgressReporter();

  let result: PipelineResult;
  try {
    result = await runCovariatePipeline(config, {
      createFetcher: createFetcherFactory(config, ndviSource),
      signal: controller.signal,
      onProgress: progress.onProgress,
    });
  } finally {
    progress.stop();
  }

  for (const line of runSummary(result)) console.log(line);
  return exitCodeFor(result.status);
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
    } else {
      console.error("[pipeline] Fatal:", error instanceof Error ? error.message : error);
    }
    process.exit(1);
  },
);
