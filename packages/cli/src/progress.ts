/**
 * Per-year batch progress bars.
 */

import cliProgress from "cli-progress";
import type { SingleBar } from "cli-progress";
import type { SchedulerEvent } from "@covariate-fetch/pipeline";

export interface ProgressReporter {
  onProgress: (event: SchedulerEvent) => void;
  stop: () => void;
}

export function createProgressReporter(): ProgressReporter {
  let bar: SingleBar | undefined;

  const stop = (): void => {
    bar?.stop();
    bar = undefined;
  };

  const onProgress = (event: SchedulerEvent): void => {
    if (event.type === "year-start") {
      stop();
      if (event.batches === 0) return;
      bar = new cliProgress.SingleBar(
        {
          format: "  {backend} {year}: {bar} {percentage}% | {value}/{total} batches | ETA: {eta}s",
          barCompleteChar: "█",
          barIncompleteChar: "░",
          hideCursor: true,
        },
        cliProgress.Presets.shades_classic,
      );
      bar.start(event.batches, 0, { backend: event.backend, year: event.year });
      return;
    }

    bar?.update(event.batch);
    if (event.batch === event.batches) stop();
  };

  return { onProgress, stop };
}
