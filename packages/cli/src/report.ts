/**
 * Console report lines: the startup banner and the end-of-run summary.
 */

import type { PipelineResult, RunStatus } from "@covariate-fetch/types";
import { resolveBackendSettings, type PipelineConfig } from "@covariate-fetch/pipeline";

function pct(n: number, total: number): string {
  if (total === 0) return "0.0%";
  return ((n / total) * 100).toFixed(1) + "%";
}

export function configBanner(config: PipelineConfig): string[] {
  const lines = [
    "=== Covariate Fetch ===",
    `Source:     ${config.sourcePath}`,
    `Checkpoint: ${config.checkpointPath}`,
    `Grid:       ${config.gridSizeKm} km`,
    `Mode:       ${config.sequential ? "sequential" : "concurrent"}`,
  ];
  for (const backend of config.backends) {
    const s = resolveBackendSettings(config, backend);
    lines.push(
      `  ${backend}: ${s.resolutionKm} km cells (${s.resolutionDeg.toFixed(6)}°), batch ${s.batchSize}, concurrency ${s.concurrency}`,
    );
    if (s.resolutionKm > config.gridSizeKm) {
      lines.push(
        `  Warning: ${config.gridSizeKm} km is finer than ${backend}'s native ${s.resolutionKm} km; using ${s.resolutionKm} km`,
      );
    }
  }
  return lines;
}

export function runSummary(result: PipelineResult): string[] {
  const stopped = result.stoppedBy ? ` (stopped by ${result.stoppedBy})` : "";
  const lines = ["", "=== Run Summary ===", `Status: ${result.status}${stopped}`];

  for (const b of result.backends) {
    lines.push(
      `  ${b.backend}: ${b.uniqueCells.toLocaleString()} cells, ${b.cacheHits.toLocaleString()} cached, ${b.fetched.toLocaleString()} fetched, ${b.batches} batches, ${(b.timeMs / 1000).toFixed(1)}s`,
    );
    if (b.skippedRows > 0) {
      lines.push(`    ${b.skippedRows.toLocaleString()} rows skipped (no numeric position/year)`);
    }
  }

  lines.push("", "=== Column Fill ===");
  for (const f of result.fill) {
    lines.push(`  ${f.column}: ${f.filled.toLocaleString()}/${f.total.toLocaleString()} (${pct(f.filled, f.total)})`);
  }

  if (result.status === "rate-limited") {
    lines.push("", "Rate limit exhausted. Progress is saved; rerun later to continue.");
  } else if (result.status === "interrupted") {
    lines.push("", "Interrupted. Progress is saved; rerun to continue.");
  }
  return lines;
}

export function exitCodeFor(status: RunStatus): number {
  return status === "rate-limited" ? 2 : 0;
}
