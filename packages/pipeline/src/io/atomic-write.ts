/**
 * Whole-file overwrite via a temporary sibling and rename, so a crash
 * mid-write leaves the previous version in place instead of a torn file.
 */

import { mkdirSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

export function writeFileAtomic(filePath: string, contents: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  writeFileSync(tmpPath, contents, "utf-8");
  renameSync(tmpPath, filePath);
}
