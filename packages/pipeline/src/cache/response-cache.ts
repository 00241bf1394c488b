/**
 * Persistent response cache, one JSON file per backend.
 *
 * Maps a cell key ("<year>,<lat>,<lon>") to the values fetched for that
 * cell. Entries are never evicted or refetched: key presence alone means
 * "already fetched", and a cached null is as final as a cached number.
 *
 * The whole mapping is rewritten on every flush; the scheduler flushes
 * after each batch so an interrupted run loses at most one batch of fetches.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import type { CovariateValues } from "@covariate-fetch/types";
import { CorruptCacheError } from "../errors.js";
import { writeFileAtomic } from "../io/atomic-write.js";

const measurement = z.number().finite().nullable().optional();

// Unknown value names fail the load
const cacheEntrySchema = z
  .object({
    ndvi: measurement,
    temp_mean: measurement,
    precip_sum: measurement,
  })
  .strict();

const cacheFileSchema = z.record(z.string(), cacheEntrySchema);

export class ResponseCache {
  readonly path: string;
  private readonly entries: Map<string, CovariateValues>;

  private constructor(path: string, entries: Map<string, CovariateValues>) {
    this.path = path;
    this.entries = entries;
  }

  /**
   * Load the cache at `path`, creating an empty cache file if none exists.
   *
   * @throws CorruptCacheError when the file exists but is not a valid cache
   */
  static load(path: string): ResponseCache {
    if (!existsSync(path)) {
      const cache = new ResponseCache(path, new Map());
      cache.flush();
      console.log(`[cache] Created empty cache: ${path}`);
      return cache;
    }

    const raw = readFileSync(path, "utf-8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CorruptCacheError(path, err instanceof Error ? err.message : String(err));
    }

    const parsed = cacheFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
      throw new CorruptCacheError(path, `${issue?.message ?? "invalid shape"}${where}`);
    }

    return new ResponseCache(path, new Map(Object.entries(parsed.data)));
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): CovariateValues | undefined {
    return this.entries.get(key);
  }

  /** Insert or overwrite. Re-putting the same key is harmless. */
  put(key: string, values: CovariateValues): void {
    this.entries.set(key, { ...values });
  }

  /** Persist the full mapping to disk. */
  flush(): void {
    const doc: Record<string, CovariateValues> = {};
    for (const [key, values] of this.entries) {
      doc[key] = values;
    }
    writeFileAtomic(this.path, JSON.stringify(doc));
  }
}
