/**
 * Error types surfaced by the pipeline.
 *
 * Everything here except RateLimitExhaustedError is fatal at startup:
 * the CLI reports it and exits without touching any persisted state.
 */

import type { BackendId } from "@covariate-fetch/types";

/** The response cache file exists but is not a valid cache document */
export class CorruptCacheError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Response cache ${path} is corrupt: ${reason}`);
    this.name = "CorruptCacheError";
    this.path = path;
  }
}

/** The checkpoint file exists but cannot be parsed as a table */
export class CorruptCheckpointError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Checkpoint ${path} is corrupt: ${reason}`);
    this.name = "CorruptCheckpointError";
    this.path = path;
  }
}

/** The source table is missing or lacks a required column */
export class InputTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputTableError";
  }
}

/** Configuration failed validation */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * A backend kept answering with rate-limit signals through every retry.
 * Continuing would only burn the remaining quota, so the scheduler stops
 * the whole run after flushing.
 */
export class RateLimitExhaustedError extends Error {
  readonly backend: BackendId;
  readonly attempts: number;

  constructor(backend: BackendId, attempts: number) {
    super(`${backend} rate limit exceeded after ${attempts} attempts`);
    this.name = "RateLimitExhaustedError";
    this.backend = backend;
    this.attempts = attempts;
  }
}

/**
 * Signal used by backends to mark a response as a rate-limit rejection,
 * as opposed to an ordinary failure.
 */
export class RateLimitSignal extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RateLimitSignal";
  }
}
