/**
 * Retry with backoff for rate-limited backends.
 *
 * Two failure classes are handled differently:
 * - rate-limit signals back off exponentially (10s, 20s, ...) and, once
 *   the attempts run out, raise RateLimitExhaustedError so the scheduler
 *   can stop the whole run;
 * - any other error waits a short fixed delay and, once the attempts run
 *   out, degrades to the caller's all-absent fallback.
 */

import type { BackendId } from "@covariate-fetch/types";
import { RateLimitExhaustedError } from "../errors.js";
import { sleep as defaultSleep, type Sleep } from "../util/sleep.js";

export interface RetryPolicy {
  /** Total attempts, including the first (default: 3) */
  maxAttempts: number;
  /** First rate-limit backoff; doubles per attempt (default: 10000) */
  rateLimitBaseDelayMs: number;
  /** Fixed wait before retrying any other error (default: 5000) */
  errorDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  rateLimitBaseDelayMs: 10_000,
  errorDelayMs: 5_000,
};

export interface RetryOptions<T> {
  backend: BackendId;
  /** Subject of the request, used in log lines */
  label: string;
  policy: RetryPolicy;
  isRateLimit: (err: unknown) => boolean;
  /** Result returned when non-rate-limit errors exhaust the attempts */
  fallback: () => T;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export async function fetchWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T>,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const { maxAttempts, rateLimitBaseDelayMs, errorDelayMs } = options.policy;
  const tag = `[${options.backend}]`;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (err) {
      if (options.signal?.aborted) throw err;
      const lastAttempt = attempt === maxAttempts - 1;

      if (options.isRateLimit(err)) {
        if (lastAttempt) {
          console.error(
            `${tag} Rate limit exceeded after ${maxAttempts} attempts (${options.label})`,
          );
          throw new RateLimitExhaustedError(options.backend, maxAttempts);
        }
        const wait = rateLimitBaseDelayMs * 2 ** attempt;
        console.log(`${tag} Rate limited — sleeping ${wait / 1000}s...`);
        await sleep(wait, options.signal);
        continue;
      }

      if (lastAttempt) {
        console.warn(`${tag} Fetch failed for ${options.label}: ${describeError(err)}`);
        return options.fallback();
      }
      await sleep(errorDelayMs, options.signal);
    }
  }

  return options.fallback();
}

/**
 * Text-based rate-limit detection for backends that only report failures
 * as messages ("429", "Quota exceeded", "rate limit").
 */
export function messageLooksRateLimited(err: unknown): boolean {
  const msg = describeError(err).toLowerCase();
  return msg.includes("429") || msg.includes("quota") || msg.includes("rate");
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
