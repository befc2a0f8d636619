import { setTimeout as sleep } from "node:timers/promises";
import { createLogger } from "./log.js";

const log = createLogger("retry");

export interface RetryOptions {
  /** Attempts including the first one. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitter: boolean;
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal;
  /** Used in log lines. */
  label?: string;
}

export const TRANSIENT_HTTP: Omit<RetryOptions, "isRetryable"> = {
  maxAttempts: 3,
  initialDelayMs: 250,
  maxDelayMs: 5_000,
  factor: 2,
  jitter: true,
};

/** Delay before retry number `attempt` (1-based). */
export function backoffDelay(
  attempt: number,
  opts: Pick<RetryOptions, "initialDelayMs" | "maxDelayMs" | "factor" | "jitter">,
  random: () => number = Math.random,
): number {
  const base = Math.min(opts.maxDelayMs, opts.initialDelayMs * opts.factor ** (attempt - 1));
  return opts.jitter ? Math.round(base * (0.5 + random())) : base;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= opts.maxAttempts || !opts.isRetryable(error) || opts.signal?.aborted) {
        if (attempt > 1) {
          log.warn("retry_exhausted", {
            label: opts.label,
            attempts: attempt,
            error: error instanceof Error ? error.message : String(error),
          });
        }
        throw error;
      }
      const delayMs = backoffDelay(attempt, opts);
      log.info("retry_scheduled", {
        label: opts.label,
        attempt,
        max_attempts: opts.maxAttempts,
        delay_ms: delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delayMs, undefined, { signal: opts.signal });
    }
  }
}
