import { computeBackoffDelayMs } from "../../shared/retry/retry";

/**
 * What a job wants to happen after a failed run.
 * `newGroupId`: `undefined` keeps the current group, `null` removes it.
 */
export type RetryConstraint = {
  readonly shouldRetry: boolean;
  readonly newDelayMs?: number;
  readonly newPriority?: number;
  readonly newGroupId?: string | null;
};

export const RETRY: RetryConstraint = Object.freeze({ shouldRetry: true });

export const CANCEL: RetryConstraint = Object.freeze({ shouldRetry: false });

/**
 * Retry with exponential backoff based on how many times the job already ran.
 * The first retry (runCount = 1) waits `baseDelayMs`.
 */
export const createExponentialBackoff = (
  runCount: number,
  baseDelayMs: number,
  maxDelayMs: number = Number.MAX_SAFE_INTEGER
): RetryConstraint => {
  if (!Number.isFinite(baseDelayMs) || baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be a finite number >= 0. Received: ${String(baseDelayMs)}`);
  }

  return {
    shouldRetry: true,
    newDelayMs: computeBackoffDelayMs({ attempt: runCount - 1, minDelayMs: baseDelayMs, maxDelayMs })
  };
};
