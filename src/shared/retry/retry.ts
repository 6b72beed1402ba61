export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number;          // extra attempts after the first one (3 means up to 4 calls)
  minDelayMs: number;       // delay before the first retry
  maxDelayMs: number;       // cap applied to every computed delay
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
};

/**
 * Exponential backoff: `minDelayMs * 2^attempt`, capped at `maxDelayMs`.
 * `attempt` is zero-based. Non-finite intermediate values collapse to the cap.
 */
export const computeBackoffDelayMs = (args: { attempt: number; minDelayMs: number; maxDelayMs: number }): number => {
  const attempt = Math.max(0, Math.floor(args.attempt));
  const raw = args.minDelayMs * Math.pow(2, attempt);
  if (!Number.isFinite(raw)) return args.maxDelayMs;
  return Math.min(args.maxDelayMs, raw);
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2
  } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const backoff = customDelayMs != null
        ? Math.min(maxDelayMs, customDelayMs)
        : computeBackoffDelayMs({ attempt, minDelayMs, maxDelayMs });
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      const waitMs = backoff + jitter;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs);
      attempt += 1;
    }
  }
};
