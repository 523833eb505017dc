import { log } from "./logging.ts";

export interface RetryOptions {
  /** Including the first try */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export function computeBackoffMs(attempt: number, opts: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>): number {
  const raw = opts.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(raw, opts.maxDelayMs);
}

/**
 * Calls the operation until it succeeds, re-running it from scratch each time.
 * Only errors matching `isRetryable` are retried; once attempts run out,
 * the last error is thrown.
 */
export async function callWithRetry<T>(
  operation: () => Promise<T>,
  isRetryable: (err: unknown) => boolean,
  opts: RetryOptions,
): Promise<T> {
  const sleep = opts.sleep ?? ((ms: number) => new Promise<void>(ok => setTimeout(ok, ms)));
  const maxAttempts = Math.max(1, opts.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!isRetryable(err) || attempt >= maxAttempts) throw err;

      const delayMs = computeBackoffMs(attempt, opts);
      log.warn(`Attempt ${attempt} of ${maxAttempts} failed, retrying in ${delayMs}ms: ${
        err instanceof Error ? err.message : String(err)}`);
      await sleep(delayMs);
    }
  }
}
