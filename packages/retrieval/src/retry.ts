import { createLogger, isRagError } from "@medrag/core";

const log = createLogger("retry");

export interface RetryOptions {
  /** extra attempts after the first one */
  retries: number;
  backoffMs: number;
  label: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryable(err: unknown): boolean {
  return isRagError(err) && err.retryable;
}

/**
 * Runs `operation`, retrying errors flagged `retryable` with a linear backoff.
 * Anything else, and the last failure, is rethrown unchanged.
 */
export async function withRetry<T>(operation: () => Promise<T>, opts: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (attempt >= opts.retries || !isRetryable(err)) throw err;

      const delay = opts.backoffMs * (attempt + 1);
      log.warn(`${opts.label} attempt ${attempt + 1} failed, retrying in ${delay}ms`, err);
      await sleep(delay);
    }
  }
}
