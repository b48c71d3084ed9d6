import { sleep } from "../time";

export type RetryOptions = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Errors for which this returns false are rethrown immediately. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempts`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

/** Runs `task` with exponential backoff between attempts. */
export const retryWithBackoff = async <T>(
  task: () => T | Promise<T>,
  options: RetryOptions,
): Promise<T> => {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const maxDelay = options.maxDelayMs ?? options.baseDelayMs * 16;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await task();
    } catch (error) {
      lastError = error;
      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }
      if (attempt === attempts) {
        break;
      }
      const delayMs = Math.min(maxDelay, options.baseDelayMs * 2 ** (attempt - 1));
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }

  throw new RetryExhaustedError(attempts, lastError);
};
