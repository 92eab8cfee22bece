export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  retries?: number;
  baseDelayMs?: number;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (err: unknown) => boolean;
}

/** Linear backoff: the n-th retry waits baseDelayMs * n. */
export const withRetry = async <T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> => {
  const retries = options.retries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 200;
  let lastError: unknown;
  for (let i = 0; i <= retries; i += 1) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (i === retries) break;
      if (options.shouldRetry && !options.shouldRetry(err)) break;
      await sleep(baseDelayMs * (i + 1));
    }
  }
  throw lastError;
};
