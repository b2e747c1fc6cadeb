export interface RetryOptions {
  retries: number;
  delayMs: number;
  factor?: number;
  onRetry?: (error: unknown, attempt: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` up to `retries + 1` times. The delay grows by `factor` after each
 * failure; no delay follows the last attempt.
 */
export const withRetry = async <T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> => {
  let attempt = 0;
  const factor = options.factor ?? 1.8;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.retries) {
        throw error;
      }

      options.onRetry?.(error, attempt + 1);
      await sleep(Math.floor(options.delayMs * Math.pow(factor, attempt)));
      attempt += 1;
    }
  }
};
