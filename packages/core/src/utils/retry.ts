interface RetryInput<T> {
  run: (attempt: number) => Promise<T>;
  maxAttempts: number;
  delayMs: number;
  /** 1 keeps the delay fixed; 2 doubles it after every failure. */
  multiplier?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Retries `run` up to `maxAttempts` times in total, rethrowing the last error. */
export async function retryWithBackoff<T>(input: RetryInput<T>): Promise<T> {
  const multiplier = input.multiplier ?? 2;
  const isRetryable = input.isRetryable ?? (() => true);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await input.run(attempt);
    } catch (error) {
      if (attempt >= input.maxAttempts || !isRetryable(error)) {
        throw error;
      }

      const delayMs = input.delayMs * Math.pow(multiplier, attempt - 1);
      input.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
