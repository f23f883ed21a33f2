export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export const withRetry = async <T>(
  fn: () => Promise<T>,
  retries = 3,
  baseDelayMs = 200
): Promise<T> => {
  let lastError: unknown;
  for (let i = 0; i <= retries; i += 1) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (i === retries) break;
      await sleep(baseDelayMs * (i + 1));
    }
  }
  throw lastError;
};

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

/**
 * Delay before the given 1-based attempt: the first retry is immediate, later ones
 * double from `baseDelayMs` up to `maxDelayMs`. Returns null once attempts are exhausted.
 *
 *   attempt 1 → 0, 2 → base, 3 → 2·base, 4 → 4·base … (capped)
 */
export const backoffDelay = (attempt: number, config: BackoffConfig): number | null => {
  if (attempt < 1 || attempt > config.maxAttempts) return null;
  if (attempt === 1) return 0;
  return Math.min(config.baseDelayMs * Math.pow(2, attempt - 2), config.maxDelayMs);
};
