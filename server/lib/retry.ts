import { TimeoutError } from "../errors";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type RetryOptions = {
  maxAttempts: number;
  delayMs: number;
  backoffMultiplier?: number;
  /** Errors rejected here are rethrown immediately. Defaults to retrying everything. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Retry an async operation with exponential backoff.
 *
 * @example
 * ```ts
 * const site = await withRetry(() => vendor.createSite(orgId, identity), {
 *   maxAttempts: 3,
 *   delayMs: 500,
 *   shouldRetry: (err) => err instanceof ConnectivityError,
 * });
 * ```
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxAttempts, delayMs, backoffMultiplier = 2, shouldRetry = () => true, onRetry } = options;
  const wait = options.sleep ?? sleep;

  let attempt = 1;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      // 500ms, 1s, 2s, ...
      const delay = delayMs * Math.pow(backoffMultiplier, attempt - 1);
      onRetry?.(attempt, error, delay);
      await wait(delay);
      attempt++;
    }
  }
}

/**
 * Reject with TimeoutError when `promise` has not settled within
 * `timeoutMs`. A non-positive timeout disables the limit. The underlying
 * operation is not cancelled; its eventual result is discarded.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  if (timeoutMs <= 0) return promise;

  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}
