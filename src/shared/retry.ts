import pRetry, { AbortError } from "p-retry";
import type { RetryPolicy } from "../config/schema.js";
import { NetworkError, isRetryableStatus } from "./errors.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = { attempts: 3, baseDelayMs: 1000 };

/**
 * Transient failures are network errors without a status, or with one of
 * the retryable statuses. Everything else is final.
 */
export function isTransientError(error: unknown): boolean {
  return (
    error instanceof NetworkError &&
    (error.statusCode === undefined || isRetryableStatus(error.statusCode))
  );
}

/**
 * Runs an operation with exponential backoff (base delay, doubling) on
 * transient errors. Non-transient errors are rethrown unchanged on first sight.
 */
export async function retryTransient<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: {
    signal?: AbortSignal | undefined;
    onRetry?: ((error: unknown, attempt: number, retriesLeft: number) => void) | undefined;
  } = {}
): Promise<T> {
  const { signal, onRetry } = options;

  return pRetry(
    async (attempt) => {
      try {
        return await operation(attempt);
      } catch (error) {
        if (isTransientError(error)) throw error;
        throw new AbortError(error instanceof Error ? error : new Error(String(error)));
      }
    },
    {
      retries: Math.max(0, policy.attempts - 1),
      factor: 2,
      minTimeout: policy.baseDelayMs,
      maxTimeout: Math.max(policy.baseDelayMs, 1) * 32,
      randomize: false,
      onFailedAttempt: (error) => {
        if (error.retriesLeft > 0) {
          onRetry?.(error, error.attemptNumber, error.retriesLeft);
        }
      },
      ...(signal ? { signal } : {}),
    }
  );
}
