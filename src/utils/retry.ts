import { ClusterOperationException } from "@/exceptions/PlannerException";
import { ClusterOperation } from "@/interfaces/cluster.interface";

export interface RetrySettings {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  // per call; a timed out call counts as a transient failure
  timeoutMs: number;
}

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise<void>(resolve => setTimeout(resolve, ms));

// attempt is 1-based: 1 -> base, 2 -> 2 * base, ... capped at max
export const backoffDelay = (attempt: number, baseDelayMs: number, maxDelayMs: number): number =>
  Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));

export const withRetry = async <T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
  const attempts = Math.max(1, options.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !options.isRetryable(error)) {
        throw error;
      }
      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
};

/**
 * Bounds the wait on a single cluster call. The call itself is not aborted;
 * cluster operations are idempotent, so a late completion is harmless.
 */
export const withTimeout = async <T>(operation: ClusterOperation, promise: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ClusterOperationException(operation, `timed out after ${timeoutMs}ms`, true)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};
