import pRetry, { AbortError } from 'p-retry';
import { CallTimeoutError, PipelineError } from './errors';
import { logger as rootLogger } from './logger';
import type { Logger } from './logger';

export interface RetryPolicy {
  /** Total attempts, the first one included. */
  attempts: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions<E extends PipelineError> {
  label: string;
  policy: RetryPolicy;
  classify: (error: unknown) => E;
  logger?: Logger;
  /** Once aborted, no further attempt is started. */
  signal?: AbortSignal;
}

/**
 * Runs `operation` with exponential backoff. Every failure is passed through
 * `classify`; only errors it marks retryable are attempted again, and the
 * promise rejects with the classified error.
 */
export async function withRetry<T, E extends PipelineError>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<E>
): Promise<T> {
  const { label, policy, classify, signal } = options;
  const log = options.logger ?? rootLogger;

  return pRetry(
    async (attempt) => {
      try {
        return await operation(attempt);
      } catch (error) {
        const classified = classify(error);
        if (!classified.retryable || signal?.aborted) {
          throw new AbortError(classified);
        }
        throw classified;
      }
    },
    {
      retries: Math.max(0, policy.attempts - 1),
      factor: 2,
      minTimeout: policy.minDelayMs,
      maxTimeout: policy.maxDelayMs,
      signal,
      onFailedAttempt: (error) => {
        if (error.retriesLeft === 0) return;
        log.warn(
          {
            operation: label,
            attempt: error.attemptNumber,
            retriesLeft: error.retriesLeft,
            error: error.message,
          },
          'Retrying after failed attempt'
        );
      },
    }
  );
}

/** Rejects with `CallTimeoutError` when `operation` has not settled within `timeoutMs`. */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CallTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
