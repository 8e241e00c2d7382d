import { TransientRemoteError } from './remote.errors';

/** Most retries a single call may ask for. */
export const MAX_RETRIES = 10;

export interface RetryOptions {
  /** Extra attempts after the first. Total attempts = maxRetries + 1. Integer, 0..MAX_RETRIES. */
  maxRetries: number;
  /** false = single attempt. */
  retry?: boolean;
  /** Wait before retry n (1-based) is 2^n × baseDelayMs. */
  baseDelayMs: number;
  isRetryable?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (retry: number, delayMs: number, err: unknown) => void;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export class RetryFailedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = 'RetryFailedError';
  }
}

export class InvalidRetryCountError extends Error {
  constructor(readonly value: unknown) {
    super(`max_retries must be an integer between 0 and ${MAX_RETRIES}, got ${String(value)}`);
    this.name = 'InvalidRetryCountError';
  }
}

export function checkRetryCount(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > MAX_RETRIES) {
    throw new InvalidRetryCountError(value);
  }
  return value;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isTransient(err: unknown): boolean {
  return err instanceof TransientRemoteError;
}

export function backoffDelay(retry: number, baseDelayMs: number): number {
  return 2 ** retry * baseDelayMs;
}

/**
 * Bounded exponential backoff. Non-retryable errors stop immediately; either way the
 * caller gets a RetryFailedError carrying the attempt count and the last error.
 * An out-of-range retry count rejects with InvalidRetryCountError before the first attempt.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const maxRetries = options.retry === false ? 0 : checkRetryCount(options.maxRetries);
  const isRetryable = options.isRetryable ?? isTransient;
  const wait = options.sleep ?? sleep;

  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return { value: await operation(attempt), attempts: attempt };
    } catch (err) {
      const retry = attempt;
      if (retry > maxRetries || !isRetryable(err)) {
        throw new RetryFailedError(attempt, err);
      }
      const delayMs = backoffDelay(retry, options.baseDelayMs);
      options.onRetry?.(retry, delayMs, err);
      await wait(delayMs);
    }
  }
}
