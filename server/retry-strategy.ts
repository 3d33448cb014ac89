/**
 * Retries for collaborator calls (embeddings, subject cropping, geocoding).
 *
 * Only failures whose error code is retryable get another attempt; invalid
 * input or a missing item fails on the first try. Every attempt waits
 * exponentially longer, capped and optionally jittered.
 */

import { AppError, ErrorCode, toAppError } from './error-handling';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitter?: boolean;
  defaultCode?: ErrorCode; // assigned to failures that are not AppErrors yet
  shouldRetry?: (error: AppError) => boolean;
  onRetry?: (attempt: number, delay: number, error: Error) => void;
}

type ResolvedRetryOptions = Required<RetryOptions>;

const DEFAULTS: ResolvedRetryOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  defaultCode: ErrorCode.INTERNAL_ERROR,
  shouldRetry: (error) => error.isRetryable(),
  onRetry: () => {},
};

/**
 * Wait before retry number `attempt + 1`; jitter spreads it by up to ±10%.
 */
export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
  const { initialDelayMs, maxDelayMs, backoffMultiplier, jitter } = { ...DEFAULTS, ...options };
  const base = Math.min(initialDelayMs * backoffMultiplier ** attempt, maxDelayMs);
  if (!jitter) return base;
  return base + (Math.random() - 0.5) * 0.2 * base;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, Math.round(ms)));

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts: ResolvedRetryOptions = { ...DEFAULTS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const failure = toAppError(error, opts.defaultCode);
      const exhausted = attempt >= opts.maxRetries;
      if (exhausted || !opts.shouldRetry(failure)) throw failure;

      const delay = backoffDelay(attempt, opts);
      opts.onRetry(attempt + 1, delay, failure.originalError ?? failure);
      await sleep(delay);
    }
  }
}

/**
 * `retryWithBackoff` that logs each retry under the collaborator's label.
 */
export async function callWithRetry<T>(
  label: string,
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  return retryWithBackoff(fn, {
    ...options,
    onRetry: (attempt, delay, error) => {
      console.warn(`[${label}] Retry ${attempt} in ${Math.round(delay)}ms after: ${error.message}`);
      options.onRetry?.(attempt, delay, error);
    },
  });
}

/**
 * Rejects with `errorCode` if `promise` has not settled within `timeoutMs`.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorCode: ErrorCode = ErrorCode.COLLABORATOR_TIMEOUT
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new AppError(errorCode, new Error(`No answer within ${timeoutMs}ms`))),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Retryable by code, unless the collaborator answered with a 4xx other than
 * 408 or 429: those come back the same on every attempt.
 */
export function isTransientFailure(error: AppError): boolean {
  const status = error.context?.httpStatus;
  if (typeof status === 'number' && status >= 400 && status < 500 && status !== 408 && status !== 429) {
    return false;
  }
  return error.isRetryable();
}

export type RetriedCollaborator = 'embedding' | 'preprocessing' | 'geocoding';

// A user is waiting on each of these, so retries stay few and short
export const COLLABORATOR_RETRY: Record<RetriedCollaborator, RetryOptions> = {
  embedding: {
    maxRetries: 2,
    initialDelayMs: 500,
    maxDelayMs: 5000,
    defaultCode: ErrorCode.COLLABORATOR_UNAVAILABLE,
    shouldRetry: isTransientFailure,
  },
  preprocessing: {
    maxRetries: 1,
    initialDelayMs: 1000,
    maxDelayMs: 5000,
    defaultCode: ErrorCode.COLLABORATOR_UNAVAILABLE,
    shouldRetry: isTransientFailure,
  },
  geocoding: {
    maxRetries: 1,
    initialDelayMs: 1000,
    maxDelayMs: 3000,
    defaultCode: ErrorCode.COLLABORATOR_UNAVAILABLE,
    shouldRetry: isTransientFailure,
  },
};
