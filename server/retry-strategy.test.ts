import { backoffDelay, isTransientFailure, retryWithBackoff, withTimeout } from './retry-strategy';
import { AppError, ErrorCode } from './error-handling';

const fast = { initialDelayMs: 1, maxDelayMs: 2, jitter: false };

describe('retryWithBackoff', () => {
  it('should retry transient failures until the call succeeds', async () => {
    let attempts = 0;
    const onRetry = vi.fn();

    const result = await retryWithBackoff(async () => {
      attempts++;
      if (attempts < 3) throw new AppError(ErrorCode.COLLABORATOR_UNAVAILABLE);
      return 'ok';
    }, { ...fast, onRetry });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should give up immediately on a permanent failure', async () => {
    let attempts = 0;

    await expect(
      retryWithBackoff(async () => {
        attempts++;
        throw new AppError(ErrorCode.INVALID_INPUT);
      }, fast)
    ).rejects.toMatchObject({ code: ErrorCode.INVALID_INPUT });
    expect(attempts).toBe(1);
  });

  it('should stop after maxRetries', async () => {
    let attempts = 0;

    await expect(
      retryWithBackoff(async () => {
        attempts++;
        throw new Error('socket hang up');
      }, { ...fast, maxRetries: 2, defaultCode: ErrorCode.COLLABORATOR_UNAVAILABLE })
    ).rejects.toMatchObject({ code: ErrorCode.COLLABORATOR_UNAVAILABLE });
    expect(attempts).toBe(3);
  });
});

describe('backoffDelay', () => {
  it('should double the delay per attempt up to the cap', () => {
    const options = { initialDelayMs: 100, maxDelayMs: 300, jitter: false };

    expect([0, 1, 2, 3].map((attempt) => backoffDelay(attempt, options))).toEqual([100, 200, 300, 300]);
  });

  it('should keep jitter within ten percent', () => {
    const delay = backoffDelay(0, { initialDelayMs: 1000 });

    expect(delay).toBeGreaterThanOrEqual(900);
    expect(delay).toBeLessThanOrEqual(1100);
  });
});

describe('withTimeout', () => {
  it('should pass through a result that arrives in time', async () => {
    expect(await withTimeout(Promise.resolve(5), 100)).toBe(5);
  });

  it('should reject with COLLABORATOR_TIMEOUT when the call is too slow', async () => {
    const never = new Promise<never>(() => {});
    await expect(withTimeout(never, 5)).rejects.toMatchObject({ code: ErrorCode.COLLABORATOR_TIMEOUT });
  });
});

describe('isTransientFailure', () => {
  const unavailable = (httpStatus?: number) =>
    new AppError(ErrorCode.COLLABORATOR_UNAVAILABLE, new Error('upstream'), httpStatus === undefined ? undefined : { httpStatus });

  it('should not retry client errors other than timeouts and rate limits', () => {
    expect(isTransientFailure(unavailable(401))).toBe(false);
    expect(isTransientFailure(unavailable(400))).toBe(false);
    expect(isTransientFailure(unavailable(408))).toBe(true);
    expect(isTransientFailure(unavailable(429))).toBe(true);
  });

  it('should fall back to the error code otherwise', () => {
    expect(isTransientFailure(unavailable(503))).toBe(true);
    expect(isTransientFailure(unavailable())).toBe(true);
    expect(isTransientFailure(new AppError(ErrorCode.INVALID_INPUT, new Error('bad')))).toBe(false);
  });
});
