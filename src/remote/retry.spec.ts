import { InvalidRetryCountError, MAX_RETRIES, RetryFailedError, backoffDelay, withRetry } from './retry';
import { RemoteRequestError, TransientRemoteError } from './remote.errors';

describe('withRetry', () => {
  let waits: number[];
  const sleep = async (ms: number) => {
    waits.push(ms);
  };

  beforeEach(() => {
    waits = [];
  });

  it('returns the first successful value with the attempt count', async () => {
    let calls = 0;
    const outcome = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new TransientRemoteError('busy', 503);
        return 'run-1';
      },
      { maxRetries: 3, baseDelayMs: 1000, sleep },
    );

    expect(outcome).toEqual({ value: 'run-1', attempts: 3 });
    expect(waits).toEqual([2000, 4000]);
  });

  it('makes exactly maxRetries + 1 attempts with 2^n second waits', async () => {
    const operation = jest.fn(async (attempt: number) => {
      throw new TransientRemoteError(`attempt ${attempt} failed`);
    });

    const failure = await withRetry(operation, { maxRetries: 3, baseDelayMs: 1000, sleep }).catch(
      (err: unknown) => err,
    );

    expect(failure).toBeInstanceOf(RetryFailedError);
    expect(failure).toMatchObject({ attempts: 4, message: 'attempt 4 failed' });
    expect(operation).toHaveBeenCalledTimes(4);
    expect(waits).toEqual([2000, 4000, 8000]);
    expect(waits.reduce((a, b) => a + b, 0)).toBe(14_000);
  });

  it('makes a single attempt when retry is disabled', async () => {
    const operation = jest.fn(async () => {
      throw new TransientRemoteError('down');
    });

    await expect(
      withRetry(operation, { maxRetries: 3, retry: false, baseDelayMs: 1000, sleep }),
    ).rejects.toMatchObject({ attempts: 1 });
    expect(waits).toEqual([]);
  });

  it('does not retry non-transient errors', async () => {
    const operation = jest.fn(async () => {
      throw new RemoteRequestError('HTTP 404', 404);
    });

    await expect(withRetry(operation, { maxRetries: 5, baseDelayMs: 10, sleep })).rejects.toMatchObject({
      attempts: 1,
      message: 'HTTP 404',
    });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('honours a caller-supplied retry count and predicate', async () => {
    const operation = jest.fn(async () => {
      throw new Error('flaky');
    });

    await expect(
      withRetry(operation, { maxRetries: 1, baseDelayMs: 5, sleep, isRetryable: () => true }),
    ).rejects.toMatchObject({ attempts: 2 });
    expect(waits).toEqual([10]);
  });

  it.each([Number('abc'), -1, 2.5, Infinity, 1_000_000])(
    'refuses a retry count of %p without attempting',
    async (maxRetries) => {
      const operation = jest.fn(async () => {
        throw new TransientRemoteError('busy', 503);
      });

      await expect(withRetry(operation, { maxRetries, baseDelayMs: 1000, sleep })).rejects.toBeInstanceOf(
        InvalidRetryCountError,
      );
      expect(operation).not.toHaveBeenCalled();
      expect(waits).toEqual([]);
    },
  );

  it('accepts the largest allowed retry count', async () => {
    const operation = jest.fn(async () => {
      throw new TransientRemoteError('busy', 503);
    });

    await expect(withRetry(operation, { maxRetries: MAX_RETRIES, baseDelayMs: 0, sleep })).rejects.toMatchObject({
      attempts: MAX_RETRIES + 1,
    });
  });

  it('ignores the retry count when retry is disabled', async () => {
    const operation = jest.fn(async () => 'ok');

    await expect(
      withRetry(operation, { maxRetries: Number('abc'), retry: false, baseDelayMs: 0, sleep }),
    ).resolves.toEqual({ value: 'ok', attempts: 1 });
  });
});

describe('backoffDelay', () => {
  it('doubles per retry', () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, 1000))).toEqual([2000, 4000, 8000, 16000]);
  });
});
