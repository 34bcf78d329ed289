import fc from 'fast-check';
import { retryWithBackoff } from '../src/utils/retryHelper';
import { NetworkError, isRetryable } from '../src/utils/errors';

describe('Property: retry with exponential backoff', () => {
  it('should succeed iff failures fit within the retry budget', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 0, max: 4 }),
        fc.integer({ min: 0, max: 3 }),
        async (failuresBeforeSuccess, maxRetries) => {
          let attemptCount = 0;

          const operation = async () => {
            attemptCount++;
            if (attemptCount <= failuresBeforeSuccess) {
              throw new Error('Network timeout');
            }
            return 'success';
          };

          const outcome = await retryWithBackoff(operation, {
            maxRetries,
            baseDelay: 1,
            operationName: 'test-operation',
          }).catch((error: Error) => error);

          if (failuresBeforeSuccess <= maxRetries) {
            expect(outcome).toBe('success');
            expect(attemptCount).toBe(failuresBeforeSuccess + 1);
          } else {
            expect(outcome).toBeInstanceOf(Error);
            expect(attemptCount).toBe(maxRetries + 1);
          }
        },
      ),
      { numRuns: 30 },
    );
  });

  it('should stop at the first non-retryable error', async () => {
    let attempts = 0;
    const operation = async (): Promise<string> => {
      attempts++;
      throw new NetworkError('HTTP 403 Forbidden', 'https://files.test/x', 403);
    };

    await expect(
      retryWithBackoff(operation, { maxRetries: 5, baseDelay: 1, shouldRetry: isRetryable }),
    ).rejects.toThrow('HTTP 403 Forbidden');
    expect(attempts).toBe(1);
  });

  it('should double the delay between attempts', async () => {
    jest.useFakeTimers();
    try {
      let attempts = 0;
      const promise = retryWithBackoff(
        async () => {
          attempts++;
          if (attempts < 4) throw new Error('flaky');
          return attempts;
        },
        { maxRetries: 3, baseDelay: 100 },
      );

      await jest.advanceTimersByTimeAsync(0);
      expect(attempts).toBe(1);
      await jest.advanceTimersByTimeAsync(99);
      expect(attempts).toBe(1);
      await jest.advanceTimersByTimeAsync(1);
      expect(attempts).toBe(2);
      await jest.advanceTimersByTimeAsync(199);
      expect(attempts).toBe(2);
      await jest.advanceTimersByTimeAsync(1);
      expect(attempts).toBe(3);
      await jest.advanceTimersByTimeAsync(400);

      await expect(promise).resolves.toBe(4);
    } finally {
      jest.useRealTimers();
    }
  });
});

describe('error classification', () => {
  it.each([
    [undefined, true],
    [408, true],
    [429, true],
    [500, true],
    [503, true],
    [400, false],
    [404, false],
  ])('status %p retryable=%p', (status, expected) => {
    expect(isRetryable(new NetworkError('x', 'https://files.test', status))).toBe(expected);
  });

  it('should never retry non-network errors', () => {
    expect(isRetryable(new Error('disk full'))).toBe(false);
  });
});
