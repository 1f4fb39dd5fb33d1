import { computeDelay, decideRetry, executeWithRetry, isTransientRequestError } from '../src/services/RetryPolicy';
import { ILogger } from '../src/interfaces/services';
import { RequestRetrySettings } from '../src/types/domain';
import { CancelledError, IntegrityError, RequestError } from '../src/types/errors';

// Mock logger
const mockLogger: ILogger = {
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn()
};

const noJitter = () => 0;

describe('RetryPolicy', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('computeDelay', () => {
    test('should grow exponentially from the base delay', () => {
      expect(computeDelay(1, 1000, 2, undefined, { random: noJitter })).toBe(1000);
      expect(computeDelay(2, 1000, 2, undefined, { random: noJitter })).toBe(2000);
      expect(computeDelay(3, 1000, 2, undefined, { random: noJitter })).toBe(4000);
    });

    test('should never decrease as attempts increase', () => {
      const delays = [1, 2, 3, 4, 5, 6].map((attempt) =>
        computeDelay(attempt, 500, 1.5, undefined, { random: noJitter, maxDelayMs: 2000 })
      );
      for (let i = 1; i < delays.length; i++) {
        expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1]);
      }
    });

    test('should cap the delay at maxDelayMs', () => {
      expect(computeDelay(10, 1000, 2, undefined, { random: noJitter, maxDelayMs: 3000 })).toBe(3000);
    });

    test('should add at most jitterFraction of the delay on top', () => {
      expect(computeDelay(1, 1000, 2, undefined, { random: () => 0.5, jitterFraction: 0.25 })).toBe(1125);
      expect(computeDelay(1, 1000, 2, undefined, { random: () => 0.999, jitterFraction: 0.25 })).toBeLessThan(1250);
    });

    test('should honor a wait hint that is longer than the computed delay', () => {
      expect(computeDelay(1, 1000, 2, 5000, { random: noJitter })).toBe(5000);
      expect(computeDelay(1, 1000, 2, 5000, { random: noJitter, maxDelayMs: 2000 })).toBe(5000);
    });

    test('should ignore a wait hint shorter than the computed delay', () => {
      expect(computeDelay(2, 1000, 2, 100, { random: noJitter })).toBe(2000);
    });
  });

  describe('decideRetry', () => {
    const backoff = { baseDelayMs: 1000, backoffFactor: 2, jitterFraction: 0 };

    test('should fail immediately on a non-retryable error', () => {
      const decision = decideRetry(1, 5, new Error('bad input'), () => false, backoff);
      expect(decision).toEqual({ action: 'fail', reason: 'bad input' });
    });

    test('should fail once the attempt budget is used up', () => {
      const decision = decideRetry(3, 3, new Error('boom'), () => true, backoff);
      expect(decision).toEqual({ action: 'fail', reason: 'boom (gave up after 3 attempts)' });
    });

    test('should retry with a backoff delay while attempts remain', () => {
      const decision = decideRetry(2, 3, new Error('boom'), () => true, backoff, noJitter);
      expect(decision).toEqual({ action: 'retry', delayMs: 2000 });
    });

    test('should use Retry-After from a RequestError as the delay floor', () => {
      const error = RequestError.transient('throttled', { status: 429, retryAfterMs: 7000 });
      const decision = decideRetry(1, 3, error, isTransientRequestError, backoff, noJitter);
      expect(decision).toEqual({ action: 'retry', delayMs: 7000 });
    });
  });

  describe('isTransientRequestError', () => {
    test('should only accept transient request errors', () => {
      expect(isTransientRequestError(RequestError.transient('503'))).toBe(true);
      expect(isTransientRequestError(RequestError.permanent('400'))).toBe(false);
      expect(isTransientRequestError(new IntegrityError('mismatch'))).toBe(false);
      expect(isTransientRequestError(new Error('plain'))).toBe(false);
    });
  });

  describe('executeWithRetry', () => {
    const settings: RequestRetrySettings = {
      maxAttempts: 3,
      backoff: { baseDelayMs: 100, backoffFactor: 2, jitterFraction: 0 }
    };

    test('should return the result after transient failures', async () => {
      const task = jest.fn()
        .mockRejectedValueOnce(RequestError.transient('HTTP 503'))
        .mockRejectedValueOnce(RequestError.transient('HTTP 503'))
        .mockResolvedValueOnce('ok');
      const sleep = jest.fn().mockResolvedValue(undefined);

      const result = await executeWithRetry(task, {
        operation: 'poll',
        settings,
        logger: mockLogger,
        sleep,
        random: noJitter
      });

      expect(result).toBe('ok');
      expect(task).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200]);
      expect(mockLogger.warn).toHaveBeenCalledTimes(2);
    });

    test('should rethrow a permanent error without retrying', async () => {
      const permanent = RequestError.permanent('HTTP 400', { status: 400 });
      const task = jest.fn().mockRejectedValue(permanent);
      const sleep = jest.fn().mockResolvedValue(undefined);

      await expect(
        executeWithRetry(task, { operation: 'submit', settings, logger: mockLogger, sleep })
      ).rejects.toBe(permanent);
      expect(task).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    test('should surface a transient error once attempts are exhausted', async () => {
      const task = jest.fn().mockRejectedValue(RequestError.transient('HTTP 503', { status: 503 }));
      const sleep = jest.fn().mockResolvedValue(undefined);

      const attempt = executeWithRetry(task, { operation: 'poll', settings, logger: mockLogger, sleep });

      await expect(attempt).rejects.toThrow('poll failed: HTTP 503 (gave up after 3 attempts)');
      await expect(attempt).rejects.toMatchObject({ kind: 'transient', status: 503 });
      expect(task).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    test('should not start when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const task = jest.fn().mockResolvedValue('ok');

      await expect(
        executeWithRetry(task, { operation: 'poll', settings, logger: mockLogger, signal: controller.signal })
      ).rejects.toBeInstanceOf(CancelledError);
      expect(task).not.toHaveBeenCalled();
    });
  });
});
