import { ILogger } from '../interfaces/services';
import { BackoffSettings, RequestRetrySettings } from '../types/domain';
import { CancelledError, RequestError, toError } from '../types/errors';
import { sleep as defaultSleep, Sleeper } from '../utils/sleep';

export const DEFAULT_JITTER_FRACTION = 0.25;

export interface DelayOptions {
  jitterFraction?: number;
  maxDelayMs?: number;
  random?: () => number;   // [0, 1) - injectable so tests can pin the jitter
}

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'fail'; reason: string };

/**
 * Exponential backoff with jitter.
 *
 * `baseDelayMs * backoffFactor^(attempt - 1)`, capped at `maxDelayMs` when given, plus up to
 * `jitterFraction` of that on top. A service-provided hint is a floor, and may exceed the cap.
 */
export function computeDelay(
  attempt: number,
  baseDelayMs: number,
  backoffFactor: number,
  retryAfterHintMs?: number,
  options: DelayOptions = {}
): number {
  const jitterFraction = options.jitterFraction ?? DEFAULT_JITTER_FRACTION;
  const random = options.random ?? Math.random;

  const exponential = baseDelayMs * Math.pow(backoffFactor, Math.max(0, attempt - 1));
  const capped = options.maxDelayMs !== undefined ? Math.min(exponential, options.maxDelayMs) : exponential;
  const delay = capped + random() * capped * jitterFraction;

  if (retryAfterHintMs !== undefined && retryAfterHintMs > delay) {
    return retryAfterHintMs;
  }
  return delay;
}

// Pure decision: given how many attempts have been made and what went wrong, retry or give up
export function decideRetry(
  attempt: number,
  maxAttempts: number,
  error: Error,
  isRetryable: (error: Error) => boolean,
  backoff: BackoffSettings,
  random?: () => number
): RetryDecision {
  if (!isRetryable(error)) {
    return { action: 'fail', reason: error.message };
  }
  if (attempt >= maxAttempts) {
    return { action: 'fail', reason: `${error.message} (gave up after ${attempt} attempts)` };
  }

  const hint = error instanceof RequestError ? error.retryAfterMs : undefined;
  return {
    action: 'retry',
    delayMs: computeDelay(attempt, backoff.baseDelayMs, backoff.backoffFactor, hint, {
      jitterFraction: backoff.jitterFraction,
      maxDelayMs: backoff.maxDelayMs,
      random,
    }),
  };
}

// Request level: only transient transport/service errors are worth another try
export function isTransientRequestError(error: Error): boolean {
  return error instanceof RequestError && error.isTransient;
}

export interface ExecuteWithRetryOptions {
  operation: string;
  settings: RequestRetrySettings;
  logger: ILogger;
  signal?: AbortSignal;
  sleep?: Sleeper;
  random?: () => number;
}

/**
 * Runs `task` until it succeeds, fails permanently, or runs out of attempts.
 * Exhaustion rethrows the last error, which is always a transient RequestError at that point.
 */
export async function executeWithRetry<T>(
  task: () => Promise<T>,
  options: ExecuteWithRetryOptions
): Promise<T> {
  const { operation, settings, logger, signal } = options;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    try {
      return await task();
    } catch (caught) {
      const error = toError(caught);
      const decision = decideRetry(
        attempt,
        settings.maxAttempts,
        error,
        isTransientRequestError,
        settings.backoff,
        options.random
      );

      if (decision.action === 'fail') {
        if (isTransientRequestError(error)) {
          throw RequestError.transient(`${operation} failed: ${decision.reason}`, {
            status: error instanceof RequestError ? error.status : undefined,
          });
        }
        throw error;
      }

      logger.warn(`Transient error during ${operation}, retrying`, {
        attempt,
        maxAttempts: settings.maxAttempts,
        delayMs: Math.round(decision.delayMs),
        error: error.message,
      });
      await sleep(decision.delayMs, signal);
    }
  }
}
