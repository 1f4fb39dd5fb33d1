import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError } from '../types/errors';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

// Abortable timer. Rejects with CancelledError so callers don't have to know about AbortError.
export const sleep: Sleeper = async (ms, signal) => {
  if (signal?.aborted) {
    throw new CancelledError();
  }
  try {
    await delay(Math.max(0, ms), undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    throw error;
  }
};
