import { ILogger, IRedactionClient } from '../interfaces/services';
import { ConversationDocument, JobOutcome, JobSettings, JobState, RedactedConversation } from '../types/domain';
import {
  AdapterError,
  CancelledError,
  PollTimeoutError,
  ServiceLogicFailure,
  toError
} from '../types/errors';
import { computeDelay, decideRetry } from '../services/RetryPolicy';
import { sleep as defaultSleep, Sleeper } from '../utils/sleep';
import { buildRedactedConversation } from './Conversation';

// Allowed lifecycle moves - anything else is a bug in this file
const TRANSITIONS: Record<JobState, JobState[]> = {
  pending: ['submitting'],
  submitting: ['polling', 'failed'],
  polling: ['polling', 'fetching', 'failed'],
  fetching: ['succeeded', 'failed'],
  succeeded: [],
  failed: ['pending'],
};

export interface RedactionJobDependencies {
  client: IRedactionClient;
  settings: JobSettings;
  logger: ILogger;
  sleep?: Sleeper;
  clock?: () => number;
  random?: () => number;
}

// File level: everything except bad input or a shutdown gets a fresh resubmission.
// A rejected request is not repeated as-is, but a new submission may still go through.
export function isFileRetryable(error: Error): boolean {
  return !(error instanceof CancelledError || error instanceof AdapterError);
}

/**
 * Drives one document through submit -> poll -> fetch against the redaction service.
 *
 * A failed attempt is never resumed: the operation handle is dropped and the whole
 * attempt starts over with a fresh submission, up to `maxFileRetries` attempts in total.
 * `run()` always resolves - failures come back as a `JobOutcome`.
 */
export class RedactionJob {
  private state: JobState = 'pending';
  private operationHandle?: string;
  private pollIntervalMs: number;
  private attemptCount = 0;
  private lastError?: Error;
  private readonly history: JobState[] = ['pending'];

  private readonly sleep: Sleeper;
  private readonly clock: () => number;

  constructor(
    public readonly document: ConversationDocument,
    private deps: RedactionJobDependencies
  ) {
    this.pollIntervalMs = deps.settings.initialPollIntervalMs;
    this.sleep = deps.sleep ?? defaultSleep;
    this.clock = deps.clock ?? Date.now;
  }

  async run(signal?: AbortSignal): Promise<JobOutcome> {
    const { settings, logger } = this.deps;
    const documentId = this.document.id;

    for (;;) {
      this.attemptCount++;

      try {
        const conversation = await this.runAttempt(signal);
        this.transition('succeeded');
        logger.info(`Redaction completed for ${documentId}`, { attempts: this.attemptCount });
        return { status: 'succeeded', documentId, attempts: this.attemptCount, conversation };
      } catch (caught) {
        const error = toError(caught);
        this.lastError = error;
        this.transition('failed');

        if (error instanceof CancelledError) {
          logger.warn(`Redaction cancelled for ${documentId}`, { state: this.history[this.history.length - 2] });
          return { status: 'cancelled', documentId, attempts: this.attemptCount };
        }

        const decision = decideRetry(
          this.attemptCount,
          settings.maxFileRetries,
          error,
          isFileRetryable,
          settings.fileRetryBackoff,
          this.deps.random
        );

        if (decision.action === 'fail') {
          logger.error(`Redaction failed for ${documentId}`, error);
          return { status: 'failed', documentId, attempts: this.attemptCount, error };
        }

        logger.warn(`Retrying ${documentId} from a fresh submission`, {
          attempt: this.attemptCount + 1,
          maxAttempts: settings.maxFileRetries,
          delayMs: Math.round(decision.delayMs),
          error: error.message,
        });

        try {
          await this.sleep(decision.delayMs, signal);
        } catch (sleepError) {
          if (sleepError instanceof CancelledError) {
            return { status: 'cancelled', documentId, attempts: this.attemptCount };
          }
          throw sleepError;
        }
        this.reset();
      }
    }
  }

  getState(): JobState {
    return this.state;
  }

  getAttemptCount(): number {
    return this.attemptCount;
  }

  getLastError(): Error | undefined {
    return this.lastError;
  }

  getOperationHandle(): string | undefined {
    return this.operationHandle;
  }

  getPollIntervalMs(): number {
    return this.pollIntervalMs;
  }

  getHistory(): readonly JobState[] {
    return this.history;
  }

  private async runAttempt(signal?: AbortSignal): Promise<RedactedConversation> {
    const { client, settings, logger } = this.deps;

    this.transition('submitting');
    const handle = await client.submit(this.document, signal);
    this.operationHandle = handle;
    this.transition('polling');

    const startedAt = this.clock();
    let pollCount = 0;

    for (;;) {
      if (this.clock() - startedAt > settings.pollTimeoutMs) {
        throw new PollTimeoutError(
          `Polling timed out after ${settings.pollTimeoutMs / 1000} seconds for ${handle}`
        );
      }

      const result = await client.poll(handle, signal);
      if (result.status === 'succeeded') break;
      if (result.status === 'failed') {
        throw new ServiceLogicFailure(result.error ?? 'Job failed');
      }

      // Never shrinks within an attempt; a wait hint can only push it up
      pollCount++;
      const next = computeDelay(
        pollCount,
        settings.initialPollIntervalMs,
        settings.pollBackoffFactor,
        result.waitHintMs,
        { jitterFraction: 0, maxDelayMs: settings.maxPollIntervalMs }
      );
      this.pollIntervalMs = Math.max(this.pollIntervalMs, next);

      logger.debug(`Job is still processing for ${this.document.id}`, {
        pollCount,
        nextPollMs: this.pollIntervalMs,
      });
      await this.sleep(this.pollIntervalMs, signal);
      this.transition('polling');
    }

    this.transition('fetching');
    const redacted = await client.fetchResult(handle, signal);
    return buildRedactedConversation(this.document, redacted);
  }

  private reset(): void {
    this.operationHandle = undefined;
    this.pollIntervalMs = this.deps.settings.initialPollIntervalMs;
    this.transition('pending');
  }

  private transition(next: JobState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal job transition ${this.state} -> ${next} for ${this.document.id}`);
    }
    this.state = next;
    this.history.push(next);
  }
}
