import { ILogger, IOutputRepository, IRunSummary } from '../interfaces/services';
import { ConversationDocument } from '../types/domain';
import { toError } from '../types/errors';
import { RedactionJob } from '../models/RedactionJob';

export type JobFactory = (document: ConversationDocument) => RedactionJob;

export interface JobSchedulerOptions {
  maxConcurrency: number;
}

// Runs redaction jobs with a hard cap on how many are in flight at once.
// Documents are admitted as they stream in from discovery, one per free slot.
export class JobScheduler {
  private readonly maxConcurrency: number;
  private inFlight = 0;
  private peakInFlight = 0;

  constructor(
    options: JobSchedulerOptions,
    private createJob: JobFactory,
    private outputRepository: IOutputRepository,
    private logger: ILogger
  ) {
    this.maxConcurrency = Math.max(1, Math.floor(options.maxConcurrency));
  }

  async run(
    documents: AsyncIterable<ConversationDocument> | Iterable<ConversationDocument>,
    summary: IRunSummary,
    signal?: AbortSignal
  ): Promise<void> {
    const running = new Set<Promise<void>>();

    try {
      for await (const document of documents) {
        if (signal?.aborted) {
          this.logger.warn('Run cancelled, no further documents will be admitted');
          break;
        }

        const task: Promise<void> = this.execute(document, summary, signal).finally(() => {
          running.delete(task);
        });
        running.add(task);

        if (running.size >= this.maxConcurrency) {
          await Promise.race(running);
        }
      }
    } finally {
      // Let whatever is in flight reach a terminal state even if discovery blew up
      await Promise.all(running);
    }
  }

  getPeakInFlight(): number {
    return this.peakInFlight;
  }

  getInFlight(): number {
    return this.inFlight;
  }

  private async execute(document: ConversationDocument, summary: IRunSummary, signal?: AbortSignal): Promise<void> {
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);

    try {
      const job = this.createJob(document);
      const outcome = await job.run(signal);

      switch (outcome.status) {
        case 'succeeded': {
          const outputPath = await this.outputRepository.write(outcome.conversation);
          summary.recordSuccess(document.id);
          this.logger.info(`✔ Processed '${document.sourceFile}' -> '${outputPath}'`, {
            documentId: document.id,
            attempts: outcome.attempts,
          });
          break;
        }
        case 'failed':
          summary.recordFailure(
            document.id,
            `Failed after ${outcome.attempts} attempt(s). Last error: ${outcome.error.message}`
          );
          this.logger.warn(`✖ Failed processing '${document.sourceFile}'`, {
            documentId: document.id,
            error: outcome.error.message,
          });
          break;
        case 'cancelled':
          summary.recordFailure(document.id, 'Cancelled before completion');
          break;
      }
    } catch (caught) {
      // Output write failures and anything unexpected still end up as a per-document outcome
      const error = toError(caught);
      this.logger.error(`Unexpected error processing ${document.id}`, error);
      summary.recordFailure(document.id, error.message);
    } finally {
      this.inFlight--;
    }
  }
}
