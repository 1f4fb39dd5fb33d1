import { promises as fs } from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { IInputAdapter, ILogger, IOutputRepository, IRunSummary } from "./interfaces/services";
import { ConversationDocument, RunReport } from "./types/domain";
import { AdapterError, describeError } from "./types/errors";
import { JobScheduler } from "./services/JobScheduler";
import { RunSummary } from "./services/RunSummary";

export interface BatchRunnerOptions {
  inputDir: string;
}

// The batch run - discovers input files, turns them into documents and feeds the scheduler.
// Safe to re-run: documents with an existing output artifact are skipped.
export class BatchRunner {
  constructor(
    private options: BatchRunnerOptions,
    private adapters: IInputAdapter[],
    private outputRepository: IOutputRepository,
    private scheduler: JobScheduler,
    private logger: ILogger
  ) {}

  async run(signal?: AbortSignal): Promise<RunReport> {
    const runId = uuidv4();
    const summary = new RunSummary(this.logger);

    await this.outputRepository.prepare();
    const files = await this.discoverFiles();

    if (files.length === 0) {
      this.logger.info("No CSV or JSON files found to process.", { inputDir: this.options.inputDir });
      return summary.report();
    }

    this.logger.info(`Processing ${files.length} file(s)`, { runId, inputDir: this.options.inputDir });
    await this.scheduler.run(this.documents(files, summary, signal), summary, signal);

    const report = summary.report();
    for (const line of RunSummary.format(report)) {
      this.logger.info(line);
    }
    this.logger.info("Run finished", {
      runId,
      peakConcurrency: this.scheduler.getPeakInFlight(),
      cancelled: signal?.aborted ?? false,
    });
    return report;
  }

  private async discoverFiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.options.inputDir);
    } catch (error) {
      this.logger.error(`Failed to read input directory ${this.options.inputDir}`, error);
      throw new Error(`Failed to read input directory: ${describeError(error)}`);
    }

    return entries
      .filter((name) => this.adapters.some((adapter) => adapter.supports(name)))
      .sort();
  }

  // Streams documents lazily so the scheduler can start on the first file while later ones are still unread
  private async *documents(
    files: string[],
    summary: IRunSummary,
    signal?: AbortSignal
  ): AsyncGenerator<ConversationDocument> {
    const seenIds = new Map<string, string>();

    for (const fileName of files) {
      if (signal?.aborted) return;

      const adapter = this.adapters.find((candidate) => candidate.supports(fileName));
      if (!adapter) continue;

      let documents: ConversationDocument[];
      try {
        documents = await adapter.load(path.join(this.options.inputDir, fileName));
      } catch (error) {
        // Bad input only costs this file, never the batch
        const reason =
          error instanceof AdapterError
            ? error.message
            : `Failed to read '${fileName}': ${describeError(error)}`;
        this.logger.warn(`✖ Could not read '${fileName}'`, { error: reason });
        summary.recordFailure(fileName, reason);
        continue;
      }

      for (const document of documents) {
        const owner = seenIds.get(document.id);
        if (owner !== undefined) {
          summary.recordFailure(
            fileName,
            `Document id '${document.id}' is already produced by '${owner}'`
          );
          continue;
        }
        seenIds.set(document.id, fileName);

        let shouldProcess: boolean;
        try {
          shouldProcess = await this.outputRepository.shouldProcess(document.id);
        } catch (error) {
          const reason = `Could not check existing output for '${document.id}': ${describeError(error)}`;
          this.logger.warn(`✖ ${reason}`);
          summary.recordFailure(document.id, reason);
          continue;
        }

        if (!shouldProcess) {
          this.logger.info(`↷ Skipping '${document.id}' because '${document.id}.json' already exists in output`);
          summary.recordSkip(document.id);
          continue;
        }

        yield document;
      }
    }
  }
}
