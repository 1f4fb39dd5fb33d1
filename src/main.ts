import { ApplicationContainer } from './container/DIContainer';
import { describeError } from './types/errors';

// Main entry point - one batch run over the input directory, then exit
async function runBatch(): Promise<void> {
  const container = new ApplicationContainer();
  const controller = new AbortController();

  try {
    container.initialize();
    const logger = container.getLogger();

    // Ctrl+C / docker stop: stop admitting files, let in-flight jobs wind down
    const shutdown = (signal: NodeJS.Signals) => {
      logger.warn(`Received ${signal}, cancelling run...`);
      controller.abort();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    const report = await container.getBatchRunner().run(controller.signal);

    if (report.failed > 0 || controller.signal.aborted) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error('Redaction run failed:', describeError(error));
    process.exitCode = 1;
  }
}

void runBatch();
