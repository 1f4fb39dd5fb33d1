import { ILogger, IRunSummary } from '../interfaces/services';
import { FailureRecord, RunReport } from '../types/domain';

type Outcome = 'succeeded' | 'failed' | 'skipped';

/**
 * Append-only tally for one run. Every method is synchronous, so concurrent jobs
 * are serialized by the event loop; each id is recorded at most once.
 */
export class RunSummary implements IRunSummary {
  private outcomes = new Map<string, Outcome>();
  private failures: FailureRecord[] = [];

  constructor(private logger: ILogger) {}

  recordSuccess(fileId: string): void {
    this.record(fileId, 'succeeded');
  }

  recordFailure(fileId: string, reason: string): void {
    if (this.record(fileId, 'failed')) {
      this.failures.push({ fileId, reason });
    }
  }

  recordSkip(fileId: string): void {
    this.record(fileId, 'skipped');
  }

  report(): RunReport {
    let succeeded = 0;
    let failed = 0;
    let skipped = 0;
    for (const outcome of this.outcomes.values()) {
      if (outcome === 'succeeded') succeeded++;
      else if (outcome === 'failed') failed++;
      else skipped++;
    }

    return {
      total: this.outcomes.size,
      processed: succeeded + failed,
      succeeded,
      failed,
      skipped,
      failures: [...this.failures].sort((a, b) => a.fileId.localeCompare(b.fileId)),
    };
  }

  static format(report: RunReport): string[] {
    const lines = [
      `Done. ${report.succeeded} succeeded, ${report.failed} failed, ${report.skipped} skipped (already existed). ${report.total} total.`,
    ];
    for (const failure of report.failures) {
      lines.push(`  ✖ ${failure.fileId}: ${failure.reason}`);
    }
    return lines;
  }

  private record(fileId: string, outcome: Outcome): boolean {
    const existing = this.outcomes.get(fileId);
    if (existing !== undefined) {
      this.logger.warn(`Outcome for ${fileId} already recorded, ignoring`, { existing, attempted: outcome });
      return false;
    }
    this.outcomes.set(fileId, outcome);
    return true;
  }
}
