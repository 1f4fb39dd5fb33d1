import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ILogger, IOutputRepository } from '../interfaces/services';
import { RedactedConversation } from '../types/domain';
import { describeError, hasErrorCode } from '../types/errors';

const TEMP_MARKER = '.tmp-';
const STALE_TEMP_FILE = /\.json\.tmp-[0-9a-f-]{36}$/;

// One JSON artifact per document. Its presence is what makes a re-run skip the document.
export class OutputRepository implements IOutputRepository {
  constructor(
    private outputDir: string,
    private logger: ILogger
  ) {}

  // Creates the output directory and clears temp files left behind by an interrupted run
  async prepare(): Promise<void> {
    try {
      await fs.mkdir(this.outputDir, { recursive: true });

      const entries = await fs.readdir(this.outputDir);
      const stale = entries.filter((name) => STALE_TEMP_FILE.test(name));
      await Promise.all(stale.map((name) => fs.rm(path.join(this.outputDir, name), { force: true })));

      if (stale.length > 0) {
        this.logger.info(`Removed ${stale.length} stale temp file(s) from ${this.outputDir}`);
      }
    } catch (error) {
      this.logger.error(`Failed to prepare output directory ${this.outputDir}`, error);
      throw new Error(`Failed to prepare output directory: ${describeError(error)}`);
    }
  }

  artifactPath(documentId: string): string {
    return path.join(this.outputDir, `${documentId}.json`);
  }

  async shouldProcess(documentId: string): Promise<boolean> {
    try {
      await fs.access(this.artifactPath(documentId));
      return false;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return true;
      throw error;
    }
  }

  // Write to a temp file then rename, so nobody ever sees a half-written artifact
  async write(conversation: RedactedConversation): Promise<string> {
    const target = this.artifactPath(conversation.id);
    const tmp = `${target}${TEMP_MARKER}${uuidv4()}`;

    try {
      await fs.writeFile(tmp, JSON.stringify(conversation, null, 4), 'utf8');
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      this.logger.error(`Failed to write output for ${conversation.id}`, error);
      throw new Error(`Failed to write output: ${describeError(error)}`);
    }

    this.logger.debug(`Output written`, { documentId: conversation.id, path: target });
    return target;
  }
}
