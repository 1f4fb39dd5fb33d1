import { promises as fs } from 'fs';
import path from 'path';
import { IInputAdapter } from '../interfaces/services';
import { ConversationDocument, Turn } from '../types/domain';
import { AdapterError } from '../types/errors';
import { parseDelimited } from '../utils/DelimitedParser';

const TIMESTAMP_COLUMN = 'timestamp';
const PARTICIPANT_COLUMN = 'participant';
const TEXT_COLUMN = 'transcript';

/**
 * Reads one conversation per CSV file, e.g. with the default pipe delimiter:
 *
 *   Timestamp|Participant|Transcript
 *   2025-07-27 10:00:00.006 | [internal] | Good morning.
 *
 * Timestamp is optional; header names are matched case-insensitively.
 */
export class CsvAdapter implements IInputAdapter {
  constructor(private delimiter: string = '|') {}

  supports(fileName: string): boolean {
    return path.extname(fileName).toLowerCase() === '.csv';
  }

  async load(filePath: string): Promise<ConversationDocument[]> {
    const fileName = path.basename(filePath);
    const content = await fs.readFile(filePath, 'utf8');
    return [this.parse(fileName, content)];
  }

  parse(fileName: string, content: string): ConversationDocument {
    const [header, ...rows] = parseDelimited(content, this.delimiter);
    if (!header) {
      throw new AdapterError(fileName, 'file is empty');
    }

    const columns = header.map((name) => name.trim().toLowerCase());
    const column = (name: string): number => columns.indexOf(name);
    const timestampIndex = column(TIMESTAMP_COLUMN);
    const participantIndex = column(PARTICIPANT_COLUMN);
    const textIndex = column(TEXT_COLUMN);

    if (participantIndex === -1 || textIndex === -1) {
      throw new AdapterError(
        fileName,
        `header must contain Participant and Transcript columns (delimiter ${JSON.stringify(this.delimiter)})`
      );
    }

    const cell = (row: string[], index: number): string => (index === -1 ? '' : (row[index] ?? '').trim());

    const turns: Turn[] = [];
    rows.forEach((row, rowIndex) => {
      const timestamp = cell(row, timestampIndex);
      const participantId = cell(row, participantIndex);
      const text = cell(row, textIndex);

      if (!timestamp && !participantId && !text) return;
      if (!participantId) {
        throw new AdapterError(fileName, `row ${rowIndex + 2} is missing a participant`);
      }

      turns.push({ participantId, text, timestamp: timestamp || null });
    });

    if (turns.length === 0) {
      throw new AdapterError(fileName, 'no conversation turns found');
    }

    return {
      id: path.parse(fileName).name,
      sourceFile: fileName,
      turns,
    };
  }
}
