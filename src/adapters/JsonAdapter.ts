import { promises as fs } from 'fs';
import path from 'path';
import _ from 'lodash';
import { IInputAdapter } from '../interfaces/services';
import { ConversationDocument, JsonFieldMapping, Turn } from '../types/domain';
import { AdapterError, describeError } from '../types/errors';
import { fieldText, isRecord, resolvePath } from '../utils/FieldPath';

// Tried in order when no conversation path is configured (or it doesn't resolve)
const FALLBACK_ARRAY_KEYS = ['phrases', 'messages', 'conversation', 'items'];

export class JsonAdapter implements IInputAdapter {
  constructor(private mapping: JsonFieldMapping) {}

  supports(fileName: string): boolean {
    return path.extname(fileName).toLowerCase() === '.json';
  }

  async load(filePath: string): Promise<ConversationDocument[]> {
    const fileName = path.basename(filePath);
    const content = await fs.readFile(filePath, 'utf8');
    return this.parse(fileName, content);
  }

  parse(fileName: string, content: string): ConversationDocument[] {
    const data = this.parseJson(fileName, content);
    const baseId = path.parse(fileName).name;

    if (this.mapping.multiDocument && Array.isArray(data)) {
      const documents: ConversationDocument[] = [];
      data.forEach((element: unknown, index) => {
        if (!isRecord(element) && !Array.isArray(element)) return;
        const id = `${baseId}_${_.padStart(String(index + 1), 3, '0')}`;
        documents.push(this.buildDocument(fileName, element, id));
      });
      if (documents.length === 0) {
        throw new AdapterError(fileName, 'multi-document array contains no documents');
      }
      return documents;
    }

    return [this.buildDocument(fileName, data, baseId)];
  }

  private parseJson(fileName: string, content: string): unknown {
    const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new AdapterError(fileName, `invalid JSON: ${describeError(error)}`);
    }
  }

  private locateItems(root: unknown): unknown[] | undefined {
    if (Array.isArray(root)) return root;

    const resolved = resolvePath(root, this.mapping.conversationPath);
    if (Array.isArray(resolved)) return resolved;

    if (isRecord(root)) {
      for (const key of FALLBACK_ARRAY_KEYS) {
        const candidate = root[key];
        if (Array.isArray(candidate)) return candidate;
      }
    }
    return undefined;
  }

  private buildDocument(fileName: string, root: unknown, id: string): ConversationDocument {
    const items = this.locateItems(root);
    if (!items) {
      throw new AdapterError(
        fileName,
        "Could not locate conversation array in JSON document. Set JSON_CONVERSATION_PATH (e.g. 'phrases')."
      );
    }

    const { participantField, textField, timestampField } = this.mapping;
    const turns: Turn[] = [];

    items.forEach((item, index) => {
      if (!isRecord(item)) return;

      const participantId = fieldText(item[participantField]);
      const text = fieldText(item[textField]);
      const timestamp = timestampField ? fieldText(item[timestampField]) || null : null;

      if (!participantId && !text && !timestamp) return;
      if (!participantId) {
        throw new AdapterError(fileName, `${id}: item ${index + 1} is missing "${participantField}"`);
      }
      // An empty string is a valid utterance; an absent field is not
      if (item[textField] === undefined || item[textField] === null) {
        throw new AdapterError(fileName, `${id}: item ${index + 1} is missing "${textField}"`);
      }

      turns.push({ participantId, text, timestamp });
    });

    if (turns.length === 0) {
      throw new AdapterError(fileName, `${id}: no conversation turns found`);
    }

    return { id, sourceFile: fileName, turns };
  }
}
