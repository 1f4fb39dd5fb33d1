import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { JsonAdapter } from '../src/adapters/JsonAdapter';
import { JsonFieldMapping } from '../src/types/domain';

const defaultMapping: JsonFieldMapping = {
  participantField: 'participant',
  textField: 'text',
  multiDocument: false
};

describe('JsonAdapter', () => {
  const adapter = new JsonAdapter(defaultMapping);

  test('should only pick up .json files', () => {
    expect(adapter.supports('chat.json')).toBe(true);
    expect(adapter.supports('chat.JSON')).toBe(true);
    expect(adapter.supports('chat.csv')).toBe(false);
  });

  describe('parse', () => {
    test('should find a conversation under a well-known key', () => {
      const content = JSON.stringify({
        phrases: [
          { participant: 'agent', text: 'Hello, my name is John' },
          { participant: 'customer', text: 'Hi John' }
        ]
      });

      expect(adapter.parse('chat.json', content)).toEqual([
        {
          id: 'chat',
          sourceFile: 'chat.json',
          turns: [
            { participantId: 'agent', text: 'Hello, my name is John', timestamp: null },
            { participantId: 'customer', text: 'Hi John', timestamp: null }
          ]
        }
      ]);
    });

    test('should accept a top-level array of turns', () => {
      const [document] = adapter.parse('chat.json', '[{"participant":"agent","text":"hi"}]');

      expect(document.turns).toEqual([{ participantId: 'agent', text: 'hi', timestamp: null }]);
    });

    test('should follow a configured path and field names', () => {
      const mapped = new JsonAdapter({
        conversationPath: 'payload.turns',
        participantField: 'speaker',
        textField: 'utterance',
        timestampField: 'time',
        multiDocument: false
      });
      const content = JSON.stringify({
        payload: { turns: [{ speaker: 'agent', utterance: 'hi', time: '10:00' }, { speaker: 7, utterance: 'yo' }] }
      });

      const [document] = mapped.parse('chat.json', content);

      expect(document.turns).toEqual([
        { participantId: 'agent', text: 'hi', timestamp: '10:00' },
        { participantId: '7', text: 'yo', timestamp: null }
      ]);
    });

    test('should skip items that carry nothing', () => {
      const [document] = adapter.parse('chat.json', '[{}, "noise", {"participant":"agent","text":"hi"}]');

      expect(document.turns).toHaveLength(1);
    });

    test('should tolerate a byte order mark', () => {
      const [document] = adapter.parse('chat.json', '\uFEFF[{"participant":"agent","text":"hi"}]');

      expect(document.id).toBe('chat');
    });

    test('should reject invalid JSON', () => {
      expect(() => adapter.parse('chat.json', '{')).toThrow(/^chat\.json: invalid JSON: /);
    });

    test('should explain how to point at the conversation array', () => {
      expect(() => adapter.parse('chat.json', '{"foo": 1}')).toThrow(
        "chat.json: Could not locate conversation array in JSON document. Set JSON_CONVERSATION_PATH (e.g. 'phrases')."
      );
    });

    test('should reject an item without a participant', () => {
      expect(() =>
        adapter.parse('chat.json', '[{"participant":"agent","text":"hi"},{"text":"who said this"}]')
      ).toThrow('chat.json: chat: item 2 is missing "participant"');
    });

    test('should reject an item without a text field', () => {
      expect(() => adapter.parse('chat.json', '[{"participant":"agent","text":"hi"},{"participant":"customer"}]')).toThrow(
        'chat.json: chat: item 2 is missing "text"'
      );
    });

    test('should accept an item whose text is empty', () => {
      const [document] = adapter.parse('chat.json', '[{"participant":"agent","text":""}]');

      expect(document.turns).toEqual([{ participantId: 'agent', text: '', timestamp: null }]);
    });

    test('should reject a conversation with no turns', () => {
      expect(() => adapter.parse('chat.json', '{"messages": []}')).toThrow('chat.json: chat: no conversation turns found');
    });
  });

  describe('multi-document files', () => {
    const multi = new JsonAdapter({ ...defaultMapping, multiDocument: true });

    test('should emit one document per element with numbered ids', () => {
      const content = JSON.stringify([
        { phrases: [{ participant: 'agent', text: 'first' }] },
        { phrases: [{ participant: 'agent', text: 'second' }] }
      ]);

      const documents = multi.parse('batch.json', content);

      expect(documents.map((document) => document.id)).toEqual(['batch_001', 'batch_002']);
      expect(documents[1].turns[0].text).toBe('second');
      expect(documents[1].sourceFile).toBe('batch.json');
    });

    test('should keep numbering by position when skipping non-conversation elements', () => {
      const content = JSON.stringify([1, { phrases: [{ participant: 'agent', text: 'only' }] }]);

      expect(multi.parse('batch.json', content).map((document) => document.id)).toEqual(['batch_002']);
    });

    test('should treat a top-level object as a single document', () => {
      const content = JSON.stringify({ phrases: [{ participant: 'agent', text: 'hi' }] });

      expect(multi.parse('single.json', content).map((document) => document.id)).toEqual(['single']);
    });

    test('should reject an array with no documents in it', () => {
      expect(() => multi.parse('batch.json', '[1, 2]')).toThrow('batch.json: multi-document array contains no documents');
    });
  });

  describe('load', () => {
    let workDir: string;

    beforeEach(async () => {
      workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'redaction-json-'));
    });

    afterEach(async () => {
      await fs.rm(workDir, { recursive: true, force: true });
    });

    test('should read the file from disk', async () => {
      const filePath = path.join(workDir, 'chat.json');
      await fs.writeFile(filePath, '{"messages":[{"participant":"agent","text":"hi"}]}', 'utf8');

      const documents = await adapter.load(filePath);

      expect(documents.map((document) => document.id)).toEqual(['chat']);
    });
  });
});
