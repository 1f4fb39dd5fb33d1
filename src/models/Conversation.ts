import { ConversationDocument, RedactedConversation, RedactedTurn } from '../types/domain';
import { IntegrityError } from '../types/errors';

// Item ids sent to the service; the order check on fetch relies on them
export function turnItemId(index: number): string {
  return `conversationId_${index + 1}`;
}

/**
 * Checks that the service returned exactly the turns we submitted, in the same order.
 * A mismatch is never patched up - the job fails and gets resubmitted.
 */
export function assertTurnIntegrity(document: ConversationDocument, redacted: RedactedTurn[]): void {
  if (redacted.length !== document.turns.length) {
    throw new IntegrityError(
      `Expected ${document.turns.length} redacted turns for ${document.id}, got ${redacted.length}`
    );
  }

  redacted.forEach((turn, index) => {
    const expected = turnItemId(index);
    if (turn.id !== expected) {
      throw new IntegrityError(
        `Turn order mismatch for ${document.id} at position ${index + 1}: expected ${expected}, got ${turn.id}`
      );
    }
  });
}

// Merges redacted text back with the source participant and timestamp
export function buildRedactedConversation(
  document: ConversationDocument,
  redacted: RedactedTurn[]
): RedactedConversation {
  assertTurnIntegrity(document, redacted);

  return {
    id: document.id,
    metadata: {},
    conversation: document.turns.map((turn, index) => ({
      timestamp: turn.timestamp,
      participant: turn.participantId,
      text: redacted[index].text,
    })),
  };
}
