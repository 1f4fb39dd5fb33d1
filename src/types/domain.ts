// Core domain interfaces and types

export interface Turn {
  participantId: string;
  text: string;
  timestamp: string | null;
}

export interface ConversationDocument {
  id: string;            // base name of the source file, plus _NNN for multi-document inputs
  sourceFile: string;
  turns: Turn[];
}

export type JobState =
  | 'pending'
  | 'submitting'
  | 'polling'
  | 'fetching'
  | 'succeeded'
  | 'failed';

export type OperationStatus = 'running' | 'succeeded' | 'failed';

export interface PollResult {
  status: OperationStatus;
  waitHintMs?: number;
  error?: string;
}

export interface RedactedTurn {
  id: string;
  text: string;
}

// Shape of the JSON artifact written per document
export interface RedactedConversation {
  id: string;
  metadata: Record<string, unknown>;
  conversation: RedactedTurnRecord[];
}

export interface RedactedTurnRecord {
  timestamp: string | null;
  participant: string;
  text: string;
}

export type JobOutcome =
  | { status: 'succeeded'; documentId: string; attempts: number; conversation: RedactedConversation }
  | { status: 'failed'; documentId: string; attempts: number; error: Error }
  | { status: 'cancelled'; documentId: string; attempts: number };

export interface BackoffSettings {
  baseDelayMs: number;
  backoffFactor: number;
  jitterFraction: number;
  maxDelayMs?: number;
}

export interface RequestRetrySettings {
  maxAttempts: number;
  backoff: BackoffSettings;
}

export interface RedactionServiceSettings {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  language: string;
  redactionCharacter: string;
  timeoutMs: number;
  retry: RequestRetrySettings;
}

export interface JobSettings {
  maxFileRetries: number;
  fileRetryBackoff: BackoffSettings;
  initialPollIntervalMs: number;
  maxPollIntervalMs: number;
  pollBackoffFactor: number;
  pollTimeoutMs: number;
}

export interface JsonFieldMapping {
  conversationPath?: string;
  participantField: string;
  textField: string;
  timestampField?: string;
  multiDocument: boolean;
}

export interface InputSettings {
  inputDir: string;
  outputDir: string;
  csvDelimiter: string;
  jsonMapping: JsonFieldMapping;
}

export interface FailureRecord {
  fileId: string;
  reason: string;
}

export interface RunReport {
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  failures: FailureRecord[];
}
