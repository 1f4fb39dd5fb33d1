import {
  ConversationDocument,
  PollResult,
  RedactedConversation,
  RedactedTurn,
  RunReport
} from '../types/domain';

// Redaction service operations - the job state machine only talks to this
export interface IRedactionClient {
  submit(document: ConversationDocument, signal?: AbortSignal): Promise<string>;
  poll(operationHandle: string, signal?: AbortSignal): Promise<PollResult>;
  fetchResult(operationHandle: string, signal?: AbortSignal): Promise<RedactedTurn[]>;
}

// Turns one input file into canonical documents
export interface IInputAdapter {
  supports(fileName: string): boolean;
  load(filePath: string): Promise<ConversationDocument[]>;
}

// Output artifacts double as the idempotency marker
export interface IOutputRepository {
  prepare(): Promise<void>;
  shouldProcess(documentId: string): Promise<boolean>;
  write(conversation: RedactedConversation): Promise<string>;
}

// Shared across every job in a run
export interface IRunSummary {
  recordSuccess(fileId: string): void;
  recordFailure(fileId: string, reason: string): void;
  recordSkip(fileId: string): void;
  report(): RunReport;
}

// Logging interface
export interface ILogger {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

// Configuration interface
export interface IConfiguration {
  get(key: string): string | undefined;
  getNumber(key: string, defaultValue?: number): number;
  getFloat(key: string, defaultValue?: number): number;
  getBoolean(key: string, defaultValue?: boolean): boolean;
}
