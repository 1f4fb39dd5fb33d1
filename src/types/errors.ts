// Error taxonomy for the redaction pipeline.
// Everything thrown inside a job is one of these by the time it reaches the job boundary.

export class RedactionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Malformed input or missing required field - never retried
export class AdapterError extends RedactionError {
  constructor(public readonly fileName: string, message: string) {
    super(`${fileName}: ${message}`);
  }
}

export type RequestErrorKind = 'transient' | 'permanent';

export interface RequestErrorDetails {
  status?: number;
  retryAfterMs?: number;
}

export class RequestError extends RedactionError {
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(
    public readonly kind: RequestErrorKind,
    message: string,
    details: RequestErrorDetails = {}
  ) {
    super(message);
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }

  static transient(message: string, details: RequestErrorDetails = {}): RequestError {
    return new RequestError('transient', message, details);
  }

  static permanent(message: string, details: RequestErrorDetails = {}): RequestError {
    return new RequestError('permanent', message, details);
  }

  get isTransient(): boolean {
    return this.kind === 'transient';
  }
}

// The service reported the operation itself as failed, or answered with something unusable
export class ServiceLogicFailure extends RedactionError {}

export class PollTimeoutError extends ServiceLogicFailure {}

// Redacted turns don't line up with what we submitted
export class IntegrityError extends RedactionError {}

export class CancelledError extends RedactionError {
  constructor(message: string = 'Operation cancelled') {
    super(message);
  }
}

// Errors raised by Node internals can come from another realm (vm contexts, test sandboxes),
// so nothing here relies on `instanceof Error`
export function describeError(error: unknown): string {
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Unknown error occurred';
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(describeError(error));
}
