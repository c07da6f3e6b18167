// Per-message error taxonomy. Every one of these is contained to the message
// (or poll cycle) that raised it.

export type ListenerErrorCode =
  | 'DECODE_ERROR'
  | 'PARSE_ERROR'
  | 'TIMESTAMP_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'TRANSIENT_IO_ERROR';

export class ListenerError extends Error {
  constructor(
    public readonly code: ListenerErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ListenerError';
  }
}

/** Frame could not be inflated or is not valid UTF-8. */
export class DecodeError extends ListenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_ERROR', message, options);
    this.name = 'DecodeError';
  }
}

/** Payload is not JSON, or matches none of the candidate message shapes. */
export class ParseError extends ListenerError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super('PARSE_ERROR', message, options);
    this.name = 'ParseError';
  }
}

export class TimestampError extends ListenerError {
  constructor(public readonly value: unknown) {
    super('TIMESTAMP_ERROR', `malformed timestamp: ${JSON.stringify(value) ?? String(value)}`);
    this.name = 'TimestampError';
  }
}

/** Store unreachable or a statement failed; the message's transaction was rolled back. */
export class PersistenceError extends ListenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_ERROR', message, options);
    this.name = 'PersistenceError';
  }
}

/** Feed hiccup during poll/receive. The subscriber sleeps and retries. */
export class TransientIOError extends ListenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_IO_ERROR', message, options);
    this.name = 'TransientIOError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
