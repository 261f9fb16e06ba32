export type TextSyncErrorCode =
  | "MALFORMED_MESSAGE"
  | "STORE_UNAVAILABLE"
  | "SESSION_UNREACHABLE"
  | "OVERSIZED_CONTENT";

/**
 * Base class for every failure the sync server recovers from locally.
 * None of these is fatal to the process.
 */
export class TextSyncError extends Error {
  readonly code: TextSyncErrorCode;

  constructor(code: TextSyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Unparseable payload or a missing/ill-typed required field. */
export class MalformedMessageError extends TextSyncError {
  constructor(message: string) {
    super("MALFORMED_MESSAGE", message);
  }
}

export class StoreUnavailableError extends TextSyncError {
  constructor(message: string, cause?: unknown) {
    super("STORE_UNAVAILABLE", message, { cause });
  }
}

export class SessionUnreachableError extends TextSyncError {
  readonly sessionId: string;

  constructor(sessionId: string, message: string, cause?: unknown) {
    super("SESSION_UNREACHABLE", message, { cause });
    this.sessionId = sessionId;
  }
}

export class OversizedContentError extends TextSyncError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super("OVERSIZED_CONTENT", `Content is ${size} bytes, limit is ${limit}`);
    this.size = size;
    this.limit = limit;
  }
}
