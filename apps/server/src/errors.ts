import type { ErrorKind } from "@streamscribe/shared";

export type RecognitionErrorKind = Extract<ErrorKind, "timeout" | "backpressure" | "model_failure">;

/**
 * Base for every error the server reports to clients. `code` doubles as the
 * outbound `error.kind`.
 */
export class StreamscribeError extends Error {
  readonly code: ErrorKind;

  constructor(code: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Fragment-level; the fragment is dropped and the session continues. */
export class DecodeError extends StreamscribeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("decode_error", message, options);
  }
}

/**
 * Window-level failure. Returned by the dispatcher as a value, never thrown at callers.
 */
export class RecognitionError extends StreamscribeError {
  readonly kind: RecognitionErrorKind;

  constructor(kind: RecognitionErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.kind = kind;
  }

  get retryable(): boolean {
    return this.kind === "timeout" || this.kind === "backpressure";
  }
}

export class SessionFatalError extends StreamscribeError {
  constructor(message: string) {
    super("session_fatal", message);
  }
}

export class SessionClosedError extends StreamscribeError {
  constructor(sessionId: string) {
    super("session_closed", `Session ${sessionId} is closed.`);
  }
}

export class SessionNotFoundError extends StreamscribeError {
  constructor(sessionId: string) {
    super("not_found", `Session ${sessionId} not found (it may have expired).`);
  }
}

export class UnsupportedLanguageError extends StreamscribeError {
  constructor(language: string, supported: readonly string[]) {
    super(
      "unsupported_language",
      `Unsupported language "${language}". Expected one of: ${supported.join(", ")}.`,
    );
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
