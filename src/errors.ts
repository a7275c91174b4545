/**
 * Structured error hierarchy for the GSP interpreter.
 *
 * All interpreter errors extend {@link GspError} to enable type-safe catch blocks
 * and programmatic matching on `code`:
 *
 * ```ts
 * const result = interpreter.processLine(line);
 * if (result.status === "rejected" && result.error instanceof UnknownMessageKindError) {
 *   console.warn(`skipping ${result.error.kind}`);
 * }
 * ```
 *
 * @module errors
 */

/** Base error for all interpreter errors. Includes an error code for programmatic matching. */
export class GspError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "GspError";
    this.code = code;
  }
}

/** A line that is not JSON, not an object, lacks a `type`, or fails its variant's schema. */
export class MalformedMessageError extends GspError {
  readonly issues: readonly string[];
  constructor(message: string, issues: readonly string[] = []) {
    super("MALFORMED_MESSAGE", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "MalformedMessageError";
    this.issues = issues;
  }
}

/** Valid JSON whose `type` discriminator names no known message kind. */
export class UnknownMessageKindError extends GspError {
  readonly kind: string;
  constructor(kind: string) {
    super("UNKNOWN_MESSAGE_KIND", `Unknown message kind "${kind}"`);
    this.name = "UnknownMessageKindError";
    this.kind = kind;
  }
}

/** A non-header message arrived before any header, or names a session that was never started. */
export class UninitializedSessionError extends GspError {
  readonly messageType: string;
  readonly sessionId?: string;
  constructor(messageType: string, sessionId?: string) {
    super(
      "UNINITIALIZED_SESSION",
      sessionId
        ? `"${messageType}" references session "${sessionId}" which was never initialized`
        : `"${messageType}" received before any streamHeader`,
    );
    this.name = "UninitializedSessionError";
    this.messageType = messageType;
    this.sessionId = sessionId;
  }
}

/** Thrown when a listener calls back into a mutating interpreter operation during dispatch. */
export class ReentrancyError extends GspError {
  readonly operation: string;
  constructor(operation: string) {
    super("REENTRANT_CALL", `${operation}() called from inside a listener while a message is being dispatched`);
    this.name = "ReentrancyError";
    this.operation = operation;
  }
}

/** Thrown when a second stream is consumed while one is still running on the same interpreter. */
export class InterpreterBusyError extends GspError {
  constructor() {
    super("INTERPRETER_BUSY", "Interpreter is already consuming a stream");
    this.name = "InterpreterBusyError";
  }
}

/** Thrown when configuration validation fails. */
export class ConfigValidationError extends GspError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("CONFIG_INVALID", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ConfigValidationError";
    this.field = field;
  }
}

/** Errors that reject a single message without halting the stream. */
export type MessageError = MalformedMessageError | UnknownMessageKindError | UninitializedSessionError;
