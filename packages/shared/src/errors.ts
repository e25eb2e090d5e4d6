/**
 * Error types shared by the runtime and the HTTP layer.
 *
 * Every error the daemon raises on purpose carries an application `code`
 * and the HTTP-like `status` it maps to. The HTTP layer turns anything that is
 * not an {@link ExecdError} into a `RuntimeError` envelope.
 *
 * @module @execd/shared/errors
 */

import { ErrorCodes, type ErrorCode } from "./protocol.js";

export abstract class ExecdError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  toJSON(): { code: ErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

/**
 * Malformed or missing request fields, or an unknown session on seek.
 */
export class InvalidRequestError extends ExecdError {
  readonly name = "InvalidRequestError";
  readonly code = ErrorCodes.INVALID_REQUEST;
  readonly status = 400;
}

/**
 * A required query parameter was absent.
 */
export class MissingQueryError extends ExecdError {
  readonly name = "MissingQueryError";
  readonly code = ErrorCodes.MISSING_QUERY;
  readonly status = 400;

  constructor(readonly parameter: string) {
    super(`missing query parameter: ${parameter}`);
  }
}

/**
 * Session id absent from the registry.
 */
export class SessionNotFoundError extends ExecdError {
  readonly name = "SessionNotFoundError";
  readonly code = ErrorCodes.NOT_FOUND;
  readonly status = 404;

  constructor(readonly sessionId: string) {
    super(`command session not found: ${sessionId}`);
  }
}

/**
 * Execution infrastructure failure (capture files, spawn plumbing).
 */
export class ExecutionError extends ExecdError {
  readonly name = "ExecutionError";
  readonly code = ErrorCodes.RUNTIME_ERROR;
  readonly status = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UnauthorizedError extends ExecdError {
  readonly name = "UnauthorizedError";
  readonly code = ErrorCodes.UNAUTHORIZED;
  readonly status = 401;

  constructor() {
    super("missing or invalid access token");
  }
}

export function isExecdError(value: unknown): value is ExecdError {
  return value instanceof ExecdError;
}

/**
 * Best-effort message extraction for logging and error envelopes.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
