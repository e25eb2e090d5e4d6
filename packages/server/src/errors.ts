/**
 * Error envelopes.
 *
 * Every failed request answers with `{ code, message }`. Errors raised on
 * purpose carry their own code and status; body-parser failures become
 * `InvalidRequest`; anything else is a `RuntimeError`.
 *
 * @module @execd/server/errors
 */

import type { ErrorRequestHandler, Response } from "express";
import { ErrorCodes, errorMessage, isExecdError, type ErrorResponse } from "@execd/shared";
import { Logger } from "@execd/runtime";

const log = Logger.for("HTTP");

/**
 * Map any thrown value to an HTTP status and error envelope.
 */
export function toErrorResponse(err: unknown): { status: number; body: ErrorResponse } {
  if (isExecdError(err)) {
    return { status: err.status, body: err.toJSON() };
  }
  if (isBodyParseError(err)) {
    return {
      status: 400,
      body: {
        code: ErrorCodes.INVALID_REQUEST,
        message: `error parsing request body: ${errorMessage(err)}`,
      },
    };
  }
  return {
    status: 500,
    body: { code: ErrorCodes.RUNTIME_ERROR, message: errorMessage(err) },
  };
}

export function sendError(res: Response, err: unknown): void {
  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    log.error({ err }, "request failed");
  } else {
    log.debug({ code: body.code, message: body.message }, "request rejected");
  }
  res.status(status).json(body);
}

/**
 * Terminal Express error handler.
 */
export function errorHandler(): ErrorRequestHandler {
  return (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    sendError(res, err);
  };
}

/** express.json() rejects malformed bodies with a 4xx `SyntaxError`. */
function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    err.type.startsWith("entity.") &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status < 500
  );
}
