/**
 * Wire Protocol Types - shared between the runtime and the HTTP layer.
 *
 * @module @execd/shared/protocol
 */

// ============================================================================
// Errors
// ============================================================================

/**
 * Application error codes carried in error envelopes.
 */
export const ErrorCodes = {
  INVALID_REQUEST: "InvalidRequest",
  MISSING_QUERY: "MissingQuery",
  NOT_FOUND: "NotFound",
  RUNTIME_ERROR: "RuntimeError",
  UNAUTHORIZED: "Unauthorized",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Error envelope returned for every failed request.
 */
export interface ErrorResponse {
  code: ErrorCode;
  message: string;
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Execution mode of a command session.
 *
 * - `command` blocks the caller and streams output live
 * - `background_command` returns the session id at once; output is polled
 */
export type CommandMode = "command" | "background_command";

/**
 * Body of `POST /command`.
 */
export interface RunCommandRequest {
  command: string;
  cwd?: string;
  background?: boolean;
}

/**
 * Response of `GET /command/status/:id`. Timestamps are ISO-8601.
 */
export interface CommandStatusResponse {
  id: string;
  content: string;
  running: boolean;
  pid?: number;
  exitCode?: number;
  signal?: string;
  error?: string;
  startedAt: string;
  finishedAt?: string;
}

/** Header carrying the next cursor on `GET /command/:id/logs`. */
export const TAIL_CURSOR_HEADER = "EXECD-COMMANDS-TAIL-CURSOR";

/** Header carrying the access token when the daemon requires one. */
export const ACCESS_TOKEN_HEADER = "X-EXECD-ACCESS-TOKEN";

// ============================================================================
// Streaming events
// ============================================================================

/**
 * Failure details for an `error` event.
 */
export interface ExecutionErrorInfo {
  /** Error class, e.g. `CommandExecError`. */
  name: string;
  /** Human-readable detail. */
  value: string;
}

/**
 * Events written to the foreground command stream, in order:
 * one `init`, any number of `stdout`/`stderr`, then exactly one
 * `execution_complete` or `error`.
 */
export type CommandEvent =
  | { type: "init"; sessionId: string; timestamp: number }
  | { type: "stdout"; text: string; timestamp: number }
  | { type: "stderr"; text: string; timestamp: number }
  | {
      type: "execution_complete";
      exitCode: number | null;
      signal: string | null;
      executionTimeMs: number;
      timestamp: number;
    }
  | { type: "error"; error: ExecutionErrorInfo; timestamp: number };

export type CommandEventType = CommandEvent["type"];
