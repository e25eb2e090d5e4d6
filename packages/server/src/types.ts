/**
 * Server Types for @execd/server
 *
 * @module @execd/server/types
 */

import type { CommandEvent } from "@execd/shared";

// ============================================================================
// SSE Types
// ============================================================================

/**
 * SSE writer interface.
 */
export interface SSEWriter {
  /** Write a command event */
  writeEvent(event: CommandEvent): void;
  /** Write a comment (keepalive) */
  writeComment(comment: string): void;
  /** Close the stream */
  close(): void;
  /** Check if closed */
  readonly closed: boolean;
}

/**
 * SSE writer options.
 */
export interface SSEWriterOptions {
  /** Keepalive interval in ms (default: 15000) */
  keepaliveInterval?: number;
}

// ============================================================================
// Router Types
// ============================================================================

export interface CommandRouterOptions {
  /**
   * Pause after a foreground command completes before the stream is closed,
   * so trailing events reach slow clients. Default: 1000ms.
   */
  gracefulShutdownMs?: number;

  /** SSE keepalive interval in ms. Default: 15000. 0 disables. */
  sseKeepaliveInterval?: number;

  /**
   * When set, every request must carry this value in the
   * `X-EXECD-ACCESS-TOKEN` header.
   */
  accessToken?: string;
}
