/**
 * SSE (Server-Sent Events) utilities.
 *
 * Every command event goes out as `event: message` with the JSON-encoded
 * event on its `data:` line.
 *
 * @module @execd/server/sse
 */

import type { CommandEvent } from "@execd/shared";
import type { SSEWriter, SSEWriterOptions } from "./types.js";

/**
 * Create an SSE writer for a response stream.
 *
 * Works with any writable stream that has write() and end() methods
 * (Node.js response, Express response, etc.).
 *
 * @example
 * ```typescript
 * router.post('/command', async (req, res) => {
 *   setSSEHeaders(res);
 *   const writer = createSSEWriter(res);
 *
 *   writer.writeEvent({ type: 'stdout', text: 'hello', timestamp: Date.now() });
 *   writer.close();
 * });
 * ```
 */
export function createSSEWriter(
  stream: { write: (data: string) => void; end: () => void },
  options: SSEWriterOptions = {},
): SSEWriter {
  const keepaliveInterval = options.keepaliveInterval ?? 15000;

  let closed = false;
  let keepaliveTimer: ReturnType<typeof setInterval> | undefined;

  const writer: SSEWriter = {
    writeEvent(event: CommandEvent): void {
      if (closed) return;

      const data = JSON.stringify(event);
      stream.write("event: message\n");
      stream.write(`data: ${data}\n\n`);
    },

    writeComment(comment: string): void {
      if (closed) return;
      stream.write(`: ${comment}\n\n`);
    },

    close(): void {
      if (closed) return;
      closed = true;

      if (keepaliveTimer) {
        clearInterval(keepaliveTimer);
      }

      stream.end();
    },

    get closed(): boolean {
      return closed;
    },
  };

  if (keepaliveInterval > 0) {
    keepaliveTimer = setInterval(() => writer.writeComment("keepalive"), keepaliveInterval);
  }

  return writer;
}

/**
 * Set SSE headers on a response.
 */
export function setSSEHeaders(res: {
  setHeader: (name: string, value: string) => void;
  flushHeaders?: () => void;
}): void {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering

  // Flush headers immediately so EventSource 'open' event fires
  if (res.flushHeaders) {
    res.flushHeaders();
  }
}

/**
 * Split an SSE body into the JSON payloads of its `data:` lines.
 * Keepalive comments are skipped.
 */
export function parseSSEEvents(body: string): CommandEvent[] {
  const events: CommandEvent[] = [];
  for (const frame of body.split("\n\n")) {
    const dataLine = frame.split("\n").find((line) => line.startsWith("data: "));
    if (!dataLine) continue;
    const parsed: unknown = JSON.parse(dataLine.slice("data: ".length));
    if (isCommandEvent(parsed)) events.push(parsed);
  }
  return events;
}

const EVENT_TYPES = new Set(["init", "stdout", "stderr", "execution_complete", "error"]);

function isCommandEvent(value: unknown): value is CommandEvent {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    EVENT_TYPES.has(value.type)
  );
}
