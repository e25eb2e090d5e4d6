/**
 * Status & Seek
 *
 * Read-only queries against the session registry.
 *
 * @module @execd/runtime/status
 */

import { InvalidRequestError, SessionNotFoundError } from "@execd/shared";
import { readFileRange } from "./tailer.js";
import type { SessionRegistry } from "./session-registry.js";
import type { CommandKernel, CommandStatus, SeekResult } from "./types.js";

export function toCommandStatus(kernel: CommandKernel): CommandStatus {
  return {
    sessionId: kernel.sessionId,
    content: kernel.content,
    running: kernel.running,
    pid: kernel.pid,
    exitCode: kernel.exitCode,
    signal: kernel.signal,
    errMsg: kernel.errMsg,
    startedAt: kernel.startedAt,
    finishedAt: kernel.finishedAt,
  };
}

/**
 * Point-in-time status of a session.
 *
 * @throws SessionNotFoundError for an unknown id
 */
export function getCommandStatus(registry: SessionRegistry, sessionId: string): CommandStatus {
  const kernel = registry.get(sessionId);
  if (!kernel) {
    throw new SessionNotFoundError(sessionId);
  }
  return toCommandStatus(kernel);
}

/**
 * Output captured since `cursor`, plus the cursor for the next call.
 *
 * Background sessions read their combined file; foreground sessions read
 * stdout. A cursor at or past the end yields an empty buffer and the same
 * cursor.
 *
 * @throws InvalidRequestError for an unknown id or a malformed cursor
 */
export async function seekCommandOutput(
  registry: SessionRegistry,
  sessionId: string,
  cursor: number,
): Promise<SeekResult> {
  if (!Number.isSafeInteger(cursor) || cursor < 0) {
    throw new InvalidRequestError(`invalid cursor: ${cursor}`);
  }
  const kernel = registry.get(sessionId);
  if (!kernel) {
    throw new InvalidRequestError(`command session not found: ${sessionId}`);
  }

  // Snapshot before reading: if the session had already finished, the
  // file is complete and reaching its end means the output was drained.
  const finished = !kernel.running;
  const path = kernel.combinedPath ?? kernel.stdoutPath;

  let output: Buffer;
  try {
    output = await readFileRange(path, cursor);
  } catch (err) {
    if (isMissingFile(err)) {
      output = Buffer.alloc(0);
    } else {
      throw err;
    }
  }

  if (finished && !kernel.outputDrainedAt && registry.has(sessionId)) {
    registry.update(sessionId, { outputDrainedAt: new Date() });
  }

  return { output, cursor: cursor + output.length };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
