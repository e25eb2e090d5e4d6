/**
 * Interrupt Control
 *
 * @module @execd/runtime/interrupt
 */

import { SessionNotFoundError } from "@execd/shared";
import { Logger } from "./logger.js";
import type { SessionRegistry } from "./session-registry.js";

const log = Logger.for("Interrupt");

/**
 * Ask a running session's process to stop.
 *
 * Returns true when a termination request was sent, or recorded for a
 * process that is still starting (the runner applies it once the process
 * exists). Finished or already interrupted sessions are left alone. The
 * kernel flips to `running=false` only when the runner observes the exit.
 *
 * @throws SessionNotFoundError for an unknown id
 */
export function interruptCommand(registry: SessionRegistry, sessionId: string): boolean {
  const kernel = registry.get(sessionId);
  if (!kernel) {
    throw new SessionNotFoundError(sessionId);
  }
  if (!kernel.running || kernel.interruptRequested) {
    return false;
  }
  if (!kernel.handle) {
    registry.update(sessionId, { interruptRequested: true });
    log.info({ sessionId }, "interrupt requested before process start");
    return true;
  }

  const sent = kernel.handle.terminate();
  if (sent) {
    log.info({ sessionId, pid: kernel.pid }, "interrupt requested");
  }
  return sent;
}
