/**
 * Session Registry implementations.
 *
 * @module @execd/runtime/session-registry
 */

import { InvalidRequestError, SessionNotFoundError } from "@execd/shared";
import type { CommandKernel, KernelPatch } from "./types.js";

/**
 * Session registry protocol - the single source of truth for command state.
 */
export interface SessionRegistry {
  /** Insert a new kernel. Throws on a duplicate id. */
  register(kernel: CommandKernel): void;
  /** Get kernel by session ID. */
  get(sessionId: string): CommandKernel | undefined;
  /** Apply a patch and return the new snapshot. Throws if the id is unknown. */
  update(sessionId: string, patch: KernelPatch): CommandKernel;
  /** Remove a kernel. */
  delete(sessionId: string): boolean;
  /** List all kernels. */
  list(): CommandKernel[];
  /** Check if session exists. */
  has(sessionId: string): boolean;
  readonly size: number;
}

/**
 * In-memory session registry.
 *
 * Every update stores a new frozen object instead of mutating the old one.
 * Mutations run to completion on the event loop, so a concurrent status
 * query sees either the old snapshot or the new one.
 *
 * @example
 * ```typescript
 * const registry = new InMemorySessionRegistry();
 * const runner = new CommandRunner({ registry, outputDir: "/tmp/execd" });
 * ```
 */
export class InMemorySessionRegistry implements SessionRegistry {
  private kernels = new Map<string, CommandKernel>();

  register(kernel: CommandKernel): void {
    if (this.kernels.has(kernel.sessionId)) {
      throw new InvalidRequestError(`command session already exists: ${kernel.sessionId}`);
    }
    this.kernels.set(kernel.sessionId, Object.freeze({ ...kernel }));
  }

  get(sessionId: string): CommandKernel | undefined {
    return this.kernels.get(sessionId);
  }

  update(sessionId: string, patch: KernelPatch): CommandKernel {
    const existing = this.kernels.get(sessionId);
    if (!existing) {
      throw new SessionNotFoundError(sessionId);
    }
    const next: CommandKernel = Object.freeze({ ...existing, ...patch });
    this.kernels.set(sessionId, next);
    return next;
  }

  delete(sessionId: string): boolean {
    return this.kernels.delete(sessionId);
  }

  list(): CommandKernel[] {
    return Array.from(this.kernels.values());
  }

  has(sessionId: string): boolean {
    return this.kernels.has(sessionId);
  }

  get size(): number {
    return this.kernels.size;
  }

  /**
   * Drop every kernel. Running processes are not touched.
   */
  clear(): void {
    this.kernels.clear();
  }
}
