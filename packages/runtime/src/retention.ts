/**
 * Output Retention
 *
 * Periodic cleanup of finished sessions. A session is removed (registry
 * entry and capture files) once all of these hold:
 * - it is no longer running
 * - it finished more than `retentionMs` ago
 * - its output was consumed: foreground sessions streamed it live,
 *   background sessions need one seek that reached the end after completion
 */

import { Logger } from "./logger.js";
import type { OutputCapture } from "./output-capture.js";
import type { SessionRegistry } from "./session-registry.js";
import type { CommandKernel } from "./types.js";

const log = Logger.for("OutputRetention");

export const DEFAULT_RETENTION_MS = 60 * 60 * 1000;
export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000;

export interface OutputRetentionOptions {
  registry: SessionRegistry;
  capture: OutputCapture;
  /** Minimum age after finishing. 0 disables the sweeper. Default: 1h. */
  retentionMs?: number;
  /** Default: 60s. */
  sweepIntervalMs?: number;
  /** Clock, for tests. */
  now?: () => number;
}

export class OutputRetention {
  private readonly registry: SessionRegistry;
  private readonly capture: OutputCapture;
  private readonly retentionMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private timer?: ReturnType<typeof setInterval>;
  private sweeping?: Promise<number>;

  constructor(options: OutputRetentionOptions) {
    this.registry = options.registry;
    this.capture = options.capture;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.retentionMs > 0;
  }

  start(): void {
    if (!this.enabled || this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch((err) => {
        log.error({ err }, "retention sweep failed");
      });
    }, this.sweepIntervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.sweeping;
  }

  isExpired(kernel: CommandKernel): boolean {
    if (kernel.running || !kernel.finishedAt) return false;
    if (this.now() - kernel.finishedAt.getTime() < this.retentionMs) return false;
    return !kernel.isBackground || kernel.outputDrainedAt !== undefined;
  }

  /**
   * Remove every expired session. Resolves with the number removed.
   * Overlapping calls share one pass.
   */
  sweep(): Promise<number> {
    if (!this.sweeping) {
      this.sweeping = this.runSweep().finally(() => {
        this.sweeping = undefined;
      });
    }
    return this.sweeping;
  }

  private async runSweep(): Promise<number> {
    const expired = this.registry.list().filter((kernel) => this.isExpired(kernel));
    for (const kernel of expired) {
      this.registry.delete(kernel.sessionId);
      await this.capture.remove(kernel);
    }
    if (expired.length > 0) {
      log.info({ removed: expired.length }, "expired command sessions removed");
    }
    return expired.length;
  }
}
