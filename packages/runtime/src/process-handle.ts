/**
 * Process Handle
 *
 * Capability over one child process, owned by exactly one kernel. The handle
 * is the only way to signal the process; it is released once the exit has
 * been recorded.
 */

import type { ChildProcess } from "node:child_process";
import { Logger } from "./logger.js";

const log = Logger.for("ProcessHandle");

export const DEFAULT_KILL_GRACE_MS = 5000;

export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process never started. */
  error?: Error;
}

export interface ProcessHandleOptions {
  /** Delay between SIGTERM and SIGKILL on terminate(). */
  killGraceMs?: number;
}

export class ProcessHandle {
  /** Resolves once the process has started, or with the error that kept it from starting. */
  readonly started: Promise<Error | undefined>;
  readonly exited: Promise<ProcessExit>;

  private readonly killGraceMs: number;
  private killTimer?: ReturnType<typeof setTimeout>;
  private hasExited = false;
  private released = false;

  constructor(
    private readonly child: ChildProcess,
    options: ProcessHandleOptions = {},
  ) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

    let spawned = false;
    this.started = new Promise((resolve) => {
      child.once("spawn", () => {
        spawned = true;
        resolve(undefined);
      });
      child.once("error", (err) => {
        if (!spawned) resolve(err);
      });
    });

    this.exited = new Promise((resolve) => {
      child.once("close", (exitCode, signal) => {
        this.markExited();
        resolve({ exitCode, signal });
      });
      child.on("error", (err) => {
        if (spawned) {
          log.warn({ pid: child.pid, err }, "child process error");
          return;
        }
        this.markExited();
        resolve({ exitCode: null, signal: null, error: err });
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get running(): boolean {
    return !this.hasExited;
  }

  /**
   * Ask the process group to stop: SIGTERM now, SIGKILL after the grace
   * period if it is still around. Returns false when there was nothing to
   * signal.
   */
  terminate(): boolean {
    if (this.hasExited || this.released || this.killTimer) return false;

    this.signalGroup("SIGTERM");
    this.killTimer = setTimeout(() => {
      if (!this.hasExited) {
        log.warn({ pid: this.pid }, "process ignored SIGTERM; sending SIGKILL");
        this.signalGroup("SIGKILL");
      }
    }, this.killGraceMs);
    this.killTimer.unref();
    return true;
  }

  /**
   * Give up the capability. Later terminate() calls are no-ops.
   */
  release(): void {
    this.released = true;
    this.clearKillTimer();
  }

  private signalGroup(signal: NodeJS.Signals): void {
    const pid = this.child.pid;
    try {
      if (pid) {
        process.kill(-pid, signal);
        return;
      }
    } catch (err) {
      log.debug({ pid, signal, err }, "process group signal failed; signalling child");
    }
    this.child.kill(signal);
  }

  private markExited(): void {
    this.hasExited = true;
    this.clearKillTimer();
  }

  private clearKillTimer(): void {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
    }
  }
}
