/**
 * Runtime types.
 *
 * @module @execd/runtime/types
 */

import type { CommandMode, ExecutionErrorInfo } from "@execd/shared";
import type { ProcessHandle } from "./process-handle.js";

// ============================================================================
// Session kernel
// ============================================================================

/**
 * Internal state record for one command session.
 *
 * Records are immutable snapshots: the registry swaps in a new object on every
 * update, so a reader holding a kernel never observes a half-applied change.
 */
export interface CommandKernel {
  readonly sessionId: string;
  /** Command text as submitted. */
  readonly content: string;
  readonly pid?: number;
  readonly stdoutPath: string;
  readonly stderrPath: string;
  /** Set for background sessions; stdout and stderr both land here. */
  readonly combinedPath?: string;
  readonly isBackground: boolean;
  readonly running: boolean;
  readonly startedAt: Date;
  readonly finishedAt?: Date;
  /** Absent while running, and after a death by signal. */
  readonly exitCode?: number;
  readonly signal?: NodeJS.Signals;
  /** Failure other than a non-zero exit, e.g. spawn failure. */
  readonly errMsg?: string;
  /** When a seek first read a finished session's output to the end. */
  readonly outputDrainedAt?: Date;
  /** Owned process; dropped once the process has exited. */
  readonly handle?: ProcessHandle;
  /** Interrupt that arrived before the process had started. */
  readonly interruptRequested?: boolean;
}

export type KernelPatch = Partial<
  Pick<
    CommandKernel,
    "pid" | "running" | "finishedAt" | "exitCode" | "signal" | "errMsg" | "outputDrainedAt" | "handle" | "interruptRequested"
  >
>;

// ============================================================================
// Execution
// ============================================================================

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  executionTimeMs: number;
}

/**
 * Callbacks a caller attaches to a run. All are optional and synchronous;
 * exceptions thrown from them are logged and swallowed by the runner.
 */
export interface CommandHooks {
  onInit?(sessionId: string): void;
  onStdout?(text: string): void;
  onStderr?(text: string): void;
  onComplete?(result: CommandResult): void;
  onError?(error: ExecutionErrorInfo): void;
}

export interface ExecuteCommandRequest {
  mode: CommandMode;
  code: string;
  cwd?: string;
  /** Caller-chosen id; generated when omitted. */
  sessionId?: string;
  /** Extra environment on top of the daemon's own. */
  env?: Record<string, string>;
  hooks?: CommandHooks;
}

// ============================================================================
// Queries
// ============================================================================

export interface CommandStatus {
  sessionId: string;
  content: string;
  running: boolean;
  pid?: number;
  exitCode?: number;
  signal?: NodeJS.Signals;
  errMsg?: string;
  startedAt: Date;
  finishedAt?: Date;
}

export interface SeekResult {
  output: Buffer;
  /** Byte offset to pass to the next seek. */
  cursor: number;
}
