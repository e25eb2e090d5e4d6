/**
 * @execd/runtime - command execution and streaming runtime
 *
 * Runs shell commands as tracked sessions, captures their output to files
 * and serves status, cursor-based output reads and interrupts.
 *
 * @example
 * ```typescript
 * import { CommandRunner } from "@execd/runtime";
 *
 * const runner = new CommandRunner({ outputDir: "/tmp/execd" });
 * const sessionId = await runner.run({
 *   mode: "command",
 *   code: "echo hello",
 *   hooks: { onStdout: (line) => console.log(line) },
 * });
 * runner.getStatus(sessionId); // { running: false, exitCode: 0, ... }
 * ```
 */

// ── Engine ──────────────────────────────────────────────────────────────────
export { CommandRunner } from "./command-runner.js";
export type { CommandRunnerOptions } from "./command-runner.js";
export type {
  CommandKernel,
  KernelPatch,
  CommandHooks,
  CommandResult,
  CommandStatus,
  ExecuteCommandRequest,
  SeekResult,
} from "./types.js";

// ── Registry, queries, control ──────────────────────────────────────────────
export { InMemorySessionRegistry } from "./session-registry.js";
export type { SessionRegistry } from "./session-registry.js";
export { getCommandStatus, seekCommandOutput, toCommandStatus } from "./status.js";
export { interruptCommand } from "./interrupt.js";

// ── Primitives ──────────────────────────────────────────────────────────────
export { OutputCapture } from "./output-capture.js";
export type { CaptureFiles } from "./output-capture.js";
export {
  tailFile,
  readFromPosition,
  readFileRange,
  splitRecords,
  READ_CHUNK_BYTES,
  DEFAULT_MAX_RECORD_BYTES,
  DEFAULT_POLL_INTERVAL_MS,
} from "./tailer.js";
export type { RecordHandler, TailOptions, SplitResult } from "./tailer.js";
export { ProcessHandle, DEFAULT_KILL_GRACE_MS } from "./process-handle.js";
export type { ProcessExit, ProcessHandleOptions } from "./process-handle.js";
export { ShellExecutor, DEFAULT_SHELL } from "./executor/shell.js";
export type { CommandExecutor, SpawnOptions } from "./executor/types.js";

// ── Retention ───────────────────────────────────────────────────────────────
export { OutputRetention, DEFAULT_RETENTION_MS, DEFAULT_SWEEP_INTERVAL_MS } from "./retention.js";
export type { OutputRetentionOptions } from "./retention.js";

// ── Logging ─────────────────────────────────────────────────────────────────
export { Logger, LOG_LEVELS } from "./logger.js";
export type { LogLevel, ComponentLogger } from "./logger.js";
