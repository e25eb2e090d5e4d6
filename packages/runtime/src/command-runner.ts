/**
 * CommandRunner: runs shell commands as tracked sessions.
 *
 * Foreground runs block until the process exits and stream every output
 * record through the caller's hooks. Background runs return the session id
 * as soon as the process has started; a detached monitor records completion.
 *
 * @module @execd/runtime/command-runner
 */

import { stat } from "node:fs/promises";
import type { ChildProcess } from "node:child_process";
import {
  ExecutionError,
  InvalidRequestError,
  SessionIdSchema,
  errorMessage,
  formatIssues,
  generateSessionId,
} from "@execd/shared";
import { Logger } from "./logger.js";
import { OutputCapture, type CaptureFiles } from "./output-capture.js";
import { ProcessHandle, type ProcessExit } from "./process-handle.js";
import { InMemorySessionRegistry, type SessionRegistry } from "./session-registry.js";
import { ShellExecutor } from "./executor/shell.js";
import type { CommandExecutor } from "./executor/types.js";
import { DEFAULT_MAX_RECORD_BYTES, DEFAULT_POLL_INTERVAL_MS, tailFile, type RecordHandler } from "./tailer.js";
import { getCommandStatus, seekCommandOutput } from "./status.js";
import { interruptCommand } from "./interrupt.js";
import type {
  CommandHooks,
  CommandStatus,
  ExecuteCommandRequest,
  SeekResult,
} from "./types.js";

const log = Logger.for("CommandRunner");

export interface CommandRunnerOptions {
  /** Where capture files live. */
  outputDir: string;
  /** Defaults to a fresh in-memory registry. */
  registry?: SessionRegistry;
  /** Defaults to `/bin/sh -c`. */
  executor?: CommandExecutor;
  /** Tail poll interval. Default: 100ms. */
  pollIntervalMs?: number;
  /** Longest output record the tailer accepts. Default: 5 MiB. */
  maxRecordBytes?: number;
  /** SIGTERM → SIGKILL delay on interrupt. Default: 5000ms. */
  killGraceMs?: number;
  /** Base environment for every command. Default: the daemon's own. */
  env?: NodeJS.ProcessEnv;
}

interface TailTarget {
  path: string;
  onRecord: RecordHandler;
}

export class CommandRunner {
  readonly registry: SessionRegistry;
  readonly capture: OutputCapture;

  private readonly executor: CommandExecutor;
  private readonly pollIntervalMs: number;
  private readonly maxRecordBytes: number;
  private readonly killGraceMs?: number;
  private readonly env: NodeJS.ProcessEnv;
  /** Ids between validation and registration. */
  private readonly reserved = new Set<string>();
  private readonly monitors = new Set<Promise<void>>();
  private closed = false;

  constructor(options: CommandRunnerOptions) {
    this.registry = options.registry ?? new InMemorySessionRegistry();
    this.capture = new OutputCapture(options.outputDir);
    this.executor = options.executor ?? new ShellExecutor();
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxRecordBytes = options.maxRecordBytes ?? DEFAULT_MAX_RECORD_BYTES;
    this.killGraceMs = options.killGraceMs;
    this.env = options.env ?? process.env;
  }

  /**
   * Start a command session and return its id.
   *
   * Foreground (`command`) resolves after the process has exited and every
   * hook has fired. Background (`background_command`) resolves once the
   * process has started.
   *
   * A failure to start the process is recorded on the session (and reported
   * through `hooks.onError`) rather than thrown.
   *
   * @throws InvalidRequestError for an empty command, unusable cwd or a bad or taken session id
   * @throws ExecutionError when the capture files cannot be created
   */
  async run(request: ExecuteCommandRequest): Promise<string> {
    this.assertOpen();
    const hooks = request.hooks ?? {};
    const background = request.mode === "background_command";

    const { sessionId, cwd } = await this.validate(request);

    // validate() reserved the id; it is released once registered or failed.
    let files: CaptureFiles;
    try {
      files = await this.capture.open(sessionId, { combined: background });
      try {
        this.registry.register({
          sessionId,
          content: request.code,
          stdoutPath: files.stdoutPath,
          stderrPath: files.stderrPath,
          combinedPath: files.combinedPath,
          isBackground: background,
          running: true,
          startedAt: new Date(),
        });
      } catch (err) {
        await files.close();
        throw err;
      }
    } finally {
      this.reserved.delete(sessionId);
    }

    log.info({ sessionId, background, cwd }, "command session registered");
    callHook("onInit", () => hooks.onInit?.(sessionId));

    const handle = await this.spawn(sessionId, request, cwd, files, hooks);
    if (!handle) return sessionId;

    const targets: TailTarget[] = [];
    if (background) {
      if (hooks.onStdout) {
        targets.push({ path: files.stdoutPath, onRecord: hooks.onStdout });
      }
    } else {
      targets.push(
        { path: files.stdoutPath, onRecord: (text) => hooks.onStdout?.(text) },
        { path: files.stderrPath, onRecord: (text) => hooks.onStderr?.(text) },
      );
    }

    const monitor = this.monitor(sessionId, handle, targets, hooks)
      .catch((err) => {
        log.error({ sessionId, err }, "command monitor failed");
      })
      .finally(() => {
        this.monitors.delete(monitor);
      });
    this.monitors.add(monitor);

    if (!background) {
      await monitor;
    }
    return sessionId;
  }

  /**
   * @see interruptCommand
   */
  interrupt(sessionId: string): boolean {
    return interruptCommand(this.registry, sessionId);
  }

  /**
   * @see getCommandStatus
   */
  getStatus(sessionId: string): CommandStatus {
    return getCommandStatus(this.registry, sessionId);
  }

  /**
   * @see seekCommandOutput
   */
  seekOutput(sessionId: string, cursor: number): Promise<SeekResult> {
    return seekCommandOutput(this.registry, sessionId, cursor);
  }

  /**
   * Stop accepting runs, terminate every running session and wait until
   * their exits have been recorded.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const kernel of this.registry.list()) {
      if (kernel.running && interruptCommand(this.registry, kernel.sessionId)) {
        log.info({ sessionId: kernel.sessionId }, "terminating on shutdown");
      }
    }
    await Promise.all([...this.monitors]);
  }

  private async validate(request: ExecuteCommandRequest): Promise<{ sessionId: string; cwd?: string }> {
    if (request.mode !== "command" && request.mode !== "background_command") {
      throw new InvalidRequestError(`unsupported mode: ${String(request.mode)}`);
    }
    if (request.code.trim().length === 0) {
      throw new InvalidRequestError("command must not be empty");
    }

    let sessionId: string;
    if (request.sessionId === undefined) {
      sessionId = generateSessionId();
    } else {
      const parsed = SessionIdSchema.safeParse(request.sessionId);
      if (!parsed.success) {
        throw new InvalidRequestError(formatIssues(parsed.error));
      }
      sessionId = parsed.data;
    }

    if (request.cwd !== undefined) {
      const info = await stat(request.cwd).catch(() => undefined);
      if (!info?.isDirectory()) {
        throw new InvalidRequestError(`working directory is not usable: ${request.cwd}`);
      }
    }

    // No await between the check and the reservation.
    if (this.registry.has(sessionId) || this.reserved.has(sessionId)) {
      throw new InvalidRequestError(`command session already exists: ${sessionId}`);
    }
    this.reserved.add(sessionId);
    return { sessionId, cwd: request.cwd };
  }

  /**
   * Start the process. On failure the session is finished with `errMsg`
   * and undefined is returned.
   */
  private async spawn(
    sessionId: string,
    request: ExecuteCommandRequest,
    cwd: string | undefined,
    files: CaptureFiles,
    hooks: CommandHooks,
  ): Promise<ProcessHandle | undefined> {
    let child: ChildProcess;
    try {
      child = this.executor.spawn(request.code, {
        cwd,
        env: { ...this.env, ...request.env },
        stdout: files.stdout.fd,
        stderr: files.stderr.fd,
      });
    } catch (err) {
      await files.close();
      this.fail(sessionId, err, hooks);
      return undefined;
    }

    const handle = new ProcessHandle(child, { killGraceMs: this.killGraceMs });
    const startError = await handle.started;
    // The child holds its own copies of the descriptors by now.
    await files.close();

    if (startError) {
      this.fail(sessionId, startError, hooks);
      return undefined;
    }

    this.registry.update(sessionId, { pid: handle.pid, handle });
    log.debug({ sessionId, pid: handle.pid }, "process started");
    if (this.registry.get(sessionId)?.interruptRequested) {
      handle.terminate();
      log.info({ sessionId, pid: handle.pid }, "applied interrupt requested during start");
    }
    return handle;
  }

  private async monitor(
    sessionId: string,
    handle: ProcessHandle,
    targets: TailTarget[],
    hooks: CommandHooks,
  ): Promise<void> {
    let exit: ProcessExit | undefined;
    const exited = handle.exited.then((result) => {
      exit = result;
      return result;
    });

    const tails = targets.map((target) =>
      tailFile(target.path, target.onRecord, {
        isGrowing: () => exit === undefined,
        intervalMs: this.pollIntervalMs,
        maxRecordBytes: this.maxRecordBytes,
      }),
    );

    const result = await exited;
    await Promise.all(tails);
    handle.release();

    const kernel = this.registry.get(sessionId);
    if (!kernel) {
      log.warn({ sessionId }, "session removed before completion was recorded");
      return;
    }

    const finishedAt = new Date();
    this.registry.update(sessionId, {
      running: false,
      finishedAt,
      exitCode: result.exitCode ?? undefined,
      signal: result.signal ?? undefined,
      errMsg: result.error?.message,
      handle: undefined,
    });

    const executionTimeMs = finishedAt.getTime() - kernel.startedAt.getTime();
    log.info(
      { sessionId, exitCode: result.exitCode, signal: result.signal, executionTimeMs },
      "command finished",
    );

    if (result.error) {
      callHook("onError", () =>
        hooks.onError?.({ name: "CommandExecError", value: errorMessage(result.error) }),
      );
      return;
    }
    callHook("onComplete", () =>
      hooks.onComplete?.({ exitCode: result.exitCode, signal: result.signal, executionTimeMs }),
    );
  }

  private fail(sessionId: string, err: unknown, hooks: CommandHooks): void {
    const message = errorMessage(err);
    log.error({ sessionId, err }, "command failed to start");
    this.registry.update(sessionId, {
      running: false,
      finishedAt: new Date(),
      errMsg: message,
    });
    callHook("onError", () => hooks.onError?.({ name: "CommandExecError", value: message }));
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ExecutionError("command runner has been closed");
    }
  }
}

function callHook(name: keyof CommandHooks, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    log.warn({ hook: name, err }, "command hook threw");
  }
}
