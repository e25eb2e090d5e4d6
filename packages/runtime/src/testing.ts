/**
 * Runtime Testing Utilities
 *
 * Helpers for tests that drive real command sessions.
 */

import { mkdtemp, realpath, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { CommandRunner, type CommandRunnerOptions } from "./command-runner.js";
import type { ExecutionErrorInfo } from "@execd/shared";
import type { CommandHooks, CommandResult } from "./types.js";

export interface CommandEventLog {
  sessionIds: string[];
  stdout: string[];
  stderr: string[];
  completions: CommandResult[];
  errors: ExecutionErrorInfo[];
  hooks: Required<CommandHooks>;
}

/**
 * Create a fresh temp directory with symlinks resolved
 * (macOS: /var → /private/var).
 */
export async function createTempDir(prefix = "execd-test-"): Promise<string> {
  return realpath(await mkdtemp(join(tmpdir(), prefix)));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Poll `predicate` until it holds or `timeoutMs` passes.
 */
export async function waitFor(
  predicate: () => boolean | Promise<boolean>,
  { timeoutMs = 5000, intervalMs = 20 }: { timeoutMs?: number; intervalMs?: number } = {},
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await predicate())) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await delay(intervalMs);
  }
}

/**
 * Runner with a short poll interval, writing into `outputDir`.
 */
export function createTestRunner(
  outputDir: string,
  options: Partial<CommandRunnerOptions> = {},
): CommandRunner {
  return new CommandRunner({ outputDir, pollIntervalMs: 10, killGraceMs: 1000, ...options });
}

/**
 * Hooks that record everything they receive.
 */
export function recordingHooks(): CommandEventLog {
  const log: CommandEventLog = {
    sessionIds: [],
    stdout: [],
    stderr: [],
    completions: [],
    errors: [],
    hooks: {
      onInit: (sessionId) => log.sessionIds.push(sessionId),
      onStdout: (text) => log.stdout.push(text),
      onStderr: (text) => log.stderr.push(text),
      onComplete: (result) => log.completions.push(result),
      onError: (error) => log.errors.push(error),
    },
  };
  return log;
}
