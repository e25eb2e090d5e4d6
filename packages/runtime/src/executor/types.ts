/**
 * Command executor types.
 */

import type { ChildProcess } from "node:child_process";

export interface CommandExecutor {
  spawn(command: string, options: SpawnOptions): ChildProcess;
}

export interface SpawnOptions {
  cwd?: string;
  env: NodeJS.ProcessEnv;
  /** File descriptor the child writes stdout to. */
  stdout: number;
  /** File descriptor the child writes stderr to. May equal `stdout`. */
  stderr: number;
}
