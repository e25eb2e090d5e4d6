/**
 * Shell executor.
 *
 * Runs the command through `<shell> -c`, in its own process group so an
 * interrupt reaches everything the command started. Output goes straight to
 * the capture descriptors; the daemon never holds a pipe.
 */

import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import type { CommandExecutor, SpawnOptions } from "./types.js";

export const DEFAULT_SHELL = "/bin/sh";

export class ShellExecutor implements CommandExecutor {
  constructor(readonly shell: string = DEFAULT_SHELL) {}

  spawn(command: string, options: SpawnOptions): ChildProcess {
    return spawn(this.shell, ["-c", command], {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", options.stdout, options.stderr],
      detached: true,
    });
  }
}
