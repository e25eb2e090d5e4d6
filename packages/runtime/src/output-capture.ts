/**
 * Output Capture
 *
 * Per-session output files. The child process gets the raw descriptors, so
 * every byte it writes is in the file before any reader can look for it.
 */

import { mkdir, open, rm } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { join } from "node:path";
import { ExecutionError, errorMessage } from "@execd/shared";
import type { CommandKernel } from "./types.js";

export interface CaptureFiles {
  stdoutPath: string;
  stderrPath: string;
  combinedPath?: string;
  /** Descriptor for the child's stdout. */
  stdout: FileHandle;
  /** Descriptor for the child's stderr; the same handle as `stdout` when combined. */
  stderr: FileHandle;
  /** Close the daemon's copies of the descriptors. */
  close(): Promise<void>;
}

export class OutputCapture {
  constructor(readonly directory: string) {}

  stdoutPath(sessionId: string): string {
    return join(this.directory, `${sessionId}.stdout`);
  }

  stderrPath(sessionId: string): string {
    return join(this.directory, `${sessionId}.stderr`);
  }

  combinedPath(sessionId: string): string {
    return join(this.directory, `${sessionId}.output`);
  }

  /**
   * Create (or truncate) the capture files for a session.
   *
   * Foreground sessions get separate `.stdout` / `.stderr` files; background
   * sessions get one `.output` file that both streams append to.
   *
   * @throws ExecutionError when a file cannot be created. Nothing stays open.
   */
  async open(sessionId: string, options: { combined: boolean }): Promise<CaptureFiles> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (err) {
      throw new ExecutionError(`cannot create output directory: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (options.combined) {
      const combinedPath = this.combinedPath(sessionId);
      const handle = await openForWrite(combinedPath);
      return {
        stdoutPath: combinedPath,
        stderrPath: combinedPath,
        combinedPath,
        stdout: handle,
        stderr: handle,
        close: () => handle.close(),
      };
    }

    const stdoutPath = this.stdoutPath(sessionId);
    const stderrPath = this.stderrPath(sessionId);
    const stdout = await openForWrite(stdoutPath);
    let stderr: FileHandle;
    try {
      stderr = await openForWrite(stderrPath);
    } catch (err) {
      await stdout.close();
      throw err;
    }

    return {
      stdoutPath,
      stderrPath,
      stdout,
      stderr,
      close: async () => {
        await Promise.all([stdout.close(), stderr.close()]);
      },
    };
  }

  /**
   * Delete every output file a kernel references. Missing files are fine.
   */
  async remove(kernel: Pick<CommandKernel, "stdoutPath" | "stderrPath" | "combinedPath">): Promise<void> {
    const paths = new Set([kernel.stdoutPath, kernel.stderrPath]);
    if (kernel.combinedPath) paths.add(kernel.combinedPath);
    await Promise.all([...paths].map((path) => rm(path, { force: true })));
  }
}

async function openForWrite(path: string): Promise<FileHandle> {
  try {
    return await open(path, "w", 0o644);
  } catch (err) {
    throw new ExecutionError(`cannot create output file ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
