import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ExecutionError } from "@execd/shared";
import { OutputCapture } from "../output-capture.js";
import { createTempDir, removeTempDir } from "../testing.js";

describe("OutputCapture", () => {
  let dir: string;
  let capture: OutputCapture;

  beforeEach(async () => {
    dir = await createTempDir();
    capture = new OutputCapture(join(dir, "out"));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("derives paths from the session id", () => {
    expect(capture.stdoutPath("abc")).toBe(join(dir, "out", "abc.stdout"));
    expect(capture.stderrPath("abc")).toBe(join(dir, "out", "abc.stderr"));
    expect(capture.combinedPath("abc")).toBe(join(dir, "out", "abc.output"));
  });

  it("opens separate stdout and stderr files", async () => {
    const files = await capture.open("fg", { combined: false });
    await files.stdout.write("out");
    await files.stderr.write("err");
    await files.close();

    expect(files.combinedPath).toBeUndefined();
    expect(await readFile(files.stdoutPath, "utf8")).toBe("out");
    expect(await readFile(files.stderrPath, "utf8")).toBe("err");
  });

  it("shares one file for combined output", async () => {
    const files = await capture.open("bg", { combined: true });
    expect(files.stdout).toBe(files.stderr);
    expect(files.stdoutPath).toBe(capture.combinedPath("bg"));

    await files.stdout.write("a");
    await files.stderr.write("b");
    await files.close();

    expect(await readFile(capture.combinedPath("bg"), "utf8")).toBe("ab");
  });

  it("truncates existing files", async () => {
    const first = await capture.open("again", { combined: false });
    await first.stdout.write("stale output");
    await first.close();

    const second = await capture.open("again", { combined: false });
    await second.close();

    expect(await readFile(second.stdoutPath, "utf8")).toBe("");
  });

  it("fails with ExecutionError when the directory cannot be created", async () => {
    const blocker = join(dir, "not-a-dir");
    await writeFile(blocker, "");
    const broken = new OutputCapture(join(blocker, "nested"));

    await expect(broken.open("x", { combined: false })).rejects.toBeInstanceOf(ExecutionError);
  });

  it("removes every file a kernel references", async () => {
    const files = await capture.open("gone", { combined: false });
    await files.close();

    await capture.remove(files);

    expect(existsSync(files.stdoutPath)).toBe(false);
    expect(existsSync(files.stderrPath)).toBe(false);
  });
});
