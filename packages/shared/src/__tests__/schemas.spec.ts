import { describe, it, expect } from "vitest";
import { RunCommandRequestSchema, SessionIdSchema, formatIssues } from "../schemas.js";
import { generateSessionId } from "../utils/entity-ids.js";

describe("RunCommandRequestSchema", () => {
  it("defaults background to false", () => {
    expect(RunCommandRequestSchema.parse({ command: "ls" })).toEqual({
      command: "ls",
      background: false,
    });
  });

  it("keeps cwd and background when given", () => {
    expect(
      RunCommandRequestSchema.parse({ command: "ls", cwd: "/srv", background: true }),
    ).toEqual({ command: "ls", cwd: "/srv", background: true });
  });

  it("rejects blank commands with a readable message", () => {
    const result = RunCommandRequestSchema.safeParse({ command: " \t" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(formatIssues(result.error)).toBe("command: command must not be empty");
  });

  it("rejects a missing command", () => {
    const result = RunCommandRequestSchema.safeParse({});
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(formatIssues(result.error)).toBe("command: Required");
  });
});

describe("SessionIdSchema", () => {
  it("accepts file-name safe ids", () => {
    expect(SessionIdSchema.safeParse("cmd_0123-abc.1").success).toBe(true);
  });

  it("rejects separators and dot-only names", () => {
    expect(SessionIdSchema.safeParse("a/b").success).toBe(false);
    expect(SessionIdSchema.safeParse("..").success).toBe(false);
    expect(SessionIdSchema.safeParse(".").success).toBe(false);
    expect(SessionIdSchema.safeParse("").success).toBe(false);
  });
});

describe("generateSessionId", () => {
  it("returns unique, schema-valid ids", () => {
    const a = generateSessionId();
    const b = generateSessionId();

    expect(a).toMatch(/^cmd_[0-9a-f]{32}$/);
    expect(a).not.toBe(b);
    expect(SessionIdSchema.safeParse(a).success).toBe(true);
  });
});
