import { describe, it, expect, beforeEach } from "vitest";
import { InvalidRequestError, SessionNotFoundError } from "@execd/shared";
import { InMemorySessionRegistry } from "../session-registry.js";
import type { CommandKernel } from "../types.js";

function kernel(sessionId: string, overrides: Partial<CommandKernel> = {}): CommandKernel {
  return {
    sessionId,
    content: "echo hi",
    pid: 100,
    stdoutPath: `/tmp/${sessionId}.stdout`,
    stderrPath: `/tmp/${sessionId}.stderr`,
    isBackground: false,
    running: true,
    startedAt: new Date("2026-01-01T00:00:00Z"),
    ...overrides,
  };
}

describe("InMemorySessionRegistry", () => {
  let registry: InMemorySessionRegistry;

  beforeEach(() => {
    registry = new InMemorySessionRegistry();
  });

  it("registers and looks up kernels", () => {
    registry.register(kernel("s1"));
    expect(registry.get("s1")?.pid).toBe(100);
    expect(registry.has("s1")).toBe(true);
    expect(registry.size).toBe(1);
  });

  it("returns undefined for unknown ids", () => {
    expect(registry.get("missing")).toBeUndefined();
    expect(registry.has("missing")).toBe(false);
  });

  it("rejects duplicate ids", () => {
    registry.register(kernel("s1"));
    expect(() => registry.register(kernel("s1", { pid: 200 }))).toThrow(InvalidRequestError);
    expect(registry.get("s1")?.pid).toBe(100);
  });

  it("replaces the snapshot on update and leaves the old one untouched", () => {
    registry.register(kernel("s1"));
    const before = registry.get("s1");
    const finishedAt = new Date("2026-01-01T00:00:05Z");

    const after = registry.update("s1", { running: false, finishedAt, exitCode: 0 });

    expect(after).not.toBe(before);
    expect(after).toMatchObject({ running: false, finishedAt, exitCode: 0 });
    expect(before).toMatchObject({ running: true });
    expect(before?.exitCode).toBeUndefined();
    expect(registry.get("s1")).toBe(after);
  });

  it("freezes stored snapshots", () => {
    registry.register(kernel("s1"));
    expect(Object.isFrozen(registry.get("s1"))).toBe(true);
    expect(Object.isFrozen(registry.update("s1", { pid: 7 }))).toBe(true);
  });

  it("throws SessionNotFoundError when updating an unknown id", () => {
    expect(() => registry.update("missing", { running: false })).toThrow(SessionNotFoundError);
  });

  it("deletes, lists and clears", () => {
    registry.register(kernel("s1"));
    registry.register(kernel("s2"));
    expect(registry.list().map((k) => k.sessionId)).toEqual(["s1", "s2"]);

    expect(registry.delete("s1")).toBe(true);
    expect(registry.delete("s1")).toBe(false);
    expect(registry.size).toBe(1);

    registry.clear();
    expect(registry.size).toBe(0);
  });
});
