/**
 * Command Router Tests
 *
 * Drives the HTTP surface through supertest against real shell sessions.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import express, { type Express } from "express";
import request from "supertest";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { CommandRunner } from "@execd/runtime";
import { createTempDir, createTestRunner, removeTempDir, waitFor } from "@execd/runtime/testing";
import { TAIL_CURSOR_HEADER, type CommandEvent } from "@execd/shared";
import { createCommandRouter, parseCursor } from "../router.js";
import { parseSSEEvents } from "../sse.js";

function createApp(runner: CommandRunner, accessToken?: string): Express {
  const app = express();
  app.use(
    createCommandRouter(runner, { gracefulShutdownMs: 0, sseKeepaliveInterval: 0, accessToken }),
  );
  return app;
}

function types(events: CommandEvent[]): string[] {
  return events.map((event) => event.type);
}

function texts(events: CommandEvent[], type: "stdout" | "stderr"): string[] {
  const result: string[] = [];
  for (const event of events) {
    if (event.type === type) result.push(event.text);
  }
  return result;
}

describe("createCommandRouter", () => {
  let dir: string;
  let runner: CommandRunner;
  let app: Express;

  beforeEach(async () => {
    dir = await createTempDir();
    runner = createTestRunner(join(dir, "output"));
    app = createApp(runner);
  });

  afterEach(async () => {
    await runner.close();
    await removeTempDir(dir);
  });

  describe("GET /ping", () => {
    it("returns an empty object", async () => {
      const res = await request(app).get("/ping");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({});
    });
  });

  describe("POST /command", () => {
    it("streams init, output and completion for a foreground command", async () => {
      const res = await request(app).post("/command").send({ command: "echo hello" });

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("text/event-stream");

      const events = parseSSEEvents(res.text);
      expect(types(events)).toEqual(["init", "stdout", "execution_complete"]);

      const [init, stdout, complete] = events;
      if (init?.type !== "init") throw new Error("expected init first");
      expect(runner.registry.has(init.sessionId)).toBe(true);
      expect(stdout).toMatchObject({ type: "stdout", text: "hello" });
      expect(complete).toMatchObject({ type: "execution_complete", exitCode: 0, signal: null });
    });

    it("separates stderr and reports the exit code", async () => {
      const res = await request(app)
        .post("/command")
        .send({ command: "echo out; echo err >&2; exit 2" });

      const events = parseSSEEvents(res.text);
      expect(texts(events, "stdout")).toEqual(["out"]);
      expect(texts(events, "stderr")).toEqual(["err"]);
      expect(events[events.length - 1]).toMatchObject({
        type: "execution_complete",
        exitCode: 2,
      });
    });

    it("runs in the requested working directory", async () => {
      const cwd = join(dir, "work");
      await mkdir(cwd);

      const res = await request(app).post("/command").send({ command: "pwd", cwd });

      expect(texts(parseSSEEvents(res.text), "stdout")).toEqual([cwd]);
    });

    it("emits only init for a background command", async () => {
      const res = await request(app)
        .post("/command")
        .send({ command: "echo later", background: true });

      const events = parseSSEEvents(res.text);
      expect(types(events)).toEqual(["init"]);
    });

    it("rejects an empty command", async () => {
      const res = await request(app).post("/command").send({ command: "  " });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        code: "InvalidRequest",
        message: "invalid request: command: command must not be empty",
      });
      expect(runner.registry.size).toBe(0);
    });

    it("rejects a missing working directory with a JSON envelope", async () => {
      const cwd = join(dir, "missing");
      const res = await request(app).post("/command").send({ command: "pwd", cwd });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        code: "InvalidRequest",
        message: `working directory is not usable: ${cwd}`,
      });
    });

    it("rejects a malformed JSON body", async () => {
      const res = await request(app)
        .post("/command")
        .set("Content-Type", "application/json")
        .send("{not json");

      expect(res.status).toBe(400);
      expect(res.body.code).toBe("InvalidRequest");
    });
  });

  describe("background output and status", () => {
    async function startBackground(command: string): Promise<string> {
      const res = await request(app).post("/command").send({ command, background: true });
      const [init] = parseSSEEvents(res.text);
      if (init?.type !== "init") throw new Error("expected init event");
      return init.sessionId;
    }

    it("serves output from a cursor and returns the next one", async () => {
      const id = await startBackground("echo done");
      await waitFor(() => !runner.getStatus(id).running);

      const first = await request(app).get(`/command/${id}/logs`).query({ cursor: "0" });
      expect(first.status).toBe(200);
      expect(first.headers["content-type"]).toBe("text/plain; charset=utf-8");
      expect(first.text).toBe("done\n");
      expect(first.headers[TAIL_CURSOR_HEADER.toLowerCase()]).toBe("5");

      const second = await request(app).get(`/command/${id}/logs`).query({ cursor: "5" });
      expect(second.text).toBe("");
      expect(second.headers[TAIL_CURSOR_HEADER.toLowerCase()]).toBe("5");
    });

    it("reads from the start when the cursor does not parse", async () => {
      const id = await startBackground("echo abc");
      await waitFor(() => !runner.getStatus(id).running);

      const res = await request(app).get(`/command/${id}/logs`).query({ cursor: "abc" });
      expect(res.text).toBe("abc\n");
      expect(res.headers[TAIL_CURSOR_HEADER.toLowerCase()]).toBe("4");
    });

    it("rejects logs for an unknown session with InvalidRequest", async () => {
      const res = await request(app).get("/command/nope/logs");

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        code: "InvalidRequest",
        message: "command session not found: nope",
      });
    });

    it("reports status with ISO timestamps", async () => {
      const id = await startBackground("exit 7");
      await waitFor(() => !runner.getStatus(id).running);

      const res = await request(app).get(`/command/status/${id}`);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id, content: "exit 7", running: false, exitCode: 7 });
      expect(typeof res.body.pid).toBe("number");
      expect(new Date(res.body.startedAt).toISOString()).toBe(res.body.startedAt);
      expect(new Date(res.body.finishedAt).toISOString()).toBe(res.body.finishedAt);
      expect(res.body).not.toHaveProperty("error");
    });

    it("returns 404 for the status of an unknown session", async () => {
      const res = await request(app).get("/command/status/nope");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ code: "NotFound", message: "command session not found: nope" });
    });
  });

  describe("DELETE /command", () => {
    it("interrupts a running session", async () => {
      const res = await request(app)
        .post("/command")
        .send({ command: "sleep 30", background: true });
      const [init] = parseSSEEvents(res.text);
      if (init?.type !== "init") throw new Error("expected init event");

      const del = await request(app).delete("/command").query({ id: init.sessionId });
      expect(del.status).toBe(200);
      expect(del.body).toEqual({});

      await waitFor(() => !runner.getStatus(init.sessionId).running);
      const status = await request(app).get(`/command/status/${init.sessionId}`);
      expect(status.body.running).toBe(false);
      expect(status.body.signal).toBe("SIGTERM");
      expect(status.body).not.toHaveProperty("exitCode");
    });

    it("requires the id query parameter", async () => {
      const res = await request(app).delete("/command");

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ code: "MissingQuery", message: "missing query parameter: id" });
    });

    it("returns 404 for an unknown session", async () => {
      const res = await request(app).delete("/command").query({ id: "nope" });

      expect(res.status).toBe(404);
      expect(res.body.code).toBe("NotFound");
    });
  });

  describe("access token", () => {
    it("rejects requests without the token", async () => {
      const secured = createApp(runner, "test-secret");

      const res = await request(secured).get("/ping");

      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        code: "Unauthorized",
        message: "missing or invalid access token",
      });
    });

    it("rejects a wrong token", async () => {
      const secured = createApp(runner, "test-secret");

      const res = await request(secured).get("/ping").set("X-EXECD-ACCESS-TOKEN", "wrong");

      expect(res.status).toBe(401);
    });

    it("accepts the configured token", async () => {
      const secured = createApp(runner, "test-secret");

      const res = await request(secured).get("/ping").set("X-EXECD-ACCESS-TOKEN", "test-secret");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({});
    });
  });
});

describe("parseCursor", () => {
  it("parses integers and falls back to 0", () => {
    expect(parseCursor("42")).toBe(42);
    expect(parseCursor("-3")).toBe(-3);
    expect(parseCursor(undefined)).toBe(0);
    expect(parseCursor("")).toBe(0);
    expect(parseCursor("12abc")).toBe(0);
    expect(parseCursor("99999999999999999999")).toBe(0);
  });
});
