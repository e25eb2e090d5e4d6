/**
 * Express router for the command API.
 *
 * ```
 * POST   /command                 run a command (SSE stream)
 * DELETE /command?id=             interrupt a session
 * GET    /command/status/:id      session status
 * GET    /command/:id/logs        read background output from ?cursor=
 * GET    /ping                    liveness
 * ```
 *
 * @module @execd/server/router
 */

import { setTimeout as delay } from "node:timers/promises";
import { Router, json } from "express";
import type { Request, Response } from "express";
import {
  InvalidRequestError,
  MissingQueryError,
  RunCommandRequestSchema,
  TAIL_CURSOR_HEADER,
  errorMessage,
  formatIssues,
  type CommandEvent,
  type CommandStatusResponse,
} from "@execd/shared";
import { Logger, type CommandHooks, type CommandRunner, type CommandStatus } from "@execd/runtime";
import { requireAccessToken } from "./auth.js";
import { errorHandler } from "./errors.js";
import { createSSEWriter, setSSEHeaders } from "./sse.js";
import type { CommandRouterOptions, SSEWriter } from "./types.js";

const log = Logger.for("CommandRouter");

export const DEFAULT_GRACEFUL_SHUTDOWN_MS = 1000;

export function createCommandRouter(
  runner: CommandRunner,
  options: CommandRouterOptions = {},
): Router {
  const router = Router();
  const gracefulShutdownMs = options.gracefulShutdownMs ?? DEFAULT_GRACEFUL_SHUTDOWN_MS;
  const sseKeepaliveInterval = options.sseKeepaliveInterval ?? 15000;

  if (options.accessToken) {
    router.use(requireAccessToken(options.accessToken));
  }

  router.get("/ping", (_req, res) => {
    res.json({});
  });

  router.post("/command", json({ limit: "10mb" }), async (req, res, next) => {
    const parsed = RunCommandRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      next(new InvalidRequestError(`invalid request: ${formatIssues(parsed.error)}`));
      return;
    }
    const { command, cwd, background } = parsed.data;

    const stream = createEventStream(res, sseKeepaliveInterval);
    const emit = (event: CommandEvent) => stream.emit(event);

    const hooks: CommandHooks = {
      onInit: (sessionId) => emit({ type: "init", sessionId, timestamp: Date.now() }),
      onError: (error) => emit({ type: "error", error, timestamp: Date.now() }),
    };
    if (!background) {
      hooks.onStdout = (text) => emit({ type: "stdout", text, timestamp: Date.now() });
      hooks.onStderr = (text) => emit({ type: "stderr", text, timestamp: Date.now() });
      hooks.onComplete = (result) =>
        emit({
          type: "execution_complete",
          exitCode: result.exitCode,
          signal: result.signal,
          executionTimeMs: result.executionTimeMs,
          timestamp: Date.now(),
        });
    }

    try {
      await runner.run({
        mode: background ? "background_command" : "command",
        code: command,
        cwd,
        hooks,
      });
    } catch (err) {
      if (!stream.started) {
        next(err);
        return;
      }
      log.error({ err }, "command run failed after streaming started");
      emit({
        type: "error",
        error: { name: "RuntimeError", value: errorMessage(err) },
        timestamp: Date.now(),
      });
    }

    if (!background && gracefulShutdownMs > 0 && !stream.closed) {
      await delay(gracefulShutdownMs);
    }
    stream.close();
  });

  router.delete("/command", (req, res, next) => {
    try {
      const id = queryString(req, "id");
      if (!id) throw new MissingQueryError("id");
      runner.interrupt(id);
      res.json({});
    } catch (err) {
      next(err);
    }
  });

  router.get("/command/status/:id", (req, res, next) => {
    try {
      res.json(toStatusResponse(runner.getStatus(req.params.id)));
    } catch (err) {
      next(err);
    }
  });

  router.get("/command/:id/logs", async (req, res, next) => {
    try {
      const { output, cursor } = await runner.seekOutput(
        req.params.id,
        parseCursor(queryString(req, "cursor")),
      );
      res.setHeader(TAIL_CURSOR_HEADER, String(cursor));
      res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.status(200).send(output);
    } catch (err) {
      next(err);
    }
  });

  router.use(errorHandler());

  return router;
}

/**
 * SSE stream whose headers go out with the first event, so failures before
 * the session starts still answer with a JSON envelope.
 */
function createEventStream(res: Response, keepaliveInterval: number) {
  let writer: SSEWriter | undefined;

  return {
    get started(): boolean {
      return writer !== undefined;
    },
    get closed(): boolean {
      return writer?.closed ?? false;
    },
    emit(event: CommandEvent): void {
      if (!writer) {
        setSSEHeaders(res);
        writer = createSSEWriter(res, { keepaliveInterval });
        const opened = writer;
        res.on("close", () => opened.close());
      }
      writer.writeEvent(event);
    },
    close(): void {
      writer?.close();
    },
  };
}

export function toStatusResponse(status: CommandStatus): CommandStatusResponse {
  return {
    id: status.sessionId,
    content: status.content,
    running: status.running,
    pid: status.pid,
    exitCode: status.exitCode,
    signal: status.signal,
    error: status.errMsg,
    startedAt: status.startedAt.toISOString(),
    finishedAt: status.finishedAt?.toISOString(),
  };
}

/**
 * Integer cursor from the query string. Anything that is not an integer
 * reads from the start.
 */
export function parseCursor(value: string | undefined): number {
  if (!value || !/^-?\d+$/.test(value)) return 0;
  const cursor = Number(value);
  return Number.isSafeInteger(cursor) ? cursor : 0;
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
}
