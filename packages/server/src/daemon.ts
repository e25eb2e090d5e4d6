/**
 * Daemon bootstrap: wires the runner, retention sweeper and Express app.
 *
 * @example
 * ```typescript
 * const daemon = createDaemon(loadConfig());
 * await daemon.start();
 * process.on('SIGTERM', () => void daemon.close());
 * ```
 *
 * @module @execd/server/daemon
 */

import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import express, { type Express } from "express";
import {
  CommandRunner,
  Logger,
  OutputRetention,
  ShellExecutor,
  type CommandExecutor,
  type SessionRegistry,
} from "@execd/runtime";
import type { DaemonConfig } from "./config.js";
import { errorHandler } from "./errors.js";
import { createCommandRouter } from "./router.js";

const log = Logger.for("Daemon");

export interface DaemonOverrides {
  registry?: SessionRegistry;
  executor?: CommandExecutor;
}

export interface Daemon {
  readonly app: Express;
  readonly runner: CommandRunner;
  readonly retention: OutputRetention;
  /** Listen on the configured host and port. Resolves with the bound address. */
  start(): Promise<AddressInfo>;
  /** Stop sweeping, terminate running sessions and close the HTTP server. */
  close(): Promise<void>;
}

export function createDaemon(config: DaemonConfig, overrides: DaemonOverrides = {}): Daemon {
  Logger.configure({ level: config.logLevel });

  const runner = new CommandRunner({
    outputDir: config.outputDir,
    registry: overrides.registry,
    executor: overrides.executor ?? new ShellExecutor(config.shell),
    pollIntervalMs: config.pollIntervalMs,
    maxRecordBytes: config.maxRecordBytes,
    killGraceMs: config.killGraceMs,
  });

  const retention = new OutputRetention({
    registry: runner.registry,
    capture: runner.capture,
    retentionMs: config.retentionMs,
    sweepIntervalMs: config.sweepIntervalMs,
  });

  const app = express();
  app.disable("x-powered-by");
  app.use(
    createCommandRouter(runner, {
      gracefulShutdownMs: config.gracefulShutdownMs,
      accessToken: config.accessToken,
    }),
  );
  app.use(errorHandler());

  let server: Server | undefined;
  let closing: Promise<void> | undefined;

  return {
    app,
    runner,
    retention,

    start(): Promise<AddressInfo> {
      if (server) {
        return Promise.reject(new Error("daemon already started"));
      }
      return new Promise((resolve, reject) => {
        const listening = app.listen(config.port, config.host);
        server = listening;
        listening.once("error", reject);
        listening.once("listening", () => {
          listening.off("error", reject);
          const address = listening.address();
          if (address === null || typeof address === "string") {
            reject(new Error(`unexpected listen address: ${String(address)}`));
            return;
          }
          retention.start();
          log.info(
            { host: address.address, port: address.port, outputDir: config.outputDir },
            "execd listening",
          );
          resolve(address);
        });
      });
    },

    close(): Promise<void> {
      closing ??= (async () => {
        await retention.stop();
        await runner.close();
        const current = server;
        if (current?.listening) {
          await new Promise<void>((resolve, reject) => {
            current.close((err) => (err ? reject(err) : resolve()));
            current.closeAllConnections();
          });
        }
        log.info("execd stopped");
      })();
      return closing;
    },
  };
}
