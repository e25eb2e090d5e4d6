#!/usr/bin/env node
/**
 * execd - Entry point
 */

import { program } from "commander";
import { Logger } from "@execd/runtime";
import { loadConfig, DEFAULT_PORT } from "./config.js";
import { createDaemon } from "./daemon.js";

const log = Logger.for("Main");

program
  .name("execd")
  .description("Command execution daemon: runs shell commands and streams their output")
  .version("0.1.0")
  .option("-p, --port <port>", `Listen port (default ${DEFAULT_PORT})`)
  .option("-H, --host <host>", "Listen address (default 0.0.0.0)")
  .option("-o, --output-dir <dir>", "Directory for captured output files")
  .option("--shell <path>", "Shell used to run commands (default /bin/sh)")
  .option("--poll-interval-ms <ms>", "Output tail poll interval")
  .option("--max-record-bytes <bytes>", "Longest output line streamed")
  .option("--kill-grace-ms <ms>", "Delay before SIGKILL after an interrupt")
  .option("--graceful-shutdown-ms <ms>", "Pause before closing a finished command stream")
  .option("--retention-ms <ms>", "Keep finished sessions this long (0 keeps them forever)")
  .option("--sweep-interval-ms <ms>", "How often expired sessions are removed")
  .option("-t, --access-token <token>", "Require this token in X-EXECD-ACCESS-TOKEN")
  .option("--log-level <level>", "fatal, error, warn, info, debug, trace or silent")
  .action(async (options: Record<string, string | undefined>) => {
    const config = loadConfig({
      port: options.port,
      host: options.host,
      outputDir: options.outputDir,
      shell: options.shell,
      pollIntervalMs: options.pollIntervalMs,
      maxRecordBytes: options.maxRecordBytes,
      killGraceMs: options.killGraceMs,
      gracefulShutdownMs: options.gracefulShutdownMs,
      retentionMs: options.retentionMs,
      sweepIntervalMs: options.sweepIntervalMs,
      accessToken: options.accessToken,
      logLevel: options.logLevel,
    });
    const daemon = createDaemon(config);

    const shutdown = (signal: NodeJS.Signals) => {
      log.info({ signal }, "shutting down");
      daemon.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, "shutdown failed");
          process.exit(1);
        },
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    await daemon.start();
  });

program.parseAsync().catch((err: unknown) => {
  log.fatal({ err }, "execd failed to start");
  process.exit(1);
});
