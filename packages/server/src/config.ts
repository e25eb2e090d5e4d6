/**
 * Daemon configuration.
 *
 * Priority: CLI flags > environment (`EXECD_*`) > defaults.
 *
 * @module @execd/server/config
 */

import { tmpdir } from "node:os";
import { z } from "zod";
import { formatIssues } from "@execd/shared";
import {
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_MAX_RECORD_BYTES,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_RETENTION_MS,
  DEFAULT_SHELL,
  DEFAULT_SWEEP_INTERVAL_MS,
  LOG_LEVELS,
} from "@execd/runtime";
import { DEFAULT_GRACEFUL_SHUTDOWN_MS } from "./router.js";

export const DEFAULT_PORT = 44772;

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

export const DaemonConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  host: z.string().min(1).default("0.0.0.0"),
  outputDir: z.string().min(1).default(() => tmpdir()),
  shell: z.string().min(1).default(DEFAULT_SHELL),
  pollIntervalMs: positiveInt.default(DEFAULT_POLL_INTERVAL_MS),
  maxRecordBytes: positiveInt.default(DEFAULT_MAX_RECORD_BYTES),
  killGraceMs: nonNegativeInt.default(DEFAULT_KILL_GRACE_MS),
  gracefulShutdownMs: nonNegativeInt.default(DEFAULT_GRACEFUL_SHUTDOWN_MS),
  retentionMs: nonNegativeInt.default(DEFAULT_RETENTION_MS),
  sweepIntervalMs: positiveInt.default(DEFAULT_SWEEP_INTERVAL_MS),
  accessToken: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;

/** Raw values as they arrive from flags or the environment. */
export type DaemonConfigInput = { [K in keyof DaemonConfig]?: string | number };

const CONFIG_KEYS = [
  "port",
  "host",
  "outputDir",
  "shell",
  "pollIntervalMs",
  "maxRecordBytes",
  "killGraceMs",
  "gracefulShutdownMs",
  "retentionMs",
  "sweepIntervalMs",
  "accessToken",
  "logLevel",
] as const satisfies ReadonlyArray<keyof DaemonConfig>;

export const ENV_KEYS: { readonly [K in keyof DaemonConfig]-?: string } = {
  port: "EXECD_PORT",
  host: "EXECD_HOST",
  outputDir: "EXECD_OUTPUT_DIR",
  shell: "EXECD_SHELL",
  pollIntervalMs: "EXECD_POLL_INTERVAL_MS",
  maxRecordBytes: "EXECD_MAX_RECORD_BYTES",
  killGraceMs: "EXECD_KILL_GRACE_MS",
  gracefulShutdownMs: "EXECD_GRACEFUL_SHUTDOWN_MS",
  retentionMs: "EXECD_RETENTION_MS",
  sweepIntervalMs: "EXECD_SWEEP_INTERVAL_MS",
  accessToken: "EXECD_ACCESS_TOKEN",
  logLevel: "EXECD_LOG_LEVEL",
};

export class ConfigError extends Error {
  readonly name = "ConfigError";
  readonly code = "CONFIG_INVALID";
}

/**
 * Load configuration from CLI options and the environment.
 * Empty strings count as unset.
 */
export function loadConfig(
  cliOptions: DaemonConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): DaemonConfig {
  const merged: DaemonConfigInput = {};
  for (const key of CONFIG_KEYS) {
    const value = pick(cliOptions[key]) ?? pick(env[ENV_KEYS[key]]);
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const parsed = DaemonConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function pick(value: string | number | undefined): string | number | undefined {
  return value === "" ? undefined : value;
}
