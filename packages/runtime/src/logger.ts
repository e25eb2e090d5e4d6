/**
 * Structured logging.
 *
 * A single pino root with one child per component. Modules grab their logger
 * once at load time (`const log = Logger.for("Tailer")`), so the level is
 * pushed down to every child whenever it changes.
 *
 * @module @execd/runtime/logger
 */

import { pino, type Logger as PinoLogger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type ComponentLogger = PinoLogger;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const root = pino({
  name: "execd",
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info",
});

const children = new Map<string, ComponentLogger>();

export const Logger = {
  /**
   * Logger bound to `{ component }`. Repeated calls return the same instance.
   */
  for(component: string): ComponentLogger {
    let child = children.get(component);
    if (!child) {
      child = root.child({ component });
      children.set(component, child);
    }
    return child;
  },

  configure(config: { level?: LogLevel }): void {
    if (!config.level) return;
    root.level = config.level;
    for (const child of children.values()) {
      child.level = config.level;
    }
  },

  get level(): string {
    return root.level;
  },
};
