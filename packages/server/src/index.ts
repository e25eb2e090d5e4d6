/**
 * @execd/server - HTTP surface of the command execution daemon
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { CommandRunner } from '@execd/runtime';
 * import { createCommandRouter } from '@execd/server';
 *
 * const app = express();
 * app.use('/execd', createCommandRouter(new CommandRunner({ outputDir: '/tmp/execd' })));
 * app.listen(44772);
 * ```
 *
 * @module @execd/server
 */

export { createCommandRouter, toStatusResponse, parseCursor, DEFAULT_GRACEFUL_SHUTDOWN_MS } from "./router.js";
export { createSSEWriter, setSSEHeaders, parseSSEEvents } from "./sse.js";
export { extractAccessToken, validateAccessToken, requireAccessToken } from "./auth.js";
export { errorHandler, sendError, toErrorResponse } from "./errors.js";
export {
  DaemonConfigSchema,
  loadConfig,
  ConfigError,
  ENV_KEYS,
  DEFAULT_PORT,
  type DaemonConfig,
  type DaemonConfigInput,
} from "./config.js";
export { createDaemon, type Daemon, type DaemonOverrides } from "./daemon.js";
export type { SSEWriter, SSEWriterOptions, CommandRouterOptions } from "./types.js";
