/**
 * # execd Shared Types
 *
 * Wire protocol, error classes and request schemas shared by
 * `@execd/runtime` and `@execd/server`.
 *
 * ```typescript
 * import { RunCommandRequestSchema, InvalidRequestError } from '@execd/shared';
 *
 * const parsed = RunCommandRequestSchema.safeParse(body);
 * if (!parsed.success) throw new InvalidRequestError(formatIssues(parsed.error));
 * ```
 *
 * @module @execd/shared
 */

export * from "./protocol.js";
export * from "./errors.js";
export * from "./schemas.js";
export { generateSessionId } from "./utils/entity-ids.js";
