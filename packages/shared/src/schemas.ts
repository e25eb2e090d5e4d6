/**
 * Request validation schemas.
 *
 * @module @execd/shared/schemas
 */

import { z } from "zod";

/** Session ids become file names, so no separators or dot-only names. */
export const SessionIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._-]+$/, "session id may only contain letters, digits, '.', '_' and '-'")
  .refine((id) => id !== "." && id !== "..", "session id may not be '.' or '..'");

export const RunCommandRequestSchema = z.object({
  command: z.string().refine((value) => value.trim().length > 0, "command must not be empty"),
  cwd: z.string().min(1).optional(),
  background: z.boolean().optional().default(false),
});

export type ParsedRunCommandRequest = z.infer<typeof RunCommandRequestSchema>;

/**
 * Flatten zod issues into one line for error envelopes.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
