/**
 * Access-token authentication for @execd/server
 *
 * The daemon optionally shares a static token with its callers. When one is
 * configured, every request must present it in `X-EXECD-ACCESS-TOKEN`.
 *
 * @module @execd/server/auth
 */

import { timingSafeEqual } from "node:crypto";
import type { RequestHandler } from "express";
import { ACCESS_TOKEN_HEADER, UnauthorizedError } from "@execd/shared";

/**
 * Extract the access token from a request.
 */
export function extractAccessToken(req: {
  headers?: { [key: string]: string | string[] | undefined };
}): string | undefined {
  const value = req.headers?.[ACCESS_TOKEN_HEADER.toLowerCase()];
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  return undefined;
}

/**
 * Compare a presented token with the configured one in constant time.
 * No configured token means every request is allowed.
 */
export function validateAccessToken(token: string | undefined, expected: string | undefined): boolean {
  if (!expected) return true;
  if (!token) return false;

  const presented = Buffer.from(token);
  const wanted = Buffer.from(expected);
  if (presented.length !== wanted.length) return false;
  return timingSafeEqual(presented, wanted);
}

/**
 * Express middleware rejecting requests without the configured token.
 */
export function requireAccessToken(expected: string | undefined): RequestHandler {
  return (req, _res, next) => {
    if (validateAccessToken(extractAccessToken(req), expected)) {
      next();
      return;
    }
    next(new UnauthorizedError());
  };
}
