// routes/http-error.ts — HTTP mapping of the gateway error taxonomy.

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";

import { logger } from "../config/logger.js";
import { type GatewayErrorKind, isGatewayError } from "../core/errors.js";

const STATUS: Record<GatewayErrorKind, ContentfulStatusCode> = {
  Busy: 429,
  Timeout: 504,
  // the client has gone; nobody reads this
  Cancelled: 408,
  ModelUnknown: 404,
  InsufficientAccessLevel: 403,
  InsufficientCredit: 402,
  PayloadTooLarge: 413,
  AuthError: 502,
  RateLimited: 429,
  UpstreamUnavailable: 502,
  InvalidResponse: 502,
  ModelInUse: 409,
  ModelExists: 409,
  NotFound: 404,
  InvalidInput: 400,
  Internal: 500,
};

export function statusFor(kind: GatewayErrorKind): ContentfulStatusCode {
  return STATUS[kind];
}

/**
 * Router-level onError. Middleware exceptions (bearer auth, body limit) keep their own
 * response; gateway errors keep their kind; anything else is a 500.
 */
export function handleError(error: Error, c: Context): Response {
  if (error instanceof HTTPException) return error.getResponse();
  if (isGatewayError(error)) {
    if (error.kind === "Internal") logger.error({ err: error.cause ?? error }, "Request failed");
    return c.json(error.toJSON(), statusFor(error.kind));
  }
  logger.error({ err: error, path: c.req.path }, "Unhandled error");
  return c.json({ error: "Internal server error", kind: "Internal" }, 500);
}
