// middleware/rate-limiter.ts — In-memory rate limiters, keyed by client address.

import { getConnInfo } from "@hono/node-server/conninfo";
import type { Context } from "hono";
import { rateLimiter } from "hono-rate-limiter";

import { env } from "../config/env.js";

/**
 * Client address. x-forwarded-for is only trusted in production, where the gateway runs
 * behind a reverse proxy; the last entry is the one that proxy appended.
 */
export function clientIp(c: Context): string {
  if (env.NODE_ENV === "production") {
    const xff = c.req.header("x-forwarded-for");
    if (xff) {
      const parts = xff
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);
      return parts[parts.length - 1] ?? "unknown";
    }
  }
  return c.req.header("x-real-ip") ?? getConnInfo(c).remote.address ?? "unknown";
}

export const globalLimiter = rateLimiter({
  windowMs: 60 * 1000,
  limit: 300,
  keyGenerator: (c) => clientIp(c),
  standardHeaders: "draft-7",
});

// Bots relay many users from one address; the per-user queue does the fine-grained limiting.
export const chatLimiter = rateLimiter({
  windowMs: 60 * 1000,
  limit: 120,
  keyGenerator: (c) => `chat:${clientIp(c)}`,
  standardHeaders: "draft-7",
});
