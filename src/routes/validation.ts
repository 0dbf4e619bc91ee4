// routes/validation.ts — Shared zod schemas and body parsing for the HTTP routes.

import type { Context } from "hono";
import { z } from "zod/v4";

import { GatewayError } from "../core/errors.js";
import { AccessLevel } from "../core/types.js";

export const MAX_TEXT_LENGTH = 10_000;
export const MAX_IMAGES = 8;

export const userIdParam = z.string().min(1).max(128);

export const accessLevelSchema = z.union([
  z.literal(AccessLevel.Basic),
  z.literal(AccessLevel.Advanced),
  z.literal(AccessLevel.Ultimate),
  z.literal(AccessLevel.Owner),
]);

/** Parse the JSON body against `schema`; malformed JSON and schema failures are `InvalidInput`. */
export async function parseBody<T extends z.ZodType>(c: Context, schema: T): Promise<z.infer<T>> {
  const raw: unknown = await c.req.json().catch(() => undefined);
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new GatewayError("InvalidInput", issue?.message ?? "Invalid request body");
  }
  return parsed.data;
}

export function parseParam<T extends z.ZodType>(c: Context, name: string, schema: T): z.infer<T> {
  const parsed = schema.safeParse(c.req.param(name));
  if (!parsed.success) throw new GatewayError("InvalidInput", `Invalid ${name}`);
  return parsed.data;
}

export function parseUserId(c: Context): string {
  return parseParam(c, "userId", userIdParam);
}
