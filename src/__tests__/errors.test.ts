// Tests for core/errors.ts and routes/http-error.ts — the error taxonomy and its HTTP mapping.

import { Hono } from "hono";
import { describe, expect, it } from "vitest";

import { abortError, GatewayError, toGatewayError } from "../core/errors.js";
import { handleError, statusFor } from "../routes/http-error.js";

describe("GatewayError", () => {
  it("derives retryability from the kind", () => {
    expect(new GatewayError("RateLimited", "x").retryable).toBe(true);
    expect(new GatewayError("UpstreamUnavailable", "x").retryable).toBe(true);
    expect(new GatewayError("AuthError", "x").retryable).toBe(false);
    expect(new GatewayError("InvalidResponse", "x").retryable).toBe(false);
    expect(new GatewayError("Busy", "x").retryable).toBe(false);
  });

  it("serializes to the wire body", () => {
    expect(JSON.stringify(new GatewayError("Busy", "wait"))).toBe('{"error":"wait","kind":"Busy"}');
  });
});

describe("toGatewayError", () => {
  it("wraps foreign errors as Internal and keeps the cause", () => {
    const cause = new Error("db down");
    const error = toGatewayError(cause);
    expect(error.kind).toBe("Internal");
    expect(error.cause).toBe(cause);
  });
});

describe("abortError", () => {
  it("returns the GatewayError the signal was aborted with", () => {
    const controller = new AbortController();
    const reason = new GatewayError("Timeout", "late");
    controller.abort(reason);
    expect(abortError(controller.signal)).toBe(reason);
  });

  it("falls back to Cancelled for any other reason", () => {
    const controller = new AbortController();
    controller.abort();
    expect(abortError(controller.signal).kind).toBe("Cancelled");
  });
});

describe("HTTP mapping", () => {
  it.each([
    ["Busy", 429],
    ["RateLimited", 429],
    ["Timeout", 504],
    ["Cancelled", 408],
    ["ModelUnknown", 404],
    ["NotFound", 404],
    ["InsufficientAccessLevel", 403],
    ["InsufficientCredit", 402],
    ["PayloadTooLarge", 413],
    ["AuthError", 502],
    ["UpstreamUnavailable", 502],
    ["InvalidResponse", 502],
    ["ModelInUse", 409],
    ["ModelExists", 409],
    ["InvalidInput", 400],
    ["Internal", 500],
  ] as const)("%s -> %i", (kind, status) => {
    expect(statusFor(kind)).toBe(status);
  });

  it("answers unknown exceptions with a generic 500", async () => {
    const app = new Hono();
    app.onError(handleError);
    app.get("/boom", () => {
      throw new Error("secret detail");
    });
    const res = await app.request("/boom");
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Internal server error", kind: "Internal" });
  });

  it("answers gateway errors with their kind and status", async () => {
    const app = new Hono();
    app.onError(handleError);
    app.get("/credit", () => {
      throw new GatewayError("InsufficientCredit", "top up first");
    });
    const res = await app.request("/credit");
    expect(res.status).toBe(402);
    expect(await res.json()).toEqual({ error: "top up first", kind: "InsufficientCredit" });
  });
});
