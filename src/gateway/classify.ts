// gateway/classify.ts — Maps upstream errors onto the provider failure taxonomy.

import { APICallError, RetryError } from "ai";

import { GatewayError } from "../core/errors.js";

const MALFORMED_PAYLOAD_ERRORS = new Set([
  "AI_InvalidResponseDataError",
  "AI_JSONParseError",
  "AI_TypeValidationError",
  "AI_NoContentGeneratedError",
]);

function retryAfterMs(headers: Record<string, string> | undefined): number | undefined {
  const raw = headers?.["retry-after"];
  if (!raw) return undefined;
  const seconds = Number(raw);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(raw);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

function fromStatus(error: APICallError): GatewayError {
  const status = error.statusCode;
  if (status === 401 || status === 403) {
    return new GatewayError("AuthError", `Provider rejected credentials (${status})`, {
      cause: error,
    });
  }
  if (status === 429) {
    return new GatewayError("RateLimited", "Provider rate limit reached", {
      cause: error,
      retryAfterMs: retryAfterMs(error.responseHeaders),
    });
  }
  if (status === undefined || status === 408 || status >= 500) {
    return new GatewayError("UpstreamUnavailable", `Provider unavailable (${status ?? "network"})`, {
      cause: error,
    });
  }
  return new GatewayError("InvalidResponse", `Provider rejected the request (${status})`, {
    cause: error,
  });
}

export function classifyProviderError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;
  if (RetryError.isInstance(error)) return classifyProviderError(error.lastError);
  if (APICallError.isInstance(error)) return fromStatus(error);
  if (error instanceof Error && MALFORMED_PAYLOAD_ERRORS.has(error.name)) {
    return new GatewayError("InvalidResponse", "Provider returned a malformed response", {
      cause: error,
    });
  }
  // fetch failures, socket resets and anything else outside the SDK's error types
  const message = error instanceof Error ? error.message : String(error);
  return new GatewayError("UpstreamUnavailable", `Provider call failed: ${message}`, {
    cause: error,
  });
}
