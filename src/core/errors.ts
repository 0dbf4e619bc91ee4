// core/errors.ts — Gateway error taxonomy. One class, discriminated by `kind`.

export type GatewayErrorKind =
  | "Busy"
  | "Timeout"
  | "Cancelled"
  | "ModelUnknown"
  | "InsufficientAccessLevel"
  | "InsufficientCredit"
  | "PayloadTooLarge"
  | "AuthError"
  | "RateLimited"
  | "UpstreamUnavailable"
  | "InvalidResponse"
  | "ModelInUse"
  | "ModelExists"
  | "NotFound"
  | "InvalidInput"
  | "Internal";

const RETRYABLE: ReadonlySet<GatewayErrorKind> = new Set(["RateLimited", "UpstreamUnavailable"]);

export interface GatewayErrorOptions {
  cause?: unknown;
  retryAfterMs?: number;
}

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly retryAfterMs?: number;

  constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GatewayError";
    this.kind = kind;
    this.retryAfterMs = options.retryAfterMs;
  }

  get retryable(): boolean {
    return RETRYABLE.has(this.kind);
  }

  toJSON(): { error: string; kind: GatewayErrorKind } {
    return { error: this.message, kind: this.kind };
  }
}

export function isGatewayError(value: unknown): value is GatewayError {
  return value instanceof GatewayError;
}

/** Anything that is not already a GatewayError becomes `Internal`, keeping the cause. */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;
  return new GatewayError("Internal", "Internal error while processing the request", {
    cause: error,
  });
}

/** The reason an AbortSignal was aborted with, or a plain cancellation. */
export function abortError(signal: AbortSignal): GatewayError {
  return signal.reason instanceof GatewayError
    ? signal.reason
    : new GatewayError("Cancelled", "Request was cancelled");
}
