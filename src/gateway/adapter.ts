// gateway/adapter.ts — Capability interface every provider backend implements.

import type { GatewayError } from "../core/errors.js";
import type { AssembledMessage, TokenUsage } from "../core/types.js";

/**
 * One element of a provider stream. A stream is finite and forward-only: zero or more
 * `chunk`s followed by exactly one `done` or `failed`.
 */
export type StreamEvent =
  | { type: "chunk"; text: string }
  | { type: "done"; usage: TokenUsage }
  | { type: "failed"; error: GatewayError };

export interface StreamOptions {
  signal: AbortSignal;
}

export interface ProviderAdapter {
  /** Registry key, e.g. "aistudio". */
  readonly key: string;
  /**
   * Stream a completion for `modelName` (the upstream id). Provider-specific shaping
   * (system context, headers, credentials) happens here and nowhere else.
   * Adapters may throw instead of yielding `failed`; the gateway classifies the error.
   */
  stream(
    messages: readonly AssembledMessage[],
    modelName: string,
    options: StreamOptions,
  ): AsyncIterable<StreamEvent>;
}
