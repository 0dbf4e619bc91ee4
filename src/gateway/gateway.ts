// gateway/gateway.ts — Provider gateway: routes a request to its adapter, normalizes the
// stream, and retries retryable failures that happen before any output was produced.

import { setTimeout as sleep } from "node:timers/promises";

import { logger } from "../config/logger.js";
import { abortError, GatewayError } from "../core/errors.js";
import type { AssembledMessage } from "../core/types.js";
import type { StreamEvent } from "./adapter.js";
import { classifyProviderError } from "./classify.js";
import type { ProviderRegistry } from "./registry.js";

export interface GatewayOptions {
  maxRetries: number;
  retryBaseMs: number;
}

export interface GatewayRequest {
  modelName: string;
  messages: readonly AssembledMessage[];
  signal: AbortSignal;
  requestId?: string;
}

export class ProviderGateway {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly options: GatewayOptions,
  ) {}

  backoffMs(attempt: number, failure: GatewayError): number {
    return failure.retryAfterMs ?? this.options.retryBaseMs * 2 ** (attempt - 1);
  }

  /**
   * Never throws: the sequence always ends with `done` or `failed`. Once a chunk has been
   * yielded the stream cannot be restarted, so a later failure is returned as-is.
   */
  async *stream({ modelName, messages, signal, requestId }: GatewayRequest): AsyncGenerator<StreamEvent> {
    const route = this.registry.resolve(modelName);
    if (!route) {
      yield {
        type: "failed",
        error: new GatewayError("ModelUnknown", `No provider is configured for model '${modelName}'`),
      };
      return;
    }

    const { adapter, upstreamModel } = route;
    const log = logger.child({ requestId, model: modelName, provider: adapter.key });

    for (let attempt = 0; ; attempt += 1) {
      let emitted = false;
      let failure: GatewayError | null = null;

      try {
        for await (const event of adapter.stream(messages, upstreamModel, { signal })) {
          if (signal.aborted) break;
          if (event.type === "failed") {
            failure = event.error;
            break;
          }
          if (event.type === "chunk") emitted = true;
          yield event;
          if (event.type === "done") return;
        }
      } catch (error) {
        failure = signal.aborted ? null : classifyProviderError(error);
      }

      if (signal.aborted) {
        yield { type: "failed", error: abortError(signal) };
        return;
      }

      const error =
        failure ?? new GatewayError("InvalidResponse", "Provider stream ended without completing");

      if (!error.retryable || emitted || attempt >= this.options.maxRetries) {
        log.warn({ kind: error.kind, attempt, emitted }, "Provider call failed");
        yield { type: "failed", error };
        return;
      }

      const delay = this.backoffMs(attempt + 1, error);
      log.info({ kind: error.kind, attempt: attempt + 1, delay }, "Retrying provider call");
      try {
        await sleep(delay, undefined, { signal });
      } catch {
        yield { type: "failed", error: abortError(signal) };
        return;
      }
    }
  }
}
