// gateway/adapters/chat-completions.ts — Adapter for OpenAI-style chat completion APIs,
// driven through the AI SDK. One instance per configured upstream.

import { type LanguageModel, type ModelMessage, streamText } from "ai";

import { logger } from "../../config/logger.js";
import type { AssembledMessage, ContentPart, TextPart } from "../../core/types.js";
import type { ProviderAdapter, StreamEvent, StreamOptions } from "../adapter.js";
import { classifyProviderError } from "../classify.js";

export type ModelFactory = (modelId: string) => LanguageModel;

export interface RequestShaping {
  /** IANA zone of the timestamp prepended to the system context. */
  timeZone: string;
  /** Provider-specific instructions appended after the user's system prompt. */
  instructions?: string;
  now?: () => Date;
}

export function formatTimestamp(date: Date, timeZone: string): string {
  // sv-SE renders as "YYYY-MM-DD HH:mm:ss"
  return `${date.toLocaleString("sv-SE", { timeZone })} (${timeZone})`;
}

function textOf(content: readonly ContentPart[]): string {
  return content
    .filter((part): part is TextPart => part.kind === "text")
    .map((part) => part.value)
    .join("\n");
}

function toUserContent(content: readonly ContentPart[]) {
  return content.map((part) =>
    part.kind === "text"
      ? { type: "text" as const, text: part.value }
      : { type: "image" as const, image: new URL(part.uri) },
  );
}

/** Splits assembled messages into the SDK's `system` string and message list. */
export function toModelMessages(
  messages: readonly AssembledMessage[],
  systemPrefix: string,
): { system: string; messages: ModelMessage[] } {
  const systemParts = [systemPrefix];
  const converted: ModelMessage[] = [];

  for (const message of messages) {
    switch (message.role) {
      case "system":
        systemParts.push(textOf(message.content));
        break;
      case "user":
        converted.push({ role: "user", content: toUserContent(message.content) });
        break;
      case "assistant":
        converted.push({ role: "assistant", content: textOf(message.content) });
        break;
    }
  }

  return { system: systemParts.filter((s) => s.length > 0).join(" "), messages: converted };
}

export class ChatCompletionsAdapter implements ProviderAdapter {
  constructor(
    readonly key: string,
    private readonly createModel: ModelFactory,
    private readonly shaping: RequestShaping,
  ) {}

  private systemPrefix(): string {
    const now = this.shaping.now?.() ?? new Date();
    return `The current date and time is ${formatTimestamp(now, this.shaping.timeZone)}.`;
  }

  async *stream(
    messages: readonly AssembledMessage[],
    modelName: string,
    { signal }: StreamOptions,
  ): AsyncIterable<StreamEvent> {
    const prompt = toModelMessages(messages, this.systemPrefix());
    const system = this.shaping.instructions
      ? `${prompt.system} ${this.shaping.instructions}`
      : prompt.system;

    const result = streamText({
      model: this.createModel(modelName),
      system,
      messages: prompt.messages,
      abortSignal: signal,
      // retries are owned by the gateway
      maxRetries: 0,
      onError: ({ error }) => {
        logger.debug({ err: error, provider: this.key, model: modelName }, "Provider stream error");
      },
    });

    for await (const part of result.fullStream) {
      switch (part.type) {
        case "text-delta":
          if (part.text.length > 0) yield { type: "chunk", text: part.text };
          break;
        case "error":
          yield { type: "failed", error: classifyProviderError(part.error) };
          return;
        case "finish":
          yield {
            type: "done",
            usage: {
              inputTokens: part.totalUsage.inputTokens,
              outputTokens: part.totalUsage.outputTokens,
              totalTokens: part.totalUsage.totalTokens,
            },
          };
          return;
        default:
          break;
      }
    }
  }
}
