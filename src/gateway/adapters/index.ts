// gateway/adapters/index.ts — Builds the adapters whose credentials are configured.

import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOpenRouter } from "@openrouter/ai-sdk-provider";

import type { Env } from "../../config/env.js";
import type { ProviderAdapter } from "../adapter.js";
import { ChatCompletionsAdapter } from "./chat-completions.js";

function openAICompatible(
  key: string,
  baseURL: string,
  apiKey: string,
  timeZone: string,
  instructions?: string,
): ProviderAdapter {
  const provider = createOpenAICompatible({ name: key, baseURL, apiKey });
  return new ChatCompletionsAdapter(key, (modelId) => provider.chatModel(modelId), {
    timeZone,
    instructions,
  });
}

export function createConfiguredAdapters(env: Env): ProviderAdapter[] {
  const adapters: ProviderAdapter[] = [];
  const timeZone = env.PROVIDER_TIMEZONE;

  if (env.AISTUDIO_API_KEY) {
    adapters.push(openAICompatible("aistudio", env.AISTUDIO_BASE_URL, env.AISTUDIO_API_KEY, timeZone));
  }
  if (env.PROXYVN_API_KEY) {
    adapters.push(openAICompatible("proxyvn", env.PROXYVN_BASE_URL, env.PROXYVN_API_KEY, timeZone));
  }
  if (env.POLYDEVS_API_KEY) {
    adapters.push(
      openAICompatible(
        "polydevs",
        env.POLYDEVS_BASE_URL,
        env.POLYDEVS_API_KEY,
        timeZone,
        env.POLYDEVS_INSTRUCTIONS,
      ),
    );
  }
  if (env.OPENROUTER_API_KEY) {
    const openrouter = createOpenRouter({ apiKey: env.OPENROUTER_API_KEY });
    adapters.push(
      new ChatCompletionsAdapter("openrouter", (modelId) => openrouter.chat(modelId), { timeZone }),
    );
  }

  return adapters;
}
