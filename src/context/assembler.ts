// context/assembler.ts — Builds the bounded, provider-agnostic message list for one turn.

import { GatewayError } from "../core/errors.js";
import type { AssembledMessage, NewTurn, Turn } from "../core/types.js";
import { estimateContentTokens } from "./tokens.js";

export interface AssembleInput {
  /** The user's configured prompt; blank falls back to `defaultSystemPrompt`. */
  systemPrompt: string | null | undefined;
  defaultSystemPrompt: string;
  /** Stored history, oldest first. */
  history: readonly Turn[];
  newTurn: NewTurn;
  maxTokens: number;
  maxTurns: number;
}

export interface AssembledContext {
  messages: AssembledMessage[];
  estimatedTokens: number;
  /** History turns left out by the turn cap or the token budget. */
  droppedTurns: number;
}

export function resolveSystemPrompt(prompt: string | null | undefined, fallback: string): string {
  return prompt && prompt.trim().length > 0 ? prompt : fallback;
}

/**
 * `[system, ...history suffix, newTurn]` where the suffix is the longest run of most
 * recent turns that fits both `maxTurns` and the token budget left after the system
 * prompt and the new turn. Turns are kept or dropped whole, oldest first.
 */
export function assembleContext(input: AssembleInput): AssembledContext {
  const prompt = resolveSystemPrompt(input.systemPrompt, input.defaultSystemPrompt);
  const system: AssembledMessage = { role: "system", content: [{ kind: "text", value: prompt }] };
  const fixedTokens = estimateContentTokens(system.content) + input.newTurn.tokenEstimate;

  if (fixedTokens > input.maxTokens) {
    throw new GatewayError(
      "PayloadTooLarge",
      `Message needs about ${fixedTokens} tokens with the system prompt; the limit is ${input.maxTokens}`,
    );
  }

  const candidates = input.maxTurns > 0 ? input.history.slice(-input.maxTurns) : [];
  let budget = input.maxTokens - fixedTokens;
  let start = candidates.length;
  while (start > 0 && candidates[start - 1].tokenEstimate <= budget) {
    budget -= candidates[start - 1].tokenEstimate;
    start -= 1;
  }
  const kept = candidates.slice(start);

  return {
    messages: [
      system,
      ...kept.map((turn): AssembledMessage => ({ role: turn.role, content: turn.content })),
      { role: input.newTurn.role, content: input.newTurn.content },
    ],
    estimatedTokens: input.maxTokens - budget,
    droppedTurns: input.history.length - kept.length,
  };
}
