// Tests for context/assembler.ts — budget trimming, turn cap, prompt fallback, idempotence.

import { describe, expect, it } from "vitest";

import { assembleContext, resolveSystemPrompt } from "../context/assembler.js";
import { createTurn, estimateContentTokens } from "../context/tokens.js";
import { GatewayError } from "../core/errors.js";
import type { Turn } from "../core/types.js";

const DEFAULT_PROMPT = "Be helpful.";

function text(value: string) {
  return [{ kind: "text" as const, value }];
}

/** `count` alternating user/assistant turns of `chars` characters each. */
function history(count: number, chars = 40): Turn[] {
  return Array.from({ length: count }, (_, i) => ({
    ...createTurn(i % 2 === 0 ? "user" : "assistant", text(`${i}`.padEnd(chars, "."))),
    seq: i + 1,
    createdAt: new Date(0),
  }));
}

// "Be helpful." is 11 chars -> 3 tokens + 4 overhead
const SYSTEM_TOKENS = 7;

describe("resolveSystemPrompt", () => {
  it("falls back to the default for missing or blank prompts", () => {
    expect(resolveSystemPrompt(null, DEFAULT_PROMPT)).toBe(DEFAULT_PROMPT);
    expect(resolveSystemPrompt(undefined, DEFAULT_PROMPT)).toBe(DEFAULT_PROMPT);
    expect(resolveSystemPrompt("   ", DEFAULT_PROMPT)).toBe(DEFAULT_PROMPT);
    expect(resolveSystemPrompt("Talk like a pirate.", DEFAULT_PROMPT)).toBe("Talk like a pirate.");
  });
});

describe("assembleContext", () => {
  it("orders system prompt, history and the new turn", () => {
    const newTurn = createTurn("user", text("hi"));
    const result = assembleContext({
      systemPrompt: null,
      defaultSystemPrompt: DEFAULT_PROMPT,
      history: history(2),
      newTurn,
      maxTokens: 1000,
      maxTurns: 25,
    });

    expect(result.messages.map((m) => m.role)).toEqual(["system", "user", "assistant", "user"]);
    expect(result.messages[0]).toEqual({ role: "system", content: text(DEFAULT_PROMPT) });
    expect(result.messages[3]).toEqual({ role: "user", content: text("hi") });
    expect(result.droppedTurns).toBe(0);
    // two 40-char turns at 14 tokens each, "hi" at 5
    expect(result.estimatedTokens).toBe(SYSTEM_TOKENS + 14 + 14 + 5);
  });

  it("trims the oldest turns when 50 turns exceed the budget", () => {
    const turns = history(50);
    const newTurn = createTurn("user", text("latest question"));
    const maxTokens = 200;
    const result = assembleContext({
      systemPrompt: null,
      defaultSystemPrompt: DEFAULT_PROMPT,
      history: turns,
      newTurn,
      maxTokens,
      maxTurns: 100,
    });

    // 200 - 7 (system) - 8 (new turn) = 185 left -> 13 turns of 14 tokens
    expect(result.droppedTurns).toBe(37);
    expect(result.messages).toHaveLength(1 + 13 + 1);
    expect(result.messages[0]?.role).toBe("system");
    expect(result.messages[1]).toEqual({ role: turns[37]?.role, content: turns[37]?.content });
    expect(result.messages.at(-1)).toEqual({ role: "user", content: text("latest question") });
    expect(result.estimatedTokens).toBeLessThanOrEqual(maxTokens);
  });

  it("caps history at maxTurns even when the budget allows more", () => {
    const result = assembleContext({
      systemPrompt: "x",
      defaultSystemPrompt: DEFAULT_PROMPT,
      history: history(10),
      newTurn: createTurn("user", text("q")),
      maxTokens: 100_000,
      maxTurns: 4,
    });
    expect(result.messages).toHaveLength(6);
    expect(result.droppedTurns).toBe(6);
  });

  it("sends no history when maxTurns is 0", () => {
    const result = assembleContext({
      systemPrompt: null,
      defaultSystemPrompt: DEFAULT_PROMPT,
      history: history(3),
      newTurn: createTurn("user", text("q")),
      maxTokens: 1000,
      maxTurns: 0,
    });
    expect(result.messages.map((m) => m.role)).toEqual(["system", "user"]);
    expect(result.droppedTurns).toBe(3);
  });

  it("keeps the suffix contiguous when an older turn would still fit", () => {
    const turns = history(3);
    // make the middle turn too large for the remaining budget
    const withBig: Turn[] = [
      turns[0],
      { ...turns[1], ...createTurn("assistant", text("y".repeat(400))) },
      turns[2],
    ];
    const result = assembleContext({
      systemPrompt: null,
      defaultSystemPrompt: DEFAULT_PROMPT,
      history: withBig,
      newTurn: createTurn("user", text("q")),
      maxTokens: 60,
      maxTurns: 25,
    });
    // only the newest turn fits; the oldest is not pulled in around the gap
    expect(result.droppedTurns).toBe(2);
    expect(result.messages).toHaveLength(3);
  });

  it("raises PayloadTooLarge when the new turn alone does not fit", () => {
    const newTurn = createTurn("user", text("z".repeat(2000)));
    let caught: unknown;
    try {
      assembleContext({
        systemPrompt: null,
        defaultSystemPrompt: DEFAULT_PROMPT,
        history: [],
        newTurn,
        maxTokens: 100,
        maxTurns: 25,
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(GatewayError);
    expect(caught).toMatchObject({ kind: "PayloadTooLarge" });
  });

  it("fits exactly at the budget boundary", () => {
    const newTurn = createTurn("user", text("abcd"));
    const maxTokens = SYSTEM_TOKENS + estimateContentTokens(newTurn.content);
    const result = assembleContext({
      systemPrompt: null,
      defaultSystemPrompt: DEFAULT_PROMPT,
      history: history(2),
      newTurn,
      maxTokens,
      maxTurns: 25,
    });
    expect(result.estimatedTokens).toBe(maxTokens);
    expect(result.droppedTurns).toBe(2);
  });

  it("returns the same messages for the same inputs", () => {
    const input = {
      systemPrompt: "Be brief.",
      defaultSystemPrompt: DEFAULT_PROMPT,
      history: history(30),
      newTurn: createTurn("user", text("again")),
      maxTokens: 300,
      maxTurns: 25,
    };
    expect(assembleContext(input)).toEqual(assembleContext(input));
  });
});
