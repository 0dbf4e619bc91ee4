// Tests for context/tokens.ts — text and image estimates, turn construction.

import { describe, expect, it } from "vitest";

import {
  createTurn,
  estimateContentTokens,
  estimateImageTokens,
  estimateTextTokens,
  MESSAGE_OVERHEAD_TOKENS,
} from "../context/tokens.js";

const image = (width?: number, height?: number) => ({
  kind: "image" as const,
  uri: "https://example.com/cat.png",
  width,
  height,
});

describe("estimateTextTokens", () => {
  it("charges one token per four characters, rounded up", () => {
    expect(estimateTextTokens("")).toBe(0);
    expect(estimateTextTokens("abcd")).toBe(1);
    expect(estimateTextTokens("abcde")).toBe(2);
    expect(estimateTextTokens("x".repeat(400))).toBe(100);
  });
});

describe("estimateImageTokens", () => {
  it("prices a single tile image at base plus one tile", () => {
    expect(estimateImageTokens(image(512, 512))).toBe(85 + 170);
  });

  it("counts partial tiles as whole tiles", () => {
    // 2 x 2 tiles
    expect(estimateImageTokens(image(513, 600))).toBe(85 + 170 * 4);
  });

  it("caps the tile count at 16", () => {
    expect(estimateImageTokens(image(8000, 8000))).toBe(85 + 170 * 16);
  });

  it("prices an image without dimensions as 4 tiles", () => {
    expect(estimateImageTokens(image())).toBe(765);
    expect(estimateImageTokens(image(0, 100))).toBe(765);
  });

  it("never prices a larger image below a smaller one", () => {
    const sizes = [1, 100, 511, 512, 513, 1024, 1500, 2048, 3000, 4096];
    for (const w of sizes) {
      for (const h of sizes) {
        const cost = estimateImageTokens(image(w, h));
        for (const w2 of sizes.filter((s) => s >= w)) {
          for (const h2 of sizes.filter((s) => s >= h)) {
            expect(estimateImageTokens(image(w2, h2))).toBeGreaterThanOrEqual(cost);
          }
        }
      }
    }
  });
});

describe("estimateContentTokens", () => {
  it("adds the per-message overhead to the parts", () => {
    expect(
      estimateContentTokens([
        { kind: "text", value: "hello world!" },
        image(512, 512),
      ]),
    ).toBe(MESSAGE_OVERHEAD_TOKENS + 3 + 255);
  });

  it("charges only the overhead for empty content", () => {
    expect(estimateContentTokens([])).toBe(MESSAGE_OVERHEAD_TOKENS);
  });
});

describe("createTurn", () => {
  it("computes the estimate once and defaults model to null", () => {
    const turn = createTurn("user", [{ kind: "text", value: "12345678" }]);
    expect(turn).toEqual({
      role: "user",
      content: [{ kind: "text", value: "12345678" }],
      tokenEstimate: 6,
      model: null,
    });
  });

  it("records the model on assistant turns", () => {
    expect(createTurn("assistant", [], "gpt-5").model).toBe("gpt-5");
  });
});
