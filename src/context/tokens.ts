// context/tokens.ts — Deterministic token estimates for multimodal turns.
//
// Text: ceil(length / 4) UTF-16 code units, the usual rule of thumb for BPE tokenizers.
// Images: tile-based. The image is covered by 512px tiles; cost is 85 + 170 per tile,
// capped at 16 tiles. Without known dimensions an image is priced as 2x2 tiles (765).
// Every message carries a fixed 4-token framing overhead.

import type { ContentPart, ImagePart, NewTurn, Role } from "../core/types.js";

export const CHARS_PER_TOKEN = 4;
export const MESSAGE_OVERHEAD_TOKENS = 4;

export const IMAGE_TILE_PX = 512;
export const IMAGE_BASE_TOKENS = 85;
export const IMAGE_TILE_TOKENS = 170;
export const IMAGE_MAX_TILES = 16;
export const IMAGE_DEFAULT_TILES = 4;

export function estimateTextTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

function hasDimensions(part: ImagePart): part is ImagePart & { width: number; height: number } {
  return (
    typeof part.width === "number" &&
    typeof part.height === "number" &&
    Number.isFinite(part.width) &&
    Number.isFinite(part.height) &&
    part.width > 0 &&
    part.height > 0
  );
}

export function estimateImageTokens(part: ImagePart): number {
  const tiles = hasDimensions(part)
    ? Math.ceil(part.width / IMAGE_TILE_PX) * Math.ceil(part.height / IMAGE_TILE_PX)
    : IMAGE_DEFAULT_TILES;
  return IMAGE_BASE_TOKENS + IMAGE_TILE_TOKENS * Math.min(tiles, IMAGE_MAX_TILES);
}

export function estimatePartTokens(part: ContentPart): number {
  return part.kind === "text" ? estimateTextTokens(part.value) : estimateImageTokens(part);
}

export function estimateContentTokens(content: ContentPart[]): number {
  return content.reduce((sum, part) => sum + estimatePartTokens(part), MESSAGE_OVERHEAD_TOKENS);
}

/** Build a turn ready to store, with its estimate computed once at write time. */
export function createTurn(role: Role, content: ContentPart[], model?: string | null): NewTurn {
  return { role, content, tokenEstimate: estimateContentTokens(content), model: model ?? null };
}
