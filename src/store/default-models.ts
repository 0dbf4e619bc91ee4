// store/default-models.ts — Catalogue seeded into an empty models table.

import { AccessLevel, type ModelDescriptor } from "../core/types.js";

export const DEFAULT_MODELS: ModelDescriptor[] = [
  {
    name: "gemini-2.5-flash",
    provider: "aistudio",
    upstreamModel: null,
    creditCost: 10,
    minAccessLevel: AccessLevel.Basic,
  },
  {
    name: "gemini-2.5-pro",
    provider: "aistudio",
    upstreamModel: null,
    creditCost: 50,
    minAccessLevel: AccessLevel.Basic,
  },
  {
    name: "gpt-3.5-turbo",
    provider: "proxyvn",
    upstreamModel: null,
    creditCost: 200,
    minAccessLevel: AccessLevel.Basic,
  },
  {
    name: "gpt-5",
    provider: "proxyvn",
    upstreamModel: null,
    creditCost: 700,
    minAccessLevel: AccessLevel.Advanced,
  },
];
