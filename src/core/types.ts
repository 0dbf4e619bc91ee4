// core/types.ts — Domain types shared by the store, policy, assembler, gateway and queue.

/** Ordered access levels. Numeric so that comparisons read naturally. */
export const AccessLevel = {
  Basic: 0,
  Advanced: 1,
  Ultimate: 2,
  Owner: 3,
} as const;

export type AccessLevel = (typeof AccessLevel)[keyof typeof AccessLevel];

export const ACCESS_LEVELS: readonly AccessLevel[] = [
  AccessLevel.Basic,
  AccessLevel.Advanced,
  AccessLevel.Ultimate,
  AccessLevel.Owner,
];

export function isAccessLevel(value: number): value is AccessLevel {
  return ACCESS_LEVELS.some((level) => level === value);
}

export function accessLevelName(level: AccessLevel): string {
  switch (level) {
    case AccessLevel.Basic:
      return "Basic";
    case AccessLevel.Advanced:
      return "Advanced";
    case AccessLevel.Ultimate:
      return "Ultimate";
    case AccessLevel.Owner:
      return "Owner";
  }
}

export interface UserProfile {
  userId: string;
  preferredModel: string | null;
  systemPrompt: string | null;
  accessLevel: AccessLevel;
  creditBalance: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ModelDescriptor {
  name: string;
  /** Registry key of the adapter that serves this model. */
  provider: string;
  /** Model id sent upstream when it differs from the public name. */
  upstreamModel: string | null;
  creditCost: number;
  minAccessLevel: AccessLevel;
}

export type Role = "user" | "assistant";

export interface TextPart {
  kind: "text";
  value: string;
}

export interface ImagePart {
  kind: "image";
  uri: string;
  width?: number;
  height?: number;
}

export type ContentPart = TextPart | ImagePart;

/** A turn as submitted or about to be stored; `tokenEstimate` is computed at write time. */
export interface NewTurn {
  role: Role;
  content: ContentPart[];
  tokenEstimate: number;
  model?: string | null;
}

export interface Turn extends NewTurn {
  seq: number;
  createdAt: Date;
}

/** Provider-agnostic message handed to adapters. */
export interface AssembledMessage {
  role: "system" | Role;
  content: ContentPart[];
}

export interface TokenUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}
