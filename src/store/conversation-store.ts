// store/conversation-store.ts — Persistence contracts consumed by the request pipeline.
// Per-user operations are durable and strongly consistent for that user; nothing is
// promised across users.

import type { AccessLevel, ModelDescriptor, NewTurn, Turn, UserProfile } from "../core/types.js";

export interface ProfileFields {
  preferredModel?: string | null;
  systemPrompt?: string | null;
  accessLevel?: AccessLevel;
  creditBalance?: number;
}

export interface CreditAdjustment {
  /** False when the balance was below `expectedMinBalance` at commit time. */
  applied: boolean;
  balance: number;
}

export interface ConversationStore {
  getProfile(userId: string): Promise<UserProfile | null>;
  /** Creates the profile when missing; only the given fields are written. */
  upsertProfile(userId: string, fields: ProfileFields): Promise<UserProfile>;
  getHistory(userId: string): Promise<Turn[]>;
  /** Appends all turns atomically, in order, after the user's current last turn. */
  append(userId: string, turns: NewTurn[]): Promise<Turn[]>;
  /** Returns the number of removed turns. */
  clear(userId: string): Promise<number>;
  /**
   * Adds `delta` to the balance only if the balance is still `>= expectedMinBalance`.
   * Throws `NotFound` for an unknown user.
   */
  adjustCredit(userId: string, delta: number, expectedMinBalance: number): Promise<CreditAdjustment>;
}

export interface ModelFields {
  provider?: string;
  upstreamModel?: string | null;
  creditCost?: number;
  minAccessLevel?: AccessLevel;
}

export interface ModelCatalog {
  getModel(name: string): Promise<ModelDescriptor | null>;
  listModels(): Promise<ModelDescriptor[]>;
  /** Throws `ModelExists` when the name is taken. */
  addModel(model: ModelDescriptor): Promise<ModelDescriptor>;
  /** Throws `NotFound` for an unknown model. */
  updateModel(name: string, fields: ModelFields): Promise<ModelDescriptor>;
  /** Throws `ModelInUse` while any history entry or profile references the model. */
  removeModel(name: string): Promise<void>;
  /** Inserts the given models only when the catalogue is empty; returns how many were added. */
  seedModels(defaults: ModelDescriptor[]): Promise<number>;
}

export interface ProfileDefaults {
  creditBalance: number;
}

/** Profiles are created on first interaction with the seeded credit. */
export async function ensureProfile(
  store: ConversationStore,
  userId: string,
  defaults: ProfileDefaults,
): Promise<UserProfile> {
  const existing = await store.getProfile(userId);
  if (existing) return existing;
  return store.upsertProfile(userId, { creditBalance: defaults.creditBalance });
}
