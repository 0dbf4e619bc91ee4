// store/pg-store.ts — Postgres implementation of the conversation store and model catalogue.

import { and, asc, count, eq, gte, sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";

import { logger } from "../config/logger.js";
import { GatewayError } from "../core/errors.js";
import {
  type AccessLevel,
  isAccessLevel,
  type ModelDescriptor,
  type NewTurn,
  type Turn,
  type UserProfile,
} from "../core/types.js";
import type * as schema from "../db/schema.js";
import { messages, models, users } from "../db/schema.js";
import type {
  ConversationStore,
  CreditAdjustment,
  ModelCatalog,
  ModelFields,
  ProfileFields,
} from "./conversation-store.js";

type Db = PostgresJsDatabase<typeof schema>;
type UserRow = typeof users.$inferSelect;
type ModelRow = typeof models.$inferSelect;
type MessageRow = typeof messages.$inferSelect;

const FOREIGN_KEY_VIOLATION = "23503";

function toAccessLevel(value: number): AccessLevel {
  if (!isAccessLevel(value)) throw new Error(`Invalid access level in database: ${value}`);
  return value;
}

function toProfile(row: UserRow): UserProfile {
  return {
    userId: row.id,
    preferredModel: row.preferredModel,
    systemPrompt: row.systemPrompt,
    accessLevel: toAccessLevel(row.accessLevel),
    creditBalance: row.credit,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toModel(row: ModelRow): ModelDescriptor {
  return {
    name: row.name,
    provider: row.provider,
    upstreamModel: row.upstreamModel,
    creditCost: row.creditCost,
    minAccessLevel: toAccessLevel(row.minAccessLevel),
  };
}

function toTurn(row: MessageRow): Turn {
  return {
    seq: row.seq,
    role: row.role,
    content: row.content,
    tokenEstimate: row.tokenEstimate,
    model: row.model,
    createdAt: row.createdAt,
  };
}

function profileColumns(fields: ProfileFields): Partial<typeof users.$inferInsert> {
  const columns: Partial<typeof users.$inferInsert> = {};
  if (fields.preferredModel !== undefined) columns.preferredModel = fields.preferredModel;
  if (fields.systemPrompt !== undefined) columns.systemPrompt = fields.systemPrompt;
  if (fields.accessLevel !== undefined) columns.accessLevel = fields.accessLevel;
  if (fields.creditBalance !== undefined) columns.credit = fields.creditBalance;
  return columns;
}

/** postgres.js raises errors with a SQLSTATE `code`; newer drizzle releases wrap them in `cause`. */
function sqlState(error: unknown): string | undefined {
  let current: unknown = error;
  while (current instanceof Error) {
    if ("code" in current && typeof current.code === "string") return current.code;
    current = current.cause;
  }
  return undefined;
}

export class PostgresStore implements ConversationStore, ModelCatalog {
  constructor(private readonly db: Db) {}

  async getProfile(userId: string): Promise<UserProfile | null> {
    const row = await this.db.query.users.findFirst({ where: eq(users.id, userId) });
    return row ? toProfile(row) : null;
  }

  async upsertProfile(userId: string, fields: ProfileFields): Promise<UserProfile> {
    const columns = profileColumns(fields);
    const [row] = await this.db
      .insert(users)
      .values({ id: userId, ...columns })
      .onConflictDoUpdate({
        target: users.id,
        set: { ...columns, updatedAt: sql`NOW()` },
      })
      .returning();
    return toProfile(row);
  }

  async getHistory(userId: string): Promise<Turn[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(eq(messages.userId, userId))
      .orderBy(asc(messages.seq));
    return rows.map(toTurn);
  }

  async append(userId: string, turns: NewTurn[]): Promise<Turn[]> {
    if (turns.length === 0) return [];

    return this.db.transaction(async (tx) => {
      // Lock the owner row so concurrent appends for this user serialize on seq
      const [owner] = await tx
        .select({ id: users.id })
        .from(users)
        .where(eq(users.id, userId))
        .for("update");
      if (!owner) throw new GatewayError("NotFound", `User '${userId}' not found`);

      const [{ maxSeq }] = await tx
        .select({ maxSeq: sql<number>`coalesce(max(${messages.seq}), 0)::int` })
        .from(messages)
        .where(eq(messages.userId, userId));

      const rows = await tx
        .insert(messages)
        .values(
          turns.map((turn, i) => ({
            userId,
            seq: maxSeq + i + 1,
            role: turn.role,
            content: turn.content,
            tokenEstimate: turn.tokenEstimate,
            model: turn.model ?? null,
          })),
        )
        .returning();

      return rows.map(toTurn).sort((a, b) => a.seq - b.seq);
    });
  }

  async clear(userId: string): Promise<number> {
    const removed = await this.db
      .delete(messages)
      .where(eq(messages.userId, userId))
      .returning({ id: messages.id });
    logger.info({ userId, removed: removed.length }, "Cleared conversation history");
    return removed.length;
  }

  async adjustCredit(
    userId: string,
    delta: number,
    expectedMinBalance: number,
  ): Promise<CreditAdjustment> {
    const [row] = await this.db
      .update(users)
      .set({ credit: sql`${users.credit} + ${delta}`, updatedAt: sql`NOW()` })
      .where(and(eq(users.id, userId), gte(users.credit, expectedMinBalance)))
      .returning({ credit: users.credit });
    if (row) return { applied: true, balance: row.credit };

    const profile = await this.getProfile(userId);
    if (!profile) throw new GatewayError("NotFound", `User '${userId}' not found`);
    return { applied: false, balance: profile.creditBalance };
  }

  async getModel(name: string): Promise<ModelDescriptor | null> {
    const row = await this.db.query.models.findFirst({ where: eq(models.name, name) });
    return row ? toModel(row) : null;
  }

  async listModels(): Promise<ModelDescriptor[]> {
    const rows = await this.db.select().from(models).orderBy(asc(models.creditCost), asc(models.name));
    return rows.map(toModel);
  }

  async addModel(model: ModelDescriptor): Promise<ModelDescriptor> {
    const [row] = await this.db
      .insert(models)
      .values(model)
      .onConflictDoNothing({ target: models.name })
      .returning();
    if (!row) throw new GatewayError("ModelExists", `Model '${model.name}' already exists`);
    return toModel(row);
  }

  async updateModel(name: string, fields: ModelFields): Promise<ModelDescriptor> {
    const [row] = await this.db
      .update(models)
      .set({ ...fields, updatedAt: sql`NOW()` })
      .where(eq(models.name, name))
      .returning();
    if (!row) throw new GatewayError("NotFound", `Model '${name}' does not exist`);
    return toModel(row);
  }

  async removeModel(name: string): Promise<void> {
    const [history] = await this.db
      .select({ n: count() })
      .from(messages)
      .where(eq(messages.model, name));
    const [profiles] = await this.db
      .select({ n: count() })
      .from(users)
      .where(eq(users.preferredModel, name));
    if (history.n > 0 || profiles.n > 0) {
      throw new GatewayError(
        "ModelInUse",
        `Cannot remove model '${name}': referenced by ${history.n} history entries and ${profiles.n} profiles`,
      );
    }

    try {
      const removed = await this.db
        .delete(models)
        .where(eq(models.name, name))
        .returning({ name: models.name });
      if (removed.length === 0) throw new GatewayError("NotFound", `Model '${name}' does not exist`);
    } catch (error) {
      // A turn referencing the model may have been committed since the check
      if (sqlState(error) === FOREIGN_KEY_VIOLATION) {
        throw new GatewayError("ModelInUse", `Cannot remove model '${name}': in use`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  async seedModels(defaults: ModelDescriptor[]): Promise<number> {
    const [existing] = await this.db.select({ n: count() }).from(models);
    if (existing.n > 0) return 0;
    const inserted = await this.db
      .insert(models)
      .values(defaults)
      .onConflictDoNothing({ target: models.name })
      .returning({ name: models.name });
    logger.info({ models: inserted.map((m) => m.name) }, "Seeded default model catalogue");
    return inserted.length;
  }
}
