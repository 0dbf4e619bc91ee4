// db/schema.ts — Drizzle ORM schema: user profiles, model catalogue, per-user history.
// Tables are prefixed with "gw_" to share a database with other services.

import { sql } from "drizzle-orm";
import {
  check,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";

import type { ContentPart, Role } from "../core/types.js";

// ---------------------------------------------------------------------------
// Users: one profile per chat user (opaque id, e.g. "discord:1234")
// ---------------------------------------------------------------------------
export const users = pgTable(
  "gw_users",
  {
    id: text("id").primaryKey(),
    preferredModel: text("preferred_model"),
    systemPrompt: text("system_prompt"),
    accessLevel: integer("access_level").notNull().default(0),
    credit: integer("credit").notNull().default(0),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => [
    check("gw_users_credit_non_negative", sql`${table.credit} >= 0`),
    check("gw_users_access_level_range", sql`${table.accessLevel} BETWEEN 0 AND 3`),
  ],
);

// ---------------------------------------------------------------------------
// Models: catalogue of routable models with cost and minimum access level
// ---------------------------------------------------------------------------
export const models = pgTable("gw_models", {
  name: text("name").primaryKey(),
  provider: text("provider").notNull(),
  upstreamModel: text("upstream_model"),
  creditCost: integer("credit_cost").notNull().default(0),
  minAccessLevel: integer("min_access_level").notNull().default(0),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// ---------------------------------------------------------------------------
// Messages: ordered history per user, keyed by (user, seq)
// ---------------------------------------------------------------------------
export const messages = pgTable(
  "gw_messages",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id),
    seq: integer("seq").notNull(),
    role: text("role").notNull().$type<Role>(),
    content: jsonb("content").notNull().$type<ContentPart[]>(),
    tokenEstimate: integer("token_estimate").notNull(),
    // Restrict: a model referenced by history cannot be deleted
    model: text("model").references(() => models.name, { onDelete: "restrict" }),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("gw_messages_user_seq_idx").on(table.userId, table.seq),
    index("gw_messages_model_idx").on(table.model),
  ],
);
