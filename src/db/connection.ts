// db/connection.ts — postgres.js pool and the Drizzle instance over it.

import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import { env } from "../config/env.js";
import { logger } from "../config/logger.js";
import * as schema from "./schema.js";

export const connection = postgres(env.DATABASE_URL, {
  // history appends hold a row lock; keep a few connections beyond the provider ceiling
  max: env.GLOBAL_CONCURRENCY_LIMIT + 4,
  idle_timeout: 30,
  onnotice: (notice) => logger.debug({ notice: notice.message }, "Postgres notice"),
});

export const db = drizzle(connection, { schema });

export type Database = typeof db;

/** Round-trip check for the health endpoint. */
export async function pingDatabase(): Promise<boolean> {
  try {
    await db.execute(sql`SELECT 1`);
    return true;
  } catch (err) {
    logger.warn({ err }, "Database ping failed");
    return false;
  }
}
