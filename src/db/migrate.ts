// db/migrate.ts — Applies the SQL migrations drizzle-kit generates into ./drizzle
// (`npm run db:generate` after editing schema.ts). Also runnable on its own.

import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/postgres-js/migrator";

import { logger } from "../config/logger.js";
import { connection, db } from "./connection.js";

// src/db -> project root, both from sources and from dist/
const migrationsFolder = resolve(dirname(fileURLToPath(import.meta.url)), "../../drizzle");

export async function runMigrations(): Promise<void> {
  if (!existsSync(resolve(migrationsFolder, "meta/_journal.json"))) {
    throw new Error(`No migrations in ${migrationsFolder}; run \`npm run db:generate\` first`);
  }
  const started = Date.now();
  try {
    await migrate(db, { migrationsFolder, migrationsTable: "gw_migrations" });
  } catch (err) {
    logger.error({ err, migrationsFolder }, "Migration failed");
    throw err;
  }
  logger.info({ ms: Date.now() - started }, "Database schema is up to date");
}

const entry = process.argv[1] ?? "";

if (/[/\\]migrate\.[jt]s$/.test(entry)) {
  runMigrations()
    .then(() => connection.end())
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.fatal({ err }, "Migration error");
      process.exit(1);
    });
}
