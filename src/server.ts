// server.ts — Hono web server for the chat gateway: bearer-authenticated bot and admin
// APIs, SSE streaming, Pino logging, rate limiting and graceful shutdown.

import type { ServerType } from "@hono/node-server";
import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { bearerAuth } from "hono/bearer-auth";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { pinoLogger } from "hono-pino";

import { env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { connection, pingDatabase } from "./db/connection.js";
import { runMigrations } from "./db/migrate.js";
import { chatLimiter, globalLimiter } from "./middleware/rate-limiter.js";
import adminRouter from "./routes/admin.js";
import chatRouter from "./routes/chat.js";
import { handleError } from "./routes/http-error.js";
import modelsRouter from "./routes/models.js";
import usersRouter from "./routes/users.js";
import { admission, initRuntime } from "./runtime.js";

const app = new Hono();

// --- Middleware ---

app.use("*", pinoLogger({ pino: logger }));
// eight image URLs plus 10k characters of text fit comfortably
app.use("*", bodyLimit({ maxSize: 256 * 1024 }));
app.use(
  "*",
  cors({
    origin: env.CORS_ORIGINS.split(","),
    allowMethods: ["GET", "POST", "PUT", "PATCH", "DELETE"],
    allowHeaders: ["Content-Type", "Authorization"],
  }),
);

const botAuth = bearerAuth({ token: env.BOT_API_KEY });
const adminAuth = bearerAuth({ token: env.ADMIN_API_KEY });

app.use("/api/*", globalLimiter);
app.use("/api/chat/*", botAuth);
app.use("/api/chat/*", chatLimiter);
app.use("/api/users/*", botAuth);
app.use("/api/models", botAuth);
app.use("/api/admin/*", adminAuth);

app.onError(handleError);

// --- Routes ---

app.route("/api/chat", chatRouter);
app.route("/api/users", usersRouter);
app.route("/api/models", modelsRouter);
app.route("/api/admin", adminRouter);

app.get("/api/health", async (c) => {
  const database = await pingDatabase();
  return c.json(
    {
      status: database ? "ok" : "degraded",
      checks: { database },
      queue: admission.stats(),
      timestamp: new Date().toISOString(),
    },
    database ? 200 : 503,
  );
});

app.get("/", (c) => c.json({ name: "llm-chat-gateway", version: "1.0.0" }));

// --- Startup + Shutdown ---

let httpServer: ServerType | undefined;

async function start(): Promise<void> {
  await runMigrations();
  await initRuntime();

  httpServer = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    logger.info({ port: info.port }, "Chat gateway running");
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal, queue: admission.stats() }, "Shutting down gracefully...");
  setTimeout(() => {
    logger.error("Forced shutdown after timeout");
    process.exit(1);
  }, 30_000).unref();

  httpServer?.close();
  await connection.end().catch((err: unknown) => {
    logger.warn({ err }, "Error closing database pool");
  });

  logger.info("All resources closed");
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

start().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start server");
  process.exit(1);
});
