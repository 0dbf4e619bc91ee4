// config/logger.ts — Pino structured logger. JSON in production, pretty in development,
// silent under test. Bearer tokens never reach the log.

import pino, { type LevelWithSilent } from "pino";

import { env } from "./env.js";

const isDev = env.NODE_ENV === "development";

const LEVELS: Record<typeof env.NODE_ENV, LevelWithSilent> = {
  development: "debug",
  production: "info",
  test: "silent",
};

export const logger = pino({
  level: LEVELS[env.NODE_ENV],
  base: { service: "llm-chat-gateway" },
  redact: ["req.headers.authorization", "headers.authorization"],
  serializers: { err: pino.stdSerializers.err },
  ...(isDev && {
    transport: {
      target: "pino-pretty",
      options: { colorize: true, ignore: "pid,hostname,service" },
    },
  }),
});
