// config/env.ts — Zod-validated environment variables.
// Pipeline limits (token budget, queue depth, concurrency, timeout) and provider credentials.

import { config } from "dotenv";
import { z } from "zod/v4";

config();

const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful assistant. Answer in the language the user writes in, and keep answers concise.";

const baseSchema = z.object({
  DATABASE_URL: z.string(),

  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Bearer tokens: chat-client bots and the admin console
  BOT_API_KEY: z.string().min(16, "BOT_API_KEY must be at least 16 characters"),
  ADMIN_API_KEY: z.string().min(16, "ADMIN_API_KEY must be at least 16 characters"),

  CORS_ORIGINS: z.string().default("http://localhost:5173"),

  // Context assembly
  MAX_TOKENS: z.coerce.number().int().positive().default(4000),
  MAX_TURNS: z.coerce.number().int().positive().default(25),
  DEFAULT_SYSTEM_PROMPT: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  DEFAULT_MODEL: z.string().min(1).default("gemini-2.5-flash"),
  SEED_CREDIT: z.coerce.number().int().min(0).default(0),

  // Admission queue
  PER_USER_QUEUE_DEPTH: z.coerce.number().int().min(0).default(2),
  GLOBAL_CONCURRENCY_LIMIT: z.coerce.number().int().positive().default(8),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  // Provider gateway
  PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  PROVIDER_RETRY_BASE_MS: z.coerce.number().int().min(0).default(500),
  PROVIDER_TIMEZONE: z.string().default("Asia/Ho_Chi_Minh"),

  AISTUDIO_API_KEY: z.string().optional(),
  AISTUDIO_BASE_URL: z
    .string()
    .default("https://generativelanguage.googleapis.com/v1beta/openai"),
  PROXYVN_API_KEY: z.string().optional(),
  PROXYVN_BASE_URL: z.string().default("https://proxyvn.top/v1"),
  POLYDEVS_API_KEY: z.string().optional(),
  POLYDEVS_BASE_URL: z.string().default("https://proxyvn.top/v1"),
  POLYDEVS_INSTRUCTIONS: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),
});

export const envSchema = baseSchema.refine(
  (data) =>
    [data.AISTUDIO_API_KEY, data.PROXYVN_API_KEY, data.POLYDEVS_API_KEY, data.OPENROUTER_API_KEY].some(
      (key) => key != null && key.length > 0,
    ),
  {
    message: "At least one provider API key must be configured",
    path: ["AISTUDIO_API_KEY"],
  },
);

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);

export interface PipelineLimits {
  maxTokens: number;
  maxTurns: number;
  perUserQueueDepth: number;
  globalConcurrency: number;
  requestTimeoutMs: number;
}

/** The configuration surface the request pipeline consumes. */
export function getPipelineLimits(source: Env = env): PipelineLimits {
  return {
    maxTokens: source.MAX_TOKENS,
    maxTurns: source.MAX_TURNS,
    perUserQueueDepth: source.PER_USER_QUEUE_DEPTH,
    globalConcurrency: source.GLOBAL_CONCURRENCY_LIMIT,
    requestTimeoutMs: source.REQUEST_TIMEOUT_MS,
  };
}
