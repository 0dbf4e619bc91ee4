// runtime.ts — Composition root. Single source of truth for the store, provider
// registry, gateway, admission queue and chat pipeline.

import { env, getPipelineLimits } from "./config/env.js";
import { logger } from "./config/logger.js";
import { db } from "./db/connection.js";
import { createConfiguredAdapters } from "./gateway/adapters/index.js";
import { ProviderGateway } from "./gateway/gateway.js";
import { ProviderRegistry } from "./gateway/registry.js";
import { ChatPipeline } from "./pipeline/chat-pipeline.js";
import { AdmissionQueue } from "./queue/admission.js";
import { DEFAULT_MODELS } from "./store/default-models.js";
import { PostgresStore } from "./store/pg-store.js";

const limits = getPipelineLimits();

export const store = new PostgresStore(db);

export const registry = new ProviderRegistry(createConfiguredAdapters(env));

export const gateway = new ProviderGateway(registry, {
  maxRetries: env.PROVIDER_MAX_RETRIES,
  retryBaseMs: env.PROVIDER_RETRY_BASE_MS,
});

export const admission = new AdmissionQueue({
  perUserQueueDepth: limits.perUserQueueDepth,
  globalConcurrency: limits.globalConcurrency,
  requestTimeoutMs: limits.requestTimeoutMs,
});

export const pipeline = new ChatPipeline(store, store, gateway, admission, {
  maxTokens: limits.maxTokens,
  maxTurns: limits.maxTurns,
  defaultSystemPrompt: env.DEFAULT_SYSTEM_PROMPT,
  defaultModel: env.DEFAULT_MODEL,
  seedCredit: env.SEED_CREDIT,
});

export const profileDefaults = { creditBalance: env.SEED_CREDIT };

/** Seed the catalogue on first boot and build the routing table from it. */
export async function initRuntime(): Promise<void> {
  await store.seedModels(DEFAULT_MODELS);
  const models = await store.listModels();
  const routed = registry.load(models);
  logger.info(
    { adapters: registry.adapterKeys, models: models.length, routed },
    "Provider registry loaded",
  );
}
