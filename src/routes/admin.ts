// routes/admin.ts — Admin endpoints: credit and access-level management, model catalogue
// edits (kept in sync with the provider registry) and queue inspection.

import { Hono } from "hono";
import { z } from "zod/v4";

import { logger } from "../config/logger.js";
import { grantCredit } from "../policy/access.js";
import { admission, profileDefaults, registry, store } from "../runtime.js";
import { ensureProfile } from "../store/conversation-store.js";
import { handleError } from "./http-error.js";
import { accessLevelSchema, parseBody, parseParam, parseUserId } from "./validation.js";

const adminRouter = new Hono();

const addCreditBody = z.object({ amount: z.number().int() });
const setCreditBody = z.object({ amount: z.number().int().min(0, "Credit cannot be negative") });
const setLevelBody = z.object({ level: accessLevelSchema });

const modelName = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[\w.:/-]+$/, "Model name may only contain letters, digits and . : / - _");

const newModelBody = z.object({
  name: modelName,
  provider: z.string().min(1),
  upstreamModel: z.string().min(1).nullish(),
  creditCost: z.number().int().min(0),
  minAccessLevel: accessLevelSchema,
});

const modelPatchBody = z.object({
  provider: z.string().min(1).optional(),
  upstreamModel: z.string().min(1).nullish(),
  creditCost: z.number().int().min(0).optional(),
  minAccessLevel: accessLevelSchema.optional(),
});

adminRouter.onError(handleError);

// --- Users ---

adminRouter.post("/users/:userId/credits/add", async (c) => {
  const userId = parseUserId(c);
  const { amount } = await parseBody(c, addCreditBody);
  await ensureProfile(store, userId, profileDefaults);
  const creditBalance = await grantCredit(store, userId, amount);
  logger.info({ userId, amount, creditBalance }, "Credit adjusted by admin");
  return c.json({ userId, creditBalance });
});

adminRouter.post("/users/:userId/credits/set", async (c) => {
  const userId = parseUserId(c);
  const { amount } = await parseBody(c, setCreditBody);
  const profile = await store.upsertProfile(userId, { creditBalance: amount });
  logger.info({ userId, creditBalance: amount }, "Credit set by admin");
  return c.json({ userId, creditBalance: profile.creditBalance });
});

adminRouter.post("/users/:userId/level/set", async (c) => {
  const userId = parseUserId(c);
  const { level } = await parseBody(c, setLevelBody);
  const profile = await store.upsertProfile(userId, { accessLevel: level });
  logger.info({ userId, level }, "Access level set by admin");
  return c.json({ userId, accessLevel: profile.accessLevel });
});

adminRouter.post("/users/:userId/reset", async (c) => {
  const userId = parseUserId(c);
  await ensureProfile(store, userId, profileDefaults);
  const profile = await store.upsertProfile(userId, { preferredModel: null, systemPrompt: null });
  const removed = await store.clear(userId);
  logger.info({ userId, removed }, "User reset by admin");
  return c.json({ profile, removed });
});

// --- Models ---

adminRouter.post("/models", async (c) => {
  const body = await parseBody(c, newModelBody);
  const model = await store.addModel({ ...body, upstreamModel: body.upstreamModel ?? null });
  const routed = registry.route(model);
  logger.info({ model: model.name, provider: model.provider, routed }, "Model added");
  return c.json({ model, routed }, 201);
});

adminRouter.patch("/models/:name{.+}", async (c) => {
  const name = parseParam(c, "name", modelName);
  const fields = await parseBody(c, modelPatchBody);
  const model = await store.updateModel(name, fields);
  const routed = registry.route(model);
  logger.info({ model: model.name, routed }, "Model updated");
  return c.json({ model, routed });
});

adminRouter.delete("/models/:name{.+}", async (c) => {
  const name = parseParam(c, "name", modelName);
  await store.removeModel(name);
  registry.unroute(name);
  logger.info({ model: name }, "Model removed");
  return c.json({ removed: name });
});

// --- Queue ---

adminRouter.get("/queue", (c) => {
  const stats = admission.stats();
  const userId = c.req.query("userId");
  if (userId === undefined) return c.json(stats);
  return c.json({ ...stats, userId, depth: admission.depth(userId) });
});

export default adminRouter;
