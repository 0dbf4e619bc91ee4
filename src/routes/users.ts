// routes/users.ts — Per-user profile, configuration and memory, as driven by the chat clients.

import { Hono } from "hono";
import { z } from "zod/v4";

import { env } from "../config/env.js";
import { accessLevelName, type UserProfile } from "../core/types.js";
import { checkModelAccess, denialError } from "../policy/access.js";
import { admission, profileDefaults, store } from "../runtime.js";
import { ensureProfile, type ProfileFields } from "../store/conversation-store.js";
import { handleError } from "./http-error.js";
import { MAX_TEXT_LENGTH, parseBody, parseUserId } from "./validation.js";

const usersRouter = new Hono();

const configBody = z.object({
  model: z.string().min(1).optional(),
  // "" resets to the default prompt
  systemPrompt: z.string().max(MAX_TEXT_LENGTH, "System prompt too long").optional(),
});

function present(profile: UserProfile) {
  return {
    ...profile,
    accessLevelName: accessLevelName(profile.accessLevel),
    model: profile.preferredModel ?? env.DEFAULT_MODEL,
  };
}

usersRouter.onError(handleError);

usersRouter.get("/:userId", async (c) => {
  const userId = parseUserId(c);
  const profile = await ensureProfile(store, userId, profileDefaults);
  return c.json({ ...present(profile), queued: admission.depth(userId) });
});

usersRouter.put("/:userId/config", async (c) => {
  const userId = parseUserId(c);
  const { model, systemPrompt } = await parseBody(c, configBody);
  const profile = await ensureProfile(store, userId, profileDefaults);
  const fields: ProfileFields = {};

  if (model !== undefined) {
    const decision = checkModelAccess(profile, model, await store.getModel(model));
    if (!decision.allowed) throw denialError(decision);
    fields.preferredModel = decision.model.name;
  }
  if (systemPrompt !== undefined) {
    const trimmed = systemPrompt.trim();
    fields.systemPrompt = trimmed === "" ? null : trimmed;
  }

  const updated = await store.upsertProfile(userId, fields);
  return c.json(present(updated));
});

usersRouter.get("/:userId/memory", async (c) => {
  const userId = parseUserId(c);
  const turns = await store.getHistory(userId);
  return c.json({ userId, count: turns.length, turns });
});

usersRouter.delete("/:userId/memory", async (c) => {
  const userId = parseUserId(c);
  const removed = await store.clear(userId);
  return c.json({ userId, removed });
});

export default usersRouter;
