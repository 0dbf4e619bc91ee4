// routes/models.ts — Public model catalogue.

import { Hono } from "hono";

import { accessLevelName } from "../core/types.js";
import { registry, store } from "../runtime.js";
import { handleError } from "./http-error.js";

const modelsRouter = new Hono();

modelsRouter.onError(handleError);

modelsRouter.get("/", async (c) => {
  const models = await store.listModels();
  return c.json(
    models.map((model) => ({
      name: model.name,
      provider: model.provider,
      creditCost: model.creditCost,
      minAccessLevel: model.minAccessLevel,
      minAccessLevelName: accessLevelName(model.minAccessLevel),
      available: registry.resolve(model.name) !== null,
    })),
  );
});

export default modelsRouter;
