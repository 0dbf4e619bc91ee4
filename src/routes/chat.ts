// routes/chat.ts — Turn submission with SSE streaming of the reply.

import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod/v4";

import { logger } from "../config/logger.js";
import type { ContentPart } from "../core/types.js";
import { pipeline } from "../runtime.js";
import { handleError, statusFor } from "./http-error.js";
import { MAX_IMAGES, MAX_TEXT_LENGTH, parseBody, userIdParam } from "./validation.js";

const chatRouter = new Hono();

const imageRef = z.object({
  uri: z.url("Image uri must be a URL"),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
});

const chatBody = z
  .object({
    userId: userIdParam,
    text: z.string().max(MAX_TEXT_LENGTH, "Message too long").optional(),
    images: z.array(imageRef).max(MAX_IMAGES, `At most ${MAX_IMAGES} images per message`).optional(),
  })
  .refine((body) => (body.text?.trim() ?? "") !== "" || (body.images?.length ?? 0) > 0, {
    message: "Message cannot be empty",
  });

type ChatBody = z.infer<typeof chatBody>;

function toContent({ text, images = [] }: ChatBody): ContentPart[] {
  const parts: ContentPart[] = [];
  const trimmed = text?.trim();
  if (trimmed) parts.push({ kind: "text", value: trimmed });
  for (const image of images) parts.push({ kind: "image", ...image });
  return parts;
}

chatRouter.onError(handleError);

chatRouter.post("/stream", async (c) => {
  const body = await parseBody(c, chatBody);
  const handle = pipeline.submit({ userId: body.userId, content: toContent(body) });

  const refused = handle.rejection;
  if (refused) return c.json(refused.toJSON(), statusFor(refused.kind));

  return streamSSE(c, async (sseStream) => {
    sseStream.onAbort(() => {
      logger.info({ requestId: handle.id, userId: handle.userId }, "SSE stream aborted by client");
      handle.cancel();
    });

    await sseStream.writeSSE({
      event: "accepted",
      data: JSON.stringify({ requestId: handle.id }),
    });

    for await (const event of handle) {
      switch (event.type) {
        case "chunk":
          await sseStream.writeSSE({ event: "chunk", data: JSON.stringify({ text: event.text }) });
          break;
        case "done": {
          const { model, usage, creditBalance } = event.result;
          await sseStream.writeSSE({
            event: "done",
            data: JSON.stringify({ model, usage, creditBalance }),
          });
          break;
        }
        case "error":
          await sseStream.writeSSE({ event: "error", data: JSON.stringify(event.error.toJSON()) });
          break;
      }
    }
  });
});

export default chatRouter;
