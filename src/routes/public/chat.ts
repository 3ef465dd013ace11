import { Router } from "express";

import type { ChatController } from "@interfaces/http/ChatController";

/**
 * POST /chat and its /chat/v2 alias; both run the same turn pipeline.
 */
export default function chatRouter(chatController: ChatController): Router {
  const router = Router();

  router.post("/", chatController);
  router.post("/v2", chatController);

  return router;
}
