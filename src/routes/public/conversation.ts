import { Router } from "express";

import type { MemoryController } from "@interfaces/http/MemoryController";

// GET /conversation/:userId -> most recent short-term turns
export default function conversationRouter(
  controller: MemoryController
): Router {
  const router = Router();

  router.get("/:userId", controller.conversation);

  return router;
}
