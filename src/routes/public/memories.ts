import { Router } from "express";

import type { MemoryController } from "@interfaces/http/MemoryController";

/**
 * Long-term memory administration. The fixed /all/* paths are registered
 * ahead of /:userId.
 */
export default function memoriesRouter(controller: MemoryController): Router {
  const router = Router();

  router.delete("/all/clear", controller.clearAll);
  router.get("/all/inspect", controller.inspect);
  router.get("/:userId", controller.listMemories);
  router.delete("/:userId", controller.deleteMemories);

  return router;
}
