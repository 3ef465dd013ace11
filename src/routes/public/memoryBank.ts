import { Router } from "express";

import type { MemoryController } from "@interfaces/http/MemoryController";

export default function memoryBankRouter(controller: MemoryController): Router {
  const router = Router();

  router.get("/:userId", controller.memoryBank);

  return router;
}
