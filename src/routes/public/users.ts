import { Router } from "express";

import type { MemoryController } from "@interfaces/http/MemoryController";

export default function usersRouter(controller: MemoryController): Router {
  const router = Router();

  router.get("/list", controller.listUsers);

  return router;
}
