import { Router } from "express";

import type { SystemController } from "@interfaces/http/SystemController";

/**
 * Liveness plus the read-only configuration the chat UI needs:
 * - GET /            health check
 * - GET /api/config  short-term window size
 * - GET /api/services service catalog
 */
export default function systemRouter(controller: SystemController): Router {
  const router = Router();

  router.get("/", controller.health);
  router.get("/api/config", controller.getConfig);
  router.get("/api/services", controller.listServices);

  return router;
}
