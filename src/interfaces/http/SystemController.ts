/**
 * Health, configuration and service-catalog endpoints.
 */
import type { ServiceCatalog } from "@config/serviceCatalog";

import type { Request, Response } from "express";

export function createSystemController(settings: {
  shortTermLimit: number;
  catalog: ServiceCatalog;
}) {
  function health(_req: Request, res: Response): void {
    res.json({ status: "ok", message: "Memory Chat API is running" });
  }

  function getConfig(_req: Request, res: Response): void {
    res.json({ short_term_message_limit: settings.shortTermLimit });
  }

  function listServices(_req: Request, res: Response): void {
    res.json(settings.catalog);
  }

  return { health, getConfig, listServices };
}

export type SystemController = ReturnType<typeof createSystemController>;
