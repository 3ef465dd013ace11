/**
 * Express application factory. Kept apart from server.ts so route tests can
 * build the app without listening on a port.
 */
import express, { type Express } from "express";

import type { Controllers } from "@app/container";
import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";

export function createApp(controllers: Controllers): Express {
  const app = express();
  app.use(express.json());

  registerRoutes(app, controllers);

  app.use(errorHandler);

  return app;
}
