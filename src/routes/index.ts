/**
 * Express route registration for the memory chat API.
 *
 * Centralized route configuration exposing all system capabilities:
 * - Health, configuration and service catalog
 * - Chat turns with short-term and long-term memory
 * - Long-term memory administration and the memory-bank view
 * - Short-term conversation history
 */
import type { Controllers } from "@app/container";
import chatRouter from "@routes/public/chat";
import conversationRouter from "@routes/public/conversation";
import systemRouter from "@routes/public/health";
import memoriesRouter from "@routes/public/memories";
import memoryBankRouter from "@routes/public/memoryBank";
import usersRouter from "@routes/public/users";

import type { Express } from "express";

export function registerRoutes(app: Express, controllers: Controllers): void {
  app.use("/", systemRouter(controllers.system));
  app.use("/chat", chatRouter(controllers.chat));
  app.use("/conversation", conversationRouter(controllers.memory));
  app.use("/memories", memoriesRouter(controllers.memory));
  app.use("/memory-bank", memoryBankRouter(controllers.memory));
  app.use("/users", usersRouter(controllers.memory));
}
