/**
 * Application entry point for the dual-memory chat backend.
 *
 * Validates the OpenAI key pool, prepares the memory store, registers all
 * HTTP routes and shuts the PostgreSQL pool down on exit.
 */
import dotenv from "dotenv";

import { createContainer } from "@app/container";
import { createApp } from "@app/createApp";
import { config } from "@config/index";
import { maskCredential } from "@domain/llm/FailoverPolicy";
import { closePool } from "@infrastructure/database/db";
import { PostgresMemoryRepository } from "@infrastructure/database/PostgresMemoryRepository";
import { logger } from "@infrastructure/logging/Logger";
import { validateOpenAIKeys } from "@infrastructure/llm/OpenAIAdapter";

dotenv.config();

async function main(): Promise<void> {
  if (!config.openai.keys.length) {
    throw new Error(
      "No OpenAI API key configured. Set OPENAI_API_KEYS or OPENAI_API_KEY."
    );
  }

  logger.log("info", "OPENAI_KEY_POOL", {
    size: config.openai.keys.length,
    keys: config.openai.keys.map(maskCredential),
  });

  await validateOpenAIKeys();

  const container = createContainer(config);

  if (container.repository instanceof PostgresMemoryRepository) {
    await container.repository.ensureSchema();
  }

  const app = createApp(container.controllers);

  const server = app.listen(config.port, () => {
    logger.log("info", "SERVER_STARTED", {
      url: `http://localhost:${config.port}`,
      model: config.openai.model,
      memoryBackend: config.memory.backend,
      shortTermMessageLimit: config.memory.shortTermMessageLimit,
    });
  });

  const shutdown = (signal: string) => {
    logger.log("info", "SERVER_STOPPING", { signal });
    server.close(() => {
      closePool()
        .catch((error: unknown) => {
          logger.log("error", "PG_POOL_CLOSE_FAILED", {
            message: error instanceof Error ? error.message : String(error),
          });
        })
        .finally(() => process.exit(0));
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.log("error", "SERVER_START_FAILED", {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
