/**
 * Wipes every stored fact and conversation turn.
 *
 * Usage: npm run clear-db -- --yes
 */
import { config } from "@config/index";
import { closePool, getSqlClient } from "@infrastructure/database/db";
import { PostgresMemoryRepository } from "@infrastructure/database/PostgresMemoryRepository";
import { logger } from "@infrastructure/logging/Logger";

async function run(): Promise<void> {
  if (!process.argv.includes("--yes")) {
    logger.log("warn", "CLEAR_DB_ABORTED", {
      reason: "pass --yes to confirm",
      database: config.db.database,
    });
    process.exitCode = 1;
    return;
  }

  const repository = new PostgresMemoryRepository(getSqlClient());

  try {
    await repository.ensureSchema();
    const summary = await repository.clearAll();

    logger.log("info", "CLEAR_DB_DONE", { ...summary });
  } finally {
    await closePool();
  }
}

run().catch((error: unknown) => {
  logger.log("error", "CLEAR_DB_FAILED", {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 2;
});
