/**
 * PostgreSQL database connection pool.
 *
 * Created lazily so that the in-memory backend and the test suites never open
 * a connection. All PostgreSQL access goes through this pool.
 */
import { Pool, type QueryResult, type QueryResultRow } from "pg";

import { config } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";

/**
 * The slice of the pool the repositories use; tests pass a scripted fake.
 */
export interface SqlClient {
  query<R extends QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

let pool: Pool | null = null;

export function getPool(): Pool {
  if (pool) {
    return pool;
  }

  pool = new Pool({
    host: config.db.host,
    port: config.db.port,
    user: config.db.user,
    password: config.db.password,
    database: config.db.database,
    max: config.db.max,
    idleTimeoutMillis: config.db.idleTimeoutMs,
    connectionTimeoutMillis: config.db.connectionTimeoutMs,
  });

  pool.on("error", (err) => {
    logger.log("error", "PG_POOL_ERROR", { message: err.message });
  });

  return pool;
}

export function getSqlClient(): SqlClient {
  return {
    query: <R extends QueryResultRow>(text: string, values?: unknown[]) =>
      getPool().query<R>(text, values),
  };
}

export async function closePool(): Promise<void> {
  if (!pool) {
    return;
  }

  const current = pool;
  pool = null;
  await current.end();
}
