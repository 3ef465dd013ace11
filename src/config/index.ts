/**
 * Centralized configuration management for the memory chat service.
 *
 * Provides type-safe access to environment variables and application settings:
 * - OpenAI credential pool and model settings
 * - PostgreSQL connection parameters and storage backend selection
 * - Short-term window and long-term extraction tuning
 * - Application-level settings (ports, logging)
 *
 * `loadConfig` is pure so tests can build a config from a plain env object;
 * the exported `config` is the process-wide instance read at startup.
 */
import dotenv from "dotenv";

dotenv.config();

export type MemoryBackend = "postgres" | "memory";

function toNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseKeys(env: NodeJS.ProcessEnv): string[] {
  const pooled = env.OPENAI_API_KEYS ?? "";
  const keys = pooled
    .split(",")
    .map((key) => key.trim())
    .filter(Boolean);

  if (keys.length) {
    return keys;
  }

  const single = env.OPENAI_API_KEY?.trim();
  return single ? [single] : [];
}

export function loadConfig(env: NodeJS.ProcessEnv) {
  const backend: MemoryBackend =
    env.MEMORY_BACKEND === "memory" ? "memory" : "postgres";

  return {
    env: env.NODE_ENV || "development",

    openai: {
      keys: parseKeys(env),
      model: env.OPENAI_MODEL || "gpt-4o-mini",
      extractionModel:
        env.OPENAI_EXTRACTION_MODEL || env.OPENAI_MODEL || "gpt-4o-mini",
      baseUrl: env.OPENAI_BASE_URL || undefined,
      timeoutMs: toNumber(env.OPENAI_TIMEOUT_MS, 30000),
      extractionTemperature: toNumber(env.EXTRACTION_TEMPERATURE, 0.1),
    },

    db: {
      host: env.DB_HOST || "localhost",
      port: toNumber(env.DB_PORT, 5432),
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
      max: toNumber(env.DB_POOL_MAX, 10),
      idleTimeoutMs: toNumber(env.DB_IDLE_TIMEOUT_MS, 30000),
      connectionTimeoutMs: toNumber(env.DB_CONN_TIMEOUT_MS, 10000),
    },

    port: toNumber(env.PORT, 8000),

    memory: {
      backend,
      shortTermMessageLimit: toNumber(env.SHORT_TERM_MESSAGE_LIMIT, 30),
      extractionContextTurns: toNumber(env.EXTRACTION_CONTEXT_TURNS, 5),
      // Can be raised, never lowered below 0.5.
      minFactConfidence: Math.min(
        1,
        Math.max(0.5, toNumber(env.MEMORY_MIN_CONFIDENCE, 0.5))
      ),
    },

    observability: {
      logLevel: env.LOG_LEVEL || "info",
      logToFile: env.LOG_TO_FILE
        ? env.LOG_TO_FILE === "true"
        : env.NODE_ENV !== "test",
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig(process.env);
