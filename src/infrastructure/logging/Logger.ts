import fs from "fs";
import path from "path";

import { config } from "@config/index";

/**
 * Structured JSON logger shared by every layer.
 *
 * `log()` entries carry a level and are filtered by LOG_LEVEL; `event()`
 * entries keep the `{ timestamp, type, ...payload }` shape used for pipeline
 * milestones (turn received, facts stored, credential rotated).
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const logDir = path.join(process.cwd(), "logs");
const logFile = path.join(logDir, "app.log");

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

function threshold(): number {
  const configured = config.observability.logLevel.toLowerCase();
  return isLogLevel(configured) ? LEVEL_WEIGHT[configured] : LEVEL_WEIGHT.info;
}

function ensureLogDir(): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function writeEntry(entry: Record<string, unknown>, level: LogLevel): void {
  if (LEVEL_WEIGHT[level] < threshold()) {
    return;
  }

  const line = JSON.stringify(entry);

  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }

  if (!config.observability.logToFile) {
    return;
  }

  try {
    ensureLogDir();
    fs.appendFileSync(logFile, line + "\n", { encoding: "utf-8" });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    writeEntry(
      {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(meta || {}),
      },
      level
    );
  },

  event(type: string, payload: Record<string, unknown>): void {
    writeEntry(
      {
        timestamp: new Date().toISOString(),
        type,
        ...payload,
      },
      "info"
    );
  },
};

/**
 * Event-style logging for pipeline milestones.
 */
export function logEvent(type: string, payload: Record<string, unknown>): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}
