/**
 * Global error handling middleware for the memory chat API.
 *
 * Centralized error processing and HTTP response formatting:
 * - Custom error classes for domain, infrastructure, validation and rate-limit errors
 * - Structured error logging with metadata capture
 * - Consistent JSON error responses with appropriate status codes
 *
 * Only AppError messages reach the client. Anything else is logged and
 * answered with a generic message so internal state and credentials never leak.
 */
import { logger } from "@infrastructure/logging/Logger";

import type { Request, Response, NextFunction } from "express";

export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError"
  | "RateLimitError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export const GENERIC_ERROR_MESSAGE = "Internal Server Error";

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DomainError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "DomainError", statusCode, metadata);
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "InfrastructureError", statusCode, metadata);
  }
}

export class StoreUnavailableError extends InfrastructureError {
  constructor(operation: string) {
    super("Memory store unavailable", 500, { operation });
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata);
    } else {
      super(message, "ValidationError", 400, statusOrMeta);
    }
  }
}

/**
 * Every upstream credential reported a rate limit.
 *
 * The message is what the chat UI shows: the wait hint followed by an opaque
 * `[Code: ...]` reference that support can map back to a pool entry.
 */
export class RateLimitError extends AppError {
  public readonly retryHint: string;
  public readonly credentialRef: string;

  constructor(retryHint: string, credentialRef: string) {
    super(`${retryHint} [Code: ${credentialRef}]`, "RateLimitError", 429, {
      retryHint,
      credentialRef,
    });
    this.retryHint = retryHint;
    this.credentialRef = credentialRef;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) {
    return null;
  }

  const status = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : null;
}

/**
 * Non-AppErrors that already carry a 4xx status (body-parser's malformed or
 * oversized bodies) stay client errors; everything else is a generic 500.
 */
function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    const parseFailed =
      Reflect.get(Object(err), "type") === "entity.parse.failed";
    return new ValidationError(
      parseFailed ? "Invalid JSON body" : "Invalid request body",
      status
    );
  }

  return new InfrastructureError(GENERIC_ERROR_MESSAGE, 500);
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);

  const status = appError.statusCode ?? 500;

  logger.log(status >= 500 ? "error" : "warn", "REQUEST_FAILED", {
    method: req.method,
    path: req.path,
    type: appError.type,
    statusCode: status,
    message: appError.message,
    originalError:
      appError === err
        ? undefined
        : err instanceof Error
          ? `${err.name}: ${err.message}`
          : String(err),
  });

  res.status(status).json({
    error: {
      message: appError.message,
      code: appError.type,
      details: appError.metadata ?? {},
    },
  });
}
