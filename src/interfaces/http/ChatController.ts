/**
 * Chat HTTP controller for the dual-memory conversation endpoint.
 *
 * Express handler for POST /chat:
 * - Validates the request with Zod (message and user_id are required)
 * - Resolves the optional mode and service selection
 * - Delegates the turn to the ChatUseCase and shapes the snake_case response
 *
 * Rate-limit exhaustion and internal failures are AppErrors thrown by the
 * use case; Express 5 forwards them to the global error handler.
 */
import type { ChatUseCase, ChatTurnResult } from "@app/chat/ChatUseCase";
import { findService } from "@config/serviceCatalog";
import type { ModeType } from "@domain/memory/ContextComposer";
import type { TurnInput } from "@domain/memory/types";
import {
  ChatRequestSchema,
  ChatResponseSchema,
  type ChatRequestBody,
  type ChatResponseBody,
} from "@interfaces/http/chat/schema";
import { serializeFact } from "@interfaces/http/memory/schema";
import { logger } from "@infrastructure/logging/Logger";
import {
  GENERIC_ERROR_MESSAGE,
  InfrastructureError,
  ValidationError,
} from "@middleware/errorHandler";

import type { Request, Response } from "express";

function toModeType(value: string | null | undefined): ModeType | null {
  return value === "agent" || value === "ask" ? value : null;
}

function toHistory(messages: ChatRequestBody["messages"]): TurnInput[] {
  const history: TurnInput[] = [];

  for (const message of messages ?? []) {
    if (message.role === "user" || message.role === "assistant") {
      history.push({ role: message.role, content: message.content });
    }
  }

  return history;
}

export function toChatResponse(result: ChatTurnResult): ChatResponseBody {
  return {
    response: result.response,
    memories_used: result.memoriesUsed.map((fact) => ({
      text: fact.label,
      metadata: serializeFact(fact),
    })),
    facts_extracted: result.factsExtracted,
    mode_transitions: result.modeTransitions,
    memory_source: result.memorySource,
  };
}

export function createChatController(chatUseCase: ChatUseCase) {
  return async function chatController(
    req: Request,
    res: Response
  ): Promise<void> {
    const parsed = ChatRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      throw new ValidationError("Invalid request", {
        issues: parsed.error.issues,
      });
    }

    const body = parsed.data;

    const result = await chatUseCase.handleChat({
      userId: body.user_id,
      message: body.message,
      memorySource: body.memory_source,
      messages: toHistory(body.messages),
      modeType: toModeType(body.mode_type),
      service: findService(body.selected_service),
    });

    const payload = ChatResponseSchema.safeParse(toChatResponse(result));

    if (!payload.success) {
      logger.log("error", "CHAT_RESPONSE_INVALID", {
        userId: body.user_id,
        issues: payload.error.issues.map((issue) => issue.path.join(".")),
      });
      throw new InfrastructureError(GENERIC_ERROR_MESSAGE, 500);
    }

    res.json(payload.data);
  };
}

export type ChatController = ReturnType<typeof createChatController>;
