/**
 * Main chat orchestration use-case combining both memory tiers with the model.
 *
 * Implements the turn flow that:
 * - Normalizes the memory source and derives the thread identity
 * - Composes history and stored facts into the model input
 * - Calls the model under the credential failover policy
 * - Extracts new facts post-hoc (long/both modes) and commits them with the turn
 *
 * Extraction problems never fail the turn; model failures other than rate
 * limits do, and surface as a generic error.
 */
import crypto from "crypto";

import { TurnTracker, type TurnState } from "@app/chat/turnState";
import type { ServiceItem } from "@config/serviceCatalog";
import {
  CredentialsExhaustedError,
  type FailoverPolicy,
} from "@domain/llm/FailoverPolicy";
import type { ChatModelPort } from "@domain/llm/ports";
import type {
  ContextComposer,
  ModeType,
} from "@domain/memory/ContextComposer";
import {
  selectFactsToStore,
  type EntityExtractor,
  type ExtractionResult,
} from "@domain/memory/EntityExtractor";
import {
  deriveThreadId,
  includesLongTerm,
  normalizeMemorySource,
  type MemoryMode,
} from "@domain/memory/memoryMode";
import type { MemoryRepository } from "@domain/memory/ports";
import type { Fact, TurnInput } from "@domain/memory/types";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import {
  InfrastructureError,
  isAppError,
  RateLimitError,
} from "@middleware/errorHandler";

export interface ChatRequest {
  userId: string;
  message: string;
  /** Raw client value; anything but short/long/both means both. */
  memorySource?: unknown;
  /** Client-held history; when empty the thread's stored turns are used. */
  messages?: TurnInput[];
  modeType?: ModeType | null;
  service?: ServiceItem | null;
}

export interface ChatTurnResult {
  response: string;
  memoriesUsed: Fact[];
  storedFacts: Fact[];
  factsExtracted: string[];
  modeTransitions: string[];
  memorySource: MemoryMode;
  threadId: string;
  states: readonly TurnState[];
}

export interface ChatUseCaseDeps {
  repository: MemoryRepository;
  composer: ContextComposer;
  extractor: Pick<EntityExtractor, "extract">;
  responder: ChatModelPort;
  failover: FailoverPolicy;
  settings: {
    shortTermLimit: number;
    extractionContextTurns: number;
    minFactConfidence: number;
  };
}

export interface ChatUseCase {
  handleChat(request: ChatRequest): Promise<ChatTurnResult>;
}

export function describeStoredFacts(
  extraction: ExtractionResult | null,
  stored: Fact[]
): string[] {
  if (!extraction || !stored.length) {
    return [];
  }

  return [
    `[LLM Extraction] ${extraction.summary}`,
    ...stored.map(
      (fact) =>
        `${fact.type}: ${fact.value} (confidence: ${fact.confidence.toFixed(2)})`
    ),
  ];
}

export function createChatUseCase(deps: ChatUseCaseDeps): ChatUseCase {
  const { repository, composer, extractor, responder, failover, settings } =
    deps;

  async function resolveHistory(
    request: ChatRequest,
    threadId: string
  ): Promise<TurnInput[]> {
    if (request.messages?.length) {
      return request.messages;
    }

    const stored = await repository.getRecentTurns(
      threadId,
      Math.max(settings.shortTermLimit, settings.extractionContextTurns)
    );

    return stored.map((turn) => ({ role: turn.role, content: turn.content }));
  }

  async function handleChat(request: ChatRequest): Promise<ChatTurnResult> {
    const { userId, message } = request;

    const requestId = crypto.randomUUID();
    const startTime = Date.now();
    const mode = normalizeMemorySource(request.memorySource);
    const threadId = deriveThreadId(userId, mode);
    const tracker = new TurnTracker();

    logEvent("CHAT_REQUEST", {
      requestId,
      userId,
      mode,
      threadId,
      messageLength: message.length,
    });

    try {
      tracker.moveTo("composing_context");

      const history = await resolveHistory(request, threadId);
      const composed = await composer.compose({
        ownerId: userId,
        mode,
        message,
        history,
        modeType: request.modeType ?? null,
        service: request.service ?? null,
      });

      tracker.moveTo("invoking_model");

      const response = await failover.run(
        (credential) => responder.invoke(composed.messages, credential),
        {
          onRotate(fromIndex, toIndex) {
            tracker.moveTo("retrying");
            logEvent("CREDENTIAL_ROTATED", { requestId, fromIndex, toIndex });
            tracker.moveTo("invoking_model");
          },
        }
      );

      let extraction: ExtractionResult | null = null;

      if (includesLongTerm(mode)) {
        tracker.moveTo("extracting_memory");
        extraction = await extractor.extract(message, history, userId);
      }

      tracker.moveTo("committing");

      const storedFacts = extraction
        ? selectFactsToStore(extraction, {
            ownerId: userId,
            originMessage: message,
            minConfidence: settings.minFactConfidence,
          })
        : [];

      await repository.commitTurn(
        threadId,
        [
          { role: "user", content: message },
          { role: "assistant", content: response },
        ],
        storedFacts
      );

      tracker.moveTo("done");

      logEvent("CHAT_RESPONSE", {
        requestId,
        userId,
        mode,
        factsStored: storedFacts.length,
        memoriesUsed: composed.retrievedFacts.length,
        credentialIndex: failover.currentIndex,
        states: tracker.history.join(">"),
        durationMs: Date.now() - startTime,
      });

      return {
        response,
        memoriesUsed: composed.retrievedFacts,
        storedFacts,
        factsExtracted: describeStoredFacts(extraction, storedFacts),
        modeTransitions: [mode === "short" ? "short_term" : "long_term"],
        memorySource: mode,
        threadId,
        states: tracker.history,
      };
    } catch (error: unknown) {
      tracker.fail();

      logger.log("error", "CHAT_FAILED", {
        requestId,
        userId,
        mode,
        states: tracker.history.join(">"),
        errorName: error instanceof Error ? error.name : typeof error,
        durationMs: Date.now() - startTime,
      });

      if (error instanceof CredentialsExhaustedError) {
        throw new RateLimitError(error.retryHint, error.credentialRef);
      }

      if (isAppError(error)) {
        throw error;
      }

      throw new InfrastructureError("Chat processing failed", 500);
    }
  }

  return { handleChat };
}
