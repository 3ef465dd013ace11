/**
 * Builds the model input for one chat turn.
 *
 * Output order is fixed: system prompt, the trimmed short-term history (when
 * the mode includes it), then the current user message, augmented with a
 * `[STORED MEMORIES ...]` block when the owner has long-term facts. Retrieval
 * is the whole namespace; choosing what is relevant is left to the model.
 */
import type { ServiceItem } from "@config/serviceCatalog";
import type { LLMMessage } from "@domain/llm/ports";
import {
  deriveThreadId,
  includesLongTerm,
  includesShortTerm,
  type MemoryMode,
} from "@domain/memory/memoryMode";
import type { MemoryRepository } from "@domain/memory/ports";
import {
  factNamespace,
  type Fact,
  type TurnInput,
} from "@domain/memory/types";
import { logEvent } from "@infrastructure/logging/Logger";

export type ModeType = "agent" | "ask";

export interface ComposeRequest {
  ownerId: string;
  mode: MemoryMode;
  message: string;
  history: TurnInput[];
  modeType?: ModeType | null;
  service?: ServiceItem | null;
}

export interface ComposedInput {
  messages: LLMMessage[];
  retrievedFacts: Fact[];
  threadId: string;
  historyCount: number;
}

export interface ContextComposerOptions {
  /** Upper bound on history messages sent to the model. */
  shortTermLimit: number;
}

export function buildSystemPrompt(
  shortTermLimit: number,
  modeType?: ModeType | null,
  service?: ServiceItem | null
): string {
  const sections = [
    `You are a helpful assistant with two kinds of memory:
- SHORT-TERM: the last ${shortTermLimit} messages of this conversation.
- LONG-TERM: facts about the user saved from earlier conversations.

Rules for long-term memory:
1. Facts inside [STORED MEMORIES ...] come from earlier conversations. Treat them as true.
2. If they conflict with the recent conversation, prefer the stored memories and say so.
3. For personal questions, check the stored memories first.
4. When asked what you remember, list every stored memory.
5. Facts marked (past) are no longer true; facts marked (current) are.
6. When asked about your memory or database, describe honestly what is stored.`,
  ];

  if (modeType === "agent") {
    sections.push(
      "MODE: agent. Carry out the user's task step by step and confirm what you did."
    );
  } else if (modeType === "ask") {
    sections.push(
      "MODE: ask. Answer with information only; do not claim to take actions."
    );
  }

  if (service) {
    sections.push(`SERVICE: ${service.label}. ${service.instructions}`);
  }

  return sections.join("\n\n");
}

export function renderFact(fact: Fact): string {
  return fact.referenceSentence
    ? `${fact.label} [Reference: '${fact.referenceSentence}']`
    : fact.label;
}

export function augmentMessage(message: string, facts: Fact[]): string {
  if (!facts.length) {
    return message;
  }

  const block = facts.map(renderFact).join(" ");

  return (
    `${message}\n\n` +
    `[STORED MEMORIES from previous conversations:\n${block}\n` +
    `Use these memories to answer the user's question if relevant.]`
  );
}

/**
 * Last `limit` user/assistant messages, starting on a user message.
 */
export function trimHistory(history: TurnInput[], limit: number): TurnInput[] {
  const conversational = history.filter(
    (turn) => turn.role === "user" || turn.role === "assistant"
  );

  const window = limit > 0 ? conversational.slice(-limit) : [];
  const firstUser = window.findIndex((turn) => turn.role === "user");

  return firstUser === -1 ? [] : window.slice(firstUser);
}

export class ContextComposer {
  constructor(
    private readonly repository: MemoryRepository,
    private readonly options: ContextComposerOptions
  ) {}

  async compose(request: ComposeRequest): Promise<ComposedInput> {
    const { ownerId, mode, message } = request;

    const retrievedFacts = includesLongTerm(mode)
      ? await this.repository.searchFacts(factNamespace(ownerId))
      : [];

    const history = includesShortTerm(mode)
      ? trimHistory(request.history, this.options.shortTermLimit)
      : [];

    const messages: LLMMessage[] = [
      {
        role: "system",
        content: buildSystemPrompt(
          this.options.shortTermLimit,
          request.modeType,
          request.service
        ),
      },
      ...history.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: "user", content: augmentMessage(message, retrievedFacts) },
    ];

    logEvent("CONTEXT_COMPOSED", {
      ownerId,
      mode,
      factsRetrieved: retrievedFacts.length,
      historyCount: history.length,
    });

    return {
      messages,
      retrievedFacts,
      threadId: deriveThreadId(ownerId, mode),
      historyCount: history.length,
    };
  }
}
