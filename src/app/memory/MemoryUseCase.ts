/**
 * Read and maintenance operations over both memory tiers.
 *
 * Backs the /memories, /conversation, /memory-bank and /users routes. Nothing
 * here calls the model; it is a thin layer over the repository port.
 */
import { deriveThreadId } from "@domain/memory/memoryMode";
import type { ClearSummary, MemoryRepository } from "@domain/memory/ports";
import {
  FACT_CATEGORY,
  factNamespace,
  type ConversationTurn,
  type Fact,
  type FactType,
} from "@domain/memory/types";
import { logEvent, logger } from "@infrastructure/logging/Logger";

export interface ConversationView {
  total: number;
  turns: ConversationTurn[];
}

export type MemoryBankFiles = Record<string, string>;

const BANK_FILES: { file: string; title: string; types: FactType[] }[] = [
  {
    file: "profile.md",
    title: "Profile",
    types: ["person_name", "age", "profession", "location"],
  },
  { file: "interests.md", title: "Interests", types: ["fact"] },
  { file: "preferences.md", title: "Preferences", types: ["preference"] },
  { file: "relationships.md", title: "Relationships", types: ["relationship"] },
];

function renderSection(title: string, facts: Fact[]): string {
  if (!facts.length) {
    return "";
  }

  return `# ${title}\n\n${facts.map((fact) => `- ${fact.label}\n`).join("")}`;
}

/**
 * Groups an owner's facts into the markdown files shown by the memory-bank
 * view. `knowledge_base.md` lists everything; `active_context.md` only facts
 * that are currently true.
 */
export function buildMemoryBank(facts: Fact[]): MemoryBankFiles {
  const files: MemoryBankFiles = {};

  for (const { file, title, types } of BANK_FILES) {
    files[file] = renderSection(
      title,
      facts.filter((fact) => types.includes(fact.type))
    );
  }

  files["knowledge_base.md"] = renderSection("Knowledge Base", facts);
  files["active_context.md"] = renderSection(
    "Active Context",
    facts.filter((fact) => fact.temporalStatus === "current")
  );

  return files;
}

export function createMemoryUseCase(
  repository: MemoryRepository,
  settings: { shortTermLimit: number }
) {
  async function listFacts(userId: string): Promise<Fact[]> {
    return repository.searchFacts(factNamespace(userId));
  }

  async function deleteFacts(userId: string): Promise<number> {
    const deleted = await repository.deleteNamespace(factNamespace(userId));

    logEvent("MEMORY_NAMESPACE_DELETED", { userId, deleted });

    return deleted;
  }

  async function inspectFacts(
    userId: string | undefined,
    query?: string
  ): Promise<Fact[]> {
    if (!userId) {
      return [];
    }

    return repository.searchFacts(factNamespace(userId), query);
  }

  async function clearAll(): Promise<ClearSummary> {
    const summary = await repository.clearAll();

    logger.log("warn", "MEMORY_CLEARED_ALL", { ...summary });

    return summary;
  }

  async function listUsers(): Promise<string[]> {
    return repository.listOwners(FACT_CATEGORY);
  }

  async function memoryBank(userId: string): Promise<MemoryBankFiles> {
    return buildMemoryBank(await listFacts(userId));
  }

  /**
   * Short-term log of the owner's main thread. A store failure yields an
   * empty view so the chat UI can still render.
   */
  async function conversation(userId: string): Promise<ConversationView> {
    const threadId = deriveThreadId(userId, "both");

    try {
      const [total, turns] = await Promise.all([
        repository.countTurns(threadId),
        repository.getRecentTurns(threadId, settings.shortTermLimit),
      ]);

      return { total, turns };
    } catch (error: unknown) {
      logger.log("error", "CONVERSATION_READ_FAILED", {
        userId,
        message: error instanceof Error ? error.message : String(error),
      });

      return { total: 0, turns: [] };
    }
  }

  return {
    listFacts,
    deleteFacts,
    inspectFacts,
    clearAll,
    listUsers,
    memoryBank,
    conversation,
  };
}

export type MemoryUseCase = ReturnType<typeof createMemoryUseCase>;
