/**
 * Memory repository interface definitions.
 *
 * Defines the contract for the two memory tiers:
 * - Long-term facts, scoped by namespace; no cross-namespace query exists
 * - Short-term conversation turns, an append-only log per thread
 *
 * Implementations must give per-key atomicity; concurrent writers for the
 * same owner are last-write-wins.
 */
import type {
  ConversationTurn,
  Fact,
  Namespace,
  TurnInput,
} from "@domain/memory/types";

export interface ClearSummary {
  factsDeleted: number;
  turnsDeleted: number;
}

export interface MemoryRepository {
  putFact(fact: Fact): Promise<void>;

  getFact(namespace: Namespace, factId: string): Promise<Fact | null>;

  /**
   * All facts in the namespace, oldest first. A non-empty query keeps only
   * facts whose value or label contains it (case-insensitive).
   */
  searchFacts(namespace: Namespace, query?: string): Promise<Fact[]>;

  deleteFact(namespace: Namespace, factId: string): Promise<boolean>;

  deleteNamespace(namespace: Namespace): Promise<number>;

  listOwners(category: string): Promise<string[]>;

  /** Appends in order and returns the stored turns with their sequence numbers. */
  appendTurns(threadId: string, turns: TurnInput[]): Promise<ConversationTurn[]>;

  /**
   * Stores a finished chat turn: its facts and its thread turns land together
   * or not at all.
   */
  commitTurn(
    threadId: string,
    turns: TurnInput[],
    facts: Fact[]
  ): Promise<ConversationTurn[]>;

  /** Most recent `limit` turns of a thread, oldest first. */
  getRecentTurns(threadId: string, limit: number): Promise<ConversationTurn[]>;

  countTurns(threadId: string): Promise<number>;

  clearAll(): Promise<ClearSummary>;
}
