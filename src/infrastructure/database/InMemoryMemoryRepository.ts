/**
 * Process-local implementation of the MemoryRepository port.
 *
 * Used by the test suites and by `MEMORY_BACKEND=memory` for running the API
 * without PostgreSQL. State is lost on restart. Records are copied on the way
 * in and out so callers cannot mutate stored facts.
 */
import type { ClearSummary, MemoryRepository } from "@domain/memory/ports";
import type {
  ConversationTurn,
  Fact,
  Namespace,
  TurnInput,
} from "@domain/memory/types";

function namespaceKey(namespace: Namespace): string {
  return JSON.stringify([namespace.category, namespace.ownerId]);
}

function copyFact(fact: Fact): Fact {
  return {
    ...fact,
    namespace: { ...fact.namespace },
    createdAt: new Date(fact.createdAt.getTime()),
  };
}

export function matchesQuery(fact: Fact, query: string | undefined): boolean {
  const needle = query?.trim().toLowerCase();
  if (!needle) {
    return true;
  }

  return (
    fact.value.toLowerCase().includes(needle) ||
    fact.label.toLowerCase().includes(needle)
  );
}

export class InMemoryMemoryRepository implements MemoryRepository {
  private readonly facts = new Map<string, Map<string, Fact>>();
  private readonly turns = new Map<string, ConversationTurn[]>();

  async putFact(fact: Fact): Promise<void> {
    const key = namespaceKey(fact.namespace);
    const bucket = this.facts.get(key) ?? new Map<string, Fact>();

    bucket.set(fact.id, copyFact(fact));
    this.facts.set(key, bucket);
  }

  async getFact(namespace: Namespace, factId: string): Promise<Fact | null> {
    const fact = this.facts.get(namespaceKey(namespace))?.get(factId);
    return fact ? copyFact(fact) : null;
  }

  async searchFacts(namespace: Namespace, query?: string): Promise<Fact[]> {
    const bucket = this.facts.get(namespaceKey(namespace));
    if (!bucket) {
      return [];
    }

    return [...bucket.values()]
      .filter((fact) => matchesQuery(fact, query))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(copyFact);
  }

  async deleteFact(namespace: Namespace, factId: string): Promise<boolean> {
    return this.facts.get(namespaceKey(namespace))?.delete(factId) ?? false;
  }

  async deleteNamespace(namespace: Namespace): Promise<number> {
    const key = namespaceKey(namespace);
    const count = this.facts.get(key)?.size ?? 0;

    this.facts.delete(key);
    return count;
  }

  async listOwners(category: string): Promise<string[]> {
    const owners = new Set<string>();

    for (const bucket of this.facts.values()) {
      for (const fact of bucket.values()) {
        if (fact.namespace.category === category) {
          owners.add(fact.namespace.ownerId);
        }
      }
    }

    return [...owners].sort();
  }

  async appendTurns(
    threadId: string,
    turns: TurnInput[]
  ): Promise<ConversationTurn[]> {
    const log = this.turns.get(threadId) ?? [];
    const createdAt = new Date();

    const appended = turns.map((turn, offset) => ({
      threadId,
      sequence: log.length + offset + 1,
      role: turn.role,
      content: turn.content,
      createdAt,
    }));

    this.turns.set(threadId, [...log, ...appended]);
    return appended.map((turn) => ({ ...turn }));
  }

  async commitTurn(
    threadId: string,
    turns: TurnInput[],
    facts: Fact[]
  ): Promise<ConversationTurn[]> {
    for (const fact of facts) {
      await this.putFact(fact);
    }

    return this.appendTurns(threadId, turns);
  }

  async getRecentTurns(
    threadId: string,
    limit: number
  ): Promise<ConversationTurn[]> {
    if (limit <= 0) {
      return [];
    }

    return (this.turns.get(threadId) ?? [])
      .slice(-limit)
      .map((turn) => ({ ...turn }));
  }

  async countTurns(threadId: string): Promise<number> {
    return this.turns.get(threadId)?.length ?? 0;
  }

  async clearAll(): Promise<ClearSummary> {
    let factsDeleted = 0;
    for (const bucket of this.facts.values()) {
      factsDeleted += bucket.size;
    }

    let turnsDeleted = 0;
    for (const log of this.turns.values()) {
      turnsDeleted += log.length;
    }

    this.facts.clear();
    this.turns.clear();

    return { factsDeleted, turnsDeleted };
  }
}
