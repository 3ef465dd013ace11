/**
 * Concrete Postgres-backed implementation of the MemoryRepository port.
 *
 * Provides persistent storage for both memory tiers:
 * - memory_facts: long-term facts keyed by (category, owner_id, fact_id)
 * - conversation_turns: the short-term log keyed by (thread_id, sequence)
 *
 * Facts are insert-only; turns are appended with sequence numbers computed in
 * the same statement. Driver failures are logged and rethrown as
 * StoreUnavailableError so no SQL detail reaches the HTTP layer.
 */
import type { ClearSummary, MemoryRepository } from "@domain/memory/ports";
import {
  isFactType,
  TEMPORAL_STATUSES,
  type ConversationTurn,
  type Fact,
  type Namespace,
  type TemporalStatus,
  type TurnInput,
  type TurnRole,
} from "@domain/memory/types";
import type { SqlClient } from "@infrastructure/database/db";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { isAppError, StoreUnavailableError } from "@middleware/errorHandler";

interface FactRow {
  category: string;
  owner_id: string;
  fact_id: string;
  fact_type: string;
  value: string;
  label: string;
  confidence: number;
  importance: number;
  temporal_status: string;
  reference_sentence: string | null;
  context: string | null;
  origin_message: string;
  created_at: Date;
}

interface TurnRow {
  thread_id: string;
  sequence: number;
  role: string;
  content: string;
  created_at: Date;
}

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS memory_facts (
  position BIGSERIAL,
  category TEXT NOT NULL,
  owner_id TEXT NOT NULL,
  fact_id TEXT NOT NULL,
  fact_type TEXT NOT NULL,
  value TEXT NOT NULL,
  label TEXT NOT NULL,
  confidence DOUBLE PRECISION NOT NULL,
  importance DOUBLE PRECISION NOT NULL,
  temporal_status TEXT NOT NULL,
  reference_sentence TEXT,
  context TEXT,
  origin_message TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (category, owner_id, fact_id)
);

CREATE TABLE IF NOT EXISTS conversation_turns (
  thread_id TEXT NOT NULL,
  sequence INTEGER NOT NULL,
  role TEXT NOT NULL,
  content TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (thread_id, sequence)
);
`;

const FACT_COLUMNS = `category, owner_id, fact_id, fact_type, value, label, confidence,
  importance, temporal_status, reference_sentence, context, origin_message, created_at`;

function toTemporalStatus(value: string): TemporalStatus {
  return TEMPORAL_STATUSES.find((status) => status === value) ?? "none";
}

function toTurnRole(value: string): TurnRole {
  return value === "assistant" ? "assistant" : "user";
}

function toFact(row: FactRow): Fact {
  return {
    id: row.fact_id,
    namespace: { category: row.category, ownerId: row.owner_id },
    type: isFactType(row.fact_type) ? row.fact_type : "fact",
    value: row.value,
    label: row.label,
    confidence: Number(row.confidence),
    importance: Number(row.importance),
    temporalStatus: toTemporalStatus(row.temporal_status),
    referenceSentence: row.reference_sentence,
    context: row.context,
    originMessage: row.origin_message,
    createdAt: new Date(row.created_at),
  };
}

function toTurn(row: TurnRow): ConversationTurn {
  return {
    threadId: row.thread_id,
    sequence: Number(row.sequence),
    role: toTurnRole(row.role),
    content: row.content,
    createdAt: new Date(row.created_at),
  };
}

export function escapeLikePattern(query: string): string {
  return query.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class PostgresMemoryRepository implements MemoryRepository {
  constructor(private readonly client: SqlClient) {}

  async ensureSchema(): Promise<void> {
    await this.run("ensureSchema", () => this.client.query(SCHEMA_SQL));
  }

  async putFact(fact: Fact): Promise<void> {
    await this.run("putFact", () =>
      this.client.query(
        `
        INSERT INTO memory_facts (${FACT_COLUMNS})
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
        ON CONFLICT (category, owner_id, fact_id) DO NOTHING;
        `,
        [
          fact.namespace.category,
          fact.namespace.ownerId,
          fact.id,
          fact.type,
          fact.value,
          fact.label,
          fact.confidence,
          fact.importance,
          fact.temporalStatus,
          fact.referenceSentence,
          fact.context,
          fact.originMessage,
          fact.createdAt,
        ]
      )
    );

    logEvent("MEMORY_SAVE_FACT", {
      ownerId: fact.namespace.ownerId,
      factId: fact.id,
      type: fact.type,
      temporalStatus: fact.temporalStatus,
    });
  }

  async getFact(namespace: Namespace, factId: string): Promise<Fact | null> {
    const result = await this.run("getFact", () =>
      this.client.query<FactRow>(
        `
        SELECT ${FACT_COLUMNS}
        FROM memory_facts
        WHERE category = $1 AND owner_id = $2 AND fact_id = $3;
        `,
        [namespace.category, namespace.ownerId, factId]
      )
    );

    const row = result.rows[0];
    return row ? toFact(row) : null;
  }

  async searchFacts(namespace: Namespace, query?: string): Promise<Fact[]> {
    const needle = query?.trim();

    const result = await this.run("searchFacts", () =>
      needle
        ? this.client.query<FactRow>(
            `
            SELECT ${FACT_COLUMNS}
            FROM memory_facts
            WHERE category = $1
              AND owner_id = $2
              AND (value ILIKE $3 OR label ILIKE $3)
            ORDER BY position ASC;
            `,
            [
              namespace.category,
              namespace.ownerId,
              `%${escapeLikePattern(needle)}%`,
            ]
          )
        : this.client.query<FactRow>(
            `
            SELECT ${FACT_COLUMNS}
            FROM memory_facts
            WHERE category = $1 AND owner_id = $2
            ORDER BY position ASC;
            `,
            [namespace.category, namespace.ownerId]
          )
    );

    logEvent("MEMORY_FACTS_SCAN", {
      ownerId: namespace.ownerId,
      filtered: Boolean(needle),
      returned: result.rows.length,
    });

    return result.rows.map(toFact);
  }

  async deleteFact(namespace: Namespace, factId: string): Promise<boolean> {
    const result = await this.run("deleteFact", () =>
      this.client.query(
        `
        DELETE FROM memory_facts
        WHERE category = $1 AND owner_id = $2 AND fact_id = $3;
        `,
        [namespace.category, namespace.ownerId, factId]
      )
    );

    return (result.rowCount ?? 0) > 0;
  }

  async deleteNamespace(namespace: Namespace): Promise<number> {
    const result = await this.run("deleteNamespace", () =>
      this.client.query(
        `
        DELETE FROM memory_facts
        WHERE category = $1 AND owner_id = $2;
        `,
        [namespace.category, namespace.ownerId]
      )
    );

    return result.rowCount ?? 0;
  }

  async listOwners(category: string): Promise<string[]> {
    const result = await this.run("listOwners", () =>
      this.client.query<{ owner_id: string }>(
        `
        SELECT DISTINCT owner_id
        FROM memory_facts
        WHERE category = $1
        ORDER BY owner_id ASC;
        `,
        [category]
      )
    );

    return result.rows.map((row) => row.owner_id);
  }

  async appendTurns(
    threadId: string,
    turns: TurnInput[]
  ): Promise<ConversationTurn[]> {
    if (!turns.length) {
      return [];
    }

    const result = await this.run("appendTurns", () =>
      this.client.query<TurnRow>(
        `
        INSERT INTO conversation_turns (thread_id, sequence, role, content)
        SELECT $1, base.max_sequence + t.ord, t.role, t.content
        FROM (
          SELECT COALESCE(MAX(sequence), 0) AS max_sequence
          FROM conversation_turns
          WHERE thread_id = $1
        ) AS base,
        unnest($2::text[], $3::text[]) WITH ORDINALITY AS t(role, content, ord)
        RETURNING thread_id, sequence, role, content, created_at;
        `,
        [
          threadId,
          turns.map((turn) => turn.role),
          turns.map((turn) => turn.content),
        ]
      )
    );

    logEvent("MEMORY_SAVE_TURNS", {
      threadId,
      appended: result.rows.length,
    });

    return result.rows.map(toTurn).sort((a, b) => a.sequence - b.sequence);
  }

  /**
   * One statement, so PostgreSQL applies the fact inserts and the turn
   * append atomically.
   */
  async commitTurn(
    threadId: string,
    turns: TurnInput[],
    facts: Fact[]
  ): Promise<ConversationTurn[]> {
    const result = await this.run("commitTurn", () =>
      this.client.query<TurnRow>(
        `
        WITH new_facts AS (
          INSERT INTO memory_facts (${FACT_COLUMNS})
          SELECT * FROM unnest(
            $4::text[], $5::text[], $6::text[], $7::text[], $8::text[],
            $9::text[], $10::float8[], $11::float8[], $12::text[],
            $13::text[], $14::text[], $15::text[], $16::timestamptz[]
          )
          ON CONFLICT (category, owner_id, fact_id) DO NOTHING
          RETURNING 1
        )
        INSERT INTO conversation_turns (thread_id, sequence, role, content)
        SELECT $1, base.max_sequence + t.ord, t.role, t.content
        FROM (
          SELECT COALESCE(MAX(sequence), 0) AS max_sequence
          FROM conversation_turns
          WHERE thread_id = $1
        ) AS base,
        unnest($2::text[], $3::text[]) WITH ORDINALITY AS t(role, content, ord)
        RETURNING thread_id, sequence, role, content, created_at;
        `,
        [
          threadId,
          turns.map((turn) => turn.role),
          turns.map((turn) => turn.content),
          facts.map((fact) => fact.namespace.category),
          facts.map((fact) => fact.namespace.ownerId),
          facts.map((fact) => fact.id),
          facts.map((fact) => fact.type),
          facts.map((fact) => fact.value),
          facts.map((fact) => fact.label),
          facts.map((fact) => fact.confidence),
          facts.map((fact) => fact.importance),
          facts.map((fact) => fact.temporalStatus),
          facts.map((fact) => fact.referenceSentence),
          facts.map((fact) => fact.context),
          facts.map((fact) => fact.originMessage),
          facts.map((fact) => fact.createdAt),
        ]
      )
    );

    logEvent("MEMORY_COMMIT_TURN", {
      threadId,
      facts: facts.length,
      appended: result.rows.length,
    });

    return result.rows.map(toTurn).sort((a, b) => a.sequence - b.sequence);
  }

  async getRecentTurns(
    threadId: string,
    limit: number
  ): Promise<ConversationTurn[]> {
    if (limit <= 0) {
      return [];
    }

    const result = await this.run("getRecentTurns", () =>
      this.client.query<TurnRow>(
        `
        SELECT thread_id, sequence, role, content, created_at
        FROM conversation_turns
        WHERE thread_id = $1
        ORDER BY sequence DESC
        LIMIT $2;
        `,
        [threadId, limit]
      )
    );

    return result.rows.map(toTurn).reverse();
  }

  async countTurns(threadId: string): Promise<number> {
    const result = await this.run("countTurns", () =>
      this.client.query<{ total: number }>(
        `
        SELECT COUNT(*)::int AS total
        FROM conversation_turns
        WHERE thread_id = $1;
        `,
        [threadId]
      )
    );

    return Number(result.rows[0]?.total ?? 0);
  }

  async clearAll(): Promise<ClearSummary> {
    const result = await this.run("clearAll", () =>
      this.client.query<{ facts_deleted: number; turns_deleted: number }>(
        `
        WITH facts AS (DELETE FROM memory_facts RETURNING 1),
             turns AS (DELETE FROM conversation_turns RETURNING 1)
        SELECT
          (SELECT COUNT(*) FROM facts)::int AS facts_deleted,
          (SELECT COUNT(*) FROM turns)::int AS turns_deleted;
        `
      )
    );

    const row = result.rows[0];

    return {
      factsDeleted: Number(row?.facts_deleted ?? 0),
      turnsDeleted: Number(row?.turns_deleted ?? 0),
    };
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      if (isAppError(error)) {
        throw error;
      }

      logger.log("error", "MEMORY_STORE_FAILURE", {
        operation,
        message: error instanceof Error ? error.message : String(error),
      });

      throw new StoreUnavailableError(operation);
    }
  }
}
