import { z } from "zod";

import type { ConversationTurn, Fact } from "@domain/memory/types";
import type { FactMetadataSchema } from "@interfaces/http/chat/schema";

/**
 * Path/query schemas for the memory routes and the JSON shapes facts and
 * turns take on the wire (snake_case, ISO timestamps, null for no temporal
 * qualifier).
 */
export const UserIdParamsSchema = z.object({
  userId: z.string().trim().min(1),
});

export const InspectQuerySchema = z.object({
  user_id: z.string().trim().min(1).optional(),
  query: z.string().optional(),
});

export type FactMetadata = z.infer<typeof FactMetadataSchema>;

export function serializeFact(fact: Fact): FactMetadata {
  return {
    id: fact.id,
    data: fact.label,
    entity_type: fact.type,
    entity_value: fact.value,
    confidence: fact.confidence,
    importance: fact.importance,
    context: fact.context,
    temporal_status: fact.temporalStatus === "none" ? null : fact.temporalStatus,
    reference_sentence: fact.referenceSentence,
    original_message: fact.originMessage,
    timestamp: fact.createdAt.toISOString(),
  };
}

export function serializeTurn(turn: ConversationTurn) {
  return {
    role: turn.role,
    content: turn.content,
    sequence: turn.sequence,
    timestamp: turn.createdAt.toISOString(),
  };
}
