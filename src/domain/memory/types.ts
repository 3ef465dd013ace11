/**
 * Long-term and short-term memory records.
 *
 * Facts live under a namespace `{ category, ownerId }` and are never mutated
 * once written; conflicting facts (two "current" locations) coexist and are
 * left for the model to reconcile at read time. Conversation turns belong to a
 * thread and are only removed by the administrative bulk clear.
 */
export const FACT_TYPES = [
  "person_name",
  "age",
  "profession",
  "location",
  "preference",
  "fact",
  "relationship",
] as const;

export type FactType = (typeof FACT_TYPES)[number];

export const TEMPORAL_STATUSES = ["past", "current", "future", "none"] as const;

export type TemporalStatus = (typeof TEMPORAL_STATUSES)[number];

export const FACT_CATEGORY = "memories";

export interface Namespace {
  category: string;
  ownerId: string;
}

export interface Fact {
  id: string;
  namespace: Namespace;
  type: FactType;
  value: string;
  /** Display form, e.g. `location: Austin (past)`. */
  label: string;
  confidence: number;
  importance: number;
  temporalStatus: TemporalStatus;
  referenceSentence: string | null;
  context: string | null;
  originMessage: string;
  createdAt: Date;
}

export type TurnRole = "user" | "assistant";

export interface TurnInput {
  role: TurnRole;
  content: string;
}

export interface ConversationTurn extends TurnInput {
  threadId: string;
  sequence: number;
  createdAt: Date;
}

export function isFactType(value: string): value is FactType {
  return (FACT_TYPES as readonly string[]).includes(value);
}

export function factNamespace(ownerId: string): Namespace {
  return { category: FACT_CATEGORY, ownerId };
}

export function formatFactLabel(
  type: FactType,
  value: string,
  temporalStatus: TemporalStatus
): string {
  const suffix = temporalStatus === "none" ? "" : ` (${temporalStatus})`;
  return `${type}: ${value}${suffix}`;
}
