/**
 * LLM-backed extraction of memorable facts from a user turn.
 *
 * One model call per turn, bound to a JSON contract:
 *   { entities: [...], summary, importance, should_store }
 *
 * Extraction is bookkeeping for the long-term store, so it never fails the
 * turn: rate limits, transport errors and malformed output all end in `null`
 * and a log line. Every parsed entity is kept here; the confidence threshold
 * is applied when facts are committed.
 */
import crypto from "crypto";

import { z } from "zod";

import type {
  ChatModelPort,
  LLMMessage,
  ModelCredential,
} from "@domain/llm/ports";
import { isRateLimited } from "@domain/llm/ports";
import {
  factNamespace,
  formatFactLabel,
  isFactType,
  TEMPORAL_STATUSES,
  type Fact,
  type FactType,
  type TemporalStatus,
  type TurnInput,
} from "@domain/memory/types";
import { logEvent, logger } from "@infrastructure/logging/Logger";

export interface ExtractedEntity {
  type: FactType;
  value: string;
  confidence: number;
  context: string | null;
  temporalStatus: TemporalStatus;
  referenceSentence: string | null;
}

export interface ExtractionResult {
  entities: ExtractedEntity[];
  summary: string;
  importance: number;
  shouldStore: boolean;
}

/** Floor for persisted facts; a configured threshold can only raise it. */
export const MIN_FACT_CONFIDENCE = 0.5;

export interface EntityExtractorOptions {
  /** How many prior turns are shown to the model. */
  contextTurns: number;
}

const EXTRACTION_SYSTEM_PROMPT =
  "You extract long-term memories from conversations. Reply with a single JSON object and nothing else.";

function buildExtractionPrompt(transcript: string): string {
  return `Read the conversation below and pull out what is worth remembering about the user from their LATEST message.

CONVERSATION:
${transcript}
ENTITY TYPES:
- person_name: the user's name or names of people they mention
- age: ages
- profession: jobs, roles, occupations
- location: cities, countries, places of residence or travel
- preference: likes, dislikes, habits
- fact: other facts about the user
- relationship: family, friends, colleagues, with who they are to the user

VALUE FIELD:
Make each value self-contained. Fold in who, what, when, where, why and how whenever the user said them.
Write "plays basketball every Saturday at the community center", not "basketball".
Write "works with Priya on the quarterly budget", not "colleague".

TEMPORAL STATUS:
- "past": no longer true ("I used to live in Lisbon")
- "current": true now ("I live in Oslo now")
- "future": plans or intentions ("I'm moving to Kyoto next year")
- null: timeless ("My name is Ana")

REFERENCE SENTENCE:
Quote the sentence (or a compact part of it) that states the entity.

SCORING:
- confidence 0.0-1.0 per entity: 1.0 explicit statement, 0.7-0.9 strong context, 0.5-0.6 implied, below 0.5 uncertain
- importance 0.0-1.0 for the whole message: 1.0 core identity, 0.7-0.9 significant facts, 0.5-0.6 minor preferences, below 0.5 small talk

FORMAT:
{
  "entities": [
    {"type": "location", "value": "Lisbon", "confidence": 1.0, "context": "where the user used to live", "temporal_status": "past", "reference_sentence": "I used to live in Lisbon"},
    {"type": "location", "value": "Oslo", "confidence": 1.0, "context": "where the user lives now", "temporal_status": "current", "reference_sentence": "I live in Oslo now"},
    {"type": "person_name", "value": "Ana", "confidence": 1.0, "context": "the user's name", "temporal_status": null, "reference_sentence": "My name is Ana"}
  ],
  "summary": "Ana used to live in Lisbon and now lives in Oslo.",
  "importance": 0.95,
  "should_store": true
}

When there is nothing worth remembering (greetings, questions, small talk) reply with:
{"entities": [], "summary": "No memorable information", "importance": 0.0, "should_store": false}`;
}

const EntitySchema = z.object({
  type: z.string(),
  value: z.string(),
  confidence: z.number(),
  context: z.string().nullish(),
  temporal_status: z.string().nullable().optional(),
  reference_sentence: z.string().nullish(),
});

const ExtractionSchema = z.object({
  entities: z.array(EntitySchema).default([]),
  summary: z.string().default(""),
  importance: z.number().default(0),
  should_store: z.boolean().default(true),
});

type RawEntity = z.infer<typeof EntitySchema>;

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Absent means "current"; an explicit null (or anything unrecognised) means
 * the fact has no temporal qualifier.
 */
function toTemporalStatus(raw: string | null | undefined): TemporalStatus {
  if (raw === undefined) {
    return "current";
  }

  const normalized = raw?.trim().toLowerCase() ?? "none";
  const match = TEMPORAL_STATUSES.find((status) => status === normalized);
  return match ?? "none";
}

function toEntity(raw: RawEntity): ExtractedEntity {
  const type = raw.type.trim().toLowerCase();

  return {
    type: isFactType(type) ? type : "fact",
    value: raw.value.trim(),
    confidence: clamp01(raw.confidence),
    context: raw.context?.trim() || null,
    temporalStatus: toTemporalStatus(raw.temporal_status),
    referenceSentence: raw.reference_sentence?.trim() || null,
  };
}

/**
 * Removes a surrounding ``` fence, with or without a `json` tag.
 */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();

  if (!text.startsWith("```")) {
    return text;
  }

  const withoutOpening = text.replace(/^```(?:json)?[^\S\n]*\n?/i, "");
  return withoutOpening.replace(/\n?```\s*$/, "").trim();
}

/**
 * Parses a model reply into an ExtractionResult, or `null` when the reply is
 * not JSON or does not match the contract.
 */
export function parseExtraction(raw: string): ExtractionResult | null {
  let decoded: unknown;

  try {
    decoded = JSON.parse(stripCodeFence(raw));
  } catch (error: unknown) {
    logEvent("EXTRACTION_MALFORMED", {
      reason: "json_decode",
      message: error instanceof Error ? error.message : String(error),
      preview: raw.slice(0, 200),
    });
    return null;
  }

  const parsed = ExtractionSchema.safeParse(decoded);

  if (!parsed.success) {
    logEvent("EXTRACTION_MALFORMED", {
      reason: "schema",
      issues: parsed.error.issues.length,
      preview: raw.slice(0, 200),
    });
    return null;
  }

  return {
    // Blank values are dropped one by one; the rest of the batch is kept.
    entities: parsed.data.entities
      .map(toEntity)
      .filter((entity) => entity.value.length > 0),
    summary: parsed.data.summary,
    importance: clamp01(parsed.data.importance),
    shouldStore: parsed.data.should_store,
  };
}

export function renderTranscript(
  recentTurns: TurnInput[],
  message: string,
  contextTurns: number
): string {
  const window = contextTurns > 0 ? recentTurns.slice(-contextTurns) : [];

  const lines = window.map(
    (turn) => `${turn.role === "user" ? "User" : "Assistant"}: ${turn.content}`
  );
  lines.push(`User: ${message}`);

  return lines.join("\n") + "\n";
}

/**
 * Turns an extraction into the facts to persist: nothing unless the model
 * asked to store, and only entities at or above `minConfidence` (itself never
 * below MIN_FACT_CONFIDENCE).
 */
export function selectFactsToStore(
  extraction: ExtractionResult,
  params: {
    ownerId: string;
    originMessage: string;
    minConfidence: number;
    now?: Date;
  }
): Fact[] {
  if (!extraction.shouldStore) {
    return [];
  }

  const createdAt = params.now ?? new Date();
  const namespace = factNamespace(params.ownerId);
  const threshold = Math.max(params.minConfidence, MIN_FACT_CONFIDENCE);

  return extraction.entities
    .filter((entity) => entity.confidence >= threshold)
    .map((entity) => ({
      id: crypto.randomUUID(),
      namespace,
      type: entity.type,
      value: entity.value,
      label: formatFactLabel(entity.type, entity.value, entity.temporalStatus),
      confidence: entity.confidence,
      importance: extraction.importance,
      temporalStatus: entity.temporalStatus,
      referenceSentence: entity.referenceSentence,
      context: entity.context ?? (extraction.summary || null),
      originMessage: params.originMessage,
      createdAt,
    }));
}

export class EntityExtractor {
  constructor(
    private readonly model: ChatModelPort,
    private readonly credential: () => ModelCredential,
    private readonly options: EntityExtractorOptions
  ) {}

  async extract(
    message: string,
    recentTurns: TurnInput[],
    ownerId: string
  ): Promise<ExtractionResult | null> {
    const transcript = renderTranscript(
      recentTurns,
      message,
      this.options.contextTurns
    );

    const messages: LLMMessage[] = [
      { role: "system", content: EXTRACTION_SYSTEM_PROMPT },
      { role: "user", content: buildExtractionPrompt(transcript) },
    ];

    let raw: string;

    try {
      raw = await this.model.invoke(messages, this.credential());
    } catch (error: unknown) {
      logger.log("warn", "EXTRACTION_SKIPPED", {
        ownerId,
        reason: isRateLimited(error) ? "rate_limited" : "model_error",
        message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const extraction = parseExtraction(raw);

    if (extraction) {
      logEvent("EXTRACTION_PARSED", {
        ownerId,
        entities: extraction.entities.length,
        importance: extraction.importance,
        shouldStore: extraction.shouldStore,
      });
    }

    return extraction;
  }
}
