import { z } from "zod";

/**
 * Zod validation schemas for the chat endpoint.
 *
 * - ChatRequestSchema: `message` and `user_id` are required; everything else
 *   is optional and normalized downstream (unknown memory_source → "both")
 * - ChatResponseSchema: the response contract returned to the chat UI
 */
export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1),
  user_id: z.string().trim().min(1),
  memory_source: z.string().nullish(),
  messages: z
    .array(
      z.object({
        role: z.string(),
        content: z.string(),
      })
    )
    .nullish(),
  mode_type: z.string().nullish(),
  selected_service: z.string().nullish(),
});

export type ChatRequestBody = z.infer<typeof ChatRequestSchema>;

export const FactMetadataSchema = z.object({
  id: z.string(),
  data: z.string(),
  entity_type: z.string(),
  entity_value: z.string(),
  confidence: z.number(),
  importance: z.number(),
  context: z.string().nullable(),
  temporal_status: z.string().nullable(),
  reference_sentence: z.string().nullable(),
  original_message: z.string(),
  timestamp: z.string(),
});

export const ChatResponseSchema = z.object({
  response: z.string(),
  memories_used: z.array(
    z.object({
      text: z.string(),
      metadata: FactMetadataSchema,
    })
  ),
  facts_extracted: z.array(z.string()),
  mode_transitions: z.array(z.string()),
  memory_source: z.enum(["short", "long", "both"]),
});

export type ChatResponseBody = z.infer<typeof ChatResponseSchema>;
