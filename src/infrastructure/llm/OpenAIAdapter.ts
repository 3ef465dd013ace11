/**
 * OpenAI SDK integration layer.
 *
 * Provides:
 * - `OpenAICompletionModel`, the ChatModelPort used for fact extraction
 *   (low temperature, JSON response mode, one client per credential)
 * - `toModelCallError`, which maps SDK and provider errors onto the
 *   rate_limited / malformed / other taxonomy the pipeline understands
 * - `validateOpenAIKeys`, the startup connectivity check for the pool
 */
import OpenAI from "openai";

import { config } from "@config/index";
import { maskCredential } from "@domain/llm/FailoverPolicy";
import {
  ModelCallError,
  type ChatModelPort,
  type LLMMessage,
  type ModelCredential,
} from "@domain/llm/ports";
import { logEvent, logger } from "@infrastructure/logging/Logger";

const RATE_LIMIT_CODES = new Set(["rate_limit_exceeded", "insufficient_quota"]);
const RATE_LIMIT_TEXT = /\b429\b|rate.?limit|too many requests/i;

function field(source: unknown, key: string): unknown {
  return typeof source === "object" && source !== null
    ? Reflect.get(source, key)
    : undefined;
}

/**
 * The error itself plus everything it wraps: `cause` chains and the
 * `lastError` of retry wrappers.
 */
function errorChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;

  while (current !== undefined && current !== null && chain.length < 8) {
    if (chain.includes(current)) {
      break;
    }

    chain.push(current);
    current = field(current, "cause") ?? field(current, "lastError");
  }

  return chain;
}

function isRateLimitLink(link: unknown): boolean {
  const status = field(link, "status") ?? field(link, "statusCode");
  if (status === 429) {
    return true;
  }

  const code = field(link, "code");
  if (typeof code === "string" && RATE_LIMIT_CODES.has(code)) {
    return true;
  }

  const message = field(link, "message");
  return typeof message === "string" && RATE_LIMIT_TEXT.test(message);
}

function messageOf(link: unknown): string {
  const message = field(link, "message");
  return typeof message === "string" ? message : String(link);
}

export function toModelCallError(error: unknown): ModelCallError {
  if (error instanceof ModelCallError) {
    return error;
  }

  const chain = errorChain(error);
  const rateLimited = chain.find(isRateLimitLink);

  if (rateLimited !== undefined) {
    return new ModelCallError("rate_limited", messageOf(rateLimited));
  }

  return new ModelCallError("other", messageOf(error));
}

function toCompletionMessage(
  message: LLMMessage
): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

export interface CompletionModelSettings {
  model: string;
  temperature: number;
  baseUrl?: string | undefined;
  timeoutMs: number;
  jsonMode: boolean;
}

export class OpenAICompletionModel implements ChatModelPort {
  private readonly clients = new Map<string, OpenAI>();

  constructor(private readonly settings: CompletionModelSettings) {}

  async invoke(
    messages: LLMMessage[],
    credential: ModelCredential
  ): Promise<string> {
    const startedAt = Date.now();

    try {
      const completion = await this.clientFor(credential).chat.completions.create(
        {
          model: this.settings.model,
          temperature: this.settings.temperature,
          messages: messages.map(toCompletionMessage),
          ...(this.settings.jsonMode
            ? { response_format: { type: "json_object" as const } }
            : {}),
        }
      );

      const content = completion.choices[0]?.message?.content?.trim();

      if (!content) {
        throw new ModelCallError("malformed", "Completion returned no content");
      }

      logEvent("LLM_SUCCESS", {
        model: this.settings.model,
        purpose: "completion",
        credentialRef: credential.id,
        durationMs: Date.now() - startedAt,
        outputLength: content.length,
      });

      return content;
    } catch (error: unknown) {
      const failure = toModelCallError(error);

      logEvent("LLM_FAILURE", {
        model: this.settings.model,
        purpose: "completion",
        credentialRef: credential.id,
        kind: failure.kind,
        durationMs: Date.now() - startedAt,
      });

      throw failure;
    }
  }

  private clientFor(credential: ModelCredential): OpenAI {
    const existing = this.clients.get(credential.id);
    if (existing) {
      return existing;
    }

    const client = new OpenAI({
      apiKey: credential.secret,
      baseURL: this.settings.baseUrl,
      timeout: this.settings.timeoutMs,
      maxRetries: 0,
    });

    this.clients.set(credential.id, client);
    return client;
  }
}

/**
 * Logs the format and reachability of every pooled key. Never throws; a bad
 * key only shows up in the logs and is skipped over by failover at run time.
 */
export async function validateOpenAIKeys(
  keys: readonly string[] = config.openai.keys
): Promise<void> {
  for (const [index, key] of keys.entries()) {
    const masked = maskCredential(key);

    if (!/^sk-[A-Za-z0-9_-]{20,}$/.test(key)) {
      logger.log("warn", "OPENAI_KEY_FORMAT_SUSPICIOUS", { index, key: masked });
    }

    try {
      const healthClient = new OpenAI({
        apiKey: key,
        baseURL: config.openai.baseUrl,
        timeout: Math.min(config.openai.timeoutMs, 5000),
        maxRetries: 0,
      });

      const startedAt = Date.now();
      await healthClient.models.retrieve(config.openai.model);

      logger.log("info", "OPENAI_KEY_OK", {
        index,
        key: masked,
        model: config.openai.model,
        durationMs: Date.now() - startedAt,
      });
    } catch (error: unknown) {
      const failure = toModelCallError(error);

      logger.log("warn", "OPENAI_KEY_CHECK_FAILED", {
        index,
        key: masked,
        kind: failure.kind,
      });
    }
  }
}
