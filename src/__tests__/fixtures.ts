import type { Request, Response } from "express";

import {
  ModelCallError,
  type ChatModelPort,
  type LLMMessage,
  type ModelCredential,
} from "@domain/llm/ports";
import {
  factNamespace,
  formatFactLabel,
  type Fact,
} from "@domain/memory/types";

export function makeFact(overrides: Partial<Fact> = {}): Fact {
  const type = overrides.type ?? "location";
  const value = overrides.value ?? "Oslo";
  const temporalStatus = overrides.temporalStatus ?? "current";

  return {
    id: "fact-1",
    namespace: factNamespace("alice"),
    type,
    value,
    label: formatFactLabel(type, value, temporalStatus),
    confidence: 0.9,
    importance: 0.8,
    temporalStatus,
    referenceSentence: null,
    context: null,
    originMessage: "I live in Oslo",
    createdAt: new Date("2024-05-01T10:00:00.000Z"),
    ...overrides,
  };
}

export function rateLimited(message = "Rate limit reached"): ModelCallError {
  return new ModelCallError("rate_limited", message);
}

type ScriptStep = string | Error;

/**
 * ChatModelPort that replays a fixed script and records every call.
 */
export class ScriptedModel implements ChatModelPort {
  readonly calls: { messages: LLMMessage[]; credential: ModelCredential }[] =
    [];

  constructor(private readonly script: ScriptStep[]) {}

  async invoke(
    messages: LLMMessage[],
    credential: ModelCredential
  ): Promise<string> {
    this.calls.push({ messages, credential });

    const step = this.script.shift();
    if (step === undefined) {
      throw new Error("ScriptedModel ran out of replies");
    }
    if (step instanceof Error) {
      throw step;
    }

    return step;
  }
}

export function createMockRequest(fields: {
  body?: unknown;
  params?: Record<string, string>;
  query?: Record<string, string>;
  method?: string;
  path?: string;
}): Request {
  return {
    method: "GET",
    path: "/test",
    params: {},
    query: {},
    ...fields,
  } as unknown as Request;
}

export type MockResponse = Response & { _status: number; _json: unknown };

export function createMockResponse(): MockResponse {
  const res = {
    _status: 200,
    _json: null as unknown,
    status(code: number) {
      this._status = code;
      return this;
    },
    json(data: unknown) {
      this._json = data;
      return this;
    },
  };

  return res as unknown as MockResponse;
}
