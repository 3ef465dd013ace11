import { describe, expect, it } from "vitest";

import { createContainer } from "@app/container";
import { loadConfig } from "@config/index";
import { serviceCatalog } from "@config/serviceCatalog";
import { createChatController } from "@interfaces/http/ChatController";
import {
  GENERIC_ERROR_MESSAGE,
  InfrastructureError,
  ValidationError,
} from "@middleware/errorHandler";

import {
  createMockRequest,
  createMockResponse,
  makeFact,
  ScriptedModel,
} from "../../../__tests__/fixtures";

const NOTHING_TO_STORE = JSON.stringify({
  entities: [],
  summary: "No memorable information",
  importance: 0,
  should_store: false,
});

function build(replies: string[], extractions: string[] = []) {
  const responder = new ScriptedModel(replies);
  const container = createContainer(
    loadConfig({
      OPENAI_API_KEYS: "test-key-a,test-key-b",
      MEMORY_BACKEND: "memory",
      SHORT_TERM_MESSAGE_LIMIT: "10",
    }),
    { responder, extractionModel: new ScriptedModel(extractions) }
  );

  return { ...container, responder };
}

describe("chat controller", () => {
  it("returns the snake_case chat response", async () => {
    const { controllers, repository } = build(["Hello Alice!"], [NOTHING_TO_STORE]);
    await repository.putFact(makeFact({ referenceSentence: "I live in Oslo" }));
    const res = createMockResponse();

    await controllers.chat(
      createMockRequest({
        method: "POST",
        body: { message: "hi", user_id: "alice" },
      }),
      res
    );

    expect(res._json).toEqual({
      response: "Hello Alice!",
      memories_used: [
        {
          text: "location: Oslo (current)",
          metadata: {
            id: "fact-1",
            data: "location: Oslo (current)",
            entity_type: "location",
            entity_value: "Oslo",
            confidence: 0.9,
            importance: 0.8,
            context: null,
            temporal_status: "current",
            reference_sentence: "I live in Oslo",
            original_message: "I live in Oslo",
            timestamp: "2024-05-01T10:00:00.000Z",
          },
        },
      ],
      facts_extracted: [],
      mode_transitions: ["long_term"],
      memory_source: "both",
    });
  });

  it("passes mode, service and client history to the model", async () => {
    const { controllers, responder } = build(["Booked."]);
    const res = createMockResponse();

    await controllers.chat(
      createMockRequest({
        method: "POST",
        body: {
          message: "Get me a ride",
          user_id: "alice",
          memory_source: "short",
          mode_type: "agent",
          selected_service: "uber",
          messages: [
            { role: "system", content: "ignored" },
            { role: "user", content: "earlier" },
            { role: "assistant", content: "reply" },
          ],
        },
      }),
      res
    );

    const sent = responder.calls[0]?.messages ?? [];
    const system = sent[0]?.content ?? "";

    expect(system).toContain("MODE: agent.");
    expect(system).toContain("SERVICE: Uber.");
    expect(sent.slice(1).map((message) => message.content)).toEqual([
      "earlier",
      "reply",
      "Get me a ride",
    ]);
    expect(res._json).toMatchObject({
      memory_source: "short",
      mode_transitions: ["short_term"],
    });
  });

  it("rejects a request without user_id", async () => {
    const { controllers, responder } = build([]);

    await expect(
      controllers.chat(
        createMockRequest({ method: "POST", body: { message: "hi" } }),
        createMockResponse()
      )
    ).rejects.toBeInstanceOf(ValidationError);
    expect(responder.calls).toHaveLength(0);
  });

  it("rejects a blank message", async () => {
    const { controllers } = build([]);

    await expect(
      controllers.chat(
        createMockRequest({
          method: "POST",
          body: { message: "   ", user_id: "alice" },
        }),
        createMockResponse()
      )
    ).rejects.toThrow("Invalid request");
  });
});

describe("chat controller response contract", () => {
  it("reports a broken response as a generic 500 without schema details", async () => {
    const controller = createChatController({
      handleChat: async () => ({
        response: "ok",
        memoriesUsed: [makeFact({ confidence: Number.NaN })],
        storedFacts: [],
        factsExtracted: [],
        modeTransitions: ["long_term"],
        memorySource: "both",
        threadId: "alice",
        states: ["idle"],
      }),
    });
    const res = createMockResponse();

    const failure = await controller(
      createMockRequest({
        method: "POST",
        body: { message: "hi", user_id: "alice" },
      }),
      res
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(InfrastructureError);
    if (failure instanceof InfrastructureError) {
      expect(failure.message).toBe(GENERIC_ERROR_MESSAGE);
      expect(failure.statusCode).toBe(500);
      expect(failure.metadata).toBeUndefined();
    }
    expect(res._json).toBeNull();
  });
});

describe("memory controller", () => {
  async function seeded() {
    const built = build([]);
    await built.repository.putFact(makeFact({ id: "a1" }));
    await built.repository.putFact(
      makeFact({
        id: "a2",
        type: "person_name",
        value: "Alice",
        temporalStatus: "none",
      })
    );
    await built.repository.appendTurns("alice", [
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello" },
    ]);
    return built;
  }

  it("lists an owner's memories", async () => {
    const { controllers } = await seeded();
    const res = createMockResponse();

    await controllers.memory.listMemories(
      createMockRequest({ params: { userId: "alice" } }),
      res
    );

    expect(res._json).toMatchObject({
      user_id: "alice",
      total: 2,
      memories: [
        { id: "a1", data: "location: Oslo (current)" },
        {
          id: "a2",
          data: "person_name: Alice",
          metadata: { temporal_status: null },
        },
      ],
    });
  });

  it("deletes an owner's memories", async () => {
    const { controllers } = await seeded();
    const res = createMockResponse();

    await controllers.memory.deleteMemories(
      createMockRequest({ params: { userId: "alice" } }),
      res
    );

    expect(res._json).toEqual({
      user_id: "alice",
      deleted: 2,
      message: "Deleted 2 memories for user alice",
    });
  });

  it("inspects memories with a query", async () => {
    const { controllers } = await seeded();
    const res = createMockResponse();

    await controllers.memory.inspect(
      createMockRequest({ query: { user_id: "alice", query: "alice" } }),
      res
    );

    expect(res._json).toMatchObject({
      total: 1,
      memories: [{ text: "person_name: Alice" }],
    });
  });

  it("builds the memory bank", async () => {
    const { controllers } = await seeded();
    const res = createMockResponse();

    await controllers.memory.memoryBank(
      createMockRequest({ params: { userId: "alice" } }),
      res
    );

    // profile, knowledge_base and active_context have content
    expect(res._json).toMatchObject({ user_id: "alice", total_files: 3 });
  });

  it("lists users and the conversation", async () => {
    const { controllers } = await seeded();
    const users = createMockResponse();
    const conversation = createMockResponse();

    await controllers.memory.listUsers(createMockRequest({}), users);
    await controllers.memory.conversation(
      createMockRequest({ params: { userId: "alice" } }),
      conversation
    );

    expect(users._json).toEqual({ users: ["alice"] });
    expect(conversation._json).toMatchObject({
      user_id: "alice",
      total: 2,
      messages: [
        { role: "user", content: "hi", sequence: 1 },
        { role: "assistant", content: "hello", sequence: 2 },
      ],
    });
  });

  it("clears everything", async () => {
    const { controllers } = await seeded();
    const res = createMockResponse();

    await controllers.memory.clearAll(createMockRequest({}), res);

    expect(res._json).toEqual({
      message: "All memories and conversation history cleared",
      status: "success",
      facts_deleted: 2,
      turns_deleted: 2,
    });
  });
});

describe("system controller", () => {
  it("serves health, config and services", () => {
    const { controllers } = build([]);
    const health = createMockResponse();
    const config = createMockResponse();
    const services = createMockResponse();

    controllers.system.health(createMockRequest({}), health);
    controllers.system.getConfig(createMockRequest({}), config);
    controllers.system.listServices(createMockRequest({}), services);

    expect(health._json).toEqual({
      status: "ok",
      message: "Memory Chat API is running",
    });
    expect(config._json).toEqual({ short_term_message_limit: 10 });
    expect(services._json).toBe(serviceCatalog);
  });
});
