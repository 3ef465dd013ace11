/**
 * Mastra agent used for the user-facing reply of each chat turn.
 *
 * One agent per pooled credential, built on the @ai-sdk/openai provider. The
 * full prompt (system message, history, augmented user message) arrives from
 * the ContextComposer, so the agent's own instructions stay minimal.
 */
import { createOpenAI } from "@ai-sdk/openai";
import { Agent } from "@mastra/core/agent";

import {
  ModelCallError,
  type ChatModelPort,
  type LLMMessage,
  type ModelCredential,
} from "@domain/llm/ports";
import { toModelCallError } from "@infrastructure/llm/OpenAIAdapter";
import { logEvent } from "@infrastructure/logging/Logger";

const AGENT_INSTRUCTIONS = `
You are a conversational assistant with short-term and long-term memory.
Follow the system messages that come with each conversation; they describe
the user's stored memories and the service you are acting for.
`;

export interface AgentModelSettings {
  model: string;
  baseUrl?: string | undefined;
}

export class MastraAgentModel implements ChatModelPort {
  private readonly agents = new Map<string, Agent>();

  constructor(private readonly settings: AgentModelSettings) {}

  async invoke(
    messages: LLMMessage[],
    credential: ModelCredential
  ): Promise<string> {
    const agent = this.agentFor(credential);
    const startedAt = Date.now();

    try {
      const result = await agent.generate(
        messages as Parameters<(typeof agent)["generate"]>[0]
      );
      const text = result.text.trim();

      if (!text) {
        throw new ModelCallError("malformed", "Agent returned an empty reply");
      }

      logEvent("LLM_SUCCESS", {
        model: this.settings.model,
        purpose: "reply",
        credentialRef: credential.id,
        durationMs: Date.now() - startedAt,
        messageCount: messages.length,
      });

      return text;
    } catch (error: unknown) {
      const failure = toModelCallError(error);

      logEvent("LLM_FAILURE", {
        model: this.settings.model,
        purpose: "reply",
        credentialRef: credential.id,
        kind: failure.kind,
        durationMs: Date.now() - startedAt,
      });

      throw failure;
    }
  }

  private agentFor(credential: ModelCredential): Agent {
    const existing = this.agents.get(credential.id);
    if (existing) {
      return existing;
    }

    const provider = createOpenAI({
      apiKey: credential.secret,
      baseURL: this.settings.baseUrl,
    });

    const agent = new Agent({
      name: "memory-chat-agent",
      instructions: AGENT_INSTRUCTIONS,
      model: provider(this.settings.model),
    });

    this.agents.set(credential.id, agent);
    return agent;
  }
}
