/**
 * Composition root: builds the repository, model adapters, failover policy,
 * use-cases and controllers from the loaded configuration.
 */
import { createChatUseCase, type ChatUseCase } from "@app/chat/ChatUseCase";
import {
  createMemoryUseCase,
  type MemoryUseCase,
} from "@app/memory/MemoryUseCase";
import type { AppConfig } from "@config/index";
import { serviceCatalog } from "@config/serviceCatalog";
import {
  createCredentialPool,
  FailoverPolicy,
} from "@domain/llm/FailoverPolicy";
import type { ChatModelPort } from "@domain/llm/ports";
import { ContextComposer } from "@domain/memory/ContextComposer";
import { EntityExtractor } from "@domain/memory/EntityExtractor";
import type { MemoryRepository } from "@domain/memory/ports";
import { getSqlClient } from "@infrastructure/database/db";
import { InMemoryMemoryRepository } from "@infrastructure/database/InMemoryMemoryRepository";
import { PostgresMemoryRepository } from "@infrastructure/database/PostgresMemoryRepository";
import { MastraAgentModel } from "@infrastructure/llm/MastraAgentModel";
import { OpenAICompletionModel } from "@infrastructure/llm/OpenAIAdapter";
import {
  createChatController,
  type ChatController,
} from "@interfaces/http/ChatController";
import {
  createMemoryController,
  type MemoryController,
} from "@interfaces/http/MemoryController";
import {
  createSystemController,
  type SystemController,
} from "@interfaces/http/SystemController";

export interface Controllers {
  chat: ChatController;
  memory: MemoryController;
  system: SystemController;
}

export interface Container {
  repository: MemoryRepository;
  failover: FailoverPolicy;
  chatUseCase: ChatUseCase;
  memoryUseCase: MemoryUseCase;
  controllers: Controllers;
}

/** Test seams; anything left out is built from config. */
export interface ContainerOverrides {
  repository?: MemoryRepository;
  responder?: ChatModelPort;
  extractionModel?: ChatModelPort;
}

export function createRepository(appConfig: AppConfig): MemoryRepository {
  return appConfig.memory.backend === "memory"
    ? new InMemoryMemoryRepository()
    : new PostgresMemoryRepository(getSqlClient());
}

export function createContainer(
  appConfig: AppConfig,
  overrides: ContainerOverrides = {}
): Container {
  const { openai, memory } = appConfig;

  const repository = overrides.repository ?? createRepository(appConfig);
  const failover = new FailoverPolicy(createCredentialPool(openai.keys));

  const responder =
    overrides.responder ??
    new MastraAgentModel({ model: openai.model, baseUrl: openai.baseUrl });

  const extractionModel =
    overrides.extractionModel ??
    new OpenAICompletionModel({
      model: openai.extractionModel,
      temperature: openai.extractionTemperature,
      baseUrl: openai.baseUrl,
      timeoutMs: openai.timeoutMs,
      jsonMode: true,
    });

  const composer = new ContextComposer(repository, {
    shortTermLimit: memory.shortTermMessageLimit,
  });

  const extractor = new EntityExtractor(
    extractionModel,
    () => failover.active(),
    { contextTurns: memory.extractionContextTurns }
  );

  const chatUseCase = createChatUseCase({
    repository,
    composer,
    extractor,
    responder,
    failover,
    settings: {
      shortTermLimit: memory.shortTermMessageLimit,
      extractionContextTurns: memory.extractionContextTurns,
      minFactConfidence: memory.minFactConfidence,
    },
  });

  const memoryUseCase = createMemoryUseCase(repository, {
    shortTermLimit: memory.shortTermMessageLimit,
  });

  return {
    repository,
    failover,
    chatUseCase,
    memoryUseCase,
    controllers: {
      chat: createChatController(chatUseCase),
      memory: createMemoryController(memoryUseCase),
      system: createSystemController({
        shortTermLimit: memory.shortTermMessageLimit,
        catalog: serviceCatalog,
      }),
    },
  };
}
