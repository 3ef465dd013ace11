/**
 * Memory HTTP controllers: long-term fact administration and the short-term
 * conversation view.
 *
 * Each handler validates its path/query input, calls the MemoryUseCase and
 * returns the JSON shape the chat UI reads.
 */
import type { MemoryUseCase } from "@app/memory/MemoryUseCase";
import {
  InspectQuerySchema,
  serializeFact,
  serializeTurn,
  UserIdParamsSchema,
} from "@interfaces/http/memory/schema";
import { ValidationError } from "@middleware/errorHandler";

import type { Request, Response } from "express";

function parseUserId(req: Request): string {
  const parsed = UserIdParamsSchema.safeParse(req.params);

  if (!parsed.success) {
    throw new ValidationError("Invalid user id", {
      issues: parsed.error.issues,
    });
  }

  return parsed.data.userId;
}

export function createMemoryController(memory: MemoryUseCase) {
  async function listMemories(req: Request, res: Response): Promise<void> {
    const userId = parseUserId(req);
    const facts = await memory.listFacts(userId);

    res.json({
      user_id: userId,
      total: facts.length,
      memories: facts.map((fact) => ({
        id: fact.id,
        data: fact.label,
        metadata: serializeFact(fact),
      })),
    });
  }

  async function deleteMemories(req: Request, res: Response): Promise<void> {
    const userId = parseUserId(req);
    const deleted = await memory.deleteFacts(userId);

    res.json({
      user_id: userId,
      deleted,
      message: `Deleted ${deleted} memories for user ${userId}`,
    });
  }

  async function clearAll(_req: Request, res: Response): Promise<void> {
    const summary = await memory.clearAll();

    res.json({
      message: "All memories and conversation history cleared",
      status: "success",
      facts_deleted: summary.factsDeleted,
      turns_deleted: summary.turnsDeleted,
    });
  }

  async function inspect(req: Request, res: Response): Promise<void> {
    const parsed = InspectQuerySchema.safeParse(req.query);

    if (!parsed.success) {
      throw new ValidationError("Invalid query", {
        issues: parsed.error.issues,
      });
    }

    const facts = await memory.inspectFacts(
      parsed.data.user_id,
      parsed.data.query
    );

    res.json({
      total: facts.length,
      memories: facts.map((fact) => ({
        text: fact.label,
        metadata: serializeFact(fact),
      })),
    });
  }

  async function memoryBank(req: Request, res: Response): Promise<void> {
    const userId = parseUserId(req);
    const files = await memory.memoryBank(userId);

    res.json({
      user_id: userId,
      total_files: Object.values(files).filter(Boolean).length,
      files,
    });
  }

  async function listUsers(_req: Request, res: Response): Promise<void> {
    res.json({ users: await memory.listUsers() });
  }

  async function conversation(req: Request, res: Response): Promise<void> {
    const userId = parseUserId(req);
    const view = await memory.conversation(userId);

    res.json({
      user_id: userId,
      total: view.total,
      messages: view.turns.map(serializeTurn),
    });
  }

  return {
    listMemories,
    deleteMemories,
    clearAll,
    inspect,
    memoryBank,
    listUsers,
    conversation,
  };
}

export type MemoryController = ReturnType<typeof createMemoryController>;
