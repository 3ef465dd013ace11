/**
 * Lifecycle of a single chat turn.
 *
 * idle → composing_context → invoking_model → (retrying ↺ invoking_model)
 *      → [extracting_memory] → committing → done
 * with invoking_model / retrying → failed as the terminal error path.
 */
export type TurnState =
  | "idle"
  | "composing_context"
  | "invoking_model"
  | "retrying"
  | "extracting_memory"
  | "committing"
  | "done"
  | "failed";

const TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
  idle: ["composing_context"],
  composing_context: ["invoking_model", "failed"],
  invoking_model: ["retrying", "extracting_memory", "committing", "failed"],
  retrying: ["invoking_model", "failed"],
  extracting_memory: ["committing"],
  committing: ["done", "failed"],
  done: [],
  failed: [],
};

export function canTransition(from: TurnState, to: TurnState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class TurnTracker {
  private current: TurnState = "idle";
  private readonly trail: TurnState[] = ["idle"];

  get state(): TurnState {
    return this.current;
  }

  get history(): readonly TurnState[] {
    return this.trail;
  }

  moveTo(next: TurnState): void {
    if (!canTransition(this.current, next)) {
      throw new Error(`Illegal turn transition ${this.current} -> ${next}`);
    }

    this.current = next;
    this.trail.push(next);
  }

  /** Moves to `failed` unless the turn already ended. */
  fail(): void {
    if (this.current !== "done" && this.current !== "failed") {
      this.current = "failed";
      this.trail.push("failed");
    }
  }
}
