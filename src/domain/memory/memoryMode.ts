/**
 * Memory-source selection for a chat turn.
 *
 * Any value outside the closed set silently becomes "both"; clients rely on
 * that default, so it is part of the contract rather than an accident.
 */
export const MEMORY_MODES = ["short", "long", "both"] as const;

export type MemoryMode = (typeof MEMORY_MODES)[number];

export const DEFAULT_MEMORY_MODE: MemoryMode = "both";

const LONG_ONLY_SUFFIX = "_long_only";

function isMemoryMode(value: unknown): value is MemoryMode {
  return (
    typeof value === "string" &&
    (MEMORY_MODES as readonly string[]).includes(value)
  );
}

export function normalizeMemorySource(value: unknown): MemoryMode {
  return isMemoryMode(value) ? value : DEFAULT_MEMORY_MODE;
}

export function includesShortTerm(mode: MemoryMode): boolean {
  return mode === "short" || mode === "both";
}

export function includesLongTerm(mode: MemoryMode): boolean {
  return mode === "long" || mode === "both";
}

/**
 * Thread identity for the turn log.
 *
 * Long-only turns get their own thread so a fact-only request never resumes
 * the conversation accumulated by short/both turns for the same owner.
 */
export function deriveThreadId(ownerId: string, mode: MemoryMode): string {
  return includesShortTerm(mode) ? ownerId : `${ownerId}${LONG_ONLY_SUFFIX}`;
}
