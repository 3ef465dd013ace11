/**
 * Domain port for language-model calls.
 *
 * The pipeline treats the model as an opaque function: role-tagged messages in,
 * text out. Adapters translate provider failures into `ModelCallError` so the
 * orchestrator can tell a rate limit (rotate credentials) from anything else
 * (fail the turn) without knowing which SDK produced it.
 */
export type LLMRole = "system" | "user" | "assistant";

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

/**
 * One entry of the credential pool. `id` is an opaque reference that is safe
 * to show to clients; `secret` never leaves the adapters.
 */
export interface ModelCredential {
  id: string;
  secret: string;
}

export type ModelErrorKind = "rate_limited" | "malformed" | "other";

export class ModelCallError extends Error {
  public readonly kind: ModelErrorKind;
  public readonly upstreamMessage: string;

  constructor(kind: ModelErrorKind, upstreamMessage: string) {
    super(`Model call failed (${kind})`);
    this.name = "ModelCallError";
    this.kind = kind;
    this.upstreamMessage = upstreamMessage;
  }
}

export function isRateLimited(error: unknown): error is ModelCallError {
  return error instanceof ModelCallError && error.kind === "rate_limited";
}

export interface ChatModelPort {
  invoke(messages: LLMMessage[], credential: ModelCredential): Promise<string>;
}
