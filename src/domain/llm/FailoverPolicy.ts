/**
 * Sequential credential failover for upstream rate limits.
 *
 * The pool is fixed at startup and walked strictly forward: a credential that
 * reported a rate limit is skipped and never re-admitted for the lifetime of
 * the process. One instance is shared by every request; the cursor is a
 * single-writer value because the event loop runs one continuation at a time.
 */
import crypto from "crypto";

import {
  isRateLimited,
  type ModelCallError,
  type ModelCredential,
} from "@domain/llm/ports";
import { logEvent } from "@infrastructure/logging/Logger";

export type FailoverDecision =
  | { kind: "next"; index: number }
  | { kind: "exhausted" };

export const DEFAULT_RETRY_HINT =
  "Rate limit reached on all configured credentials. Please try again later.";

// Up to three "<digits><unit>" groups after a wait phrase: "20s", "1m30s", "500ms".
const WAIT_TIME_PATTERN =
  /\b(?:try again in|retry after|wait)\s+((?:\d{1,5}(?:\.\d{1,3})?\s?(?:ms|h|hours?|m|mins?|minutes?|s|secs?|seconds?)){1,3})\b/i;

export function nextCredential(
  currentIndex: number,
  poolSize: number
): FailoverDecision {
  if (currentIndex + 1 >= poolSize) {
    return { kind: "exhausted" };
  }

  return { kind: "next", index: currentIndex + 1 };
}

export function extractRetryHint(upstreamMessage: string): string {
  const match = WAIT_TIME_PATTERN.exec(upstreamMessage);
  const wait = match?.[1]?.trim();

  return wait ? `Please try again in ${wait}.` : DEFAULT_RETRY_HINT;
}

export function maskCredential(secret: string): string {
  if (secret.length <= 8) {
    return "****";
  }

  return `${secret.slice(0, 4)}...${secret.slice(-4)}`;
}

export function credentialRef(secret: string): string {
  return crypto.createHash("sha256").update(secret).digest("hex").slice(0, 8);
}

export function createCredentialPool(
  secrets: readonly string[]
): ModelCredential[] {
  return secrets.map((secret) => ({ id: credentialRef(secret), secret }));
}

export class CredentialsExhaustedError extends Error {
  public readonly retryHint: string;
  public readonly credentialRef: string;

  constructor(retryHint: string, ref: string) {
    super("All model credentials are rate limited");
    this.name = "CredentialsExhaustedError";
    this.retryHint = retryHint;
    this.credentialRef = ref;
  }
}

export interface FailoverHooks {
  /** Called once per rotation, before the next credential is tried. */
  onRotate?(fromIndex: number, toIndex: number): void;
}

export class FailoverPolicy {
  private readonly pool: readonly ModelCredential[];
  private cursor = 0;

  constructor(pool: readonly ModelCredential[]) {
    if (!pool.length) {
      throw new Error("FailoverPolicy needs at least one credential");
    }

    this.pool = pool;
  }

  get currentIndex(): number {
    return this.cursor;
  }

  get poolSize(): number {
    return this.pool.length;
  }

  active(): ModelCredential {
    const credential = this.pool[this.cursor];
    if (!credential) {
      throw new Error(`No credential at index ${this.cursor}`);
    }

    return credential;
  }

  advance(): FailoverDecision {
    const decision = nextCredential(this.cursor, this.pool.length);

    if (decision.kind === "next") {
      this.cursor = decision.index;
    }

    return decision;
  }

  /**
   * Runs `operation` under the active credential, rotating forward on rate
   * limits. Other errors propagate untouched. The cursor only advances past
   * the credential this call actually used, so concurrent calls failing on
   * the same key move it once.
   */
  async run<T>(
    operation: (credential: ModelCredential) => Promise<T>,
    hooks: FailoverHooks = {}
  ): Promise<T> {
    for (;;) {
      const index = this.cursor;
      const credential = this.active();

      try {
        return await operation(credential);
      } catch (error: unknown) {
        if (!isRateLimited(error)) {
          throw error;
        }

        this.onRateLimited(index, credential, error);

        // Another request already moved past this credential while we waited.
        if (this.cursor !== index) {
          hooks.onRotate?.(index, this.cursor);
          continue;
        }

        const decision = this.advance();

        if (decision.kind === "exhausted") {
          const retryHint = extractRetryHint(error.upstreamMessage);

          logEvent("CREDENTIALS_EXHAUSTED", {
            poolSize: this.pool.length,
            credential: maskCredential(credential.secret),
            retryHint,
          });

          throw new CredentialsExhaustedError(retryHint, credential.id);
        }

        hooks.onRotate?.(index, decision.index);
      }
    }
  }

  private onRateLimited(
    index: number,
    credential: ModelCredential,
    error: ModelCallError
  ): void {
    logEvent("CREDENTIAL_RATE_LIMITED", {
      index,
      poolSize: this.pool.length,
      credential: maskCredential(credential.secret),
      upstreamLength: error.upstreamMessage.length,
    });
  }
}
