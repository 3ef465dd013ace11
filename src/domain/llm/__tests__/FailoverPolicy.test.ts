import { describe, expect, it, vi } from "vitest";

import {
  createCredentialPool,
  credentialRef,
  CredentialsExhaustedError,
  DEFAULT_RETRY_HINT,
  extractRetryHint,
  FailoverPolicy,
  maskCredential,
  nextCredential,
} from "@domain/llm/FailoverPolicy";
import { ModelCallError, type ModelCredential } from "@domain/llm/ports";

import { rateLimited } from "../../../__tests__/fixtures";

const POOL = createCredentialPool([
  "test-key-one-0000",
  "test-key-two-0000",
  "test-key-three-00",
]);

describe("nextCredential", () => {
  it("moves forward until the pool is used up", () => {
    expect(nextCredential(0, 3)).toEqual({ kind: "next", index: 1 });
    expect(nextCredential(1, 3)).toEqual({ kind: "next", index: 2 });
    expect(nextCredential(2, 3)).toEqual({ kind: "exhausted" });
    expect(nextCredential(0, 1)).toEqual({ kind: "exhausted" });
  });
});

describe("extractRetryHint", () => {
  it("pulls the wait time out of the upstream message", () => {
    expect(
      extractRetryHint(
        "Rate limit reached for gpt-4o-mini on tokens per min. Please try again in 20s. Visit the docs."
      )
    ).toBe("Please try again in 20s.");
  });

  it("keeps compound durations", () => {
    expect(extractRetryHint("Please try again in 1m30s.")).toBe(
      "Please try again in 1m30s."
    );
    expect(extractRetryHint("retry after 500ms")).toBe(
      "Please try again in 500ms."
    );
  });

  it("falls back to the generic hint", () => {
    expect(extractRetryHint("Too many requests")).toBe(DEFAULT_RETRY_HINT);
    expect(extractRetryHint("")).toBe(DEFAULT_RETRY_HINT);
  });
});

describe("credential helpers", () => {
  it("masks all but the edges of a secret", () => {
    expect(maskCredential("test-secret-value")).toBe("test...alue");
    expect(maskCredential("short")).toBe("****");
  });

  it("derives a stable eight-character reference", () => {
    const ref = credentialRef("test-secret");

    expect(ref).toMatch(/^[0-9a-f]{8}$/);
    expect(credentialRef("test-secret")).toBe(ref);
    expect(credentialRef("other-secret")).not.toBe(ref);
  });

  it("never puts the secret in the id", () => {
    for (const credential of POOL) {
      expect(credential.id).not.toContain(credential.secret);
    }
  });
});

describe("FailoverPolicy", () => {
  it("refuses an empty pool", () => {
    expect(() => new FailoverPolicy([])).toThrow(
      "FailoverPolicy needs at least one credential"
    );
  });

  it("returns the first success without rotating", async () => {
    const policy = new FailoverPolicy(POOL);
    const onRotate = vi.fn();

    const result = await policy.run(async () => "ok", { onRotate });

    expect(result).toBe("ok");
    expect(policy.currentIndex).toBe(0);
    expect(onRotate).not.toHaveBeenCalled();
  });

  it("rotates past a rate-limited credential and stays there", async () => {
    const policy = new FailoverPolicy(POOL);
    const onRotate = vi.fn();
    const used: string[] = [];

    const result = await policy.run(
      async (credential: ModelCredential) => {
        used.push(credential.secret);
        if (used.length === 1) {
          throw rateLimited();
        }
        return "second";
      },
      { onRotate }
    );

    expect(result).toBe("second");
    expect(used).toEqual(["test-key-one-0000", "test-key-two-0000"]);
    expect(onRotate).toHaveBeenCalledWith(0, 1);
    expect(policy.currentIndex).toBe(1);

    await policy.run(async (credential) => {
      used.push(credential.secret);
      return "again";
    });

    expect(used[2]).toBe("test-key-two-0000");
  });

  it("raises CredentialsExhaustedError once every credential is limited", async () => {
    const policy = new FailoverPolicy(POOL);
    let attempts = 0;

    const failure = await policy
      .run(async () => {
        attempts += 1;
        throw rateLimited("Please try again in 45s.");
      })
      .catch((error: unknown) => error);

    expect(attempts).toBe(3);
    expect(failure).toBeInstanceOf(CredentialsExhaustedError);
    if (failure instanceof CredentialsExhaustedError) {
      expect(failure.retryHint).toBe("Please try again in 45s.");
      expect(failure.credentialRef).toBe(POOL[2]?.id);
    }

    // An exhausted pool stays on its last credential.
    expect(policy.currentIndex).toBe(2);
  });

  it("lets concurrent calls that fail on the same key share one rotation", async () => {
    const policy = new FailoverPolicy(
      createCredentialPool(["test-key-a", "test-key-b"])
    );
    const tried: string[][] = [[], []];

    const attempt = (slot: number) =>
      policy.run(async (credential) => {
        tried[slot]?.push(credential.secret);
        await Promise.resolve();
        if (credential.secret === "test-key-a") {
          throw rateLimited();
        }
        return "ok";
      });

    const results = await Promise.all([attempt(0), attempt(1)]);

    expect(results).toEqual(["ok", "ok"]);
    expect(tried).toEqual([
      ["test-key-a", "test-key-b"],
      ["test-key-a", "test-key-b"],
    ]);
    expect(policy.currentIndex).toBe(1);
  });

  it("passes other errors through without rotating", async () => {
    const policy = new FailoverPolicy(POOL);
    const boom = new ModelCallError("other", "connection reset");

    await expect(
      policy.run(async () => {
        throw boom;
      })
    ).rejects.toBe(boom);
    expect(policy.currentIndex).toBe(0);
  });
});
