import { describe, expect, it } from "vitest";

import { ModelCallError } from "@domain/llm/ports";
import { toModelCallError } from "@infrastructure/llm/OpenAIAdapter";

function httpError(status: number, message: string, code?: string) {
  return Object.assign(new Error(message), { status, code });
}

describe("toModelCallError", () => {
  it("recognizes a 429 status", () => {
    const mapped = toModelCallError(
      httpError(429, "Rate limit reached. Please try again in 20s.")
    );

    expect(mapped.kind).toBe("rate_limited");
    expect(mapped.upstreamMessage).toBe(
      "Rate limit reached. Please try again in 20s."
    );
  });

  it("recognizes quota error codes", () => {
    expect(
      toModelCallError(httpError(403, "You exceeded your quota", "insufficient_quota"))
        .kind
    ).toBe("rate_limited");
  });

  it("looks through wrapped causes", () => {
    const wrapped = new Error("Failed after 3 attempts", {
      cause: httpError(429, "Too many requests"),
    });

    const mapped = toModelCallError(wrapped);

    expect(mapped.kind).toBe("rate_limited");
    expect(mapped.upstreamMessage).toBe("Too many requests");
  });

  it("follows lastError on retry wrappers", () => {
    const retry = Object.assign(new Error("RetryError"), {
      lastError: { statusCode: 429, message: "slow down" },
    });

    expect(toModelCallError(retry).kind).toBe("rate_limited");
  });

  it("classifies everything else as other", () => {
    const mapped = toModelCallError(httpError(500, "upstream exploded"));

    expect(mapped.kind).toBe("other");
    expect(mapped.upstreamMessage).toBe("upstream exploded");
    expect(toModelCallError("plain string").upstreamMessage).toBe(
      "plain string"
    );
  });

  it("passes ModelCallError through", () => {
    const original = new ModelCallError("malformed", "empty reply");

    expect(toModelCallError(original)).toBe(original);
  });
});
