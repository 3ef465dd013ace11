import { describe, expect, it } from "vitest";

import {
  deriveThreadId,
  includesLongTerm,
  includesShortTerm,
  normalizeMemorySource,
} from "@domain/memory/memoryMode";

describe("normalizeMemorySource", () => {
  it("keeps the three known modes", () => {
    expect(normalizeMemorySource("short")).toBe("short");
    expect(normalizeMemorySource("long")).toBe("long");
    expect(normalizeMemorySource("both")).toBe("both");
  });

  it.each([undefined, null, "", "SHORT", "all", 3, {}])(
    "falls back to both for %s",
    (value) => {
      expect(normalizeMemorySource(value)).toBe("both");
    }
  );
});

describe("tiers per mode", () => {
  it("maps modes onto the tiers they read", () => {
    expect([includesShortTerm("short"), includesLongTerm("short")]).toEqual([
      true,
      false,
    ]);
    expect([includesShortTerm("long"), includesLongTerm("long")]).toEqual([
      false,
      true,
    ]);
    expect([includesShortTerm("both"), includesLongTerm("both")]).toEqual([
      true,
      true,
    ]);
  });
});

describe("deriveThreadId", () => {
  it("shares one thread between short and both", () => {
    expect(deriveThreadId("alice", "short")).toBe("alice");
    expect(deriveThreadId("alice", "both")).toBe("alice");
  });

  it("isolates long-only turns", () => {
    expect(deriveThreadId("alice", "long")).toBe("alice_long_only");
  });
});
