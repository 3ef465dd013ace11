import { describe, expect, it } from "vitest";

import { factNamespace } from "@domain/memory/types";
import {
  InMemoryMemoryRepository,
  matchesQuery,
} from "@infrastructure/database/InMemoryMemoryRepository";

import { makeFact } from "../../../__tests__/fixtures";

describe("InMemoryMemoryRepository", () => {
  it("returns what was stored", async () => {
    const repository = new InMemoryMemoryRepository();
    const fact = makeFact({ referenceSentence: "I live in Oslo" });

    await repository.putFact(fact);

    expect(await repository.getFact(factNamespace("alice"), "fact-1")).toEqual(
      fact
    );
    expect(await repository.getFact(factNamespace("bob"), "fact-1")).toBeNull();
  });

  it("hands out copies", async () => {
    const repository = new InMemoryMemoryRepository();
    await repository.putFact(makeFact());

    const [first] = await repository.searchFacts(factNamespace("alice"));
    if (first) {
      first.value = "changed";
    }

    const [again] = await repository.searchFacts(factNamespace("alice"));
    expect(again?.value).toBe("Oslo");
  });

  it("keeps conflicting facts side by side in insertion order", async () => {
    const repository = new InMemoryMemoryRepository();
    await repository.putFact(
      makeFact({ id: "1", value: "Lisbon", createdAt: new Date(1000) })
    );
    await repository.putFact(
      makeFact({ id: "2", value: "Oslo", createdAt: new Date(2000) })
    );

    const facts = await repository.searchFacts(factNamespace("alice"));

    expect(facts.map((fact) => fact.value)).toEqual(["Lisbon", "Oslo"]);
  });

  it("deletes single facts and whole namespaces", async () => {
    const repository = new InMemoryMemoryRepository();
    await repository.putFact(makeFact({ id: "1" }));
    await repository.putFact(makeFact({ id: "2" }));
    await repository.putFact(makeFact({ id: "3" }));

    expect(await repository.deleteFact(factNamespace("alice"), "1")).toBe(true);
    expect(await repository.deleteFact(factNamespace("alice"), "1")).toBe(false);
    expect(await repository.deleteNamespace(factNamespace("alice"))).toBe(2);
    expect(await repository.deleteNamespace(factNamespace("alice"))).toBe(0);
  });

  it("numbers turns per thread and returns the newest oldest-first", async () => {
    const repository = new InMemoryMemoryRepository();

    await repository.appendTurns("alice", [
      { role: "user", content: "a" },
      { role: "assistant", content: "b" },
    ]);
    const appended = await repository.appendTurns("alice", [
      { role: "user", content: "c" },
    ]);
    await repository.appendTurns("bob", [{ role: "user", content: "x" }]);

    expect(appended[0]?.sequence).toBe(3);
    expect(
      (await repository.getRecentTurns("alice", 2)).map((turn) => turn.content)
    ).toEqual(["b", "c"]);
    expect(await repository.getRecentTurns("alice", 0)).toEqual([]);
    expect(await repository.countTurns("alice")).toBe(3);
    expect(await repository.countTurns("bob")).toBe(1);
  });
});

describe("matchesQuery", () => {
  it("matches value or label case-insensitively", () => {
    const fact = makeFact({ value: "Oslo" });

    expect(matchesQuery(fact, "oslo")).toBe(true);
    expect(matchesQuery(fact, "LOCATION")).toBe(true);
    expect(matchesQuery(fact, "rome")).toBe(false);
    expect(matchesQuery(fact, "  ")).toBe(true);
    expect(matchesQuery(fact, undefined)).toBe(true);
  });
});
