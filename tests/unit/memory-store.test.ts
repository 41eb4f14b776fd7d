import { describe, expect, it } from "vitest";
import { InMemoryQaStore } from "../../src/infrastructure/store/memory";
import type { QaRecord } from "../../src/domain/qa/record";

function record(id: string, questionNormalized: string): QaRecord {
  return {
    id,
    question: questionNormalized,
    questionNormalized,
    answer: `answer ${id}`,
    source: "test",
    createdAtMs: 0,
  };
}

describe("InMemoryQaStore", () => {
  it("returns substring matches in insertion order up to the limit", async () => {
    const store = new InMemoryQaStore({
      records: [
        record("1", "ibukota jepang"),
        record("2", "presiden pertama"),
        record("3", "bahasa jepang"),
        record("4", "gunung tertinggi jepang"),
      ],
    });
    const found = await store.queryContainingAny(["jepang", "presiden"], 3);
    expect(found.map((r) => r.id)).toEqual(["1", "2", "3"]);
    expect(await store.queryContainingAny([], 3)).toEqual([]);
  });

  it("keeps the first of two records with the same normalized question", async () => {
    const store = new InMemoryQaStore({ records: [record("1", "ibukota jepang")] });
    expect(await store.insertIfAbsent(record("2", "ibukota jepang"))).toBe(false);
    expect((await store.queryExact("ibukota jepang"))?.id).toBe("1");
    expect(await store.queryExact("ibukota prancis")).toBeUndefined();
  });
});
