import { describe, expect, it } from "vitest";
import {
  buildContainsAnyClause,
  escapeSqlString,
} from "../../src/infrastructure/store/sql";

describe("LanceDB filter helpers", () => {
  it("escapes single quotes", () => {
    expect(escapeSqlString("o'neil")).toBe("o''neil");
  });

  it("builds an OR of LIKE clauses from plain keywords only", () => {
    expect(
      buildContainsAnyClause("question_normalized", ["jepang", "o'neil", "100%", "jepang", "tokyo"]),
    ).toBe("question_normalized LIKE '%jepang%' OR question_normalized LIKE '%tokyo%'");
  });

  it("returns undefined when no keyword is usable", () => {
    expect(buildContainsAnyClause("question_normalized", [])).toBeUndefined();
    expect(buildContainsAnyClause("question_normalized", ["a_b", "%"])).toBeUndefined();
  });
});
