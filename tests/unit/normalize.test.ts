import { describe, expect, it } from "vitest";
import {
  compactQuestion,
  normalizeQuestion,
  splitWords,
} from "../../src/infrastructure/text/normalize";

describe("normalizeQuestion", () => {
  it("lowercases, strips punctuation and collapses whitespace", () => {
    expect(normalizeQuestion("Hello,  World!")).toBe("hello world");
  });

  it("treats case, punctuation and spacing variants alike", () => {
    expect(normalizeQuestion("Siapa presiden pertama Indonesia?")).toBe(
      "siapa presiden pertama indonesia",
    );
    expect(normalizeQuestion("siapa PRESIDEN pertama   indonesia?")).toBe(
      "siapa presiden pertama indonesia",
    );
  });

  it("folds compatibility characters and drops combining marks", () => {
    expect(normalizeQuestion("Ｈｅｌｌｏ")).toBe("hello");
    expect(normalizeQuestion("ﬁne")).toBe("fine");
    expect(normalizeQuestion("Déjà, vu!!")).toBe("deja vu");
  });

  it("turns underscores and symbols into separators", () => {
    expect(normalizeQuestion("snake_case_name")).toBe("snake case name");
    expect(normalizeQuestion("2+2=4?")).toBe("2 2 4");
    expect(normalizeQuestion("  tabs\tand\nnewlines ")).toBe("tabs and newlines");
  });

  it("returns an empty string for punctuation-only input", () => {
    expect(normalizeQuestion("?!...")).toBe("");
    expect(normalizeQuestion("")).toBe("");
  });

  it("is idempotent", () => {
    const samples = [
      "Hello,  World!",
      "Ｈｅｌｌｏ ＷＯＲＬＤ",
      "Déjà, vu!!",
      "İstanbul",
      "ℌilbert — space",
      "snake_case_name",
      "Ibukota Jepang adalah apa?",
    ];
    for (const s of samples) {
      const once = normalizeQuestion(s);
      expect(normalizeQuestion(once)).toBe(once);
    }
  });
});

describe("compactQuestion", () => {
  it("removes all whitespace and underscores", () => {
    expect(compactQuestion("ibu kota jepang")).toBe("ibukotajepang");
    expect(compactQuestion("a_b c")).toBe("abc");
  });
});

describe("splitWords", () => {
  it("splits normalized text and ignores empty input", () => {
    expect(splitWords("apa ibukota jepang")).toEqual(["apa", "ibukota", "jepang"]);
    expect(splitWords("")).toEqual([]);
  });
});
