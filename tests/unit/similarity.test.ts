import { describe, expect, it } from "vitest";
import {
  DEFAULT_SIMILARITY_WEIGHTS,
  jaccard,
  sequenceRatio,
  similarity,
} from "../../src/infrastructure/text/similarity";

describe("sequenceRatio", () => {
  it("measures longest matching blocks", () => {
    expect(sequenceRatio("abcd", "bcde")).toBeCloseTo(0.75, 10);
    expect(sequenceRatio("abc", "xyz")).toBe(0);
    expect(sequenceRatio("", "")).toBe(1);
  });

  it("is symmetric", () => {
    expect(sequenceRatio("apa ibukota jepang", "ibukota jepang adalah apa")).toBe(
      sequenceRatio("ibukota jepang adalah apa", "apa ibukota jepang"),
    );
    expect(sequenceRatio("abxcd", "abcd")).toBe(sequenceRatio("abcd", "abxcd"));
  });
});

describe("jaccard", () => {
  it("divides intersection by union", () => {
    expect(jaccard(new Set(["a", "b"]), new Set(["b", "c"]))).toBeCloseTo(1 / 3, 10);
    expect(jaccard(new Set(), new Set())).toBe(0);
  });
});

describe("similarity", () => {
  it("scores identical strings as 1", () => {
    for (const s of ["ibukota jepang", "the the", "x", ""]) {
      expect(similarity(s, s)).toBe(1);
    }
  });

  it("is symmetric", () => {
    const pairs: Array<[string, string]> = [
      ["apa ibukota jepang", "ibukota jepang adalah apa"],
      ["rumah di jakarta", "kantor di jakarta"],
      ["kucing hitam melompat pagar tinggi", "kucing busuk susu duduk kukus"],
      ["ibukota prancis", "ibukota jepang adalah apa"],
    ];
    for (const [a, b] of pairs) {
      expect(similarity(a, b)).toBe(similarity(b, a));
    }
  });

  it("is 0 when either side has no keywords", () => {
    expect(similarity("apa itu", "ibukota jepang")).toBe(0);
    expect(similarity("ibukota jepang", "yang mana")).toBe(0);
    expect(similarity("the the", "the")).toBe(0);
  });

  it("blends sequence, overlap and length ratios", () => {
    // seq = 28/43, jaccard = 1, words 3 vs 4
    const expected = 0.2 * (28 / 43) + 0.6 * 1 + 0.2 * 0.75;
    expect(similarity("apa ibukota jepang", "ibukota jepang adalah apa")).toBeCloseTo(
      expected,
      10,
    );
  });

  it("keeps a one-of-five keyword overlap below 0.4", () => {
    const score = similarity(
      "kucing hitam melompat pagar tinggi",
      "kucing busuk susu duduk kukus",
    );
    expect(score).toBeCloseTo(0.2 * (20 / 63) + 0.6 / 9 + 0.2, 10);
    expect(score).toBeLessThan(0.4);
  });

  it("adds a bonus per shared important word", () => {
    const withBonus = similarity("rumah di jakarta", "kantor di jakarta");
    const without = similarity("rumah di jakarta", "kantor di jakarta", {
      ...DEFAULT_SIMILARITY_WEIGHTS,
      importantWordBonus: 0,
    });
    expect(withBonus - without).toBeCloseTo(0.05, 10);
    expect(withBonus).toBeCloseTo(0.2 * (24 / 33) + 0.6 * 0.5 + 0.2 + 0.05, 10);
  });

  it("caps the score at 1", () => {
    const score = similarity("rumah di jakarta", "kantor di jakarta", {
      sequenceWeight: 1,
      overlapWeight: 1,
      lengthWeight: 1,
      importantWordBonus: 1,
    });
    expect(score).toBe(1);
  });
});
