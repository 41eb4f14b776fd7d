import { describe, expect, it } from "vitest";
import { parseQaText } from "../../src/infrastructure/text/qa-parse";

describe("parseQaText", () => {
  it("reads prefixed questions and answers with continuation lines", () => {
    const text = [
      "Q: Siapa penemu telepon?",
      "A: Alexander",
      "Graham Bell",
      "",
      "q. Ibukota Jepang?",
      "jawaban: Tokyo",
    ].join("\n");
    expect(parseQaText(text)).toEqual([
      { question: "Siapa penemu telepon?", answer: "Alexander Graham Bell" },
      { question: "Ibukota Jepang?", answer: "Tokyo" },
    ]);
  });

  it("reads Indonesian labels and multi-line questions", () => {
    const text = "Pertanyaan: Sebutkan\nibukota Jepang\r\nJawab: Tokyo";
    expect(parseQaText(text)).toEqual([
      { question: "Sebutkan ibukota Jepang", answer: "Tokyo" },
    ]);
  });

  it("reads pipe-separated lines", () => {
    const text = "Ibukota Jepang | Tokyo\nno separator here\n| missing question";
    expect(parseQaText(text)).toEqual([{ question: "Ibukota Jepang", answer: "Tokyo" }]);
  });

  it("drops questions without an answer", () => {
    const text = "Q: Hanya pertanyaan\nQ: Lain?\nA: Ya";
    expect(parseQaText(text)).toEqual([{ question: "Lain?", answer: "Ya" }]);
  });

  it("returns nothing for empty text", () => {
    expect(parseQaText("")).toEqual([]);
  });
});
