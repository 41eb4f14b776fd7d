export type QaPair = {
  question: string;
  answer: string;
};

const QUESTION_PREFIX = /^(?:q|pertanyaan|soal|question)\s*[:.)-]\s*/i;
const ANSWER_PREFIX = /^(?:a|jawaban|jawab|answer)\s*[:.)-]\s*/i;

/**
 * Extracts question/answer pairs from free text such as OCR output.
 *
 * Recognised forms:
 * - a `Q:` / `Pertanyaan:` / `Soal:` line opening a question and an
 *   `A:` / `Jawaban:` / `Jawab:` line opening its answer; following lines
 *   continue whichever is open
 * - a single `question | answer` line
 *
 * Pairs with an empty question or answer are dropped.
 */
export function parseQaText(text: string): QaPair[] {
  const pairs: QaPair[] = [];
  let question: string[] = [];
  let answer: string[] = [];
  let mode: "none" | "question" | "answer" = "none";

  const flush = () => {
    const q = question.join(" ").trim();
    const a = answer.join(" ").trim();
    if (q && a) pairs.push({ question: q, answer: a });
    question = [];
    answer = [];
    mode = "none";
  };

  for (const rawLine of text.replace(/\r\n/g, "\n").split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    if (QUESTION_PREFIX.test(line)) {
      flush();
      question.push(line.replace(QUESTION_PREFIX, ""));
      mode = "question";
      continue;
    }
    if (ANSWER_PREFIX.test(line) && mode !== "none") {
      answer.push(line.replace(ANSWER_PREFIX, ""));
      mode = "answer";
      continue;
    }
    if (mode === "question") {
      question.push(line);
      continue;
    }
    if (mode === "answer") {
      answer.push(line);
      continue;
    }

    const pipe = line.indexOf("|");
    if (pipe > 0) {
      const q = line.slice(0, pipe).trim();
      const a = line.slice(pipe + 1).trim();
      if (q && a) pairs.push({ question: q, answer: a });
    }
  }
  flush();
  return pairs;
}
