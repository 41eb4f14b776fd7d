import { z } from "zod";
import lexiconData from "./lexicon.json";
import { splitWords } from "./normalize";

const LexiconFileSchema = z.object({
  minTokenLength: z.number().int().min(1),
  stopwords: z.array(z.string().min(1)),
  importantWords: z.array(z.string().min(1)),
});

export type Lexicon = {
  stopwords: ReadonlySet<string>;
  /** Short or function-like words that carry meaning (negations, prepositions) */
  importantWords: ReadonlySet<string>;
  minTokenLength: number;
};

export function createLexicon(input: z.input<typeof LexiconFileSchema>): Lexicon {
  const parsed = LexiconFileSchema.parse(input);
  return {
    stopwords: new Set(parsed.stopwords),
    importantWords: new Set(parsed.importantWords),
    minTokenLength: parsed.minTokenLength,
  };
}

export const DEFAULT_LEXICON: Lexicon = createLexicon(lexiconData);

/**
 * Keywords of a normalized question, in first-occurrence order, deduplicated.
 *
 * Important words always survive; other tokens are dropped when they are
 * stopwords or shorter than `minTokenLength`.
 */
export function extractKeywords(
  normalized: string,
  lexicon: Lexicon = DEFAULT_LEXICON,
): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const token of splitWords(normalized)) {
    if (seen.has(token)) continue;
    if (!lexicon.importantWords.has(token)) {
      if (lexicon.stopwords.has(token)) continue;
      if (token.length < lexicon.minTokenLength) continue;
    }
    seen.add(token);
    out.push(token);
  }
  return out;
}

/**
 * The `n` longest keywords, ties kept in original order. Used to bound the
 * candidate window when querying the store.
 */
export function longestKeywords(keywords: string[], n: number): string[] {
  return keywords
    .map((keyword, index) => ({ keyword, index }))
    .sort((a, b) => b.keyword.length - a.keyword.length || a.index - b.index)
    .slice(0, Math.max(0, n))
    .map((k) => k.keyword);
}
