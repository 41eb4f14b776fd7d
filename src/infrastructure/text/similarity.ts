import { DEFAULT_LEXICON, extractKeywords, type Lexicon } from "./keywords";
import { splitWords } from "./normalize";

export type SimilarityWeights = {
  sequenceWeight: number;
  overlapWeight: number;
  lengthWeight: number;
  /** Added once per shared important word */
  importantWordBonus: number;
};

export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = {
  sequenceWeight: 0.2,
  overlapWeight: 0.6,
  lengthWeight: 0.2,
  importantWordBonus: 0.05,
};

type Block = { i: number; j: number; size: number };

/**
 * Longest common run inside a[alo:ahi] and b[blo:bhi]. Earliest in `a` wins,
 * then earliest in `b`.
 */
function findLongestMatch(
  a: string[],
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): Block {
  let best: Block = { i: alo, j: blo, size: 0 };
  let j2len = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i] ?? "") ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) best = { i: i - k + 1, j: j - k + 1, size: k };
    }
    j2len = next;
  }
  return best;
}

function matchedCharacters(a: string[], b: string[]): number {
  const b2j = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const list = b2j.get(ch);
    if (list) list.push(j);
    else b2j.set(ch, [j]);
  });

  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const { i, j, size } = findLongestMatch(a, b2j, alo, ahi, blo, bhi);
    if (size === 0) continue;
    total += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }
  return total;
}

/**
 * Ratcliff/Obershelp ratio: 2·M / (|a| + |b|), M being the characters covered
 * by recursively found longest matching blocks.
 *
 * The block search is order dependent, so the pair is put in a canonical
 * order first to keep the ratio symmetric.
 */
export function sequenceRatio(left: string, right: string): number {
  const [first, second] = left <= right ? [left, right] : [right, left];
  const a = Array.from(first);
  const b = Array.from(second);
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchedCharacters(a, b)) / length;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const item of a) if (b.has(item)) shared += 1;
  return shared / (a.size + b.size - shared);
}

/**
 * Similarity of two normalized questions in [0, 1].
 *
 * Blend of sequence ratio, keyword Jaccard overlap and word-count ratio, plus
 * a bonus per shared important word. Identical inputs score 1; an empty
 * keyword set on either side scores 0.
 */
export function similarity(
  a: string,
  b: string,
  weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS,
  lexicon: Lexicon = DEFAULT_LEXICON,
): number {
  if (a === b) return 1;

  const keywordsA = new Set(extractKeywords(a, lexicon));
  const keywordsB = new Set(extractKeywords(b, lexicon));
  if (keywordsA.size === 0 || keywordsB.size === 0) return 0;

  const wordsA = splitWords(a).length;
  const wordsB = splitWords(b).length;
  const lengthRatio = Math.min(wordsA, wordsB) / Math.max(wordsA, wordsB);

  let sharedImportant = 0;
  for (const keyword of keywordsA) {
    if (keywordsB.has(keyword) && lexicon.importantWords.has(keyword)) {
      sharedImportant += 1;
    }
  }

  const score =
    weights.sequenceWeight * sequenceRatio(a, b) +
    weights.overlapWeight * jaccard(keywordsA, keywordsB) +
    weights.lengthWeight * lengthRatio +
    weights.importantWordBonus * sharedImportant;

  return Math.min(1, Math.max(0, score));
}
