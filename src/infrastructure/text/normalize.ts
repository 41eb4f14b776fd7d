/**
 * Canonical form of a question, shared by the write path (stored
 * `questionNormalized`) and the read path (matcher queries). Both sides must go
 * through this function or exact lookup degrades to fuzzy-only.
 *
 * - NFKD compatibility decomposition, lowercase
 * - combining marks dropped (é -> e)
 * - anything that is not a letter, digit or whitespace becomes a space
 * - whitespace collapsed and trimmed
 */
export function normalizeQuestion(input: string): string {
  try {
    return input
      .normalize("NFKD")
      .toLowerCase()
      .normalize("NFKD")
      .replace(/\p{M}+/gu, "")
      .replace(/[^\p{L}\p{N}\s]/gu, " ")
      .replace(/\s+/g, " ")
      .trim();
  } catch {
    return fallbackNormalize(input);
  }
}

/**
 * Per-character pass used when normalization fails (e.g. a non-string value
 * arriving from an untyped caller). Never throws.
 */
function fallbackNormalize(input: unknown): string {
  const text = typeof input === "string" ? input : String(input ?? "");
  let out = "";
  for (const ch of text) {
    out += /[\p{L}\p{N}]/u.test(ch) ? ch.toLowerCase() : " ";
  }
  return out.replace(/\s+/g, " ").trim();
}

/**
 * Normalized question with all whitespace and underscores removed. Recovers
 * records whose spacing differs from the query ("ibu kota" vs "ibukota").
 */
export function compactQuestion(normalized: string): string {
  return normalized.replace(/[\s_]+/g, "");
}

/** Whitespace-separated tokens of an already normalized string. */
export function splitWords(normalized: string): string[] {
  return normalized.split(/\s+/).filter(Boolean);
}
