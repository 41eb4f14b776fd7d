/**
 * Escape a string value for use in LanceDB SQL WHERE clauses.
 * Prevents SQL injection by escaping single quotes.
 */
export function escapeSqlString(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Keywords reach the filter only when they are plain letters/digits, so LIKE
 * wildcards and quotes from user input never end up in the SQL text.
 */
const SAFE_KEYWORD = /^[\p{L}\p{N}]+$/u;

/** `column LIKE '%k1%' OR column LIKE '%k2%' ...`, or undefined if no keyword is usable. */
export function buildContainsAnyClause(
  column: string,
  keywords: string[],
): string | undefined {
  const safe = [...new Set(keywords)].filter((k) => SAFE_KEYWORD.test(k));
  if (safe.length === 0) return undefined;
  return safe
    .map((k) => `${column} LIKE '%${escapeSqlString(k)}%'`)
    .join(" OR ");
}
