/**
 * Text Search
 *
 * Linear, case-sensitive substring search over a buffer's lines. Ranks
 * are recounted from the top on every step; there is no match index.
 */

export type SearchDirection = 1 | -1;

export interface SearchState {
  term: string;
  /** Number of lines containing the term in the current buffer */
  matchCount: number;
  /** 0-based ordinal of the match at the scroll position */
  currentMatch: number;
}

export const EMPTY_SEARCH: SearchState = { term: '', matchCount: 0, currentMatch: 0 };

/**
 * Find the first line containing `term`, starting at `startLine` and
 * stepping in `direction`, wrapping at both ends. Visits each line at
 * most once.
 */
export function findMatch(
  lines: readonly string[],
  term: string,
  startLine: number,
  direction: SearchDirection
): number | null {
  const count = lines.length;
  if (term.length === 0 || count === 0) return null;

  let line = startLine;
  for (let visited = 0; visited < count; visited++) {
    if (line < 0) line = count - 1;
    if (line >= count) line = 0;

    if (lines[line]?.includes(term)) {
      return line;
    }
    line += direction;
  }
  return null;
}

export function countMatches(lines: readonly string[], term: string): number {
  if (term.length === 0) return 0;
  let count = 0;
  for (const line of lines) {
    if (line.includes(term)) count++;
  }
  return count;
}

/**
 * Ordinal of `matchLine` among matching lines: the number of matching
 * lines strictly before it.
 */
export function matchRank(lines: readonly string[], term: string, matchLine: number): number {
  if (term.length === 0) return 0;
  let rank = 0;
  const end = Math.min(matchLine, lines.length);
  for (let i = 0; i < end; i++) {
    if (lines[i]?.includes(term)) rank++;
  }
  return rank;
}
