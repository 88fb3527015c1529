/**
 * Text Search Tests
 */

import { describe, test, expect } from 'vitest';
import { countMatches, findMatch, matchRank } from '../../../../src/features/search/text-search.ts';

const lines = ['alpha', 'beta', 'alphabet', 'gamma', 'Alpha'];

describe('findMatch', () => {
  test('finds forward from the start line', () => {
    expect(findMatch(lines, 'alpha', 1, 1)).toBe(2);
  });

  test('the start line itself can match', () => {
    expect(findMatch(lines, 'alpha', 2, 1)).toBe(2);
  });

  test('wraps past the end', () => {
    expect(findMatch(lines, 'alpha', 3, 1)).toBe(0);
  });

  test('wraps past the start going backwards', () => {
    expect(findMatch(lines, 'beta', 0, -1)).toBe(1);
    expect(findMatch(lines, 'gamma', -1, -1)).toBe(3);
  });

  test('is case-sensitive', () => {
    expect(findMatch(lines, 'Alpha', 0, 1)).toBe(4);
  });

  test('returns null without a match or without a term', () => {
    expect(findMatch(lines, 'delta', 0, 1)).toBeNull();
    expect(findMatch(lines, '', 0, 1)).toBeNull();
    expect(findMatch([], 'a', 0, 1)).toBeNull();
  });
});

describe('countMatches', () => {
  test('counts lines, not occurrences', () => {
    expect(countMatches(['aa a', 'b', 'a'], 'a')).toBe(2);
  });

  test('an empty term matches nothing', () => {
    expect(countMatches(lines, '')).toBe(0);
  });
});

describe('matchRank', () => {
  test('counts matching lines strictly before the line', () => {
    expect(matchRank(lines, 'alpha', 0)).toBe(0);
    expect(matchRank(lines, 'alpha', 2)).toBe(1);
    expect(matchRank(lines, 'alpha', 4)).toBe(2);
  });
});
