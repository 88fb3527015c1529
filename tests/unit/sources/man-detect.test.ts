/**
 * Man Command Detection Tests
 */

import { describe, test, expect } from 'vitest';
import { isManCommandArg } from '../../../src/sources/man-detect.ts';

describe('isManCommandArg', () => {
  test('recognizes man invocations', () => {
    expect(isManCommandArg('man grep')).toBe(true);
    expect(isManCommandArg('man 3 printf')).toBe(true);
    expect(isManCommandArg('MANWIDTH=80 man grep')).toBe(true);
  });

  test('leaves file names alone', () => {
    expect(isManCommandArg('man')).toBe(false);
    expect(isManCommandArg('manual.txt')).toBe(false);
    expect(isManCommandArg('x man ')).toBe(false);
    expect(isManCommandArg('notes/man page.txt')).toBe(false);
  });
});
