/**
 * Highlighter Tests
 */

import { describe, test, expect } from 'vitest';
import { getTokenizer, tokenize } from '../../../../src/features/syntax/highlighter.ts';
import type { Span } from '../../../../src/features/syntax/types.ts';

function span(start: number, end: number, style: Span['style'], emphasis = false): Span {
  return { start, end, style, emphasis };
}

describe('tokenize', () => {
  test('keywords, numbers and a trailing comment', () => {
    expect(tokenize('const x = 42; // note', 'typescript')).toEqual([
      span(0, 5, 'keyword', true),
      span(5, 10, 'normal'),
      span(10, 12, 'number'),
      span(12, 14, 'normal'),
      span(14, 21, 'comment'),
    ]);
  });

  test('escaped quotes stay inside the string', () => {
    expect(tokenize('x = "a\\"b" # c', 'python')).toEqual([
      span(0, 4, 'normal'),
      span(4, 10, 'string'),
      span(10, 11, 'normal'),
      span(11, 14, 'comment'),
    ]);
  });

  test('an unterminated string ends the line', () => {
    expect(tokenize('s = "open', 'javascript')).toEqual([span(0, 4, 'normal'), span(4, 9, 'string')]);
  });

  test('hex numbers in the C family', () => {
    expect(tokenize('0xff + 1.5', 'c')).toEqual([
      span(0, 4, 'number'),
      span(4, 7, 'normal'),
      span(7, 10, 'number'),
    ]);
  });

  test('hash-comment languages do not read hex', () => {
    expect(tokenize('0xff', 'python')).toEqual([span(0, 1, 'number'), span(1, 4, 'normal')]);
  });

  test('sql keywords ignore case and -- starts a comment', () => {
    expect(tokenize('Select id -- all', 'sql')).toEqual([
      span(0, 6, 'keyword', true),
      span(6, 10, 'normal'),
      span(10, 16, 'comment'),
    ]);
  });

  test('keywords elsewhere are case-sensitive', () => {
    expect(tokenize('True true', 'python')).toEqual([span(0, 4, 'keyword', true), span(4, 9, 'normal')]);
  });

  test('json has no comments', () => {
    expect(tokenize('{"a": true} // x', 'json')).toEqual([
      span(0, 1, 'normal'),
      span(1, 4, 'string'),
      span(4, 6, 'normal'),
      span(6, 10, 'keyword', true),
      span(10, 16, 'normal'),
    ]);
  });

  test('a word containing a keyword is not a keyword', () => {
    expect(tokenize('format', 'python')).toEqual([span(0, 6, 'normal')]);
  });

  test('none is a single plain span', () => {
    expect(tokenize('if (x) return 1;', 'none')).toEqual([span(0, 16, 'normal')]);
  });

  test('an empty line has no spans', () => {
    expect(tokenize('', 'none')).toEqual([]);
    expect(tokenize('', 'rust')).toEqual([]);
  });
});

describe('getTokenizer', () => {
  test('each language family has its own tokenizer', () => {
    expect(getTokenizer('man').name).toBe('man');
    expect(getTokenizer('none').name).toBe('plain');
    expect(getTokenizer('go').name).toBe('go');
  });
});
