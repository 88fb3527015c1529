/**
 * Scanner Primitives
 *
 * Small position-based scanners shared by every tokenizer. Each takes the
 * line and a start index and returns the index just past what it matched.
 */

import type { Span, StyleClass } from './types.ts';

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

export function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && ((ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z'));
}

export function isWordStart(ch: string | undefined): boolean {
  return isLetter(ch) || ch === '_';
}

export function isWordChar(ch: string | undefined): boolean {
  return isLetter(ch) || isDigit(ch) || ch === '_';
}

export function isHexChar(ch: string | undefined): boolean {
  return (
    ch !== undefined &&
    (isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F') || ch === 'x' || ch === 'X')
  );
}

export function isBlank(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

/**
 * Scan a quoted string starting at the opening quote. A quote closes the
 * string unless the character right before it is a backslash. An
 * unterminated string runs to the end of the line.
 */
export function scanString(line: string, start: number): number {
  const quote = line[start];
  let i = start + 1;
  while (i < line.length) {
    const ch = line[i];
    const escaped = i > 0 && line[i - 1] === '\\';
    i++;
    if (ch === quote && !escaped) break;
  }
  return i;
}

/**
 * Scan a number: digits and '.', plus hex letters and 'x'/'X' when
 * `hex` is set. "0xff" and "1.2.3" are each one token.
 */
export function scanNumber(line: string, start: number, hex: boolean): number {
  let i = start;
  while (i < line.length) {
    const ch = line[i];
    if (isDigit(ch) || ch === '.' || (hex && isHexChar(ch))) {
      i++;
    } else {
      break;
    }
  }
  return i;
}

/**
 * Scan a maximal [A-Za-z0-9_] run.
 */
export function scanWord(line: string, start: number): number {
  let i = start;
  while (i < line.length && isWordChar(line[i])) i++;
  return i;
}

/**
 * Scan until the next whitespace character.
 */
export function scanUntilBlank(line: string, start: number): number {
  let i = start;
  while (i < line.length && !isBlank(line[i])) i++;
  return i;
}

// ============================================
// Span Builder
// ============================================

/**
 * Collects spans in order and merges neighbours that share a style.
 */
export class SpanBuilder {
  private spans: Span[] = [];

  push(start: number, end: number, style: StyleClass, emphasis = false): void {
    if (end <= start) return;
    const last = this.spans[this.spans.length - 1];
    if (last && last.end === start && last.style === style && last.emphasis === emphasis) {
      last.end = end;
      return;
    }
    this.spans.push({ start, end, style, emphasis });
  }

  build(): Span[] {
    return this.spans;
  }
}
