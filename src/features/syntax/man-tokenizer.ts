/**
 * Man Page Tokenizer
 *
 * Highlights rendered man pages: uppercase section headings, command-line
 * flags, and cross references such as "grep(1)".
 */

import type { Span, Tokenizer } from './types.ts';
import { SpanBuilder, isBlank, isDigit, isLetter, isWordChar, scanUntilBlank } from './scanner.ts';

const MIN_HEADER_LETTERS = 3;

/**
 * Section headings are letters and spaces only, all uppercase, with at
 * least three letters: NAME, SYNOPSIS, SEE ALSO.
 */
export function isManSectionHeader(text: string): boolean {
  let letters = 0;
  for (const ch of text) {
    if (ch === ' ') continue;
    if (!isLetter(ch) || ch !== ch.toUpperCase()) return false;
    letters++;
  }
  return letters >= MIN_HEADER_LETTERS;
}

function isManWordChar(ch: string | undefined): boolean {
  return isWordChar(ch) || ch === '-';
}

/**
 * Length of a "(<digits>)" suffix at `start`, or 0 when there is none.
 */
export function crossReferenceSuffixLength(line: string, start: number): number {
  if (line[start] !== '(') return 0;
  let i = start + 1;
  while (isDigit(line[i])) i++;
  if (i === start + 1 || line[i] !== ')') return 0;
  return i + 1 - start;
}

export class ManTokenizer implements Tokenizer {
  readonly name = 'man';

  tokenize(line: string): Span[] {
    const out = new SpanBuilder();

    let lead = 0;
    while (line[lead] === ' ') lead++;
    if (isManSectionHeader(line.slice(lead))) {
      out.push(0, line.length, 'keyword', true);
      return out.build();
    }

    let i = 0;
    while (i < line.length) {
      const ch = line[i];

      if (isBlank(ch)) {
        out.push(i, i + 1, 'normal');
        i++;
        continue;
      }

      // Flags: -x, --long-option, up to the next whitespace
      if (ch === '-') {
        const end = scanUntilBlank(line, i);
        out.push(i, end, 'number', true);
        i = end;
        continue;
      }

      if (isManWordChar(ch)) {
        let end = i;
        while (isManWordChar(line[end])) end++;
        const suffix = crossReferenceSuffixLength(line, end);
        if (suffix > 0) {
          out.push(i, end, 'function', true);
          out.push(end, end + suffix, 'type');
          i = end + suffix;
        } else {
          out.push(i, end, 'normal');
          i = end;
        }
        continue;
      }

      out.push(i, i + 1, 'normal');
      i++;
    }

    return out.build();
  }
}
