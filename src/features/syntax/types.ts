/**
 * Highlighting Types
 */

export type StyleClass =
  | 'normal'
  | 'keyword'
  | 'string'
  | 'comment'
  | 'number'
  | 'type'
  | 'function';

export interface Span {
  start: number; // Column start (0-indexed)
  end: number; // Column end (exclusive)
  style: StyleClass;
  emphasis: boolean;
}

/**
 * Turns one line into ordered, non-overlapping spans covering the line.
 * Implementations keep no state between lines.
 */
export interface Tokenizer {
  readonly name: string;
  tokenize(line: string): Span[];
}
