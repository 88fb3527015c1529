/**
 * Text Normalizer
 *
 * Cleans raw captured lines before they enter a buffer: collapses
 * backspace overstrike, strips terminal escape sequences and trims
 * trailing blanks. Order matters: escape bytes can sit next to
 * backspaces in captured terminal output, so overstrike goes first.
 */

const BACKSPACE = '\b';
const ESC = '\x1b';
const BEL = '\x07';

// ============================================
// Overstrike
// ============================================

/**
 * Collapse "x\bx" (bold) and "_\bx" (underline) to the final glyph.
 * Each backspace removes the previous output character, if there is one.
 */
export function collapseOverstrike(line: string): string {
  if (!line.includes(BACKSPACE)) return line;

  const out: string[] = [];
  for (const ch of line) {
    if (ch === BACKSPACE) {
      out.pop();
    } else {
      out.push(ch);
    }
  }
  return out.join('');
}

// ============================================
// Escape Sequence Scanner
// ============================================

export type AnsiScanState = 'normal' | 'escSeen' | 'csi' | 'osc';

export interface AnsiStep {
  next: AnsiScanState;
  /** Character to copy to the output, or null when it is consumed */
  emit: string | null;
}

/**
 * CSI sequences end at a final byte in the range '@' through '~'.
 */
export function isCsiFinalByte(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= 0x40 && code <= 0x7e;
}

/**
 * One transition of the escape scanner.
 */
export function stepAnsi(state: AnsiScanState, ch: string): AnsiStep {
  switch (state) {
    case 'normal':
      return ch === ESC ? { next: 'escSeen', emit: null } : { next: 'normal', emit: ch };
    case 'escSeen':
      if (ch === '[') return { next: 'csi', emit: null };
      if (ch === ']') return { next: 'osc', emit: null };
      // Two-character escape: the byte after ESC is consumed
      return { next: 'normal', emit: null };
    case 'csi':
      return { next: isCsiFinalByte(ch) ? 'normal' : 'csi', emit: null };
    case 'osc':
      return { next: ch === BEL ? 'normal' : 'osc', emit: null };
  }
}

/**
 * Remove CSI, OSC and two-character escape sequences.
 * An unterminated sequence at the end of the line is dropped.
 */
export function stripAnsi(line: string): string {
  if (!line.includes(ESC)) return line;

  let state: AnsiScanState = 'normal';
  let out = '';
  for (const ch of line) {
    const step = stepAnsi(state, ch);
    if (step.emit !== null) {
      out += step.emit;
    }
    state = step.next;
  }
  return out;
}

// ============================================
// Trim
// ============================================

/**
 * Trim trailing spaces and tabs; other whitespace is kept.
 */
export function trimTrailingBlanks(line: string): string {
  let end = line.length;
  while (end > 0) {
    const ch = line[end - 1];
    if (ch !== ' ' && ch !== '\t') break;
    end--;
  }
  return end === line.length ? line : line.slice(0, end);
}

/**
 * Full ingestion pipeline for one raw line.
 */
export function normalizeLine(raw: string): string {
  return trimTrailingBlanks(stripAnsi(collapseOverstrike(raw)));
}

/**
 * Split raw source text into lines. "\r\n" and "\n" both end a line and a
 * trailing newline does not produce an extra empty line.
 */
export function splitRawLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}
