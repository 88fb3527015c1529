/**
 * ANSI Text Styles
 *
 * Style sequences and the minimal transition between two cells.
 */

import { STYLE } from '../../../terminal/ansi.ts';
import type { CellStyle } from '../types.ts';
import { bgColor, fgColor } from './colors.ts';

/**
 * Attributes that changed between two cells.
 */
export interface StyleDiff {
  fgChanged: boolean;
  bgChanged: boolean;
  boldChanged: boolean;
  underlineChanged: boolean;
  inverseChanged: boolean;
}

/**
 * Compare two cells and determine what changed.
 */
export function diffCells(prev: CellStyle | null, next: CellStyle): StyleDiff {
  if (!prev) {
    return {
      fgChanged: true,
      bgChanged: true,
      boldChanged: !!next.bold,
      underlineChanged: !!next.underline,
      inverseChanged: !!next.inverse,
    };
  }

  return {
    fgChanged: prev.fg !== next.fg,
    bgChanged: prev.bg !== next.bg,
    boldChanged: !!prev.bold !== !!next.bold,
    underlineChanged: !!prev.underline !== !!next.underline,
    inverseChanged: !!prev.inverse !== !!next.inverse,
  };
}

/**
 * Build minimal style sequence for transition from prev to next cell.
 * Returns empty string if no style changes needed.
 */
export function transitionStyle(prev: CellStyle | null, next: CellStyle): string {
  const diff = diffCells(prev, next);
  const parts: string[] = [];

  if (diff.fgChanged) {
    parts.push(fgColor(next.fg));
  }

  if (diff.bgChanged) {
    parts.push(bgColor(next.bg));
  }

  if (diff.boldChanged) {
    parts.push(next.bold ? STYLE.bold : STYLE.noBold);
  }

  if (diff.underlineChanged) {
    parts.push(next.underline ? STYLE.underline : STYLE.noUnderline);
  }

  if (diff.inverseChanged) {
    parts.push(next.inverse ? STYLE.inverse : STYLE.noInverse);
  }

  return parts.join('');
}

