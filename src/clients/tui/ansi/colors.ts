/**
 * ANSI Color Sequences
 *
 * SGR codes for the basic terminal palette. The viewer sticks to the
 * eight standard colors so it follows the user's terminal theme.
 */

import { CSI, STYLE } from '../../../terminal/ansi.ts';
import type { ColorName } from '../types.ts';

const COLOR_OFFSETS: Record<ColorName, number> = {
  black: 0,
  red: 1,
  green: 2,
  yellow: 3,
  blue: 4,
  magenta: 5,
  cyan: 6,
  white: 7,
  default: 9,
};

/**
 * Reset all attributes.
 */
export function resetColor(): string {
  return STYLE.reset;
}

/**
 * Set foreground color (30-37, 39 for default).
 */
export function fgColor(color: ColorName): string {
  return `${CSI}${30 + COLOR_OFFSETS[color]}m`;
}

/**
 * Set background color (40-47, 49 for default).
 */
export function bgColor(color: ColorName): string {
  return `${CSI}${40 + COLOR_OFFSETS[color]}m`;
}
