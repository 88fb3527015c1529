/**
 * TUI Core Types
 *
 * Type definitions for the terminal presentation layer.
 */

import type { Size } from '../../state/viewport.ts';

export type { Size };

// ============================================
// Geometry
// ============================================

export interface Rect {
  x: number; // Column (0-indexed)
  y: number; // Row (0-indexed)
  width: number;
  height: number;
}

// ============================================
// Rendering
// ============================================

/** The eight basic terminal colors plus the terminal's own default */
export type ColorName =
  | 'default'
  | 'black'
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'magenta'
  | 'cyan'
  | 'white';

export interface Cell {
  char: string;
  fg: ColorName;
  bg: ColorName;
  bold?: boolean;
  underline?: boolean;
  inverse?: boolean;
}

/** Cell attributes without the character */
export type CellStyle = Omit<Cell, 'char'>;

// ============================================
// Utility Functions
// ============================================

/**
 * Create a default empty cell.
 */
export function createEmptyCell(bg: ColorName = 'default', fg: ColorName = 'default'): Cell {
  return {
    char: ' ',
    fg,
    bg,
  };
}

/**
 * Clone a cell.
 */
export function cloneCell(cell: Cell): Cell {
  return { ...cell };
}

/**
 * Check if two cells are equal.
 */
export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.char === b.char && stylesMatch(a, b);
}

/**
 * Check if two cells share every style attribute.
 */
export function stylesMatch(a: CellStyle, b: CellStyle): boolean {
  return (
    a.fg === b.fg &&
    a.bg === b.bg &&
    !!a.bold === !!b.bold &&
    !!a.underline === !!b.underline &&
    !!a.inverse === !!b.inverse
  );
}
