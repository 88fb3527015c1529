/**
 * ANSI Escape Code Constants
 *
 * Low-level escape sequences for terminal control.
 */

// Control characters
export const ESC = '\x1b';
export const CSI = `${ESC}[`; // Control Sequence Introducer

// Cursor control
export const CURSOR = {
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
  home: `${CSI}H`,
  // Position: row and col are 1-indexed
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
};

// Screen control
export const SCREEN = {
  clear: `${CSI}2J`,
  // Alternate screen buffer (for fullscreen apps)
  enterAlt: `${CSI}?1049h`,
  exitAlt: `${CSI}?1049l`,
};

// Text styles
export const STYLE = {
  reset: `${CSI}0m`,
  bold: `${CSI}1m`,
  underline: `${CSI}4m`,
  inverse: `${CSI}7m`,
  noBold: `${CSI}22m`,
  noUnderline: `${CSI}24m`,
  noInverse: `${CSI}27m`,
};

/**
 * Move to a 0-indexed cell.
 */
export function moveToCell(x: number, y: number): string {
  return CURSOR.moveTo(y + 1, x + 1);
}
