/**
 * Selection Model
 *
 * Copy-mode line range. Bounds are stored in the order they were set and
 * only normalized when read.
 */

export interface Selection {
  startLine: number;
  endLine: number;
}

export interface LineRange {
  low: number;
  high: number;
}

export const EMPTY_SELECTION: Selection = { startLine: 0, endLine: 0 };

export function beginSelection(line: number): Selection {
  return { startLine: line, endLine: line };
}

/**
 * Move the free end of the selection; the anchor stays put.
 */
export function extendSelection(selection: Selection, line: number): Selection {
  return selection.endLine === line ? selection : { ...selection, endLine: line };
}

export function selectedRange(selection: Selection): LineRange {
  return {
    low: Math.min(selection.startLine, selection.endLine),
    high: Math.max(selection.startLine, selection.endLine),
  };
}

export function isLineSelected(selection: Selection, line: number): boolean {
  const { low, high } = selectedRange(selection);
  return line >= low && line <= high;
}

/**
 * Lines covered by the selection, clipped to the document.
 */
export function selectedLines(lines: readonly string[], selection: Selection): string[] {
  const { low, high } = selectedRange(selection);
  return lines.slice(Math.max(0, low), high + 1);
}

export function selectionSize(selection: Selection): number {
  const { low, high } = selectedRange(selection);
  return high - low + 1;
}
