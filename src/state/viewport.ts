/**
 * Viewport
 *
 * Screen layout, vertical and horizontal scroll motions, and the list of
 * display rows for the current buffer.
 */

import { boundaryAtOrAfter } from '../core/code-points.ts';
import { wrapLine } from '../core/line-wrapper.ts';
import { activeBuffer, scrollTo, type ViewerState } from './viewer-state.ts';

export interface Size {
  width: number;
  height: number;
}

/** Tab bar above the content; status bar and help line below it */
export const CHROME_ROWS = { top: 1, bottom: 2 } as const;

/** " 12345 " before each line when line numbers are shown */
export const LINE_NUMBER_WIDTH = 7;

export function visibleRows(size: Size): number {
  return Math.max(1, size.height - CHROME_ROWS.top - CHROME_ROWS.bottom);
}

export function gutterWidth(state: ViewerState): number {
  return state.showLineNumbers ? LINE_NUMBER_WIDTH : 0;
}

export function contentWidth(state: ViewerState, size: Size): number {
  return Math.max(1, size.width - gutterWidth(state));
}

// ============================================
// Vertical Motion
// ============================================

function scrollBy(state: ViewerState, delta: number): ViewerState {
  const buffer = activeBuffer(state);
  if (!buffer) return state;
  return scrollTo(state, buffer.scrollOffset + delta);
}

/**
 * Offset that puts the last line on the bottom row.
 */
function bottomOffset(state: ViewerState, size: Size): number {
  const buffer = activeBuffer(state);
  if (!buffer) return 0;
  return Math.max(0, buffer.lines.length - visibleRows(size));
}

export function lineDown(state: ViewerState): ViewerState {
  return scrollBy(state, 1);
}

export function lineUp(state: ViewerState): ViewerState {
  return scrollBy(state, -1);
}

export function jumpTop(state: ViewerState): ViewerState {
  return scrollTo(state, 0);
}

export function jumpBottom(state: ViewerState, size: Size): ViewerState {
  return scrollTo(state, bottomOffset(state, size));
}

export function halfPageDown(state: ViewerState, size: Size): ViewerState {
  const buffer = activeBuffer(state);
  if (!buffer) return state;
  const target = buffer.scrollOffset + Math.floor(visibleRows(size) / 2);
  return scrollTo(state, Math.min(target, bottomOffset(state, size)));
}

export function halfPageUp(state: ViewerState, size: Size): ViewerState {
  return scrollBy(state, -Math.floor(visibleRows(size) / 2));
}

// ============================================
// Horizontal Motion (wrap off only)
// ============================================

function withHorizOffset(state: ViewerState, offset: number): ViewerState {
  if (state.wrapEnabled) return state;
  const horizScrollOffset = Math.max(0, offset);
  return horizScrollOffset === state.horizScrollOffset ? state : { ...state, horizScrollOffset };
}

export function scrollLeft(state: ViewerState): ViewerState {
  return withHorizOffset(state, state.horizScrollOffset - state.horizScrollStep);
}

export function scrollRight(state: ViewerState): ViewerState {
  return withHorizOffset(state, state.horizScrollOffset + state.horizScrollStep);
}

export function scrollLineStart(state: ViewerState): ViewerState {
  return withHorizOffset(state, 0);
}

/**
 * Scroll so the longest visible line ends at the right edge.
 */
export function scrollLineEnd(state: ViewerState, size: Size): ViewerState {
  const buffer = activeBuffer(state);
  if (!buffer) return state;
  const visible = buffer.lines.slice(buffer.scrollOffset, buffer.scrollOffset + visibleRows(size));
  const longest = visible.reduce((max, line) => Math.max(max, line.length), 0);
  return withHorizOffset(state, longest - contentWidth(state, size));
}

// ============================================
// View Toggles
// ============================================

/**
 * Wrap and horizontal scroll are exclusive: enabling wrap resets the
 * horizontal offset. The vertical offset is never touched.
 */
export function toggleWrap(state: ViewerState): ViewerState {
  const wrapEnabled = !state.wrapEnabled;
  return {
    ...state,
    wrapEnabled,
    horizScrollOffset: wrapEnabled ? 0 : state.horizScrollOffset,
  };
}

export function toggleLineNumbers(state: ViewerState): ViewerState {
  return { ...state, showLineNumbers: !state.showLineNumbers };
}

// ============================================
// Layout
// ============================================

export interface DisplayRow {
  lineIndex: number;
  /** 0 for the first row of a logical line */
  segmentIndex: number;
  /** Column in the logical line where this row's text starts */
  startColumn: number;
  text: string;
}

/**
 * Display rows for the current buffer, top to bottom, limited to the
 * row budget. With wrap on a logical line may be cut off part way.
 */
export function visibleLayout(state: ViewerState, size: Size): DisplayRow[] {
  const buffer = activeBuffer(state);
  if (!buffer) return [];

  const budget = visibleRows(size);
  const width = contentWidth(state, size);
  const rows: DisplayRow[] = [];

  for (let lineIndex = buffer.scrollOffset; lineIndex < buffer.lines.length; lineIndex++) {
    if (rows.length >= budget) break;
    const line = buffer.lines[lineIndex] ?? '';

    if (!state.wrapEnabled) {
      const from = boundaryAtOrAfter(line, state.horizScrollOffset);
      rows.push({
        lineIndex,
        segmentIndex: 0,
        startColumn: from,
        text: line.slice(from, boundaryAtOrAfter(line, from + width)),
      });
      continue;
    }

    const segments = wrapLine(line, width);
    let startColumn = 0;
    for (let segmentIndex = 0; segmentIndex < segments.length && rows.length < budget; segmentIndex++) {
      const text = segments[segmentIndex] ?? '';
      rows.push({ lineIndex, segmentIndex, startColumn, text });
      startColumn += text.length;
    }
  }

  return rows;
}
