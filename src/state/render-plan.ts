/**
 * Render Plan
 *
 * Abstract description of one frame: tab bar, content rows as styled
 * spans, status bar and help line. The TUI client paints it; nothing in
 * here knows about colors or escape codes.
 */

import { bufferDisplayName } from '../core/buffer.ts';
import { isTruncated } from '../core/capacity.ts';
import { tokenize } from '../features/syntax/highlighter.ts';
import type { Span } from '../features/syntax/types.ts';
import { isLineSelected } from './selection.ts';
import { activeBuffer, type ViewerState } from './viewer-state.ts';
import { gutterWidth, visibleLayout, type Size } from './viewport.ts';

export interface TabEntry {
  name: string;
  current: boolean;
}

export interface RenderRow {
  lineIndex: number;
  /** 1-based number shown in the gutter; null on continuation rows or with numbers off */
  lineNumber: number | null;
  text: string;
  /** Spans relative to `text` */
  spans: Span[];
  selected: boolean;
}

export interface StatusLine {
  left: string;
  /** Search info, or the transient status message when there is one */
  right: string;
}

export interface RenderPlan {
  size: Size;
  gutterWidth: number;
  tabs: TabEntry[];
  /** "[current/total]" */
  tabCounter: string;
  rows: RenderRow[];
  status: StatusLine;
  help: string;
}

export const HELP_TEXT =
  'j/k:scroll  h/l:pan  g/G:top/bottom  /:search  n/N:next/prev  v:copy  T:wrap  L:numbers  o:open  Tab:next-buf  x:close  q:quit';

export const COPY_HELP_TEXT = 'COPY MODE  j/k:extend  y:copy selection  Esc:cancel';

/**
 * Clip line-relative spans to [from, to) and shift them to start at 0.
 */
export function projectSpans(spans: readonly Span[], from: number, to: number): Span[] {
  const projected: Span[] = [];
  for (const span of spans) {
    const start = Math.max(span.start, from);
    const end = Math.min(span.end, to);
    if (end > start) {
      projected.push({ ...span, start: start - from, end: end - from });
    }
  }
  return projected;
}

export function formatLineNumber(lineNumber: number): string {
  return ` ${String(lineNumber).padStart(5)} `;
}

function buildRows(state: ViewerState, size: Size): RenderRow[] {
  const buffer = activeBuffer(state);
  if (!buffer) return [];

  const spanCache = new Map<number, Span[]>();
  const spansFor = (lineIndex: number): Span[] => {
    let spans = spanCache.get(lineIndex);
    if (!spans) {
      spans = tokenize(buffer.lines[lineIndex] ?? '', buffer.language);
      spanCache.set(lineIndex, spans);
    }
    return spans;
  };

  return visibleLayout(state, size).map((row) => ({
    lineIndex: row.lineIndex,
    lineNumber: state.showLineNumbers && row.segmentIndex === 0 ? row.lineIndex + 1 : null,
    text: row.text,
    spans: projectSpans(spansFor(row.lineIndex), row.startColumn, row.startColumn + row.text.length),
    selected: state.copyMode && isLineSelected(state.selection, row.lineIndex),
  }));
}

export function buildStatusLine(state: ViewerState): StatusLine {
  const buffer = activeBuffer(state);
  if (!buffer) {
    return { left: '', right: state.statusMessage ?? '' };
  }

  const count = buffer.lines.length;
  const percent = count > 0 ? Math.floor((buffer.scrollOffset * 100) / count) : 0;
  const mode = state.copyMode ? 'COPY' : 'NORMAL';
  let left = ` ${mode} | ${bufferDisplayName(buffer)} | ${percent}% | ${buffer.scrollOffset + 1}/${count} lines`;
  if (!state.wrapEnabled && state.horizScrollOffset > 0) {
    left += ` | col ${state.horizScrollOffset + 1}`;
  }
  if (isTruncated(buffer.truncation)) {
    left += ' [truncated]';
  }

  if (state.statusMessage !== null) {
    return { left, right: state.statusMessage };
  }

  const { term, matchCount, currentMatch } = state.search;
  const right =
    term.length > 0
      ? `Search: "${term}" [${matchCount === 0 ? 0 : currentMatch + 1}/${matchCount}]`
      : '';
  return { left, right };
}

export function buildRenderPlan(state: ViewerState, size: Size): RenderPlan {
  const tabs = state.store.buffers.map((buffer, index) => ({
    name: bufferDisplayName(buffer),
    current: index === state.store.currentIndex,
  }));

  return {
    size,
    gutterWidth: gutterWidth(state),
    tabs,
    tabCounter: `[${tabs.length === 0 ? 0 : state.store.currentIndex + 1}/${tabs.length}]`,
    rows: buildRows(state, size),
    status: buildStatusLine(state),
    help: state.copyMode ? COPY_HELP_TEXT : HELP_TEXT,
  };
}
