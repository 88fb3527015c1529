/**
 * Viewport Tests
 */

import { describe, test, expect } from 'vitest';
import { activeBuffer, createViewerState, type ViewerState } from '../../../src/state/viewer-state.ts';
import {
  contentWidth,
  halfPageDown,
  halfPageUp,
  jumpBottom,
  jumpTop,
  lineDown,
  lineUp,
  scrollLeft,
  scrollLineEnd,
  scrollLineStart,
  scrollRight,
  toggleLineNumbers,
  toggleWrap,
  visibleLayout,
  visibleRows,
} from '../../../src/state/viewport.ts';
import { makeBuffer, numberedLines } from '../../helpers/fixtures.ts';

// 5 content rows between the tab bar and the status/help lines
const size = { width: 20, height: 8 };

function stateWith(lines: readonly string[], options: Parameters<typeof createViewerState>[0] = {}): ViewerState {
  return createViewerState(options, [makeBuffer(lines)]);
}

function offset(state: ViewerState): number | undefined {
  return activeBuffer(state)?.scrollOffset;
}

describe('layout', () => {
  test('three rows are taken by the chrome', () => {
    expect(visibleRows(size)).toBe(5);
    expect(visibleRows({ width: 20, height: 2 })).toBe(1);
  });

  test('the gutter narrows the content', () => {
    expect(contentWidth(stateWith(['x']), size)).toBe(13);
    expect(contentWidth(stateWith(['x'], { showLineNumbers: false }), size)).toBe(20);
  });
});

describe('vertical motion', () => {
  test('line motion is clamped to the buffer', () => {
    const state = stateWith(['a', 'b']);
    expect(offset(lineUp(state))).toBe(0);
    expect(offset(lineDown(lineDown(lineDown(state))))).toBe(1);
  });

  test('bottom puts the last line on the last row', () => {
    const state = stateWith(numberedLines(20));
    expect(offset(jumpBottom(state, size))).toBe(15);
    expect(offset(jumpTop(jumpBottom(state, size)))).toBe(0);
  });

  test('bottom of a short buffer stays at the top', () => {
    expect(offset(jumpBottom(stateWith(['a', 'b']), size))).toBe(0);
  });

  test('half pages move by half the visible rows', () => {
    const state = stateWith(numberedLines(20));
    const down = halfPageDown(state, size);
    expect(offset(down)).toBe(2);
    expect(offset(halfPageUp(down, size))).toBe(0);
  });

  test('half page down stops at the bottom offset', () => {
    const state = jumpBottom(stateWith(numberedLines(20)), size);
    expect(offset(halfPageDown(state, size))).toBe(15);
  });

  test('in copy mode the selection follows the scroll', () => {
    const state = { ...stateWith(numberedLines(10)), copyMode: true };
    const moved = lineDown(lineDown(state));
    expect(moved.selection).toEqual({ startLine: 0, endLine: 2 });
  });
});

describe('horizontal motion', () => {
  test('does nothing while wrap is on', () => {
    const state = stateWith(['x'.repeat(50)]);
    expect(scrollRight(state)).toBe(state);
  });

  test('steps by the configured amount and stops at zero', () => {
    const state = stateWith(['x'.repeat(50)], { wrapEnabled: false, horizScrollStep: 8 });
    const right = scrollRight(scrollRight(state));
    expect(right.horizScrollOffset).toBe(16);
    expect(scrollLeft(right).horizScrollOffset).toBe(8);
    expect(scrollLeft(scrollLeft(scrollLeft(right))).horizScrollOffset).toBe(0);
    expect(scrollLineStart(right).horizScrollOffset).toBe(0);
  });

  test('line end shows the end of the longest visible line', () => {
    const state = stateWith(['short', 'x'.repeat(50)], { wrapEnabled: false, showLineNumbers: false });
    expect(scrollLineEnd(state, size).horizScrollOffset).toBe(30);
  });

  test('line end on lines that fit stays at zero', () => {
    const state = stateWith(['short'], { wrapEnabled: false });
    expect(scrollLineEnd(state, size)).toBe(state);
  });
});

describe('toggles', () => {
  test('turning wrap on resets the horizontal offset', () => {
    const state = scrollRight(stateWith(['x'.repeat(50)], { wrapEnabled: false }));
    const wrapped = toggleWrap(state);
    expect(wrapped.wrapEnabled).toBe(true);
    expect(wrapped.horizScrollOffset).toBe(0);
  });

  test('turning wrap off keeps the vertical offset', () => {
    const state = lineDown(stateWith(numberedLines(5)));
    expect(offset(toggleWrap(state))).toBe(1);
  });

  test('line numbers toggle', () => {
    expect(toggleLineNumbers(stateWith(['a'])).showLineNumbers).toBe(false);
  });
});

describe('visibleLayout', () => {
  const narrow = { width: 10, height: 6 };

  test('wraps long lines into segments', () => {
    const state = stateWith(['abcdefghijklmnop', 'xy'], { showLineNumbers: false });
    expect(visibleLayout(state, narrow)).toEqual([
      { lineIndex: 0, segmentIndex: 0, startColumn: 0, text: 'abcdefghij' },
      { lineIndex: 0, segmentIndex: 1, startColumn: 10, text: 'klmnop' },
      { lineIndex: 1, segmentIndex: 0, startColumn: 0, text: 'xy' },
    ]);
  });

  test('stops at the row budget part way through a line', () => {
    const state = stateWith(['x'.repeat(25), 'next'], { showLineNumbers: false });
    const rows = visibleLayout(state, narrow);
    expect(rows).toHaveLength(3);
    expect(rows.every((row) => row.lineIndex === 0)).toBe(true);
  });

  test('without wrap each line is one clipped row', () => {
    const state = scrollRight(stateWith(['abcdefghijklmnop'], { wrapEnabled: false, showLineNumbers: false, horizScrollStep: 3 }));
    expect(visibleLayout(state, narrow)).toEqual([
      { lineIndex: 0, segmentIndex: 0, startColumn: 3, text: 'defghijklm' },
    ]);
  });

  test('wrapped segments keep surrogate pairs whole and track their columns', () => {
    const state = stateWith(['abcdefghi\u{1F600}xyz'], { showLineNumbers: false });
    expect(visibleLayout(state, narrow)).toEqual([
      { lineIndex: 0, segmentIndex: 0, startColumn: 0, text: 'abcdefghi\u{1F600}' },
      { lineIndex: 0, segmentIndex: 1, startColumn: 11, text: 'xyz' },
    ]);
  });

  test('a horizontal offset inside a pair starts after it', () => {
    const state = scrollRight(stateWith(['ab\u{1F600}cdefghijklmn'], { wrapEnabled: false, showLineNumbers: false, horizScrollStep: 3 }));
    expect(visibleLayout(state, narrow)).toEqual([
      { lineIndex: 0, segmentIndex: 0, startColumn: 4, text: 'cdefghijkl' },
    ]);
  });

  test('starts at the scroll offset', () => {
    const state = lineDown(stateWith(['a', 'b', 'c'], { showLineNumbers: false }));
    expect(visibleLayout(state, narrow).map((row) => row.text)).toEqual(['b', 'c']);
  });
});
