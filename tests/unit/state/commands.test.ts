/**
 * Viewer Command Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { ExportFailureError, LoadFailureError } from '../../../src/core/errors.ts';
import { applyCommand, isViewerCommand, search, stepMatch, type ViewerCommand } from '../../../src/state/commands.ts';
import { activeBuffer, createViewerState, type ViewerState } from '../../../src/state/viewer-state.ts';
import { makeBuffer, numberedLines } from '../../helpers/fixtures.ts';
import { createFakeServices, type FakeServices } from '../../helpers/services.ts';

// ============================================
// Test Setup
// ============================================

const size = { width: 80, height: 10 };
let services: FakeServices;

beforeEach(() => {
  services = createFakeServices();
});

function run(state: ViewerState, command: ViewerCommand): Promise<ViewerState> {
  return applyCommand(state, command, { size, services });
}

async function runAll(state: ViewerState, commands: ViewerCommand[]): Promise<ViewerState> {
  let next = state;
  for (const command of commands) {
    next = await run(next, command);
  }
  return next;
}

function single(lines: readonly string[] = numberedLines(10), maxBuffers = 50): ViewerState {
  return createViewerState({ maxBuffers }, [makeBuffer(lines)]);
}

function scrollOf(state: ViewerState): number | undefined {
  return activeBuffer(state)?.scrollOffset;
}

// ============================================
// Tests
// ============================================

describe('isViewerCommand', () => {
  test('accepts known ids only', () => {
    expect(isViewerCommand('scroll.top')).toBe(true);
    expect(isViewerCommand('scroll.sideways')).toBe(false);
  });
});

describe('dispatch', () => {
  test('every command clears the previous status message', async () => {
    const state = { ...single(), statusMessage: 'Copied 2 lines' };
    const next = await run(state, 'view.toggleLineNumbers');
    expect(next.statusMessage).toBeNull();
  });

  test('motion commands move the current buffer', async () => {
    const next = await runAll(single(), ['scroll.lineDown', 'scroll.lineDown', 'scroll.lineUp']);
    expect(scrollOf(next)).toBe(1);
    expect(scrollOf(await run(next, 'scroll.bottom'))).toBe(3);
  });

  test('quit stops the loop', async () => {
    expect((await run(single(), 'app.quit')).running).toBe(false);
  });

  test('view toggles flip their flags', async () => {
    const next = await runAll(single(), ['view.toggleWrap', 'view.toggleLineNumbers']);
    expect(next.wrapEnabled).toBe(false);
    expect(next.showLineNumbers).toBe(false);
  });
});

describe('search', () => {
  const lines = ['alpha', 'beta', 'alphabet', 'gamma', 'alpha'];

  test('the prompt asks for a search term', async () => {
    services.answers.push('alpha');
    const next = await run(single(lines), 'search.prompt');
    expect(services.promptLabels).toEqual(['Search: ']);
    expect(next.search).toEqual({ term: 'alpha', matchCount: 3, currentMatch: 0 });
    expect(scrollOf(next)).toBe(0);
  });

  test('next and previous step through matches and wrap', async () => {
    let state = search(single(lines), 'alpha');
    state = stepMatch(state, 1);
    expect(scrollOf(state)).toBe(2);
    expect(state.search.currentMatch).toBe(1);

    state = stepMatch(state, 1);
    expect(scrollOf(state)).toBe(4);
    expect(state.search.currentMatch).toBe(2);

    state = stepMatch(state, 1);
    expect(scrollOf(state)).toBe(0);
    expect(state.search.currentMatch).toBe(0);

    state = stepMatch(state, -1);
    expect(scrollOf(state)).toBe(4);
    expect(state.search.currentMatch).toBe(2);
  });

  test('a term with no match reports it and keeps the position', async () => {
    const start = await run(single(lines), 'scroll.lineDown');
    const next = search(start, 'delta');
    expect(next.statusMessage).toBe('Pattern not found');
    expect(next.search).toEqual({ term: 'delta', matchCount: 0, currentMatch: 0 });
    expect(scrollOf(next)).toBe(1);
  });

  test('an empty entry repeats the previous term', () => {
    const first = search(single(lines), 'beta');
    const again = search(first, '');
    expect(again.search.term).toBe('beta');
    expect(scrollOf(again)).toBe(1);
  });

  test('a cancelled prompt changes nothing', async () => {
    const state = single(lines);
    const next = await run(state, 'search.prompt');
    expect(next.search.term).toBe('');
  });

  test('next without a term does nothing', async () => {
    const state = single(lines);
    expect(await run(state, 'search.next')).toEqual(state);
  });

  test('scrolling keeps the match rank in step', async () => {
    const state = search(single(lines), 'alpha');
    const next = await run(state, 'scroll.bottom');
    expect(scrollOf(next)).toBe(0);
    const down = await runAll(state, ['scroll.lineDown', 'scroll.lineDown', 'scroll.lineDown']);
    expect(down.search.currentMatch).toBe(2);
  });
});

describe('copy mode', () => {
  test('selects from the anchor to the scroll position and exports it', async () => {
    let state = await runAll(single(), ['scroll.lineDown', 'copy.begin', 'scroll.lineDown', 'scroll.lineDown']);
    expect(state.copyMode).toBe(true);
    expect(state.selection).toEqual({ startLine: 1, endLine: 3 });

    state = await run(state, 'copy.commit');
    expect(services.clipboard.written).toEqual(['line 2\nline 3\nline 4']);
    expect(state.copyMode).toBe(false);
    expect(state.statusMessage).toBe('Copied 3 lines');
  });

  test('a single line reads in the singular', async () => {
    const state = await runAll(single(), ['copy.begin', 'copy.commit']);
    expect(state.statusMessage).toBe('Copied 1 line');
  });

  test('a failed export stays in copy mode', async () => {
    services.clipboard.failWith = new ExportFailureError('no clipboard tool');
    const state = await runAll(single(), ['copy.begin', 'copy.commit']);
    expect(state.copyMode).toBe(true);
    expect(state.statusMessage).toBe('Copy failed: no clipboard tool');
  });

  test('cancel leaves copy mode without exporting', async () => {
    const state = await runAll(single(), ['copy.begin', 'copy.cancel']);
    expect(state.copyMode).toBe(false);
    expect(services.clipboard.written).toEqual([]);
  });

  test('commit outside copy mode does nothing', async () => {
    await run(single(), 'copy.commit');
    expect(services.clipboard.written).toEqual([]);
  });

  test('buffer commands are ignored in copy mode', async () => {
    const state = createViewerState({}, [makeBuffer(['a'], { label: 'a.txt' }), makeBuffer(['b'], { label: 'b.txt' })]);
    const next = await runAll(state, ['copy.begin', 'buffer.next', 'buffer.close']);
    expect(next.store.currentIndex).toBe(0);
    expect(next.store.buffers).toHaveLength(2);
  });
});

describe('buffers', () => {
  function pair(): ViewerState {
    return createViewerState({}, [makeBuffer(['a'], { label: 'a.txt' }), makeBuffer(['b'], { label: 'b.txt' })]);
  }

  test('next and previous cycle', async () => {
    const next = await run(pair(), 'buffer.next');
    expect(next.store.currentIndex).toBe(1);
    expect((await run(next, 'buffer.next')).store.currentIndex).toBe(0);
    expect((await run(pair(), 'buffer.previous')).store.currentIndex).toBe(1);
  });

  test('closing reports the closed buffer', async () => {
    const next = await run(pair(), 'buffer.close');
    expect(next.store.buffers.map((buffer) => buffer.label)).toEqual(['b.txt']);
    expect(next.statusMessage).toBe('Closed a.txt');
  });

  test('closing the last buffer is refused', async () => {
    const next = await run(single(), 'buffer.close');
    expect(next.store.buffers).toHaveLength(1);
    expect(next.statusMessage).toBe('Cannot close the last buffer');
  });

  test('reload swaps in new lines', async () => {
    services.buffers.reloadLines = ['fresh', 'lines'];
    const next = await run(single(), 'buffer.reload');
    expect(activeBuffer(next)?.lines).toEqual(['fresh', 'lines']);
    expect(next.statusMessage).toBe('Reloaded notes.txt');
  });

  test('a failed reload keeps the old lines', async () => {
    services.buffers.failWith = new LoadFailureError('notes.txt', 'no such file');
    const next = await run(single(['old']), 'buffer.reload');
    expect(activeBuffer(next)?.lines).toEqual(['old']);
    expect(next.statusMessage).toBe('Failed to load notes.txt: no such file');
  });
});

describe('opening buffers', () => {
  test('the file picker opens a file buffer and makes it current', async () => {
    services.pickedFile = 'docs/guide.md';
    const next = await run(single(), 'open.file');
    expect(services.buffers.loaded).toEqual([{ type: 'file', path: 'docs/guide.md' }]);
    expect(next.store.buffers).toHaveLength(2);
    expect(activeBuffer(next)?.label).toBe('docs/guide.md');
  });

  test('a cancelled picker changes nothing', async () => {
    const next = await run(single(), 'open.file');
    expect(next.store.buffers).toHaveLength(1);
    expect(services.buffers.loaded).toEqual([]);
  });

  test('a full store refuses before loading', async () => {
    services.pickedFile = 'other.txt';
    const next = await run(single(['a'], 1), 'open.file');
    expect(next.statusMessage).toBe('Buffer limit reached (1)');
    expect(services.buffers.loaded).toEqual([]);
  });

  test('a failed load reports the error', async () => {
    services.pickedFile = 'missing.txt';
    services.buffers.failWith = new LoadFailureError('missing.txt', 'no such file');
    const next = await run(single(), 'open.file');
    expect(next.store.buffers).toHaveLength(1);
    expect(next.statusMessage).toBe('Failed to load missing.txt: no such file');
  });

  test('an HTTP request line opens a network buffer', async () => {
    services.answers.push('post example.test/api');
    const next = await run(single(), 'open.http');
    expect(services.promptLabels).toEqual(['HTTP (METHOD URL): ']);
    expect(services.buffers.loaded).toEqual([{ type: 'http', method: 'POST', url: 'https://example.test/api' }]);
    expect(activeBuffer(next)?.label).toBe('[POST https://example.test/api]');
  });

  test('an unparsable request line is reported', async () => {
    services.answers.push('FETCH a b');
    const next = await run(single(), 'open.http');
    expect(next.statusMessage).toBe('Invalid request: FETCH a b');
    expect(services.buffers.loaded).toEqual([]);
  });

  test('a web page is dumped through a quoted command', async () => {
    services.answers.push(' example.test/page ');
    await run(single(), 'open.web');
    expect(services.buffers.loaded).toEqual([
      { type: 'command', command: "w3m -dump 'example.test/page'", language: 'none' },
    ]);
  });

  test('an RSS prompt opens a feed', async () => {
    services.answers.push('https://example.test/feed.xml');
    await run(single(), 'open.rss');
    expect(services.buffers.loaded).toEqual([{ type: 'rss', url: 'https://example.test/feed.xml' }]);
  });

  test('a SQL prompt uses the configured connection', async () => {
    services.answers.push('select 1');
    await run(single(), 'open.sql');
    expect(services.promptLabels).toEqual(['SQL: ']);
    expect(services.buffers.loaded).toEqual([
      { type: 'sql', connectionString: 'postgres://localhost/test', query: 'select 1' },
    ]);
  });

  test('an empty prompt opens nothing', async () => {
    services.answers.push('   ');
    await run(single(), 'open.rss');
    expect(services.buffers.loaded).toEqual([]);
  });

  test('opening recounts the search for the new buffer', async () => {
    services.pickedFile = 'b.txt';
    const state = search(single(['x', 'loaded']), 'loaded');
    expect(state.search.matchCount).toBe(1);
    const next = await run(state, 'open.file');
    expect(next.search).toEqual({ term: 'loaded', matchCount: 1, currentMatch: 0 });
  });
});
