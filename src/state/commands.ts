/**
 * Viewer Commands
 *
 * Every key binding resolves to one of these command ids. `applyCommand`
 * runs a command against the current state and returns the next state;
 * loads and prompts are awaited before it returns, so the caller can
 * render straight after.
 */

import {
  addBuffer,
  closeCurrentBuffer,
  reloadBuffer,
  switchBuffer,
  updateCurrentBuffer,
} from '../core/buffer-store.ts';
import type { HttpMethod, SourceDescriptor, ViewBuffer } from '../core/buffer.ts';
import { BufferLimitError, describeError, isViewerError } from '../core/errors.ts';
import { debugLog } from '../debug.ts';
import { countMatches, findMatch, matchRank, type SearchDirection } from '../features/search/text-search.ts';
import type { LoadedText } from '../sources/loader.ts';
import type { TextSink } from '../sources/text-source.ts';
import { beginSelection, selectedLines, selectionSize } from './selection.ts';
import { activeBuffer, refreshSearch, scrollTo, withStatus, type ViewerState } from './viewer-state.ts';
import {
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
  type Size,
} from './viewport.ts';

// ============================================
// Command Ids
// ============================================

export const VIEWER_COMMANDS = [
  'scroll.lineDown',
  'scroll.lineUp',
  'scroll.left',
  'scroll.right',
  'scroll.lineStart',
  'scroll.lineEnd',
  'scroll.top',
  'scroll.bottom',
  'scroll.halfPageDown',
  'scroll.halfPageUp',
  'search.prompt',
  'search.next',
  'search.previous',
  'copy.begin',
  'copy.commit',
  'copy.cancel',
  'view.toggleLineNumbers',
  'view.toggleWrap',
  'buffer.next',
  'buffer.previous',
  'buffer.close',
  'buffer.reload',
  'open.file',
  'open.http',
  'open.web',
  'open.rss',
  'open.sql',
  'app.quit',
] as const;

export type ViewerCommand = (typeof VIEWER_COMMANDS)[number];

export function isViewerCommand(value: string): value is ViewerCommand {
  return VIEWER_COMMANDS.some((command) => command === value);
}

/** Commands that add, remove or replace buffers; ignored in copy mode */
const BUFFER_COMMANDS: ReadonlySet<ViewerCommand> = new Set<ViewerCommand>([
  'buffer.next',
  'buffer.previous',
  'buffer.close',
  'buffer.reload',
  'open.file',
  'open.http',
  'open.web',
  'open.rss',
  'open.sql',
]);

// ============================================
// Services
// ============================================

/**
 * Loads descriptors into buffers. Implemented by BufferLoader.
 */
export interface BufferSource {
  load(descriptor: SourceDescriptor): Promise<ViewBuffer>;
  reload(buffer: ViewBuffer): Promise<LoadedText>;
}

export interface ViewerServices {
  buffers: BufferSource;
  clipboard: TextSink;
  /** Read one line from the user; null when cancelled */
  prompt(label: string): Promise<string | null>;
  /** Let the user choose a file; null when cancelled */
  pickFile(): Promise<string | null>;
  /** Parse a `METHOD URL` line; null when it is not one */
  parseHttpRequest(input: string): { method: HttpMethod; url: string } | null;
  /** Shell command that dumps a web page as text */
  webDumpCommand(url: string): string;
  sqlConnectionString(): string;
}

export interface CommandContext {
  size: Size;
  services: ViewerServices;
}

// ============================================
// Dispatch
// ============================================

/**
 * Apply one command. The status message from the previous event is
 * cleared first; a failure leaves the state as it was and reports itself
 * in the status bar.
 */
export async function applyCommand(
  state: ViewerState,
  command: ViewerCommand,
  context: CommandContext
): Promise<ViewerState> {
  const cleared = withStatus(state, null);
  if (cleared.copyMode && BUFFER_COMMANDS.has(command)) {
    return cleared;
  }

  try {
    return await runCommand(cleared, command, context);
  } catch (error) {
    if (isViewerError(error)) {
      debugLog(`[Commands] ${command} failed (${error.code}): ${error.message}`);
    } else {
      debugLog(`[Commands] ${command} threw: ${String(error)}`);
    }
    return withStatus(cleared, describeError(error));
  }
}

async function runCommand(
  state: ViewerState,
  command: ViewerCommand,
  { size, services }: CommandContext
): Promise<ViewerState> {
  switch (command) {
    // ─────────────────────────────────────────────────────────────────────
    // Motion
    // ─────────────────────────────────────────────────────────────────────
    case 'scroll.lineDown':
      return withMatchRank(lineDown(state));
    case 'scroll.lineUp':
      return withMatchRank(lineUp(state));
    case 'scroll.left':
      return scrollLeft(state);
    case 'scroll.right':
      return scrollRight(state);
    case 'scroll.lineStart':
      return scrollLineStart(state);
    case 'scroll.lineEnd':
      return scrollLineEnd(state, size);
    case 'scroll.top':
      return withMatchRank(jumpTop(state));
    case 'scroll.bottom':
      return withMatchRank(jumpBottom(state, size));
    case 'scroll.halfPageDown':
      return withMatchRank(halfPageDown(state, size));
    case 'scroll.halfPageUp':
      return withMatchRank(halfPageUp(state, size));

    // ─────────────────────────────────────────────────────────────────────
    // Search
    // ─────────────────────────────────────────────────────────────────────
    case 'search.prompt': {
      const input = await services.prompt('Search: ');
      if (input === null) return state;
      return search(state, input);
    }
    case 'search.next':
      return stepMatch(state, 1);
    case 'search.previous':
      return stepMatch(state, -1);

    // ─────────────────────────────────────────────────────────────────────
    // Copy Mode
    // ─────────────────────────────────────────────────────────────────────
    case 'copy.begin':
      return enterCopyMode(state);
    case 'copy.commit':
      return commitCopy(state, services.clipboard);
    case 'copy.cancel':
      return state.copyMode ? { ...state, copyMode: false } : state;

    // ─────────────────────────────────────────────────────────────────────
    // View Toggles
    // ─────────────────────────────────────────────────────────────────────
    case 'view.toggleLineNumbers':
      return toggleLineNumbers(state);
    case 'view.toggleWrap':
      return toggleWrap(state);

    // ─────────────────────────────────────────────────────────────────────
    // Buffers
    // ─────────────────────────────────────────────────────────────────────
    case 'buffer.next':
      return refreshSearch({ ...state, store: switchBuffer(state.store, 1) });
    case 'buffer.previous':
      return refreshSearch({ ...state, store: switchBuffer(state.store, -1) });
    case 'buffer.close': {
      const { store, closed } = closeCurrentBuffer(state.store);
      return withStatus(refreshSearch({ ...state, store }), `Closed ${closed.label}`);
    }
    case 'buffer.reload':
      return reloadCurrent(state, services.buffers);

    // ─────────────────────────────────────────────────────────────────────
    // Opening Buffers
    // ─────────────────────────────────────────────────────────────────────
    case 'open.file': {
      const path = await services.pickFile();
      if (!path) return state;
      return openBuffer(state, services.buffers, { type: 'file', path });
    }
    case 'open.http': {
      const input = await services.prompt('HTTP (METHOD URL): ');
      if (input === null || input.trim() === '') return state;
      const request = services.parseHttpRequest(input);
      if (!request) return withStatus(state, `Invalid request: ${input.trim()}`);
      return openBuffer(state, services.buffers, { type: 'http', ...request });
    }
    case 'open.web': {
      const url = (await services.prompt('Web page URL: '))?.trim();
      if (!url) return state;
      return openBuffer(state, services.buffers, {
        type: 'command',
        command: services.webDumpCommand(url),
        language: 'none',
      });
    }
    case 'open.rss': {
      const url = (await services.prompt('RSS feed URL: '))?.trim();
      if (!url) return state;
      return openBuffer(state, services.buffers, { type: 'rss', url });
    }
    case 'open.sql': {
      const query = (await services.prompt('SQL: '))?.trim();
      if (!query) return state;
      return openBuffer(state, services.buffers, {
        type: 'sql',
        connectionString: services.sqlConnectionString(),
        query,
      });
    }

    case 'app.quit':
      return { ...state, running: false };
  }
}

// ============================================
// Search
// ============================================

/**
 * Keep the match ordinal in step with the scroll position.
 */
function withMatchRank(state: ViewerState): ViewerState {
  const buffer = activeBuffer(state);
  if (!buffer || state.search.matchCount === 0) return state;
  const currentMatch = matchRank(buffer.lines, state.search.term, buffer.scrollOffset);
  if (currentMatch === state.search.currentMatch) return state;
  return { ...state, search: { ...state.search, currentMatch } };
}

/**
 * Run a new search from the top of the buffer. An empty entry repeats the
 * previous term.
 */
export function search(state: ViewerState, input: string): ViewerState {
  const entered = input.trimEnd();
  const term = entered.length > 0 ? entered : state.search.term;
  if (term.length === 0) return state;

  const buffer = activeBuffer(state);
  if (!buffer) return state;

  const matchCount = countMatches(buffer.lines, term);
  const match = findMatch(buffer.lines, term, 0, 1);
  if (match === null) {
    return withStatus(
      { ...state, search: { term, matchCount: 0, currentMatch: 0 } },
      'Pattern not found'
    );
  }

  const moved = scrollTo(state, match);
  return {
    ...moved,
    search: { term, matchCount, currentMatch: matchRank(buffer.lines, term, match) },
  };
}

/**
 * Jump to the next (1) or previous (-1) match relative to the scroll
 * position, wrapping around.
 */
export function stepMatch(state: ViewerState, direction: SearchDirection): ViewerState {
  const buffer = activeBuffer(state);
  const term = state.search.term;
  if (!buffer || term.length === 0) return state;

  const match = findMatch(buffer.lines, term, buffer.scrollOffset + direction, direction);
  if (match === null) {
    return withStatus(state, 'Pattern not found');
  }

  const moved = scrollTo(state, match);
  return {
    ...moved,
    search: { ...state.search, currentMatch: matchRank(buffer.lines, term, match) },
  };
}

// ============================================
// Copy Mode
// ============================================

export function enterCopyMode(state: ViewerState): ViewerState {
  const buffer = activeBuffer(state);
  if (!buffer) return state;
  return {
    ...state,
    copyMode: true,
    selection: beginSelection(buffer.scrollOffset),
  };
}

/**
 * Export the selected lines and leave copy mode. On failure copy mode
 * stays on so the user can retry or cancel.
 */
async function commitCopy(state: ViewerState, sink: TextSink): Promise<ViewerState> {
  const buffer = activeBuffer(state);
  if (!state.copyMode || !buffer) return state;

  const lines = selectedLines(buffer.lines, state.selection);
  await sink.write(lines.join('\n'));

  const count = selectionSize(state.selection);
  return withStatus(
    { ...state, copyMode: false },
    `Copied ${count} ${count === 1 ? 'line' : 'lines'}`
  );
}

// ============================================
// Buffer Loading
// ============================================

async function openBuffer(
  state: ViewerState,
  source: BufferSource,
  descriptor: SourceDescriptor
): Promise<ViewerState> {
  // A full store fails before anything is fetched
  if (state.store.buffers.length >= state.store.maxBuffers) {
    throw new BufferLimitError(state.store.maxBuffers);
  }
  const buffer = await source.load(descriptor);
  return refreshSearch({ ...state, store: addBuffer(state.store, buffer) });
}

async function reloadCurrent(state: ViewerState, source: BufferSource): Promise<ViewerState> {
  const buffer = activeBuffer(state);
  if (!buffer) return state;

  const loaded = await source.reload(buffer);
  const store = reloadBuffer(state.store, state.store.currentIndex, loaded.lines, loaded.truncation);
  const next = refreshSearch({
    ...state,
    store: updateCurrentBuffer(store, (current) =>
      current.language === loaded.language ? current : { ...current, language: loaded.language }
    ),
  });
  return withStatus(next, `Reloaded ${buffer.label}`);
}
