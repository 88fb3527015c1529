/**
 * Viewer State
 *
 * The single state value owned by the run loop. Every operation takes a
 * state and returns the next one.
 */

import {
  addBuffer,
  createBufferStore,
  currentBuffer,
  setCurrentScroll,
  type BufferStore,
} from '../core/buffer-store.ts';
import type { ViewBuffer } from '../core/buffer.ts';
import { DEFAULT_CAPACITY } from '../core/capacity.ts';
import { EMPTY_SEARCH, countMatches, matchRank, type SearchState } from '../features/search/text-search.ts';
import { EMPTY_SELECTION, extendSelection, type Selection } from './selection.ts';

export interface ViewerState {
  readonly store: BufferStore;
  readonly search: SearchState;
  readonly showLineNumbers: boolean;
  readonly wrapEnabled: boolean;
  /** Only meaningful with wrap off; always 0 while wrap is on */
  readonly horizScrollOffset: number;
  readonly horizScrollStep: number;
  readonly selection: Selection;
  readonly copyMode: boolean;
  /** Transient status-bar text, cleared by the next input event */
  readonly statusMessage: string | null;
  readonly running: boolean;
}

export interface ViewerOptions {
  showLineNumbers: boolean;
  wrapEnabled: boolean;
  horizScrollStep: number;
  maxBuffers: number;
}

export const DEFAULT_VIEWER_OPTIONS: ViewerOptions = {
  showLineNumbers: true,
  wrapEnabled: true,
  horizScrollStep: 8,
  maxBuffers: DEFAULT_CAPACITY.maxBuffers,
};

export function createViewerState(
  options: Partial<ViewerOptions> = {},
  buffers: readonly ViewBuffer[] = []
): ViewerState {
  const resolved = { ...DEFAULT_VIEWER_OPTIONS, ...options };
  let store = createBufferStore(resolved.maxBuffers);
  for (const buffer of buffers) {
    store = addBuffer(store, buffer);
  }
  // The first buffer loaded is the one shown at startup
  store = { ...store, currentIndex: 0 };

  return {
    store,
    search: EMPTY_SEARCH,
    showLineNumbers: resolved.showLineNumbers,
    wrapEnabled: resolved.wrapEnabled,
    horizScrollOffset: 0,
    horizScrollStep: Math.max(1, resolved.horizScrollStep),
    selection: EMPTY_SELECTION,
    copyMode: false,
    statusMessage: null,
    running: true,
  };
}

export function activeBuffer(state: ViewerState): ViewBuffer | null {
  return currentBuffer(state.store);
}

export function withStatus(state: ViewerState, message: string | null): ViewerState {
  return state.statusMessage === message ? state : { ...state, statusMessage: message };
}

/**
 * Move the current buffer's scroll offset. In copy mode the selection's
 * free end follows it.
 */
export function scrollTo(state: ViewerState, offset: number): ViewerState {
  const store = setCurrentScroll(state.store, offset);
  const buffer = currentBuffer(store);
  if (!buffer) return state;

  const selection = state.copyMode
    ? extendSelection(state.selection, buffer.scrollOffset)
    : state.selection;

  if (store === state.store && selection === state.selection) return state;
  return { ...state, store, selection };
}

/**
 * Recount matches for the current buffer, e.g. after it changed.
 */
export function refreshSearch(state: ViewerState): ViewerState {
  const buffer = activeBuffer(state);
  const term = state.search.term;
  if (!buffer || term.length === 0) {
    return state.search.matchCount === 0 && state.search.currentMatch === 0
      ? state
      : { ...state, search: { term, matchCount: 0, currentMatch: 0 } };
  }
  return {
    ...state,
    search: {
      term,
      matchCount: countMatches(buffer.lines, term),
      currentMatch: matchRank(buffer.lines, term, buffer.scrollOffset),
    },
  };
}
