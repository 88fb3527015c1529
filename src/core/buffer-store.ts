/**
 * Buffer Store
 *
 * Ordered, bounded list of buffers with a current index. Every operation
 * returns a new store; failures throw and leave the input untouched.
 */

import { BufferLimitError, CloseRejectedError } from './errors.ts';
import { withLines, withScrollOffset, type ViewBuffer } from './buffer.ts';
import type { TruncationReport } from './capacity.ts';

export interface BufferStore {
  readonly buffers: readonly ViewBuffer[];
  readonly currentIndex: number;
  readonly maxBuffers: number;
}

export function createBufferStore(maxBuffers: number): BufferStore {
  if (!Number.isInteger(maxBuffers) || maxBuffers < 1) {
    throw new RangeError(`maxBuffers must be a positive integer, got ${maxBuffers}`);
  }
  return { buffers: [], currentIndex: 0, maxBuffers };
}

/**
 * The current buffer, or null for an empty store.
 */
export function currentBuffer(store: BufferStore): ViewBuffer | null {
  return store.buffers[store.currentIndex] ?? null;
}

/**
 * Append a buffer and make it current.
 */
export function addBuffer(store: BufferStore, buffer: ViewBuffer): BufferStore {
  if (store.buffers.length >= store.maxBuffers) {
    throw new BufferLimitError(store.maxBuffers);
  }
  const buffers = [...store.buffers, buffer];
  return { ...store, buffers, currentIndex: buffers.length - 1 };
}

export interface CloseResult {
  store: BufferStore;
  closed: ViewBuffer;
}

/**
 * Remove the current buffer. Later buffers shift down by one; the current
 * index stays where it was, or moves to the new last buffer.
 */
export function closeCurrentBuffer(store: BufferStore): CloseResult {
  const closing = currentBuffer(store);
  if (store.buffers.length <= 1 || !closing) {
    throw new CloseRejectedError();
  }

  const removedIndex = store.currentIndex;
  const buffers = store.buffers.filter((_, index) => index !== removedIndex);
  return {
    store: {
      ...store,
      buffers,
      currentIndex: Math.min(removedIndex, buffers.length - 1),
    },
    closed: { ...closing, lines: [], active: false },
  };
}

/**
 * Step cyclically through the buffers.
 */
export function switchBuffer(store: BufferStore, direction: 1 | -1): BufferStore {
  const count = store.buffers.length;
  if (count <= 1) return store;
  const currentIndex = (store.currentIndex + direction + count) % count;
  return { ...store, currentIndex };
}

/**
 * Replace the buffer at `index` with `update(buffer)`.
 */
export function updateBuffer(
  store: BufferStore,
  index: number,
  update: (buffer: ViewBuffer) => ViewBuffer
): BufferStore {
  const target = store.buffers[index];
  if (!target) return store;
  const updated = update(target);
  if (updated === target) return store;
  const buffers = store.buffers.map((buffer, i) => (i === index ? updated : buffer));
  return { ...store, buffers };
}

export function updateCurrentBuffer(
  store: BufferStore,
  update: (buffer: ViewBuffer) => ViewBuffer
): BufferStore {
  return updateBuffer(store, store.currentIndex, update);
}

export function setCurrentScroll(store: BufferStore, offset: number): BufferStore {
  return updateCurrentBuffer(store, (buffer) => withScrollOffset(buffer, offset));
}

/**
 * Swap in freshly loaded lines for the buffer at `index`; its position,
 * id and label are kept.
 */
export function reloadBuffer(
  store: BufferStore,
  index: number,
  lines: readonly string[],
  truncation: TruncationReport
): BufferStore {
  return updateBuffer(store, index, (buffer) => withLines(buffer, lines, truncation));
}
