/**
 * View Buffer
 *
 * One loaded document: its normalized lines plus its own view state and
 * the descriptor that reloads it. Buffers are immutable records; every
 * change produces a new record.
 */

import type { LanguageTag } from '../features/syntax/languages.ts';
import { NO_TRUNCATION, type TruncationReport } from './capacity.ts';

export type BufferKind = 'file' | 'stdin' | 'process-output' | 'network-response' | 'sql-result';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

/**
 * Where a buffer's text comes from. Also used to reload it.
 */
export type SourceDescriptor =
  | { type: 'file'; path: string }
  | { type: 'stdin' }
  | { type: 'command'; command: string; language: LanguageTag }
  | { type: 'http'; method: HttpMethod; url: string }
  | { type: 'rss'; url: string }
  | { type: 'sql'; connectionString: string; query: string };

export interface ViewBuffer {
  readonly id: number;
  readonly label: string;
  readonly lines: readonly string[];
  readonly language: LanguageTag;
  readonly kind: BufferKind;
  /** Index of the topmost visible logical line */
  readonly scrollOffset: number;
  readonly active: boolean;
  readonly source: SourceDescriptor;
  readonly truncation: TruncationReport;
}

export interface CreateBufferOptions {
  label: string;
  lines: readonly string[];
  language: LanguageTag;
  source: SourceDescriptor;
  truncation?: TruncationReport;
}

let nextBufferId = 1;

export function kindForSource(source: SourceDescriptor): BufferKind {
  switch (source.type) {
    case 'file':
      return 'file';
    case 'stdin':
      return 'stdin';
    case 'command':
      return 'process-output';
    case 'http':
    case 'rss':
      return 'network-response';
    case 'sql':
      return 'sql-result';
  }
}

export function createBuffer(options: CreateBufferOptions): ViewBuffer {
  return {
    id: nextBufferId++,
    label: options.label,
    lines: options.lines,
    language: options.language,
    kind: kindForSource(options.source),
    scrollOffset: 0,
    active: true,
    source: options.source,
    truncation: options.truncation ?? NO_TRUNCATION,
  };
}

/**
 * Largest valid scroll offset for a buffer: 0 when it is empty.
 */
export function maxScrollOffset(buffer: ViewBuffer): number {
  return Math.max(0, buffer.lines.length - 1);
}

export function clampScroll(buffer: ViewBuffer, offset: number): number {
  return Math.min(Math.max(0, offset), maxScrollOffset(buffer));
}

export function withScrollOffset(buffer: ViewBuffer, offset: number): ViewBuffer {
  const scrollOffset = clampScroll(buffer, offset);
  return scrollOffset === buffer.scrollOffset ? buffer : { ...buffer, scrollOffset };
}

/**
 * Replace a buffer's lines, keeping its identity and clamping the scroll.
 */
export function withLines(
  buffer: ViewBuffer,
  lines: readonly string[],
  truncation: TruncationReport = NO_TRUNCATION
): ViewBuffer {
  const next: ViewBuffer = { ...buffer, lines, truncation };
  return { ...next, scrollOffset: clampScroll(next, buffer.scrollOffset) };
}

/**
 * Display name for tabs and the status bar: the last path component.
 */
export function bufferDisplayName(buffer: ViewBuffer): string {
  const label = buffer.label;
  // Command and request labels ("[man grep]") may contain slashes
  if (label.startsWith('[')) return label;
  const slash = label.lastIndexOf('/');
  return slash === -1 ? label : label.slice(slash + 1);
}
