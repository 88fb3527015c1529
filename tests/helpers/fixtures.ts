/**
 * Test fixtures shared by the unit tests.
 */

import { createBuffer, type SourceDescriptor, type ViewBuffer } from '../../src/core/buffer.ts';
import type { TruncationReport } from '../../src/core/capacity.ts';
import type { LanguageTag } from '../../src/features/syntax/languages.ts';

export interface BufferFixture {
  label?: string;
  language?: LanguageTag;
  source?: SourceDescriptor;
  truncation?: TruncationReport;
}

export function makeBuffer(lines: readonly string[], fixture: BufferFixture = {}): ViewBuffer {
  const label = fixture.label ?? 'notes.txt';
  return createBuffer({
    label,
    lines,
    language: fixture.language ?? 'none',
    source: fixture.source ?? { type: 'file', path: label },
    truncation: fixture.truncation,
  });
}

/** Lines "line 1" .. "line n" */
export function numberedLines(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `line ${i + 1}`);
}
