/**
 * Buffer Loader
 *
 * Turns a source descriptor into a normalized, bounded buffer. Sources
 * supply raw text; normalization, capacity limits and classification
 * happen here so every kind of buffer goes through the same path.
 */

import { createBuffer, type SourceDescriptor, type ViewBuffer } from '../core/buffer.ts';
import {
  describeTruncation,
  ingestLines,
  isTruncated,
  type CapacityPolicy,
  type IngestResult,
} from '../core/capacity.ts';
import { LoadFailureError, isViewerError } from '../core/errors.ts';
import { normalizeLine, splitRawLines } from '../core/text-normalizer.ts';
import { debugLog } from '../debug.ts';
import { classify, type LanguageTag } from '../features/syntax/languages.ts';
import { sourceLabel, type SourceRegistry, type SourceResult } from './text-source.ts';

export interface LoadedText extends IngestResult {
  language: LanguageTag;
}

export class BufferLoader {
  private _debugName = 'BufferLoader';

  constructor(
    private readonly sources: SourceRegistry,
    private readonly capacity: CapacityPolicy
  ) {}

  protected debugLog(msg: string): void {
    debugLog(`[${this._debugName}] ${msg}`);
  }

  /**
   * Load a descriptor into a new buffer.
   * @throws LoadFailureError when the source fails or yields no lines
   */
  async load(descriptor: SourceDescriptor): Promise<ViewBuffer> {
    const loaded = await this.loadText(descriptor);
    return createBuffer({
      label: sourceLabel(descriptor),
      lines: loaded.lines,
      language: loaded.language,
      source: descriptor,
      truncation: loaded.truncation,
    });
  }

  /**
   * Read a buffer's source again. The caller swaps the lines in.
   */
  async reload(buffer: ViewBuffer): Promise<LoadedText> {
    return this.loadText(buffer.source);
  }

  private async loadText(descriptor: SourceDescriptor): Promise<LoadedText> {
    const label = sourceLabel(descriptor);
    let result: SourceResult;
    try {
      result = await this.read(descriptor);
    } catch (error) {
      if (isViewerError(error)) throw error;
      this.debugLog(`Load failed for ${label}: ${String(error)}`);
      const reason = error instanceof Error ? error.message : String(error);
      throw new LoadFailureError(label, reason, { cause: error });
    }

    const ingested = ingestLines(splitRawLines(result.text), this.capacity, normalizeLine);
    if (ingested.lines.length === 0) {
      throw new LoadFailureError(label, 'no content');
    }
    if (isTruncated(ingested.truncation)) {
      this.debugLog(`Truncated ${label}: ${describeTruncation(ingested.truncation)}`);
    }

    return { ...ingested, language: languageFor(descriptor, result) };
  }

  private read(descriptor: SourceDescriptor): Promise<SourceResult> {
    switch (descriptor.type) {
      case 'file':
        return this.sources.file.read(descriptor);
      case 'stdin':
        return this.sources.stdin.read(descriptor);
      case 'command':
        return this.sources.command.read(descriptor);
      case 'http':
        return this.sources.http.read(descriptor);
      case 'rss':
        return this.sources.rss.read(descriptor);
      case 'sql':
        return this.sources.sql.read(descriptor);
    }
  }
}

function languageFor(descriptor: SourceDescriptor, result: SourceResult): LanguageTag {
  switch (descriptor.type) {
    case 'file':
      return classify(descriptor.path);
    case 'command':
      return descriptor.language;
    case 'http':
      return result.language ?? 'none';
    case 'stdin':
    case 'rss':
    case 'sql':
      return 'none';
  }
}

/**
 * One-shot form of {@link BufferLoader.load}.
 */
export function loadBuffer(
  descriptor: SourceDescriptor,
  sources: SourceRegistry,
  policy: CapacityPolicy
): Promise<ViewBuffer> {
  return new BufferLoader(sources, policy).load(descriptor);
}
