/**
 * Text Source Contracts
 *
 * Collaborators that turn a descriptor into raw text. The core only sees
 * the text; how it was fetched is up to the source.
 */

import type { SourceDescriptor } from '../core/buffer.ts';
import type { LanguageTag } from '../features/syntax/languages.ts';

export interface SourceResult {
  text: string;
  /** Language suggested by the source (e.g. from a content type) */
  language?: LanguageTag;
}

export type DescriptorOf<T extends SourceDescriptor['type']> = Extract<SourceDescriptor, { type: T }>;

export interface TextSource<D extends SourceDescriptor = SourceDescriptor> {
  read(descriptor: D): Promise<SourceResult>;
}

/**
 * One source per descriptor type.
 */
export type SourceRegistry = {
  [K in SourceDescriptor['type']]: TextSource<DescriptorOf<K>>;
};

/**
 * Receives exported text (the copy-mode selection).
 */
export interface TextSink {
  write(text: string): Promise<void>;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs a shell command line, optionally feeding `input` to its stdin,
 * and returns what it printed.
 */
export type CommandRunner = (command: string, input?: string) => Promise<CommandOutput>;

export function sourceLabel(descriptor: SourceDescriptor): string {
  switch (descriptor.type) {
    case 'file':
      return descriptor.path;
    case 'stdin':
      return '<stdin>';
    case 'command':
      return `[${descriptor.command}]`;
    case 'http':
      return `[${descriptor.method} ${descriptor.url}]`;
    case 'rss':
      return `[rss ${descriptor.url}]`;
    case 'sql':
      return `[sql ${descriptor.query}]`;
  }
}

/**
 * Quote a value for a POSIX shell command line.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
