/**
 * Stdin Source
 *
 * Standard input can only be read once, so the text is cached and a
 * reload gets the same content back.
 */

import type { Readable } from 'stream';
import { LoadFailureError } from '../core/errors.ts';
import type { DescriptorOf, SourceResult, TextSource } from './text-source.ts';

export async function readStream(stream: Readable): Promise<string> {
  stream.setEncoding('utf8');
  let text = '';
  for await (const chunk of stream) {
    text += String(chunk);
  }
  return text;
}

export class StdinSource implements TextSource<DescriptorOf<'stdin'>> {
  private cached: Promise<string> | null = null;

  constructor(private readonly stream: Readable = process.stdin) {}

  async read(_descriptor: DescriptorOf<'stdin'>): Promise<SourceResult> {
    if (!this.cached) {
      this.cached = readStream(this.stream);
    }
    try {
      return { text: await this.cached };
    } catch (error) {
      this.cached = null;
      throw new LoadFailureError('<stdin>', 'read failed', { cause: error });
    }
  }
}
