/**
 * Stdin Source Tests
 */

import { describe, test, expect } from 'vitest';
import { PassThrough } from 'stream';
import { StdinSource, readStream } from '../../../src/sources/stdin-source.ts';

describe('readStream', () => {
  test('collects every chunk', async () => {
    const stream = new PassThrough();
    stream.write('one\n');
    stream.end('two\n');
    expect(await readStream(stream)).toBe('one\ntwo\n');
  });
});

describe('StdinSource', () => {
  test('reads once and serves the cached text on reload', async () => {
    const stream = new PassThrough();
    stream.end('piped text\n');
    const source = new StdinSource(stream);

    const first = await source.read({ type: 'stdin' });
    const second = await source.read({ type: 'stdin' });
    expect(first).toEqual({ text: 'piped text\n' });
    expect(second).toEqual(first);
  });

  test('a stream error is a load failure', async () => {
    const stream = new PassThrough();
    const source = new StdinSource(stream);
    const reading = source.read({ type: 'stdin' });
    stream.destroy(new Error('EIO'));
    await expect(reading).rejects.toThrow('Failed to load <stdin>: read failed');
  });
});
