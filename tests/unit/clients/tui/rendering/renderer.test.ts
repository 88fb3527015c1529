/**
 * Renderer Tests
 */

import { describe, test, expect } from 'vitest';
import { createTestRenderer } from '../../../../../src/clients/tui/rendering/renderer.ts';
import { transitionStyle } from '../../../../../src/clients/tui/ansi/styles.ts';

describe('Renderer', () => {
  test('initialize hides the cursor and clears the screen', () => {
    const { renderer, getOutput } = createTestRenderer({ width: 3, height: 1 });
    renderer.initialize();
    expect(getOutput()).toBe('\x1b[?25l\x1b[2J\x1b[H');
    expect(renderer.isInitialized()).toBe(true);
  });

  test('flush writes dirty cells with minimal style changes', () => {
    const { renderer, getOutput, clearOutput } = createTestRenderer({ width: 3, height: 1 });
    renderer.initialize();
    clearOutput();

    renderer.getBuffer().writeString(0, 0, 'ab', { fg: 'green', bg: 'default' });
    renderer.flush();
    expect(getOutput()).toBe('\x1b[1;1H\x1b[32m\x1b[49mab\x1b[39m ');

    clearOutput();
    renderer.flush();
    expect(getOutput()).toBe('');

    renderer.getBuffer().writeString(2, 0, 'c', { fg: 'green', bg: 'default' });
    renderer.flush();
    expect(getOutput()).toBe('\x1b[1;3H\x1b[32mc');
  });

  test('cleanup restores the terminal once', () => {
    const { renderer, getOutput, clearOutput } = createTestRenderer({ width: 2, height: 1 });
    renderer.initialize();
    clearOutput();

    renderer.cleanup();
    renderer.cleanup();
    expect(getOutput()).toBe('\x1b[0m\x1b[?25h');
    expect(renderer.isInitialized()).toBe(false);
  });

  test('resize clears the screen only when the size changes', () => {
    const { renderer, getOutput, clearOutput } = createTestRenderer({ width: 2, height: 1 });
    renderer.resize({ width: 2, height: 1 });
    expect(getOutput()).toBe('');

    clearOutput();
    renderer.resize({ width: 5, height: 2 });
    expect(getOutput()).toBe('\x1b[0m\x1b[2J');
    expect(renderer.getSize()).toEqual({ width: 5, height: 2 });
    expect(renderer.getBuffer().getSize()).toEqual({ width: 5, height: 2 });
  });
});

describe('transitionStyle', () => {
  test('emits only the attributes that change', () => {
    expect(transitionStyle(null, { fg: 'default', bg: 'default', bold: true })).toBe('\x1b[39m\x1b[49m\x1b[1m');
    expect(
      transitionStyle({ fg: 'white', bg: 'default', bold: true }, { fg: 'white', bg: 'default', inverse: true })
    ).toBe('\x1b[22m\x1b[7m');
    expect(transitionStyle({ fg: 'red', bg: 'blue' }, { fg: 'red', bg: 'blue' })).toBe('');
  });
});
