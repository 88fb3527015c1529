/**
 * ScreenBuffer Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { rowText } from '../../../../helpers/screen.ts';
import { ScreenBuffer } from '../../../../../src/clients/tui/rendering/buffer.ts';
import type { CellStyle } from '../../../../../src/clients/tui/types.ts';

// ============================================
// Test Setup
// ============================================

const green: CellStyle = { fg: 'green', bg: 'default' };

let screen: ScreenBuffer;

beforeEach(() => {
  screen = new ScreenBuffer({ width: 4, height: 2 });
  screen.clearDirty();
});

describe('ScreenBuffer', () => {
  test('starts blank and fully dirty', () => {
    const fresh = new ScreenBuffer({ width: 2, height: 1 });
    expect(rowText(fresh, 0)).toBe('  ');
    expect(fresh.getDirtyCells()).toHaveLength(2);
  });

  test('writeString clips at the right edge and blanks control characters', () => {
    expect(screen.writeString(1, 0, 'hi\tx', green)).toBe(3);
    expect(rowText(screen, 0)).toBe(' hi ');
    expect(screen.get(3, 0)).toEqual({ char: ' ', fg: 'green', bg: 'default' });
    expect(screen.getDirtyCells().map(({ x, y }) => [x, y])).toEqual([
      [1, 0],
      [2, 0],
      [3, 0],
    ]);
  });

  test('writeString skips columns left of the screen', () => {
    expect(screen.writeString(-1, 1, 'ab', green)).toBe(1);
    expect(rowText(screen, 1)).toBe('b   ');
  });

  test('rewriting an identical cell does not mark it dirty', () => {
    screen.writeString(0, 0, 'a', green);
    screen.clearDirty();
    screen.writeString(0, 0, 'a', green);
    expect(screen.getDirtyCells()).toEqual([]);
    screen.writeString(0, 0, 'a', { fg: 'red', bg: 'default' });
    expect(screen.getDirtyCells()).toEqual([{ x: 0, y: 0, cell: { char: 'a', fg: 'red', bg: 'default' } }]);
  });

  test('out of bounds access is ignored', () => {
    screen.set(9, 9, { char: 'x', fg: 'default', bg: 'default' });
    expect(screen.get(9, 9)).toBeNull();
    expect(screen.getDirtyCells()).toEqual([]);
  });

  test('fillRow styles the whole row', () => {
    screen.fillRow(1, green);
    expect(screen.getDirtyCells()).toHaveLength(4);
    expect(screen.get(0, 1)).toEqual({ char: ' ', fg: 'green', bg: 'default' });
  });

  test('resize clears the contents', () => {
    screen.writeString(0, 0, 'abcd', green);
    screen.resize({ width: 3, height: 1 });
    expect(screen.getSize()).toEqual({ width: 3, height: 1 });
    expect(rowText(screen, 0)).toBe('   ');
  });
});
