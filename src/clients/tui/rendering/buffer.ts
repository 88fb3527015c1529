/**
 * Screen Buffer
 *
 * Cell grid for the whole terminal. Tracks dirty cells so the renderer
 * only writes what changed since the last flush.
 */

import {
  type Cell,
  type CellStyle,
  type Rect,
  type Size,
  createEmptyCell,
  cellsEqual,
  cloneCell,
} from '../types.ts';

// ============================================
// ScreenBuffer Class
// ============================================

export class ScreenBuffer {
  private width: number;
  private height: number;
  private cells: Cell[][];
  private dirty: boolean[][];

  constructor(size: Size) {
    this.width = size.width;
    this.height = size.height;
    this.cells = this.createGrid();
    this.dirty = this.createDirtyGrid(true); // Initially all dirty
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Grid Creation
  // ─────────────────────────────────────────────────────────────────────────

  private createGrid(): Cell[][] {
    return Array.from({ length: this.height }, () =>
      Array.from({ length: this.width }, () => createEmptyCell())
    );
  }

  private createDirtyGrid(initialValue: boolean): boolean[][] {
    return Array.from({ length: this.height }, () =>
      Array.from({ length: this.width }, () => initialValue)
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Size Management
  // ─────────────────────────────────────────────────────────────────────────

  getSize(): Size {
    return { width: this.width, height: this.height };
  }

  /**
   * Resize the buffer. Contents are cleared.
   */
  resize(size: Size): void {
    this.width = size.width;
    this.height = size.height;
    this.cells = this.createGrid();
    this.dirty = this.createDirtyGrid(true);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cell Access
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Get a cell at position. Returns null if out of bounds.
   */
  get(x: number, y: number): Cell | null {
    return this.cells[y]?.[x] ?? null;
  }

  /**
   * Set a cell at position. Marks as dirty if changed.
   * Out of bounds writes are ignored.
   */
  set(x: number, y: number, cell: Cell): void {
    const row = this.cells[y];
    const dirtyRow = this.dirty[y];
    const existing = row?.[x];
    if (!row || !dirtyRow || !existing || x < 0) {
      return;
    }

    if (!cellsEqual(existing, cell)) {
      row[x] = cloneCell(cell);
      dirtyRow[x] = true;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Bulk Operations
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Write a string starting at position, one cell per code point.
   * Control characters (tabs included) show as a blank cell so columns
   * stay aligned with span offsets.
   */
  writeString(x: number, y: number, text: string, style: CellStyle): number {
    let written = 0;
    let px = x;

    for (const char of text) {
      if (px >= this.width) break;
      if (px >= 0) {
        const code = char.codePointAt(0) ?? 0;
        this.set(px, y, { ...style, char: code < 0x20 || code === 0x7f ? ' ' : char });
        written++;
      }
      px++;
    }
    return written;
  }

  /**
   * Fill a rectangle with a cell.
   */
  fillRect(rect: Rect, cell: Cell): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.set(x, y, cell);
      }
    }
  }

  /**
   * Blank a whole row with a style.
   */
  fillRow(y: number, style: CellStyle): void {
    this.fillRect({ x: 0, y, width: this.width, height: 1 }, { ...style, char: ' ' });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Dirty Tracking
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Mark entire buffer as dirty.
   */
  markAllDirty(): void {
    for (const row of this.dirty) {
      row.fill(true);
    }
  }

  /**
   * Clear all dirty flags.
   */
  clearDirty(): void {
    for (const row of this.dirty) {
      row.fill(false);
    }
  }

  /**
   * Get all dirty cells, row by row.
   */
  getDirtyCells(): Array<{ x: number; y: number; cell: Cell }> {
    const result: Array<{ x: number; y: number; cell: Cell }> = [];

    this.cells.forEach((row, y) => {
      row.forEach((cell, x) => {
        if (this.dirty[y]?.[x]) {
          result.push({ x, y, cell });
        }
      });
    });

    return result;
  }
}
