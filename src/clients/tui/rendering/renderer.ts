/**
 * Renderer
 *
 * Writes the ScreenBuffer to the terminal using ANSI escape sequences.
 * Supports both real terminal output and captured output for testing.
 */

import type { Size, Cell } from '../types.ts';
import { ScreenBuffer } from './buffer.ts';
import { CURSOR, SCREEN, moveToCell } from '../../../terminal/ansi.ts';
import { resetColor } from '../ansi/colors.ts';
import { transitionStyle } from '../ansi/styles.ts';

// ============================================
// Types
// ============================================

export interface RendererOptions {
  /** Output function */
  output: (data: string) => void;
  /** Enable alternate screen buffer */
  alternateScreen?: boolean;
}

// ============================================
// Renderer Class
// ============================================

export class Renderer {
  private buffer: ScreenBuffer;
  private size: Size;
  private output: (data: string) => void;
  private alternateScreen: boolean;
  private initialized = false;

  // Track last rendered cell for style optimization
  private lastCell: Cell | null = null;

  constructor(size: Size, options: RendererOptions) {
    this.size = size;
    this.buffer = new ScreenBuffer(size);
    this.output = options.output;
    this.alternateScreen = options.alternateScreen ?? true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Take over the screen.
   */
  initialize(): void {
    if (this.initialized) return;

    let initSequence = CURSOR.hide;
    if (this.alternateScreen) {
      initSequence += SCREEN.enterAlt;
    }
    initSequence += SCREEN.clear + CURSOR.home;

    this.output(initSequence);
    this.buffer.markAllDirty();
    this.lastCell = null;
    this.initialized = true;
  }

  /**
   * Give the screen back in the state it was found.
   */
  cleanup(): void {
    if (!this.initialized) return;

    let cleanupSequence = resetColor();
    if (this.alternateScreen) {
      cleanupSequence += SCREEN.exitAlt;
    }
    cleanupSequence += CURSOR.show;

    this.output(cleanupSequence);
    this.initialized = false;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Size Management
  // ─────────────────────────────────────────────────────────────────────────

  getSize(): Size {
    return { ...this.size };
  }

  /**
   * Resize the renderer and buffer.
   */
  resize(size: Size): void {
    if (size.width === this.size.width && size.height === this.size.height) return;
    this.size = size;
    this.buffer.resize(size);
    this.lastCell = null;
    this.output(resetColor() + SCREEN.clear);
  }

  getBuffer(): ScreenBuffer {
    return this.buffer;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Flush dirty cells to terminal.
   */
  flush(): void {
    const dirtyCells = this.buffer.getDirtyCells();

    if (dirtyCells.length === 0) {
      return;
    }

    this.output(this.buildOutput(dirtyCells));
    this.buffer.clearDirty();
  }

  /**
   * Build output string from dirty cells.
   * Skips cursor moves between adjacent cells on the same row.
   */
  private buildOutput(cells: Array<{ x: number; y: number; cell: Cell }>): string {
    let output = '';
    let lastY = -1;
    let cursorX = -1;

    for (const { x, y, cell } of cells) {
      const code = cell.char.codePointAt(0) ?? 0;
      const isNonAscii = code > 127;

      if (y !== lastY || x !== cursorX) {
        output += moveToCell(x, y);
        cursorX = x;
      }

      output += transitionStyle(this.lastCell, cell);
      output += cell.char;

      // Terminals disagree on the width of some characters
      cursorX = isNonAscii ? -1 : cursorX + 1;

      this.lastCell = cell;
      lastY = y;
    }

    return output;
  }

  isInitialized(): boolean {
    return this.initialized;
  }
}

// ============================================
// Factory Functions
// ============================================

/**
 * Create a renderer that captures output (for testing).
 */
export function createTestRenderer(
  size: Size
): { renderer: Renderer; getOutput: () => string; clearOutput: () => void } {
  let captured = '';

  const renderer = new Renderer(size, {
    output: (data: string) => {
      captured += data;
    },
    alternateScreen: false,
  });

  return {
    renderer,
    getOutput: () => captured,
    clearOutput: () => {
      captured = '';
    },
  };
}
