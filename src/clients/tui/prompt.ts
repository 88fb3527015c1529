/**
 * Prompt Line
 *
 * Single-line text entry for the search, request and query prompts.
 * Holds the text and cursor; the client draws it on the status row.
 */

import type { KeyEvent } from '../../terminal/input.ts';
import { debugLog } from '../../debug.ts';

export type PromptAction = 'submit' | 'cancel' | 'edit' | 'ignored';

export interface LineEditorOptions {
  /** Initial value */
  initialValue?: string;
  /** Maximum length (0 = unlimited) */
  maxLength?: number;
}

export class LineEditor {
  private _value: string;
  private _cursorPosition: number;
  private _maxLength: number;

  constructor(options: LineEditorOptions = {}) {
    this._value = options.initialValue ?? '';
    this._maxLength = options.maxLength ?? 0;
    this._cursorPosition = this._value.length;
  }

  // === Getters ===

  get value(): string {
    return this._value;
  }

  get cursorPosition(): number {
    return this._cursorPosition;
  }

  // === Text Manipulation ===

  /**
   * Insert text at cursor position
   */
  insert(text: string): void {
    if (this._maxLength > 0) {
      text = text.slice(0, Math.max(0, this._maxLength - this._value.length));
    }
    if (text.length === 0) return;

    this._value =
      this._value.slice(0, this._cursorPosition) + text + this._value.slice(this._cursorPosition);
    this._cursorPosition += text.length;
  }

  /**
   * Delete character before cursor
   */
  backspace(): void {
    if (this._cursorPosition === 0) return;
    this._value =
      this._value.slice(0, this._cursorPosition - 1) + this._value.slice(this._cursorPosition);
    this._cursorPosition--;
  }

  /**
   * Delete character at cursor
   */
  delete(): void {
    if (this._cursorPosition >= this._value.length) return;
    this._value =
      this._value.slice(0, this._cursorPosition) + this._value.slice(this._cursorPosition + 1);
  }

  /**
   * Delete the word before the cursor, and the blanks after it
   */
  deleteWordBefore(): void {
    let start = this._cursorPosition;
    while (start > 0 && /\s/.test(this._value[start - 1] ?? '')) start--;
    while (start > 0 && !/\s/.test(this._value[start - 1] ?? '')) start--;

    this._value = this._value.slice(0, start) + this._value.slice(this._cursorPosition);
    this._cursorPosition = start;
  }

  /**
   * Delete everything before the cursor
   */
  deleteToStart(): void {
    this._value = this._value.slice(this._cursorPosition);
    this._cursorPosition = 0;
  }

  // === Cursor Movement ===

  moveLeft(): void {
    this._cursorPosition = Math.max(0, this._cursorPosition - 1);
  }

  moveRight(): void {
    this._cursorPosition = Math.min(this._value.length, this._cursorPosition + 1);
  }

  moveToStart(): void {
    this._cursorPosition = 0;
  }

  moveToEnd(): void {
    this._cursorPosition = this._value.length;
  }

  // === Keyboard Handling ===

  /**
   * Apply a key event and report what it meant.
   */
  handleKey(event: KeyEvent): PromptAction {
    const { key, ctrl } = event;

    if (key === 'ESCAPE' || (ctrl && key === 'C')) return 'cancel';
    if (key === 'ENTER') return 'submit';

    if (ctrl) {
      switch (key) {
        case 'A':
          this.moveToStart();
          return 'edit';
        case 'E':
          this.moveToEnd();
          return 'edit';
        case 'W':
          this.deleteWordBefore();
          return 'edit';
        case 'U':
          this.deleteToStart();
          return 'edit';
        default:
          return 'ignored';
      }
    }

    switch (key) {
      case 'LEFT':
        this.moveLeft();
        return 'edit';
      case 'RIGHT':
        this.moveRight();
        return 'edit';
      case 'HOME':
        this.moveToStart();
        return 'edit';
      case 'END':
        this.moveToEnd();
        return 'edit';
      case 'BACKSPACE':
        this.backspace();
        return 'edit';
      case 'DELETE':
        this.delete();
        return 'edit';
    }

    if (event.char !== undefined && !event.alt) {
      this.insert(event.char);
      return 'edit';
    }

    debugLog(`[LineEditor] Ignored key ${key}`);
    return 'ignored';
  }
}
