/**
 * Raw Terminal Input Handler
 *
 * Parses raw terminal input into key events. The viewer reads one key at
 * a time through `nextKey()`.
 */

import type { Readable } from 'stream';
import { ESC } from './ansi.ts';

export interface KeyEvent {
  key: string;        // Key name (e.g., 'A', 'ENTER', 'UP', 'F1')
  char?: string;      // Original character if printable
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;      // Cmd on macOS (rarely available in terminal)
}

/** Keyboard stream: stdin, or /dev/tty when stdin is a pipe */
export type TerminalInput = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

// Special key mappings for escape sequences
const ESCAPE_SEQUENCES: Record<string, { key: string; shift?: boolean }> = {
  // Arrow keys
  '[A': { key: 'UP' },
  '[B': { key: 'DOWN' },
  '[C': { key: 'RIGHT' },
  '[D': { key: 'LEFT' },
  'OA': { key: 'UP' },
  'OB': { key: 'DOWN' },
  'OC': { key: 'RIGHT' },
  'OD': { key: 'LEFT' },
  // Arrow keys with modifiers (xterm style)
  '[1;2A': { key: 'UP', shift: true },
  '[1;2B': { key: 'DOWN', shift: true },
  '[1;2C': { key: 'RIGHT', shift: true },
  '[1;2D': { key: 'LEFT', shift: true },
  '[1;5A': { key: 'UP' },  // Ctrl+Up
  '[1;5B': { key: 'DOWN' },
  '[1;5C': { key: 'RIGHT' },
  '[1;5D': { key: 'LEFT' },
  '[1;3A': { key: 'UP' },  // Alt+Up
  '[1;3B': { key: 'DOWN' },
  '[1;3C': { key: 'RIGHT' },
  '[1;3D': { key: 'LEFT' },
  // Home/End
  '[H': { key: 'HOME' },
  '[F': { key: 'END' },
  'OH': { key: 'HOME' },
  'OF': { key: 'END' },
  '[1~': { key: 'HOME' },
  '[4~': { key: 'END' },
  '[7~': { key: 'HOME' },
  '[8~': { key: 'END' },
  // Insert/Delete
  '[2~': { key: 'INSERT' },
  '[3~': { key: 'DELETE' },
  // Shift+Tab
  '[Z': { key: 'TAB', shift: true },
  // Page Up/Down
  '[5~': { key: 'PAGEUP' },
  '[6~': { key: 'PAGEDOWN' },
  // Function keys
  'OP': { key: 'F1' },
  'OQ': { key: 'F2' },
  'OR': { key: 'F3' },
  'OS': { key: 'F4' },
  '[15~': { key: 'F5' },
  '[17~': { key: 'F6' },
  '[18~': { key: 'F7' },
  '[19~': { key: 'F8' },
  '[20~': { key: 'F9' },
  '[21~': { key: 'F10' },
  '[23~': { key: 'F11' },
  '[24~': { key: 'F12' },
  // Alternative function key sequences
  '[[A': { key: 'F1' },
  '[[B': { key: 'F2' },
  '[[C': { key: 'F3' },
  '[[D': { key: 'F4' },
  '[[E': { key: 'F5' },
  '[11~': { key: 'F1' },
  '[12~': { key: 'F2' },
  '[13~': { key: 'F3' },
  '[14~': { key: 'F4' },
};

// Control character mappings
const CTRL_CHARS: Record<number, string> = {
  0: '@',    // Ctrl+@
  1: 'a',
  2: 'b',
  3: 'c',
  4: 'd',
  5: 'e',
  6: 'f',
  7: 'g',
  8: 'h',    // or BACKSPACE
  9: 'i',    // or TAB
  10: 'j',   // or ENTER (LF)
  11: 'k',
  12: 'l',
  13: 'm',   // or ENTER (CR)
  14: 'n',
  15: 'o',
  16: 'p',
  17: 'q',
  18: 'r',
  19: 's',
  20: 't',
  21: 'u',
  22: 'v',
  23: 'w',
  24: 'x',
  25: 'y',
  26: 'z',
  27: '[',   // ESC
  28: '\\',
  29: ']',
  30: '^',
  31: '_',
};

export class InputHandler {
  private pendingKeys: KeyEvent[] = [];
  private waiters: Array<(event: KeyEvent) => void> = [];
  private isRunning: boolean = false;
  private buffer: string = '';
  private escapeTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly escapeTimeout = 50;  // ms to wait for escape sequence
  private readonly onData = (data: string | Buffer): void => {
    this.feed(String(data));
  };

  constructor(private readonly input: TerminalInput) {}

  /**
   * Start listening for input
   */
  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;

    // Set raw mode to get individual keypresses
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.setEncoding('utf8');
    this.input.on('data', this.onData);
    this.input.resume();
  }

  /**
   * Stop listening for input
   */
  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;

    this.input.off('data', this.onData);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }
  }

  /**
   * Resolve with the next key event, queued or yet to come.
   */
  nextKey(): Promise<KeyEvent> {
    const queued = this.pendingKeys.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Process raw input data
   */
  feed(data: string): void {
    this.buffer += data;
    this.parseBuffer();
  }

  /**
   * Parse the input buffer
   */
  private parseBuffer(): void {
    while (this.buffer.length > 0) {
      // Clear any pending escape timer
      if (this.escapeTimer) {
        clearTimeout(this.escapeTimer);
        this.escapeTimer = null;
      }

      const consumed = this.tryParse();
      if (consumed === 0) {
        // Couldn't parse anything yet - might be incomplete escape sequence
        if (this.buffer.startsWith(ESC) && this.buffer.length < 10) {
          // Wait a bit for more data
          this.escapeTimer = setTimeout(() => {
            this.escapeTimer = null;
            // Timeout - treat as plain ESC key
            if (this.buffer.startsWith(ESC)) {
              this.emitKey({ key: 'ESCAPE', ctrl: false, alt: false, shift: false, meta: false });
              this.buffer = this.buffer.slice(1);
              this.parseBuffer();
            }
          }, this.escapeTimeout);
          return;
        }
        // Unknown sequence - skip one character
        this.buffer = this.buffer.slice(1);
      } else {
        this.buffer = this.buffer.slice(consumed);
      }
    }
  }

  /**
   * Try to parse the current buffer
   * Returns number of characters consumed
   */
  private tryParse(): number {
    const firstChar = this.buffer[0];
    if (firstChar === undefined) return 0;
    const firstCode = firstChar.charCodeAt(0);

    // Check for escape sequences
    if (firstChar === ESC && this.buffer.length > 1) {
      // Try to match known escape sequences
      for (const [seq, mapping] of Object.entries(ESCAPE_SEQUENCES)) {
        if (this.buffer.startsWith(ESC + seq)) {
          this.emitKey({
            key: mapping.key,
            ctrl: false,
            alt: false,
            shift: mapping.shift || false,
            meta: false
          });
          return 1 + seq.length;
        }
      }

      const nextChar = this.buffer[1] ?? '';
      const nextCode = nextChar.charCodeAt(0);

      // Don't treat escape sequences as alt+key
      if (nextChar !== '[' && nextChar !== 'O') {
        // Double ESC is a plain Escape press
        if (nextChar === ESC) {
          this.emitKey({ key: 'ESCAPE', ctrl: false, alt: false, shift: false, meta: false });
          return 1;
        }
        // Alt+letter
        if (nextCode >= 32 && nextCode < 127) {
          this.emitKey({
            key: nextChar.toUpperCase(),
            char: nextChar,
            ctrl: false,
            alt: true,
            shift: nextChar !== nextChar.toLowerCase(),
            meta: false
          });
          return 2;
        }
      }

      // CSI sequence we do not know: swallow it whole once complete
      if (nextChar === '[') {
        const match = /^\x1b\[[0-9;?]*[@-~]/.exec(this.buffer);
        if (match) return match[0].length;
      }

      // Unknown escape sequence - wait a bit or process as ESC
      return 0;
    }

    // Lone ESC key
    if (firstChar === ESC) {
      return 0;  // Wait for potential sequence
    }

    // Control characters
    if (firstCode < 32) {
      const event = this.parseControlChar(firstCode);
      if (event) {
        this.emitKey(event);
      }
      return 1;
    }

    // DEL (backspace on most terminals)
    if (firstCode === 127) {
      this.emitKey({ key: 'BACKSPACE', ctrl: false, alt: false, shift: false, meta: false });
      return 1;
    }

    // Regular printable character, including surrogate pairs
    let char = firstChar;
    if (firstCode >= 0xD800 && firstCode <= 0xDBFF && this.buffer.length >= 2) {
      const second = this.buffer.charCodeAt(1);
      if (second >= 0xDC00 && second <= 0xDFFF) {
        char = this.buffer.slice(0, 2);
      }
    }

    this.emitKey({
      key: char.toUpperCase(),
      char: char,
      ctrl: false,
      alt: false,
      shift: char !== char.toLowerCase() && char.toLowerCase() !== char.toUpperCase(),
      meta: false
    });
    return char.length;
  }

  /**
   * Parse control character
   */
  private parseControlChar(code: number): KeyEvent | null {
    switch (code) {
      case 8:  // Ctrl+H or Backspace
        return { key: 'BACKSPACE', ctrl: false, alt: false, shift: false, meta: false };
      case 9:  // Tab
        return { key: 'TAB', ctrl: false, alt: false, shift: false, meta: false };
      case 10: // Line feed (Enter on Unix)
      case 13: // Carriage return (Enter)
        return { key: 'ENTER', ctrl: false, alt: false, shift: false, meta: false };
      case 27: // ESC
        return { key: 'ESCAPE', ctrl: false, alt: false, shift: false, meta: false };
      default: {
        // Ctrl+letter
        const name = CTRL_CHARS[code];
        if (name) {
          return {
            key: name.toUpperCase(),
            ctrl: true,
            alt: false,
            shift: false,
            meta: false
          };
        }
        return null;
      }
    }
  }

  /**
   * Emit key event
   */
  private emitKey(event: KeyEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
    } else {
      this.pendingKeys.push(event);
    }
  }
}
