/**
 * Terminal Acquisition
 *
 * Finds the keyboard and screen to drive. When text arrives on a pipe,
 * keys are read from the controlling terminal instead of stdin.
 */

import * as fs from 'fs';
import * as tty from 'tty';
import { TerminalInitError } from '../core/errors.ts';
import type { TerminalInput } from './input.ts';
import type { Size } from '../state/viewport.ts';

export interface TerminalHandle {
  input: TerminalInput;
  output: NodeJS.WriteStream;
  /** Release anything opened here (the /dev/tty stream) */
  release(): void;
}

/**
 * @throws TerminalInitError when there is no terminal to draw on
 */
export function acquireTerminal(
  stdin: NodeJS.ReadStream = process.stdin,
  stdout: NodeJS.WriteStream = process.stdout
): TerminalHandle {
  if (!stdout.isTTY) {
    throw new TerminalInitError('stdout is not a terminal');
  }

  if (stdin.isTTY) {
    return { input: stdin, output: stdout, release: () => {} };
  }

  let fd: number;
  try {
    fd = fs.openSync('/dev/tty', 'r');
  } catch (error) {
    throw new TerminalInitError('cannot open /dev/tty', { cause: error });
  }

  const input = new tty.ReadStream(fd);
  return {
    input,
    output: stdout,
    release: () => input.destroy(),
  };
}

export function terminalSize(output: Pick<NodeJS.WriteStream, 'columns' | 'rows'>): Size {
  return {
    width: output.columns || 80,
    height: output.rows || 24,
  };
}
