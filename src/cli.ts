/**
 * Command Line
 *
 * Turns argv into the descriptors to load at startup plus view flags.
 */

import type { SourceDescriptor } from './core/buffer.ts';
import { isManCommandArg } from './sources/man-detect.ts';

export const VERSION = '0.3.0';

export const USAGE = `
peek - terminal text viewer

Usage: peek [options] [file | - | "man <page>" | -m <command>]...

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  --debug                 Enable debug logging to debug.log
  --no-wrap               Start with line wrapping off
  --no-line-numbers       Start with line numbers hidden
  -m <command>            View the output of a shell command as a man page

Examples:
  peek notes.md src/main.ts   Open two files
  git log | peek              View piped text
  peek "man grep"             View a man page
  peek -m "git help log"      View command output with man highlighting
`;

export interface CliOptions {
  descriptors: SourceDescriptor[];
  /** Set only when a flag overrides the settings */
  wrap?: boolean;
  lineNumbers?: boolean;
  debug: boolean;
}

export type CliParseResult =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

/**
 * @param stdinIsTTY whether stdin is a terminal; piped stdin is read when
 *   no source argument is given
 */
export function parseArgs(argv: readonly string[], stdinIsTTY: boolean): CliParseResult {
  const options: CliOptions = { descriptors: [], debug: false };
  let optionsEnded = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (optionsEnded) {
      options.descriptors.push(positional(arg));
      continue;
    }

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--debug':
        options.debug = true;
        break;
      case '--no-wrap':
        options.wrap = false;
        break;
      case '--no-line-numbers':
        options.lineNumbers = false;
        break;
      case '--':
        optionsEnded = true;
        break;
      case '-m': {
        const command = argv[i + 1];
        if (command === undefined || command.trim() === '') {
          return { kind: 'error', message: '-m requires a command' };
        }
        options.descriptors.push({ type: 'command', command, language: 'man' });
        i++;
        break;
      }
      case '-':
        options.descriptors.push({ type: 'stdin' });
        break;
      default:
        if (arg.startsWith('-')) {
          return { kind: 'error', message: `unknown option: ${arg}` };
        }
        options.descriptors.push(positional(arg));
    }
  }

  if (options.descriptors.length === 0) {
    if (stdinIsTTY) {
      return { kind: 'error', message: 'nothing to view' };
    }
    options.descriptors.push({ type: 'stdin' });
  }

  return { kind: 'run', options };
}

function positional(arg: string): SourceDescriptor {
  if (isManCommandArg(arg)) {
    return { type: 'command', command: arg, language: 'man' };
  }
  return { type: 'file', path: arg };
}
