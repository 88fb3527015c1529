/**
 * Shell Command Runner
 *
 * Runs a command line through the shell with execa and captures its
 * output. Pagers are forced to `cat` so man and friends print directly.
 */

import { execa } from 'execa';
import { debugLog } from '../debug.ts';
import type { CommandOutput, CommandRunner } from './text-source.ts';

export interface ShellRunnerOptions {
  cwd?: string;
  /** Columns to format man pages for */
  manWidth?: number;
}

export function createShellRunner(options: ShellRunnerOptions = {}): CommandRunner {
  return async (command: string, input?: string): Promise<CommandOutput> => {
    debugLog(`[ShellRunner] Running: ${command}`);
    const result = await execa(command, {
      shell: true,
      reject: false,
      cwd: options.cwd,
      ...(input === undefined ? { stdin: 'ignore' as const } : { input }),
      env: {
        PAGER: 'cat',
        MANPAGER: 'cat',
        ...(options.manWidth ? { MANWIDTH: String(options.manWidth) } : {}),
      },
    });
    debugLog(`[ShellRunner] Exit ${result.exitCode}: ${command}`);
    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode,
    };
  };
}
