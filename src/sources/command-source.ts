/**
 * Command Source
 *
 * Captures the output of a shell command: `man grep`, an explicit `-m`
 * command, or a `w3m -dump` page.
 */

import { LoadFailureError } from '../core/errors.ts';
import type { CommandOutput, CommandRunner, DescriptorOf, SourceResult, TextSource } from './text-source.ts';

export class CommandSource implements TextSource<DescriptorOf<'command'>> {
  constructor(private readonly runCommand: CommandRunner) {}

  async read(descriptor: DescriptorOf<'command'>): Promise<SourceResult> {
    let output: CommandOutput;
    try {
      output = await this.runCommand(descriptor.command);
    } catch (error) {
      throw new LoadFailureError(descriptor.command, 'could not run command', { cause: error });
    }

    // A failing command that still printed something is shown as is
    if (output.stdout.length === 0) {
      const reason = output.stderr.trim().split('\n')[0] || `exit code ${output.exitCode}`;
      throw new LoadFailureError(descriptor.command, reason);
    }
    return { text: output.stdout, language: descriptor.language };
  }
}

/**
 * Command line that dumps a web page as text.
 */
export function webDumpCommand(url: string, quote: (value: string) => string): string {
  return `w3m -dump ${quote(url)}`;
}
