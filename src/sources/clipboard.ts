/**
 * Clipboard Sink
 *
 * Hands copied lines to the system clipboard through the first clipboard
 * tool that accepts them.
 */

import { ExportFailureError } from '../core/errors.ts';
import { debugLog } from '../debug.ts';
import type { CommandRunner, TextSink } from './text-source.ts';

export const CLIPBOARD_COMMANDS: readonly string[] = [
  'pbcopy',
  'wl-copy',
  'xclip -selection clipboard',
  'xsel --clipboard --input',
];

export class ClipboardSink implements TextSink {
  private _debugName = 'ClipboardSink';
  /** Command that worked last time; tried first */
  private preferred: string | null = null;

  /**
   * @param configured Command from settings; when set, no other tool is tried
   */
  constructor(
    private readonly runCommand: CommandRunner,
    private readonly configured: string = ''
  ) {}

  protected debugLog(msg: string): void {
    debugLog(`[${this._debugName}] ${msg}`);
  }

  private candidates(): string[] {
    if (this.configured) return [this.configured];
    if (this.preferred) {
      return [this.preferred, ...CLIPBOARD_COMMANDS.filter((command) => command !== this.preferred)];
    }
    return [...CLIPBOARD_COMMANDS];
  }

  async write(text: string): Promise<void> {
    for (const command of this.candidates()) {
      const output = await this.runCommand(command, text);
      if (output.exitCode === 0) {
        this.preferred = command;
        this.debugLog(`Copied ${text.length} chars with ${command}`);
        return;
      }
      this.debugLog(`${command} failed with exit ${output.exitCode}`);
    }
    throw new ExportFailureError(this.configured ? `${this.configured} failed` : 'no clipboard tool found');
  }
}
