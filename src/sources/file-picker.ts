/**
 * File Picker
 *
 * Lets the user choose a file with fzf. fzf draws on the terminal, so the
 * caller suspends the viewer around the call.
 */

import { execa } from 'execa';
import { debugLog } from '../debug.ts';

export type FilePicker = (cwd: string) => Promise<string | null>;

export const PICKER_COMMAND = "find . -type f | fzf --prompt='Open File> ' --height=40% --reverse";

export const pickFileWithFzf: FilePicker = async (cwd) => {
  const result = await execa(PICKER_COMMAND, {
    shell: true,
    cwd,
    reject: false,
    stdin: 'inherit',
    stderr: 'inherit',
  });

  // 130: fzf cancelled with Escape or Ctrl-C
  if (result.exitCode !== 0) {
    debugLog(`[FilePicker] fzf exited with ${result.exitCode}`);
    return null;
  }
  const picked = result.stdout.trim();
  return picked.length > 0 ? picked : null;
};
