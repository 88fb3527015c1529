/**
 * User Configuration Manager
 *
 * Reads user configuration from the ~/.peek directory. Both files are
 * optional and never written; a missing file leaves the defaults alone.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { debugLog } from '../debug.ts';
import { parseKeybindings, type Keymap } from '../input/keymap.ts';
import { parseSettings, type Settings } from './settings.ts';

/**
 * Strip `//` and block comments so settings files may carry notes.
 * Comment markers inside strings are left alone.
 */
export function stripJsonComments(content: string): string {
  return content.replace(/("(?:\\.|[^"\\])*")|\/\/.*$|\/\*[\s\S]*?\*\//gm, (_match, str: string | undefined) =>
    str ?? ''
  );
}

export class UserConfigManager {
  private configDir: string;
  private settingsPath: string;
  private keybindingsPath: string;

  constructor(configDir: string = path.join(os.homedir(), '.peek')) {
    this.configDir = configDir;
    this.settingsPath = path.join(this.configDir, 'settings.json');
    this.keybindingsPath = path.join(this.configDir, 'keybindings.json');
  }

  /**
   * Apply the user's settings and keybindings over the defaults.
   * Returns one line per problem found; nothing here throws.
   */
  async load(settings: Settings, keymap: Keymap): Promise<string[]> {
    const problems: string[] = [];

    const rawSettings = await this.readJson(this.settingsPath, problems);
    if (rawSettings !== undefined) {
      const parsed = parseSettings(rawSettings);
      settings.update(parsed.settings);
      problems.push(...parsed.problems.map((problem) => `settings.json: ${problem}`));
    }

    const rawBindings = await this.readJson(this.keybindingsPath, problems);
    if (rawBindings !== undefined) {
      const parsed = parseKeybindings(rawBindings);
      keymap.loadBindings(parsed.bindings);
      problems.push(...parsed.problems.map((problem) => `keybindings.json: ${problem}`));
    }

    for (const problem of problems) {
      debugLog(`[UserConfig] ${problem}`);
    }
    return problems;
  }

  /**
   * Parsed JSON content, or undefined when the file is absent or invalid.
   */
  private async readJson(filePath: string, problems: string[]): Promise<unknown> {
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      problems.push(`${path.basename(filePath)}: unreadable`);
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(stripJsonComments(content));
      return parsed;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      problems.push(`${path.basename(filePath)}: ${reason}`);
      return undefined;
    }
  }
}
