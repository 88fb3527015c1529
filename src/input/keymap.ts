/**
 * Keymap System
 *
 * Maps key strings to viewer commands. A key string is either the typed
 * character itself (`j`, `G`, `$`) or a named key with modifiers
 * (`ctrl+d`, `shift+tab`, `down`).
 */

import defaultKeybindingsJson from '../../config/default-keybindings.json';
import { isViewerCommand, type ViewerCommand } from '../state/commands.ts';
import type { KeyEvent } from '../terminal/input.ts';

export interface KeyBinding {
  key: string;
  command: ViewerCommand;
}

/**
 * Built-in bindings, loaded before ~/.peek/keybindings.json.
 */
export const DEFAULT_KEYBINDINGS: readonly KeyBinding[] = parseKeybindings(defaultKeybindingsJson).bindings;

const MODIFIER_ALIASES: Readonly<Record<string, string>> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  alt: 'alt',
  option: 'alt',
  meta: 'alt',
  shift: 'shift',
};

const MODIFIER_ORDER = ['ctrl', 'alt', 'shift'];

export class Keymap {
  private bindings: Map<string, KeyBinding> = new Map();

  constructor(bindings: readonly KeyBinding[] = DEFAULT_KEYBINDINGS) {
    this.loadBindings(bindings);
  }

  /**
   * Load keybindings; later bindings for the same key win
   */
  loadBindings(bindings: readonly KeyBinding[]): void {
    for (const binding of bindings) {
      this.addBinding(binding);
    }
  }

  private addBinding(binding: KeyBinding): void {
    const key = normalizeKey(binding.key);
    this.bindings.set(key, { key, command: binding.command });
  }

  /**
   * Get command for a key event
   */
  getCommand(event: KeyEvent): ViewerCommand | null {
    return this.bindings.get(eventToKeyString(event))?.command ?? null;
  }
}

/**
 * Canonical form of a binding key: single characters stay as typed,
 * everything else is lower case with modifiers in a fixed order.
 */
export function normalizeKey(key: string): string {
  if (key === ' ') return 'space';
  if (key.length === 1) return key;

  const parts = key.split('+').map((part) => part.trim());
  const base = parts.pop() ?? '';
  const modifiers = new Set(parts.map((part) => MODIFIER_ALIASES[part.toLowerCase()] ?? part.toLowerCase()));

  // shift+g is the same key press as G
  if (base.length === 1 && !modifiers.has('ctrl') && !modifiers.has('alt')) {
    return modifiers.has('shift') ? base.toUpperCase() : base;
  }

  const ordered = MODIFIER_ORDER.filter((modifier) => modifiers.has(modifier));
  return [...ordered, base.toLowerCase()].join('+');
}

export function eventToKeyString(event: KeyEvent): string {
  if (event.char !== undefined && !event.ctrl && !event.alt && !event.meta) {
    return event.char === ' ' ? 'space' : event.char;
  }

  const parts: string[] = [];
  if (event.ctrl) parts.push('ctrl');
  if (event.alt || event.meta) parts.push('alt');
  if (event.shift) parts.push('shift');
  parts.push(event.key.toLowerCase());
  return parts.join('+');
}

/**
 * Validate a parsed keybindings.json: an array of `{ key, command }`.
 */
export function parseKeybindings(raw: unknown): { bindings: KeyBinding[]; problems: string[] } {
  const bindings: KeyBinding[] = [];
  const problems: string[] = [];

  if (!Array.isArray(raw)) {
    return { bindings, problems: ['keybindings must be a JSON array'] };
  }

  for (const entry of raw) {
    if (typeof entry !== 'object' || entry === null) {
      problems.push('keybinding entries must be objects');
      continue;
    }
    const fields = new Map(Object.entries(entry));
    const key = fields.get('key');
    const command = fields.get('command');
    if (typeof key !== 'string' || key.length === 0) {
      problems.push('keybinding without a key');
      continue;
    }
    if (typeof command !== 'string' || !isViewerCommand(command)) {
      problems.push(`unknown command for ${key}: ${String(command)}`);
      continue;
    }
    bindings.push({ key, command });
  }

  return { bindings, problems };
}
