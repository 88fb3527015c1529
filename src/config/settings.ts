/**
 * Settings Manager
 *
 * Viewer configuration keyed by dotted names, as in settings.json.
 */

export interface ViewerSettings {
  'viewer.wrap': boolean;
  'viewer.lineNumbers': boolean;
  'viewer.horizontalScrollStep': number;
  'viewer.maxBuffers': number;
  'viewer.maxLines': number;
  'viewer.maxLineLength': number;
  'clipboard.command': string;
  'sql.connectionString': string;
  'http.userAgent': string;
}

export type SettingKey = keyof ViewerSettings;

export const BOOLEAN_SETTINGS = ['viewer.wrap', 'viewer.lineNumbers'] as const;
export const NUMBER_SETTINGS = [
  'viewer.horizontalScrollStep',
  'viewer.maxBuffers',
  'viewer.maxLines',
  'viewer.maxLineLength',
] as const;
export const STRING_SETTINGS = ['clipboard.command', 'sql.connectionString', 'http.userAgent'] as const;

export const SETTING_KEYS: readonly SettingKey[] = [
  ...BOOLEAN_SETTINGS,
  ...NUMBER_SETTINGS,
  ...STRING_SETTINGS,
];

export const defaultSettings: ViewerSettings = {
  'viewer.wrap': true,
  'viewer.lineNumbers': true,
  'viewer.horizontalScrollStep': 8,
  'viewer.maxBuffers': 50,
  'viewer.maxLines': 10000,
  'viewer.maxLineLength': 2048,
  'clipboard.command': '',
  'sql.connectionString': '${env:DATABASE_URL}',
  'http.userAgent': 'peek/0.3.0',
};

export class Settings {
  private settings: ViewerSettings;

  constructor() {
    this.settings = { ...defaultSettings };
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): ViewerSettings[K] {
    return this.settings[key];
  }

  /**
   * Get a string setting with `${env:NAME}` references filled in
   */
  getResolved(key: (typeof STRING_SETTINGS)[number]): string {
    return this.resolveEnvVars(this.settings[key]);
  }

  /**
   * Set a setting value
   */
  set<K extends SettingKey>(key: K, value: ViewerSettings[K]): void {
    this.settings[key] = value;
  }

  /**
   * Update multiple settings
   */
  update(partial: Partial<ViewerSettings>): void {
    for (const key of SETTING_KEYS) {
      const value = partial[key];
      if (value !== undefined) {
        this.set(key, value);
      }
    }
  }

  /**
   * Process environment variable substitution
   */
  resolveEnvVars(value: string): string {
    return value.replace(/\$\{env:([^}]+)\}/g, (_, envVar: string) => {
      return process.env[envVar] || '';
    });
  }
}

/**
 * Pick the recognised, well-typed entries out of a parsed settings.json.
 * Unknown keys and values of the wrong type are reported, not applied.
 */
export function parseSettings(raw: unknown): { settings: Partial<ViewerSettings>; problems: string[] } {
  const settings: Partial<ViewerSettings> = {};
  const problems: string[] = [];

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { settings, problems: ['settings must be a JSON object'] };
  }
  const entries = new Map(Object.entries(raw));

  for (const key of BOOLEAN_SETTINGS) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value === 'boolean') settings[key] = value;
    else problems.push(`${key} must be true or false`);
  }
  for (const key of NUMBER_SETTINGS) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value === 'number' && Number.isInteger(value) && value > 0) settings[key] = value;
    else problems.push(`${key} must be a positive integer`);
  }
  for (const key of STRING_SETTINGS) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value === 'string') settings[key] = value;
    else problems.push(`${key} must be a string`);
  }

  for (const key of entries.keys()) {
    if (!SETTING_KEYS.some((known) => known === key)) {
      problems.push(`unknown setting ${key}`);
    }
  }

  return { settings, problems };
}

export const settings = new Settings();

export default settings;
