/**
 * Settings Tests
 */

import { describe, test, expect, afterEach } from 'vitest';
import { Settings, defaultSettings, parseSettings } from '../../../src/config/settings.ts';

describe('Settings', () => {
  afterEach(() => {
    delete process.env.PEEK_TEST_DB;
  });

  test('starts from the defaults', () => {
    const settings = new Settings();
    expect(settings.get('viewer.wrap')).toBe(true);
    expect(settings.get('viewer.horizontalScrollStep')).toBe(defaultSettings['viewer.horizontalScrollStep']);
  });

  test('update applies only the given keys', () => {
    const settings = new Settings();
    settings.update({ 'viewer.horizontalScrollStep': 4, 'viewer.lineNumbers': false });
    expect(settings.get('viewer.horizontalScrollStep')).toBe(4);
    expect(settings.get('viewer.lineNumbers')).toBe(false);
    expect(settings.get('viewer.wrap')).toBe(true);
  });

  test('getResolved fills in environment references', () => {
    process.env.PEEK_TEST_DB = 'postgres://localhost/test';
    const settings = new Settings();
    settings.set('sql.connectionString', 'db=${env:PEEK_TEST_DB}');
    expect(settings.getResolved('sql.connectionString')).toBe('db=postgres://localhost/test');
  });

  test('unset environment references resolve to empty text', () => {
    const settings = new Settings();
    settings.set('sql.connectionString', '${env:PEEK_TEST_DB}');
    expect(settings.getResolved('sql.connectionString')).toBe('');
  });
});

describe('parseSettings', () => {
  test('keeps well-typed entries and reports the rest', () => {
    const result = parseSettings({
      'viewer.wrap': false,
      'viewer.maxLines': 0,
      'clipboard.command': 5,
      'editor.fontSize': 12,
    });
    expect(result.settings).toEqual({ 'viewer.wrap': false });
    expect(result.problems).toEqual([
      'viewer.maxLines must be a positive integer',
      'clipboard.command must be a string',
      'unknown setting editor.fontSize',
    ]);
  });

  test('rejects anything but an object', () => {
    expect(parseSettings([])).toEqual({ settings: {}, problems: ['settings must be a JSON object'] });
    expect(parseSettings(null).problems).toEqual(['settings must be a JSON object']);
  });
});
