/**
 * Debug Logging Tests
 */

import { describe, test, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { debugLog, setDebugEnabled } from '../../src/debug.ts';

describe('debugLog', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'peek-debug-'));
  const file = path.join(dir, 'debug.log');

  afterEach(() => {
    setDebugEnabled(false);
    fs.rmSync(file, { force: true });
  });

  test('writes timestamped lines once enabled', () => {
    debugLog('[Test] before');
    expect(fs.existsSync(file)).toBe(false);

    setDebugEnabled(true, file);
    debugLog('[Test] after');

    const lines = fs.readFileSync(file, 'utf8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T.* \[Debug\] Logging to /);
    expect(lines[1]).toMatch(/ \[Test\] after$/);
  });
});
