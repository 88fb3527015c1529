/**
 * Debug Logging
 *
 * Appends timestamped lines to debug.log when --debug is given.
 * The TUI owns the terminal, so nothing here writes to stdout or stderr.
 */

import * as fs from 'fs';
import * as path from 'path';

let enabled = false;
let logFile = path.join(process.cwd(), 'debug.log');

export function setDebugEnabled(value: boolean, file?: string): void {
  enabled = value;
  if (file) {
    logFile = file;
  }
  if (enabled) {
    debugLog(`[Debug] Logging to ${logFile}`);
  }
}

/**
 * Write a line to the debug log. A no-op unless logging is enabled.
 */
export function debugLog(message: string): void {
  if (!enabled) return;
  try {
    fs.appendFileSync(logFile, `${new Date().toISOString()} ${message}\n`);
  } catch {
    // Stop logging after the first failed write.
    enabled = false;
  }
}
