/**
 * Debug logging utility
 *
 * Centralized logging for the relay. Debug lines go to a file and are only
 * written when enabled; verbose lines are operator-facing console output.
 */

import { appendFileSync } from 'node:fs';

let debugEnabled = false;
let verboseEnabled = true;
let logFile = 'debug.log';

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function setVerboseEnabled(enabled: boolean): void {
  verboseEnabled = enabled;
}

export function setLogFile(path: string): void {
  logFile = path;
}

export function debugLog(msg: string): void {
  if (debugEnabled) {
    appendFileSync(logFile, `[${new Date().toISOString()}] ${msg}\n`);
  }
}

/**
 * Console line with a local timestamp. Also mirrored to the debug log.
 */
export function verboseLog(msg: string, level: 'info' | 'warn' | 'error' = 'info'): void {
  debugLog(msg);
  if (!verboseEnabled) return;

  const line = `  [${new Date().toLocaleTimeString()}] ${msg}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}
