/**
 * Debug logging utility.
 * Enable by setting FINGERPAINT_DEBUG=1 in the environment or calling enableDebug().
 */

import { isDebugRequested } from '../config';

// Global debug flag - can be toggled at runtime
let DEBUG_ENABLED = isDebugRequested();

// Log buffer for inspection from a debug overlay or tests
const LOG_BUFFER: string[] = [];
const MAX_LOG_BUFFER = 500;

export function getLogBuffer(): string[] {
  return [...LOG_BUFFER];
}

export function clearLogBuffer(): void {
  LOG_BUFFER.length = 0;
}

export function enableDebug(): void {
  DEBUG_ENABLED = true;
}

export function disableDebug(): void {
  DEBUG_ENABLED = false;
}

export function isDebugEnabled(): boolean {
  return DEBUG_ENABLED;
}

/**
 * Log a debug message with category prefix.
 * Only logs when DEBUG_ENABLED is true.
 */
export function debug(category: string, message: string, data?: unknown): void {
  if (!DEBUG_ENABLED) return;

  const prefix = `[${category}]`;
  const logLine =
    data !== undefined ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;

  LOG_BUFFER.push(logLine);
  if (LOG_BUFFER.length > MAX_LOG_BUFFER) {
    LOG_BUFFER.shift();
  }

  console.log(logLine);
}

/**
 * Create a logger bound to a category, matching the `log` dependency of services.
 */
export function createLogger(category: string): (message: string, ...args: unknown[]) => void {
  return (message, ...args) => {
    debug(category, message, args.length === 0 ? undefined : args);
  };
}
