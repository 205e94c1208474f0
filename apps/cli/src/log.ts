/**
 * Namespaced logging for the command-line tool.
 *
 * Everything goes to stderr: stdout carries only the report.
 */

const PREFIX = 'presence-histogram';

/** Progress and summary lines. */
export function info(...args: unknown[]): void {
  console.error(`${PREFIX}:`, ...args);
}

/** Non-fatal issues worth investigating. */
export function warn(...args: unknown[]): void {
  console.warn(`${PREFIX}:`, ...args);
}

/** Failures that end the run. */
export function error(...args: unknown[]): void {
  console.error(`${PREFIX}: Error:`, ...args);
}
