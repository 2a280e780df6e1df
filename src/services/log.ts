/**
 * Namespaced logging for daybook.
 *
 * Everything goes to stderr: stdout carries the MCP transport and the CLI's
 * own output.
 */

const PREFIX = "daybook";

let debugEnabled = process.env.DAYBOOK_DEBUG === "1";

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function debug(...args: unknown[]): void {
  if (!debugEnabled) return;
  console.error(`${PREFIX} [debug]:`, ...args);
}

export function info(...args: unknown[]): void {
  console.error(`${PREFIX}:`, ...args);
}

/** Non-fatal issues: skipped sources, unreadable entries. */
export function warn(...args: unknown[]): void {
  console.error(`${PREFIX} [warn]:`, ...args);
}

export function error(...args: unknown[]): void {
  console.error(`${PREFIX} [error]:`, ...args);
}
