/**
 * Minimal structured logger for @passgauge/engine.
 *
 * Respects PASSGAUGE_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for JSON output. The level is read on
 * every call so the CLI can switch it after import (--verbose / --quiet).
 *
 * Never pass a password to it.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

export function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

function enabled(threshold: number): boolean {
  return parseLevel(process.env.PASSGAUGE_LOG_LEVEL) <= threshold;
}

export const logger = {
  debug(msg: string) { if (enabled(LEVELS.debug)) process.stderr.write(`[passgauge] ${msg}\n`); },
  info(msg: string)  { if (enabled(LEVELS.info))  process.stderr.write(`[passgauge] ${msg}\n`); },
  warn(msg: string)  { if (enabled(LEVELS.warn))  process.stderr.write(`[passgauge] Warning: ${msg}\n`); },
  error(msg: string) { if (enabled(LEVELS.error)) process.stderr.write(`[passgauge] Error: ${msg}\n`); },
};
