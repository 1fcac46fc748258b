// Filename: utils/log.ts

/**
 * Leveled console logger.
 *
 * Levels are plain numbers so callers can compare them and tests can mock the
 * module with literal values. Anything above the configured threshold is dropped.
 */

export const ERR = 1;
export const WARN = 3;
export const LOG = 5;
export const INFO = 7;
export const TMI = 9;

export type LogLevel = typeof ERR | typeof WARN | typeof LOG | typeof INFO | typeof TMI;

function resolveThreshold(): number {
  const raw = process.env.LOG_LEVEL;
  if (!raw) {
    return LOG;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? LOG : parsed;
}

/**
 * Writes a message if its level is within the LOG_LEVEL threshold.
 * Errors and warnings go to stderr.
 */
export function log(message: string, level: LogLevel = LOG): void {
  if (level > resolveThreshold()) {
    return;
  }

  if (level <= ERR) {
    console.error(message);
  } else if (level <= WARN) {
    console.warn(message);
  } else {
    console.log(message);
  }
}

/**
 * Shows only the first few characters of a secret, enough to confirm which
 * key was loaded.
 */
export function maskSecret(secret: string, visible = 5): string {
  if (secret.length <= visible) {
    return "***";
  }
  return `${secret.slice(0, visible)}...`;
}
