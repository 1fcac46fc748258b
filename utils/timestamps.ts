// Filename: utils/timestamps.ts

export const SECONDS_PER_DAY = 86_400;

// Anything at or above this is treated as epoch milliseconds (~ year 33658 in seconds)
const MILLISECONDS_THRESHOLD = 1e12;

/**
 * Normalizes an upstream timestamp to integer epoch seconds.
 * Accepts epoch seconds, epoch milliseconds, or an ISO-8601 string.
 * @returns null when the value cannot be interpreted.
 */
export function toEpochSeconds(value: number | string): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      return null;
    }
    return value >= MILLISECONDS_THRESHOLD
      ? Math.floor(value / 1000)
      : Math.floor(value);
  }

  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    return null;
  }
  return Math.floor(parsed / 1000);
}

export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function toIsoDate(timestampSeconds: number): string {
  return new Date(timestampSeconds * 1000).toISOString().split('T')[0];
}
