/** 3000-01-01T00:00:00Z in seconds. Anything smaller is read as seconds. */
export const SECONDS_CUTOFF = 32_503_680_000;

/**
 * Normalize a Unix timestamp given in seconds or milliseconds to milliseconds.
 */
export function normalizeTimestamp(timestamp: number): number {
  if (timestamp < SECONDS_CUTOFF) {
    return timestamp * 1000;
  }
  return timestamp;
}

/** Format epoch milliseconds as "YYYY-MM-DD HH:MM:SS UTC". */
export function formatTimestamp(timestampMs: number): string {
  const iso = new Date(timestampMs).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

/** UTC calendar day ("YYYY-MM-DD") of a timestamp in seconds. */
export function dayBucket(timestampSecs: number): string {
  return new Date(timestampSecs * 1000).toISOString().slice(0, 10);
}

export function toUnixSeconds(timestampMs: number): number {
  return Math.floor(timestampMs / 1000);
}
