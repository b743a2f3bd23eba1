// Greedy prefix: the last `-<digits>.` in the name wins, so `dump-1700000000.tgz.enc`
// and `nested/dump-1700000000.tgz.enc` both yield 1700000000.
const TIMESTAMP_PATTERN = /^.*-(\d+)\..*$/s;

/**
 * Reads the creation timestamp (Unix seconds) embedded in an artifact name.
 *
 * @returns `null` when the name carries no `-<digits>.` segment.
 */
export function extractArtifactTimestamp(fileName: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(fileName);
  if (!match) {
    return null;
  }
  const timestamp = Number(match[1]);
  return Number.isSafeInteger(timestamp) ? timestamp : null;
}

/** Strictly older than the threshold; an artifact exactly at the limit is kept. */
export function isExpired(timestamp: number, now: number, thresholdSeconds: number): boolean {
  return now - timestamp > thresholdSeconds;
}
