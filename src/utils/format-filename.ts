import { TIMESTAMP_PLACEHOLDER } from '../config/config.schema';

/**
 * Builds the artifact base name from a template such as `dump-{timestamp}`.
 *
 * @param formatString - Template containing the `{timestamp}` placeholder.
 * @param timestamp - Unix seconds captured when the run started.
 */
export function formatFilename(formatString: string, timestamp: number): string {
  return formatString.replace(TIMESTAMP_PLACEHOLDER, String(timestamp));
}
