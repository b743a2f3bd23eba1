import { format, fromUnixTime } from 'date-fns';

/**
 * Human-readable form of a Unix timestamp for log lines, e.g. `2001-09-09 01:46:40`.
 */
export function formattedTimestamp(unixSeconds: number): string {
  return format(fromUnixTime(unixSeconds), 'yyyy-MM-dd HH:mm:ss');
}
