import type { RetentionPeriod, RetentionUnit } from '../../../types/mixed';
import { ConfigurationError } from '../../../infrastructure/errors';

export const SECONDS_PER_UNIT: Readonly<Record<RetentionUnit, number>> = {
  d: 86_400,
  h: 3_600,
  m: 60,
};

const RETENTION_PATTERN = /^(\d+)([dhm])$/;

function isRetentionUnit(value: string): value is RetentionUnit {
  return value in SECONDS_PER_UNIT;
}

/**
 * Parses a retention setting such as `7d`, `12h` or `45m`.
 * Zero is accepted; anything that is not a non-negative integer followed by one unit letter is not.
 *
 * @throws {@link ConfigurationError} for any other input.
 */
export function parseRetentionPeriod(value: string): RetentionPeriod {
  const match = RETENTION_PATTERN.exec(value);
  const magnitude = match ? Number(match[1]) : NaN;
  const unit = match?.[2];

  if (!unit || !isRetentionUnit(unit) || !Number.isSafeInteger(magnitude)) {
    throw new ConfigurationError(`Unable to handle retention value: '${value}'. Aborting.`);
  }

  const seconds = magnitude * SECONDS_PER_UNIT[unit];
  if (!Number.isSafeInteger(seconds)) {
    throw new ConfigurationError(`Unable to handle retention value: '${value}'. Aborting.`);
  }

  return { magnitude, unit, seconds };
}
