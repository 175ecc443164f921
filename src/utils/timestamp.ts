/**
 * Instants as epoch nanoseconds
 * Device timestamps carry up to nanosecond precision, more than a Date holds.
 */

const NS_PER_MILLISECOND = 1_000_000n;

const RFC3339 = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Parse an RFC 3339 timestamp, keeping every fraction digit down to the
 * nanosecond. Returns null when the value is not a valid timestamp.
 */
export function parseEpochNanos(value: string): bigint | null {
  const match = RFC3339.exec(value);
  if (!match) {
    return null;
  }

  const [, wholeSeconds, fraction = '', zone] = match;
  const milliseconds = Date.parse(`${wholeSeconds}${zone.toUpperCase()}`);
  if (Number.isNaN(milliseconds)) {
    return null;
  }

  const subSecond = BigInt(fraction.slice(0, 9).padEnd(9, '0'));
  return BigInt(milliseconds) * NS_PER_MILLISECOND + subSecond;
}

export function dateToEpochNanos(date: Date): bigint | null {
  const milliseconds = date.getTime();
  return Number.isNaN(milliseconds) ? null : BigInt(milliseconds) * NS_PER_MILLISECOND;
}

/**
 * Accepts either representation; null for an invalid Date
 */
export function toEpochNanos(instant: Date | bigint): bigint | null {
  return typeof instant === 'bigint' ? instant : dateToEpochNanos(instant);
}
