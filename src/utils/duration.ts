/**
 * Duration formatting
 * Renders nanosecond durations the way device firmware reports them:
 * "0s", "999ns", "1.5µs", "750ms", "7.5s", "5m10s", "1h0m0s"
 */

const NS_PER_MICROSECOND = 1_000;
const NS_PER_MILLISECOND = 1_000_000;
const NS_PER_SECOND = 1_000_000_000;
const NS_PER_MINUTE = 60 * NS_PER_SECOND;
const NS_PER_HOUR = 60 * NS_PER_MINUTE;

export function formatDuration(nanoseconds: number): string {
  const negative = nanoseconds < 0;
  let remaining = Math.abs(Math.trunc(nanoseconds));
  const sign = negative ? '-' : '';

  if (remaining === 0) {
    return '0s';
  }
  if (remaining < NS_PER_MICROSECOND) {
    return `${sign}${remaining}ns`;
  }
  if (remaining < NS_PER_MILLISECOND) {
    return `${sign}${withFraction(remaining, NS_PER_MICROSECOND)}µs`;
  }
  if (remaining < NS_PER_SECOND) {
    return `${sign}${withFraction(remaining, NS_PER_MILLISECOND)}ms`;
  }

  const hours = Math.floor(remaining / NS_PER_HOUR);
  remaining -= hours * NS_PER_HOUR;
  const minutes = Math.floor(remaining / NS_PER_MINUTE);
  remaining -= minutes * NS_PER_MINUTE;

  let result = sign;
  if (hours > 0) {
    result += `${hours}h`;
  }
  if (hours > 0 || minutes > 0) {
    result += `${minutes}m`;
  }
  return `${result}${withFraction(remaining, NS_PER_SECOND)}s`;
}

/**
 * value / unit as a decimal without trailing zeros
 */
function withFraction(value: number, unit: number): string {
  const whole = Math.floor(value / unit);
  const rest = value % unit;
  if (rest === 0) {
    return String(whole);
  }

  const digits = String(unit).length - 1;
  const fraction = String(rest).padStart(digits, '0').replace(/0+$/, '');
  return `${whole}.${fraction}`;
}
