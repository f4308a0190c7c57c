/**
 * Counter record timestamps
 *
 * Stored as a compact local-time string (YYYYMMDDHHmmss). The value is
 * informational only; no logic reads it back.
 */

type TimestampPart = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second';

const TIMESTAMP_PARTS: readonly TimestampPart[] = ['year', 'month', 'day', 'hour', 'minute', 'second'];

const isTimestampPart = (type: string): type is TimestampPart =>
  TIMESTAMP_PARTS.some((part) => part === type);

/**
 * Format a date as YYYYMMDDHHmmss in the given IANA time zone
 *
 * @example
 * formatCounterTimestamp(new Date('2024-01-15T18:30:05Z'), 'America/Chicago') // '20240115123005'
 */
export function formatCounterTimestamp(date: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });

  const parts: Partial<Record<TimestampPart, string>> = {};
  for (const part of formatter.formatToParts(date)) {
    if (isTimestampPart(part.type)) {
      parts[part.type] = part.value;
    }
  }

  return TIMESTAMP_PARTS.map((part) => parts[part] ?? '00').join('');
}
