/**
 * Calendar timestamp formatting and parsing
 *
 * Timestamps are naive calendar date-times ("YYYY-MM-DD HH:MM:SS") with no
 * zone. They are carried in a Date whose UTC fields hold the calendar
 * fields, so the host time zone never shifts a reading.
 */

/** Length of a formatted timestamp in characters (and ASCII bytes) */
export const TIMESTAMP_LENGTH = 19;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

/**
 * Left-pad a number with zeros
 * @param value - Non-negative integer
 * @param width - Minimum number of digits
 * @returns Zero-padded string
 */
function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Check that a date can be written as a 19-character timestamp
 * @param date - Date to check
 * @returns True for a valid date with a four-digit year
 */
export function isEncodableTimestamp(date: Date): boolean {
  const time = date.getTime();
  if (isNaN(time)) {
    return false;
  }
  const year = date.getUTCFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

/**
 * Drop the sub-second part of a timestamp
 * @param date - Source date (not mutated)
 * @returns New date at whole-second precision
 */
export function truncateToSecond(date: Date): Date {
  const time = date.getTime();
  return new Date(time - (((time % 1000) + 1000) % 1000));
}

/**
 * Format a timestamp as "YYYY-MM-DD"
 * @param date - Timestamp
 * @returns Date part
 */
export function formatDate(date: Date): string {
  return pad(date.getUTCFullYear(), 4) + '-' +
    pad(date.getUTCMonth() + 1, 2) + '-' +
    pad(date.getUTCDate(), 2);
}

/**
 * Format a timestamp as "HH:MM:SS"
 * @param date - Timestamp
 * @returns Time part
 */
export function formatTime(date: Date): string {
  return pad(date.getUTCHours(), 2) + ':' +
    pad(date.getUTCMinutes(), 2) + ':' +
    pad(date.getUTCSeconds(), 2);
}

/**
 * Format a timestamp as "YYYY-MM-DD HH:MM:SS"
 * @param date - Timestamp
 * @returns Full timestamp
 */
export function formatTimestamp(date: Date): string {
  return formatDate(date) + ' ' + formatTime(date);
}

/**
 * Parse a "YYYY-MM-DD HH:MM:SS" timestamp
 *
 * Rejects anything that is not exactly that shape or that names a
 * calendar date-time that does not exist (2023-02-30, 24:00:00, ...).
 *
 * @param text - Timestamp text
 * @returns Parsed date, or null if invalid
 */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (match === null) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hours = Number(match[4]);
  const minutes = Number(match[5]);
  const seconds = Number(match[6]);

  if (year < MIN_YEAR) {
    return null;
  }

  // setUTCFullYear keeps years below 100 as-is (Date.UTC would map them to 19xx)
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, 0);

  if (date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day ||
      date.getUTCHours() !== hours ||
      date.getUTCMinutes() !== minutes ||
      date.getUTCSeconds() !== seconds) {
    return null;
  }

  return date;
}
