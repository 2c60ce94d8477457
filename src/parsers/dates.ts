/**
 * Due date handling for assignment imports
 *
 * CSV dates are wall-clock times in the project's timezone. The service stores
 * UTC timestamps as MM/dd/yyyy HH:mm:ss strings.
 */

import { format, isValid, parse, set } from 'date-fns';
import { TZDate } from '@date-fns/tz';
import { UTCDate } from '@date-fns/utc';
import { UsageError } from '../types/index.js';

/** Format the assignments layer expects for dueDate and assignedDate */
export const STORAGE_DATE_FORMAT = 'MM/dd/yyyy HH:mm:ss';

export const DEFAULT_DATE_FORMAT = '%m/%d/%Y %H:%M:%S';

/**
 * strptime directives and their date-fns equivalents
 */
const STRPTIME_TOKENS: Record<string, string> = {
  Y: 'yyyy',
  y: 'yy',
  m: 'MM',
  d: 'dd',
  H: 'HH',
  I: 'hh',
  M: 'mm',
  S: 'ss',
  p: 'a',
  b: 'MMM',
  B: 'MMMM',
};

// Strptime has no default year; neither should a year-less format pick up today's
const REFERENCE_DATE = new UTCDate(1900, 0, 1);

// date-fns places a two-digit year within 50 years of the reference year, so
// 2019 expands 69-99 to 1969-1999 and 00-68 to 2000-2068, as strptime does
const TWO_DIGIT_YEAR_REFERENCE_DATE = new UTCDate(2019, 0, 1);

// Appended to every value so date-fns keeps the parsed fields in UTC instead of
// moving them into the host timezone
const UTC_OFFSET_SUFFIX = ' +00:00';
const UTC_OFFSET_TOKEN = ' xxx';

/**
 * Convert a strptime-style format into a date-fns pattern.
 * Formats without any % directive are taken to be date-fns patterns already.
 *
 * @example
 * toDateFnsPattern('%m/%d/%Y %H:%M:%S') // => 'MM/dd/yyyy HH:mm:ss'
 * toDateFnsPattern('%Y-%m-%dT%H:%M') // => "yyyy-MM-dd'T'HH:mm"
 */
export function toDateFnsPattern(format: string): string {
  if (!format.includes('%')) {
    return format;
  }

  let pattern = '';
  let literal = '';

  const flushLiteral = (): void => {
    if (literal) {
      pattern += quoteLiteral(literal);
      literal = '';
    }
  };

  for (let i = 0; i < format.length; i++) {
    const char = format[i];
    if (char !== '%') {
      literal += char;
      continue;
    }

    i++;
    const directive = format.charAt(i);
    if (directive === '%') {
      literal += '%';
      continue;
    }

    const token = STRPTIME_TOKENS[directive];
    if (!token) {
      throw new UsageError(
        `Unsupported date format directive "%${directive}" in "${format}". Supported: ${Object.keys(STRPTIME_TOKENS).map(d => `%${d}`).join(' ')}`,
        'date_format'
      );
    }
    flushLiteral();
    pattern += token;
  }
  flushLiteral();

  return pattern;
}

function quoteLiteral(text: string): string {
  // date-fns treats every latin letter as a token unless quoted
  return /[A-Za-z']/.test(text) ? `'${text.replace(/'/g, "''")}'` : text;
}

/**
 * Check that an IANA timezone name is known to the runtime
 */
export function isValidTimeZone(timezone: string): boolean {
  if (!timezone) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * Format an instant as a UTC storage timestamp
 */
export function formatUtcTimestamp(date: Date): string {
  return format(new UTCDate(date.getTime()), STORAGE_DATE_FORMAT);
}

/**
 * Find the instant at which the wall clock (held in the UTC fields) shows in the timezone.
 * The offset is read at a first guess and once more at the result, which settles
 * wall clocks near a DST change.
 */
function zonedWallClockToInstant(wallClock: Date, timezone: string): Date {
  const asUtc = wallClock.getTime();
  const offsetAt = (time: number): number => new TZDate(time, timezone).getTimezoneOffset() * 60_000;

  const firstOffset = offsetAt(asUtc);
  const secondOffset = offsetAt(asUtc + firstOffset);
  return new Date(asUtc + secondOffset);
}

function hasTwoDigitYear(pattern: string): boolean {
  return /(^|[^y])yy([^y]|$)/.test(pattern.replace(/'[^']*'/g, ''));
}

/**
 * Parse a CSV due date and normalize it for storage.
 *
 * A time of exactly 00:00:00 is read as "due by the end of that day" and becomes
 * 23:59:59 before the conversion to UTC.
 *
 * @param value - Raw cell value
 * @param pattern - date-fns pattern (see toDateFnsPattern)
 * @param timezone - IANA zone the value is expressed in
 * @returns UTC timestamp in STORAGE_DATE_FORMAT, or null when the value does not match the pattern
 */
export function normalizeDueDate(value: string, pattern: string, timezone: string): string | null {
  const referenceDate = hasTwoDigitYear(pattern) ? TWO_DIGIT_YEAR_REFERENCE_DATE : REFERENCE_DATE;

  // Holds the wall-clock fields in its UTC fields, so host DST gaps never apply
  let wallClock: UTCDate;
  try {
    wallClock = parse(value.trim() + UTC_OFFSET_SUFFIX, pattern + UTC_OFFSET_TOKEN, referenceDate);
  } catch (error) {
    // date-fns rejects malformed patterns (e.g. YYYY, DD) with a RangeError
    if (error instanceof RangeError) {
      throw new UsageError(`Invalid date format "${pattern}": ${error.message}`, 'date_format');
    }
    throw error;
  }

  if (!isValid(wallClock)) {
    return null;
  }

  if (wallClock.getUTCHours() === 0 && wallClock.getUTCMinutes() === 0 && wallClock.getUTCSeconds() === 0) {
    wallClock = set(wallClock, { hours: 23, minutes: 59, seconds: 59 });
  }

  const instant = zonedWallClockToInstant(wallClock, timezone);
  if (!isValid(instant)) {
    return null;
  }

  return formatUtcTimestamp(instant);
}
