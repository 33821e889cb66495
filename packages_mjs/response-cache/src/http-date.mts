/**
 * HTTP Date header parsing.
 *
 * HTTP dates are always English and always GMT, so names are matched
 * against fixed tables rather than the host locale. Three grammars are
 * accepted, tried in order:
 *
 * - IMF-fixdate: `Sun, 06 Nov 1994 08:49:37 GMT`
 * - RFC 850:     `Sunday, 06-Nov-94 08:49:37 GMT`
 * - asctime:     `Sun Nov  6 08:49:37 1994`
 */

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const DAY_NAMES = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];

const SHORT_DAY = '(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun)';
const LONG_DAY = '(?:Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday)';
const MONTH = '(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)';
const TIME = '(\\d{2}):(\\d{2}):(\\d{2})';

const IMF_FIXDATE = new RegExp(`^${SHORT_DAY}, (\\d{2}) ${MONTH} (\\d{4}) ${TIME} GMT$`, 'i');
const RFC_850 = new RegExp(`^${LONG_DAY}, (\\d{2})-${MONTH}-(\\d{2}) ${TIME} GMT$`, 'i');
const ASCTIME = new RegExp(`^${SHORT_DAY} ${MONTH} +(\\d{1,2}) ${TIME} (\\d{4})$`, 'i');

interface DateFields {
  year: number;
  month: string;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

type DateGrammar = (value: string, now: number) => DateFields | undefined;

const parseImfFixdate: DateGrammar = (value) => {
  const match = IMF_FIXDATE.exec(value);
  if (!match) return undefined;
  const [, day, month, year, hour, minute, second] = match;
  return {
    year: Number(year),
    month,
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };
};

const parseRfc850: DateGrammar = (value, now) => {
  const match = RFC_850.exec(value);
  if (!match) return undefined;
  const [, day, month, year, hour, minute, second] = match;
  return {
    year: expandTwoDigitYear(Number(year), now),
    month,
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };
};

const parseAsctime: DateGrammar = (value) => {
  const match = ASCTIME.exec(value);
  if (!match) return undefined;
  const [, month, day, hour, minute, second, year] = match;
  return {
    year: Number(year),
    month,
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };
};

const GRAMMARS: readonly DateGrammar[] = [parseImfFixdate, parseRfc850, parseAsctime];

/**
 * A two-digit year that would land more than 50 years in the future
 * belongs to the previous century (RFC 9110, section 5.6.7).
 */
function expandTwoDigitYear(year: number, now: number): number {
  const currentYear = new Date(now).getUTCFullYear();
  let expanded = Math.floor(currentYear / 100) * 100 + year;
  if (expanded > currentYear + 50) {
    expanded -= 100;
  }
  return expanded;
}

function toTimestamp(fields: DateFields): number | undefined {
  const month = MONTHS.indexOf(fields.month.toLowerCase());
  if (month === -1) return undefined;
  if (fields.hour > 23 || fields.minute > 59 || fields.second > 60) return undefined;

  const timestamp = Date.UTC(
    fields.year,
    month,
    fields.day,
    fields.hour,
    fields.minute,
    Math.min(fields.second, 59)
  );

  // Date.UTC rolls 31 Feb over into March; reject instead
  const check = new Date(timestamp);
  if (check.getUTCMonth() !== month || check.getUTCDate() !== fields.day) {
    return undefined;
  }

  return timestamp;
}

/**
 * Parse an HTTP date into a Unix timestamp in milliseconds.
 *
 * @returns the instant, or `undefined` when no grammar matches
 */
export function parseHttpDate(
  value: string | undefined | null,
  now: number = Date.now()
): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();

  for (const grammar of GRAMMARS) {
    const fields = grammar(trimmed, now);
    if (fields) {
      return toTimestamp(fields);
    }
  }

  return undefined;
}

/**
 * Format a timestamp as IMF-fixdate, the preferred HTTP date form
 */
export function formatHttpDate(timestamp: number): string {
  const date = new Date(timestamp);
  const dayName = DAY_NAMES[date.getUTCDay()];
  const monthName = MONTHS[date.getUTCMonth()];
  const pad = (n: number): string => String(n).padStart(2, '0');

  return (
    `${capitalize(dayName)}, ${pad(date.getUTCDate())} ${capitalize(monthName)} ${date.getUTCFullYear()} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} GMT`
  );
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
