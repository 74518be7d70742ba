import moment from 'moment-timezone';

export const SECONDS_PER_DAY = 24 * 60 * 60;

const TIME_OF_DAY_FORMATS = ['HH:mm:ss', 'HH:mm'];
const DATE_FORMAT = 'YYYY-MM-DD';

/**
 * Parse "HH:mm" or "HH:mm:ss" into seconds since the start of the broadcast day.
 * Returns null for anything else, including "24:00".
 */
export function parseTimeOfDay(value: string): number | null {
  const parsed = moment.utc(value, TIME_OF_DAY_FORMATS, true);
  if (!parsed.isValid() || parsed.hours() > 23 || value.startsWith('24')) {
    return null;
  }
  return parsed.hours() * 3600 + parsed.minutes() * 60 + parsed.seconds();
}

export function formatTimeOfDay(seconds: number): string {
  return moment.utc(Math.round(seconds * 1000)).format('HH:mm:ss');
}

export function isValidDate(value: string): boolean {
  return moment(value, DATE_FORMAT, true).isValid();
}

export function todayIn(timezone: string): string {
  return moment().tz(timezone).format(DATE_FORMAT);
}

export function isKnownTimezone(timezone: string): boolean {
  return moment.tz.zone(timezone) !== null;
}

/**
 * Year and month directories plus file name for a broadcast date,
 * e.g. 2026-06-01 -> ['2026', '06', '2026-06-01.json'].
 */
export function datePathSegments(date: string): [string, string, string] {
  const parsed = moment(date, DATE_FORMAT, true);
  return [parsed.format('YYYY'), parsed.format('MM'), `${parsed.format(DATE_FORMAT)}.json`];
}
