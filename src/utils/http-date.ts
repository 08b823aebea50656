/**
 * Parser for the fixed `EEE, dd MMM yyyy HH:mm:ss zzz` date pattern used in
 * the `Date` response header, e.g. `Wed, 05 Jan 2022 08:00:00 GMT`.
 *
 * Day and month names are English regardless of the host locale.
 */

const DAY_NAMES = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];

const MONTH_NAMES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// Zone names accepted by the pattern, with their offset from UTC in minutes
const ZONE_OFFSETS = new Map<string, number>([
  ['GMT', 0],
  ['UT', 0],
  ['UTC', 0],
  ['EST', -5 * 60],
  ['EDT', -4 * 60],
  ['CST', -6 * 60],
  ['CDT', -5 * 60],
  ['MST', -7 * 60],
  ['MDT', -6 * 60],
  ['PST', -8 * 60],
  ['PDT', -7 * 60],
]);

const HTTP_DATE_PATTERN = /^([A-Za-z]{3}), (\d{1,2}) ([A-Za-z]{3}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) ([A-Za-z]{2,3})$/;

/**
 * Parse an HTTP date header value
 *
 * Stricter than the bare pattern: the day name must fall on the given date,
 * so `Thu, 05 Jan 2022` is rejected rather than read as 5 January.
 *
 * @returns the instant, or `null` when the value does not match the pattern
 * or names an impossible date (e.g. `31 Feb`, or a weekday that does not fall on that date)
 */
export function parseHttpDate(value: string): Date | null {
  const match = HTTP_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, dayName, dayText, monthName, yearText, hoursText, minutesText, secondsText, zone] = match;

  const month = MONTH_NAMES.indexOf(monthName.toLowerCase());
  const weekday = DAY_NAMES.indexOf(dayName.toLowerCase());
  const offsetMinutes = ZONE_OFFSETS.get(zone.toUpperCase());
  if (month < 0 || weekday < 0 || offsetMinutes === undefined) {
    return null;
  }

  const day = Number(dayText);
  const year = Number(yearText);
  const hours = Number(hoursText);
  const minutes = Number(minutesText);
  const seconds = Number(secondsText);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  // setUTCFullYear keeps years below 100 as written instead of mapping them to 19xx
  const calendarDate = new Date(0);
  calendarDate.setUTCFullYear(year, month, day);
  if (calendarDate.getUTCMonth() !== month || calendarDate.getUTCDate() !== day) {
    return null;
  }
  if (calendarDate.getUTCDay() !== weekday) {
    return null;
  }

  const wallClockMillis = calendarDate.getTime() + ((hours * 60 + minutes) * 60 + seconds) * 1000;
  return new Date(wallClockMillis - offsetMinutes * 60 * 1000);
}
