/**
 * src/utils/dateFormatter.ts
 * Human-readable timestamps for log output.
 */
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import advancedFormat from 'dayjs/plugin/advancedFormat';

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(advancedFormat);

const DEFAULT_TIMEZONE = process.env.TIMEZONE || 'UTC';
const DEFAULT_DATE_FORMAT = process.env.DATE_FORMAT || 'MMM DD, YYYY hh:mm:ss A z'; // May 04, 2025 01:56:21 PM UTC

/**
 * Formats a date or timestamp using the configured format and timezone.
 *
 * @param date - Date object, ISO string or epoch milliseconds
 * @param format - Optional dayjs format string override
 * @param tz - Optional IANA timezone override
 */
export function formatDate(
  date: Date | string | number,
  format: string = DEFAULT_DATE_FORMAT,
  tz: string = DEFAULT_TIMEZONE,
): string {
  return dayjs(date).tz(tz).format(format);
}

export const DateTimeConfig = {
  timezone: DEFAULT_TIMEZONE,
  format: DEFAULT_DATE_FORMAT,
};
