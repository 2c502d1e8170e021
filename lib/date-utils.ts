import {
  CalendarDate,
  fromDate,
  toCalendarDate,
  ZonedDateTime,
} from "@internationalized/date";

// Cloud stations report zones like "GMT -8" or "GMT+5:30"
const GMT_OFFSET_PATTERN =
  /^(?:GMT|UTC)\s*(?:([+-]?)\s*(\d{1,2})(?::?(\d{2}))?)?$/i;

/**
 * Parse a "GMT -8" style zone into minutes east of UTC
 * @returns offset in minutes, or null if the string is not in that form
 */
export function parseGmtOffset(timezone: string): number | null {
  const match = GMT_OFFSET_PATTERN.exec(timezone.trim());
  if (!match) return null;

  const [, sign, hours, minutes] = match;
  if (hours === undefined) return 0;

  const total = Number(hours) * 60 + Number(minutes ?? 0);
  return sign === "-" ? -total : total;
}

/**
 * Check whether the runtime knows an IANA zone name
 */
export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Current time in a station zone, falling back to UTC
 */
export function getZonedTime(
  timezone: string | undefined,
  at: Date = new Date(),
): ZonedDateTime {
  if (timezone) {
    const offset = parseGmtOffset(timezone);
    if (offset !== null) {
      return fromDate(at, "UTC").add({ minutes: offset });
    }
    if (isValidTimeZone(timezone)) {
      return fromDate(at, timezone);
    }
  }
  return fromDate(at, "UTC");
}

/**
 * Calendar date in a station zone (UTC if the zone is unknown)
 */
export function getCalendarDateInTimezone(
  timezone: string | undefined,
  at: Date = new Date(),
): CalendarDate {
  return toCalendarDate(getZonedTime(timezone, at));
}

/**
 * Format a CalendarDate to YYYY-MM-DD string
 */
export function formatCalendarDate(date: CalendarDate): string {
  const year = date.year;
  const month = String(date.month).padStart(2, "0");
  const day = String(date.day).padStart(2, "0");

  return `${year}-${month}-${day}`;
}

/**
 * Local date string used for daily counter rollover
 */
export function getLocalDateString(
  timezone: string | undefined,
  at: Date = new Date(),
): string {
  return formatCalendarDate(getCalendarDateInTimezone(timezone, at));
}
