// src/utils/eventWindow.ts
import { addMinutes, format } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { UTCDate } from '@date-fns/utc';
import type { CalendarEventWindow } from '../types/calendar.js';

const RFC3339_WITH_OFFSET = "yyyy-MM-dd'T'HH:mm:ssXXX";

export const DEFAULT_EVENT_DURATION_MINUTES = 60;

/**
 * Wall-clock time of a parsed event as "yyyy-MM-ddTHH:mm:ss", read from its UTC fields
 */
export function toWallClock(eventTime: Date): string {
  return format(new UTCDate(eventTime.getTime()), "yyyy-MM-dd'T'HH:mm:ss");
}

/**
 * Localize a naive timestamp into a zone and derive its [start, end) window.
 * The UTC fields of eventTime are read as wall-clock time in `timeZone`, so the
 * host zone plays no part. A time inside a DST gap resolves as date-fns-tz does.
 *
 * @param eventTime - Naive time from the subject line
 * @param timeZone - IANA zone (e.g., 'America/Chicago')
 * @param durationMinutes - Event length
 */
export function buildEventWindow(
  eventTime: Date,
  timeZone: string,
  durationMinutes: number = DEFAULT_EVENT_DURATION_MINUTES
): CalendarEventWindow {
  const start = fromZonedTime(toWallClock(eventTime), timeZone);
  const end = addMinutes(start, durationMinutes);

  return {
    start: formatInTimeZone(start, timeZone, RFC3339_WITH_OFFSET),
    end: formatInTimeZone(end, timeZone, RFC3339_WITH_OFFSET),
    timeZone,
  };
}
