// src/utils/calendarDedup.ts
import type { CalendarEventWindow, CalendarService, ExistingEvent } from '../types/calendar.js';

/**
 * Find events already on the calendar for this name inside the window.
 * Text matching is whatever the calendar's full-text query does.
 */
export async function findExistingEvents(
  calendar: CalendarService,
  eventName: string,
  window: CalendarEventWindow
): Promise<ExistingEvent[]> {
  return calendar.listEvents(window, eventName);
}

/**
 * Check if a matching event already exists in the window.
 *
 * Best-effort only: an event created between this check and the insert is
 * not seen. Errors propagate so the caller can skip the message.
 *
 * @returns true when the calendar returned at least one event
 */
export async function checkForDuplicate(
  calendar: CalendarService,
  eventName: string,
  window: CalendarEventWindow
): Promise<boolean> {
  const existing = await findExistingEvents(calendar, eventName, window);
  return existing.length > 0;
}
