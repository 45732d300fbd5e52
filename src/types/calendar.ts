// src/types/calendar.ts

/**
 * Zoned [start, end) window for one event
 */
export interface CalendarEventWindow {
  start: string; // RFC 3339 with offset, e.g. "2025-01-11T09:00:00-06:00"
  end: string;
  timeZone: string; // IANA zone (e.g., 'America/Chicago')
}

/**
 * Event already on the calendar, as returned by a window + text query
 */
export interface ExistingEvent {
  id: string;
  summary: string;
  start?: string;
}

/**
 * Insert request for a new event
 */
export interface NewCalendarEvent {
  summary: string;
  window: CalendarEventWindow;
  attendees: string[]; // Email addresses
}

export interface CreatedEvent {
  id: string;
  htmlLink?: string;
}

/**
 * Calendar collaborator used by the scheduler
 */
export interface CalendarService {
  listEvents(window: CalendarEventWindow, textQuery: string): Promise<ExistingEvent[]>;
  insertEvent(event: NewCalendarEvent): Promise<CreatedEvent>;
}
