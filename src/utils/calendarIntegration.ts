// src/utils/calendarIntegration.ts

import { google, type calendar_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import type {
  CalendarEventWindow,
  CalendarService,
  CreatedEvent,
  ExistingEvent,
  NewCalendarEvent,
} from '../types/calendar.js';

/**
 * Google Calendar backed CalendarService
 */
export class GoogleCalendarClient implements CalendarService {
  private readonly calendar: calendar_v3.Calendar;

  constructor(
    auth: OAuth2Client,
    private readonly calendarId: string = 'primary'
  ) {
    this.calendar = google.calendar({ version: 'v3', auth });
  }

  /**
   * List single (expanded) events overlapping the window whose text matches
   *
   * @param window - Zoned [start, end) window
   * @param textQuery - Free-text query, matched by Google against summary, description, etc.
   */
  async listEvents(window: CalendarEventWindow, textQuery: string): Promise<ExistingEvent[]> {
    const response = await this.calendar.events.list({
      calendarId: this.calendarId,
      timeMin: window.start,
      timeMax: window.end,
      q: textQuery,
      singleEvents: true,
      orderBy: 'startTime',
    });

    return (response.data.items ?? []).map((evt) => ({
      id: evt.id ?? '',
      summary: evt.summary ?? '(No title)',
      start: evt.start?.dateTime ?? evt.start?.date ?? undefined,
    }));
  }

  /**
   * Insert an event with its attendees
   *
   * @returns Created event ID and link
   */
  async insertEvent(event: NewCalendarEvent): Promise<CreatedEvent> {
    const requestBody: calendar_v3.Schema$Event = {
      summary: event.summary,
      start: {
        dateTime: event.window.start,
        timeZone: event.window.timeZone,
      },
      end: {
        dateTime: event.window.end,
        timeZone: event.window.timeZone,
      },
      attendees: event.attendees.map((email) => ({ email })),
    };

    const response = await this.calendar.events.insert({
      calendarId: this.calendarId,
      requestBody,
    });

    const id = response.data.id;
    if (!id) {
      throw new Error('Calendar API returned an event without an ID');
    }

    return { id, htmlLink: response.data.htmlLink ?? undefined };
  }
}
