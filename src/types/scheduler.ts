// src/types/scheduler.ts
import type { FormatMismatch, ParseFailure } from './extraction.js';

/**
 * A collaborator call for one message failed
 */
export interface FetchFailure {
  kind: 'FetchFailure';
  operation: 'getMessage' | 'listEvents' | 'insertEvent';
  message: string;
}

/**
 * Matching event already on the calendar (not an error)
 */
export interface DuplicateSkip {
  kind: 'DuplicateSkip';
  eventName: string;
  start: string;
}

export type SkipReason = FormatMismatch | ParseFailure | FetchFailure | DuplicateSkip;

export interface SkippedMessage {
  messageId: string;
  reason: SkipReason;
}

/**
 * Settings for one scheduling pass
 */
export interface ScheduleOptions {
  timeZone: string; // IANA zone events are created in
  durationMinutes: number;
  attendees: string[];
}

export interface RunOptions extends ScheduleOptions {
  query: string; // Gmail search query
  maxMessages: number;
}

export interface SchedulerReport {
  considered: number;
  created: number;
  createdEvents: Array<{ messageId: string; eventId: string; htmlLink?: string }>;
  skipped: SkippedMessage[];
  aborted?: string; // Set when the run ended before processing messages
}
