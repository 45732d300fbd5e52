// src/types/extraction.ts

/**
 * One accepted date/time layout, in date-fns pattern syntax
 */
export interface TimeFormat {
  id: string; // Stable name used in logs and tests
  pattern: string; // e.g. "EEEE, MMMM d, yyyy h:mm a"
}

/**
 * Event parsed out of a confirmation subject line.
 * eventTime is naive: its UTC fields hold the wall-clock time from the subject.
 */
export interface EventDetails {
  eventName: string;
  eventTime: Date;
}

/**
 * Subject line did not follow "Registration Confirmation: <name> on <time>"
 */
export interface FormatMismatch {
  kind: 'FormatMismatch';
  subject: string;
  reason: string;
}

/**
 * Time string matched none of the accepted formats
 */
export interface ParseFailure {
  kind: 'ParseFailure';
  input: string;
  formatsTried: string[];
}

export type TimeParseResult =
  | { ok: true; value: Date; format: TimeFormat }
  | { ok: false; error: ParseFailure };

export type ExtractionResult =
  | { ok: true; details: EventDetails }
  | { ok: false; error: FormatMismatch | ParseFailure };
