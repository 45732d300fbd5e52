// src/parsers/subjectExtractor.ts
import { TimeParser } from './timeParser.js';
import type { ExtractionResult, FormatMismatch } from '../types/extraction.js';

export const REGISTRATION_MARKER = 'Registration Confirmation: ';
export const TIME_SEPARATOR = ' on ';

function mismatch(subject: string, reason: string): { ok: false; error: FormatMismatch } {
  return { ok: false, error: { kind: 'FormatMismatch', subject, reason } };
}

/**
 * Strict matcher for "Registration Confirmation: <name> on <time>".
 * Any deviation in wording or punctuation fails closed.
 */
export class SubjectExtractor {
  constructor(private readonly timeParser: TimeParser = new TimeParser()) {}

  extract(subject: string): ExtractionResult {
    const markerAt = subject.indexOf(REGISTRATION_MARKER);
    if (markerAt === -1) {
      return mismatch(subject, `missing "${REGISTRATION_MARKER.trim()}" marker`);
    }

    const remainder = subject.slice(markerAt + REGISTRATION_MARKER.length);
    const parts = remainder.split(TIME_SEPARATOR);
    if (parts.length !== 2) {
      return mismatch(
        subject,
        `expected exactly one "${TIME_SEPARATOR.trim()}" separator, found ${parts.length - 1}`
      );
    }

    const [rawName = '', rawTime = ''] = parts;
    const eventName = rawName.trim();
    const timeText = rawTime.trim();

    if (!eventName) {
      return mismatch(subject, 'event name is empty');
    }

    const parsedTime = this.timeParser.parse(timeText);
    if (!parsedTime.ok) {
      return parsedTime;
    }

    return {
      ok: true,
      details: { eventName, eventTime: parsedTime.value },
    };
  }
}
