// src/parsers/timeParser.ts
import { addDays, format, isValid, parse } from 'date-fns';
import { enUS } from 'date-fns/locale';
import { UTCDate } from '@date-fns/utc';
import { z } from 'zod';
import type { TimeFormat, TimeParseResult } from '../types/extraction.js';

/**
 * Accepted confirmation time layouts, tried in this order.
 * Weekday and month names must use the width the pattern names.
 */
export const CONFIRMATION_TIME_FORMATS: readonly TimeFormat[] = [
  { id: 'weekday-long-month-long', pattern: 'EEEE, MMMM d, yyyy h:mm a' },
  { id: 'weekday-long-month-short', pattern: 'EEEE, MMM d, yyyy h:mm a' },
  { id: 'weekday-short-month-long', pattern: 'EEE, MMMM d, yyyy h:mm a' },
  { id: 'weekday-short-month-short', pattern: 'EEE, MMM d, yyyy h:mm a' },
];

const TimeFormatsSchema = z
  .array(
    z.object({
      id: z.string().min(1),
      pattern: z.string().min(1),
    })
  )
  .min(1);

// Leading weekday token plus the literal separator after it, e.g. "EEEE, "
const LEADING_WEEKDAY = /^(E{1,4})([^A-Za-z']*)/;

function weekdayNames(token: 'EEE' | 'EEEE'): Set<string> {
  const sunday = new UTCDate(2025, 0, 5);
  return new Set(
    Array.from({ length: 7 }, (_, i) => format(addDays(sunday, i), token, { locale: enUS }).toLowerCase())
  );
}

const WEEKDAY_NAMES = {
  abbreviated: weekdayNames('EEE'),
  wide: weekdayNames('EEEE'),
};

/**
 * Case-fold and drop leading zeros so "09:00 am" compares equal to "9:00 AM"
 */
function normalize(text: string): string {
  return text.replace(/\b0+(?=\d)/g, '').toLowerCase();
}

/**
 * Remove a leading weekday from the pattern and the input.
 * The weekday only has to be a name of the pattern's width; the date fields decide the day.
 *
 * @returns The remaining input and pattern, or undefined when the weekday name is wrong
 */
function stripWeekday(text: string, pattern: string): { text: string; pattern: string } | undefined {
  const token = LEADING_WEEKDAY.exec(pattern);
  if (!token) return { text, pattern };

  const [prefix = '', weekdayToken = '', separator = ''] = token;
  const names = weekdayToken.length === 4 ? WEEKDAY_NAMES.wide : WEEKDAY_NAMES.abbreviated;

  const word = /^[A-Za-z]+/.exec(text)?.[0];
  if (!word || !names.has(word.toLowerCase())) return undefined;

  const rest = text.slice(word.length);
  if (!rest.startsWith(separator)) return undefined;

  return { text: rest.slice(separator.length), pattern: pattern.slice(prefix.length) };
}

export class TimeParser {
  private readonly formats: readonly TimeFormat[];

  constructor(formats: readonly TimeFormat[] = CONFIRMATION_TIME_FORMATS) {
    this.formats = TimeFormatsSchema.parse(formats);
  }

  /**
   * Parse a human-readable date/time.
   * First format that reproduces the input wins. The result is a UTCDate whose
   * UTC fields hold the wall-clock time; it carries no time zone of its own.
   *
   * @param input - e.g. "Saturday, January 11, 2025 9:00 AM"
   * @param referenceDate - Fills any field a pattern leaves out
   */
  parse(input: string, referenceDate: Date = new Date()): TimeParseResult {
    const text = input.trim().replace(/\s+/g, ' ');
    const reference = new UTCDate(referenceDate.getTime());

    for (const timeFormat of this.formats) {
      const stripped = stripWeekday(text, timeFormat.pattern);
      if (!stripped) continue;

      // A pinned "Z" offset stops date-fns moving the fields into the host zone
      const parsed = parse(`${stripped.text} Z`, `${stripped.pattern} X`, reference, {
        locale: enUS,
      });
      if (!isValid(parsed)) continue;

      // date-fns falls back to shorter month names; formatting back catches that
      const roundTrip = format(parsed, stripped.pattern, { locale: enUS });
      if (normalize(roundTrip) !== normalize(stripped.text)) continue;

      return { ok: true, value: parsed, format: timeFormat };
    }

    return {
      ok: false,
      error: {
        kind: 'ParseFailure',
        input,
        formatsTried: this.formats.map((f) => f.pattern),
      },
    };
  }
}
