// src/parsers/timeParser.test.ts
import { describe, it, expect, afterEach } from 'vitest';
import { format } from 'date-fns';
import { enUS } from 'date-fns/locale';
import { TimeParser, CONFIRMATION_TIME_FORMATS } from './timeParser.js';
import { toWallClock as naive } from '../utils/eventWindow.js';

describe('TimeParser', () => {
  const parser = new TimeParser();

  describe('accepted formats', () => {
    it('parses full weekday and full month', () => {
      const result = parser.parse('Saturday, January 11, 2025 9:00 AM');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(naive(result.value)).toBe('2025-01-11T09:00:00');
      expect(result.format.id).toBe('weekday-long-month-long');
    });

    it('parses an abbreviated month with the second format', () => {
      const result = parser.parse('Saturday, Jan 11, 2025 9:00 AM');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(naive(result.value)).toBe('2025-01-11T09:00:00');
      expect(result.format).toBe(CONFIRMATION_TIME_FORMATS[1]);
    });

    it('parses an abbreviated weekday with a full month', () => {
      const result = parser.parse('Sat, January 11, 2025 9:00 PM');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(naive(result.value)).toBe('2025-01-11T21:00:00');
      expect(result.format.id).toBe('weekday-short-month-long');
    });

    it('parses abbreviated weekday and month', () => {
      const result = parser.parse('Wed, Mar 5, 2025 12:15 PM');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(naive(result.value)).toBe('2025-03-05T12:15:00');
      expect(result.format.id).toBe('weekday-short-month-short');
    });

    it('treats 12 AM as midnight', () => {
      const result = parser.parse('Sunday, February 2, 2025 12:00 AM');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(naive(result.value)).toBe('2025-02-02T00:00:00');
    });

    it('ignores case of the AM/PM marker and leading zeros', () => {
      const result = parser.parse('Saturday, January 11, 2025 09:00 am');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(naive(result.value)).toBe('2025-01-11T09:00:00');
    });

    it('takes the day from the date when the weekday disagrees', () => {
      const result = parser.parse('Friday, January 11, 2025 9:00 AM');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(naive(result.value)).toBe('2025-01-11T09:00:00');
      expect(result.format.id).toBe('weekday-long-month-long');
    });

    it('accepts runs of whitespace between fields', () => {
      const result = parser.parse('Saturday,  January 11,\t2025  9:00 AM');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(naive(result.value)).toBe('2025-01-11T09:00:00');
    });

    it('requires the weekday width the pattern names', () => {
      const strict = new TimeParser([{ id: 'weekday-long', pattern: 'EEEE, MMMM d, yyyy h:mm a' }]);

      expect(strict.parse('Sat, January 11, 2025 9:00 AM').ok).toBe(false);
      expect(strict.parse('Saturday, January 11, 2025 9:00 AM').ok).toBe(true);
    });

    it.each([
      'Saturday, January 11, 2025 9:00 AM',
      'Saturday, Jan 11, 2025 9:00 AM',
      'Sat, January 11, 2025 9:00 AM',
      'Sat, Jan 11, 2025 9:00 AM',
    ])('formats "%s" back to the same string', (input) => {
      const result = parser.parse(input);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(format(result.value, result.format.pattern, { locale: enUS })).toBe(input);
    });
  });

  describe('failures', () => {
    it('reports the input and every format tried', () => {
      const result = parser.parse('2025-01-11 09:00');

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'ParseFailure',
          input: '2025-01-11 09:00',
          formatsTried: [
            'EEEE, MMMM d, yyyy h:mm a',
            'EEEE, MMM d, yyyy h:mm a',
            'EEE, MMMM d, yyyy h:mm a',
            'EEE, MMM d, yyyy h:mm a',
          ],
        },
      });
    });

    it('rejects a word that is not a weekday', () => {
      const result = parser.parse('Someday, January 11, 2025 9:00 AM');
      expect(result.ok).toBe(false);
    });

    it('rejects a time without an AM/PM marker', () => {
      const result = parser.parse('Saturday, January 11, 2025 9:00');
      expect(result.ok).toBe(false);
    });

    it('rejects a truncated month name', () => {
      const result = parser.parse('Saturday, Janu 11, 2025 9:00 AM');
      expect(result.ok).toBe(false);
    });
  });

  describe('host time zone', () => {
    const hostZone = process.env.TZ;

    afterEach(() => {
      if (hostZone === undefined) {
        delete process.env.TZ;
      } else {
        process.env.TZ = hostZone;
      }
    });

    it.each(['America/Chicago', 'UTC', 'Asia/Tokyo'])(
      'parses a time in the spring-forward gap the same way under %s',
      (zone) => {
        process.env.TZ = zone;

        const result = parser.parse('Sunday, March 9, 2025 2:30 AM');

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(naive(result.value)).toBe('2025-03-09T02:30:00');
        expect(result.value.toISOString()).toBe('2025-03-09T02:30:00.000Z');
      }
    );
  });

  describe('custom formats', () => {
    it('tries a caller-supplied list in order', () => {
      const custom = new TimeParser([
        { id: 'iso-minutes', pattern: 'yyyy-MM-dd HH:mm' },
        { id: 'us-long', pattern: 'MMMM d, yyyy h:mm a' },
      ]);

      const iso = custom.parse('2025-01-11 18:45');
      expect(iso.ok && iso.format.id).toBe('iso-minutes');
      expect(iso.ok && naive(iso.value)).toBe('2025-01-11T18:45:00');

      const us = custom.parse('January 11, 2025 6:45 PM');
      expect(us.ok && us.format.id).toBe('us-long');
    });

    it('requires at least one format', () => {
      expect(() => new TimeParser([])).toThrow();
    });
  });
});
