// src/utils/eventWindow.test.ts
import { describe, it, expect, afterEach } from 'vitest';
import { UTCDate } from '@date-fns/utc';
import { buildEventWindow, toWallClock } from './eventWindow.js';

describe('buildEventWindow', () => {
  it('reads the naive time as wall-clock time in the target zone', () => {
    const window = buildEventWindow(new UTCDate(2025, 0, 11, 9, 0), 'America/Chicago');

    expect(window).toEqual({
      start: '2025-01-11T09:00:00-06:00',
      end: '2025-01-11T10:00:00-06:00',
      timeZone: 'America/Chicago',
    });
  });

  it('uses the daylight saving offset in summer', () => {
    const window = buildEventWindow(new UTCDate(2025, 6, 12, 18, 30), 'America/Chicago', 90);

    expect(window.start).toBe('2025-07-12T18:30:00-05:00');
    expect(window.end).toBe('2025-07-12T20:00:00-05:00');
  });

  it('rolls the end over midnight', () => {
    const window = buildEventWindow(new UTCDate(2025, 0, 11, 23, 30), 'America/Chicago');

    expect(window.end).toBe('2025-01-12T00:30:00-06:00');
  });

  it('supports zones east of UTC', () => {
    const window = buildEventWindow(new UTCDate(2025, 0, 11, 9, 0), 'Asia/Tokyo');

    expect(window.start).toBe('2025-01-11T09:00:00+09:00');
    expect(window.end).toBe('2025-01-11T10:00:00+09:00');
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
      'gives the same window for a spring-forward gap time under %s',
      (zone) => {
        process.env.TZ = zone;

        const window = buildEventWindow(new UTCDate(2025, 2, 9, 2, 30), 'America/Chicago');

        expect(window).toEqual({
          start: '2025-03-09T01:30:00-06:00',
          end: '2025-03-09T03:30:00-05:00',
          timeZone: 'America/Chicago',
        });
      }
    );

    it.each(['America/Chicago', 'Asia/Tokyo'])('ignores the host zone %s for ordinary times', (zone) => {
      process.env.TZ = zone;

      const window = buildEventWindow(new UTCDate(2025, 0, 11, 9, 0), 'America/Chicago');

      expect(window.start).toBe('2025-01-11T09:00:00-06:00');
    });
  });
});

describe('toWallClock', () => {
  it('reads the UTC fields', () => {
    expect(toWallClock(new UTCDate(2025, 0, 11, 21, 5))).toBe('2025-01-11T21:05:00');
  });
});
