import { describe, expect, it } from 'vitest';
import { localDate, localTime, parseIsoDate, todayIn, toZonedIso, zonedDayRange } from './time.js';

describe('zonedDayRange', () => {
  it('handles a positive offset', () => {
    // 2024-03-09T16:00:00Z is midnight in Shanghai
    expect(zonedDayRange('2024-03-10', 'Asia/Shanghai')).toEqual({ start: 1710000000, end: 1710086400 });
  });

  it('handles a negative offset', () => {
    expect(zonedDayRange('2024-01-15', 'America/New_York')).toEqual({ start: 1705294800, end: 1705381200 });
  });

  it('gives UTC days in UTC', () => {
    expect(zonedDayRange('2024-03-10', 'UTC')).toEqual({ start: 1710028800, end: 1710115200 });
  });

  it('is 23 hours long on the spring-forward day', () => {
    const range = zonedDayRange('2024-03-10', 'America/New_York');
    expect(range).toEqual({ start: 1710046800, end: 1710129600 });
    expect(range.end - range.start).toBe(23 * 3600);
  });

  it('is 25 hours long on the fall-back day', () => {
    const range = zonedDayRange('2024-11-03', 'America/New_York');
    expect(range).toEqual({ start: 1730606400, end: 1730696400 });
    expect(range.end - range.start).toBe(25 * 3600);
  });

  it('puts 23:59:59 and 00:00:01 local into different days', () => {
    for (const tz of ['Asia/Shanghai', 'America/New_York']) {
      const day = zonedDayRange('2024-01-15', tz);
      const next = zonedDayRange('2024-01-16', tz);
      const lastSecond = day.end - 1;
      const firstSecond = day.end + 1;

      expect(day.end).toBe(next.start);
      expect(lastSecond >= day.start && lastSecond < day.end).toBe(true);
      expect(firstSecond >= next.start && firstSecond < next.end).toBe(true);
      expect(localTime(lastSecond, tz)).toBe('23:59');
      expect(localDate(lastSecond, tz)).toBe('2024-01-15');
      expect(localDate(firstSecond, tz)).toBe('2024-01-16');
    }
  });

  it('rejects malformed and impossible dates', () => {
    expect(() => zonedDayRange('2024-3-10', 'UTC')).toThrow(RangeError);
    expect(() => parseIsoDate('2023-02-29')).toThrow(RangeError);
    expect(parseIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
  });
});

describe('formatting', () => {
  it('renders instants with the zone offset', () => {
    expect(toZonedIso(1710000000, 'Asia/Shanghai')).toBe('2024-03-10T00:00:00+08:00');
    expect(toZonedIso(1705294800, 'America/New_York')).toBe('2024-01-15T00:00:00-05:00');
    expect(toZonedIso(1710028800, 'UTC')).toBe('2024-03-10T00:00:00+00:00');
  });

  it('knows the local date at a given instant', () => {
    const now = new Date('2024-03-10T20:00:00Z');
    expect(todayIn('UTC', now)).toBe('2024-03-10');
    expect(todayIn('Asia/Shanghai', now)).toBe('2024-03-11');
  });
});
