const DAY_MS = 24 * 60 * 60 * 1000;

export interface DayRange {
  /** Inclusive, Unix seconds. */
  start: number;
  /** Exclusive, Unix seconds. */
  end: number;
}

interface LocalParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function localParts(epochMs: number, timeZone: string): LocalParts {
  const parts: LocalParts = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };
  for (const part of formatterFor(timeZone).formatToParts(new Date(epochMs))) {
    switch (part.type) {
      case 'year':
      case 'month':
      case 'day':
      case 'hour':
      case 'minute':
      case 'second':
        parts[part.type] = Number(part.value);
        break;
      default:
        break;
    }
  }
  return parts;
}

/** Offset of `timeZone` from UTC at the given instant, in milliseconds. */
export function timezoneOffsetMs(epochMs: number, timeZone: string): number {
  const p = localParts(epochMs, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - (epochMs - (((epochMs % 1000) + 1000) % 1000));
}

export function parseIsoDate(date: string): { year: number; month: number; day: number } {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) {
    throw new RangeError(`Invalid date '${date}', expected YYYY-MM-DD`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new RangeError(`Invalid date '${date}'`);
  }
  return { year, month, day };
}

function localMidnightMs(year: number, month: number, day: number, timeZone: string): number {
  const guess = Date.UTC(year, month - 1, day);
  const firstOffset = timezoneOffsetMs(guess - timezoneOffsetMs(guess, timeZone), timeZone);
  return guess - firstOffset;
}

/**
 * Convert the local calendar day `[00:00, 24:00)` in `timeZone` into a
 * half-open range of Unix seconds. Days that contain a DST change are 23 or 25
 * hours long.
 */
export function zonedDayRange(date: string, timeZone: string): DayRange {
  const { year, month, day } = parseIsoDate(date);
  const next = new Date(Date.UTC(year, month - 1, day) + DAY_MS);
  const startMs = localMidnightMs(year, month, day, timeZone);
  const endMs = localMidnightMs(next.getUTCFullYear(), next.getUTCMonth() + 1, next.getUTCDate(), timeZone);
  return { start: Math.floor(startMs / 1000), end: Math.floor(endMs / 1000) };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function localDate(epochSeconds: number, timeZone: string): string {
  const p = localParts(epochSeconds * 1000, timeZone);
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}`;
}

export function localTime(epochSeconds: number, timeZone: string): string {
  const p = localParts(epochSeconds * 1000, timeZone);
  return `${pad(p.hour)}:${pad(p.minute)}`;
}

export function todayIn(timeZone: string, now: Date = new Date()): string {
  return localDate(Math.floor(now.getTime() / 1000), timeZone);
}

/** ISO 8601 with the zone's offset, e.g. `2024-03-10T00:00:00+08:00`. */
export function toZonedIso(epochSeconds: number, timeZone: string): string {
  const ms = epochSeconds * 1000;
  const p = localParts(ms, timeZone);
  const offsetMinutes = Math.round(timezoneOffsetMs(ms, timeZone) / 60_000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return (
    `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

export function nowIso(): string {
  return new Date().toISOString();
}
