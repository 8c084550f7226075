const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: number;
  minute: number;
}

function getZonedParts(now: Date, timezone: string): ZonedParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return {
    year: part('year'),
    month: part('month'),
    day: part('day'),
    hour: Number(part('hour')),
    minute: Number(part('minute')),
  };
}

/** Calendar date (YYYY-MM-DD) of `now` in the given IANA timezone. */
export function getTodayDate(timezone: string, now: Date = new Date()): string {
  const { year, month, day } = getZonedParts(now, timezone);
  return `${year}-${month}-${day}`;
}

/** Minutes elapsed since local midnight, never less than 1. */
export function getMinutesSinceMidnight(timezone: string, now: Date = new Date()): number {
  const { hour, minute } = getZonedParts(now, timezone);
  return Math.max(1, hour * 60 + minute);
}

export function isCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}
