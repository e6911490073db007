export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const MS_PER_HOUR = 60 * 60 * 1000;

export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
}

// Stored dates may carry a time part; filtering only looks at the day.
export function toCalendarDate(value: string): string {
  return value.slice(0, 10);
}

export function isWithinDateRange(date: string, start?: string | null, end?: string | null): boolean {
  const day = toCalendarDate(date);
  if (start && day < start) {
    return false;
  }
  if (end && day > end) {
    return false;
  }
  return true;
}

export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

// NaN for an unparseable timestamp, so every comparison against it is false.
export function millisecondsSince(isoTimestamp: string, now: Date): number {
  return now.getTime() - Date.parse(isoTimestamp);
}

/** Timestamp for a mutation that never sorts before the previous one. */
export function nextTimestamp(now: Date, previous?: string | null): string {
  const current = now.toISOString();
  if (previous && previous > current) {
    return previous;
  }
  return current;
}
