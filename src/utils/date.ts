/** A calendar month. `month` is 1-based. */
export interface MonthKey {
  year: number;
  month: number;
}

/** Source of the current instant, injected wherever "now" matters. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/** Month key of an instant, in UTC. */
export function monthKeyOf(date: Date): MonthKey {
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

/** Months since year 0; gives month keys a total order. */
export function monthIndex(key: MonthKey): number {
  return key.year * 12 + (key.month - 1);
}

export function monthsBetween(from: MonthKey, to: MonthKey): number {
  return monthIndex(to) - monthIndex(from);
}

export function addMonths(key: MonthKey, months: number): MonthKey {
  const index = monthIndex(key) + months;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

export function compareMonthKeys(a: MonthKey, b: MonthKey): number {
  return monthIndex(a) - monthIndex(b);
}

export function daysInMonth(key: MonthKey): number {
  // Day 0 of the following month is the last day of this one.
  return new Date(Date.UTC(key.year, key.month, 0)).getUTCDate();
}

/** Formats a month key the way snapshot filenames carry it: YYYY_MM. */
export function formatMonthKey(key: MonthKey): string {
  return `${pad(key.year, 4)}_${pad(key.month)}`;
}

/** Parses a YYYY_MM fragment. Returns null for anything else, including month 00 or 13. */
export function parseMonthKey(raw: string): MonthKey | null {
  const match = /^(\d{4})_(\d{2})$/.exec(raw);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;
  return { year, month };
}

/** Query parameter format: YYYY-MM-DD HH:MM. */
export function formatQueryDate(key: MonthKey, day: number, hour: number, minute: number): string {
  return `${pad(key.year, 4)}-${pad(key.month)}-${pad(day)} ${pad(hour)}:${pad(minute)}`;
}

/** Compact UTC timestamp used in output filenames: YYYYMMDDHHMMSS. */
export function formatCaptureTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}
