const DAY_MS = 24 * 60 * 60 * 1000;

/** Calendar date (UTC) as YYYY-MM-DD. */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(Date.parse(isoDate) + days * DAY_MS));
}

/**
 * Whole days elapsed between two dates or timestamps, floored like a
 * calendar difference. Negative when `to` precedes `from`.
 */
export function wholeDaysBetween(from: string, to: string): number {
  return Math.floor((Date.parse(to) - Date.parse(from)) / DAY_MS);
}

export function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}
