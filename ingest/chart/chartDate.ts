/**
 * Chart week dates. The Hot 100 is published weekly, dated on a Saturday.
 * All arithmetic is in UTC so a YYYY-MM-DD string maps to one calendar day.
 */

const SATURDAY = 6;
const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parse YYYY-MM-DD into a UTC midnight Date; null when invalid (e.g. 2023-02-30). */
export function parseChartDate(text: string): Date | null {
  const match = text.trim().match(DATE_RE);
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (
    date.getUTCFullYear() !== Number(y) ||
    date.getUTCMonth() !== Number(m) - 1 ||
    date.getUTCDate() !== Number(d)
  ) {
    return null;
  }
  return date;
}

export function formatChartDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Snap a date to the nearest Saturday: Sun-Tue go back, Wed-Fri go forward.
 * Strings must be YYYY-MM-DD; Dates are read by their UTC calendar day.
 */
export function toChartWeek(input: Date | string): string {
  const date = typeof input === "string" ? parseChartDate(input) : input;
  if (!date || Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid chart date: ${String(input)}`);
  }
  const day = date.getUTCDay();
  const forward = (SATURDAY - day + 7) % 7;
  const offset = forward <= 3 ? forward : forward - 7;
  const utcMidnight = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  return formatChartDate(new Date(utcMidnight + offset * DAY_MS));
}

/** All Saturdays in a month (1-12), as YYYY-MM-DD. */
export function monthSaturdays(year: number, month: number): string[] {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Invalid month: ${year}-${month}`);
  }
  const out: string[] = [];
  const d = new Date(Date.UTC(year, month - 1, 1));
  d.setUTCDate(d.getUTCDate() + ((SATURDAY - d.getUTCDay() + 7) % 7));
  while (d.getUTCMonth() === month - 1) {
    out.push(formatChartDate(d));
    d.setUTCDate(d.getUTCDate() + 7);
  }
  return out;
}
