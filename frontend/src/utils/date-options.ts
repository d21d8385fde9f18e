import { daysInMonth } from '@recall-curve/shared';

/** Years offered around the current one. */
export const YEAR_SPAN = 2;

function range(from: number, to: number): string[] {
  const values: string[] = [];
  for (let n = from; n <= to; n++) {
    values.push(String(n));
  }
  return values;
}

/**
 * Years from `currentYear - 2` to `currentYear + 2`. A selected year outside
 * that window (e.g. from a loaded entry) is added in order.
 */
export function yearOptions(currentYear: number, selected?: string): string[] {
  const years = range(currentYear - YEAR_SPAN, currentYear + YEAR_SPAN);
  if (selected && !years.includes(selected)) {
    years.push(selected);
    years.sort((a, b) => Number(a) - Number(b));
  }
  return years;
}

export function monthOptions(): string[] {
  return range(1, 12);
}

export function dayOptions(year: string, month: string): string[] {
  return range(1, daysInMonth(Number(year), Number(month)));
}

/**
 * Keep the selected day valid after the year or month changes
 * (e.g. 31 -> 30 when switching to April).
 */
export function clampDay(day: string, year: string, month: string): string {
  const max = daysInMonth(Number(year), Number(month));
  return Number(day) > max ? String(max) : day;
}
