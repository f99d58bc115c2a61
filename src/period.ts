/**
 * Validity periods. Months and years are fixed day multiples, not calendar months.
 */

export const PERIOD_UNITS = ['day', 'month', 'year'] as const;
export type PeriodUnit = (typeof PERIOD_UNITS)[number];

export const DAYS_PER_UNIT: Record<PeriodUnit, number> = {
  day: 1,
  month: 30,
  year: 365,
};

const DAY_MS = 24 * 60 * 60 * 1000;

/** `Day`, `days`, `MONTHS` -> canonical unit; null when unrecognised. */
export function normalizePeriodUnit(raw: string): PeriodUnit | null {
  const s = raw.trim().toLowerCase();
  const singular = s.endsWith('s') ? s.slice(0, -1) : s;
  return PERIOD_UNITS.find((u) => u === singular) ?? null;
}

export function periodDays(count: number, unit: PeriodUnit): number {
  return count * DAYS_PER_UNIT[unit];
}

export function computeExpiry(from: Date, count: number, unit: PeriodUnit): Date {
  return new Date(from.getTime() + periodDays(count, unit) * DAY_MS);
}

export function formatPeriod(count: number, unit: PeriodUnit): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}
