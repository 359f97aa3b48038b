import { Result, ok, err } from 'neverthrow';
import type { DatedTimePeriod, InputError, TimePeriod, TripTable } from './types.ts';
import { DATA_YEAR, MONTH_NAMES, SELECTABLE_MONTHS } from './constants.ts';

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Calendar date of a timestamp as a sortable yyyymmdd integer.
 * Reads UTC components: timestamps are parsed as zone-less wall-clock values.
 */
export function dateKey(date: Date): number {
  return date.getUTCFullYear() * 10000 + (date.getUTCMonth() + 1) * 100 + date.getUTCDate();
}

export function validateMonth(month: number): Result<number, InputError> {
  if (!Number.isInteger(month) || month < 1 || month > SELECTABLE_MONTHS.length) {
    return err({
      type: 'INVALID_INPUT',
      message: `Month must be between 1 and ${SELECTABLE_MONTHS.length}, got ${month}`,
    });
  }
  return ok(month);
}

export function monthPeriod(month: number, year: number = DATA_YEAR): Result<DatedTimePeriod, InputError> {
  return validateMonth(month).map((m): DatedTimePeriod => ({
    period: 'month',
    year,
    month: m,
    day: [1, daysInMonth(year, m)],
  }));
}

export function dayPeriod(month: number, day: number, year: number = DATA_YEAR): Result<DatedTimePeriod, InputError> {
  return validateMonth(month).andThen((m): Result<DatedTimePeriod, InputError> => {
    const lastDay = daysInMonth(year, m);
    if (!Number.isInteger(day) || day < 1 || day > lastDay) {
      return err({
        type: 'INVALID_INPUT',
        message: `Day must be between 1 and ${lastDay} for ${MONTH_NAMES[m - 1]} ${year}, got ${day}`,
      });
    }
    const period: DatedTimePeriod = { period: 'day', year, month: m, day: [day, day] };
    return ok(period);
  });
}

/**
 * Inclusive bounds of a period as yyyymmdd keys, or null when the period
 * does not restrict anything.
 */
export function periodBounds(period: TimePeriod): [number, number] | null {
  if (period.period === 'none') return null;
  const base = period.year * 10000 + period.month * 100;
  return [base + period.day[0], base + period.day[1]];
}

export function filterByTimePeriod(table: TripTable, period: TimePeriod): TripTable {
  const bounds = periodBounds(period);
  if (!bounds) return table;

  const [start, end] = bounds;
  const rows = table.rows.filter((trip) => {
    const key = dateKey(trip.startTime);
    return key >= start && key <= end;
  });

  return { ...table, rows };
}

export function describeTimePeriod(period: TimePeriod): string {
  if (period.period === 'none') {
    return `all of ${DATA_YEAR} (${SELECTABLE_MONTHS[0]} to ${SELECTABLE_MONTHS[SELECTABLE_MONTHS.length - 1]})`;
  }
  const monthName = MONTH_NAMES[period.month - 1] ?? `month ${period.month}`;
  if (period.period === 'month') {
    return `${monthName} ${period.year}`;
  }
  return `${monthName} ${period.day[0]}, ${period.year}`;
}
