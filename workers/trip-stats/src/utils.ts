// Aggregators over a trip table. All pure; none mutate the table.
//
// Tie-break: values are tallied in first-seen order and stably sorted by
// descending count, so among equal counts the value seen first wins.

import { Result, ok, err } from 'neverthrow';
import { DAY_NAMES, MONTH_NAMES } from '@bikeshare-stats/shared';
import type {
  BirthYearStats,
  CountedValue,
  DurationStats,
  StationStats,
  StatsError,
  TripTable,
} from '@bikeshare-stats/shared';

export function countValues<T>(values: Iterable<T | null>): CountedValue<T>[] {
  const counts = new Map<T, number>();
  for (const value of values) {
    if (value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count);
}

export function mostFrequent<T>(values: Iterable<T | null>): CountedValue<T> | null {
  const [top] = countValues(values);
  return top ?? null;
}

function noData(what: string): StatsError {
  return { type: 'NO_DATA_IN_RANGE', message: `No ${what} in the selected period` };
}

function requireTrips(table: TripTable): Result<TripTable, StatsError> {
  return table.rows.length === 0 ? err(noData('trips')) : ok(table);
}

function requireTop<T>(top: CountedValue<T> | null, what: string): Result<CountedValue<T>, StatsError> {
  return top ? ok(top) : err(noData(what));
}

export function popularMonth(table: TripTable): Result<CountedValue<string>, StatsError> {
  return requireTrips(table)
    .andThen((t) => requireTop(mostFrequent(t.rows.map((trip) => trip.startTime.getUTCMonth())), 'start times'))
    .map(({ value, count }): CountedValue<string> => ({ value: MONTH_NAMES[value], count }));
}

export function popularDay(table: TripTable): Result<CountedValue<string>, StatsError> {
  // getUTCDay() counts from Sunday; shift so Monday is 0
  return requireTrips(table)
    .andThen((t) => requireTop(mostFrequent(t.rows.map((trip) => (trip.startTime.getUTCDay() + 6) % 7)), 'start times'))
    .map(({ value, count }): CountedValue<string> => ({ value: DAY_NAMES[value], count }));
}

export function popularHour(table: TripTable): Result<CountedValue<number>, StatsError> {
  return requireTrips(table)
    .andThen((t) => requireTop(mostFrequent(t.rows.map((trip) => trip.startTime.getUTCHours())), 'start times'));
}

export function tripDuration(table: TripTable): Result<DurationStats, StatsError> {
  return requireTrips(table).map((t) => {
    const total = t.rows.reduce((sum, trip) => sum + trip.tripDuration, 0);
    return { total, mean: total / t.rows.length };
  });
}

export function popularStations(table: TripTable): Result<StationStats, StatsError> {
  return requireTrips(table).andThen((t) => {
    const start = mostFrequent(t.rows.map((trip) => trip.startStation));
    const end = mostFrequent(t.rows.map((trip) => trip.endStation));
    if (!start || !end) {
      return err(noData('station names'));
    }
    return ok({ start, end });
  });
}

interface TripPairGroup {
  start: string;
  end: string;
  count: number;
}

// Grouped by ordered (start, end) pair: A to B and B to A are different trips
export function popularTrip(table: TripTable): Result<CountedValue<string>, StatsError> {
  return requireTrips(table).andThen((t) => {
    const groups = t.rows.reduce<Map<string, TripPairGroup>>((acc, trip) => {
      if (trip.startStation === null || trip.endStation === null) return acc;

      const key = `${trip.startStation}|${trip.endStation}`;
      const existing = acc.get(key);
      const group = existing ?? { start: trip.startStation, end: trip.endStation, count: 0 };
      group.count += 1;

      if (!existing) {
        acc.set(key, group);
      }
      return acc;
    }, new Map());

    const [top] = Array.from(groups.values()).sort((a, b) => b.count - a.count);
    if (!top) {
      return err(noData('station pairs'));
    }
    return ok({ value: `${top.start} to ${top.end}`, count: top.count });
  });
}

function distribution(values: (string | null)[], what: string): Result<CountedValue<string>[], StatsError> {
  const counts = countValues(values);
  return counts.length === 0 ? err(noData(what)) : ok(counts);
}

export function userTypes(table: TripTable): Result<CountedValue<string>[], StatsError> {
  return requireTrips(table).andThen((t) => distribution(t.rows.map((trip) => trip.userType), 'user types'));
}

export function genders(table: TripTable): Result<CountedValue<string>[], StatsError> {
  if (!table.hasGender) {
    return err({ type: 'COLUMN_ABSENT', message: `${table.city} data has no gender column` });
  }
  return requireTrips(table).andThen((t) => distribution(t.rows.map((trip) => trip.gender), 'genders'));
}

export function birthYears(table: TripTable): Result<BirthYearStats, StatsError> {
  if (!table.hasBirthYear) {
    return err({ type: 'COLUMN_ABSENT', message: `${table.city} data has no birth year column` });
  }

  return requireTrips(table).andThen((t) => {
    const years = t.rows.flatMap((trip) => (trip.birthYear === null ? [] : [trip.birthYear]));
    const mode = mostFrequent(years);
    if (!mode) {
      return err(noData('birth years'));
    }

    // Math.min(...years) overflows the stack at full dataset size
    const oldest = years.reduce((min, year) => (year < min ? year : min), years[0]);
    const youngest = years.reduce((max, year) => (year > max ? year : max), years[0]);
    return ok({ oldest, youngest, mode: mode.value });
  });
}
