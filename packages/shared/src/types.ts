export type CityName = 'chicago' | 'new york' | 'washington';

export interface TripRecord {
  startTime: Date;
  endTime: Date;
  // Seconds in all three sources
  tripDuration: number;
  startStation: string | null;
  endStation: string | null;
  userType: string | null;
  gender: string | null;
  birthYear: number | null;
}

export interface TripTable {
  city: CityName;
  // Source header in file order
  columns: string[];
  hasGender: boolean;
  hasBirthYear: boolean;
  rows: TripRecord[];
}

export type Granularity = 'none' | 'month' | 'day';

export interface NoTimePeriod {
  period: 'none';
}

export interface DatedTimePeriod {
  period: 'month' | 'day';
  year: number;
  month: number;
  // Inclusive [first, last] day of month
  day: [number, number];
}

export type TimePeriod = NoTimePeriod | DatedTimePeriod;

export interface CountedValue<T> {
  value: T;
  count: number;
}

export interface DurationStats {
  total: number;
  mean: number;
}

export interface StationStats {
  start: CountedValue<string>;
  end: CountedValue<string>;
}

export interface BirthYearStats {
  oldest: number;
  youngest: number;
  mode: number;
}

export type InputError = { type: 'INVALID_INPUT'; message: string };

export type LoaderError = { type: 'DATA_UNAVAILABLE'; message: string };

export type StatsError =
  | { type: 'NO_DATA_IN_RANGE'; message: string }
  | { type: 'COLUMN_ABSENT'; message: string }
  | { type: 'STAGE_FAILED'; message: string };
