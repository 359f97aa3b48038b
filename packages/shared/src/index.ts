// Types
export type {
  CityName,
  TripRecord,
  TripTable,
  Granularity,
  NoTimePeriod,
  DatedTimePeriod,
  TimePeriod,
  CountedValue,
  DurationStats,
  StationStats,
  BirthYearStats,
  InputError,
  LoaderError,
  StatsError,
} from './types.ts';

// Constants
export {
  CITY_FILES,
  CITY_LABELS,
  DATA_YEAR,
  MONTH_NAMES,
  SELECTABLE_MONTHS,
  DAY_NAMES,
  DEFAULT_PAGE_SIZE,
} from './constants.ts';

// Time periods
export {
  daysInMonth,
  dateKey,
  validateMonth,
  monthPeriod,
  dayPeriod,
  periodBounds,
  filterByTimePeriod,
  describeTimePeriod,
} from './time-period.ts';
