import type { CityName } from './types.ts';

export const CITY_FILES: Record<CityName, string> = {
  'chicago': 'chicago.csv',
  'new york': 'new_york_city.csv',
  'washington': 'washington.csv',
};

export const CITY_LABELS: Record<CityName, string> = {
  'chicago': 'Chicago',
  'new york': 'New York',
  'washington': 'Washington',
};

// Every dataset covers the first half of this year only
export const DATA_YEAR = 2017;

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export const SELECTABLE_MONTHS = MONTH_NAMES.slice(0, 6);

// Index 0 is Monday
export const DAY_NAMES = [
  'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday',
] as const;

export const DEFAULT_PAGE_SIZE = 5;
