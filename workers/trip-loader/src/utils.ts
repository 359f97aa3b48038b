// Parsing helpers for the city trip datasets

import * as path from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { CITY_FILES } from '@bikeshare-stats/shared';
import type { CityName, InputError, LoaderError, TripRecord } from '@bikeshare-stats/shared';

export const REQUIRED_COLUMNS = {
  startTime: 'Start Time',
  endTime: 'End Time',
  tripDuration: 'Trip Duration',
  startStation: 'Start Station',
  endStation: 'End Station',
  userType: 'User Type',
} as const;

export const OPTIONAL_COLUMNS = {
  gender: 'Gender',
  birthYear: 'Birth Year',
} as const;

const CITY_ALIASES: Record<string, CityName> = {
  'chicago': 'chicago',
  'new york': 'new york',
  'new york city': 'new york',
  'washington': 'washington',
};

export function resolveCityName(input: string): Result<CityName, InputError> {
  const key = input.trim().toLowerCase().replace(/\s+/g, ' ');
  const city = CITY_ALIASES[key];
  if (!city) {
    return err({ type: 'INVALID_INPUT', message: 'An invalid city was entered.' });
  }
  return ok(city);
}

export function resolveCityFile(city: CityName, dataDir: string): string {
  return path.join(dataDir, CITY_FILES[city]);
}

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;

// Wall-clock timestamp without a zone, stored as if it were UTC
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const millis = match[7] ? Math.floor(Number(`0.${match[7]}`) * 1000) : 0;
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));

  // Date.UTC rolls 2017-02-30 over into March; reject instead
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }
  return date;
}

export interface ColumnIndex {
  startTime: number;
  endTime: number;
  tripDuration: number;
  startStation: number;
  endStation: number;
  userType: number;
  gender: number | null;
  birthYear: number | null;
}

export function resolveColumns(header: string[]): Result<ColumnIndex, LoaderError> {
  const normalized = header.map((name) => name.trim().toLowerCase());
  const find = (name: string): number => normalized.indexOf(name.toLowerCase());

  const missing = Object.values(REQUIRED_COLUMNS).filter((name) => find(name) === -1);
  if (missing.length > 0) {
    return err({
      type: 'DATA_UNAVAILABLE',
      message: `Missing required columns: ${missing.join(', ')}`,
    });
  }

  const gender = find(OPTIONAL_COLUMNS.gender);
  const birthYear = find(OPTIONAL_COLUMNS.birthYear);

  return ok({
    startTime: find(REQUIRED_COLUMNS.startTime),
    endTime: find(REQUIRED_COLUMNS.endTime),
    tripDuration: find(REQUIRED_COLUMNS.tripDuration),
    startStation: find(REQUIRED_COLUMNS.startStation),
    endStation: find(REQUIRED_COLUMNS.endStation),
    userType: find(REQUIRED_COLUMNS.userType),
    gender: gender === -1 ? null : gender,
    birthYear: birthYear === -1 ? null : birthYear,
  });
}

function cell(row: string[], index: number | null): string | null {
  if (index === null) return null;
  const value = row[index]?.trim() ?? '';
  return value === '' ? null : value;
}

function malformed(rowNumber: number, column: string, value: string | null): LoaderError {
  return {
    type: 'DATA_UNAVAILABLE',
    message: `Row ${rowNumber}: invalid ${column} "${value ?? ''}"`,
  };
}

/**
 * Converts data rows (header excluded) into trip records. Empty cells become
 * null; the first unparseable timestamp, duration or birth year fails the
 * whole load.
 */
export function parseTripRows(rows: string[][], columns: ColumnIndex): Result<TripRecord[], LoaderError> {
  const trips: TripRecord[] = [];

  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    const rowNumber = i + 1;

    const startText = cell(row, columns.startTime);
    const startTime = startText ? parseTimestamp(startText) : null;
    if (!startTime) return err(malformed(rowNumber, REQUIRED_COLUMNS.startTime, startText));

    const endText = cell(row, columns.endTime);
    const endTime = endText ? parseTimestamp(endText) : null;
    if (!endTime) return err(malformed(rowNumber, REQUIRED_COLUMNS.endTime, endText));

    const durationText = cell(row, columns.tripDuration);
    const tripDuration = durationText === null ? NaN : Number(durationText);
    if (!Number.isFinite(tripDuration)) {
      return err(malformed(rowNumber, REQUIRED_COLUMNS.tripDuration, durationText));
    }

    // Birth years are stored as floats ("1989.0") in some sources
    const birthYearText = cell(row, columns.birthYear);
    const birthYear = birthYearText === null ? null : Number(birthYearText);
    if (birthYear !== null && !Number.isFinite(birthYear)) {
      return err(malformed(rowNumber, OPTIONAL_COLUMNS.birthYear, birthYearText));
    }

    trips.push({
      startTime,
      endTime,
      tripDuration,
      startStation: cell(row, columns.startStation),
      endStation: cell(row, columns.endStation),
      userType: cell(row, columns.userType),
      gender: cell(row, columns.gender),
      birthYear: birthYear === null ? null : Math.trunc(birthYear),
    });
  }

  return ok(trips);
}
