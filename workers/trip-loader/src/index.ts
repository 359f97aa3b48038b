import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { parse } from 'csv-parse/sync';
import { Result, ResultAsync, err } from 'neverthrow';
import type { CityName, LoaderError, TripTable } from '@bikeshare-stats/shared';
import { resolveCityFile, resolveColumns, parseTripRows } from './utils.ts';

export {
  REQUIRED_COLUMNS,
  OPTIONAL_COLUMNS,
  resolveCityName,
  resolveCityFile,
  parseTimestamp,
  resolveColumns,
  parseTripRows,
} from './utils.ts';
export type { ColumnIndex } from './utils.ts';

function isRowList(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(
    (row) => Array.isArray(row) && row.every((field) => typeof field === 'string')
  );
}

const parseCsv = Result.fromThrowable(
  (content: string): string[][] => {
    const records: unknown = parse(content, {
      bom: true,
      skip_empty_lines: true,
      // Short rows leave trailing cells empty; extra fields still fail
      relax_column_count_less: true,
    });
    if (!isRowList(records)) {
      throw new Error('CSV parser returned unexpected records');
    }
    return records;
  },
  (error): LoaderError => ({
    type: 'DATA_UNAVAILABLE',
    message: error instanceof Error ? error.message : 'Unknown CSV parse error',
  })
);

export function parseTripCsv(
  content: string,
  city: CityName
): Result<TripTable, LoaderError> {
  const parsed = parseCsv(content);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const [header, ...rows] = parsed.value;
  if (!header) {
    return err({ type: 'DATA_UNAVAILABLE', message: 'file is empty' });
  }

  const columnsResult = resolveColumns(header);
  if (columnsResult.isErr()) {
    return err(columnsResult.error);
  }
  const columns = columnsResult.value;

  return parseTripRows(rows, columns).map((trips): TripTable => ({
    city,
    columns: header.map((name) => name.trim()),
    hasGender: columns.gender !== null,
    hasBirthYear: columns.birthYear !== null,
    rows: trips,
  }));
}

export function loadTripTable(city: CityName, dataDir: string): ResultAsync<TripTable, LoaderError> {
  const source = resolveCityFile(city, dataDir);
  const fileName = path.basename(source);

  return ResultAsync.fromPromise(
    readFile(source, 'utf8'),
    (error): LoaderError => ({
      type: 'DATA_UNAVAILABLE',
      message: `Cannot read ${fileName}: ${error instanceof Error ? error.message : 'Unknown read error'}`,
    })
  )
    .andThen((content) =>
      parseTripCsv(content, city).mapErr((error): LoaderError => ({
        type: 'DATA_UNAVAILABLE',
        message: `${fileName}: ${error.message}`,
      }))
    )
    .map((table) => {
      console.warn(
        `[LOADER] Loaded ${table.rows.length} trips from ${fileName}` +
        ` (gender: ${table.hasGender ? 'yes' : 'no'}, birth year: ${table.hasBirthYear ? 'yes' : 'no'})`
      );
      return table;
    });
}
