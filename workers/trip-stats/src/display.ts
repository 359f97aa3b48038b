import type { TripRecord, TripTable } from '@bikeshare-stats/shared';
import type { OperatorIO } from './prompts.ts';

interface DisplayColumn {
  header: string;
  value: (trip: TripRecord) => string;
}

function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

const BASE_COLUMNS: DisplayColumn[] = [
  { header: 'Start Time', value: (trip) => formatTimestamp(trip.startTime) },
  { header: 'End Time', value: (trip) => formatTimestamp(trip.endTime) },
  { header: 'Trip Duration', value: (trip) => String(trip.tripDuration) },
  { header: 'Start Station', value: (trip) => trip.startStation ?? '' },
  { header: 'End Station', value: (trip) => trip.endStation ?? '' },
  { header: 'User Type', value: (trip) => trip.userType ?? '' },
];

const GENDER_COLUMN: DisplayColumn = { header: 'Gender', value: (trip) => trip.gender ?? '' };
const BIRTH_YEAR_COLUMN: DisplayColumn = {
  header: 'Birth Year',
  value: (trip) => (trip.birthYear === null ? '' : String(trip.birthYear)),
};

function displayColumns(table: TripTable): DisplayColumn[] {
  return [
    ...BASE_COLUMNS,
    ...(table.hasGender ? [GENDER_COLUMN] : []),
    ...(table.hasBirthYear ? [BIRTH_YEAR_COLUMN] : []),
  ];
}

/** Left-justifies every column to its widest cell, two spaces apart. */
export function formatColumns(rows: string[][]): string[] {
  const widths = rows.reduce<number[]>((acc, row) => {
    row.forEach((cell, i) => {
      acc[i] = Math.max(acc[i] ?? 0, cell.length);
    });
    return acc;
  }, []);

  return rows.map((row) =>
    row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd()
  );
}

export function formatTripRows(table: TripTable, offset: number, limit: number): string[] {
  const columns = displayColumns(table);
  const header = columns.map((column) => column.header);
  const body = table.rows
    .slice(offset, offset + limit)
    .map((trip) => columns.map((column) => column.value(trip)));
  return formatColumns([header, ...body]);
}

export async function pageTrips(io: OperatorIO, table: TripTable, pageSize: number): Promise<void> {
  io.print('');
  io.print('User trip details:');

  if (table.rows.length === 0) {
    io.print('No trips in the selected period.');
    return;
  }

  for (let offset = 0; offset < table.rows.length; offset += pageSize) {
    for (const line of formatTripRows(table, offset, pageSize)) {
      io.print(line);
    }

    if (offset + pageSize >= table.rows.length) {
      io.print('End of trip details file.');
      return;
    }

    const answer = (await io.ask("Continue? ('c', anything else to stop): ")).trim().toLowerCase();
    if (answer !== 'c' && answer !== 'continue') {
      return;
    }
    io.print('');
  }
}
