/**
 * Report stages for a trip table
 *
 * Turns the aggregators into the fixed, ordered list of report stages,
 * runs each one in isolation and formats its lines for the terminal.
 */

import { Result } from 'neverthrow';
import type { CountedValue, StatsError, TimePeriod, TripTable } from '@bikeshare-stats/shared';
import {
  birthYears,
  genders,
  popularDay,
  popularHour,
  popularMonth,
  popularStations,
  popularTrip,
  tripDuration,
  userTypes,
} from './utils.ts';
import { formatColumns } from './display.ts';

// ============================================================================
// Types
// ============================================================================

export type StageKey =
  | 'month'
  | 'day'
  | 'hour'
  | 'duration'
  | 'stations'
  | 'trip'
  | 'users'
  | 'gender'
  | 'birth_years';

export interface Stage {
  key: StageKey;
  label: string;
  compute: (table: TripTable) => Result<string[], StatsError>;
}

export type StagePlan =
  | { kind: 'run'; stage: Stage }
  | { kind: 'skip'; key: StageKey; message: string };

export type StageStatus = 'ok' | 'unavailable' | 'skipped';

export interface StageReport {
  key: StageKey;
  status: StageStatus;
  lines: string[];
  elapsedSeconds: number | null;
  error?: StatsError;
}

export type Clock = () => number;

// ============================================================================
// Line formatting
// ============================================================================

const SECONDS_PER_MINUTE = 60;

function formatDistribution(heading: string, columns: [string, string], counts: CountedValue<string>[]): string[] {
  const rows = counts.map(({ value, count }) => [value, String(count)]);
  return [heading, ...formatColumns([columns, ...rows])];
}

// ============================================================================
// Stages
// ============================================================================

const STAGES: Record<StageKey, Stage> = {
  month: {
    key: 'month',
    label: 'Most popular month',
    compute: (table) => popularMonth(table).map(({ value, count }) => [
      `${value} is the most popular month: ${count} rides.`,
    ]),
  },
  day: {
    key: 'day',
    label: 'Most popular day',
    compute: (table) => popularDay(table).map(({ value, count }) => [
      `${value} is the most popular day: ${count} rides.`,
    ]),
  },
  hour: {
    key: 'hour',
    label: 'Most popular hour',
    compute: (table) => popularHour(table).map(({ value, count }) => [
      `${value} is the most popular hour: ${count} rides.`,
    ]),
  },
  duration: {
    key: 'duration',
    label: 'Trip duration',
    // Sources store seconds; the report speaks minutes
    compute: (table) => tripDuration(table).map(({ total, mean }) => [
      `Total trip duration: ${(total / SECONDS_PER_MINUTE).toFixed(2)} minutes`,
      `Average trip duration: ${(mean / SECONDS_PER_MINUTE).toFixed(2)} minutes`,
    ]),
  },
  stations: {
    key: 'stations',
    label: 'Most popular stations',
    compute: (table) => popularStations(table).map(({ start, end }) => [
      `"${start.value}" is the most popular starting station: ${start.count} rides.`,
      `"${end.value}" is the most popular ending station: ${end.count} rides.`,
    ]),
  },
  trip: {
    key: 'trip',
    label: 'Most popular trip',
    compute: (table) => popularTrip(table).map(({ value, count }) => [
      `"${value}" is the most popular trip: ${count} rides.`,
    ]),
  },
  users: {
    key: 'users',
    label: 'User type counts',
    compute: (table) => userTypes(table).map((counts) =>
      formatDistribution('User type counts:', ['User Type', 'Count'], counts)
    ),
  },
  gender: {
    key: 'gender',
    label: 'Gender counts',
    compute: (table) => genders(table).map((counts) =>
      formatDistribution('Gender counts:', ['Gender', 'Count'], counts)
    ),
  },
  birth_years: {
    key: 'birth_years',
    label: 'Birth year statistics',
    compute: (table) => birthYears(table).map(({ oldest, youngest, mode }) => [
      `Oldest birth year: ${oldest}`,
      `Newest birth year: ${youngest}`,
      `Most common birth year: ${mode}`,
    ]),
  },
};

export function getStage(key: StageKey): Stage {
  return STAGES[key];
}

/**
 * Fixed stage order. Month only runs when nothing is filtered, day of week
 * only when at most one month is selected. Gender and birth year become
 * planned skips when the source has no such column.
 */
export function planStages(table: TripTable, period: TimePeriod): StagePlan[] {
  const run = (key: StageKey): StagePlan => ({ kind: 'run', stage: STAGES[key] });
  const plan: StagePlan[] = [];

  if (period.period === 'none') {
    plan.push(run('month'));
  }
  if (period.period === 'none' || period.period === 'month') {
    plan.push(run('day'));
  }
  plan.push(run('hour'), run('duration'), run('stations'), run('trip'), run('users'));

  plan.push(
    table.hasGender
      ? run('gender')
      : { kind: 'skip', key: 'gender', message: 'Gender data not available.' }
  );
  plan.push(
    table.hasBirthYear
      ? run('birth_years')
      : { kind: 'skip', key: 'birth_years', message: 'Birth year data not available.' }
  );

  return plan;
}

export function runStage(stage: Stage, table: TripTable, clock: Clock): StageReport {
  const started = clock();

  const safeCompute = Result.fromThrowable(stage.compute, (error): StatsError => ({
    type: 'STAGE_FAILED',
    message: error instanceof Error ? error.message : 'Unknown stage error',
  }));
  const result = safeCompute(table).andThen((lines) => lines);

  const elapsedSeconds = (clock() - started) / 1000;

  return result.match<StageReport>(
    (lines) => ({ key: stage.key, status: 'ok', lines, elapsedSeconds }),
    (error) => {
      if (error.type === 'STAGE_FAILED') {
        console.warn(`[REPORT] Stage ${stage.key} failed: ${error.message}`);
      }
      return {
        key: stage.key,
        status: 'unavailable',
        lines: [`${stage.label} not available in filtered data.`],
        elapsedSeconds: null,
        error,
      };
    }
  );
}

export function generateReport(table: TripTable, period: TimePeriod, clock: Clock): StageReport[] {
  return planStages(table, period).map((plan): StageReport =>
    plan.kind === 'run'
      ? runStage(plan.stage, table, clock)
      : { key: plan.key, status: 'skipped', lines: [plan.message], elapsedSeconds: null }
  );
}

export function renderStageReport(report: StageReport): string[] {
  if (report.elapsedSeconds === null) {
    return [...report.lines, ''];
  }
  return [...report.lines, `(${report.elapsedSeconds.toFixed(2)} seconds)`, ''];
}
