import test from 'ava';
import { err } from 'neverthrow';
import { generateReport, getStage, planStages, renderStageReport, runStage } from '../src/summaries.ts';
import type { Clock, Stage, StagePlan } from '../src/summaries.ts';
import type { StatsError } from '@bikeshare-stats/shared';
import { createTable, trip } from './helpers/fixtures.ts';

// Each call advances a quarter second, so every stage takes 0.25s
function steppingClock(): Clock {
  let now = 0;
  return () => {
    now += 250;
    return now;
  };
}

function planKeys(plan: StagePlan[]): string[] {
  return plan.map((p) => (p.kind === 'run' ? p.stage.key : `skip:${p.key}`));
}

const sampleTable = createTable([
  trip({ start: '2017-01-02 08:00:00', duration: 600, userType: 'Subscriber', gender: 'Male', birthYear: 1980 }),
  trip({ start: '2017-01-02 08:30:00', duration: 1200, userType: 'Customer', gender: 'Female', birthYear: 1990 }),
]);

// planStages tests
test('planStages runs every stage when nothing is filtered', t => {
  t.deepEqual(planKeys(planStages(sampleTable, { period: 'none' })), [
    'month', 'day', 'hour', 'duration', 'stations', 'trip', 'users', 'gender', 'birth_years',
  ]);
});

test('planStages drops the month stage for a single month', t => {
  const plan = planStages(sampleTable, { period: 'month', year: 2017, month: 1, day: [1, 31] });
  t.deepEqual(planKeys(plan), ['day', 'hour', 'duration', 'stations', 'trip', 'users', 'gender', 'birth_years']);
});

test('planStages drops month and weekday stages for a single day', t => {
  const plan = planStages(sampleTable, { period: 'day', year: 2017, month: 1, day: [2, 2] });
  t.deepEqual(planKeys(plan), ['hour', 'duration', 'stations', 'trip', 'users', 'gender', 'birth_years']);
});

test('planStages skips demographics the source does not have', t => {
  const table = createTable([trip()], { hasGender: false, hasBirthYear: false });
  const plan = planStages(table, { period: 'none' });

  t.deepEqual(planKeys(plan).slice(-2), ['skip:gender', 'skip:birth_years']);
  t.deepEqual(plan.slice(-2), [
    { kind: 'skip', key: 'gender', message: 'Gender data not available.' },
    { kind: 'skip', key: 'birth_years', message: 'Birth year data not available.' },
  ]);
});

// runStage tests
test('runStage formats the stage lines and times the stage', t => {
  const report = runStage(getStage('duration'), sampleTable, steppingClock());

  t.is(report.status, 'ok');
  t.deepEqual(report.lines, ['Total trip duration: 30.00 minutes', 'Average trip duration: 15.00 minutes']);
  t.is(report.elapsedSeconds, 0.25);
});

test('runStage marks a stage with nothing to report as unavailable', t => {
  const table = createTable([trip({ gender: null })]);
  const report = runStage(getStage('gender'), table, steppingClock());

  t.is(report.status, 'unavailable');
  t.deepEqual(report.lines, ['Gender counts not available in filtered data.']);
  t.is(report.elapsedSeconds, null);
  t.is(report.error?.type, 'NO_DATA_IN_RANGE');
});

test('runStage contains a stage that throws', t => {
  const broken: Stage = {
    key: 'hour',
    label: 'Most popular hour',
    compute: () => {
      throw new Error('boom');
    },
  };
  const report = runStage(broken, sampleTable, steppingClock());

  t.is(report.status, 'unavailable');
  t.deepEqual(report.error, { type: 'STAGE_FAILED', message: 'boom' });
  t.deepEqual(report.lines, ['Most popular hour not available in filtered data.']);
});

test('runStage passes through a stage error result', t => {
  const failing: Stage = {
    key: 'trip',
    label: 'Most popular trip',
    compute: () => err<string[], StatsError>({ type: 'NO_DATA_IN_RANGE', message: 'No station pairs in the selected period' }),
  };
  t.is(runStage(failing, sampleTable, steppingClock()).error?.message, 'No station pairs in the selected period');
});

// generateReport tests
test('generateReport produces the single-day report in order', t => {
  const reports = generateReport(sampleTable, { period: 'day', year: 2017, month: 1, day: [2, 2] }, steppingClock());

  t.deepEqual(reports.map((r) => r.key), ['hour', 'duration', 'stations', 'trip', 'users', 'gender', 'birth_years']);
  t.true(reports.every((r) => r.status === 'ok'));
  t.deepEqual(reports.map((r) => r.lines), [
    ['8 is the most popular hour: 2 rides.'],
    ['Total trip duration: 30.00 minutes', 'Average trip duration: 15.00 minutes'],
    [
      '"A" is the most popular starting station: 2 rides.',
      '"B" is the most popular ending station: 2 rides.',
    ],
    ['"A to B" is the most popular trip: 2 rides.'],
    ['User type counts:', 'User Type   Count', 'Subscriber  1', 'Customer    1'],
    ['Gender counts:', 'Gender  Count', 'Male    1', 'Female  1'],
    ['Oldest birth year: 1980', 'Newest birth year: 1990', 'Most common birth year: 1980'],
  ]);
});

test('generateReport names the month and weekday when unfiltered', t => {
  const reports = generateReport(sampleTable, { period: 'none' }, steppingClock());
  t.deepEqual(reports[0]?.lines, ['January is the most popular month: 2 rides.']);
  t.deepEqual(reports[1]?.lines, ['Monday is the most popular day: 2 rides.']);
});

test('generateReport keeps going after an empty filter result', t => {
  const reports = generateReport(createTable([]), { period: 'none' }, steppingClock());

  t.is(reports.length, 9);
  t.true(reports.every((r) => r.status === 'unavailable'));
  t.deepEqual(reports[0]?.lines, ['Most popular month not available in filtered data.']);
});

// renderStageReport tests
test('renderStageReport appends the timing line for completed stages', t => {
  const report = runStage(getStage('hour'), sampleTable, steppingClock());
  t.deepEqual(renderStageReport(report), ['8 is the most popular hour: 2 rides.', '(0.25 seconds)', '']);
});

test('renderStageReport prints skipped stages without timing', t => {
  const table = createTable([trip()], { hasGender: false });
  const [, , , , , , , gender] = generateReport(table, { period: 'none' }, steppingClock());

  t.is(gender?.status, 'skipped');
  t.deepEqual(gender && renderStageReport(gender), ['Gender data not available.', '']);
});
