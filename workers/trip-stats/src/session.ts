import type { ResultAsync } from 'neverthrow';
import { CITY_LABELS, describeTimePeriod, filterByTimePeriod } from '@bikeshare-stats/shared';
import type { CityName, LoaderError, TripTable } from '@bikeshare-stats/shared';
import { loadTripTable, resolveCityName } from '@bikeshare-stats/trip-loader';
import type { AppConfig } from './config.ts';
import { pageTrips } from './display.ts';
import { QUESTIONS, askTimePeriod, parseYesNoAnswer, promptUntilValid } from './prompts.ts';
import type { OperatorIO } from './prompts.ts';
import { generateReport, renderStageReport } from './summaries.ts';
import type { Clock } from './summaries.ts';

export interface SessionDeps {
  loadTable: (city: CityName, dataDir: string) => ResultAsync<TripTable, LoaderError>;
  clock: Clock;
}

export const defaultSessionDeps: SessionDeps = {
  loadTable: loadTripTable,
  clock: () => performance.now(),
};

function seconds(started: number, clock: Clock): string {
  return ((clock() - started) / 1000).toFixed(2);
}

async function askRestart(io: OperatorIO): Promise<boolean> {
  io.print('');
  const answer = await io.ask(QUESTIONS.restart);
  return answer.trim().toLowerCase() === 'yes';
}

/**
 * One full pass: city, load, time period, statistics, optional raw trips.
 * Resolves to true when the operator asks for another session.
 */
export async function runSession(
  config: AppConfig,
  io: OperatorIO,
  deps: SessionDeps = defaultSessionDeps
): Promise<boolean> {
  io.print("Hello! Let's explore some US bikeshare data!");
  io.print('');

  const city = await promptUntilValid(io, QUESTIONS.city, resolveCityName);

  let started = deps.clock();
  const loaded = await deps.loadTable(city, config.dataDir);
  if (loaded.isErr()) {
    io.print(`Unable to load ${CITY_LABELS[city]} data: ${loaded.error.message}`);
    return askRestart(io);
  }
  let table = loaded.value;
  io.print(`Loading data took: ${seconds(started, deps.clock)} seconds.`);
  io.print('');

  const period = await askTimePeriod(io);
  if (period.period !== 'none') {
    started = deps.clock();
    table = filterByTimePeriod(table, period);
    io.print(`Filtering data took: ${seconds(started, deps.clock)} seconds.`);
  }

  io.print('');
  io.print('=== Statistics ===');
  io.print(`${CITY_LABELS[city]}, ${describeTimePeriod(period)}: ${table.rows.length} trips`);
  io.print('');

  for (const report of generateReport(table, period, deps.clock)) {
    for (const line of renderStageReport(report)) {
      io.print(line);
    }
  }

  const viewTrips = await promptUntilValid(io, QUESTIONS.viewTrips, parseYesNoAnswer);
  if (viewTrips) {
    await pageTrips(io, table, config.pageSize);
  }

  return askRestart(io);
}

// Each restart is a fresh session with a fresh load; nothing carries over
export async function runSessions(
  config: AppConfig,
  io: OperatorIO,
  deps: SessionDeps = defaultSessionDeps
): Promise<number> {
  let sessions = 0;
  let restart = true;

  while (restart) {
    sessions += 1;
    restart = await runSession(config, io, deps);
  }

  return sessions;
}
