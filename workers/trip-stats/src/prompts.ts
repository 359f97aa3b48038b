import { Result, ok, err } from 'neverthrow';
import {
  DATA_YEAR,
  MONTH_NAMES,
  SELECTABLE_MONTHS,
  dayPeriod,
  daysInMonth,
  monthPeriod,
} from '@bikeshare-stats/shared';
import type { DatedTimePeriod, Granularity, InputError, TimePeriod } from '@bikeshare-stats/shared';

/** Line-oriented terminal surface the session talks through. */
export interface OperatorIO {
  ask(question: string): Promise<string>;
  print(line: string): void;
}

export type AnswerParser<T> = (input: string) => Result<T, InputError>;

// A prompt waits for an answer, then lands in valid (terminal) or invalid (ask again)
export type PromptState<T> =
  | { state: 'awaiting' }
  | { state: 'valid'; value: T }
  | { state: 'invalid'; error: InputError };

export const QUESTIONS = {
  city: "Which city would you like to view? ('Chicago', 'New York', or 'Washington'): ",
  granularity: "Filter data? ('month', 'day', or 'none'): ",
  month: 'Which month? January, February, March, April, May, or June? ',
  viewTrips: "View individual trip data? ('yes' or 'no'): ",
  restart: "Would you like to restart? ('yes', or anything else to quit): ",
} as const;

function invalid(message: string): InputError {
  return { type: 'INVALID_INPUT', message };
}

function normalize(input: string): string {
  return input.trim().toLowerCase();
}

export function parseGranularityAnswer(input: string): Result<Granularity, InputError> {
  const answer = normalize(input);
  if (answer === 'month' || answer === 'day' || answer === 'none') {
    return ok(answer);
  }
  return err(invalid('An invalid filter was entered.'));
}

export function parseMonthAnswer(input: string): Result<number, InputError> {
  const answer = normalize(input);
  const index = SELECTABLE_MONTHS.findIndex((name) => name.toLowerCase() === answer);
  if (index === -1) {
    return err(invalid('An invalid month was entered.'));
  }
  return ok(index + 1);
}

export function parseDayAnswer(month: number): AnswerParser<DatedTimePeriod> {
  return (input) => {
    const answer = input.trim();
    if (!/^\d+$/.test(answer)) {
      return err(invalid('An invalid day was entered.'));
    }
    return dayPeriod(month, Number(answer));
  };
}

export function parseYesNoAnswer(input: string): Result<boolean, InputError> {
  const answer = normalize(input);
  if (answer === 'yes') return ok(true);
  if (answer === 'no') return ok(false);
  return err(invalid('An invalid response was entered.'));
}

export function nextPromptState<T>(input: string, parse: AnswerParser<T>): PromptState<T> {
  return parse(input).match<PromptState<T>>(
    (value) => ({ state: 'valid', value }),
    (error) => ({ state: 'invalid', error })
  );
}

export async function promptUntilValid<T>(
  io: OperatorIO,
  question: string,
  parse: AnswerParser<T>
): Promise<T> {
  let state: PromptState<T> = { state: 'awaiting' };

  while (state.state !== 'valid') {
    state = nextPromptState(await io.ask(question), parse);
    if (state.state === 'invalid') {
      io.print(state.error.message);
      io.print('');
    }
  }

  return state.value;
}

export function dayQuestion(month: number, year: number = DATA_YEAR): string {
  return `Which day of ${MONTH_NAMES[month - 1]} ${year}? Valid days are [1...${daysInMonth(year, month)}]: `;
}

export async function askTimePeriod(io: OperatorIO): Promise<TimePeriod> {
  const granularity = await promptUntilValid(io, QUESTIONS.granularity, parseGranularityAnswer);
  if (granularity === 'none') {
    return { period: 'none' };
  }

  if (granularity === 'month') {
    return promptUntilValid(io, QUESTIONS.month, (input) => parseMonthAnswer(input).andThen((m) => monthPeriod(m)));
  }

  const month = await promptUntilValid(io, QUESTIONS.month, parseMonthAnswer);
  return promptUntilValid(io, dayQuestion(month), parseDayAnswer(month));
}
