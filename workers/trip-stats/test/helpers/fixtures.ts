import type { OperatorIO } from '../../src/prompts.ts';
import type { TripRecord, TripTable } from '@bikeshare-stats/shared';

export interface TripOverrides {
  start?: string;
  duration?: number;
  from?: string | null;
  to?: string | null;
  userType?: string | null;
  gender?: string | null;
  birthYear?: number | null;
}

// Timestamps are wall-clock "YYYY-MM-DD HH:MM:SS", stored as UTC like the loader does
export function trip(overrides: TripOverrides = {}): TripRecord {
  const startTime = new Date(`${(overrides.start ?? '2017-01-02 08:00:00').replace(' ', 'T')}Z`);
  const duration = overrides.duration ?? 600;
  return {
    startTime,
    endTime: new Date(startTime.getTime() + duration * 1000),
    tripDuration: duration,
    startStation: overrides.from === undefined ? 'A' : overrides.from,
    endStation: overrides.to === undefined ? 'B' : overrides.to,
    userType: overrides.userType === undefined ? 'Subscriber' : overrides.userType,
    gender: overrides.gender ?? null,
    birthYear: overrides.birthYear ?? null,
  };
}

export function createTable(
  rows: TripRecord[],
  options: { hasGender?: boolean; hasBirthYear?: boolean } = {}
): TripTable {
  const hasGender = options.hasGender ?? true;
  const hasBirthYear = options.hasBirthYear ?? true;
  return {
    city: 'chicago',
    columns: [
      'Start Time', 'End Time', 'Trip Duration', 'Start Station', 'End Station', 'User Type',
      ...(hasGender ? ['Gender'] : []),
      ...(hasBirthYear ? ['Birth Year'] : []),
    ],
    hasGender,
    hasBirthYear,
    rows,
  };
}

export interface ScriptedIO {
  io: OperatorIO;
  questions: string[];
  output: string[];
}

// Answers questions in order; running out of answers rejects like a closed terminal
export function createScriptedIO(answers: string[]): ScriptedIO {
  const queue = [...answers];
  const questions: string[] = [];
  const output: string[] = [];

  return {
    questions,
    output,
    io: {
      ask: async (question) => {
        questions.push(question);
        const answer = queue.shift();
        if (answer === undefined) {
          throw new Error(`No scripted answer for: ${question}`);
        }
        return answer;
      },
      print: (line) => {
        output.push(line);
      },
    },
  };
}
