import * as readline from 'node:readline/promises';
import type { OperatorIO } from './prompts.ts';

export interface TerminalIO extends OperatorIO {
  close(): void;
}

export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): TerminalIO {
  const rl = readline.createInterface({ input, output });

  // A pending question rejects once input ends (Ctrl+D, closed pipe)
  const closed = new AbortController();
  rl.on('close', () => closed.abort());

  return {
    ask: (question) => rl.question(question, { signal: closed.signal }),
    print: (line) => {
      output.write(`${line}\n`);
    },
    close: () => rl.close(),
  };
}
