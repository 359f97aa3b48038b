import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig, loadEnvFile } from './config.ts';
import { runSessions } from './session.ts';
import { createTerminalIO } from './terminal.ts';

export async function main(): Promise<number> {
  loadEnvFile();

  const configResult = loadConfig();
  if (configResult.isErr()) {
    console.error(`[CLI] Invalid configuration: [${configResult.error.type}] ${configResult.error.message}`);
    return 1;
  }

  const io = createTerminalIO();
  try {
    await runSessions(configResult.value, io);
    return 0;
  } catch (error) {
    // Input closed mid-prompt
    console.error(`[CLI] Session ended: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  } finally {
    io.close();
  }
}

const entry = process.argv[1];
if (entry && path.resolve(entry) === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error) => {
      console.error('[CLI] Unexpected error:', error);
      process.exitCode = 1;
    }
  );
}
