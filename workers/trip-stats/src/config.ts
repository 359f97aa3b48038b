import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import { Result, ok, err } from 'neverthrow';
import { DEFAULT_PAGE_SIZE } from '@bikeshare-stats/shared';

export interface AppConfig {
  dataDir: string;
  pageSize: number;
}

export type ConfigError = { type: 'CONFIG_ERROR'; message: string };

// City CSVs ship beside the package unless BIKESHARE_DATA_DIR points elsewhere
export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

export function loadEnvFile(envPath: string = path.resolve(process.cwd(), '.env')): void {
  const result = dotenv.config({ path: envPath });
  if (result.error && !('code' in result.error && result.error.code === 'ENOENT')) {
    console.warn(`[CONFIG] Could not read ${envPath}: ${result.error.message}`);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig, ConfigError> {
  const dataDir = env.BIKESHARE_DATA_DIR?.trim()
    ? path.resolve(env.BIKESHARE_DATA_DIR.trim())
    : DEFAULT_DATA_DIR;

  const pageSizeText = env.BIKESHARE_PAGE_SIZE?.trim();
  if (!pageSizeText) {
    return ok({ dataDir, pageSize: DEFAULT_PAGE_SIZE });
  }

  const pageSize = Number(pageSizeText);
  if (!/^\d+$/.test(pageSizeText) || pageSize < 1) {
    return err({
      type: 'CONFIG_ERROR',
      message: `BIKESHARE_PAGE_SIZE must be a positive integer, got "${pageSizeText}"`,
    });
  }

  return ok({ dataDir, pageSize });
}
