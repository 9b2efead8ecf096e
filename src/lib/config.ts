// Runtime configuration, read once from the environment
import type { LogLevel } from '../types';

function parseLogLevel(value: string | undefined): LogLevel {
  return value === 'warn' || value === 'error' ? value : 'info';
}

export const config = {
  cacheDir: process.env.NPP_CACHE_DIR || './raw_data',
  nomisApiKey: process.env.NOMIS_API_KEY || undefined,
  databaseUrl: process.env.DATABASE_URL || undefined,
  port: Number(process.env.PORT) || 3001,
  warmCron: process.env.WARM_CRON || '0 4 * * 1',
  warmVariants: (process.env.WARM_VARIANTS || '')
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0),
  publishOnWarm: process.env.PUBLISH_ON_WARM === 'true',
  runInitialWarm: process.env.RUN_INITIAL_WARM === 'true',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  logQueries: process.env.LOG_QUERIES === 'true',
};
