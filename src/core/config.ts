import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Runtime configuration, read from the environment once at startup.
 */

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** Column spacing assumed when a voting-authority sub-header is missing */
export const DEFAULT_COLUMN_MARGIN = 10;

const envSchema = z.object({
  SEC_USER_AGENT: z.string().min(1).default('edgar-13f-holdings contact@example.com'),
  EDGAR_HOLDINGS_CACHE_DIR: z.string().min(1).default(join(homedir(), '.edgar-13f-holdings')),
  SEC_REQUESTS_PER_SECOND: z.coerce.number().positive().max(10).default(10),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  FIXED_WIDTH_COLUMN_MARGIN: z.coerce.number().int().positive().default(DEFAULT_COLUMN_MARGIN),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, issues.join('\n'));
  }
  return parsed.data;
}

let cached: AppConfig | null = null;

/** Lazily loaded process-wide config */
export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
