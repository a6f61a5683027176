/**
 * Configuration from environment
 */

import { z } from 'zod';
import { homedir } from 'os';
import { join } from 'path';
import { ConfigError } from './ledger/errors.js';

export const DEFAULT_DATABASE_PATH = join(homedir(), '.schema-ledger', 'game.db');

const ConfigSchema = z.object({
  databasePath: z.string().min(1, 'database path must not be empty'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  debug: z.boolean(),
});

export type LedgerConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<LedgerConfig> = {}
): LedgerConfig {
  const parsed = ConfigSchema.safeParse({
    databasePath: env.SCHEMA_LEDGER_DATABASE ?? DEFAULT_DATABASE_PATH,
    logLevel: env.SCHEMA_LEDGER_LOG_LEVEL ?? 'info',
    debug: env.DEBUG === 'true',
    ...overrides,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return parsed.data;
}
