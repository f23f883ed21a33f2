import dotenv from 'dotenv';
import { AppError } from '../core/errors.js';
import { configSchema } from './schema.js';
import type { AppConfig } from './types.js';

/**
 * Parse configuration from the environment. `.env` is read only when `env` is the
 * process environment, so tests can pass a plain object.
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  if (env === process.env) {
    dotenv.config({ path: process.env['DOTENV_CONFIG_PATH'] || '.env' });
  }
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new AppError(`Config validation failed: ${details}`, 'CONFIG_INVALID');
  }
  return parsed.data;
};
