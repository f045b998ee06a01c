import dotenv from 'dotenv';
import { ConfigError } from '../core/errors.js';
import { configSchema } from './schema.js';
import type { AppConfig } from './types.js';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Config validation failed: ${details}`);
  }
  return parsed.data;
};

export const loadConfigFromDotenv = (): AppConfig => {
  dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || '.env' });
  return loadConfig(process.env);
};
