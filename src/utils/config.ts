// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_ADMIN_PASSWORD = 'admin123';

const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  DATABASE_URL: z.string().url().startsWith('postgresql://'),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(5),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  SEED_ADMIN_USERNAME: z.string().min(1).max(50).default('admin'),
  SEED_ADMIN_EMAIL: z.string().email().max(100).default('admin@backmeup.com'),
  SEED_ADMIN_PASSWORD: z.string().min(1).max(256).default(DEFAULT_ADMIN_PASSWORD),
  SEED_ADMIN_FULL_NAME: z.string().max(100).default('System Administrator'),
});

export type Config = z.infer<typeof ConfigSchema>;

let _config: Config | null = null;

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = ConfigSchema.safeParse(env);

  if (!result.success) {
    const messages = Object.entries(result.error.flatten().fieldErrors)
      .map(([key, errors]) => `  ${key}: ${(errors ?? []).join(', ')}`)
      .join('\n');

    throw new ConfigError(`Invalid environment configuration:\n${messages}`);
  }

  _config = result.data;
  return _config;
}

export function getConfig(): Config {
  if (!_config) {
    throw new ConfigError('Config not loaded. Call loadConfig() first.');
  }
  return _config;
}
