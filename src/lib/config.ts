/**
 * Runtime configuration read from the environment.
 * Engine behaviour settings live in the settings table instead
 * (see settings.repository).
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

export const DEFAULT_DB_PATH = 'worktime.db';
export const DEFAULT_PORT = 3847;
export const DEFAULT_HOST = '127.0.0.1';

const runtimeConfigSchema = z.object({
  WORKTIME_DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  WORKTIME_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  WORKTIME_HOST: z.string().min(1).default(DEFAULT_HOST),
});

export interface RuntimeConfig {
  dbPath: string;
  port: number;
  host: string;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = runtimeConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new ConfigurationError(
      `Invalid environment: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`
    );
  }
  return {
    dbPath: parsed.data.WORKTIME_DB_PATH,
    port: parsed.data.WORKTIME_PORT,
    host: parsed.data.WORKTIME_HOST,
  };
}
