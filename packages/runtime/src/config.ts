// Environment configuration

import { z } from 'zod';
import { DEFAULT_PROVIDER } from '@roadspeed/protocol';
import { ConfigError } from './errors.js';

export const REFRESH_POLICIES = ['manual', 'interval', 'on-write'] as const;
export type RefreshPolicy = (typeof REFRESH_POLICIES)[number];

const schema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().min(1).default(10),
  DEFAULT_PROVIDER: z.string().min(1).default(DEFAULT_PROVIDER),
  REFRESH_POLICY: z.enum(REFRESH_POLICIES).default('manual'),
  REFRESH_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
});

export type Env = z.infer<typeof schema>;

export type Config = {
  /** Postgres connection string; in-memory storage when absent */
  databaseUrl?: string;
  databaseMaxConnections: number;
  defaultProvider: string;
  refreshPolicy: RefreshPolicy;
  refreshIntervalMs: number;
  logLevel: Env['LOG_LEVEL'];
  port: number;
};

/**
 * Validate and load configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Treat empty strings as unset so `DATABASE_URL=` falls back to in-memory
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = schema.safeParse(present);
  if (!parsed.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(parsed.error.flatten().fieldErrors)) {
      if (messages) fieldErrors[field] = messages;
    }
    throw new ConfigError(fieldErrors);
  }

  const data = parsed.data;
  return {
    databaseUrl: data.DATABASE_URL,
    databaseMaxConnections: data.DATABASE_MAX_CONNECTIONS,
    defaultProvider: data.DEFAULT_PROVIDER,
    refreshPolicy: data.REFRESH_POLICY,
    refreshIntervalMs: data.REFRESH_INTERVAL_MS,
    logLevel: data.LOG_LEVEL,
    port: data.PORT,
  };
}
