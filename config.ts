/**
 * Runtime Configuration
 *
 * Environment variables parsed into a typed config. Entry points load
 * .env.local before calling loadConfig().
 */

import { z } from 'zod';
import { DEFAULT_DECAY_RATE, DEFAULT_BACKEND_TIMEOUT_MS } from './constants';

const envSchema = z
  .object({
    RETENTION_PORT: z.coerce.number().int().min(0).max(65535).default(5000),
    RETENTION_HOST: z.string().min(1).default('0.0.0.0'),
    RETENTION_DECAY_RATE: z.coerce.number().nonnegative().default(DEFAULT_DECAY_RATE),
    RETENTION_SOURCE: z.enum(['catalog', 'process', 'postgres']).default('catalog'),
    RETENTION_BACKEND_COMMAND: z.string().min(1).default('./concept-backend'),
    RETENTION_BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_BACKEND_TIMEOUT_MS),
    RETENTION_DATABASE_URL: z.string().min(1).optional(),
    RETENTION_STATIC_DIR: z.string().min(1).optional(),
  })
  .refine((env) => env.RETENTION_SOURCE !== 'postgres' || env.RETENTION_DATABASE_URL !== undefined, {
    message: 'RETENTION_DATABASE_URL is required when RETENTION_SOURCE=postgres',
    path: ['RETENTION_DATABASE_URL'],
  });

export type SourceKind = 'catalog' | 'process' | 'postgres';

export interface RetentionConfig {
  port: number;
  host: string;
  decayRate: number;
  source: SourceKind;
  backendCommand: string;
  backendTimeoutMs: number;
  databaseUrl?: string;
  staticDir?: string;
}

/**
 * Parse configuration from the environment.
 * Throws with every offending variable listed when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RetentionConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const e = parsed.data;
  return {
    port: e.RETENTION_PORT,
    host: e.RETENTION_HOST,
    decayRate: e.RETENTION_DECAY_RATE,
    source: e.RETENTION_SOURCE,
    backendCommand: e.RETENTION_BACKEND_COMMAND,
    backendTimeoutMs: e.RETENTION_BACKEND_TIMEOUT_MS,
    databaseUrl: e.RETENTION_DATABASE_URL,
    staticDir: e.RETENTION_STATIC_DIR,
  };
}
