/**
 * config.ts
 *
 * Environment loading and parsing.
 *
 * Load order (first match per variable wins):
 *   1. .env.local  — local overrides, git-ignored
 *   2. .env        — shared defaults
 * Variables already set in the process environment win over both files.
 */
import dotenv from 'dotenv';
import path   from 'node:path';
import { z }  from 'zod';

const EnvSchema = z.object({
  NODE_ENV:    z.string().default('development'),
  PORT:        z.coerce.number().int().min(0).max(65535).default(8080),
  CORS_ORIGIN: z.string().min(1).default('http://localhost:5173'),
  MAX_BATCH:   z.coerce.number().int().positive().default(1000),
});

export interface AppConfig {
  nodeEnv:    string;
  port:       number;
  corsOrigin: string;
  maxBatch:   number;
}

/** Reads .env.local and .env from `cwd` into process.env. */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.join(cwd, '.env.local') });
  dotenv.config({ path: path.join(cwd, '.env') });
}

/**
 * Parses configuration from `env`. Throws an Error naming every invalid
 * variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment — ${problems}`);
  }

  return {
    nodeEnv:    parsed.data.NODE_ENV,
    port:       parsed.data.PORT,
    corsOrigin: parsed.data.CORS_ORIGIN,
    maxBatch:   parsed.data.MAX_BATCH,
  };
}
