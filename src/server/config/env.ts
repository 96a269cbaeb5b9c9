/**
 * Environment Variables
 *
 * Process-level settings and secrets. Everything else lives in the TOML configuration file,
 * whose top-level keys may be overridden through NEWSLOOKOUT_-prefixed variables.
 */

// Load dotenv early to ensure environment variables are available to importers
import * as dotenv from 'dotenv';
dotenv.config();

export const ENV_OVERRIDE_PREFIX = 'NEWSLOOKOUT_';

/**
 * Helper function to safely parse a number from string with default
 */
export function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL?: string;
  OPENAI_API_KEY?: string;
  GOOGLE_API_KEY?: string;
  /** Attempts per LLM call, including the first */
  LLM_MAX_ATTEMPTS: number;
}

function parseNodeEnv(value: string | undefined): Env['NODE_ENV'] {
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

/**
 * Read the environment. Not cached, so tests can stub variables.
 */
export function getEnv(env: NodeJS.ProcessEnv = process.env): Env {
  return {
    NODE_ENV: parseNodeEnv(env.NODE_ENV),
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    OPENAI_API_KEY: env.OPENAI_API_KEY || undefined,
    GOOGLE_API_KEY: env.GOOGLE_API_KEY || env.GEMINI_API_KEY || undefined,
    LLM_MAX_ATTEMPTS: parseNumericEnv(env.LLM_MAX_ATTEMPTS, 2),
  };
}

/**
 * Collect NEWSLOOKOUT_<KEY> variables as lower-cased configuration keys
 *
 * @example
 * ```typescript
 * getConfigOverrides({ NEWSLOOKOUT_DATA_DIR: '/tmp/x' }) // { data_dir: '/tmp/x' }
 * ```
 */
export function getConfigOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value === undefined || !name.startsWith(ENV_OVERRIDE_PREFIX)) continue;
    const key = name.slice(ENV_OVERRIDE_PREFIX.length).toLowerCase();
    if (key.length > 0) {
      overrides[key] = value;
    }
  }
  return overrides;
}
