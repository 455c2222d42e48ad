import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { Config } from './types';
import { ConfigurationError, isLogLevel } from './utils';

export const DEFAULT_BASE_URL = 'https://ncore.pro/profile.php?id=';

type Env = Record<string, string | undefined>;

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);
// Timers overflow past ~24.8 days
const intervalHours = z.coerce.number().positive().max(24 * 24);

/** Loads `.env.local` and then `.env`; neither overrides variables already set. */
export function loadEnvFiles(): void {
  loadDotenv({ path: '.env.local' });
  loadDotenv();
}

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key];
  if (value) {
    return value;
  }
  if (defaultValue === undefined) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`, { key });
  }
  return defaultValue;
}

function getNumber(env: Env, key: string, defaultValue: string, schema: z.ZodType<number>): number {
  const raw = getEnvVar(env, key, defaultValue);
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid value for ${key}: ${raw}`, {
      key,
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data;
}

export function loadConfig(env: Env = process.env): Config {
  const logLevel = getEnvVar(env, 'LOG_LEVEL', 'info').toLowerCase();
  const hours = getNumber(env, 'FETCH_INTERVAL_HOURS', '24', intervalHours);

  return {
    ncore: {
      nick: getEnvVar(env, 'NICK'),
      pass: getEnvVar(env, 'PASS'),
      baseUrl: getEnvVar(env, 'NCORE_BASE_URL', DEFAULT_BASE_URL),
      timeoutMs: getNumber(env, 'FETCH_TIMEOUT_MS', '30000', positiveInt),
    },
    database: {
      url: getEnvVar(env, 'DATABASE_URL'),
    },
    app: {
      port: getNumber(env, 'PORT', '3000', positiveInt),
      nodeEnv: getEnvVar(env, 'NODE_ENV', 'development'),
      logLevel: isLogLevel(logLevel) ? logLevel : 'info',
      webDir: getEnvVar(env, 'WEB_DIR', 'web'),
      shutdownGraceMs: getNumber(env, 'SHUTDOWN_GRACE_MS', '5000', positiveInt),
    },
    ingestion: {
      intervalMs: Math.round(hours * 60 * 60 * 1000),
      pauseMs: getNumber(env, 'FETCH_PAUSE_MS', '2000', nonNegativeInt),
    },
  };
}
