import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_SESSION_TTL_MS = 30 * 60_000;

type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  corsOrigin: string;
  sessionSecret: string;
  scoreDbPath: string;
  adminToken: string | null;
  sessionTtlMs: number;
  production: boolean;
}

const getRequired = (value: string | undefined, key: string): string => {
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
};

const getPositiveInteger = (value: string | undefined, key: string, fallback: number): number => {
  if (value === undefined || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer`);
  }
  return parsed;
};

export const loadConfig = (env: Env = process.env): AppConfig => ({
  port: getPositiveInteger(env.PORT, 'PORT', 4000),
  corsOrigin: getRequired(env.CORS_ORIGIN, 'CORS_ORIGIN'),
  sessionSecret: getRequired(env.SESSION_SECRET, 'SESSION_SECRET'),
  scoreDbPath: env.SCORE_DB_PATH || 'arcade.db',
  adminToken: env.ADMIN_TOKEN || null,
  sessionTtlMs: getPositiveInteger(env.SESSION_TTL_MS, 'SESSION_TTL_MS', DEFAULT_SESSION_TTL_MS),
  production: env.NODE_ENV === 'production'
});
