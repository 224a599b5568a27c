import cron from 'node-cron';

export interface AppConfig {
  port: number;
  production: boolean;
  mongoUri?: string;
  adminId: string;
  adminPasswordHash?: string;
  accessTokenSecret: string;
  accessTokenExpireDays: number;
  frontendUrl?: string;
  sessionTimeoutMinutes: number;
  sessionSweepCron: string;
  collectionBlockHolidays: boolean;
  collectionBlockedWeekdays: number[];
  multidaySkipHolidays: boolean;
}

const required = (env: NodeJS.ProcessEnv, key: string): string => {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable ${key}`);
  }
  return value;
};

const optional = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const positiveInt = (env: NodeJS.ProcessEnv, key: string, fallback: number): number => {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;

  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0 || String(value) !== raw) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const flag = (env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean => {
  const raw = optional(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new Error(`${key} must be true or false, got "${raw}"`);
};

// 0 = Sunday … 6 = Saturday
const weekdays = (env: NodeJS.ProcessEnv, key: string): number[] => {
  const raw = optional(env, key);
  if (raw === undefined) return [];

  return raw.split(',').map((part) => {
    const day = Number(part.trim());
    if (!Number.isInteger(day) || day < 0 || day > 6) {
      throw new Error(`${key} must list weekday numbers between 0 and 6, got "${raw}"`);
    }
    return day;
  });
};

const schedule = (env: NodeJS.ProcessEnv, key: string, fallback: string): string => {
  const expression = optional(env, key) ?? fallback;
  if (!cron.validate(expression)) {
    throw new Error(`${key} is not a valid cron expression, got "${expression}"`);
  }
  return expression;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: positiveInt(env, 'PORT', 8080),
  production: env.NODE_ENV === 'production',
  mongoUri: optional(env, 'MONGO_URI'),
  adminId: required(env, 'ADMIN_ID'),
  adminPasswordHash: optional(env, 'ADMIN_PASSWORD_HASH'),
  accessTokenSecret: required(env, 'ACCESS_TOKEN'),
  accessTokenExpireDays: positiveInt(env, 'ACCESS_TOKEN_EXPIRE', 1),
  frontendUrl: optional(env, 'FRONTEND_URL'),
  sessionTimeoutMinutes: positiveInt(env, 'SESSION_TIMEOUT_MINUTES', 15),
  sessionSweepCron: schedule(env, 'SESSION_SWEEP_CRON', '* * * * *'),
  collectionBlockHolidays: flag(env, 'COLLECTION_BLOCK_HOLIDAYS', true),
  collectionBlockedWeekdays: weekdays(env, 'COLLECTION_BLOCKED_WEEKDAYS'),
  multidaySkipHolidays: flag(env, 'MULTIDAY_SKIP_HOLIDAYS', false),
});
