import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

const base = { ADMIN_ID: 'admin', ACCESS_TOKEN: 'test-secret' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(base)).toEqual({
      port: 8080,
      production: false,
      mongoUri: undefined,
      adminId: 'admin',
      adminPasswordHash: undefined,
      accessTokenSecret: 'test-secret',
      accessTokenExpireDays: 1,
      frontendUrl: undefined,
      sessionTimeoutMinutes: 15,
      sessionSweepCron: '* * * * *',
      collectionBlockHolidays: true,
      collectionBlockedWeekdays: [],
      multidaySkipHolidays: false,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...base,
      NODE_ENV: 'production',
      PORT: '3000',
      SESSION_TIMEOUT_MINUTES: '5',
      COLLECTION_BLOCK_HOLIDAYS: 'false',
      COLLECTION_BLOCKED_WEEKDAYS: '0, 6',
      MULTIDAY_SKIP_HOLIDAYS: 'yes',
      SESSION_SWEEP_CRON: '*/5 * * * *',
    });

    expect(config.production).toBe(true);
    expect(config.port).toBe(3000);
    expect(config.sessionTimeoutMinutes).toBe(5);
    expect(config.collectionBlockHolidays).toBe(false);
    expect(config.collectionBlockedWeekdays).toEqual([0, 6]);
    expect(config.multidaySkipHolidays).toBe(true);
    expect(config.sessionSweepCron).toBe('*/5 * * * *');
  });

  it('fails on missing required values', () => {
    expect(() => loadConfig({ ACCESS_TOKEN: 'test-secret' })).toThrow(
      'Missing required environment variable ADMIN_ID',
    );
    expect(() => loadConfig({ ADMIN_ID: 'admin', ACCESS_TOKEN: '  ' })).toThrow(
      'Missing required environment variable ACCESS_TOKEN',
    );
  });

  it('fails on malformed values', () => {
    expect(() => loadConfig({ ...base, SESSION_TIMEOUT_MINUTES: '15m' })).toThrow(
      'SESSION_TIMEOUT_MINUTES must be a positive integer, got "15m"',
    );
    expect(() => loadConfig({ ...base, PORT: '0' })).toThrow('PORT must be a positive integer, got "0"');
    expect(() => loadConfig({ ...base, MULTIDAY_SKIP_HOLIDAYS: 'maybe' })).toThrow(
      'MULTIDAY_SKIP_HOLIDAYS must be true or false, got "maybe"',
    );
    expect(() => loadConfig({ ...base, COLLECTION_BLOCKED_WEEKDAYS: '7' })).toThrow(
      'COLLECTION_BLOCKED_WEEKDAYS must list weekday numbers between 0 and 6, got "7"',
    );
    expect(() => loadConfig({ ...base, SESSION_SWEEP_CRON: 'every minute' })).toThrow(
      'SESSION_SWEEP_CRON is not a valid cron expression, got "every minute"',
    );
  });
});
