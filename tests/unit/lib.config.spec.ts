import { describe, it, expect } from 'vitest';
import { loadConfig, parseIntEnv } from '../../src/lib/config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      primaryConvexUrl: 'http://127.0.0.1:3210',
      sharedConvexUrl: 'http://127.0.0.1:3210',
      mockConvex: false,
      profilePollIntervalMs: 3000,
      profilePollAttempts: 2,
      notifierBufferSize: 256,
      listPageSize: 50,
      logLevel: 'info',
      backfillStudioId: 'home',
      backfillStudioName: 'Home Studio',
      backfillDiscountPercent: 25,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      PRIMARY_CONVEX_URL: 'https://primary.example',
      SHARED_CONVEX_URL: 'https://shared.example',
      MOCK_CONVEX: '1',
      PROFILE_POLL_INTERVAL_MS: '500',
      PROFILE_POLL_ATTEMPTS: '4',
      LOG_LEVEL: 'DEBUG',
      BACKFILL_DISCOUNT_PERCENT: '250',
    });
    expect(config.primaryConvexUrl).toBe('https://primary.example');
    expect(config.sharedConvexUrl).toBe('https://shared.example');
    expect(config.mockConvex).toBe(true);
    expect(config.profilePollIntervalMs).toBe(500);
    expect(config.profilePollAttempts).toBe(4);
    expect(config.logLevel).toBe('debug');
    expect(config.backfillDiscountPercent).toBe(100);
  });

  it('uses the shared url for the primary store when only that is set', () => {
    expect(loadConfig({ CONVEX_URL: 'https://one.example' }).primaryConvexUrl).toBe('https://one.example');
  });
});

describe('parseIntEnv', () => {
  it('falls back on junk, zero and negatives and floors fractions', () => {
    expect(parseIntEnv({ N: 'abc' }, 'N', 7)).toBe(7);
    expect(parseIntEnv({ N: '0' }, 'N', 7)).toBe(7);
    expect(parseIntEnv({ N: '-3' }, 'N', 7)).toBe(7);
    expect(parseIntEnv({ N: '12.9' }, 'N', 7)).toBe(12);
    expect(parseIntEnv({}, 'N', 7)).toBe(7);
  });
});
