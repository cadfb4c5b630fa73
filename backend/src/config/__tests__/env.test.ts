import { afterEach, describe, it, expect, vi } from 'vitest';
import { corsOrigins, loadEnv } from '../env.js';

describe('loadEnv', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should apply defaults to an empty environment', () => {
    const env = loadEnv({});
    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 8000,
      WS_ENABLED: true,
      STREAM_MODE: 'interval',
      TICK_INTERVAL_MS: 500,
      DRIFT_MODE: 'parameter',
      DRIFT_VOLATILITY: 0.0002,
      NS_LAMBDA: 0.6,
    });
    expect(env.SIMULATION_SEED).toBeUndefined();
    expect(env.STREAM_INTERVAL_MS).toBeUndefined();
  });

  it('should coerce numbers and flags', () => {
    const env = loadEnv({ PORT: '9000', WS_ENABLED: '0', TICK_INTERVAL_MS: '1000', SIMULATION_SEED: '42' });
    expect(env.PORT).toBe(9000);
    expect(env.WS_ENABLED).toBe(false);
    expect(env.TICK_INTERVAL_MS).toBe(1000);
    expect(env.SIMULATION_SEED).toBe(42);
  });

  it('should reject invalid values', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => loadEnv({ TICK_INTERVAL_MS: '0' })).toThrow('Invalid environment variables');
    expect(() => loadEnv({ DRIFT_MODE: 'wild' })).toThrow('Invalid environment variables');
    expect(() => loadEnv({ NS_LAMBDA: '-1' })).toThrow('Invalid environment variables');
    expect(spy).toHaveBeenCalledTimes(3);
  });
});

describe('corsOrigins', () => {
  it('should allow any origin for *', () => {
    expect(corsOrigins(loadEnv({ CORS_ORIGINS: '*' }))).toBe(true);
  });

  it('should split a comma-separated list', () => {
    expect(corsOrigins(loadEnv({ CORS_ORIGINS: 'http://a.test, http://b.test,' }))).toEqual([
      'http://a.test',
      'http://b.test',
    ]);
  });
});
