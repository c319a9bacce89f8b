import { describe, expect, it, vi } from 'vitest';
import { parseEnv, toAppEnv } from './env';

describe('parseEnv', () => {
  it('applies defaults for an empty environment', () => {
    expect(parseEnv({})).toEqual({
      SYNC_ENV: 'development',
      SYNC_DB_PATH: 'driftsync.db',
      SYNC_BATCH_SIZE: 50,
      SYNC_DIRECTION: 'BIDIRECTIONAL',
      SYNC_CONFLICT_STRATEGY: 'SERVER_WINS',
      SYNC_INTERVAL_MS: 600_000
    });
  });

  it('coerces numbers and trims values', () => {
    const env = parseEnv({
      SYNC_ENV: ' staging ',
      SUPABASE_URL: 'https://example.supabase.co',
      SUPABASE_ANON_KEY: 'test-secret',
      SYNC_BATCH_SIZE: '25',
      SYNC_DIRECTION: 'UPLOAD',
      SYNC_CONFLICT_STRATEGY: 'LWW',
      SYNC_INTERVAL_MS: '30000'
    });

    expect(env).toMatchObject({
      SYNC_ENV: 'staging',
      SUPABASE_URL: 'https://example.supabase.co',
      SYNC_BATCH_SIZE: 25,
      SYNC_DIRECTION: 'UPLOAD',
      SYNC_CONFLICT_STRATEGY: 'LWW',
      SYNC_INTERVAL_MS: 30_000
    });
  });

  it('falls back to defaults and warns on invalid input', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const env = parseEnv({ SYNC_BATCH_SIZE: 'lots', SUPABASE_URL: 'not a url' });

    expect(env.SYNC_BATCH_SIZE).toBe(50);
    expect(env.SUPABASE_URL).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('stays quiet about invalid input under test', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    parseEnv({ SYNC_ENV: 'test', SYNC_DIRECTION: 'SIDEWAYS' });

    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });
});

describe('toAppEnv', () => {
  it('enables verbose logging in development unless overridden', () => {
    expect(toAppEnv(parseEnv({})).verboseLogging).toBe(true);
    expect(toAppEnv(parseEnv({ SYNC_VERBOSE: '0' })).verboseLogging).toBe(false);
    expect(toAppEnv(parseEnv({ SYNC_ENV: 'production', SYNC_VERBOSE: '1' })).verboseLogging).toBe(true);
    expect(toAppEnv(parseEnv({ SYNC_ENV: 'production' })).verboseLogging).toBe(false);
  });

  it('flags supabase as configured only with both url and key', () => {
    expect(toAppEnv(parseEnv({ SUPABASE_URL: 'https://example.supabase.co' })).isSupabaseConfigured).toBe(false);
    expect(
      toAppEnv(parseEnv({ SUPABASE_URL: 'https://example.supabase.co', SUPABASE_ANON_KEY: 'test-secret' }))
        .isSupabaseConfigured
    ).toBe(true);
  });
});
