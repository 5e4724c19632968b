import { describe, it, expect } from 'vitest';
import { loadConfig, parseConfig } from './cribbageConfig';
import { isCribbageError } from './errors';

const configError = (fn: () => unknown): string => {
  try {
    fn();
  } catch (err) {
    if (isCribbageError(err, 'INVALID_CONFIG')) return err.message;
    throw err;
  }
  throw new Error('expected an INVALID_CONFIG error');
};

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig(['--n_games', '5'], {})).toEqual({
      nGames: 5,
      verbosity: 1,
      trackStates: true,
      debug: false,
      seed: undefined,
      policy: 'random',
      logDir: './logs',
      csv: true,
      supabase: undefined,
    });
  });

  it('reads every flag', () => {
    const config = loadConfig(
      [
        '--n_games', '2',
        '--verbosity', '2',
        '--no_track_states',
        '--debug',
        '--seed', '42',
        '--policy', 'first-legal',
        '--log_dir', 'out',
        '--no_csv',
      ],
      {}
    );
    expect(config).toEqual({
      nGames: 2,
      verbosity: 2,
      trackStates: false,
      debug: true,
      seed: 42,
      policy: 'first-legal',
      logDir: 'out',
      csv: false,
      supabase: undefined,
    });
  });

  it('falls back to the environment', () => {
    const config = loadConfig(['--n_games', '1'], {
      CRIBBAGE_VERBOSITY: '0',
      CRIBBAGE_DEBUG: '1',
      CRIBBAGE_LOG_DIR: '/tmp/cribbage',
      CRIBBAGE_NO_CSV: 'true',
      SUPABASE_URL: 'https://example.supabase.co',
      SUPABASE_ANON_KEY: 'test-key',
    });
    expect(config.verbosity).toBe(0);
    expect(config.debug).toBe(true);
    expect(config.logDir).toBe('/tmp/cribbage');
    expect(config.csv).toBe(false);
    expect(config.supabase).toEqual({ url: 'https://example.supabase.co', key: 'test-key' });
  });

  it('lets flags win over the environment', () => {
    const config = loadConfig(['--n_games', '1', '--verbosity', '2'], { CRIBBAGE_VERBOSITY: '0' });
    expect(config.verbosity).toBe(2);
  });

  it('requires a game count', () => {
    expect(configError(() => loadConfig([], {}))).toBe('Invalid configuration: --n_games is required');
  });

  it('rejects bad values with the offending field', () => {
    expect(configError(() => loadConfig(['--n_games', '0'], {}))).toMatch(/^Invalid configuration: nGames: /);
    expect(configError(() => loadConfig(['--n_games', 'many'], {}))).toMatch(/nGames/);
    expect(configError(() => loadConfig(['--n_games', '1', '--verbosity', '3'], {}))).toMatch(/verbosity/);
    expect(configError(() => loadConfig(['--n_games', '1', '--policy', 'smart'], {}))).toMatch(/policy/);
    expect(configError(() => loadConfig(['--n_games', '1', '--seed', '-4'], {}))).toMatch(/seed/);
  });

  it('rejects unknown flags', () => {
    expect(configError(() => loadConfig(['--n_games', '1', '--fast'], {}))).toMatch(/^Invalid configuration: /);
  });
});

describe('parseConfig', () => {
  it('rejects a non-object', () => {
    expect(configError(() => parseConfig(null))).toMatch(/^Invalid configuration: config: /);
  });
});
