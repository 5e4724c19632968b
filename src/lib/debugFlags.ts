/**
 * Environment flags.
 *
 * Enable via environment variables, e.g.
 *   CRIBBAGE_DEBUG=1 CRIBBAGE_VERBOSITY=2 npm run simulate -- --n_games 1
 *
 * CLI flags override anything set here.
 */

const truthyValues = new Set(['1', 'true', 'yes', 'on']);
const falsyValues = new Set(['0', 'false', 'no', 'off']);

type Env = Record<string, string | undefined>;

function readFlag(env: Env, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === '' || truthyValues.has(v)) return true;
  if (falsyValues.has(v)) return false;
  return undefined;
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

export function isDebugEnabled(env: Env = process.env): boolean | undefined {
  return readFlag(env, 'CRIBBAGE_DEBUG');
}

export function isCsvDisabled(env: Env = process.env): boolean | undefined {
  return readFlag(env, 'CRIBBAGE_NO_CSV');
}

export function getVerbosityOverride(env: Env = process.env): string | undefined {
  return readString(env, 'CRIBBAGE_VERBOSITY');
}

export function getLogDir(env: Env = process.env): string | undefined {
  return readString(env, 'CRIBBAGE_LOG_DIR');
}

export function getSupabaseSettings(env: Env = process.env): { url: string; key: string } | undefined {
  const url = readString(env, 'SUPABASE_URL');
  const key = readString(env, 'SUPABASE_ANON_KEY');
  return url && key ? { url, key } : undefined;
}
