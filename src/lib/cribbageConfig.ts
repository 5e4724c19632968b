import { parseArgs } from 'node:util';
import { z } from 'zod';
import { getLogDir, getSupabaseSettings, getVerbosityOverride, isCsvDisabled, isDebugEnabled } from './debugFlags';
import { invalidConfig } from './errors';

const ConfigSchema = z.object({
  nGames: z.number().int().positive(),
  verbosity: z.union([z.literal(0), z.literal(1), z.literal(2)]),
  trackStates: z.boolean(),
  debug: z.boolean(),
  seed: z.number().int().min(0).max(0xffffffff).optional(),
  policy: z.enum(['random', 'first-legal']),
  logDir: z.string().min(1),
  csv: z.boolean(),
  supabase: z
    .object({
      url: z.string().url(),
      key: z.string().min(1),
    })
    .optional(),
});

export type CribbageConfig = z.infer<typeof ConfigSchema>;

export const USAGE = `Usage: cribbage-sim --n_games N [--verbosity 0|1|2] [--no_track_states] [--debug]
                    [--seed S] [--policy random|first-legal] [--log_dir DIR] [--no_csv]`;

const toNumber = (value: string | undefined) => (value === undefined ? undefined : Number(value));

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

/**
 * Validate a config object. Throws INVALID_CONFIG with every zod issue in the message.
 */
export function parseConfig(raw: unknown): CribbageConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) throw invalidConfig(formatIssues(result.error));
  return result.data;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        n_games: { type: 'string' },
        verbosity: { type: 'string' },
        no_track_states: { type: 'boolean' },
        debug: { type: 'boolean' },
        seed: { type: 'string' },
        policy: { type: 'string' },
        log_dir: { type: 'string' },
        no_csv: { type: 'boolean' },
      },
    }).values;
  } catch (err) {
    throw invalidConfig(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Build the configuration from CLI flags over environment over defaults
 */
export function loadConfig(argv: string[], env: Record<string, string | undefined> = process.env): CribbageConfig {
  const values = readFlags(argv);
  if (values.n_games === undefined) {
    throw invalidConfig('--n_games is required');
  }

  return parseConfig({
    nGames: toNumber(values.n_games),
    verbosity: toNumber(values.verbosity ?? getVerbosityOverride(env) ?? '1'),
    trackStates: !values.no_track_states,
    debug: values.debug ?? isDebugEnabled(env) ?? false,
    seed: toNumber(values.seed),
    policy: values.policy ?? 'random',
    logDir: values.log_dir ?? getLogDir(env) ?? './logs',
    csv: !(values.no_csv ?? isCsvDisabled(env) ?? false),
    supabase: getSupabaseSettings(env),
  });
}
