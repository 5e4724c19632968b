#!/usr/bin/env tsx
import path from 'node:path';
import { format } from 'date-fns';
import { loadConfig, USAGE } from '@/lib/cribbageConfig';
import type { CribbageConfig } from '@/lib/cribbageConfig';
import { combineSinks, createCsvSink, createSupabaseSink } from '@/lib/cribbageEventLog';
import type { CribbageRecordSink } from '@/lib/cribbageEventLog';
import { createConsoleLogger } from '@/lib/logger';
import type { CribbageLogger } from '@/lib/logger';
import { DEFAULT_PLAYERS, runSimulation } from '@/lib/cribbageSimulation';
import { isCribbageError } from '@/lib/errors';
import { createUuid } from '@/lib/uuid';
import { createSupabaseRecordClient } from '@/integrations/supabase/client';

/**
 * Run directory for this invocation: <logDir>/yyyy-MM-dd/HH-mm-ss
 */
function runDirectory(logDir: string, now: Date): string {
  return path.join(logDir, format(now, 'yyyy-MM-dd'), format(now, 'HH-mm-ss'));
}

function buildSinks(config: CribbageConfig, runDir: string, logger: CribbageLogger): CribbageRecordSink {
  const sinks: CribbageRecordSink[] = [];
  if (config.csv) {
    const csv = createCsvSink(runDir);
    logger.log(`Writing ${csv.summaryPath} and ${csv.handsPath}`);
    sinks.push(csv);
  }
  if (config.supabase) {
    const runId = createUuid();
    logger.log(`Exporting records to Supabase as run ${runId}`);
    sinks.push(createSupabaseSink(createSupabaseRecordClient(config.supabase), { runId, logger }));
  }
  return combineSinks(...sinks);
}

async function main(argv: string[]): Promise<void> {
  const config = loadConfig(argv);
  const now = new Date();
  const runDir = runDirectory(config.logDir, now);
  const logger = createConsoleLogger({
    verbosity: config.verbosity,
    debug: config.debug,
    logFile: config.csv ? path.join(runDir, 'simulation.log') : undefined,
  });
  const sink = buildSinks(config, runDir, logger);

  console.log(`Running ${config.nGames} game(s) with the ${config.policy} policy`);
  const { baseSeed, run } = await runSimulation({
    nGames: config.nGames,
    baseSeed: config.seed,
    trackStates: config.trackStates,
    policy: config.policy,
    logger,
    sink,
  });

  console.log('\nSimulation complete');
  console.log(`Games played: ${run.games}`);
  for (const seat of DEFAULT_PLAYERS) {
    console.log(`${seat.name} wins: ${run.wins[seat.playerId] ?? 0} (${(run.winPercentage[seat.playerId] ?? 0).toFixed(1)}%)`);
  }
  console.log(`Average hands per game: ${run.averageHands.toFixed(1)}`);
  if (config.trackStates) {
    console.log(`Base seed: ${baseSeed}`);
    console.log(`Game seeds: ${run.seeds.join(', ')}`);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[ERROR] Simulation failed: ${message}`);
  if (isCribbageError(err, 'INVALID_CONFIG')) console.error(USAGE);
  if (process.argv.includes('--debug') && err instanceof Error) console.error(err.stack);
  process.exitCode = 1;
});
