/**
 * Cribbage record sinks - where hand-detail and game-summary records go.
 *
 * Sinks observe finished deals and games; they never feed anything back into
 * the game. The Supabase sink is fire-and-forget: failed inserts are logged
 * and the simulation carries on.
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { GameSummaryRecord, HandBreakdown, HandDetailRecord } from './cribbageTypes';
import { HAND_CATEGORIES } from './cribbageTypes';
import { formatCard, formatCards } from './cribbageCards';
import type { CribbageLogger } from './logger';

export interface CribbageRecordSink {
  recordHand(record: HandDetailRecord): void;
  recordGame(record: GameSummaryRecord): void;
  close?(): Promise<void>;
}

type Row = Record<string, string | number>;

export const GAME_FIELDNAMES = [
  'game_number',
  'timestamp',
  'winner',
  'player1_final_score',
  'player2_final_score',
  'hands_played',
  'player1_play_points',
  'player1_count_points',
  'player2_play_points',
  'player2_count_points',
  'random_seed',
] as const;

function breakdownFields(prefix: string): string[] {
  return HAND_CATEGORIES.map(category => `${prefix}_${category}`);
}

function playerFields(prefix: 'p1' | 'p2'): string[] {
  return [
    `${prefix}_dealt_cards`,
    `${prefix}_kept_cards`,
    `${prefix}_discards`,
    `${prefix}_hand_score`,
    ...breakdownFields(`${prefix}_hand`),
    `${prefix}_pegging_points`,
    `${prefix}_score_before`,
    `${prefix}_score_after`,
  ];
}

export const HAND_FIELDNAMES: readonly string[] = [
  'game_number',
  'hand_number',
  'dealer',
  ...playerFields('p1'),
  ...playerFields('p2'),
  'crib_cards',
  'crib_score',
  ...breakdownFields('crib'),
  'starter_card',
  'his_heels',
  'ended_during',
];

function breakdownRow(prefix: string, breakdown: HandBreakdown | null): Row {
  const row: Row = {};
  for (const category of HAND_CATEGORIES) {
    row[`${prefix}_${category}`] = breakdown ? breakdown[category] : '';
  }
  return row;
}

/**
 * Flatten a game summary into a CSV row (player 1 = first seat)
 */
export function toGameRow(record: GameSummaryRecord): Row {
  const [p1, p2] = record.players;
  return {
    game_number: record.gameId,
    timestamp: record.timestamp,
    winner: record.players.find(p => p.playerId === record.winnerPlayerId)?.name ?? record.winnerPlayerId,
    player1_final_score: p1?.score ?? '',
    player2_final_score: p2?.score ?? '',
    hands_played: record.handsPlayed,
    player1_play_points: p1?.playPoints ?? '',
    player1_count_points: p1?.countPoints ?? '',
    player2_play_points: p2?.playPoints ?? '',
    player2_count_points: p2?.countPoints ?? '',
    random_seed: record.seed ?? '',
  };
}

/**
 * Flatten a hand-detail record into a CSV row. Breakdowns not computed are left blank.
 */
export function toHandRow(record: HandDetailRecord): Row {
  const row: Row = {
    game_number: record.gameId,
    hand_number: record.handNumber,
    dealer: record.dealerPlayerId,
  };
  record.players.forEach((player, idx) => {
    const prefix = idx === 0 ? 'p1' : 'p2';
    Object.assign(row, {
      [`${prefix}_dealt_cards`]: formatCards(player.dealt),
      [`${prefix}_kept_cards`]: formatCards(player.kept),
      [`${prefix}_discards`]: formatCards(player.discarded),
      [`${prefix}_hand_score`]: player.handScore ?? '',
      ...breakdownRow(`${prefix}_hand`, player.handBreakdown),
      [`${prefix}_pegging_points`]: player.peggingPoints,
      [`${prefix}_score_before`]: player.scoreBefore,
      [`${prefix}_score_after`]: player.scoreAfter,
    });
  });
  return {
    ...row,
    crib_cards: formatCards(record.crib),
    crib_score: record.cribScore ?? '',
    ...breakdownRow('crib', record.cribBreakdown),
    starter_card: record.starter ? formatCard(record.starter) : '',
    his_heels: record.hisHeels ? 'true' : 'false',
    ended_during: record.endedDuring ?? '',
  };
}

function escapeCsv(value: string | number): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvLine(fields: readonly string[], row: Row): string {
  return fields.map(field => escapeCsv(row[field] ?? '')).join(',');
}

export function createMemorySink(): CribbageRecordSink & { hands: HandDetailRecord[]; games: GameSummaryRecord[] } {
  const hands: HandDetailRecord[] = [];
  const games: GameSummaryRecord[] = [];
  return {
    hands,
    games,
    recordHand: record => {
      hands.push(record);
    },
    recordGame: record => {
      games.push(record);
    },
  };
}

export interface CsvSinkPaths {
  summaryPath: string;
  handsPath: string;
}

/**
 * Write `summary.csv` and `hands.csv` into the run directory, headers first
 */
export function createCsvSink(runDir: string): CribbageRecordSink & CsvSinkPaths {
  mkdirSync(runDir, { recursive: true });
  const summaryPath = path.join(runDir, 'summary.csv');
  const handsPath = path.join(runDir, 'hands.csv');
  writeFileSync(summaryPath, `${GAME_FIELDNAMES.join(',')}\n`);
  writeFileSync(handsPath, `${HAND_FIELDNAMES.join(',')}\n`);

  return {
    summaryPath,
    handsPath,
    recordHand: record => appendFileSync(handsPath, `${toCsvLine(HAND_FIELDNAMES, toHandRow(record))}\n`),
    recordGame: record => appendFileSync(summaryPath, `${toCsvLine(GAME_FIELDNAMES, toGameRow(record))}\n`),
  };
}

export interface RecordInsertClient {
  insert(table: string, row: Record<string, unknown>): Promise<{ error: { message: string } | null }>;
}

/**
 * Fire-and-forget inserts into cribbage_hands / cribbage_games.
 * close() waits for whatever is still in flight.
 */
export function createSupabaseSink(
  client: RecordInsertClient,
  options: { runId: string; logger: CribbageLogger }
): CribbageRecordSink {
  const pending = new Set<Promise<void>>();

  const insert = (table: string, row: Record<string, unknown>, label: string) => {
    const request = client
      .insert(table, { run_id: options.runId, ...row })
      .then(
        ({ error }) => {
          if (error) options.logger.error(`[CRIBBAGE_EVENT] Failed to log ${label}: ${error.message}`);
        },
        (err: unknown) => options.logger.error(`[CRIBBAGE_EVENT] Exception logging ${label}`, err)
      )
      .finally(() => pending.delete(request));
    pending.add(request);
  };

  return {
    recordHand: record =>
      insert(
        'cribbage_hands',
        {
          game_id: record.gameId,
          hand_number: record.handNumber,
          dealer_id: record.dealerPlayerId,
          players: record.players.map(p => ({
            player_id: p.playerId,
            dealt: p.dealt.map(formatCard),
            kept: p.kept.map(formatCard),
            discarded: p.discarded.map(formatCard),
            hand_score: p.handScore,
            hand_breakdown: p.handBreakdown,
            pegging_points: p.peggingPoints,
            score_before: p.scoreBefore,
            score_after: p.scoreAfter,
          })),
          crib: record.crib.map(formatCard),
          crib_score: record.cribScore,
          crib_breakdown: record.cribBreakdown,
          starter: record.starter ? formatCard(record.starter) : null,
          his_heels: record.hisHeels,
          pegging: record.pegging.map(p => ({ player_id: p.playerId, card: formatCard(p.card) })),
          ended_during: record.endedDuring,
        },
        `hand ${record.gameId}/${record.handNumber}`
      ),
    recordGame: record =>
      insert(
        'cribbage_games',
        {
          game_id: record.gameId,
          winner_id: record.winnerPlayerId,
          players: record.players.map(p => ({
            player_id: p.playerId,
            name: p.name,
            score: p.score,
            play_points: p.playPoints,
            count_points: p.countPoints,
          })),
          hands_played: record.handsPlayed,
          random_seed: record.seed,
          created_at: record.timestamp,
        },
        `game ${record.gameId}`
      ),
    close: async () => {
      await Promise.allSettled([...pending]);
    },
  };
}

export function combineSinks(...sinks: CribbageRecordSink[]): CribbageRecordSink {
  return {
    recordHand: record => sinks.forEach(sink => sink.recordHand(record)),
    recordGame: record => sinks.forEach(sink => sink.recordGame(record)),
    close: async () => {
      await Promise.all(sinks.map(sink => sink.close?.()));
    },
  };
}
