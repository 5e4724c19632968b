// Drives games with player policies, reports them to a logger and a record sink

import { formatISO } from 'date-fns';
import type {
  CribbageGameState,
  GameSummaryRecord,
  HandDetailRecord,
  PeggingTurn,
  PlayerId,
  RunSummary,
  ScoreBreakdown,
  ScoreCategory,
  ScoreEvent,
} from './cribbageTypes';
import { SCORE_CATEGORIES } from './cribbageTypes';
import type { CribbagePolicy, PolicyName } from './cribbageBotLogic';
import { createPolicy } from './cribbageBotLogic';
import {
  advanceDealer,
  applyPeggingTurn,
  buildGameSummary,
  buildHandDetailRecord,
  countHands,
  cutStarter,
  dealHand,
  discardToCrib,
  getPeggingOptions,
  initializeCribbageGame,
} from './cribbageGameLogic';
import type { CribbageSeat } from './cribbageGameLogic';
import { RNG_STREAMS, createStreamRng, deriveSeed, generateRandomSeed } from './cribbageRng';
import { formatCard, formatCards } from './cribbageCards';
import { nonZeroCategories } from './cribbageScoring';
import { describeCombo, getHandScoringCombos, getTotalFromCombos } from './cribbageScoringDetails';
import type { CribbageRecordSink } from './cribbageEventLog';
import type { CribbageLogger } from './logger';
import { silentLogger } from './logger';
import { invariant, missedPlay } from './errors';

export const DEFAULT_PLAYERS: [CribbageSeat, CribbageSeat] = [
  { playerId: 'p1', name: 'Player 1' },
  { playerId: 'p2', name: 'Player 2' },
];

export interface PlayGameOptions {
  gameId?: number;
  seed: number;
  players?: [CribbageSeat, CribbageSeat];
  /** One policy per seat. Defaults to `policyName` seeded from the game's player streams. */
  policies?: [CribbagePolicy, CribbagePolicy];
  policyName?: PolicyName;
  firstDealerPlayerId?: PlayerId;
  trackSeed?: boolean;
  logger?: CribbageLogger;
  sink?: CribbageRecordSink;
  now?: () => Date;
}

export interface PlayedGame {
  state: CribbageGameState;
  summary: GameSummaryRecord;
  hands: HandDetailRecord[];
}

function describeCategory(category: ScoreCategory, points: number): string {
  switch (category) {
    case 'play-fifteen':
      return '15 for 2';
    case 'play-thirty-one':
      return '31 for 2';
    case 'play-pair':
      return points === 12 ? 'quadruple for 12' : points === 6 ? 'triple for 6' : 'pair for 2';
    case 'play-run':
      return `run of ${points} for ${points}`;
    case 'play-go':
      return 'go for 1';
    case 'heels':
      return 'his heels for 2';
    default:
      return `${category} ${points}`;
  }
}

/**
 * Human-readable breakdown for the game log, e.g. "15 for 2, pair for 2"
 */
export function describeBreakdown(breakdown: ScoreBreakdown): string {
  return SCORE_CATEGORIES.flatMap(category => {
    const points = breakdown[category];
    return points ? [describeCategory(category, points)] : [];
  }).join(', ');
}

function logNewScores(state: CribbageGameState, since: number, logger: CribbageLogger): void {
  state.scoreLog.slice(since).forEach((event: ScoreEvent) => {
    const name = state.playerStates[event.playerId]?.name ?? event.playerId;
    logger.log(`${name} scores ${event.points} (${describeBreakdown(event.breakdown)}). (${name}: ${event.scoreAfter})`);
  });
}

/**
 * Ask the active player's policy for a card. A policy that declines while it
 * holds a legal card has missed a play.
 */
export function resolvePeggingTurn(
  state: CribbageGameState,
  policyFor: (playerId: PlayerId) => CribbagePolicy
): { playerId: PlayerId; turn: PeggingTurn } {
  const { playerId, turn } = getPeggingOptions(state);
  if (turn !== 'play') return { playerId, turn: { kind: turn } };

  const card = policyFor(playerId).choosePlay({
    playerId,
    hand: state.playerStates[playerId].playHand,
    currentCount: state.pegging.currentCount,
    playedCards: state.pegging.playedCards,
  });
  if (!card) throw missedPlay(playerId);
  return { playerId, turn: { kind: 'played', card } };
}

function logCount(state: CribbageGameState, logger: CribbageLogger): void {
  const starter = state.cutCard;
  if (!starter) return;
  const entries = [
    ...state.turnOrder.map(id => ({ id, label: 'hand', cards: state.playerStates[id].hand, score: state.playerStates[id].handScore, isCrib: false })),
    { id: state.dealerPlayerId, label: 'crib', cards: state.crib, score: state.cribScore, isCrib: true },
  ];
  for (const entry of entries) {
    if (!entry.score) continue;
    const name = state.playerStates[entry.id].name;
    logger.log(`${name}'s ${entry.label}: ${formatCards(entry.cards)} + ${formatCard(starter)} = ${entry.score.total}`);
    for (const [category, points] of Object.entries(nonZeroCategories(entry.score.breakdown))) {
      logger.log(`  ${category}: ${points}`, 2);
    }
    const combos = getHandScoringCombos(entry.cards, starter, entry.isCrib);
    if (getTotalFromCombos(combos) !== entry.score.total) {
      throw invariant(`${name}'s ${entry.label} combos do not add up to ${entry.score.total}`);
    }
    for (const combo of combos) {
      logger.log(`    ${describeCombo(combo)}`, 2);
    }
  }
}

/**
 * Play one deal from Deal through Count, or until someone reaches 121
 */
export function playDeal(
  initial: CribbageGameState,
  policyFor: (playerId: PlayerId) => CribbagePolicy,
  logger: CribbageLogger = silentLogger
): CribbageGameState {
  let state = dealHand(initial);
  const dealer = state.playerStates[state.dealerPlayerId];
  logger.log(`Hand ${state.handNumber}, dealer: ${dealer.name}`);

  for (const playerId of state.turnOrder) {
    const player = state.playerStates[playerId];
    logger.debug(`${player.name} hand: ${formatCards(player.hand)}`);
    const discards = policyFor(playerId).chooseDiscards({
      playerId,
      hand: player.hand,
      isDealer: playerId === state.dealerPlayerId,
    });
    state = discardToCrib(state, playerId, discards);
    logger.debug(`${player.name} discarded: ${formatCards(discards)}`);
  }

  state = cutStarter(state);
  if (state.cutCard) logger.log(`Starter card: ${formatCard(state.cutCard)}`, 2);
  logNewScores(state, 0, logger);

  while (state.phase === 'pegging') {
    const before = state.scoreLog.length;
    const { playerId, turn } = resolvePeggingTurn(state, policyFor);
    state = applyPeggingTurn(state, playerId, turn);
    const name = state.playerStates[playerId].name;
    if (turn.kind === 'played') {
      // a play that leaves the count at 0 made 31
      const count = state.pegging.currentCount === 0 ? 31 : state.pegging.currentCount;
      logger.log(`${name} plays ${formatCard(turn.card)} (count: ${count})`, 2);
    } else if (turn.kind === 'go') {
      logger.log(`${name} says Go.`, 2);
    }
    logNewScores(state, before, logger);
  }

  if (state.phase === 'counting') {
    const before = state.scoreLog.length;
    state = countHands(state);
    logCount(state, logger);
    logNewScores(state, before, logger);
  }
  return state;
}

/**
 * Play a full game to 121
 */
export function playCribbageGame(options: PlayGameOptions): PlayedGame {
  const logger = options.logger ?? silentLogger;
  const players = options.players ?? DEFAULT_PLAYERS;
  const gameId = options.gameId ?? 1;
  const policies = options.policies ?? [
    createPolicy(options.policyName ?? 'random', createStreamRng(options.seed, RNG_STREAMS.firstPlayer)),
    createPolicy(options.policyName ?? 'random', createStreamRng(options.seed, RNG_STREAMS.secondPlayer)),
  ];

  let state = initializeCribbageGame({
    gameId,
    seed: options.seed,
    players,
    firstDealerPlayerId: options.firstDealerPlayerId,
  });
  const policyFor = (playerId: PlayerId): CribbagePolicy => {
    const seat = state.seats.indexOf(playerId);
    if (seat < 0) throw invariant(`No policy for ${playerId}`);
    return policies[seat];
  };

  logger.log(`Game ${gameId} initialized. ${state.playerStates[state.dealerPlayerId].name} deals first.`);
  const hands: HandDetailRecord[] = [];

  while (state.phase !== 'complete') {
    state = playDeal(state, policyFor, logger);
    const record = buildHandDetailRecord(state);
    hands.push(record);
    options.sink?.recordHand(record);
    if (state.phase !== 'complete') state = advanceDealer(state);
  }

  const summary = buildGameSummary(state, {
    trackSeed: options.trackSeed ?? true,
    timestamp: formatISO(options.now?.() ?? new Date()),
  });
  options.sink?.recordGame(summary);

  const winner = state.winnerPlayerId ? state.playerStates[state.winnerPlayerId] : undefined;
  logger.log(`GAME OVER! ${winner?.name ?? 'nobody'} wins with ${winner?.score ?? 0} points after ${state.handNumber} hands.`);
  return { state, summary, hands };
}

export interface SimulationOptions {
  nGames: number;
  baseSeed?: number;
  trackStates: boolean;
  policy: PolicyName;
  players?: [CribbageSeat, CribbageSeat];
  logger?: CribbageLogger;
  sink?: CribbageRecordSink;
  now?: () => Date;
}

export interface SimulationResult {
  baseSeed: number;
  summaries: GameSummaryRecord[];
  run: RunSummary;
}

/**
 * Aggregate finished games into run statistics
 */
export function summarizeRun(summaries: readonly GameSummaryRecord[], players: readonly CribbageSeat[] = DEFAULT_PLAYERS): RunSummary {
  const wins: Record<PlayerId, number> = {};
  for (const seat of players) wins[seat.playerId] = 0;
  for (const summary of summaries) {
    wins[summary.winnerPlayerId] = (wins[summary.winnerPlayerId] ?? 0) + 1;
  }

  const games = summaries.length;
  const winPercentage: Record<PlayerId, number> = {};
  for (const [playerId, count] of Object.entries(wins)) {
    winPercentage[playerId] = games === 0 ? 0 : Math.round((count / games) * 1000) / 10;
  }
  const totalHands = summaries.reduce((sum, s) => sum + s.handsPlayed, 0);

  return {
    games,
    wins,
    winPercentage,
    averageHands: games === 0 ? 0 : Math.round((totalHands / games) * 10) / 10,
    seeds: summaries.flatMap(s => (s.seed === null ? [] : [s.seed])),
  };
}

/**
 * Play `nGames` independent games. Game i is seeded with deriveSeed(baseSeed, i).
 */
export async function runSimulation(options: SimulationOptions): Promise<SimulationResult> {
  const logger = options.logger ?? silentLogger;
  const players = options.players ?? DEFAULT_PLAYERS;
  const baseSeed = options.baseSeed ?? generateRandomSeed();
  const summaries: GameSummaryRecord[] = [];

  try {
    for (let gameId = 1; gameId <= options.nGames; gameId++) {
      const { summary } = playCribbageGame({
        gameId,
        seed: deriveSeed(baseSeed, gameId),
        players,
        policyName: options.policy,
        trackSeed: options.trackStates,
        logger,
        sink: options.sink,
        now: options.now,
      });
      summaries.push(summary);
      if (options.trackStates && summary.seed !== null) {
        logger.log(`Game ${gameId} random seed: ${summary.seed}`);
      }
    }
  } finally {
    await options.sink?.close?.();
  }

  return { baseSeed, summaries, run: summarizeRun(summaries, players) };
}
