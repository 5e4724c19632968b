// Cribbage game orchestration logic. Every step takes a state and returns a new one.

import type {
  CribbageCard,
  CribbageGameState,
  CribbagePhase,
  CribbagePlayerState,
  GameSummaryRecord,
  HandDetailRecord,
  PeggingState,
  PeggingTurn,
  PlayerHandDetail,
  PlayerId,
  ScoreBreakdown,
  ScoringPhase,
} from './cribbageTypes';
import { INITIAL_HAND_SIZE } from './cribbageTypes';
import { createDeck, drawCard, shuffleDeck } from './cribbageDeck';
import { RNG_STREAMS, createStreamRng, randomInt } from './cribbageRng';
import { checkHisHeels, hasLegalPlay, isGameWon, validateDiscard, validatePlay } from './cribbageRules';
import { breakdownTotal, evaluateHand, evaluatePegging, goBreakdown, heelsBreakdown } from './cribbageScoring';
import { withoutCards } from './cribbageCards';
import { invalidDiscard, invalidPhase, invariant, missedPlay, notYourTurn } from './errors';

export interface CribbageSeat {
  playerId: PlayerId;
  name: string;
}

export interface InitializeCribbageOptions {
  gameId?: number;
  seed: number;
  players: [CribbageSeat, CribbageSeat];
  firstDealerPlayerId?: PlayerId;
}

function createPlayerState(seat: CribbageSeat): CribbagePlayerState {
  return {
    playerId: seat.playerId,
    name: seat.name,
    score: 0,
    playPoints: 0,
    countPoints: 0,
    dealt: [],
    hand: [],
    playHand: [],
    discarded: [],
    scoreBeforeCount: null,
    handScore: null,
  };
}

function createPeggingState(turnOrder: [PlayerId, PlayerId]): PeggingState {
  return {
    playedCards: [],
    history: [],
    currentCount: 0,
    currentTurnPlayerId: turnOrder[0],
    lastToPlay: null,
    consecutivePasses: 0,
    pointsByPlayer: { [turnOrder[0]]: 0, [turnOrder[1]]: 0 },
  };
}

function orderFromDealer(seats: [PlayerId, PlayerId], dealerPlayerId: PlayerId): [PlayerId, PlayerId] {
  return seats[0] === dealerPlayerId ? [seats[1], seats[0]] : [seats[0], seats[1]];
}

/**
 * Initialize a new cribbage game. The first dealer comes from the game's seat stream.
 */
export function initializeCribbageGame(options: InitializeCribbageOptions): CribbageGameState {
  const [first, second] = options.players;
  if (first.playerId === second.playerId) {
    throw invariant('Players must have distinct ids');
  }
  const seats: [PlayerId, PlayerId] = [first.playerId, second.playerId];

  let dealerPlayerId = options.firstDealerPlayerId;
  if (dealerPlayerId === undefined) {
    dealerPlayerId = seats[randomInt(createStreamRng(options.seed, RNG_STREAMS.seats), 2)];
  } else if (!seats.includes(dealerPlayerId)) {
    throw invariant(`Unknown dealer ${dealerPlayerId}`);
  }
  const turnOrder = orderFromDealer(seats, dealerPlayerId);

  return {
    gameId: options.gameId ?? 1,
    seed: options.seed >>> 0,
    phase: 'dealing',
    handNumber: 0,
    seats,
    dealerPlayerId,
    turnOrder,
    playerStates: {
      [first.playerId]: createPlayerState(first),
      [second.playerId]: createPlayerState(second),
    },
    deck: [],
    crib: [],
    cribScore: null,
    cutCard: null,
    hisHeels: false,
    pegging: createPeggingState(turnOrder),
    scoreLog: [],
    winnerPlayerId: null,
    endedDuring: null,
  };
}

function assertPhase(state: CribbageGameState, phase: CribbagePhase): void {
  if (state.phase !== phase) throw invalidPhase(phase, state.phase);
}

export function getOpponentId(state: CribbageGameState, playerId: PlayerId): PlayerId {
  const [a, b] = state.seats;
  if (playerId === a) return b;
  if (playerId === b) return a;
  throw invariant(`Unknown player ${playerId}`);
}

function getPlayer(state: CribbageGameState, playerId: PlayerId): CribbagePlayerState {
  const player = state.playerStates[playerId];
  if (!player) throw invariant(`Unknown player ${playerId}`);
  return player;
}

function updatePlayer(
  state: CribbageGameState,
  playerId: PlayerId,
  patch: Partial<CribbagePlayerState>
): CribbageGameState {
  return {
    ...state,
    playerStates: {
      ...state.playerStates,
      [playerId]: { ...getPlayer(state, playerId), ...patch },
    },
  };
}

/**
 * End the game with a winner. Records the phase the game ended in.
 */
function endGame(state: CribbageGameState, winnerPlayerId: PlayerId): CribbageGameState {
  return {
    ...state,
    phase: 'complete',
    winnerPlayerId,
    endedDuring: state.phase,
  };
}

/**
 * Add a breakdown's total to a player's score and check the win threshold.
 * Every point in the game goes through here.
 */
export function applyScore(
  state: CribbageGameState,
  playerId: PlayerId,
  breakdown: ScoreBreakdown,
  phase: ScoringPhase
): CribbageGameState {
  const points = breakdownTotal(breakdown);
  if (points === 0) return state;

  const player = getPlayer(state, playerId);
  const score = player.score + points;
  const next = updatePlayer(state, playerId, {
    score,
    playPoints: player.playPoints + (phase === 'play' ? points : 0),
    countPoints: player.countPoints + (phase === 'count' ? points : 0),
  });
  const logged: CribbageGameState = {
    ...next,
    scoreLog: [...next.scoreLog, { playerId, phase, breakdown, points, scoreAfter: score }],
  };

  return isGameWon(score) ? endGame(logged, playerId) : logged;
}

/**
 * Deal: a freshly shuffled deck, one card at a time starting with the non-dealer
 */
export function dealHand(state: CribbageGameState): CribbageGameState {
  assertPhase(state, 'dealing');
  const handNumber = state.handNumber + 1;
  let deck = shuffleDeck(createDeck(), createStreamRng(state.seed, RNG_STREAMS.deck, handNumber));

  const dealt: Record<PlayerId, CribbageCard[]> = { [state.turnOrder[0]]: [], [state.turnOrder[1]]: [] };
  for (let i = 0; i < INITIAL_HAND_SIZE; i++) {
    for (const playerId of state.turnOrder) {
      const draw = drawCard(deck);
      dealt[playerId].push(draw.card);
      deck = draw.deck;
    }
  }

  let next: CribbageGameState = {
    ...state,
    phase: 'discarding',
    handNumber,
    deck,
    crib: [],
    cribScore: null,
    cutCard: null,
    hisHeels: false,
    pegging: createPeggingState(state.turnOrder),
    scoreLog: [],
  };
  for (const playerId of state.turnOrder) {
    next = updatePlayer(next, playerId, {
      dealt: dealt[playerId],
      hand: [...dealt[playerId]],
      playHand: [],
      discarded: [],
      scoreBeforeCount: null,
      handScore: null,
    });
  }
  return next;
}

/**
 * Process a player's discard to the crib
 */
export function discardToCrib(
  state: CribbageGameState,
  playerId: PlayerId,
  cards: readonly CribbageCard[]
): CribbageGameState {
  assertPhase(state, 'discarding');
  const player = getPlayer(state, playerId);
  if (player.discarded.length > 0) {
    throw invalidDiscard(`${playerId} has already discarded`);
  }
  validateDiscard(player.hand, cards);

  const kept = withoutCards(player.hand, cards);
  const next = updatePlayer(
    { ...state, crib: [...state.crib, ...cards] },
    playerId,
    { hand: kept, playHand: [...kept], discarded: [...cards] }
  );

  const allDiscarded = next.seats.every(id => getPlayer(next, id).discarded.length > 0);
  return allDiscarded ? { ...next, phase: 'cutting' } : next;
}

/**
 * Cut the starter. A Jack is "his heels": 2 to the dealer before play starts.
 */
export function cutStarter(state: CribbageGameState): CribbageGameState {
  assertPhase(state, 'cutting');
  const { card: cutCard, deck } = drawCard(state.deck);
  const hisHeels = checkHisHeels(cutCard);

  let next: CribbageGameState = { ...state, deck, cutCard, hisHeels };
  if (hisHeels) {
    next = applyScore(next, next.dealerPlayerId, heelsBreakdown(), 'play');
    if (next.phase === 'complete') return next;
  }

  return {
    ...next,
    phase: 'pegging',
    pegging: { ...next.pegging, currentTurnPlayerId: next.turnOrder[0] },
  };
}

/**
 * What the active player is able to do: play, call go, or nothing left to play
 */
export function getPeggingOptions(state: CribbageGameState): { playerId: PlayerId; turn: 'play' | 'go' | 'exhausted' } {
  assertPhase(state, 'pegging');
  const playerId = state.pegging.currentTurnPlayerId;
  const { playHand } = getPlayer(state, playerId);
  if (playHand.length === 0) return { playerId, turn: 'exhausted' };
  return { playerId, turn: hasLegalPlay(playHand, state.pegging.currentCount) ? 'play' : 'go' };
}

function beginNewCycle(state: CribbageGameState, preferredLeaderId: PlayerId): CribbageGameState {
  const leader = getPlayer(state, preferredLeaderId).playHand.length > 0
    ? preferredLeaderId
    : getOpponentId(state, preferredLeaderId);
  return {
    ...state,
    pegging: {
      ...state.pegging,
      playedCards: [],
      currentCount: 0,
      currentTurnPlayerId: leader,
      lastToPlay: null,
      consecutivePasses: 0,
    },
  };
}

function addPeggingPoints(state: CribbageGameState, playerId: PlayerId, points: number): CribbageGameState {
  const pointsByPlayer = { ...state.pegging.pointsByPlayer };
  pointsByPlayer[playerId] = (pointsByPlayer[playerId] ?? 0) + points;
  return { ...state, pegging: { ...state.pegging, pointsByPlayer } };
}

function awardGo(state: CribbageGameState): CribbageGameState {
  const lastToPlay = state.pegging.lastToPlay;
  if (!lastToPlay) throw invariant('Go awarded with no card played in the cycle');
  const breakdown = goBreakdown();
  return applyScore(addPeggingPoints(state, lastToPlay, breakdown['play-go'] ?? 0), lastToPlay, breakdown, 'play');
}

/**
 * Both play hands are empty. An open cycle gives the last player one for last.
 */
function finishPegging(state: CribbageGameState): CribbageGameState {
  let next = state;
  if (next.pegging.currentCount > 0) {
    next = awardGo(next);
    if (next.phase === 'complete') return next;
  }
  return { ...next, phase: 'counting' };
}

function allCardsPlayed(state: CribbageGameState): boolean {
  return state.seats.every(id => getPlayer(state, id).playHand.length === 0);
}

/**
 * Play a card during pegging
 */
export function playPeggingCard(
  state: CribbageGameState,
  playerId: PlayerId,
  card: CribbageCard
): CribbageGameState {
  assertPhase(state, 'pegging');
  if (state.pegging.currentTurnPlayerId !== playerId) throw notYourTurn(playerId);

  const player = getPlayer(state, playerId);
  validatePlay(player.playHand, card, state.pegging.currentCount);
  const result = evaluatePegging(state.pegging.playedCards, card, state.pegging.currentCount);

  let next = updatePlayer(state, playerId, { playHand: withoutCards(player.playHand, [card]) });
  next = {
    ...next,
    pegging: {
      ...next.pegging,
      playedCards: [...next.pegging.playedCards, { playerId, card }],
      history: [...next.pegging.history, { playerId, card }],
      currentCount: result.newCount,
      lastToPlay: playerId,
      consecutivePasses: 0,
      currentTurnPlayerId: getOpponentId(state, playerId),
    },
  };
  next = applyScore(addPeggingPoints(next, playerId, result.total), playerId, result.breakdown, 'play');
  if (next.phase === 'complete') return next;

  // 31 closes the cycle; the other player leads the next one
  if (result.resetsCount) {
    next = beginNewCycle(next, getOpponentId(next, playerId));
  }
  return allCardsPlayed(next) ? finishPegging(next) : next;
}

/**
 * Call "go" (or pass with no cards left). Two passes in a row close the cycle.
 */
export function callGo(state: CribbageGameState, playerId: PlayerId): CribbageGameState {
  assertPhase(state, 'pegging');
  if (state.pegging.currentTurnPlayerId !== playerId) throw notYourTurn(playerId);

  const player = getPlayer(state, playerId);
  if (hasLegalPlay(player.playHand, state.pegging.currentCount)) throw missedPlay(playerId);

  const consecutivePasses = state.pegging.consecutivePasses + 1;
  let next: CribbageGameState = {
    ...state,
    pegging: {
      ...state.pegging,
      consecutivePasses,
      currentTurnPlayerId: getOpponentId(state, playerId),
    },
  };
  if (consecutivePasses < 2) return next;

  const lastToPlay = next.pegging.lastToPlay;
  next = awardGo(next);
  if (next.phase === 'complete' || !lastToPlay) return next;
  return beginNewCycle(next, getOpponentId(next, lastToPlay));
}

/**
 * Apply one resolved pegging turn
 */
export function applyPeggingTurn(state: CribbageGameState, playerId: PlayerId, turn: PeggingTurn): CribbageGameState {
  return turn.kind === 'played' ? playPeggingCard(state, playerId, turn.card) : callGo(state, playerId);
}

/**
 * Count hands: non-dealer, dealer, then the crib. The game can end after any of them.
 */
export function countHands(state: CribbageGameState): CribbageGameState {
  assertPhase(state, 'counting');
  const starter = state.cutCard;
  if (!starter) throw invariant('Counting without a starter card');

  let next = state;
  for (const playerId of state.seats) {
    next = updatePlayer(next, playerId, { scoreBeforeCount: getPlayer(next, playerId).score });
  }

  for (const playerId of state.turnOrder) {
    const handScore = evaluateHand(getPlayer(next, playerId).hand, starter, false);
    next = applyScore(updatePlayer(next, playerId, { handScore }), playerId, handScore.breakdown, 'count');
    if (next.phase === 'complete') return next;
  }

  const cribScore = evaluateHand(next.crib, starter, true);
  return applyScore({ ...next, cribScore }, next.dealerPlayerId, cribScore.breakdown, 'count');
}

/**
 * Pass the deal to the other player
 */
export function advanceDealer(state: CribbageGameState): CribbageGameState {
  assertPhase(state, 'counting');
  const dealerPlayerId = getOpponentId(state, state.dealerPlayerId);
  const turnOrder = orderFromDealer(state.seats, dealerPlayerId);
  return {
    ...state,
    phase: 'dealing',
    dealerPlayerId,
    turnOrder,
    pegging: createPeggingState(turnOrder),
  };
}

/**
 * Snapshot of the current deal for exporters
 */
export function buildHandDetailRecord(state: CribbageGameState): HandDetailRecord {
  const players: PlayerHandDetail[] = state.seats.map(playerId => {
    const p = getPlayer(state, playerId);
    return {
      playerId,
      dealt: [...p.dealt],
      kept: p.discarded.length > 0 ? [...p.hand] : [],
      discarded: [...p.discarded],
      handScore: p.handScore?.total ?? null,
      handBreakdown: p.handScore ? { ...p.handScore.breakdown } : null,
      peggingPoints: state.pegging.pointsByPlayer[playerId] ?? 0,
      scoreBefore: p.scoreBeforeCount ?? p.score,
      scoreAfter: p.score,
    };
  });

  return Object.freeze({
    gameId: state.gameId,
    handNumber: state.handNumber,
    dealerPlayerId: state.dealerPlayerId,
    players,
    crib: [...state.crib],
    cribScore: state.cribScore?.total ?? null,
    cribBreakdown: state.cribScore ? { ...state.cribScore.breakdown } : null,
    starter: state.cutCard,
    hisHeels: state.hisHeels,
    pegging: [...state.pegging.history],
    scoreEvents: [...state.scoreLog],
    endedDuring: state.endedDuring,
  });
}

export function buildGameSummary(
  state: CribbageGameState,
  options: { trackSeed: boolean; timestamp: string }
): GameSummaryRecord {
  if (state.phase !== 'complete' || !state.winnerPlayerId) {
    throw invalidPhase('complete', state.phase);
  }
  return Object.freeze({
    gameId: state.gameId,
    winnerPlayerId: state.winnerPlayerId,
    players: state.seats.map(playerId => {
      const p = getPlayer(state, playerId);
      return {
        playerId,
        name: p.name,
        score: p.score,
        playPoints: p.playPoints,
        countPoints: p.countPoints,
      };
    }),
    handsPlayed: state.handNumber,
    seed: options.trackSeed ? state.seed : null,
    timestamp: options.timestamp,
  });
}
