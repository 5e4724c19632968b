// Cribbage simulator types and constants

export type Suit = 'clubs' | 'diamonds' | 'hearts' | 'spades';
export type Rank = 'A' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K';

export interface CribbageCard {
  readonly suit: Suit;
  readonly rank: Rank;
}

export type PlayerId = string;

export interface PlayedCard {
  playerId: PlayerId;
  card: CribbageCard;
}

// Scoring categories. Count-phase categories first, then pegging, then heels.
export type HandCategory = 'fifteens' | 'pairs' | 'runs' | 'flush' | 'nobs';
export type PeggingCategory =
  | 'play-fifteen'
  | 'play-pair'
  | 'play-run'
  | 'play-go'
  | 'play-thirty-one';
export type ScoreCategory = HandCategory | PeggingCategory | 'heels';

export const HAND_CATEGORIES: readonly HandCategory[] = ['fifteens', 'pairs', 'runs', 'flush', 'nobs'];
export const SCORE_CATEGORIES: readonly ScoreCategory[] = [
  ...HAND_CATEGORIES,
  'play-fifteen',
  'play-pair',
  'play-run',
  'play-go',
  'play-thirty-one',
  'heels',
];

export type ScoreBreakdown = Partial<Record<ScoreCategory, number>>;
export type HandBreakdown = Record<HandCategory, number>;

export interface HandScore {
  breakdown: HandBreakdown;
  total: number;
}

export interface PeggingResult {
  newCount: number;
  breakdown: ScoreBreakdown;
  total: number;
  resetsCount: boolean; // true when the play hit 31
}

// Points are booked either to the play phase (pegging, heels) or the count phase.
export type ScoringPhase = 'play' | 'count';

export interface ScoreEvent {
  playerId: PlayerId;
  phase: ScoringPhase;
  breakdown: ScoreBreakdown;
  points: number;
  scoreAfter: number;
}

export interface CribbagePlayerState {
  playerId: PlayerId;
  name: string;
  score: number;
  playPoints: number;
  countPoints: number;
  dealt: CribbageCard[];
  hand: CribbageCard[]; // 6 after the deal, the 4 kept cards after discarding
  playHand: CribbageCard[]; // copy of the kept cards, consumed during pegging
  discarded: CribbageCard[];
  scoreBeforeCount: number | null;
  handScore: HandScore | null;
}

export interface PeggingState {
  playedCards: PlayedCard[]; // current 31-cycle only
  history: PlayedCard[]; // every card played this deal
  currentCount: number;
  currentTurnPlayerId: PlayerId;
  lastToPlay: PlayerId | null;
  consecutivePasses: number;
  pointsByPlayer: Record<PlayerId, number>;
}

export type CribbagePhase =
  | 'dealing'
  | 'discarding'
  | 'cutting'
  | 'pegging'
  | 'counting'
  | 'complete';

export interface CribbageGameState {
  gameId: number;
  seed: number;
  phase: CribbagePhase;
  handNumber: number;
  seats: [PlayerId, PlayerId]; // fixed seating, used for records
  dealerPlayerId: PlayerId;
  turnOrder: [PlayerId, PlayerId]; // non-dealer first
  playerStates: Record<PlayerId, CribbagePlayerState>;
  deck: CribbageCard[];
  crib: CribbageCard[];
  cribScore: HandScore | null;
  cutCard: CribbageCard | null;
  hisHeels: boolean;
  pegging: PeggingState;
  scoreLog: ScoreEvent[]; // events of the current deal
  winnerPlayerId: PlayerId | null;
  endedDuring: CribbagePhase | null;
}

// Per-turn resolution during pegging
export type PeggingTurn =
  | { kind: 'played'; card: CribbageCard }
  | { kind: 'go' }
  | { kind: 'exhausted' };

export interface PlayerHandDetail {
  playerId: PlayerId;
  dealt: CribbageCard[];
  kept: CribbageCard[];
  discarded: CribbageCard[];
  handScore: number | null;
  handBreakdown: HandBreakdown | null;
  peggingPoints: number;
  scoreBefore: number;
  scoreAfter: number;
}

export interface HandDetailRecord {
  readonly gameId: number;
  readonly handNumber: number;
  readonly dealerPlayerId: PlayerId;
  readonly players: readonly PlayerHandDetail[];
  readonly crib: readonly CribbageCard[];
  readonly cribScore: number | null;
  readonly cribBreakdown: HandBreakdown | null;
  readonly starter: CribbageCard | null;
  readonly hisHeels: boolean;
  readonly pegging: readonly PlayedCard[];
  readonly scoreEvents: readonly ScoreEvent[];
  readonly endedDuring: CribbagePhase | null;
}

export interface GameSummaryPlayer {
  playerId: PlayerId;
  name: string;
  score: number;
  playPoints: number;
  countPoints: number;
}

export interface GameSummaryRecord {
  readonly gameId: number;
  readonly winnerPlayerId: PlayerId;
  readonly players: readonly GameSummaryPlayer[];
  readonly handsPlayed: number;
  readonly seed: number | null;
  readonly timestamp: string;
}

export interface RunSummary {
  games: number;
  wins: Record<PlayerId, number>;
  winPercentage: Record<PlayerId, number>;
  averageHands: number;
  seeds: number[];
}

// Game constants
export const CRIBBAGE_WINNING_SCORE = 121;
export const MAX_PEGGING_COUNT = 31;
export const INITIAL_HAND_SIZE = 6;
export const DISCARD_COUNT = 2;
export const PLAY_HAND_SIZE = 4;
export const HIS_HEELS_POINTS = 2;
