// Cribbage hand evaluation and scoring logic

import type {
  CribbageCard,
  HandBreakdown,
  HandScore,
  PeggingResult,
  PlayedCard,
  ScoreBreakdown,
} from './cribbageTypes';
import { HIS_HEELS_POINTS, MAX_PEGGING_COUNT, PLAY_HAND_SIZE, SCORE_CATEGORIES } from './cribbageTypes';
import { cardKey, containsCard, formatCard, getCardPointValue, getRankValue, hasDuplicateCards } from './cribbageCards';
import { canPlayCard, checkNobs } from './cribbageRules';
import { illegalPlay, malformedHand } from './errors';

export function breakdownTotal(breakdown: ScoreBreakdown): number {
  return Object.values(breakdown).reduce((sum, points) => sum + (points ?? 0), 0);
}

/**
 * Drop zero-valued categories, in canonical category order
 */
export function nonZeroCategories(breakdown: ScoreBreakdown): ScoreBreakdown {
  const out: ScoreBreakdown = {};
  for (const category of SCORE_CATEGORIES) {
    const points = breakdown[category];
    if (points) out[category] = points;
  }
  return out;
}

/**
 * Count all combinations of two or more cards that sum to 15 (2 points each)
 */
function countFifteens(cards: readonly CribbageCard[]): number {
  const values = cards.map(getCardPointValue);
  const n = values.length;
  let count = 0;

  for (let mask = 1; mask < (1 << n); mask++) {
    let sum = 0;
    let size = 0;
    for (let i = 0; i < n; i++) {
      if (mask & (1 << i)) {
        sum += values[i];
        size++;
      }
    }
    if (size >= 2 && sum === 15) count++;
  }

  return count * 2;
}

function rankMultiplicities(cards: readonly CribbageCard[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const card of cards) {
    const rank = getRankValue(card);
    counts.set(rank, (counts.get(rank) ?? 0) + 1);
  }
  return counts;
}

/**
 * Pairs, three-of-a-kind and four-of-a-kind: n cards of a rank make n*(n-1)/2 pairs of 2 points
 */
function countPairs(cards: readonly CribbageCard[]): number {
  let points = 0;
  for (const count of rankMultiplicities(cards).values()) {
    points += count * (count - 1);
  }
  return points;
}

/**
 * Score the longest run(s). Duplicate ranks inside a run multiply it
 * (3-4-5-5 is two runs of 3), and every region of the longest length scores.
 */
function countRuns(cards: readonly CribbageCard[]): number {
  const counts = rankMultiplicities(cards);
  const uniqueRanks = [...counts.keys()].sort((a, b) => a - b);

  const regions: number[][] = [];
  let current: number[] = [];
  for (const rank of uniqueRanks) {
    if (current.length > 0 && rank !== current[current.length - 1] + 1) {
      regions.push(current);
      current = [];
    }
    current.push(rank);
  }
  if (current.length > 0) regions.push(current);

  const runRegions = regions.filter(region => region.length >= 3);
  if (runRegions.length === 0) return 0;

  const longest = Math.max(...runRegions.map(region => region.length));
  let points = 0;
  for (const region of runRegions) {
    if (region.length !== longest) continue;
    const multiplier = region.reduce((product, rank) => product * (counts.get(rank) ?? 0), 1);
    points += longest * multiplier;
  }
  return points;
}

/**
 * Hand: 4 for a four-card flush, 5 when the starter matches too.
 * Crib: only a five-card flush counts.
 */
function countFlush(hand: readonly CribbageCard[], starter: CribbageCard, isCrib: boolean): number {
  const suit = hand[0].suit;
  if (!hand.every(card => card.suit === suit)) return 0;

  if (starter.suit === suit) return 5;
  return isCrib ? 0 : 4;
}

function assertWellFormed(hand: readonly CribbageCard[], starter: CribbageCard): void {
  if (hand.length !== PLAY_HAND_SIZE) {
    throw malformedHand(`expected ${PLAY_HAND_SIZE} cards, got ${hand.length}`);
  }
  if (hasDuplicateCards(hand)) {
    throw malformedHand(`duplicate card in ${hand.map(cardKey).join(', ')}`);
  }
  if (containsCard(hand, starter)) {
    throw malformedHand(`starter ${formatCard(starter)} is also in the hand`);
  }
}

/**
 * Evaluate a four-card hand or crib together with the starter
 */
export function evaluateHand(
  hand: readonly CribbageCard[],
  starter: CribbageCard,
  isCrib: boolean = false
): HandScore {
  assertWellFormed(hand, starter);
  const allCards = [...hand, starter];

  const breakdown: HandBreakdown = {
    fifteens: countFifteens(allCards),
    pairs: countPairs(allCards),
    runs: countRuns(allCards),
    flush: countFlush(hand, starter, isCrib),
    nobs: checkNobs(hand, starter) ? 1 : 0,
  };

  return { breakdown, total: breakdownTotal(breakdown) };
}

function pairPoints(streak: number): number {
  return streak >= 2 ? streak * (streak - 1) : 0;
}

/**
 * Longest trailing run in the current cycle. A suffix only counts when its
 * ranks are k distinct consecutive values.
 */
function trailingRunLength(cards: readonly CribbageCard[]): number {
  for (let len = cards.length; len >= 3; len--) {
    const ranks = cards.slice(-len).map(getRankValue);
    const distinct = new Set(ranks);
    if (distinct.size !== len) continue;
    if (Math.max(...ranks) - Math.min(...ranks) === len - 1) return len;
  }
  return 0;
}

/**
 * Evaluate pegging points for a card played onto the current cycle
 */
export function evaluatePegging(
  playedCards: readonly PlayedCard[],
  newCard: CribbageCard,
  currentCount: number
): PeggingResult {
  if (!canPlayCard(newCard, currentCount)) {
    throw illegalPlay(`${formatCard(newCard)} would take the count past ${MAX_PEGGING_COUNT} from ${currentCount}`);
  }
  const newCount = currentCount + getCardPointValue(newCard);
  const breakdown: ScoreBreakdown = {};

  if (newCount === 15) breakdown['play-fifteen'] = 2;
  if (newCount === MAX_PEGGING_COUNT) breakdown['play-thirty-one'] = 2;

  let streak = 1;
  for (let i = playedCards.length - 1; i >= 0; i--) {
    if (playedCards[i].card.rank !== newCard.rank) break;
    streak++;
  }
  if (streak >= 2) breakdown['play-pair'] = pairPoints(streak);

  const run = trailingRunLength([...playedCards.map(p => p.card), newCard]);
  if (run > 0) breakdown['play-run'] = run;

  return {
    newCount,
    breakdown,
    total: breakdownTotal(breakdown),
    resetsCount: newCount === MAX_PEGGING_COUNT,
  };
}

export function goBreakdown(): ScoreBreakdown {
  return { 'play-go': 1 };
}

export function heelsBreakdown(): ScoreBreakdown {
  return { heels: HIS_HEELS_POINTS };
}
