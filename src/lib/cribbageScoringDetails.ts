// Per-combination breakdown of a counted hand, for detailed logging

import type { CribbageCard, HandCategory } from './cribbageTypes';
import { formatCards, getCardPointValue, getRankValue } from './cribbageCards';
import { checkNobs } from './cribbageRules';

export interface ScoringCombo {
  category: HandCategory;
  cards: CribbageCard[];
  points: number;
  label: string;
}

function findFifteens(cards: readonly CribbageCard[]): ScoringCombo[] {
  const combos: ScoringCombo[] = [];
  const n = cards.length;

  for (let mask = 1; mask < (1 << n); mask++) {
    const comboCards = cards.filter((_, i) => mask & (1 << i));
    if (comboCards.length < 2) continue;
    const sum = comboCards.reduce((acc, card) => acc + getCardPointValue(card), 0);
    if (sum === 15) {
      combos.push({ category: 'fifteens', cards: comboCards, points: 2, label: '15 for 2' });
    }
  }

  return combos;
}

function groupByRank(cards: readonly CribbageCard[]): Map<number, CribbageCard[]> {
  const groups = new Map<number, CribbageCard[]>();
  for (const card of cards) {
    const rank = getRankValue(card);
    groups.set(rank, [...(groups.get(rank) ?? []), card]);
  }
  return groups;
}

/**
 * Pairs, trips and quads as one combo per rank
 */
function findPairsTripsQuads(cards: readonly CribbageCard[]): ScoringCombo[] {
  const combos: ScoringCombo[] = [];
  for (const group of groupByRank(cards).values()) {
    const n = group.length;
    if (n < 2) continue;
    const rank = group[0].rank;
    const label = n === 4 ? `Quads (${rank}s)` : n === 3 ? `Trips (${rank}s)` : `Pair of ${rank}s`;
    combos.push({ category: 'pairs', cards: group, points: n * (n - 1), label });
  }
  return combos;
}

/**
 * Every distinct card combination forming a run of the longest length
 */
function findRuns(cards: readonly CribbageCard[]): ScoringCombo[] {
  const groups = groupByRank(cards);
  const uniqueRanks = [...groups.keys()].sort((a, b) => a - b);

  const regions: number[][] = [];
  for (const rank of uniqueRanks) {
    const last = regions[regions.length - 1];
    if (last && last[last.length - 1] + 1 === rank) last.push(rank);
    else regions.push([rank]);
  }
  const runRegions = regions.filter(r => r.length >= 3);
  if (runRegions.length === 0) return [];
  const longest = Math.max(...runRegions.map(r => r.length));

  const combos: ScoringCombo[] = [];
  for (const region of runRegions.filter(r => r.length === longest)) {
    const generateRuns = (idx: number, current: CribbageCard[]): CribbageCard[][] => {
      if (idx === region.length) return [current];
      return (groups.get(region[idx]) ?? []).flatMap(card => generateRuns(idx + 1, [...current, card]));
    };
    for (const run of generateRuns(0, [])) {
      combos.push({ category: 'runs', cards: run, points: run.length, label: `Run of ${run.length}` });
    }
  }
  return combos;
}

function findFlush(hand: readonly CribbageCard[], starter: CribbageCard, isCrib: boolean): ScoringCombo[] {
  const suit = hand[0]?.suit;
  if (!suit || !hand.every(c => c.suit === suit)) return [];

  if (starter.suit === suit) {
    return [{ category: 'flush', cards: [...hand, starter], points: 5, label: 'Flush (5 cards)' }];
  }
  if (isCrib) return [];
  return [{ category: 'flush', cards: [...hand], points: 4, label: 'Flush (4 cards)' }];
}

function findNobs(hand: readonly CribbageCard[], starter: CribbageCard): ScoringCombo[] {
  if (!checkNobs(hand, starter)) return [];
  const jack = hand.filter(c => c.rank === 'J' && c.suit === starter.suit);
  return [{ category: 'nobs', cards: jack, points: 1, label: 'Nobs' }];
}

/**
 * Get all scoring combinations for a hand or crib with its starter
 */
export function getHandScoringCombos(
  hand: readonly CribbageCard[],
  starter: CribbageCard,
  isCrib: boolean = false
): ScoringCombo[] {
  const allCards = [...hand, starter];
  return [
    ...findFifteens(allCards),
    ...findPairsTripsQuads(allCards),
    ...findRuns(allCards),
    ...findFlush(hand, starter, isCrib),
    ...findNobs(hand, starter),
  ];
}

export function getTotalFromCombos(combos: readonly ScoringCombo[]): number {
  return combos.reduce((sum, combo) => sum + combo.points, 0);
}

export function describeCombo(combo: ScoringCombo): string {
  return `${combo.label}: ${formatCards(combo.cards)}`;
}
