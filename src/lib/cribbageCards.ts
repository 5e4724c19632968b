// Card model helpers

import type { CribbageCard, Rank, Suit } from './cribbageTypes';
import { malformedHand } from './errors';

export const RANKS: readonly Rank[] = ['A', '2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K'];
export const SUITS: readonly Suit[] = ['clubs', 'diamonds', 'hearts', 'spades'];

const SUIT_SYMBOLS: Record<Suit, string> = {
  clubs: '♣',
  diamonds: '♦',
  hearts: '♥',
  spades: '♠',
};

export function createCard(rank: Rank, suit: Suit): CribbageCard {
  return Object.freeze({ rank, suit });
}

/**
 * Get the numeric rank value (A=1, 2-10=face, J=11, Q=12, K=13)
 */
export function getRankValue(card: CribbageCard): number {
  return RANKS.indexOf(card.rank) + 1;
}

/**
 * Get the point value for counting to 15 and 31 (A=1, 2-10=face, J/Q/K=10)
 */
export function getCardPointValue(card: CribbageCard): number {
  return Math.min(getRankValue(card), 10);
}

export function cardKey(card: CribbageCard): string {
  return `${card.rank}-${card.suit}`;
}

export function cardsEqual(a: CribbageCard, b: CribbageCard): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

export function containsCard(cards: readonly CribbageCard[], card: CribbageCard): boolean {
  return cards.some(c => cardsEqual(c, card));
}

/**
 * Remove the given cards (by value) from a list, returning a new list
 */
export function withoutCards(cards: readonly CribbageCard[], removed: readonly CribbageCard[]): CribbageCard[] {
  return cards.filter(c => !containsCard(removed, c));
}

export function hasDuplicateCards(cards: readonly CribbageCard[]): boolean {
  return new Set(cards.map(cardKey)).size !== cards.length;
}

export function formatCard(card: CribbageCard): string {
  return `${card.rank}${SUIT_SYMBOLS[card.suit]}`;
}

export function formatCards(cards: readonly CribbageCard[]): string {
  return cards.map(formatCard).join(',');
}

function isRank(value: string): value is Rank {
  return RANKS.some(r => r === value);
}

/**
 * Parse a card written as `5♠`, `10h` or `Jd`
 */
export function parseCard(text: string): CribbageCard {
  const trimmed = text.trim();
  const rankPart = trimmed.slice(0, -1).toUpperCase();
  const suitPart = trimmed.slice(-1).toLowerCase();

  const suit = SUITS.find(s => SUIT_SYMBOLS[s] === suitPart || s[0] === suitPart);
  if (!isRank(rankPart) || !suit) {
    throw malformedHand(`cannot parse card "${text}"`);
  }
  return createCard(rankPart, suit);
}

export function parseCards(text: string): CribbageCard[] {
  return text.split(/[\s,]+/).filter(Boolean).map(parseCard);
}
