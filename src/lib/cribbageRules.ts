// Cribbage rule predicates. Stateless.

import type { CribbageCard } from './cribbageTypes';
import {
  CRIBBAGE_WINNING_SCORE,
  DISCARD_COUNT,
  INITIAL_HAND_SIZE,
  MAX_PEGGING_COUNT,
} from './cribbageTypes';
import { cardsEqual, containsCard, formatCard, getCardPointValue, hasDuplicateCards } from './cribbageCards';
import { illegalPlay, invalidDiscard } from './errors';

export function winThreshold(): number {
  return CRIBBAGE_WINNING_SCORE;
}

export function maxPeggingCount(): number {
  return MAX_PEGGING_COUNT;
}

export function isGameWon(score: number): boolean {
  return score >= winThreshold();
}

/**
 * Check if a card can be played (count + card value <= 31)
 */
export function canPlayCard(card: CribbageCard, currentCount: number): boolean {
  return currentCount + getCardPointValue(card) <= maxPeggingCount();
}

/**
 * Check if a player has any playable cards
 */
export function hasLegalPlay(hand: readonly CribbageCard[], currentCount: number): boolean {
  return hand.some(card => canPlayCard(card, currentCount));
}

/**
 * "His heels": the starter is a Jack (2 points to the dealer)
 */
export function checkHisHeels(starter: CribbageCard): boolean {
  return starter.rank === 'J';
}

/**
 * Nobs: the hand holds the Jack of the starter's suit
 */
export function checkNobs(hand: readonly CribbageCard[], starter: CribbageCard): boolean {
  return hand.some(card => card.rank === 'J' && card.suit === starter.suit);
}

export function validateDiscard(hand: readonly CribbageCard[], discards: readonly CribbageCard[]): void {
  if (hand.length !== INITIAL_HAND_SIZE) {
    throw invalidDiscard(`hand holds ${hand.length} cards, expected ${INITIAL_HAND_SIZE}`);
  }
  if (discards.length !== DISCARD_COUNT) {
    throw invalidDiscard(`expected ${DISCARD_COUNT} cards, got ${discards.length}`);
  }
  if (hasDuplicateCards(discards)) {
    throw invalidDiscard('the same card was chosen twice');
  }
  const missing = discards.find(card => !containsCard(hand, card));
  if (missing) {
    throw invalidDiscard(`${formatCard(missing)} is not in hand`);
  }
}

export function validatePlay(hand: readonly CribbageCard[], card: CribbageCard, currentCount: number): void {
  if (!hand.some(c => cardsEqual(c, card))) {
    throw illegalPlay(`${formatCard(card)} is not in hand`);
  }
  if (!canPlayCard(card, currentCount)) {
    throw illegalPlay(`${formatCard(card)} would take the count past ${maxPeggingCount()} from ${currentCount}`);
  }
}
