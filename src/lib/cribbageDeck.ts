// Deck construction, shuffling and dealing

import type { CribbageCard } from './cribbageTypes';
import { RANKS, SUITS, createCard } from './cribbageCards';
import type { RNG } from './cribbageRng';
import { deckExhausted } from './errors';

/**
 * Create a standard 52-card deck
 */
export function createDeck(): CribbageCard[] {
  const deck: CribbageCard[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/**
 * Shuffle a deck using Fisher-Yates, drawing only from the given RNG
 */
export function shuffleDeck(deck: readonly CribbageCard[], rng: RNG): CribbageCard[] {
  const shuffled = [...deck];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = shuffled[i];
    shuffled[i] = shuffled[j];
    shuffled[j] = tmp;
  }
  return shuffled;
}

/**
 * Take the top card off the deck. Drawing from an empty deck is an invariant violation.
 */
export function drawCard(deck: readonly CribbageCard[]): { card: CribbageCard; deck: CribbageCard[] } {
  const [card, ...rest] = deck;
  if (!card) throw deckExhausted();
  return { card, deck: rest };
}
