/**
 * Cribbage player policies
 *
 * The game asks a policy for two things:
 * 1. Which two cards to discard to the crib
 * 2. Which card to play during pegging (null means "go")
 *
 * Both policies here are uninformed. The game validates every choice.
 */

import type { CribbageCard, PlayedCard, PlayerId } from './cribbageTypes';
import { DISCARD_COUNT } from './cribbageTypes';
import { canPlayCard } from './cribbageRules';
import { randomInt, sampleWithoutReplacement } from './cribbageRng';
import type { RNG } from './cribbageRng';

export interface DiscardContext {
  playerId: PlayerId;
  hand: readonly CribbageCard[];
  isDealer: boolean;
}

export interface PlayContext {
  playerId: PlayerId;
  hand: readonly CribbageCard[]; // cards not yet played this deal
  currentCount: number;
  playedCards: readonly PlayedCard[]; // current cycle
}

export interface CribbagePolicy {
  readonly name: string;
  chooseDiscards(ctx: DiscardContext): CribbageCard[];
  choosePlay(ctx: PlayContext): CribbageCard | null;
}

export type PolicyName = 'random' | 'first-legal';

function playableCards(ctx: PlayContext): CribbageCard[] {
  return ctx.hand.filter(card => canPlayCard(card, ctx.currentCount));
}

/**
 * Discards two cards and plays a legal card, both uniformly at random
 */
export function createRandomPolicy(rng: RNG): CribbagePolicy {
  return {
    name: 'random',
    chooseDiscards: ({ hand }) => sampleWithoutReplacement(hand, DISCARD_COUNT, rng),
    choosePlay: ctx => {
      const playable = playableCards(ctx);
      if (playable.length === 0) return null;
      return playable[randomInt(rng, playable.length)];
    },
  };
}

/**
 * Random discards, then always the first legal card in hand order
 */
export function createFirstLegalPolicy(rng: RNG): CribbagePolicy {
  return {
    name: 'first-legal',
    chooseDiscards: ({ hand }) => sampleWithoutReplacement(hand, DISCARD_COUNT, rng),
    choosePlay: ctx => playableCards(ctx)[0] ?? null,
  };
}

export function createPolicy(name: PolicyName, rng: RNG): CribbagePolicy {
  switch (name) {
    case 'random':
      return createRandomPolicy(rng);
    case 'first-legal':
      return createFirstLegalPolicy(rng);
  }
}
