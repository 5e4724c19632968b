import { describe, it, expect } from 'vitest';
import {
  canPlayCard,
  checkHisHeels,
  checkNobs,
  hasLegalPlay,
  isGameWon,
  maxPeggingCount,
  validateDiscard,
  validatePlay,
  winThreshold,
} from './cribbageRules';
import { parseCard, parseCards } from './cribbageCards';
import { CribbageError } from './errors';

describe('pegging legality', () => {
  it('allows a card that reaches exactly 31', () => {
    expect(canPlayCard(parseCard('Ks'), 21)).toBe(true);
    expect(canPlayCard(parseCard('Ks'), 22)).toBe(false);
  });

  it('finds any legal play in a hand', () => {
    expect(hasLegalPlay(parseCards('Ks Qh'), 25)).toBe(false);
    expect(hasLegalPlay(parseCards('Ks Ah'), 25)).toBe(true);
    expect(hasLegalPlay([], 0)).toBe(false);
  });

  it('validates plays', () => {
    expect(() => validatePlay(parseCards('Ks Ah'), parseCard('2h'), 0)).toThrow('Illegal play: 2♥ is not in hand');
    expect(() => validatePlay(parseCards('Ks Ah'), parseCard('Ks'), 25)).toThrow(CribbageError);
    expect(() => validatePlay(parseCards('Ks Ah'), parseCard('Ah'), 25)).not.toThrow();
  });
});

describe('validateDiscard', () => {
  const hand = parseCards('As 2h 3d 4c 5s 6h');

  it('accepts two distinct cards from a six-card hand', () => {
    expect(() => validateDiscard(hand, parseCards('As 6h'))).not.toThrow();
  });

  it('rejects the wrong number of cards', () => {
    expect(() => validateDiscard(hand, parseCards('As'))).toThrow('Invalid discard: expected 2 cards, got 1');
    expect(() => validateDiscard(hand.slice(0, 4), parseCards('As 2h'))).toThrow(
      'Invalid discard: hand holds 4 cards, expected 6'
    );
  });

  it('rejects duplicates and cards not in hand', () => {
    expect(() => validateDiscard(hand, parseCards('As As'))).toThrow('Invalid discard: the same card was chosen twice');
    expect(() => validateDiscard(hand, parseCards('As Kd'))).toThrow('Invalid discard: K♦ is not in hand');
  });
});

describe('jacks and winning', () => {
  it('recognises his heels and nobs', () => {
    expect(checkHisHeels(parseCard('Jd'))).toBe(true);
    expect(checkHisHeels(parseCard('Qd'))).toBe(false);
    expect(checkNobs(parseCards('Jd 2s 3s 4s'), parseCard('9d'))).toBe(true);
    expect(checkNobs(parseCards('Jd 2s 3s 4s'), parseCard('9s'))).toBe(false);
  });

  it('wins at 121', () => {
    expect(isGameWon(120)).toBe(false);
    expect(isGameWon(121)).toBe(true);
    expect(isGameWon(125)).toBe(true);
  });

  it('plays to 121 with counts capped at 31', () => {
    expect(winThreshold()).toBe(121);
    expect(maxPeggingCount()).toBe(31);
  });
});
