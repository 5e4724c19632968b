export type CribbageErrorCode =
  | 'DECK_EXHAUSTED'
  | 'INVALID_DISCARD'
  | 'ILLEGAL_PLAY'
  | 'MISSED_PLAY'
  | 'MALFORMED_HAND'
  | 'INVALID_PHASE'
  | 'NOT_YOUR_TURN'
  | 'INVALID_CONFIG'
  | 'INVARIANT';

export class CribbageError extends Error {
  readonly code: CribbageErrorCode;

  constructor(message: string, code: CribbageErrorCode) {
    super(message);
    this.name = 'CribbageError';
    this.code = code;
  }
}

export function isCribbageError(err: unknown, code?: CribbageErrorCode): err is CribbageError {
  return err instanceof CribbageError && (code === undefined || err.code === code);
}

// Pre-built errors for common cases

export function deckExhausted() {
  return new CribbageError('Cannot deal from an exhausted deck', 'DECK_EXHAUSTED');
}

export function invalidDiscard(reason: string) {
  return new CribbageError(`Invalid discard: ${reason}`, 'INVALID_DISCARD');
}

export function illegalPlay(reason: string) {
  return new CribbageError(`Illegal play: ${reason}`, 'ILLEGAL_PLAY');
}

export function missedPlay(playerId: string) {
  return new CribbageError(`${playerId} called go while holding a playable card`, 'MISSED_PLAY');
}

export function malformedHand(reason: string) {
  return new CribbageError(`Malformed hand: ${reason}`, 'MALFORMED_HAND');
}

export function invalidPhase(expected: string, actual: string) {
  return new CribbageError(`Expected phase ${expected}, game is in ${actual}`, 'INVALID_PHASE');
}

export function notYourTurn(playerId: string) {
  return new CribbageError(`Not ${playerId}'s turn`, 'NOT_YOUR_TURN');
}

export function invalidConfig(details: string) {
  return new CribbageError(`Invalid configuration: ${details}`, 'INVALID_CONFIG');
}

export function invariant(message: string) {
  return new CribbageError(message, 'INVARIANT');
}
