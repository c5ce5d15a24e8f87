export type CombatErrorKind =
  | 'InvalidHandSize'
  | 'IllegalStateTransition'
  | 'EmptyDeckDraw'
  | 'NegativeMagnitudeEffect'
  | 'CardNotInHand'
  | 'DiscardLimitReached'
  | 'InvalidDeck'
  | 'UnknownItem';

export class CombatError extends Error {
  readonly kind: CombatErrorKind;

  constructor(kind: CombatErrorKind, message: string) {
    super(message);
    this.name = 'CombatError';
    this.kind = kind;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: CombatError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: CombatErrorKind, message: string): Result<T> {
  return { ok: false, error: new CombatError(kind, message) };
}
