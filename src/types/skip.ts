import type { PickType } from './prediction.js';

export const SkipReason = {
  BelowThreshold: 'below_threshold',
  UnmatchedGame: 'unmatched_game',
  GameNotFinal: 'game_not_final',
  FetchFailed: 'fetch_failed',
  UnresolvableOutcome: 'unresolvable_outcome',
  NoImpliedSide: 'no_implied_side',
  Push: 'push',
  AlreadyLogged: 'already_logged',
  InvalidPrediction: 'invalid_prediction',
} as const;

export type SkipReason = (typeof SkipReason)[keyof typeof SkipReason];

/** A prediction that was deliberately left out of the ledger. */
export interface SkippedPrediction {
  gameId: string;
  /** null when the pick type could not be determined (e.g. unmatched projection) */
  pickType: PickType | null;
  reason: SkipReason;
  detail: string;
}

/** A prediction that resolved but could not be written. */
export interface FailedPrediction {
  gameId: string;
  pickType: PickType;
  kind: 'validation' | 'persistence';
  message: string;
}
