import type { GameOutcome } from '../types/result.js';
import type { Prediction, SpreadPrediction, TotalPrediction } from '../types/prediction.js';
import { SkipReason } from '../types/skip.js';
import { UnresolvableOutcomeError } from '../errors.js';
import { EDGE_THRESHOLDS } from '../pipeline/classifier.js';

/** `loss` counts a push as an incorrect pick; `void` leaves it out of the ledger. */
export type PushPolicy = 'loss' | 'void';

export interface ResolutionPolicy {
  pushPolicy: PushPolicy;
}

export type Resolution =
  | {
      kind: 'resolved';
      correct: boolean;
      push: boolean;
      marketLine: number;
      notes: string;
    }
  | {
      kind: 'skipped';
      reason: SkipReason;
      detail: string;
    };

type ScoreLine = Pick<GameOutcome, 'gameId' | 'homeScore' | 'awayScore'>;

function signed(value: number, digits: number): string {
  const text = value.toFixed(digits);
  return value >= 0 ? `+${text}` : text;
}

export function meetsEdgeThreshold(prediction: Prediction): boolean {
  return prediction.edgePoints >= EDGE_THRESHOLDS[prediction.family];
}

function settle(
  margin: number,
  backedSideWon: boolean,
  marketLine: number,
  notes: string,
  policy: ResolutionPolicy,
): Resolution {
  if (margin !== 0) {
    return { kind: 'resolved', correct: backedSideWon, push: false, marketLine, notes };
  }
  if (policy.pushPolicy === 'void') {
    return { kind: 'skipped', reason: SkipReason.Push, detail: `${notes} (push)` };
  }
  return { kind: 'resolved', correct: false, push: true, marketLine, notes: `${notes} (push)` };
}

/**
 * Against the spread: the model backs home when its line is more home-favored than
 * the closing line, away otherwise. For a flipped favorite this puts the model on
 * the market underdog.
 */
export function resolveSpread(
  prediction: SpreadPrediction,
  outcome: ScoreLine & Pick<GameOutcome, 'closingSpread'>,
  policy: ResolutionPolicy,
): Resolution {
  const market = outcome.closingSpread;
  if (market == null) throw new UnresolvableOutcomeError(outcome.gameId, 'closing spread');

  if (prediction.modelLine === market) {
    return {
      kind: 'skipped',
      reason: SkipReason.NoImpliedSide,
      detail: `Model line ${prediction.modelLine} equals closing spread`,
    };
  }

  const actualMargin = outcome.homeScore - outcome.awayScore;
  const atsMargin = actualMargin + market;
  const backsHome = prediction.modelLine < market;
  const backedSideCovered = backsHome ? atsMargin > 0 : atsMargin < 0;
  const notes = `Actual: ${signed(actualMargin, 0)}, ATS vs market: ${signed(atsMargin, 1)}`;

  return settle(atsMargin, backedSideCovered, market, notes, policy);
}

/** Over/under against the closing total; the direction comes from the pick type. */
export function resolveTotal(
  prediction: TotalPrediction,
  outcome: ScoreLine & Pick<GameOutcome, 'closingTotal'>,
  policy: ResolutionPolicy,
): Resolution {
  const market = outcome.closingTotal;
  if (market == null) throw new UnresolvableOutcomeError(outcome.gameId, 'closing total');

  const actualTotal = outcome.homeScore + outcome.awayScore;
  const diff = actualTotal - market;
  const over = prediction.pickType.startsWith('total_over');
  const notes = `Actual: ${actualTotal}, vs market ${market} (${signed(diff, 1)})`;

  return settle(diff, over ? diff > 0 : diff < 0, market, notes, policy);
}

/**
 * Decide whether a stored pick was right.
 * Throws UnresolvableOutcomeError when the outcome has no closing line for the pick's market.
 */
export function resolve(
  prediction: Prediction,
  outcome: GameOutcome,
  policy: ResolutionPolicy,
): Resolution {
  if (!meetsEdgeThreshold(prediction)) {
    return {
      kind: 'skipped',
      reason: SkipReason.BelowThreshold,
      detail: `Edge ${prediction.edgePoints} below ${EDGE_THRESHOLDS[prediction.family]} ${prediction.family} threshold`,
    };
  }

  switch (prediction.family) {
    case 'spread':
      return resolveSpread(prediction, outcome, policy);
    case 'total':
      return resolveTotal(prediction, outcome, policy);
  }
}
