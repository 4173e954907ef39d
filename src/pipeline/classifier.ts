import type { GameOutcome } from '../types/result.js';
import type { ConfidenceBand, InjuryFlag, VarianceFlag } from '../types/record.js';
import type { PickFamily, PickType, SpreadPickType, TotalPickType } from '../types/prediction.js';
import { isSpreadPickType } from '../types/prediction.js';

/**
 * Pure classification functions. No side effects, no I/O.
 * Every real input maps to exactly one bucket.
 */

export interface VariancePolicy {
  /** A final margin at or below this many points counts as a close game */
  closeGameMargin: number;
  /** Combined score treated as an overtime signal when the period count is unknown */
  overtimeTotalProxy: number;
}

export const DEFAULT_VARIANCE_POLICY: VariancePolicy = {
  closeGameMargin: 3,
  overtimeTotalProxy: 260,
};

/** Minimum edge, in points, for a pick to be evaluated at all. */
export const EDGE_THRESHOLDS: Record<PickFamily, number> = {
  spread: 1.0,
  total: 2.0,
};

const BIG_EDGE = 4.0;

export function confidenceBand(edgePoints: number): ConfidenceBand {
  const edge = Math.abs(edgePoints);
  if (edge < 2.0) return 'low';
  if (edge < 4.0) return 'medium';
  if (edge < 6.0) return 'high';
  return 'elite';
}

export function injuryFlag(impact: number | null | undefined): InjuryFlag {
  if (impact == null) return 'none';
  const magnitude = Math.abs(impact);
  if (magnitude >= 2.0) return 'major';
  if (magnitude >= 0.5) return 'minor';
  return 'none';
}

export function varianceFlag(
  outcome: Pick<GameOutcome, 'homeScore' | 'awayScore' | 'overtime'>,
  policy: VariancePolicy = DEFAULT_VARIANCE_POLICY,
): VarianceFlag {
  const margin = Math.abs(outcome.homeScore - outcome.awayScore);
  if (margin <= policy.closeGameMargin) return 'high_variance';

  const wentToOvertime =
    outcome.overtime ?? outcome.homeScore + outcome.awayScore >= policy.overtimeTotalProxy;
  return wentToOvertime ? 'high_variance' : 'normal';
}

export function pickFamily(pickType: PickType): PickFamily {
  return isSpreadPickType(pickType) ? 'spread' : 'total';
}

/**
 * Name a spread pick from the model line against the market line.
 * Lines are home perspective: negative means the home side is favored.
 */
export function classifySpreadPick(
  edgePoints: number,
  modelLine: number,
  marketLine: number,
): SpreadPickType {
  const edge = Math.abs(edgePoints);
  const modelFavorsHome = modelLine < 0;
  const marketFavorsHome = marketLine < 0;
  if (modelFavorsHome !== marketFavorsHome) return 'flipped_favorite';
  if (edge >= BIG_EDGE) return 'spread_big_edge';
  if (edge >= 2.0 && marketLine <= 0) return 'spread_fav_small';
  return 'spread_dog_value';
}

export function classifyTotalPick(
  edgePoints: number,
  modelLine: number,
  marketLine: number,
): TotalPickType {
  const over = modelLine > marketLine;
  if (Math.abs(edgePoints) >= BIG_EDGE) return over ? 'total_over_big_edge' : 'total_under_big_edge';
  return over ? 'total_over_value' : 'total_under_value';
}
