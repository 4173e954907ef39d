export const SPREAD_PICK_TYPES = [
  'spread_dog_value',
  'spread_fav_small',
  'spread_big_edge',
  'flipped_favorite',
] as const;

export const TOTAL_PICK_TYPES = [
  'total_over_value',
  'total_under_value',
  'total_over_big_edge',
  'total_under_big_edge',
] as const;

export const PICK_TYPES = [...SPREAD_PICK_TYPES, ...TOTAL_PICK_TYPES] as const;

export type SpreadPickType = (typeof SPREAD_PICK_TYPES)[number];
export type TotalPickType = (typeof TOTAL_PICK_TYPES)[number];
export type PickType = SpreadPickType | TotalPickType;
export type PickFamily = 'spread' | 'total';

interface PredictionBase {
  /** ISO date string, e.g. '2025-12-11' */
  readonly date: string;
  /** AWAY@HOME, e.g. 'BOS@MIL' */
  readonly gameId: string;
  /** Points between model and market, always >= 0 */
  readonly edgePoints: number;
  /** Model spread (home perspective, negative = home favored) or model total */
  readonly modelLine: number;
  /** Largest injury adjustment in points, null when the model reported none */
  readonly injuryImpact: number | null;
  readonly notes: string;
}

export interface SpreadPrediction extends PredictionBase {
  readonly family: 'spread';
  readonly pickType: SpreadPickType;
}

export interface TotalPrediction extends PredictionBase {
  readonly family: 'total';
  readonly pickType: TotalPickType;
}

/** One model pick as produced by the prediction run. */
export type Prediction = SpreadPrediction | TotalPrediction;

export function isSpreadPickType(value: string): value is SpreadPickType {
  return (SPREAD_PICK_TYPES as readonly string[]).includes(value);
}
