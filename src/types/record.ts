import type { PickType } from './prediction.js';

export const CONFIDENCE_BANDS = ['low', 'medium', 'high', 'elite'] as const;
export const VARIANCE_FLAGS = ['high_variance', 'normal'] as const;
export const INJURY_FLAGS = ['major', 'minor', 'none'] as const;

export type ConfidenceBand = (typeof CONFIDENCE_BANDS)[number];
export type VarianceFlag = (typeof VARIANCE_FLAGS)[number];
export type InjuryFlag = (typeof INJURY_FLAGS)[number];

/** One row of the performance ledger. */
export interface PerformanceRecord {
  date: string;
  gameId: string;
  pickType: PickType;
  edgePoints: number;
  modelLine: number;
  marketLine: number;
  resultCorrect: boolean;
  confidenceBand: ConfidenceBand;
  varianceFlag: VarianceFlag;
  injuryFlag: InjuryFlag;
  notes: string;
}

/** Ledger columns, in file order. */
export const LEDGER_COLUMNS = [
  'date',
  'game_id',
  'pick_type',
  'edge_points',
  'model_line',
  'market_line',
  'result_correct',
  'confidence_band',
  'variance_flag',
  'injury_flag',
  'notes',
] as const;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];
