export type {
  Prediction,
  SpreadPrediction,
  TotalPrediction,
  PickType,
  SpreadPickType,
  TotalPickType,
  PickFamily,
} from './prediction.js';
export type { GameOutcome, OutcomeFailure, OutcomeFetchResult, OutcomeSource } from './result.js';
export type {
  PerformanceRecord,
  ConfidenceBand,
  VarianceFlag,
  InjuryFlag,
  LedgerColumn,
} from './record.js';
export type { SkippedPrediction, FailedPrediction } from './skip.js';
