import { config } from '../config.js';
import { CsvLedgerStore } from '../ledger/csv-store.js';
import { EspnOutcomeSource } from '../results/espn-fetcher.js';
import { FilePredictionSource } from './prediction-loader.js';
import type { EvaluationDeps } from './evaluator.js';

/** Production collaborators, wired from config. */
export function createEvaluationDeps(): EvaluationDeps {
  return {
    predictions: new FilePredictionSource(config.PREDICTIONS_DIR),
    outcomes: new EspnOutcomeSource(),
    store: new CsvLedgerStore(config.LEDGER_PATH),
    policy: {
      pushPolicy: config.PUSH_POLICY,
      closeGameMargin: config.CLOSE_GAME_MARGIN,
      overtimeTotalProxy: config.OVERTIME_TOTAL_PROXY,
    },
  };
}
