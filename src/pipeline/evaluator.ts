import type { GameOutcome, OutcomeFetchResult, OutcomeSource, Prediction } from '../types/index.js';
import type { FailedPrediction, SkippedPrediction } from '../types/index.js';
import { SkipReason } from '../types/skip.js';
import { PersistenceError, UnresolvableOutcomeError } from '../errors.js';
import type { LedgerStore } from '../ledger/csv-store.js';
import { validateRecord, type RecordCandidate, type ValidatedRecord } from '../ledger/record-schema.js';
import { resolve, type Resolution, type ResolutionPolicy } from '../results/resolver.js';
import { injuryFlag, varianceFlag, type VariancePolicy } from './classifier.js';
import type { PredictionSource } from './prediction-loader.js';
import { expandProjection } from './projections.js';
import { ledgerKey } from './dedup.js';
import { logger } from '../utils/logger.js';

export type EvaluationPolicy = ResolutionPolicy & VariancePolicy;

export interface EvaluationDeps {
  predictions: PredictionSource;
  outcomes: OutcomeSource;
  store: LedgerStore;
  policy: EvaluationPolicy;
}

export interface EvaluationSummary {
  date: string;
  /** Prediction file that was evaluated, null when none existed */
  source: string | null;
  written: number;
  records: ValidatedRecord[];
  skipped: SkippedPrediction[];
  failed: FailedPrediction[];
}

interface OutcomeIndex {
  byGameId: Map<string, GameOutcome>;
  failures: Map<string, string>;
  pending: Set<string>;
}

type OutcomeMatch =
  | { kind: 'matched'; outcome: GameOutcome }
  | { kind: 'skipped'; reason: SkipReason; detail: string };

function indexOutcomes(fetched: OutcomeFetchResult): OutcomeIndex {
  return {
    byGameId: new Map(fetched.outcomes.map((o) => [o.gameId, o])),
    failures: new Map(fetched.failures.map((f) => [f.gameId, f.reason])),
    pending: new Set(fetched.pending),
  };
}

function matchOutcome(gameId: string, index: OutcomeIndex): OutcomeMatch {
  const outcome = index.byGameId.get(gameId);
  if (outcome) return { kind: 'matched', outcome };

  const failure = index.failures.get(gameId);
  if (failure !== undefined) {
    return { kind: 'skipped', reason: SkipReason.FetchFailed, detail: failure };
  }
  if (index.pending.has(gameId)) {
    return { kind: 'skipped', reason: SkipReason.GameNotFinal, detail: `${gameId} has not gone final` };
  }
  return { kind: 'skipped', reason: SkipReason.UnmatchedGame, detail: `No completed game ${gameId}` };
}

function joinNotes(predictionNotes: string, resolutionNotes: string): string {
  const trimmed = predictionNotes.trim();
  return trimmed ? `${trimmed}; ${resolutionNotes}` : resolutionNotes;
}

export function buildCandidate(
  prediction: Prediction,
  outcome: GameOutcome,
  resolution: Extract<Resolution, { kind: 'resolved' }>,
  policy: VariancePolicy,
): RecordCandidate {
  return {
    date: prediction.date,
    game_id: prediction.gameId,
    pick_type: prediction.pickType,
    edge_points: prediction.edgePoints,
    model_line: prediction.modelLine,
    market_line: resolution.marketLine,
    result_correct: resolution.correct,
    variance_flag: varianceFlag(outcome, policy),
    injury_flag: injuryFlag(prediction.injuryImpact),
    notes: joinNotes(prediction.notes, resolution.notes),
  };
}

/**
 * Evaluate every stored pick for one date and append one ledger row per resolved pick.
 *
 * Picks already in the ledger are skipped, so re-running a date never duplicates rows.
 * Throws only when the run cannot proceed at all: the ledger is unusable
 * (PersistenceError), the prediction file is malformed (PredictionInputError) or no
 * outcomes could be fetched (OutcomeFetchError).
 */
export async function evaluateDate(date: string, deps: EvaluationDeps): Promise<EvaluationSummary> {
  const log = logger.child({ date });
  const summary: EvaluationSummary = {
    date,
    source: null,
    written: 0,
    records: [],
    skipped: [],
    failed: [],
  };

  await deps.store.ensureStorage();

  const doc = await deps.predictions.load(date);
  if (!doc) {
    log.warn('No predictions to evaluate');
    return summary;
  }
  summary.source = doc.file;

  const index = indexOutcomes(await deps.outcomes.fetchOutcomes(date));
  const existing = await deps.store.keys();

  const skip = (gameId: string, pickType: SkippedPrediction['pickType'], reason: SkipReason, detail: string) => {
    summary.skipped.push({ gameId, pickType, reason, detail });
    log.debug({ gameId, pickType, reason }, detail);
  };

  // 1. Pair every pick with its completed game
  const candidates: Array<{ prediction: Prediction; outcome: GameOutcome }> = [];

  for (const rejected of doc.rejected) {
    skip(rejected.gameId, null, SkipReason.InvalidPrediction, `Entry ${rejected.index}: ${rejected.message}`);
  }

  if (doc.kind === 'picks') {
    for (const prediction of doc.predictions) {
      const match = matchOutcome(prediction.gameId, index);
      if (match.kind === 'skipped') {
        skip(prediction.gameId, prediction.pickType, match.reason, match.detail);
        continue;
      }
      candidates.push({ prediction, outcome: match.outcome });
    }
  } else {
    for (const game of doc.games) {
      const match = matchOutcome(game.gameId, index);
      if (match.kind === 'skipped') {
        skip(game.gameId, null, match.reason, match.detail);
        continue;
      }
      const expanded = expandProjection(game, match.outcome, date);
      for (const s of expanded.skipped) skip(s.gameId, s.pickType, s.reason, s.detail);
      for (const prediction of expanded.predictions) {
        candidates.push({ prediction, outcome: match.outcome });
      }
    }
  }

  // 2. Resolve, classify, validate, append
  for (const { prediction, outcome } of candidates) {
    const { gameId, pickType } = prediction;

    let resolution: Resolution;
    try {
      resolution = resolve(prediction, outcome, deps.policy);
    } catch (err) {
      if (!(err instanceof UnresolvableOutcomeError)) throw err;
      skip(gameId, pickType, SkipReason.UnresolvableOutcome, err.message);
      continue;
    }

    if (resolution.kind === 'skipped') {
      skip(gameId, pickType, resolution.reason, resolution.detail);
      continue;
    }

    const key = ledgerKey(prediction);
    if (existing.has(key)) {
      skip(gameId, pickType, SkipReason.AlreadyLogged, 'Already in ledger');
      continue;
    }

    const validated = validateRecord(buildCandidate(prediction, outcome, resolution, deps.policy));
    if (!validated.ok) {
      summary.failed.push({ gameId, pickType, kind: 'validation', message: validated.error.message });
      log.warn({ gameId, pickType, field: validated.error.field }, validated.error.message);
      continue;
    }

    let appended: boolean;
    try {
      appended = await deps.store.appendIfAbsent(validated.record);
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      summary.failed.push({ gameId, pickType, kind: 'persistence', message: err.message });
      log.error({ err, gameId, pickType }, 'Ledger append failed');
      continue;
    }

    existing.add(key);
    // another writer logged it after `existing` was read
    if (!appended) {
      skip(gameId, pickType, SkipReason.AlreadyLogged, 'Already in ledger');
      continue;
    }
    summary.records.push(validated.record);
    summary.written++;
    log.info(
      { gameId, pickType, correct: validated.record.resultCorrect, band: validated.record.confidenceBand },
      'Logged pick',
    );
  }

  log.info(
    { written: summary.written, skipped: summary.skipped.length, failed: summary.failed.length },
    'Evaluation complete',
  );
  return summary;
}

/** Human-readable end-of-run report: rows written, skips grouped by reason, failures. */
export function formatSummary(summary: EvaluationSummary): string {
  if (summary.source === null) {
    return `Evaluation ${summary.date}: no prediction file found`;
  }

  const lines = [
    `Evaluation ${summary.date}: ${summary.written} written, ${summary.skipped.length} skipped, ${summary.failed.length} failed`,
  ];

  const byReason = new Map<SkipReason, number>();
  for (const s of summary.skipped) {
    byReason.set(s.reason, (byReason.get(s.reason) ?? 0) + 1);
  }
  for (const [reason, count] of byReason) {
    lines.push(`  skipped ${reason}: ${count}`);
  }
  for (const f of summary.failed) {
    lines.push(`  failed ${f.gameId} ${f.pickType} (${f.kind}): ${f.message}`);
  }

  return lines.join('\n');
}
