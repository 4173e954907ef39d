import { z } from 'zod';
import { PICK_TYPES } from '../types/prediction.js';
import { CONFIDENCE_BANDS, INJURY_FLAGS, VARIANCE_FLAGS } from '../types/record.js';
import type { PerformanceRecord } from '../types/record.js';
import { ValidationError } from '../errors.js';
import { isCalendarDate } from '../utils/date.js';
import { round2 } from '../utils/math.js';
import { EDGE_THRESHOLDS, confidenceBand, pickFamily } from '../pipeline/classifier.js';

const GAME_ID = /^[A-Z0-9]+@[A-Z0-9]+$/;

const requiredText = z.string().trim().min(1, 'must not be empty');
// Numbers are rounded to the stored precision before the band is derived
const finiteNumber = z.number().finite();
const ledgerNumber = finiteNumber.transform(round2);

/**
 * Candidate ledger row as supplied by the pipeline or a manual entry.
 * Keys are checked in column order, so the first issue names the first failing column.
 */
export const recordSchema = z
  .object({
    date: requiredText.refine(isCalendarDate, 'must be a YYYY-MM-DD calendar date'),
    game_id: requiredText.regex(GAME_ID, 'must be AWAY@HOME with uppercase abbreviations'),
    pick_type: z.enum(PICK_TYPES),
    edge_points: finiteNumber.nonnegative().transform(round2),
    model_line: ledgerNumber,
    market_line: ledgerNumber,
    result_correct: z.boolean(),
    confidence_band: z.enum(CONFIDENCE_BANDS).optional(),
    variance_flag: z.enum(VARIANCE_FLAGS),
    injury_flag: z.enum(INJURY_FLAGS),
    notes: z.string().default(''),
  })
  .superRefine((row, ctx) => {
    const family = pickFamily(row.pick_type);
    const threshold = EDGE_THRESHOLDS[family];
    if (row.edge_points < threshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['edge_points'],
        message: `must be at least ${threshold} for ${family} picks`,
      });
      return;
    }
    const derived = confidenceBand(row.edge_points);
    if (row.confidence_band !== undefined && row.confidence_band !== derived) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['confidence_band'],
        message: `'${row.confidence_band}' does not match edge ${row.edge_points} (expected '${derived}')`,
      });
    }
  })
  .transform(
    (row): PerformanceRecord => ({
      date: row.date,
      gameId: row.game_id,
      pickType: row.pick_type,
      edgePoints: row.edge_points,
      modelLine: row.model_line,
      marketLine: row.market_line,
      resultCorrect: row.result_correct,
      confidenceBand: row.confidence_band ?? confidenceBand(row.edge_points),
      varianceFlag: row.variance_flag,
      injuryFlag: row.injury_flag,
      notes: row.notes,
    }),
  )
  .brand<'ValidatedRecord'>();

export type RecordCandidate = z.input<typeof recordSchema>;
/** A PerformanceRecord that passed validation; the only thing the ledger accepts. */
export type ValidatedRecord = z.output<typeof recordSchema>;

export type ValidationResult =
  | { ok: true; record: ValidatedRecord }
  | { ok: false; error: ValidationError };

export function validateRecord(candidate: unknown): ValidationResult {
  const parsed = recordSchema.safeParse(candidate);
  if (parsed.success) return { ok: true, record: parsed.data };

  const [issue] = parsed.error.issues;
  const field = issue?.path[0];
  return {
    ok: false,
    error: new ValidationError(
      typeof field === 'string' ? field : 'record',
      issue?.message ?? 'invalid record',
    ),
  };
}

export function assertValidRecord(candidate: unknown): ValidatedRecord {
  const result = validateRecord(candidate);
  if (!result.ok) throw result.error;
  return result.record;
}
