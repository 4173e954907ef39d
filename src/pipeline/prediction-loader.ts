import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { PICK_TYPES, isSpreadPickType } from '../types/prediction.js';
import type { Prediction } from '../types/prediction.js';
import { PredictionInputError } from '../errors.js';
import { buildGameId } from './team-resolver.js';
import { logger } from '../utils/logger.js';

const predictionEntrySchema = z.object({
  game_id: z
    .string()
    .trim()
    .min(1)
    .transform((id) => id.toUpperCase()),
  pick_type: z.enum(PICK_TYPES),
  edge_points: z.number().finite().nonnegative(),
  model_line: z.number().finite(),
  injury_impact: z.number().finite().nullish(),
  notes: z.string().default(''),
});

const predictionsDocSchema = z.object({
  date: z.string(),
  predictions: z.array(z.unknown()),
});

const lineSchema = z.number().finite().nullish();
const adjustmentSchema = z
  .number()
  .finite()
  .nullish()
  .transform((v) => v ?? 0);

const projectionGameSchema = z.object({
  home_team: z.string().trim().min(1),
  away_team: z.string().trim().min(1),
  spread: z.object({ baseline: lineSchema, rest_adjusted: lineSchema }).nullish(),
  total: z.object({ baseline: lineSchema, pace_adjusted: lineSchema }).nullish(),
  injury_impact: z
    .object({
      home_total_adjustment: adjustmentSchema,
      away_total_adjustment: adjustmentSchema,
    })
    .nullish(),
});

const projectionsDocSchema = z.object({
  date: z.string(),
  timestamp: z.string().optional(),
  games: z.array(z.unknown()),
});

export interface RejectedPrediction {
  index: number;
  gameId: string;
  message: string;
}

/** One game from the model's raw projection output. */
export interface ProjectionGame {
  gameId: string;
  homeTeam: string;
  awayTeam: string;
  /** Rest-adjusted spread when present, else baseline */
  modelSpread: number | null;
  /** Pace-adjusted total when present, else baseline */
  modelTotal: number | null;
  /** Largest absolute injury adjustment across both teams */
  injuryImpact: number;
}

export type PredictionDocument =
  | {
      kind: 'picks';
      date: string;
      file: string;
      predictions: Prediction[];
      rejected: RejectedPrediction[];
    }
  | {
      kind: 'projections';
      date: string;
      file: string;
      games: ProjectionGame[];
      rejected: RejectedPrediction[];
    };

/** Anything that can supply the model's output for a date. */
export interface PredictionSource {
  load(date: string): Promise<PredictionDocument | null>;
}

type PredictionEntry = z.infer<typeof predictionEntrySchema>;

export function toPrediction(entry: PredictionEntry, date: string): Prediction {
  const base = {
    date,
    gameId: entry.game_id,
    edgePoints: entry.edge_points,
    modelLine: entry.model_line,
    injuryImpact: entry.injury_impact ?? null,
    notes: entry.notes,
  };
  if (isSpreadPickType(entry.pick_type)) {
    return { ...base, family: 'spread', pickType: entry.pick_type };
  }
  return { ...base, family: 'total', pickType: entry.pick_type };
}

function gameIdHint(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'game_id' in raw && typeof raw.game_id === 'string') {
    return raw.game_id;
  }
  return 'unknown';
}

function matchupHint(raw: unknown): string {
  if (
    typeof raw === 'object' &&
    raw !== null &&
    'home_team' in raw &&
    'away_team' in raw &&
    typeof raw.home_team === 'string' &&
    typeof raw.away_team === 'string' &&
    raw.home_team.trim() !== '' &&
    raw.away_team.trim() !== ''
  ) {
    return buildGameId(raw.away_team, raw.home_team);
  }
  return 'unknown';
}

function describeIssue(issues: z.ZodIssue[], fallback: string): string {
  const [issue] = issues;
  return issue ? `${issue.path.join('.')}: ${issue.message}` : fallback;
}

export function parsePicksDocument(data: unknown, date: string, file: string): PredictionDocument {
  const doc = predictionsDocSchema.safeParse(data);
  if (!doc.success) {
    throw new PredictionInputError(file, `Malformed predictions document: ${doc.error.issues[0]?.message ?? 'invalid'}`);
  }
  if (doc.data.date !== date) {
    throw new PredictionInputError(file, `Document is for ${doc.data.date}, expected ${date}`);
  }

  const predictions: Prediction[] = [];
  const rejected: RejectedPrediction[] = [];

  doc.data.predictions.forEach((raw, index) => {
    const entry = predictionEntrySchema.safeParse(raw);
    if (entry.success) {
      predictions.push(toPrediction(entry.data, date));
      return;
    }
    rejected.push({
      index,
      gameId: gameIdHint(raw),
      message: describeIssue(entry.error.issues, 'invalid prediction'),
    });
  });

  return { kind: 'picks', date, file, predictions, rejected };
}

export function parseProjectionsDocument(data: unknown, date: string, file: string): PredictionDocument {
  const doc = projectionsDocSchema.safeParse(data);
  if (!doc.success) {
    throw new PredictionInputError(file, `Malformed projections document: ${doc.error.issues[0]?.message ?? 'invalid'}`);
  }
  if (doc.data.date !== date) {
    throw new PredictionInputError(file, `Document is for ${doc.data.date}, expected ${date}`);
  }

  const games: ProjectionGame[] = [];
  const rejected: RejectedPrediction[] = [];

  doc.data.games.forEach((raw, index) => {
    const parsed = projectionGameSchema.safeParse(raw);
    if (!parsed.success) {
      rejected.push({
        index,
        gameId: matchupHint(raw),
        message: describeIssue(parsed.error.issues, 'invalid projection'),
      });
      return;
    }

    const g = parsed.data;
    games.push({
      gameId: buildGameId(g.away_team, g.home_team),
      homeTeam: g.home_team,
      awayTeam: g.away_team,
      modelSpread: g.spread?.rest_adjusted ?? g.spread?.baseline ?? null,
      modelTotal: g.total?.pace_adjusted ?? g.total?.baseline ?? null,
      injuryImpact: Math.max(
        Math.abs(g.injury_impact?.home_total_adjustment ?? 0),
        Math.abs(g.injury_impact?.away_total_adjustment ?? 0),
      ),
    });
  });

  return { kind: 'projections', date, file, games, rejected };
}

/**
 * Reads `<date>_predictions.json` from a directory, falling back to the model's
 * raw `<date>_projections.json`.
 */
export class FilePredictionSource implements PredictionSource {
  constructor(readonly dir: string) {}

  async load(date: string): Promise<PredictionDocument | null> {
    const picksFile = path.join(this.dir, `${date}_predictions.json`);
    const picks = await this.readJson(picksFile);
    if (picks !== undefined) return parsePicksDocument(picks, date, picksFile);

    const projectionsFile = path.join(this.dir, `${date}_projections.json`);
    const projections = await this.readJson(projectionsFile);
    if (projections !== undefined) return parseProjectionsDocument(projections, date, projectionsFile);

    logger.warn({ dir: this.dir, date }, 'No prediction file found');
    return null;
  }

  /** Parsed JSON, or undefined when the file does not exist. */
  private async readJson(file: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
      throw new PredictionInputError(file, 'Cannot read prediction file', { cause: err });
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new PredictionInputError(file, 'Prediction file is not valid JSON', { cause: err });
    }
  }
}
