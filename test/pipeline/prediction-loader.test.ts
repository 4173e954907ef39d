import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  FilePredictionSource,
  parsePicksDocument,
  parseProjectionsDocument,
} from '../../src/pipeline/prediction-loader.js';
import { PredictionInputError } from '../../src/errors.js';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

const DATE = '2025-12-11';

const picksDoc = {
  date: DATE,
  predictions: [
    { game_id: ' bos@mil ', pick_type: 'spread_big_edge', edge_points: 4.5, model_line: -7.1, injury_impact: 2.5 },
    { game_id: 'LAL@DEN', pick_type: 'total_under_value', edge_points: 2.2, model_line: 221.8, notes: 'pace down' },
    { game_id: 'NYK@MIA', pick_type: 'moneyline', edge_points: 3, model_line: -2 },
    { game_id: 'PHI@TOR', pick_type: 'spread_dog_value', edge_points: -1, model_line: 3 },
    'not an object',
  ],
};

const projectionsDoc = {
  date: DATE,
  timestamp: '2025-12-11T15:00:00Z',
  games: [
    {
      home_team: 'Milwaukee Bucks',
      away_team: 'Boston Celtics',
      spread: { baseline: -6.0, rest_adjusted: -7.1 },
      total: { baseline: 224.0 },
      injury_impact: { home_total_adjustment: -1.2, away_total_adjustment: 2.5 },
    },
    {
      home_team: 'LA Clippers',
      away_team: 'Utah Jazz',
    },
  ],
};

describe('parsePicksDocument', () => {
  it('turns valid entries into predictions', () => {
    const doc = parsePicksDocument(picksDoc, DATE, 'picks.json');
    if (doc.kind !== 'picks') throw new Error('expected picks');

    expect(doc.predictions).toEqual([
      {
        date: DATE,
        gameId: 'BOS@MIL',
        family: 'spread',
        pickType: 'spread_big_edge',
        edgePoints: 4.5,
        modelLine: -7.1,
        injuryImpact: 2.5,
        notes: '',
      },
      {
        date: DATE,
        gameId: 'LAL@DEN',
        family: 'total',
        pickType: 'total_under_value',
        edgePoints: 2.2,
        modelLine: 221.8,
        injuryImpact: null,
        notes: 'pace down',
      },
    ]);
  });

  it('keeps rejected entries with their index and first problem', () => {
    const doc = parsePicksDocument(picksDoc, DATE, 'picks.json');
    if (doc.kind !== 'picks') throw new Error('expected picks');

    expect(doc.rejected.map((r) => [r.index, r.gameId])).toEqual([
      [2, 'NYK@MIA'],
      [3, 'PHI@TOR'],
      [4, 'unknown'],
    ]);
    expect(doc.rejected[0]?.message).toMatch(/^pick_type: /);
    expect(doc.rejected[1]?.message).toBe('edge_points: Number must be greater than or equal to 0');
  });

  it('rejects a document for another date', () => {
    expect(() => parsePicksDocument(picksDoc, '2025-12-12', 'picks.json')).toThrow(
      'Document is for 2025-12-11, expected 2025-12-12 (picks.json)',
    );
  });

  it('rejects a document without a predictions list', () => {
    expect(() => parsePicksDocument({ date: DATE }, DATE, 'picks.json')).toThrow(PredictionInputError);
  });
});

describe('parseProjectionsDocument', () => {
  it('prefers adjusted lines and keeps the largest injury adjustment', () => {
    const doc = parseProjectionsDocument(projectionsDoc, DATE, 'projections.json');
    if (doc.kind !== 'projections') throw new Error('expected projections');

    expect(doc.games).toEqual([
      {
        gameId: 'BOS@MIL',
        homeTeam: 'Milwaukee Bucks',
        awayTeam: 'Boston Celtics',
        modelSpread: -7.1,
        modelTotal: 224,
        injuryImpact: 2.5,
      },
      {
        gameId: 'UTA@LAC',
        homeTeam: 'LA Clippers',
        awayTeam: 'Utah Jazz',
        modelSpread: null,
        modelTotal: null,
        injuryImpact: 0,
      },
    ]);
  });

  it('rejects a malformed game and keeps the rest', () => {
    const data = {
      date: DATE,
      games: [
        projectionsDoc.games[0],
        { home_team: '', away_team: 'Utah Jazz' },
        { home_team: 'Denver Nuggets', away_team: 'Los Angeles Lakers', total: { baseline: 'high' } },
      ],
    };
    const doc = parseProjectionsDocument(data, DATE, 'projections.json');
    if (doc.kind !== 'projections') throw new Error('expected projections');

    expect(doc.games.map((g) => g.gameId)).toEqual(['BOS@MIL']);
    expect(doc.rejected).toEqual([
      { index: 1, gameId: 'unknown', message: 'home_team: String must contain at least 1 character(s)' },
      { index: 2, gameId: 'LAL@DEN', message: 'total.baseline: Expected number, received string' },
    ]);
  });

  it('treats null injury adjustments as zero', () => {
    const data = {
      date: DATE,
      games: [
        {
          home_team: 'Milwaukee Bucks',
          away_team: 'Boston Celtics',
          spread: { baseline: -6.0, rest_adjusted: null },
          injury_impact: { home_total_adjustment: null, away_total_adjustment: -0.8 },
        },
      ],
    };
    const doc = parseProjectionsDocument(data, DATE, 'projections.json');
    if (doc.kind !== 'projections') throw new Error('expected projections');

    expect(doc.rejected).toEqual([]);
    expect(doc.games[0]).toMatchObject({ modelSpread: -6, modelTotal: null, injuryImpact: 0.8 });
  });

  it('rejects a document without a games list', () => {
    expect(() => parseProjectionsDocument({ date: DATE }, DATE, 'projections.json')).toThrow(PredictionInputError);
  });
});

describe('FilePredictionSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('returns null when the date has no file', async () => {
    expect(await new FilePredictionSource(dir).load(DATE)).toBeNull();
  });

  it('prefers the picks file over projections', async () => {
    await fs.writeFile(path.join(dir, `${DATE}_predictions.json`), JSON.stringify(picksDoc));
    await fs.writeFile(path.join(dir, `${DATE}_projections.json`), JSON.stringify(projectionsDoc));

    const doc = await new FilePredictionSource(dir).load(DATE);
    expect(doc?.kind).toBe('picks');
    expect(doc?.file).toBe(path.join(dir, `${DATE}_predictions.json`));
  });

  it('falls back to the projections file', async () => {
    await fs.writeFile(path.join(dir, `${DATE}_projections.json`), JSON.stringify(projectionsDoc));

    const doc = await new FilePredictionSource(dir).load(DATE);
    expect(doc?.kind).toBe('projections');
  });

  it('reports a file that is not JSON', async () => {
    await fs.writeFile(path.join(dir, `${DATE}_predictions.json`), '{ "date": ');

    await expect(new FilePredictionSource(dir).load(DATE)).rejects.toThrow('Prediction file is not valid JSON');
  });
});
