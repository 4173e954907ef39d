import { describe, it, expect } from 'vitest';
import {
  EspnOutcomeSource,
  oddsUrl,
  parseClosingLines,
  parseScoreboard,
  scoreboardUrl,
} from '../../src/results/espn-fetcher.js';
import { HttpError, OutcomeFetchError } from '../../src/errors.js';
import type { JsonFetcher } from '../../src/workers/http-client.js';

function event(
  id: string,
  away: string,
  home: string,
  status: { name: string; period?: number },
  scores: { away?: string | number; home?: string | number } = {},
) {
  return {
    id,
    competitions: [
      {
        id,
        status: { period: status.period, type: { name: status.name } },
        competitors: [
          { homeAway: 'home', team: { displayName: home }, score: scores.home },
          { homeAway: 'away', team: { displayName: away }, score: scores.away },
        ],
      },
    ],
  };
}

const scoreboard = {
  events: [
    event('401000001', 'Boston Celtics', 'Milwaukee Bucks', { name: 'STATUS_FINAL', period: 4 }, { away: '100', home: '110' }),
    event('401000002', 'Los Angeles Lakers', 'Denver Nuggets', { name: 'STATUS_FINAL_OT', period: 5 }, { away: 121, home: 118 }),
    event('401000003', 'New York Knicks', 'Miami Heat', { name: 'STATUS_IN_PROGRESS', period: 3 }, { away: '80', home: '77' }),
    event('401000004', 'Utah Jazz', 'LA Clippers', { name: 'STATUS_FINAL' }, { away: '99', home: '104' }),
    { id: '401000005', competitions: 'garbage' },
  ],
};

describe('parseScoreboard', () => {
  it('keeps final games and lists the rest as pending', () => {
    const { games, pending } = parseScoreboard(scoreboard);

    expect(games.map((g) => g.gameId)).toEqual(['BOS@MIL', 'LAL@DEN', 'UTA@LAC']);
    expect(pending).toEqual(['NYK@MIA']);
  });

  it('reads string and numeric scores', () => {
    const { games } = parseScoreboard(scoreboard);
    expect(games[0]).toEqual({
      eventId: '401000001',
      competitionId: '401000001',
      gameId: 'BOS@MIL',
      homeTeam: 'Milwaukee Bucks',
      awayTeam: 'Boston Celtics',
      homeScore: 110,
      awayScore: 100,
      overtime: false,
    });
    expect([games[1]?.homeScore, games[1]?.awayScore]).toEqual([118, 121]);
  });

  it('marks overtime from the status and leaves it unknown without a period', () => {
    const { games } = parseScoreboard(scoreboard);
    expect(games.map((g) => g.overtime)).toEqual([false, true, null]);
  });

  it('skips a final game with no score', () => {
    const data = { events: [event('1', 'Boston Celtics', 'Milwaukee Bucks', { name: 'STATUS_FINAL', period: 4 })] };
    expect(parseScoreboard(data)).toEqual({ games: [], pending: [] });
  });

  it('treats a response without events as an empty slate', () => {
    expect(parseScoreboard({})).toEqual({ games: [], pending: [] });
  });
});

describe('parseClosingLines', () => {
  it('takes the first provider carrying both lines', () => {
    const data = {
      items: [{ spread: -3.0 }, { spread: -2.5, overUnder: 224.5 }, { spread: -2.0, overUnder: 225 }],
    };
    expect(parseClosingLines(data)).toEqual({ spread: -2.5, total: 224.5 });
  });

  it('combines partial providers', () => {
    const data = { items: [{ overUnder: 230.5, spread: null }, { spread: 4.5 }] };
    expect(parseClosingLines(data)).toEqual({ spread: 4.5, total: 230.5 });
  });

  it('returns nulls when no lines are published', () => {
    expect(parseClosingLines({ items: [] })).toEqual({ spread: null, total: null });
  });
});

describe('ESPN URLs', () => {
  it('builds the scoreboard and odds URLs', () => {
    expect(scoreboardUrl('2025-12-11')).toBe(
      'https://site.api.espn.com/apis/site/v2/sports/basketball/nba/scoreboard?dates=20251211',
    );
    expect(oddsUrl('401000001', '401000001')).toBe(
      'https://sports.core.api.espn.com/v2/sports/basketball/leagues/nba/events/401000001/competitions/401000001/odds',
    );
  });
});

describe('EspnOutcomeSource', () => {
  const odds: Record<string, unknown> = {
    [oddsUrl('401000001', '401000001')]: { items: [{ spread: -2.6, overUnder: 225.5 }] },
    [oddsUrl('401000004', '401000004')]: { items: [{ spread: -5.5 }] },
  };

  const fakeFetch: JsonFetcher = async (url) => {
    if (url === scoreboardUrl('2025-12-11')) return scoreboard;
    if (url in odds) return odds[url];
    throw new HttpError(url, 404);
  };

  it('attaches closing lines to final games', async () => {
    const result = await new EspnOutcomeSource(fakeFetch).fetchOutcomes('2025-12-11');

    expect(result.outcomes).toEqual([
      {
        gameId: 'BOS@MIL',
        eventId: '401000001',
        homeTeam: 'Milwaukee Bucks',
        awayTeam: 'Boston Celtics',
        homeScore: 110,
        awayScore: 100,
        closingSpread: -2.6,
        closingTotal: 225.5,
        overtime: false,
      },
      {
        gameId: 'UTA@LAC',
        eventId: '401000004',
        homeTeam: 'LA Clippers',
        awayTeam: 'Utah Jazz',
        homeScore: 104,
        awayScore: 99,
        closingSpread: -5.5,
        closingTotal: null,
        overtime: null,
      },
    ]);
    expect(result.pending).toEqual(['NYK@MIA']);
  });

  it('reports games whose odds could not be fetched', async () => {
    const result = await new EspnOutcomeSource(fakeFetch).fetchOutcomes('2025-12-11');
    expect(result.failures).toEqual([
      { gameId: 'LAL@DEN', reason: `HTTP 404 from ${oddsUrl('401000002', '401000002')}` },
    ]);
  });

  it('throws OutcomeFetchError when the scoreboard is unavailable', async () => {
    const failing: JsonFetcher = async (url) => {
      throw new HttpError(url, 503);
    };
    await expect(new EspnOutcomeSource(failing).fetchOutcomes('2025-12-11')).rejects.toBeInstanceOf(
      OutcomeFetchError,
    );
  });
});
