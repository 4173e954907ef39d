import { z } from 'zod';
import type { GameOutcome, OutcomeFailure, OutcomeFetchResult, OutcomeSource } from '../types/result.js';
import { OutcomeFetchError } from '../errors.js';
import { buildGameId } from '../pipeline/team-resolver.js';
import { createJsonFetcher, type JsonFetcher } from '../workers/http-client.js';
import { config } from '../config.js';
import { toCompactDate } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const SCOREBOARD_URL = 'https://site.api.espn.com/apis/site/v2/sports/basketball/nba/scoreboard';
const ODDS_URL = 'https://sports.core.api.espn.com/v2/sports/basketball/leagues/nba/events';

const REGULATION_PERIODS = 4;

const espnStatusSchema = z.object({
  period: z.number().optional(),
  type: z.object({
    name: z.string(),
    completed: z.boolean().optional(),
  }),
});

const espnCompetitorSchema = z.object({
  homeAway: z.enum(['home', 'away']),
  team: z.object({ displayName: z.string() }),
  score: z.union([z.string(), z.number()]).optional(),
});

const espnEventSchema = z.object({
  id: z.string(),
  status: espnStatusSchema.optional(),
  competitions: z.array(
    z.object({
      id: z.string(),
      status: espnStatusSchema.optional(),
      competitors: z.array(espnCompetitorSchema),
    }),
  ),
});

const espnScoreboardSchema = z.object({
  events: z.array(z.unknown()).default([]),
});

const espnOddsSchema = z.object({
  items: z
    .array(
      z.object({
        spread: z.number().nullish(),
        overUnder: z.number().nullish(),
      }),
    )
    .default([]),
});

/** A final game from the scoreboard, before closing lines are attached. */
export interface ScoreboardGame {
  eventId: string;
  competitionId: string;
  gameId: string;
  homeTeam: string;
  awayTeam: string;
  homeScore: number;
  awayScore: number;
  overtime: boolean | null;
}

export interface ClosingLines {
  spread: number | null;
  total: number | null;
}

function isFinal(statusName: string): boolean {
  return statusName === 'STATUS_FINAL' || statusName.startsWith('STATUS_FINAL_');
}

function toScore(raw: string | number | undefined): number {
  if (typeof raw === 'number') return raw;
  return raw === undefined ? NaN : parseInt(raw, 10);
}

/**
 * Extracts final games from an NBA scoreboard response.
 * Games that are not final are returned by game ID in `pending`.
 */
export function parseScoreboard(data: unknown): { games: ScoreboardGame[]; pending: string[] } {
  const scoreboard = espnScoreboardSchema.parse(data);
  const games: ScoreboardGame[] = [];
  const pending: string[] = [];

  for (const rawEvent of scoreboard.events) {
    const parsed = espnEventSchema.safeParse(rawEvent);
    if (!parsed.success) {
      logger.debug({ issues: parsed.error.issues.length }, 'Skipping malformed scoreboard event');
      continue;
    }

    const event = parsed.data;
    const [comp] = event.competitions;
    if (!comp) continue;
    const home = comp.competitors.find((c) => c.homeAway === 'home');
    const away = comp.competitors.find((c) => c.homeAway === 'away');
    if (!home || !away) continue;

    const gameId = buildGameId(away.team.displayName, home.team.displayName);
    const status = comp.status ?? event.status;
    if (!status || !isFinal(status.type.name)) {
      pending.push(gameId);
      continue;
    }

    const homeScore = toScore(home.score);
    const awayScore = toScore(away.score);
    if (Number.isNaN(homeScore) || Number.isNaN(awayScore)) continue;

    let overtime: boolean | null = null;
    if (status.type.name === 'STATUS_FINAL_OT') overtime = true;
    else if (status.period !== undefined) overtime = status.period > REGULATION_PERIODS;

    games.push({
      eventId: event.id,
      competitionId: comp.id,
      gameId,
      homeTeam: home.team.displayName,
      awayTeam: away.team.displayName,
      homeScore,
      awayScore,
      overtime,
    });
  }

  return { games, pending };
}

/**
 * Closing spread and total from an ESPN odds response. The first provider that
 * carries both wins; otherwise each line comes from the first provider that has it.
 */
export function parseClosingLines(data: unknown): ClosingLines {
  const { items } = espnOddsSchema.parse(data);

  const complete = items.find((i) => i.spread != null && i.overUnder != null);
  if (complete) return { spread: complete.spread ?? null, total: complete.overUnder ?? null };

  return {
    spread: items.find((i) => i.spread != null)?.spread ?? null,
    total: items.find((i) => i.overUnder != null)?.overUnder ?? null,
  };
}

export function scoreboardUrl(date: string): string {
  return `${SCOREBOARD_URL}?dates=${toCompactDate(date)}`;
}

export function oddsUrl(eventId: string, competitionId: string): string {
  return `${ODDS_URL}/${eventId}/competitions/${competitionId}/odds`;
}

/**
 * Final NBA scores from the ESPN scoreboard with closing lines from the ESPN odds feed.
 * No retries: a game whose odds cannot be fetched is reported in `failures`.
 */
export class EspnOutcomeSource implements OutcomeSource {
  constructor(
    private readonly fetchJson: JsonFetcher = createJsonFetcher(config.ESPN_TIMEOUT_MS),
  ) {}

  async fetchOutcomes(date: string): Promise<OutcomeFetchResult> {
    const log = logger.child({ date });
    const url = scoreboardUrl(date);

    let scoreboard: { games: ScoreboardGame[]; pending: string[] };
    try {
      scoreboard = parseScoreboard(await this.fetchJson(url));
    } catch (err) {
      throw new OutcomeFetchError(date, `ESPN scoreboard unavailable for ${date}`, { cause: err });
    }

    const outcomes: GameOutcome[] = [];
    const failures: OutcomeFailure[] = [];

    for (const game of scoreboard.games) {
      let lines: ClosingLines;
      try {
        lines = parseClosingLines(await this.fetchJson(oddsUrl(game.eventId, game.competitionId)));
      } catch (err) {
        log.warn({ err, gameId: game.gameId }, 'ESPN odds fetch failed');
        failures.push({
          gameId: game.gameId,
          reason: err instanceof Error ? err.message : String(err),
        });
        continue;
      }

      outcomes.push({
        gameId: game.gameId,
        eventId: game.eventId,
        homeTeam: game.homeTeam,
        awayTeam: game.awayTeam,
        homeScore: game.homeScore,
        awayScore: game.awayScore,
        closingSpread: lines.spread,
        closingTotal: lines.total,
        overtime: game.overtime,
      });
    }

    log.info(
      { final: outcomes.length, pending: scoreboard.pending.length, failures: failures.length },
      'ESPN outcomes fetched',
    );
    return { outcomes, pending: scoreboard.pending, failures };
  }
}
