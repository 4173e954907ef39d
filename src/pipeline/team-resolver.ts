import fs from 'node:fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const TEAMS_FILE = new URL('../../seeds/nba-teams.json', import.meta.url);

const teamsSchema = z.array(
  z.object({
    name: z.string(),
    abbr: z.string(),
    aliases: z.array(z.string()).default([]),
  }),
);

// In-memory cache: lowercase name or alias -> abbreviation
const aliasMap = new Map<string, string>();

export function loadTeamAliases(): void {
  const teams = teamsSchema.parse(JSON.parse(fs.readFileSync(TEAMS_FILE, 'utf-8')));

  aliasMap.clear();
  for (const team of teams) {
    aliasMap.set(team.name.toLowerCase(), team.abbr);
    aliasMap.set(team.abbr.toLowerCase(), team.abbr);
    for (const alias of team.aliases) {
      aliasMap.set(alias.toLowerCase(), team.abbr);
    }
  }

  logger.debug({ aliasCount: aliasMap.size }, 'Team aliases loaded');
}

export function getAliasCount(): number {
  if (aliasMap.size === 0) loadTeamAliases();
  return aliasMap.size;
}

/**
 * Team abbreviation for a display name. Unknown names fall back to their first
 * three letters, uppercased.
 */
export function resolveTeamAbbr(rawName: string): string {
  if (aliasMap.size === 0) loadTeamAliases();
  const trimmed = rawName.trim();
  return aliasMap.get(trimmed.toLowerCase()) ?? trimmed.replace(/[^A-Za-z0-9]/g, '').slice(0, 3).toUpperCase();
}

/** AWAY@HOME */
export function buildGameId(awayTeam: string, homeTeam: string): string {
  return `${resolveTeamAbbr(awayTeam)}@${resolveTeamAbbr(homeTeam)}`;
}
