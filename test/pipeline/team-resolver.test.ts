import { describe, it, expect, beforeAll } from 'vitest';
import {
  buildGameId,
  getAliasCount,
  loadTeamAliases,
  resolveTeamAbbr,
} from '../../src/pipeline/team-resolver.js';

describe('teamResolver', () => {
  beforeAll(() => {
    loadTeamAliases();
  });

  it('should load aliases from the seed file', () => {
    expect(getAliasCount()).toBeGreaterThan(60);
  });

  it('should resolve full team name', () => {
    expect(resolveTeamAbbr('Los Angeles Lakers')).toBe('LAL');
  });

  it('should resolve abbreviation', () => {
    expect(resolveTeamAbbr('gsw')).toBe('GSW');
  });

  it('should resolve alias', () => {
    expect(resolveTeamAbbr('LA Clippers')).toBe('LAC');
    expect(resolveTeamAbbr('Trail Blazers')).toBe('POR');
  });

  it('should be case-insensitive and ignore surrounding whitespace', () => {
    expect(resolveTeamAbbr('  boston celtics ')).toBe('BOS');
    expect(resolveTeamAbbr('LAKERS')).toBe('LAL');
  });

  it('should fall back to the first three letters for unknown teams', () => {
    expect(resolveTeamAbbr('Seattle Supersonics')).toBe('SEA');
    expect(resolveTeamAbbr('St. Louis')).toBe('STL');
  });

  it('should build away-at-home game IDs', () => {
    expect(buildGameId('Boston Celtics', 'Milwaukee Bucks')).toBe('BOS@MIL');
    expect(buildGameId('LA Clippers', 'Golden State Warriors')).toBe('LAC@GSW');
  });
});
