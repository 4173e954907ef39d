/** A completed game as seen by the outcome source. */
export interface GameOutcome {
  /** AWAY@HOME, e.g. 'BOS@MIL' */
  gameId: string;
  eventId: string;
  homeTeam: string;
  awayTeam: string;
  homeScore: number;
  awayScore: number;
  /** Closing spread, home perspective (negative = home favored) */
  closingSpread: number | null;
  closingTotal: number | null;
  /** null when the source reported no period count */
  overtime: boolean | null;
}

export interface OutcomeFailure {
  gameId: string;
  reason: string;
}

export interface OutcomeFetchResult {
  outcomes: GameOutcome[];
  /** Game IDs on the slate that have not gone final */
  pending: string[];
  /** Games whose closing lines could not be fetched */
  failures: OutcomeFailure[];
}

/** Anything that can produce the completed games for a date. */
export interface OutcomeSource {
  fetchOutcomes(date: string): Promise<OutcomeFetchResult>;
}
