// apps/api/src/modules/games/games.schemas.ts

export type Season = {
  id: number;
  year: number;
  name: string | null;
  isActive: boolean;
};

export type Week = {
  id: number;
  seasonId: number;
  number: number;
};

export type Team = {
  id: number;
  seasonId: number;
  name: string;
  abbreviation: string | null;
};

export type Game = {
  id: number;
  seasonId: number;
  weekId: number;
  homeTeamId: number;
  awayTeamId: number;
  /** ISO 8601 */
  kickoff: string;
  /** Home perspective; negative means the home team is favored. */
  currentHomeSpread: number | null;
  homeScore: number | null;
  awayScore: number | null;
  isFinal: boolean;
};

/**
 * A game selected into one league's pool, carrying the spread that league
 * froze for it.
 */
export type LeagueGame = {
  leagueId: number;
  gameId: number;
  lockedHomeSpread: number | null;
  spreadLockedAt: string | null;
  isActive: boolean;
  /** The week's total-points tiebreaker game. */
  isTotalPointsGame: boolean;
};

export type CreateGameBody = {
  seasonId: number;
  weekId: number;
  homeTeamId: number;
  awayTeamId: number;
  kickoff: string;
  currentHomeSpread?: number | null;
};

export type SelectGameBody = {
  isTotalPointsGame?: boolean;
  /** Lock immediately with this spread instead of the game's current one. */
  lockedHomeSpread?: number | null;
};

export type FinalScoreBody = {
  homeScore: number;
  awayScore: number;
};

export type FinalizeGameResult = {
  gameId: number;
  /** false when the game was already final and nothing was re-triggered */
  triggered: boolean;
  /** an already-final game was given a different score; grades are stale */
  scoreChanged: boolean;
};
