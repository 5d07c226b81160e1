// apps/api/src/modules/standings/standings.schemas.ts
import type { SeasonTotals } from "../scoring/scoring.schemas";

export type WeekStandingsRow = {
  rank: number;
  userId: number;
  username: string;
  displayName: string | null;
  picksMade: number;
  correct: number;
  incorrect: number;
  ties: number;
  correctKey: number;
  points: number;
  pointsGuess: number | null;
  pointsActual: number | null;
  tiebreakAbsDiff: number | null;
};

export type WeekStandingsResponse = {
  leagueId: number;
  weekId: number;
  weekNumber: number;
  rows: WeekStandingsRow[];
};

export type SeasonStandingsRow = {
  rank: number;
  /** 0 when the league drops no weeks */
  rankWithDrops: number;
  userId: number;
  username: string;
  displayName: string | null;
  throughWeek: number;
  full: SeasonTotals;
  dropped: SeasonTotals;
  /** full - dropped */
  adjusted: SeasonTotals;
};

export type SeasonStandingsResponse = {
  leagueId: number;
  seasonId: number;
  dropWeeks: number;
  rows: SeasonStandingsRow[];
};
