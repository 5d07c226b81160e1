// apps/api/src/modules/scoring/scoring.schemas.ts
import type { PickemErrorShape } from "../../shared/errors";
import type { Game, LeagueGame, Week } from "../games/games.schemas";
import type { LeagueRules } from "../leagues/leagues.schemas";
import type { Pick as StoredPick, WeekPick } from "../picks/picks.schemas";

/**
 * Outcome of grading one pick. "not_graded" means the pick could not be
 * decided yet (game not final, scores or locked spread missing) and stays
 * eligible for a later attempt.
 */
export type PickGrade = "correct" | "incorrect" | "push" | "not_graded";

export type FinalPickGrade = Exclude<PickGrade, "not_graded">;

export type GradeInput = {
  game: Pick<Game, "isFinal" | "homeScore" | "awayScore" | "homeTeamId" | "awayTeamId">;
  pickedTeamId: number;
  lockedHomeSpread: number | null;
  rules: LeagueRules;
};

/** (secondary, tertiary) comparison values; higher is better. */
export type TiebreakKey = readonly [number, number];

export type MemberWeekStats = {
  /** correct + incorrect + ties */
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

export type MemberWeekRecord = MemberWeekStats & {
  userId: number;
  rank: number;
};

/** A member-week as seen by the season aggregate. */
export type SeasonWeekRecord = MemberWeekStats & {
  userId: number;
  weekId: number;
  weekNumber: number;
};

export type SeasonTotals = {
  picksMade: number;
  correct: number;
  incorrect: number;
  ties: number;
  correctKey: number;
  points: number;
};

export type MemberSeasonStats = {
  throughWeek: number;
  full: SeasonTotals;
  /** Sums of the dropped worst weeks; adjusted = full - dropped. */
  dropped: SeasonTotals;
  droppedWeekIds: number[];
};

export type MemberSeasonRecord = Omit<MemberSeasonStats, "droppedWeekIds"> & {
  userId: number;
  rank: number;
  /** 0 when the league drops no weeks */
  rankWithDrops: number;
};

export type RankEntry<Id> = {
  id: Id;
  primary: number;
  key: TiebreakKey;
};

/**
 * Everything the engine reads or writes. The default implementation is
 * SQLite-backed (scoring.repo.ts); tests may pass a fake.
 */
export interface ScoringStore {
  /** Run fn atomically; readers never observe a partial rewrite. */
  transaction<T>(fn: () => T): T;

  getGame(gameId: number): Game | null;
  listActiveLeagueGamesForGame(gameId: number): LeagueGame[];
  getLeagueRules(leagueId: number, seasonId: number): LeagueRules | null;
  getLockedSpread(leagueId: number, gameId: number): number | null;

  listGradingCandidates(leagueId: number, gameId: number): StoredPick[];
  /** Returns false if the pick was graded already. */
  persistPickResult(pickId: number, grade: FinalPickGrade): boolean;
  /** Clear one league's grades on a game; returns the number of picks reset. */
  resetPickResults(leagueId: number, gameId: number): number;
  countUngradedPicks(gameId: number): number;

  /** Picks on the week's final games that are active in the league's pool. */
  listFinalWeekPicks(leagueId: number, weekId: number): WeekPick[];
  getTotalPointsGame(leagueId: number, weekId: number): Game | null;
  clearMemberWeeks(leagueId: number, weekId: number): void;
  persistMemberWeek(leagueId: number, weekId: number, record: MemberWeekRecord): void;

  listMemberIds(leagueId: number): number[];
  listSeasonMemberWeeks(leagueId: number, seasonId: number): SeasonWeekRecord[];
  qualifyingWeeksForSeason(leagueId: number, seasonId: number): Set<number>;
  clearMemberSeasons(leagueId: number, seasonId: number): void;
  persistMemberSeason(leagueId: number, seasonId: number, record: MemberSeasonRecord): void;
  /** Drop every derived week and season row of one league season. */
  clearLeagueSeason(leagueId: number, seasonId: number): void;

  listLeagueIds(): number[];
  listWeeks(seasonId: number): Week[];
  listFinalGames(seasonId: number): Game[];
  listFinalLeagueGames(leagueId: number, weekId: number): Game[];
}

export type LeagueWeekResult = {
  leagueId: number;
  weekId: number;
  memberWeeksUpdated: number;
};

export type LeagueSeasonResult = {
  leagueId: number;
  seasonId: number;
  memberSeasonsUpdated: number;
};

export type GameFinalizedSummary = {
  gameId: number;
  leaguesProcessed: number;
  leaguesSkipped: number;
  picksGraded: number;
  memberWeeksUpdated: number;
  memberSeasonsUpdated: number;
  errors: Array<PickemErrorShape & { leagueId?: number; pickId?: number }>;
};

export type LeagueGameRescoreResult = {
  leagueId: number;
  gameId: number;
  picksGraded: number;
  memberWeeksUpdated: number;
  memberSeasonsUpdated: number;
  errors: Array<PickemErrorShape & { pickId: number }>;
};

export type RecalculationSummary = {
  seasonId: number;
  leaguesProcessed: number;
  leaguesSkipped: number;
  picksGraded: number;
  memberWeeksUpdated: number;
  memberSeasonsUpdated: number;
  errors: Array<PickemErrorShape & { leagueId: number; pickId?: number }>;
};

export type GradeFinalGamesOptions = {
  weekNumber?: number;
  dryRun?: boolean;
};

export type GradeFinalGamesSummary = {
  seasonId: number;
  gamesFound: number;
  gamesSkipped: number;
  /** dry run: picks that would be graded */
  picksPending: number;
  picksGraded: number;
  errors: Array<PickemErrorShape & { gameId: number }>;
};
