// apps/api/src/index.ts
export { dbFile } from "./db/index";
export { config } from "./shared/config";
export { logger } from "./shared/logger";
export { PickemError, createPickemError, toErrorSummary } from "./shared/errors";
export type { PickemErrorCode, PickemErrorShape } from "./shared/errors";

export { usersRepo } from "./modules/users/users.repo";
export type { UserRow } from "./modules/users/users.repo";

export { leaguesService } from "./modules/leagues/leagues.service";
export { DEFAULT_LEAGUE_RULES, Tiebreaker } from "./modules/leagues/leagues.schemas";
export type { League, LeagueMemberRole, LeagueRules } from "./modules/leagues/leagues.schemas";

export { gamesRepo } from "./modules/games/games.repo";
export { gamesService } from "./modules/games/games.service";
export type { Game, LeagueGame, Season, Team, Week } from "./modules/games/games.schemas";

export { picksService } from "./modules/picks/picks.service";
export type { Pick, SubmitPickBody } from "./modules/picks/picks.schemas";

export { applyHook, gradePick } from "./modules/scoring/scoring.grading";
export { calculatePickPoints } from "./modules/scoring/scoring.points";
export { seasonTiebreakKey, weekTiebreakKey } from "./modules/scoring/scoring.tiebreak";
export { assignRanks } from "./modules/scoring/scoring.ranking";
export { computeMemberWeek } from "./modules/scoring/scoring.weekly";
export { computeMemberSeason } from "./modules/scoring/scoring.season";
export { createScoringService, scoringService } from "./modules/scoring/scoring.service";
export type { ScoringService } from "./modules/scoring/scoring.service";
export type {
  GameFinalizedSummary,
  LeagueGameRescoreResult,
  PickGrade,
  RecalculationSummary,
  ScoringStore
} from "./modules/scoring/scoring.schemas";

export { standingsService } from "./modules/standings/standings.service";
export type { SeasonStandingsResponse, WeekStandingsResponse } from "./modules/standings/standings.schemas";
