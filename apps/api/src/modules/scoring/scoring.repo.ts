// apps/api/src/modules/scoring/scoring.repo.ts
import { dbFile } from "../../db/index";
import { gamesRepo } from "../games/games.repo";
import { leaguesRepo } from "../leagues/leagues.repo";
import { picksRepo } from "../picks/picks.repo";
import { standingsRepo } from "../standings/standings.repo";
import type { FinalPickGrade, ScoringStore } from "./scoring.schemas";

/**
 * SQLite-backed store the scoring service runs against.
 */
export const scoringRepo: ScoringStore = {
  transaction<T>(fn: () => T): T {
    return dbFile.transaction(fn)();
  },

  getGame: (gameId) => gamesRepo.getGameById(gameId),
  listActiveLeagueGamesForGame: (gameId) => gamesRepo.listActiveLeagueGamesForGame(gameId),
  getLeagueRules: (leagueId, seasonId) => leaguesRepo.getRules(leagueId, seasonId),
  getLockedSpread: (leagueId, gameId) => gamesRepo.getLockedSpread(leagueId, gameId),

  listGradingCandidates: (leagueId, gameId) => picksRepo.listGradingCandidates(leagueId, gameId),

  persistPickResult(pickId: number, grade: FinalPickGrade): boolean {
    switch (grade) {
      case "correct":
        return picksRepo.setResult(pickId, true, false);
      case "incorrect":
        return picksRepo.setResult(pickId, false, false);
      case "push":
        return picksRepo.setResult(pickId, null, true);
    }
  },

  resetPickResults: (leagueId, gameId) => picksRepo.resetResultsForLeagueGame(leagueId, gameId),
  countUngradedPicks: (gameId) => picksRepo.countUngradedForGame(gameId),

  listFinalWeekPicks: (leagueId, weekId) => picksRepo.listFinalWeekPicks(leagueId, weekId),
  getTotalPointsGame: (leagueId, weekId) => gamesRepo.getTotalPointsGame(leagueId, weekId),
  clearMemberWeeks: (leagueId, weekId) => standingsRepo.clearMemberWeeks(leagueId, weekId),
  persistMemberWeek: (leagueId, weekId, record) => standingsRepo.insertMemberWeek(leagueId, weekId, record),

  listMemberIds: (leagueId) => leaguesRepo.listMemberIds(leagueId),
  listSeasonMemberWeeks: (leagueId, seasonId) => standingsRepo.listSeasonMemberWeeks(leagueId, seasonId),
  qualifyingWeeksForSeason: (leagueId, seasonId) => gamesRepo.listQualifyingWeekIds(leagueId, seasonId),
  clearMemberSeasons: (leagueId, seasonId) => standingsRepo.clearMemberSeasons(leagueId, seasonId),
  persistMemberSeason: (leagueId, seasonId, record) =>
    standingsRepo.insertMemberSeason(leagueId, seasonId, record),

  clearLeagueSeason(leagueId: number, seasonId: number): void {
    standingsRepo.clearMemberSeasons(leagueId, seasonId);
    standingsRepo.clearSeasonMemberWeeks(leagueId, seasonId);
  },

  listLeagueIds: () => leaguesRepo.listLeagueIds(),
  listWeeks: (seasonId) => gamesRepo.listWeeks(seasonId),
  listFinalGames: (seasonId) => gamesRepo.listFinalGames(seasonId),
  listFinalLeagueGames: (leagueId, weekId) => gamesRepo.listFinalLeagueGames(leagueId, weekId)
};
