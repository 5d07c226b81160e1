// apps/api/src/modules/standings/standings.service.ts
import { createPickemError } from "../../shared/errors";
import { assertId } from "../../shared/validation";
import { gamesRepo } from "../games/games.repo";
import { leaguesRepo } from "../leagues/leagues.repo";
import { adjustedTotals } from "../scoring/scoring.tiebreak";
import { standingsRepo } from "./standings.repo";
import type { SeasonStandingsResponse, WeekStandingsResponse } from "./standings.schemas";

function assertLeagueExists(leagueId: number): void {
  if (!leaguesRepo.findById(leagueId)) {
    throw createPickemError("not_found", "League not found", { leagueId });
  }
}

export const standingsService = {
  getWeekStandings(leagueIdParam: number, weekIdParam: number): WeekStandingsResponse {
    const leagueId = assertId("leagueId", leagueIdParam);
    const weekId = assertId("weekId", weekIdParam);
    assertLeagueExists(leagueId);
    const week = gamesRepo.getWeekById(weekId);
    if (!week) {
      throw createPickemError("not_found", "Week not found", { weekId });
    }

    const rows = standingsRepo.listWeekStandings(leagueId, weekId).map((row) => ({
      rank: row.rank,
      userId: row.userId,
      username: row.username,
      displayName: row.displayName,
      picksMade: row.picksMade,
      correct: row.correct,
      incorrect: row.incorrect,
      ties: row.ties,
      correctKey: row.correctKey,
      points: row.points,
      pointsGuess: row.pointsGuess,
      pointsActual: row.pointsActual,
      tiebreakAbsDiff: row.tiebreakAbsDiff
    }));

    return { leagueId, weekId, weekNumber: week.number, rows };
  },

  /**
   * Season table ordered by full-season rank. Leagues that drop weeks also
   * get the adjusted totals and rankWithDrops.
   */
  getSeasonStandings(leagueIdParam: number, seasonIdParam: number): SeasonStandingsResponse {
    const leagueId = assertId("leagueId", leagueIdParam);
    const seasonId = assertId("seasonId", seasonIdParam);
    assertLeagueExists(leagueId);
    if (!gamesRepo.getSeasonById(seasonId)) {
      throw createPickemError("not_found", "Season not found", { seasonId });
    }

    const dropWeeks = leaguesRepo.getRules(leagueId, seasonId)?.dropWeeks ?? 0;

    const rows = standingsRepo.listSeasonStandings(leagueId, seasonId).map((row) => ({
      rank: row.rank,
      rankWithDrops: row.rankWithDrops,
      userId: row.userId,
      username: row.username,
      displayName: row.displayName,
      throughWeek: row.throughWeek,
      full: row.full,
      dropped: row.dropped,
      adjusted: adjustedTotals(row.full, row.dropped)
    }));

    return { leagueId, seasonId, dropWeeks, rows };
  }
};
