// apps/api/src/modules/scoring/scoring.service.ts
import { createPickemError, toErrorSummary, type PickemErrorShape } from "../../shared/errors";
import { logger } from "../../shared/logger";
import type { Game } from "../games/games.schemas";
import { Tiebreaker, type LeagueRules } from "../leagues/leagues.schemas";
import { gradePick } from "./scoring.grading";
import { scoringRepo } from "./scoring.repo";
import type {
  GameFinalizedSummary,
  GradeFinalGamesOptions,
  GradeFinalGamesSummary,
  LeagueGameRescoreResult,
  LeagueSeasonResult,
  LeagueWeekResult,
  RecalculationSummary,
  ScoringStore
} from "./scoring.schemas";
import { buildLeagueSeason } from "./scoring.season";
import { buildLeagueWeek, totalPointsContext } from "./scoring.weekly";

const log = logger.child({ module: "scoring" });

type PickError = PickemErrorShape & { pickId: number };

type LeagueGradeResult = {
  graded: number;
  errors: PickError[];
};

type LeagueRecalcResult = {
  picksGraded: number;
  memberWeeksUpdated: number;
  memberSeasonsUpdated: number;
  errors: PickError[];
};

/**
 * Grading and standings orchestration over a ScoringStore.
 *
 * Each league is handled in its own store transaction: grading, the week
 * rewrite with ranks and the season rewrite commit together or not at all.
 * A failing league is logged and reported; the others still run.
 */
export function createScoringService(store: ScoringStore) {
  function gradeLeaguePicks(leagueId: number, game: Game, rules: LeagueRules): LeagueGradeResult {
    const result: LeagueGradeResult = { graded: 0, errors: [] };
    const lockedHomeSpread = rules.againstTheSpreadEnabled
      ? store.getLockedSpread(leagueId, game.id)
      : null;

    if (rules.againstTheSpreadEnabled && lockedHomeSpread === null) {
      log.warn({ leagueId, gameId: game.id }, "no locked spread; picks stay ungraded");
    }

    for (const pick of store.listGradingCandidates(leagueId, game.id)) {
      try {
        const grade = gradePick({
          game,
          pickedTeamId: pick.pickedTeamId,
          lockedHomeSpread,
          rules
        });

        if (grade === "not_graded") {
          if (pick.pickedTeamId !== game.homeTeamId && pick.pickedTeamId !== game.awayTeamId) {
            log.warn(
              { leagueId, gameId: game.id, pickId: pick.id, pickedTeamId: pick.pickedTeamId },
              "picked team is not playing in this game"
            );
          }
          continue;
        }

        if (store.persistPickResult(pick.id, grade)) {
          result.graded++;
        }
      } catch (err) {
        log.error({ err, leagueId, gameId: game.id, pickId: pick.id }, "failed to grade pick");
        result.errors.push({ ...toErrorSummary(err), pickId: pick.id });
      }
    }

    return result;
  }

  function rebuildLeagueWeek(leagueId: number, weekId: number, rules: LeagueRules): LeagueWeekResult {
    const tiebreakGame =
      rules.tiebreaker === Tiebreaker.TotalPointsGuess
        ? totalPointsContext(store.getTotalPointsGame(leagueId, weekId))
        : null;

    const records = buildLeagueWeek(store.listFinalWeekPicks(leagueId, weekId), rules, tiebreakGame);

    store.clearMemberWeeks(leagueId, weekId);
    for (const record of records) {
      store.persistMemberWeek(leagueId, weekId, record);
    }

    return { leagueId, weekId, memberWeeksUpdated: records.length };
  }

  function rebuildLeagueSeason(leagueId: number, seasonId: number, rules: LeagueRules): LeagueSeasonResult {
    const records = buildLeagueSeason(
      store.listMemberIds(leagueId),
      store.listSeasonMemberWeeks(leagueId, seasonId),
      store.qualifyingWeeksForSeason(leagueId, seasonId),
      rules
    );

    store.clearMemberSeasons(leagueId, seasonId);
    for (const record of records) {
      store.persistMemberSeason(leagueId, seasonId, record);
    }

    return { leagueId, seasonId, memberSeasonsUpdated: records.length };
  }

  function loadRules(leagueId: number, seasonId: number): LeagueRules | null {
    const rules = store.getLeagueRules(leagueId, seasonId);
    if (!rules) {
      log.warn({ leagueId, seasonId }, "league has no rules for this season; skipping");
    }
    return rules;
  }

  function requireGame(gameId: number): Game {
    const game = store.getGame(gameId);
    if (!game) {
      throw createPickemError("not_found", "Game not found", { gameId });
    }
    return game;
  }

  /**
   * Score a final game in every league whose pool has it active. With
   * `resetGrades` each league's grades on the game are cleared first, inside
   * the same transaction as the regrade.
   */
  function scoreGame(gameId: number, resetGrades: boolean): GameFinalizedSummary {
    const game = requireGame(gameId);

    const summary: GameFinalizedSummary = {
      gameId,
      leaguesProcessed: 0,
      leaguesSkipped: 0,
      picksGraded: 0,
      memberWeeksUpdated: 0,
      memberSeasonsUpdated: 0,
      errors: []
    };

    if (!game.isFinal) {
      log.debug({ gameId }, "game is not final; nothing to grade");
      return summary;
    }

    for (const leagueGame of store.listActiveLeagueGamesForGame(gameId)) {
      const { leagueId } = leagueGame;
      try {
        const rules = loadRules(leagueId, game.seasonId);
        if (!rules) {
          summary.leaguesSkipped++;
          continue;
        }

        const { cleared, graded, week, season } = store.transaction(() => ({
          cleared: resetGrades ? store.resetPickResults(leagueId, gameId) : 0,
          graded: gradeLeaguePicks(leagueId, game, rules),
          week: rebuildLeagueWeek(leagueId, game.weekId, rules),
          season: rebuildLeagueSeason(leagueId, game.seasonId, rules)
        }));

        if (resetGrades) {
          log.info({ leagueId, gameId, cleared }, "pick grades reset");
        }
        summary.leaguesProcessed++;
        summary.picksGraded += graded.graded;
        summary.memberWeeksUpdated += week.memberWeeksUpdated;
        summary.memberSeasonsUpdated += season.memberSeasonsUpdated;
        summary.errors.push(...graded.errors.map((e) => ({ ...e, leagueId })));
      } catch (err) {
        log.error({ err, leagueId, gameId }, "failed to score league");
        summary.errors.push({ ...toErrorSummary(err), leagueId });
      }
    }

    log.info(
      {
        gameId,
        leaguesProcessed: summary.leaguesProcessed,
        picksGraded: summary.picksGraded,
        errors: summary.errors.length
      },
      resetGrades ? "game regraded" : "game scored"
    );
    return summary;
  }

  const service = {
    /**
     * Entry point for the finalize-game workflow: grade the game's picks in
     * every league that selected it, then rebuild that week and the season.
     */
    onGameFinalized(gameId: number): GameFinalizedSummary {
      return scoreGame(gameId, false);
    },

    /**
     * Clear and redo the grades of a final game in every league where it is
     * active. Leagues that deactivated the game keep their grades.
     */
    regradeGame(gameId: number): GameFinalizedSummary {
      return scoreGame(gameId, true);
    },

    /**
     * Bring one league's rows in line after its pool changed for a game
     * (selected, re-activated or deactivated): grade the league's picks if the
     * game is final and active, then rebuild the game's week and the season.
     */
    rescoreLeagueGame(leagueId: number, gameId: number): LeagueGameRescoreResult | null {
      const game = requireGame(gameId);
      const rules = loadRules(leagueId, game.seasonId);
      if (!rules) return null;

      const isActive = store
        .listActiveLeagueGamesForGame(gameId)
        .some((leagueGame) => leagueGame.leagueId === leagueId);

      return store.transaction(() => {
        const graded: LeagueGradeResult =
          isActive && game.isFinal ? gradeLeaguePicks(leagueId, game, rules) : { graded: 0, errors: [] };
        const week = rebuildLeagueWeek(leagueId, game.weekId, rules);
        const season = rebuildLeagueSeason(leagueId, game.seasonId, rules);
        return {
          leagueId,
          gameId,
          picksGraded: graded.graded,
          memberWeeksUpdated: week.memberWeeksUpdated,
          memberSeasonsUpdated: season.memberSeasonsUpdated,
          errors: graded.errors
        };
      });
    },

    /** Grade one league's picks on a final game. */
    gradeLeagueGame(leagueId: number, gameId: number): number {
      const game = requireGame(gameId);
      const rules = loadRules(leagueId, game.seasonId);
      if (!rules) return 0;

      return store.transaction(() => gradeLeaguePicks(leagueId, game, rules).graded);
    },

    recomputeLeagueWeek(leagueId: number, seasonId: number, weekId: number): LeagueWeekResult | null {
      const rules = loadRules(leagueId, seasonId);
      if (!rules) return null;
      return store.transaction(() => rebuildLeagueWeek(leagueId, weekId, rules));
    },

    recomputeLeagueSeason(leagueId: number, seasonId: number): LeagueSeasonResult | null {
      const rules = loadRules(leagueId, seasonId);
      if (!rules) return null;
      return store.transaction(() => rebuildLeagueSeason(leagueId, seasonId, rules));
    },

    /**
     * Rebuild every league's derived rows for the season from picks, games
     * and rules. Leagues without rules are left untouched.
     */
    recalculateSeason(seasonId: number): RecalculationSummary {
      const summary: RecalculationSummary = {
        seasonId,
        leaguesProcessed: 0,
        leaguesSkipped: 0,
        picksGraded: 0,
        memberWeeksUpdated: 0,
        memberSeasonsUpdated: 0,
        errors: []
      };

      const weeks = store.listWeeks(seasonId);

      for (const leagueId of store.listLeagueIds()) {
        try {
          const rules = loadRules(leagueId, seasonId);
          if (!rules) {
            summary.leaguesSkipped++;
            continue;
          }

          const result = store.transaction(() => {
            const league: LeagueRecalcResult = {
              picksGraded: 0,
              memberWeeksUpdated: 0,
              memberSeasonsUpdated: 0,
              errors: []
            };
            store.clearLeagueSeason(leagueId, seasonId);
            const qualifying = store.qualifyingWeeksForSeason(leagueId, seasonId);

            for (const week of weeks) {
              if (!qualifying.has(week.id)) continue;

              for (const game of store.listFinalLeagueGames(leagueId, week.id)) {
                const graded = gradeLeaguePicks(leagueId, game, rules);
                league.picksGraded += graded.graded;
                league.errors.push(...graded.errors);
              }
              league.memberWeeksUpdated += rebuildLeagueWeek(leagueId, week.id, rules).memberWeeksUpdated;
            }

            league.memberSeasonsUpdated = rebuildLeagueSeason(leagueId, seasonId, rules).memberSeasonsUpdated;
            return league;
          });

          summary.leaguesProcessed++;
          summary.picksGraded += result.picksGraded;
          summary.memberWeeksUpdated += result.memberWeeksUpdated;
          summary.memberSeasonsUpdated += result.memberSeasonsUpdated;
          summary.errors.push(...result.errors.map((e) => ({ ...e, leagueId })));
        } catch (err) {
          log.error({ err, leagueId, seasonId }, "failed to recalculate league");
          summary.errors.push({ ...toErrorSummary(err), leagueId });
        }
      }

      log.info(
        {
          seasonId,
          leaguesProcessed: summary.leaguesProcessed,
          leaguesSkipped: summary.leaguesSkipped,
          errors: summary.errors.length
        },
        "season recalculated"
      );
      return summary;
    },

    /**
     * Catch-up pass over final games that still have ungraded picks, e.g.
     * games finalized before a league locked its spread.
     */
    gradeFinalGames(seasonId: number, options: GradeFinalGamesOptions = {}): GradeFinalGamesSummary {
      const summary: GradeFinalGamesSummary = {
        seasonId,
        gamesFound: 0,
        gamesSkipped: 0,
        picksPending: 0,
        picksGraded: 0,
        errors: []
      };

      let games = store.listFinalGames(seasonId);
      if (options.weekNumber !== undefined) {
        const week = store.listWeeks(seasonId).find((w) => w.number === options.weekNumber);
        games = week ? games.filter((g) => g.weekId === week.id) : [];
      }
      summary.gamesFound = games.length;

      for (const game of games) {
        const pending = store.countUngradedPicks(game.id);
        if (pending === 0) {
          summary.gamesSkipped++;
          continue;
        }

        if (options.dryRun) {
          summary.picksPending += pending;
          continue;
        }

        try {
          const result = service.onGameFinalized(game.id);
          summary.picksGraded += result.picksGraded;
          summary.errors.push(...result.errors.map((e) => ({ ...e, gameId: game.id })));
        } catch (err) {
          log.error({ err, gameId: game.id }, "failed to grade final game");
          summary.errors.push({ ...toErrorSummary(err), gameId: game.id });
        }
      }

      return summary;
    }
  };

  return service;
}

export type ScoringService = ReturnType<typeof createScoringService>;

export const scoringService = createScoringService(scoringRepo);
