import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";
import { gamesRepo } from "../../src/modules/games/games.repo";
import { gamesService } from "../../src/modules/games/games.service";
import type { Game } from "../../src/modules/games/games.schemas";
import { picksRepo } from "../../src/modules/picks/picks.repo";
import { scoringService } from "../../src/modules/scoring/scoring.service";
import { captureError } from "../helpers/errors";
import {
  addGame,
  placePick,
  resetDatabase,
  seedLeague,
  seedSeason,
  type LeagueFixture,
  type SeasonFixture
} from "../helpers/fixtures";

describe("gamesService", () => {
  let season: SeasonFixture;
  let pool: LeagueFixture;
  let game: Game;

  beforeEach(() => {
    resetDatabase();
    season = seedSeason(1, 4);
    pool = seedLeague(season.season.id);
    game = addGame(season, 0, 0, 1, -3);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("selectGameForLeague", () => {
    it("adds the game to the pool without a locked spread", () => {
      const leagueGame = gamesService.selectGameForLeague(pool.league.id, game.id);
      expect(leagueGame).toMatchObject({
        leagueId: pool.league.id,
        gameId: game.id,
        lockedHomeSpread: null,
        spreadLockedAt: null,
        isActive: true,
        isTotalPointsGame: false
      });
    });

    it("locks a spread given with the selection", () => {
      const leagueGame = gamesService.selectGameForLeague(pool.league.id, game.id, {
        isTotalPointsGame: true,
        lockedHomeSpread: -6.5
      });
      expect(leagueGame.lockedHomeSpread).toBe(-6.5);
      expect(leagueGame.isTotalPointsGame).toBe(true);
    });

    it("re-activates a deactivated game", () => {
      gamesService.selectGameForLeague(pool.league.id, game.id);
      gamesService.setLeagueGameActive(pool.league.id, game.id, false);
      expect(gamesService.selectGameForLeague(pool.league.id, game.id).isActive).toBe(true);
    });

    it("rejects unknown games", () => {
      expect(captureError(() => gamesService.selectGameForLeague(pool.league.id, game.id + 99))).toMatchObject({
        code: "not_found"
      });
    });
  });

  describe("lockSpread", () => {
    beforeEach(() => {
      gamesService.selectGameForLeague(pool.league.id, game.id);
    });

    it("freezes the current spread for the league", () => {
      const now = new Date("2030-09-04T12:00:00.000Z");
      expect(gamesService.lockSpread(pool.league.id, game.id, now)).toBe(true);

      gamesService.updateCurrentSpread(game.id, -7);
      expect(gamesRepo.getLeagueGame(pool.league.id, game.id)).toMatchObject({
        lockedHomeSpread: -3,
        spreadLockedAt: "2030-09-04T12:00:00.000Z"
      });
    });

    it("returns false when the game has no line", () => {
      gamesService.updateCurrentSpread(game.id, null);
      expect(gamesService.lockSpread(pool.league.id, game.id)).toBe(false);
      expect(gamesRepo.getLockedSpread(pool.league.id, game.id)).toBeNull();
    });
  });

  describe("finalizeGame", () => {
    beforeEach(() => {
      gamesService.selectGameForLeague(pool.league.id, game.id, { lockedHomeSpread: -3 });
    });

    it("scores the game on the transition to final", () => {
      const pick = placePick(pool.league.id, game, pool.owner.id, "home");
      const onGameFinalized = vi.spyOn(scoringService, "onGameFinalized");

      expect(gamesService.finalizeGame(game.id, { homeScore: 24, awayScore: 20 })).toEqual({
        gameId: game.id,
        triggered: true,
        scoreChanged: false
      });
      expect(onGameFinalized).toHaveBeenCalledTimes(1);
      expect(picksRepo.findById(pick.id)?.isCorrect).toBe(true);
    });

    it("does not score again once the game is final", () => {
      gamesService.finalizeGame(game.id, { homeScore: 24, awayScore: 20 });
      const onGameFinalized = vi.spyOn(scoringService, "onGameFinalized");

      expect(gamesService.finalizeGame(game.id, { homeScore: 27, awayScore: 20 })).toEqual({
        gameId: game.id,
        triggered: false,
        scoreChanged: true
      });
      expect(onGameFinalized).not.toHaveBeenCalled();
      expect(gamesRepo.getGameById(game.id)).toMatchObject({ homeScore: 27, awayScore: 20, isFinal: true });
    });

    it("reports an unchanged score on a repeated finalize", () => {
      gamesService.finalizeGame(game.id, { homeScore: 24, awayScore: 20 });
      expect(gamesService.finalizeGame(game.id, { homeScore: 24, awayScore: 20 })).toEqual({
        gameId: game.id,
        triggered: false,
        scoreChanged: false
      });
    });

    it("rejects negative or fractional scores", () => {
      expect(
        captureError(() => gamesService.finalizeGame(game.id, { homeScore: -1, awayScore: 20 }))
      ).toMatchObject({ code: "validation" });
      expect(
        captureError(() => gamesService.finalizeGame(game.id, { homeScore: 21.5, awayScore: 20 }))
      ).toMatchObject({ code: "validation" });
      expect(gamesRepo.getGameById(game.id)?.isFinal).toBe(false);
    });
  });

  describe("resetGameGrades", () => {
    beforeEach(() => {
      gamesService.selectGameForLeague(pool.league.id, game.id, { lockedHomeSpread: -3 });
    });

    it("regrades picks against a corrected score", () => {
      const pick = placePick(pool.league.id, game, pool.owner.id, "home");
      gamesService.finalizeGame(game.id, { homeScore: 24, awayScore: 20 });
      expect(picksRepo.findById(pick.id)?.isCorrect).toBe(true);

      // Score correction: home only won by 2
      gamesService.finalizeGame(game.id, { homeScore: 22, awayScore: 20 });
      expect(picksRepo.findById(pick.id)?.isCorrect).toBe(true);

      const summary = gamesService.resetGameGrades(game.id);
      expect(summary.picksGraded).toBe(1);
      expect(picksRepo.findById(pick.id)?.isCorrect).toBe(false);
    });

    it("leaves grades alone in leagues that took the game out of their pool", () => {
      const other = seedLeague(season.season.id, { name: "Night Owls", memberNames: ["dave"] });
      gamesService.selectGameForLeague(other.league.id, game.id, { lockedHomeSpread: -3 });
      const pick = placePick(pool.league.id, game, pool.owner.id, "home");
      const otherPick = placePick(other.league.id, game, other.owner.id, "home");
      gamesService.finalizeGame(game.id, { homeScore: 24, awayScore: 20 });
      gamesService.setLeagueGameActive(other.league.id, game.id, false);

      gamesService.finalizeGame(game.id, { homeScore: 22, awayScore: 20 });
      const summary = gamesService.resetGameGrades(game.id);

      expect(summary.leaguesProcessed).toBe(1);
      expect(picksRepo.findById(pick.id)?.isCorrect).toBe(false);
      expect(picksRepo.findById(otherPick.id)?.isCorrect).toBe(true);
    });

        it("refuses games that are not final", () => {
      expect(captureError(() => gamesService.resetGameGrades(game.id))).toMatchObject({ code: "validation" });
    });
  });
});
