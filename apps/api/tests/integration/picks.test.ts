import { describe, it, expect, beforeEach } from "vitest";
import { gamesRepo } from "../../src/modules/games/games.repo";
import type { Game } from "../../src/modules/games/games.schemas";
import { leaguesService } from "../../src/modules/leagues/leagues.service";
import { picksService } from "../../src/modules/picks/picks.service";
import { usersRepo } from "../../src/modules/users/users.repo";
import { captureError } from "../helpers/errors";
import {
  AFTER_KICKOFF,
  BEFORE_KICKOFF,
  addGame,
  resetDatabase,
  seedLeague,
  seedSeason,
  selectGame,
  type LeagueFixture,
  type SeasonFixture
} from "../helpers/fixtures";

describe("picksService.submitPick", () => {
  let season: SeasonFixture;
  let pool: LeagueFixture;
  let game: Game;
  let secondGame: Game;
  let aliceId: number;

  beforeEach(() => {
    resetDatabase();
    season = seedSeason(2, 6);
    pool = seedLeague(season.season.id);
    aliceId = pool.owner.id;
    game = addGame(season, 0, 0, 1, -3);
    secondGame = addGame(season, 0, 2, 3, 7);
    selectGame(pool.league.id, game.id, -3, true);
    selectGame(pool.league.id, secondGame.id, 7);
  });

  function submit(overrides: Partial<Parameters<typeof picksService.submitPick>[0]> = {}, now = BEFORE_KICKOFF) {
    return picksService.submitPick(
      {
        leagueId: pool.league.id,
        gameId: game.id,
        userId: aliceId,
        pickedTeamId: game.homeTeamId,
        ...overrides
      },
      now
    );
  }

  it("stores a new pick as ungraded", () => {
    const pick = submit({ isKeyPick: true, pointsGuess: 51 });

    expect(pick).toMatchObject({
      leagueId: pool.league.id,
      gameId: game.id,
      userId: aliceId,
      pickedTeamId: game.homeTeamId,
      isKeyPick: true,
      isCorrect: null,
      isPush: false,
      pointsGuess: 51
    });
  });

  it("updates the existing pick instead of adding another", () => {
    const first = submit();
    const second = submit({ pickedTeamId: game.awayTeamId });

    expect(second.id).toBe(first.id);
    expect(second.pickedTeamId).toBe(game.awayTeamId);
  });

  it("locks picks at kickoff", () => {
    expect(captureError(() => submit({}, AFTER_KICKOFF))).toMatchObject({ code: "locked" });
  });

  it("locks picks on a final game", () => {
    gamesRepo.updateResult(game.id, { homeScore: 24, awayScore: 20, isFinal: true });
    expect(captureError(() => submit())).toMatchObject({ code: "locked" });
  });

  it("only accepts members", () => {
    const outsider = usersRepo.createUser("mallory");
    expect(captureError(() => submit({ userId: outsider.id }))).toMatchObject({ code: "forbidden" });
  });

  it("only accepts teams playing in the game", () => {
    expect(captureError(() => submit({ pickedTeamId: season.teams[4].id }))).toMatchObject({
      code: "validation"
    });
  });

  it("rejects games outside the league pool", () => {
    const other = addGame(season, 0, 4, 5, 1);
    expect(captureError(() => submit({ gameId: other.id, pickedTeamId: other.homeTeamId }))).toMatchObject({
      code: "not_found"
    });

    gamesRepo.setLeagueGameActive(pool.league.id, secondGame.id, false);
    expect(
      captureError(() => submit({ gameId: secondGame.id, pickedTeamId: secondGame.homeTeamId }))
    ).toMatchObject({ code: "not_found" });
  });

  it("caps key picks per week", () => {
    submit({ isKeyPick: true });
    expect(
      captureError(() =>
        submit({ gameId: secondGame.id, pickedTeamId: secondGame.homeTeamId, isKeyPick: true })
      )
    ).toMatchObject({ code: "validation", message: "Key pick limit reached for this week" });

    // Re-saving the same key pick does not count against itself
    expect(submit({ isKeyPick: true, pickedTeamId: game.awayTeamId }).isKeyPick).toBe(true);
  });

  it("counts key picks per week, not per season", () => {
    const nextWeek = addGame(season, 1, 4, 5, -1);
    selectGame(pool.league.id, nextWeek.id, -1);

    submit({ isKeyPick: true });
    const pick = submit({ gameId: nextWeek.id, pickedTeamId: nextWeek.homeTeamId, isKeyPick: true });
    expect(pick.isKeyPick).toBe(true);
  });

  it("rejects key picks when the league disables them", () => {
    leaguesService.saveLeagueRules(pool.league.id, season.season.id, { keyPicksEnabled: false });
    expect(captureError(() => submit({ isKeyPick: true }))).toMatchObject({ code: "validation" });
  });

  it("takes points guesses only on the total-points game", () => {
    expect(
      captureError(() =>
        submit({ gameId: secondGame.id, pickedTeamId: secondGame.homeTeamId, pointsGuess: 40 })
      )
    ).toMatchObject({ code: "validation" });
    expect(captureError(() => submit({ pointsGuess: -2 }))).toMatchObject({ code: "validation" });
  });
});
