// apps/api/src/modules/picks/picks.service.ts
import { createPickemError } from "../../shared/errors";
import { assertId, parseInteger } from "../../shared/validation";
import { gamesRepo } from "../games/games.repo";
import { leaguesRepo } from "../leagues/leagues.repo";
import { DEFAULT_LEAGUE_RULES } from "../leagues/leagues.schemas";
import { picksRepo } from "./picks.repo";
import type { Pick, SubmitPickBody } from "./picks.schemas";

export const picksService = {
  /**
   * Create or update a member's pick while the game has not kicked off.
   * The weekly key-pick cap is enforced here; grading trusts the stored flag.
   */
  submitPick(body: SubmitPickBody, now: Date = new Date()): Pick {
    const leagueId = assertId("leagueId", body.leagueId);
    const gameId = assertId("gameId", body.gameId);
    const userId = assertId("userId", body.userId);
    const pickedTeamId = assertId("pickedTeamId", body.pickedTeamId);
    const isKeyPick = body.isKeyPick ?? false;

    const game = gamesRepo.getGameById(gameId);
    if (!game) {
      throw createPickemError("not_found", "Game not found", { gameId });
    }

    const leagueGame = gamesRepo.getLeagueGame(leagueId, gameId);
    if (!leagueGame || !leagueGame.isActive) {
      throw createPickemError("not_found", "Game is not part of this league's pool", {
        leagueId,
        gameId
      });
    }

    if (!leaguesRepo.getMemberRole(leagueId, userId)) {
      throw createPickemError("forbidden", "Only league members can make picks", {
        leagueId,
        userId
      });
    }

    if (game.isFinal || now.getTime() >= Date.parse(game.kickoff)) {
      throw createPickemError("locked", "Picks lock at kickoff", { gameId, kickoff: game.kickoff });
    }

    if (pickedTeamId !== game.homeTeamId && pickedTeamId !== game.awayTeamId) {
      throw createPickemError("validation", "Picked team is not playing in this game", {
        gameId,
        pickedTeamId
      });
    }

    const rules = leaguesRepo.getRules(leagueId, game.seasonId) ?? DEFAULT_LEAGUE_RULES;

    if (isKeyPick) {
      if (!rules.keyPicksEnabled) {
        throw createPickemError("validation", "Key picks are disabled for this league");
      }
      const otherKeyPicks = picksRepo.countOtherKeyPicks(leagueId, userId, game.weekId, gameId);
      if (otherKeyPicks >= rules.numberOfKeyPicks) {
        throw createPickemError("validation", "Key pick limit reached for this week", {
          limit: rules.numberOfKeyPicks
        });
      }
    }

    let pointsGuess: number | null = null;
    if (body.pointsGuess !== undefined && body.pointsGuess !== null) {
      if (!leagueGame.isTotalPointsGame) {
        throw createPickemError("validation", "Points guesses are only taken on the total-points game", {
          gameId
        });
      }
      pointsGuess = parseInteger("pointsGuess", body.pointsGuess, { min: 0 });
    }

    return picksRepo.upsertPick({ leagueId, gameId, userId, pickedTeamId, isKeyPick, pointsGuess });
  }
};
