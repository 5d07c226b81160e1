// apps/api/src/modules/games/games.service.ts
import { createPickemError } from "../../shared/errors";
import { logger } from "../../shared/logger";
import { assertId, parseInteger, parseNumber } from "../../shared/validation";
import { leaguesRepo } from "../leagues/leagues.repo";
import type { GameFinalizedSummary } from "../scoring/scoring.schemas";
import { scoringService } from "../scoring/scoring.service";
import { gamesRepo } from "./games.repo";
import type {
  FinalScoreBody,
  FinalizeGameResult,
  Game,
  LeagueGame,
  SelectGameBody
} from "./games.schemas";

const log = logger.child({ module: "games" });

function assertGameExists(gameId: number): Game {
  const game = gamesRepo.getGameById(gameId);
  if (!game) {
    throw createPickemError("not_found", "Game not found", { gameId });
  }
  return game;
}

/** Pool changes on a final game move that league's standings. */
function rescoreIfFinal(leagueId: number, game: Game): void {
  if (!game.isFinal) return;
  const result = scoringService.rescoreLeagueGame(leagueId, game.id);
  log.info(
    { leagueId, gameId: game.id, picksGraded: result?.picksGraded ?? 0, errors: result?.errors.length ?? 0 },
    "league rescored after pool change"
  );
}

function assertLeagueGame(leagueId: number, gameId: number): LeagueGame {
  const leagueGame = gamesRepo.getLeagueGame(leagueId, gameId);
  if (!leagueGame) {
    throw createPickemError("not_found", "Game is not part of this league's pool", { leagueId, gameId });
  }
  return leagueGame;
}

export const gamesService = {
  /**
   * Add a game to a league's pool (or re-activate it). A spread given in the
   * body is locked right away.
   */
  selectGameForLeague(leagueIdParam: number, gameIdParam: number, body: SelectGameBody = {}): LeagueGame {
    const leagueId = assertId("leagueId", leagueIdParam);
    const gameId = assertId("gameId", gameIdParam);
    if (!leaguesRepo.findById(leagueId)) {
      throw createPickemError("not_found", "League not found", { leagueId });
    }
    const game = assertGameExists(gameId);

    gamesRepo.upsertLeagueGame(leagueId, gameId, body.isTotalPointsGame ?? false);

    if (body.lockedHomeSpread !== undefined && body.lockedHomeSpread !== null) {
      const spread = parseNumber("lockedHomeSpread", body.lockedHomeSpread);
      gamesRepo.setLockedSpread(leagueId, gameId, spread, new Date().toISOString());
    }

    rescoreIfFinal(leagueId, game);
    return assertLeagueGame(leagueId, gameId);
  },

  setLeagueGameActive(leagueId: number, gameId: number, isActive: boolean): LeagueGame {
    const current = assertLeagueGame(leagueId, gameId);
    if (current.isActive === isActive) return current;

    gamesRepo.setLeagueGameActive(leagueId, gameId, isActive);
    rescoreIfFinal(leagueId, assertGameExists(gameId));
    return assertLeagueGame(leagueId, gameId);
  },

  updateCurrentSpread(gameIdParam: number, homeSpread: number | null): Game {
    const gameId = assertId("gameId", gameIdParam);
    assertGameExists(gameId);
    gamesRepo.updateCurrentSpread(
      gameId,
      homeSpread === null ? null : parseNumber("homeSpread", homeSpread)
    );
    return assertGameExists(gameId);
  },

  /**
   * Freeze the game's current home spread for this league.
   * Returns false when the game has no current spread to lock.
   */
  lockSpread(leagueId: number, gameId: number, now: Date = new Date()): boolean {
    assertLeagueGame(leagueId, gameId);
    const game = assertGameExists(gameId);
    if (game.currentHomeSpread === null) {
      return false;
    }
    gamesRepo.setLockedSpread(leagueId, gameId, game.currentHomeSpread, now.toISOString());
    return true;
  },

  /**
   * Record the final score. Scoring runs only when the game goes from
   * not-final to final; later calls just correct the stored score, and
   * grades made from the old score stay until `resetGameGrades`.
   */
  finalizeGame(gameIdParam: number, body: FinalScoreBody): FinalizeGameResult {
    const gameId = assertId("gameId", gameIdParam);
    const homeScore = parseInteger("homeScore", body.homeScore, { min: 0 });
    const awayScore = parseInteger("awayScore", body.awayScore, { min: 0 });
    const game = assertGameExists(gameId);

    gamesRepo.updateResult(gameId, { homeScore, awayScore, isFinal: true });

    if (game.isFinal) {
      const scoreChanged = game.homeScore !== homeScore || game.awayScore !== awayScore;
      if (scoreChanged) {
        log.warn(
          {
            gameId,
            previous: { homeScore: game.homeScore, awayScore: game.awayScore },
            current: { homeScore, awayScore }
          },
          "final score changed; run resetGameGrades to regrade"
        );
      } else {
        log.debug({ gameId }, "game already final; scoring not re-triggered");
      }
      return { gameId, triggered: false, scoreChanged };
    }

    scoringService.onGameFinalized(gameId);
    return { gameId, triggered: true, scoreChanged: false };
  },

  /**
   * Clear the grades on a final game and score it again, in each league
   * where the game is active. This is the only path that re-grades an
   * already graded pick.
   */
  resetGameGrades(gameIdParam: number): GameFinalizedSummary {
    const gameId = assertId("gameId", gameIdParam);
    const game = assertGameExists(gameId);
    if (!game.isFinal) {
      throw createPickemError("validation", "Only final games can be regraded", { gameId });
    }

    return scoringService.regradeGame(gameId);
  }
};
