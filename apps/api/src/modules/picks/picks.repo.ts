// apps/api/src/modules/picks/picks.repo.ts
import { dbFile } from "../../db/index";
import { fromFlag, toFlag } from "../../shared/validation";
import type { Pick, WeekPick } from "./picks.schemas";

type RawPickRow = {
  id: number;
  league_id: number;
  game_id: number;
  user_id: number;
  picked_team_id: number;
  is_key_pick: number;
  is_correct: number | null;
  is_push: number;
  points_guess: number | null;
  created_at: string;
  updated_at: string;
};

type RawWeekPickRow = {
  pick_id: number;
  user_id: number;
  game_id: number;
  is_key_pick: number;
  is_correct: number | null;
  is_push: number;
  points_guess: number | null;
};

function mapRowToPick(row: RawPickRow): Pick {
  return {
    id: row.id,
    leagueId: row.league_id,
    gameId: row.game_id,
    userId: row.user_id,
    pickedTeamId: row.picked_team_id,
    isKeyPick: fromFlag(row.is_key_pick),
    isCorrect: row.is_correct === null ? null : fromFlag(row.is_correct),
    isPush: fromFlag(row.is_push),
    pointsGuess: row.points_guess,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

const pickColumns = `
  id, league_id, game_id, user_id, picked_team_id, is_key_pick,
  is_correct, is_push, points_guess, created_at, updated_at
`;

const getPickByIdStmt = dbFile.prepare<[number], RawPickRow>(`
  SELECT ${pickColumns} FROM picks WHERE id = ?
`);

const getPickStmt = dbFile.prepare<[number, number, number], RawPickRow>(`
  SELECT ${pickColumns}
  FROM picks
  WHERE league_id = ? AND game_id = ? AND user_id = ?
`);

const upsertPickStmt = dbFile.prepare<[number, number, number, number, number, number | null]>(`
  INSERT INTO picks (league_id, game_id, user_id, picked_team_id, is_key_pick, points_guess)
  VALUES (?, ?, ?, ?, ?, ?)
  ON CONFLICT(league_id, game_id, user_id) DO UPDATE SET
    picked_team_id = excluded.picked_team_id,
    is_key_pick    = excluded.is_key_pick,
    points_guess   = excluded.points_guess,
    updated_at     = datetime('now')
`);

const listGradingCandidatesStmt = dbFile.prepare<[number, number], RawPickRow>(`
  SELECT ${pickColumns}
  FROM picks
  WHERE league_id = ?
    AND game_id = ?
    AND is_correct IS NULL
    AND is_push = 0
  ORDER BY id ASC
`);

const setResultStmt = dbFile.prepare<[number | null, number, number]>(`
  UPDATE picks
  SET is_correct = ?, is_push = ?
  WHERE id = ? AND is_correct IS NULL AND is_push = 0
`);

const listFinalWeekPicksStmt = dbFile.prepare<[number, number], RawWeekPickRow>(`
  SELECT
    p.id AS pick_id,
    p.user_id,
    p.game_id,
    p.is_key_pick,
    p.is_correct,
    p.is_push,
    p.points_guess
  FROM picks p
  JOIN games g ON g.id = p.game_id
  JOIN league_games lg ON lg.league_id = p.league_id AND lg.game_id = p.game_id
  WHERE p.league_id = ?
    AND g.week_id = ?
    AND g.is_final = 1
    AND lg.is_active = 1
  ORDER BY p.user_id ASC, p.id ASC
`);

const countKeyPicksStmt = dbFile.prepare<[number, number, number, number], { count: number }>(`
  SELECT COUNT(*) AS count
  FROM picks p
  JOIN games g ON g.id = p.game_id
  WHERE p.league_id = ?
    AND p.user_id = ?
    AND g.week_id = ?
    AND p.game_id != ?
    AND p.is_key_pick = 1
`);

const countUngradedForGameStmt = dbFile.prepare<[number], { count: number }>(`
  SELECT COUNT(*) AS count
  FROM picks
  WHERE game_id = ? AND is_correct IS NULL AND is_push = 0
`);

const resetResultsForLeagueGameStmt = dbFile.prepare<[number, number]>(`
  UPDATE picks SET is_correct = NULL, is_push = 0 WHERE league_id = ? AND game_id = ?
`);

export const picksRepo = {
  findById(pickId: number): Pick | null {
    const row = getPickByIdStmt.get(pickId);
    return row ? mapRowToPick(row) : null;
  },

  find(leagueId: number, gameId: number, userId: number): Pick | null {
    const row = getPickStmt.get(leagueId, gameId, userId);
    return row ? mapRowToPick(row) : null;
  },

  upsertPick(params: {
    leagueId: number;
    gameId: number;
    userId: number;
    pickedTeamId: number;
    isKeyPick: boolean;
    pointsGuess: number | null;
  }): Pick {
    upsertPickStmt.run(
      params.leagueId,
      params.gameId,
      params.userId,
      params.pickedTeamId,
      toFlag(params.isKeyPick),
      params.pointsGuess
    );
    const pick = this.find(params.leagueId, params.gameId, params.userId);
    if (!pick) {
      throw new Error("Failed to load pick after save");
    }
    return pick;
  },

  /** Picks on this game that have never been graded (pushes excluded). */
  listGradingCandidates(leagueId: number, gameId: number): Pick[] {
    return listGradingCandidatesStmt.all(leagueId, gameId).map(mapRowToPick);
  },

  /**
   * Write a grade once. Returns false when the pick was already graded,
   * so a duplicate finalize event cannot overwrite it.
   */
  setResult(pickId: number, isCorrect: boolean | null, isPush: boolean): boolean {
    const info = setResultStmt.run(
      isCorrect === null ? null : toFlag(isCorrect),
      toFlag(isPush),
      pickId
    );
    return info.changes > 0;
  },

  /** Picks on the week's final games that are active in the league pool. */
  listFinalWeekPicks(leagueId: number, weekId: number): WeekPick[] {
    return listFinalWeekPicksStmt.all(leagueId, weekId).map((row) => ({
      pickId: row.pick_id,
      userId: row.user_id,
      gameId: row.game_id,
      isKeyPick: fromFlag(row.is_key_pick),
      isCorrect: row.is_correct === null ? null : fromFlag(row.is_correct),
      isPush: fromFlag(row.is_push),
      pointsGuess: row.points_guess
    }));
  },

  countOtherKeyPicks(leagueId: number, userId: number, weekId: number, gameId: number): number {
    return countKeyPicksStmt.get(leagueId, userId, weekId, gameId)?.count ?? 0;
  },

  countUngradedForGame(gameId: number): number {
    return countUngradedForGameStmt.get(gameId)?.count ?? 0;
  },

  resetResultsForLeagueGame(leagueId: number, gameId: number): number {
    return resetResultsForLeagueGameStmt.run(leagueId, gameId).changes;
  }
};
