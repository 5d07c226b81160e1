// apps/api/src/modules/games/games.repo.ts
import { dbFile } from "../../db/index";
import { fromFlag, toFlag } from "../../shared/validation";
import type { CreateGameBody, Game, LeagueGame, Season, Team, Week } from "./games.schemas";

type RawSeasonRow = { id: number; year: number; name: string | null; is_active: number };

type RawGameRow = {
  id: number;
  season_id: number;
  week_id: number;
  home_team_id: number;
  away_team_id: number;
  kickoff: string;
  current_home_spread: number | null;
  home_score: number | null;
  away_score: number | null;
  is_final: number;
};

type RawLeagueGameRow = {
  league_id: number;
  game_id: number;
  locked_home_spread: number | null;
  spread_locked_at: string | null;
  is_active: number;
  is_total_points_game: number;
};

function mapRowToGame(row: RawGameRow): Game {
  return {
    id: row.id,
    seasonId: row.season_id,
    weekId: row.week_id,
    homeTeamId: row.home_team_id,
    awayTeamId: row.away_team_id,
    kickoff: row.kickoff,
    currentHomeSpread: row.current_home_spread,
    homeScore: row.home_score,
    awayScore: row.away_score,
    isFinal: fromFlag(row.is_final)
  };
}

function mapRowToLeagueGame(row: RawLeagueGameRow): LeagueGame {
  return {
    leagueId: row.league_id,
    gameId: row.game_id,
    lockedHomeSpread: row.locked_home_spread,
    spreadLockedAt: row.spread_locked_at,
    isActive: fromFlag(row.is_active),
    isTotalPointsGame: fromFlag(row.is_total_points_game)
  };
}

const gameColumns = `
  g.id, g.season_id, g.week_id, g.home_team_id, g.away_team_id, g.kickoff,
  g.current_home_spread, g.home_score, g.away_score, g.is_final
`;

const leagueGameColumns = `
  league_id, game_id, locked_home_spread, spread_locked_at, is_active, is_total_points_game
`;

const insertSeasonStmt = dbFile.prepare<[number, string | null, number], RawSeasonRow>(`
  INSERT INTO seasons (year, name, is_active)
  VALUES (?, ?, ?)
  RETURNING id, year, name, is_active
`);

const getSeasonByIdStmt = dbFile.prepare<[number], RawSeasonRow>(`
  SELECT id, year, name, is_active FROM seasons WHERE id = ?
`);

const insertWeekStmt = dbFile.prepare<[number, number], Week>(`
  INSERT INTO weeks (season_id, number)
  VALUES (?, ?)
  RETURNING id, season_id AS seasonId, number
`);

const getWeekByIdStmt = dbFile.prepare<[number], Week>(`
  SELECT id, season_id AS seasonId, number FROM weeks WHERE id = ?
`);

const listWeeksStmt = dbFile.prepare<[number], Week>(`
  SELECT id, season_id AS seasonId, number
  FROM weeks
  WHERE season_id = ?
  ORDER BY number ASC
`);

const insertTeamStmt = dbFile.prepare<[number, string, string | null], Team>(`
  INSERT INTO teams (season_id, name, abbreviation)
  VALUES (?, ?, ?)
  RETURNING id, season_id AS seasonId, name, abbreviation
`);

const insertGameStmt = dbFile.prepare<
  [number, number, number, number, string, number | null],
  { id: number }
>(`
  INSERT INTO games (season_id, week_id, home_team_id, away_team_id, kickoff, current_home_spread)
  VALUES (?, ?, ?, ?, ?, ?)
  RETURNING id
`);

const getGameByIdStmt = dbFile.prepare<[number], RawGameRow>(`
  SELECT ${gameColumns}
  FROM games g
  WHERE g.id = ?
`);

const updateResultStmt = dbFile.prepare<[number | null, number | null, number, number]>(`
  UPDATE games
  SET home_score = ?, away_score = ?, is_final = ?
  WHERE id = ?
`);

const updateCurrentSpreadStmt = dbFile.prepare<[number | null, number]>(`
  UPDATE games SET current_home_spread = ? WHERE id = ?
`);

const listFinalGamesStmt = dbFile.prepare<[number], RawGameRow>(`
  SELECT ${gameColumns}
  FROM games g
  JOIN weeks w ON w.id = g.week_id
  WHERE g.season_id = ? AND g.is_final = 1
  ORDER BY w.number ASC, g.kickoff ASC, g.id ASC
`);

const upsertLeagueGameStmt = dbFile.prepare<[number, number, number]>(`
  INSERT INTO league_games (league_id, game_id, is_total_points_game)
  VALUES (?, ?, ?)
  ON CONFLICT(league_id, game_id) DO UPDATE SET
    is_total_points_game = excluded.is_total_points_game,
    is_active = 1
`);

const getLeagueGameStmt = dbFile.prepare<[number, number], RawLeagueGameRow>(`
  SELECT ${leagueGameColumns}
  FROM league_games
  WHERE league_id = ? AND game_id = ?
`);

const setLeagueGameActiveStmt = dbFile.prepare<[number, number, number]>(`
  UPDATE league_games SET is_active = ? WHERE league_id = ? AND game_id = ?
`);

const listActiveLeagueGamesForGameStmt = dbFile.prepare<[number], RawLeagueGameRow>(`
  SELECT ${leagueGameColumns}
  FROM league_games
  WHERE game_id = ? AND is_active = 1
  ORDER BY league_id ASC
`);

const setLockedSpreadStmt = dbFile.prepare<[number | null, string, number, number]>(`
  UPDATE league_games
  SET locked_home_spread = ?, spread_locked_at = ?
  WHERE league_id = ? AND game_id = ?
`);

const listQualifyingWeekIdsStmt = dbFile.prepare<[number, number], { weekId: number }>(`
  SELECT DISTINCT g.week_id AS weekId
  FROM league_games lg
  JOIN games g ON g.id = lg.game_id
  WHERE lg.league_id = ?
    AND g.season_id = ?
    AND g.is_final = 1
    AND lg.is_active = 1
`);

const getTotalPointsGameStmt = dbFile.prepare<[number, number], RawGameRow>(`
  SELECT ${gameColumns}
  FROM league_games lg
  JOIN games g ON g.id = lg.game_id
  WHERE lg.league_id = ?
    AND g.week_id = ?
    AND lg.is_active = 1
    AND lg.is_total_points_game = 1
  ORDER BY g.kickoff ASC, g.id ASC
  LIMIT 1
`);

const listFinalLeagueGamesStmt = dbFile.prepare<[number, number], RawGameRow>(`
  SELECT ${gameColumns}
  FROM league_games lg
  JOIN games g ON g.id = lg.game_id
  WHERE lg.league_id = ?
    AND g.week_id = ?
    AND lg.is_active = 1
    AND g.is_final = 1
  ORDER BY g.kickoff ASC, g.id ASC
`);

export const gamesRepo = {
  createSeason(params: { year: number; name?: string | null; isActive?: boolean }): Season {
    const row = insertSeasonStmt.get(params.year, params.name ?? null, toFlag(params.isActive ?? false));
    if (!row) {
      throw new Error("Failed to load season after creation");
    }
    return { id: row.id, year: row.year, name: row.name, isActive: fromFlag(row.is_active) };
  },

  getSeasonById(seasonId: number): Season | null {
    const row = getSeasonByIdStmt.get(seasonId);
    return row ? { id: row.id, year: row.year, name: row.name, isActive: fromFlag(row.is_active) } : null;
  },

  createWeek(seasonId: number, number: number): Week {
    const row = insertWeekStmt.get(seasonId, number);
    if (!row) {
      throw new Error("Failed to load week after creation");
    }
    return row;
  },

  getWeekById(weekId: number): Week | null {
    return getWeekByIdStmt.get(weekId) ?? null;
  },

  listWeeks(seasonId: number): Week[] {
    return listWeeksStmt.all(seasonId);
  },

  createTeam(seasonId: number, name: string, abbreviation: string | null = null): Team {
    const row = insertTeamStmt.get(seasonId, name, abbreviation);
    if (!row) {
      throw new Error("Failed to load team after creation");
    }
    return row;
  },

  createGame(body: CreateGameBody): Game {
    const inserted = insertGameStmt.get(
      body.seasonId,
      body.weekId,
      body.homeTeamId,
      body.awayTeamId,
      body.kickoff,
      body.currentHomeSpread ?? null
    );
    const game = inserted ? this.getGameById(inserted.id) : null;
    if (!game) {
      throw new Error("Failed to load game after creation");
    }
    return game;
  },

  getGameById(gameId: number): Game | null {
    const row = getGameByIdStmt.get(gameId);
    return row ? mapRowToGame(row) : null;
  },

  updateResult(
    gameId: number,
    result: { homeScore: number | null; awayScore: number | null; isFinal: boolean }
  ): void {
    updateResultStmt.run(result.homeScore, result.awayScore, toFlag(result.isFinal), gameId);
  },

  updateCurrentSpread(gameId: number, homeSpread: number | null): void {
    updateCurrentSpreadStmt.run(homeSpread, gameId);
  },

  listFinalGames(seasonId: number): Game[] {
    return listFinalGamesStmt.all(seasonId).map(mapRowToGame);
  },

  upsertLeagueGame(leagueId: number, gameId: number, isTotalPointsGame: boolean): void {
    upsertLeagueGameStmt.run(leagueId, gameId, toFlag(isTotalPointsGame));
  },

  getLeagueGame(leagueId: number, gameId: number): LeagueGame | null {
    const row = getLeagueGameStmt.get(leagueId, gameId);
    return row ? mapRowToLeagueGame(row) : null;
  },

  setLeagueGameActive(leagueId: number, gameId: number, isActive: boolean): void {
    setLeagueGameActiveStmt.run(toFlag(isActive), leagueId, gameId);
  },

  listActiveLeagueGamesForGame(gameId: number): LeagueGame[] {
    return listActiveLeagueGamesForGameStmt.all(gameId).map(mapRowToLeagueGame);
  },

  setLockedSpread(leagueId: number, gameId: number, homeSpread: number | null, lockedAt: string): void {
    setLockedSpreadStmt.run(homeSpread, lockedAt, leagueId, gameId);
  },

  getLockedSpread(leagueId: number, gameId: number): number | null {
    return getLeagueGameStmt.get(leagueId, gameId)?.locked_home_spread ?? null;
  },

  /** Weeks with at least one final, active game selected for this league. */
  listQualifyingWeekIds(leagueId: number, seasonId: number): Set<number> {
    return new Set(listQualifyingWeekIdsStmt.all(leagueId, seasonId).map((r) => r.weekId));
  },

  getTotalPointsGame(leagueId: number, weekId: number): Game | null {
    const row = getTotalPointsGameStmt.get(leagueId, weekId);
    return row ? mapRowToGame(row) : null;
  },

  listFinalLeagueGames(leagueId: number, weekId: number): Game[] {
    return listFinalLeagueGamesStmt.all(leagueId, weekId).map(mapRowToGame);
  }
};
