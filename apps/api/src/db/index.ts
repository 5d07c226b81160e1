// apps/api/src/db/index.ts
import Database from "better-sqlite3";
import { config } from "../shared/config";

export const dbFile = new Database(config.dbPath);

// Ensure schema exists on startup
initializeSchema();

function initializeSchema() {
  // Enforce foreign key constraints
  dbFile.pragma("foreign_keys = ON");

  // Readers keep seeing the last committed standings while a league is rewritten
  dbFile.pragma("journal_mode = WAL");

  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      display_name TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  //
  // Calendar: seasons, weeks, teams, games
  //
  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS seasons (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      year INTEGER NOT NULL UNIQUE,
      name TEXT,
      is_active INTEGER NOT NULL DEFAULT 0
    );
  `);

  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS weeks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      season_id INTEGER NOT NULL,
      number INTEGER NOT NULL,
      UNIQUE (season_id, number),
      FOREIGN KEY (season_id) REFERENCES seasons(id) ON DELETE CASCADE
    );
  `);

  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS teams (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      season_id INTEGER NOT NULL,
      name TEXT NOT NULL,
      abbreviation TEXT,
      UNIQUE (season_id, name),
      FOREIGN KEY (season_id) REFERENCES seasons(id) ON DELETE CASCADE
    );
  `);

  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS games (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      season_id INTEGER NOT NULL,
      week_id INTEGER NOT NULL,
      home_team_id INTEGER NOT NULL,
      away_team_id INTEGER NOT NULL,
      kickoff TEXT NOT NULL,             -- ISO 8601
      current_home_spread REAL,          -- home perspective, negative = home favored
      home_score INTEGER,
      away_score INTEGER,
      is_final INTEGER NOT NULL DEFAULT 0,
      FOREIGN KEY (season_id) REFERENCES seasons(id) ON DELETE CASCADE,
      FOREIGN KEY (week_id) REFERENCES weeks(id) ON DELETE CASCADE,
      FOREIGN KEY (home_team_id) REFERENCES teams(id) ON DELETE CASCADE,
      FOREIGN KEY (away_team_id) REFERENCES teams(id) ON DELETE CASCADE
    );
  `);

  //
  // Leagues, memberships, rules
  //
  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS leagues (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE COLLATE NOCASE,
      description TEXT,
      created_by_user_id INTEGER NOT NULL,
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      FOREIGN KEY (created_by_user_id) REFERENCES users(id) ON DELETE CASCADE
    );
  `);

  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS league_memberships (
      league_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      role TEXT NOT NULL DEFAULT 'member',   -- owner | admin | member
      joined_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (league_id, user_id),
      FOREIGN KEY (league_id) REFERENCES leagues(id) ON DELETE CASCADE,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    );
  `);

  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS league_rules (
      league_id INTEGER NOT NULL,
      season_id INTEGER NOT NULL,
      points_per_correct_pick INTEGER NOT NULL DEFAULT 1,
      key_pick_extra_points INTEGER NOT NULL DEFAULT 1,
      key_picks_enabled INTEGER NOT NULL DEFAULT 1,
      number_of_key_picks INTEGER NOT NULL DEFAULT 1,
      against_the_spread_enabled INTEGER NOT NULL DEFAULT 1,
      force_hooks INTEGER NOT NULL DEFAULT 0,
      tiebreaker INTEGER NOT NULL DEFAULT 0,   -- 0 none | 1 key picks | 2 total points | 3 correct picks
      drop_weeks INTEGER NOT NULL DEFAULT 0,
      updated_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (league_id, season_id),
      FOREIGN KEY (league_id) REFERENCES leagues(id) ON DELETE CASCADE,
      FOREIGN KEY (season_id) REFERENCES seasons(id) ON DELETE CASCADE
    );
  `);

  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS league_games (
      league_id INTEGER NOT NULL,
      game_id INTEGER NOT NULL,
      locked_home_spread REAL,
      spread_locked_at TEXT,
      is_active INTEGER NOT NULL DEFAULT 1,
      is_total_points_game INTEGER NOT NULL DEFAULT 0,
      selected_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (league_id, game_id),
      FOREIGN KEY (league_id) REFERENCES leagues(id) ON DELETE CASCADE,
      FOREIGN KEY (game_id) REFERENCES games(id) ON DELETE CASCADE
    );
  `);

  //
  // Picks
  //
  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS picks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      league_id INTEGER NOT NULL,
      game_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      picked_team_id INTEGER NOT NULL,
      is_key_pick INTEGER NOT NULL DEFAULT 0,
      is_correct INTEGER,                 -- NULL = ungraded or push
      is_push INTEGER NOT NULL DEFAULT 0,
      points_guess INTEGER,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now')),
      UNIQUE (league_id, game_id, user_id),
      FOREIGN KEY (league_id) REFERENCES leagues(id) ON DELETE CASCADE,
      FOREIGN KEY (game_id) REFERENCES games(id) ON DELETE CASCADE,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
      FOREIGN KEY (picked_team_id) REFERENCES teams(id) ON DELETE CASCADE
    );
  `);

  dbFile.exec(`
    CREATE INDEX IF NOT EXISTS idx_picks_league_user ON picks(league_id, user_id);
  `);

  //
  // Derived standings (safe to wipe and recompute)
  //
  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS member_weeks (
      league_id INTEGER NOT NULL,
      week_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      picks_made INTEGER NOT NULL DEFAULT 0,
      correct INTEGER NOT NULL DEFAULT 0,
      incorrect INTEGER NOT NULL DEFAULT 0,
      ties INTEGER NOT NULL DEFAULT 0,
      correct_key INTEGER NOT NULL DEFAULT 0,
      points INTEGER NOT NULL DEFAULT 0,
      points_guess INTEGER,
      points_actual INTEGER,
      tiebreak_abs_diff INTEGER,
      rank INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (league_id, week_id, user_id),
      FOREIGN KEY (league_id) REFERENCES leagues(id) ON DELETE CASCADE,
      FOREIGN KEY (week_id) REFERENCES weeks(id) ON DELETE CASCADE,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    );
  `);

  dbFile.exec(`
    CREATE TABLE IF NOT EXISTS member_seasons (
      league_id INTEGER NOT NULL,
      season_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      through_week INTEGER NOT NULL DEFAULT 0,
      picks_made INTEGER NOT NULL DEFAULT 0,
      correct INTEGER NOT NULL DEFAULT 0,
      incorrect INTEGER NOT NULL DEFAULT 0,
      ties INTEGER NOT NULL DEFAULT 0,
      correct_key INTEGER NOT NULL DEFAULT 0,
      points INTEGER NOT NULL DEFAULT 0,
      picks_made_dropped INTEGER NOT NULL DEFAULT 0,
      correct_dropped INTEGER NOT NULL DEFAULT 0,
      incorrect_dropped INTEGER NOT NULL DEFAULT 0,
      ties_dropped INTEGER NOT NULL DEFAULT 0,
      correct_key_dropped INTEGER NOT NULL DEFAULT 0,
      points_dropped INTEGER NOT NULL DEFAULT 0,
      rank INTEGER NOT NULL DEFAULT 0,
      rank_with_drops INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (league_id, season_id, user_id),
      FOREIGN KEY (league_id) REFERENCES leagues(id) ON DELETE CASCADE,
      FOREIGN KEY (season_id) REFERENCES seasons(id) ON DELETE CASCADE,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    );
  `);
}
