// apps/api/src/modules/leagues/leagues.repo.ts
import { dbFile } from "../../db/index";
import { fromFlag, toFlag } from "../../shared/validation";
import {
  TIEBREAKERS,
  Tiebreaker,
  type League,
  type LeagueMemberRole,
  type LeagueRules
} from "./leagues.schemas";

type RawLeagueRow = {
  id: number;
  name: string;
  description: string | null;
  created_by_user_id: number;
  is_active: number;
  created_at: string;
};

type RawRulesRow = {
  points_per_correct_pick: number;
  key_pick_extra_points: number;
  key_picks_enabled: number;
  number_of_key_picks: number;
  against_the_spread_enabled: number;
  force_hooks: number;
  tiebreaker: number;
  drop_weeks: number;
};

function mapRowToLeague(row: RawLeagueRow): League {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdByUserId: row.created_by_user_id,
    isActive: fromFlag(row.is_active),
    createdAt: row.created_at
  };
}

function mapRowToRules(row: RawRulesRow): LeagueRules {
  return {
    pointsPerCorrectPick: row.points_per_correct_pick,
    keyPickExtraPoints: row.key_pick_extra_points,
    keyPicksEnabled: fromFlag(row.key_picks_enabled),
    numberOfKeyPicks: row.number_of_key_picks,
    againstTheSpreadEnabled: fromFlag(row.against_the_spread_enabled),
    forceHooks: fromFlag(row.force_hooks),
    // Unknown codes fall back to no tiebreaker rather than breaking ranking
    tiebreaker: TIEBREAKERS.find((t) => t === row.tiebreaker) ?? Tiebreaker.None,
    dropWeeks: row.drop_weeks
  };
}

const selectLeagueBase = `
  SELECT id, name, description, created_by_user_id, is_active, created_at
  FROM leagues
`;

const getLeagueByIdStmt = dbFile.prepare<[number], RawLeagueRow>(`
  ${selectLeagueBase}
  WHERE id = ?
`);

const getLeagueByNameStmt = dbFile.prepare<[string], RawLeagueRow>(`
  ${selectLeagueBase}
  WHERE name = ? COLLATE NOCASE
`);

const listLeagueIdsStmt = dbFile.prepare<[], { id: number }>(`
  SELECT id FROM leagues ORDER BY id ASC
`);

const insertLeagueStmt = dbFile.prepare<[string, string | null, number], RawLeagueRow>(`
  INSERT INTO leagues (name, description, created_by_user_id)
  VALUES (?, ?, ?)
  RETURNING id, name, description, created_by_user_id, is_active, created_at
`);

const upsertMemberStmt = dbFile.prepare<[number, number, string]>(`
  INSERT INTO league_memberships (league_id, user_id, role)
  VALUES (?, ?, ?)
  ON CONFLICT(league_id, user_id) DO UPDATE SET role = excluded.role
`);

const getMemberRoleStmt = dbFile.prepare<[number, number], { role: LeagueMemberRole }>(`
  SELECT role
  FROM league_memberships
  WHERE league_id = ? AND user_id = ?
`);

const listMemberIdsStmt = dbFile.prepare<[number], { userId: number }>(`
  SELECT user_id AS userId
  FROM league_memberships
  WHERE league_id = ?
  ORDER BY user_id ASC
`);

const getRulesStmt = dbFile.prepare<[number, number], RawRulesRow>(`
  SELECT
    points_per_correct_pick,
    key_pick_extra_points,
    key_picks_enabled,
    number_of_key_picks,
    against_the_spread_enabled,
    force_hooks,
    tiebreaker,
    drop_weeks
  FROM league_rules
  WHERE league_id = ? AND season_id = ?
`);

const upsertRulesStmt = dbFile.prepare<
  [number, number, number, number, number, number, number, number, number, number]
>(`
  INSERT INTO league_rules (
    league_id,
    season_id,
    points_per_correct_pick,
    key_pick_extra_points,
    key_picks_enabled,
    number_of_key_picks,
    against_the_spread_enabled,
    force_hooks,
    tiebreaker,
    drop_weeks
  )
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT(league_id, season_id) DO UPDATE SET
    points_per_correct_pick    = excluded.points_per_correct_pick,
    key_pick_extra_points      = excluded.key_pick_extra_points,
    key_picks_enabled          = excluded.key_picks_enabled,
    number_of_key_picks        = excluded.number_of_key_picks,
    against_the_spread_enabled = excluded.against_the_spread_enabled,
    force_hooks                = excluded.force_hooks,
    tiebreaker                 = excluded.tiebreaker,
    drop_weeks                 = excluded.drop_weeks,
    updated_at                 = datetime('now')
`);

export const leaguesRepo = {
  findById(id: number): League | null {
    const row = getLeagueByIdStmt.get(id);
    return row ? mapRowToLeague(row) : null;
  },

  findByName(name: string): League | null {
    const row = getLeagueByNameStmt.get(name);
    return row ? mapRowToLeague(row) : null;
  },

  listLeagueIds(): number[] {
    return listLeagueIdsStmt.all().map((r) => r.id);
  },

  createLeague(params: {
    name: string;
    description: string | null;
    createdByUserId: number;
  }): League {
    const row = insertLeagueStmt.get(params.name, params.description, params.createdByUserId);
    if (!row) {
      throw new Error("Failed to load league after creation");
    }
    return mapRowToLeague(row);
  },

  upsertMember(leagueId: number, userId: number, role: LeagueMemberRole): void {
    upsertMemberStmt.run(leagueId, userId, role);
  },

  getMemberRole(leagueId: number, userId: number): LeagueMemberRole | null {
    return getMemberRoleStmt.get(leagueId, userId)?.role ?? null;
  },

  listMemberIds(leagueId: number): number[] {
    return listMemberIdsStmt.all(leagueId).map((r) => r.userId);
  },

  getRules(leagueId: number, seasonId: number): LeagueRules | null {
    const row = getRulesStmt.get(leagueId, seasonId);
    return row ? mapRowToRules(row) : null;
  },

  upsertRules(leagueId: number, seasonId: number, rules: LeagueRules): void {
    upsertRulesStmt.run(
      leagueId,
      seasonId,
      rules.pointsPerCorrectPick,
      rules.keyPickExtraPoints,
      toFlag(rules.keyPicksEnabled),
      rules.numberOfKeyPicks,
      toFlag(rules.againstTheSpreadEnabled),
      toFlag(rules.forceHooks),
      rules.tiebreaker,
      rules.dropWeeks
    );
  }
};
