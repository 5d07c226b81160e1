// apps/api/src/modules/standings/standings.repo.ts
import { dbFile } from "../../db/index";
import type {
  MemberSeasonRecord,
  MemberWeekRecord,
  SeasonTotals,
  SeasonWeekRecord
} from "../scoring/scoring.schemas";

type RawMemberWeekRow = {
  user_id: number;
  picks_made: number;
  correct: number;
  incorrect: number;
  ties: number;
  correct_key: number;
  points: number;
  points_guess: number | null;
  points_actual: number | null;
  tiebreak_abs_diff: number | null;
  rank: number;
};

type RawSeasonWeekRow = RawMemberWeekRow & {
  week_id: number;
  week_number: number;
};

type RawMemberSeasonRow = {
  user_id: number;
  through_week: number;
  picks_made: number;
  correct: number;
  incorrect: number;
  ties: number;
  correct_key: number;
  points: number;
  picks_made_dropped: number;
  correct_dropped: number;
  incorrect_dropped: number;
  ties_dropped: number;
  correct_key_dropped: number;
  points_dropped: number;
  rank: number;
  rank_with_drops: number;
};

type UserColumns = { username: string; display_name: string | null };

export type StoredMemberWeek = MemberWeekRecord & { username: string; displayName: string | null };
export type StoredMemberSeason = MemberSeasonRecord & { username: string; displayName: string | null };

function mapRowToMemberWeek(row: RawMemberWeekRow): MemberWeekRecord {
  return {
    userId: row.user_id,
    picksMade: row.picks_made,
    correct: row.correct,
    incorrect: row.incorrect,
    ties: row.ties,
    correctKey: row.correct_key,
    points: row.points,
    pointsGuess: row.points_guess,
    pointsActual: row.points_actual,
    tiebreakAbsDiff: row.tiebreak_abs_diff,
    rank: row.rank
  };
}

function mapRowToMemberSeason(row: RawMemberSeasonRow): MemberSeasonRecord {
  const dropped: SeasonTotals = {
    picksMade: row.picks_made_dropped,
    correct: row.correct_dropped,
    incorrect: row.incorrect_dropped,
    ties: row.ties_dropped,
    correctKey: row.correct_key_dropped,
    points: row.points_dropped
  };
  return {
    userId: row.user_id,
    throughWeek: row.through_week,
    full: {
      picksMade: row.picks_made,
      correct: row.correct,
      incorrect: row.incorrect,
      ties: row.ties,
      correctKey: row.correct_key,
      points: row.points
    },
    dropped,
    rank: row.rank,
    rankWithDrops: row.rank_with_drops
  };
}

const memberWeekColumns = `
  mw.user_id, mw.picks_made, mw.correct, mw.incorrect, mw.ties, mw.correct_key,
  mw.points, mw.points_guess, mw.points_actual, mw.tiebreak_abs_diff, mw.rank
`;

const memberSeasonColumns = `
  ms.user_id, ms.through_week,
  ms.picks_made, ms.correct, ms.incorrect, ms.ties, ms.correct_key, ms.points,
  ms.picks_made_dropped, ms.correct_dropped, ms.incorrect_dropped,
  ms.ties_dropped, ms.correct_key_dropped, ms.points_dropped,
  ms.rank, ms.rank_with_drops
`;

const deleteMemberWeeksStmt = dbFile.prepare<[number, number]>(`
  DELETE FROM member_weeks WHERE league_id = ? AND week_id = ?
`);

const insertMemberWeekStmt = dbFile.prepare<
  [
    number, number, number,
    number, number, number, number, number, number,
    number | null, number | null, number | null,
    number
  ]
>(`
  INSERT INTO member_weeks (
    league_id, week_id, user_id,
    picks_made, correct, incorrect, ties, correct_key, points,
    points_guess, points_actual, tiebreak_abs_diff,
    rank
  )
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`);

const deleteMemberSeasonsStmt = dbFile.prepare<[number, number]>(`
  DELETE FROM member_seasons WHERE league_id = ? AND season_id = ?
`);

const deleteSeasonMemberWeeksStmt = dbFile.prepare<[number, number]>(`
  DELETE FROM member_weeks
  WHERE league_id = ?
    AND week_id IN (SELECT id FROM weeks WHERE season_id = ?)
`);

const insertMemberSeasonStmt = dbFile.prepare<
  [
    number, number, number, number,
    number, number, number, number, number, number,
    number, number, number, number, number, number,
    number, number
  ]
>(`
  INSERT INTO member_seasons (
    league_id, season_id, user_id, through_week,
    picks_made, correct, incorrect, ties, correct_key, points,
    picks_made_dropped, correct_dropped, incorrect_dropped,
    ties_dropped, correct_key_dropped, points_dropped,
    rank, rank_with_drops
  )
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`);

const listSeasonMemberWeeksStmt = dbFile.prepare<[number, number], RawSeasonWeekRow>(`
  SELECT ${memberWeekColumns}, w.id AS week_id, w.number AS week_number
  FROM member_weeks mw
  JOIN weeks w ON w.id = mw.week_id
  WHERE mw.league_id = ? AND w.season_id = ?
  ORDER BY mw.user_id ASC, w.number ASC
`);

const listWeekStandingsStmt = dbFile.prepare<[number, number], RawMemberWeekRow & UserColumns>(`
  SELECT ${memberWeekColumns}, u.username, u.display_name
  FROM member_weeks mw
  JOIN users u ON u.id = mw.user_id
  WHERE mw.league_id = ? AND mw.week_id = ?
  ORDER BY mw.rank ASC, mw.user_id ASC
`);

const listSeasonStandingsStmt = dbFile.prepare<[number, number], RawMemberSeasonRow & UserColumns>(`
  SELECT ${memberSeasonColumns}, u.username, u.display_name
  FROM member_seasons ms
  JOIN users u ON u.id = ms.user_id
  WHERE ms.league_id = ? AND ms.season_id = ?
  ORDER BY ms.rank ASC, ms.user_id ASC
`);

export const standingsRepo = {
  clearMemberWeeks(leagueId: number, weekId: number): void {
    deleteMemberWeeksStmt.run(leagueId, weekId);
  },

  insertMemberWeek(leagueId: number, weekId: number, record: MemberWeekRecord): void {
    insertMemberWeekStmt.run(
      leagueId,
      weekId,
      record.userId,
      record.picksMade,
      record.correct,
      record.incorrect,
      record.ties,
      record.correctKey,
      record.points,
      record.pointsGuess,
      record.pointsActual,
      record.tiebreakAbsDiff,
      record.rank
    );
  },

  clearMemberSeasons(leagueId: number, seasonId: number): void {
    deleteMemberSeasonsStmt.run(leagueId, seasonId);
  },

  clearSeasonMemberWeeks(leagueId: number, seasonId: number): void {
    deleteSeasonMemberWeeksStmt.run(leagueId, seasonId);
  },

  insertMemberSeason(leagueId: number, seasonId: number, record: MemberSeasonRecord): void {
    const { full, dropped } = record;
    insertMemberSeasonStmt.run(
      leagueId,
      seasonId,
      record.userId,
      record.throughWeek,
      full.picksMade,
      full.correct,
      full.incorrect,
      full.ties,
      full.correctKey,
      full.points,
      dropped.picksMade,
      dropped.correct,
      dropped.incorrect,
      dropped.ties,
      dropped.correctKey,
      dropped.points,
      record.rank,
      record.rankWithDrops
    );
  },

  listSeasonMemberWeeks(leagueId: number, seasonId: number): SeasonWeekRecord[] {
    return listSeasonMemberWeeksStmt.all(leagueId, seasonId).map((row) => ({
      ...mapRowToMemberWeek(row),
      weekId: row.week_id,
      weekNumber: row.week_number
    }));
  },

  listWeekStandings(leagueId: number, weekId: number): StoredMemberWeek[] {
    return listWeekStandingsStmt.all(leagueId, weekId).map((row) => ({
      ...mapRowToMemberWeek(row),
      username: row.username,
      displayName: row.display_name
    }));
  },

  listSeasonStandings(leagueId: number, seasonId: number): StoredMemberSeason[] {
    return listSeasonStandingsStmt.all(leagueId, seasonId).map((row) => ({
      ...mapRowToMemberSeason(row),
      username: row.username,
      displayName: row.display_name
    }));
  }
};
