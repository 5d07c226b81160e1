// apps/api/src/modules/scoring/scoring.weekly.ts
import type { Game } from "../games/games.schemas";
import { Tiebreaker, type LeagueRules } from "../leagues/leagues.schemas";
import type { WeekPick } from "../picks/picks.schemas";
import { storedGrade } from "./scoring.grading";
import { calculatePickPoints } from "./scoring.points";
import { assignRanks } from "./scoring.ranking";
import type { MemberWeekRecord, MemberWeekStats, RankEntry } from "./scoring.schemas";
import { weekTiebreakKey } from "./scoring.tiebreak";

export type TotalPointsContext = {
  gameId: number;
  /** Combined final score; null until the game is final. */
  actualTotal: number | null;
};

export function totalPointsContext(game: Game | null): TotalPointsContext | null {
  if (!game) return null;
  const actualTotal =
    game.isFinal && game.homeScore !== null && game.awayScore !== null
      ? game.homeScore + game.awayScore
      : null;
  return { gameId: game.id, actualTotal };
}

/**
 * One member's line for one league week, built from the stored grades of
 * their picks. Ungraded picks count for nothing; pushes count as ties.
 */
export function computeMemberWeek(
  picks: readonly WeekPick[],
  rules: LeagueRules,
  totalPointsGame: TotalPointsContext | null
): MemberWeekStats {
  let correct = 0;
  let incorrect = 0;
  let ties = 0;
  let correctKey = 0;
  let points = 0;

  for (const pick of picks) {
    const grade = storedGrade(pick.isCorrect, pick.isPush);
    if (grade === "correct") {
      correct++;
      if (pick.isKeyPick) correctKey++;
    } else if (grade === "incorrect") {
      incorrect++;
    } else if (grade === "push") {
      ties++;
    }
    points += calculatePickPoints(pick, grade, rules);
  }

  let pointsGuess: number | null = null;
  let pointsActual: number | null = null;
  let tiebreakAbsDiff: number | null = null;

  if (rules.tiebreaker === Tiebreaker.TotalPointsGuess && totalPointsGame) {
    const guessPick = picks.find((p) => p.gameId === totalPointsGame.gameId);
    pointsGuess = guessPick?.pointsGuess ?? null;
    pointsActual = totalPointsGame.actualTotal;
    if (pointsGuess !== null && pointsActual !== null) {
      tiebreakAbsDiff = Math.abs(pointsGuess - pointsActual);
    }
  }

  return {
    picksMade: correct + incorrect + ties,
    correct,
    incorrect,
    ties,
    correctKey,
    points,
    pointsGuess,
    pointsActual,
    tiebreakAbsDiff
  };
}

/**
 * Every member with one of the given picks, ranked. Callers pass the picks on
 * the week's final, active league games. Rows come back in user id order.
 */
export function buildLeagueWeek(
  picks: readonly WeekPick[],
  rules: LeagueRules,
  totalPointsGame: TotalPointsContext | null
): MemberWeekRecord[] {
  const byUser = new Map<number, WeekPick[]>();
  for (const pick of picks) {
    const list = byUser.get(pick.userId);
    if (list) {
      list.push(pick);
    } else {
      byUser.set(pick.userId, [pick]);
    }
  }

  const userIds = [...byUser.keys()].sort((a, b) => a - b);
  const stats = userIds.map((userId) => ({
    userId,
    stats: computeMemberWeek(byUser.get(userId) ?? [], rules, totalPointsGame)
  }));

  const entries: RankEntry<number>[] = stats.map((s) => ({
    id: s.userId,
    primary: s.stats.points,
    key: weekTiebreakKey(s.stats, rules)
  }));
  const ranks = assignRanks(entries);

  return stats.map((s) => ({
    ...s.stats,
    userId: s.userId,
    rank: ranks.get(s.userId) ?? 0
  }));
}
