// apps/api/src/modules/scoring/scoring.tiebreak.ts
import { Tiebreaker, type LeagueRules } from "../leagues/leagues.schemas";
import type { MemberWeekStats, SeasonTotals, TiebreakKey } from "./scoring.schemas";

type WeekKeyStats = Pick<MemberWeekStats, "points" | "correct" | "correctKey" | "tiebreakAbsDiff">;

/**
 * Values compared (after points) when ranking one league week.
 * For the total-points guess a smaller miss is better, so the difference is
 * negated; members without a guess sort below everyone who made one.
 */
export function weekTiebreakKey(stats: WeekKeyStats, rules: LeagueRules): TiebreakKey {
  switch (rules.tiebreaker) {
    case Tiebreaker.CorrectKeyPicks:
      return [stats.correctKey, stats.points];
    case Tiebreaker.TotalPointsGuess:
      return [
        stats.tiebreakAbsDiff === null ? -Infinity : -stats.tiebreakAbsDiff,
        stats.correctKey
      ];
    case Tiebreaker.CorrectPicks:
      return [stats.correct, stats.points];
    case Tiebreaker.None:
    default:
      return [stats.points, stats.correct];
  }
}

/**
 * Season keys mirror the weekly ones. A season has no single guess, so the
 * total-points mode ranks on correct picks like the default.
 */
export function seasonTiebreakKey(totals: SeasonTotals, rules: LeagueRules): TiebreakKey {
  switch (rules.tiebreaker) {
    case Tiebreaker.CorrectKeyPicks:
      return [totals.correctKey, totals.points];
    case Tiebreaker.TotalPointsGuess:
    case Tiebreaker.CorrectPicks:
      return [totals.correct, totals.points];
    case Tiebreaker.None:
    default:
      return [totals.points, totals.correct];
  }
}

/**
 * Secondary value when choosing a member's worst weeks: correct key picks
 * for the key-pick tiebreaker, correct picks otherwise.
 */
export function dropTiebreakValue(
  week: Pick<MemberWeekStats, "correct" | "correctKey">,
  rules: LeagueRules
): number {
  return rules.tiebreaker === Tiebreaker.CorrectKeyPicks ? week.correctKey : week.correct;
}

export function adjustedTotals(full: SeasonTotals, dropped: SeasonTotals): SeasonTotals {
  return {
    picksMade: full.picksMade - dropped.picksMade,
    correct: full.correct - dropped.correct,
    incorrect: full.incorrect - dropped.incorrect,
    ties: full.ties - dropped.ties,
    correctKey: full.correctKey - dropped.correctKey,
    points: full.points - dropped.points
  };
}
