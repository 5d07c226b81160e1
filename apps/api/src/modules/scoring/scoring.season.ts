// apps/api/src/modules/scoring/scoring.season.ts
import type { LeagueRules } from "../leagues/leagues.schemas";
import { assignRanks, compareNumbers } from "./scoring.ranking";
import type {
  MemberSeasonRecord,
  MemberSeasonStats,
  RankEntry,
  SeasonTotals,
  SeasonWeekRecord
} from "./scoring.schemas";
import { adjustedTotals, dropTiebreakValue, seasonTiebreakKey } from "./scoring.tiebreak";

export const EMPTY_TOTALS: SeasonTotals = {
  picksMade: 0,
  correct: 0,
  incorrect: 0,
  ties: 0,
  correctKey: 0,
  points: 0
};

function sumTotals(weeks: readonly SeasonWeekRecord[]): SeasonTotals {
  return weeks.reduce<SeasonTotals>(
    (acc, week) => ({
      picksMade: acc.picksMade + week.picksMade,
      correct: acc.correct + week.correct,
      incorrect: acc.incorrect + week.incorrect,
      ties: acc.ties + week.ties,
      correctKey: acc.correctKey + week.correctKey,
      points: acc.points + week.points
    }),
    EMPTY_TOTALS
  );
}

/**
 * The member's worst `dropWeeks` weeks: lowest points first, then fewer
 * correct picks (correct key picks under the key-pick tiebreaker), then the
 * earlier week. Nothing is dropped unless the member has more weeks than the
 * league drops.
 */
export function selectDroppedWeeks(
  weeks: readonly SeasonWeekRecord[],
  rules: LeagueRules
): SeasonWeekRecord[] {
  if (rules.dropWeeks <= 0 || weeks.length <= rules.dropWeeks) return [];

  const sorted = [...weeks].sort(
    (a, b) =>
      compareNumbers(a.points, b.points) ||
      compareNumbers(dropTiebreakValue(a, rules), dropTiebreakValue(b, rules)) ||
      compareNumbers(a.weekNumber, b.weekNumber)
  );
  return sorted.slice(0, rules.dropWeeks);
}

/** Season line for one member from their qualifying weeks. */
export function computeMemberSeason(
  weeks: readonly SeasonWeekRecord[],
  rules: LeagueRules
): MemberSeasonStats {
  const dropped = selectDroppedWeeks(weeks, rules);
  return {
    throughWeek: weeks.reduce((max, w) => Math.max(max, w.weekNumber), 0),
    full: sumTotals(weeks),
    dropped: sumTotals(dropped),
    droppedWeekIds: dropped.map((w) => w.weekId)
  };
}

/**
 * Season rows for every league member (members without a qualifying week
 * get zeros), ranked on full totals and, when weeks are dropped, on the
 * adjusted totals as well.
 */
export function buildLeagueSeason(
  memberIds: readonly number[],
  weekRows: readonly SeasonWeekRecord[],
  qualifyingWeekIds: ReadonlySet<number>,
  rules: LeagueRules
): MemberSeasonRecord[] {
  const members = [...new Set(memberIds)].sort((a, b) => a - b);
  const byUser = new Map<number, SeasonWeekRecord[]>(members.map((id) => [id, []]));

  for (const row of weekRows) {
    if (!qualifyingWeekIds.has(row.weekId)) continue;
    byUser.get(row.userId)?.push(row);
  }

  const stats = members.map((userId) => ({
    userId,
    stats: computeMemberSeason(byUser.get(userId) ?? [], rules)
  }));

  const fullRanks = assignRanks<number>(
    stats.map((s) => ({
      id: s.userId,
      primary: s.stats.full.points,
      key: seasonTiebreakKey(s.stats.full, rules)
    }))
  );

  let adjustedRanks = new Map<number, number>();
  if (rules.dropWeeks > 0) {
    const entries: RankEntry<number>[] = stats.map((s) => {
      const adjusted = adjustedTotals(s.stats.full, s.stats.dropped);
      return { id: s.userId, primary: adjusted.points, key: seasonTiebreakKey(adjusted, rules) };
    });
    adjustedRanks = assignRanks(entries);
  }

  return stats.map((s) => ({
    userId: s.userId,
    throughWeek: s.stats.throughWeek,
    full: s.stats.full,
    dropped: s.stats.dropped,
    rank: fullRanks.get(s.userId) ?? 0,
    rankWithDrops: adjustedRanks.get(s.userId) ?? 0
  }));
}
