// apps/api/src/modules/scoring/scoring.ranking.ts
import type { RankEntry, TiebreakKey } from "./scoring.schemas";

/** Ascending order that stays defined for -Infinity (no subtraction). */
export function compareNumbers(a: number, b: number): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareDesc(a: number, b: number): number {
  return compareNumbers(b, a);
}

export function compareRankEntries<Id>(a: RankEntry<Id>, b: RankEntry<Id>): number {
  return (
    compareDesc(a.primary, b.primary) ||
    compareDesc(a.key[0], b.key[0]) ||
    compareDesc(a.key[1], b.key[1])
  );
}

function sameKey(a: TiebreakKey, b: TiebreakKey): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Competition ranking: equal (primary, key) entries share a rank and the
 * next distinct entry takes its 1-based position, so a three-way tie for
 * 2nd is followed by 5th.
 */
export function assignRanks<Id>(entries: readonly RankEntry<Id>[]): Map<Id, number> {
  const ranks = new Map<Id, number>();
  const sorted = [...entries].sort(compareRankEntries);

  let currentRank = 1;
  let previous: RankEntry<Id> | null = null;

  sorted.forEach((entry, index) => {
    if (previous && (entry.primary !== previous.primary || !sameKey(entry.key, previous.key))) {
      currentRank = index + 1;
    }
    ranks.set(entry.id, currentRank);
    previous = entry;
  });

  return ranks;
}
