import { describe, it, expect } from "vitest";
import { DEFAULT_LEAGUE_RULES, Tiebreaker } from "../../src/modules/leagues/leagues.schemas";
import {
  adjustedTotals,
  dropTiebreakValue,
  seasonTiebreakKey,
  weekTiebreakKey
} from "../../src/modules/scoring/scoring.tiebreak";

const week = { points: 6, correct: 5, correctKey: 1, tiebreakAbsDiff: 4 };
const totals = { picksMade: 30, correct: 20, incorrect: 8, ties: 2, correctKey: 3, points: 23 };

function rulesWith(tiebreaker: Tiebreaker) {
  return { ...DEFAULT_LEAGUE_RULES, tiebreaker };
}

describe("weekTiebreakKey", () => {
  it("falls back to correct picks without a tiebreaker", () => {
    expect(weekTiebreakKey(week, rulesWith(Tiebreaker.None))).toEqual([6, 5]);
  });

  it("compares correct key picks, then points", () => {
    expect(weekTiebreakKey(week, rulesWith(Tiebreaker.CorrectKeyPicks))).toEqual([1, 6]);
  });

  it("prefers the smaller total-points miss", () => {
    expect(weekTiebreakKey(week, rulesWith(Tiebreaker.TotalPointsGuess))).toEqual([-4, 1]);
  });

  it("sorts members without a guess last", () => {
    const noGuess = { ...week, tiebreakAbsDiff: null };
    expect(weekTiebreakKey(noGuess, rulesWith(Tiebreaker.TotalPointsGuess))).toEqual([-Infinity, 1]);
  });

  it("compares correct picks, then points", () => {
    expect(weekTiebreakKey(week, rulesWith(Tiebreaker.CorrectPicks))).toEqual([5, 6]);
  });
});

describe("seasonTiebreakKey", () => {
  it("mirrors the weekly keys over season totals", () => {
    expect(seasonTiebreakKey(totals, rulesWith(Tiebreaker.None))).toEqual([23, 20]);
    expect(seasonTiebreakKey(totals, rulesWith(Tiebreaker.CorrectKeyPicks))).toEqual([3, 23]);
    expect(seasonTiebreakKey(totals, rulesWith(Tiebreaker.CorrectPicks))).toEqual([20, 23]);
  });

  it("uses correct picks for the total-points mode", () => {
    expect(seasonTiebreakKey(totals, rulesWith(Tiebreaker.TotalPointsGuess))).toEqual([20, 23]);
  });
});

describe("dropTiebreakValue", () => {
  it("uses correct key picks only under the key-pick tiebreaker", () => {
    expect(dropTiebreakValue(week, rulesWith(Tiebreaker.CorrectKeyPicks))).toBe(1);
    expect(dropTiebreakValue(week, rulesWith(Tiebreaker.None))).toBe(5);
    expect(dropTiebreakValue(week, rulesWith(Tiebreaker.TotalPointsGuess))).toBe(5);
    expect(dropTiebreakValue(week, rulesWith(Tiebreaker.CorrectPicks))).toBe(5);
  });
});

describe("adjustedTotals", () => {
  it("subtracts the dropped weeks field by field", () => {
    const dropped = { picksMade: 5, correct: 1, incorrect: 4, ties: 0, correctKey: 0, points: 1 };
    expect(adjustedTotals(totals, dropped)).toEqual({
      picksMade: 25,
      correct: 19,
      incorrect: 4,
      ties: 2,
      correctKey: 3,
      points: 22
    });
  });
});
