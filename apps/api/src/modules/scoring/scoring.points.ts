// apps/api/src/modules/scoring/scoring.points.ts
import type { LeagueRules } from "../leagues/leagues.schemas";
import type { PickGrade } from "./scoring.schemas";

export function calculatePickPoints(
  pick: { isKeyPick: boolean },
  grade: PickGrade,
  rules: LeagueRules
): number {
  if (grade !== "correct") return 0;

  let points = rules.pointsPerCorrectPick;
  if (pick.isKeyPick && rules.keyPicksEnabled) {
    points += rules.keyPickExtraPoints;
  }
  return points;
}
