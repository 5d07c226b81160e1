// apps/api/src/modules/scoring/scoring.grading.ts
import type { GradeInput, PickGrade } from "./scoring.schemas";

/**
 * Put a spread on the hook: whole numbers move half a point away from zero
 * (-3 -> -3.5, 7 -> 7.5), values already on the hook stay, and a pick'em
 * line (0) is left alone.
 */
export function applyHook(spread: number): number {
  if (spread === 0) return 0;
  const hooked = Math.floor(Math.abs(spread)) + 0.5;
  return spread > 0 ? hooked : -hooked;
}

/**
 * Grade one pick against a finished game.
 *
 * Spreads are from the home team's perspective (negative = home favored).
 * The home side covers when `home - away > -spread`; landing exactly on the
 * number is a push. With forced hooks only a 0 spread can still push.
 * Straight-up leagues grade the winner and push on a tied score.
 */
export function gradePick(input: GradeInput): PickGrade {
  const { game, pickedTeamId, rules } = input;

  if (!game.isFinal || game.homeScore === null || game.awayScore === null) {
    return "not_graded";
  }

  const pickedHome = pickedTeamId === game.homeTeamId;
  if (!pickedHome && pickedTeamId !== game.awayTeamId) {
    return "not_graded";
  }

  const margin = game.homeScore - game.awayScore;

  if (rules.againstTheSpreadEnabled) {
    if (input.lockedHomeSpread === null) return "not_graded";

    const spread = rules.forceHooks ? applyHook(input.lockedHomeSpread) : input.lockedHomeSpread;
    if (margin === -spread) return "push";

    const homeCovered = margin > -spread;
    return pickedHome === homeCovered ? "correct" : "incorrect";
  }

  if (margin === 0) return "push";
  const homeWon = margin > 0;
  return pickedHome === homeWon ? "correct" : "incorrect";
}

/** Read a stored pick back into a grade. */
export function storedGrade(isCorrect: boolean | null, isPush: boolean): PickGrade {
  if (isPush) return "push";
  if (isCorrect === null) return "not_graded";
  return isCorrect ? "correct" : "incorrect";
}
