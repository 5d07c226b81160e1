// apps/api/src/modules/leagues/leagues.schemas.ts

export type LeagueMemberRole = "owner" | "admin" | "member";

export type League = {
  id: number;
  name: string;
  description: string | null;
  createdByUserId: number;
  isActive: boolean;
  createdAt: string;
};

/**
 * How members with equal points are separated.
 * Stored as an integer in league_rules.tiebreaker.
 */
export const Tiebreaker = {
  None: 0,
  CorrectKeyPicks: 1,
  TotalPointsGuess: 2,
  CorrectPicks: 3
} as const;

export type Tiebreaker = (typeof Tiebreaker)[keyof typeof Tiebreaker];

export const TIEBREAKERS: readonly Tiebreaker[] = [
  Tiebreaker.None,
  Tiebreaker.CorrectKeyPicks,
  Tiebreaker.TotalPointsGuess,
  Tiebreaker.CorrectPicks
];

/**
 * Season-scoped scoring configuration for one league.
 * Treated as an immutable value by the scoring engine.
 */
export type LeagueRules = Readonly<{
  pointsPerCorrectPick: number;
  keyPickExtraPoints: number;
  keyPicksEnabled: boolean;
  /** Max key picks a member may flag per week. */
  numberOfKeyPicks: number;
  /** false = straight-up winner grading */
  againstTheSpreadEnabled: boolean;
  /** Move whole-number spreads half a point away from zero so no pick can push. */
  forceHooks: boolean;
  tiebreaker: Tiebreaker;
  /** Worst weeks excluded from the adjusted season standings. */
  dropWeeks: number;
}>;

export const DEFAULT_LEAGUE_RULES: LeagueRules = {
  pointsPerCorrectPick: 1,
  keyPickExtraPoints: 1,
  keyPicksEnabled: true,
  numberOfKeyPicks: 1,
  againstTheSpreadEnabled: true,
  forceHooks: false,
  tiebreaker: Tiebreaker.None,
  dropWeeks: 0
};

export type CreateLeagueBody = {
  name: string;
  description?: string | null;
  createdByUserId: number;
};

export type SaveLeagueRulesBody = Partial<{
  pointsPerCorrectPick: unknown;
  keyPickExtraPoints: unknown;
  keyPicksEnabled: unknown;
  numberOfKeyPicks: unknown;
  againstTheSpreadEnabled: unknown;
  forceHooks: unknown;
  tiebreaker: unknown;
  dropWeeks: unknown;
}>;
