// apps/api/src/modules/picks/picks.schemas.ts

export type Pick = {
  id: number;
  leagueId: number;
  gameId: number;
  userId: number;
  pickedTeamId: number;
  isKeyPick: boolean;
  /** null = ungraded or push; see isPush */
  isCorrect: boolean | null;
  /** Graded as a push; never graded again unless explicitly reset. */
  isPush: boolean;
  pointsGuess: number | null;
  createdAt: string;
  updatedAt: string;
};

/**
 * A pick joined with the week/tiebreak context the weekly aggregate needs.
 */
export type WeekPick = {
  pickId: number;
  userId: number;
  gameId: number;
  isKeyPick: boolean;
  isCorrect: boolean | null;
  isPush: boolean;
  pointsGuess: number | null;
};

export type SubmitPickBody = {
  leagueId: number;
  gameId: number;
  userId: number;
  pickedTeamId: number;
  isKeyPick?: boolean;
  /** Only accepted on the week's total-points game. */
  pointsGuess?: number | null;
};
