// apps/api/src/modules/leagues/leagues.service.ts
import { createPickemError } from "../../shared/errors";
import { logger } from "../../shared/logger";
import { assertId, parseEnum, parseInteger } from "../../shared/validation";
import { usersRepo } from "../users/users.repo";
import { leaguesRepo } from "./leagues.repo";
import {
  DEFAULT_LEAGUE_RULES,
  TIEBREAKERS,
  type CreateLeagueBody,
  type League,
  type LeagueMemberRole,
  type LeagueRules,
  type SaveLeagueRulesBody
} from "./leagues.schemas";

const log = logger.child({ module: "leagues" });

function parseBoolean(field: string, raw: unknown, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  if (typeof raw !== "boolean") {
    throw createPickemError("validation", `${field} must be a boolean`, { field, value: raw });
  }
  return raw;
}

function parseCount(field: string, raw: unknown, fallback: number): number {
  if (raw === undefined) return fallback;
  return parseInteger(field, raw, { min: 0 });
}

function assertLeagueExists(leagueId: number): League {
  const league = leaguesRepo.findById(leagueId);
  if (!league) {
    throw createPickemError("not_found", "League not found", { leagueId });
  }
  return league;
}

export const leaguesService = {
  createLeague(body: CreateLeagueBody): League {
    const name = body.name.trim();
    if (!name) {
      throw createPickemError("validation", "League name is required");
    }
    const creatorId = assertId("createdByUserId", body.createdByUserId);
    if (!usersRepo.findById(creatorId)) {
      throw createPickemError("not_found", "User not found", { userId: creatorId });
    }
    // Names are unique regardless of case
    if (leaguesRepo.findByName(name)) {
      throw createPickemError("conflict", "A league with this name already exists", { name });
    }

    const league = leaguesRepo.createLeague({
      name,
      description: body.description?.trim() || null,
      createdByUserId: creatorId
    });
    leaguesRepo.upsertMember(league.id, creatorId, "owner");

    log.info({ leagueId: league.id }, "league created");
    return league;
  },

  addMember(leagueIdParam: number, userIdParam: number, role: LeagueMemberRole = "member"): void {
    const leagueId = assertId("leagueId", leagueIdParam);
    const userId = assertId("userId", userIdParam);
    assertLeagueExists(leagueId);
    if (!usersRepo.findById(userId)) {
      throw createPickemError("not_found", "User not found", { userId });
    }
    leaguesRepo.upsertMember(leagueId, userId, role);
  },

  getLeagueRules(leagueId: number, seasonId: number): LeagueRules | null {
    return leaguesRepo.getRules(leagueId, seasonId);
  },

  /**
   * Patch-style save: fields absent from the body keep their stored value
   * (or the default when the league has no rules for this season yet).
   */
  saveLeagueRules(leagueIdParam: number, seasonIdParam: number, body: SaveLeagueRulesBody): LeagueRules {
    const leagueId = assertId("leagueId", leagueIdParam);
    const seasonId = assertId("seasonId", seasonIdParam);
    assertLeagueExists(leagueId);

    const base = leaguesRepo.getRules(leagueId, seasonId) ?? DEFAULT_LEAGUE_RULES;

    const tiebreaker =
      body.tiebreaker === undefined
        ? base.tiebreaker
        : parseEnum(body.tiebreaker, TIEBREAKERS);
    if (tiebreaker === undefined) {
      throw createPickemError("validation", "Unknown tiebreaker", { value: body.tiebreaker });
    }

    const rules: LeagueRules = {
      pointsPerCorrectPick: parseCount("pointsPerCorrectPick", body.pointsPerCorrectPick, base.pointsPerCorrectPick),
      keyPickExtraPoints: parseCount("keyPickExtraPoints", body.keyPickExtraPoints, base.keyPickExtraPoints),
      keyPicksEnabled: parseBoolean("keyPicksEnabled", body.keyPicksEnabled, base.keyPicksEnabled),
      numberOfKeyPicks: parseCount("numberOfKeyPicks", body.numberOfKeyPicks, base.numberOfKeyPicks),
      againstTheSpreadEnabled: parseBoolean(
        "againstTheSpreadEnabled",
        body.againstTheSpreadEnabled,
        base.againstTheSpreadEnabled
      ),
      forceHooks: parseBoolean("forceHooks", body.forceHooks, base.forceHooks),
      tiebreaker,
      dropWeeks: parseCount("dropWeeks", body.dropWeeks, base.dropWeeks)
    };

    leaguesRepo.upsertRules(leagueId, seasonId, rules);
    return rules;
  }
};
