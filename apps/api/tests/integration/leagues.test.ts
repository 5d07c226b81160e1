import { describe, it, expect, beforeEach } from "vitest";
import { PickemError } from "../../src/shared/errors";
import { leaguesRepo } from "../../src/modules/leagues/leagues.repo";
import { leaguesService } from "../../src/modules/leagues/leagues.service";
import { DEFAULT_LEAGUE_RULES, Tiebreaker } from "../../src/modules/leagues/leagues.schemas";
import { usersRepo } from "../../src/modules/users/users.repo";
import { captureError } from "../helpers/errors";
import { resetDatabase, seedSeason } from "../helpers/fixtures";

describe("leaguesService", () => {
  let ownerId: number;
  let seasonId: number;

  beforeEach(() => {
    resetDatabase();
    ownerId = usersRepo.createUser("alice", "Alice").id;
    seasonId = seedSeason(1, 2).season.id;
  });

  describe("createLeague", () => {
    it("creates the league with its creator as owner", () => {
      const league = leaguesService.createLeague({
        name: "  Saturday Pool ",
        description: "Big Ten only",
        createdByUserId: ownerId
      });

      expect(league.name).toBe("Saturday Pool");
      expect(league.description).toBe("Big Ten only");
      expect(league.isActive).toBe(true);
      expect(leaguesRepo.getMemberRole(league.id, ownerId)).toBe("owner");
    });

    it("rejects a name that differs only in case", () => {
      leaguesService.createLeague({ name: "Saturday Pool", createdByUserId: ownerId });
      const err = captureError(() =>
        leaguesService.createLeague({ name: "saturday pool", createdByUserId: ownerId })
      );
      expect(err).toBeInstanceOf(PickemError);
      expect(err).toMatchObject({ code: "conflict" });
    });

    it("requires a name and an existing creator", () => {
      expect(
        captureError(() => leaguesService.createLeague({ name: "   ", createdByUserId: ownerId }))
      ).toMatchObject({ code: "validation" });
      expect(
        captureError(() => leaguesService.createLeague({ name: "Pool", createdByUserId: ownerId + 100 }))
      ).toMatchObject({ code: "not_found" });
    });
  });

  describe("addMember", () => {
    it("adds a regular member", () => {
      const league = leaguesService.createLeague({ name: "Pool", createdByUserId: ownerId });
      const bob = usersRepo.createUser("bob");
      leaguesService.addMember(league.id, bob.id);

      expect(leaguesRepo.getMemberRole(league.id, bob.id)).toBe("member");
      expect(leaguesRepo.listMemberIds(league.id)).toEqual([ownerId, bob.id]);
    });
  });

  describe("saveLeagueRules", () => {
    let leagueId: number;

    beforeEach(() => {
      leagueId = leaguesService.createLeague({ name: "Pool", createdByUserId: ownerId }).id;
    });

    it("has no rules until they are saved", () => {
      expect(leaguesService.getLeagueRules(leagueId, seasonId)).toBeNull();
    });

    it("saves defaults for an empty body", () => {
      expect(leaguesService.saveLeagueRules(leagueId, seasonId, {})).toEqual(DEFAULT_LEAGUE_RULES);
      expect(leaguesService.getLeagueRules(leagueId, seasonId)).toEqual(DEFAULT_LEAGUE_RULES);
    });

    it("patches only the fields given", () => {
      leaguesService.saveLeagueRules(leagueId, seasonId, { dropWeeks: 2, forceHooks: true });
      const rules = leaguesService.saveLeagueRules(leagueId, seasonId, {
        tiebreaker: Tiebreaker.TotalPointsGuess
      });

      expect(rules).toEqual({
        ...DEFAULT_LEAGUE_RULES,
        dropWeeks: 2,
        forceHooks: true,
        tiebreaker: Tiebreaker.TotalPointsGuess
      });
      expect(leaguesService.getLeagueRules(leagueId, seasonId)).toEqual(rules);
    });

    it("rejects negative counts, unknown tiebreakers and non-boolean flags", () => {
      expect(
        captureError(() => leaguesService.saveLeagueRules(leagueId, seasonId, { dropWeeks: -1 }))
      ).toMatchObject({ code: "validation" });
      expect(
        captureError(() => leaguesService.saveLeagueRules(leagueId, seasonId, { numberOfKeyPicks: 1.5 }))
      ).toMatchObject({ code: "validation" });
      expect(
        captureError(() => leaguesService.saveLeagueRules(leagueId, seasonId, { tiebreaker: 5 }))
      ).toMatchObject({ code: "validation" });
      expect(
        captureError(() => leaguesService.saveLeagueRules(leagueId, seasonId, { forceHooks: "yes" }))
      ).toMatchObject({ code: "validation" });
      expect(leaguesService.getLeagueRules(leagueId, seasonId)).toBeNull();
    });

    it("rejects an unknown league", () => {
      expect(captureError(() => leaguesService.saveLeagueRules(leagueId + 50, seasonId, {}))).toMatchObject({
        code: "not_found"
      });
    });
  });
});
