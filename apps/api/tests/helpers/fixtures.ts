// apps/api/tests/helpers/fixtures.ts
import { dbFile } from "../../src/db/index";
import { gamesRepo } from "../../src/modules/games/games.repo";
import type { Game, Season, Team, Week } from "../../src/modules/games/games.schemas";
import { leaguesService } from "../../src/modules/leagues/leagues.service";
import type { League, SaveLeagueRulesBody } from "../../src/modules/leagues/leagues.schemas";
import { picksRepo } from "../../src/modules/picks/picks.repo";
import type { Pick } from "../../src/modules/picks/picks.schemas";
import { usersRepo, type UserRow } from "../../src/modules/users/users.repo";

const TABLES = [
  "member_seasons",
  "member_weeks",
  "picks",
  "league_games",
  "league_rules",
  "league_memberships",
  "leagues",
  "games",
  "teams",
  "weeks",
  "seasons",
  "users"
];

export function resetDatabase(): void {
  dbFile.exec(TABLES.map((table) => `DELETE FROM ${table};`).join("\n"));
}

export const FUTURE_KICKOFF = "2030-09-07T19:30:00.000Z";
export const BEFORE_KICKOFF = new Date("2030-09-06T12:00:00.000Z");
export const AFTER_KICKOFF = new Date("2030-09-07T20:00:00.000Z");

export type SeasonFixture = {
  season: Season;
  weeks: Week[];
  teams: Team[];
};

/** A season with numbered weeks and a pool of teams. */
export function seedSeason(weekCount = 3, teamCount = 4): SeasonFixture {
  const season = gamesRepo.createSeason({ year: 2030, name: "2030 Season", isActive: true });
  const weeks: Week[] = [];
  for (let number = 1; number <= weekCount; number++) {
    weeks.push(gamesRepo.createWeek(season.id, number));
  }
  const teams: Team[] = [];
  for (let i = 1; i <= teamCount; i++) {
    teams.push(gamesRepo.createTeam(season.id, `Team ${i}`, `T${i}`));
  }
  return { season, weeks, teams };
}

export type LeagueFixture = {
  league: League;
  owner: UserRow;
  members: UserRow[];
};

/**
 * League whose owner is the first member. Rules are saved for the season
 * unless `rules` is null.
 */
export function seedLeague(
  seasonId: number,
  options: { name?: string; memberNames?: string[]; rules?: SaveLeagueRulesBody | null } = {}
): LeagueFixture {
  const [ownerName = "alice", ...others] = options.memberNames ?? ["alice", "bob", "carol"];
  const owner = usersRepo.createUser(ownerName);
  const league = leaguesService.createLeague({
    name: options.name ?? "Saturday Pool",
    createdByUserId: owner.id
  });

  const members = [owner];
  for (const name of others) {
    const user = usersRepo.createUser(name);
    leaguesService.addMember(league.id, user.id);
    members.push(user);
  }

  if (options.rules !== null) {
    leaguesService.saveLeagueRules(league.id, seasonId, options.rules ?? {});
  }

  return { league, owner, members };
}

export function addGame(
  fixture: SeasonFixture,
  weekIndex: number,
  homeIndex: number,
  awayIndex: number,
  currentHomeSpread: number | null = null
): Game {
  return gamesRepo.createGame({
    seasonId: fixture.season.id,
    weekId: fixture.weeks[weekIndex].id,
    homeTeamId: fixture.teams[homeIndex].id,
    awayTeamId: fixture.teams[awayIndex].id,
    kickoff: FUTURE_KICKOFF,
    currentHomeSpread
  });
}

/** Put a game in the league's pool with a locked spread. */
export function selectGame(
  leagueId: number,
  gameId: number,
  lockedHomeSpread: number | null,
  isTotalPointsGame = false
): void {
  gamesRepo.upsertLeagueGame(leagueId, gameId, isTotalPointsGame);
  if (lockedHomeSpread !== null) {
    gamesRepo.setLockedSpread(leagueId, gameId, lockedHomeSpread, "2030-09-04T12:00:00.000Z");
  }
}

/** Store a pick directly, skipping the kickoff and membership checks. */
export function placePick(
  leagueId: number,
  game: Game,
  userId: number,
  side: "home" | "away",
  options: { isKeyPick?: boolean; pointsGuess?: number | null } = {}
): Pick {
  return picksRepo.upsertPick({
    leagueId,
    gameId: game.id,
    userId,
    pickedTeamId: side === "home" ? game.homeTeamId : game.awayTeamId,
    isKeyPick: options.isKeyPick ?? false,
    pointsGuess: options.pointsGuess ?? null
  });
}

/** Mark a game final without running the scoring hook. */
export function setFinal(gameId: number, homeScore: number | null, awayScore: number | null): void {
  gamesRepo.updateResult(gameId, { homeScore, awayScore, isFinal: true });
}

type Row = Record<string, unknown>;

export function dumpDerivedRows(): { memberWeeks: Row[]; memberSeasons: Row[] } {
  return {
    memberWeeks: dbFile
      .prepare<[], Row>("SELECT * FROM member_weeks ORDER BY league_id, week_id, user_id")
      .all(),
    memberSeasons: dbFile
      .prepare<[], Row>("SELECT * FROM member_seasons ORDER BY league_id, season_id, user_id")
      .all()
  };
}
