import type { EspnClient } from "@/lib/espn/client";
import type { SleeperClient } from "@/lib/sleeper/client";
import type { LeagueDirectory, LeagueRef, UserIdentity } from "@/types/league";

export interface ConfiguredLeagueDirectoryDeps {
  espnLeagueIds: readonly string[];
  espn: (leagueId: string, season: string) => Pick<EspnClient, "getLeagueSettings">;
  sleeper: Pick<SleeperClient, "getUser" | "getUserLeagues">;
}

/**
 * League listing for a single configured user: ESPN leagues by id from
 * configuration, Sleeper leagues discovered from the user's account.
 * A platform that cannot be reached contributes no leagues.
 */
export class ConfiguredLeagueDirectory implements LeagueDirectory {
  constructor(private readonly deps: ConfiguredLeagueDirectoryDeps) {}

  async listLeagues(identity: UserIdentity, season: string): Promise<LeagueRef[]> {
    const [espn, sleeper] = await Promise.all([
      this.listEspnLeagues(season),
      this.listSleeperLeagues(identity, season),
    ]);
    return [...espn, ...sleeper];
  }

  private async listEspnLeagues(season: string): Promise<LeagueRef[]> {
    const settled = await Promise.allSettled(
      this.deps.espnLeagueIds.map(async (leagueId): Promise<LeagueRef> => {
        const data = await this.deps.espn(leagueId, season).getLeagueSettings();
        return {
          source: "espn",
          id: leagueId,
          name: data.settings?.name || `ESPN League ${leagueId}`,
          teamCount: data.teams?.length ?? data.settings?.size ?? 0,
          season,
        };
      })
    );

    const leagues: LeagueRef[] = [];
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") {
        leagues.push(result.value);
      } else {
        console.warn(`[League Directory] ESPN league ${this.deps.espnLeagueIds[index]} unavailable:`, result.reason);
      }
    });
    return leagues;
  }

  private async listSleeperLeagues(identity: UserIdentity, season: string): Promise<LeagueRef[]> {
    const sleeperUser = identity.sleeperUser?.trim();
    if (!sleeperUser) return [];

    try {
      const userId = /^\d+$/.test(sleeperUser)
        ? sleeperUser
        : (await this.deps.sleeper.getUser(sleeperUser))?.user_id;
      if (!userId) {
        console.warn(`[League Directory] Sleeper user ${sleeperUser} not found`);
        return [];
      }

      const leagues = await this.deps.sleeper.getUserLeagues(userId, season);
      return leagues.map((league) => ({
        source: "sleeper",
        id: league.league_id,
        name: league.name,
        teamCount: league.total_rosters,
        season: league.season,
        playoffWeekStart: league.settings?.playoff_week_start ?? undefined,
      }));
    } catch (error) {
      console.warn(`[League Directory] Sleeper leagues for ${sleeperUser} unavailable:`, error);
      return [];
    }
  }
}
