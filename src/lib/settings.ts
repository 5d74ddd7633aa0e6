import type { UserIdentity } from "@/types/league";
import { settingsSchema } from "./settings-schema";

export interface AppSettings {
  identity: UserIdentity;
  espn: {
    swid?: string;
    s2?: string;
    leagueIds: string[];
  };
  season: string;
  week: number;
  currentWeek?: number;
  refreshIntervalMs: number;
  joinTimeoutMs?: number;
}

/**
 * NFL seasons are named for the year they kick off; January and February
 * still belong to the previous season.
 */
export const defaultSeason = (now: Date = new Date()): string =>
  String(now.getMonth() < 2 ? now.getFullYear() - 1 : now.getFullYear());

/**
 * Reads and validates engine settings from environment variables.
 *
 * Priority: explicit env value → derived default.
 * @throws Error listing every invalid variable
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): AppSettings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const config = parsed.data;
  const currentWeek = config.CURRENT_NFL_WEEK;

  return {
    identity: {
      espnSwid: config.ESPN_SWID,
      sleeperUser: config.SLEEPER_USER,
    },
    espn: {
      swid: config.ESPN_SWID,
      s2: config.ESPN_S2,
      leagueIds: config.ESPN_LEAGUE_IDS,
    },
    season: config.SEASON_YEAR || defaultSeason(now),
    week: config.FANTASY_WEEK ?? currentWeek ?? 1,
    currentWeek,
    refreshIntervalMs: config.REFRESH_INTERVAL_MS,
    joinTimeoutMs: config.JOIN_TIMEOUT_MS,
  };
}
