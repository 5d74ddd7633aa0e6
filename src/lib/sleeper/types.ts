/**
 * Sleeper API payloads (https://api.sleeper.app/v1).
 *
 * Sleeper reports missing collections as `null` rather than omitting them.
 */

import { z } from 'zod';

export const SleeperUserSchema = z.object({
    user_id: z.string(),
    username: z.string().nullish(),
    display_name: z.string().nullish(),
    avatar: z.string().nullish(),
    metadata: z
        .object({
            team_name: z.string().nullish(),
        })
        .nullish(),
});

export const SleeperLeagueSchema = z.object({
    league_id: z.string(),
    name: z.string(),
    season: z.string(),
    status: z.string().nullish(),
    total_rosters: z.number(),
    roster_positions: z.array(z.string()).nullish(),
    scoring_settings: z.record(z.unknown()).nullish(),
    settings: z
        .object({
            playoff_week_start: z.number().nullish(),
        })
        .nullish(),
});

export const SleeperRosterSchema = z.object({
    roster_id: z.number(),
    owner_id: z.string().nullish(),
    co_owners: z.array(z.string()).nullish(),
    players: z.array(z.string()).nullish(),
    starters: z.array(z.string()).nullish(),
    settings: z
        .object({
            wins: z.number().nullish(),
            losses: z.number().nullish(),
            ties: z.number().nullish(),
        })
        .nullish(),
});

export const SleeperMatchupSchema = z.object({
    roster_id: z.number(),
    matchup_id: z.number().nullish(),
    points: z.number().nullish(),
    players: z.array(z.string()).nullish(),
    starters: z.array(z.string()).nullish(),
});

export const SleeperPlayerSchema = z.object({
    full_name: z.string().nullish(),
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
    position: z.string().nullish(),
    team: z.string().nullish(),
    espn_id: z.union([z.string(), z.number()]).nullish(),
});

/** player id -> player, the full NFL player pool */
export const SleeperPlayersSchema = z.record(SleeperPlayerSchema);

/** player id -> stat key -> value */
export const SleeperWeekStatsSchema = z.record(z.record(z.unknown()));

export type SleeperUser = z.infer<typeof SleeperUserSchema>;
export type SleeperLeague = z.infer<typeof SleeperLeagueSchema>;
export type SleeperRoster = z.infer<typeof SleeperRosterSchema>;
export type SleeperMatchup = z.infer<typeof SleeperMatchupSchema>;
export type SleeperWeekStats = z.infer<typeof SleeperWeekStatsSchema>;
export type SleeperPlayer = z.infer<typeof SleeperPlayerSchema>;
export type SleeperPlayers = z.infer<typeof SleeperPlayersSchema>;
