/**
 * Sleeper public REST client.
 *
 * No authentication. The weekly stat feed is shared by every league, so it is
 * cached briefly per season/week and concurrent callers share one request.
 */

import { z } from 'zod';
import { fetchJson } from '@/lib/http/fetch-json';
import type { RetryOptions } from '@/utils/retry';
import {
    SleeperLeagueSchema,
    SleeperMatchupSchema,
    SleeperPlayersSchema,
    SleeperRosterSchema,
    SleeperUserSchema,
    SleeperWeekStatsSchema,
    type SleeperLeague,
    type SleeperMatchup,
    type SleeperPlayers,
    type SleeperRoster,
    type SleeperUser,
    type SleeperWeekStats,
} from './types';

export const SLEEPER_API_BASE = 'https://api.sleeper.app/v1';
export const SLEEPER_AVATAR_BASE = 'https://sleepercdn.com/avatars';

/** Weeks past the regular season are read from the postseason feed. */
export const NFL_REGULAR_SEASON_WEEKS = 18;

export interface SleeperClientOptions {
    retry?: RetryOptions;
    /** Lifetime of a cached weekly stat feed, default 10s */
    statsTtlMs?: number;
}

interface CachedStats {
    ts: number;
    data: Promise<SleeperWeekStats>;
}

export class SleeperClient {
    private readonly retry?: RetryOptions;
    private readonly statsTtlMs: number;
    private readonly weekStatsCache = new Map<string, CachedStats>();

    constructor(options: SleeperClientOptions = {}) {
        this.retry = options.retry;
        this.statsTtlMs = options.statsTtlMs ?? 10_000;
    }

    private get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        const url = `${SLEEPER_API_BASE}${path}`;
        console.log(`[SleeperClient] GET ${url}`);
        return fetchJson('Sleeper', url, schema, { retry: this.retry });
    }

    /** Looks a user up by username or id; `null` when Sleeper has no such user. */
    getUser(usernameOrId: string): Promise<SleeperUser | null> {
        return this.get(`/user/${encodeURIComponent(usernameOrId)}`, SleeperUserSchema.nullable());
    }

    getLeague(leagueId: string): Promise<SleeperLeague> {
        return this.get(`/league/${leagueId}`, SleeperLeagueSchema);
    }

    getRosters(leagueId: string): Promise<SleeperRoster[]> {
        return this.get(`/league/${leagueId}/rosters`, z.array(SleeperRosterSchema));
    }

    getUsers(leagueId: string): Promise<SleeperUser[]> {
        return this.get(`/league/${leagueId}/users`, z.array(SleeperUserSchema));
    }

    /** Matchup entries for a week; an empty array when the league has none. */
    async getMatchups(leagueId: string, week: number): Promise<SleeperMatchup[]> {
        const matchups = await this.get(`/league/${leagueId}/matchups/${week}`, z.array(SleeperMatchupSchema).nullable());
        return matchups ?? [];
    }

    getUserLeagues(userId: string, season: string): Promise<SleeperLeague[]> {
        return this.get(`/user/${userId}/leagues/nfl/${season}`, z.array(SleeperLeagueSchema));
    }

    /** Every NFL player Sleeper knows, keyed by Sleeper player id. A large payload. */
    getPlayers(): Promise<SleeperPlayers> {
        return this.get('/players/nfl', SleeperPlayersSchema);
    }

    /**
     * Raw NFL stat lines for a week, keyed by player id.
     * Weeks 19+ map onto postseason rounds 1+.
     */
    getWeekStats(season: string, week: number): Promise<SleeperWeekStats> {
        const key = `${season}-${week}`;
        const now = Date.now();
        const cached = this.weekStatsCache.get(key);
        if (cached && now - cached.ts < this.statsTtlMs) return cached.data;

        const path = week > NFL_REGULAR_SEASON_WEEKS
            ? `/stats/nfl/post/${season}/${week - NFL_REGULAR_SEASON_WEEKS}`
            : `/stats/nfl/regular/${season}/${week}`;

        const data = this.get(path, SleeperWeekStatsSchema.nullable()).then(stats => stats ?? {});
        this.weekStatsCache.set(key, { ts: now, data });
        void data.catch(() => {
            if (this.weekStatsCache.get(key)?.data === data) {
                this.weekStatsCache.delete(key);
            }
        });
        return data;
    }
}

export const buildSleeperAvatarUrl = (avatar: string | null | undefined): string | undefined =>
    avatar ? `${SLEEPER_AVATAR_BASE}/${avatar}` : undefined;
