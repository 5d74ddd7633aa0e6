/**
 * League identity and loading-state types shared by the aggregation engine.
 */

/**
 * Upstream fantasy platform.
 * - `espn`: private, cookie-authenticated league API
 * - `sleeper`: public REST API
 */
export type Platform = 'espn' | 'sleeper';

/**
 * Immutable identity of a connected league, produced by a LeagueDirectory.
 */
export interface LeagueRef {
    readonly source: Platform;
    /** External league id on the owning platform */
    readonly id: string;
    readonly name: string;
    readonly teamCount: number;
    readonly season?: string;
    /** First fantasy-playoff week, when the directory knows it */
    readonly playoffWeekStart?: number;
}

/**
 * Credentials-free identity of the authenticated user on each platform.
 */
export interface UserIdentity {
    /** ESPN SWID cookie value, e.g. `{ABCD-...}` */
    readonly espnSwid?: string;
    /** Sleeper username or numeric user id */
    readonly sleeperUser?: string;
}

/**
 * Source of the user's leagues. Consumed by the engine, implemented outside it.
 */
export interface LeagueDirectory {
    listLeagues(identity: UserIdentity, season: string): Promise<LeagueRef[]>;
}

export type LoadingStatus = 'pending' | 'loading' | 'completed' | 'failed';

export interface LeagueLoadingState {
    name: string;
    status: LoadingStatus;
    /** 0..1 */
    progress: number;
}

/** Week/season pair a fetch cycle runs against. */
export interface FetchScope {
    week: number;
    year: string;
}

/** Dedupe key for one (league, week, year) fetch. */
export const buildFetchKey = (league: Pick<LeagueRef, 'id'>, scope: FetchScope): string =>
    `${league.id}_${scope.week}_${scope.year}`;

/**
 * Ownership of one roster as reported by the platform.
 */
export interface RosterOwnership {
    rosterId: number;
    /** Primary owner's platform user id, null for an orphaned roster */
    ownerId: string | null;
    coOwnerIds: readonly string[];
}

/** Stable per-league key, shared by results and loading states. */
export const buildLeagueKey = (league: Pick<LeagueRef, 'source' | 'id'>): string =>
    `${league.source}_${league.id}`;
