/**
 * Team Identity Service
 *
 * Works out which roster in a league belongs to the authenticated user.
 * Matching is by platform user id only, never by team or display name.
 *
 * @module services/team-identity
 */

import type { LeagueRef, RosterOwnership, UserIdentity } from '@/types/league';

export type IdentityResolution =
    | { ok: true; rosterId: number; userId: string; strategy: string }
    | { ok: false; reason: string };

export interface TeamIdentityDeps {
    /** Sleeper username to user id, `null` when no such user exists */
    lookupSleeperUserId: (username: string) => Promise<string | null>;
}

type MatchStrategy = {
    name: string;
    match: (userId: string, owners: readonly RosterOwnership[]) => RosterOwnership | undefined;
};

// Tried in order; the first hit wins.
const STRATEGIES: readonly MatchStrategy[] = [
    {
        name: 'primary-owner',
        match: (userId, owners) => owners.find(o => o.ownerId === userId),
    },
    {
        name: 'co-owner',
        match: (userId, owners) => owners.find(o => o.coOwnerIds.includes(userId)),
    },
];

const NUMERIC_ID = /^\d+$/;

export class TeamIdentityResolver {
    constructor(private readonly deps: TeamIdentityDeps) {}

    /**
     * Platform user id for the league's source, or null when the identity has none.
     */
    async resolveUserId(league: LeagueRef, identity: UserIdentity): Promise<string | null> {
        if (league.source === 'espn') {
            return identity.espnSwid?.trim() || null;
        }

        const sleeperUser = identity.sleeperUser?.trim();
        if (!sleeperUser) return null;
        if (NUMERIC_ID.test(sleeperUser)) return sleeperUser;
        return this.deps.lookupSleeperUserId(sleeperUser);
    }

    async resolve(
        league: LeagueRef,
        identity: UserIdentity,
        owners: readonly RosterOwnership[]
    ): Promise<IdentityResolution> {
        const userId = await this.resolveUserId(league, identity);
        if (!userId) {
            return { ok: false, reason: `No ${league.source} user id for league ${league.name}` };
        }

        for (const strategy of STRATEGIES) {
            const owner = strategy.match(userId, owners);
            if (owner) {
                return { ok: true, rosterId: owner.rosterId, userId, strategy: strategy.name };
            }
        }

        return { ok: false, reason: `User ${userId} owns no roster in league ${league.name}` };
    }
}
