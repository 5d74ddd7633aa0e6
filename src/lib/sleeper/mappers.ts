/**
 * Sleeper Data Mappers
 *
 * Sleeper ships raw stat lines only, so every player's points are computed
 * here from the shared weekly feed and the league's scoring settings.
 *
 * @module lib/sleeper/mappers
 */

import type { PlayerDirectory, RosterPlayer, RosterSnapshot, ScoringRuleSet } from '@/types/fantasy';
import type { RosterOwnership } from '@/types/league';
import { calculateFantasyPoints, sumStarterPoints, toStatLine } from '@/services/scoring.service';
import { buildSleeperAvatarUrl } from './client';
import type { SleeperMatchup, SleeperRoster, SleeperUser, SleeperWeekStats } from './types';

/** Placeholder Sleeper puts in an unfilled starter slot */
const EMPTY_SLOT = '0';

export interface SleeperScoringContext {
    stats: SleeperWeekStats;
    rules: ScoringRuleSet;
    /** League `roster_positions`, starter slots first */
    rosterPositions: readonly string[];
    players?: PlayerDirectory;
}

export function mapSleeperOwnership(rosters: readonly SleeperRoster[]): RosterOwnership[] {
    return rosters.map(roster => ({
        rosterId: roster.roster_id,
        ownerId: roster.owner_id ?? null,
        coOwnerIds: roster.co_owners ?? [],
    }));
}

export const resolveSleeperManagerName = (user: SleeperUser | undefined): string =>
    user?.display_name || user?.username || 'Unknown';

export const resolveSleeperTeamName = (user: SleeperUser | undefined, rosterId: number): string =>
    user?.metadata?.team_name || user?.display_name || `Team ${rosterId}`;

function mapPlayer(
    playerId: string,
    isStarter: boolean,
    lineupSlot: string,
    context: SleeperScoringContext
): RosterPlayer {
    const info = context.players?.lookup(playerId);
    const statLine = toStatLine(context.stats[playerId]);

    return {
        id: playerId,
        sleeperId: playerId,
        espnId: info?.espnId,
        name: info?.name,
        position: info?.position || 'UNK',
        nflTeam: info?.nflTeam || 'UNK',
        isStarter,
        lineupSlot,
        points: calculateFantasyPoints(statLine, context.rules),
        pointsSource: 'computed',
    };
}

/**
 * Starters in lineup order, then the bench. Empty starter slots are skipped.
 */
export function mapSleeperPlayers(
    lineup: { players?: string[] | null; starters?: string[] | null },
    context: SleeperScoringContext
): RosterPlayer[] {
    const starters = lineup.starters ?? [];
    const starterIds = new Set(starters);
    const result: RosterPlayer[] = [];

    starters.forEach((playerId, index) => {
        if (playerId === EMPTY_SLOT) return;
        result.push(mapPlayer(playerId, true, context.rosterPositions[index] ?? 'FLEX', context));
    });

    for (const playerId of lineup.players ?? []) {
        if (starterIds.has(playerId)) continue;
        result.push(mapPlayer(playerId, false, 'BN', context));
    }

    return result;
}

/**
 * Snapshot for one roster. The week's matchup entry, when present, carries the
 * lineup that counts; otherwise the roster listing does.
 */
export function mapSleeperSnapshot(
    roster: SleeperRoster,
    entry: SleeperMatchup | undefined,
    users: readonly SleeperUser[],
    context: SleeperScoringContext
): RosterSnapshot {
    const owner = users.find(u => u.user_id === roster.owner_id);
    const players = mapSleeperPlayers(entry ?? roster, context);
    const settings = roster.settings;

    return {
        id: String(roster.roster_id),
        rosterId: roster.roster_id,
        name: resolveSleeperTeamName(owner, roster.roster_id),
        ownerName: resolveSleeperManagerName(owner),
        avatarUrl: buildSleeperAvatarUrl(owner?.avatar),
        score: sumStarterPoints(players),
        record: settings
            ? { wins: settings.wins ?? 0, losses: settings.losses ?? 0, ties: settings.ties ?? 0 }
            : undefined,
        players,
    };
}

/** A roster that fields nobody, i.e. already eliminated. */
export const isEmptyRoster = (roster: SleeperRoster): boolean =>
    (roster.players ?? []).length === 0;
