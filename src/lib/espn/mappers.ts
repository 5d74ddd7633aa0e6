/**
 * ESPN Data Mappers
 *
 * Utilities for transforming raw ESPN API responses into roster snapshots.
 *
 * @module lib/espn/mappers
 */

import type { RosterPlayer, RosterSnapshot, ScoringRuleSet } from "@/types/fantasy";
import type { RosterOwnership } from "@/types/league";
import { calculateFantasyPoints, sumStarterPoints, sumStarterProjections } from "@/services/scoring.service";
import {
    ESPN_STAT_SOURCE_ACTUAL,
    ESPN_STAT_SOURCE_PROJECTED,
    getLineupSlotName,
    getPositionName,
    getProTeamAbbrev,
    isStarterSlot,
} from "./constants";
import type { EspnLeagueSettings, EspnMember, EspnRosterEntry, EspnTeam } from "./types";

/**
 * Standard team name resolution from ESPN team object.
 * ESPN's `name` field is a legacy field that may be empty;
 * the canonical representation is `location + nickname`.
 */
export const resolveTeamName = (team: { location?: string; nickname?: string; name?: string; id?: number | string }): string =>
    (team.location && team.nickname) ? `${team.location} ${team.nickname}` : (team.name || `Team ${team.id ?? '?'}`);

/** Primary owner SWID: `primaryOwner`, else the first listed owner. */
export const getPrimaryOwnerId = (team: EspnTeam): string | null =>
    team.primaryOwner ?? team.owners?.[0] ?? null;

export function resolveManagerName(team: EspnTeam, members: readonly EspnMember[]): string {
    const ownerId = getPrimaryOwnerId(team);
    const member = ownerId ? members.find(m => m.id === ownerId) : undefined;
    if (!member) return "Unknown";
    return `${member.firstName || ""} ${member.lastName || ""}`.trim() || member.displayName || "Unknown";
}

export function mapEspnOwnership(teams: readonly EspnTeam[]): RosterOwnership[] {
    return teams.map(team => {
        const ownerId = getPrimaryOwnerId(team);
        return {
            rosterId: team.id,
            ownerId,
            coOwnerIds: (team.owners || []).filter(id => id !== ownerId),
        };
    });
}

/**
 * League scoring items keyed by stat id, for players that arrive without `appliedTotal`.
 */
export function mapEspnScoringRules(settings: EspnLeagueSettings | undefined): ScoringRuleSet {
    const rules: Record<string, number> = {};
    for (const item of settings?.scoringSettings?.scoringItems || []) {
        if (typeof item.points === "number") {
            rules[String(item.statId)] = item.points;
        }
    }
    return rules;
}

export function mapEspnRosterPlayer(entry: EspnRosterEntry, week: number, rules: ScoringRuleSet): RosterPlayer {
    const player = entry.playerPoolEntry?.player;
    const stats = player?.stats || [];
    const actual = stats.find(s => s.scoringPeriodId === week && s.statSourceId === ESPN_STAT_SOURCE_ACTUAL);
    const projected = stats.find(s => s.scoringPeriodId === week && s.statSourceId === ESPN_STAT_SOURCE_PROJECTED);

    let points = 0;
    let pointsSource: RosterPlayer["pointsSource"] = "platform";
    if (typeof actual?.appliedTotal === "number") {
        points = actual.appliedTotal;
    } else if (actual?.stats) {
        points = calculateFantasyPoints(actual.stats, rules);
        pointsSource = "computed";
    }

    const fullName = player
        ? player.fullName || `${player.firstName || ""} ${player.lastName || ""}`.trim()
        : "";

    return {
        id: String(entry.playerId),
        espnId: String(entry.playerId),
        name: fullName || undefined,
        position: getPositionName(player?.defaultPositionId),
        nflTeam: getProTeamAbbrev(player?.proTeamId),
        isStarter: isStarterSlot(entry.lineupSlotId),
        lineupSlot: getLineupSlotName(entry.lineupSlotId),
        points,
        projectedPoints: projected?.appliedTotal,
        pointsSource,
    };
}

/**
 * Builds a team's snapshot for a week. Without roster entries the score falls
 * back to the schedule total.
 */
export function mapEspnTeamSnapshot(
    team: EspnTeam,
    members: readonly EspnMember[],
    week: number,
    rules: ScoringRuleSet,
    scheduleTotal?: number
): RosterSnapshot {
    const entries = team.roster?.entries;
    const players = (entries || []).map(entry => mapEspnRosterPlayer(entry, week, rules));
    const overall = team.record?.overall;

    return {
        id: String(team.id),
        rosterId: team.id,
        name: resolveTeamName(team),
        ownerName: resolveManagerName(team, members),
        avatarUrl: team.logo,
        score: entries ? sumStarterPoints(players) : (scheduleTotal ?? 0),
        projectedScore: sumStarterProjections(players),
        record: overall
            ? { wins: overall.wins || 0, losses: overall.losses || 0, ties: overall.ties || 0 }
            : undefined,
        players,
    };
}
