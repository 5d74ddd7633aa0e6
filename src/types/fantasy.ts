/**
 * Core Fantasy Football Domain Models
 *
 * Rosters, matchups, elimination rankings and the unified per-league result
 * handed to the presentation layer.
 */

import type { LeagueRef } from './league';

/** Per-unit point weight by stat key, scoped to one league. */
export type ScoringRuleSet = Readonly<Record<string, number>>;

/** Observed count by stat key for one player in one week. */
export type StatLine = Readonly<Record<string, number>>;

export interface TeamRecord {
    wins: number;
    losses: number;
    ties: number;
}

/**
 * A player on a roster for one week.
 */
export interface RosterPlayer {
    /** Id on the league's own platform */
    id: string;
    sleeperId?: string;
    espnId?: string;
    name?: string;
    position: string;
    /** NFL team code, `UNK` when unknown */
    nflTeam: string;
    isStarter: boolean;
    lineupSlot: string;
    points: number;
    projectedPoints?: number;
    /** Whether `points` came from the platform or from the scoring engine */
    pointsSource: 'platform' | 'computed';
}

/**
 * One team's complete state for a week. Replaced wholesale, never mutated.
 */
export interface RosterSnapshot {
    /** Roster/team id as a string */
    id: string;
    rosterId: number;
    /** Team display name */
    name: string;
    /** Manager display name */
    ownerName: string;
    avatarUrl?: string;
    score: number;
    projectedScore?: number;
    record?: TeamRecord;
    players: readonly RosterPlayer[];
}

export type MatchupStatus = 'upcoming' | 'live' | 'complete';

/**
 * Head-to-head pairing of two rosters. `home.id !== away.id`.
 */
export interface Matchup {
    id: string;
    leagueId: string;
    week: number;
    year: string;
    home: RosterSnapshot;
    away: RosterSnapshot;
    status: MatchupStatus;
    /** Home win chance, linear heuristic in [0.35, 0.65] */
    winProbability: number;
}

export type EliminationStatus = 'champion' | 'safe' | 'warning' | 'danger' | 'critical';

export interface RankingEntry {
    team: RosterSnapshot;
    /** Dense 1..N */
    rank: number;
    eliminationStatus: EliminationStatus;
    isEliminated: boolean;
    survivalProbability: number;
    /** Score margin over the best score inside the elimination zone */
    pointsFromSafety: number;
}

/**
 * Weekly table for an elimination pool ("chopped" league).
 */
export interface Ranking {
    week: number;
    entries: RankingEntry[];
    eliminationCount: number;
    cutoffScore: number;
    averageScore: number;
    highestScore: number;
    lowestScore: number;
    /** Rosters left without players, chopped in an earlier week */
    graveyard: RosterSnapshot[];
}

interface UnifiedResultBase {
    id: string;
    league: LeagueRef;
    myTeamId: string;
    week: number;
    year: string;
    lastUpdated: Date;
}

export interface MatchupResult extends UnifiedResultBase {
    kind: 'matchup';
    /** The user's own matchup */
    matchup: Matchup;
    /** Every paired matchup in the league this week */
    leagueMatchups: Matchup[];
    byes: RosterSnapshot[];
}

export interface RankingResult extends UnifiedResultBase {
    kind: 'ranking';
    ranking: Ranking;
    myEntry: RankingEntry;
}

/**
 * Output of one league's fetch cycle.
 */
export type UnifiedResult = MatchupResult | RankingResult;

export interface PlayerInfo {
    name?: string;
    position?: string;
    nflTeam?: string;
    /** Same player's ESPN id */
    espnId?: string;
}

/**
 * Optional player metadata source (name, position, NFL team) keyed by platform player id.
 */
export interface PlayerDirectory {
    lookup(playerId: string): PlayerInfo | undefined;
    /** Brings the directory up to date; awaited before a fetch cycle maps players */
    refresh?(): Promise<void>;
}
