/**
 * Matchup Assembler Service
 *
 * Turns scored roster snapshots into head-to-head matchups, or into a flat
 * survival ranking for elimination ("chopped") leagues. Pure and synchronous.
 *
 * @module services/matchup-assembler
 */

import type {
    EliminationStatus,
    Matchup,
    MatchupStatus,
    Ranking,
    RankingEntry,
    RosterSnapshot,
} from '@/types/fantasy';

/** One team's entry in the week's pairing list. */
export interface PairingEntry {
    /** Platform pairing key; entries sharing a key play each other */
    key: string | number | null | undefined;
    team: RosterSnapshot;
}

export interface AssemblyContext {
    leagueId: string;
    week: number;
    year: string;
    /** Status for a pairing key, `live` when omitted */
    statusOf?: (key: string | number) => MatchupStatus;
}

export interface AssembledWeek {
    matchups: Matchup[];
    byes: RosterSnapshot[];
}

const clamp = (value: number, min: number, max: number): number =>
    Math.min(max, Math.max(min, value));

/**
 * Home win chance from the current score gap: 0.5 ± 0.15 at most.
 */
export function calculateWinProbability(homeScore: number, awayScore: number): number {
    return 0.5 + clamp((homeScore - awayScore) / 100, -0.5, 0.5) * 0.3;
}

/**
 * Status from where the week sits relative to the NFL's current week.
 * A decided platform result always reads as complete.
 */
export function resolveMatchupStatus(week: number, currentWeek?: number, decided = false): MatchupStatus {
    if (decided) return 'complete';
    if (currentWeek === undefined) return 'live';
    if (week < currentWeek) return 'complete';
    if (week > currentWeek) return 'upcoming';
    return 'live';
}

/**
 * Groups entries by pairing key. A pair becomes a Matchup with the first
 * reported entry at home; single entries and keyless entries are byes.
 */
export function assembleMatchups(entries: readonly PairingEntry[], context: AssemblyContext): AssembledWeek {
    const groups = new Map<string | number, RosterSnapshot[]>();
    const byes: RosterSnapshot[] = [];

    for (const entry of entries) {
        if (entry.key === null || entry.key === undefined) {
            byes.push(entry.team);
            continue;
        }
        const group = groups.get(entry.key);
        if (group) {
            group.push(entry.team);
        } else {
            groups.set(entry.key, [entry.team]);
        }
    }

    const matchups: Matchup[] = [];
    for (const [key, teams] of groups) {
        if (teams.length === 1) {
            byes.push(teams[0]);
            continue;
        }

        const [home, away] = teams;
        if (teams.length > 2 || home.id === away.id) {
            console.warn(`[Matchup Assembler] Dropping malformed pairing ${key} in league ${context.leagueId} (${teams.length} entries)`);
            continue;
        }

        matchups.push({
            id: `${context.leagueId}_${context.week}_${key}`,
            leagueId: context.leagueId,
            week: context.week,
            year: context.year,
            home,
            away,
            status: context.statusOf?.(key) ?? 'live',
            winProbability: calculateWinProbability(home.score, away.score),
        });
    }

    matchups.sort((a, b) => a.home.ownerName.localeCompare(b.home.ownerName));

    return { matchups, byes };
}

/**
 * Rosters chopped at the end of a week: two in leagues of 20 or more, else one.
 * At least one roster always survives.
 */
export function eliminationCutoff(teamCount: number): number {
    if (teamCount <= 1) return 0;
    return Math.min(teamCount >= 20 ? 2 : 1, teamCount - 1);
}

function resolveEliminationStatus(rank: number, teamCount: number, cutoff: number): EliminationStatus {
    if (rank === 1) return 'champion';
    if (rank > teamCount - cutoff) return 'critical';
    if (rank > Math.floor((3 * teamCount) / 4)) return 'danger';
    if (rank > Math.floor(teamCount / 2)) return 'warning';
    return 'safe';
}

export interface RankingOptions {
    week: number;
    graveyard?: RosterSnapshot[];
}

/**
 * Ranks every live roster by score, highest first. Ties keep report order.
 */
export function buildRanking(teams: readonly RosterSnapshot[], options: RankingOptions): Ranking {
    // Array.prototype.sort is stable
    const ordered = [...teams].sort((a, b) => b.score - a.score);
    const teamCount = ordered.length;
    const cutoff = eliminationCutoff(teamCount);
    const cutoffScore = cutoff > 0 ? ordered[teamCount - cutoff].score : 0;

    const entries: RankingEntry[] = ordered.map((team, index) => {
        const rank = index + 1;
        const eliminationStatus = resolveEliminationStatus(rank, teamCount, cutoff);
        const isEliminated = rank > teamCount - cutoff;

        return {
            team,
            rank,
            eliminationStatus,
            isEliminated,
            survivalProbability: isEliminated ? 0 : (teamCount - rank) / teamCount,
            pointsFromSafety: team.score - cutoffScore,
        };
    });

    const scores = ordered.map(team => team.score);
    const total = scores.reduce((sum, score) => sum + score, 0);

    return {
        week: options.week,
        entries,
        eliminationCount: cutoff,
        cutoffScore,
        averageScore: teamCount > 0 ? total / teamCount : 0,
        highestScore: teamCount > 0 ? Math.max(...scores) : 0,
        lowestScore: teamCount > 0 ? Math.min(...scores) : 0,
        graveyard: options.graveyard ?? [],
    };
}
