/**
 * League Provider Service
 *
 * Runs one league's fetch cycle for a single week: settings, identity, week
 * data, scoring and assembly. Produces exactly one outcome and never throws.
 *
 * @module services/league-provider
 */

import type { EspnClient } from '@/lib/espn/client';
import {
    mapEspnOwnership,
    mapEspnScoringRules,
    mapEspnTeamSnapshot,
} from '@/lib/espn/mappers';
import type { EspnLeagueResponse, EspnMatchup, EspnTeam } from '@/lib/espn/types';
import { ProviderError, classifyFailure, type FailureKind } from '@/lib/http/errors';
import type { SleeperClient } from '@/lib/sleeper/client';
import {
    isEmptyRoster,
    mapSleeperOwnership,
    mapSleeperSnapshot,
    type SleeperScoringContext,
} from '@/lib/sleeper/mappers';
import type { SleeperMatchup } from '@/lib/sleeper/types';
import type { Matchup, PlayerDirectory, RosterSnapshot, UnifiedResult } from '@/types/fantasy';
import { buildLeagueKey, type FetchScope, type LeagueRef, type RosterOwnership, type UserIdentity } from '@/types/league';
import { toScoringRuleSet } from './scoring.service';
import {
    assembleMatchups,
    buildRanking,
    resolveMatchupStatus,
    type PairingEntry,
} from './matchup-assembler.service';
import type { TeamIdentityResolver } from './team-identity.service';

export interface ProviderFailure {
    kind: FailureKind;
    message: string;
}

export type ProviderOutcome =
    | { ok: true; result: UnifiedResult }
    | { ok: false; failure: ProviderFailure };

export type EspnLeagueApi = Pick<EspnClient, 'getLeagueSettings' | 'getMatchups'>;
export type SleeperLeagueApi = Pick<SleeperClient, 'getLeague' | 'getRosters' | 'getUsers' | 'getMatchups' | 'getWeekStats'>;

export interface LeagueProviderDeps {
    identity: UserIdentity;
    resolver: Pick<TeamIdentityResolver, 'resolve'>;
    /** ESPN clients are bound to one league and season */
    espn: (league: LeagueRef, year: string) => EspnLeagueApi;
    sleeper: SleeperLeagueApi;
    players?: PlayerDirectory;
    /** The NFL's current week, for matchup status */
    currentWeek?: number;
    onProgress?: (fraction: number) => void;
    now?: () => Date;
}

const DECIDED_WINNERS = new Set(['HOME', 'AWAY', 'TIE']);

export class LeagueMatchupProvider {
    constructor(
        private readonly league: LeagueRef,
        private readonly week: number,
        private readonly year: string,
        private readonly deps: LeagueProviderDeps
    ) {}

    async fetch(): Promise<ProviderOutcome> {
        try {
            this.progress(0.1);
            const result = this.league.source === 'espn'
                ? await this.fetchEspn()
                : await this.fetchSleeper();
            this.progress(1);
            return { ok: true, result };
        } catch (error: unknown) {
            const failure: ProviderFailure = {
                kind: classifyFailure(error),
                message: error instanceof Error ? error.message : String(error),
            };
            console.warn(`[LeagueProvider] ${this.league.name} (${this.league.source}:${this.league.id}) failed [${failure.kind}]: ${failure.message}`);
            return { ok: false, failure };
        }
    }

    private progress(fraction: number): void {
        this.deps.onProgress?.(fraction);
    }

    private resultBase(myTeamId: string) {
        return {
            id: buildLeagueKey(this.league),
            league: this.league,
            myTeamId,
            week: this.week,
            year: this.year,
            lastUpdated: this.deps.now?.() ?? new Date(),
        };
    }

    private async resolveRosterId(owners: RosterOwnership[]): Promise<number> {
        const resolution = await this.deps.resolver.resolve(this.league, this.deps.identity, owners);
        if (!resolution.ok) {
            throw new ProviderError('identity', resolution.reason);
        }
        return resolution.rosterId;
    }

    private selectMyMatchup(matchups: Matchup[], rosterId: number): Matchup {
        if (matchups.length === 0) {
            throw new ProviderError('empty', `No matchups in week ${this.week}`);
        }
        const mine = matchups.find(m => m.home.rosterId === rosterId || m.away.rosterId === rosterId);
        if (!mine) {
            throw new ProviderError('empty', `Roster ${rosterId} has no matchup in week ${this.week}`);
        }
        return mine;
    }

    // ─── ESPN ────────────────────────────────────────────────────────────────

    private async fetchEspn(): Promise<UnifiedResult> {
        const client = this.deps.espn(this.league, this.year);

        const settings = await client.getLeagueSettings();
        const rules = mapEspnScoringRules(settings.settings);
        this.progress(0.3);

        const rosterId = await this.resolveRosterId(mapEspnOwnership(settings.teams ?? []));
        this.progress(0.6);

        const weekData = await client.getMatchups(this.week);
        this.progress(0.8);

        const schedule = (weekData.schedule ?? []).filter(m => m.matchupPeriodId === this.week);
        const entries = this.buildEspnEntries(schedule, settings, weekData, rules);
        const winners = new Map(schedule.map(m => [m.id, m.winner]));

        const { matchups, byes } = assembleMatchups(entries, {
            leagueId: this.league.id,
            week: this.week,
            year: this.year,
            statusOf: key => resolveMatchupStatus(
                this.week,
                this.deps.currentWeek,
                DECIDED_WINNERS.has(winners.get(Number(key)) ?? '')
            ),
        });

        const matchup = this.selectMyMatchup(matchups, rosterId);
        return { ...this.resultBase(String(rosterId)), kind: 'matchup', matchup, leagueMatchups: matchups, byes };
    }

    private buildEspnEntries(
        schedule: EspnMatchup[],
        settings: EspnLeagueResponse,
        weekData: EspnLeagueResponse,
        rules: ReturnType<typeof mapEspnScoringRules>
    ): PairingEntry[] {
        const teamsById = new Map<number, EspnTeam>();
        for (const team of settings.teams ?? []) teamsById.set(team.id, team);
        // Week-scoped rosters carry that week's stats
        for (const team of weekData.teams ?? []) {
            const base = teamsById.get(team.id);
            teamsById.set(team.id, base ? { ...base, ...team, owners: team.owners ?? base.owners } : team);
        }
        const members = settings.members ?? weekData.members ?? [];

        const entries: PairingEntry[] = [];
        for (const game of schedule) {
            for (const side of [game.home, game.away]) {
                if (!side) continue;
                const team = teamsById.get(side.teamId);
                if (!team) {
                    console.warn(`[LeagueProvider] ${this.league.name}: schedule references unknown team ${side.teamId}`);
                    continue;
                }
                entries.push({
                    key: game.id,
                    team: mapEspnTeamSnapshot(team, members, this.week, rules, side.totalPoints),
                });
            }
        }
        return entries;
    }

    // ─── Sleeper ─────────────────────────────────────────────────────────────

    private async fetchSleeper(): Promise<UnifiedResult> {
        const { sleeper } = this.deps;

        const [league, rosters, users] = await Promise.all([
            sleeper.getLeague(this.league.id),
            sleeper.getRosters(this.league.id),
            sleeper.getUsers(this.league.id),
        ]);
        const rules = toScoringRuleSet(league.scoring_settings);
        this.progress(0.3);

        const rosterId = await this.resolveRosterId(mapSleeperOwnership(rosters));
        this.progress(0.6);

        const [weekMatchups, stats] = await Promise.all([
            sleeper.getMatchups(this.league.id, this.week),
            sleeper.getWeekStats(this.year, this.week),
            this.deps.players?.refresh?.(),
        ]);
        this.progress(0.8);

        const context: SleeperScoringContext = {
            stats,
            rules,
            rosterPositions: league.roster_positions ?? [],
            players: this.deps.players,
        };
        const entryByRoster = new Map(weekMatchups.map(m => [m.roster_id, m]));
        const snapshotOf = (rosterIndex: number): RosterSnapshot => {
            const roster = rosters[rosterIndex];
            return mapSleeperSnapshot(roster, entryByRoster.get(roster.roster_id), users, context);
        };

        if (countPairings(weekMatchups) === 0) {
            const playoffWeekStart = league.settings?.playoff_week_start ?? this.league.playoffWeekStart ?? 0;
            const pastPlayoffStart = playoffWeekStart > 0 && this.week >= playoffWeekStart;
            if (rosters.length < 2 || pastPlayoffStart) {
                throw new ProviderError('empty', `No pairings in week ${this.week}`);
            }
            const alive: RosterSnapshot[] = [];
            const graveyard: RosterSnapshot[] = [];
            rosters.forEach((roster, index) => {
                (isEmptyRoster(roster) ? graveyard : alive).push(snapshotOf(index));
            });
            return this.buildEliminationResult(alive, graveyard, rosterId);
        }

        const rosterIndexById = new Map(rosters.map((r, i) => [r.roster_id, i]));
        const entries: PairingEntry[] = [];
        for (const entry of weekMatchups) {
            const index = rosterIndexById.get(entry.roster_id);
            if (index === undefined) continue;
            entries.push({ key: entry.matchup_id, team: snapshotOf(index) });
        }

        const { matchups, byes } = assembleMatchups(entries, {
            leagueId: this.league.id,
            week: this.week,
            year: this.year,
            statusOf: () => resolveMatchupStatus(this.week, this.deps.currentWeek),
        });

        const matchup = this.selectMyMatchup(matchups, rosterId);
        return { ...this.resultBase(String(rosterId)), kind: 'matchup', matchup, leagueMatchups: matchups, byes };
    }

    private buildEliminationResult(
        alive: RosterSnapshot[],
        graveyard: RosterSnapshot[],
        rosterId: number
    ): UnifiedResult {
        const ranking = buildRanking(alive, { week: this.week, graveyard });
        const myEntry = ranking.entries.find(e => e.team.rosterId === rosterId);
        if (!myEntry) {
            throw new ProviderError('empty', `Roster ${rosterId} was already eliminated`);
        }

        return { ...this.resultBase(String(rosterId)), kind: 'ranking', ranking, myEntry };
    }
}

export type ProviderFactory = (
    league: LeagueRef,
    scope: FetchScope,
    onProgress?: (fraction: number) => void
) => Pick<LeagueMatchupProvider, 'fetch'>;

/** Binds shared collaborators; each call yields a fresh single-use provider. */
export const createProviderFactory = (deps: Omit<LeagueProviderDeps, 'onProgress'>): ProviderFactory =>
    (league, scope, onProgress) => new LeagueMatchupProvider(league, scope.week, scope.year, { ...deps, onProgress });

/** Number of matchup ids shared by at least two entries. */
function countPairings(matchups: readonly SleeperMatchup[]): number {
    const sizes = new Map<number, number>();
    for (const m of matchups) {
        if (m.matchup_id === null || m.matchup_id === undefined) continue;
        sizes.set(m.matchup_id, (sizes.get(m.matchup_id) ?? 0) + 1);
    }
    return [...sizes.values()].filter(size => size >= 2).length;
}
