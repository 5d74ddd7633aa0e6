/**
 * Aggregation Service Tests
 *
 * Providers are replaced by a scripted factory so each league's outcome and
 * timing is controlled by the test.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
    MatchupAggregator,
    NO_LEAGUES_MESSAGE,
    resultPriority,
    type AggregatorSnapshot,
} from './aggregation.service';
import type { ProviderFactory, ProviderOutcome } from './league-provider.service';
import type { MatchupStatus, RosterSnapshot, UnifiedResult } from '@/types/fantasy';
import type { FetchScope, LeagueRef } from '@/types/league';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

const SCOPE: FetchScope = { week: 5, year: '2025' };
const NOW = new Date('2025-10-05T18:00:00Z');

const league = (source: LeagueRef['source'], id: string): LeagueRef => ({
    source,
    id,
    name: `${source} ${id}`,
    teamCount: 10,
});

const team = (id: number): RosterSnapshot => ({
    id: String(id),
    rosterId: id,
    name: `Team ${id}`,
    ownerName: `Owner ${id}`,
    score: 0,
    players: [],
});

const matchupResult = (ref: LeagueRef, status: MatchupStatus, tag = ''): UnifiedResult => {
    const matchup = {
        id: `${ref.id}_5_1${tag}`,
        leagueId: ref.id,
        week: 5,
        year: '2025',
        home: team(1),
        away: team(2),
        status,
        winProbability: 0.5,
    };
    return {
        kind: 'matchup',
        id: `${ref.source}_${ref.id}`,
        league: ref,
        myTeamId: '1',
        week: 5,
        year: '2025',
        lastUpdated: NOW,
        matchup,
        leagueMatchups: [matchup],
        byes: [],
    };
};

const rankingResult = (ref: LeagueRef): UnifiedResult => {
    const entry = {
        team: team(1),
        rank: 1,
        eliminationStatus: 'champion' as const,
        isEliminated: false,
        survivalProbability: 0.5,
        pointsFromSafety: 0,
    };
    return {
        kind: 'ranking',
        id: `${ref.source}_${ref.id}`,
        league: ref,
        myTeamId: '1',
        week: 5,
        year: '2025',
        lastUpdated: NOW,
        ranking: {
            week: 5,
            entries: [entry],
            eliminationCount: 0,
            cutoffScore: 0,
            averageScore: 0,
            highestScore: 0,
            lowestScore: 0,
            graveyard: [],
        },
        myEntry: entry,
    };
};

const ok = (result: UnifiedResult): ProviderOutcome => ({ ok: true, result });
const failed = (message = 'boom'): ProviderOutcome => ({ ok: false, failure: { kind: 'network', message } });

interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
}

const deferred = <T>(): Deferred<T> => {
    let resolve: (value: T) => void = () => {};
    const promise = new Promise<T>((r) => {
        resolve = r;
    });
    return { promise, resolve };
};

type Script = (league: LeagueRef, scope: FetchScope) => Promise<ProviderOutcome>;

const scriptedFactory = (script: Script) => {
    const factory = vi.fn<Parameters<ProviderFactory>, ReturnType<ProviderFactory>>((ref, scope, onProgress) => ({
        fetch: async () => {
            onProgress?.(0.1);
            return script(ref, scope);
        },
    }));
    return factory;
};

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('MatchupAggregator', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    describe('resultPriority', () => {
        it('weights live matchups, rankings and platforms', () => {
            expect(resultPriority(matchupResult(league('sleeper', 'a'), 'live'))).toBe(130);
            expect(resultPriority(matchupResult(league('espn', 'b'), 'live'))).toBe(120);
            expect(resultPriority(rankingResult(league('sleeper', 'c')))).toBe(80);
            expect(resultPriority(matchupResult(league('espn', 'd'), 'complete'))).toBe(20);
        });
    });

    describe('loadAll', () => {
        it('orders results by priority after the load', async () => {
            const leagues = [
                league('espn', 'done'),
                league('sleeper', 'chop'),
                league('espn', 'elive'),
                league('sleeper', 'slive'),
            ];
            const outcomes: Record<string, UnifiedResult> = {
                done: matchupResult(leagues[0], 'complete'),
                chop: rankingResult(leagues[1]),
            };
            const factory = scriptedFactory(async (ref) =>
                ok(outcomes[ref.id] ?? matchupResult(ref, 'live'))
            );
            const aggregator = new MatchupAggregator(factory, SCOPE, { now: () => NOW });

            const results = await aggregator.loadAll(leagues);

            expect(results.map((r) => r.id)).toEqual(['sleeper_slive', 'espn_elive', 'sleeper_chop', 'espn_done']);
            expect(aggregator.isLoading()).toBe(false);
            expect(aggregator.getLastUpdated()).toBe(NOW);
            expect(aggregator.getErrorMessage()).toBeNull();
        });

        it('isolates a failing league', async () => {
            const leagues = [league('espn', 'bad'), league('sleeper', 'good')];
            const factory = scriptedFactory(async (ref) =>
                ref.id === 'bad' ? failed() : ok(matchupResult(ref, 'live'))
            );
            const aggregator = new MatchupAggregator(factory, SCOPE);

            const results = await aggregator.loadAll(leagues);

            expect(results.map((r) => r.id)).toEqual(['sleeper_good']);
            expect(aggregator.getLoadingStates()).toEqual({
                espn_bad: { name: 'espn bad', status: 'failed', progress: 0.1 },
                sleeper_good: { name: 'sleeper good', status: 'completed', progress: 1 },
            });
            expect(aggregator.getProgress()).toEqual({ loaded: 2, total: 2, fraction: 1 });
        });

        it('reports no leagues when nothing loads', async () => {
            const aggregator = new MatchupAggregator(scriptedFactory(async () => failed()), SCOPE);

            await expect(aggregator.loadAll([])).resolves.toEqual([]);
            expect(aggregator.getErrorMessage()).toBe(NO_LEAGUES_MESSAGE);
        });

        it('ignores a second load while one is running', async () => {
            const gate = deferred<ProviderOutcome>();
            const ref = league('sleeper', 's1');
            const factory = scriptedFactory(() => gate.promise);
            const aggregator = new MatchupAggregator(factory, SCOPE);

            const first = aggregator.loadAll([ref]);
            expect(aggregator.isLoading()).toBe(true);
            await expect(aggregator.loadAll([ref, league('espn', 'e1')])).resolves.toEqual([]);
            expect(factory).toHaveBeenCalledTimes(1);

            gate.resolve(ok(matchupResult(ref, 'live')));
            await expect(first).resolves.toHaveLength(1);
        });

        it('shows completions before the load finishes', async () => {
            const slow = deferred<ProviderOutcome>();
            const fastRef = league('espn', 'fast');
            const slowRef = league('sleeper', 'slow');
            const factory = scriptedFactory((ref) =>
                ref.id === 'fast' ? Promise.resolve(ok(matchupResult(ref, 'live'))) : slow.promise
            );
            const aggregator = new MatchupAggregator(factory, SCOPE);
            const snapshots: AggregatorSnapshot[] = [];
            aggregator.subscribe((s) => snapshots.push(s));

            const load = aggregator.loadAll([fastRef, slowRef]);
            await vi.waitFor(() => expect(aggregator.getResults()).toHaveLength(1));
            expect(aggregator.isLoading()).toBe(true);
            expect(aggregator.getProgress()).toEqual({ loaded: 1, total: 2, fraction: 0.5 });

            slow.resolve(ok(matchupResult(slowRef, 'live')));
            await load;
            expect(aggregator.getResults().map((r) => r.id)).toEqual(['sleeper_slow', 'espn_fast']);
            expect(snapshots[snapshots.length - 1].isLoading).toBe(false);
        });

        it('marks stragglers failed after the join timeout', async () => {
            vi.useFakeTimers();
            const hung = deferred<ProviderOutcome>();
            const quickRef = league('espn', 'quick');
            const hungRef = league('sleeper', 'hung');
            const factory = scriptedFactory((ref) =>
                ref.id === 'quick' ? Promise.resolve(ok(matchupResult(ref, 'live'))) : hung.promise
            );
            const aggregator = new MatchupAggregator(factory, SCOPE, { joinTimeoutMs: 5_000 });

            const load = aggregator.loadAll([quickRef, hungRef]);
            await vi.advanceTimersByTimeAsync(5_000);
            const results = await load;

            expect(results.map((r) => r.id)).toEqual(['espn_quick']);
            expect(aggregator.getLoadingStates()['sleeper_hung'].status).toBe('failed');

            // a late result from the abandoned task is ignored
            hung.resolve(ok(matchupResult(hungRef, 'live')));
            await vi.advanceTimersByTimeAsync(0);
            expect(aggregator.getResults().map((r) => r.id)).toEqual(['espn_quick']);
        });

        it('fails a league whose fetch key is taken by another platform', async () => {
            const gate = deferred<ProviderOutcome>();
            const espnRef = league('espn', '123');
            const sleeperRef = league('sleeper', '123');
            const factory = scriptedFactory(() => gate.promise);
            const aggregator = new MatchupAggregator(factory, SCOPE);

            const load = aggregator.loadAll([espnRef, sleeperRef]);
            gate.resolve(ok(matchupResult(espnRef, 'live')));
            const results = await load;

            expect(factory).toHaveBeenCalledTimes(1);
            expect(results.map((r) => r.id)).toEqual(['espn_123']);
            expect(aggregator.getLoadingStates()['espn_123'].status).toBe('completed');
            expect(aggregator.getLoadingStates()['sleeper_123'].status).toBe('failed');
        });

        it('uses the selected week for subsequent loads', async () => {
            const factory = scriptedFactory(async (ref) => ok(matchupResult(ref, 'live')));
            const aggregator = new MatchupAggregator(factory, SCOPE);

            aggregator.selectWeek(19, '2025');
            await aggregator.loadAll([league('sleeper', 's1')]);

            expect(factory.mock.calls[0][1]).toEqual({ week: 19, year: '2025' });
            expect(aggregator.getScope()).toEqual({ week: 19, year: '2025' });
        });
    });

    describe('refreshInBackground', () => {
        it('never toggles the loading flag or loading states', async () => {
            const ref = league('sleeper', 's1');
            const factory = scriptedFactory(async (r) => ok(matchupResult(r, 'live')));
            const aggregator = new MatchupAggregator(factory, SCOPE);
            await aggregator.loadAll([ref]);
            const statesBefore = aggregator.getLoadingStates();

            const snapshots: AggregatorSnapshot[] = [];
            aggregator.subscribe((s) => snapshots.push(s));
            await aggregator.refreshInBackground();

            expect(snapshots).toHaveLength(1);
            expect(snapshots[0].isLoading).toBe(false);
            expect(aggregator.getLoadingStates()).toEqual(statesBefore);
        });

        it('replaces entries with fresh results and keeps old ones on failure', async () => {
            const a = league('sleeper', 'a');
            const b = league('espn', 'b');
            let round = 0;
            const factory = scriptedFactory(async (ref) => {
                if (round === 0) return ok(matchupResult(ref, 'live'));
                return ref.id === 'a' ? ok(matchupResult(ref, 'complete', '_fresh')) : failed();
            });
            const aggregator = new MatchupAggregator(factory, SCOPE);
            const initial = await aggregator.loadAll([a, b]);

            round = 1;
            const refreshed = await aggregator.refreshInBackground(initial);

            expect(refreshed.map((r) => r.id)).toEqual(['espn_b', 'sleeper_a']);
            const fresh = refreshed[1];
            expect(fresh.kind === 'matchup' && fresh.matchup.id).toBe('a_5_1_fresh');
            expect(refreshed[0]).toBe(initial[1]);
        });

        it('dedupes concurrent fetches of the same key', async () => {
            const gate = deferred<ProviderOutcome>();
            const ref = league('sleeper', 's1');
            const factory = scriptedFactory(() => gate.promise);
            const aggregator = new MatchupAggregator(factory, SCOPE);
            const existing = [matchupResult(ref, 'live')];

            const first = aggregator.refreshInBackground(existing);
            const second = aggregator.refreshInBackground(existing);
            gate.resolve(ok(matchupResult(ref, 'live', '_new')));
            await Promise.all([first, second]);

            expect(factory).toHaveBeenCalledTimes(1);
        });

        it('hands its result to a full load that starts while it is in flight', async () => {
            const ref = league('sleeper', 's1');
            const gate = deferred<ProviderOutcome>();
            let round = 0;
            const factory = scriptedFactory((r) =>
                round === 0 ? Promise.resolve(ok(matchupResult(r, 'live'))) : gate.promise
            );
            const aggregator = new MatchupAggregator(factory, SCOPE);
            await aggregator.loadAll([ref]);

            round = 1;
            const refresh = aggregator.refreshInBackground();
            const load = aggregator.loadAll([ref]);
            gate.resolve(ok(matchupResult(ref, 'live', '_new')));
            const [, results] = await Promise.all([refresh, load]);

            expect(factory).toHaveBeenCalledTimes(2);
            expect(results).toHaveLength(1);
            const mine = results[0];
            expect(mine.kind === 'matchup' && mine.matchup.id).toBe('s1_5_1_new');
            expect(aggregator.getLoadingStates()).toEqual({
                sleeper_s1: { name: 'sleeper s1', status: 'completed', progress: 1 },
            });
            expect(aggregator.getErrorMessage()).toBeNull();
        });

        it('publishes nothing once cancelled', async () => {
            const ref = league('sleeper', 's1');
            const gate = deferred<ProviderOutcome>();
            let round = 0;
            const factory = scriptedFactory((r) =>
                round === 0 ? Promise.resolve(ok(matchupResult(r, 'live'))) : gate.promise
            );
            const aggregator = new MatchupAggregator(factory, SCOPE);
            await aggregator.loadAll([ref]);
            const listener = vi.fn();
            aggregator.subscribe(listener);

            round = 1;
            const controller = new AbortController();
            const refresh = aggregator.refreshInBackground(undefined, controller.signal);
            controller.abort();
            gate.resolve(ok(matchupResult(ref, 'live', '_new')));
            await refresh;

            expect(listener).not.toHaveBeenCalled();
            const current = aggregator.getResults()[0];
            expect(current.kind === 'matchup' && current.matchup.id).toBe('s1_5_1');
        });

        it('does nothing without known leagues', async () => {
            const factory = scriptedFactory(async () => failed());
            const aggregator = new MatchupAggregator(factory, SCOPE);

            await expect(aggregator.refreshInBackground()).resolves.toEqual([]);
            expect(factory).not.toHaveBeenCalled();
        });
    });

    describe('auto refresh', () => {
        it('refreshes on each interval only while active', async () => {
            vi.useFakeTimers();
            const ref = league('sleeper', 's1');
            const factory = scriptedFactory(async (r) => ok(matchupResult(r, 'live')));
            const aggregator = new MatchupAggregator(factory, SCOPE, { refreshIntervalMs: 15_000 });
            await aggregator.loadAll([ref]);
            factory.mockClear();

            let active = false;
            aggregator.startAutoRefresh(() => active);
            await vi.advanceTimersByTimeAsync(15_000);
            expect(factory).not.toHaveBeenCalled();

            active = true;
            await vi.advanceTimersByTimeAsync(15_000);
            expect(factory).toHaveBeenCalledTimes(1);

            aggregator.stopAutoRefresh();
            await vi.advanceTimersByTimeAsync(30_000);
            expect(factory).toHaveBeenCalledTimes(1);
        });
    });

    describe('stopping auto refresh', () => {
        it('drops the result of a tick that is still running', async () => {
            vi.useFakeTimers();
            const ref = league('sleeper', 's1');
            const gate = deferred<ProviderOutcome>();
            let round = 0;
            const factory = scriptedFactory((r) =>
                round === 0 ? Promise.resolve(ok(matchupResult(r, 'live'))) : gate.promise
            );
            const aggregator = new MatchupAggregator(factory, SCOPE, { refreshIntervalMs: 15_000 });
            await aggregator.loadAll([ref]);

            round = 1;
            aggregator.startAutoRefresh(() => true);
            await vi.advanceTimersByTimeAsync(15_000);
            expect(factory).toHaveBeenCalledTimes(2);

            const listener = vi.fn();
            aggregator.subscribe(listener);
            aggregator.stopAutoRefresh();
            gate.resolve(ok(matchupResult(ref, 'live', '_new')));

            await vi.waitFor(() =>
                expect(console.log).toHaveBeenCalledWith('[Aggregator] Background refresh cancelled')
            );
            expect(listener).not.toHaveBeenCalled();
        });
    });

    describe('subscribe', () => {
        it('stops notifying after unsubscribe', async () => {
            const listener = vi.fn();
            const aggregator = new MatchupAggregator(scriptedFactory(async () => failed()), SCOPE);

            const unsubscribe = aggregator.subscribe(listener);
            unsubscribe();
            await aggregator.loadAll([]);

            expect(listener).not.toHaveBeenCalled();
        });
    });
});
