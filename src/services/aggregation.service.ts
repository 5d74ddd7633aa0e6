/**
 * Aggregation Service
 *
 * Fans one provider task out per connected league, collects results as they
 * complete, and keeps a single priority-ordered list for the presentation
 * layer. Supports a silent background refresh and a periodic refresh loop.
 *
 * @module services/aggregation
 */

import { FetchKeyGuard } from '@/lib/concurrency/fetch-key-guard';
import { RefreshTicker } from '@/lib/time/refresh-ticker';
import type { UnifiedResult } from '@/types/fantasy';
import {
    buildFetchKey,
    buildLeagueKey,
    type FetchScope,
    type LeagueLoadingState,
    type LeagueRef,
} from '@/types/league';
import type { ProviderFactory, ProviderOutcome } from './league-provider.service';

export const NO_LEAGUES_MESSAGE = 'No leagues found. Connect an ESPN or Sleeper league to see your matchups.';
export const DEFAULT_REFRESH_INTERVAL_MS = 15_000;

export interface AggregatorOptions {
    /** Upper bound on a full load; leagues still running are marked failed */
    joinTimeoutMs?: number;
    refreshIntervalMs?: number;
    now?: () => Date;
}

export interface LoadProgress {
    loaded: number;
    total: number;
    /** loaded / total, 0 when there is nothing to load */
    fraction: number;
}

export interface AggregatorSnapshot {
    results: readonly UnifiedResult[];
    loadingStates: Readonly<Record<string, LeagueLoadingState>>;
    progress: LoadProgress;
    isLoading: boolean;
    errorMessage: string | null;
    lastUpdated: Date | null;
}

export type AggregatorListener = (snapshot: AggregatorSnapshot) => void;

/**
 * Sort weight: live head-to-head first, then elimination pools, Sleeper ahead of ESPN.
 */
export function resultPriority(result: UnifiedResult): number {
    let priority = result.league.source === 'sleeper' ? 30 : 20;
    if (result.kind === 'ranking') priority += 50;
    if (result.kind === 'matchup' && result.matchup.status === 'live') priority += 100;
    return priority;
}

/** Highest priority first; equal priorities keep their current order. */
export const sortByPriority = (results: readonly UnifiedResult[]): UnifiedResult[] =>
    [...results].sort((a, b) => resultPriority(b) - resultPriority(a));

export class MatchupAggregator {
    private scope: FetchScope;
    private leagues: LeagueRef[] = [];
    private results: UnifiedResult[] = [];
    private loadingStates = new Map<string, LeagueLoadingState>();
    private loaded = 0;
    private total = 0;
    private loading = false;
    private errorMessage: string | null = null;
    private lastUpdated: Date | null = null;
    // Bumped per full load; results from an older load are ignored
    private sessionId = 0;
    private readonly guard = new FetchKeyGuard<ProviderOutcome>();
    private readonly listeners = new Set<AggregatorListener>();
    private ticker: RefreshTicker | null = null;

    constructor(
        private readonly createProvider: ProviderFactory,
        scope: FetchScope,
        private readonly options: AggregatorOptions = {}
    ) {
        this.scope = { ...scope };
    }

    // ─── Queries ─────────────────────────────────────────────────────────────

    getScope(): FetchScope {
        return { ...this.scope };
    }

    getResults(): UnifiedResult[] {
        return [...this.results];
    }

    getLoadingStates(): Record<string, LeagueLoadingState> {
        const states: Record<string, LeagueLoadingState> = {};
        for (const [key, state] of this.loadingStates) {
            states[key] = { ...state };
        }
        return states;
    }

    getProgress(): LoadProgress {
        return {
            loaded: this.loaded,
            total: this.total,
            fraction: this.total > 0 ? this.loaded / this.total : 0,
        };
    }

    isLoading(): boolean {
        return this.loading;
    }

    getErrorMessage(): string | null {
        return this.errorMessage;
    }

    getLastUpdated(): Date | null {
        return this.lastUpdated;
    }

    subscribe(listener: AggregatorListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Changes the week/season used by subsequent loads and refreshes. */
    selectWeek(week: number, year: string): void {
        this.scope = { week, year };
    }

    // ─── Full load ───────────────────────────────────────────────────────────

    /**
     * Loads every league from scratch. Ignored while another full load runs.
     */
    async loadAll(leagues: readonly LeagueRef[]): Promise<UnifiedResult[]> {
        if (this.loading) {
            console.log('[Aggregator] Load already in progress, ignoring request');
            return this.getResults();
        }

        const session = ++this.sessionId;
        const scope = { ...this.scope };
        this.loading = true;
        this.leagues = [...leagues];
        this.results = [];
        this.errorMessage = null;
        this.loaded = 0;
        this.total = leagues.length;
        this.loadingStates = new Map<string, LeagueLoadingState>(
            leagues.map(league => [buildLeagueKey(league), { name: league.name, status: 'pending', progress: 0 }])
        );
        this.emit();

        console.log(`[Aggregator] Loading ${leagues.length} league(s) for week ${scope.week}, ${scope.year}`);
        await this.join(leagues.map(league => this.runLoadTask(league, scope, session)));

        for (const [key, state] of this.loadingStates) {
            if (state.status === 'pending' || state.status === 'loading') {
                console.warn(`[Aggregator] ${state.name} did not finish in time`);
                this.loadingStates.set(key, { ...state, status: 'failed' });
            }
        }

        this.results = sortByPriority(this.results);
        this.loading = false;
        this.lastUpdated = this.now();
        if (this.results.length === 0) {
            this.errorMessage = NO_LEAGUES_MESSAGE;
        }
        this.emit();
        return this.getResults();
    }

    private async join(tasks: Promise<void>[]): Promise<void> {
        const settled = Promise.allSettled(tasks).then(() => undefined);
        const timeoutMs = this.options.joinTimeoutMs;
        if (timeoutMs === undefined) return settled;

        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeout = new Promise<void>(resolve => {
            timer = setTimeout(resolve, timeoutMs);
        });
        try {
            await Promise.race([settled, timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    private async runLoadTask(league: LeagueRef, scope: FetchScope, session: number): Promise<void> {
        const key = buildLeagueKey(league);
        const isCurrent = () => session === this.sessionId && this.loading;

        this.setLoadingState(key, { status: 'loading', progress: 0 });
        const outcome = await this.fetchOnce(league, scope, fraction => {
            if (isCurrent()) this.setLoadingState(key, { progress: fraction });
        });
        if (!isCurrent()) return;

        this.loaded += 1;
        // A shared in-flight fetch may belong to another platform's league with the same id
        if (outcome.ok && outcome.result.id === key) {
            this.results = sortByPriority([...this.results, outcome.result]);
            this.setLoadingState(key, { status: 'completed', progress: 1 });
        } else {
            this.setLoadingState(key, { status: 'failed' });
        }
        this.emit();
    }

    // ─── Background refresh ──────────────────────────────────────────────────

    /**
     * Re-fetches without touching loading flags or progress. A league keeps
     * its previous entry unless a fresh result arrives; the list is published once.
     * Nothing is published once `signal` has been aborted.
     */
    async refreshInBackground(existing?: readonly UnifiedResult[], signal?: AbortSignal): Promise<UnifiedResult[]> {
        const targets = uniqueLeagues(existing ? existing.map(r => r.league) : this.leagues);
        if (targets.length === 0) return this.getResults();

        const session = this.sessionId;
        const scope = { ...this.scope };
        const outcomes = await Promise.all(targets.map(league => this.fetchOnce(league, scope)));

        if (signal?.aborted) {
            console.log('[Aggregator] Background refresh cancelled');
            return this.getResults();
        }
        if (session !== this.sessionId || this.loading) {
            console.log('[Aggregator] Discarding background refresh superseded by a full load');
            return this.getResults();
        }

        const fresh = new Map<string, UnifiedResult>();
        for (const outcome of outcomes) {
            if (outcome.ok) fresh.set(outcome.result.id, outcome.result);
        }

        const merged = this.results.map(result => fresh.get(result.id) ?? result);
        const present = new Set(merged.map(result => result.id));
        for (const previous of existing ?? []) {
            if (!present.has(previous.id)) {
                merged.push(fresh.get(previous.id) ?? previous);
                present.add(previous.id);
            }
        }
        for (const [id, result] of fresh) {
            if (!present.has(id)) merged.push(result);
        }

        console.log(`[Aggregator] Background refresh: ${fresh.size}/${targets.length} league(s) updated`);
        this.results = sortByPriority(merged);
        this.lastUpdated = this.now();
        if (this.results.length > 0) this.errorMessage = null;
        this.emit();
        return this.getResults();
    }

    // ─── Periodic refresh ────────────────────────────────────────────────────

    /**
     * Refreshes in the background every interval while `isActive()` holds and
     * no full load is running.
     */
    startAutoRefresh(isActive: () => boolean): void {
        this.stopAutoRefresh();
        const intervalMs = this.options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
        this.ticker = new RefreshTicker(intervalMs, async (signal) => {
            if (!isActive() || this.loading) return;
            await this.refreshInBackground(undefined, signal);
        });
        this.ticker.start();
    }

    stopAutoRefresh(): void {
        this.ticker?.stop();
        this.ticker = null;
    }

    // ─── Internals ───────────────────────────────────────────────────────────

    /**
     * One guarded provider run. Joins the running fetch when the key is already in flight.
     */
    private async fetchOnce(
        league: LeagueRef,
        scope: FetchScope,
        onProgress?: (fraction: number) => void
    ): Promise<ProviderOutcome> {
        try {
            return await this.guard.run(buildFetchKey(league, scope), () =>
                this.createProvider(league, scope, onProgress).fetch()
            );
        } catch (error: unknown) {
            console.error(`[Aggregator] Provider for ${league.name} threw:`, error);
            return {
                ok: false,
                failure: { kind: 'network', message: error instanceof Error ? error.message : String(error) },
            };
        }
    }

    private setLoadingState(key: string, patch: Partial<LeagueLoadingState>): void {
        const current = this.loadingStates.get(key);
        if (!current) return;
        this.loadingStates.set(key, { ...current, ...patch });
        this.emit();
    }

    private now(): Date {
        return this.options.now?.() ?? new Date();
    }

    private emit(): void {
        if (this.listeners.size === 0) return;
        const snapshot: AggregatorSnapshot = {
            results: this.getResults(),
            loadingStates: this.getLoadingStates(),
            progress: this.getProgress(),
            isLoading: this.loading,
            errorMessage: this.errorMessage,
            lastUpdated: this.lastUpdated,
        };
        for (const listener of this.listeners) {
            listener(snapshot);
        }
    }
}

function uniqueLeagues(leagues: readonly LeagueRef[]): LeagueRef[] {
    const seen = new Map<string, LeagueRef>();
    for (const league of leagues) {
        const key = buildLeagueKey(league);
        if (!seen.has(key)) seen.set(key, league);
    }
    return [...seen.values()];
}
