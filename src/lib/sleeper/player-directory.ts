/**
 * Sleeper player pool as a PlayerDirectory.
 *
 * The pool is one multi-megabyte download covering every NFL player, so it is
 * held for a day and reloaded lazily when a fetch cycle asks for it.
 */

import type { PlayerDirectory, PlayerInfo } from '@/types/fantasy';
import type { SleeperClient } from './client';
import type { SleeperPlayer, SleeperPlayers } from './types';

export const PLAYER_DIRECTORY_TTL_MS = 24 * 60 * 60 * 1000;

export interface SleeperPlayerDirectoryOptions {
    ttlMs?: number;
    now?: () => number;
}

function toPlayerInfo(player: SleeperPlayer): PlayerInfo {
    const name = player.full_name || `${player.first_name || ''} ${player.last_name || ''}`.trim();
    return {
        name: name || undefined,
        position: player.position || undefined,
        nflTeam: player.team || undefined,
        espnId: player.espn_id === null || player.espn_id === undefined ? undefined : String(player.espn_id),
    };
}

export function mapSleeperPlayerPool(players: SleeperPlayers): Map<string, PlayerInfo> {
    const directory = new Map<string, PlayerInfo>();
    for (const [playerId, player] of Object.entries(players)) {
        directory.set(playerId, toPlayerInfo(player));
    }
    return directory;
}

export class SleeperPlayerDirectory implements PlayerDirectory {
    private players = new Map<string, PlayerInfo>();
    private loadedAt: number | null = null;
    private pending: Promise<void> | null = null;
    private readonly ttlMs: number;
    private readonly now: () => number;

    constructor(
        private readonly client: Pick<SleeperClient, 'getPlayers'>,
        options: SleeperPlayerDirectoryOptions = {}
    ) {
        this.ttlMs = options.ttlMs ?? PLAYER_DIRECTORY_TTL_MS;
        this.now = options.now ?? Date.now;
    }

    get size(): number {
        return this.players.size;
    }

    lookup(playerId: string): PlayerInfo | undefined {
        return this.players.get(playerId);
    }

    /**
     * Downloads the pool when it is missing or stale. Concurrent callers share
     * one download; a failed download keeps the previous pool and is retried
     * on the next call.
     */
    refresh(): Promise<void> {
        if (this.loadedAt !== null && this.now() - this.loadedAt < this.ttlMs) {
            return Promise.resolve();
        }
        if (!this.pending) {
            this.pending = this.load().finally(() => {
                this.pending = null;
            });
        }
        return this.pending;
    }

    private async load(): Promise<void> {
        try {
            const pool = await this.client.getPlayers();
            this.players = mapSleeperPlayerPool(pool);
            this.loadedAt = this.now();
            console.log(`[PlayerDirectory] Loaded ${this.players.size} players`);
        } catch (error) {
            console.warn(`[PlayerDirectory] Player pool unavailable, keeping ${this.players.size} cached players:`, error);
        }
    }
}
