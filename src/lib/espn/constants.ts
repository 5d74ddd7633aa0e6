export const ESPN_POSITION_MAPPINGS: Record<number, string> = {
    1: 'QB',
    2: 'RB',
    3: 'WR',
    4: 'TE',
    5: 'K',
    16: 'D/ST',
};

export const ESPN_LINEUP_SLOT_MAPPINGS: Record<number, string> = {
    0: 'QB',
    2: 'RB',
    3: 'RB',
    4: 'WR',
    5: 'WR',
    6: 'TE',
    16: 'D/ST',
    17: 'K',
    20: 'BN',
    23: 'FLEX',
};

/** Lineup slots that count toward the team score. */
export const ESPN_STARTER_SLOTS: ReadonlySet<number> = new Set([0, 2, 3, 4, 5, 6, 23, 16, 17]);

export const ESPN_PRO_TEAM_MAPPINGS: Record<number, string> = {
    1: 'ATL', 2: 'BUF', 3: 'CHI', 4: 'CIN', 5: 'CLE', 6: 'DAL', 7: 'DEN', 8: 'DET',
    9: 'GB', 10: 'TEN', 11: 'IND', 12: 'KC', 13: 'LV', 14: 'LAR', 15: 'MIA', 16: 'MIN',
    17: 'NE', 18: 'NO', 19: 'NYG', 20: 'NYJ', 21: 'PHI', 22: 'ARI', 23: 'PIT', 24: 'LAC',
    25: 'SF', 26: 'SEA', 27: 'TB', 28: 'WSH', 29: 'CAR', 30: 'JAX', 33: 'BAL', 34: 'HOU',
};

// Stat sources on player stat entries
export const ESPN_STAT_SOURCE_ACTUAL = 0;
export const ESPN_STAT_SOURCE_PROJECTED = 1;

export function getPositionName(id: number | string | undefined): string {
    if (id === undefined) return 'UNK';
    const numericId = typeof id === 'string' ? parseInt(id) : id;
    return ESPN_POSITION_MAPPINGS[numericId] || 'UNK';
}

export function getLineupSlotName(id: number | undefined): string {
    if (id === undefined) return 'BN';
    // Bench, IR and unknown slots all read as bench
    return ESPN_LINEUP_SLOT_MAPPINGS[id] || 'BN';
}

export function isStarterSlot(id: number | undefined): boolean {
    return id !== undefined && ESPN_STARTER_SLOTS.has(id);
}

export function getProTeamAbbrev(id: number | undefined): string {
    if (id === undefined) return 'UNK';
    return ESPN_PRO_TEAM_MAPPINGS[id] || 'UNK';
}
