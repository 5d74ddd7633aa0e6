/**
 * Scoring Service
 *
 * Pure functions that turn a player's raw stat line into fantasy points under
 * a league's own scoring rules.
 *
 * @module services/scoring
 */

import type { RosterPlayer, ScoringRuleSet, StatLine } from '@/types/fantasy';

/**
 * Calculates fantasy points for a stat line under a league's scoring rules.
 *
 * Sums `stat * weight` for every key present in both inputs. Keys are visited
 * in sorted order so equal inputs always produce bit-identical floats.
 * The total is neither rounded nor clamped; non-finite terms count as zero.
 *
 * @example
 * ```typescript
 * const points = calculateFantasyPoints(
 *   { pass_td: 2, pass_yd: 300, rush_yd: 5 },
 *   { pass_td: 4, pass_yd: 0.05 }
 * );
 * // Returns: 2*4 + 300*0.05 = 23
 * ```
 */
export function calculateFantasyPoints(
    stats: StatLine,
    scoringSettings: ScoringRuleSet
): number {
    let total = 0;

    for (const category of Object.keys(stats).sort()) {
        const weight = scoringSettings[category];
        if (typeof weight !== 'number') continue;

        const term = stats[category] * weight;
        if (Number.isFinite(term)) {
            total += term;
        }
    }

    return total;
}

const pickFiniteNumbers = (raw: Record<string, unknown> | null | undefined): Record<string, number> => {
    const result: Record<string, number> = {};
    if (!raw) return result;

    for (const [key, value] of Object.entries(raw)) {
        if (typeof value === 'number' && Number.isFinite(value)) {
            result[key] = value;
        }
    }

    return result;
};

/**
 * Keeps only finite numeric weights from a platform's raw scoring settings.
 */
export const toScoringRuleSet = (raw: Record<string, unknown> | null | undefined): ScoringRuleSet =>
    pickFiniteNumbers(raw);

/** Raw feed entry to a stat line; a player absent from the feed has an empty line. */
export const toStatLine = (raw: Record<string, unknown> | null | undefined): StatLine =>
    pickFiniteNumbers(raw);

/** Team score: the starters' points, bench excluded. */
export const sumStarterPoints = (players: readonly RosterPlayer[]): number =>
    players.reduce((sum, player) => (player.isStarter ? sum + player.points : sum), 0);

export const sumStarterProjections = (players: readonly RosterPlayer[]): number | undefined => {
    let total: number | undefined;
    for (const player of players) {
        if (!player.isStarter || player.projectedPoints === undefined) continue;
        total = (total ?? 0) + player.projectedPoints;
    }
    return total;
};
