/**
 * ESPN Fantasy Football API payloads.
 *
 * zod schemas for the league views the engine reads (`mSettings`, `mTeam`,
 * `mRoster`, `mMatchupScore`, `mLiveScoring`). Only the fields in use are
 * declared; unknown keys are stripped on parse.
 */

import { z } from 'zod';

export const EspnScoringItemSchema = z.object({
    statId: z.number(),
    points: z.number().optional(),
});

export const EspnLeagueSettingsSchema = z.object({
    name: z.string().optional(),
    size: z.number().optional(),
    scoringSettings: z
        .object({
            scoringItems: z.array(EspnScoringItemSchema).optional(),
        })
        .optional(),
    scheduleSettings: z
        .object({
            matchupPeriodCount: z.number().optional(),
        })
        .optional(),
});

export const EspnPlayerStatsSchema = z.object({
    scoringPeriodId: z.number().optional(),
    statSourceId: z.number().optional(), // 0 = Actual, 1 = Projected
    appliedTotal: z.number().optional(),
    stats: z.record(z.number()).optional(),
});

export const EspnPlayerSchema = z.object({
    id: z.number(),
    fullName: z.string().optional(),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    defaultPositionId: z.number().optional(),
    proTeamId: z.number().optional(),
    stats: z.array(EspnPlayerStatsSchema).optional(),
});

export const EspnRosterEntrySchema = z.object({
    playerId: z.number(),
    lineupSlotId: z.number().optional(),
    playerPoolEntry: z
        .object({
            id: z.number().optional(),
            player: EspnPlayerSchema.optional(),
        })
        .optional(),
});

export const EspnRosterSchema = z.object({
    entries: z.array(EspnRosterEntrySchema).optional(),
});

export const EspnRecordSchema = z.object({
    overall: z
        .object({
            wins: z.number().optional(),
            losses: z.number().optional(),
            ties: z.number().optional(),
        })
        .optional(),
});

export const EspnTeamSchema = z.object({
    id: z.number(),
    abbrev: z.string().optional(),
    location: z.string().optional(),
    nickname: z.string().optional(),
    name: z.string().optional(),
    logo: z.string().optional(),
    primaryOwner: z.string().optional(),
    owners: z.array(z.string()).optional(),
    record: EspnRecordSchema.optional(),
    roster: EspnRosterSchema.optional(),
});

export const EspnMemberSchema = z.object({
    id: z.string(),
    displayName: z.string().optional(),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
});

export const EspnMatchupTeamSchema = z.object({
    teamId: z.number(),
    totalPoints: z.number().optional(),
});

export const EspnMatchupSchema = z.object({
    id: z.number(),
    matchupPeriodId: z.number(),
    playoffTierType: z.string().optional(),
    winner: z.enum(['HOME', 'AWAY', 'UNDECIDED', 'TIE']).optional(),
    home: EspnMatchupTeamSchema.optional(),
    away: EspnMatchupTeamSchema.optional(),
});

export const EspnLeagueResponseSchema = z.object({
    id: z.number(),
    seasonId: z.number().optional(),
    scoringPeriodId: z.number().optional(),
    status: z
        .object({
            currentMatchupPeriod: z.number().optional(),
        })
        .optional(),
    settings: EspnLeagueSettingsSchema.optional(),
    teams: z.array(EspnTeamSchema).optional(),
    members: z.array(EspnMemberSchema).optional(),
    schedule: z.array(EspnMatchupSchema).optional(),
});

export type EspnScoringItem = z.infer<typeof EspnScoringItemSchema>;
export type EspnLeagueSettings = z.infer<typeof EspnLeagueSettingsSchema>;
export type EspnPlayerStats = z.infer<typeof EspnPlayerStatsSchema>;
export type EspnPlayer = z.infer<typeof EspnPlayerSchema>;
export type EspnRosterEntry = z.infer<typeof EspnRosterEntrySchema>;
export type EspnTeam = z.infer<typeof EspnTeamSchema>;
export type EspnMember = z.infer<typeof EspnMemberSchema>;
export type EspnMatchup = z.infer<typeof EspnMatchupSchema>;
export type EspnLeagueResponse = z.infer<typeof EspnLeagueResponseSchema>;
