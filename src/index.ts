export * from '@/types/league';
export * from '@/types/fantasy';

export { EspnClient, ESPN_API_BASE } from '@/lib/espn/client';
export { SleeperClient, SLEEPER_API_BASE, buildSleeperAvatarUrl, type SleeperClientOptions } from '@/lib/sleeper/client';
export { SleeperPlayerDirectory, PLAYER_DIRECTORY_TTL_MS } from '@/lib/sleeper/player-directory';
export { ConfiguredLeagueDirectory, type ConfiguredLeagueDirectoryDeps } from '@/lib/league-directory';
export { loadSettings, defaultSeason, type AppSettings } from '@/lib/settings';
export { formatResult } from '@/lib/format-result';
export {
    UpstreamHttpError,
    UpstreamDecodeError,
    ProviderError,
    classifyFailure,
    type FailureKind,
} from '@/lib/http/errors';

export { calculateFantasyPoints } from '@/services/scoring.service';
export { TeamIdentityResolver, type IdentityResolution, type TeamIdentityDeps } from '@/services/team-identity.service';
export {
    assembleMatchups,
    buildRanking,
    calculateWinProbability,
    eliminationCutoff,
    resolveMatchupStatus,
} from '@/services/matchup-assembler.service';
export {
    LeagueMatchupProvider,
    createProviderFactory,
    type LeagueProviderDeps,
    type ProviderFactory,
    type ProviderOutcome,
} from '@/services/league-provider.service';
export {
    MatchupAggregator,
    NO_LEAGUES_MESSAGE,
    DEFAULT_REFRESH_INTERVAL_MS,
    resultPriority,
    sortByPriority,
    type AggregatorOptions,
    type AggregatorSnapshot,
    type LoadProgress,
} from '@/services/aggregation.service';
