import { loadEnv } from './load-env';
import { EspnClient } from '@/lib/espn/client';
import { formatResult } from '@/lib/format-result';
import { ConfiguredLeagueDirectory } from '@/lib/league-directory';
import { loadSettings } from '@/lib/settings';
import { SleeperClient } from '@/lib/sleeper/client';
import { SleeperPlayerDirectory } from '@/lib/sleeper/player-directory';
import { MatchupAggregator } from '@/services/aggregation.service';
import { createProviderFactory } from '@/services/league-provider.service';
import { TeamIdentityResolver } from '@/services/team-identity.service';
import type { UnifiedResult } from '@/types/fantasy';

const printResults = (results: readonly UnifiedResult[], errorMessage: string | null): void => {
  if (errorMessage) {
    console.log(`[Ops] ${errorMessage}`);
    return;
  }
  results.forEach((result) => console.log(formatResult(result)));
};

const run = async (): Promise<void> => {
  loadEnv();
  const watch = process.argv.includes('--watch');

  try {
    const settings = loadSettings();
    const { swid, s2, leagueIds } = settings.espn;

    const sleeper = new SleeperClient();
    const players = new SleeperPlayerDirectory(sleeper);
    const espnFor = (leagueId: string, season: string) => new EspnClient(leagueId, season, 'ffl', swid, s2);

    const directory = new ConfiguredLeagueDirectory({
      espnLeagueIds: leagueIds,
      espn: espnFor,
      sleeper,
    });
    const resolver = new TeamIdentityResolver({
      lookupSleeperUserId: async (username) => (await sleeper.getUser(username))?.user_id ?? null,
    });
    const aggregator = new MatchupAggregator(
      createProviderFactory({
        identity: settings.identity,
        resolver,
        espn: (league, year) => espnFor(league.id, year),
        sleeper,
        players,
        currentWeek: settings.currentWeek,
      }),
      { week: settings.week, year: settings.season },
      { joinTimeoutMs: settings.joinTimeoutMs, refreshIntervalMs: settings.refreshIntervalMs }
    );

    console.log(`[Ops] Listing leagues for season ${settings.season}...`);
    const leagues = await directory.listLeagues(settings.identity, settings.season);

    console.log(`[Ops] Loading week ${settings.week} for ${leagues.length} league(s)...`);
    const results = await aggregator.loadAll(leagues);
    printResults(results, aggregator.getErrorMessage());

    if (!watch) return;

    console.log(`[Ops] Refreshing every ${settings.refreshIntervalMs}ms, Ctrl+C to stop.`);
    aggregator.subscribe((snapshot) => {
      if (snapshot.isLoading) return;
      console.log(`[Ops] Updated ${snapshot.lastUpdated?.toISOString() ?? ''}`);
      printResults(snapshot.results, snapshot.errorMessage);
    });
    aggregator.startAutoRefresh(() => true);

    process.once('SIGINT', () => {
      aggregator.stopAutoRefresh();
      console.log('[Ops] Stopped.');
      process.exit(0);
    });
  } catch (error) {
    console.error('[Ops] Matchup load failed:', error);
    process.exit(1);
  }
};

void run();
