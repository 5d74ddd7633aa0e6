import type { UnifiedResult } from "@/types/fantasy";

const points = (value: number): string => value.toFixed(2);

/**
 * One-line console summary of a league result.
 */
export function formatResult(result: UnifiedResult): string {
  const prefix = `[${result.league.source.toUpperCase()}] ${result.league.name} (week ${result.week})`;

  if (result.kind === "matchup") {
    const { home, away, status, winProbability } = result.matchup;
    const mine = home.id === result.myTeamId ? home : away;
    const odds = mine === home ? winProbability : 1 - winProbability;
    return `${prefix} ${status.toUpperCase()}: ${home.name} ${points(home.score)} - ${points(away.score)} ${away.name} | win ${Math.round(odds * 100)}%`;
  }

  const { ranking, myEntry } = result;
  return `${prefix} ELIMINATION: ${myEntry.team.name} rank ${myEntry.rank}/${ranking.entries.length} ${myEntry.eliminationStatus} | ${points(myEntry.pointsFromSafety)} from safety`;
}
