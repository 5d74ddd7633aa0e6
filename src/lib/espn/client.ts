import { fetchJson } from "@/lib/http/fetch-json";
import type { RetryOptions } from "@/utils/retry";
import { EspnLeagueResponseSchema, type EspnLeagueResponse } from "./types";

export const ESPN_API_BASE = "https://lm-api-reads.fantasy.espn.com/apis/v3/games";

export class EspnClient {
    private leagueId: string;
    private year: string;
    private sport: string;
    private swid?: string;
    private s2?: string;
    private retry?: RetryOptions;

    constructor(leagueId: string, year: string, sport: string = "ffl", swid?: string, s2?: string, retry?: RetryOptions) {
        this.leagueId = leagueId;
        this.year = year;
        this.sport = sport;
        this.swid = swid;
        this.s2 = s2;
        this.retry = retry;
    }

    // Helper to construct headers with cookies
    private getHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            "User-Agent": "league-hub/1.0",
        };

        if (this.swid && this.s2) {
            headers["Cookie"] = `swid=${this.swid}; espn_s2=${this.s2};`;
        }

        return headers;
    }

    private buildLeagueUrl(views: string[], params?: Record<string, string | number>) {
        const base = `${ESPN_API_BASE}/${this.sport}/seasons/${this.year}/segments/0/leagues/${this.leagueId}`;
        const query = new URLSearchParams();

        for (const view of views) {
            query.append("view", view);
        }

        if (params) {
            for (const [key, value] of Object.entries(params)) {
                query.append(key, String(value));
            }
        }

        return `${base}?${query.toString()}`;
    }

    private async fetchLeagueViews(
        views: string[],
        params?: Record<string, string | number>
    ): Promise<EspnLeagueResponse> {
        const url = this.buildLeagueUrl(views, params);
        console.log(`[EspnClient] Fetching views [${views.join(", ")}]: ${url}`);

        return fetchJson("ESPN", url, EspnLeagueResponseSchema, {
            headers: this.getHeaders(),
            retry: this.retry,
        });
    }

    /**
     * League settings, teams with their owners, members and current rosters.
     */
    async getLeagueSettings(): Promise<EspnLeagueResponse> {
        try {
            return await this.fetchLeagueViews(["mSettings", "mTeam", "mRoster"]);
        } catch (error) {
            console.error("[EspnClient] Failed to fetch league settings:", error);
            throw error;
        }
    }

    /**
     * Week-scoped schedule with live scores and rosters carrying that week's stats.
     */
    async getMatchups(scoringPeriodId: number): Promise<EspnLeagueResponse> {
        try {
            return await this.fetchLeagueViews(
                ["mMatchupScore", "mLiveScoring", "mRoster"],
                { scoringPeriodId }
            );
        } catch (error) {
            console.error("[EspnClient] Failed to fetch matchups:", error);
            throw error;
        }
    }
}
