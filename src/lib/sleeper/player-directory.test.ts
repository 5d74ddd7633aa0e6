/**
 * Unit tests for SleeperPlayerDirectory
 *
 * Runs against a real SleeperClient with fetch mocked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SleeperClient } from "./client";
import { SleeperPlayerDirectory } from "./player-directory";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

const okResponse = (body: unknown) => ({
  ok: true,
  status: 200,
  statusText: "OK",
  text: () => Promise.resolve(JSON.stringify(body)),
});

const POOL = {
  "4046": { full_name: "Test Quarterback", position: "QB", team: "KC", espn_id: 3139477 },
  "6794": { first_name: "Test", last_name: "Receiver", position: "WR", team: null, espn_id: "4262921" },
  KC: { first_name: "Kansas City", last_name: "Chiefs", position: "DEF", team: "KC" },
};

beforeEach(() => {
  mockFetch.mockReset();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("SleeperClient.getPlayers", () => {
  it("reads the NFL player pool", async () => {
    mockFetch.mockResolvedValue(okResponse(POOL));

    const players = await new SleeperClient().getPlayers();

    expect(String(mockFetch.mock.calls[0][0])).toBe("https://api.sleeper.app/v1/players/nfl");
    expect(players["4046"]).toEqual({ full_name: "Test Quarterback", position: "QB", team: "KC", espn_id: 3139477 });
  });
});

describe("SleeperPlayerDirectory", () => {
  it("maps names, positions, teams and ESPN ids", async () => {
    mockFetch.mockResolvedValue(okResponse(POOL));
    const directory = new SleeperPlayerDirectory(new SleeperClient());

    await directory.refresh();

    expect(directory.size).toBe(3);
    expect(directory.lookup("4046")).toEqual({ name: "Test Quarterback", position: "QB", nflTeam: "KC", espnId: "3139477" });
    expect(directory.lookup("6794")).toEqual({ name: "Test Receiver", position: "WR", nflTeam: undefined, espnId: "4262921" });
    expect(directory.lookup("KC")).toEqual({ name: "Kansas City Chiefs", position: "DEF", nflTeam: "KC", espnId: undefined });
    expect(directory.lookup("missing")).toBeUndefined();
  });

  it("downloads once per TTL and shares a download between callers", async () => {
    mockFetch.mockResolvedValue(okResponse(POOL));
    let now = 1_000;
    const directory = new SleeperPlayerDirectory(new SleeperClient(), { ttlMs: 60_000, now: () => now });

    await Promise.all([directory.refresh(), directory.refresh()]);
    now += 59_999;
    await directory.refresh();
    expect(mockFetch).toHaveBeenCalledTimes(1);

    now += 1;
    await directory.refresh();
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("keeps the previous pool when a download fails and retries next time", async () => {
    let now = 0;
    const directory = new SleeperPlayerDirectory(new SleeperClient(), { ttlMs: 10, now: () => now });
    mockFetch.mockResolvedValueOnce(okResponse(POOL));
    await directory.refresh();

    now = 20;
    mockFetch.mockResolvedValueOnce({ ok: false, status: 503, statusText: "Service Unavailable", text: () => Promise.resolve("") });
    await expect(directory.refresh()).resolves.toBeUndefined();
    expect(directory.lookup("4046")?.position).toBe("QB");

    mockFetch.mockResolvedValueOnce(okResponse({ "4046": { full_name: "Test Quarterback", position: "QB", team: "BUF" } }));
    await directory.refresh();
    expect(directory.lookup("4046")?.nflTeam).toBe("BUF");
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });
});
