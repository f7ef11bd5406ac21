import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/app.js";
import { StatsClient } from "../src/services/statsClient.js";
import { championRecord, fakeRequester, fullDeck, playerRecord, type RouteHandler } from "./fixtures.js";

let server: Server | null = null;

async function startApp(routes: Record<string, RouteHandler>, cacheEnabled = false): Promise<string> {
  const client = new StatsClient({ requester: fakeRequester(routes), cacheEnabled });
  const app = createApp({ client });
  const started = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  server = started;
  const address = started.address();
  if (address === null || typeof address === "string") throw new Error("Server is not listening on a port.");
  return `http://127.0.0.1:${address.port}`;
}

async function getJson(url: string): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url);
  return { status: response.status, body: await response.json() };
}

describe("stats routes", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    const running = server;
    server = null;
    if (running) {
      await new Promise<void>((resolve, reject) => running.close((error) => (error ? reject(error) : resolve())));
    }
  });

  it("reports health", async () => {
    const baseUrl = await startApp({});

    await expect(getJson(`${baseUrl}/health`)).resolves.toEqual({
      status: 200,
      body: { ok: true, service: "game-stats-client", cacheEnabled: false, monitoring: false }
    });
  });

  it("searches champions by name", async () => {
    const baseUrl = await startApp(
      {
        getchampions: () => [championRecord(2205, "Androxus"), championRecord(2404, "Ash")],
        getitems: () => [...fullDeck(2205), ...fullDeck(2404)],
        getchampionskins: () => []
      },
      true
    );

    const { status, body } = await getJson(`${baseUrl}/api/champions?q=andro`);

    expect(status).toBe(200);
    expect(body).toMatchObject({ language: 1, champions: [{ id: 2205, name: "Androxus", complete: true }] });
  });

  it("rejects an invalid champion limit", async () => {
    const baseUrl = await startApp({});

    const { status } = await getJson(`${baseUrl}/api/champions?limit=0`);

    expect(status).toBe(400);
  });

  it("presents private players", async () => {
    const baseUrl = await startApp({
      getplayer: () => [{ ret_msg: "Player Privacy Flag set for: playerIdType=5; playerId=123" }]
    });

    await expect(getJson(`${baseUrl}/api/players/123`)).resolves.toEqual({
      status: 200,
      body: { id: 123, name: "", platform: "Steam", private: true }
    });
  });

  it("maps NotFound to 404", async () => {
    const baseUrl = await startApp({});

    await expect(getJson(`${baseUrl}/api/players/0`)).resolves.toEqual({
      status: 404,
      body: { error: "Failed to load the player.", message: "Player not found" }
    });
  });

  it("maps unexpected failures to 500", async () => {
    const baseUrl = await startApp({
      getplayer: () => {
        throw new Error("boom");
      }
    });

    await expect(getJson(`${baseUrl}/api/players/Seven`)).resolves.toEqual({
      status: 500,
      body: { error: "Failed to load the player.", message: "boom" }
    });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("lists the match history of a named player", async () => {
    const baseUrl = await startApp({
      getplayer: () => [playerRecord(7, "Seven")],
      getmatchhistory: () => [{ ret_msg: "No Match History" }]
    });

    await expect(getJson(`${baseUrl}/api/players/Seven/history`)).resolves.toEqual({
      status: 200,
      body: { player: 7, matches: [] }
    });
  });

  it("rejects a non-numeric match id", async () => {
    const baseUrl = await startApp({});

    const { status } = await getJson(`${baseUrl}/api/matches/abc`);

    expect(status).toBe(400);
  });

  it("returns 404 when no server status is available", async () => {
    const baseUrl = await startApp({
      gethirezserverstatus: () => [{ ret_msg: "Service unavailable" }]
    });

    const { status } = await getJson(`${baseUrl}/api/status`);

    expect(status).toBe(404);
  });
});
