import { vi } from "vitest";
import type { RequestParam } from "../src/models/cacheClient.js";

export type RouteHandler = (...params: RequestParam[]) => unknown;

/** In-process stand-in for the stats API, answering each method from `routes`. */
export function fakeRequester(routes: Record<string, RouteHandler>) {
  const request = vi.fn(async (method: string, ...params: RequestParam[]): Promise<unknown> => {
    const handler = routes[method];
    if (!handler) throw new Error(`Unexpected request: ${method}`);
    return handler(...params);
  });
  const callsTo = (method: string): RequestParam[][] =>
    request.mock.calls.filter(([called]) => called === method).map(([, ...params]) => params);
  return { request, callsTo };
}

export function championRecord(id: number, name: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    Name: name,
    Title: `The ${name}`,
    Roles: "Paladins Flanker",
    Health: 2100,
    Speed: 395,
    Ability_1: { Id: id * 10 + 1, Summary: "Primary", Description: "Fires.<br>Hits.", damageType: "Direct", rechargeSeconds: 0 },
    Ability_2: { Id: id * 10 + 2, Summary: "Dash", Description: "Moves.", damageType: "AoE", rechargeSeconds: 6 },
    ret_msg: null,
    ...overrides
  };
}

export function cardRecord(id: number, championId: number, name: string, description = "") {
  return { ItemId: id, DeviceName: name, Description: description, item_type: "Card", champion_id: championId };
}

export function talentRecord(id: number, championId: number, name: string, level: number) {
  return {
    ItemId: id,
    DeviceName: name,
    Description: "",
    item_type: "Talent",
    champion_id: championId,
    talent_reward_level: level
  };
}

export function itemRecord(id: number, name: string) {
  return { ItemId: id, DeviceName: name, Description: "Shop item.", item_type: "Item Shop", champion_id: 0, Price: 300 };
}

/** A full deck: 16 cards and 3 talents. */
export function fullDeck(championId: number) {
  const cards = Array.from({ length: 16 }, (_, index) => cardRecord(championId * 100 + index, championId, `Card ${index}`));
  const talents = [
    talentRecord(championId * 100 + 50, championId, "Talent B", 30),
    talentRecord(championId * 100 + 51, championId, "Talent A", 0),
    talentRecord(championId * 100 + 52, championId, "Talent C", 20)
  ];
  return [...cards, ...talents];
}

export function playerRecord(id: number, name: string, overrides: Record<string, unknown> = {}) {
  return {
    Id: id,
    ActivePlayerId: id,
    Name: name,
    hz_player_name: name,
    Platform: "Steam",
    Region: "Europe",
    Level: 120,
    Created_Datetime: "1/2/2020 3:04:05 PM",
    ret_msg: null,
    ...overrides
  };
}

export function matchPlayerRecord(matchId: number, playerId: number, team: number, overrides: Record<string, unknown> = {}) {
  return {
    Match: matchId,
    Entry_Datetime: "3/4/2024 10:00:00 AM",
    Map_Game: "LIVE Frog Isle (Onslaught)",
    match_queue_id: 452,
    Region: "Europe",
    Time_In_Match_Seconds: 600,
    Team1Score: 400,
    Team2Score: 250,
    Winning_TaskForce: 1,
    TaskForce: team,
    playerId,
    playerName: `player${playerId}`,
    ChampionId: 2205,
    Reference_Name: "Androxus",
    Win_Status: team === 1 ? "Winner" : "Loser",
    ret_msg: null,
    ...overrides
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}
