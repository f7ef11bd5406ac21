import { beforeEach, describe, expect, it, vi } from "vitest";
import { Language } from "../src/data/enums.js";
import { DataCache } from "../src/services/dataCache.js";
import { championRecord, fakeRequester, fullDeck, itemRecord } from "./fixtures.js";

const HOUR = 60 * 60 * 1000;
const START = Date.UTC(2024, 2, 4, 12, 0, 0);

function referenceRoutes(items: unknown[] = [...fullDeck(2205), itemRecord(9001, "Nimble")]) {
  let failing = false;
  const api = fakeRequester({
    getchampions: () => {
      if (failing) throw new Error("stats API down");
      return [championRecord(2205, "Androxus")];
    },
    getitems: () => items,
    getchampionskins: () => []
  });
  return {
    ...api,
    fail: () => {
      failing = true;
    }
  };
}

describe("DataCache", () => {
  let nowMs = START;

  beforeEach(() => {
    nowMs = START;
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("serves an entry until it is twelve hours old", async () => {
    const api = referenceRoutes();
    const cache = new DataCache(api, { now: () => nowMs });

    const first = await cache.fetchEntry();
    nowMs = START + 11 * HOUR + 59 * 60 * 1000;
    const second = await cache.fetchEntry();

    expect(second).toBe(first);
    expect(api.callsTo("getchampions")).toHaveLength(1);
    expect(first?.expiresAt).toBe(START + 12 * HOUR);
  });

  it("refreshes an expired entry once for concurrent callers", async () => {
    const api = referenceRoutes();
    const cache = new DataCache(api, { now: () => nowMs });
    const first = await cache.fetchEntry();

    nowMs = START + 12 * HOUR + 60 * 1000;
    const refreshed = await Promise.all([cache.fetchEntry(), cache.fetchEntry(), cache.fetchEntry()]);

    expect(api.callsTo("getchampions")).toHaveLength(2);
    expect(refreshed[0]).not.toBe(first);
    expect(refreshed[1]).toBe(refreshed[0]);
    expect(refreshed[2]).toBe(refreshed[0]);
    expect(api.callsTo("getchampions")[1]).toEqual([Language.English]);
  });

  it("keeps serving the previous entry when a refresh fails", async () => {
    const api = referenceRoutes();
    const cache = new DataCache(api, { now: () => nowMs });
    const first = await cache.fetchEntry();

    api.fail();
    nowMs = START + 13 * HOUR;

    await expect(cache.fetchEntry()).resolves.toBe(first);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("falls back to one empty entry when nothing could be fetched", async () => {
    const api = referenceRoutes();
    api.fail();
    const cache = new DataCache(api, { now: () => nowMs });

    await expect(cache.fetchEntry()).resolves.toBeNull();
    const fallback = await cache.resolveEntry();
    expect(fallback.champions.size).toBe(0);
    expect(await cache.resolveEntry()).toBe(fallback);
    expect(fallback.champions.cacheObject(2205).id).toBe(2205);
  });

  it("never requests reference data while disabled", async () => {
    const api = referenceRoutes();
    const cache = new DataCache(api, { enabled: false, now: () => nowMs });

    const entry = await cache.resolveEntry(Language.German);

    expect(entry.language).toBe(Language.German);
    expect(entry.champions.size).toBe(0);
    expect(api.request).not.toHaveBeenCalled();
  });

  it("builds complete champions with ordered talents", async () => {
    const cache = new DataCache(referenceRoutes(), { now: () => nowMs });

    const entry = await cache.resolveEntry();
    const champion = entry.champions.get("androxus");

    expect(entry.complete).toBe(true);
    expect(champion?.cards.size).toBe(16);
    expect(champion?.talents.toArray().map((talent) => talent.name)).toEqual(["Talent A", "Talent C", "Talent B"]);
    expect(entry.items.toArray().map((item) => item.name)).toEqual(["Nimble"]);
    expect(entry.devices.size).toBe(20);
  });

  it("marks the entry incomplete when a card is missing", async () => {
    const cache = new DataCache(referenceRoutes(fullDeck(2205).slice(1)), { now: () => nowMs });

    const entry = await cache.resolveEntry();

    expect(entry.champions.get(2205)?.cards.size).toBe(15);
    expect(entry.complete).toBe(false);
  });

  it("drops stored entries on clear", async () => {
    const api = referenceRoutes();
    const cache = new DataCache(api, { now: () => nowMs });
    await cache.initialize();

    expect(cache.peekEntry()).toBeDefined();
    cache.clear();
    expect(cache.peekEntry()).toBeUndefined();
  });
});
