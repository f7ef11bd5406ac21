import type { Database } from "sqlite";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { closeResources } from "../src/config/client.js";
import { Language } from "../src/data/enums.js";
import { getDatabase, openDatabase } from "../src/db/sqlite.js";
import { warmLanguages } from "../src/services/cacheWarmer.js";
import { SqliteSnapshotStore } from "../src/services/sqliteSnapshotStore.js";
import { StatsClient } from "../src/services/statsClient.js";
import { championRecord, fakeRequester, fullDeck } from "./fixtures.js";

describe("warmLanguages", () => {
  let db: Database;
  let store: SqliteSnapshotStore;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    db = await openDatabase(":memory:");
    store = new SqliteSnapshotStore(db);
  });

  afterEach(async () => {
    await db.close();
  });

  it("warms each language, then prunes expired snapshots", async () => {
    const expired = {
      language: Language.German,
      champions: [championRecord(2205, "Androxus")],
      items: fullDeck(2205),
      skins: [],
      fetchedAt: Date.UTC(2024, 2, 4)
    };
    await store.upsert(expired, Date.UTC(2024, 2, 4, 12));
    const client = new StatsClient({
      snapshotStore: store,
      requester: fakeRequester({
        getchampions: (language) => (language === Language.English ? [championRecord(2205, "Androxus")] : []),
        getitems: () => fullDeck(2205),
        getchampionskins: () => []
      })
    });

    const result = await warmLanguages(client, [Language.English, Language.French], store);

    expect(result).toEqual({ warmed: [Language.English], failed: [Language.French], pruned: 1 });
    await expect(store.get(Language.English)).resolves.not.toBeNull();
    await expect(db.get("SELECT COUNT(*) AS count FROM reference_snapshots")).resolves.toEqual({ count: 1 });
    expect(console.log).toHaveBeenCalledWith("[warm-cache] pruned 1 expired snapshot(s)");
  });

  it("skips pruning without a store", async () => {
    const initialize = vi.fn(async () => true);

    await expect(warmLanguages({ initialize }, [Language.English])).resolves.toEqual({
      warmed: [Language.English],
      failed: [],
      pruned: 0
    });
  });
});

describe("closeResources", () => {
  it("closes the client and the shared sqlite connection", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const close = vi.fn(async () => {});
    const shared = await getDatabase(":memory:");

    await closeResources({ close });

    expect(close).toHaveBeenCalledTimes(1);
    const reopened = await getDatabase(":memory:");
    expect(reopened).not.toBe(shared);
    await closeResources({ close });
  });
});
