import { Language, Languages } from "../data/enums.js";
import { closePostgresPool, getPostgresPool } from "../db/postgres.js";
import { closeDatabase, getDatabase } from "../db/sqlite.js";
import { PostgresSnapshotStore } from "../services/postgresSnapshotStore.js";
import type { SnapshotStore } from "../services/snapshotStore.js";
import { SqliteSnapshotStore } from "../services/sqliteSnapshotStore.js";
import { StatsClient } from "../services/statsClient.js";
import { StatusPage } from "../services/statusPage.js";
import { env } from "./env.js";

export async function createSnapshotStore(): Promise<SnapshotStore | undefined> {
  if (env.SNAPSHOT_STORE === "postgres") {
    if (!env.DATABASE_URL) {
      throw new Error("DATABASE_URL is required when SNAPSHOT_STORE=postgres.");
    }
    console.log("[db] Using postgres provider for reference snapshots.");
    return new PostgresSnapshotStore(await getPostgresPool(env.DATABASE_URL));
  }
  if (env.SNAPSHOT_STORE === "sqlite") {
    console.log(`[db] Using sqlite provider at ${env.SNAPSHOT_DB_PATH}.`);
    return new SqliteSnapshotStore(await getDatabase(env.SNAPSHOT_DB_PATH));
  }
  return undefined;
}

export function resolveLanguage(value: string): Language {
  const language = Languages.resolve(value);
  if (language === undefined) {
    throw new Error(`Unknown language "${value}".`);
  }
  return language;
}

/** Builds a client from the environment, with the store from `createSnapshotStore` unless one is given. */
export async function createClientFromEnv(snapshotStore?: SnapshotStore): Promise<StatsClient> {
  if (env.STATS_DEV_ID === undefined || env.STATS_AUTH_KEY === undefined) {
    throw new Error("STATS_DEV_ID and STATS_AUTH_KEY are required.");
  }
  return new StatsClient({
    baseUrl: env.STATS_API_URL,
    devId: env.STATS_DEV_ID,
    authKey: env.STATS_AUTH_KEY,
    sessionLifetimeMs: env.SESSION_LIFETIME_MINUTES * 60 * 1000,
    maxAttempts: env.REQUEST_MAX_ATTEMPTS,
    retryBaseMs: env.REQUEST_RETRY_BASE_MS,
    cacheEnabled: env.CACHE_ENABLED,
    defaultLanguage: resolveLanguage(env.DEFAULT_LANGUAGE),
    cacheTtlMs: env.CACHE_TTL_HOURS * 60 * 60 * 1000,
    snapshotStore: snapshotStore ?? (await createSnapshotStore()),
    statusPage: new StatusPage({ url: env.STATUS_PAGE_URL }),
    statusPageGroup: env.STATUS_PAGE_GROUP
  });
}

/** Closes the client along with any snapshot store connections that were opened. */
export async function closeResources(client: Pick<StatsClient, "close">): Promise<void> {
  await client.close();
  await closeDatabase();
  await closePostgresPool();
}
