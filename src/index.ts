export * from "./data/enums.js";
export { CacheEntry, type ReferenceSnapshot } from "./models/cacheEntry.js";
export { CacheObject } from "./models/cacheObject.js";
export type { ApiRequester, CacheClient, RequestParam } from "./models/cacheClient.js";
export { BountyItem } from "./models/bounty.js";
export { Ability, Champion, Skin } from "./models/champion.js";
export { ChampionStats } from "./models/championStats.js";
export { Device } from "./models/device.js";
export { Expandable, expandPartial } from "./models/expandable.js";
export { Loadout } from "./models/loadout.js";
export { Lookup, LookupGroup, type FuzzyOptions, type ScoredMatch } from "./models/lookup.js";
export { LiveMatch, LivePlayer, Match, MatchPlayer, PartialMatch } from "./models/match.js";
export { DataUsed } from "./models/dataUsed.js";
export { PartialPlayer, Player, PlayerStatus, type RankedStats } from "./models/player.js";
export { ServerStatus, type PlatformStatus, type StatusName } from "./models/serverStatus.js";
export { DataCache } from "./services/dataCache.js";
export { PostgresSnapshotStore } from "./services/postgresSnapshotStore.js";
export { RequestTransport, type RequestTransportConfig } from "./services/requestTransport.js";
export type { SnapshotStore, StoredSnapshot } from "./services/snapshotStore.js";
export { SqliteSnapshotStore } from "./services/sqliteSnapshotStore.js";
export { StatsClient, type Bounty, type StatsClientOptions } from "./services/statsClient.js";
export { StatusMonitor, type StatusCallback, type StatusMonitorOptions } from "./services/statusMonitor.js";
export { StatusPage } from "./services/statusPage.js";
export * from "./utils/errors.js";
