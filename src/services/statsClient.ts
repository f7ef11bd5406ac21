import { PC_PLATFORMS, Region, Regions, type Language, type Platform, type Queue } from "../data/enums.js";
import type { ApiRequester } from "../models/cacheClient.js";
import type { CacheEntry } from "../models/cacheEntry.js";
import { BountyItem } from "../models/bounty.js";
import { DataUsed } from "../models/dataUsed.js";
import { Match, MATCH_BATCH_SIZE, matchRecords, PartialMatch } from "../models/match.js";
import {
  fetchPlayerBatch,
  fetchPlayers,
  PartialPlayer,
  Player,
  privatePlayerFromMessage,
  type PartialPlayerInit
} from "../models/player.js";
import { ServerStatus, type PageComponent } from "../models/serverStatus.js";
import {
  bountyItemSchema,
  dataUsedSchema,
  matchHistorySchema,
  parseRecords,
  playerIdSchema,
  playerSchema,
  queueMatchIdSchema,
  retMessage,
  serverStatusSchema,
  type PlayerIdRecord,
  type ServerStatusRecord
} from "../schemas/responses.js";
import { chunk, deduplicate, groupBy } from "../utils/collections.js";
import { dateWindows } from "../utils/dateWindows.js";
import { errorMessage, HTTPException, LimitReached, NotFound, Private, Unavailable } from "../utils/errors.js";
import { Mutex } from "../utils/mutex.js";
import { parseApiTimestamp } from "../utils/timestamp.js";
import { DataCache, type FetchEntryOptions } from "./dataCache.js";
import { RequestTransport } from "./requestTransport.js";
import type { SnapshotStore } from "./snapshotStore.js";
import { StatusMonitor, type StatusCallback, type StatusMonitorOptions, type StatusSource } from "./statusMonitor.js";
import type { StatusPage } from "./statusPage.js";

const SERVER_STATUS_TTL_MS = 60 * 1000;

export interface ClosableRequester extends ApiRequester {
  close?(): Promise<void>;
}

export interface StatsClientOptions {
  /** Sends the API calls. When omitted, a `RequestTransport` is built from the fields below. */
  requester?: ClosableRequester;
  baseUrl?: string;
  devId?: number;
  authKey?: string;
  sessionLifetimeMs?: number;
  maxAttempts?: number;
  retryBaseMs?: number;
  fetchImpl?: typeof fetch;
  cacheEnabled?: boolean;
  defaultLanguage?: Language;
  cacheTtlMs?: number;
  snapshotStore?: SnapshotStore;
  statusPage?: StatusPage;
  /** Name of the status page component group listing the game's platforms. */
  statusPageGroup?: string;
  now?: () => number;
}

export interface ReturnPrivateOption {
  /** Return private profiles as private partial players instead of failing or skipping them. */
  returnPrivate?: boolean;
}

export interface SearchPlayersOptions extends ReturnPrivateOption {
  platform?: Platform;
  /** Only names matching exactly (case insensitive). Defaults to `true`. */
  exact?: boolean;
}

export interface MatchOptions {
  language?: Language;
  /** Replace partial players in the returned matches with full profiles. */
  expandPlayers?: boolean;
}

export interface QueueMatchesOptions extends MatchOptions {
  start: Date;
  end: Date;
  region?: Region;
  /** Newest matches first. */
  reverse?: boolean;
}

export interface Bounty {
  /** Items on sale, the one expiring soonest first. */
  active: BountyItem[];
  /** Expired items, the most recently expired first. */
  past: BountyItem[];
}

export const DEFAULT_API_URL = "https://api.paladins.com/paladinsapi.svc";

function buildRequester(options: StatsClientOptions): ClosableRequester {
  if (options.requester) return options.requester;
  if (options.devId === undefined || options.authKey === undefined) {
    throw new TypeError("Either a requester or both devId and authKey are required.");
  }
  return new RequestTransport({
    baseUrl: options.baseUrl ?? DEFAULT_API_URL,
    devId: options.devId,
    authKey: options.authKey,
    sessionLifetimeMs: options.sessionLifetimeMs,
    maxAttempts: options.maxAttempts,
    retryBaseMs: options.retryBaseMs,
    fetchImpl: options.fetchImpl,
    now: options.now
  });
}

/**
 * Entry point for the game statistics API: reference data caching, players, matches, the
 * bounty store and server status monitoring.
 */
export class StatsClient implements StatusSource {
  readonly cache: DataCache;
  private readonly requester: ClosableRequester;
  private readonly monitor: StatusMonitor;
  private readonly statusLock = new Mutex();
  private readonly now: () => number;
  private serverStatus: ServerStatus | null = null;

  constructor(private readonly options: StatsClientOptions = {}) {
    this.requester = buildRequester(options);
    this.now = options.now ?? Date.now;
    this.cache = new DataCache(this.requester, {
      enabled: options.cacheEnabled,
      defaultLanguage: options.defaultLanguage,
      ttlMs: options.cacheTtlMs,
      snapshotStore: options.snapshotStore,
      now: this.now
    });
    this.monitor = new StatusMonitor(this);
  }

  get defaultLanguage(): Language {
    return this.cache.defaultLanguage;
  }

  set defaultLanguage(language: Language) {
    this.cache.setDefaultLanguage(language);
  }

  get cachedStatus(): ServerStatus | null {
    return this.serverStatus;
  }

  get monitoring(): boolean {
    return this.monitor.running;
  }

  /** Downloads the reference data for `language` ahead of time. Resolves to whether it succeeded. */
  initialize(language?: Language): Promise<boolean> {
    return this.cache.initialize(language);
  }

  /** Wraps known details into a partial player without any request. */
  wrapPlayer(init: PartialPlayerInit): PartialPlayer {
    return new PartialPlayer(this.cache, init);
  }

  /** API usage of the developer account for the current day. */
  async getDataUsed(): Promise<DataUsed> {
    const response = await this.cache.request("getdataused");
    const [record] = parseRecords(dataUsedSchema, response, "data used").filter((entry) => !entry.ret_msg);
    if (!record) throw new NotFound("Data usage");
    return new DataUsed(record);
  }

  async getServerStatus(options: { forceRefresh?: boolean } = {}): Promise<ServerStatus> {
    const { forceRefresh = false } = options;
    return this.statusLock.runExclusive(async () => {
      const cached = this.serverStatus;
      if (!forceRefresh && cached && this.now() < cached.timestamp.getTime() + SERVER_STATUS_TTL_MS) {
        return cached;
      }

      const apiRecords = await this.fetchApiStatus();
      const pageComponents = await this.fetchPageStatus();
      if (apiRecords.length === 0 && pageComponents === null) {
        if (!cached) throw new NotFound("Server status");
        console.warn("[status] Fetching the server status failed, using the cached one.");
        return cached;
      }

      const status = new ServerStatus(apiRecords, pageComponents, new Date(this.now()));
      this.serverStatus = status;
      return status;
    });
  }

  /**
   * Polls the server status in the background and calls `callback` whenever it changes.
   * Replaces any registered callback; `null` stops the polling.
   */
  registerStatusCallback(callback: StatusCallback | null, options: StatusMonitorOptions = {}): void {
    this.monitor.register(callback, options);
  }

  async getChampionInfo(language?: Language, options: FetchEntryOptions = {}): Promise<CacheEntry> {
    const entry = await this.cache.fetchEntry(language ?? this.defaultLanguage, options);
    if (!entry) throw new NotFound("Champion information");
    return entry;
  }

  /** Fetches a player by id or by name. Names only find players of PC platforms. */
  getPlayer(player: number | string, options?: { returnPrivate?: false }): Promise<Player>;
  getPlayer(player: number | string, options: ReturnPrivateOption): Promise<Player | PartialPlayer>;
  async getPlayer(player: number | string, options: ReturnPrivateOption = {}): Promise<Player | PartialPlayer> {
    const identifier = String(player).trim();
    if (identifier === "" || identifier === "0") throw new NotFound("Player");

    const response = await this.cache.request("getplayer", identifier);
    const message = retMessage(response);
    if (message) {
      const privatePlayer = options.returnPrivate ? privatePlayerFromMessage(this.cache, message) : null;
      if (privatePlayer) return privatePlayer;
      throw new Private();
    }
    const [record] = parseRecords(playerSchema, response, "player");
    if (!record) throw new NotFound("Player");
    return new Player(this.cache, record);
  }

  /** Profiles in the order of `ids`; missing and private ones are left out unless `returnPrivate`. */
  getPlayers(ids: Iterable<number>, options: ReturnPrivateOption = {}): Promise<Array<Player | PartialPlayer>> {
    return fetchPlayerBatch(this.cache, ids, options.returnPrivate ?? false);
  }

  async searchPlayers(name: string, options: SearchPlayersOptions = {}): Promise<PartialPlayer[]> {
    const { platform, exact = true, returnPrivate = false } = options;
    let records: PlayerIdRecord[];

    if (exact && platform !== undefined) {
      const response = PC_PLATFORMS.includes(platform)
        ? await this.cache.request("getplayeridbyname", name)
        : await this.cache.request("getplayeridsbygamertag", platform, name);
      records = parseRecords(playerIdSchema, response, "player id").filter((record) => !record.ret_msg);
    } else {
      const wanted = name.toLowerCase();
      records = parseRecords(playerIdSchema, await this.cache.request("searchplayers", name), "player id")
        .filter((record) => !record.ret_msg)
        // unique account names take priority over console gamer tags
        .map((record) => (record.hz_player_name ? { ...record, Name: record.hz_player_name } : record))
        .filter((record) => !exact || record.Name.toLowerCase() === wanted)
        .filter((record) => platform === undefined || record.portal_id === platform);
    }

    if (!returnPrivate) records = records.filter((record) => record.privacy_flag !== "y");
    if (records.length === 0) throw new NotFound("Player");
    return records.map(
      (record) =>
        new PartialPlayer(this.cache, {
          id: record.player_id,
          name: record.Name,
          platform: record.portal_id,
          isPrivate: record.privacy_flag === "y"
        })
    );
  }

  /** The player linked to a platform account id (Steam id, Discord id, ...). The name stays empty. */
  async getFromPlatform(platformId: number | string, platform: Platform): Promise<PartialPlayer> {
    const response = await this.cache.request("getplayeridbyportaluserid", platform, platformId);
    const record = parseRecords(playerIdSchema, response, "player id").find((candidate) => !candidate.ret_msg);
    if (!record || record.player_id === 0) throw new NotFound("Linked profile");
    return new PartialPlayer(this.cache, {
      id: record.player_id,
      platform: record.portal_id,
      isPrivate: record.privacy_flag === "y"
    });
  }

  async getMatchHistory(player: PartialPlayer | number, language?: Language): Promise<PartialMatch[]> {
    const partial = typeof player === "number" ? this.wrapPlayer({ id: player }) : player;
    if (partial.isPrivate) throw new Private();
    const entry = await this.cache.resolveEntry(language);
    const response = await this.cache.request("getmatchhistory", partial.id);
    if (retMessage(response)) return [];
    return parseRecords(matchHistorySchema, response, "match history").map(
      (record) => new PartialMatch(this.cache, partial, entry, record)
    );
  }

  async getMatch(matchId: number, options: MatchOptions = {}): Promise<Match> {
    const entry = await this.cache.resolveEntry(options.language);
    const records = matchRecords(await this.cache.request("getmatchdetails", matchId));
    if (records.length === 0) throw new NotFound("Match");
    const playerIds = records.map((record) => record.playerId);
    const players = options.expandPlayers ? await fetchPlayers(this.cache, playerIds) : new Map<number, Player>();
    return new Match(this.cache, entry, records, players);
  }

  /** Matches in the order of `matchIds`; ids the API has no details for are left out. */
  async getMatches(matchIds: Iterable<number>, options: MatchOptions = {}): Promise<Match[]> {
    const ids = deduplicate(matchIds);
    if (ids.length === 0) return [];
    const entry = await this.cache.resolveEntry(options.language);
    const players = new Map<number, Player>();
    const matches: Match[] = [];
    for (const idChunk of chunk(ids, MATCH_BATCH_SIZE)) {
      matches.push(...(await this.fetchMatchChunk(idChunk, entry, players, options.expandPlayers ?? false)));
    }
    return matches;
  }

  /**
   * Finished matches of `queue` played between `start` and `end`, oldest first (newest first
   * with `reverse`). Requests are issued lazily as the iteration proceeds.
   */
  async *getMatchesForQueue(queue: Queue | number, options: QueueMatchesOptions): AsyncGenerator<Match> {
    const { start, end, region, reverse = false, expandPlayers = false } = options;
    if (end.getTime() < start.getTime()) return;
    const entry = await this.cache.resolveEntry(options.language);
    const players = new Map<number, Player>();

    for (const [date, hour] of dateWindows(start, end, reverse)) {
      const response = await this.cache.request("getmatchidsbyqueue", queue, date, hour);
      const candidates = parseRecords(queueMatchIdSchema, response, "queue match id")
        .filter((record) => !record.ret_msg && record.Active_Flag === "n")
        .flatMap((record) => {
          const timestamp = parseApiTimestamp(record.Entry_Datetime);
          if (!timestamp) return [];
          const matchRegion = Regions.resolveOr(record.Region, Region.Unknown);
          return [{ id: record.Match, time: timestamp.getTime(), region: matchRegion }];
        })
        .sort((a, b) => (reverse ? b.time - a.time : a.time - b.time));

      const matchIds = candidates
        .filter((candidate) => candidate.time >= start.getTime() && candidate.time <= end.getTime())
        .filter((candidate) => region === undefined || candidate.region === region)
        .map((candidate) => candidate.id);

      for (const idChunk of chunk(matchIds, MATCH_BATCH_SIZE)) {
        yield* await this.fetchMatchChunk(idChunk, entry, players, expandPlayers);
      }
    }
  }

  /** Bounty store items, split into the ones still on sale and the expired ones. */
  async getBounty(language?: Language): Promise<Bounty> {
    const entry = await this.cache.resolveEntry(language);
    const response = await this.cache.request("getbountyitems");
    const items = parseRecords(bountyItemSchema, response, "bounty item").map(
      (record) => new BountyItem(entry, record)
    );
    if (items.length === 0) throw new NotFound("Bounty items");

    // the store lists active items first, latest expiry first
    const firstPast = items.findIndex((item) => !item.active);
    const split = firstPast === -1 ? items.length : firstPast;
    return { active: items.slice(0, split).reverse(), past: items.slice(split) };
  }

  /** Stops status monitoring, closes the transport and drops the cached data. */
  async close(): Promise<void> {
    this.monitor.stop();
    await this.requester.close?.();
    this.cache.clear();
    this.serverStatus = null;
  }

  private async fetchMatchChunk(
    ids: readonly number[],
    entry: CacheEntry,
    players: Map<number, Player>,
    expandPlayers: boolean
  ): Promise<Match[]> {
    const response = await this.cache.request("getmatchdetailsbatch", ids.join(","));
    const records = matchRecords(response);
    const byMatch = groupBy(records, (record) => record.Match);

    if (expandPlayers) {
      const missing = records.map((record) => record.playerId).filter((id) => !players.has(id));
      for (const [id, player] of await fetchPlayers(this.cache, missing)) {
        players.set(id, player);
      }
    }

    const matches: Match[] = [];
    for (const id of ids) {
      const matchRecordsForId = byMatch.get(id);
      if (matchRecordsForId) matches.push(new Match(this.cache, entry, matchRecordsForId, players));
    }
    return matches;
  }

  private async fetchApiStatus(): Promise<ServerStatusRecord[]> {
    try {
      const response = await this.cache.request("gethirezserverstatus");
      if (retMessage(response)) return [];
      return parseRecords(serverStatusSchema, response, "server status");
    } catch (error) {
      if (error instanceof HTTPException || error instanceof Unavailable || error instanceof LimitReached) {
        console.warn("[status] API server status unavailable:", errorMessage(error));
        return [];
      }
      throw error;
    }
  }

  private async fetchPageStatus(): Promise<PageComponent[] | null> {
    const statusPage = this.options.statusPage;
    if (!statusPage) return null;
    try {
      const summary = await statusPage.getStatus();
      return summary.group(this.options.statusPageGroup ?? "Paladins");
    } catch (error) {
      if (error instanceof HTTPException) {
        console.warn("[status] Status page unavailable:", errorMessage(error));
        return null;
      }
      throw error;
    }
  }
}
