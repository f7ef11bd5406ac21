import { Activities, Activity, Platform, Platforms, Rank, Ranks, Region, Regions, type Language } from "../data/enums.js";
import {
  championStatsSchema,
  friendSchema,
  loadoutSchema,
  parseRecords,
  playerSchema,
  playerStatusSchema,
  type PlayerRecord,
  type PlayerStatusRecord,
  type RankedRecord
} from "../schemas/responses.js";
import { chunk, deduplicate } from "../utils/collections.js";
import { NotFound, Private } from "../utils/errors.js";
import { parseApiTimestamp } from "../utils/timestamp.js";
import type { CacheClient } from "./cacheClient.js";
import type { CacheObject } from "./cacheObject.js";
import type { Champion } from "./champion.js";
import { ChampionStats } from "./championStats.js";
import { Expandable } from "./expandable.js";
import { Loadout } from "./loadout.js";
import { Lookup, LookupGroup } from "./lookup.js";
import { fetchLiveMatch, type LiveMatch, type MatchFetchOptions } from "./match.js";

export const PLAYER_BATCH_SIZE = 20;

const PRIVATE_PLAYER = /playerIdType=([0-9]{1,2}); playerId=([0-9]+)/;
const PRIVATE_BATCH_PLAYER = /playerId=([0-9]+)/;

export interface PartialPlayerInit {
  id: number;
  name?: string;
  platform?: string | number;
  isPrivate?: boolean;
}

export interface FriendList {
  friends: PartialPlayer[];
  blocked: PartialPlayer[];
}

export interface ChampionStatsOptions {
  language?: Language;
  /** Restricts the stats to one queue; omitted means totals across all queues. */
  queue?: number;
}

/**
 * A player known only by id (and maybe name and platform). `expand()` fetches the full
 * profile; the other accessors work straight from the id.
 */
export class PartialPlayer extends Expandable<Player> {
  readonly id: number;
  readonly name: string;
  readonly platform: Platform;
  private readonly privateProfile: boolean;

  constructor(
    protected readonly client: CacheClient,
    init: PartialPlayerInit
  ) {
    super();
    this.id = init.id;
    this.name = init.name ?? "";
    this.platform = Platforms.resolveOr(init.platform, Platform.Unknown);
    this.privateProfile = init.isPrivate ?? false;
  }

  /** Private profiles, and players without an id, cannot be queried. */
  get isPrivate(): boolean {
    return this.privateProfile || this.id === 0;
  }

  equals(other: PartialPlayer): boolean {
    return this.id !== 0 && other.id !== 0 && this.id === other.id;
  }

  private assertAccessible(): void {
    if (this.isPrivate) throw new Private();
  }

  async expand(): Promise<Player> {
    this.assertAccessible();
    const response = await this.client.request("getplayer", this.id);
    const [record] = parseRecords(playerSchema, response, "player");
    if (!record) throw new NotFound("Player");
    if (record.ret_msg) throw new Private();
    return new Player(this.client, record);
  }

  async getStatus(): Promise<PlayerStatus> {
    this.assertAccessible();
    const response = await this.client.request("getplayerstatus", this.id);
    const [record] = parseRecords(playerStatusSchema, response, "player status");
    if (!record || record.status === Activity.Unknown) throw new NotFound("Player status");
    return new PlayerStatus(this.client, this, record);
  }

  async getFriends(): Promise<FriendList> {
    this.assertAccessible();
    const response = await this.client.request("getfriends", this.id);
    const records = parseRecords(friendSchema, response, "friend");
    const toPlayer = (record: (typeof records)[number]): PartialPlayer =>
      new PartialPlayer(this.client, { id: record.player_id, name: record.name, platform: record.portal_id });
    return {
      friends: records.filter((record) => record.friend_flags === "1").map(toPlayer),
      blocked: records.filter((record) => record.friend_flags === "32").map(toPlayer)
    };
  }

  async getLoadouts(language?: Language): Promise<LookupGroup<Champion | CacheObject, Loadout>> {
    this.assertAccessible();
    const entry = await this.client.resolveEntry(language);
    const response = await this.client.request("getplayerloadouts", this.id, entry.language);
    const loadouts = parseRecords(loadoutSchema, response, "loadout")
      .filter((record) => record.playerId !== 0 && !record.ret_msg)
      .map((record) => new Loadout(this, entry, record));
    return new LookupGroup(loadouts, (loadout) => loadout.champion);
  }

  async getChampionStats(options: ChampionStatsOptions = {}): Promise<Lookup<Champion | CacheObject, ChampionStats>> {
    this.assertAccessible();
    const entry = await this.client.resolveEntry(options.language);
    const response =
      options.queue === undefined
        ? await this.client.request("getgodranks", this.id)
        : await this.client.request("getqueuestats", this.id, options.queue);
    const stats = parseRecords(championStatsSchema, response, "champion stats")
      .filter((record) => !record.ret_msg)
      .map((record) => new ChampionStats(entry, record, options.queue ?? null));
    return new Lookup(stats, (entryStats) => entryStats.champion);
  }
}

export interface RankedStats {
  mode: "Keyboard" | "Controller";
  rank: Rank;
  wins: number;
  losses: number;
  leaves: number;
  points: number;
  season: number;
}

function rankedStats(mode: RankedStats["mode"], record: RankedRecord | null): RankedStats {
  return {
    mode,
    rank: Ranks.resolveOr(record?.Tier, Rank.Qualifying),
    wins: record?.Wins ?? 0,
    losses: record?.Losses ?? 0,
    leaves: record?.Leaves ?? 0,
    points: record?.Points ?? 0,
    season: record?.Season ?? 0
  };
}

export class Player extends PartialPlayer {
  readonly activePlayer: PartialPlayer | null;
  readonly level: number;
  readonly title: string;
  readonly region: Region;
  readonly createdAt: Date | null;
  readonly lastLogin: Date | null;
  readonly playtimeMinutes: number;
  readonly championCount: number;
  readonly totalAchievements: number;
  readonly totalExperience: number;
  readonly rankedKeyboard: RankedStats;
  readonly rankedController: RankedStats;

  constructor(client: CacheClient, record: PlayerRecord) {
    super(client, {
      id: record.Id,
      name: record.hz_player_name || record.hz_gamer_tag || record.Name,
      platform: record.Platform
    });
    this.activePlayer =
      record.ActivePlayerId && record.ActivePlayerId !== record.Id
        ? new PartialPlayer(client, { id: record.ActivePlayerId })
        : null;
    this.level = record.Level;
    this.title = record.Title ?? "";
    this.region = Regions.resolveOr(record.Region, Region.Unknown);
    this.createdAt = parseApiTimestamp(record.Created_Datetime);
    this.lastLogin = parseApiTimestamp(record.Last_Login_Datetime);
    this.playtimeMinutes = record.MinutesPlayed;
    this.championCount = record.MasteryLevel;
    this.totalAchievements = record.Total_Achievements;
    this.totalExperience = record.Total_XP;
    this.rankedKeyboard = rankedStats("Keyboard", record.RankedKBM);
    this.rankedController = rankedStats("Controller", record.RankedController);
  }

  /** Already a full profile. */
  override async expand(): Promise<Player> {
    return this;
  }
}

export class PlayerStatus {
  readonly activity: Activity;
  readonly queueId: number;
  readonly matchId: number;
  readonly message: string;

  constructor(
    private readonly client: CacheClient,
    readonly player: PartialPlayer,
    record: PlayerStatusRecord
  ) {
    this.activity = Activities.resolveOr(record.status, Activity.Unknown);
    this.queueId = record.match_queue_id;
    this.matchId = record.Match;
    this.message = record.personal_status_message;
  }

  get inMatch(): boolean {
    return this.activity === Activity.In_Match && this.matchId !== 0;
  }

  /** Details of the match the player is in; `null` when they are not in one. */
  async getLiveMatch(options: MatchFetchOptions = {}): Promise<LiveMatch | null> {
    if (!this.inMatch) return null;
    return fetchLiveMatch(this.client, this.matchId, options);
  }
}

/** The private profile a `getplayer` error message refers to, if it names one. */
export function privatePlayerFromMessage(client: CacheClient, message: string): PartialPlayer | null {
  const match = PRIVATE_PLAYER.exec(message);
  if (!match) return null;
  return new PartialPlayer(client, { id: Number(match[2]), platform: Number(match[1]), isPrivate: true });
}

/**
 * Fetches full profiles in batches of 20, in the order of the (deduplicated) ids.
 * Private profiles are skipped, or returned as private partial players with `returnPrivate`.
 */
export async function fetchPlayerBatch(
  client: CacheClient,
  ids: Iterable<number>,
  returnPrivate = false
): Promise<Array<Player | PartialPlayer>> {
  const results: Array<Player | PartialPlayer> = [];
  for (const idChunk of chunk(deduplicate(ids, 0), PLAYER_BATCH_SIZE)) {
    const response = await client.request("getplayerbatch", idChunk.join(","));
    const found = new Map<number, Player | PartialPlayer>();
    for (const record of parseRecords(playerSchema, response, "player")) {
      if (!record.ret_msg) {
        found.set(record.Id, new Player(client, record));
        continue;
      }
      const match = returnPrivate ? PRIVATE_BATCH_PLAYER.exec(record.ret_msg) : null;
      if (match) {
        const id = Number(match[1]);
        found.set(id, new PartialPlayer(client, { id, isPrivate: true }));
      }
    }
    for (const id of idChunk) {
      const player = found.get(id);
      if (player) results.push(player);
    }
  }
  return results;
}

export async function fetchPlayers(client: CacheClient, ids: Iterable<number>): Promise<Map<number, Player>> {
  const players = new Map<number, Player>();
  for (const player of await fetchPlayerBatch(client, ids)) {
    if (player instanceof Player) players.set(player.id, player);
  }
  return players;
}
