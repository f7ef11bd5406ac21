import { Queue, Queues, Rank, Ranks, Region, Regions, type Language } from "../data/enums.js";
import {
  livePlayerSchema,
  matchPlayerSchema,
  parseRecords,
  type LivePlayerRecord,
  type MatchHistoryRecord,
  type MatchPlayerRecord
} from "../schemas/responses.js";
import { NotFound } from "../utils/errors.js";
import { parseApiTimestamp } from "../utils/timestamp.js";
import type { CacheClient } from "./cacheClient.js";
import type { CacheEntry } from "./cacheEntry.js";
import type { CacheObject } from "./cacheObject.js";
import type { Champion, Skin } from "./champion.js";
import { Expandable } from "./expandable.js";
import { fetchPlayers, PartialPlayer, type Player } from "./player.js";

export const MATCH_BATCH_SIZE = 10;

export interface MatchFetchOptions {
  language?: Language;
  /** Replace partial players with full profiles, at the cost of extra requests. */
  expandPlayers?: boolean;
}

const MAP_PREFIXES = ["LIVE", "Ranked", "Practice", "WIP"];
const MAP_SUFFIXES = ["(Siege)", "(Onslaught)", "(TDM)", "(KOTH)"];

/** Strips mode prefixes and suffixes: `"LIVE Frog Isle (Onslaught)"` becomes `"Frog Isle"`. */
export function convertMapName(raw: string): string {
  let name = raw.trim();
  const prefix = MAP_PREFIXES.find((candidate) => name.startsWith(candidate));
  if (prefix) name = name.slice(prefix.length);
  const suffix = MAP_SUFFIXES.find((candidate) => name.endsWith(candidate));
  if (suffix) name = name.slice(0, -suffix.length);
  return name.trim();
}

/** Records of a match-details response that describe a player, i.e. carry no error message. */
export function matchRecords(response: unknown): MatchPlayerRecord[] {
  return parseRecords(matchPlayerSchema, response, "match player").filter((record) => !record.ret_msg);
}

/**
 * Party numbers: ids seen once are solo (0), ids seen again get 1, 2, ... in order of
 * their second appearance.
 */
function assignParties(records: readonly MatchPlayerRecord[]): Map<number, number> {
  let next = 1;
  const parties = new Map<number, number>();
  for (const record of records) {
    const partyId = record.PartyId;
    if (!partyId) continue;
    const assigned = parties.get(partyId);
    if (assigned === undefined) {
      parties.set(partyId, 0);
    } else if (assigned === 0) {
      parties.set(partyId, next);
      next += 1;
    }
  }
  return parties;
}

export class MatchPlayer {
  player: PartialPlayer | Player;
  readonly champion: Champion | CacheObject;
  readonly skin: Skin | CacheObject;
  readonly rank: Rank | null;
  readonly accountLevel: number;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly damageDone: number;
  readonly healingDone: number;
  readonly credits: number;
  readonly winner: boolean;
  readonly team: number;
  readonly partyNumber: number;

  constructor(
    client: CacheClient,
    entry: CacheEntry,
    record: MatchPlayerRecord,
    parties: ReadonlyMap<number, number>,
    players: ReadonlyMap<number, Player>
  ) {
    this.player =
      players.get(record.playerId) ??
      new PartialPlayer(client, { id: record.playerId, name: record.playerName, platform: record.playerPortalId });
    this.champion = entry.champions.cacheObject(record.ChampionId, record.Reference_Name);
    this.skin = entry.skins.cacheObject(record.SkinId, record.Skin);
    this.rank = record.League_Tier ? Ranks.resolve(record.League_Tier) ?? null : null;
    this.accountLevel = record.Account_Level;
    this.kills = record.Kills_Player;
    this.deaths = record.Deaths;
    this.assists = record.Assists;
    this.damageDone = record.Damage_Player;
    this.healingDone = record.Healing;
    this.credits = record.Gold_Earned;
    this.winner = record.Win_Status === "Winner";
    this.team = record.TaskForce;
    this.partyNumber = parties.get(record.PartyId) ?? 0;
  }
}

export class Match {
  readonly id: number;
  readonly queueId: number;
  readonly queue: Queue;
  readonly region: Region;
  readonly timestamp: Date | null;
  readonly durationSeconds: number;
  readonly mapName: string;
  readonly score: readonly [number, number];
  readonly winningTeam: number;
  readonly replayAvailable: boolean;
  /** Ranked bans in pick order; `null` marks a skipped ban. Empty outside ranked. */
  readonly bans: Array<Champion | CacheObject | null> = [];
  readonly team1: MatchPlayer[] = [];
  readonly team2: MatchPlayer[] = [];

  constructor(
    private readonly client: CacheClient,
    entry: CacheEntry,
    records: readonly MatchPlayerRecord[],
    players: ReadonlyMap<number, Player> = new Map()
  ) {
    const [first] = records;
    if (!first) throw new NotFound("Match");

    this.id = first.Match;
    this.queueId = first.match_queue_id;
    this.queue = Queues.resolveOr(first.match_queue_id, Queue.Unknown);
    this.region = Regions.resolveOr(first.Region, Region.Unknown);
    this.timestamp = parseApiTimestamp(first.Entry_Datetime);
    this.durationSeconds = first.Time_In_Match_Seconds;
    this.mapName = convertMapName(first.Map_Game);
    this.score = [first.Team1Score, first.Team2Score];
    this.winningTeam = first.Winning_TaskForce;
    this.replayAvailable = first.hasReplay === "y";

    if (this.queue === Queue.Ranked) {
      const bans: Array<[number, string]> = [
        [first.BanId1, first.Ban_1],
        [first.BanId2, first.Ban_2],
        [first.BanId3, first.Ban_3],
        [first.BanId4, first.Ban_4]
      ];
      for (const [banId, banName] of bans) {
        this.bans.push(banId ? entry.champions.cacheObject(banId, banName) : null);
      }
    }

    const parties = assignParties(records);
    for (const record of records) {
      const matchPlayer = new MatchPlayer(client, entry, record, parties, players);
      if (record.TaskForce === 1) this.team1.push(matchPlayer);
      else if (record.TaskForce === 2) this.team2.push(matchPlayer);
    }
  }

  get players(): MatchPlayer[] {
    return [...this.team1, ...this.team2];
  }

  /** Replaces partial players with full profiles where they are available. */
  async expandPlayers(): Promise<void> {
    const players = await fetchPlayers(
      this.client,
      this.players.map((matchPlayer) => matchPlayer.player.id)
    );
    for (const matchPlayer of this.players) {
      const player = players.get(matchPlayer.player.id);
      if (player) matchPlayer.player = player;
    }
  }
}

/** A match as it appears in a player's match history, from that player's point of view. */
export class PartialMatch extends Expandable<Match> {
  readonly id: number;
  readonly language: Language;
  readonly champion: Champion | CacheObject;
  readonly skin: Skin | CacheObject;
  readonly queueId: number;
  readonly queue: Queue;
  readonly region: Region;
  readonly timestamp: Date | null;
  readonly durationSeconds: number;
  readonly mapName: string;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly credits: number;
  readonly winner: boolean;

  constructor(
    private readonly client: CacheClient,
    readonly player: PartialPlayer,
    entry: CacheEntry,
    record: MatchHistoryRecord
  ) {
    super();
    this.id = record.Match;
    this.language = entry.language;
    this.champion = entry.champions.cacheObject(record.ChampionId, record.Champion);
    this.skin = entry.skins.cacheObject(record.SkinId, record.Skin);
    this.queueId = record.Match_Queue_Id;
    this.queue = Queues.resolveOr(record.Match_Queue_Id, Queue.Unknown);
    this.region = Regions.resolveOr(record.Region, Region.Unknown);
    this.timestamp = parseApiTimestamp(record.Match_Time);
    this.durationSeconds = record.Time_In_Match_Seconds;
    this.mapName = convertMapName(record.Map_Game);
    this.kills = record.Kills;
    this.deaths = record.Deaths;
    this.assists = record.Assists;
    this.credits = record.Gold;
    this.winner = record.Win_Status === "Win";
  }

  async expand(): Promise<Match> {
    const records = matchRecords(await this.client.request("getmatchdetails", this.id));
    if (records.length === 0) throw new NotFound("Match");
    const entry = await this.client.resolveEntry(this.language);
    return new Match(this.client, entry, records);
  }
}

export class LivePlayer {
  player: PartialPlayer | Player;
  readonly champion: Champion | CacheObject;
  readonly skin: Skin | CacheObject;
  /** Only reported for ranked matches. */
  readonly rank: Rank | null;
  readonly accountLevel: number;
  readonly masteryLevel: number;
  readonly wins: number;
  readonly losses: number;

  constructor(
    client: CacheClient,
    readonly match: LiveMatch,
    entry: CacheEntry,
    record: LivePlayerRecord,
    players: ReadonlyMap<number, Player>
  ) {
    this.player =
      players.get(record.playerId) ??
      new PartialPlayer(client, { id: record.playerId, name: record.playerName, platform: record.playerPortalId });
    this.champion = entry.champions.cacheObject(record.ChampionId, record.ChampionName);
    this.skin = entry.skins.cacheObject(record.SkinId, record.Skin);
    this.rank = match.queue === Queue.Ranked ? Ranks.resolveOr(record.Tier, Rank.Qualifying) : null;
    this.accountLevel = record.Account_Level;
    this.masteryLevel = record.Mastery_Level;
    this.wins = record.tierWins;
    this.losses = record.tierLosses;
  }

  get winRate(): number {
    const matches = this.wins + this.losses;
    return matches > 0 ? this.wins / matches : 0;
  }
}

/** A match still being played, as reported for a player that is in it. */
export class LiveMatch {
  readonly id: number;
  readonly queueId: number;
  readonly queue: Queue;
  readonly region: Region;
  readonly mapName: string;
  readonly team1: LivePlayer[] = [];
  readonly team2: LivePlayer[] = [];

  constructor(
    private readonly client: CacheClient,
    entry: CacheEntry,
    records: readonly LivePlayerRecord[],
    players: ReadonlyMap<number, Player> = new Map()
  ) {
    const [first] = records;
    if (!first) throw new NotFound("Live match");

    this.id = first.Match;
    this.queueId = first.Queue;
    this.queue = Queues.resolveOr(first.Queue, Queue.Unknown);
    this.region = Regions.resolveOr(first.playerRegion, Region.Unknown);
    this.mapName = convertMapName(first.mapGame);

    for (const record of records) {
      const livePlayer = new LivePlayer(client, this, entry, record, players);
      if (record.taskForce === 1) this.team1.push(livePlayer);
      else if (record.taskForce === 2) this.team2.push(livePlayer);
    }
  }

  get players(): LivePlayer[] {
    return [...this.team1, ...this.team2];
  }

  async expandPlayers(): Promise<void> {
    const players = await fetchPlayers(
      this.client,
      this.players.map((livePlayer) => livePlayer.player.id)
    );
    for (const livePlayer of this.players) {
      const player = players.get(livePlayer.player.id);
      if (player) livePlayer.player = player;
    }
  }
}

/** Live match details for `matchId`, or `null` once the match is no longer running. */
export async function fetchLiveMatch(
  client: CacheClient,
  matchId: number,
  options: MatchFetchOptions = {}
): Promise<LiveMatch | null> {
  const entry = await client.resolveEntry(options.language);
  const response = await client.request("getmatchplayerdetails", matchId);
  const records = parseRecords(livePlayerSchema, response, "live player").filter((record) => !record.ret_msg);
  if (records.length === 0) return null;
  const players = options.expandPlayers
    ? await fetchPlayers(client, records.map((record) => record.playerId))
    : new Map<number, Player>();
  return new LiveMatch(client, entry, records, players);
}
