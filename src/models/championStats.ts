import type { ChampionStatsRecord } from "../schemas/responses.js";
import { parseApiTimestamp } from "../utils/timestamp.js";
import type { CacheEntry } from "./cacheEntry.js";
import type { CacheObject } from "./cacheObject.js";
import type { Champion } from "./champion.js";

/**
 * A player's totals on one champion, either across all queues (`queueId` is `null`) or
 * within a single queue.
 */
export class ChampionStats {
  readonly champion: Champion | CacheObject;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly wins: number;
  readonly losses: number;
  /** Champion mastery level; only reported for stats across all queues. */
  readonly level: number;
  readonly experience: number;
  readonly playtimeMinutes: number;
  readonly lastPlayed: Date | null;
  readonly queueId: number | null;

  constructor(entry: CacheEntry, record: ChampionStatsRecord, queueId: number | null = null) {
    this.champion = entry.champions.cacheObject(
      record.champion_id || record.ChampionId,
      record.champion || record.Champion
    );
    this.kills = record.Kills;
    this.deaths = record.Deaths;
    this.assists = record.Assists;
    this.wins = record.Wins;
    this.losses = record.Losses;
    this.level = record.Rank;
    this.experience = record.Worshippers;
    this.playtimeMinutes = record.Minutes;
    this.lastPlayed = parseApiTimestamp(record.LastPlayed);
    this.queueId = queueId;
  }

  get matches(): number {
    return this.wins + this.losses;
  }

  get winRate(): number {
    return this.matches > 0 ? this.wins / this.matches : 0;
  }

  /** `(kills + assists / 2) / deaths`, with deaths floored at 1. */
  get kda(): number {
    return (this.kills + this.assists / 2) / Math.max(this.deaths, 1);
  }
}
