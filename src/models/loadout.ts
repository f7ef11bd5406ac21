import type { LoadoutRecord } from "../schemas/responses.js";
import type { CacheEntry } from "./cacheEntry.js";
import { CacheObject } from "./cacheObject.js";
import type { Champion } from "./champion.js";
import type { Device } from "./device.js";
import type { PartialPlayer } from "./player.js";

export interface LoadoutCard {
  card: Device | CacheObject;
  points: number;
}

/** A named deck of cards a player built for one champion. */
export class Loadout extends CacheObject {
  readonly champion: Champion | CacheObject;
  readonly cards: LoadoutCard[];

  constructor(
    readonly player: PartialPlayer,
    entry: CacheEntry,
    record: LoadoutRecord
  ) {
    super(record.DeckId, record.DeckName.trim());
    this.champion = entry.champions.cacheObject(record.ChampionId, record.ChampionName);
    this.cards = record.LoadoutItems.map((item) => ({
      card: entry.cards.cacheObject(item.ItemId, item.ItemName),
      points: item.Points
    })).sort((left, right) => right.points - left.points);
  }
}
