import type { BountyItemRecord } from "../schemas/responses.js";
import { parseApiTimestamp } from "../utils/timestamp.js";
import type { CacheEntry } from "./cacheEntry.js";
import { CacheObject } from "./cacheObject.js";
import type { Champion } from "./champion.js";

export type BountySaleType = "Increasing" | "Decreasing";

/** A bounty store deal. `finalPrice` is unknown (`null`) while a deal is still running. */
export class BountyItem {
  readonly active: boolean;
  readonly item: CacheObject;
  readonly champion: Champion | CacheObject;
  readonly expires: Date | null;
  readonly saleType: BountySaleType;
  readonly initialPrice: number;
  readonly finalPrice: number | null;

  constructor(entry: CacheEntry, record: BountyItemRecord) {
    this.active = record.active === "y";
    this.item = new CacheObject(record.bounty_item_id2, record.bounty_item_name.trim());
    this.champion = entry.champions.cacheObject(record.champion_id, record.champion_name);
    this.expires = parseApiTimestamp(record.sale_end_datetime);
    this.saleType = record.sale_type === "Decreasing" ? "Decreasing" : "Increasing";
    this.initialPrice = record.initial_price;
    this.finalPrice = /^\d+$/.test(record.final_price) ? Number(record.final_price) : null;
  }
}
