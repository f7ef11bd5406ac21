import { DeviceType } from "../data/enums.js";
import type { DeviceRecord } from "../schemas/responses.js";
import { CacheObject } from "./cacheObject.js";
import type { Ability, Champion } from "./champion.js";
import type { Lookup } from "./lookup.js";

const ABILITY_PREFIX = /^\[([^\]]+)\]\s*/;

export function deviceTypeOf(itemType: string): DeviceType {
  if (/talent/i.test(itemType)) return DeviceType.Talent;
  if (/card/i.test(itemType)) return DeviceType.Card;
  if (/shop|consumable|item/i.test(itemType)) return DeviceType.Item;
  return DeviceType.Undefined;
}

/** A card, talent or shop item. */
export class Device extends CacheObject {
  readonly type: DeviceType;
  readonly description: string;
  readonly shortDescription: string;
  readonly championId: number;
  /** Account level or champion level the talent unlocks at; 0 for other devices. */
  readonly unlockedAt: number;
  readonly cooldown: number;
  readonly price: number;
  readonly iconUrl: string;
  private readonly abilityName: string | null;
  private attachedChampion: Champion | CacheObject | null = null;
  private attachedAbility: Ability | CacheObject | null = null;

  constructor(record: DeviceRecord) {
    super(record.ItemId, record.DeviceName.trim());
    this.type = deviceTypeOf(record.item_type);
    this.championId = record.champion_id;
    this.unlockedAt = record.talent_reward_level;
    this.cooldown = record.recharge_seconds;
    this.price = record.Price;
    this.iconUrl = record.itemIcon_URL;
    this.shortDescription = record.ShortDesc.trim();

    const description = record.Description.trim();
    const prefix = ABILITY_PREFIX.exec(description);
    this.abilityName = this.type === DeviceType.Card && prefix ? prefix[1].trim() : null;
    this.description = prefix ? description.slice(prefix[0].length) : description;
  }

  get champion(): Champion | CacheObject | null {
    return this.attachedChampion;
  }

  /** The ability a card modifies, when its description names one. */
  get ability(): Ability | CacheObject | null {
    return this.attachedAbility;
  }

  attachChampion(champion: Champion | CacheObject, abilities?: Lookup<Ability, Ability>): void {
    this.attachedChampion = champion;
    if (this.abilityName !== null) {
      this.attachedAbility = abilities ? abilities.cacheObject(undefined, this.abilityName) : new CacheObject(0, this.abilityName);
    }
  }
}
