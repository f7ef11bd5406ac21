import { DeviceType, type Language } from "../data/enums.js";
import { championSchema, deviceSchema, parseRecords, skinSchema, type SkinRecord } from "../schemas/responses.js";
import { groupBy } from "../utils/collections.js";
import type { ApiRequester } from "./cacheClient.js";
import { Champion, type Ability, type Skin } from "./champion.js";
import { Device } from "./device.js";
import { Lookup } from "./lookup.js";

/** Raw reference data for one language, as downloaded or as persisted by a snapshot store. */
export interface ReferenceSnapshot {
  language: Language;
  champions: unknown[];
  items: unknown[];
  skins: unknown[];
  fetchedAt: number;
}

export interface CacheEntryTimes {
  createdAt: number;
  expiresAt: number;
}

/**
 * One language's reference data. Built once from a snapshot and replaced as a whole on
 * refresh; the only later change is a champion swapping its own skins.
 */
export class CacheEntry {
  readonly champions: Lookup<Champion, Champion>;
  readonly devices: Lookup<Device, Device>;
  readonly items: Lookup<Device, Device>;
  readonly cards: Lookup<Device, Device>;
  readonly talents: Lookup<Device, Device>;
  readonly abilities: Lookup<Ability, Ability>;
  readonly skins: Lookup<Skin, Skin>;
  readonly createdAt: number;
  readonly expiresAt: number;

  constructor(
    requester: ApiRequester,
    readonly language: Language,
    snapshot: ReferenceSnapshot,
    times: CacheEntryTimes
  ) {
    this.createdAt = times.createdAt;
    this.expiresAt = times.expiresAt;

    const devices = parseRecords(deviceSchema, snapshot.items, "device").map((record) => new Device(record));
    const devicesByChampion = groupBy(devices, (device) => device.championId);
    const skinsByChampion = groupBy<SkinRecord, number>(
      parseRecords(skinSchema, snapshot.skins, "skin"),
      (record) => record.champion_id
    );

    this.champions = Lookup.from(
      parseRecords(championSchema, snapshot.champions, "champion").map(
        (record) =>
          new Champion(
            requester,
            language,
            record,
            devicesByChampion.get(record.id) ?? [],
            skinsByChampion.get(record.id) ?? []
          )
      )
    );

    for (const device of devices) {
      if (device.championId > 0 && device.champion === null) {
        device.attachChampion(this.champions.cacheObject(device.championId));
      }
    }

    this.devices = Lookup.from(devices);
    this.items = Lookup.from(devices.filter((device) => device.type === DeviceType.Item));
    this.cards = Lookup.from(devices.filter((device) => device.type === DeviceType.Card));
    this.talents = Lookup.from(devices.filter((device) => device.type === DeviceType.Talent));
    this.abilities = Lookup.from(this.champions.toArray().flatMap((champion) => champion.abilities.toArray()));
    this.skins = Lookup.from(this.champions.toArray().flatMap((champion) => champion.skins.toArray()));
  }

  /** Entry with empty lookups; every reference resolved through it becomes a stand-in. */
  static empty(requester: ApiRequester, language: Language): CacheEntry {
    return new CacheEntry(
      requester,
      language,
      { language, champions: [], items: [], skins: [], fetchedAt: 0 },
      { createdAt: 0, expiresAt: 0 }
    );
  }

  /** True when every champion has its full set of cards and talents. */
  get complete(): boolean {
    return this.champions.toArray().every((champion) => champion.isComplete());
  }

  isFresh(nowMs: number): boolean {
    return nowMs < this.expiresAt;
  }
}
