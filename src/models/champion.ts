import { AbilityTypes, AbilityType, DeviceType, Rarities, Rarity, type Language } from "../data/enums.js";
import { parseRecords, skinSchema, type AbilityRecord, type ChampionRecord, type SkinRecord } from "../schemas/responses.js";
import type { ApiRequester } from "./cacheClient.js";
import { CacheObject } from "./cacheObject.js";
import type { Device } from "./device.js";
import { Lookup } from "./lookup.js";

export const CHAMPION_CARD_COUNT = 16;
export const CHAMPION_TALENT_COUNT = 3;

const LINE_BREAKS = / ?<br>(?:<br>)? ?/g;

function compareText(left: string, right: string): number {
  if (left < right) return -1;
  return left > right ? 1 : 0;
}

export class Ability extends CacheObject {
  readonly description: string;
  readonly type: AbilityType;
  readonly cooldown: number;
  readonly iconUrl: string;

  constructor(
    readonly champion: Champion,
    record: AbilityRecord
  ) {
    super(record.Id, record.Summary.trim());
    this.description = record.Description.trim().replace(/\r/g, "").replace(LINE_BREAKS, "\n");
    this.type = AbilityTypes.resolveOr(record.damageType, AbilityType.Undefined);
    this.cooldown = record.rechargeSeconds;
    this.iconUrl = record.URL;
  }
}

function skinName(raw: string, champion: Champion): string {
  const name = raw.trim();
  if (!champion.hasName || !name.endsWith(champion.name)) return name;
  return name.slice(0, -champion.name.length).trim();
}

export class Skin extends CacheObject {
  readonly rarity: Rarity;

  constructor(
    readonly champion: Champion,
    record: SkinRecord
  ) {
    super(record.skin_id2, skinName(record.skin_name, champion));
    this.rarity = record.rarity ? Rarities.resolveOr(record.rarity, Rarity.Default) : Rarity.Default;
  }
}

function buildSkins(champion: Champion, records: readonly SkinRecord[]): Lookup<Skin, Skin> {
  const skins = records.map((record) => new Skin(champion, record));
  return Lookup.from(skins.sort((left, right) => left.rarity - right.rarity));
}

/** Cards whose ability could not be resolved go last. */
function cardAbilityKey(card: Device): string {
  const ability = card.ability;
  if (ability === null) return "z";
  return ability instanceof Ability ? ability.name : `z${ability.name}`;
}

export class Champion extends CacheObject {
  readonly title: string;
  readonly role: string;
  readonly iconUrl: string;
  readonly lore: string;
  readonly health: number;
  readonly speed: number;
  readonly abilities: Lookup<Ability, Ability>;
  readonly cards: Lookup<Device, Device>;
  readonly talents: Lookup<Device, Device>;
  skins: Lookup<Skin, Skin>;

  constructor(
    private readonly requester: ApiRequester,
    readonly language: Language,
    record: ChampionRecord,
    devices: readonly Device[],
    skins: readonly SkinRecord[]
  ) {
    super(record.id, record.Name.trim());
    this.title = record.Title;
    this.role = record.Roles.replace(/^\S+\s+/, "").replace("er", "");
    this.iconUrl = record.ChampionIcon_URL;
    this.lore = record.Lore;
    this.health = record.Health;
    this.speed = record.Speed;

    const abilityRecords = [record.Ability_1, record.Ability_2, record.Ability_3, record.Ability_4, record.Ability_5];
    this.abilities = Lookup.from(
      abilityRecords
        .filter((ability): ability is AbilityRecord => ability !== null)
        .map((ability) => new Ability(this, ability))
    );

    const cards: Device[] = [];
    const talents: Device[] = [];
    for (const device of devices) {
      if (device.type === DeviceType.Card) cards.push(device);
      else if (device.type === DeviceType.Talent) talents.push(device);
      device.attachChampion(this, this.abilities);
    }
    talents.sort((left, right) => left.unlockedAt - right.unlockedAt);
    cards.sort((left, right) => compareText(left.name, right.name));
    cards.sort((left, right) => compareText(cardAbilityKey(left), cardAbilityKey(right)));
    this.cards = Lookup.from(cards);
    this.talents = Lookup.from(talents);
    this.skins = buildSkins(this, skins);
  }

  /** A champion is usable only with its full set of cards and talents. */
  isComplete(): boolean {
    return this.cards.size === CHAMPION_CARD_COUNT && this.talents.size === CHAMPION_TALENT_COUNT;
  }

  /** Refetches this champion's skins and replaces `skins` with the result. */
  async getSkins(): Promise<Skin[]> {
    const response = await this.requester.request("getchampionskins", this.id, this.language);
    this.skins = buildSkins(this, parseRecords(skinSchema, response, "skin"));
    return this.skins.toArray();
  }
}
