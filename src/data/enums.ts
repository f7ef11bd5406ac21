export interface EnumRegistry<V extends number> {
  readonly values: readonly V[];
  /** Accepts a value, a numeric string, a member name or an alias; case and `_`/space insensitive. */
  resolve(input: string | number | null | undefined): V | undefined;
  resolveOr(input: string | number | null | undefined, fallback: V): V;
  nameOf(value: number): string | undefined;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[\s_]+/g, "");
}

export function createRegistry<V extends number>(
  members: Readonly<Record<string, V>>,
  aliases: Readonly<Record<string, V>> = {}
): EnumRegistry<V> {
  const byKey = new Map<string, V>();
  const byValue = new Map<number, { value: V; name: string }>();

  for (const [name, value] of Object.entries(members)) {
    byKey.set(normalizeKey(name), value);
    if (!byValue.has(value)) byValue.set(value, { value, name: name.replace(/_/g, " ") });
  }
  for (const [alias, value] of Object.entries(aliases)) {
    byKey.set(normalizeKey(alias), value);
  }

  const values = [...byValue.values()].map((entry) => entry.value);

  const resolve = (input: string | number | null | undefined): V | undefined => {
    if (input === null || input === undefined) return undefined;
    if (typeof input === "number") return byValue.get(input)?.value;
    const trimmed = input.trim();
    if (/^-?\d+$/.test(trimmed)) return byValue.get(Number(trimmed))?.value;
    return byKey.get(normalizeKey(trimmed));
  };

  return Object.freeze({
    values,
    resolve,
    resolveOr: (input: string | number | null | undefined, fallback: V): V => resolve(input) ?? fallback,
    nameOf: (value: number): string | undefined => byValue.get(value)?.name
  });
}

export const Language = {
  English: 1,
  German: 2,
  French: 3,
  Chinese: 5,
  Spanish: 9,
  Portuguese: 10,
  Russian: 11,
  Polish: 12,
  Turkish: 13
} as const;
export type Language = (typeof Language)[keyof typeof Language];

export const Languages = createRegistry<Language>(Language, {
  en: Language.English,
  eng: Language.English,
  de: Language.German,
  ger: Language.German,
  fr: Language.French,
  fre: Language.French,
  zh: Language.Chinese,
  chi: Language.Chinese,
  es: Language.Spanish,
  spa: Language.Spanish,
  pt: Language.Portuguese,
  por: Language.Portuguese,
  ru: Language.Russian,
  rus: Language.Russian,
  pl: Language.Polish,
  pol: Language.Polish,
  tr: Language.Turkish,
  tur: Language.Turkish
});

export const Platform = {
  Unknown: 0,
  PC: 1,
  Steam: 5,
  PS4: 9,
  Xbox: 10,
  Facebook: 12,
  Google: 13,
  Mixer: 14,
  Switch: 22,
  Discord: 25,
  Epic_Games: 28,
  Amazon_Luna: 30
} as const;
export type Platform = (typeof Platform)[keyof typeof Platform];

export const Platforms = createRegistry<Platform>(Platform, {
  hirez: Platform.PC,
  standalone: Platform.PC,
  ps5: Platform.PS4,
  psn: Platform.PS4,
  playstation: Platform.PS4,
  xb: Platform.Xbox,
  xboxlive: Platform.Xbox,
  xboxone: Platform.Xbox,
  xbox1: Platform.Xbox,
  fb: Platform.Facebook,
  nintendo_switch: Platform.Switch,
  epic: Platform.Epic_Games,
  luna: Platform.Amazon_Luna
});

/** Platforms whose players are looked up by account name rather than by gamer tag. */
export const PC_PLATFORMS: readonly Platform[] = [Platform.PC, Platform.Steam, Platform.Discord];

export const Region = {
  Unknown: 0,
  North_America: 1,
  Europe: 2,
  Australia: 3,
  Brazil: 4,
  Latin_America_North: 5,
  Southeast_Asia: 6,
  Japan: 7
} as const;
export type Region = (typeof Region)[keyof typeof Region];

export const Regions = createRegistry<Region>(Region, {
  na: Region.North_America,
  nam: Region.North_America,
  eu: Region.Europe,
  eur: Region.Europe,
  au: Region.Australia,
  aus: Region.Australia,
  oc: Region.Australia,
  oce: Region.Australia,
  oceania: Region.Australia,
  br: Region.Brazil,
  bra: Region.Brazil,
  la: Region.Latin_America_North,
  lan: Region.Latin_America_North,
  latam: Region.Latin_America_North,
  sa: Region.Southeast_Asia,
  sea: Region.Southeast_Asia,
  jp: Region.Japan,
  jpn: Region.Japan
});

export const Queue = {
  Unknown: 0,
  Casual_Siege: 424,
  Training_Siege: 425,
  Shooting_Range: 434,
  Test_Maps: 445,
  Onslaught: 452,
  Training_Onslaught: 453,
  Classic_Team_Deathmatch: 469,
  Custom_Ascension_Peak: 473,
  Ranked: 486,
  Custom_Magistrates_Archives_KotH: 10200,
  Team_Deathmatch: 10296,
  Training_Team_Deathmatch: 10297
} as const;
export type Queue = (typeof Queue)[keyof typeof Queue];

export const Queues = createRegistry<Queue>(Queue, {
  siege: Queue.Casual_Siege,
  casual: Queue.Casual_Siege,
  tdm: Queue.Team_Deathmatch,
  competitive: Queue.Ranked
});

export const DeviceType = {
  Undefined: 0,
  Item: 1,
  Card: 2,
  Talent: 3
} as const;
export type DeviceType = (typeof DeviceType)[keyof typeof DeviceType];

export const Rarity = {
  Default: 0,
  Common: 1,
  Uncommon: 2,
  Rare: 3,
  Epic: 4,
  Legendary: 5,
  Unlimited: 6,
  Limited: 7
} as const;
export type Rarity = (typeof Rarity)[keyof typeof Rarity];

export const Rarities = createRegistry<Rarity>(Rarity);

export const AbilityType = {
  Undefined: 0,
  Direct_Damage: 1,
  Area_Damage: 2
} as const;
export type AbilityType = (typeof AbilityType)[keyof typeof AbilityType];

export const AbilityTypes = createRegistry<AbilityType>(AbilityType, {
  direct: AbilityType.Direct_Damage,
  aoe: AbilityType.Area_Damage
});

export const Activity = {
  Offline: 0,
  In_Lobby: 1,
  Character_Selection: 2,
  In_Match: 3,
  Online: 4,
  Unknown: 5
} as const;
export type Activity = (typeof Activity)[keyof typeof Activity];

export const Activities = createRegistry<Activity>(Activity, {
  god_selection: Activity.Character_Selection
});

export const Rank = {
  Qualifying: 0,
  Bronze_V: 1,
  Bronze_IV: 2,
  Bronze_III: 3,
  Bronze_II: 4,
  Bronze_I: 5,
  Silver_V: 6,
  Silver_IV: 7,
  Silver_III: 8,
  Silver_II: 9,
  Silver_I: 10,
  Gold_V: 11,
  Gold_IV: 12,
  Gold_III: 13,
  Gold_II: 14,
  Gold_I: 15,
  Platinum_V: 16,
  Platinum_IV: 17,
  Platinum_III: 18,
  Platinum_II: 19,
  Platinum_I: 20,
  Diamond_V: 21,
  Diamond_IV: 22,
  Diamond_III: 23,
  Diamond_II: 24,
  Diamond_I: 25,
  Master: 26,
  Grandmaster: 27
} as const;
export type Rank = (typeof Rank)[keyof typeof Rank];

export const Ranks = createRegistry<Rank>(Rank);
