import { z } from "zod";

const int = z.coerce.number().catch(0);
const text = z.string().catch("");
const flag = z.string().catch("n");
const retMsg = z.string().nullable().catch(null);
const numericText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .catch("");

export const sessionResponseSchema = z.looseObject({
  ret_msg: retMsg,
  session_id: z.string().min(1).optional().catch(undefined)
});

export const abilitySchema = z.looseObject({
  Id: int,
  Summary: text,
  Description: text,
  damageType: text,
  rechargeSeconds: int,
  URL: text
});
export type AbilityRecord = z.infer<typeof abilitySchema>;

const maybeAbility = abilitySchema.nullable().catch(null);

export const championSchema = z.looseObject({
  id: z.coerce.number().int().positive(),
  Name: z.string().min(1),
  Title: text,
  Roles: text,
  ChampionIcon_URL: text,
  Lore: text,
  Health: int,
  Speed: int,
  Ability_1: maybeAbility,
  Ability_2: maybeAbility,
  Ability_3: maybeAbility,
  Ability_4: maybeAbility,
  Ability_5: maybeAbility,
  ret_msg: retMsg
});
export type ChampionRecord = z.infer<typeof championSchema>;

export const deviceSchema = z.looseObject({
  ItemId: z.coerce.number().int().positive(),
  DeviceName: text,
  Description: text,
  ShortDesc: text,
  item_type: text,
  champion_id: int,
  talent_reward_level: int,
  recharge_seconds: int,
  Price: int,
  itemIcon_URL: text,
  ret_msg: retMsg
});
export type DeviceRecord = z.infer<typeof deviceSchema>;

export const skinSchema = z.looseObject({
  champion_id: int,
  champion_name: text,
  skin_id1: int,
  skin_id2: int,
  skin_name: text,
  rarity: text,
  ret_msg: retMsg
});
export type SkinRecord = z.infer<typeof skinSchema>;

const rankedSchema = z
  .looseObject({
    Tier: int,
    Wins: int,
    Losses: int,
    Leaves: int,
    Points: int,
    Season: int
  })
  .nullable()
  .catch(null);
export type RankedRecord = NonNullable<z.infer<typeof rankedSchema>>;

export const playerSchema = z.looseObject({
  Id: int,
  ActivePlayerId: int,
  Name: text,
  hz_player_name: z.string().nullable().catch(null),
  hz_gamer_tag: z.string().nullable().catch(null),
  Platform: text,
  Region: text,
  Level: int,
  Title: z.string().nullable().catch(null),
  Created_Datetime: z.string().nullable().catch(null),
  Last_Login_Datetime: z.string().nullable().catch(null),
  MinutesPlayed: int,
  MasteryLevel: int,
  Total_Achievements: int,
  Total_XP: int,
  RankedKBM: rankedSchema,
  RankedController: rankedSchema,
  ret_msg: retMsg
});
export type PlayerRecord = z.infer<typeof playerSchema>;

export const playerStatusSchema = z.looseObject({
  Match: int,
  match_queue_id: int,
  personal_status_message: text,
  status: int,
  status_string: text,
  ret_msg: retMsg
});
export type PlayerStatusRecord = z.infer<typeof playerStatusSchema>;

export const friendSchema = z.looseObject({
  player_id: int,
  name: text,
  portal_id: int,
  friend_flags: text
});

export const playerIdSchema = z.looseObject({
  player_id: int,
  portal_id: int,
  Name: text,
  hz_player_name: z.string().nullable().catch(null),
  privacy_flag: flag,
  ret_msg: retMsg
});
export type PlayerIdRecord = z.infer<typeof playerIdSchema>;

export const loadoutSchema = z.looseObject({
  playerId: int,
  playerName: text,
  ChampionId: int,
  ChampionName: text,
  DeckId: int,
  DeckName: text,
  LoadoutItems: z
    .array(
      z.looseObject({
        ItemId: int,
        ItemName: text,
        Points: int
      })
    )
    .catch([]),
  ret_msg: retMsg
});
export type LoadoutRecord = z.infer<typeof loadoutSchema>;

export const championStatsSchema = z.looseObject({
  champion_id: int,
  ChampionId: int,
  champion: text,
  Champion: text,
  Kills: int,
  Deaths: int,
  Assists: int,
  Wins: int,
  Losses: int,
  Rank: int,
  Worshippers: int,
  Minutes: int,
  LastPlayed: z.string().nullable().catch(null),
  ret_msg: retMsg
});
export type ChampionStatsRecord = z.infer<typeof championStatsSchema>;

export const matchHistorySchema = z.looseObject({
  Match: int,
  ChampionId: int,
  Champion: text,
  SkinId: int,
  Skin: text,
  Kills: int,
  Deaths: int,
  Assists: int,
  Gold: int,
  Map_Game: text,
  Match_Time: text,
  Match_Queue_Id: int,
  Region: text,
  Time_In_Match_Seconds: int,
  Win_Status: text,
  ret_msg: retMsg
});
export type MatchHistoryRecord = z.infer<typeof matchHistorySchema>;

export const matchPlayerSchema = z.looseObject({
  Match: int,
  Entry_Datetime: text,
  Map_Game: text,
  match_queue_id: int,
  Region: text,
  Time_In_Match_Seconds: int,
  Team1Score: int,
  Team2Score: int,
  Winning_TaskForce: int,
  hasReplay: flag,
  TaskForce: int,
  PartyId: int,
  playerId: int,
  playerName: text,
  playerPortalId: int,
  ChampionId: int,
  Reference_Name: text,
  SkinId: int,
  Skin: text,
  League_Tier: int,
  Account_Level: int,
  Kills_Player: int,
  Deaths: int,
  Assists: int,
  Damage_Player: int,
  Healing: int,
  Gold_Earned: int,
  Win_Status: text,
  BanId1: int,
  BanId2: int,
  BanId3: int,
  BanId4: int,
  Ban_1: text,
  Ban_2: text,
  Ban_3: text,
  Ban_4: text,
  ret_msg: retMsg
});
export type MatchPlayerRecord = z.infer<typeof matchPlayerSchema>;

export const livePlayerSchema = z.looseObject({
  Match: int,
  Queue: int,
  mapGame: text,
  playerRegion: text,
  taskForce: int,
  playerId: int,
  playerName: text,
  playerPortalId: int,
  ChampionId: int,
  ChampionName: text,
  SkinId: int,
  Skin: text,
  Tier: int,
  tierWins: int,
  tierLosses: int,
  Account_Level: int,
  Mastery_Level: int,
  ret_msg: retMsg
});
export type LivePlayerRecord = z.infer<typeof livePlayerSchema>;

export const queueMatchIdSchema = z.looseObject({
  Match: int,
  Active_Flag: flag,
  Entry_Datetime: text,
  Region: text,
  ret_msg: retMsg
});
export type QueueMatchIdRecord = z.infer<typeof queueMatchIdSchema>;

export const bountyItemSchema = z.looseObject({
  active: flag,
  bounty_item_id2: int,
  bounty_item_name: text,
  champion_id: int,
  champion_name: text,
  sale_end_datetime: text,
  sale_type: text,
  initial_price: int,
  final_price: numericText
});
export type BountyItemRecord = z.infer<typeof bountyItemSchema>;

export const dataUsedSchema = z.looseObject({
  Active_Sessions: int,
  Concurrent_Sessions: int,
  Request_Limit_Daily: int,
  Session_Cap: int,
  Session_Time_Limit: int,
  Total_Requests_Today: int,
  Total_Sessions_Today: int,
  ret_msg: retMsg
});
export type DataUsedRecord = z.infer<typeof dataUsedSchema>;

export const serverStatusSchema = z.looseObject({
  environment: text,
  platform: text,
  status: text,
  limited_access: z.boolean().catch(false),
  version: text,
  entry_datetime: text,
  ret_msg: retMsg
});
export type ServerStatusRecord = z.infer<typeof serverStatusSchema>;

/**
 * Parses every record of an array response that matches `schema`. Non-array responses
 * yield nothing; malformed records are dropped with a warning.
 */
export function parseRecords<S extends z.ZodType>(schema: S, raw: unknown, context: string): Array<z.output<S>> {
  if (!Array.isArray(raw)) return [];
  const records: Array<z.output<S>> = [];
  for (const entry of raw) {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      console.warn(`[responses] Dropping malformed ${context} record:`, parsed.error.issues[0]?.message);
    }
  }
  return records;
}

/** Error message of the first record of a response, if there is one. */
export function retMessage(raw: unknown): string | null {
  const first: unknown = Array.isArray(raw) ? raw[0] : raw;
  if (typeof first !== "object" || first === null || !("ret_msg" in first)) return null;
  const message = first.ret_msg;
  return typeof message === "string" && message.length > 0 ? message : null;
}
