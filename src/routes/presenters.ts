import { AbilityTypes, Languages, Platforms, Queues, Ranks, Regions } from "../data/enums.js";
import type { CacheObject } from "../models/cacheObject.js";
import type { Champion } from "../models/champion.js";
import type { Match, MatchPlayer, PartialMatch } from "../models/match.js";
import { Player, type PartialPlayer, type RankedStats } from "../models/player.js";
import type { PlatformStatus, ServerStatus } from "../models/serverStatus.js";

interface Reference {
  id: number;
  name: string;
}

function ref(object: CacheObject): Reference {
  return object.toJSON();
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function presentServerStatus(status: ServerStatus) {
  return {
    timestamp: status.timestamp.toISOString(),
    status: status.status,
    color: status.color,
    allUp: status.allUp,
    limitedAccess: status.limitedAccess,
    platforms: [...status.statuses.values()].map((platform: PlatformStatus) => ({
      platform: platform.platform,
      status: platform.status,
      up: platform.up,
      limitedAccess: platform.limitedAccess,
      color: platform.color,
      version: platform.version
    }))
  };
}

export function presentChampion(champion: Champion) {
  return {
    id: champion.id,
    name: champion.name,
    title: champion.title,
    role: champion.role,
    language: Languages.nameOf(champion.language) ?? null,
    health: champion.health,
    speed: champion.speed,
    iconUrl: champion.iconUrl,
    complete: champion.isComplete(),
    abilities: champion.abilities.toArray().map((ability) => ({
      ...ref(ability),
      type: AbilityTypes.nameOf(ability.type) ?? null,
      cooldown: ability.cooldown,
      description: ability.description
    })),
    cards: champion.cards.toArray().map(ref),
    talents: champion.talents.toArray().map(ref),
    skins: champion.skins.toArray().length
  };
}

function presentRanked(stats: RankedStats) {
  return {
    mode: stats.mode,
    rank: Ranks.nameOf(stats.rank) ?? null,
    wins: stats.wins,
    losses: stats.losses,
    leaves: stats.leaves,
    points: stats.points,
    season: stats.season
  };
}

export function presentPartialPlayer(player: PartialPlayer) {
  return {
    id: player.id,
    name: player.name,
    platform: Platforms.nameOf(player.platform) ?? null,
    private: player.isPrivate
  };
}

export function presentPlayer(player: PartialPlayer) {
  if (!(player instanceof Player)) return presentPartialPlayer(player);
  return {
    ...presentPartialPlayer(player),
    level: player.level,
    title: player.title,
    region: Regions.nameOf(player.region) ?? null,
    createdAt: iso(player.createdAt),
    lastLogin: iso(player.lastLogin),
    playtimeMinutes: player.playtimeMinutes,
    championCount: player.championCount,
    totalAchievements: player.totalAchievements,
    totalExperience: player.totalExperience,
    rankedKeyboard: presentRanked(player.rankedKeyboard),
    rankedController: presentRanked(player.rankedController)
  };
}

export function presentPartialMatch(match: PartialMatch) {
  return {
    id: match.id,
    queue: Queues.nameOf(match.queue) ?? null,
    queueId: match.queueId,
    region: Regions.nameOf(match.region) ?? null,
    timestamp: iso(match.timestamp),
    durationSeconds: match.durationSeconds,
    map: match.mapName,
    champion: ref(match.champion),
    kills: match.kills,
    deaths: match.deaths,
    assists: match.assists,
    credits: match.credits,
    winner: match.winner
  };
}

function presentMatchPlayer(matchPlayer: MatchPlayer) {
  return {
    player: presentPlayer(matchPlayer.player),
    champion: ref(matchPlayer.champion),
    skin: ref(matchPlayer.skin),
    rank: matchPlayer.rank === null ? null : Ranks.nameOf(matchPlayer.rank) ?? null,
    accountLevel: matchPlayer.accountLevel,
    kills: matchPlayer.kills,
    deaths: matchPlayer.deaths,
    assists: matchPlayer.assists,
    damageDone: matchPlayer.damageDone,
    healingDone: matchPlayer.healingDone,
    credits: matchPlayer.credits,
    party: matchPlayer.partyNumber,
    winner: matchPlayer.winner
  };
}

export function presentMatch(match: Match) {
  return {
    id: match.id,
    queue: Queues.nameOf(match.queue) ?? null,
    queueId: match.queueId,
    region: Regions.nameOf(match.region) ?? null,
    timestamp: iso(match.timestamp),
    durationSeconds: match.durationSeconds,
    map: match.mapName,
    score: match.score,
    winningTeam: match.winningTeam,
    replayAvailable: match.replayAvailable,
    bans: match.bans.map((ban) => (ban ? ref(ban) : null)),
    team1: match.team1.map(presentMatchPlayer),
    team2: match.team2.map(presentMatchPlayer)
  };
}
