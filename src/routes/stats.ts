import { Router, type Response } from "express";
import type { Champion } from "../models/champion.js";
import {
  championsQuerySchema,
  historyQuerySchema,
  matchParamsSchema,
  matchQuerySchema,
  playerParamsSchema,
  statusQuerySchema
} from "../schemas/api.js";
import type { StatsClient } from "../services/statsClient.js";
import { errorMessage, LimitReached, NotFound, Private, Unavailable } from "../utils/errors.js";
import {
  presentChampion,
  presentMatch,
  presentPartialMatch,
  presentPlayer,
  presentServerStatus
} from "./presenters.js";

function statusFor(error: unknown): number {
  if (error instanceof NotFound) return 404;
  if (error instanceof Private) return 403;
  if (error instanceof LimitReached) return 429;
  if (error instanceof Unavailable) return 503;
  return 500;
}

function sendError(res: Response, error: unknown, description: string): Response {
  const status = statusFor(error);
  if (status === 500) console.error(`[server] ${description}`, error);
  return res.status(status).json({
    error: description,
    message: errorMessage(error)
  });
}

function playerKey(player: string): number | string {
  return /^\d+$/.test(player) ? Number(player) : player;
}

interface CreateStatsRouterOptions {
  client: StatsClient;
}

export function createStatsRouter(options: CreateStatsRouterOptions): Router {
  const { client } = options;
  const router = Router();

  router.get("/status", async (req, res) => {
    const parseQuery = statusQuerySchema.safeParse(req.query);
    if (!parseQuery.success) {
      return res.status(400).json({ error: "Invalid query.", details: parseQuery.error.flatten() });
    }
    try {
      const status = await client.getServerStatus({ forceRefresh: parseQuery.data.refresh ?? false });
      return res.json(presentServerStatus(status));
    } catch (error) {
      return sendError(res, error, "Failed to load the server status.");
    }
  });

  router.get("/champions", async (req, res) => {
    const parseQuery = championsQuerySchema.safeParse(req.query);
    if (!parseQuery.success) {
      return res.status(400).json({ error: "Invalid query.", details: parseQuery.error.flatten() });
    }
    const { language, q, limit } = parseQuery.data;
    try {
      const entry = await client.getChampionInfo(language);
      const champions: Champion[] = q
        ? entry.champions.getFuzzyMatches(q, { limit })
        : entry.champions.toArray();
      return res.json({
        language: entry.language,
        expiresAt: new Date(entry.expiresAt).toISOString(),
        champions: champions.map(presentChampion)
      });
    } catch (error) {
      return sendError(res, error, "Failed to load champions.");
    }
  });

  router.get("/players/:player", async (req, res) => {
    const parseParams = playerParamsSchema.safeParse(req.params);
    if (!parseParams.success) {
      return res.status(400).json({ error: "Invalid player.", details: parseParams.error.flatten() });
    }
    try {
      const player = await client.getPlayer(playerKey(parseParams.data.player), { returnPrivate: true });
      return res.json(presentPlayer(player));
    } catch (error) {
      return sendError(res, error, "Failed to load the player.");
    }
  });

  router.get("/players/:player/history", async (req, res) => {
    const parseParams = playerParamsSchema.safeParse(req.params);
    const parseQuery = historyQuerySchema.safeParse(req.query);
    if (!parseParams.success || !parseQuery.success) {
      return res.status(400).json({ error: "Invalid player or query." });
    }
    try {
      const key = playerKey(parseParams.data.player);
      const player = typeof key === "number" ? client.wrapPlayer({ id: key }) : await client.getPlayer(key);
      const history = await client.getMatchHistory(player, parseQuery.data.language);
      return res.json({ player: player.id, matches: history.map(presentPartialMatch) });
    } catch (error) {
      return sendError(res, error, "Failed to load the match history.");
    }
  });

  router.get("/matches/:matchId", async (req, res) => {
    const parseParams = matchParamsSchema.safeParse(req.params);
    const parseQuery = matchQuerySchema.safeParse(req.query);
    if (!parseParams.success || !parseQuery.success) {
      return res.status(400).json({ error: "Invalid match id or query." });
    }
    try {
      const match = await client.getMatch(parseParams.data.matchId, {
        language: parseQuery.data.language,
        expandPlayers: parseQuery.data.expandPlayers ?? false
      });
      return res.json(presentMatch(match));
    } catch (error) {
      return sendError(res, error, "Failed to load the match.");
    }
  });

  return router;
}
