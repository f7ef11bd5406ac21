import cors from "cors";
import express, { type Express } from "express";
import { createStatsRouter } from "./routes/stats.js";
import type { StatsClient } from "./services/statsClient.js";

export interface CreateAppOptions {
  client: StatsClient;
  corsOrigin?: string;
}

export function createApp(options: CreateAppOptions): Express {
  const { client, corsOrigin = "*" } = options;
  const app = express();
  app.use(
    cors({
      origin: corsOrigin === "*" ? true : corsOrigin
    })
  );
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      service: "game-stats-client",
      cacheEnabled: client.cache.enabled,
      monitoring: client.monitoring
    });
  });

  app.use("/api", createStatsRouter({ client }));
  return app;
}
