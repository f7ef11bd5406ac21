import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const booleanFlag = (fallback: "true" | "false") =>
  z.enum(["true", "false"]).optional().default(fallback).transform((v) => v === "true");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default("*"),
  STATS_API_URL: z.string().url().default("https://api.paladins.com/paladinsapi.svc"),
  STATS_DEV_ID: z.coerce.number().int().positive().optional(),
  STATS_AUTH_KEY: z.string().min(8).optional(),
  STATUS_PAGE_URL: z.string().url().default("https://status.hirezstudios.com"),
  STATUS_PAGE_GROUP: z.string().min(1).default("Paladins"),
  CACHE_ENABLED: booleanFlag("true"),
  DEFAULT_LANGUAGE: z.string().default("english"),
  CACHE_TTL_HOURS: z.coerce.number().positive().default(12),
  SESSION_LIFETIME_MINUTES: z.coerce.number().int().positive().default(15),
  REQUEST_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  REQUEST_RETRY_BASE_MS: z.coerce.number().int().positive().default(500),
  STATUS_CHECK_INTERVAL_SECONDS: z.coerce.number().int().positive().default(180),
  STATUS_RECHECK_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  STATUS_MONITOR_ENABLED: booleanFlag("false"),
  SNAPSHOT_STORE: z.enum(["none", "sqlite", "postgres"]).default("none"),
  DATABASE_URL: z.string().url().optional(),
  SNAPSHOT_DB_PATH: z.string().min(1).default("./data/game-stats.db"),
  WARM_LANGUAGES: z
    .string()
    .default("english")
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    )
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
  throw new Error("Environment variable validation failed.");
}

export const env = parsed.data;
