import { z } from "zod";
import { Languages, type Language } from "../data/enums.js";

const languageParam = z
  .string()
  .trim()
  .min(1)
  .transform((value, ctx): Language => {
    const language = Languages.resolve(value);
    if (language === undefined) {
      ctx.addIssue({ code: "custom", message: `Unknown language "${value}".` });
      return z.NEVER;
    }
    return language;
  });

const flagParam = z.enum(["true", "false"]).transform((value) => value === "true");

export const statusQuerySchema = z.object({
  refresh: flagParam.optional()
});

export const championsQuerySchema = z.object({
  language: languageParam.optional(),
  q: z.string().trim().min(1).max(60).optional(),
  limit: z.coerce.number().int().min(1).max(20).default(3)
});

export const playerParamsSchema = z.object({
  player: z.string().trim().min(1).max(64)
});

export const historyQuerySchema = z.object({
  language: languageParam.optional()
});

export const matchParamsSchema = z.object({
  matchId: z.coerce.number().int().positive()
});

export const matchQuerySchema = z.object({
  language: languageParam.optional(),
  expandPlayers: flagParam.optional()
});
