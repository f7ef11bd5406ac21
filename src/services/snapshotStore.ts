import { z } from "zod";
import { Languages, type Language } from "../data/enums.js";
import type { ReferenceSnapshot } from "../models/cacheEntry.js";

export interface StoredSnapshot {
  snapshot: ReferenceSnapshot;
  expiresAtMs: number;
}

/** Persists raw reference snapshots so a restarted process can skip the initial download. */
export interface SnapshotStore {
  /** The stored snapshot for `language`, or `null` when there is none or it has expired. */
  get(language: Language, nowMs?: number): Promise<StoredSnapshot | null>;
  upsert(snapshot: ReferenceSnapshot, expiresAtMs: number): Promise<void>;
  pruneExpired(nowMs?: number): Promise<number>;
}

const languageSchema = z.number().transform((value, ctx): Language => {
  const language = Languages.resolve(value);
  if (language === undefined) {
    ctx.addIssue({ code: "custom", message: `Unknown language ${value}` });
    return z.NEVER;
  }
  return language;
});

export const referenceSnapshotSchema = z.object({
  language: languageSchema,
  champions: z.array(z.unknown()),
  items: z.array(z.unknown()),
  skins: z.array(z.unknown()),
  fetchedAt: z.number()
});

/** Validates a persisted payload; a corrupt row reads as missing. */
export function parseStoredSnapshot(payload: unknown, expiresAtMs: number): StoredSnapshot | null {
  const parsed = referenceSnapshotSchema.safeParse(payload);
  if (!parsed.success) {
    console.warn("[snapshot-store] Ignoring malformed snapshot:", parsed.error.issues[0]?.message);
    return null;
  }
  return { snapshot: parsed.data, expiresAtMs };
}
