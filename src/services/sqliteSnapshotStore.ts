import type { Database } from "sqlite";
import type { Language } from "../data/enums.js";
import type { ReferenceSnapshot } from "../models/cacheEntry.js";
import { parseStoredSnapshot, type SnapshotStore, type StoredSnapshot } from "./snapshotStore.js";

interface SnapshotRow {
  payload: string;
  expires_at: number;
}

export class SqliteSnapshotStore implements SnapshotStore {
  constructor(private readonly db: Database) {}

  async get(language: Language, nowMs = Date.now()): Promise<StoredSnapshot | null> {
    const row = await this.db.get<SnapshotRow>(
      `
        SELECT payload, expires_at
        FROM reference_snapshots
        WHERE language = ? AND expires_at > ?
        LIMIT 1
      `,
      [language, nowMs]
    );
    if (!row) return null;

    let payload: unknown;
    try {
      payload = JSON.parse(row.payload);
    } catch (error) {
      console.warn(`[snapshot-store] Snapshot for language ${language} is not valid JSON:`, String(error));
      return null;
    }
    return parseStoredSnapshot(payload, row.expires_at);
  }

  async upsert(snapshot: ReferenceSnapshot, expiresAtMs: number): Promise<void> {
    await this.db.run(
      `
        INSERT INTO reference_snapshots (language, payload, fetched_at, expires_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(language)
        DO UPDATE SET
          payload = excluded.payload,
          fetched_at = excluded.fetched_at,
          expires_at = excluded.expires_at
      `,
      [snapshot.language, JSON.stringify(snapshot), snapshot.fetchedAt, expiresAtMs]
    );
  }

  async pruneExpired(nowMs = Date.now()): Promise<number> {
    const result = await this.db.run(`DELETE FROM reference_snapshots WHERE expires_at <= ?`, [nowMs]);
    return result.changes ?? 0;
  }
}
