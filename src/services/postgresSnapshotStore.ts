import type { Pool } from "pg";
import type { Language } from "../data/enums.js";
import type { ReferenceSnapshot } from "../models/cacheEntry.js";
import { parseStoredSnapshot, type SnapshotStore, type StoredSnapshot } from "./snapshotStore.js";

interface SnapshotRow {
  payload: unknown;
  expires_at: string | number;
}

export class PostgresSnapshotStore implements SnapshotStore {
  constructor(private readonly pool: Pool) {}

  async get(language: Language, nowMs = Date.now()): Promise<StoredSnapshot | null> {
    const result = await this.pool.query<SnapshotRow>(
      `
        SELECT payload, expires_at
        FROM reference_snapshots
        WHERE language = $1 AND expires_at > $2
        LIMIT 1
      `,
      [language, nowMs]
    );
    const row = result.rows[0];
    if (!row) return null;
    return parseStoredSnapshot(row.payload, Number(row.expires_at));
  }

  async upsert(snapshot: ReferenceSnapshot, expiresAtMs: number): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO reference_snapshots (language, payload, fetched_at, expires_at)
        VALUES ($1, $2::jsonb, $3::timestamptz, $4)
        ON CONFLICT (language)
        DO UPDATE SET
          payload = EXCLUDED.payload,
          fetched_at = EXCLUDED.fetched_at,
          expires_at = EXCLUDED.expires_at
      `,
      [snapshot.language, JSON.stringify(snapshot), new Date(snapshot.fetchedAt).toISOString(), expiresAtMs]
    );
  }

  async pruneExpired(nowMs = Date.now()): Promise<number> {
    const result = await this.pool.query(`DELETE FROM reference_snapshots WHERE expires_at <= $1`, [nowMs]);
    return result.rowCount ?? 0;
  }
}
