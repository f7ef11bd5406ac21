import fs from "node:fs/promises";
import path from "node:path";
import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";

const IN_MEMORY = ":memory:";

let dbInstance: Database | null = null;

/** Opens a database and makes sure the snapshot table exists. */
export async function openDatabase(filename: string): Promise<Database> {
  let target = filename;
  if (filename !== IN_MEMORY) {
    target = path.isAbsolute(filename) ? filename : path.resolve(process.cwd(), filename);
    await fs.mkdir(path.dirname(target), { recursive: true });
  }

  const db = await open({
    filename: target,
    driver: sqlite3.Database
  });

  await db.exec(`
    CREATE TABLE IF NOT EXISTS reference_snapshots (
      language INTEGER PRIMARY KEY,
      payload TEXT NOT NULL,
      fetched_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_reference_snapshots_expires_at
      ON reference_snapshots (expires_at);
  `);

  return db;
}

export async function getDatabase(filename: string): Promise<Database> {
  if (dbInstance) return dbInstance;
  dbInstance = await openDatabase(filename);
  console.log(`[db] Opened sqlite snapshot store at ${filename}`);
  return dbInstance;
}

export async function closeDatabase(): Promise<void> {
  if (!dbInstance) return;
  const db = dbInstance;
  dbInstance = null;
  await db.close();
}
