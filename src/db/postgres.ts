import { Pool, type PoolClient } from "pg";

let poolInstance: Pool | null = null;

export async function withClient<T>(pool: Pool, handler: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await handler(client);
  } finally {
    client.release();
  }
}

export async function getPostgresPool(connectionString: string): Promise<Pool> {
  if (poolInstance) return poolInstance;

  const pool = new Pool({
    connectionString,
    ssl: connectionString.includes("localhost") ? false : { rejectUnauthorized: false }
  });

  await withClient(pool, async (client) => {
    await client.query(`
      CREATE TABLE IF NOT EXISTS reference_snapshots (
        language INTEGER PRIMARY KEY,
        payload JSONB NOT NULL,
        fetched_at TIMESTAMPTZ NOT NULL,
        expires_at BIGINT NOT NULL
      );
    `);
    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_reference_snapshots_expires
        ON reference_snapshots (expires_at);
    `);
  });

  poolInstance = pool;
  console.log("[db] Connected to the Postgres snapshot store.");
  return poolInstance;
}

export async function closePostgresPool(): Promise<void> {
  if (!poolInstance) return;
  const pool = poolInstance;
  poolInstance = null;
  await pool.end();
}
