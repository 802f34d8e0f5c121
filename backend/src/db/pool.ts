import { Pool, type PoolClient } from "pg";
import { toStoreError } from "../utils/errors";

export function createPgPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString });
  pool.on("error", (err) => {
    // eslint-disable-next-line no-console
    console.error("Unexpected error on idle Postgres client:", err);
  });
  return pool;
}

export async function checkPostgresConnection(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query("SELECT 1");
  } finally {
    client.release();
  }
}

/**
 * BEGIN / COMMIT around `work`; ROLLBACK on any failure.
 * Retryable driver errors surface as TransientStoreError.
 */
export async function withTransaction<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  let client: PoolClient;
  try {
    client = await pool.connect();
  } catch (e) {
    throw toStoreError(e);
  }

  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (e) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      // eslint-disable-next-line no-console
      console.error("ROLLBACK failed:", rollbackError);
    }
    throw toStoreError(e);
  } finally {
    client.release();
  }
}

/** Borrows a client for a few reads without opening a transaction. */
export async function withClient<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  let client: PoolClient;
  try {
    client = await pool.connect();
  } catch (e) {
    throw toStoreError(e);
  }

  try {
    return await work(client);
  } catch (e) {
    throw toStoreError(e);
  } finally {
    client.release();
  }
}

/** Single statement outside a transaction, with the same error mapping. */
export async function runQuery<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (e) {
    throw toStoreError(e);
  }
}
