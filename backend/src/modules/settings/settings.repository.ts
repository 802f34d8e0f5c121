import type { Pool } from "pg";
import { runQuery, withTransaction } from "../../db/pool";

export interface SettingsRepository {
  loadAll(): Promise<Map<string, string>>;
  put(values: Record<string, string>): Promise<void>;
  /** Inserts missing keys only; existing values are kept. */
  seedDefaults(defaults: Record<string, string>): Promise<void>;
}

type SettingRow = {
  key: string;
  value: string;
};

export class PgSettingsRepository implements SettingsRepository {
  constructor(private readonly pool: Pool) {}

  async loadAll(): Promise<Map<string, string>> {
    const { rows } = await runQuery(() => this.pool.query<SettingRow>(`SELECT key, value FROM settings`));
    return new Map(rows.map((r) => [r.key, r.value]));
  }

  async put(values: Record<string, string>): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      for (const [key, value] of Object.entries(values)) {
        await client.query(
          `INSERT INTO settings (key, value)
           VALUES ($1, $2)
           ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`,
          [key, value]
        );
      }
    });
  }

  async seedDefaults(defaults: Record<string, string>): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      for (const [key, value] of Object.entries(defaults)) {
        await client.query(
          `INSERT INTO settings (key, value)
           VALUES ($1, $2)
           ON CONFLICT (key) DO NOTHING`,
          [key, value]
        );
      }
    });
  }
}
