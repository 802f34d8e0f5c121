/** Creates the schema and seeds default settings. Safe to run repeatedly. */

import dotenv from "dotenv";
import type { Pool } from "pg";
import { getEnv } from "../config/env";
import { PgSettingsRepository } from "../modules/settings/settings.repository";
import { SETTING_DEFAULTS } from "../modules/settings/settings.service";
import { createPgPool } from "./pool";
import { SCHEMA_SQL } from "./schema";

export async function runMigrations(pool: Pool): Promise<void> {
  // eslint-disable-next-line no-console
  console.log("Running database migrations...");
  await pool.query(SCHEMA_SQL);
  await new PgSettingsRepository(pool).seedDefaults(SETTING_DEFAULTS);
  // eslint-disable-next-line no-console
  console.log("Migrations complete.");
}

// Allow running directly: tsx backend/src/db/migrate.ts
if (require.main === module) {
  dotenv.config();
  const pool = createPgPool(getEnv().DATABASE_URL);
  runMigrations(pool)
    .then(() => pool.end())
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error("Migration failed:", err);
      process.exit(1);
    });
}
