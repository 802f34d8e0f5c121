import dotenv from "dotenv";
dotenv.config();

import { createApp } from "./app";
import { getEnv } from "./config/env";
import { buildServices, createPgRepositories } from "./container";
import { checkPostgresConnection, createPgPool } from "./db/pool";
import { runMigrations } from "./db/migrate";
import { TelegramGateway } from "./modules/telegram/telegram.client";
import { checkRedisConnection, createRedis, RedisSnapshotCache } from "./redis/client";
import { Scheduler } from "./scheduler/scheduler";
import { systemClock } from "./utils/clock";

async function main() {
  const env = getEnv();

  const pool = createPgPool(env.DATABASE_URL);
  const redis = createRedis(env.REDIS_URL);

  // Fail fast if dependencies are not reachable.
  await checkPostgresConnection(pool);
  await checkRedisConnection(redis);
  await runMigrations(pool);

  const gateway = new TelegramGateway({ token: env.TELEGRAM_BOT_TOKEN, apiBase: env.TELEGRAM_API_BASE });
  if (env.TELEGRAM_WEBHOOK_URL) {
    await gateway.setWebhook(env.TELEGRAM_WEBHOOK_URL, env.TELEGRAM_WEBHOOK_SECRET);
  }

  const services = await buildServices({
    repos: createPgRepositories(pool),
    cache: new RedisSnapshotCache(redis),
    gateway,
    clock: systemClock,
    config: env
  });

  const scheduler = new Scheduler(
    {
      periodicQuiz: () => services.quiz.triggerPeriodicQuiz(),
      dailyDigest: () => services.quiz.triggerDailyDigest()
    },
    {
      settings: services.settings,
      clock: systemClock,
      timeZone: env.APP_TIMEZONE,
      digestTime: env.DIGEST_TIME,
      tickMs: env.SCHEDULER_TICK_MS
    }
  );

  const app = createApp(services, { corsOrigin: env.CORS_ORIGIN, webhookSecret: env.TELEGRAM_WEBHOOK_SECRET });
  const server = app.listen(env.PORT, () => {
    // eslint-disable-next-line no-console
    console.log(`Quiz bot backend listening on :${env.PORT}`);
  });
  scheduler.start();

  const shutdown = (signal: string) => {
    // eslint-disable-next-line no-console
    console.log(`${signal} received, shutting down`);
    server.close();
    scheduler
      .stop()
      .then(() => Promise.all([pool.end(), redis.quit()]))
      .then(() => process.exit(0))
      .catch((err) => {
        // eslint-disable-next-line no-console
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
