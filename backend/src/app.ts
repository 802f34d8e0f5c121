import express from "express";
import cors from "cors";
import type { Services } from "./container";
import { createQuizRouter, createPollsRouter } from "./modules/quiz/quiz.routes";
import { createLeaderboardRouter } from "./modules/leaderboard/leaderboard.routes";
import { createStatsRouter } from "./modules/stats/stats.routes";
import { createSettingsRouter } from "./modules/settings/settings.routes";
import { createTelegramRouter } from "./modules/telegram/telegram.routes";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";

export type AppOptions = {
  corsOrigin: string;
  webhookSecret?: string;
};

export function createApp(services: Services, options: AppOptions) {
  const app = express();

  app.use(cors({ origin: options.corsOrigin }));
  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use("/v1/polls", createPollsRouter(services.quiz));
  app.use("/v1/quiz", createQuizRouter(services.quiz));
  app.use("/v1/leaderboard", createLeaderboardRouter(services.ranking));
  app.use("/v1/stats", createStatsRouter(services.stats));
  app.use("/v1/settings", createSettingsRouter(services.settings));
  app.use("/v1/telegram", createTelegramRouter(services.bot, options.webhookSecret));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
