import type { Pool } from "pg";
import type { Env } from "./config/env";
import { AdminService } from "./modules/chats/admins.service";
import { PgChatRepository, type ChatRepository } from "./modules/chats/chats.repository";
import { PgComplimentRepository, type ComplimentRepository } from "./modules/compliments/compliments.repository";
import { ComplimentService } from "./modules/compliments/compliments.service";
import { PgLeaderboardRepository, type LeaderboardRepository } from "./modules/leaderboard/leaderboard.repository";
import { RankingService } from "./modules/leaderboard/leaderboard.service";
import type { MessagingGateway } from "./modules/messaging/messaging.gateway";
import { PgPollRepository, type PollRepository } from "./modules/polls/polls.repository";
import { PollTrackingService } from "./modules/polls/polls.service";
import { PgQuestionRepository, type QuestionRepository } from "./modules/questions/questions.repository";
import { QuestionService } from "./modules/questions/questions.service";
import { QuizService } from "./modules/quiz/quiz.service";
import { PgScoreRepository, type ScoreRepository } from "./modules/scoring/scoring.repository";
import { ScoringEngine } from "./modules/scoring/scoring.service";
import { PgSettingsRepository, type SettingsRepository } from "./modules/settings/settings.repository";
import { SettingsStore } from "./modules/settings/settings.service";
import { StatsService } from "./modules/stats/stats.service";
import { TelegramBot } from "./modules/telegram/telegram.commands";
import type { SnapshotCache } from "./redis/client";
import type { Clock } from "./utils/clock";

export type Repositories = {
  scores: ScoreRepository;
  questions: QuestionRepository;
  polls: PollRepository;
  leaderboard: LeaderboardRepository;
  chats: ChatRepository;
  compliments: ComplimentRepository;
  settings: SettingsRepository;
};

export type ServiceConfig = Pick<
  Env,
  | "OWNER_ID"
  | "APP_TIMEZONE"
  | "LEADERBOARD_CACHE_TTL_SECONDS"
  | "STORE_RETRY_ATTEMPTS"
  | "STORE_RETRY_DELAY_MS"
  | "DISPATCH_DELAY_MS"
  | "POLL_RETENTION_DAYS"
>;

export type Services = {
  settings: SettingsStore;
  scoring: ScoringEngine;
  questions: QuestionService;
  polls: PollTrackingService;
  ranking: RankingService;
  stats: StatsService;
  admins: AdminService;
  compliments: ComplimentService;
  quiz: QuizService;
  bot: TelegramBot;
};

export function createPgRepositories(pool: Pool): Repositories {
  return {
    scores: new PgScoreRepository(pool),
    questions: new PgQuestionRepository(pool),
    polls: new PgPollRepository(pool),
    leaderboard: new PgLeaderboardRepository(pool),
    chats: new PgChatRepository(pool),
    compliments: new PgComplimentRepository(pool),
    settings: new PgSettingsRepository(pool)
  };
}

export async function buildServices(deps: {
  repos: Repositories;
  cache: SnapshotCache;
  gateway: MessagingGateway;
  clock: Clock;
  config: ServiceConfig;
}): Promise<Services> {
  const { repos, cache, gateway, clock, config } = deps;
  const retry = { attempts: config.STORE_RETRY_ATTEMPTS, delayMs: config.STORE_RETRY_DELAY_MS };

  const settings = await SettingsStore.load(repos.settings);
  const scoring = new ScoringEngine(repos.scores, { clock, timeZone: config.APP_TIMEZONE, retry });
  const questions = new QuestionService(repos.questions, retry);
  const polls = new PollTrackingService(repos.polls, clock, retry);
  const ranking = new RankingService(repos.leaderboard, cache, config.LEADERBOARD_CACHE_TTL_SECONDS);
  const admins = new AdminService(repos.chats, config.OWNER_ID);
  const compliments = new ComplimentService(repos.compliments);
  const stats = new StatsService({
    scores: repos.scores,
    ranking,
    chats: repos.chats,
    questions: repos.questions,
    clock,
    timeZone: config.APP_TIMEZONE,
    ownerId: config.OWNER_ID
  });
  const quiz = new QuizService({
    questions,
    polls,
    scoring,
    ranking,
    chats: repos.chats,
    compliments,
    settings,
    gateway,
    dispatchDelayMs: config.DISPATCH_DELAY_MS,
    pollRetentionDays: config.POLL_RETENTION_DAYS
  });
  const bot = new TelegramBot({
    quiz,
    questions,
    admins,
    compliments,
    settings,
    ranking,
    stats,
    chats: repos.chats,
    gateway
  });

  return { settings, scoring, questions, polls, ranking, stats, admins, compliments, quiz, bot };
}
