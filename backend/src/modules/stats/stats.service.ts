import { calendarDay, type Clock } from "../../utils/clock";
import type { ChatRepository } from "../chats/chats.repository";
import type { RankingService } from "../leaderboard/leaderboard.service";
import type { QuestionRepository } from "../questions/questions.repository";
import type { ScoreRepository } from "../scoring/scoring.repository";
import { accuracyPercent, rankTitle, xpOf, type DailyStats, type GlobalStats, type GroupStats } from "../scoring/scoring";

export type StatsReport = {
  stats: GlobalStats;
  wrong: number;
  accuracy: number;
  xp: number;
  title: string;
  globalRank: number;
  groupStats: GroupStats | null;
  groupRank: number | null;
  today: DailyStats | null;
};

export type BotStats = {
  users: number;
  chats: number;
  admins: number;
  questions: number;
  attempts: number;
};

export type StatsDeps = {
  scores: ScoreRepository;
  ranking: RankingService;
  chats: ChatRepository;
  questions: QuestionRepository;
  clock: Clock;
  timeZone: string;
  ownerId: number;
};

export class StatsService {
  constructor(private readonly deps: StatsDeps) {}

  /** `null` when the user has never answered. */
  async getReport(userId: number, groupId: number | null = null): Promise<StatsReport | null> {
    const { scores, ranking } = this.deps;
    const stats = await scores.findGlobalStats(userId);
    if (!stats) return null;

    const day = calendarDay(this.deps.clock.now(), this.deps.timeZone);
    const [globalRank, groupStats, today] = await Promise.all([
      ranking.getRank({ kind: "global" }, stats.score),
      groupId === null ? Promise.resolve(null) : scores.findGroupStats(groupId, userId),
      scores.findDailyStats(userId, day)
    ]);

    const groupRank =
      groupId !== null && groupStats ? await ranking.getRank({ kind: "group", groupId }, groupStats.score) : null;

    const xp = xpOf(stats);
    return {
      stats,
      wrong: stats.attempted - stats.correct,
      accuracy: accuracyPercent(stats),
      xp,
      title: rankTitle(xp),
      globalRank,
      groupStats,
      groupRank,
      today
    };
  }

  async getBotStats(): Promise<BotStats> {
    const { chats, questions, scores } = this.deps;
    const [users, chatCount, admins, questionCount, attempts] = await Promise.all([
      chats.countUsers(),
      chats.countChats(),
      chats.listAdmins(),
      questions.count(),
      scores.totalAttempts()
    ]);
    // the owner is always an admin, stored or not
    const adminCount = new Set([this.deps.ownerId, ...admins]).size;
    return { users, chats: chatCount, admins: adminCount, questions: questionCount, attempts };
  }
}
