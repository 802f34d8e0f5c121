import { setTimeout as sleep } from "timers/promises";
import { GatewayError } from "../../utils/errors";
import type { ChatRepository } from "../chats/chats.repository";
import type { ComplimentService } from "../compliments/compliments.service";
import type { RankingService } from "../leaderboard/leaderboard.service";
import { applyFooter, NO_QUESTIONS_TEXT, renderAnnouncement, renderDailyDigest } from "../messaging/messages";
import type { MessagingGateway, OutgoingPoll } from "../messaging/messaging.gateway";
import type { PollTrackingService } from "../polls/polls.service";
import { parseAnswerKey } from "../questions/answerKey";
import type { Question } from "../questions/questions.repository";
import type { QuestionService } from "../questions/questions.service";
import type { ScoringEngine } from "../scoring/scoring.service";
import type { SettingsStore } from "../settings/settings.service";

export type AnswerEvent = {
  pollId: string;
  userId: number;
  username?: string | null;
  displayName?: string | null;
  /** Chosen options; empty when the vote was retracted. */
  optionIds: number[];
};

export type AnswerResult =
  | { status: "ignored" }
  | { status: "duplicate" }
  | { status: "recorded"; correct: boolean; scoreDelta: number; totalScore: number };

export type DispatchTarget = {
  chatId: number;
  isGroup: boolean;
};

export type RoundSummary = {
  sent: number;
  failed: number;
};

export type QuizDeps = {
  questions: QuestionService;
  polls: PollTrackingService;
  scoring: ScoringEngine;
  ranking: RankingService;
  chats: ChatRepository;
  compliments: ComplimentService;
  settings: SettingsStore;
  gateway: MessagingGateway;
  dispatchDelayMs: number;
  pollRetentionDays: number;
};

const DIGEST_SIZE = 10;

// Bot API descriptions meaning the bot can no longer post to the chat.
const CHAT_GONE = /bot was kicked|chat not found|bot is not a member|group chat was deleted/i;

function isChatGone(err: unknown): boolean {
  return err instanceof GatewayError && CHAT_GONE.test(err.message);
}

export function toOutgoingPoll(question: Question, heading = "🧠 MCQ"): OutgoingPoll {
  return {
    question: `${heading}:\n\n${question.question}`,
    options: [...question.options],
    correctOptionIndex: parseAnswerKey(question.correct),
    explanation: `📖 Explanation:\n${question.explanation}`
  };
}

export class QuizService {
  constructor(private readonly deps: QuizDeps) {}

  async onAnswerEvent(event: AnswerEvent): Promise<AnswerResult> {
    const { polls, scoring, chats } = this.deps;
    const profile = { userId: event.userId, username: event.username, firstName: event.displayName };

    const entry = event.optionIds.length > 0 ? await polls.resolvePoll(event.pollId) : null;
    if (!entry) {
      // Unscoreable, but the profile is still worth refreshing.
      await chats.upsertUser(profile);
      return { status: "ignored" };
    }

    const correct = event.optionIds[0] === entry.correctOptionIndex;
    const outcome = await scoring.recordAnswer({
      userId: event.userId,
      groupId: entry.groupId,
      isCorrect: correct,
      username: event.username,
      displayName: event.displayName,
      pollId: event.pollId
    });

    if (outcome.status === "duplicate") return outcome;
    if (entry.groupId !== null) await this.postCompliment(entry.groupId, correct, event);
    return { status: "recorded", correct, scoreDelta: outcome.scoreDelta, totalScore: outcome.stats.score };
  }

  /**
   * Draws (and retires) one question, sends it to the chat and tracks the poll.
   * An exhausted bank sends a notice instead and returns null.
   */
  async dispatchQuiz(target: DispatchTarget): Promise<Question | null> {
    const { questions, gateway, polls } = this.deps;

    const question = await questions.drawAndRetire();
    if (!question) {
      await gateway.sendMessage(target.chatId, NO_QUESTIONS_TEXT);
      return null;
    }

    const poll = toOutgoingPoll(question);
    const { pollId } = await gateway.sendPoll(target.chatId, poll);
    await polls.trackPoll(pollId, target.isGroup ? target.chatId : null, poll.correctOptionIndex);
    return question;
  }

  /** One shared question to every registered group. Null when nothing was sent. */
  async triggerPeriodicQuiz(): Promise<RoundSummary | null> {
    const { settings, chats, questions, gateway, polls } = this.deps;
    if (!settings.current().autoquizEnabled) return null;

    const groups = await chats.listGroupChats();
    if (groups.length === 0) return null;

    const question = await questions.drawAndRetire();
    if (!question) {
      // eslint-disable-next-line no-console
      console.log("Auto quiz skipped: question bank is empty");
      return null;
    }

    const poll = toOutgoingPoll(question, "🧠 MCQ (Global Quiz)");
    const summary: RoundSummary = { sent: 0, failed: 0 };
    for (const group of groups) {
      try {
        const { pollId } = await gateway.sendPoll(group.chatId, poll);
        await polls.trackPoll(pollId, group.chatId, poll.correctOptionIndex);
        summary.sent++;
      } catch (e) {
        summary.failed++;
        await this.handleDeliveryFailure(group.chatId, "Auto quiz", e);
      }
      await this.pause();
    }
    return summary;
  }

  async triggerDailyDigest(): Promise<RoundSummary> {
    const { ranking, chats, gateway, settings, polls } = this.deps;

    const global = await ranking.getLeaderboard({ kind: "global" }, DIGEST_SIZE);
    const groups = await chats.listGroupChats();

    const summary: RoundSummary = { sent: 0, failed: 0 };
    for (const group of groups) {
      try {
        const rows = await ranking.getLeaderboard({ kind: "group", groupId: group.chatId }, DIGEST_SIZE);
        const text = renderDailyDigest(global, group.title ?? "This Group", rows);
        await gateway.sendMessage(group.chatId, applyFooter(text, settings.current()));
        summary.sent++;
      } catch (e) {
        summary.failed++;
        await this.handleDeliveryFailure(group.chatId, "Daily digest", e);
      }
      await this.pause();
    }

    const pruned = await polls.prune(this.deps.pollRetentionDays);
    if (pruned > 0) {
      // eslint-disable-next-line no-console
      console.log(`Pruned ${pruned} expired poll entries`);
    }
    return summary;
  }

  /** Private chats are reached through the user list, so only group chats are added. */
  async broadcast(text: string): Promise<{ users: number; chats: number }> {
    const { chats, gateway } = this.deps;
    const message = renderAnnouncement(text);

    const deliver = async (ids: number[]): Promise<number> => {
      let delivered = 0;
      for (const id of ids) {
        try {
          await gateway.sendMessage(id, message);
          delivered++;
        } catch (e) {
          // eslint-disable-next-line no-console
          console.warn(`Broadcast to ${id} failed:`, e);
        }
        await this.pause();
      }
      return delivered;
    };

    const users = await deliver(await chats.listUserIds());
    const chatCount = await deliver((await chats.listGroupChats()).map((c) => c.chatId));
    return { users, chats: chatCount };
  }

  private async postCompliment(chatId: number, correct: boolean, event: AnswerEvent): Promise<void> {
    const { compliments, gateway } = this.deps;
    try {
      const text = await compliments.complimentFor(chatId, correct, event);
      if (text) await gateway.sendMessage(chatId, text);
    } catch (e) {
      await this.handleDeliveryFailure(chatId, "Compliment", e);
    }
  }

  private async handleDeliveryFailure(chatId: number, job: string, err: unknown): Promise<void> {
    if (isChatGone(err)) {
      // eslint-disable-next-line no-console
      console.warn(`${job}: chat ${chatId} is gone, unregistering it`);
      await this.deps.chats.removeChat(chatId);
      return;
    }
    // eslint-disable-next-line no-console
    console.error(`${job} delivery to ${chatId} failed:`, err);
  }

  private async pause(): Promise<void> {
    if (this.deps.dispatchDelayMs > 0) await sleep(this.deps.dispatchDelayMs);
  }
}
