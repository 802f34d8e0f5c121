import { AppError, UnauthorizedError, ValidationError } from "../../utils/errors";
import type { AdminService } from "../chats/admins.service";
import { toChatType, type ChatRepository } from "../chats/chats.repository";
import { parseComplimentKind, type ComplimentService } from "../compliments/compliments.service";
import type { RankingService } from "../leaderboard/leaderboard.service";
import {
  applyFooter,
  escapeHtml,
  GENERIC_FAILURE_TEXT,
  NO_STATS_TEXT,
  renderBotStats,
  renderImportSummary,
  renderLeaderboard,
  renderProfile,
  renderScoreSummary
} from "../messaging/messages";
import type { MessagingGateway } from "../messaging/messaging.gateway";
import type { QuestionService } from "../questions/questions.service";
import type { QuizService } from "../quiz/quiz.service";
import type { SettingsStore } from "../settings/settings.service";
import type { StatsService } from "../stats/stats.service";
import { parseCommand, type TelegramMessage, type TelegramPollAnswer, type TelegramUpdate } from "./telegram.validation";

export type BotDeps = {
  quiz: QuizService;
  questions: QuestionService;
  admins: AdminService;
  compliments: ComplimentService;
  settings: SettingsStore;
  ranking: RankingService;
  stats: StatsService;
  chats: ChatRepository;
  gateway: MessagingGateway;
};

type CommandContext = {
  chatId: number;
  chatTitle: string | null;
  isGroup: boolean;
  userId: number;
  name: string;
  args: string;
};

type CommandHandler = (ctx: CommandContext) => Promise<void>;

const LEADERBOARD_SIZE = 10;

const HELP_TEXT = [
  "📘 <b>Commands</b>",
  "/randomquiz - get a quiz question",
  "/myscore - your score summary",
  "/mystats - your full profile",
  "/leaderboard - global top 10",
  "/groupleaderboard - this group's top 10"
].join("\n");

const ADMIN_HELP_TEXT = [
  "",
  "🛠 <b>Admin</b>",
  "/addquestion &lt;blocks&gt; - import questions",
  "/questions - questions left in the bank",
  "/delallquestions - empty the bank (owner)",
  "/footer on|off|&lt;text&gt;",
  "/autoquiz on|off|interval &lt;minutes&gt;",
  "/addadmin &lt;user_id&gt;, /removeadmin &lt;user_id&gt; (owner)",
  "/adminlist, /broadcast &lt;text&gt;, /botstats",
  "/addcompliment correct|wrong &lt;text&gt;, /listcompliments",
  "/delcompliment &lt;id&gt;, /delallcompliments (owner)"
].join("\n");

const GROUP_ADMIN_HELP_TEXT = [
  "",
  "👥 <b>Group admins</b>",
  "/setcomp correct|wrong &lt;text&gt; - this group's compliment ({user} is replaced)",
  "/comp_toggle on|off - compliments in this group"
].join("\n");

const GROUP_ADMIN_STATUSES = new Set(["creator", "administrator"]);

function parseUserId(raw: string, usage: string): number {
  if (!/^\d+$/.test(raw)) throw new ValidationError("Invalid user id", usage);
  return Number(raw);
}

function onOff(raw: string): boolean | null {
  const value = raw.toLowerCase();
  if (value === "on") return true;
  if (value === "off") return false;
  return null;
}

export class TelegramBot {
  private readonly commands = new Map<string, CommandHandler>([
    ["start", (ctx) => this.start(ctx)],
    ["help", (ctx) => this.help(ctx)],
    ["randomquiz", (ctx) => this.randomQuiz(ctx)],
    ["myscore", (ctx) => this.myScore(ctx)],
    ["mystats", (ctx) => this.myStats(ctx)],
    ["leaderboard", (ctx) => this.leaderboard(ctx)],
    ["groupleaderboard", (ctx) => this.groupLeaderboard(ctx)],
    ["addquestion", (ctx) => this.addQuestion(ctx)],
    ["questions", (ctx) => this.questionCount(ctx)],
    ["delallquestions", (ctx) => this.deleteAllQuestions(ctx)],
    ["footer", (ctx) => this.footer(ctx)],
    ["autoquiz", (ctx) => this.autoquiz(ctx)],
    ["addadmin", (ctx) => this.addAdmin(ctx)],
    ["removeadmin", (ctx) => this.removeAdmin(ctx)],
    ["adminlist", (ctx) => this.adminList(ctx)],
    ["broadcast", (ctx) => this.broadcast(ctx)],
    ["botstats", (ctx) => this.botStats(ctx)],
    ["addcompliment", (ctx) => this.addCompliment(ctx)],
    ["listcompliments", (ctx) => this.listCompliments(ctx)],
    ["delcompliment", (ctx) => this.deleteCompliment(ctx)],
    ["delallcompliments", (ctx) => this.deleteAllCompliments(ctx)],
    ["setcomp", (ctx) => this.setGroupCompliment(ctx)],
    ["comp_toggle", (ctx) => this.toggleCompliments(ctx)]
  ]);

  constructor(private readonly deps: BotDeps) {}

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    if (update.poll_answer) {
      await this.onPollAnswer(update.poll_answer);
      return;
    }
    if (update.message) await this.onMessage(update.message);
  }

  private async onPollAnswer(answer: TelegramPollAnswer): Promise<void> {
    if (answer.user.is_bot) return;
    await this.deps.quiz.onAnswerEvent({
      pollId: answer.poll_id,
      userId: answer.user.id,
      username: answer.user.username ?? null,
      displayName: answer.user.first_name ?? null,
      optionIds: answer.option_ids
    });
  }

  private async onMessage(message: TelegramMessage): Promise<void> {
    const { chats } = this.deps;
    const from = message.from;
    if (!from || from.is_bot) return;

    const chatType = toChatType(message.chat.type);
    await chats.registerChat({ chatId: message.chat.id, type: chatType, title: message.chat.title ?? null });
    await chats.upsertUser({ userId: from.id, username: from.username ?? null, firstName: from.first_name ?? null });

    const command = parseCommand(message.text);
    if (!command) return;
    const handler = this.commands.get(command.name);
    if (!handler) return;

    const ctx: CommandContext = {
      chatId: message.chat.id,
      chatTitle: message.chat.title ?? null,
      isGroup: chatType !== "private",
      userId: from.id,
      name: from.first_name ?? from.username ?? `User ${from.id}`,
      args: command.args
    };

    try {
      await handler(ctx);
    } catch (e) {
      await this.replyWithError(ctx.chatId, command.name, e);
    }
  }

  private async replyWithError(chatId: number, command: string, err: unknown): Promise<void> {
    let text = GENERIC_FAILURE_TEXT;
    if (err instanceof ValidationError) {
      text = `⚠️ ${escapeHtml(err.message)}`;
      if (err.hint) text += `\nUsage: <code>${escapeHtml(err.hint)}</code>`;
    } else if (err instanceof UnauthorizedError) {
      text = `🚫 ${escapeHtml(err.message)}`;
    } else {
      // eslint-disable-next-line no-console
      console.error(`/${command} failed:`, err instanceof AppError ? err.message : err);
    }

    try {
      await this.deps.gateway.sendMessage(chatId, text);
    } catch (e) {
      // eslint-disable-next-line no-console
      console.error(`Could not deliver error reply to ${chatId}:`, e);
    }
  }

  private reply(chatId: number, text: string): Promise<void> {
    return this.deps.gateway.sendMessage(chatId, applyFooter(text, this.deps.settings.current()));
  }

  private async start(ctx: CommandContext): Promise<void> {
    await this.reply(
      ctx.chatId,
      `👋 Welcome, <b>${escapeHtml(ctx.name)}</b>!\n\nAnswer quiz polls to earn points: +4 for a correct answer, -1 for a wrong one.\n\n${HELP_TEXT}`
    );
  }

  private async help(ctx: CommandContext): Promise<void> {
    const isAdmin = await this.deps.admins.isAdmin(ctx.userId);
    const text = isAdmin ? HELP_TEXT + "\n" + ADMIN_HELP_TEXT : HELP_TEXT;
    await this.reply(ctx.chatId, ctx.isGroup ? text + "\n" + GROUP_ADMIN_HELP_TEXT : text);
  }

  private async randomQuiz(ctx: CommandContext): Promise<void> {
    await this.deps.quiz.dispatchQuiz({ chatId: ctx.chatId, isGroup: ctx.isGroup });
  }

  private async myScore(ctx: CommandContext): Promise<void> {
    const report = await this.deps.stats.getReport(ctx.userId);
    await this.reply(ctx.chatId, report ? renderScoreSummary(report) : NO_STATS_TEXT);
  }

  private async myStats(ctx: CommandContext): Promise<void> {
    const report = await this.deps.stats.getReport(ctx.userId, ctx.isGroup ? ctx.chatId : null);
    await this.reply(ctx.chatId, report ? renderProfile(ctx.name, report) : NO_STATS_TEXT);
  }

  private async leaderboard(ctx: CommandContext): Promise<void> {
    const items = await this.deps.ranking.getLeaderboard({ kind: "global" }, LEADERBOARD_SIZE);
    if (items.length === 0) {
      await this.reply(ctx.chatId, "🏆 No scores recorded yet.");
      return;
    }
    await this.reply(ctx.chatId, renderLeaderboard("🏆 Global Leaderboard", items));
  }

  private async groupLeaderboard(ctx: CommandContext): Promise<void> {
    if (!ctx.isGroup) {
      await this.reply(ctx.chatId, "👥 This command works in groups only.");
      return;
    }
    const items = await this.deps.ranking.getLeaderboard({ kind: "group", groupId: ctx.chatId }, LEADERBOARD_SIZE);
    if (items.length === 0) {
      await this.reply(ctx.chatId, "👥 No one in this group has answered yet.");
      return;
    }
    await this.reply(ctx.chatId, renderLeaderboard(`👥 ${ctx.chatTitle ?? "Group"} Leaderboard`, items));
  }

  private async addQuestion(ctx: CommandContext): Promise<void> {
    await this.deps.admins.assertAdmin(ctx.userId);
    const summary = await this.deps.questions.importText(ctx.args);
    await this.reply(ctx.chatId, renderImportSummary(summary));
  }

  private async questionCount(ctx: CommandContext): Promise<void> {
    await this.deps.admins.assertAdmin(ctx.userId);
    const count = await this.deps.questions.count();
    await this.reply(ctx.chatId, `📚 Questions left in the bank: <code>${count}</code>`);
  }

  private async deleteAllQuestions(ctx: CommandContext): Promise<void> {
    this.deps.admins.assertOwner(ctx.userId);
    const deleted = await this.deps.questions.clear();
    await this.reply(ctx.chatId, `🗑 Deleted <code>${deleted}</code> questions.`);
  }

  private async footer(ctx: CommandContext): Promise<void> {
    const { admins, settings } = this.deps;
    await admins.assertAdmin(ctx.userId);

    if (!ctx.args) {
      const current = settings.current();
      await this.reply(
        ctx.chatId,
        `📝 Footer is <b>${current.footerEnabled ? "on" : "off"}</b>: <code>${escapeHtml(current.footerText)}</code>`
      );
      return;
    }

    const toggle = onOff(ctx.args);
    if (toggle !== null) {
      await settings.setFooterEnabled(toggle);
      await this.reply(ctx.chatId, `✅ Footer turned ${toggle ? "on" : "off"}.`);
      return;
    }

    await settings.setFooterText(ctx.args);
    await this.reply(ctx.chatId, "✅ Footer text updated.");
  }

  private async autoquiz(ctx: CommandContext): Promise<void> {
    const { admins, settings } = this.deps;
    await admins.assertAdmin(ctx.userId);

    const [action = "", value = ""] = ctx.args.split(/\s+/);
    const toggle = onOff(action);
    if (toggle !== null) {
      await settings.setAutoquizEnabled(toggle);
      await this.reply(ctx.chatId, `✅ Auto quiz turned ${toggle ? "on" : "off"}.`);
      return;
    }

    if (action.toLowerCase() === "interval") {
      const updated = await settings.setAutoquizInterval(value);
      await this.reply(ctx.chatId, `✅ Auto quiz every <code>${updated.autoquizIntervalMinutes}</code> minutes.`);
      return;
    }

    const current = settings.current();
    await this.reply(
      ctx.chatId,
      `⏱ Auto quiz is <b>${current.autoquizEnabled ? "on" : "off"}</b>, every <code>${current.autoquizIntervalMinutes}</code> minutes.\nUsage: <code>/autoquiz on|off|interval &lt;minutes&gt;</code>`
    );
  }

  private async addAdmin(ctx: CommandContext): Promise<void> {
    const userId = parseUserId(ctx.args, "/addadmin <user_id>");
    await this.deps.admins.addAdmin(ctx.userId, userId);
    await this.reply(ctx.chatId, `✅ <code>${userId}</code> is now an admin.`);
  }

  private async removeAdmin(ctx: CommandContext): Promise<void> {
    const userId = parseUserId(ctx.args, "/removeadmin <user_id>");
    const removed = await this.deps.admins.removeAdmin(ctx.userId, userId);
    await this.reply(
      ctx.chatId,
      removed ? `✅ <code>${userId}</code> is no longer an admin.` : `ℹ️ <code>${userId}</code> was not an admin.`
    );
  }

  private async adminList(ctx: CommandContext): Promise<void> {
    const ids = await this.deps.admins.listAdmins(ctx.userId);
    const lines = ids.map((id, idx) => `${idx === 0 ? "👑" : "👮"} <code>${id}</code>`);
    await this.reply(ctx.chatId, `<b>Admins</b>\n${lines.join("\n")}`);
  }

  private async broadcast(ctx: CommandContext): Promise<void> {
    await this.deps.admins.assertAdmin(ctx.userId);
    if (!ctx.args) throw new ValidationError("Nothing to broadcast", "/broadcast <text>");
    const delivered = await this.deps.quiz.broadcast(ctx.args);
    await this.reply(
      ctx.chatId,
      `✅ Broadcast delivered to <code>${delivered.users}</code> users and <code>${delivered.chats}</code> chats.`
    );
  }

  private async botStats(ctx: CommandContext): Promise<void> {
    await this.deps.admins.assertAdmin(ctx.userId);
    await this.reply(ctx.chatId, renderBotStats(await this.deps.stats.getBotStats()));
  }

  private async addCompliment(ctx: CommandContext): Promise<void> {
    await this.deps.admins.assertAdmin(ctx.userId);
    const usage = "/addcompliment correct|wrong <text>";
    const [rawKind = "", ...words] = ctx.args.split(/\s+/);
    const kind = parseComplimentKind(rawKind, usage);
    const added = await this.deps.compliments.add(kind, words.join(" "));
    await this.reply(ctx.chatId, `✅ Added ${kind} compliment <code>#${added.id}</code>: ${escapeHtml(added.text)}`);
  }

  private async listCompliments(ctx: CommandContext): Promise<void> {
    await this.deps.admins.assertAdmin(ctx.userId);
    const all = await this.deps.compliments.list();
    if (all.length === 0) {
      await this.reply(ctx.chatId, "📭 No compliments added yet.");
      return;
    }
    const entries = all.map((c) => `ID: <code>${c.id}</code> | Type: ${c.kind}\nText: ${escapeHtml(c.text)}`);
    await this.reply(ctx.chatId, `📝 <b>Compliment List</b>\n\n${entries.join("\n\n")}`);
  }

  private async deleteCompliment(ctx: CommandContext): Promise<void> {
    await this.deps.admins.assertAdmin(ctx.userId);
    if (!/^\d+$/.test(ctx.args)) throw new ValidationError("Invalid compliment id", "/delcompliment <id>");
    const id = Number(ctx.args);
    const removed = await this.deps.compliments.remove(id);
    await this.reply(
      ctx.chatId,
      removed ? `✅ Compliment <code>${id}</code> deleted.` : `ℹ️ No compliment with id <code>${id}</code>.`
    );
  }

  private async deleteAllCompliments(ctx: CommandContext): Promise<void> {
    this.deps.admins.assertOwner(ctx.userId);
    const deleted = await this.deps.compliments.clear();
    await this.reply(ctx.chatId, `🗑 Deleted <code>${deleted}</code> compliments.`);
  }

  private async setGroupCompliment(ctx: CommandContext): Promise<void> {
    await this.assertGroupAdmin(ctx);
    const usage = "/setcomp correct|wrong <text>";
    const [rawKind = "", ...words] = ctx.args.split(/\s+/);
    const kind = parseComplimentKind(rawKind, usage);
    await this.deps.compliments.setForChat(ctx.chatId, kind, words.join(" "));
    await this.reply(ctx.chatId, `✅ Custom ${kind} message saved!`);
  }

  private async toggleCompliments(ctx: CommandContext): Promise<void> {
    await this.assertGroupAdmin(ctx);
    const toggle = onOff(ctx.args);
    if (toggle === null) throw new ValidationError("Choose on or off", "/comp_toggle on|off");
    await this.deps.compliments.setEnabled(ctx.chatId, toggle);
    await this.reply(ctx.chatId, `✅ Compliments are now ${toggle ? "ON" : "OFF"}.`);
  }

  /** Admins of the Telegram group itself, not bot admins. */
  private async assertGroupAdmin(ctx: CommandContext): Promise<void> {
    if (!ctx.isGroup) throw new ValidationError("This command only works in groups");
    const status = await this.deps.gateway.getMemberStatus(ctx.chatId, ctx.userId);
    if (!GROUP_ADMIN_STATUSES.has(status)) throw new UnauthorizedError("Only group admins can do this");
  }
}
