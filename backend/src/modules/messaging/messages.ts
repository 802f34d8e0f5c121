/**
 * Chat texts. Everything here is rendered for HTML parse mode, so any user-provided
 * value goes through `escapeHtml` first.
 */

import type { LeaderboardItem } from "../leaderboard/leaderboard.service";
import type { ImportSummary } from "../questions/questions.service";
import type { Settings } from "../settings/settings.service";
import type { BotStats, StatsReport } from "../stats/stats.service";

export const MAX_MESSAGE_LENGTH = 4000;
const RULE = "━━━━━━━━━━━━━━━━━━";
const FOOTER_RULE = "━━━━━━━━━━━━━━━━━━━";
const DIVIDER = "────────────────────";

export const NO_QUESTIONS_TEXT =
  "📭 <b>Question bank empty!</b> All questions have been used. Please upload new ones with /addquestion.";
export const NO_STATS_TEXT = "❌ <b>No statistics yet.</b> Answer a quiz to start tracking your progress!";
export const GENERIC_FAILURE_TEXT = "❌ Something went wrong. Please try again later.";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;"
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function applyFooter(text: string, settings: Pick<Settings, "footerEnabled" | "footerText">): string {
  if (!settings.footerEnabled) return text;
  return `${text}\n\n${FOOTER_RULE}\n${escapeHtml(settings.footerText)}`;
}

export function badge(rank: number): string {
  switch (rank) {
    case 1:
      return "🥇";
    case 2:
      return "🥈";
    case 3:
      return "🥉";
    default:
      return `#${rank}`;
  }
}

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;
const MAX_ENTITY_LENGTH = 8;

/** Largest cut point at or below `max` that keeps surrogate pairs whole. */
export function codePointBoundary(text: string, max: number): number {
  if (text.length <= max) return text.length;
  return max > 0 && isHighSurrogate(text.charCodeAt(max - 1)) ? max - 1 : max;
}

export function clipText(text: string, max: number): string {
  return text.slice(0, codePointBoundary(text, max));
}

// Backs off so the cut lands outside a tag, an entity and a surrogate pair.
function htmlBoundary(text: string, max: number): number {
  const fallback = codePointBoundary(text, max);
  let end = fallback;

  const tagOpen = text.lastIndexOf("<", end - 1);
  if (tagOpen >= 0 && tagOpen > text.lastIndexOf(">", end - 1)) end = tagOpen;

  const amp = text.lastIndexOf("&", end - 1);
  if (amp >= 0 && end - amp <= MAX_ENTITY_LENGTH && !text.slice(amp, end).includes(";")) end = amp;

  return end > 0 ? end : fallback;
}

/**
 * Splits HTML text into messages of at most `maxLength` units. Cuts fall on line breaks;
 * a single line that is too long is cut where no tag, entity or emoji is broken.
 * Renderers keep each tag pair on one line.
 */
export function splitMessage(text: string, maxLength = MAX_MESSAGE_LENGTH): string[] {
  const chunks: string[] = [];
  let current: string | null = null;

  for (const line of text.split("\n")) {
    let rest = line;
    while (rest.length > maxLength) {
      if (current !== null) chunks.push(current);
      current = null;
      const cut = htmlBoundary(rest, maxLength);
      chunks.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }

    if (current === null) {
      current = rest;
    } else if (current.length + 1 + rest.length <= maxLength) {
      current = `${current}\n${rest}`;
    } else {
      chunks.push(current);
      current = rest;
    }
  }

  if (current !== null) chunks.push(current);
  return chunks;
}

export function leaderboardLines(items: LeaderboardItem[]): string {
  return items.map((it) => `${badge(it.rank)} ${escapeHtml(it.displayName)} - ${it.score} pts`).join("\n");
}

export function renderLeaderboard(title: string, items: LeaderboardItem[]): string {
  return `<b>${escapeHtml(title)}</b>\n${RULE}\n\n${leaderboardLines(items)}`;
}

export function renderScoreSummary(report: StatsReport): string {
  const s = report.stats;
  return [
    "📊 <b>Your Score Summary</b>",
    "",
    `Total Attempted: <code>${s.attempted}</code>`,
    `Correct Answers: <code>${s.correct}</code>`,
    `Incorrect Answers: <code>${report.wrong}</code>`,
    `Current Score: <code>${s.score}</code>`
  ].join("\n");
}

export function renderProfile(name: string, report: StatsReport): string {
  const s = report.stats;
  const groupRank = report.groupRank === null ? "N/A" : `#${report.groupRank}`;
  const today = report.today ? `${report.today.correct}/${report.today.attempted}` : "0/0";

  return [
    "🪪 <b>USER PROFILE</b>",
    DIVIDER,
    `👤 <b>NAME</b> : <code>${escapeHtml(name)}</code>`,
    `🏅 <b>STATUS</b> : <code>${escapeHtml(report.title)}</code>`,
    DIVIDER,
    "📊 <b>PERFORMANCE DATA:</b>",
    `<code>│ 🏆 Global Rank : #${report.globalRank}</code>`,
    `<code>│ 👥 Group Rank  : ${groupRank}</code>`,
    `<code>│ 🧬 Current XP  : ${report.xp.toLocaleString("en-US")}</code>`,
    "📈 <b>ACCURACY TRACKER:</b>",
    `<code>┌── Attempted : ${s.attempted}</code>`,
    `<code>├── Correct   : ${s.correct}</code>`,
    `<code>├── Today     : ${today}</code>`,
    `<code>└── Precision : ${report.accuracy.toFixed(1)}%</code>`,
    DIVIDER,
    "🔥 <b>STREAK MONITOR:</b>",
    `<code>┌── Current   : ${s.currentStreak}</code>`,
    `<code>└── Best      : ${s.maxStreak}</code>`
  ].join("\n");
}

export function renderImportSummary(summary: ImportSummary): string {
  return `📊 <b>Import Summary:</b>\n✅ Added: <code>${summary.added}</code>\n⚠️ Skipped: <code>${summary.skipped}</code>`;
}

export function renderBotStats(stats: BotStats): string {
  return [
    "🤖 <b>Bot Statistics</b>",
    "",
    `👤 <b>Total Users:</b> <code>${stats.users}</code>`,
    `👥 <b>Total Groups:</b> <code>${stats.chats}</code>`,
    `👮 <b>Total Admins:</b> <code>${stats.admins}</code>`,
    "",
    `❓ <b>Total Questions:</b> <code>${stats.questions}</code>`,
    `📝 <b>Total Global Attempts:</b> <code>${stats.attempts}</code>`
  ].join("\n");
}

export function renderDailyDigest(global: LeaderboardItem[], groupTitle: string, group: LeaderboardItem[]): string {
  const globalBody = global.length > 0 ? leaderboardLines(global) : "No global data recorded yet.";
  const groupBody = group.length > 0 ? leaderboardLines(group) : "No participants in this group yet.";

  return [
    "🌙 <b>DAILY LEADERBOARD</b>",
    RULE,
    "<b>🌍 Global Top 10 Performers</b>",
    globalBody,
    RULE,
    `<b>👥 ${escapeHtml(groupTitle)} Top 10</b>`,
    groupBody,
    RULE,
    "Great effort today! 🚀 More quizzes coming tomorrow."
  ].join("\n");
}

export function renderAnnouncement(text: string): string {
  return `📢 <b>ANNOUNCEMENT</b>\n\n${escapeHtml(text)}`;
}
