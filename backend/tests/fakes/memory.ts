import { setImmediate as yieldTick } from "timers/promises";
import type { Repositories } from "../../src/container";
import type { Chat, ChatRepository, ProfileUpdate } from "../../src/modules/chats/chats.repository";
import type { Compliment, ComplimentKind, ComplimentRepository } from "../../src/modules/compliments/compliments.repository";
import type { LeaderboardRepository, LeaderboardScope, StandingRow } from "../../src/modules/leaderboard/leaderboard.repository";
import type { PollEntry, PollRepository } from "../../src/modules/polls/polls.repository";
import type { NewQuestion, Question, QuestionRepository } from "../../src/modules/questions/questions.repository";
import type { ScoreRepository, ScoringUnit } from "../../src/modules/scoring/scoring.repository";
import type { DailyStats, GlobalStats, GroupStats } from "../../src/modules/scoring/scoring";
import type { SettingsRepository } from "../../src/modules/settings/settings.repository";
import { TransientStoreError } from "../../src/utils/errors";

type UserRow = { username: string | null; firstName: string | null };

/** Shared in-memory tables behind every fake repository. */
export class MemoryState {
  readonly users = new Map<number, UserRow>();
  readonly global = new Map<number, GlobalStats>();
  readonly daily = new Map<string, DailyStats>();
  readonly group = new Map<string, GroupStats>();
  readonly pollAnswers = new Set<string>();
  readonly polls = new Map<string, PollEntry & { createdAt: Date }>();
  readonly questions = new Map<number, Question>();
  readonly chats = new Map<number, Chat>();
  readonly admins = new Set<number>();
  readonly settings = new Map<string, string>();
  readonly compliments = new Map<number, Compliment>();
  /** `${chatId}:${kind}` -> text */
  readonly groupCompliments = new Map<string, string>();
  readonly complimentsEnabled = new Map<number, boolean>();

  nextQuestionId = 1;
  nextComplimentId = 1;
  /** Upcoming scoring units that fail with TransientStoreError instead of committing. */
  failingCommits = 0;
  /** Upcoming poll inserts that fail with TransientStoreError. */
  failingPollInserts = 0;
  /** Set to make a failing poll insert write its row before failing. */
  pollInsertLandsBeforeFailure = false;
  /** Highest number of scoring units seen running at once for a single user. */
  maxConcurrentUnits = 0;
  now: () => Date = () => new Date();
  random: () => number = Math.random;
}

const dailyKey = (userId: number, day: string) => `${userId}:${day}`;
const groupKey = (groupId: number, userId: number) => `${groupId}:${userId}`;
const answerKey = (pollId: string, userId: number) => `${pollId}:${userId}`;

function mergeProfile(users: Map<number, UserRow>, profile: ProfileUpdate): void {
  const prev = users.get(profile.userId);
  users.set(profile.userId, {
    username: profile.username ?? prev?.username ?? null,
    firstName: profile.firstName ?? prev?.firstName ?? null
  });
}

/** Writes are staged and only reach the state when the unit commits. */
class StagedUnit implements ScoringUnit {
  readonly profiles: ProfileUpdate[] = [];
  readonly global = new Map<number, GlobalStats>();
  readonly daily = new Map<string, DailyStats>();
  readonly group = new Map<string, GroupStats>();
  readonly claims = new Set<string>();

  constructor(private readonly state: MemoryState) {}

  async claimPollAnswer(pollId: string, userId: number): Promise<boolean> {
    const key = answerKey(pollId, userId);
    if (this.state.pollAnswers.has(key) || this.claims.has(key)) return false;
    this.claims.add(key);
    return true;
  }

  async upsertProfile(profile: ProfileUpdate): Promise<void> {
    this.profiles.push(profile);
  }

  async getGlobalStats(userId: number): Promise<GlobalStats | null> {
    await yieldTick();
    return this.global.get(userId) ?? this.state.global.get(userId) ?? null;
  }

  async saveGlobalStats(stats: GlobalStats): Promise<void> {
    await yieldTick();
    this.global.set(stats.userId, stats);
  }

  async getDailyStats(userId: number, day: string): Promise<DailyStats | null> {
    const key = dailyKey(userId, day);
    return this.daily.get(key) ?? this.state.daily.get(key) ?? null;
  }

  async saveDailyStats(stats: DailyStats): Promise<void> {
    this.daily.set(dailyKey(stats.userId, stats.day), stats);
  }

  async getGroupStats(groupId: number, userId: number): Promise<GroupStats | null> {
    const key = groupKey(groupId, userId);
    return this.group.get(key) ?? this.state.group.get(key) ?? null;
  }

  async saveGroupStats(stats: GroupStats): Promise<void> {
    this.group.set(groupKey(stats.groupId, stats.userId), stats);
  }

  commit(): void {
    for (const profile of this.profiles) mergeProfile(this.state.users, profile);
    for (const [k, v] of this.global) this.state.global.set(k, v);
    for (const [k, v] of this.daily) this.state.daily.set(k, v);
    for (const [k, v] of this.group) this.state.group.set(k, v);
    for (const k of this.claims) this.state.pollAnswers.add(k);
  }
}

export class MemoryScoreRepository implements ScoreRepository {
  private readonly locks = new Map<number, Promise<unknown>>();
  private readonly active = new Map<number, number>();

  constructor(private readonly state: MemoryState) {}

  withUserLock<T>(userId: number, work: (unit: ScoringUnit) => Promise<T>): Promise<T> {
    const prev = this.locks.get(userId) ?? Promise.resolve();
    const run = prev.then(() => this.runUnit(userId, work));
    this.locks.set(userId, run.catch(() => undefined));
    return run;
  }

  private async runUnit<T>(userId: number, work: (unit: ScoringUnit) => Promise<T>): Promise<T> {
    const active = (this.active.get(userId) ?? 0) + 1;
    this.active.set(userId, active);
    this.state.maxConcurrentUnits = Math.max(this.state.maxConcurrentUnits, active);
    try {
      const unit = new StagedUnit(this.state);
      const result = await work(unit);
      if (this.state.failingCommits > 0) {
        this.state.failingCommits--;
        throw new TransientStoreError("injected commit failure");
      }
      unit.commit();
      return result;
    } finally {
      this.active.set(userId, (this.active.get(userId) ?? 1) - 1);
    }
  }

  async findGlobalStats(userId: number): Promise<GlobalStats | null> {
    return this.state.global.get(userId) ?? null;
  }

  async findDailyStats(userId: number, day: string): Promise<DailyStats | null> {
    return this.state.daily.get(dailyKey(userId, day)) ?? null;
  }

  async findGroupStats(groupId: number, userId: number): Promise<GroupStats | null> {
    return this.state.group.get(groupKey(groupId, userId)) ?? null;
  }

  async totalAttempts(): Promise<number> {
    let total = 0;
    for (const s of this.state.global.values()) total += s.attempted;
    return total;
  }
}

export class MemoryQuestionRepository implements QuestionRepository {
  constructor(private readonly state: MemoryState) {}

  async insertMany(questions: NewQuestion[]): Promise<number> {
    for (const q of questions) {
      const id = this.state.nextQuestionId++;
      this.state.questions.set(id, { id, ...q });
    }
    return questions.length;
  }

  async count(): Promise<number> {
    return this.state.questions.size;
  }

  async deleteAll(): Promise<number> {
    const n = this.state.questions.size;
    this.state.questions.clear();
    return n;
  }

  async drawAndRetire(): Promise<Question | null> {
    const all = [...this.state.questions.values()];
    if (all.length === 0) return null;
    const picked = all[Math.min(all.length - 1, Math.floor(this.state.random() * all.length))];
    this.state.questions.delete(picked.id);
    return picked;
  }
}

export class MemoryPollRepository implements PollRepository {
  constructor(private readonly state: MemoryState) {}

  async insert(entry: PollEntry): Promise<boolean> {
    if (this.state.failingPollInserts > 0) {
      this.state.failingPollInserts--;
      if (this.state.pollInsertLandsBeforeFailure) {
        this.state.polls.set(entry.pollId, { ...entry, createdAt: this.state.now() });
      }
      throw new TransientStoreError("injected poll insert failure");
    }
    if (this.state.polls.has(entry.pollId)) return false;
    this.state.polls.set(entry.pollId, { ...entry, createdAt: this.state.now() });
    return true;
  }

  async find(pollId: string): Promise<PollEntry | null> {
    const row = this.state.polls.get(pollId);
    if (!row) return null;
    return { pollId: row.pollId, groupId: row.groupId, correctOptionIndex: row.correctOptionIndex };
  }

  async isAnswered(pollId: string, userId: number): Promise<boolean> {
    return this.state.pollAnswers.has(answerKey(pollId, userId));
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [pollId, row] of this.state.polls) {
      if (row.createdAt.getTime() < cutoff.getTime()) {
        this.state.polls.delete(pollId);
        for (const key of this.state.pollAnswers) {
          if (key.startsWith(`${pollId}:`)) this.state.pollAnswers.delete(key);
        }
        removed++;
      }
    }
    return removed;
  }
}

export class MemoryLeaderboardRepository implements LeaderboardRepository {
  constructor(private readonly state: MemoryState) {}

  private rows(scope: LeaderboardScope): StandingRow[] {
    const source =
      scope.kind === "global"
        ? [...this.state.global.values()]
        : [...this.state.group.values()].filter((g) => g.groupId === scope.groupId);

    return source.map((s) => {
      const user = this.state.users.get(s.userId);
      return {
        userId: s.userId,
        username: user?.username ?? null,
        firstName: user?.firstName ?? null,
        attempted: s.attempted,
        correct: s.correct,
        score: s.score
      };
    });
  }

  async top(scope: LeaderboardScope, limit: number): Promise<StandingRow[]> {
    return this.rows(scope)
      .sort((a, b) => b.score - a.score || a.userId - b.userId)
      .slice(0, limit);
  }

  async countAbove(scope: LeaderboardScope, score: number): Promise<number> {
    return this.rows(scope).filter((r) => r.score > score).length;
  }
}

export class MemoryChatRepository implements ChatRepository {
  constructor(private readonly state: MemoryState) {}

  async upsertUser(profile: ProfileUpdate): Promise<void> {
    mergeProfile(this.state.users, profile);
  }

  async listUserIds(): Promise<number[]> {
    return [...this.state.users.keys()].sort((a, b) => a - b);
  }

  async countUsers(): Promise<number> {
    return this.state.users.size;
  }

  async registerChat(chat: Chat): Promise<void> {
    const prev = this.state.chats.get(chat.chatId);
    this.state.chats.set(chat.chatId, { ...chat, title: chat.title ?? prev?.title ?? null });
  }

  async listGroupChats(): Promise<Chat[]> {
    return [...this.state.chats.values()].filter((c) => c.type !== "private");
  }

  async removeChat(chatId: number): Promise<void> {
    this.state.chats.delete(chatId);
  }

  async countChats(): Promise<number> {
    return [...this.state.chats.values()].filter((c) => c.type !== "private").length;
  }

  async isAdmin(userId: number): Promise<boolean> {
    return this.state.admins.has(userId);
  }

  async addAdmin(userId: number): Promise<void> {
    this.state.admins.add(userId);
  }

  async removeAdmin(userId: number): Promise<boolean> {
    return this.state.admins.delete(userId);
  }

  async listAdmins(): Promise<number[]> {
    return [...this.state.admins];
  }
}

export class MemoryComplimentRepository implements ComplimentRepository {
  constructor(private readonly state: MemoryState) {}

  async add(kind: ComplimentKind, text: string): Promise<Compliment> {
    const compliment = { id: this.state.nextComplimentId++, kind, text };
    this.state.compliments.set(compliment.id, compliment);
    return compliment;
  }

  async list(): Promise<Compliment[]> {
    return [...this.state.compliments.values()];
  }

  async remove(id: number): Promise<boolean> {
    return this.state.compliments.delete(id);
  }

  async removeAll(): Promise<number> {
    const n = this.state.compliments.size;
    this.state.compliments.clear();
    return n;
  }

  async pickShared(kind: ComplimentKind): Promise<string | null> {
    const pool = [...this.state.compliments.values()].filter((c) => c.kind === kind);
    if (pool.length === 0) return null;
    return pool[Math.min(pool.length - 1, Math.floor(this.state.random() * pool.length))].text;
  }

  async findForChat(chatId: number, kind: ComplimentKind): Promise<string | null> {
    return this.state.groupCompliments.get(`${chatId}:${kind}`) ?? null;
  }

  async setForChat(chatId: number, kind: ComplimentKind, text: string): Promise<void> {
    this.state.groupCompliments.set(`${chatId}:${kind}`, text);
  }

  async isEnabledIn(chatId: number): Promise<boolean> {
    return this.state.complimentsEnabled.get(chatId) ?? true;
  }

  async setEnabledIn(chatId: number, enabled: boolean): Promise<void> {
    this.state.complimentsEnabled.set(chatId, enabled);
  }
}

export class MemorySettingsRepository implements SettingsRepository {
  constructor(private readonly state: MemoryState) {}

  async loadAll(): Promise<Map<string, string>> {
    return new Map(this.state.settings);
  }

  async put(values: Record<string, string>): Promise<void> {
    for (const [k, v] of Object.entries(values)) this.state.settings.set(k, v);
  }

  async seedDefaults(defaults: Record<string, string>): Promise<void> {
    for (const [k, v] of Object.entries(defaults)) {
      if (!this.state.settings.has(k)) this.state.settings.set(k, v);
    }
  }
}

export function createMemoryRepositories(state = new MemoryState()): Repositories & { state: MemoryState } {
  return {
    state,
    scores: new MemoryScoreRepository(state),
    questions: new MemoryQuestionRepository(state),
    polls: new MemoryPollRepository(state),
    leaderboard: new MemoryLeaderboardRepository(state),
    chats: new MemoryChatRepository(state),
    compliments: new MemoryComplimentRepository(state),
    settings: new MemorySettingsRepository(state)
  };
}
