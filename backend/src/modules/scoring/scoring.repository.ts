import type { Pool, PoolClient } from "pg";
import { runQuery, withClient, withTransaction } from "../../db/pool";
import type { ProfileUpdate } from "../chats/chats.repository";
import type { DailyStats, GlobalStats, GroupStats } from "./scoring";

/** Reads and writes for one user inside one all-or-nothing unit of work. */
export interface ScoringUnit {
  /** False when this user's answer to the poll was already scored. */
  claimPollAnswer(pollId: string, userId: number): Promise<boolean>;
  upsertProfile(profile: ProfileUpdate): Promise<void>;
  getGlobalStats(userId: number): Promise<GlobalStats | null>;
  saveGlobalStats(stats: GlobalStats): Promise<void>;
  getDailyStats(userId: number, day: string): Promise<DailyStats | null>;
  saveDailyStats(stats: DailyStats): Promise<void>;
  getGroupStats(groupId: number, userId: number): Promise<GroupStats | null>;
  saveGroupStats(stats: GroupStats): Promise<void>;
}

export interface ScoreRepository {
  /**
   * Runs `work` while holding the user's exclusive lock. Units for the same user never
   * overlap; their writes commit together or not at all.
   */
  withUserLock<T>(userId: number, work: (unit: ScoringUnit) => Promise<T>): Promise<T>;
  findGlobalStats(userId: number): Promise<GlobalStats | null>;
  findDailyStats(userId: number, day: string): Promise<DailyStats | null>;
  findGroupStats(groupId: number, userId: number): Promise<GroupStats | null>;
  /** Sum of `attempted` over all users. */
  totalAttempts(): Promise<number>;
}

type StatsRow = {
  user_id: string;
  attempted: number;
  correct: number;
  score: number;
  current_streak: number;
  max_streak: number;
  last_activity_date: string | null;
};

type DailyRow = {
  user_id: string;
  day: string;
  attempted: number;
  correct: number;
};

type GroupRow = {
  chat_id: string;
  user_id: string;
  attempted: number;
  correct: number;
  score: number;
};

function toGlobalStats(r: StatsRow): GlobalStats {
  return {
    userId: Number(r.user_id),
    attempted: Number(r.attempted),
    correct: Number(r.correct),
    score: Number(r.score),
    currentStreak: Number(r.current_streak),
    maxStreak: Number(r.max_streak),
    lastActivityDate: r.last_activity_date
  };
}

function toDailyStats(r: DailyRow): DailyStats {
  return {
    userId: Number(r.user_id),
    day: r.day,
    attempted: Number(r.attempted),
    correct: Number(r.correct)
  };
}

function toGroupStats(r: GroupRow): GroupStats {
  return {
    groupId: Number(r.chat_id),
    userId: Number(r.user_id),
    attempted: Number(r.attempted),
    correct: Number(r.correct),
    score: Number(r.score)
  };
}

// DATE columns are rendered as text so no timezone shift happens in the driver.
async function selectGlobal(db: PoolClient, userId: number, forUpdate: boolean): Promise<GlobalStats | null> {
  const { rows } = await db.query<StatsRow>(
    `SELECT user_id, attempted, correct, score, current_streak, max_streak,
            to_char(last_activity_date, 'YYYY-MM-DD') AS last_activity_date
     FROM stats
     WHERE user_id = $1${forUpdate ? " FOR UPDATE" : ""}`,
    [userId]
  );
  return rows[0] ? toGlobalStats(rows[0]) : null;
}

async function selectDaily(db: PoolClient, userId: number, day: string): Promise<DailyStats | null> {
  const { rows } = await db.query<DailyRow>(
    `SELECT user_id, to_char(day, 'YYYY-MM-DD') AS day, attempted, correct
     FROM daily_stats
     WHERE user_id = $1 AND day = $2::date`,
    [userId, day]
  );
  return rows[0] ? toDailyStats(rows[0]) : null;
}

async function selectGroup(db: PoolClient, groupId: number, userId: number): Promise<GroupStats | null> {
  const { rows } = await db.query<GroupRow>(
    `SELECT chat_id, user_id, attempted, correct, score
     FROM group_stats
     WHERE chat_id = $1 AND user_id = $2`,
    [groupId, userId]
  );
  return rows[0] ? toGroupStats(rows[0]) : null;
}

class PgScoringUnit implements ScoringUnit {
  constructor(private readonly client: PoolClient) {}

  async claimPollAnswer(pollId: string, userId: number): Promise<boolean> {
    const { rowCount } = await this.client.query(
      `INSERT INTO poll_answers (poll_id, user_id)
       VALUES ($1, $2)
       ON CONFLICT (poll_id, user_id) DO NOTHING`,
      [pollId, userId]
    );
    return rowCount === 1;
  }

  async upsertProfile(profile: ProfileUpdate): Promise<void> {
    await this.client.query(
      `INSERT INTO users (user_id, username, first_name)
       VALUES ($1, $2, $3)
       ON CONFLICT (user_id) DO UPDATE SET
         username = COALESCE(EXCLUDED.username, users.username),
         first_name = COALESCE(EXCLUDED.first_name, users.first_name)`,
      [profile.userId, profile.username ?? null, profile.firstName ?? null]
    );
  }

  getGlobalStats(userId: number): Promise<GlobalStats | null> {
    return selectGlobal(this.client, userId, true);
  }

  async saveGlobalStats(stats: GlobalStats): Promise<void> {
    await this.client.query(
      `INSERT INTO stats (user_id, attempted, correct, score, current_streak, max_streak, last_activity_date)
       VALUES ($1, $2, $3, $4, $5, $6, $7::date)
       ON CONFLICT (user_id) DO UPDATE SET
         attempted = EXCLUDED.attempted,
         correct = EXCLUDED.correct,
         score = EXCLUDED.score,
         current_streak = EXCLUDED.current_streak,
         max_streak = EXCLUDED.max_streak,
         last_activity_date = EXCLUDED.last_activity_date`,
      [
        stats.userId,
        stats.attempted,
        stats.correct,
        stats.score,
        stats.currentStreak,
        stats.maxStreak,
        stats.lastActivityDate
      ]
    );
  }

  getDailyStats(userId: number, day: string): Promise<DailyStats | null> {
    return selectDaily(this.client, userId, day);
  }

  async saveDailyStats(stats: DailyStats): Promise<void> {
    await this.client.query(
      `INSERT INTO daily_stats (user_id, day, attempted, correct)
       VALUES ($1, $2::date, $3, $4)
       ON CONFLICT (user_id, day) DO UPDATE SET
         attempted = EXCLUDED.attempted,
         correct = EXCLUDED.correct`,
      [stats.userId, stats.day, stats.attempted, stats.correct]
    );
  }

  getGroupStats(groupId: number, userId: number): Promise<GroupStats | null> {
    return selectGroup(this.client, groupId, userId);
  }

  async saveGroupStats(stats: GroupStats): Promise<void> {
    await this.client.query(
      `INSERT INTO group_stats (chat_id, user_id, attempted, correct, score)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (chat_id, user_id) DO UPDATE SET
         attempted = EXCLUDED.attempted,
         correct = EXCLUDED.correct,
         score = EXCLUDED.score`,
      [stats.groupId, stats.userId, stats.attempted, stats.correct, stats.score]
    );
  }
}

export class PgScoreRepository implements ScoreRepository {
  constructor(private readonly pool: Pool) {}

  withUserLock<T>(userId: number, work: (unit: ScoringUnit) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, async (client) => {
      // Held until COMMIT/ROLLBACK; also covers the first insert, where no row exists to lock yet.
      await client.query(`SELECT pg_advisory_xact_lock($1::bigint)`, [userId]);
      return work(new PgScoringUnit(client));
    });
  }

  findGlobalStats(userId: number): Promise<GlobalStats | null> {
    return withClient(this.pool, (client) => selectGlobal(client, userId, false));
  }

  findDailyStats(userId: number, day: string): Promise<DailyStats | null> {
    return withClient(this.pool, (client) => selectDaily(client, userId, day));
  }

  findGroupStats(groupId: number, userId: number): Promise<GroupStats | null> {
    return withClient(this.pool, (client) => selectGroup(client, groupId, userId));
  }

  async totalAttempts(): Promise<number> {
    const { rows } = await runQuery(() =>
      this.pool.query<{ total: string }>(`SELECT COALESCE(SUM(attempted), 0) AS total FROM stats`)
    );
    return Number(rows[0]?.total ?? 0);
  }
}
