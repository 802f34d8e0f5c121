import type { Pool } from "pg";
import { runQuery, withTransaction } from "../../db/pool";
import { isOptionIndex, type OptionIndex } from "../questions/answerKey";

export type PollEntry = {
  pollId: string;
  /** Null for polls sent to a private chat: their answers skip group stats. */
  groupId: number | null;
  correctOptionIndex: OptionIndex;
};

export interface PollRepository {
  /** False when an entry for the poll already exists; the stored entry is kept. */
  insert(entry: PollEntry): Promise<boolean>;
  find(pollId: string): Promise<PollEntry | null>;
  isAnswered(pollId: string, userId: number): Promise<boolean>;
  /** Removes entries (and their answer claims) created before `cutoff`. */
  deleteOlderThan(cutoff: Date): Promise<number>;
}

type PollRow = {
  poll_id: string;
  group_id: string | null;
  correct_option_id: number;
};

export class PgPollRepository implements PollRepository {
  constructor(private readonly pool: Pool) {}

  async insert(entry: PollEntry): Promise<boolean> {
    const { rowCount } = await runQuery(() =>
      this.pool.query(
        `INSERT INTO active_polls (poll_id, group_id, correct_option_id)
         VALUES ($1, $2, $3)
         ON CONFLICT (poll_id) DO NOTHING`,
        [entry.pollId, entry.groupId, entry.correctOptionIndex]
      )
    );
    return rowCount === 1;
  }

  async find(pollId: string): Promise<PollEntry | null> {
    const { rows } = await runQuery(() =>
      this.pool.query<PollRow>(
        `SELECT poll_id, group_id, correct_option_id
         FROM active_polls
         WHERE poll_id = $1`,
        [pollId]
      )
    );
    const r = rows[0];
    if (!r) return null;

    const index = Number(r.correct_option_id);
    if (!isOptionIndex(index)) {
      throw new Error(`Corrupt poll entry ${pollId}: option ${index}`);
    }
    return {
      pollId: r.poll_id,
      groupId: r.group_id === null ? null : Number(r.group_id),
      correctOptionIndex: index
    };
  }

  async isAnswered(pollId: string, userId: number): Promise<boolean> {
    const { rows } = await runQuery(() =>
      this.pool.query(`SELECT 1 FROM poll_answers WHERE poll_id = $1 AND user_id = $2`, [pollId, userId])
    );
    return rows.length > 0;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    return withTransaction(this.pool, async (client) => {
      await client.query(
        `DELETE FROM poll_answers
         WHERE poll_id IN (SELECT poll_id FROM active_polls WHERE created_at < $1)`,
        [cutoff]
      );
      const { rowCount } = await client.query(`DELETE FROM active_polls WHERE created_at < $1`, [cutoff]);
      return rowCount ?? 0;
    });
  }
}
