import type { Pool } from "pg";
import { runQuery } from "../../db/pool";

export type LeaderboardScope = { kind: "global" } | { kind: "group"; groupId: number };

export type StandingRow = {
  userId: number;
  username: string | null;
  firstName: string | null;
  attempted: number;
  correct: number;
  score: number;
};

export interface LeaderboardRepository {
  /** Highest score first; equal scores by ascending user id. */
  top(scope: LeaderboardScope, limit: number): Promise<StandingRow[]>;
  /** Rows in the scope with a strictly greater score. */
  countAbove(scope: LeaderboardScope, score: number): Promise<number>;
}

type StandingDbRow = {
  user_id: string;
  username: string | null;
  first_name: string | null;
  attempted: number;
  correct: number;
  score: number;
};

function toStanding(r: StandingDbRow): StandingRow {
  return {
    userId: Number(r.user_id),
    username: r.username,
    firstName: r.first_name,
    attempted: Number(r.attempted),
    correct: Number(r.correct),
    score: Number(r.score)
  };
}

export class PgLeaderboardRepository implements LeaderboardRepository {
  constructor(private readonly pool: Pool) {}

  async top(scope: LeaderboardScope, limit: number): Promise<StandingRow[]> {
    const { rows } = await runQuery(() =>
      scope.kind === "global"
        ? this.pool.query<StandingDbRow>(
            `SELECT s.user_id, u.username, u.first_name, s.attempted, s.correct, s.score
             FROM stats s
             LEFT JOIN users u ON u.user_id = s.user_id
             ORDER BY s.score DESC, s.user_id ASC
             LIMIT $1`,
            [limit]
          )
        : this.pool.query<StandingDbRow>(
            `SELECT gs.user_id, u.username, u.first_name, gs.attempted, gs.correct, gs.score
             FROM group_stats gs
             LEFT JOIN users u ON u.user_id = gs.user_id
             WHERE gs.chat_id = $1
             ORDER BY gs.score DESC, gs.user_id ASC
             LIMIT $2`,
            [scope.groupId, limit]
          )
    );
    return rows.map(toStanding);
  }

  async countAbove(scope: LeaderboardScope, score: number): Promise<number> {
    const { rows } = await runQuery(() =>
      scope.kind === "global"
        ? this.pool.query<{ count: string }>(`SELECT COUNT(*) AS count FROM stats WHERE score > $1`, [score])
        : this.pool.query<{ count: string }>(
            `SELECT COUNT(*) AS count FROM group_stats WHERE chat_id = $1 AND score > $2`,
            [scope.groupId, score]
          )
    );
    return Number(rows[0]?.count ?? 0);
  }
}
