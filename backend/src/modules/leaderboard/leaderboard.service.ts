import { z } from "zod";
import type { SnapshotCache } from "../../redis/client";
import { ValidationError } from "../../utils/errors";
import type { LeaderboardRepository, LeaderboardScope, StandingRow } from "./leaderboard.repository";

export type LeaderboardItem = {
  rank: number;
  userId: number;
  displayName: string;
  attempted: number;
  correct: number;
  score: number;
};

const LeaderboardItemsSchema = z.array(
  z.object({
    rank: z.number().int(),
    userId: z.number().int(),
    displayName: z.string().min(1),
    attempted: z.number().int(),
    correct: z.number().int(),
    score: z.number().int()
  })
);


/** "@username", else the first name, else "Participant <id>". Never empty. */
export function resolveDisplayName(userId: number, username: string | null, firstName: string | null): string {
  if (username) return `@${username}`;
  if (firstName) return firstName;
  return `Participant ${userId}`;
}

function toItem(row: StandingRow, idx: number): LeaderboardItem {
  return {
    rank: idx + 1,
    userId: row.userId,
    displayName: resolveDisplayName(row.userId, row.username, row.firstName),
    attempted: row.attempted,
    correct: row.correct,
    score: row.score
  };
}

function cacheKey(scope: LeaderboardScope, limit: number): string {
  return scope.kind === "global" ? `lb:global:${limit}` : `lb:group:${scope.groupId}:${limit}`;
}

export class RankingService {
  constructor(
    private readonly repo: LeaderboardRepository,
    private readonly cache: SnapshotCache,
    private readonly cacheTtlSeconds: number
  ) {}

  /**
   * Top `limit` rows of the scope by score. Snapshots are cached for a few seconds,
   * so a read may trail the latest answers.
   */
  async getLeaderboard(scope: LeaderboardScope, limit: number): Promise<LeaderboardItem[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new ValidationError("limit must be a non-negative integer");
    }
    if (limit === 0) return [];

    const key = cacheKey(scope, limit);
    const cached = await this.readCache(key);
    if (cached) return cached;

    const items = (await this.repo.top(scope, limit)).map(toItem);
    await this.writeCache(key, items);
    return items;
  }

  /** 1-based competition rank: users with equal scores share a rank. */
  async getRank(scope: LeaderboardScope, score: number): Promise<number> {
    return (await this.repo.countAbove(scope, score)) + 1;
  }

  private async readCache(key: string): Promise<LeaderboardItem[] | null> {
    let raw: string | null;
    try {
      raw = await this.cache.get(key);
    } catch (e) {
      // eslint-disable-next-line no-console
      console.warn("Leaderboard cache read failed, using database:", e);
      return null;
    }
    if (!raw) return null;

    try {
      const parsed = LeaderboardItemsSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null; // unparsable payload: rebuild from the database
    }
  }

  private async writeCache(key: string, items: LeaderboardItem[]): Promise<void> {
    try {
      await this.cache.set(key, JSON.stringify(items), this.cacheTtlSeconds);
    } catch (e) {
      // eslint-disable-next-line no-console
      console.warn("Leaderboard cache write failed:", e);
    }
  }
}
