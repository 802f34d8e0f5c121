import Redis from "ioredis";
import { toStoreError } from "../utils/errors";

export function createRedis(url: string): Redis {
  return new Redis(url, {
    // Keep defaults; ioredis reconnects automatically
    maxRetriesPerRequest: 3
  });
}

export async function checkRedisConnection(redis: Redis): Promise<void> {
  const pong = await redis.ping();
  if (pong !== "PONG") {
    throw new Error("Redis ping failed");
  }
}

/** Read-through cache used for leaderboard snapshots. */
export interface SnapshotCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export class RedisSnapshotCache implements SnapshotCache {
  constructor(private readonly redis: Redis, private readonly prefix = "pq:") {}

  async get(key: string): Promise<string | null> {
    try {
      return await this.redis.get(this.prefix + key);
    } catch (e) {
      throw toStoreError(e);
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.redis.set(this.prefix + key, value, "EX", ttlSeconds);
    } catch (e) {
      throw toStoreError(e);
    }
  }
}
