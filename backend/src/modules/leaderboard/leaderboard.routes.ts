import { Router } from "express";
import { asyncHandler } from "../../middleware/errorHandler";
import type { LeaderboardScope } from "./leaderboard.repository";
import type { RankingService } from "./leaderboard.service";
import { LeaderboardQuerySchema } from "./leaderboard.validation";

export function createLeaderboardRouter(ranking: RankingService): Router {
  const router = Router();

  // GET /v1/leaderboard?scope=global|group&groupId=&limit=
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const parsed = LeaderboardQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request", details: parsed.error.flatten().fieldErrors });
      }

      const { scope, groupId, limit } = parsed.data;
      const target: LeaderboardScope =
        scope === "group" && groupId !== undefined ? { kind: "group", groupId } : { kind: "global" };
      const items = await ranking.getLeaderboard(target, limit);
      return res.json({ scope, items });
    })
  );

  return router;
}
