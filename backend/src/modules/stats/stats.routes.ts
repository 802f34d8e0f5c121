import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../../middleware/errorHandler";
import { NotFoundError } from "../../utils/errors";
import type { StatsService } from "./stats.service";

const StatsRequestSchema = z.object({
  userId: z.coerce.number().int().positive(),
  groupId: z.coerce.number().int().optional()
});

export function createStatsRouter(stats: StatsService): Router {
  const router = Router();

  // GET /v1/stats/:userId?groupId=
  router.get(
    "/:userId",
    asyncHandler(async (req, res) => {
      const parsed = StatsRequestSchema.safeParse({ userId: req.params.userId, groupId: req.query.groupId });
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request", details: parsed.error.flatten().fieldErrors });
      }

      const report = await stats.getReport(parsed.data.userId, parsed.data.groupId ?? null);
      if (!report) throw new NotFoundError("No statistics yet");
      return res.json(report);
    })
  );

  return router;
}
