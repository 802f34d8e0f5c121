import { z } from "zod";

// HTTP callers only; the service itself takes any non-negative limit
export const MAX_LEADERBOARD_LIMIT = 100;

export const LeaderboardQuerySchema = z
  .object({
    scope: z.enum(["global", "group"]).default("global"),
    groupId: z.coerce.number().int().optional(),
    limit: z.coerce.number().int().min(1).max(MAX_LEADERBOARD_LIMIT).default(10)
  })
  .refine((q) => q.scope === "global" || q.groupId !== undefined, {
    message: "groupId is required for the group scope",
    path: ["groupId"]
  });

export type LeaderboardQuery = z.infer<typeof LeaderboardQuerySchema>;
