import { Router } from "express";
import { asyncHandler } from "../../middleware/errorHandler";
import type { TelegramBot } from "./telegram.commands";
import { UpdateSchema } from "./telegram.validation";

export const SECRET_HEADER = "x-telegram-bot-api-secret-token";

export function createTelegramRouter(bot: TelegramBot, secret?: string): Router {
  const router = Router();

  // POST /v1/telegram/webhook
  router.post(
    "/webhook",
    asyncHandler(async (req, res) => {
      if (secret && req.get(SECRET_HEADER) !== secret) {
        return res.status(401).json({ error: "Unauthorized" });
      }

      const parsed = UpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request", details: parsed.error.flatten().fieldErrors });
      }

      // A non-2xx answer makes the platform redeliver the update, so failures end here.
      try {
        await bot.handleUpdate(parsed.data);
      } catch (e) {
        // eslint-disable-next-line no-console
        console.error(`Update ${parsed.data.update_id} failed:`, e);
      }
      return res.json({ ok: true });
    })
  );

  return router;
}
