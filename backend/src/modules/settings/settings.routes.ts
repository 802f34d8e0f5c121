import { Router } from "express";
import type { SettingsStore } from "./settings.service";

export function createSettingsRouter(settings: SettingsStore): Router {
  const router = Router();

  // GET /v1/settings
  router.get("/", (_req, res) => {
    res.json(settings.current());
  });

  return router;
}
