import { Router } from "express";
import type { AchievementController } from "@/infrastructure/controllers/achievementController";

export function createAchievementRoutes(controller: AchievementController): Router {
  const router = Router();

  router.get("/api/achievements", controller.listAchievements);
  router.get("/api/achievements/statistics", controller.getStatistics);
  router.post("/api/achievements/check", controller.checkAchievements);

  return router;
}
