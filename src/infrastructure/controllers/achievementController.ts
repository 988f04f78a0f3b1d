import type { Request, Response } from "express";
import { inject, injectable } from "inversify";

import { TYPES } from "@/config/Types";
import { HttpStatusCode } from "@/shared/constants/HttpStatusCodes";
import { errorMessage } from "@/shared/utils/snapshotUtils";
import { logger, LogCategory } from "../utils/logger";
import type { AchievementManager } from "@/domain/achievements/AchievementManager";
import { achievementCheckBodySchema } from "./requestSchemas";

/**
 * HTTP adapter over the achievement engine.
 */
@injectable()
export class AchievementController {
  constructor(
    @inject(TYPES.AchievementManager) private readonly achievements: AchievementManager,
  ) {}

  /**
   * Hidden achievements stay out of the list until unlocked.
   */
  listAchievements = (_req: Request, res: Response): void => {
    res.json({
      achievements: this.achievements.getAllAchievements(false).map((a) => a.toDict()),
    });
  };

  getStatistics = (_req: Request, res: Response): void => {
    try {
      res.json(this.achievements.getStatistics());
    } catch (error) {
      logger.error(`Error reading achievement statistics: ${errorMessage(error)}`, LogCategory.HTTP);
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to read achievement statistics",
      });
    }
  };

  checkAchievements = (req: Request, res: Response): void => {
    const parsed = achievementCheckBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(HttpStatusCode.BAD_REQUEST).json({
        error: "Invalid request body",
        details: parsed.error.flatten(),
      });
      return;
    }

    const { gameData, playerStats } = parsed.data;
    try {
      const unlocked = this.achievements.checkAllAchievements(gameData, playerStats);
      res.json({
        unlocked: unlocked.map((a) => a.toDict()),
        progress: this.achievements.getProgressReport(gameData, playerStats),
      });
    } catch (error) {
      logger.error(`Error checking achievements: ${errorMessage(error)}`, LogCategory.HTTP);
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to check achievements",
      });
    }
  };
}
