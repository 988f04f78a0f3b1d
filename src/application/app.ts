import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import type { Container } from "inversify";

import { createObjectiveRoutes } from "./routes/objectiveRoutes";
import { createAchievementRoutes } from "./routes/achievementRoutes";
import { TYPES } from "../config/Types";
import { logger, LogCategory } from "../infrastructure/utils/logger";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";
import type { ObjectiveController } from "../infrastructure/controllers/objectiveController";
import type { AchievementController } from "../infrastructure/controllers/achievementController";

/**
 * Builds the Express application over a service container.
 *
 * Routes:
 * - `/health` - Health check
 * - `/api/objectives` - Objective lifecycle, turns and AI suggestions
 * - `/api/achievements` - Achievement listing and checks
 *
 * @module application
 */
export function createApp(container: Container): Express {
  const app = express();

  app.use(
    cors({
      origin: process.env.ALLOWED_ORIGINS?.split(",") ?? "*",
      credentials: true,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  if (process.env.NODE_ENV !== "production") {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, LogCategory.HTTP);
      next();
    });
  }

  app.use(
    "/",
    createObjectiveRoutes(container.get<ObjectiveController>(TYPES.ObjectiveController)),
  );
  app.use(
    "/",
    createAchievementRoutes(container.get<AchievementController>(TYPES.AchievementController)),
  );

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    const errorMessage =
      process.env.NODE_ENV === "production" ? "Internal server error" : err.message;
    logger.error(`Unhandled error: ${err.message}`, LogCategory.HTTP);
    res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({ error: errorMessage });
  });

  app.use((_req: Request, res: Response): void => {
    res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
  });

  return app;
}
