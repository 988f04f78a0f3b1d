import { Router } from "express";
import type { ObjectiveController } from "@/infrastructure/controllers/objectiveController";

export function createObjectiveRoutes(controller: ObjectiveController): Router {
  const router = Router();

  router.get("/health", controller.healthCheck);
  router.get("/api/objectives", controller.getSummary);
  router.get("/api/objectives/statistics", controller.getStatistics);
  router.post("/api/objectives", controller.createObjective);
  router.post("/api/objectives/turn", controller.runTurn);
  router.post("/api/objectives/suggestions", controller.getSuggestions);
  router.get("/api/objectives/:id", controller.getObjective);
  router.post("/api/objectives/:id/:transition", controller.applyTransition);

  return router;
}
