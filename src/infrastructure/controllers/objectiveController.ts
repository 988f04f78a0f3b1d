import type { Request, Response } from "express";
import { inject, injectable } from "inversify";
import type { ZodError } from "zod";

import { TYPES } from "@/config/Types";
import { HttpStatusCode } from "@/shared/constants/HttpStatusCodes";
import { ObjectiveErrorCode } from "@/shared/constants/ErrorEnums";
import { AIObjectiveMode } from "@/shared/constants/AIEnums";
import { errorMessage } from "@/shared/utils/snapshotUtils";
import { logger, LogCategory } from "../utils/logger";
import type { ObjectiveManager } from "@/domain/objectives/ObjectiveManager";
import type { AIObjectiveCoordinator } from "@/domain/ai/AIObjectiveCoordinator";
import { ObjectiveManagerError } from "@/domain/objectives/core/ObjectiveManagerError";
import {
  createObjectiveBodySchema,
  suggestionsBodySchema,
  transitionBodySchema,
  turnBodySchema,
} from "./requestSchemas";

const TRANSITIONS = ["activate", "start", "suspend", "resume", "abandon", "fail"] as const;
type Transition = (typeof TRANSITIONS)[number];

function isTransition(value: string): value is Transition {
  return TRANSITIONS.some((t) => t === value);
}

function statusForError(error: ObjectiveManagerError): HttpStatusCode {
  switch (error.code) {
    case ObjectiveErrorCode.DUPLICATE_ID:
      return HttpStatusCode.CONFLICT;
    case ObjectiveErrorCode.UNKNOWN_TYPE:
    case ObjectiveErrorCode.UNKNOWN_TEMPLATE:
    case ObjectiveErrorCode.INVALID_OPTIONS:
      return HttpStatusCode.BAD_REQUEST;
    default:
      return HttpStatusCode.INTERNAL_SERVER_ERROR;
  }
}

function validationError(res: Response, error: ZodError): void {
  res.status(HttpStatusCode.BAD_REQUEST).json({
    error: "Invalid request body",
    details: error.flatten(),
  });
}

/**
 * HTTP adapter over the objective manager and the AI coordinator.
 *
 * Handlers are arrow properties so routes can pass them around unbound.
 */
@injectable()
export class ObjectiveController {
  constructor(
    @inject(TYPES.ObjectiveManager) private readonly manager: ObjectiveManager,
    @inject(TYPES.AIObjectiveCoordinator)
    private readonly coordinator: AIObjectiveCoordinator,
  ) {}

  healthCheck = (_req: Request, res: Response): void => {
    const stats = this.manager.getStatistics();
    res.json({
      status: "ok",
      timestamp: Date.now(),
      objectives: {
        total: stats.totalObjectives,
        active: stats.activeObjectives,
      },
    });
  };

  getSummary = (_req: Request, res: Response): void => {
    try {
      res.json(this.manager.getDisplaySummary());
    } catch (error) {
      logger.error(`Error building objective summary: ${errorMessage(error)}`, LogCategory.HTTP);
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to build objective summary",
      });
    }
  };

  getStatistics = (_req: Request, res: Response): void => {
    try {
      res.json({
        objectives: this.manager.getStatistics(),
        ai: this.coordinator.getStatistics(),
      });
    } catch (error) {
      logger.error(`Error reading statistics: ${errorMessage(error)}`, LogCategory.HTTP);
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to read statistics",
      });
    }
  };

  getObjective = (req: Request, res: Response): void => {
    const objective = this.manager.getObjective(req.params.id ?? "");
    if (!objective) {
      res.status(HttpStatusCode.NOT_FOUND).json({ error: "Objective not found" });
      return;
    }
    res.json(objective.getDisplayInfo());
  };

  createObjective = (req: Request, res: Response): void => {
    const parsed = createObjectiveBodySchema.safeParse(req.body);
    if (!parsed.success) {
      validationError(res, parsed.error);
      return;
    }

    const { id, kind, template, options } = parsed.data;
    try {
      const objective =
        template !== undefined
          ? this.manager.createFromTemplate(template, id, options)
          : this.manager.createObjective(kind ?? "", id, options);
      res.status(HttpStatusCode.CREATED).json(objective.getDisplayInfo());
    } catch (error) {
      if (error instanceof ObjectiveManagerError) {
        res.status(statusForError(error)).json({ error: error.message, code: error.code });
        return;
      }
      logger.error(`Error creating objective: ${errorMessage(error)}`, LogCategory.HTTP);
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to create objective",
      });
    }
  };

  runTurn = (req: Request, res: Response): void => {
    const parsed = turnBodySchema.safeParse(req.body);
    if (!parsed.success) {
      validationError(res, parsed.error);
      return;
    }

    try {
      const report = this.manager.updateAllObjectives(
        parsed.data.gameState,
        parsed.data.actionData,
      );
      res.json({ report, gameState: parsed.data.gameState });
    } catch (error) {
      logger.error(`Error running objective turn: ${errorMessage(error)}`, LogCategory.HTTP);
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to run objective turn",
      });
    }
  };

  applyTransition = (req: Request, res: Response): void => {
    const id = req.params.id ?? "";
    const transition = req.params.transition ?? "";
    if (!isTransition(transition)) {
      res.status(HttpStatusCode.BAD_REQUEST).json({ error: `Unknown transition: ${transition}` });
      return;
    }
    if (!this.manager.getObjective(id)) {
      res.status(HttpStatusCode.NOT_FOUND).json({ error: "Objective not found" });
      return;
    }

    const parsed = transitionBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      validationError(res, parsed.error);
      return;
    }

    const { gameState, reason } = parsed.data;
    let applied: boolean;
    switch (transition) {
      case "activate":
        applied = this.manager.activateObjective(id, gameState);
        break;
      case "start":
        applied = this.manager.startObjective(id);
        break;
      case "suspend":
        applied = this.manager.suspendObjective(id);
        break;
      case "resume":
        applied = this.manager.resumeObjective(id);
        break;
      case "abandon":
        applied = this.manager.abandonObjective(id);
        break;
      case "fail":
        applied = this.manager.failObjective(id, gameState, reason);
        break;
      default:
        applied = false;
    }

    const objective = this.manager.getObjective(id);
    if (!applied || !objective) {
      res.status(HttpStatusCode.CONFLICT).json({
        error: `Transition ${transition} refused for objective ${id}`,
      });
      return;
    }
    res.json(objective.getDisplayInfo());
  };

  getSuggestions = async (req: Request, res: Response): Promise<void> => {
    const parsed = suggestionsBodySchema.safeParse(req.body);
    if (!parsed.success) {
      validationError(res, parsed.error);
      return;
    }

    const { gameState, limit, implement } = parsed.data;
    try {
      const suggestions = await this.coordinator.getSuggestions(
        gameState,
        this.manager.getActiveObjectives(),
        limit,
      );
      if (implement && this.coordinator.mode !== AIObjectiveMode.FULL_CONTROL) {
        for (const suggestion of suggestions) this.coordinator.implementSuggestion(suggestion);
      }

      const implemented = this.coordinator
        .getSuggestionHistory()
        .filter((r) => suggestions.includes(r.suggestion) && r.objectiveId !== null)
        .map((r) => r.objectiveId);
      res.json({ suggestions, implemented });
    } catch (error) {
      logger.error(`Error generating suggestions: ${errorMessage(error)}`, LogCategory.HTTP);
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to generate suggestions",
      });
    }
  };
}
