import fs from "fs/promises";
import path from "path";
import { inject, injectable } from "inversify";

import { TYPES } from "@/config/Types";
import {
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveStatus,
  type ObjectiveType,
} from "@/shared/constants/ObjectiveEnums";
import { ObjectiveEventType } from "@/shared/constants/EventEnums";
import { ObjectiveErrorCode } from "@/shared/constants/ErrorEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  errorMessage,
  readTimestamp,
  toIsoOrNull,
} from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "../types/game-types";
import type { AIObjectiveSuggestion } from "../types/ai";
import type {
  Objective,
  ObjectiveDisplayInfo,
  ObjectiveSeed,
} from "./core/Objective";
import { ObjectiveArena } from "./core/ObjectiveArena";
import type { ObjectiveBusEvent, ObjectiveEventBus } from "./core/ObjectiveEventBus";
import { ObjectiveManagerError } from "./core/ObjectiveManagerError";
import type { ObjectiveRegistry } from "./ObjectiveRegistry";
import {
  managerSaveSchema,
  type ManagerSave,
  type ManagerStatistics,
  type ObjectiveOptions,
} from "./schemas";

const HOUR_MS = 3_600_000;

export interface ObjectiveManagerConfig {
  maxActiveObjectives: number;
  maxImmediateObjectives: number;
  maxShortTermObjectives: number;
  autoCleanupCompleted: boolean;
  autoCleanupAfterHours: number;
}

export const DEFAULT_MANAGER_CONFIG: ObjectiveManagerConfig = {
  maxActiveObjectives: 20,
  maxImmediateObjectives: 5,
  maxShortTermObjectives: 10,
  autoCleanupCompleted: true,
  autoCleanupAfterHours: 24,
};

/**
 * Ids touched by one turn, in the order they were processed.
 */
export interface ObjectiveUpdateReport {
  activated: string[];
  updated: string[];
  completed: string[];
  failed: string[];
  expired: string[];
  /** Removed by the retention sweep */
  evicted: string[];
}

export interface ManagerDisplaySummary {
  totalObjectives: number;
  activeCount: number;
  completedCount: number;
  failedCount: number;
  activeByPriority: Record<string, ObjectiveDisplayInfo[]>;
  statistics: ManagerStatistics;
  lastUpdate: string | null;
  updateCount: number;
}

export type SuggestionProvider = (
  state: GameStateSnapshot,
  activeObjectives: Objective[],
) => Promise<AIObjectiveSuggestion[]>;

function emptyStatistics(): ManagerStatistics {
  return {
    objectivesCreated: 0,
    objectivesCompleted: 0,
    objectivesFailed: 0,
    objectivesExpired: 0,
    totalProgressUpdates: 0,
  };
}

/**
 * Owns every objective and runs the per-turn lifecycle.
 *
 * Each turn runs four phases in a fixed order: admission of eligible
 * objectives under the global and per-scope caps, the update of every active
 * objective, terminal bookkeeping, and the retention sweep. An objective that
 * throws during its update is failed and the turn goes on.
 *
 * Assumes a single writer. Event handlers run synchronously inside the turn
 * and must not call back into the mutating methods.
 */
@injectable()
export class ObjectiveManager {
  private readonly arena = new ObjectiveArena();
  private readonly activeIds = new Set<string>();
  private readonly completedIds = new Set<string>();
  private readonly failedIds = new Set<string>();
  private statistics: ManagerStatistics = emptyStatistics();
  private suggestionProviders: SuggestionProvider[] = [];
  private lastUpdate: number | null = null;
  private updateCount = 0;

  constructor(
    @inject(TYPES.ObjectiveRegistry) private readonly registry: ObjectiveRegistry,
    @inject(TYPES.ObjectiveEventBus) private readonly eventBus: ObjectiveEventBus,
    @inject(TYPES.ObjectiveManagerConfig) private readonly config: ObjectiveManagerConfig,
  ) {
    logger.info("ObjectiveManager initialized", LogCategory.OBJECTIVES, {
      maxActive: config.maxActiveObjectives,
    });
  }

  getRegistry(): ObjectiveRegistry {
    return this.registry;
  }

  getEventBus(): ObjectiveEventBus {
    return this.eventBus;
  }

  getConfig(): Readonly<ObjectiveManagerConfig> {
    return this.config;
  }

  registerSuggestionProvider(provider: SuggestionProvider): () => void {
    this.suggestionProviders.push(provider);
    return () => {
      this.suggestionProviders = this.suggestionProviders.filter((p) => p !== provider);
    };
  }

  // ==================== Creation ====================

  createObjective(kind: string, objectiveId: string, seed: ObjectiveSeed = {}): Objective {
    this.assertFreeId(objectiveId);
    return this.build(`objective ${objectiveId}`, () =>
      this.registry.create(kind, objectiveId, seed),
    );
  }

  createFromTemplate(
    templateName: string,
    objectiveId: string,
    overrides: ObjectiveOptions = {},
  ): Objective {
    this.assertFreeId(objectiveId);
    return this.build(`objective from template ${templateName}`, () =>
      this.registry.createFromTemplate(templateName, objectiveId, overrides),
    );
  }

  private assertFreeId(objectiveId: string): void {
    if (this.arena.has(objectiveId)) {
      throw new ObjectiveManagerError(
        ObjectiveErrorCode.DUPLICATE_ID,
        `Objective with ID '${objectiveId}' already exists`,
      );
    }
  }

  private build(label: string, factory: () => Objective): Objective {
    let objective: Objective;
    try {
      objective = factory();
    } catch (error) {
      logger.error(`Failed to create ${label}: ${errorMessage(error)}`, LogCategory.OBJECTIVES);
      if (error instanceof ObjectiveManagerError) throw error;
      throw new ObjectiveManagerError(
        ObjectiveErrorCode.CREATION_FAILED,
        `Failed to create objective: ${errorMessage(error)}`,
      );
    }
    this.addObjective(objective);
    return objective;
  }

  /**
   * Adds an existing objective. Returns false when the id is taken.
   */
  addObjective(objective: Objective): boolean {
    if (!this.arena.insert(objective)) return false;

    this.track(objective);
    this.statistics.objectivesCreated++;
    this.eventBus.publish(ObjectiveEventType.OBJECTIVE_CREATED, {
      objectiveId: objective.objectiveId,
      kind: objective.kind,
    });
    logger.info(`Added objective: ${objective.title}`, LogCategory.OBJECTIVES);
    return true;
  }

  removeObjective(objectiveId: string): boolean {
    const objective = this.arena.remove(objectiveId);
    if (!objective) return false;

    this.activeIds.delete(objectiveId);
    this.completedIds.delete(objectiveId);
    this.failedIds.delete(objectiveId);
    this.eventBus.publish(ObjectiveEventType.OBJECTIVE_REMOVED, { objectiveId });
    logger.info(`Removed objective: ${objective.title}`, LogCategory.OBJECTIVES);
    return true;
  }

  /**
   * Files an objective under the collection matching its status.
   */
  private track(objective: Objective): void {
    const id = objective.objectiveId;
    if (objective.isActive) this.activeIds.add(id);
    else if (objective.isCompleted) this.completedIds.add(id);
    else if (objective.isFailed) this.failedIds.add(id);
  }

  // ==================== Queries ====================

  getObjective(objectiveId: string): Objective | undefined {
    return this.arena.get(objectiveId);
  }

  getAllObjectives(): Objective[] {
    return this.arena.values();
  }

  getObjectivesByStatus(status: ObjectiveStatus): Objective[] {
    return this.arena.values().filter((o) => o.status === status);
  }

  getObjectivesByType(type: ObjectiveType): Objective[] {
    return this.arena.byTypeOf(type);
  }

  getObjectivesByScope(scope: ObjectiveScope): Objective[] {
    return this.arena.byScopeOf(scope);
  }

  getObjectivesByPriority(priority: ObjectivePriority): Objective[] {
    return this.arena.byPriorityOf(priority);
  }

  getChildObjectives(objectiveId: string): Objective[] {
    return this.arena.getChildren(objectiveId);
  }

  getParentObjective(objectiveId: string): Objective | undefined {
    return this.arena.getParent(objectiveId);
  }

  getActiveObjectives(): Objective[] {
    return this.resolve(this.activeIds);
  }

  getCompletedObjectives(): Objective[] {
    return this.resolve(this.completedIds);
  }

  getFailedObjectives(): Objective[] {
    return this.resolve(this.failedIds);
  }

  /**
   * Objectives whose activation conditions hold right now.
   */
  getAvailableObjectives(state: GameStateSnapshot): Objective[] {
    return this.arena.values().filter((o) => this.safeCanActivate(o, state));
  }

  /**
   * Active objectives, highest priority first.
   */
  getPriorityObjectives(): Objective[] {
    return this.getActiveObjectives().sort((a, b) => b.priority - a.priority);
  }

  private resolve(ids: Iterable<string>): Objective[] {
    const result: Objective[] = [];
    for (const id of ids) {
      const objective = this.arena.get(id);
      if (objective) result.push(objective);
    }
    return result;
  }

  private safeCanActivate(objective: Objective, state: GameStateSnapshot): boolean {
    try {
      return objective.canActivate(state);
    } catch (error) {
      logger.error(
        `Error checking activation of ${objective.objectiveId}: ${errorMessage(error)}`,
        LogCategory.OBJECTIVES,
      );
      return false;
    }
  }

  // ==================== Explicit transitions ====================

  /**
   * Activates one objective outside the turn loop, still under the caps.
   */
  activateObjective(objectiveId: string, state: GameStateSnapshot): boolean {
    const objective = this.arena.get(objectiveId);
    if (!objective || !this.hasCapacityFor(objective)) return false;
    if (!objective.activate(state)) return false;

    this.activeIds.add(objectiveId);
    this.publishActivated(objective);
    return true;
  }

  startObjective(objectiveId: string): boolean {
    const objective = this.arena.get(objectiveId);
    if (!objective?.startProgress()) return false;
    this.eventBus.publish(ObjectiveEventType.OBJECTIVE_STARTED, { objectiveId });
    return true;
  }

  suspendObjective(objectiveId: string): boolean {
    const objective = this.arena.get(objectiveId);
    if (!objective?.suspend()) return false;
    this.activeIds.delete(objectiveId);
    this.eventBus.publish(ObjectiveEventType.OBJECTIVE_SUSPENDED, { objectiveId });
    return true;
  }

  /**
   * Resumes a suspended objective if the caps leave room for it.
   */
  resumeObjective(objectiveId: string): boolean {
    const objective = this.arena.get(objectiveId);
    if (!objective || objective.status !== ObjectiveStatus.SUSPENDED) return false;
    if (!this.hasCapacityFor(objective)) {
      logger.debug(
        `Resume of ${objectiveId} refused: active capacity reached`,
        LogCategory.OBJECTIVES,
      );
      return false;
    }
    if (!objective.resume()) return false;
    this.activeIds.add(objectiveId);
    this.eventBus.publish(ObjectiveEventType.OBJECTIVE_RESUMED, { objectiveId });
    return true;
  }

  abandonObjective(objectiveId: string): boolean {
    const objective = this.arena.get(objectiveId);
    if (!objective?.abandon()) return false;
    this.settle(objective);
    return true;
  }

  failObjective(objectiveId: string, state: GameStateSnapshot, reason = ""): boolean {
    const objective = this.arena.get(objectiveId);
    if (!objective?.fail(state, reason)) return false;
    this.settle(objective);
    return true;
  }

  // ==================== Turn loop ====================

  updateAllObjectives(
    state: GameStateSnapshot,
    actionData?: ActionData,
  ): ObjectiveUpdateReport {
    const report: ObjectiveUpdateReport = {
      activated: [],
      updated: [],
      completed: [],
      failed: [],
      expired: [],
      evicted: [],
    };

    this.admit(state, report);

    for (const objective of this.getActiveObjectives()) {
      const id = objective.objectiveId;
      try {
        if (objective.update(state, actionData)) {
          report.updated.push(id);
          this.statistics.totalProgressUpdates++;
        }
      } catch (error) {
        logger.error(`Error updating objective ${id}: ${errorMessage(error)}`, LogCategory.OBJECTIVES);
        objective.fail(state, `Update error: ${errorMessage(error)}`);
      }
      this.settle(objective, report);
    }

    report.evicted = this.sweepRetention(Date.now());

    this.lastUpdate = Date.now();
    this.updateCount++;
    return report;
  }

  /**
   * Activates eligible objectives while the caps allow. High-priority
   * candidates are considered first; the rest keep insertion order.
   */
  private admit(state: GameStateSnapshot, report: ObjectiveUpdateReport): void {
    const candidates = this.getAvailableObjectives(state);
    const urgent = candidates.filter((o) => o.priority >= ObjectivePriority.HIGH);
    const regular = candidates.filter((o) => o.priority < ObjectivePriority.HIGH);

    for (const objective of [...urgent, ...regular]) {
      if (!this.hasCapacityFor(objective)) continue;
      if (!objective.activate(state)) continue;

      this.activeIds.add(objective.objectiveId);
      report.activated.push(objective.objectiveId);
      this.publishActivated(objective);
    }
  }

  private hasCapacityFor(objective: Objective): boolean {
    if (this.activeIds.size >= this.config.maxActiveObjectives) return false;

    const scopeCap = this.scopeCap(objective.scope);
    if (scopeCap === null) return true;
    const inScope = this.getActiveObjectives().filter((o) => o.scope === objective.scope).length;
    return inScope < scopeCap;
  }

  private scopeCap(scope: ObjectiveScope): number | null {
    switch (scope) {
      case ObjectiveScope.IMMEDIATE:
        return this.config.maxImmediateObjectives;
      case ObjectiveScope.SHORT_TERM:
        return this.config.maxShortTermObjectives;
      default:
        return null;
    }
  }

  private publishActivated(objective: Objective): void {
    this.eventBus.publish(ObjectiveEventType.OBJECTIVE_ACTIVATED, {
      objectiveId: objective.objectiveId,
      priority: objective.priority,
    });
  }

  /**
   * Moves an objective out of the active set once it stops being active and
   * files terminal ones. Each terminal objective is settled once.
   */
  private settle(objective: Objective, report?: ObjectiveUpdateReport): void {
    const id = objective.objectiveId;
    if (objective.status === ObjectiveStatus.SUSPENDED) {
      this.activeIds.delete(id);
      return;
    }
    if (!objective.isTerminal || this.completedIds.has(id) || this.failedIds.has(id)) {
      return;
    }

    this.activeIds.delete(id);
    if (objective.isCompleted) {
      this.completedIds.add(id);
      this.statistics.objectivesCompleted++;
      report?.completed.push(id);
      this.eventBus.publish(ObjectiveEventType.OBJECTIVE_COMPLETED, {
        objectiveId: id,
        objectiveType: objective.objectiveType,
        scope: objective.scope,
      });
      return;
    }

    this.failedIds.add(id);
    if (objective.status === ObjectiveStatus.EXPIRED) {
      this.statistics.objectivesExpired++;
      report?.expired.push(id);
    } else {
      this.statistics.objectivesFailed++;
      report?.failed.push(id);
    }
    this.eventBus.publish(ObjectiveEventType.OBJECTIVE_FAILED, {
      objectiveId: id,
      status: objective.status,
      objectiveType: objective.objectiveType,
      scope: objective.scope,
    });
  }

  /**
   * Evicts completed objectives by completion time and failed ones by their
   * last update, once older than the retention window.
   */
  private sweepRetention(now: number): string[] {
    if (!this.config.autoCleanupCompleted) return [];

    const cutoff = now - this.config.autoCleanupAfterHours * HOUR_MS;
    const evicted: string[] = [];
    for (const objective of this.getCompletedObjectives()) {
      if (objective.completedAt !== null && objective.completedAt < cutoff) {
        evicted.push(objective.objectiveId);
      }
    }
    for (const objective of this.getFailedObjectives()) {
      if (objective.lastUpdate !== null && objective.lastUpdate < cutoff) {
        evicted.push(objective.objectiveId);
      }
    }

    for (const id of evicted) this.removeObjective(id);
    if (evicted.length > 0) {
      this.eventBus.publish(ObjectiveEventType.OBJECTIVES_EVICTED, { objectiveIds: evicted });
    }
    return evicted;
  }

  // ==================== Reporting ====================

  getDisplaySummary(now: number = Date.now()): ManagerDisplaySummary {
    const activeByPriority: Record<string, ObjectiveDisplayInfo[]> = {};
    for (const objective of this.getActiveObjectives()) {
      const key = String(objective.priority);
      (activeByPriority[key] ??= []).push(objective.getDisplayInfo(now));
    }

    return {
      totalObjectives: this.arena.size,
      activeCount: this.activeIds.size,
      completedCount: this.completedIds.size,
      failedCount: this.failedIds.size,
      activeByPriority,
      statistics: { ...this.statistics },
      lastUpdate: toIsoOrNull(this.lastUpdate),
      updateCount: this.updateCount,
    };
  }

  getStatistics() {
    return {
      ...this.statistics,
      totalObjectives: this.arena.size,
      activeObjectives: this.activeIds.size,
      completedObjectives: this.completedIds.size,
      failedObjectives: this.failedIds.size,
      updateCount: this.updateCount,
      lastUpdate: toIsoOrNull(this.lastUpdate),
      events: this.eventBus.getStats(),
    };
  }

  getRecentEvents(limit = 10): ObjectiveBusEvent[] {
    return this.eventBus.getRecentEvents(limit);
  }

  /**
   * Asks every registered provider for suggestions. A failing provider is
   * logged and skipped.
   */
  async suggestNewObjectives(state: GameStateSnapshot): Promise<AIObjectiveSuggestion[]> {
    const suggestions: AIObjectiveSuggestion[] = [];
    const active = this.getActiveObjectives();
    for (const provider of this.suggestionProviders) {
      try {
        suggestions.push(...(await provider(state, active)));
      } catch (error) {
        logger.error(`Error getting AI suggestions: ${errorMessage(error)}`, LogCategory.AI);
      }
    }
    return suggestions;
  }

  /**
   * Drops every objective and counter. Subscriptions and providers stay.
   */
  reset(): void {
    this.arena.clear();
    this.activeIds.clear();
    this.completedIds.clear();
    this.failedIds.clear();
    this.statistics = emptyStatistics();
    this.lastUpdate = null;
    this.updateCount = 0;
    this.eventBus.clearHistory();
    logger.info("ObjectiveManager reset", LogCategory.OBJECTIVES);
  }

  // ==================== Persistence ====================

  toSaveData(): ManagerSave {
    const objectives: ManagerSave["objectives"] = {};
    for (const objective of this.arena.values()) {
      objectives[objective.objectiveId] = objective.toDict();
    }
    return {
      objectives,
      active_objectives: [...this.activeIds],
      completed_objectives: [...this.completedIds],
      failed_objectives: [...this.failedIds],
      statistics: { ...this.statistics },
      last_update: toIsoOrNull(this.lastUpdate),
      update_count: this.updateCount,
    };
  }

  async saveToFile(filePath: string): Promise<boolean> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(this.toSaveData(), null, 2), "utf-8");
      logger.info(`Saved objectives to ${filePath}`, LogCategory.STORAGE);
      return true;
    } catch (error) {
      logger.error(`Failed to save objectives: ${errorMessage(error)}`, LogCategory.STORAGE);
      return false;
    }
  }

  /**
   * Replaces the current state with a save file. Every objective is rebuilt
   * before anything is replaced, so a bad file leaves the manager untouched.
   */
  async loadFromFile(filePath: string): Promise<boolean> {
    let data: ManagerSave;
    try {
      const content = await fs.readFile(filePath, "utf-8");
      const raw: unknown = JSON.parse(content);
      const parsed = managerSaveSchema.safeParse(raw);
      if (!parsed.success) {
        logger.error(
          `Invalid objectives save file ${filePath}: ${parsed.error.message}`,
          LogCategory.STORAGE,
        );
        return false;
      }
      data = parsed.data;
    } catch (error) {
      logger.error(`Failed to load objectives: ${errorMessage(error)}`, LogCategory.STORAGE);
      return false;
    }

    let restored: Objective[];
    try {
      restored = Object.values(data.objectives).map((dict) => this.registry.hydrate(dict));
    } catch (error) {
      logger.error(`Failed to rebuild objectives: ${errorMessage(error)}`, LogCategory.STORAGE);
      return false;
    }

    this.arena.clear();
    this.activeIds.clear();
    this.completedIds.clear();
    this.failedIds.clear();
    for (const objective of restored) this.arena.insert(objective);

    const fill = (target: Set<string>, ids: string[]): void => {
      for (const id of ids) if (this.arena.has(id)) target.add(id);
    };
    fill(this.activeIds, data.active_objectives);
    fill(this.completedIds, data.completed_objectives);
    fill(this.failedIds, data.failed_objectives);

    this.statistics = { ...data.statistics };
    this.lastUpdate = readTimestamp(data.last_update);
    this.updateCount = data.update_count;

    logger.info(`Loaded ${restored.length} objectives from ${filePath}`, LogCategory.STORAGE);
    return true;
  }
}
