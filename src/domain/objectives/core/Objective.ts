import { randomUUID } from "node:crypto";

import {
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveStatus,
  ObjectiveType,
  TERMINAL_STATUSES,
} from "@/shared/constants/ObjectiveEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  readTimestamp,
  toIsoOrNull,
} from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import type {
  ConditionInput,
  ObjectiveConsequence,
  ObjectiveDict,
  ObjectiveEventRecord,
  ObjectiveOptions,
  ObjectiveReward,
} from "../schemas";
import { ObjectiveCondition } from "./ObjectiveCondition";
import { ModifierStack } from "./ModifierStack";
import { describeConsequence, describeReward } from "./rewards";

const MINUTE_MS = 60_000;
const MAX_EVENTS = 50;
const PERSISTED_EVENTS = 10;
const PROGRESS_EPSILON = 1e-9;

/**
 * Options an objective is built from. Conditions may be given as plain data
 * or as condition instances carrying inline checks.
 */
export type ObjectiveSeed = Omit<
  ObjectiveOptions,
  "activationConditions" | "completionConditions"
> & {
  activationConditions?: Array<ConditionInput | ObjectiveCondition>;
  completionConditions?: Array<ConditionInput | ObjectiveCondition>;
};

/**
 * Per-variant defaults applied where the seed is silent.
 */
export interface ObjectiveDefaults {
  scope: ObjectiveScope;
  objectiveType?: ObjectiveType;
  /** null means no time limit */
  timeLimitMinutes: number | null;
}

/**
 * Read-only view model for the presentation layer.
 */
export interface ObjectiveDisplayInfo {
  id: string;
  kind: string;
  title: string;
  description: string;
  type: ObjectiveType;
  scope: ObjectiveScope;
  priority: number;
  status: ObjectiveStatus;
  progress: number;
  timeInfo: { remainingSeconds: number; expired: boolean } | null;
  rewards: string[];
  consequences: string[];
  modifiers: string[];
  details: Record<string, unknown>;
}

/**
 * Clamps progress into [0, 1], snapping float noise just under 1 up to 1.
 */
export function normalizeProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value >= 1 - PROGRESS_EPSILON) return 1;
  return Math.max(0, value);
}

/**
 * Abstract objective: the lifecycle state machine shared by every variant.
 *
 * INACTIVE → ACTIVE → IN_PROGRESS → {COMPLETED, FAILED, EXPIRED, ABANDONED},
 * with ACTIVE ⇄ SUSPENDED. Variants only decide how progress moves; this
 * class owns transitions, expiry, completion, the event log and
 * serialization. Once terminal, only the event log may change.
 *
 * @remarks
 * Priority, time limit and required actions are read through the modifier
 * stack, so runtime effects never overwrite the base definition.
 */
export abstract class Objective {
  /** Registry key used to rebuild this objective from a dict */
  abstract readonly kind: string;

  readonly objectiveId: string;
  uuid: string = randomUUID();
  title: string;
  description: string;
  readonly objectiveType: ObjectiveType;
  readonly scope: ObjectiveScope;
  status: ObjectiveStatus = ObjectiveStatus.INACTIVE;
  createdAt: number = Date.now();
  activatedAt: number | null = null;
  completedAt: number | null = null;
  lastUpdate: number | null = null;
  attemptCount = 0;
  parentObjective: string | null;
  childObjectives: string[];
  metadata: Record<string, unknown>;
  readonly activationConditions: ObjectiveCondition[];
  readonly completionConditions: ObjectiveCondition[];
  readonly rewards: ObjectiveReward[];
  readonly consequences: ObjectiveConsequence[];
  modifiers = new ModifierStack();

  protected basePriority: number;
  protected baseTimeLimitMs: number | null;
  /** JSON form of the seed, persisted so the registry can rebuild the variant */
  protected readonly options: ObjectiveOptions;

  private currentProgress = 0;
  private events: ObjectiveEventRecord[] = [];

  constructor(objectiveId: string, seed: ObjectiveSeed, defaults: ObjectiveDefaults) {
    this.objectiveId = objectiveId;
    this.title = seed.title ?? objectiveId;
    this.description = seed.description ?? "";
    this.objectiveType =
      seed.objectiveType ?? defaults.objectiveType ?? ObjectiveType.INVESTIGATION;
    this.scope = seed.scope ?? defaults.scope;
    this.basePriority = seed.priority ?? ObjectivePriority.NORMAL;

    const minutes =
      seed.timeLimitMinutes === undefined
        ? defaults.timeLimitMinutes
        : seed.timeLimitMinutes;
    this.baseTimeLimitMs =
      minutes !== null && minutes > 0 ? minutes * MINUTE_MS : null;

    this.activationConditions = (seed.activationConditions ?? []).map(
      ObjectiveCondition.from,
    );
    this.completionConditions = (seed.completionConditions ?? []).map(
      ObjectiveCondition.from,
    );
    this.rewards = (seed.rewards ?? []).map((r) => ({ ...r }));
    this.consequences = (seed.consequences ?? []).map((c) => ({ ...c }));
    this.parentObjective = seed.parentObjective ?? null;
    this.childObjectives = [...(seed.childObjectives ?? [])];
    this.metadata = { ...(seed.metadata ?? {}) };

    this.options = structuredClone({
      ...seed,
      activationConditions: this.activationConditions.map((c) => c.toJSON()),
      completionConditions: this.completionConditions.map((c) => c.toJSON()),
    });
  }

  get progress(): number {
    return this.currentProgress;
  }

  /**
   * Sets progress, ignored once the objective is terminal.
   */
  protected setProgress(value: number): void {
    if (this.isTerminal) return;
    this.currentProgress = normalizeProgress(value);
  }

  get priority(): number {
    return this.modifiers.applyPriority(this.basePriority);
  }

  get definedPriority(): number {
    return this.basePriority;
  }

  get timeLimitMs(): number | null {
    return this.modifiers.applyTimeLimit(this.baseTimeLimitMs);
  }

  get definedTimeLimitMs(): number | null {
    return this.baseTimeLimitMs;
  }

  get isActive(): boolean {
    return (
      this.status === ObjectiveStatus.ACTIVE ||
      this.status === ObjectiveStatus.IN_PROGRESS
    );
  }

  get isCompleted(): boolean {
    return this.status === ObjectiveStatus.COMPLETED;
  }

  get isFailed(): boolean {
    return (
      this.status === ObjectiveStatus.FAILED ||
      this.status === ObjectiveStatus.EXPIRED ||
      this.status === ObjectiveStatus.ABANDONED
    );
  }

  get isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this.status);
  }

  /**
   * Expiry is measured from activation, never from creation.
   */
  isExpired(now: number = Date.now()): boolean {
    const limit = this.timeLimitMs;
    if (this.activatedAt === null || limit === null) return false;
    return now >= this.activatedAt + limit;
  }

  timeRemainingMs(now: number = Date.now()): number | null {
    const limit = this.timeLimitMs;
    if (this.activatedAt === null || limit === null) return null;
    return Math.max(0, this.activatedAt + limit - now);
  }

  canActivate(state: GameStateSnapshot): boolean {
    if (this.status !== ObjectiveStatus.INACTIVE) return false;
    return this.activationConditions.every((c) => c.evaluate(state));
  }

  activate(state: GameStateSnapshot): boolean {
    if (!this.canActivate(state)) return false;

    const now = Date.now();
    this.status = ObjectiveStatus.ACTIVE;
    this.activatedAt = now;
    this.lastUpdate = now;
    this.attemptCount++;
    this.logEvent("activated", {
      location: state.currentLocation ?? null,
      sanity: state.sanity ?? null,
    });
    logger.info(`Objective activated: ${this.title}`, LogCategory.OBJECTIVES);
    return true;
  }

  /**
   * Marks an active objective as being worked on. Never called automatically.
   */
  startProgress(): boolean {
    if (this.status !== ObjectiveStatus.ACTIVE) return false;

    this.status = ObjectiveStatus.IN_PROGRESS;
    this.lastUpdate = Date.now();
    this.logEvent("progress_started");
    return true;
  }

  /**
   * Variant-specific progress step. Returns whether anything changed.
   */
  abstract updateProgress(
    state: GameStateSnapshot,
    action?: ActionData,
  ): boolean;

  checkCompletion(state: GameStateSnapshot): boolean {
    if (!this.isActive) return false;
    if (this.completionConditions.length > 0) {
      return this.completionConditions.every((c) => c.evaluate(state));
    }
    return this.progress >= 1;
  }

  complete(state: GameStateSnapshot): boolean {
    if (!this.isActive) return false;

    const now = Date.now();
    this.currentProgress = 1;
    this.status = ObjectiveStatus.COMPLETED;
    this.completedAt = now;
    this.lastUpdate = now;
    const applied = this.applyRewards(state);
    this.logEvent("completed", {
      completion_time: new Date(now).toISOString(),
      rewards_applied: applied,
    });
    logger.info(`Objective completed: ${this.title}`, LogCategory.OBJECTIVES);
    return true;
  }

  fail(state: GameStateSnapshot, reason = ""): boolean {
    if (this.isTerminal) return false;

    this.status = ObjectiveStatus.FAILED;
    this.lastUpdate = Date.now();
    const applied = this.applyConsequences(state);
    this.logEvent("failed", { reason, consequences_applied: applied });
    logger.warn(
      `Objective failed: ${this.title}${reason ? ` - ${reason}` : ""}`,
      LogCategory.OBJECTIVES,
    );
    return true;
  }

  abandon(): boolean {
    if (this.isTerminal) return false;

    this.status = ObjectiveStatus.ABANDONED;
    this.lastUpdate = Date.now();
    this.logEvent("abandoned");
    logger.info(`Objective abandoned: ${this.title}`, LogCategory.OBJECTIVES);
    return true;
  }

  suspend(): boolean {
    if (!this.isActive) return false;

    this.status = ObjectiveStatus.SUSPENDED;
    this.lastUpdate = Date.now();
    this.logEvent("suspended");
    return true;
  }

  resume(): boolean {
    if (this.status !== ObjectiveStatus.SUSPENDED) return false;

    this.status = ObjectiveStatus.ACTIVE;
    this.lastUpdate = Date.now();
    this.logEvent("resumed");
    return true;
  }

  /**
   * One turn of the lifecycle: expiry first, then the variant's progress
   * step, then the completion check.
   */
  update(state: GameStateSnapshot, action?: ActionData): boolean {
    if (!this.isActive) return false;

    const now = Date.now();
    for (const expired of this.modifiers.prune(now)) {
      this.logEvent("modifier_expired", { source: expired.source });
    }

    if (this.isExpired(now)) {
      this.expire(state);
      return true;
    }

    this.lastUpdate = now;
    const changed = this.updateProgress(state, action);
    if (this.isTerminal) return true;

    if (this.checkCompletion(state)) {
      this.complete(state);
      return true;
    }
    return changed;
  }

  private expire(state: GameStateSnapshot): void {
    this.status = ObjectiveStatus.EXPIRED;
    this.lastUpdate = Date.now();
    const applied = this.applyConsequences(state);
    this.logEvent("expired", { consequences_applied: applied });
    logger.warn(`Objective expired: ${this.title}`, LogCategory.OBJECTIVES);
  }

  /**
   * Rewards are handed to the game engine; here they are recorded.
   */
  protected applyRewards(_state: GameStateSnapshot): string[] {
    return this.rewards.map(describeReward);
  }

  protected applyConsequences(_state: GameStateSnapshot): string[] {
    return this.consequences.map(describeConsequence);
  }

  protected logEvent(eventType: string, data: Record<string, unknown> = {}): void {
    this.events.push({
      timestamp: new Date().toISOString(),
      event_type: eventType,
      objective_id: this.objectiveId,
      status: this.status,
      progress: this.progress,
      data,
    });
    if (this.events.length > MAX_EVENTS) {
      this.events = this.events.slice(-MAX_EVENTS);
    }
  }

  getEvents(): readonly ObjectiveEventRecord[] {
    return this.events;
  }

  /**
   * Variant details merged into the display info.
   */
  protected describeDetails(): Record<string, unknown> {
    return {};
  }

  getDisplayInfo(now: number = Date.now()): ObjectiveDisplayInfo {
    const remaining = this.timeRemainingMs(now);
    return {
      id: this.objectiveId,
      kind: this.kind,
      title: this.title,
      description: this.description,
      type: this.objectiveType,
      scope: this.scope,
      priority: this.priority,
      status: this.status,
      progress: this.progress,
      timeInfo:
        remaining === null
          ? null
          : {
              remainingSeconds: Math.round(remaining / 1000),
              expired: this.isExpired(now),
            },
      rewards: this.rewards.map(describeReward),
      consequences: this.consequences.map(describeConsequence),
      modifiers: this.modifiers.list().map((m) => m.source),
      details: this.describeDetails(),
    };
  }

  /**
   * Variant runtime state, persisted under `state`.
   */
  protected getState(): Record<string, unknown> {
    return {};
  }

  protected restoreState(_state: Record<string, unknown>): void {}

  toDict(): ObjectiveDict {
    return {
      objective_id: this.objectiveId,
      uuid: this.uuid,
      title: this.title,
      description: this.description,
      objective_type: this.objectiveType,
      scope: this.scope,
      priority: this.basePriority,
      status: this.status,
      progress: this.progress,
      created_at: new Date(this.createdAt).toISOString(),
      activated_at: toIsoOrNull(this.activatedAt),
      completed_at: toIsoOrNull(this.completedAt),
      time_limit:
        this.baseTimeLimitMs === null ? null : this.baseTimeLimitMs / 1000,
      parent_objective: this.parentObjective,
      child_objectives: [...this.childObjectives],
      metadata: { ...this.metadata },
      attempt_count: this.attemptCount,
      events: this.events.slice(-PERSISTED_EVENTS),

      kind: this.kind,
      last_update: toIsoOrNull(this.lastUpdate),
      options: structuredClone(this.options),
      state: this.getState(),
      modifiers: this.modifiers.toJSON(),
    };
  }

  /**
   * Overwrites lifecycle fields with a persisted dict. Used right after the
   * registry rebuilt the variant from the dict's options.
   */
  restoreFromDict(dict: ObjectiveDict): void {
    this.uuid = dict.uuid;
    this.title = dict.title;
    this.description = dict.description;
    this.basePriority = dict.priority;
    this.status = dict.status;
    this.currentProgress = normalizeProgress(dict.progress);
    this.createdAt = readTimestamp(dict.created_at) ?? this.createdAt;
    this.activatedAt = readTimestamp(dict.activated_at);
    this.completedAt = readTimestamp(dict.completed_at);
    this.lastUpdate = readTimestamp(dict.last_update);
    this.baseTimeLimitMs =
      dict.time_limit !== null && dict.time_limit > 0
        ? dict.time_limit * 1000
        : null;
    this.parentObjective = dict.parent_objective;
    this.childObjectives = [...dict.child_objectives];
    this.metadata = { ...dict.metadata };
    this.attemptCount = dict.attempt_count;
    this.events = dict.events.map((e) => ({ ...e }));
    this.modifiers = ModifierStack.from(dict.modifiers);
    this.restoreState(dict.state);
  }

  toString(): string {
    return `${this.title} (${this.status}, ${Math.round(this.progress * 100)}%)`;
  }
}
