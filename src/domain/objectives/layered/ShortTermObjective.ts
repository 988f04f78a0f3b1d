import {
  ObjectiveKind,
  ObjectiveScope,
} from "@/shared/constants/ObjectiveEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  errorMessage,
  readNumber,
  readStringList,
} from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import { Objective, normalizeProgress, type ObjectiveSeed } from "../core/Objective";

const DISCOVERY_WEIGHT = 0.6;
const MILESTONE_WEIGHT = 0.4;

export type TensionListener = (tensionLevel: number, progress: number) => void;

/**
 * Objective spanning a single scene: discoveries plus milestones.
 *
 * Progress = 0.6 · discoveries + 0.4 · milestones; when one source is empty
 * the other carries the full weight. Each step of progress ramps the scene's
 * tension from `initialTension` towards `maxTension`.
 */
export class ShortTermObjective extends Objective {
  readonly kind: string = ObjectiveKind.SHORT_TERM;

  protected readonly requiredDiscoveries: Set<string>;
  protected readonly discoveriesMade = new Set<string>();
  protected milestoneCount: number;
  protected milestonesCompleted = 0;
  readonly subObjectives: string[];
  readonly sceneContext: Record<string, unknown>;
  readonly tensionRampEnabled: boolean;
  readonly initialTension: number;
  readonly maxTension: number;
  tensionLevel: number;

  private tensionListeners: TensionListener[] = [];

  constructor(objectiveId: string, seed: ObjectiveSeed = {}) {
    super(
      objectiveId,
      { ...seed, scope: ObjectiveScope.SHORT_TERM },
      { scope: ObjectiveScope.SHORT_TERM, timeLimitMinutes: 20 },
    );
    this.requiredDiscoveries = new Set(seed.requiredDiscoveries ?? []);
    this.milestoneCount = seed.milestoneCount ?? 3;
    this.subObjectives = [...(seed.subObjectives ?? [])];
    this.sceneContext = { ...(seed.sceneContext ?? {}) };
    this.tensionRampEnabled = seed.tensionRampEnabled ?? true;
    this.initialTension = seed.initialTension ?? 1;
    this.maxTension = seed.maxTension ?? 3;
    this.tensionLevel = this.initialTension;
  }

  /**
   * Registers a tension listener and returns its unsubscribe function.
   */
  onTensionChange(listener: TensionListener): () => void {
    this.tensionListeners.push(listener);
    return () => {
      this.tensionListeners = this.tensionListeners.filter((l) => l !== listener);
    };
  }

  updateProgress(_state: GameStateSnapshot, action?: ActionData): boolean {
    if (!this.isActive) return false;

    let progressMade = false;

    const discovery = action?.discovery;
    if (
      discovery !== undefined &&
      this.requiredDiscoveries.has(discovery) &&
      !this.discoveriesMade.has(discovery)
    ) {
      this.discoveriesMade.add(discovery);
      progressMade = true;
      this.logEvent("discovery_made", { discovery });
    }

    if (action?.milestoneCompleted && this.milestonesCompleted < this.milestoneCount) {
      this.milestonesCompleted++;
      progressMade = true;
      this.logEvent("milestone_completed", {
        milestone: this.milestonesCompleted,
        total: this.milestoneCount,
      });
    }

    this.recalculate();

    if (this.tensionRampEnabled && progressMade) {
      this.updateTension();
    }
    return progressMade;
  }

  /** Weighted share of discoveries and milestones reached */
  private coverage(): number {
    const hasDiscoveries = this.requiredDiscoveries.size > 0;
    const hasMilestones = this.milestoneCount > 0;
    const discoveryProgress = hasDiscoveries
      ? this.discoveriesMade.size / this.requiredDiscoveries.size
      : 0;
    const milestoneProgress = hasMilestones
      ? this.milestonesCompleted / this.milestoneCount
      : 0;

    if (hasDiscoveries && hasMilestones) {
      return normalizeProgress(
        discoveryProgress * DISCOVERY_WEIGHT + milestoneProgress * MILESTONE_WEIGHT,
      );
    }
    return hasDiscoveries ? discoveryProgress : milestoneProgress;
  }

  /**
   * Raising the targets never lowers progress; completion waits for them.
   */
  private recalculate(): void {
    this.setProgress(Math.max(this.progress, this.coverage()));
  }

  checkCompletion(state: GameStateSnapshot): boolean {
    if (this.completionConditions.length > 0) return super.checkCompletion(state);
    return this.isActive && this.coverage() >= 1;
  }

  private updateTension(): void {
    this.tensionLevel =
      this.initialTension + this.progress * (this.maxTension - this.initialTension);
    this.logEvent("tension_updated", {
      tension_level: this.tensionLevel,
      progress: this.progress,
    });

    for (const listener of this.tensionListeners) {
      try {
        listener(this.tensionLevel, this.progress);
      } catch (error) {
        logger.error(
          `Error in tension listener for ${this.objectiveId}: ${errorMessage(error)}`,
          LogCategory.OBJECTIVES,
        );
      }
    }
  }

  /**
   * Counts one milestone outside of an action, e.g. from a scripted scene.
   */
  addMilestone(): boolean {
    if (!this.isActive || this.milestonesCompleted >= this.milestoneCount) {
      return false;
    }
    this.milestonesCompleted++;
    this.recalculate();
    return true;
  }

  addDiscovery(discovery: string): void {
    if (this.isTerminal) return;
    this.requiredDiscoveries.add(discovery);
    this.options.requiredDiscoveries = [...this.requiredDiscoveries];
    this.recalculate();
  }

  getMilestoneCount(): number {
    return this.milestoneCount;
  }

  /**
   * Changes the milestone target; used by difficulty tuning.
   */
  setMilestoneCount(count: number): void {
    if (this.isTerminal) return;
    this.milestoneCount = Math.max(1, Math.round(count));
    this.milestonesCompleted = Math.min(this.milestonesCompleted, this.milestoneCount);
    this.recalculate();
  }

  protected describeDetails(): Record<string, unknown> {
    return {
      milestones: {
        completed: this.milestonesCompleted,
        total: this.milestoneCount,
      },
      discoveries: {
        required: [...this.requiredDiscoveries],
        made: [...this.discoveriesMade],
        remaining: [...this.requiredDiscoveries].filter(
          (d) => !this.discoveriesMade.has(d),
        ),
      },
      tensionLevel: this.tensionLevel,
      sceneContext: this.sceneContext,
    };
  }

  protected getState(): Record<string, unknown> {
    return {
      requiredDiscoveries: [...this.requiredDiscoveries],
      discoveriesMade: [...this.discoveriesMade],
      milestoneCount: this.milestoneCount,
      milestonesCompleted: this.milestonesCompleted,
      tensionLevel: this.tensionLevel,
    };
  }

  protected restoreState(state: Record<string, unknown>): void {
    this.requiredDiscoveries.clear();
    for (const d of readStringList(state.requiredDiscoveries)) {
      this.requiredDiscoveries.add(d);
    }
    this.discoveriesMade.clear();
    for (const d of readStringList(state.discoveriesMade)) {
      this.discoveriesMade.add(d);
    }
    this.milestoneCount = readNumber(state.milestoneCount, this.milestoneCount);
    this.milestonesCompleted = readNumber(state.milestonesCompleted, 0);
    this.tensionLevel = readNumber(state.tensionLevel, this.initialTension);
  }
}
