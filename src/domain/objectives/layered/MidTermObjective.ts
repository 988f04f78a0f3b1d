import {
  ObjectiveKind,
  ObjectiveScope,
} from "@/shared/constants/ObjectiveEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  errorMessage,
  readNumber,
  readNumberRecord,
  readString,
  readStringList,
} from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import { Objective, type ObjectiveSeed } from "../core/Objective";
import type { CompletionPath, StoryBeat } from "../schemas";

const DEFAULT_BRANCH_ADVANCEMENT = 0.1;
const ESCALATION_FACTOR = 1.5;

const WEIGHTS = {
  investigation: 0.4,
  story: 0.3,
  revelations: 0.2,
  skills: 0.1,
} as const;

export type HorrorEscalationListener = (
  accumulatedSanLoss: number,
  state: GameStateSnapshot,
) => void;

/**
 * Objective covering a whole scenario or session.
 *
 * Progress blends investigation branches, story beats, horror revelations
 * and skill challenges, renormalizing weights over the sources that exist.
 * Accumulated SAN loss escalates the horror each time it crosses the
 * threshold. The first completion path whose requirements hold is locked in
 * and completes the objective.
 */
export class MidTermObjective extends Objective {
  readonly kind: string = ObjectiveKind.MID_TERM;

  protected readonly investigationBranches: Record<string, number>;
  protected readonly storyBeats: StoryBeat[];
  protected currentBeatIndex = 0;
  protected readonly skillChallenges: Record<string, number>;
  protected skillsTested: Record<string, number> = {};
  protected sanLossThreshold: number;
  protected accumulatedSanLoss = 0;
  protected escalationCount = 0;
  protected readonly horrorRevelations: string[];
  protected readonly revelationsUnlocked = new Set<string>();
  protected readonly completionPaths: Record<string, CompletionPath>;
  activePath: string | null = null;

  private horrorListeners: HorrorEscalationListener[] = [];

  constructor(objectiveId: string, seed: ObjectiveSeed = {}) {
    super(
      objectiveId,
      { ...seed, scope: ObjectiveScope.MID_TERM },
      { scope: ObjectiveScope.MID_TERM, timeLimitMinutes: 120 },
    );
    this.investigationBranches = { ...(seed.investigationBranches ?? {}) };
    this.storyBeats = (seed.storyBeats ?? []).map((b) => ({ ...b }));
    this.skillChallenges = { ...(seed.skillChallenges ?? {}) };
    this.sanLossThreshold = seed.sanLossThreshold ?? 10;
    this.horrorRevelations = [...(seed.horrorRevelations ?? [])];
    this.completionPaths = { ...(seed.completionPaths ?? {}) };
  }

  onHorrorEscalation(listener: HorrorEscalationListener): () => void {
    this.horrorListeners.push(listener);
    return () => {
      this.horrorListeners = this.horrorListeners.filter((l) => l !== listener);
    };
  }

  updateProgress(state: GameStateSnapshot, action?: ActionData): boolean {
    if (!this.isActive) return false;

    let progressMade = false;

    const branch = action?.investigationBranch;
    if (branch !== undefined && Object.hasOwn(this.investigationBranches, branch)) {
      const advancement = action?.advancement ?? DEFAULT_BRANCH_ADVANCEMENT;
      this.investigationBranches[branch] = Math.min(
        1,
        this.investigationBranches[branch] + advancement,
      );
      progressMade = true;
      this.logEvent("investigation_advanced", {
        branch,
        progress: this.investigationBranches[branch],
        advancement,
      });
    }

    if (action?.storyBeatCompleted && this.currentBeatIndex < this.storyBeats.length) {
      this.currentBeatIndex++;
      progressMade = true;
      this.logEvent("story_beat_completed", {
        beat_index: this.currentBeatIndex - 1,
        total_beats: this.storyBeats.length,
      });
    }

    const skill = action?.skillUsed;
    if (skill !== undefined && Object.hasOwn(this.skillChallenges, skill)) {
      this.skillsTested[skill] = (this.skillsTested[skill] ?? 0) + 1;
      progressMade = true;
    }

    if (action?.sanLoss !== undefined) {
      this.accumulatedSanLoss += action.sanLoss;
      if (this.accumulatedSanLoss >= this.sanLossThreshold) {
        this.triggerHorrorEscalation(state);
      }
    }

    const revelation = action?.revelation;
    if (
      revelation !== undefined &&
      this.horrorRevelations.includes(revelation) &&
      !this.revelationsUnlocked.has(revelation)
    ) {
      this.revelationsUnlocked.add(revelation);
      progressMade = true;
      this.logEvent("horror_revelation", { revelation });
    }

    this.recalculate();
    this.checkCompletionPaths();
    return progressMade;
  }

  private recalculate(): void {
    const components: Array<[number, number]> = [];

    const branches = Object.values(this.investigationBranches);
    if (branches.length > 0) {
      components.push([this.averageBranchProgress(), WEIGHTS.investigation]);
    }
    if (this.storyBeats.length > 0) {
      components.push([
        this.currentBeatIndex / this.storyBeats.length,
        WEIGHTS.story,
      ]);
    }
    if (this.horrorRevelations.length > 0) {
      components.push([
        this.revelationsUnlocked.size / this.horrorRevelations.length,
        WEIGHTS.revelations,
      ]);
    }
    const challenges = Object.entries(this.skillChallenges);
    if (challenges.length > 0) {
      const met = challenges.filter(
        ([name, required]) => (this.skillsTested[name] ?? 0) >= required,
      ).length;
      components.push([met / challenges.length, WEIGHTS.skills]);
    }

    if (components.length === 0) {
      this.setProgress(0);
      return;
    }
    const totalWeight = components.reduce((sum, [, w]) => sum + w, 0);
    const weighted = components.reduce((sum, [p, w]) => sum + p * w, 0);
    this.setProgress(weighted / totalWeight);
  }

  private averageBranchProgress(): number {
    const values = Object.values(this.investigationBranches);
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
  }

  private triggerHorrorEscalation(state: GameStateSnapshot): void {
    this.escalationCount++;
    this.logEvent("horror_escalation", {
      san_loss: this.accumulatedSanLoss,
      threshold: this.sanLossThreshold,
    });
    this.sanLossThreshold *= ESCALATION_FACTOR;

    for (const listener of this.horrorListeners) {
      try {
        listener(this.accumulatedSanLoss, state);
      } catch (error) {
        logger.error(
          `Error in horror escalation listener for ${this.objectiveId}: ${errorMessage(error)}`,
          LogCategory.OBJECTIVES,
        );
      }
    }
  }

  /**
   * Locks in the first satisfied path. Later paths are never reconsidered.
   */
  private checkCompletionPaths(): void {
    if (this.activePath !== null) return;

    for (const [name, path] of Object.entries(this.completionPaths)) {
      if (this.pathRequirementsMet(path)) {
        this.activePath = name;
        this.logEvent("completion_path_activated", { path: name });
        return;
      }
    }
  }

  private pathRequirementsMet(path: CompletionPath): boolean {
    const { minInvestigationProgress, requiredRevelations, minStoryBeat } =
      path.requirements;
    if (
      minInvestigationProgress === undefined &&
      requiredRevelations === undefined &&
      minStoryBeat === undefined
    ) {
      return false;
    }
    if (
      minInvestigationProgress !== undefined &&
      this.averageBranchProgress() < minInvestigationProgress
    ) {
      return false;
    }
    if (
      requiredRevelations !== undefined &&
      !requiredRevelations.every((r) => this.revelationsUnlocked.has(r))
    ) {
      return false;
    }
    if (minStoryBeat !== undefined && this.currentBeatIndex < minStoryBeat) {
      return false;
    }
    return true;
  }

  checkCompletion(state: GameStateSnapshot): boolean {
    if (this.isActive && this.activePath !== null) return true;
    return super.checkCompletion(state);
  }

  getCurrentStoryBeat(): StoryBeat | null {
    return this.storyBeats[this.currentBeatIndex] ?? null;
  }

  getSanLossThreshold(): number {
    return this.sanLossThreshold;
  }

  getAccumulatedSanLoss(): number {
    return this.accumulatedSanLoss;
  }

  protected describeDetails(): Record<string, unknown> {
    return {
      investigationBranches: { ...this.investigationBranches },
      storyProgress: {
        currentBeat: this.currentBeatIndex,
        totalBeats: this.storyBeats.length,
        currentBeatData: this.getCurrentStoryBeat(),
      },
      horrorProgression: {
        sanLoss: this.accumulatedSanLoss,
        threshold: this.sanLossThreshold,
        escalations: this.escalationCount,
        revelationsUnlocked: [...this.revelationsUnlocked],
        totalRevelations: this.horrorRevelations.length,
      },
      skillChallenges: { ...this.skillChallenges },
      skillsTested: { ...this.skillsTested },
      activeCompletionPath: this.activePath,
    };
  }

  protected getState(): Record<string, unknown> {
    return {
      investigationBranches: { ...this.investigationBranches },
      currentBeatIndex: this.currentBeatIndex,
      skillsTested: { ...this.skillsTested },
      sanLossThreshold: this.sanLossThreshold,
      accumulatedSanLoss: this.accumulatedSanLoss,
      escalationCount: this.escalationCount,
      revelationsUnlocked: [...this.revelationsUnlocked],
      activePath: this.activePath,
    };
  }

  protected restoreState(state: Record<string, unknown>): void {
    Object.assign(
      this.investigationBranches,
      readNumberRecord(state.investigationBranches),
    );
    this.currentBeatIndex = readNumber(state.currentBeatIndex, 0);
    this.skillsTested = readNumberRecord(state.skillsTested);
    this.sanLossThreshold = readNumber(state.sanLossThreshold, this.sanLossThreshold);
    this.accumulatedSanLoss = readNumber(state.accumulatedSanLoss, 0);
    this.escalationCount = readNumber(state.escalationCount, 0);
    this.revelationsUnlocked.clear();
    for (const r of readStringList(state.revelationsUnlocked)) {
      this.revelationsUnlocked.add(r);
    }
    const path = readString(state.activePath);
    this.activePath = path === "" ? null : path;
  }
}
