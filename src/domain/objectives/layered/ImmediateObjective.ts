import {
  ObjectiveKind,
  ObjectiveScope,
} from "@/shared/constants/ObjectiveEnums";
import { readStringList } from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import { Objective, type ObjectiveSeed } from "../core/Objective";

/**
 * Objective resolved within one or two actions.
 *
 * Progress is the share of required actions performed. Actions added by
 * modifiers (madness compulsions) count as required while the modifier holds.
 */
export class ImmediateObjective extends Objective {
  readonly kind: string = ObjectiveKind.IMMEDIATE;

  protected readonly requiredActions: Set<string>;
  protected readonly completedActions = new Set<string>();
  readonly autoCompleteOnAction: boolean;
  readonly provideImmediateFeedback: boolean;

  constructor(objectiveId: string, seed: ObjectiveSeed = {}) {
    super(
      objectiveId,
      { ...seed, scope: ObjectiveScope.IMMEDIATE },
      { scope: ObjectiveScope.IMMEDIATE, timeLimitMinutes: 5 },
    );
    this.requiredActions = new Set(seed.requiredActions ?? []);
    this.autoCompleteOnAction = seed.autoCompleteOnAction ?? true;
    this.provideImmediateFeedback = seed.provideImmediateFeedback ?? true;
  }

  getRequiredActions(): Set<string> {
    return this.modifiers.applyActions(this.requiredActions);
  }

  getRemainingActions(): string[] {
    return [...this.getRequiredActions()].filter(
      (a) => !this.completedActions.has(a),
    );
  }

  updateProgress(state: GameStateSnapshot, action?: ActionData): boolean {
    if (!this.isActive) return false;

    let progressMade = false;
    const required = this.getRequiredActions();
    const actionType = action?.actionType;

    if (
      actionType &&
      required.has(actionType) &&
      !this.completedActions.has(actionType)
    ) {
      this.completedActions.add(actionType);
      progressMade = true;
      if (this.provideImmediateFeedback) {
        this.logEvent("action_completed", {
          action: actionType,
          remaining: this.getRemainingActions(),
        });
      }
    }

    this.recalculate(state);
    return progressMade;
  }

  /**
   * Completion for objectives without required actions ("be at X", "hold Y").
   */
  protected checkSimpleCompletion(_state: GameStateSnapshot): boolean {
    return false;
  }

  /**
   * Without auto-completion and explicit conditions, the game completes the
   * objective itself.
   */
  checkCompletion(state: GameStateSnapshot): boolean {
    if (this.completionConditions.length > 0) return super.checkCompletion(state);
    if (!this.autoCompleteOnAction) return false;
    return this.isActive && this.coverage(state) >= 1;
  }

  /**
   * Widens the action set. Progress keeps its high-water mark; completion
   * waits for the new action.
   */
  addRequiredAction(actionType: string): void {
    if (this.isTerminal) return;
    this.requiredActions.add(actionType);
    this.options.requiredActions = [...this.requiredActions];
  }

  private countCompleted(required: Set<string>): number {
    return [...required].filter((a) => this.completedActions.has(a)).length;
  }

  /** Share of the current action set performed */
  private coverage(state: GameStateSnapshot): number {
    const required = this.getRequiredActions();
    if (required.size > 0) return this.countCompleted(required) / required.size;
    return this.checkSimpleCompletion(state) ? 1 : 0;
  }

  private recalculate(state: GameStateSnapshot): void {
    this.setProgress(Math.max(this.progress, this.coverage(state)));
  }

  protected describeDetails(): Record<string, unknown> {
    return {
      requiredActions: [...this.getRequiredActions()],
      completedActions: [...this.completedActions],
      remainingActions: this.getRemainingActions(),
      immediateFeedback: this.provideImmediateFeedback,
    };
  }

  protected getState(): Record<string, unknown> {
    return {
      requiredActions: [...this.requiredActions],
      completedActions: [...this.completedActions],
    };
  }

  protected restoreState(state: Record<string, unknown>): void {
    this.requiredActions.clear();
    for (const a of readStringList(state.requiredActions)) {
      this.requiredActions.add(a);
    }
    this.completedActions.clear();
    for (const a of readStringList(state.completedActions)) {
      this.completedActions.add(a);
    }
  }
}
