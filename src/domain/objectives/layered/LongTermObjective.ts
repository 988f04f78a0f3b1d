import {
  ObjectiveKind,
  ObjectiveScope,
} from "@/shared/constants/ObjectiveEnums";
import {
  isRecord,
  readNumber,
  readNumberRecord,
  readString,
} from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import { Objective, type ObjectiveSeed } from "../core/Objective";
import type { CampaignPhase } from "../schemas";

const WEIGHTS = { phases: 0.5, growth: 0.3, themes: 0.2 } as const;

export interface WorldStateChange {
  timestamp: string;
  change: unknown;
  source: string;
}

/**
 * Growth goal kinds understood by the long-term progress blend.
 */
export const GROWTH_GOALS = {
  /** Number of mythos entities known at level 1+ */
  MYTHOS_ENTITIES: "mythos_entities",
  /** Sum of all mythos knowledge levels */
  MYTHOS_KNOWLEDGE_TOTAL: "mythos_knowledge_total",
  /** Number of NPCs with a positive relationship */
  NPC_RELATIONSHIPS: "npc_relationships",
} as const;

/**
 * Campaign-arc objective spanning several sessions. No time limit.
 */
export class LongTermObjective extends Objective {
  readonly kind: string = ObjectiveKind.LONG_TERM;

  protected readonly campaignPhases: CampaignPhase[];
  currentPhase = 0;
  protected phaseProgress: Record<string, number> = {};
  protected readonly characterGrowthGoals: Record<string, number>;
  protected mythosKnowledgeLevels: Record<string, number>;
  protected readonly recurringThemes: string[];
  protected themeEncounters: Record<string, number> = {};
  protected worldStateChanges: WorldStateChange[] = [];
  protected npcRelationshipChanges: Record<string, number> = {};
  readonly persistentElements: Record<string, unknown>;

  constructor(objectiveId: string, seed: ObjectiveSeed = {}) {
    super(
      objectiveId,
      { ...seed, scope: ObjectiveScope.LONG_TERM },
      { scope: ObjectiveScope.LONG_TERM, timeLimitMinutes: null },
    );
    this.campaignPhases = (seed.campaignPhases ?? []).map((p) => ({ ...p }));
    this.characterGrowthGoals = { ...(seed.characterGrowthGoals ?? {}) };
    this.mythosKnowledgeLevels = { ...(seed.mythosKnowledgeLevels ?? {}) };
    this.recurringThemes = [...(seed.recurringThemes ?? [])];
    this.persistentElements = { ...(seed.persistentElements ?? {}) };
  }

  updateProgress(state: GameStateSnapshot, action?: ActionData): boolean {
    if (!this.isActive) return false;

    let progressMade = false;

    if (action?.phaseAdvancement !== undefined) {
      const index = action.phaseIndex ?? this.currentPhase;
      this.advancePhase(index, action.phaseAdvancement);
      progressMade = true;
    }

    const knowledge = action?.mythosKnowledge;
    if (knowledge !== undefined) {
      const gain = knowledge.levelGain ?? 1;
      this.mythosKnowledgeLevels[knowledge.entity] =
        (this.mythosKnowledgeLevels[knowledge.entity] ?? 0) + gain;
      progressMade = true;
      this.logEvent("mythos_knowledge_gained", {
        entity: knowledge.entity,
        new_level: this.mythosKnowledgeLevels[knowledge.entity],
        gain,
      });
    }

    const theme = action?.themeEncounter;
    if (theme !== undefined && this.recurringThemes.includes(theme)) {
      this.themeEncounters[theme] = (this.themeEncounters[theme] ?? 0) + 1;
      progressMade = true;
    }

    if (action?.worldChange !== undefined) {
      this.worldStateChanges.push({
        timestamp: new Date().toISOString(),
        change: action.worldChange,
        source: readString(state.currentSession, "unknown"),
      });
      progressMade = true;
    }

    const relationship = action?.npcRelationship;
    if (relationship !== undefined) {
      this.npcRelationshipChanges[relationship.npc] =
        (this.npcRelationshipChanges[relationship.npc] ?? 0) + relationship.change;
      progressMade = true;
    }

    this.recalculate();
    return progressMade;
  }

  /**
   * Adds progress to a phase. Reaching 1.0 on the current phase completes it
   * and moves on, cascading through phases that were already full.
   */
  advancePhase(index: number, advancement: number): void {
    if (this.isTerminal) return;
    const key = String(index);
    this.phaseProgress[key] = Math.min(
      1,
      (this.phaseProgress[key] ?? 0) + Math.max(0, advancement),
    );

    while (
      this.currentPhase < this.campaignPhases.length &&
      (this.phaseProgress[String(this.currentPhase)] ?? 0) >= 1
    ) {
      this.completeCurrentPhase();
    }
    this.recalculate();
  }

  private completeCurrentPhase(): void {
    const phase = this.campaignPhases[this.currentPhase];
    this.logEvent("campaign_phase_completed", {
      phase: this.currentPhase,
      phase_name: phase.name,
      completion_time: new Date().toISOString(),
    });
    this.currentPhase++;

    const effects = phase.completionEffects;
    for (const [entity, level] of Object.entries(effects?.unlockKnowledge ?? {})) {
      this.mythosKnowledgeLevels[entity] = Math.max(
        this.mythosKnowledgeLevels[entity] ?? 0,
        level,
      );
    }
    if (effects?.worldState !== undefined) {
      this.worldStateChanges.push({
        timestamp: new Date().toISOString(),
        change: effects.worldState,
        source: "phase_completion",
      });
    }
  }

  private recalculate(): void {
    const components: Array<[number, number]> = [];

    const phaseCount = this.campaignPhases.length;
    if (phaseCount > 0) {
      const completed = this.campaignPhases.filter(
        (_, i) => (this.phaseProgress[String(i)] ?? 0) >= 1,
      ).length;
      const current =
        this.currentPhase < phaseCount
          ? (this.phaseProgress[String(this.currentPhase)] ?? 0)
          : 0;
      components.push([(completed + (current < 1 ? current : 0)) / phaseCount, WEIGHTS.phases]);
    }

    const goals = Object.entries(this.characterGrowthGoals);
    if (goals.length > 0) {
      const met = goals.filter(([goal, target]) => this.growthValue(goal) >= target).length;
      components.push([met / goals.length, WEIGHTS.growth]);
    }

    if (this.recurringThemes.length > 0) {
      const explored = this.recurringThemes.filter(
        (t) => (this.themeEncounters[t] ?? 0) > 0,
      ).length;
      components.push([explored / this.recurringThemes.length, WEIGHTS.themes]);
    }

    if (components.length === 0) {
      this.setProgress(0);
      return;
    }
    const totalWeight = components.reduce((sum, [, w]) => sum + w, 0);
    this.setProgress(components.reduce((sum, [p, w]) => sum + p * w, 0) / totalWeight);
  }

  private growthValue(goal: string): number {
    const levels = Object.values(this.mythosKnowledgeLevels);
    switch (goal) {
      case GROWTH_GOALS.MYTHOS_ENTITIES:
        return levels.filter((level) => level > 0).length;
      case GROWTH_GOALS.MYTHOS_KNOWLEDGE_TOTAL:
        return levels.reduce((sum, level) => sum + level, 0);
      case GROWTH_GOALS.NPC_RELATIONSHIPS:
        return Object.values(this.npcRelationshipChanges).filter((v) => v > 0).length;
      default:
        return 0;
    }
  }

  getCurrentPhaseInfo(): (CampaignPhase & { progress: number }) | null {
    const phase = this.campaignPhases[this.currentPhase];
    if (phase === undefined) return null;
    return { ...phase, progress: this.phaseProgress[String(this.currentPhase)] ?? 0 };
  }

  getMythosKnowledge(): Readonly<Record<string, number>> {
    return this.mythosKnowledgeLevels;
  }

  getWorldStateChanges(): readonly WorldStateChange[] {
    return this.worldStateChanges;
  }

  protected describeDetails(): Record<string, unknown> {
    return {
      campaignProgression: {
        currentPhase: this.currentPhase,
        totalPhases: this.campaignPhases.length,
        currentPhaseInfo: this.getCurrentPhaseInfo(),
        phaseProgress: { ...this.phaseProgress },
      },
      mythosKnowledge: { ...this.mythosKnowledgeLevels },
      characterGrowth: { ...this.characterGrowthGoals },
      themeEncounters: { ...this.themeEncounters },
      worldChanges: this.worldStateChanges.length,
      npcRelationships: { ...this.npcRelationshipChanges },
    };
  }

  protected getState(): Record<string, unknown> {
    return {
      currentPhase: this.currentPhase,
      phaseProgress: { ...this.phaseProgress },
      mythosKnowledgeLevels: { ...this.mythosKnowledgeLevels },
      themeEncounters: { ...this.themeEncounters },
      worldStateChanges: this.worldStateChanges.map((c) => ({ ...c })),
      npcRelationshipChanges: { ...this.npcRelationshipChanges },
    };
  }

  protected restoreState(state: Record<string, unknown>): void {
    this.currentPhase = readNumber(state.currentPhase, 0);
    this.phaseProgress = readNumberRecord(state.phaseProgress);
    this.mythosKnowledgeLevels = {
      ...this.mythosKnowledgeLevels,
      ...readNumberRecord(state.mythosKnowledgeLevels),
    };
    this.themeEncounters = readNumberRecord(state.themeEncounters);
    this.npcRelationshipChanges = readNumberRecord(state.npcRelationshipChanges);
    const changes = Array.isArray(state.worldStateChanges) ? state.worldStateChanges : [];
    this.worldStateChanges = changes.filter(isRecord).map((c) => ({
      timestamp: readString(c.timestamp),
      change: c.change,
      source: readString(c.source, "unknown"),
    }));
  }
}
