import { clamp } from "@/shared/utils/snapshotUtils";
import {
  MAX_PRIORITY,
  MIN_PRIORITY,
} from "@/shared/constants/ObjectiveEnums";
import type { ObjectiveModifier } from "../schemas";

const MINUTE_MS = 60_000;

export type ModifierInput = Omit<ObjectiveModifier, "appliedAt"> & {
  appliedAt?: number;
};

/**
 * Read-time adjustments layered over an objective's base definition.
 *
 * Madness effects, sanity-state configurations and difficulty tuning push
 * modifiers here instead of rewriting the objective's priority, time limit
 * or required actions. One modifier per source; pushing a source again
 * replaces it.
 */
export class ModifierStack {
  private modifiers: ObjectiveModifier[] = [];

  apply(input: ModifierInput): void {
    this.removeBySource(input.source);
    this.modifiers.push({ ...input, appliedAt: input.appliedAt ?? Date.now() });
  }

  removeBySource(source: string): boolean {
    const before = this.modifiers.length;
    this.modifiers = this.modifiers.filter((m) => m.source !== source);
    return this.modifiers.length !== before;
  }

  has(source: string): boolean {
    return this.modifiers.some((m) => m.source === source);
  }

  get(source: string): ObjectiveModifier | undefined {
    return this.modifiers.find((m) => m.source === source);
  }

  /**
   * Drops modifiers whose `expiresAt` has passed and returns them.
   */
  prune(now: number): ObjectiveModifier[] {
    const expired = this.modifiers.filter(
      (m) => m.expiresAt != null && m.expiresAt <= now,
    );
    if (expired.length > 0) {
      this.modifiers = this.modifiers.filter((m) => !expired.includes(m));
    }
    return expired;
  }

  list(): readonly ObjectiveModifier[] {
    return this.modifiers;
  }

  get size(): number {
    return this.modifiers.length;
  }

  applyPriority(base: number): number {
    const delta = this.modifiers.reduce(
      (sum, m) => sum + (m.priorityDelta ?? 0),
      0,
    );
    return clamp(base + delta, MIN_PRIORITY, MAX_PRIORITY);
  }

  /**
   * Scales and shortens a time limit. A missing base limit stays missing.
   */
  applyTimeLimit(baseMs: number | null): number | null {
    if (baseMs === null) return null;
    if (this.modifiers.length === 0) return baseMs;

    let limit = baseMs;
    for (const m of this.modifiers) {
      limit *= m.timeLimitFactor ?? 1;
    }
    for (const m of this.modifiers) {
      limit -= (m.timePressureMinutes ?? 0) * MINUTE_MS;
    }
    return Math.max(MINUTE_MS, Math.round(limit));
  }

  applyActions(base: Iterable<string>): Set<string> {
    const actions = new Set(base);
    for (const m of this.modifiers) {
      for (const action of m.addedActions ?? []) actions.add(action);
    }
    return actions;
  }

  addedActions(): Set<string> {
    return this.applyActions([]);
  }

  clear(): void {
    this.modifiers = [];
  }

  toJSON(): ObjectiveModifier[] {
    return this.modifiers.map((m) => ({
      ...m,
      addedActions: m.addedActions ? [...m.addedActions] : undefined,
    }));
  }

  static from(list: readonly ObjectiveModifier[]): ModifierStack {
    const stack = new ModifierStack();
    stack.modifiers = list.map((m) => ({ ...m }));
    return stack;
  }
}
