import type {
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveType,
} from "@/shared/constants/ObjectiveEnums";
import type { Objective } from "./Objective";

interface ArenaSlot {
  objective: Objective;
  parentId: string | null;
  childIds: string[];
}

/**
 * Slot map holding every objective the manager owns, with the hierarchy kept
 * inside the slots.
 *
 * A child whose parent is not present yet waits in a pending list and is
 * attached when the parent arrives. Removing a parent detaches its children
 * and puts them back on the pending list, so the hierarchy never points at a
 * missing slot.
 */
export class ObjectiveArena {
  private slots = new Map<string, ArenaSlot>();
  private byType = new Map<ObjectiveType, Set<string>>();
  private byScope = new Map<ObjectiveScope, Set<string>>();
  /** parent id → ids of children inserted before the parent */
  private pendingChildren = new Map<string, string[]>();
  /** child id → parent that declared it before the child arrived */
  private pendingParents = new Map<string, string>();

  get size(): number {
    return this.slots.size;
  }

  has(id: string): boolean {
    return this.slots.has(id);
  }

  get(id: string): Objective | undefined {
    return this.slots.get(id)?.objective;
  }

  /**
   * Objectives in insertion order.
   */
  values(): Objective[] {
    return [...this.slots.values()].map((slot) => slot.objective);
  }

  ids(): string[] {
    return [...this.slots.keys()];
  }

  insert(objective: Objective): boolean {
    const id = objective.objectiveId;
    if (this.slots.has(id)) return false;

    const slot: ArenaSlot = { objective, parentId: null, childIds: [] };
    this.slots.set(id, slot);
    this.index(this.byType, objective.objectiveType, id);
    this.index(this.byScope, objective.scope, id);

    for (const childId of this.pendingChildren.get(id) ?? []) {
      const child = this.slots.get(childId);
      if (child !== undefined && child.parentId === null) this.link(slot, child);
    }
    this.pendingChildren.delete(id);

    const parentId = objective.parentObjective ?? this.pendingParents.get(id) ?? null;
    this.pendingParents.delete(id);
    if (parentId !== null) {
      const parent = this.slots.get(parentId);
      if (parent !== undefined) this.link(parent, slot);
      else this.addPending(parentId, id);
    }

    for (const childId of objective.childObjectives) {
      const child = this.slots.get(childId);
      if (child === undefined) {
        this.pendingParents.set(childId, id);
      } else if (
        child.parentId === null &&
        (child.objective.parentObjective === null || child.objective.parentObjective === id)
      ) {
        this.link(slot, child);
      }
    }
    return true;
  }

  remove(id: string): Objective | undefined {
    const slot = this.slots.get(id);
    if (slot === undefined) return undefined;

    this.slots.delete(id);
    this.unindex(this.byType, slot.objective.objectiveType, id);
    this.unindex(this.byScope, slot.objective.scope, id);

    if (slot.parentId !== null) {
      const parent = this.slots.get(slot.parentId);
      if (parent !== undefined) {
        parent.childIds = parent.childIds.filter((c) => c !== id);
      }
    } else if (slot.objective.parentObjective !== null) {
      this.dropPending(slot.objective.parentObjective, id);
    }

    for (const childId of slot.childIds) {
      const child = this.slots.get(childId);
      if (child === undefined) continue;
      child.parentId = null;
      this.addPending(id, childId);
    }
    for (const [childId, parentId] of this.pendingParents) {
      if (parentId === id) this.pendingParents.delete(childId);
    }
    return slot.objective;
  }

  getChildren(id: string): Objective[] {
    const slot = this.slots.get(id);
    if (slot === undefined) return [];
    return slot.childIds.flatMap((c) => {
      const child = this.slots.get(c);
      return child === undefined ? [] : [child.objective];
    });
  }

  getParent(id: string): Objective | undefined {
    const parentId = this.slots.get(id)?.parentId;
    return parentId == null ? undefined : this.slots.get(parentId)?.objective;
  }

  byTypeOf(type: ObjectiveType): Objective[] {
    return this.resolve(this.byType.get(type));
  }

  byScopeOf(scope: ObjectiveScope): Objective[] {
    return this.resolve(this.byScope.get(scope));
  }

  byPriorityOf(priority: ObjectivePriority): Objective[] {
    return this.values().filter((o) => o.priority === priority);
  }

  clear(): void {
    this.slots.clear();
    this.byType.clear();
    this.byScope.clear();
    this.pendingChildren.clear();
    this.pendingParents.clear();
  }

  private resolve(ids: Set<string> | undefined): Objective[] {
    if (ids === undefined) return [];
    return [...ids].flatMap((id) => {
      const slot = this.slots.get(id);
      return slot === undefined ? [] : [slot.objective];
    });
  }

  private index<K>(map: Map<K, Set<string>>, key: K, id: string): void {
    let ids = map.get(key);
    if (!ids) {
      ids = new Set();
      map.set(key, ids);
    }
    ids.add(id);
  }

  private unindex<K>(map: Map<K, Set<string>>, key: K, id: string): void {
    const ids = map.get(key);
    if (!ids) return;
    ids.delete(id);
    if (ids.size === 0) map.delete(key);
  }

  /**
   * Links both slots and records the relation on both objectives, so a save
   * rebuilds it from either side.
   */
  private link(parent: ArenaSlot, child: ArenaSlot): void {
    const parentId = parent.objective.objectiveId;
    const childId = child.objective.objectiveId;
    child.parentId = parentId;
    if (child.objective.parentObjective === null) child.objective.parentObjective = parentId;
    if (!parent.childIds.includes(childId)) parent.childIds.push(childId);
    if (!parent.objective.childObjectives.includes(childId)) {
      parent.objective.childObjectives.push(childId);
    }
  }

  private addPending(parentId: string, childId: string): void {
    const pending = this.pendingChildren.get(parentId) ?? [];
    if (!pending.includes(childId)) pending.push(childId);
    this.pendingChildren.set(parentId, pending);
  }

  private dropPending(parentId: string, childId: string): void {
    const pending = this.pendingChildren.get(parentId);
    if (!pending) return;
    const rest = pending.filter((c) => c !== childId);
    if (rest.length === 0) this.pendingChildren.delete(parentId);
    else this.pendingChildren.set(parentId, rest);
  }
}
