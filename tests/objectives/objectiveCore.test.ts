import { describe, it, expect, vi } from "vitest";
import { ModifierStack } from "../../src/domain/objectives/core/ModifierStack";
import {
  ObjectiveCondition,
  createBasicCondition,
  createItemCondition,
  createLocationCondition,
  createSanityThresholdCondition,
} from "../../src/domain/objectives/core/ObjectiveCondition";
import { ObjectiveArena } from "../../src/domain/objectives/core/ObjectiveArena";
import { ObjectiveEventBus } from "../../src/domain/objectives/core/ObjectiveEventBus";
import { ImmediateObjective } from "../../src/domain/objectives/layered/ImmediateObjective";
import { MidTermObjective } from "../../src/domain/objectives/layered/MidTermObjective";
import {
  ConditionCheck,
  ObjectiveScope,
  ObjectiveType,
} from "../../src/shared/constants/ObjectiveEnums";
import { ObjectiveEventType } from "../../src/shared/constants/EventEnums";

describe("ModifierStack", () => {
  it("debe reemplazar modificadores de la misma fuente", () => {
    const stack = new ModifierStack();
    stack.apply({ source: "madness:paranoia", priorityDelta: 1, appliedAt: 10 });
    stack.apply({ source: "madness:paranoia", priorityDelta: 2, appliedAt: 20 });

    expect(stack.size).toBe(1);
    expect(stack.get("madness:paranoia")?.priorityDelta).toBe(2);
    expect(stack.removeBySource("madness:paranoia")).toBe(true);
    expect(stack.removeBySource("madness:paranoia")).toBe(false);
    expect(stack.has("madness:paranoia")).toBe(false);
  });

  it("debe acotar la prioridad entre 1 y 6", () => {
    const stack = new ModifierStack();
    stack.apply({ source: "a", priorityDelta: 3 });

    expect(stack.applyPriority(5)).toBe(6);

    stack.apply({ source: "a", priorityDelta: -4 });
    expect(stack.applyPriority(2)).toBe(1);
  });

  it("debe escalar y acortar el límite de tiempo", () => {
    const stack = new ModifierStack();
    expect(stack.applyTimeLimit(600_000)).toBe(600_000);
    expect(stack.applyTimeLimit(null)).toBeNull();

    stack.apply({ source: "difficulty", timeLimitFactor: 0.5 });
    stack.apply({ source: "madness:phobia", timePressureMinutes: 2 });
    expect(stack.applyTimeLimit(600_000)).toBe(180_000);

    stack.apply({ source: "madness:phobia", timePressureMinutes: 10 });
    expect(stack.applyTimeLimit(600_000)).toBe(60_000);
    expect(stack.applyTimeLimit(null)).toBeNull();
  });

  it("debe sumar acciones requeridas sin duplicarlas", () => {
    const stack = new ModifierStack();
    stack.apply({ source: "madness:obsession", addedActions: ["count_steps", "search"] });

    expect([...stack.applyActions(["search"])]).toEqual(["search", "count_steps"]);
    expect([...stack.addedActions()]).toEqual(["count_steps", "search"]);
  });

  it("debe descartar modificadores vencidos", () => {
    const stack = new ModifierStack();
    stack.apply({ source: "short", priorityDelta: 1, expiresAt: 1_000 });
    stack.apply({ source: "long", priorityDelta: 1, expiresAt: 5_000 });
    stack.apply({ source: "permanent", priorityDelta: 1, expiresAt: null });

    const expired = stack.prune(1_000);

    expect(expired.map((m) => m.source)).toEqual(["short"]);
    expect(stack.list().map((m) => m.source)).toEqual(["long", "permanent"]);
  });

  it("debe reconstruirse desde su forma serializada", () => {
    const stack = new ModifierStack();
    stack.apply({ source: "difficulty", timeLimitFactor: 1.2, appliedAt: 42 });

    const copy = ModifierStack.from(stack.toJSON());

    expect(copy.get("difficulty")).toEqual({
      source: "difficulty",
      timeLimitFactor: 1.2,
      appliedAt: 42,
    });
    expect(copy.applyTimeLimit(100_000)).toBe(120_000);
  });
});

describe("ObjectiveCondition", () => {
  it("debe comparar el valor del estado cuando no hay verificación", () => {
    const condition = createBasicCondition("doorOpen", "The door is open", true);

    expect(condition.evaluate({ doorOpen: true })).toBe(true);
    expect(condition.evaluate({ doorOpen: "true" })).toBe(false);
    expect(condition.evaluate({})).toBe(false);
  });

  it("debe usar las verificaciones con nombre", () => {
    expect(createItemCondition("lantern").evaluate({ inventory: ["rope", "lantern"] })).toBe(true);
    expect(createItemCondition("lantern").evaluate({})).toBe(false);
    expect(createLocationCondition("crypt").evaluate({ currentLocation: "crypt" })).toBe(true);
    expect(createSanityThresholdCondition(30).evaluate({ sanity: 30 })).toBe(true);
    expect(createSanityThresholdCondition(30).evaluate({ sanity: 29 })).toBe(false);
  });

  it("debe tratar como falsa una verificación que lanza", () => {
    const condition = new ObjectiveCondition("ritual", "", null, () => {
      throw new Error("broken check");
    });

    expect(condition.evaluate({})).toBe(false);
  });

  it("debe pasar valor requerido y metadatos a la verificación en línea", () => {
    const check = vi.fn().mockReturnValue(true);
    const condition = new ObjectiveCondition("custom", "", 3, check, { tag: "x" });

    expect(condition.evaluate({ sanity: 10 })).toBe(true);
    expect(check).toHaveBeenCalledWith({ sanity: 10 }, 3, { tag: "x" });
  });

  it("debe serializar solo las verificaciones con nombre", () => {
    const named = ObjectiveCondition.from({
      conditionId: "has_item",
      requiredValue: "key",
      check: ConditionCheck.HAS_ITEM,
    });
    const inline = new ObjectiveCondition("custom", "Custom", 1, () => true);

    expect(named.toJSON()).toEqual({
      conditionId: "has_item",
      description: "",
      requiredValue: "key",
      check: ConditionCheck.HAS_ITEM,
      metadata: {},
    });
    expect(inline.toJSON().check).toBeUndefined();
    expect(ObjectiveCondition.from(inline)).toBe(inline);
  });
});

describe("ObjectiveArena", () => {
  it("debe rechazar ids repetidos", () => {
    const arena = new ObjectiveArena();

    expect(arena.insert(new ImmediateObjective("a"))).toBe(true);
    expect(arena.insert(new ImmediateObjective("a"))).toBe(false);
    expect(arena.size).toBe(1);
  });

  it("debe enlazar hijos pendientes cuando llega el padre", () => {
    const arena = new ObjectiveArena();
    arena.insert(new ImmediateObjective("clue", { parentObjective: "case" }));
    expect(arena.getParent("clue")).toBeUndefined();

    arena.insert(new MidTermObjective("case"));

    expect(arena.getParent("clue")?.objectiveId).toBe("case");
    expect(arena.getChildren("case").map((o) => o.objectiveId)).toEqual(["clue"]);
  });

  it("debe devolver los hijos a pendientes al quitar el padre", () => {
    const arena = new ObjectiveArena();
    arena.insert(new MidTermObjective("case"));
    arena.insert(new ImmediateObjective("clue", { parentObjective: "case" }));

    arena.remove("case");
    expect(arena.getParent("clue")).toBeUndefined();

    arena.insert(new MidTermObjective("case"));
    expect(arena.getChildren("case").map((o) => o.objectiveId)).toEqual(["clue"]);
  });

  it("debe enlazar los hijos que declara el padre", () => {
    const arena = new ObjectiveArena();
    arena.insert(new ImmediateObjective("clue"));
    arena.insert(new MidTermObjective("case", { childObjectives: ["clue", "witness"] }));

    expect(arena.getChildren("case").map((o) => o.objectiveId)).toEqual(["clue"]);
    expect(arena.getParent("clue")?.objectiveId).toBe("case");
    expect(arena.get("clue")?.parentObjective).toBe("case");

    arena.insert(new ImmediateObjective("witness"));

    expect(arena.getChildren("case").map((o) => o.objectiveId)).toEqual(["clue", "witness"]);
    expect(arena.getParent("witness")?.objectiveId).toBe("case");
  });

  it("no debe robar un hijo que ya declara otro padre", () => {
    const arena = new ObjectiveArena();
    arena.insert(new ImmediateObjective("clue", { parentObjective: "other_case" }));
    arena.insert(new MidTermObjective("case", { childObjectives: ["clue"] }));

    expect(arena.getChildren("case")).toEqual([]);

    arena.insert(new MidTermObjective("other_case"));
    expect(arena.getParent("clue")?.objectiveId).toBe("other_case");
  });

  it("debe olvidar los hijos declarados al quitar el padre", () => {
    const arena = new ObjectiveArena();
    arena.insert(new MidTermObjective("case", { childObjectives: ["clue"] }));
    arena.remove("case");

    arena.insert(new ImmediateObjective("clue"));

    expect(arena.getParent("clue")).toBeUndefined();
    expect(arena.get("clue")?.parentObjective).toBeNull();
  });

  it("debe indexar por tipo y alcance", () => {
    const arena = new ObjectiveArena();
    arena.insert(new ImmediateObjective("talk", { objectiveType: ObjectiveType.SOCIAL }));
    arena.insert(new ImmediateObjective("run", { objectiveType: ObjectiveType.ESCAPE }));
    arena.insert(new MidTermObjective("case"));

    expect(arena.byTypeOf(ObjectiveType.SOCIAL).map((o) => o.objectiveId)).toEqual(["talk"]);
    expect(arena.byScopeOf(ObjectiveScope.IMMEDIATE)).toHaveLength(2);

    arena.remove("talk");
    expect(arena.byTypeOf(ObjectiveType.SOCIAL)).toEqual([]);
    expect(arena.ids()).toEqual(["run", "case"]);
  });
});

describe("ObjectiveEventBus", () => {
  it("debe seguir notificando cuando un handler falla", () => {
    const bus = new ObjectiveEventBus();
    const second = vi.fn();
    bus.subscribe(ObjectiveEventType.OBJECTIVE_COMPLETED, () => {
      throw new Error("handler failure");
    });
    bus.subscribe(ObjectiveEventType.OBJECTIVE_COMPLETED, second);

    const event = bus.publish(ObjectiveEventType.OBJECTIVE_COMPLETED, { objectiveId: "a" });

    expect(second).toHaveBeenCalledWith(event);
    expect(event.data).toEqual({ objectiveId: "a" });
  });

  it("debe permitir cancelar la suscripción", () => {
    const bus = new ObjectiveEventBus();
    const handler = vi.fn();
    const unsubscribe = bus.subscribe(ObjectiveEventType.OBJECTIVE_FAILED, handler);

    unsubscribe();
    bus.publish(ObjectiveEventType.OBJECTIVE_FAILED);

    expect(handler).not.toHaveBeenCalled();
    expect(bus.getHandlerCount(ObjectiveEventType.OBJECTIVE_FAILED)).toBe(0);
  });

  it("debe conservar solo los últimos 100 eventos", () => {
    const bus = new ObjectiveEventBus();
    for (let i = 0; i < 105; i++) {
      bus.publish(ObjectiveEventType.OBJECTIVE_CREATED, { index: i });
    }

    expect(bus.getRecentEvents(200)).toHaveLength(100);
    expect(bus.getRecentEvents(200)[0].data.index).toBe(5);
    expect(bus.getRecentEvents().map((e) => e.data.index)).toEqual([
      95, 96, 97, 98, 99, 100, 101, 102, 103, 104,
    ]);
    expect(bus.getStats().eventCounts).toEqual({ objective_created: 105 });
  });

  it("debe limpiar el historial sin perder suscripciones", () => {
    const bus = new ObjectiveEventBus();
    bus.subscribe(ObjectiveEventType.OBJECTIVE_ACTIVATED, vi.fn());
    bus.publish(ObjectiveEventType.OBJECTIVE_ACTIVATED);

    bus.clearHistory();

    expect(bus.getStats()).toEqual({
      totalEvents: 0,
      eventCounts: {},
      handlerCounts: { objective_activated: 1 },
    });

    bus.clear();
    expect(bus.getStats().handlerCounts).toEqual({});
  });
});
