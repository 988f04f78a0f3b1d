import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ImmediateObjective } from "../../src/domain/objectives/layered/ImmediateObjective";
import { ShortTermObjective } from "../../src/domain/objectives/layered/ShortTermObjective";
import { MidTermObjective } from "../../src/domain/objectives/layered/MidTermObjective";
import { LongTermObjective, GROWTH_GOALS } from "../../src/domain/objectives/layered/LongTermObjective";
import { MetaObjective } from "../../src/domain/objectives/layered/MetaObjective";
import {
  ConditionCheck,
  ObjectiveScope,
  ObjectiveStatus,
} from "../../src/shared/constants/ObjectiveEnums";

const T0 = new Date("2026-03-01T12:00:00.000Z").getTime();

describe("ImmediateObjective", () => {
  it("debe avanzar por acciones requeridas y completarse", () => {
    const objective = new ImmediateObjective("hide", {
      requiredActions: ["search", "hide"],
    });
    objective.activate({});

    expect(objective.update({}, { actionType: "search" })).toBe(true);
    expect(objective.progress).toBe(0.5);
    expect(objective.getRemainingActions()).toEqual(["hide"]);

    objective.update({}, { actionType: "hide" });
    expect(objective.status).toBe(ObjectiveStatus.COMPLETED);
    expect(objective.progress).toBe(1);
  });

  it("debe ignorar acciones repetidas o desconocidas", () => {
    const objective = new ImmediateObjective("hide", { requiredActions: ["search", "hide"] });
    objective.activate({});
    objective.update({}, { actionType: "search" });

    expect(objective.updateProgress({}, { actionType: "search" })).toBe(false);
    expect(objective.updateProgress({}, { actionType: "dance" })).toBe(false);
    expect(objective.progress).toBe(0.5);
  });

  it("debe forzar el alcance inmediato y un límite de 5 minutos", () => {
    const objective = new ImmediateObjective("x", { scope: ObjectiveScope.META });

    expect(objective.scope).toBe(ObjectiveScope.IMMEDIATE);
    expect(objective.timeLimitMs).toBe(300_000);
  });

  it("no debe autocompletarse cuando autoCompleteOnAction es falso", () => {
    const objective = new ImmediateObjective("x", {
      requiredActions: ["search"],
      autoCompleteOnAction: false,
    });
    objective.activate({});
    objective.update({}, { actionType: "search" });

    expect(objective.progress).toBe(1);
    expect(objective.status).toBe(ObjectiveStatus.ACTIVE);
  });

  it("debe conservar el progreso y esperar la acción agregada", () => {
    const objective = new ImmediateObjective("x", { requiredActions: ["a"] });
    objective.activate({});
    objective.updateProgress({}, { actionType: "a" });
    objective.addRequiredAction("b");

    expect(objective.progress).toBe(1);
    expect(objective.getRemainingActions()).toEqual(["b"]);

    objective.update({}, {});
    expect(objective.status).toBe(ObjectiveStatus.ACTIVE);
    expect(objective.progress).toBe(1);

    objective.update({}, { actionType: "b" });
    expect(objective.status).toBe(ObjectiveStatus.COMPLETED);
  });

  it("no debe bajar el progreso al crecer las acciones requeridas", () => {
    const objective = new ImmediateObjective("x", { requiredActions: ["a", "b"] });
    objective.activate({});
    objective.update({}, { actionType: "a" });
    objective.addRequiredAction("c");
    objective.addRequiredAction("d");

    objective.update({}, {});
    expect(objective.progress).toBe(0.5);

    objective.update({}, { actionType: "b" });
    expect(objective.progress).toBe(0.5);

    objective.update({}, { actionType: "c" });
    expect(objective.progress).toBe(0.75);
  });
});

describe("ShortTermObjective", () => {
  let objective: ShortTermObjective;

  beforeEach(() => {
    objective = new ShortTermObjective("library", {
      requiredDiscoveries: ["book", "note", "symbol"],
      milestoneCount: 2,
    });
    objective.activate({});
  });

  it("debe combinar descubrimientos y hitos con pesos 0.6 y 0.4", () => {
    objective.update({}, { discovery: "book" });
    objective.update({}, { discovery: "note", milestoneCompleted: true });

    expect(objective.progress).toBeCloseTo(0.6, 10);
    expect(objective.status).toBe(ObjectiveStatus.ACTIVE);
  });

  it("debe subir la tensión con el progreso y notificar a los oyentes", () => {
    const listener = vi.fn();
    objective.onTensionChange(listener);

    objective.update({}, { discovery: "book" });

    expect(objective.tensionLevel).toBeCloseTo(1.4, 10);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toBeCloseTo(1.4, 10);
  });

  it("debe dejar de notificar tras cancelar la suscripción", () => {
    const listener = vi.fn();
    const unsubscribe = objective.onTensionChange(listener);
    unsubscribe();

    objective.update({}, { discovery: "book" });

    expect(listener).not.toHaveBeenCalled();
  });

  it("debe usar solo los hitos cuando no hay descubrimientos", () => {
    const milestonesOnly = new ShortTermObjective("scene", { milestoneCount: 4 });
    milestonesOnly.activate({});
    milestonesOnly.update({}, { milestoneCompleted: true });

    expect(milestonesOnly.progress).toBe(0.25);
  });

  it("debe completarse al reunir todo", () => {
    objective.update({}, { discovery: "book", milestoneCompleted: true });
    objective.update({}, { discovery: "note", milestoneCompleted: true });
    objective.update({}, { discovery: "symbol" });

    expect(objective.status).toBe(ObjectiveStatus.COMPLETED);
    expect(objective.completedAt).not.toBeNull();
  });

  it("debe ajustar la cantidad de hitos con un mínimo de 1", () => {
    objective.setMilestoneCount(0.2);
    expect(objective.getMilestoneCount()).toBe(1);
  });

  it("no debe bajar el progreso al sumar descubrimientos o hitos", () => {
    objective.update({}, { discovery: "book", milestoneCompleted: true });
    expect(objective.progress).toBeCloseTo(0.4, 10);

    objective.addDiscovery("sigil");
    objective.setMilestoneCount(4);
    expect(objective.progress).toBeCloseTo(0.4, 10);

    objective.update({}, { discovery: "note" });
    expect(objective.progress).toBeCloseTo(0.4, 10);

    objective.update({}, { discovery: "symbol", milestoneCompleted: true });
    expect(objective.progress).toBeCloseTo(0.65, 10);
  });

  it("debe esperar los descubrimientos agregados antes de completarse", () => {
    const single = new ShortTermObjective("hall", {
      requiredDiscoveries: ["door"],
      milestoneCount: 0,
    });
    single.activate({});
    single.updateProgress({}, { discovery: "door" });
    single.addDiscovery("key");

    single.update({}, {});
    expect(single.progress).toBe(1);
    expect(single.status).toBe(ObjectiveStatus.ACTIVE);

    single.update({}, { discovery: "key" });
    expect(single.status).toBe(ObjectiveStatus.COMPLETED);
  });
});

describe("MidTermObjective", () => {
  it("debe escalar el horror una vez al cruzar el umbral y multiplicarlo por 1.5", () => {
    const objective = new MidTermObjective("cult", { sanLossThreshold: 10 });
    const listener = vi.fn();
    objective.onHorrorEscalation(listener);
    objective.activate({});

    objective.update({}, { sanLoss: 5 });
    objective.update({}, { sanLoss: 7 });

    const escalations = objective
      .getEvents()
      .filter((e) => e.event_type === "horror_escalation");
    expect(escalations).toHaveLength(1);
    expect(objective.getSanLossThreshold()).toBe(15);
    expect(objective.getAccumulatedSanLoss()).toBe(12);
    expect(listener).toHaveBeenCalledWith(12, {});

    objective.update({}, { sanLoss: 2 });
    expect(objective.getSanLossThreshold()).toBe(15);
  });

  it("debe renormalizar los pesos sobre las fuentes presentes", () => {
    const objective = new MidTermObjective("cult", {
      investigationBranches: { members: 0, rituals: 0 },
      storyBeats: [{ name: "arrival" }, { name: "ritual" }],
    });
    objective.activate({});

    objective.update({}, { investigationBranch: "members", advancement: 0.5 });

    expect(objective.progress).toBeCloseTo(0.1 / 0.7, 10);
  });

  it("debe usar el avance por defecto de 0.1 por rama", () => {
    const objective = new MidTermObjective("cult", {
      investigationBranches: { members: 0 },
    });
    objective.activate({});
    objective.update({}, { investigationBranch: "members" });

    expect(objective.progress).toBeCloseTo(0.1, 10);
  });

  it("debe fijar la primera ruta de finalización satisfecha y completarse", () => {
    const objective = new MidTermObjective("cult", {
      storyBeats: [{ name: "arrival" }, { name: "ritual" }],
      completionPaths: {
        escape: { requirements: { minStoryBeat: 1 } },
        confront: { requirements: { minStoryBeat: 2 } },
      },
    });
    objective.activate({});

    objective.update({}, { storyBeatCompleted: true });

    expect(objective.activePath).toBe("escape");
    expect(objective.status).toBe(ObjectiveStatus.COMPLETED);
    expect(objective.progress).toBe(1);
  });

  it("debe contar revelaciones solo una vez", () => {
    const objective = new MidTermObjective("cult", {
      horrorRevelations: ["purpose", "ritual"],
    });
    objective.activate({});
    objective.update({}, { revelation: "purpose" });
    objective.update({}, { revelation: "purpose" });

    expect(objective.progress).toBe(0.5);
  });
});

describe("LongTermObjective", () => {
  it("no debe tener límite de tiempo", () => {
    expect(new LongTermObjective("arc").timeLimitMs).toBeNull();
  });

  it("debe avanzar fases y encadenar las que ya estaban llenas", () => {
    const objective = new LongTermObjective("arc", {
      campaignPhases: [
        { name: "awakening" },
        { name: "descent", completionEffects: { unlockKnowledge: { dagon: 2 } } },
        { name: "revelation" },
      ],
    });
    objective.activate({});

    objective.update({}, { phaseAdvancement: 0.5 });
    expect(objective.progress).toBeCloseTo(0.5 / 3, 10);

    objective.update({}, { phaseAdvancement: 0.5 });
    expect(objective.currentPhase).toBe(1);
    expect(objective.progress).toBeCloseTo(1 / 3, 10);

    objective.advancePhase(2, 1);
    expect(objective.currentPhase).toBe(1);

    objective.advancePhase(1, 1);
    expect(objective.currentPhase).toBe(3);
    expect(objective.getMythosKnowledge()).toEqual({ dagon: 2 });
    expect(
      objective.getEvents().filter((e) => e.event_type === "campaign_phase_completed"),
    ).toHaveLength(3);

    objective.update({}, {});
    expect(objective.status).toBe(ObjectiveStatus.COMPLETED);
  });

  it("debe medir el crecimiento del personaje por conocimiento de mitos", () => {
    const objective = new LongTermObjective("arc", {
      characterGrowthGoals: { [GROWTH_GOALS.MYTHOS_ENTITIES]: 2 },
      recurringThemes: ["isolation", "decay"],
    });
    objective.activate({});

    objective.update({}, { mythosKnowledge: { entity: "dagon" } });
    objective.update({}, { themeEncounter: "isolation" });
    expect(objective.progress).toBeCloseTo((0.5 * 0.2) / 0.5, 10);

    objective.update({}, { mythosKnowledge: { entity: "hydra" } });
    expect(objective.progress).toBeCloseTo((0.3 + 0.5 * 0.2) / 0.5, 10);
  });
});

describe("MetaObjective", () => {
  it("debe mezclar campañas, personajes, patrones y horas sin criterios", () => {
    const objective = new MetaObjective("veteran");
    objective.activate({});

    objective.update(
      { campaignId: "c1", characterId: "k1" },
      { sessionDuration: 10, patternLearned: "cults_lie" },
    );

    expect(objective.progress).toBeCloseTo(0.64, 10);
    expect(objective.getPlaytimeHours()).toBe(10);
  });

  it("debe medir el progreso por criterios de desbloqueo", () => {
    const objective = new MetaObjective("veteran", {
      unlockCriteria: {
        veteran: { minCampaigns: 2 },
        scholar: { requiredPatterns: ["cults_lie"] },
      },
    });
    objective.activate({});

    objective.update({ campaignId: "c1" });
    expect(objective.progress).toBe(0);

    objective.update({ campaignId: "c2" });
    expect(objective.isUnlocked("veteran")).toBe(true);
    expect(objective.progress).toBe(0.5);
  });

  it("debe acumular maestría con avance por defecto de 0.1", () => {
    const objective = new MetaObjective("mastery");
    objective.activate({});
    objective.update({}, { masteryAdvancement: { category: "occult", skill: "rituals" } });
    objective.update({}, { masteryAdvancement: { category: "occult", skill: "rituals", advancement: 0.3 } });

    expect(objective.getMasteryLevel("occult", "rituals")).toBeCloseTo(0.4, 10);
  });
});

describe("Objective lifecycle", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("debe expirar exactamente al cumplirse el límite desde la activación", () => {
    const objective = new ImmediateObjective("timed", {
      requiredActions: ["a"],
      timeLimitMinutes: 1,
    });
    vi.setSystemTime(T0 + 30_000);
    objective.activate({});

    expect(objective.activatedAt).toBe(T0 + 30_000);
    expect(objective.isExpired(T0 + 89_999)).toBe(false);
    expect(objective.isExpired(T0 + 90_000)).toBe(true);
    expect(objective.timeRemainingMs(T0 + 60_000)).toBe(30_000);

    vi.setSystemTime(T0 + 90_000);
    expect(objective.update({})).toBe(true);
    expect(objective.status).toBe(ObjectiveStatus.EXPIRED);
    expect(objective.isFailed).toBe(true);
  });

  it("no debe salir nunca de un estado terminal", () => {
    const objective = new ImmediateObjective("done", { requiredActions: ["a"] });
    objective.activate({});
    objective.update({}, { actionType: "a" });

    expect(objective.status).toBe(ObjectiveStatus.COMPLETED);
    expect(objective.fail({}, "late")).toBe(false);
    expect(objective.abandon()).toBe(false);
    expect(objective.activate({})).toBe(false);
    expect(objective.suspend()).toBe(false);
    expect(objective.update({}, { actionType: "a" })).toBe(false);
    expect(objective.status).toBe(ObjectiveStatus.COMPLETED);
    expect(objective.progress).toBe(1);
  });

  it("debe suspender y reanudar solo desde los estados válidos", () => {
    const objective = new ShortTermObjective("scene");

    expect(objective.suspend()).toBe(false);
    objective.activate({});
    expect(objective.startProgress()).toBe(true);
    expect(objective.status).toBe(ObjectiveStatus.IN_PROGRESS);
    expect(objective.suspend()).toBe(true);
    expect(objective.update({}, { milestoneCompleted: true })).toBe(false);
    expect(objective.resume()).toBe(true);
    expect(objective.status).toBe(ObjectiveStatus.ACTIVE);
  });

  it("debe respetar las condiciones de activación", () => {
    const objective = new ImmediateObjective("door", {
      activationConditions: [{ conditionId: "inventory", check: ConditionCheck.HAS_ITEM, requiredValue: "key" }],
    });

    expect(objective.activate({ inventory: ["lamp"] })).toBe(false);
    expect(objective.activate({ inventory: ["key"] })).toBe(true);
    expect(objective.attemptCount).toBe(1);
  });

  it("debe serializar los tiempos y el límite en segundos", () => {
    const objective = new ShortTermObjective("scene", { timeLimitMinutes: 2 });
    objective.activate({});
    const dict = objective.toDict();

    expect(dict.time_limit).toBe(120);
    expect(dict.created_at).toBe(new Date(T0).toISOString());
    expect(dict.activated_at).toBe(new Date(T0).toISOString());
    expect(dict.completed_at).toBeNull();
    expect(dict.kind).toBe("short_term");
  });

  it("debe conservar solo los últimos 10 eventos en el diccionario", () => {
    const objective = new ImmediateObjective("noisy", {
      requiredActions: Array.from({ length: 12 }, (_, i) => `a${i}`),
      autoCompleteOnAction: false,
    });
    objective.activate({});
    for (let i = 0; i < 12; i++) objective.update({}, { actionType: `a${i}` });

    expect(objective.getEvents()).toHaveLength(13);
    expect(objective.toDict().events).toHaveLength(10);
  });
});

describe("claves heredadas de Object", () => {
  it.each(["toString", "constructor", "__proto__"])(
    "debe ignorar la rama y la habilidad %s",
    (key) => {
      const objective = new MidTermObjective("cult", {
        investigationBranches: { cellar: 0 },
        skillChallenges: { occult: 1 },
      });
      objective.activate({});

      expect(objective.updateProgress({}, { investigationBranch: key, skillUsed: key })).toBe(false);
      expect(objective.progress).toBe(0);
      expect(objective.getDisplayInfo().details).toMatchObject({
        investigationBranches: { cellar: 0 },
        skillsTested: {},
      });
    },
  );
});

describe("avance de fases negativo", () => {
  it("no debe restar progreso a la fase", () => {
    const objective = new LongTermObjective("arc", {
      campaignPhases: [{ name: "awakening" }, { name: "descent" }],
    });
    objective.activate({});

    objective.update({}, { phaseAdvancement: 0.5 });
    objective.update({}, { phaseAdvancement: -0.3 });
    expect(objective.getCurrentPhaseInfo()?.progress).toBe(0.5);
    expect(objective.progress).toBeCloseTo(0.25, 10);

    objective.advancePhase(0, -2);
    objective.update({}, { phaseAdvancement: 0.5 });
    expect(objective.currentPhase).toBe(1);
  });
});
