import { describe, it, expect } from "vitest";
import {
  createCampaignObjective,
  createEscapeObjective,
  createExplorationObjective,
  createForbiddenKnowledgeObjective,
  createInvestigationObjective,
  createKnowledgeObjective,
  createMadnessDrivenObjective,
  createMasteryObjective,
  createProtectionObjective,
  createSanityDependentInvestigation,
  createSocialObjective,
  createSurvivalObjective,
} from "../../src/domain/objectives/factories";
import {
  DEFAULT_MANAGER_CONFIG,
  ObjectiveManager,
} from "../../src/domain/objectives/ObjectiveManager";
import { ObjectiveRegistry } from "../../src/domain/objectives/ObjectiveRegistry";
import { ObjectiveEventBus } from "../../src/domain/objectives/core/ObjectiveEventBus";
import {
  ObjectiveKind,
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveStatus,
  ObjectiveType,
} from "../../src/shared/constants/ObjectiveEnums";
import { MadnessType, SanityState } from "../../src/shared/constants/SanityEnums";

describe("fábricas de objetivos", () => {
  it("debe crear una investigación atada a su lugar", () => {
    const objective = createInvestigationObjective("lib", "Search the Library", "library", [
      "book",
      "note",
    ]);

    expect(objective.kind).toBe(ObjectiveKind.SHORT_TERM);
    expect(objective.objectiveType).toBe(ObjectiveType.INVESTIGATION);
    expect(objective.description).toBe("Thoroughly investigate library to uncover its secrets");
    expect(objective.timeLimitMs).toBe(900_000);
    expect(objective.canActivate({ currentLocation: "attic" })).toBe(false);
    expect(objective.canActivate({ currentLocation: "library" })).toBe(true);
  });

  it("debe reconstruir un objetivo de fábrica desde su diccionario", () => {
    const original = createInvestigationObjective("lib", "Search the Library", "library", ["book"]);

    const restored = new ObjectiveRegistry().hydrate(original.toDict());

    expect(restored.kind).toBe(ObjectiveKind.SHORT_TERM);
    expect(restored.title).toBe("Search the Library");
    expect(restored.canActivate({ currentLocation: "attic" })).toBe(false);
    expect(restored.canActivate({ currentLocation: "library" })).toBe(true);
  });

  it("debe crear una supervivencia urgente con tensión inicial", () => {
    const objective = createSurvivalObjective("night", "Survive the Night", "the deep ones");

    expect(objective.description).toBe("Survive the deep ones");
    expect(objective.priority).toBe(ObjectivePriority.HIGH);
    expect(objective.timeLimitMs).toBe(600_000);
    expect(objective.tensionLevel).toBe(2);
  });

  it("debe crear una conversación con los pasos por defecto", () => {
    const objective = createSocialObjective("talk", "Question Armitage", "Armitage");

    expect(objective.kind).toBe(ObjectiveKind.IMMEDIATE);
    expect(objective.getRemainingActions()).toEqual([
      "initiate_conversation",
      "ask_questions",
      "conclude_conversation",
    ]);
    expect(objective.metadata.npcName).toBe("Armitage");
  });

  it("debe crear una exploración con un hito por zona", () => {
    const objective = createExplorationObjective("map", "Map the House", ["attic", "cellar"]);

    expect(objective.getMilestoneCount()).toBe(2);
    expect(objective.getDisplayInfo().details).toMatchObject({
      discoveries: { required: ["explored_attic", "explored_cellar"] },
    });
  });

  it("debe crear un objetivo de conocimiento que avanza con revelaciones", () => {
    const objective = createKnowledgeObjective("dagon", "Learn of Dagon", "dagon", 2);
    objective.activate({});

    objective.update({}, { revelation: "dagon_basic" });

    expect(objective.kind).toBe(ObjectiveKind.MID_TERM);
    expect(objective.progress).toBe(0.5);
    expect(objective.metadata).toEqual({ mythosEntity: "dagon", targetKnowledgeLevel: 2 });
  });

  it("debe crear una protección con sus escenas", () => {
    const objective = createProtectionObjective("guard", "Guard the Professor", "the professor");

    expect(objective.priority).toBe(ObjectivePriority.HIGH);
    expect(objective.getCurrentStoryBeat()?.name).toBe("identify_threat");
    expect(objective.metadata).toEqual({ protectedEntity: "the professor", threatLevel: 3 });
  });

  it("debe crear una huida crítica cuya tensión parte de la urgencia", () => {
    const objective = createEscapeObjective("out", "Flee the Crypt", "the crypt", 4);

    expect(objective.priority).toBe(ObjectivePriority.CRITICAL);
    expect(objective.objectiveType).toBe(ObjectiveType.ESCAPE);
    expect(objective.timeLimitMs).toBe(600_000);
    expect(objective.tensionLevel).toBe(4);
  });

  it("debe crear una campaña sin límite de tiempo", () => {
    const objective = createCampaignObjective(
      "innsmouth",
      "The Shadow over Innsmouth",
      "Innsmouth",
      [{ name: "arrival" }, { name: "reef" }],
      ["deep_ones"],
    );

    expect(objective.kind).toBe(ObjectiveKind.LONG_TERM);
    expect(objective.timeLimitMs).toBeNull();
    expect(objective.getCurrentPhaseInfo()?.name).toBe("arrival");
  });

  it("debe crear una maestría de baja prioridad", () => {
    const objective = createMasteryObjective("occultist", "Master the Occult", "occult", {
      minCampaigns: 3,
    });

    expect(objective.kind).toBe(ObjectiveKind.META);
    expect(objective.priority).toBe(ObjectivePriority.LOW);
    expect(objective.metadata).toEqual({ masteryType: "occult" });
  });

  it("debe crear un conocimiento prohibido de alcance medio", () => {
    const objective = createForbiddenKnowledgeObjective("necro", "Read the Necronomicon", "the Old Ones", [
      { cosmicKnowledgeUnlock: ["yog_sothoth"] },
    ]);

    expect(objective.kind).toBe(ObjectiveKind.COSMIC_INSIGHT);
    expect(objective.scope).toBe(ObjectiveScope.MID_TERM);
    expect(objective.priority).toBe(ObjectivePriority.HIGH);
  });

  it("debe crear una investigación que depende de la cordura", () => {
    const objective = createSanityDependentInvestigation("ward", "Search the Ward", "the asylum", {
      [SanityState.DISTURBED]: { titleSuffix: "(paranoid)" },
    });

    expect(objective.kind).toBe(ObjectiveKind.SANITY_DEPENDENT);
    expect(objective.sanRiskLevel).toBe(2);
    expect(objective.description).toBe("Investigate the asylum - methods depend on mental state");
  });

  it("debe exigir la locura indicada para activarse", () => {
    const objective = createMadnessDrivenObjective("ritual", "Count the Candles");

    expect(objective.kind).toBe(ObjectiveKind.MADNESS);
    expect(objective.canActivate({ activeMadness: [MadnessType.PHOBIA], madnessSeverity: 2 })).toBe(
      false,
    );
    expect(
      objective.canActivate({ activeMadness: [MadnessType.COMPULSION], madnessSeverity: 2 }),
    ).toBe(true);
  });

  it("debe integrarse con el gestor", () => {
    const manager = new ObjectiveManager(
      new ObjectiveRegistry(),
      new ObjectiveEventBus(),
      DEFAULT_MANAGER_CONFIG,
    );
    manager.addObjective(createSocialObjective("talk", "Question Armitage", "Armitage"));
    manager.addObjective(createInvestigationObjective("lib", "Search the Library", "library"));

    const report = manager.updateAllObjectives({ currentLocation: "street" });

    expect(report.activated).toEqual(["talk"]);
    expect(manager.getObjective("lib")?.status).toBe(ObjectiveStatus.INACTIVE);
  });
});
