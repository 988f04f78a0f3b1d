import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs/promises";
import path from "path";
import { tmpdir } from "os";
import { AchievementManager } from "../../src/domain/achievements/AchievementManager";
import { Achievement } from "../../src/domain/achievements/Achievement";
import { ObjectiveEventBus } from "../../src/domain/objectives/core/ObjectiveEventBus";
import {
  AchievementCategory,
  AchievementCondition,
  AchievementRarity,
  AchievementTrigger,
  ComparisonOperator,
} from "../../src/shared/constants/AchievementEnums";
import { ObjectiveEventType } from "../../src/shared/constants/EventEnums";

describe("AchievementManager", () => {
  let manager: AchievementManager;

  beforeEach(() => {
    manager = new AchievementManager();
  });

  it("debe cargar el catálogo por defecto", () => {
    expect(manager.getAllAchievements()).toHaveLength(11);
    expect(manager.getAllAchievements(false)).toHaveLength(10);
    expect(manager.getUnlocked()).toEqual([]);
    expect(manager.checkAllAchievements({}, {})).toEqual([]);
  });

  it("debe desbloquear una sola vez", () => {
    const gameData = { events: [{ type: "supernatural_encounter_survived" }] };

    const first = manager.checkAllAchievements(gameData, {});
    const second = manager.checkAllAchievements(gameData, {});

    expect(first.map((a) => a.achievementId)).toEqual(["first_survival"]);
    expect(second).toEqual([]);
    expect(manager.getUnlockHistory()).toHaveLength(1);
  });

  it("debe desbloquear en la misma llamada los que dependen de otro recién desbloqueado", () => {
    const completedObjectives = Array.from({ length: 25 }, (_, i) => ({
      id: `case_${i}`,
      type: "investigation",
    }));

    const unlocked = manager.checkAllAchievements({ completedObjectives }, {});

    expect(unlocked.map((a) => a.achievementId)).toEqual(["first_mystery", "master_detective"]);
  });

  it("no debe desbloquear sin los prerrequisitos", () => {
    const unlocked = manager.checkAllAchievements({}, { knownEntitiesCount: 7 });

    expect(unlocked).toEqual([]);
    expect(manager.getAchievement("forbidden_scholar")?.unlocked).toBe(false);
  });

  it("debe contar solo objetivos del tipo pedido", () => {
    const unlocked = manager.checkAllAchievements(
      { completedObjectives: [{ id: "talk", type: "social" }] },
      {},
    );

    expect(unlocked).toEqual([]);
  });

  it("debe evaluar el estado de cordura desde las estadísticas", () => {
    const unlocked = manager.checkAllAchievements({}, { sanity: 5 });

    expect(unlocked.map((a) => a.achievementId)).toEqual(["madness_embrace"]);
  });

  it("debe mostrar logros ocultos solo cuando están desbloqueados", () => {
    expect(manager.getLocked().some((a) => a.achievementId === "fourth_wall")).toBe(false);
    expect(manager.getLocked(true).some((a) => a.achievementId === "fourth_wall")).toBe(true);

    manager.checkAllAchievements({ events: [{ type: "meta_realization" }] }, {});

    const visible = manager.getProgressReport({}, {}).map((entry) => entry.achievementId);
    expect(visible).toContain("fourth_wall");
    expect(manager.getAllAchievements(false)).toHaveLength(11);
  });

  it("debe anunciar desbloqueos en el bus de eventos", () => {
    const bus = new ObjectiveEventBus();
    const handler = vi.fn();
    bus.subscribe(ObjectiveEventType.ACHIEVEMENT_UNLOCKED, handler);
    const withBus = new AchievementManager(bus);

    withBus.checkAllAchievements({}, { cosmicKnowledgeCount: 1 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].data).toEqual({
      achievementId: "first_truth",
      title: "Glimpse of Truth",
      rarity: AchievementRarity.COMMON,
      category: AchievementCategory.KNOWLEDGE,
    });
  });

  it("debe informar el progreso y el siguiente criterio", () => {
    const progress = manager.getAchievementProgress("forbidden_scholar", {}, {});

    expect(progress).toEqual({
      unlocked: false,
      unlockTimestamp: null,
      progress: 0,
      metCriteria: 0,
      totalCriteria: 1,
      nextCriterion: {
        type: AchievementTrigger.STAT_THRESHOLD,
        description: "Reach 5 knownEntitiesCount",
        target: 5,
      },
    });
    expect(manager.getAchievementProgress("missing", {}, {})).toBeNull();
  });

  it("debe calcular las estadísticas ponderadas por rareza", () => {
    manager.checkAllAchievements(
      { events: [{ type: "supernatural_encounter_survived" }] },
      { sanity: 5 },
    );

    const stats = manager.getStatistics();

    expect(stats.totalAchievements).toBe(11);
    expect(stats.unlockedCount).toBe(2);
    expect(stats.overallUnlockRate).toBeCloseTo(2 / 11, 10);
    expect(stats.completionPercentage).toBeCloseTo(400 / 33, 10);
    expect(stats.categoryBreakdown.sanity).toEqual({ total: 2, unlocked: 1, unlockRate: 0.5 });
    expect(stats.categoryBreakdown.story).toEqual({ total: 0, unlocked: 0, unlockRate: 0 });
    expect(stats.rarityBreakdown["3"]).toEqual({ total: 2, unlocked: 1, unlockRate: 0.5 });
    expect(stats.rarestUnlocked).toEqual({
      achievementId: "madness_embrace",
      title: "Embrace of Madness",
      rarity: AchievementRarity.RARE,
    });
    expect(stats.latestUnlock?.achievement_id).toBe("madness_embrace");
    expect(stats.recentUnlocks).toHaveLength(2);
  });

  it("debe reiniciar desbloqueos e historial", () => {
    manager.checkAllAchievements({}, { cosmicKnowledgeCount: 1 });

    manager.reset();

    expect(manager.getUnlocked()).toEqual([]);
    expect(manager.getUnlockHistory()).toEqual([]);
    expect(manager.getAchievement("first_truth")?.unlockTimestamp).toBeNull();
  });

  describe("persistencia", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(tmpdir(), "achievements-test-"));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("debe guardar y restaurar los desbloqueos", async () => {
      manager.checkAllAchievements({}, { cosmicKnowledgeCount: 1, totalPlaytimeHours: 60 });
      const file = path.join(dir, "achievements.json");

      expect(await manager.saveToFile(file)).toBe(true);

      const restored = new AchievementManager();
      expect(await restored.loadFromFile(file)).toBe(true);
      expect(restored.getUnlocked().map((a) => a.achievementId)).toEqual([
        "first_truth",
        "dedicated_investigator",
      ]);
      expect(restored.getAchievement("first_truth")?.unlockTimestamp).toBe(
        manager.getAchievement("first_truth")?.unlockTimestamp,
      );
      expect(restored.getUnlockHistory()).toEqual(manager.getUnlockHistory());
      expect(restored.checkAllAchievements({}, { cosmicKnowledgeCount: 1 })).toEqual([]);
    });

    it("debe rechazar archivos inválidos sin tocar el estado", async () => {
      manager.checkAllAchievements({}, { cosmicKnowledgeCount: 1 });
      const file = path.join(dir, "broken.json");
      await fs.writeFile(file, JSON.stringify({ unlocked_achievements: "all" }), "utf-8");

      expect(await manager.loadFromFile(file)).toBe(false);
      expect(manager.getUnlocked().map((a) => a.achievementId)).toEqual(["first_truth"]);
    });
  });
});

describe("Achievement", () => {
  function ritualist(): Achievement {
    return new Achievement({
      achievementId: "ritualist",
      title: "Ritualist",
      description: "Banish something from the attic",
      category: AchievementCategory.STORY,
      rarity: AchievementRarity.EPIC,
      criteria: [
        {
          trigger: AchievementTrigger.STAT_THRESHOLD,
          target: ["crypt", "attic"],
          operator: ComparisonOperator.IN,
          statName: "location",
        },
        {
          trigger: AchievementTrigger.STAT_THRESHOLD,
          target: "elder_sign",
          operator: ComparisonOperator.CONTAINS,
          statName: "inventory",
        },
        {
          trigger: AchievementTrigger.SEQUENCE_COMPLETION,
          target: true,
          sequenceName: "banishment",
        },
      ],
    });
  }

  it("debe combinar criterios con AND", () => {
    const achievement = ritualist();
    const stats = { location: "attic", inventory: ["candle", "elder_sign"] };

    expect(achievement.checkUnlockConditions({}, stats)).toBe(false);
    expect(achievement.checkUnlockConditions({ completedSequences: ["banishment"] }, stats)).toBe(
      true,
    );
  });

  it("debe describir el primer criterio pendiente", () => {
    const info = ritualist().getProgressInfo(
      {},
      { location: "attic", inventory: ["elder_sign"] },
    );

    expect(info.progress).toBeCloseTo(2 / 3, 10);
    expect(info.nextCriterion?.description).toBe("Complete the banishment sequence");
  });

  it("debe comparar la exposición cósmica acumulada", () => {
    const achievement = new Achievement({
      achievementId: "exposed",
      title: "Exposed",
      description: "",
      category: AchievementCategory.SANITY,
      rarity: AchievementRarity.RARE,
      criteria: [
        {
          trigger: AchievementTrigger.CONDITION_MET,
          target: 10,
          condition: AchievementCondition.COSMIC_EXPOSURE,
        },
      ],
    });

    expect(achievement.checkUnlockConditions({}, { cosmicExposure: 9 })).toBe(false);
    expect(achievement.checkUnlockConditions({}, { cosmicExposure: 10 })).toBe(true);
  });

  it("debe ser idempotente al desbloquear", () => {
    const achievement = ritualist();

    expect(achievement.unlock({ by: "test" })).toBe(true);
    expect(achievement.unlock()).toBe(false);
    expect(achievement.unlockContext).toEqual({ by: "test" });
    expect(achievement.getProgressInfo({}, {}).progress).toBe(1);
  });

  it("debe usar la recompensa por defecto", () => {
    expect(ritualist().rewards.title).toBe("Recognition");
    expect(ritualist().hidden).toBe(false);
    expect(ritualist().prerequisites).toEqual([]);
  });

  it("debe rechazar definiciones inválidas", () => {
    expect(
      () =>
        new Achievement({
          achievementId: "",
          title: "Nameless",
          description: "",
          category: AchievementCategory.STORY,
          rarity: AchievementRarity.COMMON,
          criteria: [],
        }),
    ).toThrow();
  });
});
