import { describe, it, expect } from "vitest";
import path from "path";
import { loadConfig } from "../../src/config/config";
import { AIObjectiveMode } from "../../src/shared/constants/AIEnums";

describe("Config", () => {
  it("debe tener valores por defecto", () => {
    const config = loadConfig({ DATA_DIR: "/data" });

    expect(config.PORT).toBe(8080);
    expect(config.NODE_ENV).toBe("development");
    expect(config.OBJECTIVES.MAX_ACTIVE).toBe(20);
    expect(config.OBJECTIVES.MAX_IMMEDIATE).toBe(5);
    expect(config.OBJECTIVES.MAX_SHORT_TERM).toBe(10);
    expect(config.OBJECTIVES.AUTO_CLEANUP_COMPLETED).toBe(true);
    expect(config.OBJECTIVES.AUTO_CLEANUP_AFTER_HOURS).toBe(24);
    expect(config.OBJECTIVES.SAVE_PATH).toBe(path.join("/data", "objectives.json"));
    expect(config.ACHIEVEMENTS.SAVE_PATH).toBe(path.join("/data", "achievements.json"));
    expect(config.AI.ENABLED).toBe(true);
    expect(config.AI.MODE).toBe(AIObjectiveMode.SUGGESTIONS_ONLY);
    expect(config.AI.ENDPOINT).toBeUndefined();
    expect(config.DIFFICULTY).toEqual({
      TARGET_SUCCESS_RATE: 0.7,
      SENSITIVITY: 0.1,
      WINDOW: 10,
    });
    expect(config.RANDOM_SEED).toBeUndefined();
  });

  it("debe usar valores de entorno cuando están disponibles", () => {
    const config = loadConfig({
      PORT: "3000",
      OBJECTIVES_MAX_ACTIVE: "7",
      OBJECTIVES_AUTO_CLEANUP: "false",
      OBJECTIVES_CLEANUP_AFTER_HOURS: "1.5",
      AI_MODE: "full_control",
      AI_ENDPOINT: "http://localhost:9999/v1",
      DIFFICULTY_SENSITIVITY: "0.2",
      RANDOM_SEED: "abc",
    });

    expect(config.PORT).toBe(3000);
    expect(config.OBJECTIVES.MAX_ACTIVE).toBe(7);
    expect(config.OBJECTIVES.AUTO_CLEANUP_COMPLETED).toBe(false);
    expect(config.OBJECTIVES.AUTO_CLEANUP_AFTER_HOURS).toBe(1.5);
    expect(config.AI.MODE).toBe(AIObjectiveMode.FULL_CONTROL);
    expect(config.AI.ENDPOINT).toBe("http://localhost:9999/v1");
    expect(config.DIFFICULTY.SENSITIVITY).toBe(0.2);
    expect(config.RANDOM_SEED).toBe("abc");
  });

  it("debe volver a los valores por defecto con entradas inválidas", () => {
    const config = loadConfig({
      PORT: "abc",
      OBJECTIVES_MAX_IMMEDIATE: "",
      OBJECTIVES_AUTO_CLEANUP: "yes",
      AI_CONFIDENCE_THRESHOLD: "NaN",
      AI_MODE: "chaos",
    });

    expect(config.PORT).toBe(8080);
    expect(config.OBJECTIVES.MAX_IMMEDIATE).toBe(5);
    expect(config.OBJECTIVES.AUTO_CLEANUP_COMPLETED).toBe(true);
    expect(config.AI.CONFIDENCE_THRESHOLD).toBe(0.6);
    expect(config.AI.MODE).toBe(AIObjectiveMode.SUGGESTIONS_ONLY);
  });
});
