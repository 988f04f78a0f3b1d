import "dotenv/config";
import type { Server } from "http";

import { createApp } from "./app";
import { CONFIG } from "../config/config";
import { container } from "../config/container";
import { TYPES } from "../config/Types";
import { RandomUtils } from "../shared/utils/RandomUtils";
import { logger, LogCategory } from "../infrastructure/utils/logger";
import type { ObjectiveManager } from "../domain/objectives/ObjectiveManager";
import type { AchievementManager } from "../domain/achievements/AchievementManager";

/**
 * Main server entry point.
 *
 * Restores the objective and achievement saves, serves the HTTP API and
 * writes both saves back on shutdown.
 *
 * @module application
 */

const manager = container.get<ObjectiveManager>(TYPES.ObjectiveManager);
const achievements = container.get<AchievementManager>(TYPES.AchievementManager);

let server: Server | undefined;
let shuttingDown = false;

async function start(): Promise<void> {
  RandomUtils.seed(CONFIG.RANDOM_SEED);

  if (await manager.loadFromFile(CONFIG.OBJECTIVES.SAVE_PATH)) {
    logger.info(`💾 Objectives restored from ${CONFIG.OBJECTIVES.SAVE_PATH}`);
  } else {
    logger.info("🆕 No objective save found. Starting empty.");
  }
  if (await achievements.loadFromFile(CONFIG.ACHIEVEMENTS.SAVE_PATH)) {
    logger.info(`🏆 Achievements restored from ${CONFIG.ACHIEVEMENTS.SAVE_PATH}`);
  }

  const app = createApp(container);
  server = app.listen(CONFIG.PORT, () => {
    logger.info(`Objective server running on http://localhost:${CONFIG.PORT}`, LogCategory.HTTP);
    logger.info(`AI mode: ${CONFIG.AI.ENABLED ? CONFIG.AI.MODE : "disabled"}`, LogCategory.AI);
  });
}

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, saving state...`);

  await manager.saveToFile(CONFIG.OBJECTIVES.SAVE_PATH);
  await achievements.saveToFile(CONFIG.ACHIEVEMENTS.SAVE_PATH);

  await new Promise<void>((resolve) => {
    if (server) server.close(() => resolve());
    else resolve();
  });
  await logger.shutdown();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error(`❌ Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
  });
}

start().catch((err: unknown) => {
  logger.error(
    `❌ Failed to start objective server: ${err instanceof Error ? err.message : String(err)}`,
  );
  process.exit(1);
});
