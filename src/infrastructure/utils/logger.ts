/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { randomUUID } from "node:crypto";

/**
 * Logging utility for the objective orchestrator.
 *
 * Features:
 * - Console output with colored levels and a minimum level
 * - Memory buffer with periodic evacuation to daily rotated JSONL files
 * - Category-based logging for subsystem identification
 * - Aggregated metrics per category/level
 * - Throttling to prevent log spam from per-turn loops
 */

import { LogLevel, LogCategory } from "@/shared/constants/LogEnums";

/**
 * Log entry kept in memory and written to disk.
 */
export interface LogEntry {
  /** Unique identifier for this log entry */
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  /** Unix timestamp for sorting/filtering */
  timestampMs: number;
  /** Additional structured data */
  data?: unknown;
}

/**
 * Aggregated metrics for analysis.
 */
export interface LogMetrics {
  byLevel: Partial<Record<LogLevel, number>>;
  byCategory: Partial<Record<LogCategory, number>>;
  startTime: number;
  endTime: number;
  totalCount: number;
}

export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  messageContains?: string;
  limit?: number;
}

interface LoggerConfig {
  maxMemoryLogs: number;
  evacuationThreshold: number;
  logDir: string;
  minLevel: LogLevel;
  /** Console output disabled; entries are still buffered and written */
  silent: boolean;
  throttleWindowMs: number;
  maxThrottleCount: number;
  writeIntervalMs: number;
  maxRotationDays: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

function isLogLevel(value: unknown): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

function isLogCategory(value: unknown): value is LogCategory {
  return Object.values(LogCategory).some((category) => category === value);
}

function readNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function defaultConfig(): LoggerConfig {
  const level = process.env.LOG_LEVEL;
  return {
    maxMemoryLogs: 5000,
    evacuationThreshold: readNumberEnv("LOG_EVACUATION_THRESHOLD", 4000),
    logDir: process.env.LOG_DIR
      ? path.resolve(process.env.LOG_DIR)
      : path.join(process.cwd(), "logs"),
    minLevel: isLogLevel(level) ? level : LogLevel.INFO,
    silent: process.env.LOG_SILENT === "true",
    throttleWindowMs: readNumberEnv("LOG_THROTTLE_WINDOW_MS", 5000),
    maxThrottleCount: readNumberEnv("LOG_MAX_THROTTLE_COUNT", 3),
    writeIntervalMs: readNumberEnv("LOG_WRITE_INTERVAL_MS", 5000),
    maxRotationDays: readNumberEnv("LOG_MAX_ROTATION_DAYS", 7),
  };
}

/**
 * Current date string for file rotation (YYYY-MM-DD).
 */
function getDateString(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Logger with memory buffering and file evacuation.
 * Console: levels at or above the minimum, colored
 * Memory: every entry with its data
 * Files: one JSONL file per day
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private isEvacuating = false;
  private lastEvacuation = Date.now();
  private evacuationInterval?: NodeJS.Timeout;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private currentLogDate: string;
  private metrics: LogMetrics;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...defaultConfig(), ...config };
    this.currentLogDate = getDateString();
    this.metrics = this.initMetrics();

    this.evacuationInterval = setInterval(
      () => this.checkEvacuation(),
      this.config.writeIntervalMs,
    );
    this.evacuationInterval.unref();

    process.once("beforeExit", () => {
      this.flush().catch((error: unknown) => {
        console.error(
          "Failed to flush logs on exit:",
          error instanceof Error ? error.message : String(error),
        );
      });
    });
  }

  private initMetrics(): LogMetrics {
    const now = Date.now();
    return {
      byLevel: {},
      byCategory: {},
      startTime: now,
      endTime: now,
      totalCount: 0,
    };
  }

  private getLogFilePath(): string {
    return path.join(this.config.logDir, `logs-${this.currentLogDate}.jsonl`);
  }

  private async ensureLogDir(): Promise<void> {
    await fs.promises.mkdir(this.config.logDir, { recursive: true });
  }

  private checkDateRotation(): void {
    const today = getDateString();
    if (today === this.currentLogDate) return;
    this.currentLogDate = today;
    this.cleanupOldLogs().catch((error: unknown) => {
      console.warn("Failed to cleanup old logs:", error);
    });
  }

  private async cleanupOldLogs(): Promise<void> {
    const files = await fs.promises.readdir(this.config.logDir);
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - this.config.maxRotationDays);

    for (const file of files) {
      const match = file.match(/^logs-(\d{4}-\d{2}-\d{2})\.jsonl$/);
      if (match && new Date(match[1]) < cutoff) {
        await fs.promises.unlink(path.join(this.config.logDir, file));
      }
    }
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const reset = "\x1b[0m";
    return `${LEVEL_COLORS[level]}[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry || now - entry.lastTime > this.config.throttleWindowMs) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private updateMetrics(entry: LogEntry): void {
    this.metrics.byLevel[entry.level] =
      (this.metrics.byLevel[entry.level] ?? 0) + 1;
    this.metrics.byCategory[entry.category] =
      (this.metrics.byCategory[entry.category] ?? 0) + 1;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.shift();
    }
    this.updateMetrics(entry);

    if (this.memoryBuffer.length >= this.config.evacuationThreshold) {
      this.evacuateToFile();
    }
  }

  private evacuateToFile(): void {
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.doEvacuate(),
    );
  }

  private async doEvacuate(): Promise<void> {
    if (this.isEvacuating || this.memoryBuffer.length === 0) return;

    this.checkDateRotation();
    this.isEvacuating = true;
    const logsToWrite = [...this.memoryBuffer];
    this.memoryBuffer = [];
    const logFilePath = this.getLogFilePath();

    try {
      await this.ensureLogDir();
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
      this.lastEvacuation = Date.now();
    } catch (error) {
      this.memoryBuffer = [...logsToWrite, ...this.memoryBuffer].slice(
        -this.config.maxMemoryLogs,
      );
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    } finally {
      this.isEvacuating = false;
    }
  }

  private checkEvacuation(): void {
    const now = Date.now();
    if (
      this.memoryBuffer.length >= this.config.evacuationThreshold ||
      (this.memoryBuffer.length > 0 && now - this.lastEvacuation > 3000)
    ) {
      this.evacuateToFile();
    }

    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs * 2) {
        this.throttleMap.delete(key);
      }
    }
  }

  /**
   * Log with explicit level and category.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: unknown,
  ): void {
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) return;

    const now = Date.now();
    this.addToMemory({
      id: randomUUID(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      data,
    });

    if (
      this.config.silent ||
      LEVEL_ORDER[level] < LEVEL_ORDER[this.config.minLevel]
    ) {
      return;
    }

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data ?? "");
        break;
    }
  }

  private dispatch(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, data);
    } else {
      this.log(level, LogCategory.GENERAL, message, categoryOrData);
    }
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.ERROR, message, categoryOrData, data);
  }

  getMetrics(): LogMetrics {
    return {
      ...this.metrics,
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
    };
  }

  resetMetrics(): void {
    this.metrics = this.initMetrics();
  }

  /**
   * Query logs still held in the memory buffer.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, messageContains, limit } = filter;
    const search = messageContains?.toLowerCase();
    const results = this.memoryBuffer.filter(
      (entry) =>
        (!levels?.length || levels.includes(entry.level)) &&
        (!categories?.length || categories.includes(entry.category)) &&
        (!search || entry.message.toLowerCase().includes(search)),
    );
    return limit ? results.slice(-limit) : results;
  }

  /**
   * Force immediate evacuation of logs to file.
   */
  async flush(): Promise<void> {
    await this.evacuationPromise;
    await this.doEvacuate();
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  /**
   * Stops the evacuation timer and writes what is left in the buffer.
   */
  async shutdown(): Promise<void> {
    if (this.evacuationInterval) {
      clearInterval(this.evacuationInterval);
      this.evacuationInterval = undefined;
    }
    await this.flush();
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "@/shared/constants/LogEnums";
