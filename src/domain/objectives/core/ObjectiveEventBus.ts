/**
 * @fileoverview Objective Event Bus
 *
 * Synchronous in-process fan-out for lifecycle events. Handlers run in
 * registration order during `publish`; a throwing handler is logged and the
 * remaining handlers still run. Handlers must not re-enter the manager's
 * mutating API.
 *
 * @module domain/objectives/core
 */

import { injectable } from "inversify";
import { ObjectiveEventType } from "@/shared/constants/EventEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { errorMessage } from "@/shared/utils/snapshotUtils";

const RECENT_EVENTS_LIMIT = 100;

export interface ObjectiveBusEvent {
  type: ObjectiveEventType;
  timestamp: number;
  data: Record<string, unknown>;
}

export type ObjectiveEventHandler = (event: ObjectiveBusEvent) => void;

@injectable()
export class ObjectiveEventBus {
  private handlers = new Map<ObjectiveEventType, Set<ObjectiveEventHandler>>();
  private eventCounts = new Map<ObjectiveEventType, number>();
  private recentEvents: ObjectiveBusEvent[] = [];

  /**
   * Registra un handler para un tipo de evento
   * @returns Función para unsubscribe
   */
  public subscribe(type: ObjectiveEventType, handler: ObjectiveEventHandler): () => void {
    let handlers = this.handlers.get(type);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(type, handlers);
    }
    handlers.add(handler);

    return () => {
      this.handlers.get(type)?.delete(handler);
    };
  }

  public publish(type: ObjectiveEventType, data: Record<string, unknown> = {}): ObjectiveBusEvent {
    const event: ObjectiveBusEvent = { type, timestamp: Date.now(), data };

    this.eventCounts.set(type, (this.eventCounts.get(type) ?? 0) + 1);
    this.recentEvents.push(event);
    if (this.recentEvents.length > RECENT_EVENTS_LIMIT) {
      this.recentEvents = this.recentEvents.slice(-RECENT_EVENTS_LIMIT);
    }

    for (const handler of [...(this.handlers.get(type) ?? [])]) {
      try {
        handler(event);
      } catch (error) {
        logger.error(
          `ObjectiveEventBus: Error in handler for ${type}: ${errorMessage(error)}`,
          LogCategory.OBJECTIVES,
        );
      }
    }
    return event;
  }

  public getRecentEvents(limit = 10): ObjectiveBusEvent[] {
    return this.recentEvents.slice(-limit);
  }

  public getHandlerCount(type: ObjectiveEventType): number {
    return this.handlers.get(type)?.size ?? 0;
  }

  public getStats(): {
    totalEvents: number;
    eventCounts: Record<string, number>;
    handlerCounts: Record<string, number>;
  } {
    const eventCounts: Record<string, number> = {};
    const handlerCounts: Record<string, number> = {};
    let totalEvents = 0;

    for (const [type, count] of this.eventCounts) {
      eventCounts[type] = count;
      totalEvents += count;
    }
    for (const [type, handlers] of this.handlers) {
      handlerCounts[type] = handlers.size;
    }
    return { totalEvents, eventCounts, handlerCounts };
  }

  /**
   * Drops event history. Subscriptions survive.
   */
  public clearHistory(): void {
    this.recentEvents = [];
    this.eventCounts.clear();
  }

  public clear(): void {
    this.handlers.clear();
    this.clearHistory();
  }
}
