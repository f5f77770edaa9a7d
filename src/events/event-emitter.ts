/**
 * Event Emitter
 *
 * In-process event bus. A failing handler is logged and does not stop the
 * remaining handlers or the caller.
 */

import { log } from "../utils/logger.js";
import { errorMessage } from "../errors.js";
import type { BotEvent, EventType } from "./event-types.js";

export type EventHandler = (event: BotEvent) => void | Promise<void>;

export class EventEmitter {
  private handlers: Map<EventType | "*", EventHandler[]> = new Map();

  /**
   * Subscribe to an event type, or "*" for every event.
   * Returns the unsubscribe function.
   */
  on(eventType: EventType | "*", handler: EventHandler): () => void {
    const handlers = this.handlers.get(eventType) ?? [];
    handlers.push(handler);
    this.handlers.set(eventType, handlers);

    return () => {
      const current = this.handlers.get(eventType) ?? [];
      const index = current.indexOf(handler);
      if (index > -1) {
        current.splice(index, 1);
      }
    };
  }

  async emit(event: BotEvent): Promise<void> {
    log.dim(`📢 Event: ${event.type}`);

    const handlers = [...(this.handlers.get(event.type) ?? []), ...(this.handlers.get("*") ?? [])];
    for (const handler of handlers) {
      try {
        await handler(event);
      } catch (error) {
        log.error(`Event handler error for ${event.type}: ${errorMessage(error)}`);
      }
    }
  }
}

export const eventEmitter = new EventEmitter();
