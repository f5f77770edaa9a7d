/**
 * Channel Notifier
 *
 * Posts store and document events to the Telegram notification channel,
 * retrying failed deliveries with exponential backoff.
 */

import { log } from "../utils/logger.js";
import { errorMessage } from "../errors.js";
import type { EventEmitter } from "./event-emitter.js";
import type { BotEvent, EventType } from "./event-types.js";

export type SendMessage = (chatId: number, text: string) => Promise<unknown>;

export interface ChannelNotifierOptions {
  retryCount?: number;
  retryDelayMs?: number;
  /** Event types to forward */
  events?: EventType[];
}

const DEFAULT_EVENTS: EventType[] = [
  "store_created",
  "store_deleted",
  "store_renamed",
  "document_uploaded",
  "stores_synced",
];

const EMOJIS: Record<EventType, string> = {
  store_created: "📁",
  store_deleted: "🗑️",
  store_renamed: "✏️",
  document_uploaded: "📄",
  stores_synced: "🔄",
  question_answered: "💬",
};

export function formatEventMessage(event: BotEvent): string {
  const by = event.userId !== undefined ? ` (by ${event.userId})` : "";

  switch (event.type) {
    case "store_created":
      return `${EMOJIS.store_created} Store created: ${event.payload.name} [${event.payload.backend}]${by}`;
    case "store_deleted":
      return `${EMOJIS.store_deleted} Store deleted: ${event.payload.name}${by}`;
    case "store_renamed":
      return `${EMOJIS.store_renamed} Store renamed: ${event.payload.oldName} → ${event.payload.newName}${by}`;
    case "document_uploaded":
      return `${EMOJIS.document_uploaded} Document "${event.payload.documentName}" added to ${event.payload.storeName}${by}`;
    case "stores_synced":
      return event.payload.added.length > 0
        ? `${EMOJIS.stores_synced} Sync added ${event.payload.added.length} store(s): ${event.payload.added.join(", ")}`
        : `${EMOJIS.stores_synced} Sync finished, ${event.payload.total} store(s), nothing new`;
    case "question_answered":
      return `${EMOJIS.question_answered} Answered a ${event.payload.queryType} question in ${event.payload.durationMs}ms`;
  }
}

export class ChannelNotifier {
  private unsubscribe: (() => void) | null = null;
  private readonly retryCount: number;
  private readonly retryDelayMs: number;
  private readonly events: EventType[];

  constructor(
    private readonly channelId: number,
    private readonly send: SendMessage,
    options: ChannelNotifierOptions = {}
  ) {
    this.retryCount = options.retryCount ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.events = options.events ?? DEFAULT_EVENTS;
  }

  attach(emitter: EventEmitter): void {
    this.detach();
    // dispatch never rejects
    this.unsubscribe = emitter.on("*", (event) => {
      void this.dispatch(event);
    });
    log.info(`🔔 Notifications go to channel ${this.channelId}`);
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  async dispatch(event: BotEvent): Promise<boolean> {
    if (!this.events.includes(event.type)) return false;

    const text = formatEventMessage(event);
    for (let attempt = 1; attempt <= this.retryCount; attempt++) {
      try {
        await this.send(this.channelId, text);
        return true;
      } catch (error) {
        log.warning(`⚠️ Notification failed (attempt ${attempt}/${this.retryCount}): ${errorMessage(error)}`);
      }

      if (attempt < this.retryCount) {
        const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    log.error(`❌ Notification for ${event.type} dropped after ${this.retryCount} attempts`);
    return false;
  }
}
