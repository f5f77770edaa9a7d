/**
 * Bot Event Types
 *
 * Events raised when stores change or a question is answered. The notifier
 * forwards the store events to the notification channel.
 */

import type { StoreBackend } from "../stores/types.js";

export interface EventPayloads {
  /** New store or registered notebook */
  store_created: {
    storeId: string;
    name: string;
    backend: StoreBackend;
  };
  store_deleted: {
    storeId: string;
    name: string;
  };
  store_renamed: {
    storeId: string;
    oldName: string;
    newName: string;
  };
  document_uploaded: {
    storeId: string;
    storeName: string;
    documentName: string;
    source?: string;
  };
  /** Remote File Search stores merged into the registry */
  stores_synced: {
    added: string[];
    total: number;
  };
  question_answered: {
    storeIds: string[];
    queryType: string;
    questionLength: number;
    answerLength: number;
    durationMs: number;
  };
}

export type EventType = keyof EventPayloads;

export interface EventEnvelope<T extends EventType> {
  type: T;
  timestamp: string;
  /** Telegram user that caused the event, absent for scheduled jobs */
  userId?: number;
  payload: EventPayloads[T];
}

export type BotEvent = { [K in EventType]: EventEnvelope<K> }[EventType];

/**
 * Create an event with standard fields
 */
export function createEvent<T extends EventType>(
  type: T,
  payload: EventPayloads[T],
  userId?: number
): EventEnvelope<T> {
  return {
    type,
    timestamp: new Date().toISOString(),
    userId,
    payload,
  };
}
