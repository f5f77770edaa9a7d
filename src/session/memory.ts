/**
 * Conversation Memory
 *
 * Short per-user history, kept separately for every store the user talks to
 * (and under "global" for questions outside a store). Only the most recent
 * messages are kept; they are replayed to the model as context.
 */

import { z } from "zod";
import { CONFIG } from "../config.js";
import { JsonFile } from "../utils/json-file.js";
import { truncate } from "../utils/text.js";

export const GLOBAL_SCOPE = "global";
const CONTEXT_MESSAGE_LIMIT = 500;

const messageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
});

const conversationSchema = z.object({
  messages: z.array(messageSchema),
  lastInteraction: z.string(),
});

const memorySchema = z.record(z.string(), z.record(z.string(), conversationSchema));

export type MemoryMessage = z.infer<typeof messageSchema>;
export type MessageRole = MemoryMessage["role"];
type MemoryData = z.infer<typeof memorySchema>;

export interface LastAnswer {
  question: string;
  answer: string;
  storeName?: string;
  createdAt: string;
}

export interface MemoryStats {
  users: number;
  stores: number;
  messages: number;
}

export class ConversationMemory {
  private file: JsonFile<typeof memorySchema>;
  private data: MemoryData;
  private lastAnswers = new Map<number, LastAnswer>();

  constructor(
    filePath: string = CONFIG.memoryFile,
    private readonly maxMessages: number = CONFIG.memoryMaxMessages
  ) {
    this.file = new JsonFile(filePath, memorySchema, () => ({}));
    this.data = this.file.load();
  }

  addMessage(userId: number, role: MessageRole, content: string, storeId: string = GLOBAL_SCOPE): void {
    const now = new Date().toISOString();
    const key = String(userId);
    if (!this.data[key]) this.data[key] = {};
    const user = this.data[key];
    if (!user[storeId]) user[storeId] = { messages: [], lastInteraction: now };
    const conversation = user[storeId];

    conversation.messages.push({ role, content, timestamp: now });
    if (conversation.messages.length > this.maxMessages) {
      conversation.messages = conversation.messages.slice(-this.maxMessages);
    }
    conversation.lastInteraction = now;
    this.file.save(this.data);
  }

  /** Record a question and its answer */
  addExchange(userId: number, question: string, answer: string, storeId: string = GLOBAL_SCOPE): void {
    this.addMessage(userId, "user", question, storeId);
    this.addMessage(userId, "assistant", answer, storeId);
  }

  getHistory(userId: number, storeId: string = GLOBAL_SCOPE): MemoryMessage[] {
    return [...(this.data[String(userId)]?.[storeId]?.messages ?? [])];
  }

  /**
   * History rendered as a prompt prefix, or "" when there is none.
   */
  getContextPrompt(userId: number, storeId: string = GLOBAL_SCOPE): string {
    const history = this.getHistory(userId, storeId);
    if (history.length === 0) return "";

    const lines = history.map((m) => {
      const speaker = m.role === "user" ? "User" : "Assistant";
      return `${speaker}: ${truncate(m.content, CONTEXT_MESSAGE_LIMIT)}`;
    });
    return ["Previous conversation:", ...lines, "", "Current question:"].join("\n");
  }

  /**
   * Clear one store's history for the user, or all of it when no store is given.
   */
  clearHistory(userId: number, storeId?: string): void {
    const key = String(userId);
    const user = this.data[key];
    if (!user) return;

    if (storeId === undefined) {
      delete this.data[key];
    } else {
      delete user[storeId];
      if (Object.keys(user).length === 0) delete this.data[key];
    }
    this.lastAnswers.delete(userId);
    this.file.save(this.data);
  }

  /**
   * Drop conversations idle for more than `days`, then users left empty.
   * Returns the number of conversations removed.
   */
  cleanupOldEntries(days: number = CONFIG.memoryCleanupDays, now: Date = new Date()): number {
    const cutoff = now.getTime() - days * 24 * 60 * 60 * 1000;
    let removed = 0;

    for (const [userKey, conversations] of Object.entries(this.data)) {
      for (const [storeId, conversation] of Object.entries(conversations)) {
        if (new Date(conversation.lastInteraction).getTime() < cutoff) {
          delete conversations[storeId];
          removed++;
        }
      }
      if (Object.keys(conversations).length === 0) {
        delete this.data[userKey];
      }
    }

    if (removed > 0) this.file.save(this.data);
    return removed;
  }

  getStats(): MemoryStats {
    let stores = 0;
    let messages = 0;
    for (const conversations of Object.values(this.data)) {
      for (const conversation of Object.values(conversations)) {
        stores++;
        messages += conversation.messages.length;
      }
    }
    return { users: Object.keys(this.data).length, stores, messages };
  }

  setLastAnswer(userId: number, answer: Omit<LastAnswer, "createdAt">): void {
    this.lastAnswers.set(userId, { ...answer, createdAt: new Date().toISOString() });
  }

  getLastAnswer(userId: number): LastAnswer | undefined {
    return this.lastAnswers.get(userId);
  }
}
