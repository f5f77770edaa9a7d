/**
 * Reply texts
 */

import { truncate } from "../utils/text.js";
import type { Store } from "../stores/types.js";
import type { MemoryStats } from "../session/memory.js";

export interface StatusInfo {
  geminiAvailable: boolean;
  notebooklmReady: boolean;
  driveConfigured: boolean;
  storeCount: number;
  notebookCount: number;
  model: string;
  thinkingLevel: string;
  memory: MemoryStats;
  autoSyncHours: number;
}

export function formatStoreList(stores: Store[], selectedId?: string): string {
  if (stores.length === 0) {
    return "No stores yet.\nThe admin can create one with /add or register a notebook with /addnotebook.";
  }

  const lines = [`Knowledge stores (${stores.length}):`, ""];
  stores.forEach((store, i) => {
    const marker = store.id === selectedId ? " ✅" : "";
    const kind = store.backend === "notebooklm" ? " [NotebookLM]" : "";
    lines.push(`${i + 1}. ${store.name}${kind}${marker}`);
    if (store.description) {
      lines.push(`   ${truncate(store.description, 50)}`);
    }
    if (store.backend === "file_search") {
      lines.push(`   Documents: ${store.documents.length}`);
    }
    lines.push("");
  });
  return lines.join("\n").trimEnd();
}

export function formatStatus(info: StatusInfo): string {
  return [
    "Status:",
    `- Gemini API: ${info.geminiAvailable ? "OK" : "Not configured"}`,
    `- NotebookLM browser: ${info.notebooklmReady ? "open" : "not started"}`,
    `- Google Drive: ${info.driveConfigured ? "service account" : "public links only"}`,
    `- Stores: ${info.storeCount} (notebooks: ${info.notebookCount})`,
    `- Model: ${info.model}`,
    `- Thinking level: ${info.thinkingLevel}`,
    `- Memory: ${info.memory.users} users, ${info.memory.messages} messages`,
    `- Auto-sync: ${info.autoSyncHours > 0 ? `every ${info.autoSyncHours}h` : "off"}`,
  ].join("\n");
}

export function helpText(isAdmin: boolean, storeCount: number, model: string): string {
  const lines = [
    `Notebook Router Bot${isAdmin ? " (you are admin)" : ""}`,
    "",
    `Model: ${model}`,
    `Stores: ${storeCount}`,
    "",
    "Commands:",
    "/list - show all stores",
    "/select <name> - choose the active store",
    "/current - show the active store",
    "/status - bot status",
    "/think <question> - deep thinking mode",
    "/clear - forget the conversation",
    "/export [pdf|docx] - export the last answer",
    "/sync - pick up stores created elsewhere",
  ];
  if (isAdmin) {
    lines.push(
      "",
      "Admin:",
      "/add <name> | <description> - create a store",
      "/addnotebook <url> <name> | <description> - register a NotebookLM notebook",
      "/upload <store> - upload a file",
      "/uploadurl <store> <links> - import Google Docs/Drive links",
      "/rename <old> -> <new> - rename a store",
      "/delete <name> - delete a store",
      "/autosync <hours|off> - periodic sync"
    );
  }
  lines.push("", "Just send a message to ask a question.");
  return lines.join("\n");
}

export function formatSources(sources: string[]): string {
  if (sources.length === 0) return "";
  return `\n\n📚 Sources:\n${sources.map((s) => `- ${s}`).join("\n")}`;
}

/** Short "Error: ..." reply for a failed update */
export function formatError(message: string): string {
  return `Error: ${truncate(message, 500, "")}`;
}
