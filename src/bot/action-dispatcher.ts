/**
 * Action Dispatcher
 *
 * Executes a BotAction, whether it came from a slash command, a phrase
 * heuristic or the query processor, and returns the replies to send.
 */

import fs from "fs";
import os from "os";
import path from "path";
import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import { NotFoundError, ValidationError, errorMessage } from "../errors.js";
import { ADMIN_ACTIONS, type BotAction, type ExportFormat } from "../routing/actions.js";
import type { StoreRegistry } from "../stores/store-registry.js";
import type { StoreService } from "../stores/store-service.js";
import type { Store } from "../stores/types.js";
import type { UserStateStore } from "../session/user-state.js";
import type { ConversationMemory } from "../session/memory.js";
import type { ExportClient } from "../export/export-client.js";
import { extractAllUrls, type DriveClient, type DriveLink, type DownloadedFile } from "../drive/drive-client.js";
import type { AccessPolicy } from "./access.js";
import { formatStatus, formatStoreList, helpText, type StatusInfo } from "./formatting.js";
import type { ProgressCallback } from "./answer-service.js";

export type Reply = { kind: "text"; text: string } | { kind: "document"; filePath: string; caption?: string };

export function textReply(text: string): Reply {
  return { kind: "text", text };
}

/** Controls the periodic store sync */
export interface AutoSyncControl {
  setAutoSync(hours: number): void;
  autoSyncHours(): number;
}

export interface ActionDispatcherDeps {
  registry: StoreRegistry;
  stores: StoreService;
  userState: UserStateStore;
  memory: ConversationMemory;
  exporter: ExportClient;
  drive: DriveClient;
  autoSync: AutoSyncControl;
  access: AccessPolicy;
  status: () => StatusInfo;
}

export class ActionDispatcher {
  /** Store a user's next document goes to, set by /upload without a file */
  private pendingUploads = new Map<number, string>();

  constructor(private readonly deps: ActionDispatcherDeps) {}

  async run(userId: number, action: BotAction, progress?: ProgressCallback): Promise<Reply[]> {
    this.deps.access.assert(userId, ADMIN_ACTIONS.has(action.action), action.action);
    log.info(`⚙️ Action ${action.action} for user ${userId}`);

    const { registry, stores, userState, memory } = this.deps;

    switch (action.action) {
      case "list_stores":
        return [textReply(formatStoreList(registry.list(), userState.getSelectedStore(userId)?.storeId))];

      case "status":
        return [textReply(formatStatus(this.deps.status()))];

      case "help":
        return [textReply(helpText(this.deps.access.isAdmin(userId), registry.count(), CONFIG.geminiModel))];

      case "clear_memory":
        memory.clearHistory(userId);
        return [textReply("Conversation memory cleared.")];

      case "sync_now": {
        await progress?.("Syncing stores with the API...");
        const { added, total } = await stores.sync(userId);
        const addedLine = added.length > 0 ? `\nAdded: ${added.map((s) => s.name).join(", ")}` : "";
        return [textReply(`Sync complete!${addedLine}\nTotal stores: ${total}`)];
      }

      case "export":
        return this.exportLastAnswer(userId, action.format ?? "pdf");

      case "select_store": {
        const store = registry.findByName(action.storeName);
        if (!store) {
          throw new NotFoundError(`Store "${action.storeName}" not found. Use /list to see available stores.`);
        }
        userState.setSelectedStore(userId, store.id, store.name);
        return [textReply(`Active store: ${store.name}`)];
      }

      case "delete_store": {
        const store = await stores.deleteStore(action.storeName, userId);
        return [textReply(`Deleted: ${store.name}`)];
      }

      case "rename_store": {
        const { store, oldName } = await stores.renameStore(action.oldName, action.newName, userId);
        return [textReply(`Renamed: ${oldName} -> ${store.name}`)];
      }

      case "add_store": {
        await progress?.(`Creating store '${action.name}'...`);
        const store = await stores.createStore(action.name, action.description, userId);
        return [
          textReply(
            `Store created!\n\nName: ${store.name}\nID: ${store.id}\n\n` +
              `Now upload files with:\n/upload ${store.name} (and attach a file)`
          ),
        ];
      }

      case "set_sync":
        this.deps.autoSync.setAutoSync(action.hours);
        return [textReply(action.hours > 0 ? `Auto-sync every ${action.hours}h.` : "Auto-sync turned off.")];

      case "upload_url": {
        const store = this.uploadTarget(userId, action.storeName);
        return [await this.importLinks(userId, store, extractAllUrls(action.urls.join(" ")), progress)];
      }

      case "upload_file": {
        const store = this.uploadTarget(userId, action.storeName);
        this.pendingUploads.set(userId, store.id);
        return [textReply(`Ready to upload to '${store.name}'.\nNow send a file (PDF, TXT, DOCX, etc.)`)];
      }
    }
  }

  /** Store a pending /upload was aimed at, cleared once taken */
  takePendingUpload(userId: number): string | undefined {
    const storeId = this.pendingUploads.get(userId);
    this.pendingUploads.delete(userId);
    return storeId;
  }

  hasPendingUpload(userId: number): boolean {
    return this.pendingUploads.has(userId);
  }

  /**
   * Upload a file the user sent through Telegram.
   */
  async uploadFile(userId: number, storeReference: string, filePath: string, displayName: string): Promise<Reply> {
    this.deps.access.assert(userId, true, "upload_file");
    const store = await this.deps.stores.uploadDocument(storeReference, filePath, {
      displayName,
      source: "telegram",
      userId,
    });
    return textReply(
      `File uploaded!\n\nStore: ${store.name}\nFile: ${displayName}\n\nYou can now ask questions about this document.`
    );
  }

  /**
   * Download Google Docs/Drive links and upload them into a store. Each link
   * is reported on its own line; one failing link does not stop the rest.
   */
  async importLinks(userId: number, store: Store, links: DriveLink[], progress?: ProgressCallback): Promise<Reply> {
    if (links.length === 0) {
      throw new ValidationError("No Google Docs or Drive links found.");
    }

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "drive-import-"));
    const lines: string[] = [];
    let uploaded = 0;

    try {
      for (const [i, link] of links.entries()) {
        await progress?.(`Importing ${i + 1}/${links.length} into '${store.name}'...`);
        try {
          const files: DownloadedFile[] =
            link.type === "folder"
              ? await this.deps.drive.downloadFolder(link.id, dir)
              : [await this.deps.drive.downloadFile(link.id, dir, link.type)];

          if (files.length === 0) {
            lines.push(`❌ ${link.url}: no files`);
          }
          for (const file of files) {
            await this.deps.stores.uploadDocument(store.id, file.filePath, {
              displayName: file.name,
              source: link.url,
              userId,
            });
            lines.push(`✅ ${file.name}`);
            uploaded++;
          }
        } catch (error) {
          log.warning(`⚠️ Import of ${link.url} failed: ${errorMessage(error)}`);
          lines.push(`❌ ${link.url}: ${errorMessage(error)}`);
        }
      }
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }

    return textReply(`Imported ${uploaded} file(s) into '${store.name}':\n\n${lines.join("\n")}`);
  }

  private uploadTarget(userId: number, storeName?: string): Store {
    if (storeName) {
      return this.deps.registry.require(storeName);
    }
    const selection = this.deps.userState.getSelectedStore(userId);
    const selected = selection ? this.deps.registry.getById(selection.storeId) : undefined;
    if (!selected) {
      throw new ValidationError("Specify a store name, or choose one with /select first.");
    }
    return selected;
  }

  private async exportLastAnswer(userId: number, format: ExportFormat): Promise<Reply[]> {
    const last = this.deps.memory.getLastAnswer(userId);
    if (!last) {
      return [textReply("Nothing to export yet. Ask a question first.")];
    }
    const filePath = await this.deps.exporter.export(format, {
      content: last.answer,
      title: last.storeName ?? "Answer",
      question: last.question,
      storeName: last.storeName,
    });
    return [{ kind: "document", filePath, caption: `Export (${format.toUpperCase()})` }];
  }
}
