/**
 * Store Service
 *
 * The write side of the store registry. Every change goes to the backend
 * first (File Search stores live in Gemini), then to the registry, and is
 * recorded in the audit trail and announced on the event bus.
 */

import path from "path";
import type { GeminiClient } from "../gemini/gemini-client.js";
import type { UserStateStore } from "../session/user-state.js";
import type { EventEmitter } from "../events/event-emitter.js";
import { createEvent } from "../events/event-types.js";
import { StoreRegistry } from "./store-registry.js";
import { parseNotebookUrl } from "./notebooks.js";
import type { Store } from "./types.js";
import { audit } from "../utils/audit-logger.js";
import { log } from "../utils/logger.js";
import { ValidationError, errorMessage } from "../errors.js";

export type StoreBackendApi = Pick<GeminiClient, "createStore" | "deleteStore" | "listStores" | "uploadFile">;

export interface SyncResult {
  added: Store[];
  total: number;
}

export class StoreService {
  constructor(
    readonly registry: StoreRegistry,
    private readonly gemini: StoreBackendApi,
    private readonly userState: UserStateStore,
    private readonly events: EventEmitter
  ) {}

  /**
   * Create a File Search store in Gemini and register it.
   */
  async createStore(name: string, description: string, userId?: number): Promise<Store> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError("Store name must not be empty");
    }
    if (this.registry.getByName(trimmed)) {
      throw new ValidationError(`A store named "${trimmed}" already exists`);
    }

    const remote = await this.gemini.createStore(trimmed);
    const store = this.registry.add({
      id: remote.id,
      name: trimmed,
      description: description.trim(),
      backend: "file_search",
      documents: [],
      createdAt: new Date().toISOString(),
    });

    audit.store("store_created", userId, { storeId: store.id, name: store.name, backend: store.backend });
    await this.events.emit(
      createEvent("store_created", { storeId: store.id, name: store.name, backend: store.backend }, userId)
    );
    log.success(`Created store ${store.name} (${store.id})`);
    return store;
  }

  /**
   * Register an existing NotebookLM notebook as a store.
   */
  async registerNotebook(url: string, name: string, description: string, userId?: number): Promise<Store> {
    const { url: notebookUrl, storeId } = parseNotebookUrl(url);
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError("Notebook name must not be empty");
    }

    const store = this.registry.add({
      id: storeId,
      name: trimmed,
      description: description.trim(),
      backend: "notebooklm",
      notebookUrl,
      documents: [],
      createdAt: new Date().toISOString(),
    });

    audit.store("notebook_registered", userId, { storeId: store.id, name: store.name, url: notebookUrl });
    await this.events.emit(
      createEvent("store_created", { storeId: store.id, name: store.name, backend: store.backend }, userId)
    );
    log.success(`Registered notebook ${store.name}`);
    return store;
  }

  /**
   * Delete a store by id or (fuzzy) name. File Search stores are deleted in
   * Gemini as well; notebooks are only unregistered. Users who had the store
   * selected lose the selection.
   */
  async deleteStore(reference: string, userId?: number): Promise<Store> {
    const store = this.registry.require(reference);

    if (store.backend === "file_search") {
      try {
        await this.gemini.deleteStore(store.id);
      } catch (error) {
        audit.store("store_deleted", userId, { storeId: store.id, name: store.name, error: errorMessage(error) }, false);
        throw error;
      }
    }

    this.registry.remove(store.id);
    const cleared = this.userState.clearStoreForAll(store.id);

    audit.store("store_deleted", userId, { storeId: store.id, name: store.name, clearedSelections: cleared });
    await this.events.emit(createEvent("store_deleted", { storeId: store.id, name: store.name }, userId));
    log.success(`Deleted store ${store.name}`);
    return store;
  }

  async renameStore(reference: string, newName: string, userId?: number): Promise<{ store: Store; oldName: string }> {
    const store = this.registry.require(reference);
    const oldName = store.name;
    const renamed = this.registry.rename(store.id, newName);
    this.userState.renameStoreForAll(store.id, renamed.name);

    audit.store("store_renamed", userId, { storeId: store.id, oldName, newName: renamed.name });
    await this.events.emit(
      createEvent("store_renamed", { storeId: store.id, oldName, newName: renamed.name }, userId)
    );
    log.info(`✏️ Renamed store ${oldName} -> ${renamed.name}`);
    return { store: renamed, oldName };
  }

  /**
   * Upload a local file into a File Search store and record it.
   */
  async uploadDocument(
    reference: string,
    filePath: string,
    options: { displayName?: string; source?: string; userId?: number } = {}
  ): Promise<Store> {
    const store = this.registry.require(reference);
    if (store.backend !== "file_search") {
      throw new ValidationError(
        `"${store.name}" is a NotebookLM notebook. Add sources to it in NotebookLM itself.`
      );
    }

    const displayName = options.displayName ?? path.basename(filePath);
    try {
      await this.gemini.uploadFile(store.id, filePath, { displayName });
    } catch (error) {
      audit.upload(
        options.userId,
        { storeId: store.id, document: displayName, source: options.source, error: errorMessage(error) },
        false
      );
      throw error;
    }

    const updated = this.registry.addDocument(store.id, {
      name: displayName,
      uploadedAt: new Date().toISOString(),
      source: options.source,
    });

    audit.upload(options.userId, { storeId: store.id, document: displayName, source: options.source });
    await this.events.emit(
      createEvent(
        "document_uploaded",
        { storeId: store.id, storeName: store.name, documentName: displayName, source: options.source },
        options.userId
      )
    );
    return updated;
  }

  /**
   * Register File Search stores that exist in Gemini but not locally.
   */
  async sync(userId?: number): Promise<SyncResult> {
    const remote = await this.gemini.listStores();
    const added = this.registry.mergeRemote(remote);
    const total = this.registry.count();

    audit.store("stores_synced", userId, { remote: remote.length, added: added.map((s) => s.id) });
    await this.events.emit(createEvent("stores_synced", { added: added.map((s) => s.name), total }, userId));
    log.info(`🔄 Sync: ${remote.length} remote stores, ${added.length} added`);
    return { added, total };
  }
}
