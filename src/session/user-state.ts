/**
 * Per-user selected store, persisted between restarts.
 */

import { z } from "zod";
import { CONFIG } from "../config.js";
import { JsonFile } from "../utils/json-file.js";

const selectionSchema = z.object({
  storeId: z.string(),
  storeName: z.string(),
  updatedAt: z.string(),
});

const userStateSchema = z.record(z.string(), selectionSchema);

export type StoreSelection = z.infer<typeof selectionSchema>;

export class UserStateStore {
  private file: JsonFile<typeof userStateSchema>;
  private state: Record<string, StoreSelection>;

  constructor(filePath: string = CONFIG.userStateFile) {
    this.file = new JsonFile(filePath, userStateSchema, () => ({}));
    this.state = this.file.load();
  }

  getSelectedStore(userId: number): StoreSelection | undefined {
    return this.state[String(userId)];
  }

  setSelectedStore(userId: number, storeId: string, storeName: string): StoreSelection {
    const selection: StoreSelection = { storeId, storeName, updatedAt: new Date().toISOString() };
    this.state[String(userId)] = selection;
    this.file.save(this.state);
    return selection;
  }

  /** Returns false when the user had nothing selected */
  clearSelectedStore(userId: number): boolean {
    const key = String(userId);
    if (!(key in this.state)) return false;
    delete this.state[key];
    this.file.save(this.state);
    return true;
  }

  /**
   * Drop a store from every user's selection (after it is deleted).
   * Returns the number of users affected.
   */
  clearStoreForAll(storeId: string): number {
    let cleared = 0;
    for (const [key, selection] of Object.entries(this.state)) {
      if (selection.storeId === storeId) {
        delete this.state[key];
        cleared++;
      }
    }
    if (cleared > 0) this.file.save(this.state);
    return cleared;
  }

  /** Keep the stored display name in step with a rename */
  renameStoreForAll(storeId: string, newName: string): number {
    let updated = 0;
    for (const selection of Object.values(this.state)) {
      if (selection.storeId === storeId) {
        selection.storeName = newName;
        updated++;
      }
    }
    if (updated > 0) this.file.save(this.state);
    return updated;
  }
}
