/**
 * Store Registry
 *
 * Persistent list of document stores (File Search stores and registered
 * NotebookLM notebooks). Every mutation is written straight back to disk.
 */

import { CONFIG } from "../config.js";
import { JsonFile } from "../utils/json-file.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { log } from "../utils/logger.js";
import { bestNameMatch, normalizeName } from "./name-matching.js";
import { storesFileSchema } from "./types.js";
import type { RemoteStore, Store, StoreDocument, StoreMatch } from "./types.js";

export class StoreRegistry {
  private file: JsonFile<typeof storesFileSchema>;
  private stores: Store[];

  constructor(filePath: string = CONFIG.storesFile) {
    this.file = new JsonFile(filePath, storesFileSchema, () => ({ stores: [] }));
    this.stores = this.file.load().stores;
    log.dim(`Loaded ${this.stores.length} stores from ${filePath}`);
  }

  private persist(): void {
    this.file.save({ stores: this.stores });
  }

  list(): Store[] {
    return [...this.stores];
  }

  count(): number {
    return this.stores.length;
  }

  getById(id: string): Store | undefined {
    return this.stores.find((s) => s.id === id);
  }

  /** Case-insensitive exact name lookup */
  getByName(name: string): Store | undefined {
    const wanted = normalizeName(name);
    return this.stores.find((s) => normalizeName(s.name) === wanted);
  }

  /**
   * Fuzzy lookup: exact name, then substring, then shared words.
   */
  findByName(query: string): Store | undefined {
    return this.match(query)?.store;
  }

  match(query: string): StoreMatch | undefined {
    const exact = this.getByName(query);
    if (exact) return { store: exact, score: 1 };

    const best = bestNameMatch(query, this.stores, (s) => s.name);
    return best ? { store: best.item, score: best.score } : undefined;
  }

  /** Resolve a user-supplied reference that may be either an id or a name */
  resolve(reference: string): Store | undefined {
    return this.getById(reference) ?? this.findByName(reference);
  }

  require(reference: string): Store {
    const store = this.resolve(reference);
    if (!store) {
      throw new NotFoundError(`Store "${reference}" not found. Use /list to see available stores.`);
    }
    return store;
  }

  add(store: Store): Store {
    if (this.getById(store.id)) {
      throw new ValidationError(`Store with id ${store.id} already exists`);
    }
    if (this.getByName(store.name)) {
      throw new ValidationError(`A store named "${store.name}" already exists`);
    }
    this.stores.push(store);
    this.persist();
    return store;
  }

  remove(id: string): Store {
    const index = this.stores.findIndex((s) => s.id === id);
    if (index === -1) {
      throw new NotFoundError(`Store ${id} not found`);
    }
    const [removed] = this.stores.splice(index, 1);
    this.persist();
    return removed;
  }

  rename(id: string, newName: string): Store {
    const store = this.getById(id);
    if (!store) {
      throw new NotFoundError(`Store ${id} not found`);
    }
    const name = newName.trim();
    if (!name) {
      throw new ValidationError("New store name must not be empty");
    }
    const clash = this.getByName(name);
    if (clash && clash.id !== id) {
      throw new ValidationError(`A store named "${name}" already exists`);
    }
    store.name = name;
    this.persist();
    return store;
  }

  addDocument(id: string, document: StoreDocument): Store {
    const store = this.getById(id);
    if (!store) {
      throw new NotFoundError(`Store ${id} not found`);
    }
    store.documents.push(document);
    this.persist();
    return store;
  }

  /**
   * Add remote File Search stores that are not registered locally.
   * Returns the stores that were added.
   */
  mergeRemote(remote: RemoteStore[]): Store[] {
    const added: Store[] = [];
    for (const r of remote) {
      if (this.getById(r.id)) continue;

      let name = r.displayName?.trim() || "Unnamed";
      if (this.getByName(name)) {
        name = `${name} (${r.id.split("/").pop() ?? r.id})`;
      }

      const store: Store = {
        id: r.id,
        name,
        description: "",
        backend: "file_search",
        documents: [],
        createdAt: new Date().toISOString(),
      };
      this.stores.push(store);
      added.push(store);
    }

    if (added.length > 0) {
      this.persist();
    }
    return added;
  }
}
