import { z } from "zod";

export const STORE_BACKENDS = ["file_search", "notebooklm"] as const;
export type StoreBackend = (typeof STORE_BACKENDS)[number];

export const storeDocumentSchema = z.object({
  name: z.string(),
  uploadedAt: z.string(),
  /** Where the document came from: a Telegram upload, a Drive URL, ... */
  source: z.string().optional(),
});

export const storeSchema = z.object({
  /** File Search store resource name, or `notebooklm:<notebook id>` */
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  backend: z.enum(STORE_BACKENDS).default("file_search"),
  notebookUrl: z.string().url().optional(),
  documents: z.array(storeDocumentSchema).default([]),
  createdAt: z.string(),
});

export const storesFileSchema = z.object({
  stores: z.array(storeSchema).default([]),
});

export type StoreDocument = z.infer<typeof storeDocumentSchema>;
export type Store = z.infer<typeof storeSchema>;
export type StoresFile = z.infer<typeof storesFileSchema>;

/** A store as reported by the File Search API */
export interface RemoteStore {
  id: string;
  displayName?: string;
}

export interface StoreMatch {
  store: Store;
  score: number;
}
