/**
 * Gemini File Search Types
 */

import type {
  CreateFileSearchStoreParameters,
  DeleteFileSearchStoreParameters,
  FileSearchStore,
  GenerateContentParameters,
  GenerateContentResponse,
  ListFileSearchStoresParameters,
  UploadToFileSearchStoreOperation,
  UploadToFileSearchStoreParameters,
} from "@google/genai";
import type { ThinkingLevelName } from "../config.js";

/**
 * The part of the GoogleGenAI client this bot calls. A GoogleGenAI instance
 * satisfies it; tests pass a hand-built fake.
 */
export interface GenAiApi {
  models: {
    generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
  };
  fileSearchStores: {
    create(params: CreateFileSearchStoreParameters): Promise<FileSearchStore>;
    delete(params: DeleteFileSearchStoreParameters): Promise<void>;
    list(params?: ListFileSearchStoresParameters): Promise<AsyncIterable<FileSearchStore>>;
    uploadToFileSearchStore(params: UploadToFileSearchStoreParameters): Promise<UploadToFileSearchStoreOperation>;
  };
  operations: {
    get(params: { operation: UploadToFileSearchStoreOperation }): Promise<{
      done?: boolean;
      error?: Record<string, unknown>;
    }>;
  };
}

export interface GenerateOptions {
  /** Defaults to the configured GEMINI_MODEL */
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  thinkingLevel?: ThinkingLevelName;
  systemInstruction?: string;
}

export interface AskOptions extends GenerateOptions {
  /** Keep the model's thought summary in the result */
  includeThoughts?: boolean;
}

export interface GeminiAnswer {
  text: string;
  /** Titles (or URLs for web results) of the grounding chunks, de-duplicated */
  sources: string[];
  /** Thought summary, only when requested */
  thoughts?: string;
  model: string;
}

export interface UploadOptions {
  displayName?: string;
  mimeType?: string;
  /** Default 5 s */
  pollIntervalMs?: number;
  /** Default 300 s */
  timeoutMs?: number;
}
