/**
 * Gemini File Search Client
 *
 * Wraps the @google/genai SDK calls the bot needs: File Search store
 * management, grounded answers over one or more stores, plain generation for
 * the query pipeline, Google Search grounding and image description.
 */

import fs from "fs";
import path from "path";
import { GoogleGenAI, ThinkingLevel } from "@google/genai";
import type { GenerateContentConfig, GenerateContentResponse, Part, Tool } from "@google/genai";
import { log } from "../utils/logger.js";
import { CONFIG, type ThinkingLevelName } from "../config.js";
import { BackendError, ConfigError, TimeoutError, errorMessage } from "../errors.js";
import { formatBytes } from "../utils/text.js";
import type { RemoteStore } from "../stores/types.js";
import type { AskOptions, GeminiAnswer, GenAiApi, GenerateOptions, UploadOptions } from "./types.js";

const DEFAULT_POLL_INTERVAL_MS = 5000;
const DEFAULT_UPLOAD_TIMEOUT_MS = 300_000;

const MIME_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".html": "text/html",
  ".htm": "text/html",
  ".csv": "text/csv",
  ".json": "application/json",
  ".xml": "application/xml",
  ".doc": "application/msword",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".xls": "application/vnd.ms-excel",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".pptx": "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ".rtf": "application/rtf",
  ".odt": "application/vnd.oasis.opendocument.text",
};

export function detectMimeType(filePath: string): string {
  return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/**
 * The SDK exposes two thinking levels; minimal/low map to LOW and
 * medium/high to HIGH.
 */
export function toSdkThinkingLevel(level: ThinkingLevelName): ThinkingLevel {
  return level === "medium" || level === "high" ? ThinkingLevel.HIGH : ThinkingLevel.LOW;
}

/**
 * Split a response into answer text, thought summary and grounding sources.
 */
export function extractAnswer(response: GenerateContentResponse): Omit<GeminiAnswer, "model"> {
  const candidate = response.candidates?.[0];
  const parts: Part[] = candidate?.content?.parts ?? [];

  const answer: string[] = [];
  const thoughts: string[] = [];
  for (const part of parts) {
    if (!part.text) continue;
    if (part.thought) {
      thoughts.push(part.text);
    } else {
      answer.push(part.text);
    }
  }

  const sources: string[] = [];
  for (const chunk of candidate?.groundingMetadata?.groundingChunks ?? []) {
    const label = chunk.retrievedContext?.title ?? chunk.web?.title ?? chunk.web?.uri;
    if (label && !sources.includes(label)) {
      sources.push(label);
    }
  }

  return {
    text: answer.join("").trim(),
    sources,
    thoughts: thoughts.length > 0 ? thoughts.join("\n").trim() : undefined,
  };
}

export class GeminiClient {
  private api: GenAiApi | null;

  constructor(api?: GenAiApi | null, apiKey: string = CONFIG.geminiApiKey) {
    if (api) {
      this.api = api;
    } else if (apiKey) {
      this.api = new GoogleGenAI({ apiKey });
      log.info("Gemini client initialized");
    } else {
      this.api = null;
      log.info("Gemini client not initialized (no API key)");
    }
  }

  isAvailable(): boolean {
    return this.api !== null;
  }

  private client(): GenAiApi {
    if (!this.api) {
      throw new ConfigError("Gemini API key not configured. Set GEMINI_API_KEY environment variable.");
    }
    return this.api;
  }

  private buildConfig(options: GenerateOptions, tools?: Tool[], includeThoughts?: boolean): GenerateContentConfig {
    const thinkingLevel = options.thinkingLevel ?? CONFIG.geminiThinkingLevel;
    return {
      temperature: options.temperature,
      maxOutputTokens: options.maxOutputTokens,
      systemInstruction: options.systemInstruction,
      tools,
      thinkingConfig: {
        thinkingLevel: toSdkThinkingLevel(thinkingLevel),
        includeThoughts,
      },
    };
  }

  /**
   * Plain text generation without retrieval
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const model = options.model ?? CONFIG.geminiModel;
    try {
      const response = await this.client().models.generateContent({
        model,
        contents: prompt,
        config: this.buildConfig(options),
      });
      return extractAnswer(response).text;
    } catch (error) {
      throw this.wrap("generate", error);
    }
  }

  /**
   * Answer a question grounded on one or more File Search stores.
   */
  async ask(storeIds: string[], question: string, options: AskOptions = {}): Promise<GeminiAnswer> {
    if (storeIds.length === 0) {
      throw new BackendError("gemini", "No File Search store selected for the question");
    }
    const model = options.model ?? CONFIG.geminiModel;
    log.info(`🔎 File Search (${model}) over ${storeIds.length} store(s): ${question.substring(0, 50)}...`);

    try {
      const response = await this.client().models.generateContent({
        model,
        contents: question,
        config: this.buildConfig(
          options,
          [{ fileSearch: { fileSearchStoreNames: storeIds } }],
          options.includeThoughts
        ),
      });

      const answer = { ...extractAnswer(response), model };
      if (!answer.text) {
        throw new BackendError("gemini", "Gemini returned an empty answer");
      }
      return answer;
    } catch (error) {
      throw this.wrap("ask", error);
    }
  }

  /**
   * Answer with the thought summary kept apart from the answer text.
   */
  async askWithThinking(storeIds: string[], question: string, options: GenerateOptions = {}): Promise<GeminiAnswer> {
    return this.ask(storeIds, question, { thinkingLevel: "high", ...options, includeThoughts: true });
  }

  /**
   * Answer using Google Search grounding instead of a document store.
   */
  async searchWeb(question: string, options: GenerateOptions = {}): Promise<GeminiAnswer> {
    const model = options.model ?? CONFIG.geminiModel;
    log.info(`🌐 Web search (${model}): ${question.substring(0, 50)}...`);
    try {
      const response = await this.client().models.generateContent({
        model,
        contents: question,
        config: this.buildConfig(options, [{ googleSearch: {} }]),
      });
      return { ...extractAnswer(response), model };
    } catch (error) {
      throw this.wrap("searchWeb", error);
    }
  }

  async describeImage(data: Buffer, mimeType: string, prompt: string, options: GenerateOptions = {}): Promise<string> {
    const model = options.model ?? CONFIG.geminiModel;
    try {
      const response = await this.client().models.generateContent({
        model,
        contents: [
          { inlineData: { mimeType, data: data.toString("base64") } },
          { text: prompt },
        ],
        config: this.buildConfig(options),
      });
      return extractAnswer(response).text;
    } catch (error) {
      throw this.wrap("describeImage", error);
    }
  }

  // ===========================================================================
  // File Search stores
  // ===========================================================================

  async createStore(displayName: string): Promise<RemoteStore> {
    try {
      const store = await this.client().fileSearchStores.create({ config: { displayName } });
      if (!store.name) {
        throw new BackendError("gemini", "File Search store was created without a name");
      }
      log.success(`Created File Search store ${store.name} (${displayName})`);
      return { id: store.name, displayName: store.displayName ?? displayName };
    } catch (error) {
      throw this.wrap("createStore", error);
    }
  }

  async deleteStore(storeId: string): Promise<void> {
    try {
      await this.client().fileSearchStores.delete({ name: storeId, config: { force: true } });
      log.info(`🗑️ Deleted File Search store ${storeId}`);
    } catch (error) {
      throw this.wrap("deleteStore", error);
    }
  }

  async listStores(): Promise<RemoteStore[]> {
    try {
      const stores: RemoteStore[] = [];
      for await (const store of await this.client().fileSearchStores.list()) {
        if (store.name) {
          stores.push({ id: store.name, displayName: store.displayName });
        }
      }
      return stores;
    } catch (error) {
      throw this.wrap("listStores", error);
    }
  }

  /**
   * Upload a local file into a store and wait for indexing to finish.
   */
  async uploadFile(storeId: string, filePath: string, options: UploadOptions = {}): Promise<void> {
    if (!fs.existsSync(filePath)) {
      throw new BackendError("gemini", `File not found: ${filePath}`);
    }

    const displayName = options.displayName ?? path.basename(filePath);
    const mimeType = options.mimeType ?? detectMimeType(filePath);
    const pollInterval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const timeoutMs = options.timeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
    const size = fs.statSync(filePath).size;

    log.info(`📤 Uploading ${displayName} (${formatBytes(size)}) to ${storeId}`);

    try {
      const api = this.client();
      const operation = await api.fileSearchStores.uploadToFileSearchStore({
        file: filePath,
        fileSearchStoreName: storeId,
        config: { displayName, mimeType },
      });

      const startTime = Date.now();
      let status = await api.operations.get({ operation });
      while (!status.done) {
        if (Date.now() - startTime >= timeoutMs) {
          throw new TimeoutError(`Indexing ${displayName} did not finish in ${Math.round(timeoutMs / 1000)}s`, timeoutMs);
        }
        await new Promise((resolve) => setTimeout(resolve, pollInterval));
        status = await api.operations.get({ operation });
      }

      if (status.error) {
        throw new BackendError("gemini", `Indexing ${displayName} failed: ${JSON.stringify(status.error)}`);
      }

      const elapsed = Math.round((Date.now() - startTime) / 1000);
      log.success(`Indexed ${displayName} in ${elapsed}s`);
    } catch (error) {
      throw this.wrap("uploadFile", error);
    }
  }

  private wrap(operation: string, error: unknown): Error {
    if (error instanceof BackendError || error instanceof TimeoutError || error instanceof ConfigError) {
      log.error(`Gemini ${operation} failed: ${error.message}`);
      return error;
    }
    const msg = errorMessage(error);
    log.error(`Gemini ${operation} failed: ${msg}`);
    return new BackendError("gemini", msg);
  }
}
