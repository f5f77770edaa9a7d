/**
 * Answer Service
 *
 * Turns a free-text message into either a bot action or an answer. Answers
 * are produced by the store's backend (File Search or a NotebookLM
 * notebook), or by web search, multi-store search or a comparison of two
 * stores, depending on how the query processor classified the question.
 */

import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import { BackendError, NotFoundError, ValidationError, withTimeout } from "../errors.js";
import type { GeminiClient } from "../gemini/gemini-client.js";
import type { StoreRegistry } from "../stores/store-registry.js";
import type { Store } from "../stores/types.js";
import type { UserStateStore } from "../session/user-state.js";
import { GLOBAL_SCOPE, type ConversationMemory } from "../session/memory.js";
import type { EventEmitter } from "../events/event-emitter.js";
import { createEvent } from "../events/event-types.js";
import { inferActionFromText, extractTargetStoreHint } from "../routing/intent.js";
import type { BotAction } from "../routing/actions.js";
import type { ProcessedQuery, QueryProcessor, QueryType } from "../routing/query-processor.js";
import type { StoreRouter } from "../routing/router.js";
import type { PromptEnhancer } from "../routing/prompt-enhancer.js";
import { formatSources } from "./formatting.js";

export type ProgressCallback = (message: string) => Promise<void>;

export type QuestionBackend = Pick<GeminiClient, "ask" | "askWithThinking" | "searchWeb" | "generate">;

export interface NotebookBackend {
  ask(notebookUrl: string, question: string): Promise<string>;
}

export type MessageIntent = { kind: "action"; action: BotAction } | { kind: "question"; processed: ProcessedQuery };

export interface AnswerResult {
  /** Reply text, with store header and sources */
  text: string;
  /** Bare answer, as remembered and exported */
  answer: string;
  queryType: QueryType;
  storeName?: string;
  storeIds: string[];
}

export interface AnswerServiceDeps {
  registry: StoreRegistry;
  userState: UserStateStore;
  memory: ConversationMemory;
  gemini: QuestionBackend;
  /** Absent when NotebookLM is not set up */
  notebooks?: NotebookBackend;
  processor: QueryProcessor;
  router: StoreRouter;
  enhancer: PromptEnhancer;
  events: EventEmitter;
}

export interface AnswerServiceOptions {
  queryTimeoutMs?: number;
  actionConfidenceThreshold?: number;
  model?: string;
  proModel?: string;
}

interface ResolvedStore {
  store: Store;
  reasoning: string;
}

interface StoreAnswer {
  text: string;
  sources: string[];
}

export class AnswerService {
  private readonly queryTimeoutMs: number;
  private readonly threshold: number;
  private readonly model: string;
  private readonly proModel: string;

  constructor(
    private readonly deps: AnswerServiceDeps,
    options: AnswerServiceOptions = {}
  ) {
    this.queryTimeoutMs = options.queryTimeoutMs ?? CONFIG.queryTimeout * 1000;
    this.threshold = options.actionConfidenceThreshold ?? CONFIG.actionConfidenceThreshold;
    this.model = options.model ?? CONFIG.geminiModel;
    this.proModel = options.proModel ?? CONFIG.geminiModelPro;
  }

  /**
   * Decide whether a message is a command in disguise or a question.
   * Phrase heuristics win; the query processor's action is only taken at or
   * above the confidence threshold.
   */
  async analyse(userId: number, text: string): Promise<MessageIntent> {
    const inferred = inferActionFromText(text);
    if (inferred) {
      log.info(`🧭 Heuristic action: ${inferred.action}`);
      return { kind: "action", action: inferred };
    }

    const selected = this.deps.userState.getSelectedStore(userId);
    const context = this.deps.memory.getContextPrompt(userId, selected?.storeId ?? GLOBAL_SCOPE);
    const processed = await this.deps.processor.processQuery(text, this.deps.registry.list(), context);

    if (processed.action && processed.confidence >= this.threshold) {
      return { kind: "action", action: processed.action };
    }
    return { kind: "question", processed };
  }

  /**
   * Answer a question and remember the exchange.
   */
  async answer(
    userId: number,
    question: string,
    processed: ProcessedQuery,
    progress?: ProgressCallback
  ): Promise<AnswerResult> {
    const stores = this.requireStores();
    const started = Date.now();

    const result = await withTimeout(
      this.run(userId, question, processed, stores, progress),
      this.queryTimeoutMs,
      "Query"
    );

    this.remember(userId, question, result);
    await this.deps.events.emit(
      createEvent(
        "question_answered",
        {
          storeIds: result.storeIds,
          queryType: result.queryType,
          questionLength: question.length,
          answerLength: result.answer.length,
          durationMs: Date.now() - started,
        },
        userId
      )
    );
    return result;
  }

  /**
   * Deep-thinking answer from one store.
   */
  async think(userId: number, question: string, progress?: ProgressCallback): Promise<AnswerResult> {
    const stores = this.requireStores();
    const { store } = await this.resolveStore(userId, question, undefined, stores);
    await progress?.(`Thinking about: ${store.name}...`);

    const run = async (): Promise<StoreAnswer> => {
      if (store.backend === "notebooklm") {
        return this.askStore(userId, store, question, this.model);
      }
      const context = this.deps.memory.getContextPrompt(userId, store.id);
      const answer = await this.deps.gemini.askWithThinking([store.id], withContext(context, question), {
        model: this.proModel,
      });
      return { text: answer.text, sources: answer.sources };
    };

    const answer = await withTimeout(run(), this.queryTimeoutMs, "Thinking");
    const result: AnswerResult = {
      text: `📁 ${store.name}\n\n${answer.text}`,
      answer: answer.text,
      queryType: "single",
      storeName: store.name,
      storeIds: [store.id],
    };
    this.remember(userId, question, result);
    return result;
  }

  /**
   * Store for a single-store question: a store named in the text, then the
   * processor's target, then the user's selection, then the router.
   */
  async resolveStore(
    userId: number,
    question: string,
    processed: ProcessedQuery | undefined,
    stores: Store[]
  ): Promise<ResolvedStore> {
    const { registry, userState, router } = this.deps;

    const hint = extractTargetStoreHint(question);
    const hinted = hint ? registry.findByName(hint) : undefined;
    if (hinted) {
      return { store: hinted, reasoning: `Named in the question ("${hint}")` };
    }

    const target = processed?.targetStore ? registry.findByName(processed.targetStore) : undefined;
    if (target) {
      return { store: target, reasoning: "Named in the question" };
    }

    const selection = userState.getSelectedStore(userId);
    const selected = selection ? registry.getById(selection.storeId) : undefined;
    if (selected) {
      return { store: selected, reasoning: "Active store" };
    }

    const routed = await router.route(question, stores, 1);
    const [first] = routed.stores;
    if (first) {
      return { store: first, reasoning: routed.reasoning };
    }
    return { store: stores[0], reasoning: "Default store" };
  }

  private requireStores(): Store[] {
    const stores = this.deps.registry.list();
    if (stores.length === 0) {
      throw new NotFoundError("No knowledge stores available.\nThe admin can create one with /add.");
    }
    return stores;
  }

  private remember(userId: number, question: string, result: AnswerResult): void {
    const scope = result.storeIds.length === 1 ? result.storeIds[0] : GLOBAL_SCOPE;
    this.deps.memory.addExchange(userId, question, result.answer, scope);
    this.deps.memory.setLastAnswer(userId, { question, answer: result.answer, storeName: result.storeName });
  }

  private modelFor(processed: ProcessedQuery): string {
    return processed.complexity === "complex" ? this.proModel : this.model;
  }

  private async run(
    userId: number,
    question: string,
    processed: ProcessedQuery,
    stores: Store[],
    progress?: ProgressCallback
  ): Promise<AnswerResult> {
    switch (processed.queryType) {
      case "web_search":
        return this.answerFromWeb(processed, progress);
      case "multistore": {
        const searchable = stores.filter((s) => s.backend === "file_search");
        if (searchable.length > 1) {
          return this.answerFromAll(userId, processed, searchable, progress);
        }
        break;
      }
      case "compare": {
        const compared = this.comparedStores(processed);
        if (compared.length >= 2) {
          return this.compare(userId, question, processed, compared, progress);
        }
        break;
      }
      case "single":
      case "sources":
        break;
    }
    return this.answerFromStore(userId, question, processed, stores, progress);
  }

  private async answerFromStore(
    userId: number,
    question: string,
    processed: ProcessedQuery,
    stores: Store[],
    progress?: ProgressCallback
  ): Promise<AnswerResult> {
    const { store, reasoning } = await this.resolveStore(userId, question, processed, stores);
    await progress?.(`Selected: ${store.name}\nReason: ${reasoning}\n\nGetting answer...`);

    const prompt =
      processed.confidence > 0
        ? processed.optimizedPrompt
        : await this.deps.enhancer.enhance(question, [store.name]);
    const answer = await this.askStore(userId, store, prompt, this.modelFor(processed));

    const showSources = processed.includeSources || processed.queryType === "sources";
    return {
      text: `📁 ${store.name}\n\n${answer.text}${showSources ? formatSources(answer.sources) : ""}`,
      answer: answer.text,
      queryType: processed.queryType === "sources" ? "sources" : "single",
      storeName: store.name,
      storeIds: [store.id],
    };
  }

  private async askStore(userId: number, store: Store, prompt: string, model: string): Promise<StoreAnswer> {
    if (store.backend === "notebooklm") {
      if (!this.deps.notebooks) {
        throw new BackendError("notebooklm", "NotebookLM is not available on this bot");
      }
      if (!store.notebookUrl) {
        throw new ValidationError(`Store "${store.name}" has no notebook URL`);
      }
      return { text: await this.deps.notebooks.ask(store.notebookUrl, prompt), sources: [] };
    }

    const context = this.deps.memory.getContextPrompt(userId, store.id);
    const answer = await this.deps.gemini.ask([store.id], withContext(context, prompt), { model });
    return { text: answer.text, sources: answer.sources };
  }

  private async answerFromWeb(processed: ProcessedQuery, progress?: ProgressCallback): Promise<AnswerResult> {
    await progress?.("Searching the web...");
    const answer = await this.deps.gemini.searchWeb(processed.optimizedPrompt, { model: this.modelFor(processed) });
    return {
      text: `🌐 Web search\n\n${answer.text}${formatSources(answer.sources)}`,
      answer: answer.text,
      queryType: "web_search",
      storeIds: [],
    };
  }

  private async answerFromAll(
    userId: number,
    processed: ProcessedQuery,
    stores: Store[],
    progress?: ProgressCallback
  ): Promise<AnswerResult> {
    await progress?.(`Searching ${stores.length} stores...`);
    const context = this.deps.memory.getContextPrompt(userId, GLOBAL_SCOPE);
    const ids = stores.map((s) => s.id);
    const answer = await this.deps.gemini.ask(ids, withContext(context, processed.optimizedPrompt), {
      model: this.modelFor(processed),
    });
    return {
      text: `📁 All stores (${stores.length})\n\n${answer.text}${formatSources(answer.sources)}`,
      answer: answer.text,
      queryType: "multistore",
      storeIds: ids,
    };
  }

  private comparedStores(processed: ProcessedQuery): Store[] {
    const found: Store[] = [];
    for (const name of processed.targetStores ?? []) {
      const store = this.deps.registry.findByName(name);
      if (store && !found.includes(store)) found.push(store);
    }
    return found.slice(0, 2);
  }

  private async compare(
    userId: number,
    question: string,
    processed: ProcessedQuery,
    stores: Store[],
    progress?: ProgressCallback
  ): Promise<AnswerResult> {
    const topic = processed.compareTopic ?? question;
    await progress?.(`Comparing ${stores.map((s) => s.name).join(" and ")}...`);

    const sections: string[] = [];
    for (const store of stores) {
      const prompt = await this.deps.processor.enhanceForStore(topic, store);
      const answer = await this.askStore(userId, store, prompt, this.model);
      sections.push(`### ${store.name}\n${answer.text}`);
    }

    const comparison = await this.deps.gemini.generate(
      `Compare the following stores on the topic "${topic}".
Point out similarities and differences with concrete figures, dates and requirements, and finish with a short conclusion.
Answer in the language of the topic.

${sections.join("\n\n")}`,
      { model: this.proModel, temperature: 0.2 }
    );

    return {
      text: `⚖️ ${stores.map((s) => s.name).join(" vs ")}\n\n${comparison}`,
      answer: comparison,
      queryType: "compare",
      storeIds: stores.map((s) => s.id),
    };
  }
}

function withContext(context: string, prompt: string): string {
  return context ? `${context}\n${prompt}` : prompt;
}
