/**
 * Query Processor
 *
 * Asks the Pro model what a message means before answering it: which kind of
 * query it is (one store, all stores, web, comparison, sources), which store
 * it targets, a cleaned-up prompt for retrieval, how complex it is, and
 * whether it is really a bot command written as a sentence.
 */

import { z } from "zod";
import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import { ValidationError, errorMessage } from "../errors.js";
import { stripQuotes } from "../utils/text.js";
import { ACTION_NAMES, toBotAction, type BotAction } from "./actions.js";
import type { GenerateOptions } from "../gemini/types.js";
import type { Store } from "../stores/types.js";

export const QUERY_TYPES = ["single", "multistore", "web_search", "compare", "sources"] as const;
export type QueryType = (typeof QUERY_TYPES)[number];

export const COMPLEXITIES = ["simple", "medium", "complex"] as const;
export type Complexity = (typeof COMPLEXITIES)[number];

/** Anything that turns a prompt into text; GeminiClient in production */
export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface ProcessedQuery {
  queryType: QueryType;
  optimizedPrompt: string;
  includeSources: boolean;
  targetStore?: string;
  /** Stores to compare, for "compare" queries */
  targetStores?: string[];
  compareTopic?: string;
  originalQuestion: string;
  userIntent: string;
  confidence: number;
  complexity: Complexity;
  /** Bot command hidden in the message, if any */
  action: BotAction | null;
}

const nullableText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() && v.trim().toLowerCase() !== "null" ? v.trim() : undefined));

const analysisSchema = z.object({
  query_type: z.enum(QUERY_TYPES).catch("single"),
  user_intent: z.string().catch(""),
  optimized_prompt: z.string().nullish().catch(null),
  include_sources: z.boolean().catch(false),
  target_store: nullableText.catch(undefined),
  compare_stores: z
    .array(z.string())
    .nullish()
    .transform((v) => (v && v.length > 0 ? v : undefined))
    .catch(undefined),
  compare_topic: nullableText.catch(undefined),
  action: z.string().nullish().catch(null),
  action_args: z.record(z.string(), z.unknown()).nullish().catch(null),
  confidence: z.coerce.number().min(0).max(1).catch(0.5),
  complexity: z.enum(COMPLEXITIES).catch("medium"),
});

/**
 * Parse the model's JSON reply. Missing or malformed fields take defaults;
 * a reply without any JSON object is a ValidationError.
 */
export function parseAnalysis(responseText: string, originalQuestion: string): ProcessedQuery {
  const match = /\{[\s\S]*\}/.exec(responseText);
  if (!match) {
    throw new ValidationError("No JSON found in query analysis response");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(match[0]);
  } catch (error) {
    throw new ValidationError(`Query analysis is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = analysisSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("Query analysis has an unexpected shape", parsed.error.issues);
  }
  const data = parsed.data;

  return {
    queryType: data.query_type,
    optimizedPrompt: data.optimized_prompt?.trim() || originalQuestion,
    includeSources: data.include_sources,
    targetStore: data.target_store,
    targetStores: data.compare_stores,
    compareTopic: data.compare_topic,
    originalQuestion,
    userIntent: data.user_intent,
    confidence: data.confidence,
    complexity: data.complexity,
    action: toBotAction(data.action, data.action_args ?? {}),
  };
}

export function fallbackQuery(question: string): ProcessedQuery {
  return {
    queryType: "single",
    optimizedPrompt: question,
    includeSources: false,
    originalQuestion: question,
    userIntent: "Could not determine intent",
    confidence: 0,
    complexity: "medium",
    action: null,
  };
}

export function formatStoresForPrompt(stores: Store[]): string {
  if (stores.length === 0) return "No knowledge stores available";
  return stores
    .map((s, i) => `${i + 1}. ${s.name} - ${s.description || "No description"} (documents: ${s.documents.length})`)
    .join("\n");
}

function analysisPrompt(question: string, stores: Store[], context: string): string {
  return `You analyse user requests for a question-answering bot over tender documentation.

AVAILABLE KNOWLEDGE STORES:
${formatStoresForPrompt(stores)}

PREVIOUS CONVERSATION:
${context || "None"}

USER REQUEST (may contain typos, transliteration or slang):
"${question}"

Work out what the user wants, classify the request and write the best prompt for the knowledge store.

QUERY TYPES:
- "single": a question for one store (name it in target_store if you can tell which)
- "multistore": look for something across all stores ("where is...", "which tenders...")
- "web_search": needs current information from the internet (prices, news, regulations)
- "compare": compare two stores on a topic
- "sources": the user asks for sources or references

Store names may be misspelt or transliterated ("майприорити" for "MyPriority").

Reply with JSON only:
{
  "query_type": "single|multistore|web_search|compare|sources",
  "user_intent": "short description of what the user wants",
  "optimized_prompt": "corrected, expanded prompt asking for concrete figures, dates and a structured answer, in the user's language",
  "include_sources": true or false,
  "target_store": "store name or null",
  "compare_stores": ["store1", "store2"] or null,
  "compare_topic": "topic or null",
  "action": "none|${ACTION_NAMES.join("|")}",
  "action_args": { "store_name": "...", "old_name": "...", "new_name": "...", "name": "...", "description": "...", "urls": ["..."], "format": "pdf|docx", "hours": 0 },
  "confidence": 0.0-1.0,
  "complexity": "simple|medium|complex"
}

Use an action other than "none" only when the user explicitly asks the bot to do something (list, select, export, rename...).
Complexity: "simple" for a single fact, "medium" for search and structuring, "complex" for comparison or synthesis across sources.

JSON:`;
}

export class QueryProcessor {
  constructor(
    private readonly generator: TextGenerator,
    private readonly model: string = CONFIG.geminiModelPro
  ) {}

  /**
   * Classify a question. Never throws: any failure yields a plain single-store
   * query with zero confidence.
   */
  async processQuery(question: string, stores: Store[], context: string = ""): Promise<ProcessedQuery> {
    try {
      const text = await this.generator.generate(analysisPrompt(question, stores, context), {
        model: this.model,
        temperature: 0.1,
        maxOutputTokens: 1500,
      });
      const result = parseAnalysis(text, question);
      log.info(
        `🧭 Query processed: type=${result.queryType}, complexity=${result.complexity}, ` +
          `action=${result.action?.action ?? "none"}, confidence=${result.confidence}`
      );
      return result;
    } catch (error) {
      log.warning(`⚠️ Query processing failed, answering as a plain question: ${errorMessage(error)}`);
      return fallbackQuery(question);
    }
  }

  /**
   * Rewrite a question for retrieval from one specific store. Returns the
   * question unchanged if the model call fails.
   */
  async enhanceForStore(question: string, store: Pick<Store, "name" | "description">): Promise<string> {
    const prompt = `You are an expert in tender documentation. Improve the user's question for search in a knowledge store.

KNOWLEDGE STORE: ${store.name}
DESCRIPTION: ${store.description || "No description"}

USER QUESTION (may contain mistakes):
"${question}"

Fix mistakes, expand the question so the answer is complete, ask for concrete data (figures, dates, requirements) and a structured answer with sections. Keep the user's language.

Return ONLY the improved question:`;

    try {
      const enhanced = stripQuotes(
        await this.generator.generate(prompt, { model: this.model, temperature: 0.2, maxOutputTokens: 500 })
      );
      return enhanced || question;
    } catch (error) {
      log.warning(`⚠️ Could not enhance question for ${store.name}: ${errorMessage(error)}`);
      return question;
    }
  }
}
