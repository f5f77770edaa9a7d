/**
 * Prompt Enhancer
 *
 * Rewrites a question before it goes to a store. A curated template from the
 * prompts library is used when the question clearly matches one; otherwise
 * the Flash model rewrites the question at a low thinking level.
 */

import fs from "fs";
import { z } from "zod";
import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import { errorMessage } from "../errors.js";
import { stripQuotes } from "../utils/text.js";
import type { TextGenerator } from "./query-processor.js";

const promptSchema = z.object({
  name: z.string(),
  keywords: z.array(z.string()).default([]),
  template: z.string(),
});

const librarySchema = z.object({
  sections: z.record(
    z.string(),
    z.object({
      keywords: z.array(z.string()).default([]),
      prompts: z.record(z.string(), promptSchema).default({}),
    })
  ),
});

export type PromptsLibrary = z.infer<typeof librarySchema>;

export interface TemplateMatch {
  section: string;
  name: string;
  template: string;
  score: number;
}

const MIN_TEMPLATE_SCORE = 2;

export function loadPromptsLibrary(filePath: string = CONFIG.promptsLibraryFile): PromptsLibrary {
  if (!fs.existsSync(filePath)) {
    log.dim(`No prompts library at ${filePath}`);
    return { sections: {} };
  }
  try {
    const library = librarySchema.parse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
    log.info(`📚 Loaded prompts library with ${Object.keys(library.sections).length} sections`);
    return library;
  } catch (error) {
    log.error(`❌ Invalid prompts library ${filePath}: ${errorMessage(error)}`);
    return { sections: {} };
  }
}

function countHits(keywords: string[], text: string): number {
  return keywords.filter((kw) => text.includes(kw.toLowerCase())).length;
}

/**
 * Best template for a question. A prompt scores its section's keyword hits
 * plus twice its own; only sections with at least one hit are considered and
 * the best score must reach 2.
 */
export function findMatchingTemplate(library: PromptsLibrary, question: string): TemplateMatch | undefined {
  const text = question.toLowerCase();
  let best: TemplateMatch | undefined;

  for (const [section, data] of Object.entries(library.sections)) {
    const sectionScore = countHits(data.keywords, text);
    if (sectionScore === 0) continue;

    for (const prompt of Object.values(data.prompts)) {
      const score = sectionScore + 2 * countHits(prompt.keywords, text);
      if (!best || score > best.score) {
        best = { section, name: prompt.name, template: prompt.template, score };
      }
    }
  }

  return best && best.score >= MIN_TEMPLATE_SCORE ? best : undefined;
}

/** Fill a template's {question} slot, or append the question when it has none */
export function applyTemplate(template: string, question: string): string {
  return template.includes("{question}")
    ? template.split("{question}").join(question)
    : `${template}\n\n${question}`;
}

export class PromptEnhancer {
  private readonly library: PromptsLibrary;

  constructor(
    private readonly generator: TextGenerator,
    library?: PromptsLibrary,
    private readonly model: string = CONFIG.geminiModelFlash
  ) {
    this.library = library ?? loadPromptsLibrary();
  }

  async enhance(question: string, storeNames: string[] = []): Promise<string> {
    if (!question.trim()) return "";

    const match = findMatchingTemplate(this.library, question);
    if (match) {
      log.info(`📚 Using template "${match.name}" from ${match.section} (score ${match.score})`);
      return applyTemplate(match.template, question);
    }

    const context = storeNames.length > 0 ? storeNames.join(", ") : "General knowledge";
    const prompt = `You are an expert prompt engineer for retrieval-augmented answering.
Rewrite the user's query so the answer is as complete and accurate as possible.

Target context: ${context}

1. Make the query specific and detailed
2. Add context the user implies
3. Use words likely to appear in the source documents
4. Ask for explanation, figures and references where it helps
5. Keep the language of the original query

Original query: "${question}"

Return ONLY the enhanced query text.`;

    try {
      const enhanced = stripQuotes(
        await this.generator.generate(prompt, {
          model: this.model,
          temperature: 0.3,
          maxOutputTokens: 800,
          thinkingLevel: "low",
        })
      );
      return enhanced || question;
    } catch (error) {
      log.warning(`⚠️ Prompt enhancement failed: ${errorMessage(error)}`);
      return question;
    }
  }
}
