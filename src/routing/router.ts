/**
 * Store Router
 *
 * Picks the stores most likely to answer a question when the user has not
 * named one. The model proposes store names, which are matched back to real
 * stores with the fuzzy name matcher.
 */

import { z } from "zod";
import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import { errorMessage } from "../errors.js";
import { bestNameMatch } from "../stores/name-matching.js";
import type { Store } from "../stores/types.js";
import type { TextGenerator } from "./query-processor.js";

export interface RouteResult {
  stores: Store[];
  reasoning: string;
}

const routeSchema = z.object({
  selected: z.union([z.array(z.string()), z.string().transform((s) => [s])]),
  reasoning: z.string().catch(""),
});

/**
 * Match model-proposed names to stores, keeping order and dropping repeats.
 */
export function matchStoreNames(names: string[], stores: Store[]): Store[] {
  const selected: Store[] = [];
  for (const name of names) {
    const match = bestNameMatch(name, stores, (s) => s.name);
    if (match && !selected.includes(match.item)) {
      selected.push(match.item);
    }
  }
  return selected;
}

export class StoreRouter {
  constructor(
    private readonly generator: TextGenerator,
    private readonly model: string = CONFIG.geminiModelFlash
  ) {}

  async route(question: string, stores: Store[], maxStores: number = 3): Promise<RouteResult> {
    if (stores.length === 0) {
      return { stores: [], reasoning: "No stores available." };
    }
    if (stores.length === 1) {
      return { stores: [stores[0]], reasoning: "Only one store available." };
    }

    const summary = stores
      .map((s) => `- ${s.name}: ${s.description || "No description"}`)
      .join("\n");

    const prompt = `You route questions to document stores.

AVAILABLE STORES:
${summary}

QUESTION: "${question}"

Select 1 to ${maxStores} stores most likely to contain the answer. Reply with JSON only:
{
  "selected": ["Store Name 1", "Store Name 2"],
  "reasoning": "one sentence on why"
}`;

    try {
      const text = await this.generator.generate(prompt, { model: this.model, temperature: 0.1, maxOutputTokens: 300 });
      const json = /\{[\s\S]*\}/.exec(text);
      if (!json) {
        throw new Error("No JSON in routing response");
      }
      const data = routeSchema.parse(JSON.parse(json[0]));
      const selected = matchStoreNames(data.selected, stores).slice(0, maxStores);

      if (selected.length === 0) {
        log.warning(`⚠️ Router picked unknown stores ${JSON.stringify(data.selected)}, using the first stores`);
        return { stores: stores.slice(0, maxStores), reasoning: "No matching store, searching the first stores." };
      }

      log.info(`🧭 Router matched: ${selected.map((s) => s.name).join(", ")}`);
      return { stores: selected, reasoning: data.reasoning };
    } catch (error) {
      log.warning(`⚠️ Routing failed: ${errorMessage(error)}`);
      return { stores: stores.slice(0, maxStores), reasoning: `Routing error: ${errorMessage(error)}` };
    }
  }
}
