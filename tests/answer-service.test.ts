import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { AnswerService, type NotebookBackend, type QuestionBackend } from "../src/bot/answer-service.js";
import { StoreRegistry } from "../src/stores/store-registry.js";
import { UserStateStore } from "../src/session/user-state.js";
import { ConversationMemory, GLOBAL_SCOPE } from "../src/session/memory.js";
import { EventEmitter } from "../src/events/event-emitter.js";
import { QueryProcessor, fallbackQuery, type ProcessedQuery } from "../src/routing/query-processor.js";
import { StoreRouter } from "../src/routing/router.js";
import { PromptEnhancer } from "../src/routing/prompt-enhancer.js";
import { BackendError, NotFoundError, TimeoutError } from "../src/errors.js";
import type { AskOptions, GeminiAnswer, GenerateOptions } from "../src/gemini/types.js";
import type { Store } from "../src/stores/types.js";

const USER = 1;
const NOTEBOOK_URL = "https://notebooklm.google.com/notebook/0123456789abcdef0123456789abcdef";

function fileStore(name: string): Store {
  return {
    id: `fileSearchStores/${name.toLowerCase()}`,
    name,
    description: "",
    backend: "file_search",
    documents: [],
    createdAt: "2024-01-01T00:00:00.000Z",
  };
}

function query(overrides: Partial<ProcessedQuery> = {}): ProcessedQuery {
  return { ...fallbackQuery("Какие сроки?"), confidence: 0.8, optimizedPrompt: "Какие сроки подачи?", ...overrides };
}

type AskFn = (storeIds: string[], question: string, options?: AskOptions) => Promise<GeminiAnswer>;
type GenerateFn = (prompt: string, options?: GenerateOptions) => Promise<string>;

function generator(reply: string): Mock<GenerateFn> {
  return vi.fn(async (_prompt: string, _options?: GenerateOptions) => reply);
}

describe("AnswerService", () => {
  let dir: string;
  let registry: StoreRegistry;
  let userState: UserStateStore;
  let memory: ConversationMemory;
  let gemini: {
    ask: Mock<AskFn>;
    askWithThinking: Mock<AskFn>;
    searchWeb: Mock<(question: string, options?: GenerateOptions) => Promise<GeminiAnswer>>;
    generate: Mock<GenerateFn>;
  };
  let processorGenerate: Mock<GenerateFn>;
  let routerGenerate: Mock<GenerateFn>;
  let enhancerGenerate: Mock<GenerateFn>;
  let emitter: EventEmitter;

  function makeAsk(prefix: string): Mock<AskFn> {
    return vi.fn(
      async (storeIds: string[], _question: string, options?: AskOptions): Promise<GeminiAnswer> => ({
        text: `${prefix} ${storeIds.join("+")}`,
        sources: ["terms.pdf"],
        model: options?.model ?? "default",
      })
    );
  }

  function service(notebooks?: NotebookBackend, queryTimeoutMs = 5000): AnswerService {
    const backend: QuestionBackend = gemini;
    return new AnswerService(
      {
        registry,
        userState,
        memory,
        gemini: backend,
        notebooks,
        processor: new QueryProcessor({ generate: processorGenerate }, "pro"),
        router: new StoreRouter({ generate: routerGenerate }, "flash"),
        enhancer: new PromptEnhancer({ generate: enhancerGenerate }, { sections: {} }, "flash"),
        events: emitter,
      },
      { queryTimeoutMs, actionConfidenceThreshold: 0.6, model: "flash", proModel: "pro" }
    );
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "answer-test-"));
    registry = new StoreRegistry(path.join(dir, "stores.json"));
    userState = new UserStateStore(path.join(dir, "state.json"));
    memory = new ConversationMemory(path.join(dir, "memory.json"), 10);
    gemini = {
      ask: makeAsk("answer from"),
      askWithThinking: makeAsk("thought about"),
      searchWeb: vi.fn(
        async (_question: string, _options?: GenerateOptions): Promise<GeminiAnswer> => ({
          text: "web answer",
          sources: ["https://news.example.com"],
          model: "flash",
        })
      ),
      generate: generator("Comparison table"),
    };
    processorGenerate = generator('{"query_type": "single", "confidence": 0.2}');
    routerGenerate = generator('{"selected": ["Beta"], "reasoning": "Bridges"}');
    enhancerGenerate = generator("Enhanced question");
    emitter = new EventEmitter();
    registry.add(fileStore("Alpha"));
    registry.add(fileStore("Beta"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("analyse", () => {
    it("recognises commands without calling the model", async () => {
      expect(await service().analyse(USER, "Покажи список тендеров")).toEqual({
        kind: "action",
        action: { action: "list_stores" },
      });
      expect(processorGenerate).not.toHaveBeenCalled();
    });

    it("takes the processor's action only when it is confident", async () => {
      processorGenerate.mockResolvedValueOnce(
        '{"action": "select_store", "action_args": {"store_name": "Beta"}, "confidence": 0.9}'
      );
      expect(await service().analyse(USER, "давай работать по бете")).toEqual({
        kind: "action",
        action: { action: "select_store", storeName: "Beta" },
      });

      processorGenerate.mockResolvedValueOnce(
        '{"action": "select_store", "action_args": {"store_name": "Beta"}, "confidence": 0.3}'
      );
      const unsure = await service().analyse(USER, "бета?");
      expect(unsure.kind).toBe("question");
    });
  });

  describe("answer", () => {
    it("answers from the selected store and remembers the exchange", async () => {
      userState.setSelectedStore(USER, "fileSearchStores/beta", "Beta");
      const progress = vi.fn(async (_message: string) => undefined);
      const events: string[] = [];
      emitter.on("*", (event) => {
        events.push(event.type);
      });

      const result = await service().answer(USER, "Какие сроки?", query(), progress);

      expect(result).toEqual({
        text: "📁 Beta\n\nanswer from fileSearchStores/beta",
        answer: "answer from fileSearchStores/beta",
        queryType: "single",
        storeName: "Beta",
        storeIds: ["fileSearchStores/beta"],
      });
      expect(gemini.ask).toHaveBeenCalledWith(["fileSearchStores/beta"], "Какие сроки подачи?", { model: "flash" });
      expect(progress).toHaveBeenCalledWith("Selected: Beta\nReason: Active store\n\nGetting answer...");
      expect(memory.getHistory(USER, "fileSearchStores/beta").map((m) => m.content)).toEqual([
        "Какие сроки?",
        "answer from fileSearchStores/beta",
      ]);
      expect(memory.getLastAnswer(USER)).toMatchObject({ question: "Какие сроки?", storeName: "Beta" });
      expect(events).toEqual(["question_answered"]);
    });

    it("prefers a store named in the question over the selection", async () => {
      userState.setSelectedStore(USER, "fileSearchStores/beta", "Beta");
      const result = await service().answer(USER, "В тендере Alpha какие сроки?", query());
      expect(result.storeName).toBe("Alpha");
    });

    it("routes when nothing is selected and enhances a low-confidence question", async () => {
      const result = await service().answer(USER, "Кто строит мост?", query({ confidence: 0 }));

      expect(result.storeName).toBe("Beta");
      expect(gemini.ask).toHaveBeenCalledWith(["fileSearchStores/beta"], "Enhanced question", { model: "flash" });
    });

    it("includes earlier conversation and uses the Pro model for complex questions", async () => {
      userState.setSelectedStore(USER, "fileSearchStores/alpha", "Alpha");
      memory.addExchange(USER, "Что строим?", "Дорогу.", "fileSearchStores/alpha");

      await service().answer(USER, "А сроки?", query({ complexity: "complex", optimizedPrompt: "Сроки?" }));

      expect(gemini.ask).toHaveBeenCalledWith(
        ["fileSearchStores/alpha"],
        "Previous conversation:\nUser: Что строим?\nAssistant: Дорогу.\n\nCurrent question:\nСроки?",
        { model: "pro" }
      );
    });

    it("lists sources when asked for them", async () => {
      userState.setSelectedStore(USER, "fileSearchStores/alpha", "Alpha");
      const result = await service().answer(USER, "Источники?", query({ queryType: "sources" }));

      expect(result.text).toBe("📁 Alpha\n\nanswer from fileSearchStores/alpha\n\n📚 Sources:\n- terms.pdf");
      expect(result.queryType).toBe("sources");
    });

    it("searches the web", async () => {
      const result = await service().answer(USER, "Цены на асфальт?", query({ queryType: "web_search" }));

      expect(result.text).toBe("🌐 Web search\n\nweb answer\n\n📚 Sources:\n- https://news.example.com");
      expect(result.storeIds).toEqual([]);
      expect(memory.getHistory(USER, GLOBAL_SCOPE)).toHaveLength(2);
    });

    it("searches every File Search store at once", async () => {
      const result = await service().answer(USER, "Где есть асфальт?", query({ queryType: "multistore" }));

      expect(result.text).toBe(
        "📁 All stores (2)\n\nanswer from fileSearchStores/alpha+fileSearchStores/beta\n\n📚 Sources:\n- terms.pdf"
      );
      expect(result.queryType).toBe("multistore");
    });

    it("compares two stores", async () => {
      processorGenerate.mockResolvedValue("Сроки по тендеру");
      const result = await service().answer(
        USER,
        "Сравни сроки",
        query({ queryType: "compare", targetStores: ["Alpha", "Beta"], compareTopic: "сроки" })
      );

      expect(result.text).toBe("⚖️ Alpha vs Beta\n\nComparison table");
      expect(result.storeIds).toEqual(["fileSearchStores/alpha", "fileSearchStores/beta"]);
      expect(gemini.ask).toHaveBeenCalledWith(["fileSearchStores/alpha"], "Сроки по тендеру", { model: "flash" });
      const [prompt, options] = gemini.generate.mock.calls[0];
      expect(prompt).toContain("### Alpha\nanswer from fileSearchStores/alpha");
      expect(prompt).toContain("### Beta\nanswer from fileSearchStores/beta");
      expect(options).toEqual({ model: "pro", temperature: 0.2 });
    });

    it("falls back to a single store when a comparison names one store", async () => {
      userState.setSelectedStore(USER, "fileSearchStores/alpha", "Alpha");
      const result = await service().answer(USER, "Сравни", query({ queryType: "compare", targetStores: ["Alpha"] }));
      expect(result.queryType).toBe("single");
    });

    it("asks NotebookLM for notebook stores", async () => {
      registry.add({ ...fileStore("Notebook"), id: "notebooklm:nb", backend: "notebooklm", notebookUrl: NOTEBOOK_URL });
      userState.setSelectedStore(USER, "notebooklm:nb", "Notebook");
      const ask = vi.fn(async (_url: string, _question: string) => "Notebook answer");

      const result = await service({ ask }).answer(USER, "Что там?", query());

      expect(ask).toHaveBeenCalledWith(NOTEBOOK_URL, "Какие сроки подачи?");
      expect(result.text).toBe("📁 Notebook\n\nNotebook answer");
      await expect(service().answer(USER, "Что там?", query())).rejects.toThrow(BackendError);
    });

    it("needs at least one store", async () => {
      registry.remove("fileSearchStores/alpha");
      registry.remove("fileSearchStores/beta");
      await expect(service().answer(USER, "q", query())).rejects.toThrow(NotFoundError);
    });

    it("gives up after the query timeout", async () => {
      userState.setSelectedStore(USER, "fileSearchStores/alpha", "Alpha");
      gemini.ask.mockImplementationOnce(() => new Promise<GeminiAnswer>(() => undefined));

      await expect(service(undefined, 20).answer(USER, "q", query())).rejects.toThrow(TimeoutError);
      expect(memory.getLastAnswer(USER)).toBeUndefined();
    });
  });

  describe("think", () => {
    it("uses thinking mode with the Pro model", async () => {
      userState.setSelectedStore(USER, "fileSearchStores/alpha", "Alpha");
      const result = await service().think(USER, "Риски?");

      expect(gemini.askWithThinking).toHaveBeenCalledWith(["fileSearchStores/alpha"], "Риски?", { model: "pro" });
      expect(result.text).toBe("📁 Alpha\n\nthought about fileSearchStores/alpha");
      expect(memory.getLastAnswer(USER)?.answer).toBe("thought about fileSearchStores/alpha");
    });
  });
});
