import { describe, expect, it } from "vitest";
import { formatError, formatSources, formatStatus, formatStoreList, helpText } from "../src/bot/formatting.js";
import type { Store } from "../src/stores/types.js";

function store(overrides: Partial<Store>): Store {
  return {
    id: "fileSearchStores/alpha",
    name: "Alpha",
    description: "",
    backend: "file_search",
    documents: [],
    createdAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

describe("formatStoreList", () => {
  it("explains how to add the first store", () => {
    expect(formatStoreList([])).toBe(
      "No stores yet.\nThe admin can create one with /add or register a notebook with /addnotebook."
    );
  });

  it("lists stores with descriptions, document counts and the selection", () => {
    const stores = [
      store({
        description: "Resurfacing of the ring road between the northern and the southern junction",
        documents: [{ name: "terms.pdf", uploadedAt: "2024-01-02T00:00:00.000Z" }],
      }),
      store({ id: "notebooklm:nb", name: "Slides", backend: "notebooklm" }),
    ];

    expect(formatStoreList(stores, "notebooklm:nb")).toBe(
      [
        "Knowledge stores (2):",
        "",
        "1. Alpha",
        "   Resurfacing of the ring road between the northern ...",
        "   Documents: 1",
        "",
        "2. Slides [NotebookLM] ✅",
      ].join("\n")
    );
  });
});

describe("formatStatus", () => {
  it("renders every component", () => {
    expect(
      formatStatus({
        geminiAvailable: false,
        notebooklmReady: true,
        driveConfigured: false,
        storeCount: 3,
        notebookCount: 1,
        model: "flash",
        thinkingLevel: "low",
        memory: { users: 2, stores: 4, messages: 9 },
        autoSyncHours: 12,
      })
    ).toBe(
      [
        "Status:",
        "- Gemini API: Not configured",
        "- NotebookLM browser: open",
        "- Google Drive: public links only",
        "- Stores: 3 (notebooks: 1)",
        "- Model: flash",
        "- Thinking level: low",
        "- Memory: 2 users, 9 messages",
        "- Auto-sync: every 12h",
      ].join("\n")
    );
  });
});

describe("helpText", () => {
  it("shows admin commands to the admin only", () => {
    expect(helpText(false, 2, "flash")).not.toContain("/delete");
    const admin = helpText(true, 2, "flash");
    expect(admin.split("\n").slice(0, 4)).toEqual(["Notebook Router Bot (you are admin)", "", "Model: flash", "Stores: 2"]);
    expect(admin).toContain("\n/delete <name> - delete a store\n");
  });
});

describe("formatSources", () => {
  it("is empty without sources", () => {
    expect(formatSources([])).toBe("");
    expect(formatSources(["a.pdf", "b.pdf"])).toBe("\n\n📚 Sources:\n- a.pdf\n- b.pdf");
  });
});

describe("formatError", () => {
  it("caps long messages", () => {
    expect(formatError("boom")).toBe("Error: boom");
    expect(formatError("x".repeat(600))).toBe(`Error: ${"x".repeat(500)}`);
  });
});
