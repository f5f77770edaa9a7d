import { describe, expect, it } from "vitest";
import { cleanStoreName, extractTargetStoreHint, inferActionFromText } from "../src/routing/intent.js";

describe("inferActionFromText", () => {
  it("recognises a request for the store list", () => {
    expect(inferActionFromText("Покажи список тендеров")).toEqual({ action: "list_stores" });
  });

  it("recognises store selection", () => {
    expect(inferActionFromText("Выбери тендер Дубровка")).toEqual({
      action: "select_store",
      storeName: "Дубровка",
    });
  });

  it("recognises a rename with a multi-word new name", () => {
    expect(inferActionFromText("Переименуй тендер Дубровка в Дубровка 2026")).toEqual({
      action: "rename_store",
      oldName: "Дубровка",
      newName: "Дубровка 2026",
    });
  });

  it("recognises an English rename", () => {
    expect(inferActionFromText("rename store Alpha to Beta")).toEqual({
      action: "rename_store",
      oldName: "Alpha",
      newName: "Beta",
    });
  });

  it("recognises deletion", () => {
    expect(inferActionFromText("Удалить тендер Тест")).toEqual({ action: "delete_store", storeName: "Тест" });
  });

  it("picks the export format from the sentence", () => {
    expect(inferActionFromText("Сделай экспорт в PDF")).toEqual({ action: "export", format: "pdf" });
    expect(inferActionFromText("export as docx")).toEqual({ action: "export", format: "docx" });
    expect(inferActionFromText("Экспорт")).toEqual({ action: "export" });
  });

  it("recognises status and memory clearing", () => {
    expect(inferActionFromText("Какой статус?")).toEqual({ action: "status" });
    expect(inferActionFromText("Очисти историю")).toEqual({ action: "clear_memory" });
  });

  it("returns null for an ordinary question", () => {
    expect(inferActionFromText("Когда подача заявок?")).toBeNull();
    expect(inferActionFromText("   ")).toBeNull();
  });
});

describe("extractTargetStoreHint", () => {
  it("cuts the question off the store name", () => {
    expect(extractTargetStoreHint("В тендере Дубровка какие сроки?")).toBe("Дубровка");
  });

  it("reads English hints", () => {
    expect(extractTargetStoreHint("What is due in the store Alpha, please")).toBe("Alpha");
  });

  it("returns undefined without a hint", () => {
    expect(extractTargetStoreHint("Какие сроки?")).toBeUndefined();
  });
});

describe("cleanStoreName", () => {
  it("drops quotes and trailing punctuation", () => {
    expect(cleanStoreName(" «Дубровка»! ")).toBe("Дубровка");
    expect(cleanStoreName('"Alpha",')).toBe("Alpha");
  });
});
