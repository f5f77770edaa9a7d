import fs from "fs";
import os from "os";
import path from "path";
import { PDFPage } from "pdf-lib";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ExportClient,
  boldRuns,
  cleanMarkdown,
  formatExportDate,
  generateFilename,
  parseBlocks,
  toWinAnsi,
  wrapText,
} from "../src/export/export-client.js";

const date = new Date(2024, 0, 5, 9, 7, 3);
const length = (s: string): number => s.length;

describe("text helpers", () => {
  it("removes markdown decoration", () => {
    expect(cleanMarkdown("**bold** and `code`\n\n```\nblock\n```")).toBe("bold and code");
    expect(cleanMarkdown("*italic* text")).toBe("italic text");
  });

  it("builds a timestamped file name", () => {
    expect(generateFilename("Test Export", ".pdf", date)).toBe("Test_Export_20240105_090703.pdf");
    expect(generateFilename("Отчёт: сроки!", "docx", date)).toBe("Отчёт_сроки_20240105_090703.docx");
  });

  it("formats the export date", () => {
    expect(formatExportDate(date)).toBe("05.01.2024 09:07");
  });

  it("splits content into headings and paragraphs", () => {
    expect(parseBlocks("# Title\n\nText line\nmore\n\n  \n\n### Deep")).toEqual([
      { kind: "heading", level: 1, text: "Title" },
      { kind: "paragraph", text: "Text line\nmore" },
      { kind: "heading", level: 3, text: "Deep" },
    ]);
  });

  it("maps text onto WinAnsi", () => {
    expect(toWinAnsi("Привет – “ok”\té")).toBe('?????? - "ok" é');
    expect(toWinAnsi("Deadlines:\n- May 1")).toBe("Deadlines:\n- May 1");
  });

  it("wraps words and splits long ones", () => {
    expect(wrapText("aa bb cc", 5, length)).toEqual(["aa bb", "cc"]);
    expect(wrapText("abcdefg", 3, length)).toEqual(["abc", "def", "g"]);
    expect(wrapText("a\n\nb", 10, length)).toEqual(["a", "", "b"]);
  });

  it("turns bold spans and line breaks into runs", () => {
    expect(boldRuns("a **b** c")).toHaveLength(3);
    expect(boldRuns("line one\nline two")).toHaveLength(2);
  });
});

describe("ExportClient", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "export-test-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const content = {
    content: "# Сроки\n\nПодача заявок до **5 мая**.\n\nОплата: 30 дней.",
    title: "Alpha",
    question: "Какие сроки?",
    storeName: "Alpha",
    date,
  };

  it("writes a PDF with the standard font when no font is configured", async () => {
    const exporter = new ExportClient(dir, undefined);
    const filePath = await exporter.exportToPdf(content);

    expect(filePath).toBe(path.join(dir, "Alpha_20240105_090703.pdf"));
    expect(fs.readFileSync(filePath).subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("keeps each line of a list on its own line", async () => {
    const drawText = vi.spyOn(PDFPage.prototype, "drawText");
    const exporter = new ExportClient(dir, path.join(dir, "missing.ttf"));
    await exporter.exportToPdf({ content: "Deadlines:\n- May 1\n- June 2", title: "Alpha", date });

    expect(drawText.mock.calls.map(([text]) => text)).toEqual([
      "Alpha",
      "Date: 05.01.2024 09:07",
      "Deadlines:",
      "- May 1",
      "- June 2",
      "Generated by Notebook Router Bot",
    ]);
  });

  it("falls back to the standard font when the configured one is missing", async () => {
    const exporter = new ExportClient(dir, path.join(dir, "missing.ttf"));
    const filePath = await exporter.export("pdf", { content: "Short answer.", date });
    expect(path.basename(filePath)).toBe("Export_20240105_090703.pdf");
  });

  it("writes a DOCX archive", async () => {
    const exporter = new ExportClient(dir, undefined);
    const filePath = await exporter.export("docx", content);

    expect(path.basename(filePath)).toBe("Alpha_20240105_090703.docx");
    expect(fs.readFileSync(filePath).subarray(0, 2).toString("latin1")).toBe("PK");
  });

  it("removes files older than the retention period", () => {
    const exporter = new ExportClient(dir, undefined);
    const old = path.join(dir, "old.pdf");
    const fresh = path.join(dir, "fresh.pdf");
    fs.writeFileSync(old, "x");
    fs.writeFileSync(fresh, "x");
    const twoDaysAgo = new Date(Date.now() - 48 * 3600 * 1000);
    fs.utimesSync(old, twoDaysAgo, twoDaysAgo);

    expect(exporter.cleanupOldFiles(24)).toBe(1);
    expect(fs.readdirSync(dir)).toEqual(["fresh.pdf"]);
  });
});
