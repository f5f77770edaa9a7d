/**
 * Export Client
 *
 * Turns a bot answer into a PDF (pdf-lib) or DOCX (docx) file in the export
 * directory. Both layouts carry the title, date, source store, the question,
 * the answer split into paragraphs and headings, and a footer line.
 */

import fs from "fs";
import path from "path";
import { PDFDocument, PageSizes, StandardFonts, rgb, type PDFFont, type PDFPage, type RGB } from "pdf-lib";
import * as fontkitModule from "@pdf-lib/fontkit";
import { AlignmentType, Document, HeadingLevel, Packer, Paragraph, TextRun } from "docx";
import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import { BackendError, errorMessage } from "../errors.js";
import { mkdirSecure } from "../utils/file-permissions.js";
import type { ExportFormat } from "../routing/actions.js";

export interface ExportContent {
  /** Answer text, may contain light markdown */
  content: string;
  title?: string;
  question?: string;
  storeName?: string;
  /** Defaults to now */
  date?: Date;
}

export type ExportBlock =
  | { kind: "heading"; level: number; text: string }
  | { kind: "paragraph"; text: string };

export const EXPORT_FOOTER = "Generated by Notebook Router Bot";

const CM = 28.35;
const MARGIN = 2 * CM;

const FONT_SIZE = { title: 16, meta: 10, body: 11 } as const;
const LINE_HEIGHT = 16;
const COLORS: Record<"title" | "meta" | "body", RGB> = {
  title: rgb(0.1, 0.1, 0.18),
  meta: rgb(0.4, 0.4, 0.4),
  body: rgb(0, 0, 0),
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** dd.mm.yyyy HH:MM */
export function formatExportDate(date: Date): string {
  return `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${date.getFullYear()} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function cleanMarkdown(text: string): string {
  return text
    .replace(/```[\s\S]*?```/g, "")
    .replace(/\*\*(.*?)\*\*/g, "$1")
    .replace(/\*(.*?)\*/g, "$1")
    .replace(/`(.*?)`/g, "$1")
    .trim();
}

/**
 * File name from a title: characters other than letters, digits, `_`, `-`
 * and whitespace are dropped, the rest is cut to 30 characters, whitespace
 * runs become `_`, and a local `_YYYYMMDD_HHMMSS` stamp is appended.
 */
export function generateFilename(title: string, extension: string, date: Date = new Date()): string {
  const cleanTitle = title
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .slice(0, 30)
    .replace(/\s+/g, "_");
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  const ext = extension.startsWith(".") || extension === "" ? extension : `.${extension}`;
  return `${cleanTitle}_${stamp}${ext}`;
}

/**
 * Split answer text into blocks on blank lines. A block starting with `#`
 * is a heading whose level is the number of leading hashes.
 */
export function parseBlocks(text: string): ExportBlock[] {
  const blocks: ExportBlock[] = [];
  for (const raw of text.split(/\n\s*\n/)) {
    const para = raw.trim();
    if (!para) continue;
    const heading = /^(#+)\s*/.exec(para);
    if (heading) {
      blocks.push({ kind: "heading", level: heading[1].length, text: para.slice(heading[0].length) });
    } else {
      blocks.push({ kind: "paragraph", text: para });
    }
  }
  return blocks;
}

/**
 * Map text onto the WinAnsi range the standard PDF fonts can encode. Line
 * breaks are kept for the line wrapper.
 */
export function toWinAnsi(text: string): string {
  let out = "";
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if ((code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff) || ch === "\n") {
      out += ch;
    } else if (ch === "–" || ch === "—") {
      out += "-";
    } else if (ch === "“" || ch === "”") {
      out += '"';
    } else if (ch === "\t") {
      out += " ";
    } else {
      out += "?";
    }
  }
  return out;
}

/** Greedy word wrap; words wider than the line are split by character */
export function wrapText(text: string, maxWidth: number, measure: (s: string) => number): string[] {
  const lines: string[] = [];
  for (const sourceLine of text.split("\n")) {
    let current = "";
    for (const word of sourceLine.split(/\s+/).filter(Boolean)) {
      const candidate = current ? `${current} ${word}` : word;
      if (measure(candidate) <= maxWidth) {
        current = candidate;
        continue;
      }
      if (current) lines.push(current);
      current = "";
      let piece = "";
      for (const ch of word) {
        if (measure(piece + ch) > maxWidth && piece) {
          lines.push(piece);
          piece = "";
        }
        piece += ch;
      }
      current = piece;
    }
    lines.push(current);
  }
  return lines;
}

class PdfWriter {
  private page: PDFPage;
  private y: number;

  constructor(
    private readonly doc: PDFDocument,
    private readonly regular: PDFFont,
    private readonly bold: PDFFont,
    private readonly encode: (s: string) => string
  ) {
    this.page = doc.addPage(PageSizes.A4);
    this.y = this.page.getHeight() - MARGIN;
  }

  private get width(): number {
    return this.page.getWidth() - 2 * MARGIN;
  }

  space(points: number): void {
    this.y -= points;
  }

  write(text: string, size: number, color: RGB, bold: boolean = false): void {
    const font = bold ? this.bold : this.regular;
    const lines = wrapText(this.encode(text), this.width, (s) => font.widthOfTextAtSize(s, size));
    const lineHeight = Math.max(LINE_HEIGHT, size * 1.4);
    for (const line of lines) {
      if (this.y - lineHeight < MARGIN) {
        this.page = this.doc.addPage(PageSizes.A4);
        this.y = this.page.getHeight() - MARGIN;
      }
      this.y -= lineHeight;
      if (line) {
        this.page.drawText(line, { x: MARGIN, y: this.y, size, font, color });
      }
    }
  }
}

export class ExportClient {
  constructor(
    private readonly exportDir: string = CONFIG.exportDir,
    private readonly fontPath: string | undefined = CONFIG.exportFontPath
  ) {
    mkdirSecure(this.exportDir);
  }

  get directory(): string {
    return this.exportDir;
  }

  async export(format: ExportFormat, input: ExportContent): Promise<string> {
    return format === "docx" ? this.exportToDocx(input) : this.exportToPdf(input);
  }

  async exportToPdf(input: ExportContent): Promise<string> {
    const title = input.title ?? "Export";
    const date = input.date ?? new Date();
    const filePath = path.join(this.exportDir, generateFilename(title, ".pdf", date));

    try {
      const doc = await PDFDocument.create();
      doc.setTitle(title);

      let regular: PDFFont;
      let bold: PDFFont;
      let encode: (s: string) => string;
      if (this.fontPath && fs.existsSync(this.fontPath)) {
        doc.registerFontkit(fontkitModule.default);
        regular = await doc.embedFont(fs.readFileSync(this.fontPath), { subset: true });
        bold = regular;
        encode = (s) => s;
      } else {
        if (this.fontPath) {
          log.warning(`⚠️ Export font not found at ${this.fontPath}, using Helvetica`);
        }
        regular = await doc.embedFont(StandardFonts.Helvetica);
        bold = await doc.embedFont(StandardFonts.HelveticaBold);
        encode = toWinAnsi;
      }

      const writer = new PdfWriter(doc, regular, bold, encode);
      writer.write(title, FONT_SIZE.title, COLORS.title, true);
      writer.space(0.3 * CM);
      writer.write(`Date: ${formatExportDate(date)}`, FONT_SIZE.meta, COLORS.meta);
      if (input.storeName) {
        writer.write(`Source: ${input.storeName}`, FONT_SIZE.meta, COLORS.meta);
      }
      writer.space(0.5 * CM);

      if (input.question) {
        writer.write(`Question: ${input.question}`, FONT_SIZE.body, COLORS.body, true);
        writer.space(0.3 * CM);
      }

      for (const block of parseBlocks(cleanMarkdown(input.content))) {
        writer.write(block.text, FONT_SIZE.body, COLORS.body, block.kind === "heading");
        writer.space(0.2 * CM);
      }

      writer.space(1 * CM);
      writer.write(EXPORT_FOOTER, FONT_SIZE.meta, COLORS.meta);

      fs.writeFileSync(filePath, await doc.save());
      log.success(`Exported PDF: ${filePath}`);
      return filePath;
    } catch (error) {
      log.error(`❌ PDF export failed: ${errorMessage(error)}`);
      throw new BackendError("export", `PDF export failed: ${errorMessage(error)}`);
    }
  }

  async exportToDocx(input: ExportContent): Promise<string> {
    const title = input.title ?? "Export";
    const date = input.date ?? new Date();
    const filePath = path.join(this.exportDir, generateFilename(title, ".docx", date));

    const meta = [new TextRun({ text: `Date: ${formatExportDate(date)}`, italics: true })];
    if (input.storeName) {
      meta.push(new TextRun({ text: `Source: ${input.storeName}`, italics: true, break: 1 }));
    }

    const children: Paragraph[] = [
      new Paragraph({ text: title, heading: HeadingLevel.TITLE, alignment: AlignmentType.CENTER }),
      new Paragraph({ children: meta }),
      new Paragraph({}),
    ];

    if (input.question) {
      children.push(
        new Paragraph({ children: [new TextRun({ text: "Question: ", bold: true }), new TextRun(input.question)] }),
        new Paragraph({})
      );
    }

    // Bold markers survive here so they can become bold runs
    const content = input.content.replace(/```[\s\S]*?```/g, "").replace(/`(.*?)`/g, "$1");
    for (const block of parseBlocks(content)) {
      if (block.kind === "heading") {
        children.push(new Paragraph({ text: cleanMarkdown(block.text), heading: docxHeading(block.level) }));
      } else {
        children.push(new Paragraph({ children: boldRuns(block.text) }));
      }
    }

    children.push(
      new Paragraph({}),
      new Paragraph({
        children: [new TextRun({ text: EXPORT_FOOTER, italics: true })],
        alignment: AlignmentType.CENTER,
      })
    );

    try {
      const doc = new Document({ title, sections: [{ children }] });
      fs.writeFileSync(filePath, await Packer.toBuffer(doc));
      log.success(`Exported DOCX: ${filePath}`);
      return filePath;
    } catch (error) {
      log.error(`❌ DOCX export failed: ${errorMessage(error)}`);
      throw new BackendError("export", `DOCX export failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Delete export files older than `hours`. Returns how many were removed.
   */
  cleanupOldFiles(hours: number = CONFIG.exportRetentionHours, now: Date = new Date()): number {
    if (!fs.existsSync(this.exportDir)) return 0;
    const cutoff = now.getTime() - hours * 3600 * 1000;
    let cleaned = 0;

    for (const entry of fs.readdirSync(this.exportDir, { withFileTypes: true })) {
      if (!entry.isFile()) continue;
      const file = path.join(this.exportDir, entry.name);
      if (fs.statSync(file).mtimeMs < cutoff) {
        fs.unlinkSync(file);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      log.info(`🧹 Cleaned up ${cleaned} old export files`);
    }
    return cleaned;
  }
}

function docxHeading(level: number): (typeof HeadingLevel)[keyof typeof HeadingLevel] {
  if (level <= 1) return HeadingLevel.HEADING_1;
  if (level === 2) return HeadingLevel.HEADING_2;
  return HeadingLevel.HEADING_3;
}

/** `**bold**` spans become bold runs; single newlines become line breaks */
export function boldRuns(text: string): TextRun[] {
  const runs: TextRun[] = [];
  for (const part of text.split(/(\*\*.*?\*\*)/)) {
    if (!part) continue;
    const bold = part.length >= 4 && part.startsWith("**") && part.endsWith("**");
    const body = (bold ? part.slice(2, -2) : part).replace(/\*(.*?)\*/g, "$1");
    body.split("\n").forEach((line, i) => {
      runs.push(new TextRun({ text: line, bold, break: i > 0 ? 1 : undefined }));
    });
  }
  return runs;
}
