/**
 * Heuristic intent matching
 *
 * Recognises command-like requests written as plain Russian or English
 * sentences ("покажи список тендеров", "rename store A to B") without a model
 * call. JavaScript's \b only knows ASCII word characters, so patterns are
 * compiled with a Unicode-aware boundary in its place.
 */

import type { BotAction } from "./actions.js";

const WORD = String.raw`[\p{L}\p{N}_]`;
const BOUNDARY = `(?:(?<!${WORD})(?=${WORD})|(?<=${WORD})(?!${WORD}))`;

function pattern(source: string): RegExp {
  return new RegExp(source.replace(/\\b/g, BOUNDARY), "iu");
}

const STORE_WORD = String.raw`(?:тендер|store|баз[ау])?`;

const LIST_STORES = pattern(
  String.raw`\b(список|перечисли|покажи|какие|какие есть)\b.*\b(тендер|тендеры|тендеров|тендерах|store|stores|баз|проект)\b`
);
const STATUS = pattern(String.raw`\b(статус|провер(ь|ка)|состояние)\b`);
const CLEAR_MEMORY = pattern(String.raw`\b(очист(и|ить)|сброс(ь|ить))\b.*\b(истор|памят|контекст)`);
const EXPORT = pattern(String.raw`\b(экспорт|выгруз|сохрани|export|сделай файл|сделай pdf|сделай docx)`);
const PDF = pattern(String.raw`\b(pdf|пдф)\b`);
const DOCX = pattern(String.raw`\b(docx|докх|док)\b`);
const SELECT_STORE = pattern(
  String.raw`\b(выбери|выбрать|используй|переключи(?:сь)?|работай с|сделай активным|установи)\b\s*${STORE_WORD}\s*(.+)`
);
const RENAME_STORE = pattern(
  String.raw`\b(переименуй|переименовать|rename)\b\s*${STORE_WORD}\s*(.+?)\s+(?:в|на|to)\s+(.+)`
);
const DELETE_STORE = pattern(String.raw`\b(удали|удалить|delete|снеси)\b\s*${STORE_WORD}\s*(.+)`);

const STORE_HINTS = [
  pattern(String.raw`\bв\s+тендер[еа]?\s+([^\n,.!?]+)`),
  pattern(String.raw`\bпо\s+тендер[уе]?\s+([^\n,.!?]+)`),
  pattern(String.raw`\bдля\s+тендер[а]?\s+([^\n,.!?]+)`),
  pattern(String.raw`\bin\s+(?:the\s+)?(?:store|tender)\s+([^\n,.!?]+)`),
];
const QUESTION_TAIL = pattern(
  String.raw`\b(что|какие|какой|когда|сколько|нужно|есть|требования|сроки|цены|стоимость|what|when|which|how)\b.*$`
);

export function cleanStoreName(name: string): string {
  return name
    .trim()
    .replace(/[\s,.!?;:]+$/u, "")
    .replace(/^["'`«]+|["'`»]+$/g, "")
    .trim();
}

/**
 * Map a sentence to a bot action, or null when it reads like a question.
 */
export function inferActionFromText(text: string): BotAction | null {
  const original = text.replace(/\s+/g, " ").trim();
  if (!original) return null;

  if (LIST_STORES.test(original)) return { action: "list_stores" };
  if (STATUS.test(original)) return { action: "status" };
  if (CLEAR_MEMORY.test(original)) return { action: "clear_memory" };

  if (EXPORT.test(original)) {
    if (PDF.test(original)) return { action: "export", format: "pdf" };
    if (DOCX.test(original)) return { action: "export", format: "docx" };
    return { action: "export" };
  }

  const select = SELECT_STORE.exec(original);
  if (select) {
    const storeName = cleanStoreName(select[2]);
    if (storeName) return { action: "select_store", storeName };
  }

  const rename = RENAME_STORE.exec(original);
  if (rename) {
    const oldName = cleanStoreName(rename[2]);
    const newName = cleanStoreName(rename[3]);
    if (oldName && newName) return { action: "rename_store", oldName, newName };
  }

  const remove = DELETE_STORE.exec(original);
  if (remove) {
    const storeName = cleanStoreName(remove[2]);
    if (storeName) return { action: "delete_store", storeName };
  }

  return null;
}

/**
 * Store name mentioned inside a question ("в тендере X какие сроки?" gives "X").
 */
export function extractTargetStoreHint(text: string): string | undefined {
  for (const hint of STORE_HINTS) {
    const match = hint.exec(text);
    if (match) {
      const name = cleanStoreName(cleanStoreName(match[1]).replace(QUESTION_TAIL, ""));
      return name || undefined;
    }
  }
  return undefined;
}
