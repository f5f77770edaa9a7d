/**
 * Command argument parsing. Each parser takes the text after the command
 * and returns the typed arguments, or throws ValidationError with the usage
 * line for that command.
 */

import { ValidationError } from "../errors.js";
import { EXPORT_FORMATS, type ExportFormat } from "../routing/actions.js";
import { extractAllUrls, type DriveLink } from "../drive/drive-client.js";

export const MAX_AUTOSYNC_HOURS = 168;

export const USAGE = {
  select: "Usage: /select <store name>",
  think: "Usage: /think <question>\n\nUses deep thinking for complex reasoning.",
  export: "Usage: /export [pdf|docx]",
  add: "Usage: /add <name> | <description>\n\nExample:\n/add Tender Dubrovka | Roof repair tender documentation",
  addnotebook:
    "Usage: /addnotebook <notebook url> <name> | <description>\n\n" +
    "Example:\n/addnotebook https://notebooklm.google.com/notebook/<id> Tender Dubrovka | Roof repair",
  upload: "Usage: /upload <store name>\nThen send a file, or send the file with /upload <store name> as its caption.",
  uploadurl: "Usage: /uploadurl <store name> <Google Docs/Drive links>",
  delete: "Usage: /delete <store name>",
  rename: "Usage: /rename <old name> -> <new name>",
  autosync: `Usage: /autosync <hours 1-${MAX_AUTOSYNC_HOURS}|off>`,
} as const;

/**
 * Text after a leading `/command` or `/command@botname`, trimmed. Text that
 * does not start with a command is returned trimmed.
 */
export function commandArgs(text: string): string {
  return text.replace(/^\/[A-Za-z0-9_]+(?:@[A-Za-z0-9_]+)?/, "").trim();
}

export function requireArgs(args: string, usage: string): string {
  if (!args.trim()) {
    throw new ValidationError(usage);
  }
  return args.trim();
}

/** `<name> | <description>`; the description is optional */
export function parseNameAndDescription(args: string, usage: string = USAGE.add): { name: string; description: string } {
  const [rawName, ...rest] = requireArgs(args, usage).split("|");
  const name = rawName.trim();
  if (!name) {
    throw new ValidationError(usage);
  }
  return { name, description: rest.join("|").trim() };
}

export function parseAddNotebookArgs(args: string): { url: string; name: string; description: string } {
  const text = requireArgs(args, USAGE.addnotebook);
  const match = /^(\S+)\s+([\s\S]+)$/.exec(text);
  if (!match) {
    throw new ValidationError(USAGE.addnotebook);
  }
  return { url: match[1], ...parseNameAndDescription(match[2], USAGE.addnotebook) };
}

/** `<old> -> <new>`; `→` and `=>` work as the arrow too */
export function parseRenameArgs(args: string): { oldName: string; newName: string } {
  const parts = requireArgs(args, USAGE.rename).split(/\s*(?:->|→|=>)\s*/);
  if (parts.length !== 2 || !parts[0].trim() || !parts[1].trim()) {
    throw new ValidationError(USAGE.rename);
  }
  return { oldName: parts[0].trim(), newName: parts[1].trim() };
}

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/** Empty means PDF */
export function parseExportFormat(args: string): ExportFormat {
  const value = args.trim().toLowerCase();
  if (!value) return "pdf";
  if (isExportFormat(value)) return value;
  throw new ValidationError(USAGE.export);
}

/** Hours between automatic syncs; `off` or `0` is 0 */
export function parseAutosyncArgs(args: string): number {
  const value = requireArgs(args, USAGE.autosync).toLowerCase();
  if (value === "off" || value === "0") return 0;
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(USAGE.autosync);
  }
  const hours = Number(value);
  if (hours < 1 || hours > MAX_AUTOSYNC_HOURS) {
    throw new ValidationError(USAGE.autosync);
  }
  return hours;
}

/**
 * `<store name> <links...>`: the store name is the text before the first
 * link. It may be empty, in which case the caller uses the selected store.
 */
export function parseUploadUrlArgs(args: string): { storeName?: string; links: DriveLink[] } {
  const text = requireArgs(args, USAGE.uploadurl);
  const links = extractAllUrls(text);
  if (links.length === 0) {
    throw new ValidationError(`No Google Docs or Drive links found.\n\n${USAGE.uploadurl}`);
  }
  const firstUrl = text.search(/https?:\/\//);
  const storeName = text.slice(0, firstUrl).trim();
  return { storeName: storeName || undefined, links };
}
