/**
 * Bot actions a free-text message can map to.
 */

import { z } from "zod";

export const EXPORT_FORMATS = ["pdf", "docx"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type BotAction =
  | { action: "list_stores" }
  | { action: "status" }
  | { action: "help" }
  | { action: "clear_memory" }
  | { action: "sync_now" }
  | { action: "export"; format?: ExportFormat }
  | { action: "select_store"; storeName: string }
  | { action: "delete_store"; storeName: string }
  | { action: "rename_store"; oldName: string; newName: string }
  | { action: "add_store"; name: string; description: string }
  /** hours === 0 turns automatic sync off */
  | { action: "set_sync"; hours: number }
  | { action: "upload_url"; storeName?: string; urls: string[] }
  | { action: "upload_file"; storeName?: string };

export type ActionName = BotAction["action"];

export const ACTION_NAMES = [
  "list_stores",
  "status",
  "help",
  "clear_memory",
  "sync_now",
  "export",
  "select_store",
  "delete_store",
  "rename_store",
  "add_store",
  "set_sync",
  "upload_url",
  "upload_file",
] as const;

/** Actions that change stores or settings and need the admin */
export const ADMIN_ACTIONS: ReadonlySet<ActionName> = new Set<ActionName>([
  "add_store",
  "delete_store",
  "rename_store",
  "set_sync",
  "upload_url",
  "upload_file",
]);

const name = z.string().trim().min(1);

const actionSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("list_stores") }),
  z.object({ action: z.literal("status") }),
  z.object({ action: z.literal("help") }),
  z.object({ action: z.literal("clear_memory") }),
  z.object({ action: z.literal("sync_now") }),
  z.object({
    action: z.literal("export"),
    format: z
      .string()
      .transform((f) => f.toLowerCase())
      .pipe(z.enum(EXPORT_FORMATS))
      .optional()
      .catch(undefined),
  }),
  z.object({ action: z.literal("select_store"), storeName: name }),
  z.object({ action: z.literal("delete_store"), storeName: name }),
  z.object({ action: z.literal("rename_store"), oldName: name, newName: name }),
  z.object({ action: z.literal("add_store"), name, description: z.string().default("") }),
  z.object({ action: z.literal("set_sync"), hours: z.coerce.number().int().min(0).max(168) }),
  z.object({ action: z.literal("upload_url"), storeName: name.optional(), urls: z.array(z.string()).default([]) }),
  z.object({ action: z.literal("upload_file"), storeName: name.optional() }),
]);

/**
 * Turn an action name and loosely-typed arguments (as produced by the
 * language model) into a BotAction, or null when they do not fit.
 * Snake-case argument names are accepted alongside camelCase.
 */
export function toBotAction(action: string | null | undefined, args: Record<string, unknown> = {}): BotAction | null {
  if (!action || action === "none") return null;

  const normalized: Record<string, unknown> = { action };
  for (const [key, value] of Object.entries(args)) {
    normalized[key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase())] = value;
  }
  if (normalized.storeName === undefined && typeof normalized.store === "string") {
    normalized.storeName = normalized.store;
  }

  const parsed = actionSchema.safeParse(normalized);
  return parsed.success ? parsed.data : null;
}
