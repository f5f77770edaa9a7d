/**
 * Configuration
 *
 * Environment variables (optionally from a .env file) are validated with zod
 * into the frozen CONFIG object. Secrets default to empty strings so modules
 * can be imported without a full environment; validateStartupConfig() is the
 * gate that refuses to start the bot when one is missing.
 */

import os from "os";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

dotenv.config();

export const THINKING_LEVELS = ["minimal", "low", "medium", "high"] as const;
export type ThinkingLevelName = (typeof THINKING_LEVELS)[number];

const DEFAULT_IMAGE_PROMPT =
  "Внимательно рассмотри изображение. Если это доска/документ с текстом - распознай и перечисли всё что написано. " +
  "Если это схема/диаграмма - опиши её структуру.";

const booleanFlag = z
  .string()
  .transform((value) => ["true", "1", "yes"].includes(value.trim().toLowerCase()));

/** Comma separated Telegram user ids; blanks and non-numbers are skipped */
const idList = z.string().transform((value) =>
  value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => /^-?\d+$/.test(part))
    .map((part) => Number(part))
);

const optionalId = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (value === "") return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be an integer id" });
      return z.NEVER;
    }
    return parsed;
  });

const envSchema = z.object({
  BOT_TOKEN: z.string().default(""),
  GEMINI_API_KEY: z.string().default(""),
  ADMIN_USER_ID: optionalId.default(""),
  NOTIFICATION_CHANNEL_ID: optionalId.default(""),
  ALLOWED_USERS: idList.default(""),

  DATA_DIR: z.string().default(path.join(process.cwd(), "data")),
  EXPORT_DIR: z.string().default(path.join(os.tmpdir(), "bot_exports")),
  EXPORT_FONT_PATH: z.string().default(""),
  EXPORT_RETENTION_HOURS: z.coerce.number().positive().default(24),
  PROMPTS_LIBRARY_FILE: z.string().default(path.join(process.cwd(), "data", "prompts_library.json")),

  MEMORY_MAX_MESSAGES: z.coerce.number().int().positive().default(5),
  MEMORY_CLEANUP_DAYS: z.coerce.number().int().positive().default(7),
  QUERY_TIMEOUT: z.coerce.number().positive().default(60),
  ACTION_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),

  GEMINI_MODEL_FLASH: z.string().default("gemini-3-flash-preview"),
  GEMINI_MODEL_PRO: z.string().default("gemini-3-pro-preview"),
  GEMINI_MODEL: z.string().default(""),
  GEMINI_THINKING_LEVEL: z.enum(THINKING_LEVELS).default("low"),
  IMAGE_DEFAULT_PROMPT: z.string().default(DEFAULT_IMAGE_PROMPT),

  GOOGLE_SERVICE_ACCOUNT_FILE: z.string().default("service_account.json"),

  NOTEBOOKLM_HEADLESS: booleanFlag.default("false"),
  NOTEBOOKLM_USER_DATA_DIR: z.string().default(path.join(process.cwd(), "data", "browser_profile")),
  NOTEBOOKLM_TIMEOUT: z.coerce.number().int().positive().default(30000),

  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export interface Config {
  botToken: string;
  geminiApiKey: string;
  adminUserId?: number;
  notificationChannelId?: number;
  allowedUsers: number[];

  dataDir: string;
  storesFile: string;
  userStateFile: string;
  memoryFile: string;
  settingsFile: string;
  auditDir: string;
  exportDir: string;
  exportFontPath?: string;
  exportRetentionHours: number;
  promptsLibraryFile: string;

  memoryMaxMessages: number;
  memoryCleanupDays: number;
  /** Seconds */
  queryTimeout: number;
  actionConfidenceThreshold: number;

  geminiModelFlash: string;
  geminiModelPro: string;
  geminiModel: string;
  geminiThinkingLevel: ThinkingLevelName;
  imageDefaultPrompt: string;

  googleServiceAccountFile: string;

  notebooklmHeadless: boolean;
  notebooklmUserDataDir: string;
  /** Milliseconds */
  notebooklmTimeout: number;

  logLevel: "error" | "warn" | "info" | "debug";
  nodeEnv: "development" | "production" | "test";
}

/**
 * Build a Config from an environment map. Throws ConfigError listing every
 * invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  const e = result.data;
  return {
    botToken: e.BOT_TOKEN.trim(),
    geminiApiKey: e.GEMINI_API_KEY.trim(),
    adminUserId: e.ADMIN_USER_ID,
    notificationChannelId: e.NOTIFICATION_CHANNEL_ID,
    allowedUsers: e.ALLOWED_USERS,

    dataDir: e.DATA_DIR,
    storesFile: path.join(e.DATA_DIR, "stores.json"),
    userStateFile: path.join(e.DATA_DIR, "user_state.json"),
    memoryFile: path.join(e.DATA_DIR, "user_memory.json"),
    settingsFile: path.join(e.DATA_DIR, "settings.json"),
    auditDir: path.join(e.DATA_DIR, "audit"),
    exportDir: e.EXPORT_DIR,
    exportFontPath: e.EXPORT_FONT_PATH || undefined,
    exportRetentionHours: e.EXPORT_RETENTION_HOURS,
    promptsLibraryFile: e.PROMPTS_LIBRARY_FILE,

    memoryMaxMessages: e.MEMORY_MAX_MESSAGES,
    memoryCleanupDays: e.MEMORY_CLEANUP_DAYS,
    queryTimeout: e.QUERY_TIMEOUT,
    actionConfidenceThreshold: e.ACTION_CONFIDENCE_THRESHOLD,

    geminiModelFlash: e.GEMINI_MODEL_FLASH,
    geminiModelPro: e.GEMINI_MODEL_PRO,
    geminiModel: e.GEMINI_MODEL || e.GEMINI_MODEL_FLASH,
    geminiThinkingLevel: e.GEMINI_THINKING_LEVEL,
    imageDefaultPrompt: e.IMAGE_DEFAULT_PROMPT,

    googleServiceAccountFile: e.GOOGLE_SERVICE_ACCOUNT_FILE,

    notebooklmHeadless: e.NOTEBOOKLM_HEADLESS,
    notebooklmUserDataDir: e.NOTEBOOKLM_USER_DATA_DIR,
    notebooklmTimeout: e.NOTEBOOKLM_TIMEOUT,

    logLevel: e.LOG_LEVEL,
    nodeEnv: e.NODE_ENV,
  };
}

/**
 * Fail fast before polling starts: every secret the bot cannot run without
 * is reported in one error.
 */
export function validateStartupConfig(config: Config): void {
  const missing: string[] = [];
  if (!config.botToken) missing.push("BOT_TOKEN");
  if (!config.geminiApiKey) missing.push("GEMINI_API_KEY");

  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}. ` +
        "Set them in the environment or in a .env file."
    );
  }
}

export const CONFIG: Readonly<Config> = Object.freeze(loadConfig());
